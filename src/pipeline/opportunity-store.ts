import { and, asc, eq, inArray, notExists, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import {
  contactEmails,
  drafts,
  opportunities,
  sightings,
  type ContactEmailRow,
  type OpportunityRow,
} from "../db/schema";
import type { KeyedRecord } from "./dedup";
import type { ContactEmail, Opportunity, Reachability } from "./types";

export function toOpportunity(row: OpportunityRow): Opportunity {
  return {
    id: row.id,
    companyKey: row.companyKey,
    company: row.company,
    title: row.title,
    description: row.description,
    source: row.source,
    url: row.url,
    urlKey: row.urlKey,
    location: row.location,
    category: row.category,
    reachability: row.reachability,
    discoveredAt: new Date(row.discoveredAt),
  };
}

function toContactEmail(row: ContactEmailRow): ContactEmail {
  return {
    opportunityId: row.opportunityId,
    address: row.address,
    strategy: row.strategy,
    tier: row.tier,
    verified: row.verified,
    resolvedAt: new Date(row.resolvedAt),
  };
}

export interface IngestResult {
  created: Opportunity[];
  resighted: number;
}

/**
 * Persistence for opportunities, their sightings and resolved contacts.
 */
export class OpportunityStore {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Persist a deduplicated batch and the in-batch duplicates it collapsed.
   * A (company, url) key already on record only gains a sighting row.
   *
   * The insert tolerates a conflict on the key, so a concurrent scout that
   * stored the same posting first turns this one into a re-sighting. The
   * transaction takes the write lock up front.
   */
  ingest(batch: KeyedRecord[], duplicates: KeyedRecord[] = []): IngestResult {
    return this.db.transaction((tx) => {
      const created: Opportunity[] = [];
      let resighted = 0;

      for (const { record, urlKey } of [...batch, ...duplicates]) {
        const seenAt = record.discoveredAt.toISOString();
        const [inserted] = tx.insert(opportunities).values({
          companyKey: record.companyKey,
          company: record.company,
          title: record.title,
          description: record.description,
          source: record.source,
          url: record.url,
          urlKey,
          location: record.location,
          category: record.category,
          discoveredAt: seenAt,
        }).onConflictDoNothing().returning().all();

        let opportunityId: number;
        if (inserted) {
          opportunityId = inserted.id;
          created.push(toOpportunity(inserted));
        } else {
          const existing = tx.select({ id: opportunities.id })
            .from(opportunities)
            .where(and(eq(opportunities.companyKey, record.companyKey), eq(opportunities.urlKey, urlKey)))
            .get();
          if (!existing) {
            throw new Error(`Opportunity ${record.companyKey} ${urlKey} conflicted but is not stored`);
          }
          opportunityId = existing.id;
          resighted++;
        }

        tx.insert(sightings).values({
          opportunityId,
          source: record.source,
          url: record.url,
          seenAt,
        }).run();
      }

      return { created, resighted };
    }, { behavior: "immediate" });
  }

  get(id: number): Opportunity | null {
    const row = this.db.select().from(opportunities).where(eq(opportunities.id, id)).get();
    return row ? toOpportunity(row) : null;
  }

  sightingCount(opportunityId: number): number {
    const row = this.db.select({ count: sql<number>`count(*)` })
      .from(sightings)
      .where(eq(sightings.opportunityId, opportunityId))
      .get();
    return row?.count ?? 0;
  }

  /**
   * Opportunities still eligible to be drafted: no draft of their own and
   * not already marked unreachable. Grouped by company key.
   */
  candidatesByCompany(): Map<string, Opportunity[]> {
    const rows = this.db.select()
      .from(opportunities)
      .where(and(
        inArray(opportunities.reachability, ["unresolved", "reachable"]),
        notExists(
          this.db.select({ id: drafts.id }).from(drafts).where(eq(drafts.opportunityId, opportunities.id)),
        ),
      ))
      .orderBy(asc(opportunities.companyKey), asc(opportunities.id))
      .all();

    const buckets = new Map<string, Opportunity[]>();
    for (const row of rows) {
      const bucket = buckets.get(row.companyKey) ?? [];
      bucket.push(toOpportunity(row));
      buckets.set(row.companyKey, bucket);
    }
    return buckets;
  }

  markReachability(opportunityId: number, reachability: Reachability): void {
    this.db.update(opportunities)
      .set({ reachability })
      .where(eq(opportunities.id, opportunityId))
      .run();
  }

  /**
   * Attach the resolved contact and mark the opportunity reachable. An
   * opportunity keeps the first contact it was given.
   */
  saveContact(contact: ContactEmail): ContactEmail {
    return this.db.transaction((tx) => {
      const existing = tx.select().from(contactEmails)
        .where(eq(contactEmails.opportunityId, contact.opportunityId))
        .get();
      if (existing) return toContactEmail(existing);

      tx.insert(contactEmails).values({
        opportunityId: contact.opportunityId,
        address: contact.address,
        strategy: contact.strategy,
        tier: contact.tier,
        verified: contact.verified,
        resolvedAt: contact.resolvedAt.toISOString(),
      }).run();
      tx.update(opportunities)
        .set({ reachability: "reachable" })
        .where(eq(opportunities.id, contact.opportunityId))
        .run();
      return contact;
    });
  }

  getContact(opportunityId: number): ContactEmail | null {
    const row = this.db.select().from(contactEmails)
      .where(eq(contactEmails.opportunityId, opportunityId))
      .get();
    return row ? toContactEmail(row) : null;
  }

  countByReachability(): Record<Reachability, number> {
    const rows = this.db.select({ reachability: opportunities.reachability, count: sql<number>`count(*)` })
      .from(opportunities)
      .groupBy(opportunities.reachability)
      .all();
    const counts: Record<Reachability, number> = { unresolved: 0, reachable: 0, unreachable: 0 };
    for (const row of rows) {
      counts[row.reachability] = row.count;
    }
    return counts;
  }
}
