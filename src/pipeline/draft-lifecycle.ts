import { and, desc, eq, gte, inArray, notExists, sql } from "drizzle-orm";
import { alias } from "drizzle-orm/sqlite-core";
import type { AppDatabase } from "../db";
import { drafts, opportunities, type DraftRow } from "../db/schema";
import {
  DraftNotFoundError,
  DuplicateCompanyOutreachError,
  SendFailedError,
  TerminalStateError,
  UnapprovedDraftError,
  errorMessage,
} from "../core/errors";
import type { MailTransport, SendOutcome } from "../services/mailer";
import type { OutreachLock } from "./outreach-lock";
import type { Draft, DraftStatus } from "./types";

const EDITABLE: DraftStatus[] = ["pending", "approved"];

export interface NewDraft {
  opportunityId: number;
  recipient: string;
  subject: string;
  body: string;
}

export interface DraftEdit {
  subject?: string;
  body?: string;
}

export interface SendOptions {
  /** Allow `pending -> sent` without review. */
  allowPending?: boolean;
}

function toDraft(row: DraftRow, company: string, title: string): Draft {
  return {
    id: row.id,
    opportunityId: row.opportunityId,
    companyKey: row.companyKey,
    company,
    title,
    recipient: row.recipient,
    subject: row.subject,
    body: row.body,
    status: row.status,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
    sentAt: row.sentAt ? new Date(row.sentAt) : null,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && String(err.code).startsWith("SQLITE_CONSTRAINT");
}

/**
 * Owns draft status. Every transition is a conditional UPDATE on the
 * expected prior status, so a concurrent change shows up as zero affected
 * rows instead of being overwritten.
 *
 *   pending -> approved -> sent
 *   pending|approved -> discarded
 *   pending -> sent (only with allowPending)
 *
 * `sent` and `discarded` are terminal.
 */
export class DraftLifecycle {
  constructor(
    private readonly db: AppDatabase,
    private readonly lock: OutreachLock,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private selectDrafts() {
    return this.db.select({ draft: drafts, company: opportunities.company, title: opportunities.title })
      .from(drafts)
      .innerJoin(opportunities, eq(drafts.opportunityId, opportunities.id));
  }

  create(input: NewDraft): Draft {
    const opportunity = this.db.select({ companyKey: opportunities.companyKey })
      .from(opportunities)
      .where(eq(opportunities.id, input.opportunityId))
      .get();
    if (!opportunity) {
      throw new Error(`Opportunity #${input.opportunityId} not found`);
    }

    const stamp = this.now().toISOString();
    const row = this.db.insert(drafts).values({
      opportunityId: input.opportunityId,
      companyKey: opportunity.companyKey,
      recipient: input.recipient,
      subject: input.subject,
      body: input.body,
      status: "pending",
      createdAt: stamp,
      updatedAt: stamp,
    }).returning({ id: drafts.id }).get();
    return this.get(row.id);
  }

  find(id: number): Draft | null {
    const row = this.selectDrafts().where(eq(drafts.id, id)).get();
    return row ? toDraft(row.draft, row.company, row.title) : null;
  }

  /** @throws DraftNotFoundError */
  get(id: number): Draft {
    const draft = this.find(id);
    if (!draft) throw new DraftNotFoundError(id);
    return draft;
  }

  list(status?: DraftStatus): Draft[] {
    const query = this.selectDrafts();
    const rows = status
      ? query.where(eq(drafts.status, status)).orderBy(drafts.id).all()
      : query.orderBy(drafts.id).all();
    return rows.map(row => toDraft(row.draft, row.company, row.title));
  }

  /** pending -> approved. Approving an approved draft changes nothing. */
  approve(id: number): Draft {
    const draft = this.get(id);
    if (draft.status === "approved") return draft;
    this.assertNotTerminal(draft, "approve");
    this.transition(draft, ["pending"], { status: "approved" }, "approve");
    return this.get(id);
  }

  /**
   * pending|approved -> discarded. Taken under the company's outreach lock,
   * so a discard waits for an in-flight send and then sees its outcome.
   */
  async discard(id: number): Promise<Draft> {
    const draft = this.get(id);
    this.assertNotTerminal(draft, "discard");
    return this.lock.withLock(draft.companyKey, async () => {
      const current = this.get(id);
      this.assertNotTerminal(current, "discard");
      this.transition(current, EDITABLE, { status: "discarded" }, "discard");
      return this.get(id);
    });
  }

  /** Subject/body change, under the same lock as `send`. */
  async edit(id: number, changes: DraftEdit): Promise<Draft> {
    const draft = this.get(id);
    this.assertNotTerminal(draft, "edit");
    const update: Partial<Pick<DraftRow, "subject" | "body">> = {};
    if (changes.subject !== undefined) update.subject = changes.subject;
    if (changes.body !== undefined) update.body = changes.body;
    return this.lock.withLock(draft.companyKey, async () => {
      const current = this.get(id);
      this.assertNotTerminal(current, "edit");
      this.transition(current, EDITABLE, update, "edit");
      return this.get(id);
    });
  }

  hasSentDraft(companyKey: string): boolean {
    const row = this.db.select({ id: drafts.id }).from(drafts)
      .where(and(eq(drafts.companyKey, companyKey), eq(drafts.status, "sent")))
      .get();
    return row !== undefined;
  }

  hasActiveDraft(companyKey: string): boolean {
    const row = this.db.select({ id: drafts.id }).from(drafts)
      .where(and(eq(drafts.companyKey, companyKey), inArray(drafts.status, EDITABLE)))
      .get();
    return row !== undefined;
  }

  countSentSince(since: Date): number {
    const row = this.db.select({ count: sql<number>`count(*)` }).from(drafts)
      .where(and(eq(drafts.status, "sent"), gte(drafts.sentAt, since.toISOString())))
      .get();
    return row?.count ?? 0;
  }

  countByStatus(): Record<DraftStatus, number> {
    const rows = this.db.select({ status: drafts.status, count: sql<number>`count(*)` })
      .from(drafts)
      .groupBy(drafts.status)
      .all();
    const counts: Record<DraftStatus, number> = { pending: 0, approved: 0, discarded: 0, sent: 0 };
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  recentSent(limit: number): Draft[] {
    return this.selectDrafts()
      .where(eq(drafts.status, "sent"))
      .orderBy(desc(drafts.sentAt), desc(drafts.id))
      .limit(limit)
      .all()
      .map(row => toDraft(row.draft, row.company, row.title));
  }

  /**
   * Deliver a draft and record it as sent.
   *
   * Runs under the company's outreach lock. The transport is called only
   * after the one-sent-per-company check passes, and the draft moves to
   * `sent` only after the transport reports success; a failed delivery
   * leaves the draft where it was.
   */
  async send(id: number, transport: MailTransport, options: SendOptions = {}): Promise<Draft> {
    const allowed: DraftStatus[] = options.allowPending ? ["pending", "approved"] : ["approved"];
    const draft = this.get(id);
    this.assertSendable(draft, allowed);

    return this.lock.withLock(draft.companyKey, async () => {
      const current = this.get(id);
      this.assertSendable(current, allowed);
      if (this.hasSentDraft(current.companyKey)) {
        throw new DuplicateCompanyOutreachError(id, current.companyKey);
      }

      let outcome: SendOutcome;
      try {
        outcome = await transport.send(current);
      } catch (err) {
        throw new SendFailedError(id, errorMessage(err));
      }
      if (!outcome.ok) {
        throw new SendFailedError(id, outcome.error);
      }

      this.commitSent(current, allowed);
      return this.get(id);
    });
  }

  private commitSent(draft: Draft, allowed: DraftStatus[]): void {
    const sentDrafts = alias(drafts, "sent_drafts");
    const stamp = this.now().toISOString();
    let changes: number;
    try {
      changes = this.db.update(drafts)
        .set({ status: "sent", sentAt: stamp, updatedAt: stamp })
        .where(and(
          eq(drafts.id, draft.id),
          inArray(drafts.status, allowed),
          notExists(
            this.db.select({ id: sentDrafts.id }).from(sentDrafts)
              .where(and(eq(sentDrafts.companyKey, draft.companyKey), eq(sentDrafts.status, "sent"))),
          ),
        ))
        .run().changes;
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      changes = 0;
    }

    if (changes === 0) {
      console.error(`❌ [Drafts] Draft #${draft.id} was delivered but another send for ${draft.companyKey} was recorded first`);
      const latest = this.get(draft.id);
      this.assertNotTerminal(latest, "send");
      throw new DuplicateCompanyOutreachError(draft.id, draft.companyKey);
    }
  }

  private assertNotTerminal(draft: Draft, attempted: string): void {
    if (draft.status === "sent" || draft.status === "discarded") {
      throw new TerminalStateError(draft.id, draft.status, attempted);
    }
  }

  private assertSendable(draft: Draft, allowed: DraftStatus[]): void {
    this.assertNotTerminal(draft, "send");
    if (!allowed.includes(draft.status)) {
      throw new UnapprovedDraftError(draft.id);
    }
  }

  /**
   * Conditional update guarded on the expected prior status. Zero affected
   * rows means someone else moved the draft first.
   */
  private transition(
    draft: Draft,
    from: DraftStatus[],
    changes: Partial<Pick<DraftRow, "status" | "subject" | "body">>,
    attempted: string,
  ): void {
    const result = this.db.update(drafts)
      .set({ ...changes, updatedAt: this.now().toISOString() })
      .where(and(eq(drafts.id, draft.id), inArray(drafts.status, from)))
      .run();
    if (result.changes === 0) {
      const latest = this.get(draft.id);
      throw new TerminalStateError(draft.id, latest.status, attempted);
    }
  }
}
