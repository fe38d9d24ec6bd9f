import type { LockConfig } from "../src/core/config-schema";
import { urlKeyFor } from "../src/pipeline/dedup";
import type { OpportunityStore } from "../src/pipeline/opportunity-store";
import type { Draft, Opportunity, OpportunityRecord } from "../src/pipeline/types";
import type { MailTransport, SendOutcome } from "../src/services/mailer";

export const TEST_LOCK: LockConfig = { ttl_ms: 60_000, wait_ms: 2_000, poll_ms: 5 };

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function makeRecord(overrides: Partial<OpportunityRecord> = {}): OpportunityRecord {
  return {
    companyKey: "acme",
    company: "Acme",
    title: "TypeScript Engineer",
    description: "Build the platform with TypeScript.",
    source: "linkedin-jobs",
    url: "https://www.linkedin.com/jobs/view/1001",
    location: "Remote",
    discoveredAt: new Date("2026-03-01T09:00:00.000Z"),
    category: "js-ts",
    ...overrides,
  };
}

export function makeOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  const record = makeRecord(overrides);
  return {
    id: 1,
    urlKey: urlKeyFor(record),
    reachability: "unresolved",
    ...record,
    ...overrides,
  };
}

/** Insert one opportunity through the store and return it. */
export function seedOpportunity(store: OpportunityStore, overrides: Partial<OpportunityRecord> = {}): Opportunity {
  const record = makeRecord(overrides);
  const [created] = store.ingest([{ record, urlKey: urlKeyFor(record) }]).created;
  if (!created) throw new Error(`seed collided with an existing opportunity: ${record.url}`);
  return created;
}

/** Records every delivery; optionally slow or failing. */
export class FakeTransport implements MailTransport {
  readonly sent: Draft[] = [];

  constructor(
    private readonly outcome: (draft: Draft) => SendOutcome | Promise<SendOutcome> = (draft) => ({
      ok: true,
      messageId: `<${draft.id}@test>`,
    }),
    private readonly delayMs = 0,
  ) {}

  async send(draft: Draft): Promise<SendOutcome> {
    if (this.delayMs > 0) await sleep(this.delayMs);
    const result = await this.outcome(draft);
    if (result.ok) this.sent.push(draft);
    return result;
  }
}
