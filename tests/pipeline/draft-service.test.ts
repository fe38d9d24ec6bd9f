import { beforeEach, describe, expect, test, vi, type Mock } from "vitest";
import { DEFAULT_CONFIG } from "../../src/core/config-reader";
import { ContentGenerationError } from "../../src/core/errors";
import { openDatabase } from "../../src/db";
import { DraftLifecycle } from "../../src/pipeline/draft-lifecycle";
import { DraftService } from "../../src/pipeline/draft-service";
import { EmailResolver, postingTextStrategy, type PageFetcher } from "../../src/pipeline/email-resolver";
import { OpportunityStore } from "../../src/pipeline/opportunity-store";
import { OutreachLock } from "../../src/pipeline/outreach-lock";
import type { DraftRequest, EmailDrafter } from "../../src/services/llm";
import { FakeTransport, seedOpportunity, TEST_LOCK } from "../helpers";

const noPages: PageFetcher = { fetchPage: async () => null };

class FakeDrafter implements EmailDrafter {
  readonly requests: DraftRequest[] = [];
  failFor = new Set<string>();

  async draft(request: DraftRequest) {
    this.requests.push(request);
    if (this.failFor.has(request.opportunity.companyKey)) {
      throw new ContentGenerationError("LLM call failed: overloaded");
    }
    return { subject: `Application: ${request.opportunity.title}`, body: `Hello ${request.opportunity.company}` };
  }
}

describe("DraftService", () => {
  let store: OpportunityStore;
  let lifecycle: DraftLifecycle;
  let drafter: FakeDrafter;
  let resumeText: Mock<() => Promise<string>>;
  let service: DraftService;

  beforeEach(() => {
    const db = openDatabase(":memory:");
    store = new OpportunityStore(db);
    lifecycle = new DraftLifecycle(db, new OutreachLock(db, TEST_LOCK));
    drafter = new FakeDrafter();
    resumeText = vi.fn(async () => "Ten years of TypeScript");
    service = new DraftService({
      store,
      lifecycle,
      resolver: new EmailResolver([postingTextStrategy], noPages, { hasMailExchange: async () => true }, {
        timeoutMs: 1_000,
        maxPages: 2,
        hrPrefixes: ["careers"],
      }),
      drafter,
      priority: DEFAULT_CONFIG.ranking.category_priority,
      profile: DEFAULT_CONFIG.profile,
      resumeText,
    });
  });

  test("drafts for the best-ranked reachable posting of each company", async () => {
    seedOpportunity(store, {
      url: "https://acme.com/jobs/1",
      category: "full-stack",
      title: "Full Stack Engineer",
      description: "Write to hiring@acme.com",
      discoveredAt: new Date("2026-03-01T10:00:00.000Z"),
    });
    const jsTs = seedOpportunity(store, {
      url: "https://acme.com/jobs/2",
      category: "js-ts",
      description: "Write to hiring@acme.com",
      discoveredAt: new Date("2026-03-01T11:00:00.000Z"),
    });
    const ghost = seedOpportunity(store, {
      companyKey: "globex",
      company: "Globex",
      url: "https://globex.com/jobs/1",
      description: "Apply on our portal",
    });

    const summary = await service.run();

    expect(summary.companies).toBe(2);
    expect(summary.drafted).toHaveLength(1);
    expect(summary.drafted[0]).toMatchObject({
      opportunityId: jsTs.id,
      recipient: "hiring@acme.com",
      subject: "Application: TypeScript Engineer",
      body: "Hello Acme",
      status: "pending",
    });
    expect(summary.skipped).toEqual([{ companyKey: "globex", reason: "no contact address" }]);
    expect(summary.unreachable).toBe(1);
    expect(store.get(ghost.id)?.reachability).toBe("unreachable");
    expect(drafter.requests[0].resumeText).toBe("Ten years of TypeScript");
  });

  test("falls through to the next candidate when the winner has no contact", async () => {
    const winner = seedOpportunity(store, {
      url: "https://acme.com/jobs/1",
      category: "js-ts",
      description: "Apply on our portal",
    });
    const runnerUp = seedOpportunity(store, {
      url: "https://acme.com/jobs/2",
      category: "backend",
      description: "Questions: jobs@acme.com",
    });

    const summary = await service.run();

    expect(summary.drafted.map(d => d.opportunityId)).toEqual([runnerUp.id]);
    expect(summary.unreachable).toBe(1);
    expect(store.get(winner.id)?.reachability).toBe("unreachable");
  });

  test("skips companies already contacted or with a draft under review", async () => {
    const contacted = seedOpportunity(store, {
      companyKey: "initech",
      company: "Initech",
      url: "https://initech.com/jobs/1",
      description: "mail jobs@initech.com",
    });
    seedOpportunity(store, {
      companyKey: "initech",
      company: "Initech",
      url: "https://initech.com/jobs/2",
      description: "mail jobs@initech.com",
    });
    const old = lifecycle.create({ opportunityId: contacted.id, recipient: "jobs@initech.com", subject: "s", body: "b" });
    await lifecycle.send(old.id, new FakeTransport(), { allowPending: true });
    seedOpportunity(store, { url: "https://acme.com/jobs/1", description: "mail jobs@acme.com" });
    seedOpportunity(store, { url: "https://acme.com/jobs/2", description: "mail jobs@acme.com" });

    const first = await service.run();
    const second = await service.run();

    expect(first.drafted.map(d => d.companyKey)).toEqual(["acme"]);
    expect(first.skipped).toEqual([{ companyKey: "initech", reason: "already contacted" }]);
    expect(second.drafted).toEqual([]);
    expect(second.skipped).toEqual([
      { companyKey: "acme", reason: "draft awaiting review" },
      { companyKey: "initech", reason: "already contacted" },
    ]);
  });

  test("a discarded draft makes the company eligible again", async () => {
    seedOpportunity(store, { url: "https://acme.com/jobs/1", description: "mail jobs@acme.com" });
    const next = seedOpportunity(store, { url: "https://acme.com/jobs/2", description: "mail jobs@acme.com" });

    const [draft] = (await service.run()).drafted;
    await lifecycle.discard(draft.id);
    const again = await service.run();

    expect(again.drafted.map(d => d.opportunityId)).toEqual([next.id]);
  });

  test("a drafting failure skips the company and keeps going", async () => {
    drafter.failFor.add("acme");
    seedOpportunity(store, { url: "https://acme.com/jobs/1", description: "mail jobs@acme.com" });
    seedOpportunity(store, {
      companyKey: "globex",
      company: "Globex",
      url: "https://globex.com/jobs/1",
      description: "mail jobs@globex.com",
    });

    const summary = await service.run();

    expect(summary.skipped).toEqual([{ companyKey: "acme", reason: "LLM call failed: overloaded" }]);
    expect(summary.drafted.map(d => d.companyKey)).toEqual(["globex"]);
    expect(lifecycle.hasActiveDraft("acme")).toBe(false);
    expect(resumeText).toHaveBeenCalledTimes(1);
  });

  test("limit stops after that many drafts", async () => {
    seedOpportunity(store, { url: "https://acme.com/jobs/1", description: "mail jobs@acme.com" });
    seedOpportunity(store, {
      companyKey: "globex",
      company: "Globex",
      url: "https://globex.com/jobs/1",
      description: "mail jobs@globex.com",
    });

    const summary = await service.run({ limit: 1 });

    expect(summary.drafted.map(d => d.companyKey)).toEqual(["acme"]);
  });

  test("preview lists each eligible company's winner without resolving", () => {
    seedOpportunity(store, { url: "https://acme.com/jobs/1", category: "backend" });
    const best = seedOpportunity(store, { url: "https://acme.com/jobs/2", category: "js-ts" });

    expect(service.preview()).toEqual([{ companyKey: "acme", winner: best }]);
    expect(drafter.requests).toEqual([]);
  });
});
