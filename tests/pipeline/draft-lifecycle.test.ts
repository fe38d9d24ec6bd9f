import { beforeEach, describe, expect, test } from "vitest";
import { eq } from "drizzle-orm";
import {
  DraftNotFoundError,
  DuplicateCompanyOutreachError,
  SendFailedError,
  TerminalStateError,
  UnapprovedDraftError,
} from "../../src/core/errors";
import { openDatabase, type AppDatabase } from "../../src/db";
import { drafts } from "../../src/db/schema";
import { DraftLifecycle } from "../../src/pipeline/draft-lifecycle";
import { OpportunityStore } from "../../src/pipeline/opportunity-store";
import { OutreachLock } from "../../src/pipeline/outreach-lock";
import type { Draft } from "../../src/pipeline/types";
import { FakeTransport, seedOpportunity, sleep, TEST_LOCK } from "../helpers";

describe("DraftLifecycle", () => {
  let db: AppDatabase;
  let store: OpportunityStore;
  let lifecycle: DraftLifecycle;
  let clock: Date;

  beforeEach(() => {
    db = openDatabase(":memory:");
    store = new OpportunityStore(db);
    clock = new Date("2026-03-01T10:00:00.000Z");
    lifecycle = new DraftLifecycle(db, new OutreachLock(db, TEST_LOCK), () => clock);
  });

  function draftFor(url: string, companyKey = "acme"): Draft {
    const opportunity = seedOpportunity(store, { url, companyKey, company: companyKey });
    return lifecycle.create({
      opportunityId: opportunity.id,
      recipient: `jobs@${companyKey}.io`,
      subject: "Application",
      body: "Hello there",
    });
  }

  test("new drafts start pending with the opportunity's company and title", () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");

    expect(draft).toMatchObject({
      status: "pending",
      companyKey: "acme",
      company: "acme",
      title: "TypeScript Engineer",
      recipient: "jobs@acme.io",
      sentAt: null,
    });
    expect(draft.createdAt).toEqual(clock);
  });

  test("approving draft #3 twice leaves it approved", () => {
    draftFor("https://www.linkedin.com/jobs/view/1");
    draftFor("https://www.linkedin.com/jobs/view/2", "globex");
    const third = draftFor("https://www.linkedin.com/jobs/view/3", "initech");
    expect(third.id).toBe(3);

    clock = new Date("2026-03-01T11:00:00.000Z");
    const once = lifecycle.approve(3);
    clock = new Date("2026-03-01T12:00:00.000Z");
    const twice = lifecycle.approve(3);

    expect(once.status).toBe("approved");
    expect(twice.status).toBe("approved");
    expect(twice.updatedAt).toEqual(new Date("2026-03-01T11:00:00.000Z"));
  });

  test("unknown ids raise DraftNotFoundError", () => {
    expect(() => lifecycle.approve(99)).toThrow(DraftNotFoundError);
    expect(lifecycle.find(99)).toBeNull();
  });

  test("edit works on pending and approved drafts and keeps the status", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");

    expect(await lifecycle.edit(draft.id, { subject: "Better subject" })).toMatchObject({
      status: "pending",
      subject: "Better subject",
      body: "Hello there",
    });

    lifecycle.approve(draft.id);
    expect(await lifecycle.edit(draft.id, { body: "New body" })).toMatchObject({
      status: "approved",
      subject: "Better subject",
      body: "New body",
    });
  });

  test("discarded drafts are terminal", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    expect((await lifecycle.discard(draft.id)).status).toBe("discarded");

    expect(() => lifecycle.approve(draft.id)).toThrow(TerminalStateError);
    await expect(lifecycle.edit(draft.id, { subject: "x" })).rejects.toBeInstanceOf(TerminalStateError);
    await expect(lifecycle.discard(draft.id)).rejects.toBeInstanceOf(TerminalStateError);
    expect(lifecycle.hasActiveDraft("acme")).toBe(false);
  });

  test("sent drafts are terminal", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    lifecycle.approve(draft.id);
    const sent = await lifecycle.send(draft.id, new FakeTransport());

    expect(sent.status).toBe("sent");
    expect(sent.sentAt).toEqual(clock);
    expect(() => lifecycle.approve(draft.id)).toThrow(TerminalStateError);
    await expect(lifecycle.discard(draft.id)).rejects.toBeInstanceOf(TerminalStateError);
    await expect(lifecycle.edit(draft.id, { body: "x" })).rejects.toBeInstanceOf(TerminalStateError);
    await expect(lifecycle.send(draft.id, new FakeTransport())).rejects.toBeInstanceOf(TerminalStateError);
  });

  test("pending drafts need approval unless the bypass is requested", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    const transport = new FakeTransport();

    await expect(lifecycle.send(draft.id, transport)).rejects.toBeInstanceOf(UnapprovedDraftError);
    expect(transport.sent).toEqual([]);

    const sent = await lifecycle.send(draft.id, transport, { allowPending: true });
    expect(sent.status).toBe("sent");
    expect(transport.sent.map(d => d.id)).toEqual([draft.id]);
  });

  test("a failed delivery leaves the draft approved and the company open", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    lifecycle.approve(draft.id);
    const refused = new FakeTransport(() => ({ ok: false, error: "550 mailbox unavailable" }));

    await expect(lifecycle.send(draft.id, refused)).rejects.toThrow(
      new SendFailedError(draft.id, "550 mailbox unavailable").message,
    );
    expect(lifecycle.get(draft.id)).toMatchObject({ status: "approved", sentAt: null });

    const retried = await lifecycle.send(draft.id, new FakeTransport());
    expect(retried.status).toBe("sent");
  });

  test("a transport that throws is reported as SendFailedError", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    lifecycle.approve(draft.id);
    const exploding = new FakeTransport(() => {
      throw new Error("connection reset");
    });

    await expect(lifecycle.send(draft.id, exploding)).rejects.toBeInstanceOf(SendFailedError);
    expect(lifecycle.get(draft.id).status).toBe("approved");
  });

  test("a second draft for an already-contacted company is refused", async () => {
    const first = draftFor("https://www.linkedin.com/jobs/view/1");
    const second = draftFor("https://www.linkedin.com/jobs/view/2");
    lifecycle.approve(first.id);
    lifecycle.approve(second.id);
    const transport = new FakeTransport();

    await lifecycle.send(first.id, transport);

    await expect(lifecycle.send(second.id, transport)).rejects.toBeInstanceOf(DuplicateCompanyOutreachError);
    expect(transport.sent).toHaveLength(1);
    expect(lifecycle.get(second.id).status).toBe("approved");
  });

  test("of two concurrent sends for one company exactly one goes out", async () => {
    const first = draftFor("https://www.linkedin.com/jobs/view/1");
    const second = draftFor("https://www.linkedin.com/jobs/view/2");
    lifecycle.approve(first.id);
    lifecycle.approve(second.id);
    // A second process: its own lock owner on the same database.
    const other = new DraftLifecycle(db, new OutreachLock(db, TEST_LOCK), () => clock);
    const transport = new FakeTransport(undefined, 20);

    const results = await Promise.allSettled([
      lifecycle.send(first.id, transport),
      other.send(second.id, transport),
    ]);

    expect(results.map(r => r.status).sort()).toEqual(["fulfilled", "rejected"]);
    const rejected = results.find(r => r.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(DuplicateCompanyOutreachError);
    expect(transport.sent).toHaveLength(1);
    expect(lifecycle.countByStatus()).toEqual({ pending: 0, approved: 1, discarded: 0, sent: 1 });
  });

  test("a discard during an in-flight send waits for it and finds the draft sent", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    const later = draftFor("https://www.linkedin.com/jobs/view/2");
    lifecycle.approve(draft.id);
    lifecycle.approve(later.id);
    const transport = new FakeTransport(undefined, 30);

    const sending = lifecycle.send(draft.id, transport);
    await sleep(5);
    await expect(lifecycle.discard(draft.id)).rejects.toBeInstanceOf(TerminalStateError);
    await sending;

    expect(lifecycle.get(draft.id).status).toBe("sent");
    expect(lifecycle.hasSentDraft("acme")).toBe(true);
    await expect(lifecycle.send(later.id, transport)).rejects.toBeInstanceOf(DuplicateCompanyOutreachError);
    expect(transport.sent).toHaveLength(1);
  });

  test("an edit during an in-flight send cannot change what was delivered", async () => {
    const draft = draftFor("https://www.linkedin.com/jobs/view/1");
    lifecycle.approve(draft.id);
    const transport = new FakeTransport(undefined, 30);

    const sending = lifecycle.send(draft.id, transport);
    await sleep(5);
    await expect(lifecycle.edit(draft.id, { subject: "Rewritten" })).rejects.toBeInstanceOf(TerminalStateError);
    await sending;

    expect(transport.sent.map(d => d.subject)).toEqual(["Application"]);
    expect(lifecycle.get(draft.id).subject).toBe("Application");
  });

  test("a send slower than the lock TTL still keeps the company to itself", async () => {
    const first = draftFor("https://www.linkedin.com/jobs/view/1");
    const second = draftFor("https://www.linkedin.com/jobs/view/2");
    lifecycle.approve(first.id);
    lifecycle.approve(second.id);
    const shortLease = { ...TEST_LOCK, ttl_ms: 50 };
    const a = new DraftLifecycle(db, new OutreachLock(db, shortLease), () => clock);
    const b = new DraftLifecycle(db, new OutreachLock(db, shortLease), () => clock);
    const transport = new FakeTransport(undefined, 150);

    const results = await Promise.allSettled([a.send(first.id, transport), b.send(second.id, transport)]);

    expect(results.map(r => r.status).sort()).toEqual(["fulfilled", "rejected"]);
    expect(transport.sent).toHaveLength(1);
  });

  test("the conditional commit refuses a send recorded behind the lock's back", async () => {
    const first = draftFor("https://www.linkedin.com/jobs/view/1");
    const second = draftFor("https://www.linkedin.com/jobs/view/2");
    lifecycle.approve(second.id);
    const sneaky = new FakeTransport(() => {
      db.update(drafts).set({ status: "sent", sentAt: clock.toISOString() }).where(eq(drafts.id, first.id)).run();
      return { ok: true, messageId: "<sneaky@test>" };
    });

    await expect(lifecycle.send(second.id, sneaky)).rejects.toBeInstanceOf(DuplicateCompanyOutreachError);
    expect(lifecycle.get(second.id).status).toBe("approved");
  });

  test("counts and recent history", async () => {
    const a = draftFor("https://www.linkedin.com/jobs/view/1");
    const b = draftFor("https://www.linkedin.com/jobs/view/2", "globex");
    draftFor("https://www.linkedin.com/jobs/view/3", "initech");
    lifecycle.approve(a.id);
    lifecycle.approve(b.id);

    await lifecycle.send(a.id, new FakeTransport());
    clock = new Date("2026-03-02T10:00:00.000Z");
    await lifecycle.send(b.id, new FakeTransport());

    expect(lifecycle.countSentSince(new Date("2026-03-02T00:00:00.000Z"))).toBe(1);
    expect(lifecycle.recentSent(10).map(d => d.id)).toEqual([b.id, a.id]);
    expect(lifecycle.hasSentDraft("acme")).toBe(true);
    expect(lifecycle.hasSentDraft("initech")).toBe(false);
    expect(lifecycle.list("pending").map(d => d.companyKey)).toEqual(["initech"]);
  });
});
