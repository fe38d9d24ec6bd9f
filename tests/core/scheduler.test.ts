import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { openDatabase, type AppDatabase } from "../../src/db";
import { cronJobs } from "../../src/db/schema";
import { isPayloadType, OutreachScheduler } from "../../src/core/scheduler";

describe("OutreachScheduler", () => {
  let db: AppDatabase;
  let scheduler: OutreachScheduler;

  beforeEach(() => {
    db = openDatabase(":memory:");
    scheduler = new OutreachScheduler(db);
  });

  afterEach(() => {
    scheduler.stop();
  });

  test("addJob stores the job with its next run", () => {
    const job = scheduler.addJob({ name: "Morning scout", schedule: "0 8 * * *", payloadType: "scout" });

    expect(job).toMatchObject({ name: "Morning scout", payloadType: "scout", timezone: "UTC", payloadParams: null });
    expect(job.nextRunAt).toMatch(/T08:00:00\.000Z$/);
    expect(scheduler.listJobs().map(j => j.id)).toEqual([job.id]);
  });

  test("addJob rejects a malformed cron pattern", () => {
    expect(() => scheduler.addJob({ name: "bad", schedule: "every morning", payloadType: "scout" })).toThrow();
    expect(scheduler.listJobs()).toEqual([]);
  });

  test("runNow records a successful run with its summary and params", async () => {
    const executor = vi.fn(async (params: Record<string, unknown>) => ({
      success: true,
      summary: { drafted: params.limit },
    }));
    scheduler.registerExecutor("draft", executor);
    const job = scheduler.addJob({
      name: "Drafts",
      schedule: "0 9 * * 1-5",
      payloadType: "draft",
      payloadParams: { limit: 5 },
    });

    const run = await scheduler.runNow(job.id);

    expect(executor).toHaveBeenCalledTimes(1);
    expect(executor.mock.calls[0][0]).toEqual({ limit: 5 });
    expect(run).toMatchObject({ jobId: job.id, status: "success", triggerReason: "manual", resultSummary: '{"drafted":5}' });
    expect(run.finishedAt).not.toBeNull();
    expect(scheduler.recentRuns().map(r => r.id)).toEqual([run.id]);
  });

  test("a failing executor marks the run failed", async () => {
    scheduler.registerExecutor("send_approved", async () => ({ success: false, error: "1 draft(s) failed" }));
    const job = scheduler.addJob({ name: "Send", schedule: "30 9 * * *", payloadType: "send_approved" });

    const run = await scheduler.runNow(job.id);

    expect(run).toMatchObject({ status: "failed", errorMessage: "1 draft(s) failed" });
  });

  test("a job without an executor fails instead of throwing", async () => {
    const job = scheduler.addJob({ name: "Run", schedule: "0 * * * *", payloadType: "run" });

    const run = await scheduler.runNow(job.id);

    expect(run).toMatchObject({ status: "failed", errorMessage: "No executor registered for payload type: run" });
    expect(db.select().from(cronJobs).get()?.lastRunAt).not.toBeNull();
  });

  test("runNow rejects an unknown job", async () => {
    await expect(scheduler.runNow(42)).rejects.toThrow("Cron job #42 not found");
  });

  test("start schedules enabled jobs; stop clears them", () => {
    scheduler.addJob({ name: "Scout", schedule: "0 8 * * *", payloadType: "scout" });

    scheduler.start();
    expect(scheduler.getStatus()).toMatchObject({ running: true, jobCount: 1 });

    scheduler.stop();
    expect(scheduler.getStatus()).toEqual({ running: false, jobCount: 0, jobs: [] });
  });

  test("isPayloadType", () => {
    expect(isPayloadType("send_approved")).toBe(true);
    expect(isPayloadType("send")).toBe(false);
  });
});
