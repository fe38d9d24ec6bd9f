import type { CAC } from "cac";
import { readFile } from "fs/promises";
import {
  bootstrap,
  createDraftService,
  createScoutService,
  createSendService,
  type AppContext,
} from "../../core/bootstrap";
import { OutreachError, errorMessage } from "../../core/errors";
import { isPayloadType, OutreachScheduler, PAYLOAD_TYPES } from "../../core/scheduler";
import { registerPipelineExecutors } from "../../core/scheduler-executors";
import type { DraftLifecycle } from "../../pipeline/draft-lifecycle";
import { formatStatus, getPipelineStatus } from "../../pipeline/status-service";
import { DRAFT_STATUSES, type Draft, type DraftStatus } from "../../pipeline/types";
import type { CliModule } from "../../types/module";

export interface DraftOpReport {
  id: string;
  ok: boolean;
  message: string;
}

const STATUS_ICON: Record<DraftStatus, string> = {
  pending: "📝",
  approved: "👍",
  discarded: "🗑️",
  sent: "🚀",
};

class InvalidDraftIdError extends Error {
  constructor(raw: string) {
    super(`Invalid draft ID: ${raw}. Must be a positive integer.`);
  }
}

function parseDraftId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new InvalidDraftIdError(raw);
  }
  return id;
}

/**
 * Apply a lifecycle operation to each id on its own. Outreach errors and
 * bad ids are reported per draft; anything else propagates.
 */
export async function applyToDrafts(
  ids: string[],
  verb: string,
  op: (id: number) => Draft | Promise<Draft>,
): Promise<DraftOpReport[]> {
  const reports: DraftOpReport[] = [];
  for (const raw of ids) {
    try {
      const draft = await op(parseDraftId(raw));
      reports.push({ id: raw, ok: true, message: `#${draft.id} ${verb} (${draft.status})` });
    } catch (err) {
      if (err instanceof OutreachError || err instanceof InvalidDraftIdError) {
        reports.push({ id: raw, ok: false, message: err.message });
        continue;
      }
      throw err;
    }
  }
  return reports;
}

/** Non-zero only when something was requested and nothing succeeded. */
export function exitCodeFor(reports: DraftOpReport[]): number {
  return reports.length > 0 && reports.every(r => !r.ok) ? 1 : 0;
}

function printReports(reports: DraftOpReport[]): void {
  for (const report of reports) {
    if (report.ok) console.log(`✅ ${report.message}`);
    else console.error(`❌ ${report.message}`);
  }
  process.exitCode = exitCodeFor(reports);
}

function formatDraftLine(draft: Draft): string {
  return `${STATUS_ICON[draft.status]} #${draft.id} [${draft.status}] ${draft.title} @ ${draft.company} -> ${draft.recipient}`;
}

export function formatDraft(draft: Draft): string {
  return [
    formatDraftLine(draft),
    `Created: ${draft.createdAt.toISOString()}${draft.sentAt ? `  Sent: ${draft.sentAt.toISOString()}` : ""}`,
    `Subject: ${draft.subject}`,
    "",
    draft.body,
  ].join("\n");
}

function approveAll(lifecycle: DraftLifecycle): Promise<DraftOpReport[]> {
  return applyToDrafts(
    lifecycle.list("pending").map(d => String(d.id)),
    "approved",
    id => lifecycle.approve(id),
  );
}

function createScheduler(ctx: AppContext): OutreachScheduler {
  const scheduler = new OutreachScheduler(ctx.db);
  registerPipelineExecutors(scheduler, ctx);
  return scheduler;
}

export class OutreachModule implements CliModule {
  name = "outreach";

  registerCommands(cli: CAC) {
    cli
      .command("scout", "Fetch listings from every enabled source")
      .action(async () => {
        const ctx = bootstrap();
        const summary = await (await createScoutService(ctx)).run();
        console.log(`🔍 ${summary.new} new, ${summary.resighted} re-sighted, ${summary.malformed} malformed (${summary.fetched} fetched)`);
      });

    cli
      .command("draft", "Draft one email per eligible company")
      .option("--limit <n>", "Stop after this many drafts")
      .action(async (options: { limit?: number }) => {
        const ctx = bootstrap();
        const limit = options.limit === undefined ? undefined : Number(options.limit);
        const summary = await (await createDraftService(ctx)).run({ limit });
        this.printDraftSummary(summary.drafted, summary.skipped);
      });

    cli
      .command("run", "Scout, then draft for every eligible company")
      .option("--dry-run", "Scout, then show what would be drafted")
      .action(async (options: { dryRun?: boolean }) => {
        const ctx = bootstrap();
        const scouted = await (await createScoutService(ctx)).run();
        console.log(`🔍 ${scouted.new} new, ${scouted.resighted} re-sighted`);

        const drafts = await createDraftService(ctx);
        if (options.dryRun) {
          const plan = drafts.preview();
          console.log(`👀 Would draft for ${plan.length} compan${plan.length === 1 ? "y" : "ies"}:`);
          for (const { winner } of plan) {
            console.log(`  - ${winner.title} @ ${winner.company} [${winner.category}] ${winner.url}`);
          }
          return;
        }
        const summary = await drafts.run();
        this.printDraftSummary(summary.drafted, summary.skipped);
      });

    cli
      .command("status", "Show pipeline status")
      .action(() => {
        const ctx = bootstrap();
        console.log(formatStatus(getPipelineStatus(ctx.store, ctx.lifecycle)));
      });

    cli
      .command("drafts", "List drafts")
      .option("--status <status>", `Filter by status (${DRAFT_STATUSES.join(", ")})`)
      .action((options: { status?: string }) => {
        const { lifecycle } = bootstrap();
        const status = DRAFT_STATUSES.find(s => s === options.status);
        if (options.status && !status) {
          console.error(`❌ Unknown status: ${options.status}`);
          process.exitCode = 1;
          return;
        }
        const rows = lifecycle.list(status);
        if (rows.length === 0) {
          console.log("📭 No drafts.");
          return;
        }
        for (const draft of rows) console.log(formatDraftLine(draft));
      });

    cli
      .command("show <id>", "Show a draft")
      .action(async (id: string) => {
        const { lifecycle } = bootstrap();
        const [report] = await applyToDrafts([id], "shown", draftId => {
          const draft = lifecycle.get(draftId);
          console.log(formatDraft(draft));
          return draft;
        });
        if (report && !report.ok) printReports([report]);
      });

    cli
      .command("approve <...ids>", "Approve drafts for sending")
      .action(async (ids: string[]) => {
        const { lifecycle } = bootstrap();
        printReports(await applyToDrafts(ids, "approved", id => lifecycle.approve(id)));
      });

    cli
      .command("approve-all", "Approve every pending draft")
      .action(async () => {
        const { lifecycle } = bootstrap();
        const reports = await approveAll(lifecycle);
        if (reports.length === 0) console.log("📭 No pending drafts.");
        printReports(reports);
      });

    cli
      .command("discard <...ids>", "Discard drafts")
      .action(async (ids: string[]) => {
        const { lifecycle } = bootstrap();
        printReports(await applyToDrafts(ids, "discarded", id => lifecycle.discard(id)));
      });

    cli
      .command("edit <id>", "Edit a draft's subject or body")
      .option("--subject <subject>", "New subject line")
      .option("--body-file <path>", "Read the new body from a file")
      .action(async (id: string, options: { subject?: string; bodyFile?: string }) => {
        const { lifecycle } = bootstrap();
        const body = options.bodyFile ? await readFile(options.bodyFile, "utf-8") : undefined;
        if (options.subject === undefined && body === undefined) {
          console.error("❌ Nothing to change: pass --subject and/or --body-file");
          process.exitCode = 1;
          return;
        }
        printReports(await applyToDrafts([id], "edited", draftId =>
          lifecycle.edit(draftId, { subject: options.subject, body })));
      });

    cli
      .command("send", "Send approved drafts")
      .option("--all", "Also send pending drafts without review")
      .option("--dry-run", "Show what would be sent")
      .action(async (options: { all?: boolean; dryRun?: boolean }) => {
        const ctx = bootstrap();
        const summary = await (await createSendService(ctx)).run({ all: options.all, dryRun: options.dryRun });
        if (!options.dryRun) {
          console.log(`📬 Sent ${summary.sent.length}, failed ${summary.failed.length}, deferred ${summary.deferred}`);
        }
        if (summary.sent.length === 0 && summary.failed.length > 0) process.exitCode = 1;
      });

    cli
      .command("resume <path>", "Import resume text (PDF or plain text)")
      .action(async (path: string) => {
        const { resume } = bootstrap();
        console.log(`📄 Reading resume from: ${path}`);
        const length = await resume.importResume(path);
        console.log(`✅ Resume imported (${length} characters)`);
      });

    cli
      .command("config:set <key> <value>", "Store a setting (API keys, SMTP password)")
      .action(async (key: string, value: string) => {
        const { settings } = bootstrap();
        await settings.set(key, value);
        console.log(`✅ ${key} saved`);
      });

    cli
      .command("config:get <key>", "Read a stored setting")
      .action(async (key: string) => {
        const { settings } = bootstrap();
        const value = await settings.get<unknown>(key);
        if (value === undefined) {
          console.log(`⚠️ ${key} is not set`);
          return;
        }
        console.log(typeof value === "string" ? value : JSON.stringify(value, null, 2));
      });

    cli
      .command("scheduler:add <name> <cron> <payload>", `Add a cron job (${PAYLOAD_TYPES.join(", ")})`)
      .option("--timezone <tz>", "IANA timezone", { default: "UTC" })
      .option("--limit <n>", "Draft limit for draft/run jobs")
      .action((name: string, cron: string, payload: string, options: { timezone: string; limit?: number }) => {
        if (!isPayloadType(payload)) {
          console.error(`❌ Unknown payload type: ${payload}. Use one of: ${PAYLOAD_TYPES.join(", ")}`);
          process.exitCode = 1;
          return;
        }
        const scheduler = createScheduler(bootstrap());
        const job = scheduler.addJob({
          name,
          schedule: cron,
          payloadType: payload,
          payloadParams: options.limit === undefined ? undefined : { limit: Number(options.limit) },
          timezone: options.timezone,
        });
        console.log(`✅ Job #${job.id} "${job.name}" added (next: ${job.nextRunAt})`);
      });

    cli
      .command("scheduler:start", "Run the cron scheduler in the foreground")
      .action(async () => {
        const scheduler = createScheduler(bootstrap());
        scheduler.start();
        console.log("🕐 Scheduler running. Press Ctrl+C to stop.");
        await new Promise(() => {});
      });

    cli
      .command("scheduler:status", "Show cron jobs and recent runs")
      .action(() => {
        const scheduler = createScheduler(bootstrap());
        const jobs = scheduler.listJobs();
        if (jobs.length === 0) console.log("📭 No cron jobs.");
        for (const job of jobs) {
          console.log(`#${job.id} ${job.name} [${job.payloadType}] ${job.schedule} ${job.timezone ?? "UTC"}  next: ${job.nextRunAt ?? "-"}  last: ${job.lastRunAt ?? "-"}`);
        }
        const runs = scheduler.recentRuns();
        if (runs.length > 0) {
          console.log("---------------------------");
          for (const run of runs) {
            const icon = run.status === "success" ? "✅" : run.status === "running" ? "🔄" : "❌";
            console.log(`${icon} run #${run.id} job #${run.jobId} ${run.startedAt} ${run.errorMessage ?? ""}`.trimEnd());
          }
        }
      });

    cli
      .command("scheduler:run <jobId>", "Run a cron job immediately")
      .action(async (jobId: string) => {
        const id = Number(jobId);
        if (!Number.isInteger(id) || id <= 0) {
          console.error(`❌ Invalid job ID: ${jobId}. Must be a positive integer.`);
          process.exitCode = 1;
          return;
        }
        const scheduler = createScheduler(bootstrap());
        try {
          const run = await scheduler.runNow(id);
          console.log(`${run.status === "success" ? "✅" : "❌"} Job ${jobId} finished: ${run.status}`);
          if (run.status !== "success") process.exitCode = 1;
        } catch (err) {
          console.error(`❌ ${errorMessage(err)}`);
          process.exitCode = 1;
        }
      });
  }

  private printDraftSummary(drafted: Draft[], skipped: { companyKey: string; reason: string }[]): void {
    console.log(`📝 ${drafted.length} draft(s) awaiting review`);
    for (const skip of skipped) {
      console.log(`  ⏭️  ${skip.companyKey}: ${skip.reason}`);
    }
    if (drafted.length > 0) {
      console.log("💡 Review with 'scout drafts', then 'scout approve <ids...>' and 'scout send'.");
    }
  }
}
