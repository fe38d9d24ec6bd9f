import type { LimitsConfig } from "../core/config-schema";
import { OutreachError } from "../core/errors";
import type { MailTransport } from "../services/mailer";
import type { DraftLifecycle } from "./draft-lifecycle";
import type { Draft } from "./types";

export interface SendRunOptions {
  /** Include pending drafts (send without review). */
  all?: boolean;
  dryRun?: boolean;
}

export interface SendFailure {
  draftId: number;
  code: string;
  message: string;
}

export interface SendRunSummary {
  sent: Draft[];
  previewed: Draft[];
  failed: SendFailure[];
  /** Drafts left for a later run because a limit was reached. */
  deferred: number;
}

export function startOfDay(date: Date): Date {
  const start = new Date(date);
  start.setHours(0, 0, 0, 0);
  return start;
}

/**
 * Sends reviewed drafts within the per-run and per-day limits. Failures are
 * collected per draft; one bad draft never stops the batch.
 */
export class SendService {
  constructor(
    private readonly lifecycle: DraftLifecycle,
    private readonly transport: MailTransport,
    private readonly limits: LimitsConfig,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** How many more drafts may go out right now. */
  remainingBudget(): number {
    const sentToday = this.lifecycle.countSentSince(startOfDay(this.now()));
    return Math.max(0, Math.min(this.limits.max_per_run, this.limits.max_per_day - sentToday));
  }

  async run(options: SendRunOptions = {}): Promise<SendRunSummary> {
    const queue = [
      ...this.lifecycle.list("approved"),
      ...(options.all ? this.lifecycle.list("pending") : []),
    ].sort((a, b) => a.id - b.id);

    const budget = this.remainingBudget();
    const batch = queue.slice(0, budget);
    const summary: SendRunSummary = { sent: [], previewed: [], failed: [], deferred: queue.length - batch.length };

    if (queue.length === 0) {
      console.log("📭 [Send] Nothing to send.");
      return summary;
    }
    if (summary.deferred > 0) {
      console.log(`⏸️  [Send] Limit reached: sending ${batch.length}, ${summary.deferred} left for later`);
    }

    for (const draft of batch) {
      if (options.dryRun) {
        console.log(`👀 [Send] Would send #${draft.id} to ${draft.recipient}: ${draft.subject}`);
        summary.previewed.push(draft);
        continue;
      }

      try {
        const sent = await this.lifecycle.send(draft.id, this.transport, { allowPending: options.all });
        summary.sent.push(sent);
        console.log(`✅ [Send] #${sent.id} sent to ${sent.recipient} (${sent.company})`);
      } catch (err) {
        if (!(err instanceof OutreachError)) throw err;
        summary.failed.push({ draftId: draft.id, code: err.code, message: err.message });
        console.error(`❌ [Send] ${err.message}`);
      }
    }

    return summary;
  }
}
