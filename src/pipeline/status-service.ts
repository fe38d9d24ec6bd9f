import type { DraftLifecycle } from "./draft-lifecycle";
import type { OpportunityStore } from "./opportunity-store";
import { startOfDay } from "./send-service";
import type { Draft, DraftStatus, Reachability } from "./types";

export interface PipelineStatus {
  opportunities: Record<Reachability, number>;
  drafts: Record<DraftStatus, number>;
  sentToday: number;
  recentSent: Draft[];
}

export function getPipelineStatus(
  store: OpportunityStore,
  lifecycle: DraftLifecycle,
  now: Date = new Date(),
): PipelineStatus {
  return {
    opportunities: store.countByReachability(),
    drafts: lifecycle.countByStatus(),
    sentToday: lifecycle.countSentSince(startOfDay(now)),
    recentSent: lifecycle.recentSent(10),
  };
}

export function formatStatus(status: PipelineStatus): string {
  const { opportunities: o, drafts: d } = status;
  const lines = [
    "📊 Outreach Status",
    "===========================",
    `🔍 Opportunities:  ${o.unresolved + o.reachable + o.unreachable} (${o.unresolved} unresolved, ${o.reachable} reachable, ${o.unreachable} unreachable)`,
    `📝 Pending:        ${d.pending}`,
    `👍 Approved:       ${d.approved}`,
    `🗑️  Discarded:      ${d.discarded}`,
    `🚀 Sent:           ${d.sent} (${status.sentToday} today)`,
  ];
  if (status.recentSent.length > 0) {
    lines.push("---------------------------", "Recently sent:");
    for (const draft of status.recentSent) {
      lines.push(`  #${draft.id} ${draft.sentAt?.toISOString().slice(0, 16).replace("T", " ")}  ${draft.company} <${draft.recipient}>`);
    }
  }
  return lines.join("\n");
}
