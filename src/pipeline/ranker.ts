import type { Opportunity, RoleCategory } from "./types";

/**
 * Order candidates best first: configured category priority, then earliest
 * discovery. Source, URL and id break any remaining tie so the order never
 * depends on input order.
 */
export function compareCandidates(
  priority: readonly RoleCategory[],
): (a: Opportunity, b: Opportunity) => number {
  const rank = (category: RoleCategory) => {
    const index = priority.indexOf(category);
    return index === -1 ? priority.length : index;
  };
  return (a, b) =>
    rank(a.category) - rank(b.category) ||
    a.discoveredAt.getTime() - b.discoveredAt.getTime() ||
    a.source.localeCompare(b.source) ||
    a.url.localeCompare(b.url) ||
    a.id - b.id;
}

export function rankCandidates(
  candidates: readonly Opportunity[],
  priority: readonly RoleCategory[],
): Opportunity[] {
  return [...candidates].sort(compareCandidates(priority));
}

/** The single best candidate for a company, or null when there are none. */
export function pickBest(
  candidates: readonly Opportunity[],
  priority: readonly RoleCategory[],
): Opportunity | null {
  return rankCandidates(candidates, priority)[0] ?? null;
}
