import { describe, expect, test } from "vitest";
import { pickBest, rankCandidates } from "../../src/pipeline/ranker";
import type { RoleCategory } from "../../src/pipeline/types";
import { makeOpportunity } from "../helpers";

const PRIORITY: RoleCategory[] = ["js-ts", "full-stack", "frontend", "backend", "other"];

describe("rankCandidates", () => {
  test("category priority beats earlier discovery", () => {
    const fullStack = makeOpportunity({
      id: 1,
      category: "full-stack",
      discoveredAt: new Date("2026-03-01T10:00:00.000Z"),
    });
    const jsTs = makeOpportunity({
      id: 2,
      category: "js-ts",
      url: "https://www.linkedin.com/jobs/view/1002",
      discoveredAt: new Date("2026-03-01T11:00:00.000Z"),
    });

    expect(pickBest([fullStack, jsTs], PRIORITY)?.id).toBe(2);
  });

  test("same category goes to the earliest discovery", () => {
    const late = makeOpportunity({ id: 1, discoveredAt: new Date("2026-03-02T00:00:00.000Z") });
    const early = makeOpportunity({ id: 2, discoveredAt: new Date("2026-03-01T00:00:00.000Z") });

    expect(rankCandidates([late, early], PRIORITY).map(o => o.id)).toEqual([2, 1]);
  });

  test("full ties break on source, url and id regardless of input order", () => {
    const a = makeOpportunity({ id: 3, source: "twitter", url: "https://x.com/i/status/1" });
    const b = makeOpportunity({ id: 2, source: "linkedin-jobs", url: "https://www.linkedin.com/jobs/view/2" });
    const c = makeOpportunity({ id: 1, source: "linkedin-jobs", url: "https://www.linkedin.com/jobs/view/2" });
    const d = makeOpportunity({ id: 4, source: "linkedin-jobs", url: "https://www.linkedin.com/jobs/view/1" });

    const expected = [4, 1, 2, 3];
    expect(rankCandidates([a, b, c, d], PRIORITY).map(o => o.id)).toEqual(expected);
    expect(rankCandidates([d, c, b, a], PRIORITY).map(o => o.id)).toEqual(expected);
  });

  test("categories missing from the priority list rank last", () => {
    const other = makeOpportunity({ id: 1, category: "other" });
    const backend = makeOpportunity({ id: 2, category: "backend" });

    expect(pickBest([other, backend], ["backend"])?.id).toBe(2);
  });

  test("no candidates gives null", () => {
    expect(pickBest([], PRIORITY)).toBeNull();
  });
});
