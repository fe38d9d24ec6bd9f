import type { OutreachConfig } from "../core/config-schema";
import { errorMessage } from "../core/errors";
import type { RawListing, SourceScraper } from "../modules/sources/types";
import { dedupBatch } from "./dedup";
import { normalizeBatch } from "./normalizer";
import type { OpportunityStore } from "./opportunity-store";
import type { Source } from "./types";

export interface SourceReport {
  listings: number;
  error?: string;
}

export interface ScoutSummary {
  fetched: number;
  malformed: number;
  new: number;
  resighted: number;
  perSource: Partial<Record<Source, SourceReport>>;
}

/**
 * Fetch every source concurrently, normalize, deduplicate within the batch
 * and against stored history, then persist.
 */
export class ScoutService {
  constructor(
    private readonly scrapers: SourceScraper[],
    private readonly store: OpportunityStore,
    private readonly config: Pick<OutreachConfig, "search" | "sources" | "ranking">,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(): Promise<ScoutSummary> {
    console.log(`🛰️  [Scout] Running ${this.scrapers.length} source(s)...`);
    const settled = await Promise.allSettled(
      this.scrapers.map(scraper => scraper.fetchListings({
        search: this.config.search,
        sources: this.config.sources,
      })),
    );

    const listings: RawListing[] = [];
    const perSource: ScoutSummary["perSource"] = {};
    settled.forEach((result, index) => {
      const source = this.scrapers[index].source;
      if (result.status === "fulfilled") {
        listings.push(...result.value);
        perSource[source] = { listings: result.value.length };
      } else {
        const error = errorMessage(result.reason);
        console.error(`❌ [Scout] ${source} failed: ${error}`);
        perSource[source] = { listings: 0, error };
      }
    });

    const { records, rejected } = normalizeBatch(listings, this.config.ranking.category_keywords, this.now());
    const { unique, duplicates } = dedupBatch(records);
    const { created, resighted } = this.store.ingest(unique, duplicates);

    const summary: ScoutSummary = {
      fetched: listings.length,
      malformed: rejected,
      new: created.length,
      resighted,
      perSource,
    };
    console.log(
      `✅ [Scout] ${summary.fetched} fetched, ${summary.new} new, ${summary.resighted} seen before, ${summary.malformed} malformed`,
    );
    return summary;
  }
}
