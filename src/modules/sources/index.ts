import type { SourcesConfig } from "../../core/config-schema";
import { LinkedInJobsScraper } from "./linkedin-jobs";
import { LinkedInPostsScraper } from "./linkedin-posts";
import { TwitterScraper } from "./twitter";
import type { SourceScraper } from "./types";

export type { RawListing, ScrapeContext, SourceScraper } from "./types";

/** Scrapers for every source switched on in the config. */
export function createScrapers(sources: SourcesConfig, twitterToken: string | undefined): SourceScraper[] {
  const scrapers: SourceScraper[] = [];
  if (sources["linkedin-posts"].enabled) scrapers.push(new LinkedInPostsScraper());
  if (sources["linkedin-jobs"].enabled) scrapers.push(new LinkedInJobsScraper());
  if (sources.twitter.enabled) scrapers.push(new TwitterScraper(twitterToken));
  return scrapers;
}
