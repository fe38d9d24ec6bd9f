import type { SearchConfig, SourcesConfig } from "../../core/config-schema";
import type { Source } from "../../pipeline/types";

/** A card from the LinkedIn guest job search, enriched with its job page. */
export interface LinkedInJobListing {
    source: "linkedin-jobs";
    jobId: string;
    title: string;
    company: string;
    location: string;
    url: string;
    description: string;
    /** External links found in the description markup. */
    links: string[];
    postedAt?: string;
}

/** A public LinkedIn "we're hiring" post. */
export interface LinkedInPostListing {
    source: "linkedin-posts";
    postUrl: string;
    author: string;
    text: string;
    emails: string[];
}

export interface TweetListing {
    source: "twitter";
    tweetId: string;
    authorName: string;
    authorHandle: string;
    text: string;
    createdAt?: string;
}

export type RawListing = LinkedInJobListing | LinkedInPostListing | TweetListing;

export interface ScrapeContext {
    search: SearchConfig;
    sources: SourcesConfig;
    signal?: AbortSignal;
}

export interface SourceScraper {
    source: Source;
    /** Fetch current listings matching the configured keywords/locations. */
    fetchListings(ctx: ScrapeContext): Promise<RawListing[]>;
}
