import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SearchConfig } from "../../core/config-schema";
import { errorMessage } from "../../core/errors";
import { extractEmails } from "../../pipeline/email-patterns";
import type { RawListing, ScrapeContext, SourceScraper, TweetListing } from "./types";

const SEARCH_URL = "https://api.twitter.com/2/tweets/search/recent";
const MAX_QUERY_LENGTH = 512;

const SearchResponseSchema = Type.Object({
  data: Type.Optional(Type.Array(Type.Object({
    id: Type.String(),
    text: Type.String(),
    author_id: Type.Optional(Type.String()),
    created_at: Type.Optional(Type.String()),
  }))),
  includes: Type.Optional(Type.Object({
    users: Type.Optional(Type.Array(Type.Object({
      id: Type.String(),
      name: Type.String(),
      username: Type.String(),
    }))),
  })),
});

export type SearchResponse = Static<typeof SearchResponseSchema>;

class RateLimitedError extends Error {}

/** One query per keyword; tweets must mention hiring and an address. */
export function buildQueries(search: SearchConfig): string[] {
  return search.keywords.map((keyword) => {
    const query = `("${keyword}") (hiring OR "job opening" OR "we are looking" OR "apply") (@ OR "email")`;
    return query.length <= MAX_QUERY_LENGTH
      ? query
      : `("${keyword}") (hiring OR "job opening") (@ OR "email")`;
  });
}

/** Tweets that carry a usable contact address, with their author resolved. */
export function parseSearchResponse(body: unknown): TweetListing[] {
  if (!Value.Check(SearchResponseSchema, body)) {
    throw new Error("Unexpected search response shape");
  }
  const users = new Map((body.includes?.users ?? []).map(user => [user.id, user] as const));
  const listings: TweetListing[] = [];
  for (const tweet of body.data ?? []) {
    if (extractEmails(tweet.text).length === 0) continue;
    const author = tweet.author_id ? users.get(tweet.author_id) : undefined;
    listings.push({
      source: "twitter",
      tweetId: tweet.id,
      authorName: author?.name ?? "",
      authorHandle: author?.username ?? "",
      text: tweet.text,
      createdAt: tweet.created_at,
    });
  }
  return listings;
}

/** X API v2 recent search. Skips itself when no bearer token is configured. */
export class TwitterScraper implements SourceScraper {
  readonly source = "twitter" as const;

  constructor(private readonly bearerToken: string | undefined) {}

  async fetchListings(ctx: ScrapeContext): Promise<RawListing[]> {
    if (!this.bearerToken || this.bearerToken.includes("YOUR_")) {
      console.log("⏭️  [Twitter] Skipping: no bearer token configured.");
      return [];
    }

    const maxResults = Math.min(Math.max(ctx.sources.twitter.max_results, 10), 100);
    const listings: TweetListing[] = [];
    const seen = new Set<string>();

    for (const query of buildQueries(ctx.search)) {
      console.log(`🔎 [Twitter] Searching: ${query.slice(0, 60)}...`);
      try {
        for (const listing of await this.search(query, maxResults, ctx)) {
          if (seen.has(listing.tweetId)) continue;
          seen.add(listing.tweetId);
          listings.push(listing);
        }
      } catch (err) {
        if (err instanceof RateLimitedError) {
          console.warn("⚠️ [Twitter] Rate limited. Will retry on next run.");
          break;
        }
        console.warn(`⚠️ [Twitter] Error: ${errorMessage(err)}`);
      }
    }

    console.log(`✅ [Twitter] ${listings.length} tweets with contact addresses`);
    return listings;
  }

  private async search(query: string, maxResults: number, ctx: ScrapeContext): Promise<TweetListing[]> {
    const params = new URLSearchParams({
      query,
      max_results: String(maxResults),
      "tweet.fields": "created_at,author_id,text",
      "user.fields": "name,username",
      expansions: "author_id",
    });
    const timeout = AbortSignal.timeout(ctx.sources.request_timeout_ms);
    const response = await fetch(`${SEARCH_URL}?${params.toString()}`, {
      headers: { Authorization: `Bearer ${this.bearerToken}` },
      signal: ctx.signal ? AbortSignal.any([ctx.signal, timeout]) : timeout,
    });
    if (response.status === 429) {
      throw new RateLimitedError("rate limited");
    }
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return parseSearchResponse(await response.json());
  }
}
