import * as cheerio from "cheerio";
import { errorMessage } from "../../core/errors";
import { extractEmails, parseMailto } from "../../pipeline/email-patterns";
import { fetchText } from "../../services/page-fetcher";
import { politePause } from "./throttle";
import type { LinkedInPostListing, RawListing, ScrapeContext, SourceScraper } from "./types";

const SEARCH_URL = "https://search.brave.com/search";

const POST_BODY_SELECTORS = [
  "div.feed-shared-update-v2__description",
  "div.attributed-text-segment-list__content",
  "div.update-components-text",
  "article",
];

export function isLinkedInPostUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.includes("linkedin.com/posts/") || lower.includes("linkedin.com/feed/update/");
}

export function buildPostQuery(keyword: string): string {
  return `site:linkedin.com/posts "${keyword}" (hiring OR "looking for" OR "join") (email OR apply OR resume) remote`;
}

/** LinkedIn post URLs on a search results page, deduplicated, in page order. */
export function parseSearchResults(html: string, limit: number): string[] {
  const $ = cheerio.load(html);
  const urls: string[] = [];
  const seen = new Set<string>();
  $("a[href]").each((_, el) => {
    if (urls.length >= limit) return false;
    const href = $(el).attr("href");
    if (!href || !isLinkedInPostUrl(href)) return;
    const clean = href.split("?")[0].replace(/\/+$/, "");
    if (seen.has(clean)) return;
    seen.add(clean);
    urls.push(href);
  });
  return urls;
}

export interface ParsedPost {
  text: string;
  author: string;
  emails: string[];
}

/**
 * Post text (longest of the meta descriptions and known body containers),
 * raw author title and contact addresses. Null when the page has neither
 * text nor addresses.
 */
export function parsePostPage(html: string): ParsedPost | null {
  const $ = cheerio.load(html);

  let text = $('meta[name="description"]').attr("content") ?? "";
  const ogDescription = $('meta[property="og:description"]').attr("content") ?? "";
  if (ogDescription.length > text.length) text = ogDescription;

  for (const selector of POST_BODY_SELECTORS) {
    const el = $(selector).first();
    if (el.length === 0) continue;
    const body = el.text().split("\n").map(line => line.trim()).filter(Boolean).join("\n");
    if (body.length > text.length) text = body;
  }

  const author = ($('meta[property="og:title"]').attr("content") ?? $("title").first().text()).trim();

  const emails = extractEmails(text);
  if (emails.length === 0) {
    emails.push(...extractEmails($("body").text()));
  }
  $("a[href]").each((_, el) => {
    const address = parseMailto($(el).attr("href") ?? "");
    if (address && !emails.includes(address)) emails.push(address);
  });

  if (!text && emails.length === 0) return null;
  return { text, author, emails };
}

export class LinkedInPostsScraper implements SourceScraper {
  readonly source = "linkedin-posts" as const;

  async fetchListings(ctx: ScrapeContext): Promise<RawListing[]> {
    const limit = ctx.sources["linkedin-posts"].max_results;
    const timeoutMs = ctx.sources.request_timeout_ms;
    const listings: LinkedInPostListing[] = [];
    const seen = new Set<string>();

    for (const keyword of ctx.search.keywords) {
      console.log(`🔎 [Posts] Searching: '${keyword}'...`);
      let postUrls: string[];
      try {
        await politePause(1000, 2000);
        const page = await fetchText(`${SEARCH_URL}?q=${encodeURIComponent(buildPostQuery(keyword))}`, {
          timeoutMs,
          signal: ctx.signal,
        });
        postUrls = page ? parseSearchResults(page.body, limit) : [];
      } catch (err) {
        console.warn(`⚠️ [Posts] Search error: ${errorMessage(err)}`);
        continue;
      }

      if (postUrls.length === 0) {
        console.log(`📭 [Posts] No posts found for '${keyword}'.`);
        continue;
      }

      for (const url of postUrls) {
        const clean = url.split("?")[0].replace(/\/+$/, "");
        if (seen.has(clean)) continue;
        seen.add(clean);

        try {
          await politePause(800, 1800);
          const page = await fetchText(url, { timeoutMs, signal: ctx.signal });
          const post = page ? parsePostPage(page.body) : null;
          // Posts without an address are not worth keeping.
          if (!post || post.emails.length === 0) continue;
          listings.push({
            source: "linkedin-posts",
            postUrl: page?.url ?? url,
            author: post.author,
            text: post.text,
            emails: post.emails,
          });
        } catch (err) {
          console.warn(`⚠️ [Posts] Error fetching ${url.slice(0, 60)}: ${errorMessage(err)}`);
        }
      }
    }

    console.log(`✅ [Posts] ${listings.length} hiring posts with contact addresses`);
    return listings;
  }
}
