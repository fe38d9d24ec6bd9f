import * as cheerio from "cheerio";
import { errorMessage } from "../../core/errors";
import type { SearchConfig } from "../../core/config-schema";
import { fetchText } from "../../services/page-fetcher";
import { politePause } from "./throttle";
import type { LinkedInJobListing, RawListing, ScrapeContext, SourceScraper } from "./types";

const SEARCH_URL = "https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search";

const EXPERIENCE_LEVELS: Record<SearchConfig["experience_level"], string> = {
    junior: "2",
    mid: "3",
    senior: "4",
};

const REMOTE_KEYWORDS = [
    "remote", "worldwide", "anywhere", "work from home", "wfh",
    "distributed", "global", "fully remote", "100% remote",
    "work from anywhere", "location flexible", "remote-friendly",
];

export interface JobCard {
    jobId: string;
    title: string;
    company: string;
    location: string;
    url: string;
    postedAt?: string;
}

export function buildSearchUrl(keyword: string, location: string, search: SearchConfig, start = 0): string {
    const params = new URLSearchParams({
        keywords: keyword,
        location,
        start: String(start),
        f_TPR: "r604800",
        f_E: EXPERIENCE_LEVELS[search.experience_level],
    });
    if (search.remote_only) {
        params.set("f_WT", "2");
    }
    return `${SEARCH_URL}?${params.toString()}`;
}

export function isRemoteFriendly(location: string, description: string): boolean {
    const combined = `${location} ${description}`.toLowerCase();
    return REMOTE_KEYWORDS.some(keyword => combined.includes(keyword));
}

/** Job cards from a guest search results fragment. */
export function parseJobCards(html: string): JobCard[] {
    const $ = cheerio.load(html);
    const cards: JobCard[] = [];

    $("div.base-card").each((_, el) => {
        const card = $(el);
        const title = card.find("h3.base-search-card__title").text().trim();
        const company = card.find("h4.base-search-card__subtitle").text().trim();
        if (!title || !company) return;

        const href = card.find("a.base-card__full-link").attr("href") ?? "";
        const url = href.split("?")[0];
        const idMatch = url.replace(/\/$/, "").match(/-(\d+)$/) ?? url.match(/\/view\/(\d+)/);

        cards.push({
            jobId: idMatch ? idMatch[1] : "",
            title,
            company,
            location: card.find("span.job-search-card__location").text().trim(),
            url,
            postedAt: card.find("time").attr("datetime"),
        });
    });

    return cards;
}

/** Description text and external links from a public job page. */
export function parseJobPage(html: string): { description: string; links: string[] } {
    const $ = cheerio.load(html);
    const markup = $("div.show-more-less-html__markup").first();
    const links: string[] = [];
    markup.find("a[href]").each((_, el) => {
        const href = $(el).attr("href");
        if (href && /^https?:\/\//i.test(href) && !href.includes("linkedin.com")) {
            links.push(href);
        }
    });
    markup.find("br").replaceWith("\n");
    markup.find("p, li").each((_, el) => {
        $(el).append("\n");
    });
    const description = markup.text().split("\n").map(line => line.trim()).filter(Boolean).join("\n");
    return { description, links };
}

export class LinkedInJobsScraper implements SourceScraper {
    readonly source = "linkedin-jobs" as const;

    async fetchListings(ctx: ScrapeContext): Promise<RawListing[]> {
        const { search, sources } = ctx;
        const limit = sources["linkedin-jobs"].max_results;
        const timeoutMs = sources.request_timeout_ms;
        const listings: LinkedInJobListing[] = [];
        const seen = new Set<string>();
        let skippedLocation = 0;

        for (const keyword of search.keywords) {
            for (const location of search.locations) {
                console.log(`🔎 [LinkedIn] Searching: '${keyword}' in '${location}'...`);
                let cards: JobCard[];
                try {
                    await politePause(1500, 3000);
                    const page = await fetchText(buildSearchUrl(keyword, location, search), { timeoutMs, signal: ctx.signal });
                    if (!page) {
                        console.warn(`⚠️ [LinkedIn] Search request rejected, skipping.`);
                        continue;
                    }
                    cards = parseJobCards(page.body);
                } catch (err) {
                    console.warn(`⚠️ [LinkedIn] Search failed: ${errorMessage(err)}`);
                    continue;
                }

                for (const card of cards.slice(0, limit)) {
                    const key = card.url || `${card.company}|${card.title}`;
                    if (seen.has(key)) continue;
                    seen.add(key);

                    let details: { description: string; links: string[] } = { description: "", links: [] };
                    if (card.url) {
                        try {
                            await politePause(1000, 2500);
                            const page = await fetchText(card.url, { timeoutMs, signal: ctx.signal });
                            if (page) details = parseJobPage(page.body);
                        } catch (err) {
                            console.warn(`⚠️ [LinkedIn] Job page failed (${card.url}): ${errorMessage(err)}`);
                        }
                    }

                    if (search.remote_only && !isRemoteFriendly(card.location, details.description)) {
                        skippedLocation++;
                        continue;
                    }

                    listings.push({ source: "linkedin-jobs", ...card, ...details });
                }
                console.log(`📋 [LinkedIn] Found ${cards.length} cards for this query.`);
            }
        }

        console.log(`✅ [LinkedIn] ${listings.length} listings (skipped ${skippedLocation} non-remote)`);
        return listings;
    }
}
