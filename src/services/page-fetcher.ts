import * as cheerio from "cheerio";
import { errorMessage } from "../core/errors";
import { parseMailto } from "../pipeline/email-patterns";
import type { FetchedPage, PageFetcher } from "../pipeline/email-resolver";

const USER_AGENTS = [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
];

export function browserHeaders(): Record<string, string> {
    return {
        "User-Agent": USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)],
        "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
    };
}

export interface FetchTextOptions {
    timeoutMs: number;
    signal?: AbortSignal;
    headers?: Record<string, string>;
}

/**
 * GET a URL and return its body, or null on a non-2xx status. Network
 * errors and timeouts propagate.
 */
export async function fetchText(url: string, options: FetchTextOptions): Promise<{ url: string; body: string } | null> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const response = await fetch(url, {
        headers: options.headers ?? browserHeaders(),
        redirect: "follow",
        signal,
    });
    if (!response.ok) {
        return null;
    }
    return { url: response.url || url, body: await response.text() };
}

/** Visible text, absolute links and mailto addresses of an HTML document. */
export function parsePage(url: string, html: string): FetchedPage {
    const $ = cheerio.load(html);
    const links: string[] = [];
    const mailto: string[] = [];

    $("a[href]").each((_, el) => {
        const href = $(el).attr("href");
        if (!href) return;
        const address = parseMailto(href);
        if (address) {
            if (!mailto.includes(address)) mailto.push(address);
            return;
        }
        try {
            const absolute = new URL(href, url);
            if (absolute.protocol === "http:" || absolute.protocol === "https:") {
                links.push(absolute.toString());
            }
        } catch {
            // relative junk like "javascript:void(0)" has no URL form
            return;
        }
    });

    $("script, style, noscript").remove();
    const text = $("body").text().replace(/\s+/g, " ").trim() || $.root().text().replace(/\s+/g, " ").trim();
    return { url, text, links, mailto };
}

/** Fetches pages with `fetch` and parses them with cheerio. */
export class HttpPageFetcher implements PageFetcher {
    constructor(private readonly timeoutMs: number) {}

    async fetchPage(url: string, signal?: AbortSignal): Promise<FetchedPage | null> {
        try {
            const result = await fetchText(url, { timeoutMs: this.timeoutMs, signal });
            return result ? parsePage(result.url, result.body) : null;
        } catch (err) {
            console.warn(`⚠️ [Fetch] ${url}: ${errorMessage(err)}`);
            return null;
        }
    }
}
