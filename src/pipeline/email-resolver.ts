import { errorMessage } from "../core/errors";
import type { ResolverConfig } from "../core/config-schema";
import {
  SKIP_DOMAINS,
  extractEmails,
  isSyntacticEmail,
  isUsableEmail,
  rankEmails,
} from "./email-patterns";
import type {
  ConfidenceTier,
  ContactEmail,
  Opportunity,
  ResolutionStrategyName,
} from "./types";

export interface FetchedPage {
  url: string;
  /** Visible text of the page. */
  text: string;
  /** Absolute http(s) links found on the page. */
  links: string[];
  /** Addresses taken from mailto: links. */
  mailto: string[];
}

export interface PageFetcher {
  /** Resolves null on non-200 responses and network errors. */
  fetchPage(url: string, signal?: AbortSignal): Promise<FetchedPage | null>;
}

export interface MailboxVerifier {
  /** true/false when the domain was checked; undefined when the check could not run. */
  hasMailExchange(domain: string): Promise<boolean | undefined>;
}

export interface StrategyResult {
  address: string;
  verified: boolean;
}

export interface ResolutionContext {
  opportunity: Opportunity;
  fetcher: PageFetcher;
  verifier: MailboxVerifier;
  maxPages: number;
  hrPrefixes: string[];
  /** Aborted when the running strategy times out. */
  signal: AbortSignal;
  /** Company domain (no scheme, no www.), looked up once per resolution. */
  companyDomain(): Promise<string | null>;
}

export interface ResolutionStrategy {
  name: ResolutionStrategyName;
  tier: ConfidenceTier;
  run(ctx: ResolutionContext): Promise<StrategyResult | null>;
}

export const CAREER_PATHS = [
  "/careers", "/jobs", "/contact", "/about",
  "/contact-us", "/about-us", "/work-with-us",
  "/join-us", "/join", "/hiring",
];

// Hosts a posting links to that never belong to the hiring company.
const SOURCE_HOSTS = [
  "linkedin.com", "lnkd.in", "licdn.com", "x.com", "twitter.com", "t.co",
  "bit.ly", "youtube.com", "instagram.com", "facebook.com", "google.com",
  "forms.gle", "docs.google.com", "calendly.com",
];

const URL_IN_TEXT = /https?:\/\/[^\s<>"')\]]+/g;

class StrategyTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "StrategyTimeoutError";
  }
}

function bareHost(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

function isForeignHost(host: string): boolean {
  return [...SOURCE_HOSTS, ...SKIP_DOMAINS].some(skip => host === skip || host.endsWith(`.${skip}`));
}

/**
 * Find the hiring company's domain: the first external link in the posting,
 * else `<company name>.com` when that site answers.
 */
export async function discoverCompanyDomain(
  opportunity: Opportunity,
  fetcher: PageFetcher,
): Promise<string | null> {
  const postingHost = opportunity.url ? bareHost(opportunity.url) : null;
  for (const match of opportunity.description.matchAll(URL_IN_TEXT)) {
    const host = bareHost(match[0]);
    if (host && host.includes(".") && host !== postingHost && !isForeignHost(host)) {
      return host;
    }
  }

  const slug = opportunity.company.toLowerCase().replace(/[^a-z0-9]/g, "");
  if (!slug) return null;
  const guess = `${slug}.com`;
  const home = await fetcher.fetchPage(`https://${guess}`);
  return home ? guess : null;
}

export const postingTextStrategy: ResolutionStrategy = {
  name: "posting-text",
  tier: "explicit-in-posting",
  async run(ctx) {
    const [best] = rankEmails(extractEmails(ctx.opportunity.description));
    return best ? { address: best, verified: true } : null;
  },
};

export const companyWebsiteStrategy: ResolutionStrategy = {
  name: "company-website",
  tier: "company-domain-pattern",
  async run(ctx) {
    const domain = await ctx.companyDomain();
    if (!domain) return null;

    const base = `https://${domain}`;
    const pages = [base, ...CAREER_PATHS.map(path => base + path)];
    let fetched = 0;
    for (const pageUrl of pages) {
      if (fetched >= ctx.maxPages || ctx.signal.aborted) break;
      const page = await ctx.fetcher.fetchPage(pageUrl, ctx.signal);
      if (!page) continue;
      fetched++;

      const found = [...page.mailto.filter(isUsableEmail), ...extractEmails(page.text)];
      const [best] = rankEmails([...new Set(found.map(email => email.toLowerCase()))]);
      if (best) return { address: best, verified: true };
    }
    return null;
  },
};

export const hrPatternStrategy: ResolutionStrategy = {
  name: "hr-pattern",
  tier: "generic-hr-pattern",
  async run(ctx) {
    const domain = await ctx.companyDomain();
    if (!domain) return null;
    const [first] = ctx.hrPrefixes.map(prefix => `${prefix}@${domain}`);
    if (!first) return null;

    let hasMx: boolean | undefined;
    try {
      hasMx = await ctx.verifier.hasMailExchange(domain);
    } catch (err) {
      console.warn(`⚠️ [Resolver] MX check failed for ${domain}: ${errorMessage(err)}`);
    }
    // Best effort: an unverified guess still beats no outreach.
    return { address: first, verified: hasMx === true };
  },
};

const STRATEGIES: Record<ResolutionStrategyName, ResolutionStrategy> = {
  "posting-text": postingTextStrategy,
  "company-website": companyWebsiteStrategy,
  "hr-pattern": hrPatternStrategy,
};

async function withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new StrategyTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface EmailResolverOptions {
  timeoutMs: number;
  maxPages: number;
  hrPrefixes: string[];
}

/**
 * Runs resolution strategies in order and stops at the first syntactically
 * valid address. A strategy that throws or times out counts as no result.
 */
export class EmailResolver {
  constructor(
    private readonly strategies: ResolutionStrategy[],
    private readonly fetcher: PageFetcher,
    private readonly verifier: MailboxVerifier,
    private readonly options: EmailResolverOptions,
  ) {}

  static fromConfig(config: ResolverConfig, fetcher: PageFetcher, verifier: MailboxVerifier): EmailResolver {
    return new EmailResolver(
      config.strategies.map(name => STRATEGIES[name]),
      fetcher,
      verifier,
      { timeoutMs: config.timeout_ms, maxPages: config.max_pages, hrPrefixes: config.hr_prefixes },
    );
  }

  async resolve(opportunity: Opportunity): Promise<ContactEmail | null> {
    let domainLookup: Promise<string | null> | undefined;
    const companyDomain = () => {
      domainLookup ??= discoverCompanyDomain(opportunity, this.fetcher).catch((err: unknown) => {
        console.warn(`⚠️ [Resolver] Domain lookup failed for ${opportunity.company}: ${errorMessage(err)}`);
        return null;
      });
      return domainLookup;
    };

    for (const strategy of this.strategies) {
      let result: StrategyResult | null;
      try {
        result = await withTimeout(
          signal => strategy.run({
            opportunity,
            fetcher: this.fetcher,
            verifier: this.verifier,
            maxPages: this.options.maxPages,
            hrPrefixes: this.options.hrPrefixes,
            signal,
            companyDomain,
          }),
          this.options.timeoutMs,
        );
      } catch (err) {
        console.warn(`⚠️ [Resolver] ${strategy.name} failed for ${opportunity.company}: ${errorMessage(err)}`);
        continue;
      }

      if (!result) continue;
      if (!isSyntacticEmail(result.address)) {
        console.warn(`⚠️ [Resolver] ${strategy.name} returned an invalid address: ${result.address}`);
        continue;
      }

      console.log(`📧 [Resolver] ${opportunity.company}: ${result.address} (${strategy.tier})`);
      return {
        opportunityId: opportunity.id,
        address: result.address,
        strategy: strategy.name,
        tier: strategy.tier,
        verified: result.verified,
        resolvedAt: new Date(),
      };
    }

    console.log(`🚫 [Resolver] No contact address for ${opportunity.company}`);
    return null;
  }
}
