import { MalformedRecordError, errorMessage } from "../core/errors";
import type { RawListing, LinkedInPostListing, TweetListing } from "../modules/sources/types";
import type { CategoryRule, OpportunityRecord, RoleCategory } from "./types";

const ROLE_HASHTAG_HINTS = [
  "developer", "engineer", "fullstack", "frontend", "backend",
  "react", "node", "python", "devops", "designer", "manager",
];

export function toCompanyKey(company: string): string {
  return company.trim().toLowerCase().replace(/\s+/g, " ");
}

export function stripHashtags(text: string): string {
  return text.replace(/#\w+/g, "").replace(/\s+/g, " ").trim();
}

/**
 * Turn a LinkedIn page title into a person's name.
 *
 * "#hiring #fullstack | Paula Mateo on LinkedIn" -> "Paula Mateo"
 */
export function cleanAuthor(raw: string): string {
  let value = raw;
  for (const sep of [" on LinkedIn", " posted on", " | LinkedIn"]) {
    value = value.split(sep)[0].trim();
  }

  if (value.includes("|")) {
    const parts = value.split("|").map(part => part.trim());
    for (const part of [...parts].reverse()) {
      const clean = stripHashtags(part);
      const words = clean.split(" ").filter(Boolean);
      if (words.length >= 1 && words.length <= 5 && !clean.startsWith("#")) {
        return clean;
      }
    }
    return stripHashtags(parts[parts.length - 1]);
  }

  return stripHashtags(value);
}

function firstMatch(text: string, patterns: RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match?.[1]) {
      const title = match[1].replace(/\s+/g, " ").trim();
      if (title.length > 3 && title.length < 80) {
        return title;
      }
    }
  }
  return null;
}

export function guessPostTitle(text: string): string {
  const found = firstMatch(stripHashtags(text), [
    /(?:hiring|looking for|seeking|need)\s+(?:a\s+|an\s+)?(.+?)(?:\.|,|!|\n|to join|with \d|who)/i,
    /(?:role|position|opening)\s*[:-]?\s*(.+?)(?:\.|,|!|\n)/i,
    /(?:join us as|join .{0,20} as)\s+(?:a\s+|an\s+)?(.+?)(?:\.|,|!|\n)/i,
  ]);
  if (found) return found;

  const hashtags = [...text.toLowerCase().matchAll(/#(\w+)/g)].map(m => m[1]);
  const roleTag = hashtags.find(tag => ROLE_HASHTAG_HINTS.some(hint => tag.includes(hint)));
  if (roleTag) {
    return roleTag
      .replace("developer", " developer")
      .replace("engineer", " engineer")
      .split(" ")
      .filter(Boolean)
      .map(word => word[0].toUpperCase() + word.slice(1))
      .join(" ");
  }

  return "Software Developer";
}

export function guessPostCompany(text: string, author: string): string {
  const clean = stripHashtags(text);
  const patterns = [
    /(?:at|@)\s+([A-Z][A-Za-z0-9\s&.]+?)(?:\.|,|!|\n|is hiring|are hiring)/,
    /([A-Z][A-Za-z0-9\s&.]+?)\s+is\s+(?:hiring|looking|seeking)/,
  ];
  for (const pattern of patterns) {
    const match = pattern.exec(clean);
    const company = match?.[1]?.trim();
    if (company && company.length > 2 && company.length < 60) {
      return company;
    }
  }
  return author.trim();
}

export function guessTweetTitle(text: string): string {
  return firstMatch(text, [
    /(?:hiring|looking for|seeking)\s+(?:a\s+)?(.+?)(?:\.|,|!|\n|to join|with)/i,
    /(?:role|position|opening)\s*[:-]?\s*(.+?)(?:\.|,|!|\n)/i,
  ]) ?? "Job Opportunity (via X)";
}

/**
 * First rule whose keyword appears in title + description, case-insensitively.
 * Rules are evaluated in table order.
 */
export function categorize(title: string, description: string, rules: CategoryRule[]): RoleCategory {
  const haystack = `${title}\n${description}`.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some(keyword => haystack.includes(keyword.toLowerCase()))) {
      return rule.category;
    }
  }
  return "other";
}

// Link targets are lost when markup becomes text; keep them for domain discovery.
function withLinks(description: string, links: string[]): string {
  const missing = links.filter(link => !description.includes(link));
  return missing.length > 0 && description.trim()
    ? `${description}\n\nLinks: ${missing.join(" ")}`
    : description;
}

function fromPost(listing: LinkedInPostListing) {
  const author = cleanAuthor(listing.author);
  // Posts carry their addresses in the text itself; append any that only
  // appeared as mailto links so the resolver can still see them.
  const missing = listing.emails.filter(email => !listing.text.includes(email));
  const description = missing.length > 0
    ? `${listing.text}\n\nContact: ${missing.join(", ")}`
    : listing.text;
  return {
    company: guessPostCompany(listing.text, author),
    title: guessPostTitle(listing.text),
    description,
    url: listing.postUrl,
    location: "Remote",
  };
}

function fromTweet(listing: TweetListing) {
  const handle = listing.authorHandle.replace(/^@/, "").trim();
  return {
    company: listing.authorName.trim() || (handle ? `@${handle}` : ""),
    title: guessTweetTitle(listing.text),
    description: listing.text,
    url: `https://x.com/i/status/${listing.tweetId}`,
    location: "",
  };
}

/**
 * Map one source-specific listing onto the canonical record.
 *
 * @throws MalformedRecordError when company or description is blank
 */
export function normalizeListing(
  raw: RawListing,
  rules: CategoryRule[],
  discoveredAt: Date,
): OpportunityRecord {
  let fields: { company: string; title: string; description: string; url: string; location: string };
  switch (raw.source) {
    case "linkedin-jobs":
      fields = {
        company: raw.company,
        title: raw.title,
        description: withLinks(raw.description, raw.links),
        url: raw.url,
        location: raw.location,
      };
      break;
    case "linkedin-posts":
      fields = fromPost(raw);
      break;
    case "twitter":
      fields = fromTweet(raw);
      break;
  }

  const company = fields.company.replace(/\s+/g, " ").trim();
  const description = fields.description.trim();
  if (!company) {
    throw new MalformedRecordError(raw.source, "missing company");
  }
  if (!description) {
    throw new MalformedRecordError(raw.source, "missing description");
  }
  const title = fields.title.replace(/\s+/g, " ").trim() || "Software Developer";

  return {
    companyKey: toCompanyKey(company),
    company,
    title,
    description,
    source: raw.source,
    url: fields.url.trim(),
    location: fields.location.trim(),
    discoveredAt,
    category: categorize(title, description, rules),
  };
}

export interface NormalizeResult {
  records: OpportunityRecord[];
  rejected: number;
}

/** Normalize a batch, logging and skipping malformed listings. */
export function normalizeBatch(
  listings: RawListing[],
  rules: CategoryRule[],
  discoveredAt: Date,
): NormalizeResult {
  const records: OpportunityRecord[] = [];
  let rejected = 0;
  for (const listing of listings) {
    try {
      records.push(normalizeListing(listing, rules, discoveredAt));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      rejected++;
      console.warn(`⚠️ [Normalize] Skipped listing: ${errorMessage(err)}`);
    }
  }
  return { records, rejected };
}
