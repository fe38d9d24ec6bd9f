import type { OpportunityRecord } from "./types";

const TRACKING_PARAMS = new Set([
  "utm_source", "utm_medium", "utm_campaign", "utm_term", "utm_content",
  "gclid", "fbclid", "ref", "source", "trk", "trkinfo", "refid", "trackingid",
]);

const JOB_ID_PARAMS = new Set([
  "jobid", "jk", "gh_jid", "job_id", "id", "requisitionid",
  "currentjobid", "vjk", "fccid",
]);

/**
 * Host + path (lowercased, trailing slash dropped) plus the sorted query
 * params that identify a posting. Tracking params are discarded.
 */
export function normalizeUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  let normalized = parsed.host.toLowerCase().replace(/^www\./, "") + parsed.pathname.toLowerCase().replace(/\/$/, "");

  const relevantParams: string[] = [];
  for (const [key, value] of parsed.searchParams.entries()) {
    const lowerKey = key.toLowerCase();
    if (JOB_ID_PARAMS.has(lowerKey) || !TRACKING_PARAMS.has(lowerKey)) {
      relevantParams.push(`${lowerKey}=${value}`);
    }
  }

  if (relevantParams.length > 0) {
    relevantParams.sort();
    normalized += "?" + relevantParams.join("&");
  }

  return normalized;
}

/**
 * Identity of a posting within its company. Postings without a usable URL
 * fall back to their normalized title.
 */
export function urlKeyFor(record: Pick<OpportunityRecord, "url" | "title">): string {
  const fromUrl = record.url ? normalizeUrl(record.url) : null;
  if (fromUrl) return fromUrl;
  return `title:${record.title.trim().toLowerCase().replace(/\s+/g, " ")}`;
}

export function dedupKey(record: Pick<OpportunityRecord, "companyKey" | "url" | "title">): string {
  return `${record.companyKey}\u0000${urlKeyFor(record)}`;
}

export interface KeyedRecord {
  record: OpportunityRecord;
  urlKey: string;
}

export interface DedupResult {
  /** One record per (company, posting), first seen first. */
  unique: KeyedRecord[];
  /** Later sightings of a posting already in `unique`. */
  duplicates: KeyedRecord[];
}

/**
 * Partition a batch by (company, posting). The first record seen for a key
 * is kept; the rest are re-sightings of it. The same company under a
 * different URL is a separate candidate.
 */
export function dedupBatch(records: OpportunityRecord[]): DedupResult {
  const seen = new Set<string>();
  const result: DedupResult = { unique: [], duplicates: [] };
  for (const record of records) {
    const key = dedupKey(record);
    const keyed = { record, urlKey: urlKeyFor(record) };
    if (seen.has(key)) {
      result.duplicates.push(keyed);
      continue;
    }
    seen.add(key);
    result.unique.push(keyed);
  }
  return result;
}
