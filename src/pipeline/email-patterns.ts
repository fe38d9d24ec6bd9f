export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

const STRICT_EMAIL = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export const SKIP_DOMAINS = new Set([
  "example.com", "test.com", "linkedin.com", "licdn.com",
  "facebook.com", "twitter.com", "x.com", "t.co", "google.com",
  "googleapis.com", "github.com", "githubusercontent.com",
  "sentry.io", "gravatar.com", "wp.com", "wordpress.com",
  "w3.org", "schema.org", "cloudflare.com", "amazonaws.com",
  "gstatic.com", "bootstrapcdn.com", "jquery.com",
]);

const SKIP_PREFIXES = new Set([
  "noreply", "no-reply", "donotreply", "do-not-reply",
  "mailer-daemon", "postmaster", "webmaster", "admin",
  "support", "abuse", "security", "privacy",
]);

const HR_HINTS = [
  "hr", "careers", "jobs", "hiring", "recruiting",
  "recruitment", "talent", "apply", "career", "people",
];

const IMAGE_SUFFIXES = [".png", ".jpg", ".jpeg", ".gif", ".svg", ".webp"];

/** Syntactic check only. */
export function isSyntacticEmail(address: string): boolean {
  return STRICT_EMAIL.test(address);
}

/** Looks like an address a person reads. */
export function isUsableEmail(address: string): boolean {
  if (address.length > 80 || !isSyntacticEmail(address)) return false;
  const lower = address.toLowerCase();
  const at = lower.lastIndexOf("@");
  const prefix = lower.slice(0, at);
  const domain = lower.slice(at + 1);

  if (SKIP_DOMAINS.has(domain)) return false;
  if (SKIP_PREFIXES.has(prefix)) return false;
  if (IMAGE_SUFFIXES.some(suffix => domain.endsWith(suffix))) return false;
  return true;
}

/** Usable addresses in text, lowercased, in order of first appearance. */
export function extractEmails(text: string): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(EMAIL_PATTERN)) {
    const address = match[0].toLowerCase();
    if (isUsableEmail(address) && !found.includes(address)) {
      found.push(address);
    }
  }
  return found;
}

/** HR-looking local parts first; otherwise keeps the given order. */
export function rankEmails(emails: string[]): string[] {
  const hr: string[] = [];
  const other: string[] = [];
  for (const email of emails) {
    const prefix = email.split("@")[0].toLowerCase();
    if (HR_HINTS.some(hint => prefix.includes(hint))) {
      hr.push(email);
    } else {
      other.push(email);
    }
  }
  return [...hr, ...other];
}

/** Address from a `mailto:` href, or null. */
export function parseMailto(href: string): string | null {
  if (!href.toLowerCase().startsWith("mailto:")) return null;
  const address = safeDecode(href.slice("mailto:".length).split("?")[0]).trim().toLowerCase();
  return isUsableEmail(address) ? address : null;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
