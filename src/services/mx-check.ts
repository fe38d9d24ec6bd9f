import { resolveMx } from "dns/promises";
import { errorMessage } from "../core/errors";
import type { MailboxVerifier } from "../pipeline/email-resolver";

// Lookup answers that mean "this domain takes no mail".
const NEGATIVE_CODES = new Set(["ENOTFOUND", "ENODATA", "NXDOMAIN"]);

type MxLookup = (domain: string) => Promise<{ exchange: string; priority: number }[]>;

/** Checks that a domain publishes at least one MX record. */
export class DnsMailboxVerifier implements MailboxVerifier {
  constructor(private readonly lookup: MxLookup = resolveMx) {}

  async hasMailExchange(domain: string): Promise<boolean | undefined> {
    try {
      const records = await this.lookup(domain);
      return records.some(record => record.exchange.length > 0);
    } catch (err) {
      const code = err instanceof Error && "code" in err ? String(err.code) : "";
      if (NEGATIVE_CODES.has(code)) return false;
      console.warn(`⚠️ [MX] Lookup failed for ${domain}: ${errorMessage(err)}`);
      return undefined;
    }
  }
}
