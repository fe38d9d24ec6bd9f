import { describe, expect, test } from "vitest";
import {
  extractEmails,
  isSyntacticEmail,
  isUsableEmail,
  parseMailto,
  rankEmails,
} from "../../src/pipeline/email-patterns";

describe("extractEmails", () => {
  test("keeps usable addresses, lowercased and deduplicated in order", () => {
    const text = "Contact Jobs@Acme.io or noreply@acme.io, logo@2x.png, jobs@acme.io, ana@example.com, dana@acme.io";

    expect(extractEmails(text)).toEqual(["jobs@acme.io", "dana@acme.io"]);
  });

  test("finds nothing in plain text", () => {
    expect(extractEmails("Apply through the portal")).toEqual([]);
  });
});

describe("isUsableEmail", () => {
  test("rejects role mailboxes and infrastructure domains", () => {
    expect(isUsableEmail("support@acme.io")).toBe(false);
    expect(isUsableEmail("talent@linkedin.com")).toBe(false);
    expect(isUsableEmail("talent@acme.io")).toBe(true);
  });

  test("rejects addresses longer than 80 characters", () => {
    expect(isUsableEmail(`${"a".repeat(75)}@acme.io`)).toBe(false);
  });

  test("isSyntacticEmail is shape only", () => {
    expect(isSyntacticEmail("noreply@example.com")).toBe(true);
    expect(isSyntacticEmail("careers@acme")).toBe(false);
  });
});

describe("rankEmails", () => {
  test("puts HR-looking mailboxes first and keeps the rest in order", () => {
    expect(rankEmails(["dana@acme.io", "careers@acme.io", "max@acme.io", "talent@acme.io"]))
      .toEqual(["careers@acme.io", "talent@acme.io", "dana@acme.io", "max@acme.io"]);
  });
});

describe("parseMailto", () => {
  test("decodes the address and drops the query", () => {
    expect(parseMailto("mailto:Hiring%40acme.io?subject=Hi")).toBe("hiring@acme.io");
  });

  test("ignores other links and undecodable hrefs", () => {
    expect(parseMailto("https://acme.io")).toBeNull();
    expect(parseMailto("mailto:%E0%A4%A")).toBeNull();
  });
});
