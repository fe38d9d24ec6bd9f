import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, loadConfigFile, validateConfig } from "../../src/core/config-reader";
import { ConfigError } from "../../src/core/errors";

function issuesOf(input: unknown): string[] {
  try {
    validateConfig(input);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe("validateConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  test("accepts the default configuration", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });

  test("fills defaults for omitted fields", () => {
    const config = validateConfig({ ...DEFAULT_CONFIG, limits: {} });

    expect(config.limits).toEqual({ max_per_run: 10, max_per_day: 30 });
  });

  test("category priority must list every category", () => {
    const input = {
      ...DEFAULT_CONFIG,
      ranking: { ...DEFAULT_CONFIG.ranking, category_priority: ["js-ts", "full-stack", "frontend", "backend"] },
    };

    expect(issuesOf(input)).toEqual(["/ranking/category_priority: missing other"]);
  });

  test("category priority may not repeat a category", () => {
    const input = {
      ...DEFAULT_CONFIG,
      ranking: {
        ...DEFAULT_CONFIG.ranking,
        category_priority: ["js-ts", "js-ts", "full-stack", "frontend", "backend", "other"],
      },
    };

    expect(issuesOf(input)).toEqual(['/ranking/category_priority: "js-ts" is listed more than once']);
  });

  test("strategies may not repeat", () => {
    const input = {
      ...DEFAULT_CONFIG,
      resolver: { ...DEFAULT_CONFIG.resolver, strategies: ["posting-text", "posting-text"] },
    };

    expect(issuesOf(input)).toEqual(["/resolver/strategies: a strategy is listed more than once"]);
  });

  test("the SMTP timeout must stay below the lock lease", () => {
    const input = { ...DEFAULT_CONFIG, email: { ...DEFAULT_CONFIG.email, timeout_ms: 120000 } };

    expect(issuesOf(input)).toEqual(["/email/timeout_ms: 120000 must be below /lock/ttl_ms (120000)"]);
  });

  test("rejects values outside the schema", () => {
    const input = { ...DEFAULT_CONFIG, limits: { max_per_run: 0, max_per_day: 30 } };

    expect(() => validateConfig(input)).toThrow(ConfigError);
    expect(issuesOf(input).some(issue => issue.startsWith("/limits/max_per_run"))).toBe(true);
  });

  test("loadConfigFile reports unreadable JSON as a ConfigError", () => {
    dir = mkdtempSync(join(tmpdir(), "outreach-config-"));
    const path = join(dir, "outreach.json");
    writeFileSync(path, "{ not json", "utf-8");

    expect(() => loadConfigFile(path)).toThrow(ConfigError);
  });

  test("loadConfigFile reads a valid file", () => {
    dir = mkdtempSync(join(tmpdir(), "outreach-config-"));
    const path = join(dir, "outreach.json");
    writeFileSync(path, JSON.stringify({ ...DEFAULT_CONFIG, limits: { max_per_run: 3, max_per_day: 5 } }), "utf-8");

    expect(loadConfigFile(path).limits).toEqual({ max_per_run: 3, max_per_day: 5 });
  });
});
