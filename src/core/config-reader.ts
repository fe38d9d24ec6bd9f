import { readFileSync, existsSync, writeFileSync } from "fs";
import { Value } from "@sinclair/typebox/value";
import { OutreachConfigSchema, type OutreachConfig } from "./config-schema";
import { getConfigPath } from "./data-dir";
import { ConfigError, errorMessage } from "./errors";
import { ROLE_CATEGORIES, type RoleCategory } from "../pipeline/types";

export const DEFAULT_CONFIG: OutreachConfig = {
  profile: {
    name: "Your Name",
    email: "you@example.com",
    phone: "",
    location: "",
    resume_path: "resume.pdf",
  },
  search: {
    keywords: ["full stack developer", "software engineer", "react developer", "node.js developer"],
    locations: ["remote"],
    experience_level: "mid",
    remote_only: true,
  },
  sources: {
    "linkedin-posts": { enabled: true, max_results: 10 },
    "linkedin-jobs": { enabled: true, max_results: 25 },
    twitter: { enabled: true, max_results: 20 },
    request_timeout_ms: 15000,
  },
  ranking: {
    category_keywords: [
      {
        category: "js-ts",
        keywords: ["typescript", "javascript", "react", "node.js", "nodejs", "next.js", "nextjs", "nestjs", "vue", "angular"],
      },
      { category: "full-stack", keywords: ["full stack", "fullstack", "full-stack"] },
      { category: "frontend", keywords: ["frontend", "front-end", "front end"] },
      { category: "backend", keywords: ["backend", "back-end", "back end"] },
    ],
    category_priority: ["js-ts", "full-stack", "frontend", "backend", "other"],
  },
  resolver: {
    strategies: ["posting-text", "company-website", "hr-pattern"],
    timeout_ms: 20000,
    max_pages: 4,
    hr_prefixes: ["careers", "hr", "jobs", "hello"],
  },
  email: {
    smtp_host: "smtp.gmail.com",
    smtp_port: 587,
    secure: false,
    user: "you@example.com",
    sender_name: "Your Name",
    timeout_ms: 30000,
  },
  llm: {
    provider: "anthropic",
    model: "claude-3-5-haiku-20241022",
    temperature: 0.7,
    max_tokens: 1024,
  },
  limits: {
    max_per_run: 10,
    max_per_day: 30,
  },
  lock: {
    ttl_ms: 120000,
    wait_ms: 30000,
    poll_ms: 250,
  },
};

/**
 * Validate a parsed config object. Beyond the schema, the category priority
 * must be a total order over every role category and strategies may not repeat.
 */
export function validateConfig(input: unknown): OutreachConfig {
  const rawConfig = Value.Default(OutreachConfigSchema, structuredClone(input));
  const issues = [...Value.Errors(OutreachConfigSchema, rawConfig)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  if (issues.length > 0 || !Value.Check(OutreachConfigSchema, rawConfig)) {
    throw new ConfigError(issues);
  }

  const config = rawConfig;
  const priority = config.ranking.category_priority;
  const missing = ROLE_CATEGORIES.filter((category) => !priority.includes(category));
  const seen = new Set<RoleCategory>();
  for (const category of priority) {
    if (seen.has(category)) {
      issues.push(`/ranking/category_priority: "${category}" is listed more than once`);
    }
    seen.add(category);
  }
  if (missing.length > 0) {
    issues.push(`/ranking/category_priority: missing ${missing.join(", ")}`);
  }

  if (new Set(config.resolver.strategies).size !== config.resolver.strategies.length) {
    issues.push("/resolver/strategies: a strategy is listed more than once");
  }

  if (config.email.timeout_ms >= config.lock.ttl_ms) {
    issues.push(
      `/email/timeout_ms: ${config.email.timeout_ms} must be below /lock/ttl_ms (${config.lock.ttl_ms})`,
    );
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}

export function loadConfigFile(configPath: string): OutreachConfig {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError([`${configPath}: ${errorMessage(err)}`]);
  }
  return validateConfig(rawConfig);
}

export class ConfigReader {
  private static config: OutreachConfig | null = null;

  static load(): OutreachConfig {
    if (this.config) {
      return this.config;
    }

    const configPath = getConfigPath();

    if (!existsSync(configPath)) {
      console.log(`📝 Config file not found. Creating default config at ${configPath}`);
      writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), "utf-8");
      console.log(`⚠️  Please edit ${configPath} with your profile and SMTP account before sending.`);
    }

    let config: OutreachConfig;
    try {
      config = loadConfigFile(configPath);
    } catch (err) {
      console.error(`❌ Failed to load config file: ${configPath}`);
      console.error(errorMessage(err));
      process.exit(1);
    }

    this.config = config;
    console.log(`✅ Loaded config from ${configPath}`);
    return config;
  }

  static reload(): OutreachConfig {
    this.config = null;
    return this.load();
  }

  static get(): OutreachConfig {
    return this.config ?? this.load();
  }
}
