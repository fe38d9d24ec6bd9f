/**
 * Bootstrap - one initialization path for CLI commands and scheduled runs.
 *
 * Opens the database, loads outreach.json and wires the pipeline services
 * to their collaborators.
 */

import { resolve } from "path";
import { closeDb, getDb, type AppDatabase } from "../db";
import { createScrapers } from "../modules/sources";
import { DraftLifecycle } from "../pipeline/draft-lifecycle";
import { DraftService } from "../pipeline/draft-service";
import { EmailResolver } from "../pipeline/email-resolver";
import { OpportunityStore } from "../pipeline/opportunity-store";
import { OutreachLock } from "../pipeline/outreach-lock";
import { ScoutService } from "../pipeline/scout-service";
import { SendService } from "../pipeline/send-service";
import { PiAiDrafter } from "../services/llm";
import { SmtpTransport } from "../services/mailer";
import { DnsMailboxVerifier } from "../services/mx-check";
import { HttpPageFetcher } from "../services/page-fetcher";
import { ResumeService } from "../services/resume";
import { ConfigManager } from "./config";
import { ConfigReader } from "./config-reader";
import type { OutreachConfig } from "./config-schema";
import { getDataDir } from "./data-dir";

export interface AppContext {
  db: AppDatabase;
  config: OutreachConfig;
  settings: ConfigManager;
  store: OpportunityStore;
  lifecycle: DraftLifecycle;
  resume: ResumeService;
}

const API_KEY_ENV: Record<string, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_API_KEY",
};

let context: AppContext | null = null;
let shutdownHandlersRegistered = false;

/**
 * Initialize the application context. Idempotent: later calls return the
 * same instance.
 */
export function bootstrap(): AppContext {
  if (context) return context;

  const db = getDb();
  const config = ConfigReader.load();
  const settings = new ConfigManager(db);
  const lock = new OutreachLock(db, config.lock);

  context = {
    db,
    config,
    settings,
    store: new OpportunityStore(db),
    lifecycle: new DraftLifecycle(db, lock),
    resume: new ResumeService(settings),
  };
  setupShutdownHandlers();
  return context;
}

export function shutdown(): void {
  if (!context) return;
  closeDb();
  context = null;
}

/** Resume path from the config, relative paths taken from the data dir. */
export function resumePath(config: OutreachConfig): string {
  return resolve(getDataDir(), config.profile.resume_path);
}

export async function createScoutService(ctx: AppContext): Promise<ScoutService> {
  const twitterToken = ctx.config.sources.twitter.bearer_token
    || await ctx.settings.getSecret("services.twitter.bearer_token", "TWITTER_BEARER_TOKEN");
  return new ScoutService(createScrapers(ctx.config.sources, twitterToken), ctx.store, ctx.config);
}

export async function createDraftService(ctx: AppContext): Promise<DraftService> {
  const { config } = ctx;
  const provider = config.llm.provider.toLowerCase();
  const apiKey = await ctx.settings.getSecret(`services.${provider}.api_key`, API_KEY_ENV[provider]);
  if (!apiKey) {
    console.warn(`⚠️ No API key configured for ${provider}`);
    console.warn(`   Run: scout config:set services.${provider}.api_key "YOUR_KEY"`);
  }

  const resolver = EmailResolver.fromConfig(
    config.resolver,
    new HttpPageFetcher(config.sources.request_timeout_ms),
    new DnsMailboxVerifier(),
  );

  return new DraftService({
    store: ctx.store,
    lifecycle: ctx.lifecycle,
    resolver,
    drafter: new PiAiDrafter(config.llm, apiKey),
    priority: config.ranking.category_priority,
    profile: config.profile,
    resumeText: () => ctx.resume.getResumeText(resumePath(config)),
  });
}

export async function createSendService(ctx: AppContext): Promise<SendService> {
  const password = await ctx.settings.getSecret("services.smtp.password", "SMTP_PASSWORD");
  if (!password) {
    console.warn("⚠️ No SMTP password configured. Run: scout config:set services.smtp.password \"...\"");
  }
  const transport = new SmtpTransport({
    email: ctx.config.email,
    password: password ?? "",
    attachmentPath: resumePath(ctx.config),
  });
  return new SendService(ctx.lifecycle, transport, ctx.config.limits);
}

/**
 * Close the database on SIGINT/SIGTERM so a scheduler process exits cleanly.
 */
function setupShutdownHandlers(): void {
  if (shutdownHandlersRegistered) return;

  const handleShutdown = (signal: string) => {
    console.log(`\n📡 Received ${signal}, shutting down...`);
    shutdown();
    process.exit(0);
  };

  process.on("SIGINT", () => handleShutdown("SIGINT"));
  process.on("SIGTERM", () => handleShutdown("SIGTERM"));

  shutdownHandlersRegistered = true;
}
