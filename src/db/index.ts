import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "./schema";
import { getDbPath } from "../core/data-dir";

export type AppDatabase = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

const DDL = [
  `CREATE TABLE IF NOT EXISTS opportunities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_key TEXT NOT NULL,
    company TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    source TEXT NOT NULL,
    url TEXT NOT NULL DEFAULT '',
    url_key TEXT NOT NULL,
    location TEXT NOT NULL DEFAULT '',
    category TEXT NOT NULL,
    reachability TEXT NOT NULL DEFAULT 'unresolved',
    discovered_at TEXT NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_opportunities_company_url ON opportunities(company_key, url_key)`,
  `CREATE INDEX IF NOT EXISTS idx_opportunities_company ON opportunities(company_key)`,
  `CREATE TABLE IF NOT EXISTS sightings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    opportunity_id INTEGER NOT NULL REFERENCES opportunities(id) ON DELETE CASCADE,
    source TEXT NOT NULL,
    url TEXT NOT NULL DEFAULT '',
    seen_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS contact_emails (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    opportunity_id INTEGER NOT NULL UNIQUE REFERENCES opportunities(id) ON DELETE CASCADE,
    address TEXT NOT NULL,
    strategy TEXT NOT NULL,
    tier TEXT NOT NULL,
    verified INTEGER NOT NULL DEFAULT 0,
    resolved_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS drafts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    opportunity_id INTEGER NOT NULL REFERENCES opportunities(id),
    company_key TEXT NOT NULL,
    recipient TEXT NOT NULL,
    subject TEXT NOT NULL,
    body TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    sent_at TEXT
  )`,
  `CREATE INDEX IF NOT EXISTS idx_drafts_status ON drafts(status)`,
  `CREATE INDEX IF NOT EXISTS idx_drafts_company ON drafts(company_key)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_drafts_one_sent_per_company ON drafts(company_key) WHERE status = 'sent'`,
  `CREATE TABLE IF NOT EXISTS outreach_locks (
    company_key TEXT PRIMARY KEY,
    owner TEXT NOT NULL,
    locked_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS sys_config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    "group" TEXT,
    updated_at TEXT DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS cron_jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    description TEXT,
    schedule TEXT NOT NULL,
    payload_type TEXT NOT NULL,
    payload_params TEXT,
    enabled INTEGER DEFAULT 1,
    timezone TEXT DEFAULT 'UTC',
    last_run_at TEXT,
    next_run_at TEXT,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP,
    updated_at TEXT DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS cron_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id INTEGER REFERENCES cron_jobs(id) ON DELETE CASCADE,
    session_id TEXT,
    started_at TEXT NOT NULL,
    finished_at TEXT,
    status TEXT NOT NULL,
    result_summary TEXT,
    error_message TEXT,
    trigger_reason TEXT
  )`,
];

/**
 * Open (or create) a SQLite database and make sure every table exists.
 *
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string): AppDatabase {
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("foreign_keys = ON");
  for (const statement of DDL) {
    sqlite.exec(statement);
  }
  return drizzle(sqlite, { schema });
}

let _db: AppDatabase | null = null;

export function getDb(): AppDatabase {
  if (_db) return _db;
  const dbPath = getDbPath();
  console.log(`📊 Using database: ${dbPath}`);
  _db = openDatabase(dbPath);
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.$client.close();
    _db = null;
  }
}
