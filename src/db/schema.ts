import { sqliteTable, integer, text, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';
import {
  CONFIDENCE_TIERS,
  DRAFT_STATUSES,
  REACHABILITY,
  RESOLUTION_STRATEGIES,
  ROLE_CATEGORIES,
  SOURCES,
} from '../pipeline/types';

export const opportunities = sqliteTable('opportunities', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  companyKey: text('company_key').notNull(),
  company: text('company').notNull(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  source: text('source', { enum: SOURCES }).notNull(),
  url: text('url').notNull().default(''),
  urlKey: text('url_key').notNull(),
  location: text('location').notNull().default(''),
  category: text('category', { enum: ROLE_CATEGORIES }).notNull(),
  reachability: text('reachability', { enum: REACHABILITY }).notNull().default('unresolved'),
  discoveredAt: text('discovered_at').notNull(),
}, (table) => [
  uniqueIndex('idx_opportunities_company_url').on(table.companyKey, table.urlKey),
  index('idx_opportunities_company').on(table.companyKey),
]);

export const sightings = sqliteTable('sightings', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  opportunityId: integer('opportunity_id').notNull().references(() => opportunities.id, { onDelete: 'cascade' }),
  source: text('source', { enum: SOURCES }).notNull(),
  url: text('url').notNull().default(''),
  seenAt: text('seen_at').notNull(),
});

export const contactEmails = sqliteTable('contact_emails', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  opportunityId: integer('opportunity_id').notNull().unique().references(() => opportunities.id, { onDelete: 'cascade' }),
  address: text('address').notNull(),
  strategy: text('strategy', { enum: RESOLUTION_STRATEGIES }).notNull(),
  tier: text('tier', { enum: CONFIDENCE_TIERS }).notNull(),
  verified: integer('verified', { mode: 'boolean' }).notNull().default(false),
  resolvedAt: text('resolved_at').notNull(),
});

export const drafts = sqliteTable('drafts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  opportunityId: integer('opportunity_id').notNull().references(() => opportunities.id),
  companyKey: text('company_key').notNull(),
  recipient: text('recipient').notNull(),
  subject: text('subject').notNull(),
  body: text('body').notNull(),
  status: text('status', { enum: DRAFT_STATUSES }).notNull().default('pending'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
  sentAt: text('sent_at'),
}, (table) => [
  index('idx_drafts_status').on(table.status),
  index('idx_drafts_company').on(table.companyKey),
  uniqueIndex('idx_drafts_one_sent_per_company').on(table.companyKey).where(sql`status = 'sent'`),
]);

export const outreachLocks = sqliteTable('outreach_locks', {
  companyKey: text('company_key').primaryKey(),
  owner: text('owner').notNull(),
  lockedAt: text('locked_at').notNull(),
  expiresAt: text('expires_at').notNull(),
});

export const sysConfig = sqliteTable('sys_config', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  group: text('group'),
  updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
});

export const cronJobs = sqliteTable('cron_jobs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description'),
  schedule: text('schedule').notNull(),
  payloadType: text('payload_type').notNull(),
  payloadParams: text('payload_params'),  // JSON
  enabled: integer('enabled').default(1),
  timezone: text('timezone').default('UTC'),
  lastRunAt: text('last_run_at'),
  nextRunAt: text('next_run_at'),
  createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
  updatedAt: text('updated_at').default(sql`CURRENT_TIMESTAMP`),
});

export const cronRuns = sqliteTable('cron_runs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  jobId: integer('job_id').references(() => cronJobs.id, { onDelete: 'cascade' }),
  sessionId: text('session_id'),
  startedAt: text('started_at').notNull(),
  finishedAt: text('finished_at'),
  status: text('status').notNull(),
  resultSummary: text('result_summary'),  // JSON
  errorMessage: text('error_message'),
  triggerReason: text('trigger_reason'),
});

export type OpportunityRow = typeof opportunities.$inferSelect;
export type NewOpportunityRow = typeof opportunities.$inferInsert;
export type SightingRow = typeof sightings.$inferSelect;
export type ContactEmailRow = typeof contactEmails.$inferSelect;
export type DraftRow = typeof drafts.$inferSelect;
export type NewDraftRow = typeof drafts.$inferInsert;
export type OutreachLockRow = typeof outreachLocks.$inferSelect;
export type SysConfig = typeof sysConfig.$inferSelect;
export type CronJob = typeof cronJobs.$inferSelect;
export type NewCronJob = typeof cronJobs.$inferInsert;
export type CronRun = typeof cronRuns.$inferSelect;
