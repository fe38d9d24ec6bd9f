import { Cron } from 'croner';
import { desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { cronJobs, cronRuns, type CronJob, type CronRun } from '../db/schema';
import { errorMessage } from './errors';

export const PAYLOAD_TYPES = ['scout', 'draft', 'run', 'send_approved'] as const;
export type PayloadType = typeof PAYLOAD_TYPES[number];

export function isPayloadType(value: string): value is PayloadType {
  return PAYLOAD_TYPES.some(type => type === value);
}

export interface ExecutorResult {
  success: boolean;
  summary?: Record<string, unknown>;
  error?: string;
}

export type JobExecutor = (params: Record<string, unknown>, job: CronJob, sessionId: string) => Promise<ExecutorResult>;

export interface NewJobInput {
  name: string;
  schedule: string;
  payloadType: PayloadType;
  payloadParams?: Record<string, unknown>;
  description?: string;
  timezone?: string;
}

export interface SchedulerStatus {
  running: boolean;
  jobCount: number;
  jobs: { id: number; name: string; nextRun: Date | null; lastRun: string | null }[];
}

function parseParams(raw: string | null): Record<string, unknown> {
  if (!raw) return {};
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`payload_params must be a JSON object, got: ${raw}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Cron-driven pipeline runs. Jobs live in cron_jobs; every execution is
 * recorded in cron_runs. Each execution builds its own services, so runs
 * share nothing in memory.
 */
export class OutreachScheduler {
  private jobs: Map<number, Cron> = new Map();
  private executors: Map<string, JobExecutor> = new Map();
  private isRunning = false;

  constructor(private readonly db: AppDatabase) {}

  registerExecutor(payloadType: PayloadType, executor: JobExecutor): void {
    this.executors.set(payloadType, executor);
  }

  /** Validates the cron pattern before storing the job. */
  addJob(input: NewJobInput): CronJob {
    const preview = new Cron(input.schedule, { paused: true, timezone: input.timezone ?? 'UTC' });
    const nextRun = preview.nextRun();
    preview.stop();

    const job = this.db.insert(cronJobs).values({
      name: input.name,
      description: input.description,
      schedule: input.schedule,
      payloadType: input.payloadType,
      payloadParams: input.payloadParams ? JSON.stringify(input.payloadParams) : null,
      timezone: input.timezone ?? 'UTC',
      nextRunAt: nextRun?.toISOString(),
    }).returning().get();

    if (this.isRunning) {
      this.scheduleJob(job);
    }
    return job;
  }

  listJobs(): CronJob[] {
    return this.db.select().from(cronJobs).all();
  }

  recentRuns(limit = 10): CronRun[] {
    return this.db.select().from(cronRuns).orderBy(desc(cronRuns.id)).limit(limit).all();
  }

  start(): void {
    if (this.isRunning) return;

    console.log('🕐 [Scheduler] Starting...');
    const jobs = this.db.select().from(cronJobs).where(eq(cronJobs.enabled, 1)).all();
    for (const job of jobs) {
      this.scheduleJob(job);
    }

    this.isRunning = true;
    console.log(`📅 [Scheduler] Active with ${jobs.length} job(s)`);
  }

  stop(): void {
    for (const cron of this.jobs.values()) {
      cron.stop();
    }
    this.jobs.clear();
    this.isRunning = false;
    console.log('🛑 [Scheduler] Stopped');
  }

  private scheduleJob(job: CronJob): void {
    const cron = new Cron(job.schedule, {
      timezone: job.timezone || 'UTC',
      protect: true,
    }, async () => {
      try {
        await this.executeJob(job.id, 'scheduled');
      } catch (error) {
        // The job row was removed while its timer was armed
        console.error(`❌ [Scheduler] Job #${job.id}: ${errorMessage(error)}`);
      }
    });

    this.jobs.set(job.id, cron);

    const nextRun = cron.nextRun();
    console.log(`  ✓ Job "${job.name}" scheduled: ${job.schedule} (next: ${nextRun?.toISOString()})`);

    this.db.update(cronJobs)
      .set({ nextRunAt: nextRun?.toISOString() })
      .where(eq(cronJobs.id, job.id))
      .run();
  }

  async runNow(jobId: number): Promise<CronRun> {
    return this.executeJob(jobId, 'manual');
  }

  private async executeJob(jobId: number, triggerReason: 'scheduled' | 'manual'): Promise<CronRun> {
    const job = this.db.select().from(cronJobs).where(eq(cronJobs.id, jobId)).get();
    if (!job) {
      throw new Error(`Cron job #${jobId} not found`);
    }

    const sessionId = `cron:${job.name.replace(/\s+/g, '-').toLowerCase()}:${Date.now()}`;
    console.log(`🔄 [Scheduler] Executing: ${job.name} (${sessionId})`);

    const runRecord = this.db.insert(cronRuns).values({
      jobId: job.id,
      sessionId,
      startedAt: new Date().toISOString(),
      status: 'running',
      triggerReason,
    }).returning().get();

    try {
      const executor = this.executors.get(job.payloadType);
      if (!executor) {
        throw new Error(`No executor registered for payload type: ${job.payloadType}`);
      }

      const result = await executor(parseParams(job.payloadParams), job, sessionId);

      this.db.update(cronRuns).set({
        finishedAt: new Date().toISOString(),
        status: result.success ? 'success' : 'failed',
        resultSummary: JSON.stringify(result.summary ?? {}),
        errorMessage: result.error,
      }).where(eq(cronRuns.id, runRecord.id)).run();

      console.log(`✅ [Scheduler] Job "${job.name}" complete`);
    } catch (error) {
      this.db.update(cronRuns).set({
        finishedAt: new Date().toISOString(),
        status: 'failed',
        errorMessage: errorMessage(error),
      }).where(eq(cronRuns.id, runRecord.id)).run();

      console.error(`❌ [Scheduler] Job "${job.name}" failed: ${errorMessage(error)}`);
    }

    this.db.update(cronJobs).set({
      lastRunAt: new Date().toISOString(),
      nextRunAt: this.jobs.get(job.id)?.nextRun()?.toISOString(),
    }).where(eq(cronJobs.id, job.id)).run();

    const finished = this.db.select().from(cronRuns).where(eq(cronRuns.id, runRecord.id)).get();
    return finished ?? runRecord;
  }

  getStatus(): SchedulerStatus {
    const jobList: SchedulerStatus['jobs'] = [];
    for (const [id, cron] of this.jobs) {
      const job = this.db.select().from(cronJobs).where(eq(cronJobs.id, id)).get();
      jobList.push({
        id,
        name: job?.name || 'Unknown',
        nextRun: cron.nextRun(),
        lastRun: job?.lastRunAt || null,
      });
    }

    return {
      running: this.isRunning,
      jobCount: this.jobs.size,
      jobs: jobList,
    };
  }
}
