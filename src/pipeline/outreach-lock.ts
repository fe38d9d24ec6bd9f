import { randomUUID } from "crypto";
import { and, eq, lt } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { outreachLocks } from "../db/schema";
import type { LockConfig } from "../core/config-schema";
import { LockTimeoutError, errorMessage } from "../core/errors";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Per-company mutual exclusion backed by the outreach_locks table, so that
 * separate processes (a cron run and a manual `send`) serialize on the same
 * company key. Expired rows are reclaimed on the next acquisition attempt.
 *
 * A lease held through `withLock` is renewed every third of its TTL for as
 * long as the callback runs; only a holder that stopped running (a crashed
 * process) lets it lapse.
 */
export class OutreachLock {
  private readonly owner = `${process.pid}:${randomUUID()}`;

  constructor(
    private readonly db: AppDatabase,
    private readonly config: LockConfig,
  ) {}

  /** One attempt. Returns true when this instance now holds the lock. */
  tryAcquire(companyKey: string): boolean {
    const now = new Date();
    this.db.delete(outreachLocks).where(lt(outreachLocks.expiresAt, now.toISOString())).run();

    const result = this.db.insert(outreachLocks).values({
      companyKey,
      owner: this.owner,
      lockedAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + this.config.ttl_ms).toISOString(),
    }).onConflictDoNothing().run();
    return result.changes > 0;
  }

  release(companyKey: string): void {
    this.db.delete(outreachLocks)
      .where(and(eq(outreachLocks.companyKey, companyKey), eq(outreachLocks.owner, this.owner)))
      .run();
  }

  /** Push the expiry out by one TTL. False when the lease is no longer ours. */
  renew(companyKey: string): boolean {
    const result = this.db.update(outreachLocks)
      .set({ expiresAt: new Date(Date.now() + this.config.ttl_ms).toISOString() })
      .where(and(eq(outreachLocks.companyKey, companyKey), eq(outreachLocks.owner, this.owner)))
      .run();
    return result.changes > 0;
  }

  async acquire(companyKey: string): Promise<void> {
    const started = Date.now();
    const deadline = started + this.config.wait_ms;
    while (!this.tryAcquire(companyKey)) {
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(companyKey, Date.now() - started);
      }
      await sleep(this.config.poll_ms);
    }
  }

  /** Run `fn` while holding the company's lock; released on every exit path. */
  async withLock<T>(companyKey: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(companyKey);
    const heartbeat = setInterval(() => {
      try {
        if (!this.renew(companyKey)) {
          console.warn(`⚠️ [Lock] Lease on ${companyKey} was lost before renewal`);
        }
      } catch (err) {
        console.warn(`⚠️ [Lock] Could not renew lease on ${companyKey}: ${errorMessage(err)}`);
      }
    }, Math.max(1, Math.floor(this.config.ttl_ms / 3)));
    try {
      return await fn();
    } finally {
      clearInterval(heartbeat);
      this.release(companyKey);
    }
  }
}
