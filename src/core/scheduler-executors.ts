import {
  createDraftService,
  createScoutService,
  createSendService,
  type AppContext,
} from './bootstrap';
import type { OutreachScheduler } from './scheduler';
import { errorMessage } from './errors';

function numberParam(params: Record<string, unknown>, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Wire the pipeline stages as cron payload types. Services are created per
 * execution from the persisted state.
 */
export function registerPipelineExecutors(scheduler: OutreachScheduler, ctx: AppContext): void {
  scheduler.registerExecutor('scout', async () => {
    try {
      const summary = await (await createScoutService(ctx)).run();
      return { success: true, summary: { ...summary } };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  });

  scheduler.registerExecutor('draft', async (params) => {
    try {
      const summary = await (await createDraftService(ctx)).run({ limit: numberParam(params, 'limit') });
      return {
        success: true,
        summary: { drafted: summary.drafted.map(d => d.id), skipped: summary.skipped.length, unreachable: summary.unreachable },
      };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  });

  scheduler.registerExecutor('run', async (params) => {
    try {
      const scouted = await (await createScoutService(ctx)).run();
      const drafted = await (await createDraftService(ctx)).run({ limit: numberParam(params, 'limit') });
      return {
        success: true,
        summary: { new: scouted.new, resighted: scouted.resighted, drafted: drafted.drafted.map(d => d.id) },
      };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  });

  // Only ever sends reviewed drafts; the bypass path stays a manual choice.
  scheduler.registerExecutor('send_approved', async () => {
    try {
      const summary = await (await createSendService(ctx)).run();
      return {
        success: summary.failed.length === 0,
        summary: { sent: summary.sent.map(d => d.id), failed: summary.failed, deferred: summary.deferred },
        error: summary.failed.length > 0 ? `${summary.failed.length} draft(s) failed` : undefined,
      };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  });
}
