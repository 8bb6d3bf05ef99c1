/**
 * Scheduler — node-cron task that runs the sync on `schedule.sync_cron`.
 * Started by `wpsync serve` when `schedule.enabled` is set.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Config } from '../shared/config.js';
import type { SyncJob } from './job.js';
import { errorMessage } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

let syncTask: ScheduledTask | null = null;

export function startScheduler(job: SyncJob, config: Config): boolean {
  const syncCron = config.schedule.sync_cron;

  if (!cron.validate(syncCron)) {
    logger.warn({ syncCron }, 'Invalid sync_cron expression, skipping scheduler');
    return false;
  }

  syncTask?.stop();
  syncTask = cron.schedule(syncCron, () => {
    logger.info('Scheduled sync starting');
    job.run().then(
      (result) => logger.info({ total_stored: result.total_stored }, 'Scheduled sync complete'),
      (err: unknown) => logger.error({ error: errorMessage(err) }, 'Scheduled sync failed'),
    );
  });

  logger.info({ sync_cron: syncCron }, 'Scheduler started');
  return true;
}

export function stopScheduler(): void {
  if (!syncTask) return;
  syncTask.stop();
  syncTask = null;
  logger.info('Scheduler stopped');
}
