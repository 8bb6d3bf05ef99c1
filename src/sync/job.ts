import type { Config, SyncEnv } from '../shared/config.js';
import { WordPressSource } from '../source/wordpress.js';
import { createAppwriteStore } from '../store/appwrite.js';
import { MemoryArticleStore } from '../store/memory.js';
import { runSync, type SyncDeps, type SyncResult } from './run.js';
import { nowISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export function buildSyncDeps(
  env: SyncEnv,
  config: Config,
  opts: { dryRun?: boolean } = {},
): SyncDeps {
  return {
    source: new WordPressSource(env.wordpressUrl, { userAgent: config.wordpress.user_agent }),
    store: opts.dryRun ? new MemoryArticleStore() : createAppwriteStore(env),
  };
}

export interface LastRun {
  result: SyncResult;
  finishedAt: string;
}

/**
 * Runs syncs for a long-lived process (server, scheduler). Overlapping calls
 * join the run already in flight instead of starting a second one.
 */
export class SyncJob {
  private inFlight: Promise<SyncResult> | null = null;
  private last: LastRun | null = null;

  constructor(private readonly deps: SyncDeps) {}

  get running(): boolean {
    return this.inFlight !== null;
  }

  get lastRun(): LastRun | null {
    return this.last;
  }

  run(): Promise<SyncResult> {
    if (this.inFlight) {
      logger.info('Sync already running, joining it');
      return this.inFlight;
    }

    const run = runSync(this.deps)
      .then((result) => {
        this.last = { result, finishedAt: nowISO() };
        return result;
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = run;
    return run;
  }
}
