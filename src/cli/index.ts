#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_CONFIG_FILE,
  REQUIRED_SYNC_KEYS,
  loadConfig,
  resolveSyncEnv,
  writeDefaultConfig,
} from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { buildSyncDeps } from '../sync/job.js';
import { runSync, type SyncResult } from '../sync/run.js';
import { TIMEFRAMES } from '../source/adapter.js';
import { startServer } from '../api/server.js';

const program = new Command();

program
  .name('wpsync')
  .description('Sync WordPress posts into an Appwrite collection')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description(`Write a default ${DEFAULT_CONFIG_FILE} in the current directory`)
  .action(() => {
    const configPath = path.resolve(DEFAULT_CONFIG_FILE);
    if (fs.existsSync(configPath)) {
      log(`✓ ${DEFAULT_CONFIG_FILE} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${DEFAULT_CONFIG_FILE} created`);
  });

// === run ===
program
  .command('run')
  .description('Run one sync pass using variables from the environment')
  .option('--dry-run', 'write to an in-memory store instead of Appwrite')
  .option('--json', 'print the raw result as JSON')
  .action(async (opts: { dryRun?: boolean; json?: boolean }) => {
    const config = await loadConfig();
    const env = resolveSyncEnv(process.env);
    const result = await runSync(buildSyncDeps(env, config, { dryRun: opts.dryRun }));

    if (opts.json) {
      log(JSON.stringify(result, null, 2));
    } else {
      printSummary(result, opts.dryRun ?? false);
    }
  });

// === serve ===
program
  .command('serve')
  .description('Start the HTTP trigger and, if enabled, the cron scheduler')
  .option('-p, --port <port>', 'port to listen on', (v) => parseInt(v, 10))
  .action(async (opts: { port?: number }) => {
    await startServer({ port: opts.port });
  });

// === doctor ===
program
  .command('doctor')
  .description('Check configuration and required variables')
  .action(async () => {
    const config = await loadConfig();
    log(`Config: ok (server ${config.server.host}:${config.server.port})`);
    for (const key of REQUIRED_SYNC_KEYS) {
      log(`${key}: ${process.env[key]?.trim() ? 'set' : 'missing'}`);
    }
    log(`APPWRITE_API_KEY: ${process.env['APPWRITE_API_KEY'] ? 'set' : 'missing'}`);
  });

function printSummary(result: SyncResult, dryRun: boolean): void {
  log(dryRun ? 'Dry run (nothing written to Appwrite)' : 'Sync finished');
  for (const timeframe of TIMEFRAMES) {
    const r = result.results[timeframe];
    log('error' in r ? `  ${timeframe}: error: ${r.error}` : `  ${timeframe}: ${r.fetched} fetched, ${r.stored} stored`);
  }
  log(`Total stored: ${result.total_stored}`);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    const missing = err.details?.['missing'];
    // eslint-disable-next-line no-console
    console.error(Array.isArray(missing) ? `${err.message}: ${missing.join(', ')}` : err.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
});
