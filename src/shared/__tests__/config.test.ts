import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigSchema,
  generateDefaultConfigYaml,
  loadConfig,
  resetConfigCache,
  resolveSyncEnv,
} from '../config.js';
import { ConfigError } from '../errors.js';

const VARIABLES = {
  APPWRITE_FUNCTION_ENDPOINT: 'https://appwrite.example.com/v1',
  APPWRITE_FUNCTION_PROJECT_ID: 'project',
  APPWRITE_API_KEY: 'test-secret',
  WORDPRESS_URL: 'https://blog.example.com',
  APPWRITE_DATABASE_ID: 'db-main',
  APPWRITE_COLLECTION_ID: 'articles',
};

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfigCache();
});

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const config = ConfigSchema.parse({});
    expect(config.server.port).toBe(3892);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.wordpress.user_agent).toBe('wpsync/1.0');
    expect(config.schedule).toEqual({ enabled: false, sync_cron: '0 * * * *' });
  });

  it('accepts overrides and keeps other defaults', () => {
    const config = ConfigSchema.parse({ server: { port: 8080 }, schedule: { enabled: true } });
    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe('127.0.0.1');
    expect(config.schedule.sync_cron).toBe('0 * * * *');
  });

  it('rejects invalid types', () => {
    expect(ConfigSchema.safeParse({ server: { port: 'not-a-number' } }).success).toBe(false);
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('sync_cron');
    expect(yaml).toContain('3892');
  });
});

describe('loadConfig', () => {
  it('loads the file named by WPSYNC_CONFIG', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wpsync-'));
    const file = path.join(dir, 'wpsync.config.yaml');
    fs.writeFileSync(file, 'server:\n  port: 4000\n', 'utf-8');
    vi.stubEnv('WPSYNC_CONFIG', file);

    const config = await loadConfig(true);

    expect(config.server.port).toBe(4000);
    expect(config.wordpress.user_agent).toBe('wpsync/1.0');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('throws ConfigError when WPSYNC_CONFIG points nowhere', async () => {
    vi.stubEnv('WPSYNC_CONFIG', path.join(os.tmpdir(), 'wpsync-missing', 'nope.yaml'));
    await expect(loadConfig(true)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('resolveSyncEnv', () => {
  it('maps variables to a SyncEnv', () => {
    expect(resolveSyncEnv(VARIABLES)).toEqual({
      endpoint: 'https://appwrite.example.com/v1',
      projectId: 'project',
      apiKey: 'test-secret',
      wordpressUrl: 'https://blog.example.com',
      databaseId: 'db-main',
      collectionId: 'articles',
    });
  });

  it('defaults the Appwrite connection values to empty strings', () => {
    const env = resolveSyncEnv({
      WORDPRESS_URL: 'https://blog.example.com',
      APPWRITE_DATABASE_ID: 'db-main',
      APPWRITE_COLLECTION_ID: 'articles',
    });
    expect(env.endpoint).toBe('');
    expect(env.apiKey).toBe('');
  });

  it('lists missing and blank keys', () => {
    const err = (() => {
      try {
        resolveSyncEnv({ ...VARIABLES, WORDPRESS_URL: undefined, APPWRITE_DATABASE_ID: ' ' });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({
      message: 'Missing required environment variables',
      details: { missing: ['WORDPRESS_URL', 'APPWRITE_DATABASE_ID'] },
    });
  });
});
