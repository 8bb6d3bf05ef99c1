import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  wordpress: z
    .object({
      user_agent: z.string().default('wpsync/1.0'),
    })
    .default({}),

  schedule: z
    .object({
      enabled: z.boolean().default(false),
      sync_cron: z.string().default('0 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG_FILE = 'wpsync.config.yaml';

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('wpsync', {
    searchPlaces: [DEFAULT_CONFIG_FILE, 'wpsync.config.yml', '.wpsyncrc.yaml', '.wpsyncrc.yml'],
  });

  const envConfigPath = process.env['WPSYNC_CONFIG'];
  let rawConfig: unknown = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = result?.config ?? {};
  } else {
    const result = await explorer.search();
    if (result) {
      rawConfig = result.config ?? {};
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

// ================================================================
// Function variables
// ================================================================

export const REQUIRED_SYNC_KEYS = [
  'WORDPRESS_URL',
  'APPWRITE_DATABASE_ID',
  'APPWRITE_COLLECTION_ID',
] as const;

const required = z.string().trim().min(1);
const optional = z.string().trim().default('');

export const SyncEnvSchema = z
  .object({
    APPWRITE_FUNCTION_ENDPOINT: optional,
    APPWRITE_FUNCTION_PROJECT_ID: optional,
    APPWRITE_API_KEY: optional,
    WORDPRESS_URL: required,
    APPWRITE_DATABASE_ID: required,
    APPWRITE_COLLECTION_ID: required,
  })
  .transform((vars) => ({
    endpoint: vars.APPWRITE_FUNCTION_ENDPOINT,
    projectId: vars.APPWRITE_FUNCTION_PROJECT_ID,
    apiKey: vars.APPWRITE_API_KEY,
    wordpressUrl: vars.WORDPRESS_URL,
    databaseId: vars.APPWRITE_DATABASE_ID,
    collectionId: vars.APPWRITE_COLLECTION_ID,
  }));

export type SyncEnv = z.infer<typeof SyncEnvSchema>;

export type Variables = Record<string, string | undefined>;

/**
 * Validate the function variables. Blank values count as missing.
 * @throws ConfigError listing the missing keys
 */
export function resolveSyncEnv(vars: Variables): SyncEnv {
  const parsed = SyncEnvSchema.safeParse(vars);
  if (!parsed.success) {
    const missing = REQUIRED_SYNC_KEYS.filter((key) => !vars[key]?.trim());
    throw new ConfigError('Missing required environment variables', { missing });
  }
  return parsed.data;
}
