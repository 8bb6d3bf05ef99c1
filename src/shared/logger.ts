import pino from 'pino';

const isProduction = process.env['NODE_ENV'] === 'production';
const isTest = process.env['VITEST'] !== undefined || process.env['NODE_ENV'] === 'test';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? (isTest ? 'silent' : 'info'),
  transport:
    !isProduction && !isTest
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['APPWRITE_API_KEY', 'api_key', 'apiKey', 'key', '*.APPWRITE_API_KEY', '*.api_key', '*.apiKey'],
    censor: '***REDACTED***',
  },
});
