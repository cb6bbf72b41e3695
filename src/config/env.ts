import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

function integerVar(fallback: string, min: number, max: number, description: string) {
  return z
    .string()
    .default(fallback)
    .transform(value => Number(value))
    .pipe(z.number().int().min(min).max(max).describe(description));
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  HASH_SIZE: integerVar('8', 2, 64, 'HASH_SIZE must be within 2-64'),
  HASH_DIFF_THRESHOLD: integerVar(
    '5',
    0,
    4096,
    'HASH_DIFF_THRESHOLD must be a non-negative bit count'
  ),
  // 50MB
  MAX_IMAGE_SIZE: integerVar(
    String(50 * 1024 * 1024),
    1,
    Number.MAX_SAFE_INTEGER,
    'MAX_IMAGE_SIZE must be a positive byte count'
  ),
  // 1GB
  MAX_ZIP_SIZE: integerVar(
    String(1024 * 1024 * 1024),
    1,
    Number.MAX_SAFE_INTEGER,
    'MAX_ZIP_SIZE must be a positive byte count'
  ),
  MAX_COMPRESSION_RATIO: integerVar('10', 1, 1000, 'MAX_COMPRESSION_RATIO must be within 1-1000'),
  FINGERPRINT_CONCURRENCY: integerVar('4', 1, 64, 'FINGERPRINT_CONCURRENCY must be within 1-64'),
  ITEM_TIMEOUT_MS: integerVar('30000', 100, 600000, 'ITEM_TIMEOUT_MS must be within 100-600000ms')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
