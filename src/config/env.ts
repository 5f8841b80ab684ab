import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./data/journal.db'),
  REDIS_URL: z.string().optional(),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3100),

  // Comma-separated chat sender ids; empty means anyone may post
  AUTHORIZED_SENDERS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((sender) => sender.trim())
        .filter((sender) => sender.length > 0),
    ),

  // Price enrichment
  PRICE_API_BASE_URL: z.string().url().default('https://api.dexscreener.com'),
  PRICE_LOOKUP_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),
  PRICE_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),

  // Position engine
  POSITION_UPDATE_MAX_RETRIES: z.coerce.number().int().min(1).max(20).default(3),
  OVERSELL_TOLERANCE: z.coerce.number().min(0).max(0.01).default(1e-8),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  if (result.data.REDIS_URL === '') {
    return { ...result.data, REDIS_URL: undefined };
  }

  return result.data;
}

export const env = validateEnv();
