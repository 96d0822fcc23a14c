/**
 * Environment configuration
 * Loaded from process.env (populated from .env by dotenv) and validated once.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';

const booleanString = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true');

const integerString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v, ctx) => {
      const n = Number(v);
      if (!Number.isInteger(n) || n < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a non-negative integer, got "${v}"` });
        return z.NEVER;
      }
      return n;
    });

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

export const ConfigSchema = z.object({
  DATABASE_URL: z.string().optional(),
  DATABASE_SSL: booleanString.default('false'),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: integerString('6379'),
  PORT: integerString('3001'),
  CORS_ORIGIN: z.string().default('*'),
  MIRROR_API_KEY: optionalSecret,
  TUSHARE_TOKEN: optionalSecret,
  TUSHARE_API_URL: z.string().url().default('http://api.tushare.pro'),
  ALPACA_API_KEY: optionalSecret,
  ALPACA_API_SECRET: optionalSecret,
  ALPACA_DATA_URL: z.string().url().default('https://data.alpaca.markets'),
  ALPACA_TRADING_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  FETCH_CONCURRENCY: integerString('1'),
  RETRY_ATTEMPTS: integerString('5'),
  UPDATE_LOOKBACK_DAYS: integerString('30'),
  PROVIDER_TIMEOUT_MS: integerString('30000'),
  ENABLE_WORKERS: booleanString.default('true'),
});

export type MirrorConfig = z.infer<typeof ConfigSchema>;

/**
 * Keys `config set` may write to the env file
 */
export const CONFIG_KEYS = ConfigSchema.keyof().options;

export const ENV_FILE = '.env';

let cached: MirrorConfig | null = null;

/**
 * Parse an environment into a config, throwing ConfigurationError on invalid values
 */
export function parseConfig(env: NodeJS.ProcessEnv): MirrorConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

export function getConfig(): MirrorConfig {
  if (!cached) {
    dotenv.config({ path: ENV_FILE });
    cached = parseConfig(process.env);
  }
  return cached;
}

/**
 * Drop the cached config (after `config set`, and in tests)
 */
export function resetConfig(): void {
  cached = null;
}

export function requireDatabaseUrl(config: MirrorConfig = getConfig()): string {
  if (!config.DATABASE_URL) {
    throw new ConfigurationError('DATABASE_URL is required');
  }
  return config.DATABASE_URL;
}

/**
 * Read the env file as key/value pairs (empty when it does not exist)
 */
export function readEnvFile(file: string = ENV_FILE): Record<string, string> {
  if (!fs.existsSync(file)) return {};
  return dotenv.parse(fs.readFileSync(file, 'utf8'));
}

/**
 * Set one key in the env file, keeping the others
 */
export function writeEnvValue(key: string, value: string, file: string = ENV_FILE): void {
  if (!ConfigSchema.keyof().safeParse(key).success) {
    throw new ConfigurationError(`Unknown configuration key: ${key}`, { known: CONFIG_KEYS });
  }
  const values = { ...readEnvFile(file), [key]: value };
  parseConfig(values);

  const lines = Object.entries(values).map(([k, v]) => {
    if (!/[\s#"'=]/.test(v)) return `${k}=${v}`;
    return v.includes('"') ? `${k}='${v}'` : `${k}="${v}"`;
  });
  fs.writeFileSync(file, lines.join('\n') + '\n', 'utf8');
}

/**
 * Mask secrets for display
 */
export function maskValue(key: string, value: string | undefined): string {
  if (value === undefined || value === '') return '(not set)';
  if (/KEY|SECRET|TOKEN/.test(key)) {
    return value.length <= 4 ? '****' : `${value.slice(0, 2)}****${value.slice(-2)}`;
  }
  return value;
}
