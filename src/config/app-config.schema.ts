import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_POLL_INTERVAL_SEC = 60;
const DEFAULT_MONITOR_FETCH_TIMEOUT_MS = 15_000;
const DEFAULT_SOURCE_FETCH_LIMIT = 50;
const DEFAULT_DEDUP_CAPACITY = 1000;
const DEFAULT_PRICE_CACHE_TTL_SEC = 300;
const DEFAULT_COINGECKO_TIMEOUT_MS = 8000;
const DEFAULT_HUMANODE_FALLBACK_USD_PRICE = 0.05;
const DEFAULT_NOTIFICATION_MIN_INTERVAL_MS = 500;
const DEFAULT_DASHBOARD_INTERVAL_SEC = 3600;
const DEFAULT_DASHBOARD_LIMIT = 5;
const DEFAULT_RATE_LIMIT_COINGECKO_MIN_TIME_MS = 2000;
const DEFAULT_RATE_LIMIT_EXPLORER_MIN_TIME_MS = 250;
const DEFAULT_NETWORK_THRESHOLDS = 'ton=1000,everscale=100000,venom=0,humanode=250usd';
const DEFAULT_ENABLED_NETWORKS = 'ton,everscale,venom,humanode';

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  METRICS_ENABLED: booleanSchema.default(true),
  BOT_TOKEN: optionalNonEmptyStringSchema,
  TELEGRAM_CHAT_ID: optionalNonEmptyStringSchema,
  ALERT_MODE: z.enum(['global', 'per_subscriber']).default('global'),
  DATABASE_URL: z.url().optional(),
  POLL_INTERVAL_SEC: z.coerce.number().int().positive().default(DEFAULT_POLL_INTERVAL_SEC),
  MONITOR_FETCH_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MONITOR_FETCH_TIMEOUT_MS),
  ENABLED_NETWORKS: z.string().trim().default(DEFAULT_ENABLED_NETWORKS),
  NETWORK_THRESHOLDS: z.string().trim().default(DEFAULT_NETWORK_THRESHOLDS),
  USD_UNPRICED_POLICY: z.enum(['suppress', 'pass']).default('suppress'),
  SYSTEM_ADDRESSES: optionalNonEmptyStringSchema,
  SOURCE_FETCH_LIMIT: z.coerce.number().int().positive().default(DEFAULT_SOURCE_FETCH_LIMIT),
  DEDUP_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_DEDUP_CAPACITY),
  COINGECKO_API_BASE_URL: z.url().default('https://api.coingecko.com/api/v3'),
  COINGECKO_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_COINGECKO_TIMEOUT_MS),
  PRICE_CACHE_TTL_SEC: z.coerce.number().int().positive().default(DEFAULT_PRICE_CACHE_TTL_SEC),
  HUMANODE_FALLBACK_USD_PRICE: z.coerce
    .number()
    .positive()
    .default(DEFAULT_HUMANODE_FALLBACK_USD_PRICE),
  TONCENTER_API_BASE_URL: z.url().default('https://toncenter.com/api/v3/'),
  TONCENTER_API_KEY: optionalNonEmptyStringSchema,
  EVERSCALE_GRAPHQL_URL: z.url().optional(),
  VENOM_GRAPHQL_URL: z.url().default('https://gql.venom.foundation/graphql'),
  SUBSCAN_API_BASE_URL: z.url().default('https://humanode.api.subscan.io'),
  SUBSCAN_API_KEY: optionalNonEmptyStringSchema,
  NOTIFICATION_MIN_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_NOTIFICATION_MIN_INTERVAL_MS),
  DASHBOARD_ENABLED: booleanSchema.default(false),
  DASHBOARD_INTERVAL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DASHBOARD_INTERVAL_SEC),
  DASHBOARD_LIMIT: z.coerce.number().int().positive().default(DEFAULT_DASHBOARD_LIMIT),
  RATE_LIMIT_COINGECKO_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_COINGECKO_MIN_TIME_MS),
  RATE_LIMIT_EXPLORER_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_EXPLORER_MIN_TIME_MS),
});

export type ParsedEnv = z.infer<typeof envSchema>;
