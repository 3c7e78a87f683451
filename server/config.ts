import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const commaList = (fallback: string) =>
  z.string().default(fallback).transform(value =>
    value.split(',').map(item => item.trim()).filter(item => item.length > 0)
  );

const booleanFlag = (fallback: 'true' | 'false') => z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default(fallback)
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const transportKind = z.enum(['fingerprint', 'browser']);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error', 'silent']).default('info'),
  DATABASE_URL: z.string().optional(),
  DATA_DIR: z.string().default('./data'),

  PORTAL_BASE_URL: z.string().url().default('https://publicindex.sccourts.org/york/courtrosters/'),
  PORTAL_TRANSPORT: transportKind.default('fingerprint'),
  CASE_TYPES: commaList('Foreclosure'),
  MAX_PAGES: z.coerce.number().int().positive().default(25),
  REQUEST_DELAY_MIN_SECONDS: z.coerce.number().min(0).default(10),
  REQUEST_DELAY_MAX_SECONDS: z.coerce.number().min(0).default(30),

  VALUATION_BASE_URL: z.string().url().default('https://www.zillow.com'),
  VALUATION_TRANSPORT: transportKind.default('browser'),
  ENRICHMENT_ZIP_CODES: commaList('29732,29745,29730,29710,29708,29704,29726,29717,29715,29702,29743,29712'),
  ENRICHMENT_DELAY_MIN_SECONDS: z.coerce.number().min(0).default(2),
  ENRICHMENT_DELAY_MAX_SECONDS: z.coerce.number().min(0).default(5),
  ENRICHMENT_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  ENRICHMENT_CONCURRENCY: z.coerce.number().int().positive().default(3),

  DEAL_LOOKUPS_ENABLED: booleanFlag('true'),
  DEAL_BASE_URL: z.string().url().default('https://www.dealio.com'),
  DEAL_TRANSPORT: transportKind.default('browser'),

  SCHEDULE_INTERVAL_DAYS: z.coerce.number().int().positive().default(14),
  SCHEDULE_HOUR: z.coerce.number().int().min(0).max(23).default(5),
  SCHEDULE_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  SCHEDULE_TIMEZONE: z.string().default('America/New_York'),
  RUN_ONCE: booleanFlag('false'),
  EXPORT_FORMAT: z.enum(['csv', 'xlsx', 'json']).default('csv'),

  CHROME_EXECUTABLE_PATH: z.string().optional(),
}).refine(env => env.REQUEST_DELAY_MIN_SECONDS <= env.REQUEST_DELAY_MAX_SECONDS, {
  message: 'REQUEST_DELAY_MIN_SECONDS must not exceed REQUEST_DELAY_MAX_SECONDS',
  path: ['REQUEST_DELAY_MIN_SECONDS'],
}).refine(env => env.ENRICHMENT_DELAY_MIN_SECONDS <= env.ENRICHMENT_DELAY_MAX_SECONDS, {
  message: 'ENRICHMENT_DELAY_MIN_SECONDS must not exceed ENRICHMENT_DELAY_MAX_SECONDS',
  path: ['ENRICHMENT_DELAY_MIN_SECONDS'],
});

export type Env = z.infer<typeof envSchema>;
export type TransportKind = z.infer<typeof transportKind>;

export interface DelayBounds {
  minMs: number;
  maxMs: number;
}

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  logLevel: Env['LOG_LEVEL'];
  databaseUrl?: string;
  dataDir: string;
  portal: {
    baseUrl: string;
    transport: TransportKind;
    caseTypes: string[];
    maxPages: number;
    pacing: DelayBounds;
  };
  valuation: {
    baseUrl: string;
    transport: TransportKind;
    zipCodes: string[];
    pacing: DelayBounds;
    maxAttempts: number;
    concurrency: number;
  };
  deals: {
    enabled: boolean;
    baseUrl: string;
    transport: TransportKind;
  };
  schedule: {
    intervalDays: number;
    hour: number;
    minute: number;
    timezone: string;
    runOnce: boolean;
  };
  exportFormat: Env['EXPORT_FORMAT'];
  chromeExecutablePath?: string;
}

/**
 * Parse configuration from an environment map. Throws with every zod issue
 * listed so a bad deployment fails at startup rather than mid-run.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${issues}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL,
    dataDir: env.DATA_DIR,
    portal: {
      baseUrl: env.PORTAL_BASE_URL,
      transport: env.PORTAL_TRANSPORT,
      caseTypes: env.CASE_TYPES,
      maxPages: env.MAX_PAGES,
      pacing: {
        minMs: env.REQUEST_DELAY_MIN_SECONDS * 1000,
        maxMs: env.REQUEST_DELAY_MAX_SECONDS * 1000,
      },
    },
    valuation: {
      baseUrl: env.VALUATION_BASE_URL,
      transport: env.VALUATION_TRANSPORT,
      zipCodes: env.ENRICHMENT_ZIP_CODES,
      pacing: {
        minMs: env.ENRICHMENT_DELAY_MIN_SECONDS * 1000,
        maxMs: env.ENRICHMENT_DELAY_MAX_SECONDS * 1000,
      },
      maxAttempts: env.ENRICHMENT_MAX_ATTEMPTS,
      concurrency: env.ENRICHMENT_CONCURRENCY,
    },
    deals: {
      enabled: env.DEAL_LOOKUPS_ENABLED,
      baseUrl: env.DEAL_BASE_URL,
      transport: env.DEAL_TRANSPORT,
    },
    schedule: {
      intervalDays: env.SCHEDULE_INTERVAL_DAYS,
      hour: env.SCHEDULE_HOUR,
      minute: env.SCHEDULE_MINUTE,
      timezone: env.SCHEDULE_TIMEZONE,
      runOnce: env.RUN_ONCE,
    },
    exportFormat: env.EXPORT_FORMAT,
    chromeExecutablePath: env.CHROME_EXECUTABLE_PATH,
  };
}

export const config = loadConfig();
