import { z } from 'zod';
import type { AppConfig } from '../config';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge utility for config objects. Nested objects merge, arrays and
 * scalars from the source replace the target's, undefined never overrides.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const incoming = source[key];
    if (incoming === undefined) continue;

    const current = result[key];
    result[key] = isPlainObject(incoming) && isPlainObject(current)
      ? deepMerge(current, incoming)
      : incoming;
  }

  return result;
}

const transportKind = z.enum(['fingerprint', 'browser']);

const siteBase = {
  name: z.string(),
  baseUrl: z.string().url(),
  transport: transportKind,
  pacing: z.object({
    minMs: z.number().min(0),
    maxMs: z.number().min(0),
  }),
  timeoutMs: z.number().int().positive(),
  headers: z.record(z.string()).default({}),
};

export const portalSiteSchema = z.object({
  ...siteBase,
  caseTypes: z.array(z.string().min(1)).min(1),
  maxPages: z.number().int().positive(),
  defaultState: z.string(),
  selectors: z.object({
    resultsTable: z.string(),
    resultRows: z.string(),
    rosterHeader: z.string(),
    minCells: z.number().int().positive(),
  }),
  form: z.object({
    acceptButtonPattern: z.string(),
    caseTypeField: z.string(),
    searchButtonField: z.string(),
    searchButtonValue: z.string(),
    sessionExpiredPattern: z.string(),
  }),
});

// Sites looked up once per property address
const lookupSiteSchema = z.object({
  ...siteBase,
  zipCodes: z.array(z.string()),
  maxAttempts: z.number().int().positive(),
  retryBaseDelayMs: z.number().min(0),
  blockedPatterns: z.array(z.string()),
});

export const valuationSiteSchema = lookupSiteSchema.extend({
  concurrency: z.number().int().positive(),
});

export const dealSiteSchema = lookupSiteSchema.extend({
  enabled: z.boolean(),
});

export type PortalSiteConfig = z.infer<typeof portalSiteSchema>;
export type LookupSiteConfig = z.infer<typeof lookupSiteSchema>;
export type ValuationSiteConfig = z.infer<typeof valuationSiteSchema>;
export type DealSiteConfig = z.infer<typeof dealSiteSchema>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/**
 * Platform defaults. A WebForms roster portal paginates its results grid
 * through __doPostBack; a listing site embeds property JSON in the page;
 * a deal site links offer pages from a search results list.
 */
export const PLATFORM_DEFAULTS = {
  'aspnet-roster': {
    name: 'court-roster',
    transport: 'fingerprint',
    timeoutMs: 60_000,
    headers: {},
    maxPages: 25,
    defaultState: 'SC',
    selectors: {
      resultsTable: 'table.searchResultsGrid',
      resultRows: 'tr.standardRow, tr.altRow',
      rosterHeader: '.rosterHeader, #rosterHeader, h2, h3',
      minCells: 9,
    },
    form: {
      acceptButtonPattern: '^\\s*(I\\s+)?Accept',
      caseTypeField: 'ctl00$MainContent$ddlSubType',
      searchButtonField: 'ctl00$MainContent$btnSearch',
      searchButtonValue: 'Search',
      sessionExpiredPattern: 'session (has )?(expired|timed out)|validation of viewstate mac failed|invalid viewstate',
    },
  },
  'listing-site': {
    name: 'valuation',
    transport: 'browser',
    timeoutMs: 45_000,
    headers: {},
    maxAttempts: 3,
    retryBaseDelayMs: 2_000,
    concurrency: 3,
    blockedPatterns: ['Access to this page has been denied', 'captcha', 'px-captcha'],
  },
  'deal-site': {
    name: 'deals',
    transport: 'browser',
    timeoutMs: 45_000,
    headers: {},
    maxAttempts: 3,
    retryBaseDelayMs: 2_000,
    blockedPatterns: ['Access denied', 'captcha'],
  },
} as const;

export function buildPortalConfig(
  appConfig: AppConfig,
  overrides: DeepPartial<PortalSiteConfig> = {}
): PortalSiteConfig {
  const fromEnv: DeepPartial<PortalSiteConfig> = {
    baseUrl: appConfig.portal.baseUrl,
    transport: appConfig.portal.transport,
    caseTypes: appConfig.portal.caseTypes,
    maxPages: appConfig.portal.maxPages,
    pacing: { minMs: appConfig.portal.pacing.minMs, maxMs: appConfig.portal.pacing.maxMs },
  };
  const merged = deepMerge(deepMerge(PLATFORM_DEFAULTS['aspnet-roster'], fromEnv), overrides);
  return portalSiteSchema.parse(merged);
}

export function buildValuationConfig(
  appConfig: AppConfig,
  overrides: DeepPartial<ValuationSiteConfig> = {}
): ValuationSiteConfig {
  const fromEnv: DeepPartial<ValuationSiteConfig> = {
    baseUrl: appConfig.valuation.baseUrl,
    transport: appConfig.valuation.transport,
    zipCodes: appConfig.valuation.zipCodes,
    maxAttempts: appConfig.valuation.maxAttempts,
    concurrency: appConfig.valuation.concurrency,
    pacing: { minMs: appConfig.valuation.pacing.minMs, maxMs: appConfig.valuation.pacing.maxMs },
  };
  const merged = deepMerge(deepMerge(PLATFORM_DEFAULTS['listing-site'], fromEnv), overrides);
  return valuationSiteSchema.parse(merged);
}

/** Shares the valuation lookups' zip scope, pacing and attempt budget. */
export function buildDealConfig(
  appConfig: AppConfig,
  overrides: DeepPartial<DealSiteConfig> = {}
): DealSiteConfig {
  const fromEnv: DeepPartial<DealSiteConfig> = {
    enabled: appConfig.deals.enabled,
    baseUrl: appConfig.deals.baseUrl,
    transport: appConfig.deals.transport,
    zipCodes: appConfig.valuation.zipCodes,
    maxAttempts: appConfig.valuation.maxAttempts,
    pacing: { minMs: appConfig.valuation.pacing.minMs, maxMs: appConfig.valuation.pacing.maxMs },
  };
  const merged = deepMerge(deepMerge(PLATFORM_DEFAULTS['deal-site'], fromEnv), overrides);
  return dealSiteSchema.parse(merged);
}
