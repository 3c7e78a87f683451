import type { Address } from '@shared/schema';
import { Logger } from '../logger';
import { addressKey, formatAddress } from '../address';
import { BlockedError, TransportError, errorMessage } from '../errors';
import type { SessionContext } from '../session-context';
import type { LookupSiteConfig } from '../site-config';
import { pacedFetch } from '../transports';
import type { Transport, TransportResponse } from '../transports/types';
import { isBlockedPage } from './valuation-parser';

export type NoMatchReason = 'no-street' | 'out-of-scope' | 'not-found' | 'blocked' | 'transport' | 'error';

/** Nothing for this address in this run. Distinct from a match with empty fields. */
export interface NoMatch {
  readonly kind: 'no-match';
  readonly reason: NoMatchReason;
}

export function noMatch(reason: NoMatchReason): NoMatch {
  return { kind: 'no-match', reason };
}

export function isNoMatch<T extends object>(result: T | NoMatch): result is NoMatch {
  return 'kind' in result && result.kind === 'no-match';
}

export interface ResolverOptions {
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/** `quote_plus`-style: spaces as '+', everything else percent-encoded. */
export function encodeAddress(address: Address): string {
  return encodeURIComponent(formatAddress(address)).replace(/%20/g, '+');
}

/**
 * Looks something up per property address. Results are cached for the
 * life of the resolver (one run) by address key, and the cache holds the
 * pending promise so concurrent callers share one lookup. Never rejects.
 */
export abstract class AddressResolver<T extends object> {
  private readonly cache = new Map<string, Promise<T | NoMatch>>();
  private readonly zipCodes: ReadonlySet<string>;
  private lookups = 0;

  protected constructor(
    protected readonly transport: Transport,
    protected readonly session: SessionContext,
    protected readonly config: LookupSiteConfig,
    protected readonly options: ResolverOptions,
    private readonly component: string
  ) {
    this.zipCodes = new Set(config.zipCodes);
  }

  /** Lookups that reached the network, not cache hits. */
  get lookupCount(): number {
    return this.lookups;
  }

  resolve(address: Address): Promise<T | NoMatch> {
    if (!address.street.trim()) {
      return Promise.resolve(noMatch('no-street'));
    }
    if (this.zipCodes.size > 0 && !this.zipCodes.has(address.zip)) {
      return Promise.resolve(noMatch('out-of-scope'));
    }

    const key = addressKey(address);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.lookup(address);
    this.cache.set(key, pending);
    return pending;
  }

  /** Null when the site has nothing for the address. */
  protected abstract find(address: Address): Promise<T | null>;

  protected now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  // Null for a 4xx page; 5xx is retried and then surfaces as TransportError
  protected async get(url: string, referrer?: string): Promise<TransportResponse | null> {
    const response = await pacedFetch(
      this.transport,
      this.session,
      { method: 'GET', url, referrer, headers: this.config.headers, timeoutMs: this.config.timeoutMs },
      {
        maxAttempts: this.config.maxAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        sleep: this.options.sleep,
        retryServerErrors: true,
      }
    );

    if (response.status !== 200) {
      await Logger.warning(`${this.config.name} answered ${response.status} for ${url}`, this.component);
      return null;
    }
    if (isBlockedPage(response.body, this.config.blockedPatterns)) {
      throw new BlockedError(response.status, url);
    }
    return response;
  }

  private async lookup(address: Address): Promise<T | NoMatch> {
    this.lookups++;
    const label = formatAddress(address);

    try {
      const found = await this.find(address);
      if (!found) {
        await Logger.info(`Nothing on ${this.config.name} for ${label}`, this.component);
        return noMatch('not-found');
      }
      return found;
    } catch (error) {
      if (error instanceof BlockedError) {
        await Logger.warning(`Blocked looking up ${label}: ${error.message}`, this.component);
        return noMatch('blocked');
      }
      if (error instanceof TransportError) {
        await Logger.warning(
          `Lookup for ${label} failed after ${this.config.maxAttempts} attempts: ${error.message}`,
          this.component
        );
        return noMatch('transport');
      }
      await Logger.error(`Lookup for ${label} failed: ${errorMessage(error)}`, this.component);
      return noMatch('error');
    }
  }
}
