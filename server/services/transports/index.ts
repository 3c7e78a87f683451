import type { TransportKind } from '../../config';
import { TransportError } from '../errors';
import { withRetry } from '../retry';
import type { SessionContext } from '../session-context';
import { FingerprintClient } from './fingerprint-client';
import { StealthBrowser } from './stealth-browser';
import type { RequestSpec, Transport, TransportResponse } from './types';

export * from './types';
export { FingerprintClient } from './fingerprint-client';
export { StealthBrowser } from './stealth-browser';

export interface TransportOptions {
  timeoutMs?: number;
  executablePath?: string;
}

/** Static selection: each target site names its variant in its config. */
export function createTransport(kind: TransportKind, options: TransportOptions = {}): Transport {
  switch (kind) {
    case 'fingerprint':
      return new FingerprintClient({ timeoutMs: options.timeoutMs });
    case 'browser':
      return new StealthBrowser({ timeoutMs: options.timeoutMs, executablePath: options.executablePath });
  }
}

export interface PacedFetchOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Treat a 5xx answer as a TransportError so it is retried like a network failure */
  retryServerErrors?: boolean;
}

/**
 * One paced round trip: take a slot, send the session's cookies and
 * referrer, record what came back. TransportError is retried with backoff
 * and every attempt takes its own slot; BlockedError propagates at once.
 */
export async function pacedFetch(
  transport: Transport,
  session: SessionContext,
  spec: RequestSpec,
  options: PacedFetchOptions = {}
): Promise<TransportResponse> {
  return withRetry(async () => {
    const referrer = await session.acquireSlot();
    const cookies = session.cookieHeader();
    const response = await transport.fetch({
      ...spec,
      referrer: spec.referrer ?? referrer,
      cookies: cookies || undefined,
    });
    session.recordResponse(response.url, response.cookies);
    if (options.retryServerErrors && response.status >= 500) {
      throw new TransportError(`Server error ${response.status} from ${spec.url}`, spec.url);
    }
    return response;
  }, {
    maxAttempts: options.maxAttempts ?? 3,
    baseDelayMs: options.baseDelayMs ?? 2_000,
    jitterMs: 500,
    shouldRetry: error => error instanceof TransportError,
    sleep: options.sleep,
  });
}
