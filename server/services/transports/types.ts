import type { TransportKind } from '../../config';

export type HttpMethod = 'GET' | 'POST';

export interface RequestSpec {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  referrer?: string;
  /** Rendered cookie header from the session jar */
  cookies?: string;
  /** urlencoded body for POST */
  form?: Record<string, string>;
  timeoutMs?: number;
}

export interface TransportResponse {
  status: number;
  body: string;
  /** Final URL after redirects */
  url: string;
  cookies: Record<string, string>;
}

/**
 * One capability, two variants. Implementations throw BlockedError for
 * access-denial statuses and TransportError for network failures; neither
 * retries on its own.
 */
export interface Transport {
  readonly kind: TransportKind;
  fetch(spec: RequestSpec): Promise<TransportResponse>;
  /** Drop any cookies the transport keeps of its own, ahead of a fresh session */
  resetSession(): Promise<void>;
  close(): Promise<void>;
}

export const BLOCKED_STATUSES: ReadonlySet<number> = new Set([401, 403, 429, 503]);

export function isBlockedStatus(status: number): boolean {
  return BLOCKED_STATUSES.has(status);
}

/** Name/value pairs from Set-Cookie header lines; attributes are dropped. */
export function parseSetCookie(lines: string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const line of lines) {
    const [pair] = line.split(';');
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (name) cookies[name] = value;
  }
  return cookies;
}

export function encodeForm(form: Record<string, string>): string {
  return new URLSearchParams(form).toString();
}
