import { Agent, fetch as undiciFetch, type Dispatcher } from 'undici';
import { BlockedError, TransportError, errorMessage } from '../errors';
import {
  encodeForm,
  isBlockedStatus,
  parseSetCookie,
  type RequestSpec,
  type Transport,
  type TransportResponse,
} from './types';

// Chrome 124 ClientHello: cipher order, signature algorithms and groups
const CHROME_CIPHERS = [
  'TLS_AES_128_GCM_SHA256',
  'TLS_AES_256_GCM_SHA384',
  'TLS_CHACHA20_POLY1305_SHA256',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-CHACHA20-POLY1305',
  'ECDHE-RSA-CHACHA20-POLY1305',
  'ECDHE-RSA-AES128-SHA',
  'ECDHE-RSA-AES256-SHA',
  'AES128-GCM-SHA256',
  'AES256-GCM-SHA384',
  'AES128-SHA',
  'AES256-SHA',
].join(':');

const CHROME_SIGALGS = [
  'ecdsa_secp256r1_sha256',
  'rsa_pss_rsae_sha256',
  'rsa_pkcs1_sha256',
  'ecdsa_secp384r1_sha384',
  'rsa_pss_rsae_sha384',
  'rsa_pkcs1_sha384',
  'rsa_pss_rsae_sha512',
  'rsa_pkcs1_sha512',
].join(':');

export const CHROME_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

// Insertion order is the order Chrome sends them
const CHROME_NAVIGATION_HEADERS: Record<string, string> = {
  'sec-ch-ua': '"Chromium";v="124", "Google Chrome";v="124", "Not-A.Brand";v="99"',
  'sec-ch-ua-mobile': '?0',
  'sec-ch-ua-platform': '"Windows"',
  'upgrade-insecure-requests': '1',
  'user-agent': CHROME_USER_AGENT,
  'accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7',
  'sec-fetch-site': 'same-origin',
  'sec-fetch-mode': 'navigate',
  'sec-fetch-user': '?1',
  'sec-fetch-dest': 'document',
  'accept-encoding': 'gzip, deflate, br',
  'accept-language': 'en-US,en;q=0.9',
};

const MAX_REDIRECTS = 5;
const DEFAULT_TIMEOUT_MS = 60_000;

export function createChromeAgent(): Agent {
  return new Agent({
    allowH2: true,
    connect: {
      ciphers: CHROME_CIPHERS,
      sigalgs: CHROME_SIGALGS,
      ecdhCurve: 'X25519:P-256:P-384',
      minVersion: 'TLSv1.2',
      honorCipherOrder: true,
    },
    keepAliveTimeout: 30_000,
  });
}

export interface FingerprintClientOptions {
  /** Defaults to an Agent with the Chrome TLS profile */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
}

/**
 * Plain HTTP client whose handshake and header order match desktop Chrome.
 * Redirects are followed by hand so cookies set along the way are kept.
 */
export class FingerprintClient implements Transport {
  readonly kind = 'fingerprint' as const;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly timeoutMs: number;

  constructor(options: FingerprintClientOptions = {}) {
    this.dispatcher = options.dispatcher ?? createChromeAgent();
    this.ownsDispatcher = options.dispatcher === undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(spec: RequestSpec): Promise<TransportResponse> {
    const cookies: Record<string, string> = {};
    let url = spec.url;
    let method = spec.method;
    let body = spec.method === 'POST' && spec.form ? encodeForm(spec.form) : undefined;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const headers = this.buildHeaders(spec, method, cookies);
      if (body !== undefined) {
        headers['content-type'] = 'application/x-www-form-urlencoded';
        headers['origin'] = new URL(url).origin;
      }

      let response: Awaited<ReturnType<typeof undiciFetch>>;
      try {
        response = await undiciFetch(url, {
          method,
          headers,
          body,
          redirect: 'manual',
          dispatcher: this.dispatcher,
          signal: AbortSignal.timeout(spec.timeoutMs ?? this.timeoutMs),
        });
      } catch (error) {
        throw new TransportError(`Request to ${url} failed: ${errorMessage(error)}`, url, error);
      }

      Object.assign(cookies, parseSetCookie(response.headers.getSetCookie()));

      const location = response.headers.get('location');
      if (response.status >= 300 && response.status < 400 && location) {
        await response.body?.cancel();
        url = new URL(location, url).toString();
        // 303 and the classic 301/302 POST->GET downgrade
        if (response.status !== 307 && response.status !== 308) {
          method = 'GET';
          body = undefined;
        }
        continue;
      }

      if (isBlockedStatus(response.status)) {
        await response.body?.cancel();
        throw new BlockedError(response.status, url);
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw new TransportError(`Reading response from ${url} failed: ${errorMessage(error)}`, url, error);
      }

      return { status: response.status, body: text, url, cookies };
    }

    throw new TransportError(`Too many redirects starting at ${spec.url}`, spec.url);
  }

  // Cookies live in the caller's session jar; nothing is kept between requests
  async resetSession(): Promise<void> {}

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private buildHeaders(
    spec: RequestSpec,
    method: string,
    redirectCookies: Record<string, string>
  ): Record<string, string> {
    const headers: Record<string, string> = { ...CHROME_NAVIGATION_HEADERS };
    if (method === 'GET' && !spec.referrer) {
      headers['sec-fetch-site'] = 'none';
    }
    if (spec.referrer) {
      headers['referer'] = spec.referrer;
    }

    const cookieParts = [spec.cookies, ...Object.entries(redirectCookies).map(([k, v]) => `${k}=${v}`)]
      .filter((part): part is string => Boolean(part));
    if (cookieParts.length > 0) {
      headers['cookie'] = cookieParts.join('; ');
    }

    for (const [name, value] of Object.entries(spec.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }
    return headers;
  }
}
