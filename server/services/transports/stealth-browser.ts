import { execSync } from 'child_process';
import type { Browser, HTTPRequest, Page } from 'puppeteer-core';
import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { Logger } from '../logger';
import { BlockedError, TransportError, errorMessage } from '../errors';
import { CHROME_USER_AGENT } from './fingerprint-client';
import {
  encodeForm,
  isBlockedStatus,
  type RequestSpec,
  type Transport,
  type TransportResponse,
} from './types';

// puppeteer-extra drives puppeteer-core when the full puppeteer package is absent
puppeteer.use(StealthPlugin());

const CANDIDATE_EXECUTABLES = [
  'chromium',
  'chromium-browser',
  'google-chrome',
  'google-chrome-stable',
];

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
  '--window-size=1920,1080',
  '--lang=en-US,en',
];

/** Find Chrome/Chromium on PATH; puppeteer-core ships no browser of its own. */
export function findChromeExecutable(explicitPath?: string): string {
  if (explicitPath) return explicitPath;

  for (const candidate of CANDIDATE_EXECUTABLES) {
    try {
      const resolved = execSync(`which ${candidate}`, { encoding: 'utf8', stdio: ['ignore', 'pipe', 'ignore'] }).trim();
      if (resolved) return resolved;
    } catch {
      // not installed under this name
    }
  }

  throw new TransportError(
    'No Chrome/Chromium executable found on PATH; set CHROME_EXECUTABLE_PATH',
    'about:blank'
  );
}

export interface StealthBrowserOptions {
  executablePath?: string;
  timeoutMs?: number;
  headless?: boolean;
}

/**
 * Real browser with the stealth plugin's evasions applied. One page is
 * reused for the whole session so the site sees a single tab navigating.
 */
export class StealthBrowser implements Transport {
  readonly kind = 'browser' as const;
  private browser: Browser | null = null;
  private page: Page | null = null;
  private pendingPost: { url: string; body: string } | null = null;

  constructor(private readonly options: StealthBrowserOptions = {}) {}

  async fetch(spec: RequestSpec): Promise<TransportResponse> {
    const page = await this.getPage();

    try {
      await this.applyCookies(page, spec);
      if (spec.headers) {
        await page.setExtraHTTPHeaders(spec.headers);
      }

      if (spec.method === 'POST') {
        this.pendingPost = { url: spec.url, body: encodeForm(spec.form ?? {}) };
      }

      const response = await page.goto(spec.url, {
        waitUntil: 'domcontentloaded',
        timeout: spec.timeoutMs ?? this.options.timeoutMs ?? 60_000,
        referer: spec.referrer,
      });
      this.pendingPost = null;

      const status = response?.status() ?? 0;
      const finalUrl = page.url();
      if (isBlockedStatus(status)) {
        throw new BlockedError(status, finalUrl);
      }

      const body = await page.content();
      const cookies: Record<string, string> = {};
      for (const cookie of await page.cookies()) {
        cookies[cookie.name] = cookie.value;
      }

      return { status, body, url: finalUrl, cookies };
    } catch (error) {
      this.pendingPost = null;
      if (error instanceof BlockedError) throw error;
      throw new TransportError(`Browser navigation to ${spec.url} failed: ${errorMessage(error)}`, spec.url, error);
    }
  }

  async resetSession(): Promise<void> {
    this.pendingPost = null;
    if (!this.page) return;

    try {
      const client = await this.page.createCDPSession();
      await client.send('Network.clearBrowserCookies');
      await client.detach();
    } catch (error) {
      throw new TransportError(`Failed to clear browser cookies: ${errorMessage(error)}`, this.page.url(), error);
    }
    await Logger.info('Browser cookies cleared', 'stealth-browser');
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      this.page = null;
      await Logger.info('Browser closed', 'stealth-browser');
    }
  }

  private async getPage(): Promise<Page> {
    if (this.page) return this.page;

    const executablePath = findChromeExecutable(this.options.executablePath);
    await Logger.info(`Launching stealth browser from ${executablePath}`, 'stealth-browser');

    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        executablePath,
        headless: this.options.headless ?? true,
        args: LAUNCH_ARGS,
        defaultViewport: { width: 1920, height: 1080 },
      });
    } catch (error) {
      throw new TransportError(`Failed to launch browser: ${errorMessage(error)}`, 'about:blank', error);
    }
    this.browser = browser;

    let page: Page;
    try {
      page = await browser.newPage();
      await page.setUserAgent(CHROME_USER_AGENT);
      await page.setRequestInterception(true);
    } catch (error) {
      this.browser = null;
      await browser.close().catch(closeError =>
        Logger.warning(`Browser close after a failed page setup failed: ${errorMessage(closeError)}`, 'stealth-browser')
      );
      throw new TransportError(`Failed to open browser page: ${errorMessage(error)}`, 'about:blank', error);
    }
    page.on('request', request => {
      this.handleRequest(request).catch(async error => {
        await Logger.warning(`Request interception failed: ${errorMessage(error)}`, 'stealth-browser');
      });
    });

    this.page = page;
    return page;
  }

  // Turns the next top-level navigation into a form POST
  private async handleRequest(request: HTTPRequest): Promise<void> {
    const post = this.pendingPost;
    if (post && request.isNavigationRequest() && request.url() === post.url) {
      this.pendingPost = null;
      await request.continue({
        method: 'POST',
        postData: post.body,
        headers: { ...request.headers(), 'content-type': 'application/x-www-form-urlencoded' },
      });
      return;
    }
    await request.continue();
  }

  private async applyCookies(page: Page, spec: RequestSpec): Promise<void> {
    if (!spec.cookies) return;
    const cookies = spec.cookies.split(';')
      .map(part => part.trim())
      .filter(part => part.includes('='))
      .map(part => {
        const separator = part.indexOf('=');
        return { name: part.slice(0, separator), value: part.slice(separator + 1), url: spec.url };
      });
    if (cookies.length > 0) {
      await page.setCookie(...cookies);
    }
  }
}
