import { sleep as defaultSleep } from './retry';

export interface PacingOptions {
  minDelayMs: number;
  maxDelayMs: number;
  initialReferrer?: string;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Run-scoped request pacing, cookie jar and referrer chain for one target
 * site. Every outbound request takes exactly one slot; slots are issued in
 * call order and spaced by a random interval in [minDelayMs, maxDelayMs].
 */
export class SessionContext {
  private cookies = new Map<string, string>();
  private referrer: string | undefined;
  private lastSlotAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();
  private issued = 0;

  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: PacingOptions) {
    this.referrer = options.initialReferrer;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get slotsIssued(): number {
    return this.issued;
  }

  /** Resolves with the referrer to send once this caller's turn has come. */
  acquireSlot(): Promise<string | undefined> {
    const turn = this.queue.then(() => this.waitForTurn());
    this.queue = turn;
    return turn.then(() => this.referrer);
  }

  recordResponse(referrer: string | undefined, cookies: Record<string, string>): void {
    for (const [name, value] of Object.entries(cookies)) {
      this.cookies.set(name, value);
    }
    if (referrer) {
      this.referrer = referrer;
    }
  }

  cookieHeader(): string {
    return Array.from(this.cookies.entries())
      .map(([name, value]) => `${name}=${value}`)
      .join('; ');
  }

  getCookies(): Record<string, string> {
    return Object.fromEntries(this.cookies);
  }

  getReferrer(): string | undefined {
    return this.referrer;
  }

  /** Drop cookies and referrer; pacing keeps its clock. */
  reset(): void {
    this.cookies.clear();
    this.referrer = this.options.initialReferrer;
  }

  nextDelayMs(): number {
    const { minDelayMs, maxDelayMs } = this.options;
    return minDelayMs + this.random() * Math.max(0, maxDelayMs - minDelayMs);
  }

  private async waitForTurn(): Promise<void> {
    if (this.lastSlotAt !== null) {
      const elapsed = this.now() - this.lastSlotAt;
      const remaining = this.nextDelayMs() - elapsed;
      if (remaining > 0) {
        await this.sleep(remaining);
      }
    }
    this.lastSlotAt = this.now();
    this.issued++;
  }
}
