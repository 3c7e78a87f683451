import { describe, it, expect } from 'vitest';
import { SessionContext } from './session-context';

function fakeClock(start = 1_000) {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    advance: (ms: number) => {
      current += ms;
    },
    sleeps,
  };
}

describe('SessionContext', () => {
  it('issues the first slot immediately and spaces the next by a random interval', async () => {
    const clock = fakeClock();
    const session = new SessionContext({
      minDelayMs: 10_000,
      maxDelayMs: 30_000,
      random: () => 0.5,
      sleep: clock.sleep,
      now: clock.now,
    });

    await session.acquireSlot();
    expect(clock.sleeps).toEqual([]);

    await session.acquireSlot();
    expect(clock.sleeps).toEqual([20_000]);
    expect(session.slotsIssued).toBe(2);
  });

  it('only waits for the part of the interval that has not elapsed', async () => {
    const clock = fakeClock();
    const session = new SessionContext({
      minDelayMs: 10_000,
      maxDelayMs: 30_000,
      random: () => 0.5,
      sleep: clock.sleep,
      now: clock.now,
    });

    await session.acquireSlot();
    clock.advance(15_000);
    await session.acquireSlot();
    clock.advance(40_000);
    await session.acquireSlot();

    expect(clock.sleeps).toEqual([5_000]);
  });

  it('queues concurrent callers so every slot is spaced', async () => {
    const clock = fakeClock();
    const session = new SessionContext({
      minDelayMs: 2_000,
      maxDelayMs: 2_000,
      sleep: clock.sleep,
      now: clock.now,
    });

    await Promise.all([session.acquireSlot(), session.acquireSlot(), session.acquireSlot()]);

    expect(clock.sleeps).toEqual([2_000, 2_000]);
    expect(session.slotsIssued).toBe(3);
  });

  it('stays within the configured bounds', () => {
    const low = new SessionContext({ minDelayMs: 10_000, maxDelayMs: 30_000, random: () => 0 });
    const high = new SessionContext({ minDelayMs: 10_000, maxDelayMs: 30_000, random: () => 0.999 });

    expect(low.nextDelayMs()).toBe(10_000);
    expect(high.nextDelayMs()).toBeLessThan(30_000);
    expect(high.nextDelayMs()).toBeGreaterThan(29_900);
  });

  it('chains referrers and merges cookies from responses', async () => {
    const session = new SessionContext({
      minDelayMs: 0,
      maxDelayMs: 0,
      initialReferrer: 'https://portal.test/',
    });

    expect(await session.acquireSlot()).toBe('https://portal.test/');

    session.recordResponse('https://portal.test/Disclaimer.aspx', { 'ASP.NET_SessionId': 'abc' });
    session.recordResponse('https://portal.test/Roster.aspx', { 'ASP.NET_SessionId': 'def', lb: '1' });

    expect(await session.acquireSlot()).toBe('https://portal.test/Roster.aspx');
    expect(session.cookieHeader()).toBe('ASP.NET_SessionId=def; lb=1');
  });

  it('keeps the referrer when a response carries none', () => {
    const session = new SessionContext({ minDelayMs: 0, maxDelayMs: 0 });
    session.recordResponse('https://portal.test/a', {});
    session.recordResponse(undefined, { token: 'x' });

    expect(session.getReferrer()).toBe('https://portal.test/a');
    expect(session.getCookies()).toEqual({ token: 'x' });
  });

  it('reset clears cookies and restores the initial referrer', () => {
    const session = new SessionContext({
      minDelayMs: 0,
      maxDelayMs: 0,
      initialReferrer: 'https://portal.test/',
    });
    session.recordResponse('https://portal.test/Roster.aspx', { 'ASP.NET_SessionId': 'abc' });

    session.reset();

    expect(session.cookieHeader()).toBe('');
    expect(session.getReferrer()).toBe('https://portal.test/');
  });
});
