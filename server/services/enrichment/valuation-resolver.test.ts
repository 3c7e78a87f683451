import { describe, it, expect } from 'vitest';
import type { Address } from '@shared/schema';
import { loadConfig } from '../../config';
import { BlockedError, TransportError } from '../errors';
import { SessionContext } from '../session-context';
import { buildValuationConfig } from '../site-config';
import { FakeTransport, htmlReply, type FakeHandler } from '../../testing/fake-transport';
import { isNoMatch, noMatch } from './address-resolver';
import { EnrichmentResolver, detailsUrl, searchUrl } from './valuation-resolver';

const BASE = 'https://listings.test';
const RESOLVED_AT = new Date('2025-11-01T12:00:00.000Z');

const ROACH_HOUSE: Address = {
  street: '875 Rolling Green Drive',
  city: 'Rock Hill',
  state: 'SC',
  zip: '29730',
};

const SEARCH_URL = `${BASE}/homes/875+Rolling+Green+Drive%2C+Rock+Hill%2C+SC+29730_rb/`;

const propertyJson = JSON.stringify({
  props: {
    pageProps: {
      property: {
        zpid: 44556677,
        zestimate: 225000,
        price: 239900,
        bedrooms: 3,
        bathrooms: 2.5,
        livingArea: 1850,
        yearBuilt: 1998,
        homeType: 'SINGLE_FAMILY',
        homeStatus: 'FOR_SALE',
      },
    },
  },
});

const listingPage = `<html><body><script id="__NEXT_DATA__" type="application/json">${propertyJson}</script></body></html>`;

function setup(handler: FakeHandler) {
  const transport = new FakeTransport(handler, 'browser');
  const session = new SessionContext({ minDelayMs: 0, maxDelayMs: 0, sleep: async () => {} });
  const config = buildValuationConfig(loadConfig({}), {
    baseUrl: BASE,
    pacing: { minMs: 0, maxMs: 0 },
    retryBaseDelayMs: 0,
  });
  const resolver = new EnrichmentResolver(transport, session, config, {
    sleep: async () => {},
    now: () => RESOLVED_AT,
  });
  return { transport, resolver };
}

describe('searchUrl', () => {
  it('encodes the formatted address with plus signs for spaces', () => {
    expect(searchUrl(`${BASE}/`, ROACH_HOUSE)).toBe(SEARCH_URL);
  });

  it('builds the details URL from a property id', () => {
    expect(detailsUrl(BASE, '44556677')).toBe(`${BASE}/homedetails/44556677_zpid/`);
  });
});

describe('EnrichmentResolver', () => {
  it('reads the estimate embedded in the search page', async () => {
    const { transport, resolver } = setup(spec => htmlReply(listingPage, spec.url));

    const result = await resolver.resolve(ROACH_HOUSE);

    expect(result).toEqual({
      estimateValue: 225000,
      listPrice: 239900,
      bedrooms: 3,
      bathrooms: 2.5,
      sqft: 1850,
      yearBuilt: 1998,
      propertyType: 'SINGLE_FAMILY',
      status: 'FOR_SALE',
      listingUrl: SEARCH_URL,
      resolvedAt: '2025-11-01T12:00:00.000Z',
    });
    expect(transport.requests.map(request => request.url)).toEqual([SEARCH_URL]);
  });

  it('follows the first property link when the search page has no data', async () => {
    const searchPage = '<a href="/homedetails/875-Rolling-Green-Dr-Rock-Hill-SC-29730/44556677_zpid/">875 Rolling Green Dr</a>';
    const { transport, resolver } = setup(spec =>
      htmlReply(spec.url.includes('/homedetails/') ? listingPage : searchPage, spec.url)
    );

    const result = await resolver.resolve(ROACH_HOUSE);

    expect(isNoMatch(result)).toBe(false);
    expect(result).toMatchObject({ estimateValue: 225000, listingUrl: `${BASE}/homedetails/44556677_zpid/` });
    expect(transport.requests[1].url).toBe(`${BASE}/homedetails/44556677_zpid/`);
    expect(transport.requests[1].referrer).toBe(SEARCH_URL);
  });

  it('issues one lookup per address however often it is asked', async () => {
    const { transport, resolver } = setup(spec => htmlReply(listingPage, spec.url));
    const sameHouse = { ...ROACH_HOUSE, street: '875 ROLLING GREEN DRIVE', city: 'rock hill' };

    const results = await Promise.all([
      resolver.resolve(ROACH_HOUSE),
      resolver.resolve(sameHouse),
      resolver.resolve(ROACH_HOUSE),
    ]);
    await resolver.resolve(ROACH_HOUSE);

    expect(transport.requests).toHaveLength(1);
    expect(resolver.lookupCount).toBe(1);
    expect(results[1]).toBe(results[0]);
  });

  it('degrades to NoMatch after every attempt times out', async () => {
    const { transport, resolver } = setup(spec => new TransportError('Request timed out', spec.url));

    const result = await resolver.resolve(ROACH_HOUSE);

    expect(result).toEqual(noMatch('transport'));
    expect(transport.requests).toHaveLength(3);
  });

  it('retries a server error and uses the listing that follows', async () => {
    const { transport, resolver } = setup((spec, call) =>
      call === 0 ? { status: 500, body: 'Internal error', url: spec.url, cookies: {} } : htmlReply(listingPage, spec.url)
    );

    const result = await resolver.resolve(ROACH_HOUSE);

    expect(result).toMatchObject({ estimateValue: 225000, status: 'FOR_SALE' });
    expect(transport.requests.map(request => request.url)).toEqual([SEARCH_URL, SEARCH_URL]);
  });

  it('degrades to NoMatch when every attempt answers with a server error', async () => {
    const { transport, resolver } = setup(spec => ({ status: 502, body: 'Bad gateway', url: spec.url, cookies: {} }));

    expect(await resolver.resolve(ROACH_HOUSE)).toEqual(noMatch('transport'));
    expect(transport.requests).toHaveLength(3);
  });

  it('does not retry a blocked lookup', async () => {
    const { transport, resolver } = setup(spec => new BlockedError(403, spec.url));

    expect(await resolver.resolve(ROACH_HOUSE)).toEqual(noMatch('blocked'));
    expect(transport.requests).toHaveLength(1);
  });

  it('treats a challenge page as blocked', async () => {
    const { resolver } = setup(spec =>
      htmlReply('<html><body><div id="px-captcha"></div></body></html>', spec.url)
    );

    expect(await resolver.resolve(ROACH_HOUSE)).toEqual(noMatch('blocked'));
  });

  it('returns NoMatch for a page without listing data', async () => {
    const { resolver } = setup(spec => ({ status: 404, body: 'Not found', url: spec.url, cookies: {} }));

    expect(await resolver.resolve(ROACH_HOUSE)).toEqual(noMatch('not-found'));
  });

  it('skips addresses without a street or outside the configured zip codes', async () => {
    const { transport, resolver } = setup(spec => htmlReply(listingPage, spec.url));

    expect(await resolver.resolve({ ...ROACH_HOUSE, street: ' ' })).toEqual(noMatch('no-street'));
    expect(await resolver.resolve({ ...ROACH_HOUSE, zip: '90210' })).toEqual(noMatch('out-of-scope'));
    expect(transport.requests).toHaveLength(0);
  });
});
