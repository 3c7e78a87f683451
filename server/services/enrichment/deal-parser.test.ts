import { describe, it, expect } from 'vitest';
import { findDealLinks, parseDealPage, parsePrice } from './deal-parser';

const BASE = 'https://deals.test';

describe('findDealLinks', () => {
  it('takes the link in each result card, resolved against the site', () => {
    const html = [
      '<nav><a href="/deals/today">Today</a></nav>',
      '<div class="listing-card"><img src="a.jpg"><a href="/listing/101">101 Oak Ln</a><a href="/agent/7">Agent</a></div>',
      '<article data-listing="202"><a href="https://deals.test/listing/202">202 Elm St</a></article>',
    ].join('');

    expect(findDealLinks(html, BASE)).toEqual([`${BASE}/listing/101`, `${BASE}/listing/202`]);
  });

  it('falls back to links that look like listings when there are no cards', () => {
    const html = '<a href="/about">About</a><a href="/property/9?ref=search">9 Pine Ct</a>';

    expect(findDealLinks(html, BASE)).toEqual([`${BASE}/property/9?ref=search`]);
  });

  it('keeps at most five links', () => {
    const cards = [1, 2, 3, 4, 5, 6, 7].map(n => `<div class="deal-card"><a href="/listing/${n}">#${n}</a></div>`).join('');

    expect(findDealLinks(cards, BASE)).toHaveLength(5);
  });

  it('finds nothing on a page without results', () => {
    expect(findDealLinks('<p>No results for your search</p>', BASE)).toEqual([]);
  });
});

describe('parsePrice', () => {
  it('strips currency formatting', () => {
    expect(parsePrice('$189,900')).toBe(189900);
    expect(parsePrice('Now $1,250.50')).toBe(1250.5);
    expect(parsePrice(210000)).toBe(210000);
    expect(parsePrice('Call for price')).toBeNull();
    expect(parsePrice(undefined)).toBeNull();
  });
});

describe('parseDealPage', () => {
  it('reads structured data first and the markup for the rest', () => {
    const schema = JSON.stringify({
      '@type': 'RealEstateListing',
      name: '875 Rolling Green Drive',
      offers: { price: '189000', highPrice: 210000 },
    });
    const html = [
      `<script type="application/ld+json">${schema}</script>`,
      '<h1>Ignored heading</h1>',
      '<span class="price">$195,000</span>',
      '<div class="promotion"> Seller pays   closing costs </div>',
      '<span class="agent-name">Dana Example</span>',
      '<a href="tel:8035550142">(803) 555-0142</a>',
      '<a href="mailto:agent@deals.test?subject=875">Email the agent</a>',
    ].join('');

    expect(parseDealPage(html)).toEqual({
      price: 189000,
      originalPrice: 210000,
      discountPercent: 10,
      title: '875 Rolling Green Drive',
      offerText: 'Seller pays closing costs',
      contactName: 'Dana Example',
      contactPhone: '(803) 555-0142',
      contactEmail: 'agent@deals.test',
    });
  });

  it('takes prices from the markup and works out the discount', () => {
    const html = '<h1 class="listing-title">Cherry Road duplex</h1><div class="deal-price">$150,000</div><del>$200,000</del>';

    expect(parseDealPage(html)).toMatchObject({
      title: 'Cherry Road duplex',
      price: 150000,
      originalPrice: 200000,
      discountPercent: 25,
    });
  });

  it('skips malformed structured data', () => {
    const html = '<script type="application/ld+json">{broken</script><span class="price">$99,000</span>';

    expect(parseDealPage(html)?.price).toBe(99000);
  });

  it('finds a phone number anywhere on the page when no contact element has one', () => {
    const html = '<div class="offer-details">Cash offers only</div><p>Call 803.555.0199 today</p>';

    expect(parseDealPage(html)?.contactPhone).toBe('803.555.0199');
  });

  it('returns null for a page without a price, an offer or a contact', () => {
    expect(parseDealPage('<html><body><h1>Listing removed</h1></body></html>')).toBeNull();
  });
});
