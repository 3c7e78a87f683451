import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { DealOffer } from '@shared/schema';

export type ParsedDeal = Omit<DealOffer, 'listingUrl' | 'resolvedAt'>;

type JsonObject = { [key: string]: unknown };

const RESULT_CARDS = '.listing-card, .deal-card, .property-card, article[data-listing]';
const FALLBACK_LINKS = "a[href*='listing'], a[href*='deal'], a[href*='property']";
const MAX_LINKS = 5;

const SCHEMA_TYPES = new Set(['Product', 'Offer', 'RealEstateListing', 'Service']);

const TITLE_SELECTORS = ['h1.listing-title', '.deal-title', 'h1', "[data-testid='title']"];
const PRICE_SELECTORS = ['.price', '.deal-price', "[data-testid='price']", '.listing-price'];
const ORIGINAL_PRICE_SELECTOR = '.original-price, .was-price, .strikethrough, del';
const OFFER_SELECTORS = ['.offer-details', '.deal-details', '.promotion', '.special-offer'];
const PHONE_SELECTORS = ["a[href^='tel:']", '.phone', '.contact-phone', "[data-testid='phone']"];
const EMAIL_SELECTORS = ["a[href^='mailto:']", '.email', '.contact-email', "[data-testid='email']"];
const CONTACT_SELECTORS = ['.agent-name', '.contact-name', '.seller-name', "[data-testid='contact-name']"];

const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/;
const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** "$189,900" -> 189900; null when nothing numeric is left. */
export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const digits = value.replace(/[^\d.]/g, '');
  if (!digits) return null;
  const amount = Number(digits);
  return Number.isFinite(amount) ? amount : null;
}

function resolveLink(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Offer pages linked from a search results page, best match first: the
 * link in each result card, or failing any card, links that look like
 * listings.
 */
export function findDealLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const hrefs: string[] = [];

  $(RESULT_CARDS).each((_, card) => {
    const href = $(card).find('a[href]').first().attr('href');
    if (href) hrefs.push(href);
  });

  if (hrefs.length === 0) {
    $(FALLBACK_LINKS).each((_, link) => {
      const href = $(link).attr('href');
      if (href) hrefs.push(href);
    });
  }

  const links: string[] = [];
  for (const href of hrefs.slice(0, MAX_LINKS)) {
    const resolved = resolveLink(href, baseUrl);
    if (resolved) links.push(resolved);
  }
  return links;
}

function firstText($: CheerioAPI, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const text = clean($(selector).first().text());
    if (text) return text;
  }
  return null;
}

function readSchema($: CheerioAPI, deal: ParsedDeal): void {
  $('script[type="application/ld+json"]').each((_, script) => {
    let data: unknown;
    try {
      data = JSON.parse($(script).html() ?? '');
    } catch {
      // Malformed structured data; the markup is read below
      return;
    }

    for (const item of Array.isArray(data) ? data : [data]) {
      if (!isJsonObject(item)) continue;
      const type = item['@type'];
      if (typeof type !== 'string' || !SCHEMA_TYPES.has(type)) continue;

      if (deal.title === null && typeof item.name === 'string') {
        deal.title = clean(item.name);
      }
      const offers = item.offers;
      if (isJsonObject(offers)) {
        if (deal.price === null) deal.price = parsePrice(offers.price);
        if (deal.originalPrice === null) deal.originalPrice = parsePrice(offers.highPrice);
      } else if (deal.price === null) {
        deal.price = parsePrice(item.price);
      }
    }
  });
}

function readPhone($: CheerioAPI): string | null {
  for (const selector of PHONE_SELECTORS) {
    const match = PHONE_PATTERN.exec($(selector).first().text());
    if (match) return match[0];
  }
  const anywhere = PHONE_PATTERN.exec($('body').text());
  return anywhere ? anywhere[0] : null;
}

function readEmail($: CheerioAPI): string | null {
  for (const selector of EMAIL_SELECTORS) {
    const element = $(selector).first();
    const href = element.attr('href');
    if (href && href.startsWith('mailto:')) {
      return href.slice('mailto:'.length).split('?')[0];
    }
    const match = EMAIL_PATTERN.exec(element.text());
    if (match) return match[0];
  }
  return null;
}

/**
 * Read an offer page: schema.org data first, then the markup fills what
 * is still missing. Null when the page carries neither a price, an offer
 * nor a way to get in touch.
 */
export function parseDealPage(html: string): ParsedDeal | null {
  const $ = cheerio.load(html);
  const deal: ParsedDeal = {
    price: null,
    originalPrice: null,
    discountPercent: null,
    title: null,
    offerText: null,
    contactName: null,
    contactPhone: null,
    contactEmail: null,
  };

  readSchema($, deal);

  if (deal.title === null) deal.title = firstText($, TITLE_SELECTORS);
  if (deal.price === null) {
    for (const selector of PRICE_SELECTORS) {
      deal.price = parsePrice($(selector).first().text());
      if (deal.price !== null) break;
    }
  }
  if (deal.originalPrice === null) {
    deal.originalPrice = parsePrice($(ORIGINAL_PRICE_SELECTOR).first().text());
  }
  if (deal.price !== null && deal.originalPrice !== null && deal.originalPrice > deal.price) {
    deal.discountPercent = Math.round(((deal.originalPrice - deal.price) / deal.originalPrice) * 1000) / 10;
  }

  deal.offerText = firstText($, OFFER_SELECTORS);
  deal.contactPhone = readPhone($);
  deal.contactEmail = readEmail($);
  deal.contactName = firstText($, CONTACT_SELECTORS);

  const found = deal.price !== null || deal.offerText !== null || deal.contactPhone !== null || deal.contactEmail !== null;
  return found ? deal : null;
}
