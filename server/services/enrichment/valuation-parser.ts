/** What a listing page says about one property, before it becomes an estimate. */
export interface ListingData {
  estimateValue: number | null;
  listPrice: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
  sqft: number | null;
  yearBuilt: number | null;
  propertyType?: string;
  /** Listing status as the site words it, e.g. FOR_SALE or RECENTLY_SOLD */
  status?: string;
  propertyId?: string;
}

type JsonObject = { [key: string]: unknown };

const EMBEDDED_JSON_PATTERN =
  /<script[^>]*(?:id=["']__NEXT_DATA__["']|type=["']application\/json["'])[^>]*>([\s\S]*?)<\/script>/gi;

const PROPERTY_ID_PATTERNS = [
  /"zpid"\s*:\s*"?(\d+)"?/,
  /\/homedetails\/[^"']*?(\d+)_zpid/,
  /data-zpid="(\d+)"/,
];

// A dollar figure outside this band is a rent, a fee or a typo
const PLAUSIBLE_PRICE = { min: 10_000, max: 100_000_000 };

function emptyListing(): ListingData {
  return {
    estimateValue: null,
    listPrice: null,
    bedrooms: null,
    bathrooms: null,
    sqft: null,
    yearBuilt: null,
  };
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^\d+(\.\d+)?$/.test(value.trim())) return Number(value);
  return null;
}

type NumericField = 'estimateValue' | 'listPrice' | 'bedrooms' | 'bathrooms' | 'sqft' | 'yearBuilt';

function fill(listing: ListingData, field: NumericField, value: number | null): void {
  if (listing[field] === null && value !== null) {
    listing[field] = value;
  }
}

function hasValue(listing: ListingData): boolean {
  return listing.estimateValue !== null || listing.listPrice !== null || listing.sqft !== null;
}

/**
 * Depth-first walk of embedded page data. The first value found for a
 * field wins; property payloads nest the subject home before comparables.
 */
function walk(node: unknown, listing: ListingData): void {
  if (Array.isArray(node)) {
    for (const item of node) walk(item, listing);
    return;
  }
  if (!isJsonObject(node)) return;

  fill(listing, 'estimateValue', asNumber(node.zestimate));
  fill(listing, 'listPrice', asNumber(node.listPrice) ?? asNumber(node.price));
  fill(listing, 'bedrooms', asNumber(node.bedrooms));
  fill(listing, 'bathrooms', asNumber(node.bathrooms));
  fill(listing, 'sqft', asNumber(node.livingArea));
  fill(listing, 'yearBuilt', asNumber(node.yearBuilt));
  if (listing.propertyType === undefined && typeof node.homeType === 'string') {
    listing.propertyType = node.homeType;
  }
  if (listing.status === undefined && typeof node.homeStatus === 'string' && node.homeStatus) {
    listing.status = node.homeStatus;
  }
  if (listing.propertyId === undefined && (typeof node.zpid === 'string' || typeof node.zpid === 'number')) {
    listing.propertyId = String(node.zpid);
  }

  for (const value of Object.values(node)) {
    if (typeof value === 'object' && value !== null) walk(value, listing);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Not every application/json script is data we can read
    return undefined;
  }
}

function firstNumber(html: string, pattern: RegExp): number | null {
  const match = pattern.exec(html);
  return match ? Number(match[1]) : null;
}

function fillFromText(html: string, listing: ListingData): void {
  fill(listing, 'listPrice', firstNumber(html, /"listPrice"\s*:\s*(\d+)/) ?? firstNumber(html, /"price"\s*:\s*(\d+)/));
  if (listing.listPrice === null) {
    const dollars = /\$\s*(\d{1,3}(?:,\d{3})+|\d{5,})/.exec(html);
    const amount = dollars ? Number(dollars[1].replace(/,/g, '')) : null;
    if (amount !== null && amount > PLAUSIBLE_PRICE.min && amount < PLAUSIBLE_PRICE.max) {
      listing.listPrice = amount;
    }
  }
  fill(listing, 'estimateValue', firstNumber(html, /"zestimate"\s*:\s*(\d+)/));
  fill(listing, 'bedrooms', firstNumber(html, /"bedrooms"\s*:\s*(\d+)/));
  fill(listing, 'bathrooms', firstNumber(html, /"bathrooms"\s*:\s*([\d.]+)/));
  fill(listing, 'sqft', firstNumber(html, /"livingArea"\s*:\s*(\d+)/));
  fill(listing, 'yearBuilt', firstNumber(html, /"yearBuilt"\s*:\s*(\d{4})/));
  if (listing.status === undefined) {
    const status = /"homeStatus"\s*:\s*"([A-Z_]+)"/.exec(html);
    if (status) listing.status = status[1];
  }
}

/**
 * Read property data from a listing page: embedded JSON first, then
 * loose patterns over the raw markup. Null when neither a value, a price
 * nor a living area turns up.
 */
export function parseListingPage(html: string): ListingData | null {
  const listing = emptyListing();

  for (const match of html.matchAll(EMBEDDED_JSON_PATTERN)) {
    const data = parseJson(match[1]);
    if (data !== undefined) walk(data, listing);
  }

  if (listing.estimateValue === null && listing.listPrice === null) {
    fillFromText(html, listing);
  }

  return hasValue(listing) ? listing : null;
}

/** First property id linked from a search results page. */
export function findPropertyId(html: string): string | null {
  for (const pattern of PROPERTY_ID_PATTERNS) {
    const match = pattern.exec(html);
    if (match) return match[1];
  }
  return null;
}

export function isBlockedPage(html: string, markers: readonly string[]): boolean {
  const text = html.toLowerCase();
  return markers.some(marker => text.includes(marker.toLowerCase()));
}
