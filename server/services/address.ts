import type { Address } from '@shared/schema';

const ZIP_PATTERN = /\b\d{5}(?:-\d{4})?\b/g;
const CITY_PATTERN = /,\s*([A-Za-z\s]+?)(?:,?\s*(?:SC|South Carolina|\d{5}))/i;
const STATE_PATTERN = /\b([A-Z]{2})\s+\d{5}\b/;

function clean(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Split a one-line address ("875 Rolling Green Drive, Rock Hill, SC 29730")
 * into its parts. The street is whatever precedes the city; without a city
 * it is everything up to the first comma.
 */
export function parseAddress(text: string, defaultState = ''): Address {
  const line = clean(text);
  const address: Address = { street: '', city: '', state: '', zip: '' };
  if (!line) return address;

  // Last five-digit group; house numbers can be five digits too
  const zips = line.match(ZIP_PATTERN);
  if (zips) address.zip = zips[zips.length - 1].slice(0, 5);

  const city = CITY_PATTERN.exec(line);
  if (city) {
    address.city = clean(city[1]);
    address.street = clean(line.slice(0, city.index)).replace(/,+$/, '');
  } else {
    const [beforeComma] = line.split(',');
    address.street = clean(beforeComma);
  }

  const state = line.match(STATE_PATTERN);
  if (state) {
    address.state = state[1];
  } else {
    address.state = /south carolina/i.test(line) ? 'SC' : defaultState;
  }

  return address;
}

export function normalizeAddress(address: Address): Address {
  return {
    street: clean(address.street),
    city: clean(address.city),
    state: clean(address.state),
    zip: clean(address.zip),
  };
}

function keyPart(value: string): string {
  return value.toLowerCase().replace(/[.,#']/g, '').replace(/\s+/g, ' ').trim();
}

/** Comparison and cache key; display casing is kept on the Address itself. */
export function addressKey(address: Address): string {
  return [address.street, address.city, address.state, address.zip].map(keyPart).join('|');
}

export function formatAddress(address: Address): string {
  const locality = [address.state, address.zip].filter(Boolean).join(' ');
  return [address.street, address.city, locality].filter(Boolean).join(', ');
}
