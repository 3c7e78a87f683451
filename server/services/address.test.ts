import { describe, it, expect } from 'vitest';
import { addressKey, formatAddress, parseAddress } from './address';

describe('parseAddress', () => {
  it('splits street, city, state and zip', () => {
    expect(parseAddress('875 Rolling Green Drive, Rock Hill, SC 29730')).toEqual({
      street: '875 Rolling Green Drive',
      city: 'Rock Hill',
      state: 'SC',
      zip: '29730',
    });
  });

  it('drops the zip+4 suffix and ignores five-digit house numbers', () => {
    expect(parseAddress('12045 Harbor Way, Tega Cay, SC 29708-1234')).toEqual({
      street: '12045 Harbor Way',
      city: 'Tega Cay',
      state: 'SC',
      zip: '29708',
    });
  });

  it('reads the state from the long form', () => {
    expect(parseAddress('9 Elm Ct, Clover, South Carolina').state).toBe('SC');
  });

  it('falls back to the first comma-separated part when no city is recognisable', () => {
    expect(parseAddress('Lot 14 Hidden Acres, unrecorded', 'SC')).toEqual({
      street: 'Lot 14 Hidden Acres',
      city: '',
      state: 'SC',
      zip: '',
    });
  });

  it('returns an empty address for empty input', () => {
    expect(parseAddress('   ', 'SC')).toEqual({ street: '', city: '', state: '', zip: '' });
  });
});

describe('addressKey', () => {
  it('ignores case, punctuation and spacing', () => {
    const a = addressKey({ street: '875 Rolling Green Drive', city: 'Rock Hill', state: 'SC', zip: '29730' });
    const b = addressKey({ street: '875  rolling green drive.', city: 'ROCK HILL', state: 'sc', zip: '29730 ' });

    expect(a).toBe('875 rolling green drive|rock hill|sc|29730');
    expect(b).toBe(a);
  });
});

describe('formatAddress', () => {
  it('joins the populated parts', () => {
    expect(formatAddress({ street: '875 Rolling Green Drive', city: 'Rock Hill', state: 'SC', zip: '29730' }))
      .toBe('875 Rolling Green Drive, Rock Hill, SC 29730');
    expect(formatAddress({ street: '22 Oak Lane', city: '', state: '', zip: '29715' }))
      .toBe('22 Oak Lane, 29715');
  });
});
