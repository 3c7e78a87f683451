import { describe, it, expect, beforeEach } from 'vitest';
import type { DealOffer, EnrichmentEstimate, RawCaseRecord } from '@shared/schema';
import { MemStorage } from '../mem-storage';
import { Canonicalizer, mergeCase, normalizeCourtDate, toInsertCase, type IncomingCase } from './canonicalizer';
import { noMatch } from './enrichment/address-resolver';

const SCRAPED_AT = new Date('2025-11-01T10:00:00.000Z');

function roster(overrides: Partial<RawCaseRecord> = {}): RawCaseRecord {
  return {
    caseNumber: '2025CP4601197',
    caseType: 'Foreclosure',
    filingDate: '10/02/2025',
    hearingDate: '11/03/2025',
    courtRoom: '2A',
    plaintiff: {
      fullName: 'Lakeview Loan Servicing LLC',
      firstName: '',
      lastName: '',
      attorney: { name: 'Jane A. Smith', phone: '(803) 555-0101' },
    },
    defendant: { fullName: 'Kenneth Roach', firstName: 'Kenneth', lastName: 'Roach' },
    propertyAddress: { street: '875 Rolling Green Drive', city: 'Rock Hill', state: 'SC', zip: '29730' },
    sourceUrl: 'https://portal.test/york/courtrosters/Roster.aspx',
    ...overrides,
  };
}

function estimate(overrides: Partial<EnrichmentEstimate> = {}): EnrichmentEstimate {
  return {
    estimateValue: 225000,
    listPrice: null,
    bedrooms: 3,
    bathrooms: 2,
    sqft: 1850,
    yearBuilt: 1998,
    resolvedAt: '2025-11-01T10:00:00.000Z',
    ...overrides,
  };
}

function deal(overrides: Partial<DealOffer> = {}): DealOffer {
  return {
    price: 189000,
    originalPrice: 210000,
    discountPercent: 10,
    title: 'Rolling Green ranch',
    offerText: 'Seller pays closing costs',
    contactName: null,
    contactPhone: '(803) 555-0142',
    contactEmail: null,
    listingUrl: 'https://deals.test/listing/875-rolling-green',
    resolvedAt: '2025-11-01T10:00:00.000Z',
    ...overrides,
  };
}

function incoming(
  record: RawCaseRecord,
  enrichment: IncomingCase['enrichment'] = null,
  offer: IncomingCase['deal'] = null
): IncomingCase {
  return { record, enrichment, deal: offer, scrapedAt: SCRAPED_AT };
}

describe('normalizeCourtDate', () => {
  it('zero-pads month and day', () => {
    expect(normalizeCourtDate('10/2/2025')).toBe('10/02/2025');
    expect(normalizeCourtDate(' 1/5/2026 ')).toBe('01/05/2026');
    expect(normalizeCourtDate('11/03/2025')).toBe('11/03/2025');
  });

  it('passes through what is not a date and drops blanks', () => {
    expect(normalizeCourtDate('TBD')).toBe('TBD');
    expect(normalizeCourtDate('  ')).toBeNull();
    expect(normalizeCourtDate(null)).toBeNull();
  });
});

describe('toInsertCase', () => {
  it('flattens parties and address and drops a NoMatch', () => {
    const row = toInsertCase(incoming(roster(), noMatch('not-found')), 'run-1');

    expect(row).toMatchObject({
      caseNumber: '2025CP4601197',
      plaintiffName: 'Lakeview Loan Servicing LLC',
      plaintiffAttorneyName: 'Jane A. Smith',
      plaintiffAttorneyPhone: '(803) 555-0101',
      defendantFirstName: 'Kenneth',
      defendantLastName: 'Roach',
      defendantAttorneyName: null,
      propertyStreet: '875 Rolling Green Drive',
      propertyZip: '29730',
      enrichment: null,
      firstSeenRunId: 'run-1',
      lastSeenRunId: 'run-1',
    });
  });
});

describe('mergeCase', () => {
  it('inserts an unknown case', () => {
    expect(mergeCase(undefined, incoming(roster()), 'run-1').kind).toBe('insert');
  });
});

describe('Canonicalizer', () => {
  let storage: MemStorage;
  let canonicalizer: Canonicalizer;

  beforeEach(() => {
    storage = new MemStorage();
    canonicalizer = new Canonicalizer(storage);
  });

  it('stores a new case with its valuation', async () => {
    const summary = await canonicalizer.commitPage('run-1', [incoming(roster(), estimate())]);

    expect(summary).toEqual({ inserted: 1, updated: 0, unchanged: 0, conflicts: 0 });
    const stored = await storage.getCase('2025CP4601197');
    expect(stored?.defendantName).toBe('Kenneth Roach');
    expect(stored?.enrichment?.estimateValue).toBe(225000);
  });

  it('leaves an unchanged case unchanged on a re-run but stamps it as seen', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster(), estimate())]);

    const summary = await canonicalizer.commitPage('run-2', [
      incoming(roster(), estimate({ resolvedAt: '2025-11-15T10:00:00.000Z' })),
    ]);

    expect(summary).toEqual({ inserted: 0, updated: 0, unchanged: 1, conflicts: 0 });
    const stored = await storage.getCase('2025CP4601197');
    expect(stored?.firstSeenRunId).toBe('run-1');
    expect(stored?.lastSeenRunId).toBe('run-2');
    expect(await storage.getCasesCount()).toBe(1);
  });

  it('takes a new hearing date from the latest run', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster())]);

    const summary = await canonicalizer.commitPage('run-2', [incoming(roster({ hearingDate: '12/01/2025' }))]);

    expect(summary.updated).toBe(1);
    expect((await storage.getCase('2025CP4601197'))?.hearingDate).toBe('12/01/2025');
  });

  it('keeps the stored filing date and records one conflict per run', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster())]);
    const moved = roster({ filingDate: '10/05/2025' });

    const first = await canonicalizer.commitPage('run-2', [incoming(moved)]);
    const second = await canonicalizer.commitPage('run-2', [incoming(moved)]);

    expect(first.conflicts).toBe(1);
    expect(second.conflicts).toBe(0);
    expect((await storage.getCase('2025CP4601197'))?.filingDate).toBe('10/02/2025');
    const conflicts = await storage.getConflictsForRun('run-2');
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]).toMatchObject({ storedFilingDate: '10/02/2025', observedFilingDate: '10/05/2025' });
  });

  it('treats an unpadded filing date as the same date', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster())]);

    const summary = await canonicalizer.commitPage('run-2', [incoming(roster({ filingDate: '10/2/2025' }))]);

    expect(summary).toEqual({ inserted: 0, updated: 0, unchanged: 1, conflicts: 0 });
    expect(await storage.getConflictsForRun('run-2')).toEqual([]);
    expect((await storage.getCase('2025CP4601197'))?.filingDate).toBe('10/02/2025');
  });

  it('fills in a filing date the first run did not see', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster({ filingDate: null }))]);

    const summary = await canonicalizer.commitPage('run-2', [incoming(roster())]);

    expect(summary).toEqual({ inserted: 0, updated: 0, unchanged: 1, conflicts: 0 });
    expect((await storage.getCase('2025CP4601197'))?.filingDate).toBe('10/02/2025');
  });

  it('keeps the stored valuation when a later lookup finds nothing', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster(), estimate())]);

    await canonicalizer.commitPage('run-2', [incoming(roster(), noMatch('transport'))]);

    expect((await storage.getCase('2025CP4601197'))?.enrichment?.estimateValue).toBe(225000);
  });

  it('counts a changed valuation as an update', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster(), estimate())]);

    const summary = await canonicalizer.commitPage('run-2', [incoming(roster(), estimate({ estimateValue: 231000 }))]);

    expect(summary.updated).toBe(1);
  });

  it('stores the deal, keeps it through a miss and takes a changed one', async () => {
    await canonicalizer.commitPage('run-1', [incoming(roster(), null, deal())]);
    expect((await storage.getCase('2025CP4601197'))?.deal?.price).toBe(189000);

    const missed = await canonicalizer.commitPage('run-2', [incoming(roster(), null, noMatch('not-found'))]);
    expect(missed.unchanged).toBe(1);
    expect((await storage.getCase('2025CP4601197'))?.deal?.price).toBe(189000);

    const changed = await canonicalizer.commitPage('run-3', [incoming(roster(), null, deal({ price: 179000 }))]);
    expect(changed.updated).toBe(1);
    expect((await storage.getCase('2025CP4601197'))?.deal?.price).toBe(179000);
  });

  it('stores a case listed twice on one page once', async () => {
    const summary = await canonicalizer.commitPage('run-1', [incoming(roster()), incoming(roster())]);

    expect(summary.inserted).toBe(1);
    expect(await storage.getCasesCount()).toBe(1);
  });

  it('serializes concurrent commits of the same case', async () => {
    const [a, b] = await Promise.all([
      canonicalizer.commitPage('run-1', [incoming(roster())]),
      canonicalizer.commitPage('run-1', [incoming(roster())]),
    ]);

    expect(a.inserted + b.inserted).toBe(1);
    expect(a.unchanged + b.unchanged).toBe(1);
  });
});
