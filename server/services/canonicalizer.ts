import pLimit from 'p-limit';
import type {
  DealOffer,
  EnrichmentEstimate,
  ForeclosureCase,
  InsertFilingDateConflict,
  InsertForeclosureCase,
  RawCaseRecord,
} from '@shared/schema';
import type { CaseUpdate, IStorage, MergeBatch } from '../storage';
import { Logger } from './logger';
import { normalizeAddress } from './address';
import { isNoMatch } from './enrichment/address-resolver';
import type { EnrichmentResult } from './enrichment/valuation-resolver';
import type { DealResult } from './enrichment/deal-resolver';

/** A roster row as it arrives from one run, with whatever enrichment it got. */
export interface IncomingCase {
  record: RawCaseRecord;
  /** Null when enrichment was not attempted */
  enrichment: EnrichmentResult | null;
  /** Null or absent when no deal lookup was made */
  deal?: DealResult | null;
  scrapedAt: Date;
}

export type MergeKind = 'insert' | 'update' | 'unchanged';

export interface MergeResult {
  kind: MergeKind;
  /** The canonical record after the merge */
  record: InsertForeclosureCase;
  /** Fields to write on an existing record; the whole record on insert */
  changes: Partial<InsertForeclosureCase>;
  conflict?: InsertFilingDateConflict;
}

export interface CommitSummary {
  inserted: number;
  updated: number;
  unchanged: number;
  conflicts: number;
}

const COURT_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/** Zero-pad a court date to MM/DD/YYYY; anything else passes through trimmed. */
export function normalizeCourtDate(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const match = COURT_DATE.exec(trimmed);
  if (!match) return trimmed;
  return `${match[1].padStart(2, '0')}/${match[2].padStart(2, '0')}/${match[3]}`;
}

export function toInsertCase(incoming: IncomingCase, runId: string): InsertForeclosureCase {
  const { record } = incoming;
  const address = normalizeAddress(record.propertyAddress);
  const enrichment = incoming.enrichment && !isNoMatch(incoming.enrichment) ? incoming.enrichment : null;
  const deal = incoming.deal && !isNoMatch(incoming.deal) ? incoming.deal : null;

  return {
    caseNumber: record.caseNumber.trim(),
    caseType: record.caseType,
    filingDate: normalizeCourtDate(record.filingDate),
    hearingDate: normalizeCourtDate(record.hearingDate),
    courtRoom: record.courtRoom,
    plaintiffName: record.plaintiff.fullName,
    plaintiffAttorneyName: record.plaintiff.attorney?.name ?? null,
    plaintiffAttorneyPhone: record.plaintiff.attorney?.phone ?? null,
    defendantName: record.defendant.fullName,
    defendantFirstName: record.defendant.firstName,
    defendantLastName: record.defendant.lastName,
    defendantAttorneyName: record.defendant.attorney?.name ?? null,
    defendantAttorneyPhone: record.defendant.attorney?.phone ?? null,
    propertyStreet: address.street,
    propertyCity: address.city,
    propertyState: address.state,
    propertyZip: address.zip,
    enrichment,
    deal,
    sourceUrl: record.sourceUrl,
    scrapedAt: incoming.scrapedAt,
    firstSeenRunId: runId,
    lastSeenRunId: runId,
  };
}

function sameValuation(a: EnrichmentEstimate | null | undefined, b: EnrichmentEstimate | null | undefined): boolean {
  if (!a || !b) return !a && !b;
  return a.estimateValue === b.estimateValue
    && a.listPrice === b.listPrice
    && a.bedrooms === b.bedrooms
    && a.bathrooms === b.bathrooms
    && a.sqft === b.sqft
    && a.yearBuilt === b.yearBuilt
    && a.propertyType === b.propertyType
    && a.status === b.status;
}

function sameDeal(a: DealOffer | null | undefined, b: DealOffer | null | undefined): boolean {
  if (!a || !b) return !a && !b;
  return a.price === b.price
    && a.originalPrice === b.originalPrice
    && a.offerText === b.offerText
    && a.contactPhone === b.contactPhone
    && a.contactEmail === b.contactEmail
    && a.listingUrl === b.listingUrl;
}

function fromStored(existing: ForeclosureCase): InsertForeclosureCase {
  const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...record } = existing;
  return record;
}

/**
 * Fold an incoming roster row into the stored record. Identity and
 * descriptive fields stay as first stored; the hearing date, the
 * valuation, the deal and the last-seen stamp follow the latest run. A
 * stored filing date is never overwritten: a different observed value
 * comes back as a conflict instead. Dates compare in MM/DD/YYYY form.
 */
export function mergeCase(existing: ForeclosureCase | undefined, incoming: IncomingCase, runId: string): MergeResult {
  const candidate = toInsertCase(incoming, runId);
  if (!existing) {
    return { kind: 'insert', record: candidate, changes: candidate };
  }

  const changes: Partial<InsertForeclosureCase> = {
    scrapedAt: candidate.scrapedAt,
    lastSeenRunId: runId,
  };
  let changed = false;

  if (candidate.hearingDate && candidate.hearingDate !== normalizeCourtDate(existing.hearingDate)) {
    changes.hearingDate = candidate.hearingDate;
    changed = true;
  }

  if (candidate.enrichment && !sameValuation(candidate.enrichment, existing.enrichment)) {
    changes.enrichment = candidate.enrichment;
    changed = true;
  }

  if (candidate.deal && !sameDeal(candidate.deal, existing.deal)) {
    changes.deal = candidate.deal;
    changed = true;
  }

  let conflict: InsertFilingDateConflict | undefined;
  if (candidate.filingDate) {
    if (existing.filingDate === null) {
      changes.filingDate = candidate.filingDate;
    } else if (normalizeCourtDate(existing.filingDate) !== candidate.filingDate) {
      conflict = {
        caseNumber: existing.caseNumber,
        runId,
        storedFilingDate: existing.filingDate,
        observedFilingDate: candidate.filingDate,
      };
    }
  }

  return {
    kind: changed ? 'update' : 'unchanged',
    record: { ...fromStored(existing), ...changes },
    changes,
    conflict,
  };
}

/**
 * The only writer of case records. Pages are committed one at a time
 * through a single-slot queue, each as one all-or-nothing batch.
 */
export class Canonicalizer {
  private readonly queue = pLimit(1);
  private readonly reportedConflicts = new Set<string>();

  constructor(private readonly storage: IStorage) {}

  commitPage(runId: string, cases: IncomingCase[]): Promise<CommitSummary> {
    return this.queue(() => this.apply(runId, cases));
  }

  private async apply(runId: string, cases: IncomingCase[]): Promise<CommitSummary> {
    // A case listed twice on one page keeps its last occurrence
    const byNumber = new Map<string, IncomingCase>();
    for (const incoming of cases) {
      byNumber.set(incoming.record.caseNumber.trim(), incoming);
    }

    const stored = await this.storage.getCasesByNumbers(Array.from(byNumber.keys()));
    const existing = new Map(stored.map(row => [row.caseNumber, row]));

    const batch: MergeBatch = { inserts: [], updates: [], conflicts: [] };
    const summary: CommitSummary = { inserted: 0, updated: 0, unchanged: 0, conflicts: 0 };
    const newConflictKeys: string[] = [];

    for (const [caseNumber, incoming] of byNumber) {
      const result = mergeCase(existing.get(caseNumber), incoming, runId);

      if (result.kind === 'insert') {
        batch.inserts.push(result.record);
        summary.inserted++;
      } else {
        const update: CaseUpdate = { caseNumber, changes: result.changes };
        batch.updates.push(update);
        if (result.kind === 'update') summary.updated++;
        else summary.unchanged++;
      }

      if (result.conflict) {
        const key = `${runId}:${caseNumber}`;
        if (!this.reportedConflicts.has(key) && !newConflictKeys.includes(key)) {
          batch.conflicts.push(result.conflict);
          newConflictKeys.push(key);
        }
      }
    }

    await this.storage.applyMergeBatch(batch);

    for (const key of newConflictKeys) {
      this.reportedConflicts.add(key);
    }
    summary.conflicts = batch.conflicts.length;

    for (const conflict of batch.conflicts) {
      await Logger.warning(
        `Filing date conflict on ${conflict.caseNumber}: stored ${conflict.storedFilingDate}, observed ${conflict.observedFilingDate}`,
        'canonicalizer',
        { caseNumber: conflict.caseNumber, runId }
      );
    }

    return summary;
  }
}
