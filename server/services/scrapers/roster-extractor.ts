import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Attorney, Party, RawCaseRecord } from '@shared/schema';
import { ExtractionError } from '../errors';
import { parseAddress } from '../address';
import { findPagerPostback } from './form-tokens';

export interface RosterSelectors {
  resultsTable: string;
  resultRows: string;
  rosterHeader: string;
  minCells: number;
}

export const DEFAULT_ROSTER_SELECTORS: RosterSelectors = {
  resultsTable: 'table.searchResultsGrid',
  resultRows: 'tr.standardRow, tr.altRow',
  rosterHeader: '.rosterHeader, #rosterHeader, h2, h3',
  minCells: 9,
};

export interface ExtractOptions {
  selectors?: RosterSelectors;
  /** Case-type filter the page was requested with */
  caseType?: string;
  /** Results page number as requested; detected from the pager otherwise */
  pageIndex?: number;
  defaultState?: string;
}

export interface RosterExtraction {
  records: RawCaseRecord[];
  malformedRows: number;
  hasNextPage: boolean;
  currentPage: number;
  hearingDate: string | null;
  courtRoom: string | null;
}

// Roster columns: # | Case / Caption | Plaintiff Atty | Defendant Atty | Filed | Sub Type | Status | Tax Map | Notes
const COLUMN = {
  caption: 1,
  plaintiffAttorney: 2,
  defendantAttorney: 3,
  filed: 4,
  subType: 5,
  notes: 8,
} as const;

const ATTORNEY_PATTERN = /([A-Za-z.,'\s-]*?)\s*\((\d{3})\)\s*(\d{3})-?(\d{4})/;
const DATE_PATTERN = /\b(\d{1,2}\/\d{1,2}\/\d{4})\b/;
const LABELED_DATE_PATTERN = /(?:Roster|Hearing|Court|Sale)\s*Date:?\s*(\d{1,2}\/\d{1,2}\/\d{4})/i;
const COURT_ROOM_PATTERN = /Court\s*Room:?\s*([A-Za-z0-9-]+)/i;
const LABELED_ADDRESS_PATTERN = /Property Address:\s*(.+?)(?:\s+Judgment\b|$)/i;
const UNLABELED_ADDRESS_PATTERN =
  /(\d+\s+[A-Za-z0-9\s]+(?:Street|St|Avenue|Ave|Road|Rd|Drive|Dr|Lane|Ln|Court|Ct|Way|Circle|Cir|Boulevard|Blvd)[^,]*,\s*[A-Za-z\s]+,?\s*SC(?:\s+\d{5}(?:-\d{4})?)?)/i;

function clean(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

// Text with a space wherever markup separated it (<br>, adjacent links)
function spacedText(html: string | null): string {
  if (!html) return '';
  return clean(cheerio.load(html.replace(/<[^>]*>/g, ' ')).root().text());
}

export function parseAttorney(text: string): Attorney | undefined {
  const value = clean(text);
  if (!value || /^pro\s*se$/i.test(value)) return undefined;

  const match = ATTORNEY_PATTERN.exec(value);
  if (!match) return { name: value };

  const name = clean(match[1]).replace(/,+$/, '');
  const phone = `(${match[2]}) ${match[3]}-${match[4]}`;
  return name ? { name, phone } : { phone };
}

/** "2025CP... PLAINTIFF VS DEFENDANT, defendant, et al" -> the two party names. */
export function parseCaption(caption: string): { plaintiff: string; defendant: string } | null {
  const match = /^(.*?)\s+(?:VS\.?|versus)\s+(.*)$/i.exec(clean(caption));
  if (!match) return null;

  const plaintiff = clean(match[1]).replace(/,+$/, '');
  const defendant = clean(match[2].replace(/\s*,?\s*\b(?:defendants?|et\s+al)\b.*$/i, '')).replace(/,+$/, '');
  return { plaintiff, defendant };
}

/** Two or more words split into first/last; a single name only fills fullName. */
export function splitName(fullName: string): Pick<Party, 'firstName' | 'lastName'> {
  const parts = clean(fullName).split(' ').filter(Boolean);
  if (parts.length < 2) return { firstName: '', lastName: '' };
  return { firstName: parts[0], lastName: parts.slice(1).join(' ') };
}

function extractAddressText(notes: string): string {
  const labeled = LABELED_ADDRESS_PATTERN.exec(notes);
  if (labeled) return labeled[1];
  const unlabeled = UNLABELED_ADDRESS_PATTERN.exec(notes);
  return unlabeled ? unlabeled[1] : '';
}

function detectCurrentPage($: CheerioAPI): number {
  let current = 1;
  $('a[href*="Page$"]').first().closest('tr').find('span').each((_, element) => {
    const text = clean($(element).text());
    if (/^\d+$/.test(text)) {
      current = Number(text);
      return false;
    }
    return undefined;
  });
  return current;
}

function readHeader($: CheerioAPI, selector: string): { hearingDate: string | null; courtRoom: string | null } {
  const text = clean($(selector).map((_, element) => $(element).text()).get().join(' '));
  const labeled = LABELED_DATE_PATTERN.exec(text);
  const anyDate = DATE_PATTERN.exec(text);
  const room = COURT_ROOM_PATTERN.exec(text);
  return {
    hearingDate: labeled ? labeled[1] : anyDate ? anyDate[1] : null,
    courtRoom: room ? room[1] : null,
  };
}

/**
 * Parse one roster results page. Rows that are too short or carry no case
 * number are skipped and counted; a page without the results table is an
 * ExtractionError, never an empty result.
 */
export function extractRoster(html: string, sourceUrl: string, options: ExtractOptions = {}): RosterExtraction {
  const selectors = options.selectors ?? DEFAULT_ROSTER_SELECTORS;
  const $ = cheerio.load(html);

  const table = $(selectors.resultsTable).first();
  if (table.length === 0) {
    throw new ExtractionError(`Results table "${selectors.resultsTable}" not found`, sourceUrl);
  }

  const { hearingDate, courtRoom } = readHeader($, selectors.rosterHeader);
  const records: RawCaseRecord[] = [];
  let malformedRows = 0;

  table.find(selectors.resultRows).each((_, row) => {
    const cells = $(row).children('td');
    if (cells.length < selectors.minCells) {
      malformedRows++;
      return;
    }

    const captionCell = cells.eq(COLUMN.caption);
    const caseNumber = clean(captionCell.find('a').first().text());
    if (!caseNumber) {
      malformedRows++;
      return;
    }

    const caption = parseCaption(spacedText(captionCell.html()).replace(caseNumber, ''));
    const defendantName = caption?.defendant ?? '';
    const notes = spacedText(cells.eq(COLUMN.notes).html());
    const filed = clean(cells.eq(COLUMN.filed).text());
    const subType = clean(cells.eq(COLUMN.subType).text());

    records.push({
      caseNumber,
      caseType: options.caseType ?? (subType || 'Foreclosure'),
      filingDate: filed || null,
      hearingDate,
      courtRoom,
      plaintiff: {
        fullName: caption?.plaintiff ?? '',
        firstName: '',
        lastName: '',
        attorney: parseAttorney(spacedText(cells.eq(COLUMN.plaintiffAttorney).html())),
      },
      defendant: {
        fullName: defendantName,
        ...splitName(defendantName),
        attorney: parseAttorney(spacedText(cells.eq(COLUMN.defendantAttorney).html())),
      },
      propertyAddress: parseAddress(extractAddressText(notes), options.defaultState ?? ''),
      sourceUrl,
    });
  });

  const currentPage = options.pageIndex ?? detectCurrentPage($);
  const hasNextPage = findPagerPostback($, currentPage + 1) !== null;

  return { records, malformedRows, hasNextPage, currentPage, hearingDate, courtRoom };
}
