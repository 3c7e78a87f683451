import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import Papa from 'papaparse';
import type { ExportFormat, ForeclosureCase } from '@shared/schema';
import type { IStorage } from '../storage';
import { Logger } from './logger';

export const EXPORT_COLUMNS = [
  'case_number',
  'case_type',
  'filing_date',
  'hearing_date',
  'court_room',
  'plaintiff',
  'plaintiff_attorney',
  'plaintiff_attorney_phone',
  'defendant',
  'defendant_first_name',
  'defendant_last_name',
  'defendant_attorney',
  'defendant_attorney_phone',
  'property_street',
  'property_city',
  'property_state',
  'property_zip',
  'estimate_value',
  'estimate_list_price',
  'estimate_bedrooms',
  'estimate_bathrooms',
  'estimate_sqft',
  'estimate_year_built',
  'estimate_property_type',
  'estimate_status',
  'estimate_listing_url',
  'deal_price',
  'deal_original_price',
  'deal_discount_percent',
  'deal_offer',
  'deal_contact_name',
  'deal_contact_phone',
  'deal_contact_email',
  'deal_url',
  'source_url',
  'scraped_at',
] as const;

export type ExportColumn = typeof EXPORT_COLUMNS[number];
export type ExportRow = Record<ExportColumn, string | number | null>;

/** File the viewer reads; refreshed by every JSON export. */
export const VIEWER_FILE = 'foreclosures_enriched.json';

export interface ExportResult {
  format: ExportFormat;
  path: string;
  count: number;
}

export function toExportRow(record: ForeclosureCase): ExportRow {
  const estimate = record.enrichment;
  const deal = record.deal;
  return {
    case_number: record.caseNumber,
    case_type: record.caseType,
    filing_date: record.filingDate,
    hearing_date: record.hearingDate,
    court_room: record.courtRoom,
    plaintiff: record.plaintiffName,
    plaintiff_attorney: record.plaintiffAttorneyName,
    plaintiff_attorney_phone: record.plaintiffAttorneyPhone,
    defendant: record.defendantName,
    defendant_first_name: record.defendantFirstName,
    defendant_last_name: record.defendantLastName,
    defendant_attorney: record.defendantAttorneyName,
    defendant_attorney_phone: record.defendantAttorneyPhone,
    property_street: record.propertyStreet,
    property_city: record.propertyCity,
    property_state: record.propertyState,
    property_zip: record.propertyZip,
    estimate_value: estimate?.estimateValue ?? null,
    estimate_list_price: estimate?.listPrice ?? null,
    estimate_bedrooms: estimate?.bedrooms ?? null,
    estimate_bathrooms: estimate?.bathrooms ?? null,
    estimate_sqft: estimate?.sqft ?? null,
    estimate_year_built: estimate?.yearBuilt ?? null,
    estimate_property_type: estimate?.propertyType ?? null,
    estimate_status: estimate?.status ?? null,
    estimate_listing_url: estimate?.listingUrl ?? null,
    deal_price: deal?.price ?? null,
    deal_original_price: deal?.originalPrice ?? null,
    deal_discount_percent: deal?.discountPercent ?? null,
    deal_offer: deal?.offerText ?? null,
    deal_contact_name: deal?.contactName ?? null,
    deal_contact_phone: deal?.contactPhone ?? null,
    deal_contact_email: deal?.contactEmail ?? null,
    deal_url: deal?.listingUrl ?? null,
    source_url: record.sourceUrl,
    scraped_at: record.scrapedAt.toISOString(),
  };
}

const pad = (value: number) => String(value).padStart(2, '0');

/** foreclosures_YYYYMMDD_HHMMSS.<ext>, local time. */
export function exportFileName(format: ExportFormat, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `foreclosures_${date}_${time}.${format}`;
}

// Papa leaves null unquoted; empty strings keep every field quoted
export function renderCsv(rows: ExportRow[]): string {
  return Papa.unparse(
    {
      fields: [...EXPORT_COLUMNS],
      data: rows.map(row => EXPORT_COLUMNS.map(column => row[column] ?? '')),
    },
    { quotes: true }
  );
}

async function writeXlsx(rows: ExportRow[], filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Foreclosures');
  sheet.columns = EXPORT_COLUMNS.map(column => ({
    header: column,
    key: column,
    width: column.startsWith('estimate_') || column.startsWith('deal_') ? 14 : 22,
  }));
  sheet.addRows(rows);
  sheet.getRow(1).font = { bold: true };
  await workbook.xlsx.writeFile(filePath);
}

/**
 * Write a snapshot of every stored case to `dir`. Reads only; the store is
 * never modified by an export.
 */
export async function exportRecords(
  source: IStorage,
  format: ExportFormat,
  dir: string,
  now: Date = new Date()
): Promise<ExportResult> {
  const rows = (await source.getAllCases()).map(toExportRow);
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, exportFileName(format, now));

  switch (format) {
    case 'csv':
      await writeFile(filePath, renderCsv(rows), 'utf8');
      break;
    case 'xlsx':
      await writeXlsx(rows, filePath);
      break;
    case 'json': {
      const json = JSON.stringify(rows, null, 2);
      await writeFile(filePath, json, 'utf8');
      await writeFile(path.join(dir, VIEWER_FILE), json, 'utf8');
      break;
    }
  }

  await Logger.success(`Exported ${rows.length} records to ${filePath}`, 'exporter', { format, count: rows.length });
  return { format, path: filePath, count: rows.length };
}
