import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, integer, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

/**
 * Valuation attached to a case by property address.
 * Every numeric is nullable: listing pages routinely omit some of them.
 */
export interface EnrichmentEstimate {
  estimateValue: number | null;
  listPrice: number | null;
  bedrooms: number | null;
  bathrooms: number | null;
  sqft: number | null;
  yearBuilt: number | null;
  propertyType?: string;
  /** Listing status, e.g. FOR_SALE or RECENTLY_SOLD */
  status?: string;
  listingUrl?: string;
  resolvedAt: string;
}

/** An offer found on the deals site for the property address. */
export interface DealOffer {
  price: number | null;
  originalPrice: number | null;
  /** Percent off the original price, when both prices are known */
  discountPercent: number | null;
  title: string | null;
  offerText: string | null;
  contactName: string | null;
  contactPhone: string | null;
  contactEmail: string | null;
  listingUrl: string;
  resolvedAt: string;
}

export const foreclosureCases = pgTable("foreclosure_cases", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  caseNumber: text("case_number").notNull().unique(),
  caseType: text("case_type").notNull().default("Foreclosure"),
  filingDate: text("filing_date"), // as printed by the court, e.g. 10/02/2025
  hearingDate: text("hearing_date"),
  courtRoom: text("court_room"),

  plaintiffName: text("plaintiff_name").notNull().default(""),
  plaintiffAttorneyName: text("plaintiff_attorney_name"),
  plaintiffAttorneyPhone: text("plaintiff_attorney_phone"),

  defendantName: text("defendant_name").notNull().default(""),
  defendantFirstName: text("defendant_first_name").notNull().default(""),
  defendantLastName: text("defendant_last_name").notNull().default(""),
  defendantAttorneyName: text("defendant_attorney_name"),
  defendantAttorneyPhone: text("defendant_attorney_phone"),

  propertyStreet: text("property_street").notNull().default(""),
  propertyCity: text("property_city").notNull().default(""),
  propertyState: text("property_state").notNull().default(""),
  propertyZip: text("property_zip").notNull().default(""),

  enrichment: jsonb("enrichment").$type<EnrichmentEstimate>(),
  deal: jsonb("deal").$type<DealOffer>(),

  sourceUrl: text("source_url").notNull().default(""),
  scrapedAt: timestamp("scraped_at").notNull(),
  firstSeenRunId: varchar("first_seen_run_id").notNull(),
  lastSeenRunId: varchar("last_seen_run_id").notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => [
  index("IDX_foreclosure_cases_zip").on(table.propertyZip),
]);

export const pipelineRuns = pgTable("pipeline_runs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  trigger: text("trigger").notNull(), // scheduled, manual, once
  status: text("status").notNull(), // running, succeeded, failed
  startedAt: timestamp("started_at").notNull(),
  finishedAt: timestamp("finished_at"),
  recordsSeen: integer("records_seen").notNull().default(0),
  recordsNew: integer("records_new").notNull().default(0),
  recordsUpdated: integer("records_updated").notNull().default(0),
  anomalyCount: integer("anomaly_count").notNull().default(0),
  pagesFetched: integer("pages_fetched").notNull().default(0),
  errorCode: text("error_code"),
  errorMessage: text("error_message"),
});

export const filingDateConflicts = pgTable("filing_date_conflicts", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  caseNumber: text("case_number").notNull(),
  runId: varchar("run_id").notNull().references(() => pipelineRuns.id),
  storedFilingDate: text("stored_filing_date").notNull(),
  observedFilingDate: text("observed_filing_date").notNull(),
  detectedAt: timestamp("detected_at").notNull().defaultNow(),
}, (table) => [
  uniqueIndex("UQ_conflict_run_case").on(table.runId, table.caseNumber),
]);

export const systemLogs = pgTable("system_logs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  level: text("level").notNull(), // debug, info, warning, error, success
  message: text("message").notNull(),
  component: text("component").notNull(), // navigator, resolver, scheduler, etc.
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  timestamp: timestamp("timestamp").notNull().defaultNow(),
});

// Insert schemas
export const insertForeclosureCaseSchema = createInsertSchema(foreclosureCases, {
  caseNumber: z.string().trim().min(1),
}).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export const insertPipelineRunSchema = createInsertSchema(pipelineRuns).omit({
  id: true,
});

export const insertFilingDateConflictSchema = createInsertSchema(filingDateConflicts).omit({
  id: true,
  detectedAt: true,
});

// Types
export type ForeclosureCase = typeof foreclosureCases.$inferSelect;
export type InsertForeclosureCase = Omit<typeof foreclosureCases.$inferInsert, "id" | "createdAt" | "updatedAt">;

export type PipelineRun = typeof pipelineRuns.$inferSelect;
export type InsertPipelineRun = z.infer<typeof insertPipelineRunSchema>;

export type FilingDateConflict = typeof filingDateConflicts.$inferSelect;
export type InsertFilingDateConflict = z.infer<typeof insertFilingDateConflictSchema>;

export type SystemLog = typeof systemLogs.$inferSelect;
export type InsertSystemLog = Omit<typeof systemLogs.$inferInsert, "id" | "timestamp">;

export type RunTrigger = "scheduled" | "manual" | "once";
export type RunStatus = "running" | "succeeded" | "failed";
export const exportFormatSchema = z.enum(["csv", "xlsx", "json"]);
export type ExportFormat = z.infer<typeof exportFormatSchema>;

// Roster-side shapes produced by the extractor, before canonicalization

export interface Attorney {
  name?: string;
  phone?: string;
}

export interface Party {
  fullName: string;
  firstName: string;
  lastName: string;
  attorney?: Attorney;
}

export interface Address {
  street: string;
  city: string;
  state: string;
  zip: string;
}

export interface RawCaseRecord {
  caseNumber: string;
  caseType: string;
  filingDate: string | null;
  hearingDate: string | null;
  courtRoom: string | null;
  plaintiff: Party;
  defendant: Party;
  propertyAddress: Address;
  sourceUrl: string;
}
