import {
  type ForeclosureCase,
  type InsertForeclosureCase,
  type PipelineRun,
  type InsertPipelineRun,
  type FilingDateConflict,
  type InsertFilingDateConflict,
  type SystemLog,
  type InsertSystemLog
} from "@shared/schema";

export interface CaseUpdate {
  caseNumber: string;
  changes: Partial<InsertForeclosureCase>;
}

/**
 * One page worth of canonicalized writes. Implementations apply it
 * all-or-nothing so a failing page never leaves half its rows behind.
 */
export interface MergeBatch {
  inserts: InsertForeclosureCase[];
  updates: CaseUpdate[];
  conflicts: InsertFilingDateConflict[];
}

export interface IStorage {
  // Case methods
  getCase(caseNumber: string): Promise<ForeclosureCase | undefined>;
  getCasesByNumbers(caseNumbers: string[]): Promise<ForeclosureCase[]>;
  getAllCases(): Promise<ForeclosureCase[]>;
  getCasesCount(): Promise<number>;
  applyMergeBatch(batch: MergeBatch): Promise<void>;

  // Anomaly review
  getRecentConflicts(limit: number): Promise<FilingDateConflict[]>;
  getConflictsForRun(runId: string): Promise<FilingDateConflict[]>;

  // Pipeline run methods
  createPipelineRun(run: InsertPipelineRun): Promise<string>;
  updatePipelineRun(id: string, updates: Partial<PipelineRun>): Promise<void>;
  getPipelineRun(id: string): Promise<PipelineRun | undefined>;
  getRecentPipelineRuns(limit: number): Promise<PipelineRun[]>;
  getLatestPipelineRun(): Promise<PipelineRun | undefined>;

  // System log methods
  createSystemLog(log: InsertSystemLog): Promise<SystemLog>;
  getRecentSystemLogs(limit: number): Promise<SystemLog[]>;
}

import { DatabaseStorage } from "./database-storage";
import { MemStorage } from "./mem-storage";

// Postgres when configured, otherwise process memory (tests, dry runs)
export const storage: IStorage = process.env.DATABASE_URL
  ? new DatabaseStorage()
  : new MemStorage();
