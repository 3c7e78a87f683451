import {
  foreclosureCases,
  pipelineRuns,
  filingDateConflicts,
  systemLogs,
  type ForeclosureCase,
  type PipelineRun,
  type InsertPipelineRun,
  type FilingDateConflict,
  type SystemLog,
  type InsertSystemLog
} from "@shared/schema";
import { getDb } from "./db";
import { eq, desc, sql, inArray, asc } from "drizzle-orm";
import type { IStorage, MergeBatch } from "./storage";
import { randomUUID } from "crypto";

const isProduction = process.env.NODE_ENV === 'production';

const TRANSIENT_CODES = new Set(['57P01', '57P02', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

function isTransientError(error: unknown): boolean {
  const code = errorCode(error);
  if (code && (TRANSIENT_CODES.has(code) || code.startsWith('08'))) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('Connection terminated') ||
    message.toLowerCase().includes('connection timeout') ||
    message.includes('timeout expired') ||
    message.includes('socket hang up') ||
    message.includes('fetch failed');
}

// Database operation retry helper; only connection-class errors are retried
async function retryDatabaseOperation<T>(
  operation: () => Promise<T>,
  operationName: string,
  maxRetries: number = isProduction ? 5 : 3,
  baseDelay: number = isProduction ? 2000 : 1000
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Database] ${operationName} attempt ${attempt}/${maxRetries} failed:`, message);

      if (!isTransientError(error) || attempt >= maxRetries) {
        console.error(`[Database] ${operationName} failed permanently after ${attempt} attempts`);
        throw error;
      }

      const jitter = Math.random() * 500;
      const delay = (baseDelay * Math.pow(2, attempt - 1)) + jitter;
      console.log(`[Database] Retrying ${operationName} in ${Math.round(delay)}ms...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

export class DatabaseStorage implements IStorage {
  // Case methods
  async getCase(caseNumber: string): Promise<ForeclosureCase | undefined> {
    return await retryDatabaseOperation(async () => {
      const [row] = await getDb().select().from(foreclosureCases).where(eq(foreclosureCases.caseNumber, caseNumber));
      return row;
    }, `getCase(${caseNumber})`);
  }

  async getCasesByNumbers(caseNumbers: string[]): Promise<ForeclosureCase[]> {
    if (caseNumbers.length === 0) return [];
    return await retryDatabaseOperation(async () => {
      return await getDb().select()
        .from(foreclosureCases)
        .where(inArray(foreclosureCases.caseNumber, Array.from(new Set(caseNumbers))));
    }, `getCasesByNumbers(${caseNumbers.length} items)`);
  }

  async getAllCases(): Promise<ForeclosureCase[]> {
    return await retryDatabaseOperation(async () => {
      return await getDb().select().from(foreclosureCases).orderBy(asc(foreclosureCases.caseNumber));
    }, 'getAllCases');
  }

  async getCasesCount(): Promise<number> {
    const [result] = await getDb().select({ count: sql<number>`count(*)` }).from(foreclosureCases);
    return Number(result?.count || 0);
  }

  async applyMergeBatch(batch: MergeBatch): Promise<void> {
    if (batch.inserts.length === 0 && batch.updates.length === 0 && batch.conflicts.length === 0) {
      return;
    }

    await retryDatabaseOperation(async () => {
      await getDb().transaction(async (tx) => {
        if (batch.inserts.length > 0) {
          await tx.insert(foreclosureCases).values(batch.inserts.map(row => ({ ...row, id: randomUUID() })));
        }

        for (const update of batch.updates) {
          await tx.update(foreclosureCases)
            .set({ ...update.changes, updatedAt: new Date() })
            .where(eq(foreclosureCases.caseNumber, update.caseNumber));
        }

        if (batch.conflicts.length > 0) {
          await tx.insert(filingDateConflicts)
            .values(batch.conflicts)
            .onConflictDoNothing();
        }
      });
    }, `applyMergeBatch(${batch.inserts.length} new, ${batch.updates.length} updated)`);

    console.log(`[Storage] Committed ${batch.inserts.length} new and ${batch.updates.length} updated cases`);
  }

  // Anomaly review
  async getRecentConflicts(limit: number): Promise<FilingDateConflict[]> {
    return await getDb().select()
      .from(filingDateConflicts)
      .orderBy(desc(filingDateConflicts.detectedAt))
      .limit(limit);
  }

  async getConflictsForRun(runId: string): Promise<FilingDateConflict[]> {
    return await getDb().select()
      .from(filingDateConflicts)
      .where(eq(filingDateConflicts.runId, runId));
  }

  // Pipeline run methods
  async createPipelineRun(run: InsertPipelineRun): Promise<string> {
    const id = randomUUID();
    await retryDatabaseOperation(async () => {
      await getDb().insert(pipelineRuns).values({ ...run, id });
    }, 'createPipelineRun');
    return id;
  }

  async updatePipelineRun(id: string, updates: Partial<PipelineRun>): Promise<void> {
    await retryDatabaseOperation(async () => {
      await getDb().update(pipelineRuns)
        .set(updates)
        .where(eq(pipelineRuns.id, id));
    }, `updatePipelineRun(${id})`);
  }

  async getPipelineRun(id: string): Promise<PipelineRun | undefined> {
    const [run] = await getDb().select().from(pipelineRuns).where(eq(pipelineRuns.id, id));
    return run;
  }

  async getRecentPipelineRuns(limit: number): Promise<PipelineRun[]> {
    return await getDb().select()
      .from(pipelineRuns)
      .orderBy(desc(pipelineRuns.startedAt))
      .limit(limit);
  }

  async getLatestPipelineRun(): Promise<PipelineRun | undefined> {
    const [run] = await this.getRecentPipelineRuns(1);
    return run;
  }

  // System log methods
  async createSystemLog(log: InsertSystemLog): Promise<SystemLog> {
    const [entry] = await getDb().insert(systemLogs).values(log).returning();
    return entry;
  }

  async getRecentSystemLogs(limit: number): Promise<SystemLog[]> {
    return await getDb().select()
      .from(systemLogs)
      .orderBy(desc(systemLogs.timestamp))
      .limit(limit);
  }
}
