import { randomUUID } from "crypto";
import {
  type ForeclosureCase,
  type InsertForeclosureCase,
  type PipelineRun,
  type InsertPipelineRun,
  type FilingDateConflict,
  type SystemLog,
  type InsertSystemLog
} from "@shared/schema";
import type { IStorage, MergeBatch } from "./storage";

function toCaseRow(data: InsertForeclosureCase, now: Date): ForeclosureCase {
  return {
    id: randomUUID(),
    caseNumber: data.caseNumber,
    caseType: data.caseType ?? "Foreclosure",
    filingDate: data.filingDate ?? null,
    hearingDate: data.hearingDate ?? null,
    courtRoom: data.courtRoom ?? null,
    plaintiffName: data.plaintiffName ?? "",
    plaintiffAttorneyName: data.plaintiffAttorneyName ?? null,
    plaintiffAttorneyPhone: data.plaintiffAttorneyPhone ?? null,
    defendantName: data.defendantName ?? "",
    defendantFirstName: data.defendantFirstName ?? "",
    defendantLastName: data.defendantLastName ?? "",
    defendantAttorneyName: data.defendantAttorneyName ?? null,
    defendantAttorneyPhone: data.defendantAttorneyPhone ?? null,
    propertyStreet: data.propertyStreet ?? "",
    propertyCity: data.propertyCity ?? "",
    propertyState: data.propertyState ?? "",
    propertyZip: data.propertyZip ?? "",
    enrichment: data.enrichment ?? null,
    deal: data.deal ?? null,
    sourceUrl: data.sourceUrl ?? "",
    scrapedAt: data.scrapedAt,
    firstSeenRunId: data.firstSeenRunId,
    lastSeenRunId: data.lastSeenRunId,
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * In-process storage with the same merge semantics as DatabaseStorage.
 * Used when no DATABASE_URL is configured and throughout the test suite.
 */
export class MemStorage implements IStorage {
  private cases = new Map<string, ForeclosureCase>();
  private conflicts: FilingDateConflict[] = [];
  private runs = new Map<string, PipelineRun>();
  private logs: SystemLog[] = [];
  private maxLogs = 5000;

  async getCase(caseNumber: string): Promise<ForeclosureCase | undefined> {
    const row = this.cases.get(caseNumber);
    return row ? { ...row } : undefined;
  }

  async getCasesByNumbers(caseNumbers: string[]): Promise<ForeclosureCase[]> {
    const rows: ForeclosureCase[] = [];
    for (const caseNumber of new Set(caseNumbers)) {
      const row = this.cases.get(caseNumber);
      if (row) rows.push({ ...row });
    }
    return rows;
  }

  async getAllCases(): Promise<ForeclosureCase[]> {
    return Array.from(this.cases.values())
      .map(row => ({ ...row }))
      .sort((a, b) => a.caseNumber.localeCompare(b.caseNumber));
  }

  async getCasesCount(): Promise<number> {
    return this.cases.size;
  }

  async applyMergeBatch(batch: MergeBatch): Promise<void> {
    // Validate everything first so the batch applies all-or-nothing
    for (const insert of batch.inserts) {
      if (this.cases.has(insert.caseNumber)) {
        throw new Error(`Case ${insert.caseNumber} already exists`);
      }
    }
    for (const update of batch.updates) {
      if (!this.cases.has(update.caseNumber)) {
        throw new Error(`Case ${update.caseNumber} not found for update`);
      }
    }

    const now = new Date();
    for (const insert of batch.inserts) {
      this.cases.set(insert.caseNumber, toCaseRow(insert, now));
    }
    for (const update of batch.updates) {
      const current = this.cases.get(update.caseNumber);
      if (current) {
        this.cases.set(update.caseNumber, { ...current, ...update.changes, updatedAt: now });
      }
    }
    for (const conflict of batch.conflicts) {
      const duplicate = this.conflicts.some(existing =>
        existing.runId === conflict.runId && existing.caseNumber === conflict.caseNumber
      );
      if (!duplicate) {
        this.conflicts.push({ ...conflict, id: randomUUID(), detectedAt: now });
      }
    }
  }

  async getRecentConflicts(limit: number): Promise<FilingDateConflict[]> {
    return [...this.conflicts]
      .sort((a, b) => b.detectedAt.getTime() - a.detectedAt.getTime())
      .slice(0, limit);
  }

  async getConflictsForRun(runId: string): Promise<FilingDateConflict[]> {
    return this.conflicts.filter(conflict => conflict.runId === runId);
  }

  async createPipelineRun(run: InsertPipelineRun): Promise<string> {
    const id = randomUUID();
    this.runs.set(id, {
      id,
      trigger: run.trigger,
      status: run.status,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt ?? null,
      recordsSeen: run.recordsSeen ?? 0,
      recordsNew: run.recordsNew ?? 0,
      recordsUpdated: run.recordsUpdated ?? 0,
      anomalyCount: run.anomalyCount ?? 0,
      pagesFetched: run.pagesFetched ?? 0,
      errorCode: run.errorCode ?? null,
      errorMessage: run.errorMessage ?? null,
    });
    return id;
  }

  async updatePipelineRun(id: string, updates: Partial<PipelineRun>): Promise<void> {
    const current = this.runs.get(id);
    if (!current) {
      throw new Error(`Pipeline run ${id} not found`);
    }
    this.runs.set(id, { ...current, ...updates, id });
  }

  async getPipelineRun(id: string): Promise<PipelineRun | undefined> {
    const run = this.runs.get(id);
    return run ? { ...run } : undefined;
  }

  async getRecentPipelineRuns(limit: number): Promise<PipelineRun[]> {
    return Array.from(this.runs.values())
      .reverse()
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit)
      .map(run => ({ ...run }));
  }

  async getLatestPipelineRun(): Promise<PipelineRun | undefined> {
    const [latest] = await this.getRecentPipelineRuns(1);
    return latest;
  }

  async createSystemLog(log: InsertSystemLog): Promise<SystemLog> {
    const entry: SystemLog = {
      id: randomUUID(),
      level: log.level,
      message: log.message,
      component: log.component,
      metadata: log.metadata ?? null,
      timestamp: new Date(),
    };
    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.splice(0, this.logs.length - this.maxLogs);
    }
    return entry;
  }

  async getRecentSystemLogs(limit: number): Promise<SystemLog[]> {
    return this.logs.slice(-limit).reverse();
  }
}
