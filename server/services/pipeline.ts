import pLimit from 'p-limit';
import type { ExportFormat, RunStatus, RunTrigger } from '@shared/schema';
import type { TransportKind } from '../config';
import type { IStorage } from '../storage';
import { Logger } from './logger';
import { errorMessage, isPipelineError } from './errors';
import { SessionContext } from './session-context';
import type { DealSiteConfig, PortalSiteConfig, ValuationSiteConfig } from './site-config';
import { createTransport, type Transport } from './transports';
import { FormNavigator } from './scrapers/form-navigator';
import { isNoMatch } from './enrichment/address-resolver';
import { EnrichmentResolver, type EnrichmentResult } from './enrichment/valuation-resolver';
import { DealResolver, type DealResult } from './enrichment/deal-resolver';
import { Canonicalizer, type IncomingCase } from './canonicalizer';
import { exportRecords } from './exporter';

export type TargetSite = 'portal' | 'valuation' | 'deals';

export interface PipelineOptions {
  storage: IStorage;
  portal: PortalSiteConfig;
  valuation: ValuationSiteConfig;
  deals: DealSiteConfig;
  dataDir: string;
  /** Export written after a successful run; none when null */
  exportFormat: ExportFormat | null;
  chromeExecutablePath?: string;
  transportFactory?: (site: TargetSite, kind: TransportKind) => Transport;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  recordsSeen: number;
  recordsNew: number;
  recordsUpdated: number;
  anomalyCount: number;
  pagesFetched: number;
  enrichmentLookups: number;
  dealLookups: number;
  errorCode: string | null;
  errorMessage: string | null;
  exportPath: string | null;
}

/** Anything the scheduler can start and ask to stop. */
export interface PipelineRunner {
  run(trigger: RunTrigger): Promise<RunSummary>;
  requestStop(): void;
}

class StopRequested extends Error {
  constructor() {
    super('Stopped by request');
    this.name = 'StopRequested';
  }
}

// Out-of-scope addresses were never meant to be looked up
function isMiss(result: EnrichmentResult): boolean {
  return isNoMatch(result) && result.reason !== 'out-of-scope';
}

function isOffer(result: DealResult | null): boolean {
  return result !== null && !isNoMatch(result);
}

/**
 * One end-to-end pass: roster pages in order, each page enriched (valuation
 * and, when enabled, deal lookups) and then committed before the next is
 * requested. Deal misses are not anomalies. A stage failure ends the run as
 * failed and leaves earlier pages committed.
 */
export class Pipeline implements PipelineRunner {
  private stopRequested = false;
  private readonly now: () => Date;

  constructor(private readonly options: PipelineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  requestStop(): void {
    this.stopRequested = true;
  }

  async run(trigger: RunTrigger): Promise<RunSummary> {
    const { storage, portal, valuation, deals } = this.options;
    this.stopRequested = false;

    const runId = await storage.createPipelineRun({ trigger, status: 'running', startedAt: this.now() });
    const summary: RunSummary = {
      runId,
      status: 'running',
      recordsSeen: 0,
      recordsNew: 0,
      recordsUpdated: 0,
      anomalyCount: 0,
      pagesFetched: 0,
      enrichmentLookups: 0,
      dealLookups: 0,
      errorCode: null,
      errorMessage: null,
      exportPath: null,
    };

    await Logger.info(`Starting ${trigger} run`, 'pipeline', { runId });

    const portalTransport = this.transport('portal', portal.transport, portal.timeoutMs);
    const valuationTransport = this.transport('valuation', valuation.transport, valuation.timeoutMs);
    const portalSession = this.session(portal.pacing);
    const valuationSession = this.session(valuation.pacing);

    const navigator = new FormNavigator(portalTransport, portalSession, portal, { sleep: this.options.sleep });
    const resolver = new EnrichmentResolver(valuationTransport, valuationSession, valuation, {
      sleep: this.options.sleep,
      now: this.now,
    });
    const dealTransport = deals.enabled ? this.transport('deals', deals.transport, deals.timeoutMs) : null;
    const dealResolver = dealTransport
      ? new DealResolver(dealTransport, this.session(deals.pacing), deals, { sleep: this.options.sleep, now: this.now })
      : null;
    const canonicalizer = new Canonicalizer(storage);
    const enrichLimit = pLimit(valuation.concurrency);

    try {
      for await (const page of navigator.pages()) {
        // A page fetched again after a session restart was counted the first time
        if (!page.revisited) {
          summary.pagesFetched++;
          summary.recordsSeen += page.records.length;
          summary.anomalyCount += page.malformedRows;
        }

        const enrichments = await Promise.all(
          page.records.map(record => enrichLimit(() => resolver.resolve(record.propertyAddress)))
        );
        const offers = await Promise.all(
          page.records.map(record =>
            dealResolver ? enrichLimit(() => dealResolver.resolve(record.propertyAddress)) : Promise.resolve(null)
          )
        );
        const misses = page.revisited ? 0 : enrichments.filter(isMiss).length;
        summary.anomalyCount += misses;

        const scrapedAt = this.now();
        const incoming: IncomingCase[] = page.records.map((record, index) => ({
          record,
          enrichment: enrichments[index],
          deal: offers[index],
          scrapedAt,
        }));

        const committed = await canonicalizer.commitPage(runId, incoming);
        summary.recordsNew += committed.inserted;
        summary.recordsUpdated += committed.updated;
        summary.anomalyCount += committed.conflicts;
        summary.enrichmentLookups = resolver.lookupCount;
        summary.dealLookups = dealResolver ? dealResolver.lookupCount : 0;

        await Logger.info(
          `Committed ${page.caseType} page ${page.pageIndex}: ${committed.inserted} new, ` +
            `${committed.updated} updated, ${committed.unchanged} unchanged, ${misses} enrichment misses, ` +
            `${offers.filter(isOffer).length} deals`,
          'pipeline',
          { runId }
        );
        await storage.updatePipelineRun(runId, this.progress(summary));

        if (this.stopRequested) {
          throw new StopRequested();
        }
      }

      summary.status = 'succeeded';

      if (this.options.exportFormat) {
        const exported = await exportRecords(storage, this.options.exportFormat, this.options.dataDir, this.now());
        summary.exportPath = exported.path;
      }

      await Logger.success(
        `Run finished: ${summary.recordsNew} new, ${summary.recordsUpdated} updated, ` +
          `${summary.anomalyCount} anomalies over ${summary.pagesFetched} pages`,
        'pipeline',
        { runId }
      );
    } catch (error) {
      summary.status = 'failed';
      if (error instanceof StopRequested) {
        summary.errorCode = 'STOPPED';
        await Logger.warning(`Run stopped after ${summary.pagesFetched} pages`, 'pipeline', { runId });
      } else {
        summary.errorCode = isPipelineError(error) ? error.code : 'INTERNAL_ERROR';
        await Logger.error(`Run failed (${summary.errorCode}): ${errorMessage(error)}`, 'pipeline', { runId });
      }
      summary.errorMessage = errorMessage(error);
    } finally {
      summary.enrichmentLookups = resolver.lookupCount;
      summary.dealLookups = dealResolver ? dealResolver.lookupCount : 0;
      await this.close(portalTransport);
      await this.close(valuationTransport);
      if (dealTransport) await this.close(dealTransport);
    }

    await storage.updatePipelineRun(runId, {
      ...this.progress(summary),
      status: summary.status,
      finishedAt: this.now(),
      errorCode: summary.errorCode,
      errorMessage: summary.errorMessage,
    });

    return summary;
  }

  private progress(summary: RunSummary) {
    return {
      recordsSeen: summary.recordsSeen,
      recordsNew: summary.recordsNew,
      recordsUpdated: summary.recordsUpdated,
      anomalyCount: summary.anomalyCount,
      pagesFetched: summary.pagesFetched,
    };
  }

  private transport(site: TargetSite, kind: TransportKind, timeoutMs: number): Transport {
    if (this.options.transportFactory) {
      return this.options.transportFactory(site, kind);
    }
    return createTransport(kind, { timeoutMs, executablePath: this.options.chromeExecutablePath });
  }

  // A fresh context per target site per run
  private session(pacing: { minMs: number; maxMs: number }): SessionContext {
    return new SessionContext({
      minDelayMs: pacing.minMs,
      maxDelayMs: pacing.maxMs,
      random: this.options.random,
      sleep: this.options.sleep,
    });
  }

  private async close(transport: Transport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      await Logger.warning(`Failed to close ${transport.kind} transport: ${errorMessage(error)}`, 'pipeline');
    }
  }
}
