import { Command } from 'commander';
import express from 'express';
import { exportFormatSchema, type ExportFormat } from '@shared/schema';
import { config, type AppConfig } from './config';
import { storage } from './storage';
import { closeDatabase, testDatabaseConnection } from './db';
import { registerRoutes } from './routes';
import { Logger } from './services/logger';
import { errorMessage } from './services/errors';
import { Pipeline, type RunSummary } from './services/pipeline';
import { SchedulerService, type ScheduleOptions } from './services/scheduler';
import { buildDealConfig, buildPortalConfig, buildValuationConfig } from './services/site-config';
import { exportRecords } from './services/exporter';

function parseFormat(value: string | undefined): ExportFormat {
  return exportFormatSchema.parse(value ?? config.exportFormat);
}

function parsePositiveInt(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function createScheduler(appConfig: AppConfig, exportFormat: ExportFormat | null, overrides: Partial<ScheduleOptions> = {}) {
  const portal = buildPortalConfig(appConfig);
  const valuation = buildValuationConfig(appConfig);
  const deals = buildDealConfig(appConfig);

  // Each run gets its own pipeline so its stop flag and transports never leak into the next
  const createRunner = () => new Pipeline({
    storage,
    portal,
    valuation,
    deals,
    dataDir: appConfig.dataDir,
    exportFormat,
    chromeExecutablePath: appConfig.chromeExecutablePath,
  });

  return new SchedulerService(createRunner, storage, {
    intervalDays: appConfig.schedule.intervalDays,
    hour: appConfig.schedule.hour,
    minute: appConfig.schedule.minute,
    timezone: appConfig.schedule.timezone,
    ...overrides,
  });
}

async function checkDatabase(): Promise<void> {
  if (!config.databaseUrl) {
    await Logger.warning('DATABASE_URL not set - using in-memory storage', 'cli');
    return;
  }
  if (!(await testDatabaseConnection())) {
    throw new Error('Database connection failed');
  }
}

function printSummary(summary: RunSummary): void {
  console.log(`run_id=${summary.runId}`);
  console.log(`status=${summary.status}`);
  console.log(`records_new=${summary.recordsNew}`);
  console.log(`records_updated=${summary.recordsUpdated}`);
  console.log(`deal_lookups=${summary.dealLookups}`);
  console.log(`anomalies=${summary.anomalyCount}`);
  if (summary.exportPath) console.log(`export=${summary.exportPath}`);
  if (summary.errorCode) console.log(`error=${summary.errorCode}: ${summary.errorMessage}`);
}

async function runOnce(format: ExportFormat): Promise<void> {
  await checkDatabase();
  const summary = await createScheduler(config, format).runOnce();
  printSummary(summary);
  await closeDatabase();
  // Record-level anomalies still exit 0; only a failed stage is an error
  process.exitCode = summary.status === 'failed' ? 1 : 0;
}

function onShutdown(handler: () => Promise<void>): void {
  const shutdown = (signal: string) => {
    Logger.info(`${signal} received, shutting down`, 'cli')
      .then(handler)
      .then(closeDatabase)
      .then(() => process.exit(0))
      .catch(error => {
        console.error('Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

const program = new Command();

program
  .name('roster-harvest')
  .description('Collect the foreclosure roster, enrich it with valuations and deals and keep a canonical store');

program
  .command('run-once')
  .description('Run one pass and exit (0 on success, 1 when a stage fails)')
  .option('-f, --format <format>', 'export written after the run (csv, xlsx, json)')
  .action(async (options: { format?: string }) => {
    await runOnce(parseFormat(options.format));
  });

program
  .command('schedule')
  .description('Run on a fixed interval until interrupted')
  .option('-i, --interval <days>', 'days between runs')
  .option('--now', 'start a run immediately')
  .action(async (options: { interval?: string; now?: boolean }) => {
    if (config.schedule.runOnce) {
      await runOnce(config.exportFormat);
      return;
    }

    await checkDatabase();
    const scheduler = createScheduler(config, config.exportFormat, {
      intervalDays: options.interval ? parsePositiveInt(options.interval, 'interval') : config.schedule.intervalDays,
      runImmediately: options.now === true,
    });
    await scheduler.start();
    onShutdown(() => scheduler.stop());
  });

program
  .command('serve')
  .description('Start the ops API and the scheduler')
  .option('-p, --port <port>', 'port to listen on')
  .action(async (options: { port?: string }) => {
    await checkDatabase();
    const scheduler = createScheduler(config, config.exportFormat);

    const app = express();
    app.use(express.json());
    const server = registerRoutes(app, { storage, scheduler, dataDir: config.dataDir });

    const port = options.port ? parsePositiveInt(options.port, 'port') : config.port;
    server.listen(port, () => {
      Logger.info(`Ops API listening on port ${port}`, 'cli').catch(error => {
        console.error('Failed to log startup:', errorMessage(error));
      });
    });

    await scheduler.start();
    onShutdown(async () => {
      await scheduler.stop();
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
    });
  });

program
  .command('export')
  .description('Write a snapshot of the stored cases')
  .option('-f, --format <format>', 'csv, xlsx or json')
  .option('-o, --out <dir>', 'output directory')
  .action(async (options: { format?: string; out?: string }) => {
    await checkDatabase();
    const result = await exportRecords(storage, parseFormat(options.format), options.out ?? config.dataDir);
    console.log(`${result.count} records written to ${result.path}`);
    await closeDatabase();
  });

program.parseAsync(process.argv).catch(async error => {
  await Logger.error(`Command failed: ${errorMessage(error)}`, 'cli');
  process.exitCode = 1;
});
