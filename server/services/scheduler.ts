import * as cron from 'node-cron';
import type { RunTrigger } from '@shared/schema';
import type { IStorage } from '../storage';
import { Logger } from './logger';
import { errorMessage } from './errors';
import type { PipelineRunner, RunSummary } from './pipeline';

export type SchedulerState = 'idle' | 'running' | 'failed';

export interface ScheduleOptions {
  intervalDays: number;
  hour: number;
  minute: number;
  timezone: string;
  /** Fire one pass as soon as the scheduler starts */
  runImmediately?: boolean;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
// The daily tick fires at a fixed time while runs start a little after it
const DUE_SLACK_MS = 12 * 60 * 60 * 1000;

export class SchedulerService {
  private state: SchedulerState = 'idle';
  private scheduledTask: cron.ScheduledTask | null = null;
  private activeRunner: PipelineRunner | null = null;
  private activeRun: Promise<RunSummary> | null = null;
  private lastSummary: RunSummary | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly createRunner: () => PipelineRunner,
    private readonly storage: IStorage,
    private readonly options: ScheduleOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get cronExpression(): string {
    return `${this.options.minute} ${this.options.hour} * * *`;
  }

  getState(): SchedulerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getLastSummary(): RunSummary | null {
    return this.lastSummary;
  }

  async start(): Promise<void> {
    const expression = this.cronExpression;
    if (!cron.validate(expression)) {
      throw new Error(`Invalid schedule time ${this.options.hour}:${this.options.minute}`);
    }

    if (this.scheduledTask) {
      this.scheduledTask.stop();
    }
    this.scheduledTask = cron.schedule(expression, async () => {
      await this.tick();
    }, {
      timezone: this.options.timezone,
    });

    await Logger.info(
      `Scheduler started - every ${this.options.intervalDays} days, checked daily at ` +
        `${String(this.options.hour).padStart(2, '0')}:${String(this.options.minute).padStart(2, '0')} ${this.options.timezone}`,
      'scheduler'
    );

    if (this.options.runImmediately) {
      this.trigger('scheduled').catch(async error => {
        await Logger.error(`Immediate run failed to start: ${errorMessage(error)}`, 'scheduler');
      });
    }
  }

  /** True when no run exists or the last one started at least intervalDays ago. */
  async isDue(): Promise<boolean> {
    const latest = await this.storage.getLatestPipelineRun();
    if (!latest) return true;
    const elapsed = this.now().getTime() - latest.startedAt.getTime();
    return elapsed + DUE_SLACK_MS >= this.options.intervalDays * DAY_MS;
  }

  /** The daily cron callback. */
  async tick(): Promise<RunSummary | null> {
    if (!(await this.isDue())) {
      await Logger.debug('Scheduled check: not due yet', 'scheduler');
      return null;
    }
    return this.trigger('scheduled');
  }

  /**
   * Start a run unless one is in progress; a trigger while running is
   * skipped and resolves to null.
   */
  trigger(trigger: RunTrigger): Promise<RunSummary | null> {
    if (this.state === 'running') {
      return Logger.warning(`Run already in progress, skipping ${trigger} trigger`, 'scheduler').then(() => null);
    }

    this.state = 'running';
    const runner = this.createRunner();
    this.activeRunner = runner;
    const run = this.execute(runner, trigger);
    this.activeRun = run;
    return run;
  }

  private async execute(runner: PipelineRunner, trigger: RunTrigger): Promise<RunSummary> {
    try {
      const summary = await runner.run(trigger);
      this.lastSummary = summary;
      if (summary.status === 'failed') {
        this.state = 'failed';
        await Logger.warning(`Run ${summary.runId} failed with ${summary.errorCode}`, 'scheduler');
      }
      return summary;
    } catch (error) {
      this.state = 'failed';
      await Logger.error(`Run could not complete: ${errorMessage(error)}`, 'scheduler');
      throw error;
    } finally {
      this.activeRunner = null;
      this.activeRun = null;
      this.state = 'idle';
    }
  }

  /** Run-once mode: one pass, resolving with its summary. */
  async runOnce(): Promise<RunSummary> {
    const summary = await this.trigger('once');
    if (!summary) {
      throw new Error('A run is already in progress');
    }
    return summary;
  }

  /**
   * Ask the active run to stop after the page in progress is committed.
   * Returns at once; the run still finishes as failed/STOPPED.
   */
  requestStop(): boolean {
    if (!this.activeRunner) return false;
    this.activeRunner.requestStop();
    return true;
  }

  /**
   * Stop the cron task and wait for an active run to wind down, so nothing
   * is closed underneath a page that is still being fetched or committed.
   */
  async stop(): Promise<void> {
    if (this.scheduledTask) {
      this.scheduledTask.stop();
      this.scheduledTask = null;
    }

    const run = this.activeRun;
    if (!run || !this.requestStop()) {
      await Logger.info('Scheduler stopped', 'scheduler');
      return;
    }

    await Logger.info('Stop requested - waiting for the active run to finish its current page', 'scheduler');
    try {
      await run;
    } catch (error) {
      // execute() has already logged the failure; stopping still completes
      await Logger.warning(`Active run ended with an error while stopping: ${errorMessage(error)}`, 'scheduler');
    }
    await Logger.info('Scheduler stopped', 'scheduler');
  }
}
