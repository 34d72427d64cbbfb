import cron from 'node-cron';
import { CronExpressionParser } from 'cron-parser';
import defaultLogger, { type Logger } from '../utils/logger.js';
import { getErrorDetails, getErrorMessage } from '../utils/errorUtils.js';
import { validateCronExpression } from '../schemas/config.js';
import { collectionRunner, type CollectionFailure, type CollectionResult } from './collectionRunner.js';
import type { InstanceConfig, RunSchedule } from '../types/config.js';

/** The part of a node-cron task the scheduler drives */
export interface ScheduledTask {
  stop: () => void;
}

export type TaskScheduler = (expression: string, run: () => void, timezone?: string) => ScheduledTask;

export interface CycleRunner {
  runCollection(instances: readonly InstanceConfig[]): Promise<CollectionResult>;
}

export interface SchedulerRunHistory {
  timestamp: string;
  success: boolean;
  succeeded: number;
  failed: CollectionFailure[];
  error?: string;
}

export interface SchedulerStatus {
  running: boolean;
  mode: RunSchedule['mode'] | null;
  schedule: string | null;
  nextRun: string | null;
  lastRun: SchedulerRunHistory | null;
}

export interface SchedulerServiceOptions {
  runner?: CycleRunner;
  logger?: Logger;
  scheduleTask?: TaskScheduler;
  now?: () => Date;
}

const defaultTaskScheduler: TaskScheduler = (expression, run, timezone) =>
  cron.schedule(expression, run, timezone ? { timezone } : {});

/**
 * Repeats collection cycles over a fixed set of instances, either once, on a
 * sleep interval or on a cron schedule. At most one cycle runs at a time.
 */
export class SchedulerService {
  private readonly instances: readonly InstanceConfig[];
  private readonly runner: CycleRunner;
  private readonly logger: Logger;
  private readonly scheduleTask: TaskScheduler;
  private readonly now: () => Date;

  private task: ScheduledTask | null = null;
  private mode: RunSchedule['mode'] | null = null;
  private currentSchedule: string | null = null;
  private currentTimezone: string | undefined;
  private intervalActive = false;
  private isRunning = false;
  private nextIntervalRun: Date | null = null;
  private wakeTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  private runHistory: SchedulerRunHistory[] = [];
  private maxHistorySize = 100;

  constructor(instances: readonly InstanceConfig[], options: SchedulerServiceOptions = {}) {
    this.instances = instances;
    this.runner = options.runner ?? collectionRunner;
    this.logger = options.logger ?? defaultLogger;
    this.scheduleTask = options.scheduleTask ?? defaultTaskScheduler;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Runs one cycle and records it. Returns true iff every instance succeeded.
   */
  async runOnce(): Promise<boolean> {
    this.isRunning = true;
    try {
      const result = await this.runner.runCollection(this.instances);
      this.addToHistory({
        timestamp: this.now().toISOString(),
        success: result.success,
        succeeded: result.succeeded,
        failed: result.failed
      });
      return result.success;
    } catch (error: unknown) {
      const { message, stack } = getErrorDetails(error);
      this.logger.error('❌ Collection cycle failed', { error: message, stack });
      this.addToHistory({
        timestamp: this.now().toISOString(),
        success: false,
        succeeded: 0,
        failed: [],
        error: message
      });
      return false;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Runs cycles back to back with `seconds` of sleep in between, until stop()
   */
  async startInterval(seconds: number): Promise<void> {
    this.stop();
    this.mode = 'interval';
    this.intervalActive = true;
    this.logger.info(`🔁 Running continuously with ${seconds}s interval (Ctrl+C to stop)`);

    while (this.intervalActive) {
      await this.runOnce();
      if (!this.intervalActive) {
        break;
      }
      this.logger.info(`💤 Sleeping for ${seconds} seconds...`);
      this.nextIntervalRun = new Date(this.now().getTime() + seconds * 1000);
      await this.sleep(seconds * 1000);
    }
    this.nextIntervalRun = null;
  }

  /**
   * Runs a cycle on every cron tick. A tick that fires while a cycle is still
   * running is skipped.
   */
  startCron(expression: string, timezone?: string): void {
    this.stop();
    validateCronExpression(expression, timezone);

    this.mode = 'cron';
    this.currentSchedule = expression;
    this.currentTimezone = timezone;
    this.task = this.scheduleTask(expression, () => {
      this.runScheduledCycle().catch((error: unknown) => {
        this.logger.error('❌ Scheduled cycle failed', { error: getErrorMessage(error) });
      });
    }, timezone);

    this.logger.info('🕐 Scheduler started', { schedule: expression, timezone: timezone ?? 'local' });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.debug('⏹️  Cron task stopped');
    }
    this.intervalActive = false;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    if (this.wake) {
      const wake = this.wake;
      this.wake = null;
      wake();
    }
    this.mode = null;
    this.currentSchedule = null;
    this.currentTimezone = undefined;
    this.nextIntervalRun = null;
  }

  getNextRunTime(): Date | null {
    if (this.mode === 'interval') {
      return this.nextIntervalRun;
    }
    if (this.mode !== 'cron' || !this.currentSchedule) {
      return null;
    }

    try {
      const interval = CronExpressionParser.parse(this.currentSchedule, {
        currentDate: this.now(),
        ...(this.currentTimezone ? { tz: this.currentTimezone } : {})
      });
      return interval.next().toDate();
    } catch (error: unknown) {
      this.logger.debug('Could not parse cron for next run time', { schedule: this.currentSchedule, error: getErrorMessage(error) });
      return null;
    }
  }

  getStatus(): SchedulerStatus {
    const nextRun = this.getNextRunTime();
    return {
      running: this.task !== null || this.intervalActive,
      mode: this.mode,
      schedule: this.currentSchedule,
      nextRun: nextRun ? nextRun.toISOString() : null,
      lastRun: this.runHistory[0] ?? null
    };
  }

  getHistory(): SchedulerRunHistory[] {
    return [...this.runHistory];
  }

  /**
   * Logs a tally of the recorded cycles, e.g. on shutdown
   */
  logRunSummary(): void {
    const runs = this.runHistory.length;
    if (runs === 0) {
      return;
    }
    const succeeded = this.runHistory.filter(run => run.success).length;
    this.logger.info(
      `📊 ${runs} recorded cycle(s): ${succeeded} succeeded, ${runs - succeeded} failed`,
      { lastRun: this.runHistory[0]?.timestamp }
    );
  }

  private async runScheduledCycle(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('⏸️  Previous collection still running, skipping scheduled run');
      return;
    }
    this.logger.info('⏰ Scheduled collection started', { schedule: this.currentSchedule });
    await this.runOnce();
  }

  private addToHistory(entry: SchedulerRunHistory): void {
    this.runHistory.unshift(entry);
    if (this.runHistory.length > this.maxHistorySize) {
      this.runHistory = this.runHistory.slice(0, this.maxHistorySize);
    }
  }

  /** Sleep that stop() cuts short */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
