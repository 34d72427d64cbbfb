import { describe, it, expect, vi, afterEach } from 'vitest';
import { SchedulerService, type TaskScheduler } from '../../../src/services/schedulerService.js';
import type { CollectionResult } from '../../../src/services/collectionRunner.js';
import { ConfigError } from '../../../src/utils/errorUtils.js';
import logger from '../../../src/utils/logger.js';
import { makeInstance } from '../../helpers/instances.js';

const okResult: CollectionResult = { success: true, succeeded: 1, failed: [] };
const now = new Date('2024-05-01T12:00:30Z');

function createTaskScheduler() {
  const ticks: Array<() => void> = [];
  const stop = vi.fn();
  const scheduleTask = vi.fn<TaskScheduler>((_expression, run) => {
    ticks.push(run);
    return { stop };
  });
  return { ticks, stop, scheduleTask };
}

describe('SchedulerService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('runOnce', () => {
    it('should run one cycle and record it', async () => {
      const runner = { runCollection: vi.fn(async () => okResult) };
      const instances = [makeInstance()];
      const scheduler = new SchedulerService(instances, { runner, now: () => now });

      await expect(scheduler.runOnce()).resolves.toBe(true);

      expect(runner.runCollection).toHaveBeenCalledWith(instances);
      expect(scheduler.getStatus().lastRun).toEqual({
        timestamp: '2024-05-01T12:00:30.000Z',
        success: true,
        succeeded: 1,
        failed: [],
      });
    });

    it('should report failed cycles', async () => {
      const failed: CollectionResult = { success: false, succeeded: 0, failed: [{ name: 'a', reason: 'Failed to send webhook' }] };
      const scheduler = new SchedulerService([makeInstance()], { runner: { runCollection: vi.fn(async () => failed) } });

      await expect(scheduler.runOnce()).resolves.toBe(false);
      expect(scheduler.getHistory()[0].failed).toEqual(failed.failed);
    });

    it('should turn an unexpected runner error into a failed cycle', async () => {
      const runner = { runCollection: vi.fn(async (): Promise<CollectionResult> => { throw new Error('boom'); }) };
      const scheduler = new SchedulerService([makeInstance()], { runner });

      await expect(scheduler.runOnce()).resolves.toBe(false);
      expect(scheduler.getHistory()[0]).toMatchObject({ success: false, error: 'boom' });
    });

    it('should keep only the last 100 cycles', async () => {
      const scheduler = new SchedulerService([makeInstance()], { runner: { runCollection: vi.fn(async () => okResult) } });

      for (let run = 0; run < 105; run++) {
        await scheduler.runOnce();
      }

      expect(scheduler.getHistory()).toHaveLength(100);
    });
  });

  describe('logRunSummary', () => {
    it('should log a tally of the recorded cycles', async () => {
      const failed: CollectionResult = { success: false, succeeded: 0, failed: [{ name: 'a', reason: 'Failed to send webhook' }] };
      const runCollection = vi.fn<(instances: unknown) => Promise<CollectionResult>>()
        .mockResolvedValueOnce(okResult)
        .mockResolvedValueOnce(failed)
        .mockResolvedValueOnce(okResult);
      const scheduler = new SchedulerService([makeInstance()], { runner: { runCollection }, now: () => now });
      const infoSpy = vi.spyOn(logger, 'info');

      await scheduler.runOnce();
      await scheduler.runOnce();
      await scheduler.runOnce();
      scheduler.logRunSummary();

      expect(infoSpy).toHaveBeenCalledWith('📊 3 recorded cycle(s): 2 succeeded, 1 failed', { lastRun: '2024-05-01T12:00:30.000Z' });
    });

    it('should stay quiet before any cycle has run', () => {
      const scheduler = new SchedulerService([makeInstance()], { runner: { runCollection: vi.fn(async () => okResult) } });
      const infoSpy = vi.spyOn(logger, 'info');

      scheduler.logRunSummary();

      expect(infoSpy).not.toHaveBeenCalled();
    });
  });

  describe('startInterval', () => {
    it('should run a cycle, sleep, and stop when asked', async () => {
      const runner = { runCollection: vi.fn(async () => okResult) };
      const scheduler = new SchedulerService([makeInstance()], { runner, now: () => now });

      const loop = scheduler.startInterval(3600);
      await vi.waitFor(() => expect(scheduler.getStatus().nextRun).toBe('2024-05-01T13:00:30.000Z'));

      expect(scheduler.getStatus()).toMatchObject({ running: true, mode: 'interval' });
      scheduler.stop();
      await loop;

      expect(runner.runCollection).toHaveBeenCalledTimes(1);
      expect(scheduler.getStatus()).toMatchObject({ running: false, mode: null, nextRun: null });
    });
  });

  describe('startCron', () => {
    it('should schedule cycles and compute the next run', async () => {
      const runner = { runCollection: vi.fn(async () => okResult) };
      const { ticks, scheduleTask } = createTaskScheduler();
      const scheduler = new SchedulerService([makeInstance()], { runner, scheduleTask, now: () => now });

      scheduler.startCron('0 * * * *', 'UTC');

      expect(scheduleTask).toHaveBeenCalledWith('0 * * * *', expect.any(Function), 'UTC');
      expect(scheduler.getStatus()).toMatchObject({
        running: true,
        mode: 'cron',
        schedule: '0 * * * *',
        nextRun: '2024-05-01T13:00:00.000Z',
      });

      ticks[0]();
      await vi.waitFor(() => expect(scheduler.getHistory()).toHaveLength(1));
      expect(runner.runCollection).toHaveBeenCalledTimes(1);
    });

    it('should skip a tick while the previous cycle is still running', async () => {
      const releases: Array<() => void> = [];
      const runner = {
        runCollection: vi.fn(() => new Promise<CollectionResult>(resolve => {
          releases.push(() => resolve(okResult));
        })),
      };
      const { ticks, scheduleTask } = createTaskScheduler();
      const scheduler = new SchedulerService([makeInstance()], { runner, scheduleTask });
      const warnSpy = vi.spyOn(logger, 'warn');

      scheduler.startCron('*/5 * * * *');
      ticks[0]();
      ticks[0]();

      expect(runner.runCollection).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith('⏸️  Previous collection still running, skipping scheduled run');

      releases[0]();
      await vi.waitFor(() => expect(scheduler.getHistory()).toHaveLength(1));
    });

    it('should reject an invalid expression', () => {
      const { scheduleTask } = createTaskScheduler();
      const scheduler = new SchedulerService([makeInstance()], { scheduleTask });

      expect(() => scheduler.startCron('61 * * * *')).toThrow(ConfigError);
      expect(scheduleTask).not.toHaveBeenCalled();
    });

    it('should stop the cron task', () => {
      const { scheduleTask, stop } = createTaskScheduler();
      const scheduler = new SchedulerService([makeInstance()], { scheduleTask });

      scheduler.startCron('0 * * * *');
      scheduler.stop();

      expect(stop).toHaveBeenCalledTimes(1);
      expect(scheduler.getStatus()).toMatchObject({ running: false, mode: null, schedule: null, nextRun: null });
    });
  });
});
