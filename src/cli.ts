import { Command, InvalidArgumentError } from 'commander';
import logger, { updateLogLevel } from './utils/logger.js';
import { ConfigError, getErrorDetails } from './utils/errorUtils.js';
import { configService } from './services/configService.js';
import { SchedulerService } from './services/schedulerService.js';
import {
  APP_NAME,
  APP_TYPES,
  APP_VERSION,
  DEFAULT_CALENDAR_DAYS,
  DEFAULT_CALENDAR_DAYS_BEFORE,
  MAX_INTERVAL_SECONDS
} from './types/constants.js';
import type { CliOptions, InstanceConfig, RunSchedule } from './types/config.js';

interface RawCliOptions {
  config?: string;
  url?: string;
  apiKey?: string;
  webhook?: string;
  type?: string;
  days: number;
  daysBefore: number;
  calendarOnly?: boolean;
  timezone?: string;
  interval: number;
  schedule?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Expected a non-negative whole number.');
  }
  return parsed;
}

function parseInterval(value: string): number {
  const seconds = parseNonNegativeInt(value);
  if (seconds > MAX_INTERVAL_SECONDS) {
    throw new InvalidArgumentError(`Interval must not exceed ${MAX_INTERVAL_SECONDS} seconds.`);
  }
  return seconds;
}

export function createProgram(): Command {
  return new Command()
    .name(APP_NAME)
    .description('Collect data from Servarr apps (Sonarr, Radarr, Lidarr, Readarr, Prowlarr) and send it to a webhook')
    .version(APP_VERSION, '-V, --version')
    .option('-C, --config <path>', 'path to YAML config file (multiple instances)')
    .option('-u, --url <url>', 'Servarr instance URL')
    .option('-k, --api-key <key>', 'Servarr API key')
    .option('-w, --webhook <url>', 'webhook URL')
    .option('-t, --type <type>', `app type (${APP_TYPES.join(', ')})`)
    .option('-d, --days <n>', 'calendar days forward', parseNonNegativeInt, DEFAULT_CALENDAR_DAYS)
    .option('-b, --days-before <n>', 'calendar days back', parseNonNegativeInt, DEFAULT_CALENDAR_DAYS_BEFORE)
    .option('-c, --calendar-only', 'only send calendar data')
    .option('-z, --timezone <tz>', 'IANA timezone for date calculations')
    .option('-i, --interval <seconds>', 'collection interval in seconds (0 = run once)', parseInterval, 0)
    .option('-s, --schedule <cron>', 'run on a cron schedule instead of an interval')
    .option('-v, --verbose', 'verbose output')
    .option('--dry-run', 'print JSON instead of sending to the webhook')
    .addHelpText('after', `
Examples:
  # With config file (multiple instances)
  $ ${APP_NAME} --config config.yaml

  # CLI only (single instance)
  $ ${APP_NAME} -u http://sonarr:8989 -k <api-key> -w https://example.com/webhook

  # Dry run (print JSON, don't send)
  $ ${APP_NAME} --config config.yaml --dry-run`);
}

export function toCliOptions(raw: RawCliOptions): CliOptions {
  return {
    config: raw.config,
    url: raw.url,
    apiKey: raw.apiKey,
    webhook: raw.webhook,
    type: raw.type,
    days: raw.days,
    daysBefore: raw.daysBefore,
    calendarOnly: raw.calendarOnly ?? false,
    timezone: raw.timezone || undefined,
    interval: raw.interval,
    schedule: raw.schedule,
    verbose: raw.verbose ?? false,
    dryRun: raw.dryRun ?? false
  };
}

/**
 * Parses argv into CLI options. Commander exits on --help, --version and bad arguments.
 */
export function parseCliOptions(argv: readonly string[], program: Command = createProgram()): CliOptions {
  program.parse([...argv]);
  return toCliOptions(program.opts<RawCliOptions>());
}

async function loadRunPlan(options: CliOptions): Promise<{ instances: InstanceConfig[]; schedule: RunSchedule }> {
  if (options.config) {
    const fileConfig = await configService.loadConfigFile(options.config);
    return {
      instances: configService.createInstancesFromConfig(fileConfig, options),
      schedule: configService.resolveRunSettings(options, fileConfig)
    };
  }
  return {
    instances: [configService.createInstanceFromOptions(options)],
    schedule: configService.resolveRunSettings(options)
  };
}

/**
 * Runs the collector. Resolves with the process exit code, or null when the
 * collector keeps running on a schedule.
 */
export async function runCli(argv: readonly string[] = process.argv): Promise<number | null> {
  const program = createProgram();
  const options = parseCliOptions(argv, program);

  if (options.verbose) {
    updateLogLevel('debug');
  }

  if (!options.config && (!options.url || !options.apiKey)) {
    logger.error('❌ Either --config or both --url and --api-key are required');
    program.outputHelp();
    return 1;
  }

  let plan: { instances: InstanceConfig[]; schedule: RunSchedule };
  try {
    plan = await loadRunPlan(options);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      logger.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  logger.info(`🚀 ${APP_NAME} v${APP_VERSION}`);
  logger.info(`📋 Loaded ${plan.instances.length} instance(s)`);

  const scheduler = new SchedulerService(plan.instances);
  const shutdown = (signal: string) => {
    logger.info('📴 Shutting down...', { signal });
    scheduler.logRunSummary();
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  switch (plan.schedule.mode) {
    case 'once': {
      const success = await scheduler.runOnce();
      logger.info('🏁 Done!');
      return success ? 0 : 1;
    }
    case 'interval':
      await scheduler.startInterval(plan.schedule.seconds);
      return 0;
    case 'cron': {
      scheduler.startCron(plan.schedule.expression, plan.schedule.timezone);
      // First cycle runs right away, later ones on the schedule
      await scheduler.runOnce();
      const { nextRun } = scheduler.getStatus();
      logger.info('⏰ Waiting for next scheduled run', { nextRun });
      return null;
    }
  }
}

export function reportFatalError(error: unknown): void {
  const { message, name, stack } = getErrorDetails(error);
  logger.error('❌ Collector failed', { error: message, errorName: name, stack });
}
