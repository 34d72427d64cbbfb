import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import logger from '../utils/logger.js';
import { ConfigError, getErrorMessage } from '../utils/errorUtils.js';
import { configFileSchema, validateCronExpression, type CollectorFileConfig } from '../schemas/config.js';
import { isAppType } from '../types/constants.js';
import type { CliOptions, InstanceConfig, RunSchedule } from '../types/config.js';

/**
 * Loads the YAML config file and turns config or CLI options into frozen
 * instance configurations and run settings.
 */
class ConfigService {
  async loadConfigFile(configPath: string): Promise<CollectorFileConfig> {
    logger.debug('📄 Loading config file', { configPath });

    let text: string;
    try {
      text = await fs.readFile(configPath, 'utf-8');
    } catch (error: unknown) {
      throw new ConfigError(`Failed to load config: ${getErrorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (error: unknown) {
      throw new ConfigError(`Failed to parse config ${configPath}: ${getErrorMessage(error)}`);
    }

    const config = this.parseConfig(raw, configPath);
    logger.debug('✅ Config file loaded', { configPath, instances: config.instances.length });
    return config;
  }

  parseConfig(raw: unknown, source = 'config'): CollectorFileConfig {
    const result = configFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(issue => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      });
      throw new ConfigError(`Invalid configuration in ${source}`, issues);
    }
    return result.data;
  }

  /**
   * Timezone precedence: config file, then CLI, then the TZ environment variable
   */
  resolveTimezone(configTimezone: string | undefined, cliTimezone: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
    return configTimezone || cliTimezone || env.TZ || undefined;
  }

  createInstancesFromConfig(config: CollectorFileConfig, options: CliOptions, env: NodeJS.ProcessEnv = process.env): InstanceConfig[] {
    const timezone = this.resolveTimezone(config.timezone, options.timezone, env);

    return config.instances.map(instance => Object.freeze({
      name: instance.name ?? instance.url,
      url: instance.url,
      apiKey: instance.api_key,
      webhook: instance.webhook,
      appType: instance.type,
      calendarDays: instance.calendar_days ?? config.defaults.calendar_days,
      calendarDaysBefore: instance.calendar_days_before ?? config.defaults.calendar_days_before,
      calendarOnly: instance.calendar_only,
      timezone,
      verbose: options.verbose,
      dryRun: options.dryRun
    }));
  }

  createInstanceFromOptions(options: CliOptions, env: NodeJS.ProcessEnv = process.env): InstanceConfig {
    if (!options.url || !options.apiKey) {
      throw new ConfigError('Either --config or both --url and --api-key are required');
    }

    const type = options.type?.trim().toLowerCase();
    if (type !== undefined && type !== '' && !isAppType(type)) {
      throw new ConfigError(`Unsupported app type: ${options.type}`);
    }
    const appType = type && isAppType(type) ? type : undefined;

    return Object.freeze({
      name: appType ?? 'servarr',
      url: options.url,
      apiKey: options.apiKey,
      webhook: options.webhook || undefined,
      appType,
      calendarDays: options.days,
      calendarDaysBefore: options.daysBefore,
      calendarOnly: options.calendarOnly,
      timezone: this.resolveTimezone(undefined, options.timezone, env),
      verbose: options.verbose,
      dryRun: options.dryRun
    });
  }

  /**
   * Config file values win over CLI values. A schedule wins over an interval.
   */
  resolveRunSettings(options: CliOptions, config?: CollectorFileConfig, env: NodeJS.ProcessEnv = process.env): RunSchedule {
    const schedule = config?.schedule ?? options.schedule;
    const interval = config?.interval ?? options.interval;
    const timezone = this.resolveTimezone(config?.timezone, options.timezone, env);

    if (schedule) {
      validateCronExpression(schedule, timezone);
      return { mode: 'cron', expression: schedule, timezone };
    }
    if (!Number.isInteger(interval) || interval < 0) {
      throw new ConfigError(`Invalid interval: ${interval} (expected a whole number of seconds, 0 to run once)`);
    }
    if (interval > 0) {
      return { mode: 'interval', seconds: interval };
    }
    return { mode: 'once' };
  }
}

export const configService = new ConfigService();
