import defaultLogger, { type Logger } from '../utils/logger.js';
import { getServiceForApp } from '../utils/serviceRegistry.js';
import { getAppDisplayName } from '../utils/starrUtils.js';
import { getCalendarWindow, toDateString } from '../utils/dateUtils.js';
import { getTimezoneAbbreviation } from '../utils/timezoneUtils.js';
import { resolveAppType } from './appTypeResolver.js';
import { StarrApiClient } from './starrApiClient.js';
import type { InstanceConfig } from '../types/config.js';
import type { CollectionPayload } from '../types/payload.js';

export type StarrClientFactory = (instance: InstanceConfig, logger: Logger) => StarrApiClient;

export interface InstanceCollectorOptions {
  logger?: Logger;
  now?: () => Date;
  createClient?: StarrClientFactory;
}

const defaultClientFactory: StarrClientFactory = (instance, logger) =>
  new StarrApiClient(instance.url, instance.apiKey, { verbose: instance.verbose, logger });

/**
 * UTC timestamp without milliseconds: 2024-05-01T12:00:00Z
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Builds the webhook payload for one instance
 */
export class InstanceCollector {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly createClient: StarrClientFactory;

  constructor(options: InstanceCollectorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.createClient = options.createClient ?? defaultClientFactory;
  }

  /**
   * Detection errors propagate; section fetch failures only empty their section.
   */
  async collect(instance: InstanceConfig): Promise<CollectionPayload> {
    this.logger.info(`🔍 [${instance.name}] Collecting data from ${instance.url}`);

    const client = this.createClient(instance, this.logger);
    const { appType, apiVersion } = await resolveAppType(instance, client, this.logger);
    this.logger.info(`✅ [${instance.name}] App type: ${appType}, API version: ${apiVersion}`);

    const service = getServiceForApp(appType, this.logger);
    const now = this.now();
    const today = toDateString(now, instance.timezone);
    const window = getCalendarWindow(today, instance.calendarDaysBefore, instance.calendarDays);

    const header = {
      app_name: getAppDisplayName(appType),
      app_type: appType,
      last_updated: formatTimestamp(now),
      timezone: getTimezoneAbbreviation(instance.timezone, now, this.logger)
    };

    if (instance.calendarOnly) {
      const calendar = await service.getCalendar(client, today, window);
      return { merge_variables: { ...header, calendar } };
    }

    const queue = await service.getQueue(client);
    const calendar = await service.getCalendar(client, today, window);
    const health = await service.getHealth(client);
    const stats = await service.getStats(client);
    const recentlyAdded = await service.getRecentlyAdded(client, now);

    return {
      merge_variables: {
        ...header,
        health,
        queue,
        calendar,
        stats,
        recently_added: recentlyAdded
      }
    };
  }
}

export const instanceCollector = new InstanceCollector();
