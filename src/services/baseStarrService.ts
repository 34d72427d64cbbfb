import defaultLogger, { type Logger } from '../utils/logger.js';
import { calculateProgress, formatRelativeTime } from '../utils/formatUtils.js';
import { CalendarWindow, daysBetween, extractDate } from '../utils/dateUtils.js';
import {
  ApiVersion,
  AppType,
  CALENDAR_DISPLAY_LIMIT,
  HISTORY_PAGE_SIZE,
  IMPORTED_EVENT_TYPE,
  QUEUE_DISPLAY_LIMIT,
  QUEUE_PAGE_SIZE,
  RECENTLY_ADDED_DISPLAY_LIMIT,
  RECENTLY_ADDED_LIMIT
} from '../types/constants.js';
import type {
  CalendarItem,
  HealthSection,
  ListSection,
  QueueItem,
  RecentlyAddedItem,
  StatsSection
} from '../types/payload.js';
import type {
  StarrCalendarRecord,
  StarrHealthCheck,
  StarrPaginatedResponse,
  StarrRecord
} from '../types/starr.js';
import type { QueryParams, StarrApiClient } from './starrApiClient.js';

export function emptySection<T>(): ListSection<T> {
  return { count: 0, items: [] };
}

export function sumBy<T>(items: readonly T[], selector: (item: T) => number | undefined): number {
  return items.reduce((total, item) => total + (selector(item) ?? 0), 0);
}

/**
 * Base class for the per-application normalizers.
 * Implements the shared fetch-and-normalize algorithms; subclasses supply the
 * application-specific titles, date fields, include parameters and stats.
 */
export abstract class BaseStarrService {
  abstract readonly appType: AppType;
  protected abstract readonly appName: string;
  protected abstract readonly apiVersion: ApiVersion;
  /** Eager-load parameters for queue and history requests */
  protected abstract readonly includeParams: QueryParams;
  /** Eager-load parameters for calendar requests */
  protected abstract readonly calendarIncludeParams: QueryParams;

  protected readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  protected endpoint(resource: string): string {
    return `/api/${this.apiVersion}/${resource}`;
  }

  /**
   * Title built from the related entity embedded in a queue or history record,
   * or undefined when the entity was not included
   */
  protected abstract getRecordTitle(record: StarrRecord): string | undefined;

  protected abstract getCalendarTitle(record: StarrCalendarRecord): string;

  /**
   * Most relevant release/air date of a calendar record
   */
  protected abstract getCalendarDate(record: StarrCalendarRecord): string | undefined;

  protected getCalendarNetwork(_record: StarrCalendarRecord): string | null {
    return null;
  }

  /**
   * Library statistics computed over the full upstream listing
   */
  abstract getStats(client: StarrApiClient): Promise<StatsSection>;

  /**
   * Health state: no entries -> ok, any error entry -> error, otherwise warning
   */
  async getHealth(client: StarrApiClient): Promise<HealthSection> {
    const data = await client.get<StarrHealthCheck[]>(this.endpoint('health'));

    if (!Array.isArray(data) || data.length === 0) {
      return { status: 'ok' };
    }

    const hasError = data.some(check => check?.type === 'error');
    this.logger.debug(`🩺 [${this.appName}] ${data.length} health check(s) reported`, { hasError });
    return { status: hasError ? 'error' : 'warning' };
  }

  async getQueue(client: StarrApiClient): Promise<ListSection<QueueItem>> {
    const data = await client.get<StarrPaginatedResponse<StarrRecord>>(this.endpoint('queue'), {
      pageSize: QUEUE_PAGE_SIZE,
      includeUnknownSeriesItems: false,
      ...this.includeParams
    });

    if (!data) {
      return emptySection();
    }

    const records = Array.isArray(data.records) ? data.records : [];
    const count = typeof data.totalRecords === 'number' ? data.totalRecords : records.length;
    const items = records.slice(0, QUEUE_DISPLAY_LIMIT).map(record => this.formatQueueItem(record));

    this.logger.debug(`📥 [${this.appName}] Queue fetched`, { count, shown: items.length });
    return { count, items };
  }

  async getCalendar(client: StarrApiClient, today: string, window: CalendarWindow): Promise<ListSection<CalendarItem>> {
    const data = await client.get<StarrCalendarRecord[]>(this.endpoint('calendar'), {
      start: window.start,
      end: window.end,
      unmonitored: false,
      ...this.calendarIncludeParams
    });

    if (!Array.isArray(data)) {
      return emptySection();
    }

    const items = data.slice(0, CALENDAR_DISPLAY_LIMIT).map(record => this.formatCalendarItem(record, today));

    this.logger.debug(`📅 [${this.appName}] Calendar fetched`, { ...window, count: data.length, shown: items.length });
    return { count: data.length, items };
  }

  async getRecentlyAdded(client: StarrApiClient, now: Date): Promise<ListSection<RecentlyAddedItem>> {
    const data = await client.get<StarrPaginatedResponse<StarrRecord>>(this.endpoint('history'), {
      pageSize: HISTORY_PAGE_SIZE,
      sortKey: 'date',
      sortDirection: 'descending',
      ...this.includeParams
    });

    if (!data || !Array.isArray(data.records) || data.records.length === 0) {
      return emptySection();
    }

    const imported = data.records
      .filter(record => record?.eventType === IMPORTED_EVENT_TYPE)
      .slice(0, RECENTLY_ADDED_LIMIT);
    const items = imported
      .slice(0, RECENTLY_ADDED_DISPLAY_LIMIT)
      .map(record => this.formatRecentlyAddedItem(record, now));

    this.logger.debug(`🆕 [${this.appName}] Recently added fetched`, { history: data.records.length, imported: imported.length });
    return { count: imported.length, items };
  }

  protected formatQueueItem(record: StarrRecord): QueueItem {
    return {
      title: this.getRecordTitle(record) ?? record.title ?? 'Unknown',
      quality: record.quality?.quality?.name ?? 'Unknown',
      status: record.status ?? 'unknown',
      progress: calculateProgress(record.size, record.sizeleft),
      eta: record.timeleft ?? 'pending'
    };
  }

  protected formatCalendarItem(record: StarrCalendarRecord, today: string): CalendarItem {
    const airDateTime = this.getCalendarDate(record) || null;
    const airDate = extractDate(airDateTime);

    return {
      title: this.getCalendarTitle(record),
      air_date: airDate,
      // An unparsable date keeps the item but drops both date fields
      air_date_time: airDate ? airDateTime : null,
      network: this.getCalendarNetwork(record),
      days_until: airDate ? daysBetween(today, airDate) : 0
    };
  }

  protected formatRecentlyAddedItem(record: StarrRecord, now: Date): RecentlyAddedItem {
    return {
      title: this.getRecordTitle(record) ?? record.sourceTitle ?? 'Unknown',
      time_ago: formatRelativeTime(record.date, now)
    };
  }

  /**
   * Number of monitored items without a file, 0 when unavailable
   */
  protected async getMonitoredMissing(client: StarrApiClient): Promise<number> {
    const wanted = await client.get<StarrPaginatedResponse<unknown>>(this.endpoint('wanted/missing'), { pageSize: 1 });
    return typeof wanted?.totalRecords === 'number' ? wanted.totalRecords : 0;
  }
}
