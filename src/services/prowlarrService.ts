import { BaseStarrService, emptySection, sumBy } from './baseStarrService.js';
import type { CalendarItem, ListSection, ProwlarrStats, QueueItem, RecentlyAddedItem } from '../types/payload.js';
import type { ProwlarrIndexer, ProwlarrIndexerStatsResponse, StarrCalendarRecord } from '../types/starr.js';
import type { StarrApiClient } from './starrApiClient.js';

/**
 * Prowlarr manages indexers, not media: it has no queue, calendar or import
 * history, so those sections are always empty and never requested.
 */
export class ProwlarrService extends BaseStarrService {
  readonly appType = 'prowlarr' as const;
  protected readonly appName = 'Prowlarr';
  protected readonly apiVersion = 'v1' as const;
  protected readonly includeParams = {};
  protected readonly calendarIncludeParams = {};

  protected getRecordTitle(): string | undefined {
    return undefined;
  }

  protected getCalendarTitle(record: StarrCalendarRecord): string {
    return record.title ?? 'Unknown';
  }

  protected getCalendarDate(): string | undefined {
    return undefined;
  }

  async getQueue(): Promise<ListSection<QueueItem>> {
    return emptySection();
  }

  async getCalendar(): Promise<ListSection<CalendarItem>> {
    return emptySection();
  }

  async getRecentlyAdded(): Promise<ListSection<RecentlyAddedItem>> {
    return emptySection();
  }

  async getStats(client: StarrApiClient): Promise<ProwlarrStats> {
    const indexerData = await client.get<ProwlarrIndexer[]>(this.endpoint('indexer'));
    const statsData = await client.get<ProwlarrIndexerStatsResponse>(this.endpoint('indexerstats'));

    const indexers = Array.isArray(indexerData) ? indexerData : [];
    const statsList = statsData?.indexers;
    const indexerStats = Array.isArray(statsList) ? statsList : [];

    this.logger.debug(`📊 [Prowlarr] Stats computed for ${indexers.length} indexers`);
    return {
      total_indexers: indexers.length,
      enabled_indexers: indexers.filter(indexer => indexer?.enable === true).length,
      total_grabs: sumBy(indexerStats, stats => stats?.numberOfGrabs),
      total_queries: sumBy(indexerStats, stats => stats?.numberOfQueries),
      failed_grabs: sumBy(indexerStats, stats => stats?.numberOfFailedGrabs),
      failed_queries: sumBy(indexerStats, stats => stats?.numberOfFailedQueries)
    };
  }
}

export const prowlarrService = new ProwlarrService();
