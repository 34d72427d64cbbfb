import { BaseStarrService, sumBy } from './baseStarrService.js';
import { formatBytes, padNumber } from '../utils/formatUtils.js';
import type { EmptyStats, SonarrStats } from '../types/payload.js';
import type { SonarrSeries, StarrCalendarRecord, StarrRecord } from '../types/starr.js';
import type { StarrApiClient } from './starrApiClient.js';

function episodeTag(seasonNumber: number | undefined, episodeNumber: number | undefined): string {
  return `S${padNumber(seasonNumber)}E${padNumber(episodeNumber)}`;
}

export class SonarrService extends BaseStarrService {
  readonly appType = 'sonarr' as const;
  protected readonly appName = 'Sonarr';
  protected readonly apiVersion = 'v3' as const;
  protected readonly includeParams = { includeSeries: true, includeEpisode: true };
  protected readonly calendarIncludeParams = { includeSeries: true };

  protected getRecordTitle(record: StarrRecord): string | undefined {
    if (!record.series) {
      return undefined;
    }
    const tag = episodeTag(record.episode?.seasonNumber, record.episode?.episodeNumber);
    return `${record.series.title ?? 'Unknown'} [${tag}]`;
  }

  protected getCalendarTitle(record: StarrCalendarRecord): string {
    return `${record.series?.title ?? 'Unknown'} [${episodeTag(record.seasonNumber, record.episodeNumber)}]`;
  }

  protected getCalendarDate(record: StarrCalendarRecord): string | undefined {
    return record.airDateUtc || record.airDate;
  }

  protected getCalendarNetwork(record: StarrCalendarRecord): string | null {
    return record.series?.network || null;
  }

  async getStats(client: StarrApiClient): Promise<SonarrStats | EmptyStats> {
    const series = await client.get<SonarrSeries[]>(this.endpoint('series'));
    if (!Array.isArray(series) || series.length === 0) {
      return {};
    }

    const monitoredMissing = await this.getMonitoredMissing(client);
    const totalEpisodes = sumBy(series, s => s?.statistics?.totalEpisodeCount);
    const episodesOnDisk = sumBy(series, s => s?.statistics?.episodeFileCount);
    const librarySize = sumBy(series, s => s?.statistics?.sizeOnDisk);

    this.logger.debug(`📊 [Sonarr] Stats computed for ${series.length} series`);
    return {
      total_series: series.length,
      total_episodes: totalEpisodes,
      episodes_on_disk: episodesOnDisk,
      episodes_missing: totalEpisodes - episodesOnDisk,
      monitored_missing: monitoredMissing,
      library_size_bytes: librarySize,
      library_size_formatted: formatBytes(librarySize)
    };
  }
}

export const sonarrService = new SonarrService();
