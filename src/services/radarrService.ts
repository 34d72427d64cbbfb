import { BaseStarrService, sumBy } from './baseStarrService.js';
import { formatBytes } from '../utils/formatUtils.js';
import type { EmptyStats, RadarrStats } from '../types/payload.js';
import type { RadarrMovie, StarrCalendarRecord, StarrRecord } from '../types/starr.js';
import type { StarrApiClient } from './starrApiClient.js';

export class RadarrService extends BaseStarrService {
  readonly appType = 'radarr' as const;
  protected readonly appName = 'Radarr';
  protected readonly apiVersion = 'v3' as const;
  protected readonly includeParams = { includeMovie: true };
  protected readonly calendarIncludeParams = {};

  protected getRecordTitle(record: StarrRecord): string | undefined {
    if (!record.movie) {
      return undefined;
    }
    return `${record.movie.title ?? 'Unknown'} (${record.movie.year ?? ''})`;
  }

  protected getCalendarTitle(record: StarrCalendarRecord): string {
    return `${record.title ?? 'Unknown'} (${record.year ?? ''})`;
  }

  // Digital release first, then physical, then cinema
  protected getCalendarDate(record: StarrCalendarRecord): string | undefined {
    return record.digitalRelease || record.physicalRelease || record.inCinemas;
  }

  async getStats(client: StarrApiClient): Promise<RadarrStats | EmptyStats> {
    const movies = await client.get<RadarrMovie[]>(this.endpoint('movie'));
    if (!Array.isArray(movies) || movies.length === 0) {
      return {};
    }

    const monitoredMissing = await this.getMonitoredMissing(client);
    const onDisk = movies.filter(movie => movie?.hasFile === true).length;
    const librarySize = sumBy(movies, movie => movie?.sizeOnDisk);

    this.logger.debug(`📊 [Radarr] Stats computed for ${movies.length} movies`);
    return {
      total_movies: movies.length,
      movies_on_disk: onDisk,
      movies_missing: movies.length - onDisk,
      monitored_missing: monitoredMissing,
      library_size_bytes: librarySize,
      library_size_formatted: formatBytes(librarySize)
    };
  }
}

export const radarrService = new RadarrService();
