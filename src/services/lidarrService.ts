import { BaseStarrService, sumBy } from './baseStarrService.js';
import { formatBytes } from '../utils/formatUtils.js';
import type { EmptyStats, LidarrStats } from '../types/payload.js';
import type { LidarrArtist, StarrCalendarRecord, StarrRecord } from '../types/starr.js';
import type { StarrApiClient } from './starrApiClient.js';

export class LidarrService extends BaseStarrService {
  readonly appType = 'lidarr' as const;
  protected readonly appName = 'Lidarr';
  protected readonly apiVersion = 'v1' as const;
  protected readonly includeParams = { includeArtist: true, includeAlbum: true };
  protected readonly calendarIncludeParams = { includeArtist: true };

  protected getRecordTitle(record: StarrRecord): string | undefined {
    if (!record.artist) {
      return undefined;
    }
    return `${record.artist.artistName ?? 'Unknown'} - ${record.album?.title ?? 'Unknown Album'}`;
  }

  protected getCalendarTitle(record: StarrCalendarRecord): string {
    return `${record.artist?.artistName ?? 'Unknown'} - ${record.title ?? 'Unknown'}`;
  }

  protected getCalendarDate(record: StarrCalendarRecord): string | undefined {
    return record.releaseDate;
  }

  async getStats(client: StarrApiClient): Promise<LidarrStats | EmptyStats> {
    const artists = await client.get<LidarrArtist[]>(this.endpoint('artist'));
    if (!Array.isArray(artists) || artists.length === 0) {
      return {};
    }

    const monitoredMissing = await this.getMonitoredMissing(client);
    const librarySize = sumBy(artists, artist => artist?.statistics?.sizeOnDisk);

    this.logger.debug(`📊 [Lidarr] Stats computed for ${artists.length} artists`);
    return {
      total_artists: artists.length,
      total_albums: sumBy(artists, artist => artist?.statistics?.albumCount),
      total_tracks: sumBy(artists, artist => artist?.statistics?.trackCount),
      monitored_missing: monitoredMissing,
      library_size_bytes: librarySize,
      library_size_formatted: formatBytes(librarySize)
    };
  }
}

export const lidarrService = new LidarrService();
