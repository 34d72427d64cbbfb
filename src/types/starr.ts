/**
 * Upstream response shapes for the Servarr family (Sonarr, Radarr, Lidarr, Readarr, Prowlarr).
 * Only the fields the collector reads are declared, and all of them are optional:
 * upstream builds omit fields freely and a missing field must never fail a cycle.
 */

export interface StarrSystemStatus {
  appName?: string;
  instanceName?: string;
  version?: string;
}

export interface StarrHealthCheck {
  source?: string;
  type?: 'ok' | 'notice' | 'warning' | 'error' | string;
  message?: string;
}

export interface StarrPaginatedResponse<T> {
  page?: number;
  pageSize?: number;
  totalRecords?: number;
  records?: T[];
}

export interface StarrQuality {
  quality?: {
    id?: number;
    name?: string;
  };
}

// ============================================================================
// Related entities (embedded via include* query parameters)
// ============================================================================

export interface SonarrSeries {
  id?: number;
  title?: string;
  network?: string;
  statistics?: {
    totalEpisodeCount?: number;
    episodeFileCount?: number;
    sizeOnDisk?: number;
  };
}

export interface SonarrEpisode {
  id?: number;
  seasonNumber?: number;
  episodeNumber?: number;
  title?: string;
}

export interface RadarrMovie {
  id?: number;
  title?: string;
  year?: number;
  hasFile?: boolean;
  sizeOnDisk?: number;
}

export interface LidarrArtist {
  id?: number;
  artistName?: string;
  statistics?: {
    albumCount?: number;
    trackCount?: number;
    sizeOnDisk?: number;
  };
}

export interface LidarrAlbum {
  id?: number;
  title?: string;
}

export interface ReadarrAuthor {
  id?: number;
  authorName?: string;
  statistics?: {
    bookFileCount?: number;
    sizeOnDisk?: number;
  };
}

export interface ReadarrBook {
  id?: number;
  title?: string;
  statistics?: {
    bookFileCount?: number;
  };
}

// ============================================================================
// Queue, history and calendar records
// ============================================================================

/**
 * Queue or history record. Which related entities are present depends on the
 * application and the include parameters of the request.
 */
export interface StarrRecord {
  id?: number;
  title?: string;
  sourceTitle?: string;
  size?: number;
  sizeleft?: number;
  timeleft?: string;
  status?: string;
  eventType?: string;
  date?: string;
  quality?: StarrQuality;
  series?: SonarrSeries;
  episode?: SonarrEpisode;
  movie?: RadarrMovie;
  artist?: LidarrArtist;
  album?: LidarrAlbum;
  author?: ReadarrAuthor;
  book?: ReadarrBook;
}

/**
 * Calendar entry: an episode (Sonarr), movie (Radarr), album (Lidarr) or book (Readarr)
 */
export interface StarrCalendarRecord {
  id?: number;
  title?: string;
  year?: number;
  seasonNumber?: number;
  episodeNumber?: number;
  airDate?: string;
  airDateUtc?: string;
  inCinemas?: string;
  physicalRelease?: string;
  digitalRelease?: string;
  releaseDate?: string;
  series?: SonarrSeries;
  artist?: LidarrArtist;
  author?: ReadarrAuthor;
}

// ============================================================================
// Prowlarr
// ============================================================================

export interface ProwlarrIndexer {
  id?: number;
  name?: string;
  enable?: boolean;
}

export interface ProwlarrIndexerStats {
  indexerId?: number;
  indexerName?: string;
  numberOfQueries?: number;
  numberOfGrabs?: number;
  numberOfFailedQueries?: number;
  numberOfFailedGrabs?: number;
}

export interface ProwlarrIndexerStatsResponse {
  indexers?: ProwlarrIndexerStats[];
}
