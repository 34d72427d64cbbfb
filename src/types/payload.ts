/**
 * Normalized payload types sent to the webhook
 */
import type { AppType } from './constants.js';

export type HealthStatus = 'ok' | 'warning' | 'error';

export interface HealthSection {
  status: HealthStatus;
}

/**
 * A counted list. `count` is the upstream total and may exceed `items.length`.
 */
export interface ListSection<T> {
  count: number;
  items: T[];
}

export interface QueueItem {
  title: string;
  quality: string;
  status: string;
  progress: number;
  eta: string;
}

export interface CalendarItem {
  title: string;
  air_date: string | null;
  air_date_time: string | null;
  network: string | null;
  days_until: number;
}

export interface RecentlyAddedItem {
  title: string;
  time_ago: string;
}

export interface LibrarySize {
  library_size_bytes: number;
  library_size_formatted: string;
}

export interface SonarrStats extends LibrarySize {
  total_series: number;
  total_episodes: number;
  episodes_on_disk: number;
  episodes_missing: number;
  monitored_missing: number;
}

export interface RadarrStats extends LibrarySize {
  total_movies: number;
  movies_on_disk: number;
  movies_missing: number;
  monitored_missing: number;
}

export interface LidarrStats extends LibrarySize {
  total_artists: number;
  total_albums: number;
  total_tracks: number;
  monitored_missing: number;
}

export interface ReadarrStats extends LibrarySize {
  total_authors: number;
  total_books: number;
  books_on_disk: number;
  monitored_missing: number;
}

export interface ProwlarrStats {
  total_indexers: number;
  enabled_indexers: number;
  total_grabs: number;
  total_queries: number;
  failed_grabs: number;
  failed_queries: number;
}

/** Stats section when the library listing could not be fetched */
export type EmptyStats = Record<string, never>;

export type StatsSection = SonarrStats | RadarrStats | LidarrStats | ReadarrStats | ProwlarrStats | EmptyStats;

interface MergeVariablesBase {
  app_name: string;
  app_type: AppType;
  last_updated: string;
  timezone: string;
  calendar: ListSection<CalendarItem>;
}

export interface FullMergeVariables extends MergeVariablesBase {
  health: HealthSection;
  queue: ListSection<QueueItem>;
  stats: StatsSection;
  recently_added: ListSection<RecentlyAddedItem>;
}

export type CalendarOnlyMergeVariables = MergeVariablesBase;

export interface CollectionPayload {
  merge_variables: FullMergeVariables | CalendarOnlyMergeVariables;
}
