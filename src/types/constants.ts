/**
 * Application type constants
 */
export const APP_NAME = 'starr-collector';
export const APP_VERSION = '2.0.0';

export const APP_TYPES = ['sonarr', 'radarr', 'lidarr', 'readarr', 'prowlarr'] as const;
export type AppType = typeof APP_TYPES[number];

export type ApiVersion = 'v1' | 'v3';

export function isAppType(value: string): value is AppType {
  return APP_TYPES.some(appType => appType === value);
}

/** Longest sleep setTimeout can hold (2^31 - 1 ms) */
export const MAX_INTERVAL_SECONDS = 2_147_483;

/** Per-request deadline for upstream and webhook calls */
export const REQUEST_TIMEOUT_MS = 30_000;

export const QUEUE_PAGE_SIZE = 20;
export const QUEUE_DISPLAY_LIMIT = 10;
export const CALENDAR_DISPLAY_LIMIT = 10;
export const HISTORY_PAGE_SIZE = 50;
export const RECENTLY_ADDED_LIMIT = 10;
export const RECENTLY_ADDED_DISPLAY_LIMIT = 6;

export const DEFAULT_CALENDAR_DAYS = 7;
export const DEFAULT_CALENDAR_DAYS_BEFORE = 0;

/** History event type that marks a completed import */
export const IMPORTED_EVENT_TYPE = 'downloadFolderImported';
