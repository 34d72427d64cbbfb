import axios, { AxiosInstance } from 'axios';
import { ApiVersion, AppType, REQUEST_TIMEOUT_MS } from '../types/constants.js';
import { capitalize } from './formatUtils.js';

/**
 * Creates an axios client for Starr API calls
 */
export function createStarrClient(url: string, apiKey: string, timeoutMs: number = REQUEST_TIMEOUT_MS): AxiosInstance {
  return axios.create({
    baseURL: url,
    timeout: timeoutMs,
    headers: {
      'X-Api-Key': apiKey,
      'Content-Type': 'application/json'
    }
  });
}

/**
 * Sonarr and Radarr speak API v3, Lidarr, Readarr and Prowlarr speak v1
 */
export function getApiVersion(appType: AppType): ApiVersion {
  return appType === 'sonarr' || appType === 'radarr' ? 'v3' : 'v1';
}

/**
 * Display name for an app type: 'sonarr' -> 'Sonarr'
 */
export function getAppDisplayName(appType: AppType): string {
  return capitalize(appType);
}

/**
 * Removes trailing slashes so paths can be appended safely
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '');
}
