import defaultLogger, { type Logger } from '../utils/logger.js';
import { getApiVersion } from '../utils/starrUtils.js';
import {
  DetectionError,
  StarrAuthenticationError,
  StarrConnectionError,
  StarrRequestError
} from '../utils/errorUtils.js';
import { APP_TYPES, ApiVersion, AppType, isAppType } from '../types/constants.js';
import type { InstanceConfig } from '../types/config.js';
import type { StarrSystemStatus } from '../types/starr.js';
import type { StarrApiClient } from './starrApiClient.js';

export interface ResolvedAppType {
  appType: AppType;
  apiVersion: ApiVersion;
}

/**
 * Queries system status, probing v3 first (Sonarr, Radarr) and falling back to
 * v1 (Lidarr, Readarr, Prowlarr) on connection or authentication failures.
 */
async function fetchSystemStatus(client: StarrApiClient): Promise<StarrSystemStatus> {
  try {
    return await client.getOrThrow<StarrSystemStatus>('/api/v3/system/status');
  } catch (error: unknown) {
    if (error instanceof StarrConnectionError) {
      try {
        return await client.getOrThrow<StarrSystemStatus>('/api/v1/system/status');
      } catch (v1Error: unknown) {
        throw new StarrConnectionError(
          `Cannot connect to ${client.baseUrl}: Check URL and ensure service is running`,
          v1Error instanceof StarrConnectionError ? v1Error.reason : error.reason,
          { cause: v1Error }
        );
      }
    }

    if (error instanceof StarrAuthenticationError) {
      try {
        return await client.getOrThrow<StarrSystemStatus>('/api/v1/system/status');
      } catch (v1Error: unknown) {
        if (v1Error instanceof StarrConnectionError || v1Error instanceof StarrAuthenticationError) {
          throw new StarrAuthenticationError(
            `Authentication failed for ${client.baseUrl}: Check API key`,
            error.status,
            { cause: v1Error }
          );
        }
        throw v1Error;
      }
    }

    // v1-only apps answer the v3 path with 404
    if (error instanceof StarrRequestError && error.status === 404) {
      return client.getOrThrow<StarrSystemStatus>('/api/v1/system/status');
    }

    throw error;
  }
}

/**
 * Detects the application kind from the system status `appName` field
 */
export async function detectAppType(client: StarrApiClient, logger: Logger = defaultLogger): Promise<AppType> {
  const status = await fetchSystemStatus(client);
  const appName = typeof status?.appName === 'string' ? status.appName.trim().toLowerCase() : '';

  if (!appName) {
    throw new DetectionError(
      `Connected to ${client.baseUrl} but could not detect app type. ` +
      `Please specify with 'type' in config (${APP_TYPES.join(', ')}).`
    );
  }
  if (!isAppType(appName)) {
    throw new DetectionError(
      `Connected to ${client.baseUrl} but '${status.appName}' is not a supported app type. ` +
      `Supported types: ${APP_TYPES.join(', ')}.`
    );
  }

  logger.debug(`🔎 Detected ${appName} from system status`, { url: client.baseUrl, version: status.version });
  return appName;
}

/**
 * Resolves the kind and API version for one collection cycle. A forced type in
 * the instance config skips detection.
 */
export async function resolveAppType(
  instance: InstanceConfig,
  client: StarrApiClient,
  logger: Logger = defaultLogger
): Promise<ResolvedAppType> {
  const appType = instance.appType ?? await detectAppType(client, logger);
  return { appType, apiVersion: getApiVersion(appType) };
}
