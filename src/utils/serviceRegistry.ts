import { SonarrService, sonarrService } from '../services/sonarrService.js';
import { RadarrService, radarrService } from '../services/radarrService.js';
import { LidarrService, lidarrService } from '../services/lidarrService.js';
import { ReadarrService, readarrService } from '../services/readarrService.js';
import { ProwlarrService, prowlarrService } from '../services/prowlarrService.js';
import type { BaseStarrService } from '../services/baseStarrService.js';
import type { AppType } from '../types/constants.js';
import type { Logger } from './logger.js';

type StarrServiceConstructor = new (logger?: Logger) => BaseStarrService;

/**
 * Service registry - single source of truth for service-to-app-type mapping
 */
export const serviceRegistry: Record<AppType, BaseStarrService> = {
  sonarr: sonarrService,
  radarr: radarrService,
  lidarr: lidarrService,
  readarr: readarrService,
  prowlarr: prowlarrService
};

const serviceConstructors: Record<AppType, StarrServiceConstructor> = {
  sonarr: SonarrService,
  radarr: RadarrService,
  lidarr: LidarrService,
  readarr: ReadarrService,
  prowlarr: ProwlarrService
};

/**
 * Get the normalizer for an app type. With a logger, a normalizer that logs
 * to it is built; otherwise the shared instance is returned.
 */
export function getServiceForApp(appType: AppType, logger?: Logger): BaseStarrService {
  return logger ? new serviceConstructors[appType](logger) : serviceRegistry[appType];
}
