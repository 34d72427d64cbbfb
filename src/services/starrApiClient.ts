import { isAxiosError } from 'axios';
import defaultLogger, { type Logger } from '../utils/logger.js';
import { createStarrClient, normalizeBaseUrl } from '../utils/starrUtils.js';
import {
  getErrorMessage,
  StarrAuthenticationError,
  StarrConnectionError,
  StarrRequestError
} from '../utils/errorUtils.js';
import { REQUEST_TIMEOUT_MS } from '../types/constants.js';

export type QueryParams = Record<string, string | number | boolean>;

export interface StarrRequestConfig {
  params?: QueryParams;
}

/** The part of an axios instance the client needs */
export interface StarrHttp {
  get<T>(url: string, config?: StarrRequestConfig): Promise<{ data: T }>;
}

export interface StarrApiClientOptions {
  /** Pre-built HTTP client (tests pass an in-process fake) */
  http?: StarrHttp;
  /** Log swallowed request failures at error level instead of debug */
  verbose?: boolean;
  logger?: Logger;
  timeoutMs?: number;
}

const HOST_NOT_FOUND_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Authenticated read client for one Servarr instance.
 *
 * `getOrThrow` raises classified errors and is used for app-type detection;
 * `get` turns every failure into `undefined` so one broken endpoint only empties
 * its own payload section. Requests are never retried.
 */
export class StarrApiClient {
  readonly baseUrl: string;
  private readonly http: StarrHttp;
  private readonly verbose: boolean;
  private readonly logger: Logger;

  constructor(url: string, apiKey: string, options: StarrApiClientOptions = {}) {
    this.baseUrl = normalizeBaseUrl(url);
    this.http = options.http ?? createStarrClient(this.baseUrl, apiKey, options.timeoutMs ?? REQUEST_TIMEOUT_MS);
    this.verbose = options.verbose ?? false;
    this.logger = options.logger ?? defaultLogger;
  }

  async getOrThrow<T>(endpoint: string, params?: QueryParams): Promise<T> {
    this.logger.debug(`📡 GET ${endpoint}`, { url: this.baseUrl, params });
    try {
      const response = await this.http.get<T>(endpoint, params ? { params } : undefined);
      return response.data;
    } catch (error: unknown) {
      throw this.classifyError(error, endpoint);
    }
  }

  async get<T>(endpoint: string, params?: QueryParams): Promise<T | undefined> {
    try {
      return await this.getOrThrow<T>(endpoint, params);
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      if (error instanceof StarrAuthenticationError) {
        this.logger.error(`❌ ${message}`, { endpoint });
      } else if (this.verbose) {
        this.logger.error(`❌ API request failed: ${message}`, { endpoint, url: this.baseUrl });
      } else {
        this.logger.debug(`API request failed: ${message}`, { endpoint, url: this.baseUrl });
      }
      return undefined;
    }
  }

  private classifyError(error: unknown, endpoint: string): Error {
    if (!isAxiosError(error)) {
      return new StarrRequestError(`API request failed for ${endpoint}: ${getErrorMessage(error)}`, undefined, { cause: error });
    }

    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new StarrAuthenticationError(
        `Authentication failed for ${this.baseUrl}: Invalid API key (HTTP ${status})`,
        status,
        { cause: error }
      );
    }
    if (status !== undefined) {
      return new StarrRequestError(`API request failed for ${endpoint}: HTTP ${status}`, status, { cause: error });
    }

    const code = error.code ?? '';
    const prefix = `Cannot connect to ${this.baseUrl}`;
    if (TIMEOUT_CODES.has(code)) {
      return new StarrConnectionError(`${prefix}: Request timed out`, 'timeout', { cause: error });
    }
    if (HOST_NOT_FOUND_CODES.has(code)) {
      return new StarrConnectionError(`${prefix}: Host not found (check URL)`, 'host_not_found', { cause: error });
    }
    if (code === 'ECONNREFUSED') {
      return new StarrConnectionError(`${prefix}: Connection refused (is the service running?)`, 'connection_refused', { cause: error });
    }
    return new StarrConnectionError(`${prefix}: ${error.message}`, 'network', { cause: error });
  }
}
