import axios, { isAxiosError } from 'axios';
import defaultLogger, { type Logger } from '../utils/logger.js';
import { getErrorMessage, SendError } from '../utils/errorUtils.js';
import { REQUEST_TIMEOUT_MS } from '../types/constants.js';
import type { InstanceConfig } from '../types/config.js';
import type { CollectionPayload } from '../types/payload.js';

export interface WebhookRequestConfig {
  headers: Record<string, string>;
  timeout: number;
}

/** The part of an axios instance the sender needs */
export interface WebhookHttp {
  post(url: string, data: string, config: WebhookRequestConfig): Promise<{ status: number }>;
}

export interface WebhookServiceOptions {
  http?: WebhookHttp;
  logger?: Logger;
  /** Sink for dry-run output */
  write?: (text: string) => void;
}

function toSendError(error: unknown): SendError {
  if (isAxiosError(error) && error.response) {
    return new SendError(`HTTP ${error.response.status}`, error.response.status, { cause: error });
  }
  return new SendError(getErrorMessage(error), undefined, { cause: error });
}

function describeBody(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Delivers payloads to the configured webhook, or prints them on a dry run
 */
export class WebhookService {
  private readonly http: WebhookHttp;
  private readonly logger: Logger;
  private readonly write: (text: string) => void;

  constructor(options: WebhookServiceOptions = {}) {
    this.http = options.http ?? axios;
    this.logger = options.logger ?? defaultLogger;
    this.write = options.write ?? (text => process.stdout.write(`${text}\n`));
  }

  /**
   * Returns true when the payload was delivered (or printed). Never retries.
   */
  async send(instance: InstanceConfig, payload: CollectionPayload): Promise<boolean> {
    const body = JSON.stringify(payload);

    if (instance.verbose) {
      this.logger.info(`📦 [${instance.name}] Payload size: ${Buffer.byteLength(body)} bytes`);
    }

    if (instance.dryRun || !instance.webhook) {
      this.write(JSON.stringify(payload, null, 2));
      return true;
    }

    this.logger.info(`📤 [${instance.name}] Sending data to webhook`);
    try {
      const response = await this.http.post(instance.webhook, body, {
        headers: { 'Content-Type': 'application/json' },
        timeout: REQUEST_TIMEOUT_MS
      });
      this.logger.info(`✅ [${instance.name}] Successfully sent data (HTTP ${response.status})`);
      return true;
    } catch (error: unknown) {
      const sendError = toSendError(error);
      this.logger.error(`❌ [${instance.name}] Failed to send data: ${sendError.message}`);
      if (instance.verbose && isAxiosError(error) && error.response) {
        this.logger.error(`❌ [${instance.name}] Response: ${describeBody(error.response.data)}`);
      }
      return false;
    }
  }
}

export const webhookService = new WebhookService();
