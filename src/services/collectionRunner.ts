import defaultLogger, { startOperation, type Logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errorUtils.js';
import { instanceCollector } from './instanceCollector.js';
import { webhookService } from './webhookService.js';
import type { InstanceConfig } from '../types/config.js';
import type { CollectionPayload } from '../types/payload.js';

export interface CollectionFailure {
  name: string;
  reason: string;
}

export interface CollectionResult {
  success: boolean;
  succeeded: number;
  failed: CollectionFailure[];
}

export interface PayloadCollector {
  collect(instance: InstanceConfig): Promise<CollectionPayload>;
}

export interface PayloadSender {
  send(instance: InstanceConfig, payload: CollectionPayload): Promise<boolean>;
}

export interface CollectionRunnerOptions {
  collector?: PayloadCollector;
  sender?: PayloadSender;
  logger?: Logger;
}

export const SEND_FAILURE_REASON = 'Failed to send webhook';

/**
 * Runs one collection cycle over every instance, in order. A failing instance
 * is recorded and never stops the others.
 */
export class CollectionRunner {
  private readonly collector: PayloadCollector;
  private readonly sender: PayloadSender;
  private readonly logger: Logger;

  constructor(options: CollectionRunnerOptions = {}) {
    this.collector = options.collector ?? instanceCollector;
    this.sender = options.sender ?? webhookService;
    this.logger = options.logger ?? defaultLogger;
  }

  async runCollection(instances: readonly InstanceConfig[]): Promise<CollectionResult> {
    const endOperation = startOperation('collection cycle', { instances: instances.length }, this.logger);
    this.logger.info(`🚀 Starting collection cycle at ${new Date().toISOString()}`);

    let succeeded = 0;
    const failed: CollectionFailure[] = [];

    for (const instance of instances) {
      try {
        const payload = await this.collector.collect(instance);
        if (await this.sender.send(instance, payload)) {
          succeeded++;
        } else {
          failed.push({ name: instance.name, reason: SEND_FAILURE_REASON });
        }
      } catch (error: unknown) {
        const reason = getErrorMessage(error);
        this.logger.error(`❌ [${instance.name}] ${reason}`);
        failed.push({ name: instance.name, reason });
      }
    }

    const total = instances.length;
    if (failed.length > 0) {
      this.logger.warn(`⚠️  Collection complete: ${succeeded}/${total} succeeded, ${failed.length} failed`);
      for (const failure of failed) {
        this.logger.warn(`  - ${failure.name}: ${failure.reason}`);
      }
    } else {
      this.logger.info(`✅ Collection complete: ${succeeded}/${total} succeeded`);
    }

    const success = failed.length === 0;
    endOperation({ succeeded, failed: failed.length }, success);
    return { success, succeeded, failed };
  }
}

export const collectionRunner = new CollectionRunner();
