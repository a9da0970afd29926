import {
  ContractViolationError,
  isRateLimited,
  MAX_BATCH_SIZE,
  TemporaryFailureError,
  type AddResult,
  type TargetCatalog,
} from '@tracksync/contracts';
import type { Sleep } from '@tracksync/providers-core';

import { componentLogger, type Logger } from '../logger';
import { batchRetries, rateLimitWaitMs, recordBatch } from '../metrics';

export type BatchWriter = Pick<TargetCatalog, 'addTracksBatch'>;

export interface BatchProcessorOptions {
  batchSize?: number;
  /** Transient failures tolerated per batch before it is given up. */
  maxRetries?: number;
  sleep?: Sleep;
  logger?: Logger;
}

const DEFAULT_MAX_RETRIES = 3;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Fixed-size chunks in input order; the last one may be shorter. */
export function splitIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ContractViolationError(`Batch size must be a positive integer, got ${batchSize}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
}

/**
 * Writes batches of target URIs with bounded retry.
 *
 * Rate limits are waited out without spending the retry budget; every other
 * failure backs off 1s, 2s, 4s... until `maxRetries` is exceeded.
 */
export class BatchProcessor {
  readonly batchSize: number;
  readonly maxRetries: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(private readonly target: BatchWriter, options: BatchProcessorOptions = {}) {
    const batchSize = options.batchSize ?? MAX_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_BATCH_SIZE) {
      throw new ContractViolationError(`Batch size must be between 1 and ${MAX_BATCH_SIZE}, got ${batchSize}`);
    }
    this.batchSize = batchSize;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? componentLogger('batch-processor');
  }

  splitIntoBatches(uris: readonly string[]): string[][] {
    return splitIntoBatches(uris, this.batchSize);
  }

  async processBatch(
    playlistId: string,
    uris: readonly string[],
    jobId: string,
    batchIndex: number,
    dryRun = false,
  ): Promise<AddResult> {
    const log = this.logger.child({ jobId, playlistId, batchIndex });

    if (dryRun) {
      log.info({ size: uris.length }, 'dry run: batch not written');
      recordBatch('dry_run');
      return { added: uris.length, duplicates: 0, errors: 0 };
    }

    let attempt = 0;
    while (true) {
      try {
        log.debug({ attempt: attempt + 1, size: uris.length }, 'writing batch');
        const result = await this.target.addTracksBatch(playlistId, uris);
        log.info(result, 'batch written');
        recordBatch('success');
        return result;
      } catch (error) {
        if (isRateLimited(error)) {
          log.warn({ retryAfterMs: error.retryAfterMs }, 'rate limited, waiting');
          rateLimitWaitMs.inc(error.retryAfterMs);
          await this.sleep(error.retryAfterMs);
          continue;
        }

        attempt += 1;
        if (attempt > this.maxRetries) {
          log.error({ err: error, attempts: attempt }, 'batch retries exhausted');
          recordBatch('failed');
          throw new TemporaryFailureError(
            `Failed to process batch after ${this.maxRetries} retries: ${errorMessage(error)}`,
          );
        }

        const backoffMs = 2 ** (attempt - 1) * 1000;
        log.warn({ err: error, attempt, backoffMs }, 'batch failed, retrying');
        batchRetries.inc();
        await this.sleep(backoffMs);
      }
    }
  }
}
