/**
 * Worker metrics module
 *
 * Prometheus metrics for matching and batch transfer. `getMetrics()` renders
 * the registry in the text exposition format.
 */

import client from 'prom-client';

import type { MatchReason } from '@tracksync/contracts';

export const registry = new client.Registry();

client.collectDefaultMetrics({
  prefix: 'tracksync_worker_',
  register: registry,
});

export const tracksMatched = new client.Counter({
  name: 'tracksync_tracks_matched_total',
  help: 'Source tracks run through the matcher, by result reason',
  labelNames: ['reason'],
  registers: [registry],
});

export const batchesProcessed = new client.Counter({
  name: 'tracksync_batches_processed_total',
  help: 'Batch writes by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

export const batchRetries = new client.Counter({
  name: 'tracksync_batch_retries_total',
  help: 'Batch write attempts repeated after a transient failure',
  registers: [registry],
});

export const rateLimitWaitMs = new client.Counter({
  name: 'tracksync_rate_limit_wait_ms_total',
  help: 'Milliseconds spent waiting on rate limits',
  registers: [registry],
});

export const transferDuration = new client.Histogram({
  name: 'tracksync_transfer_duration_seconds',
  help: 'Duration of a playlist transfer in seconds',
  labelNames: ['dry_run'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300, 900], // 100ms to 15 minutes
  registers: [registry],
});

export const transfersActive = new client.Gauge({
  name: 'tracksync_transfers_active',
  help: 'Number of playlist transfers in progress',
  registers: [registry],
});

export type BatchOutcome = 'success' | 'dry_run' | 'failed';

export function recordMatch(reason: MatchReason): void {
  tracksMatched.inc({ reason });
}

export function recordBatch(outcome: BatchOutcome): void {
  batchesProcessed.inc({ outcome });
}

/**
 * Get current metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return await registry.metrics();
}

/**
 * Helper to time a transfer with metrics
 */
export async function trackTransfer<T>(dryRun: boolean, fn: () => Promise<T>): Promise<T> {
  const end = transferDuration.startTimer({ dry_run: String(dryRun) });
  transfersActive.inc();

  try {
    return await fn();
  } finally {
    end();
    transfersActive.dec();
  }
}
