import { EventEmitter } from 'node:events';

import type { CheckpointStage } from '@tracksync/contracts';

export type JobProgressStatus = 'running' | 'succeeded' | 'failed';

export type JobProgressUpdate = {
  jobId: string;
  playlistId: string;
  status: JobProgressStatus;
  stage: CheckpointStage;
  processed: number;
  total: number;
  percent?: number | null;
  message?: string | null;
  updatedAt?: string | null;
};

export type JobProgressEvent =
  | { type: 'progress'; update: JobProgressUpdate }
  | { type: 'complete'; update: JobProgressUpdate };

const emitter = new EventEmitter();
emitter.setMaxListeners(0);

export function subscribeToJobProgress(jobId: string, listener: (event: JobProgressEvent) => void): () => void {
  const channel = toChannel(jobId);
  emitter.on(channel, listener);
  return () => {
    emitter.off(channel, listener);
  };
}

export function publishJobProgress(update: JobProgressUpdate): void {
  const normalized = normalizeUpdate(update);
  emitter.emit(toChannel(normalized.jobId), { type: 'progress', update: normalized });
}

export function publishJobCompletion(update: JobProgressUpdate): void {
  const normalized = normalizeUpdate(update);
  emitter.emit(toChannel(normalized.jobId), { type: 'complete', update: normalized });
}

export function resetJobProgressBus(): void {
  emitter.removeAllListeners();
}

function toChannel(jobId: string): string {
  return `job:${jobId}`;
}

function normalizeUpdate(update: JobProgressUpdate): JobProgressUpdate {
  return {
    ...update,
    percent: clampPercent(update.percent ?? derivePercent(update.processed, update.total)),
    message: update.message ?? null,
    updatedAt: update.updatedAt ?? new Date().toISOString(),
  };
}

function derivePercent(processed: number, total: number): number | null {
  if (total <= 0) return null;
  return Math.round((processed / total) * 100);
}

function clampPercent(value?: number | null): number | null {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return null;
  }
  if (value < 0) return 0;
  if (value > 100) return 100;
  return value;
}
