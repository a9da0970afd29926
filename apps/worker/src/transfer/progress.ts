import type { CheckpointStage } from '@tracksync/contracts';
import {
  publishJobCompletion,
  publishJobProgress,
  type JobProgressStatus,
} from '@tracksync/interop';

export type ProgressSnapshot = {
  stage: CheckpointStage;
  processed: number;
  total: number;
  message?: string | null;
};

export type ProgressReporterOptions = {
  throttleMs?: number;
};

export type ProgressReporter = {
  report(snapshot: ProgressSnapshot): void;
  complete(status: Extract<JobProgressStatus, 'succeeded' | 'failed'>, snapshot: ProgressSnapshot): void;
};

const DEFAULT_THROTTLE_MS = 250;

/**
 * Progress for one playlist of a job, published on the interop progress bus.
 * Updates closer together than `throttleMs` collapse into the latest one.
 */
export function createProgressReporter(
  jobId: string,
  playlistId: string,
  options: ProgressReporterOptions = {},
): ProgressReporter {
  const throttleMs = options.throttleMs ?? DEFAULT_THROTTLE_MS;
  let lastEmitTimestamp = 0;
  let pending: ProgressSnapshot | null = null;
  let timer: NodeJS.Timeout | null = null;
  let closed = false;

  const emitProgress = (snapshot: ProgressSnapshot) => {
    lastEmitTimestamp = Date.now();
    publishJobProgress({
      jobId,
      playlistId,
      status: 'running',
      stage: snapshot.stage,
      processed: snapshot.processed,
      total: snapshot.total,
      message: snapshot.message ?? null,
    });
  };

  const clearTimer = () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const scheduleFlush = () => {
    if (timer) return;
    const elapsed = Date.now() - lastEmitTimestamp;
    timer = setTimeout(() => {
      timer = null;
      if (pending) {
        const next = pending;
        pending = null;
        emitProgress(next);
      }
    }, Math.max(0, throttleMs - elapsed));
  };

  return {
    report(snapshot) {
      if (closed) return;

      const elapsed = Date.now() - lastEmitTimestamp;
      if (!lastEmitTimestamp || elapsed >= throttleMs) {
        emitProgress(snapshot);
      } else {
        pending = snapshot;
        scheduleFlush();
      }
    },

    complete(status, snapshot) {
      if (closed) return;
      closed = true;
      // The final snapshot supersedes anything still buffered.
      pending = null;
      clearTimer();

      publishJobCompletion({
        jobId,
        playlistId,
        status,
        stage: snapshot.stage,
        processed: snapshot.processed,
        total: snapshot.total,
        message: snapshot.message ?? null,
      });
    },
  };
}
