import {
  compareStages,
  ContractViolationError,
  type CheckpointRecord,
  type CheckpointStage,
} from '@tracksync/contracts';

export type CheckpointEntry =
  | { type: 'stage'; stage: CheckpointStage }
  | { type: 'cursor'; trackIndex: number; batchTrackIndex: number }
  | { type: 'batch'; batchIndex: number }
  | { type: 'added'; uris: readonly string[] }
  | { type: 'progress'; totalTracks?: number; processedTracks?: number };

export interface CheckpointLogInit {
  jobId: string;
  playlistId: string;
  snapshotHash: string | null;
  batchSize: number;
}

/**
 * Append-only progress log for one (jobId, playlistId) transfer.
 *
 * Entries may only move the stage, cursor and batch index forward and may
 * only grow the added list. `snapshot()` folds the log into the flat record
 * the checkpoint store persists.
 */
export class CheckpointLog {
  private readonly entries: CheckpointEntry[] = [];
  private record: CheckpointRecord;

  private constructor(record: CheckpointRecord) {
    this.record = record;
  }

  static start(init: CheckpointLogInit, now: () => Date = () => new Date()): CheckpointLog {
    return new CheckpointLog({
      jobId: init.jobId,
      snapshotHash: init.snapshotHash,
      playlistId: init.playlistId,
      batchIndex: 0,
      stage: 'scanning',
      cursor: { trackIndex: 0, batchTrackIndex: 0 },
      addedUris: [],
      attempts: 0,
      updatedAt: now().toISOString(),
      metadata: { totalTracks: 0, processedTracks: 0, batchSize: init.batchSize },
    });
  }

  /** Continues from a persisted record, counting one more attempt. */
  static resume(record: CheckpointRecord, now: () => Date = () => new Date()): CheckpointLog {
    return new CheckpointLog({
      ...record,
      cursor: { ...record.cursor },
      addedUris: [...record.addedUris],
      metadata: { ...record.metadata },
      attempts: record.attempts + 1,
      updatedAt: now().toISOString(),
    });
  }

  get stage(): CheckpointStage {
    return this.record.stage;
  }

  get cursor(): Readonly<CheckpointRecord['cursor']> {
    return this.record.cursor;
  }

  get batchIndex(): number {
    return this.record.batchIndex;
  }

  get addedUris(): readonly string[] {
    return this.record.addedUris;
  }

  get attempts(): number {
    return this.record.attempts;
  }

  get snapshotHash(): string | null {
    return this.record.snapshotHash;
  }

  get history(): readonly CheckpointEntry[] {
    return this.entries;
  }

  append(entry: CheckpointEntry, now: Date = new Date()): this {
    this.record = applyEntry(this.record, entry);
    this.record.updatedAt = now.toISOString();
    this.entries.push(entry);
    return this;
  }

  snapshot(): CheckpointRecord {
    return structuredClone(this.record);
  }
}

function applyEntry(record: CheckpointRecord, entry: CheckpointEntry): CheckpointRecord {
  switch (entry.type) {
    case 'stage':
      if (compareStages(entry.stage, record.stage) < 0) {
        throw new ContractViolationError(`Checkpoint stage cannot move from ${record.stage} back to ${entry.stage}`);
      }
      return { ...record, stage: entry.stage };

    case 'cursor':
      if (entry.trackIndex < record.cursor.trackIndex || entry.batchTrackIndex < record.cursor.batchTrackIndex) {
        throw new ContractViolationError(
          `Checkpoint cursor cannot move backwards (${record.cursor.trackIndex} -> ${entry.trackIndex})`,
        );
      }
      return { ...record, cursor: { trackIndex: entry.trackIndex, batchTrackIndex: entry.batchTrackIndex } };

    case 'batch':
      if (entry.batchIndex < record.batchIndex) {
        throw new ContractViolationError(
          `Checkpoint batch index cannot move backwards (${record.batchIndex} -> ${entry.batchIndex})`,
        );
      }
      return { ...record, batchIndex: entry.batchIndex };

    case 'added':
      return { ...record, addedUris: [...record.addedUris, ...entry.uris] };

    case 'progress':
      return {
        ...record,
        metadata: {
          ...record.metadata,
          totalTracks: entry.totalTracks ?? record.metadata.totalTracks,
          processedTracks: Math.max(record.metadata.processedTracks, entry.processedTracks ?? 0),
        },
      };
  }
}
