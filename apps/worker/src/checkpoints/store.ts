/**
 * Checkpoint store interface and the in-memory implementation
 */
import { checkpointRecordSchema, type CheckpointRecord } from '@tracksync/contracts';

/**
 * Durable progress records keyed by (jobId, playlistId).
 * A load after a save returns the saved record unchanged.
 */
export interface CheckpointStore {
  save(jobId: string, playlistId: string, record: CheckpointRecord): Promise<void>;

  /** Null when no checkpoint exists; rejects with CheckpointCorruptError on unreadable data. */
  load(jobId: string, playlistId: string): Promise<CheckpointRecord | null>;

  delete(jobId: string, playlistId: string): Promise<void>;

  listForJob(jobId: string): Promise<CheckpointRecord[]>;

  close?(): Promise<void>;
}

/** Stored checkpoint data that does not parse as a checkpoint record. */
export class CheckpointCorruptError extends Error {
  constructor(public readonly location: string, detail: string) {
    super(`Corrupt checkpoint at ${location}: ${detail}`);
    this.name = 'CheckpointCorruptError';
  }
}

export function parseCheckpointRecord(raw: string, location: string): CheckpointRecord {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CheckpointCorruptError(location, error instanceof Error ? error.message : String(error));
  }

  const parsed = checkpointRecordSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new CheckpointCorruptError(location, detail);
  }
  return parsed.data;
}

export function serializeCheckpointRecord(record: CheckpointRecord): string {
  return JSON.stringify(record, null, 2);
}

const cloneRecord = (record: CheckpointRecord): CheckpointRecord => structuredClone(record);

/**
 * In-memory checkpoint store using Map
 * Used for dry runs, tests and single-process jobs that need no durability
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private records = new Map<string, CheckpointRecord>();

  private key(jobId: string, playlistId: string): string {
    return `${jobId}\u0000${playlistId}`;
  }

  async save(jobId: string, playlistId: string, record: CheckpointRecord): Promise<void> {
    this.records.set(this.key(jobId, playlistId), cloneRecord(record));
  }

  async load(jobId: string, playlistId: string): Promise<CheckpointRecord | null> {
    const record = this.records.get(this.key(jobId, playlistId));
    return record ? cloneRecord(record) : null;
  }

  async delete(jobId: string, playlistId: string): Promise<void> {
    this.records.delete(this.key(jobId, playlistId));
  }

  async listForJob(jobId: string): Promise<CheckpointRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.jobId === jobId)
      .map(cloneRecord);
  }
}
