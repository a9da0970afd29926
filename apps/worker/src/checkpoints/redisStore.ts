import type Redis from 'ioredis';

import type { CheckpointRecord } from '@tracksync/contracts';

import { parseCheckpointRecord, type CheckpointStore } from './store';

export type CheckpointRedisClient = Pick<Redis, 'get' | 'set' | 'del' | 'sadd' | 'srem' | 'smembers' | 'quit'>;

/**
 * Redis-based checkpoint store
 * Records live at `checkpoint:<jobId>:<playlistId>`; `checkpoint-job:<jobId>` indexes a job's playlists.
 */
export class RedisCheckpointStore implements CheckpointStore {
  constructor(
    private readonly client: CheckpointRedisClient,
    private readonly keyPrefix: string = 'checkpoint',
  ) {}

  recordKey(jobId: string, playlistId: string): string {
    return `${this.keyPrefix}:${jobId}:${playlistId}`;
  }

  indexKey(jobId: string): string {
    return `${this.keyPrefix}-job:${jobId}`;
  }

  async save(jobId: string, playlistId: string, record: CheckpointRecord): Promise<void> {
    await this.client.set(this.recordKey(jobId, playlistId), JSON.stringify(record));
    await this.client.sadd(this.indexKey(jobId), playlistId);
  }

  async load(jobId: string, playlistId: string): Promise<CheckpointRecord | null> {
    const key = this.recordKey(jobId, playlistId);
    const raw = await this.client.get(key);
    if (raw === null) {
      return null;
    }
    return parseCheckpointRecord(raw, key);
  }

  async delete(jobId: string, playlistId: string): Promise<void> {
    await this.client.del(this.recordKey(jobId, playlistId));
    await this.client.srem(this.indexKey(jobId), playlistId);
  }

  async listForJob(jobId: string): Promise<CheckpointRecord[]> {
    const playlistIds = (await this.client.smembers(this.indexKey(jobId))).sort();
    const records: CheckpointRecord[] = [];
    for (const playlistId of playlistIds) {
      const record = await this.load(jobId, playlistId);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
