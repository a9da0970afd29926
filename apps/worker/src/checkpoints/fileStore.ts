import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { CheckpointRecord } from '@tracksync/contracts';

import { parseCheckpointRecord, serializeCheckpointRecord, type CheckpointStore } from './store';

// Percent-encodes everything outside [A-Za-z0-9.-], so `_` only ever appears as the separator.
const fileSegment = (value: string): string =>
  encodeURIComponent(value).replace(/[!'()*_~]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * One JSON file per checkpoint: `<dir>/<jobId>_<playlistId>.json`.
 * Writes go through a temp file and a rename, so readers never see a partial record.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly dir: string) {}

  pathFor(jobId: string, playlistId: string): string {
    return path.join(this.dir, `${fileSegment(jobId)}_${fileSegment(playlistId)}.json`);
  }

  async save(jobId: string, playlistId: string, record: CheckpointRecord): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const target = this.pathFor(jobId, playlistId);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, serializeCheckpointRecord(record), 'utf8');
    await rename(temp, target);
  }

  async load(jobId: string, playlistId: string): Promise<CheckpointRecord | null> {
    const file = this.pathFor(jobId, playlistId);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
    const record = parseCheckpointRecord(raw, file);
    return record.jobId === jobId && record.playlistId === playlistId ? record : null;
  }

  async delete(jobId: string, playlistId: string): Promise<void> {
    await rm(this.pathFor(jobId, playlistId), { force: true });
  }

  async listForJob(jobId: string): Promise<CheckpointRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    const prefix = `${fileSegment(jobId)}_`;
    const records: CheckpointRecord[] = [];
    for (const entry of entries.sort()) {
      if (!entry.startsWith(prefix) || !entry.endsWith('.json')) continue;
      const file = path.join(this.dir, entry);
      const record = parseCheckpointRecord(await readFile(file, 'utf8'), file);
      if (record.jobId === jobId) {
        records.push(record);
      }
    }
    return records;
  }
}
