import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type Redis from 'ioredis';
import RedisMock from 'ioredis-mock';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { CheckpointRecord } from '@tracksync/contracts';

import { createCheckpointStore } from '..';
import { FileCheckpointStore } from '../fileStore';
import { RedisCheckpointStore } from '../redisStore';
import { CheckpointCorruptError, InMemoryCheckpointStore, type CheckpointStore } from '../store';

const record = (overrides: Partial<CheckpointRecord> = {}): CheckpointRecord => ({
  jobId: 'job-1',
  snapshotHash: 'abc123',
  playlistId: 'road-trip',
  batchIndex: 2,
  stage: 'writing',
  cursor: { trackIndex: 25, batchTrackIndex: 20 },
  addedUris: ['spotify:track:1', 'spotify:track:2'],
  attempts: 1,
  updatedAt: '2024-05-01T10:00:00.000Z',
  metadata: { totalTracks: 25, processedTracks: 25, batchSize: 10 },
  ...overrides,
});

function describeStoreContract(name: string, setup: () => Promise<{ store: CheckpointStore; teardown: () => Promise<void> }>) {
  describe(`${name} contract`, () => {
    let store: CheckpointStore;
    let teardown: () => Promise<void>;

    beforeEach(async () => {
      ({ store, teardown } = await setup());
    });

    afterEach(async () => {
      await teardown();
    });

    it('round-trips the exact record', async () => {
      const saved = record();
      await store.save('job-1', 'road-trip', saved);

      expect(await store.load('job-1', 'road-trip')).toEqual(saved);
    });

    it('returns null for a missing checkpoint', async () => {
      expect(await store.load('job-1', 'nope')).toBeNull();
    });

    it('keeps only the latest write', async () => {
      await store.save('job-1', 'road-trip', record({ batchIndex: 1 }));
      await store.save('job-1', 'road-trip', record({ batchIndex: 3 }));

      const loaded = await store.load('job-1', 'road-trip');
      expect(loaded?.batchIndex).toBe(3);
    });

    it('deletes a checkpoint', async () => {
      await store.save('job-1', 'road-trip', record());
      await store.delete('job-1', 'road-trip');

      expect(await store.load('job-1', 'road-trip')).toBeNull();
      expect(await store.listForJob('job-1')).toEqual([]);
    });

    it('lists checkpoints of one job only', async () => {
      await store.save('job-1', 'a', record({ playlistId: 'a' }));
      await store.save('job-1', 'b', record({ playlistId: 'b' }));
      await store.save('job-10', 'a', record({ jobId: 'job-10', playlistId: 'a' }));

      const listed = await store.listForJob('job-1');
      expect(listed.map((entry) => entry.playlistId).sort()).toEqual(['a', 'b']);
    });

    it('does not share state with the caller', async () => {
      const saved = record();
      await store.save('job-1', 'road-trip', saved);
      saved.addedUris.push('spotify:track:3');

      const loaded = await store.load('job-1', 'road-trip');
      expect(loaded?.addedUris).toEqual(['spotify:track:1', 'spotify:track:2']);
    });
  });
}

describeStoreContract('InMemoryCheckpointStore', async () => ({
  store: new InMemoryCheckpointStore(),
  teardown: async () => {},
}));

describeStoreContract('FileCheckpointStore', async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'tracksync-checkpoints-'));
  return {
    store: new FileCheckpointStore(dir),
    teardown: () => rm(dir, { recursive: true, force: true }),
  };
});

describeStoreContract('RedisCheckpointStore', async () => {
  const client: Redis = new RedisMock();
  return {
    store: new RedisCheckpointStore(client),
    teardown: async () => {
      await client.flushall();
      await client.quit();
    },
  };
});

describe('FileCheckpointStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tracksync-checkpoints-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('names files after the job and playlist', async () => {
    const store = new FileCheckpointStore(dir);
    await store.save('job-1', 'road-trip', record());

    expect(await readdir(dir)).toEqual(['job-1_road-trip.json']);
  });

  it('encodes unsafe characters in file names', () => {
    const store = new FileCheckpointStore(dir);

    expect(store.pathFor('job/1', 'a b')).toBe(path.join(dir, 'job%2F1_a%20b.json'));
    expect(store.pathFor('job_a', 'b')).toBe(path.join(dir, 'job%5Fa_b.json'));
  });

  it('keeps ids containing underscores apart', async () => {
    const store = new FileCheckpointStore(dir);
    await store.save('job_a', 'b', record({ jobId: 'job_a', playlistId: 'b' }));

    expect(await store.load('job', 'a_b')).toBeNull();
    expect(await store.load('job_a', 'b')).toMatchObject({ jobId: 'job_a', playlistId: 'b' });
    expect(await store.listForJob('job')).toEqual([]);
  });

  it('ignores a file whose record belongs to another transfer', async () => {
    const store = new FileCheckpointStore(dir);
    await writeFile(store.pathFor('job-1', 'road-trip'), JSON.stringify(record({ playlistId: 'other' })), 'utf8');

    expect(await store.load('job-1', 'road-trip')).toBeNull();
  });

  it('rejects a file that is not JSON', async () => {
    const store = new FileCheckpointStore(dir);
    await writeFile(store.pathFor('job-1', 'road-trip'), '{not json', 'utf8');

    await expect(store.load('job-1', 'road-trip')).rejects.toBeInstanceOf(CheckpointCorruptError);
  });

  it('rejects a record with missing fields', async () => {
    const store = new FileCheckpointStore(dir);
    await writeFile(store.pathFor('job-1', 'road-trip'), JSON.stringify({ jobId: 'job-1' }), 'utf8');

    await expect(store.load('job-1', 'road-trip')).rejects.toThrow(/Corrupt checkpoint/);
  });

  it('lists nothing when the directory does not exist yet', async () => {
    const store = new FileCheckpointStore(path.join(dir, 'missing'));

    expect(await store.listForJob('job-1')).toEqual([]);
  });
});

describe('RedisCheckpointStore', () => {
  let client: Redis;

  beforeEach(() => {
    client = new RedisMock();
  });

  afterEach(async () => {
    await client.flushall();
  });

  it('stores records under the checkpoint key and indexes the job', async () => {
    const store = new RedisCheckpointStore(client);
    await store.save('job-1', 'road-trip', record());

    expect(await client.get('checkpoint:job-1:road-trip')).toBe(JSON.stringify(record()));
    expect(await client.smembers('checkpoint-job:job-1')).toEqual(['road-trip']);
  });

  it('rejects a corrupt value', async () => {
    const store = new RedisCheckpointStore(client);
    await client.set('checkpoint:job-1:road-trip', '[]');

    await expect(store.load('job-1', 'road-trip')).rejects.toBeInstanceOf(CheckpointCorruptError);
  });
});

describe('createCheckpointStore', () => {
  it('builds the configured backend', () => {
    const connect = () => new RedisMock();

    expect(createCheckpointStore({ backend: 'memory', dir: './checkpoints' }, connect)).toBeInstanceOf(
      InMemoryCheckpointStore,
    );
    expect(createCheckpointStore({ backend: 'file', dir: './checkpoints' }, connect)).toBeInstanceOf(
      FileCheckpointStore,
    );
    expect(
      createCheckpointStore({ backend: 'redis', dir: './checkpoints', redisUrl: 'redis://localhost:6379' }, connect),
    ).toBeInstanceOf(RedisCheckpointStore);
  });

  it('requires a redis url for the redis backend', () => {
    expect(() => createCheckpointStore({ backend: 'redis', dir: './checkpoints' }, () => new RedisMock())).toThrow(
      'Redis URL is required when backend is "redis"',
    );
  });
});
