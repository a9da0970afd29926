import { describe, expect, it } from 'vitest';

import { ContractViolationError } from '@tracksync/contracts';

import { CheckpointLog } from '../log';

const clock = (iso: string) => () => new Date(iso);

const startLog = () =>
  CheckpointLog.start(
    { jobId: 'job-1', playlistId: 'road-trip', snapshotHash: 'abc', batchSize: 50 },
    clock('2024-05-01T10:00:00.000Z'),
  );

describe('CheckpointLog', () => {
  it('starts in scanning with an empty cursor', () => {
    expect(startLog().snapshot()).toEqual({
      jobId: 'job-1',
      snapshotHash: 'abc',
      playlistId: 'road-trip',
      batchIndex: 0,
      stage: 'scanning',
      cursor: { trackIndex: 0, batchTrackIndex: 0 },
      addedUris: [],
      attempts: 0,
      updatedAt: '2024-05-01T10:00:00.000Z',
      metadata: { totalTracks: 0, processedTracks: 0, batchSize: 50 },
    });
  });

  it('folds appended entries into the record', () => {
    const log = startLog()
      .append({ type: 'stage', stage: 'matching' })
      .append({ type: 'progress', totalTracks: 12 })
      .append({ type: 'cursor', trackIndex: 10, batchTrackIndex: 0 })
      .append({ type: 'progress', processedTracks: 10 })
      .append({ type: 'stage', stage: 'writing' })
      .append({ type: 'batch', batchIndex: 0 })
      .append({ type: 'added', uris: ['u1', 'u2'] }, new Date('2024-05-01T10:05:00.000Z'));

    const record = log.snapshot();
    expect(record.stage).toBe('writing');
    expect(record.cursor).toEqual({ trackIndex: 10, batchTrackIndex: 0 });
    expect(record.addedUris).toEqual(['u1', 'u2']);
    expect(record.metadata).toEqual({ totalTracks: 12, processedTracks: 10, batchSize: 50 });
    expect(record.updatedAt).toBe('2024-05-01T10:05:00.000Z');
    expect(log.history).toHaveLength(7);
  });

  it('refuses to move the stage backwards', () => {
    const log = startLog().append({ type: 'stage', stage: 'writing' });

    expect(() => log.append({ type: 'stage', stage: 'matching' })).toThrow(ContractViolationError);
    expect(log.stage).toBe('writing');
  });

  it('refuses to move the cursor backwards', () => {
    const log = startLog().append({ type: 'cursor', trackIndex: 20, batchTrackIndex: 5 });

    expect(() => log.append({ type: 'cursor', trackIndex: 10, batchTrackIndex: 5 })).toThrow(
      'Checkpoint cursor cannot move backwards (20 -> 10)',
    );
    expect(() => log.append({ type: 'cursor', trackIndex: 20, batchTrackIndex: 4 })).toThrow(ContractViolationError);
  });

  it('refuses to move the batch index backwards', () => {
    const log = startLog().append({ type: 'batch', batchIndex: 3 });

    expect(() => log.append({ type: 'batch', batchIndex: 2 })).toThrow(
      'Checkpoint batch index cannot move backwards (3 -> 2)',
    );
  });

  it('never lowers processed tracks', () => {
    const log = startLog()
      .append({ type: 'progress', processedTracks: 30 })
      .append({ type: 'progress', processedTracks: 10 });

    expect(log.snapshot().metadata.processedTracks).toBe(30);
  });

  it('counts an attempt on resume and keeps the persisted progress', () => {
    const persisted = startLog()
      .append({ type: 'stage', stage: 'writing' })
      .append({ type: 'added', uris: ['u1'] })
      .snapshot();

    const resumed = CheckpointLog.resume(persisted, clock('2024-05-02T08:00:00.000Z'));

    expect(resumed.attempts).toBe(1);
    expect(resumed.stage).toBe('writing');
    expect(resumed.addedUris).toEqual(['u1']);
    expect(resumed.snapshot().updatedAt).toBe('2024-05-02T08:00:00.000Z');
  });

  it('snapshots are detached copies', () => {
    const log = startLog().append({ type: 'added', uris: ['u1'] });
    const copy = log.snapshot();
    copy.addedUris.push('u2');

    expect(log.addedUris).toEqual(['u1']);
  });
});
