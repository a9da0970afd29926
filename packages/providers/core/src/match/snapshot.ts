import { createHash } from 'node:crypto';

import type { Track } from '@tracksync/contracts';

import { buildIdentityKey } from './normalize';

const sha256Hex = (input: string): string => createHash('sha256').update(input, 'utf8').digest('hex');

/** Digest of a confirmed-empty collection; never equal to a hash of real keys. */
export const EMPTY_SNAPSHOT_HASH = sha256Hex('empty_snapshot');

/**
 * Order-independent digest of a track collection. Identity keys are sorted
 * before hashing, so re-listing an unchanged catalog reproduces the value
 * across processes.
 */
export function computeSnapshotHash(tracks: readonly Track[]): string {
  if (tracks.length === 0) {
    return EMPTY_SNAPSHOT_HASH;
  }
  const keys = tracks.map((track) => buildIdentityKey(track));
  keys.sort();
  return sha256Hex(keys.join('\n'));
}
