import {
  compareStages,
  type CheckpointRecord,
  type CheckpointStage,
  type Collection,
  type MatchResult,
  type SourceCatalog,
  type TargetCatalog,
  type Track,
} from '@tracksync/contracts';
import { getMatchStatistics, type TrackMatcher } from '@tracksync/providers-core';

import { CheckpointLog } from '../checkpoints/log';
import type { CheckpointStore } from '../checkpoints/store';
import { componentLogger, type Logger } from '../logger';
import { recordMatch, trackTransfer } from '../metrics';
import { BatchProcessor, splitIntoBatches } from './batchProcessor';
import { createProgressReporter } from './progress';

/** Tracks matched between checkpoint saves and progress log lines. */
export const CHECKPOINT_INTERVAL = 10;

const DEFAULT_TOP_K = 3;

export interface TrackOutcome {
  sourceTrackId: string;
  result: MatchResult;
}

export interface TransferResult {
  /** Target collection id; null in a dry run when the target does not exist yet. */
  playlistId: string | null;
  playlistName: string;
  totalTracks: number;
  matchedTracks: number;
  notFoundTracks: number;
  ambiguousTracks: number;
  addedTracks: number;
  duplicateTracks: number;
  failedTracks: number;
  errors: string[];
  durationMs: number;
  resumed: boolean;
  /** Outcomes for the tracks matched in this run. */
  tracks: TrackOutcome[];
}

export interface TransferPipelineOptions {
  source: SourceCatalog;
  target: TargetCatalog;
  matcher: TrackMatcher;
  checkpoints: CheckpointStore;
  batchProcessor?: BatchProcessor;
  candidatesTopK?: number;
  logger?: Logger;
  progressThrottleMs?: number;
  now?: () => Date;
}

export interface TransferAllOptions {
  dryRun?: boolean;
  /** Caller-computed snapshot hashes keyed by source playlist id. */
  snapshotHashes?: Readonly<Record<string, string>>;
}

export type PlaylistTransferOutcome =
  | { playlist: Collection; ok: true; result: TransferResult }
  | { playlist: Collection; ok: false; error: string };

interface MatchedUri {
  uri: string;
  trackIndex: number;
}

interface WriteTotals {
  added: number;
  duplicates: number;
  failed: number;
  errors: string[];
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Moves one source collection into the target catalog:
 * scanning → matching → writing → completed.
 *
 * Progress is checkpointed per (jobId, playlistId) so a second run with the
 * same job id continues where the first stopped. Dry runs neither read nor
 * write checkpoints and never call the target's write operations.
 */
export class TransferPipeline {
  private readonly source: SourceCatalog;
  private readonly target: TargetCatalog;
  private readonly matcher: TrackMatcher;
  private readonly checkpoints: CheckpointStore;
  private readonly batchProcessor: BatchProcessor;
  private readonly topK: number;
  private readonly logger: Logger;
  private readonly progressThrottleMs?: number;
  private readonly now: () => Date;

  constructor(options: TransferPipelineOptions) {
    this.source = options.source;
    this.target = options.target;
    this.matcher = options.matcher;
    this.checkpoints = options.checkpoints;
    this.logger = options.logger ?? componentLogger('transfer-pipeline');
    this.batchProcessor = options.batchProcessor ?? new BatchProcessor(options.target, { logger: this.logger });
    this.topK = options.candidatesTopK ?? DEFAULT_TOP_K;
    this.progressThrottleMs = options.progressThrottleMs;
    this.now = options.now ?? (() => new Date());
  }

  async transferPlaylist(
    sourcePlaylist: Collection,
    jobId: string,
    snapshotHash?: string | null,
    dryRun = false,
  ): Promise<TransferResult> {
    return trackTransfer(dryRun, () => this.run(sourcePlaylist, jobId, snapshotHash ?? null, dryRun));
  }

  /** Transfers collections one after another; a failing collection does not stop the rest. */
  async transferAll(
    playlists: readonly Collection[],
    jobId: string,
    options: TransferAllOptions = {},
  ): Promise<PlaylistTransferOutcome[]> {
    const outcomes: PlaylistTransferOutcome[] = [];
    for (const playlist of playlists) {
      try {
        const result = await this.transferPlaylist(
          playlist,
          jobId,
          options.snapshotHashes?.[playlist.id],
          options.dryRun ?? false,
        );
        outcomes.push({ playlist, ok: true, result });
      } catch (error) {
        this.logger.error({ err: error, jobId, playlistId: playlist.id }, 'playlist transfer failed');
        outcomes.push({ playlist, ok: false, error: errorMessage(error) });
      }
    }
    return outcomes;
  }

  private async run(
    sourcePlaylist: Collection,
    jobId: string,
    snapshotHash: string | null,
    dryRun: boolean,
  ): Promise<TransferResult> {
    const startedAt = Date.now();
    const playlistId = sourcePlaylist.id;
    const log = this.logger.child({ jobId, playlistId, dryRun });
    const progress = createProgressReporter(jobId, playlistId, { throttleMs: this.progressThrottleMs });

    const existing = dryRun ? null : await this.checkpoints.load(jobId, playlistId);
    const checkpoint = this.openCheckpoint(existing, { jobId, playlistId, snapshotHash, dryRun }, log);
    let stage: CheckpointStage = checkpoint?.stage ?? 'scanning';

    const persist = async () => {
      if (checkpoint) {
        await this.checkpoints.save(jobId, playlistId, checkpoint.snapshot());
      }
    };
    const advance = (next: CheckpointStage) => {
      if (compareStages(next, stage) <= 0) return;
      stage = next;
      checkpoint?.append({ type: 'stage', stage: next }, this.now());
    };

    let tracks: Track[] = [];
    try {
      await persist();

      tracks = await this.source.listTracks(playlistId);
      const total = tracks.length;
      advance('matching');
      checkpoint?.append({ type: 'progress', totalTracks: total }, this.now());
      await persist();

      const targetCollection = await this.resolveTarget(sourcePlaylist.name, dryRun);

      // Tracks before the settled cursor were written (or unmatched) by an earlier run.
      const startIndex = Math.min(checkpoint?.cursor.batchTrackIndex ?? 0, total);
      const alreadyAdded = new Set(checkpoint?.addedUris ?? []);
      if (existing) {
        log.info({ startIndex, alreadyAdded: alreadyAdded.size, attempts: checkpoint?.attempts }, 'resuming transfer');
      }

      const outcomes: TrackOutcome[] = [];
      const matched: MatchedUri[] = [];
      for (let index = startIndex; index < total; index += 1) {
        const track = tracks[index];
        if (!track) continue;
        const result = await this.matchTrack(track, log);
        recordMatch(result.reason);
        outcomes.push({ sourceTrackId: track.sourceId, result });
        if (result.uri && !alreadyAdded.has(result.uri)) {
          matched.push({ uri: result.uri, trackIndex: index });
        }

        const scanned = index + 1;
        if (scanned % CHECKPOINT_INTERVAL === 0) {
          log.info({ processed: scanned, total, matched: matched.length }, 'matching progress');
          progress.report({ stage: 'matching', processed: scanned, total });
          if (checkpoint) {
            checkpoint.append(
              {
                type: 'cursor',
                trackIndex: Math.max(checkpoint.cursor.trackIndex, scanned),
                batchTrackIndex: checkpoint.cursor.batchTrackIndex,
              },
              this.now(),
            );
            checkpoint.append({ type: 'progress', processedTracks: scanned }, this.now());
            await persist();
          }
        }
      }

      advance('writing');
      if (checkpoint) {
        checkpoint.append(
          {
            type: 'cursor',
            trackIndex: Math.max(checkpoint.cursor.trackIndex, total),
            batchTrackIndex: checkpoint.cursor.batchTrackIndex,
          },
          this.now(),
        );
        checkpoint.append({ type: 'progress', processedTracks: total }, this.now());
        await persist();
      }

      const writes = await this.writeMatched({
        jobId,
        collectionId: targetCollection?.id ?? playlistId,
        matched,
        total,
        dryRun,
        checkpoint,
        persist,
        onBatch: (done, batches) => progress.report({ stage: 'writing', processed: done, total: batches }),
        log,
        firstBatchIndex: existing && compareStages(existing.stage, 'writing') >= 0 ? existing.batchIndex + 1 : 0,
      });

      advance('completed');
      await persist();

      const stats = getMatchStatistics(outcomes.map((outcome) => outcome.result));
      const previouslyAdded = existing?.addedUris.length ?? 0;
      const result: TransferResult = {
        playlistId: targetCollection?.id ?? null,
        playlistName: targetCollection?.name ?? sourcePlaylist.name,
        totalTracks: total,
        matchedTracks: stats.matched,
        notFoundTracks: stats.notFound,
        ambiguousTracks: stats.ambiguous,
        addedTracks: dryRun ? 0 : writes.added + previouslyAdded,
        duplicateTracks: writes.duplicates,
        failedTracks: writes.failed,
        errors: writes.errors,
        durationMs: Math.max(1, Date.now() - startedAt),
        resumed: existing !== null,
        tracks: outcomes,
      };

      log.info(
        {
          total: result.totalTracks,
          matched: result.matchedTracks,
          added: result.addedTracks,
          failed: result.failedTracks,
          durationMs: result.durationMs,
        },
        dryRun ? 'dry run finished' : 'transfer finished',
      );
      progress.complete('succeeded', { stage: 'completed', processed: total, total });
      return result;
    } catch (error) {
      log.error({ err: error, stage }, 'transfer aborted');
      progress.complete('failed', {
        stage,
        processed: checkpoint?.cursor.trackIndex ?? 0,
        total: tracks.length,
        message: errorMessage(error),
      });
      throw error;
    }
  }

  private openCheckpoint(
    existing: CheckpointRecord | null,
    context: { jobId: string; playlistId: string; snapshotHash: string | null; dryRun: boolean },
    log: Logger,
  ): CheckpointLog | null {
    if (context.dryRun) {
      return null;
    }
    if (!existing) {
      return CheckpointLog.start(
        {
          jobId: context.jobId,
          playlistId: context.playlistId,
          snapshotHash: context.snapshotHash,
          batchSize: this.batchProcessor.batchSize,
        },
        this.now,
      );
    }

    if (context.snapshotHash && existing.snapshotHash && context.snapshotHash !== existing.snapshotHash) {
      log.warn(
        { stored: existing.snapshotHash, current: context.snapshotHash },
        'source snapshot changed since the checkpoint was written',
      );
    }
    return CheckpointLog.resume(existing, this.now);
  }

  /** Dry runs only look the target up, so nothing is created. */
  private async resolveTarget(name: string, dryRun: boolean): Promise<Collection | null> {
    if (!dryRun) {
      return this.target.resolveOrCreateCollection(name);
    }
    const wanted = name.toLowerCase();
    const owned = await this.target.listOwnedCollections();
    return owned.find((collection) => collection.name.toLowerCase() === wanted) ?? null;
  }

  private async matchTrack(track: Track, log: Logger): Promise<MatchResult> {
    try {
      const candidates = await this.target.findCandidates(track, this.topK);
      return this.matcher.findBestMatch(track, candidates);
    } catch (error) {
      log.warn({ err: error, sourceTrackId: track.sourceId }, 'matching failed for track');
      return { uri: null, confidence: 0, reason: 'error' };
    }
  }

  private async writeMatched(args: {
    jobId: string;
    collectionId: string;
    matched: readonly MatchedUri[];
    total: number;
    dryRun: boolean;
    checkpoint: CheckpointLog | null;
    persist: () => Promise<void>;
    onBatch: (done: number, batches: number) => void;
    log: Logger;
    firstBatchIndex: number;
  }): Promise<WriteTotals> {
    const { checkpoint, log } = args;
    const batches = splitIntoBatches(args.matched, this.batchProcessor.batchSize);
    const totals: WriteTotals = { added: 0, duplicates: 0, failed: 0, errors: [] };
    // The settled cursor only advances while every batch so far went through in full.
    let settled = true;

    for (const [offset, batch] of batches.entries()) {
      const batchIndex = args.firstBatchIndex + offset;
      const uris = batch.map((entry) => entry.uri);

      if (checkpoint) {
        checkpoint.append({ type: 'batch', batchIndex }, this.now());
        await args.persist();
      }

      try {
        const result = await this.batchProcessor.processBatch(args.collectionId, uris, args.jobId, batchIndex, args.dryRun);
        totals.added += result.added;
        totals.duplicates += result.duplicates;
        totals.failed += result.errors;

        if (checkpoint) {
          checkpoint.append({ type: 'added', uris: uris.slice(0, result.added) }, this.now());
          settled = settled && result.errors === 0;
          if (settled) {
            const nextTrackIndex = batches[offset + 1]?.[0]?.trackIndex ?? args.total;
            checkpoint.append(
              {
                type: 'cursor',
                trackIndex: checkpoint.cursor.trackIndex,
                batchTrackIndex: Math.max(checkpoint.cursor.batchTrackIndex, nextTrackIndex),
              },
              this.now(),
            );
          }
          await args.persist();
        }
      } catch (error) {
        const message = `Failed to process batch ${batchIndex}: ${errorMessage(error)}`;
        log.error({ err: error, batchIndex, size: uris.length }, 'batch failed');
        totals.errors.push(message);
        totals.failed += uris.length;
        settled = false;
      }

      args.onBatch(offset + 1, batches.length);
    }

    if (checkpoint && settled && checkpoint.cursor.batchTrackIndex < args.total) {
      checkpoint.append(
        { type: 'cursor', trackIndex: checkpoint.cursor.trackIndex, batchTrackIndex: args.total },
        this.now(),
      );
    }

    return totals;
  }
}
