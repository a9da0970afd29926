import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { MatchResult } from '@tracksync/contracts';

import type { PlaylistTransferOutcome, TransferResult } from '../transfer/pipeline';

export type TrackStatus = 'matched' | 'skipped_dry_run' | 'not_found' | 'ambiguous' | 'error';

export interface ReportHeader {
  jobId: string;
  startedAt: string;
  finishedAt: string | null;
  source: string;
  target: string;
  snapshotHash: string | null;
  dryRun: boolean;
}

export interface ReportTotals {
  playlists: number;
  failedPlaylists: number;
  tracks: number;
  matched: number;
  notFound: number;
  ambiguous: number;
  added: number;
  duplicates: number;
  failed: number;
  durationMs: number;
}

export interface PlaylistSummary {
  playlistId: string;
  name: string;
  targetPlaylistId: string | null;
  snapshotHash: string | null;
  resumed: boolean;
  totals: {
    total: number;
    matched: number;
    notFound: number;
    ambiguous: number;
    added: number;
    duplicates: number;
    failed: number;
  };
  errors: string[];
  durationMs: number;
}

export interface TrackReportEntry {
  playlistId: string;
  sourceTrackId: string;
  status: TrackStatus;
  uri: string | null;
  confidence: number;
  reason: MatchResult['reason'];
}

export interface TransferReport {
  header: ReportHeader;
  totals: ReportTotals;
  playlists: PlaylistSummary[];
  tracks: TrackReportEntry[];
}

export interface BuildReportInput {
  jobId: string;
  startedAt: Date;
  finishedAt?: Date | null;
  source: string;
  target: string;
  snapshotHash?: string | null;
  dryRun: boolean;
  outcomes: readonly PlaylistTransferOutcome[];
  /** Per-playlist snapshot hashes keyed by source playlist id. */
  snapshotHashes?: Readonly<Record<string, string>>;
}

export function trackStatus(result: MatchResult, dryRun: boolean): TrackStatus {
  if (result.uri !== null) {
    return dryRun ? 'skipped_dry_run' : 'matched';
  }
  switch (result.reason) {
    case 'ambiguous':
      return 'ambiguous';
    case 'error':
      return 'error';
    default:
      return 'not_found';
  }
}

const emptyTransfer = (): Omit<TransferResult, 'playlistId' | 'playlistName' | 'resumed'> => ({
  totalTracks: 0,
  matchedTracks: 0,
  notFoundTracks: 0,
  ambiguousTracks: 0,
  addedTracks: 0,
  duplicateTracks: 0,
  failedTracks: 0,
  errors: [],
  durationMs: 0,
  tracks: [],
});

function summarize(outcome: PlaylistTransferOutcome, snapshotHash: string | null): PlaylistSummary {
  const result = outcome.ok ? outcome.result : emptyTransfer();
  return {
    playlistId: outcome.playlist.id,
    name: outcome.playlist.name,
    targetPlaylistId: outcome.ok ? outcome.result.playlistId : null,
    snapshotHash,
    resumed: outcome.ok ? outcome.result.resumed : false,
    totals: {
      total: result.totalTracks,
      matched: result.matchedTracks,
      notFound: result.notFoundTracks,
      ambiguous: result.ambiguousTracks,
      added: result.addedTracks,
      duplicates: result.duplicateTracks,
      failed: result.failedTracks,
    },
    errors: outcome.ok ? [...result.errors] : [outcome.error],
    durationMs: result.durationMs,
  };
}

/** Job-level report: header, overall totals, one summary per playlist and one entry per matched track. */
export function buildTransferReport(input: BuildReportInput): TransferReport {
  const playlists = input.outcomes.map((outcome) =>
    summarize(outcome, input.snapshotHashes?.[outcome.playlist.id] ?? null),
  );

  const tracks: TrackReportEntry[] = input.outcomes.flatMap((outcome) =>
    outcome.ok
      ? outcome.result.tracks.map(({ sourceTrackId, result }) => ({
          playlistId: outcome.playlist.id,
          sourceTrackId,
          status: trackStatus(result, input.dryRun),
          uri: result.uri,
          confidence: result.confidence,
          reason: result.reason,
        }))
      : [],
  );

  const totals = playlists.reduce<ReportTotals>(
    (acc, summary) => ({
      playlists: acc.playlists + 1,
      failedPlaylists: acc.failedPlaylists,
      tracks: acc.tracks + summary.totals.total,
      matched: acc.matched + summary.totals.matched,
      notFound: acc.notFound + summary.totals.notFound,
      ambiguous: acc.ambiguous + summary.totals.ambiguous,
      added: acc.added + summary.totals.added,
      duplicates: acc.duplicates + summary.totals.duplicates,
      failed: acc.failed + summary.totals.failed,
      durationMs: acc.durationMs + summary.durationMs,
    }),
    {
      playlists: 0,
      failedPlaylists: input.outcomes.filter((outcome) => !outcome.ok).length,
      tracks: 0,
      matched: 0,
      notFound: 0,
      ambiguous: 0,
      added: 0,
      duplicates: 0,
      failed: 0,
      durationMs: 0,
    },
  );

  return {
    header: {
      jobId: input.jobId,
      startedAt: input.startedAt.toISOString(),
      finishedAt: input.finishedAt ? input.finishedAt.toISOString() : null,
      source: input.source,
      target: input.target,
      snapshotHash: input.snapshotHash ?? null,
      dryRun: input.dryRun,
    },
    totals,
    playlists,
    tracks,
  };
}

export function reportPath(dir: string, jobId: string): string {
  return path.join(dir, `${jobId.replace(/[^A-Za-z0-9._-]/g, '_')}.json`);
}

/** Writes `<dir>/<jobId>.json` and returns its path. */
export async function writeReport(report: TransferReport, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = reportPath(dir, report.header.jobId);
  await writeFile(file, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  return file;
}
