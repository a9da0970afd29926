#!/usr/bin/env tsx
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';

import { nanoid } from 'nanoid';

import {
  MAX_BATCH_SIZE,
  RISK_MODES,
  type Collection,
  type RiskMode,
  type SourceCatalog,
  type TargetCatalog,
  type Track,
} from '@tracksync/contracts';
import { computeSnapshotHash, resolveMatcherConfig, TrackMatcher, type Sleep } from '@tracksync/providers-core';

import { createCheckpointStore, type CheckpointStore } from './checkpoints';
import { ConfigError, loadWorkerConfig, type WorkerConfig } from './config';
import { configureLogger, type Logger } from './logger';
import { createSourceCatalog, createTargetCatalog } from './providers';
import { createRedisClient } from './redis';
import { buildTransferReport, writeReport } from './reporting/report';
import { BatchProcessor } from './transfer/batchProcessor';
import { TransferPipeline, type PlaylistTransferOutcome } from './transfer/pipeline';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

const USAGE = `Usage:
  tracksync transfer --source <file.csv> [--source <file.csv>...] [--playlist <id>...]
                     [--job-id <id>] [--dry-run] [--risk-mode strict|balanced|aggressive]
                     [--batch-size <1-${MAX_BATCH_SIZE}>] [--report-dir <dir>]
  tracksync playlists --source <file.csv> [--source <file.csv>...]
  tracksync checkpoints --job-id <id>`;

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  createSource?: (config: WorkerConfig, files: readonly string[]) => SourceCatalog;
  createTarget?: (config: WorkerConfig) => TargetCatalog;
  createStore?: (config: WorkerConfig) => CheckpointStore;
  sleep?: Sleep;
  now?: () => Date;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const isArgumentError = (error: unknown): error is Error =>
  error instanceof UsageError ||
  (error instanceof TypeError && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS'));

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

function parseRiskModeOption(value: string | undefined): RiskMode | undefined {
  if (value === undefined) return undefined;
  const mode = RISK_MODES.find((candidate) => candidate === value.trim().toLowerCase());
  if (!mode) {
    throw new UsageError(`--risk-mode must be one of ${RISK_MODES.join(', ')}`);
  }
  return mode;
}

function parseBatchSizeOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const size = Number(value);
  if (!Number.isInteger(size) || size < 1 || size > MAX_BATCH_SIZE) {
    throw new UsageError(`--batch-size must be an integer between 1 and ${MAX_BATCH_SIZE}`);
  }
  return size;
}

function requireSources(files: readonly string[] | undefined): readonly string[] {
  if (!files || files.length === 0) {
    throw new UsageError('at least one --source file is required');
  }
  return files;
}

function defaultStore(config: WorkerConfig, logger: Logger): CheckpointStore {
  return createCheckpointStore(config.checkpoint, (url) => createRedisClient({ url, logger }));
}

function selectPlaylists(collections: Collection[], wanted: readonly string[] | undefined, logger: Logger): Collection[] {
  if (!wanted || wanted.length === 0) return collections;
  const selected: Collection[] = [];
  for (const key of wanted) {
    const match =
      collections.find((collection) => collection.id === key) ??
      collections.find((collection) => collection.name === key);
    if (match) {
      selected.push(match);
    } else {
      logger.warn({ playlist: key }, 'playlist not found among source playlists; skipping');
    }
  }
  return selected;
}

function exitCodeFor(outcomes: readonly PlaylistTransferOutcome[]): number {
  const partial = outcomes.some((outcome) => !outcome.ok || outcome.result.failedTracks > 0);
  return partial ? EXIT_PARTIAL : EXIT_OK;
}

async function runTransfer(args: string[], config: WorkerConfig, logger: Logger, deps: CliDeps): Promise<number> {
  const stdout = deps.stdout ?? console.log;
  const now = deps.now ?? (() => new Date());
  const { values } = parseArgs({
    args,
    options: {
      source: { type: 'string', multiple: true },
      playlist: { type: 'string', multiple: true },
      'job-id': { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      'risk-mode': { type: 'string' },
      'batch-size': { type: 'string' },
      'report-dir': { type: 'string' },
    },
    strict: true,
  });

  const files = requireSources(values.source);
  const riskMode = parseRiskModeOption(values['risk-mode']) ?? config.riskMode;
  const batchSize = parseBatchSizeOption(values['batch-size']) ?? config.batchSize;
  const jobId = values['job-id'] ?? `job_${nanoid(12)}`;
  let dryRun = values['dry-run'] ?? false;
  if (config.rollback && !dryRun) {
    logger.warn('TRACKSYNC_ROLLBACK is set; forcing dry run');
    dryRun = true;
  }

  const source = deps.createSource ? deps.createSource(config, files) : createSourceCatalog(config, files);
  const target = deps.createTarget ? deps.createTarget(config) : createTargetCatalog(config);
  const store = deps.createStore ? deps.createStore(config) : defaultStore(config, logger);

  try {
    const startedAt = now();
    const log = logger.child({ jobId });
    log.info({ dryRun, riskMode, batchSize }, dryRun ? 'starting dry run' : 'starting transfer');

    const playlists = selectPlaylists(await source.listOwnedCollections(), values.playlist, log);
    if (playlists.length === 0) {
      log.warn('no playlists to transfer');
      stdout('No playlists to transfer');
      return EXIT_OK;
    }

    const snapshotHashes: Record<string, string> = {};
    const allTracks: Track[] = [];
    for (const playlist of playlists) {
      const tracks = await source.listTracks(playlist.id);
      snapshotHashes[playlist.id] = computeSnapshotHash(tracks);
      allTracks.push(...tracks);
    }

    const pipeline = new TransferPipeline({
      source,
      target,
      matcher: new TrackMatcher(resolveMatcherConfig({ riskMode }, deps.env ?? process.env)),
      checkpoints: store,
      batchProcessor: new BatchProcessor(target, {
        batchSize,
        maxRetries: config.maxRetries,
        sleep: deps.sleep,
        logger: logger.child({ component: 'batch-processor' }),
      }),
      candidatesTopK: config.candidatesTopK,
      logger: logger.child({ component: 'transfer-pipeline' }),
      now: deps.now,
    });

    const outcomes = await pipeline.transferAll(playlists, jobId, { dryRun, snapshotHashes });

    const report = buildTransferReport({
      jobId,
      startedAt,
      finishedAt: now(),
      source: source.name,
      target: target.name,
      snapshotHash: computeSnapshotHash(allTracks),
      dryRun,
      outcomes,
      snapshotHashes,
    });
    const reportFile = await writeReport(report, values['report-dir'] ?? config.reportDir);

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        stdout(`${outcome.playlist.name}: failed (${outcome.error})`);
        continue;
      }
      const { result } = outcome;
      const verb = dryRun ? 'would add' : 'added';
      stdout(
        `${outcome.playlist.name}: ${result.matchedTracks}/${result.totalTracks} matched, ` +
          `${dryRun ? result.matchedTracks : result.addedTracks} ${verb}, ${result.failedTracks} failed`,
      );
    }
    stdout(`Job ${jobId} report: ${reportFile}`);

    return exitCodeFor(outcomes);
  } finally {
    await store.close?.();
  }
}

async function runPlaylists(args: string[], config: WorkerConfig, deps: CliDeps): Promise<number> {
  const stdout = deps.stdout ?? console.log;
  const { values } = parseArgs({
    args,
    options: { source: { type: 'string', multiple: true } },
    strict: true,
  });
  const files = requireSources(values.source);
  const source = deps.createSource ? deps.createSource(config, files) : createSourceCatalog(config, files);

  for (const playlist of await source.listOwnedCollections()) {
    stdout(`${playlist.id}: ${playlist.name} (tracks: ${playlist.trackCount})`);
  }
  return EXIT_OK;
}

async function runCheckpoints(args: string[], config: WorkerConfig, logger: Logger, deps: CliDeps): Promise<number> {
  const stdout = deps.stdout ?? console.log;
  const { values } = parseArgs({
    args,
    options: { 'job-id': { type: 'string' } },
    strict: true,
  });
  const jobId = values['job-id'];
  if (!jobId) {
    throw new UsageError('--job-id is required');
  }

  const store = deps.createStore ? deps.createStore(config) : defaultStore(config, logger);
  try {
    const records = await store.listForJob(jobId);
    if (records.length === 0) {
      stdout(`No checkpoints for job ${jobId}`);
      return EXIT_OK;
    }
    for (const record of records) {
      stdout(
        `${record.playlistId}: ${record.stage} ` +
          `(tracks ${record.cursor.trackIndex}/${record.metadata.totalTracks}, ` +
          `added ${record.addedUris.length}, attempts ${record.attempts}, updated ${record.updatedAt})`,
      );
    }
    return EXIT_OK;
  } finally {
    await store.close?.();
  }
}

/** Runs one CLI command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stderr = deps.stderr ?? console.error;
  const [command, ...rest] = argv;

  let config: WorkerConfig;
  try {
    config = loadWorkerConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      stderr(error.message);
      return EXIT_FATAL;
    }
    throw error;
  }
  const logger = configureLogger(config.logLevel).child({ component: 'cli' });

  try {
    switch (command) {
      case 'transfer':
        return await runTransfer(rest, config, logger, deps);
      case 'playlists':
        return await runPlaylists(rest, config, deps);
      case 'checkpoints':
        return await runCheckpoints(rest, config, logger, deps);
      default:
        stderr(USAGE);
        return EXIT_FATAL;
    }
  } catch (error) {
    if (isArgumentError(error)) {
      stderr(`${error.message}\n${USAGE}`);
    } else {
      logger.error({ err: error }, 'command failed');
      stderr(`tracksync ${command} failed: ${errorMessage(error)}`);
    }
    return EXIT_FATAL;
  }
}

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
};

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = EXIT_FATAL;
    },
  );
}
