import { z } from 'zod';

import { CHECKPOINT_STAGES } from './constants';

export const checkpointStageSchema = z.enum(CHECKPOINT_STAGES);

export type CheckpointStage = z.infer<typeof checkpointStageSchema>;

export const checkpointRecordSchema = z.object({
  jobId: z.string().min(1),
  snapshotHash: z.string().nullable(),
  playlistId: z.string().min(1),
  batchIndex: z.number().int().min(0),
  stage: checkpointStageSchema,
  cursor: z.object({
    trackIndex: z.number().int().min(0),
    batchTrackIndex: z.number().int().min(0),
  }),
  addedUris: z.array(z.string()),
  attempts: z.number().int().min(0),
  updatedAt: z.string(),
  metadata: z.object({
    totalTracks: z.number().int().min(0),
    processedTracks: z.number().int().min(0),
    batchSize: z.number().int().min(1),
  }),
});

/** Durable progress record for one (jobId, playlistId) transfer, stored as JSON. */
export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>;

const STAGE_ORDER: Record<CheckpointStage, number> = {
  scanning: 0,
  matching: 1,
  writing: 2,
  completed: 3,
};

export function compareStages(a: CheckpointStage, b: CheckpointStage): number {
  return STAGE_ORDER[a] - STAGE_ORDER[b];
}
