/**
 * Job Types
 *
 * Persisted record schemas and the in-memory view of a conversion job.
 * Persisted keys stay snake_case; everything in memory is camelCase.
 */

import { z } from 'zod';
import type { ConversionPhase } from '../phase.js';
import type { ToolStep } from '../errors/index.js';

export const MIN_FOV = 1;
export const MAX_FOV = 360;

export const JOB_RECORD_VERSION = 1;

const chunkListSchema = z.array(z.string().min(1));

/**
 * conversion_data.json: written once when the job is created
 */
export const jobHeaderSchema = z.object({
  version: z.literal(JOB_RECORD_VERSION),
  video_name: z.string().min(1),
  fov: z.number().int().min(MIN_FOV).max(MAX_FOV),
  chunks_all: chunkListSchema.min(1),
  created_at: z.string(),
});

/**
 * conversion_data.progress.json and its backup
 */
export const jobProgressSchema = z.object({
  chunks_to_convert: chunkListSchema,
  updated_at: z.string(),
});

export type JobHeaderFile = z.infer<typeof jobHeaderSchema>;
export type JobProgressFile = z.infer<typeof jobProgressSchema>;

export interface ConversionJob {
  jobDir: string;
  videoName: string;
  fov: number;
  /** Segment filenames, highest number first */
  chunksAll: readonly string[];
  /** Prefix of chunksAll still waiting for conversion */
  chunksToConvert: readonly string[];
}

export interface JobCreateInput {
  videoName: string;
  fov: number;
  chunks: readonly string[];
}

export interface StatusEventError {
  code: string;
  step: ConversionPhase;
  tool?: ToolStep;
  chunk?: string;
}

export interface StatusEvent {
  readonly videoName: string;
  readonly fov: number;
  readonly completionPercentage: number;
  readonly currentProcess: ConversionPhase;
  readonly message: string;
  readonly timestamp: Date;
  readonly error?: StatusEventError;
}
