/**
 * @equirect/processing
 *
 * Resumable fisheye → equirectangular conversion pipeline.
 *
 * CRITICAL RULES:
 * - One transcoder invocation at a time, one chunk at a time
 * - A chunk leaves chunks_to_convert only after its converted file exists
 * - The merge order is chronological, whatever the processing order
 * - Log every FFmpeg command executed
 */

// Pipeline
export {
  ConversionPipeline,
  type ConversionPipelineOptions,
  type ConversionOutcome,
  type ConversionRun,
} from './pipeline.js';

// FFmpeg wrapper
export {
  FFmpeg,
  type FFmpegOptions,
  type ToolInvocation,
  type ToolRunner,
} from './ffmpeg.js';

// Steps
export { Segmenter, listSegments, type SegmenterOptions } from './segmenter.js';
export { ChunkTranscoder } from './chunkTranscoder.js';
export { Merger, buildConcatManifest } from './merger.js';

// Status
export {
  StatusReporter,
  buildStatusEvent,
  completionPercentage,
  type StatusSink,
  type StatusContext,
  type ChunkProgress,
  type ProgressPhase,
} from './statusReporter.js';
export { StatusChannel } from './statusChannel.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  formatCommand,
  type InputOptions,
  type OutputOptions,
  type StreamMapping,
  type VideoCodecOptions,
} from './commandBuilder.js';

// Presets
export {
  DEFAULT_SEGMENT_SECONDS,
  EQUIRECT_VIDEO_CODEC,
  buildV360Filter,
  createSegmentCommand,
  createEquirectCommand,
  createConcatCommand,
} from './presets.js';

// Naming
export {
  CONCAT_MANIFEST_NAME,
  chunkStem,
  convertedChunkName,
  jobDirName,
  outputFileName,
} from './naming.js';
