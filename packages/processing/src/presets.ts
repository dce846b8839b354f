/**
 * Conversion Presets
 *
 * Fixed encoding policy and the command factories for each pipeline step.
 */

import { FFmpegCommandBuilder, type VideoCodecOptions } from './commandBuilder.js';

/** Segment length in seconds */
export const DEFAULT_SEGMENT_SECONDS = 1;

/**
 * Constant-quality HEVC used for every converted chunk
 */
export const EQUIRECT_VIDEO_CODEC: Readonly<VideoCodecOptions> = {
  codec: 'libx265',
  crf: 18,
  pixFmt: 'yuv420p',
};

/**
 * v360 filter turning an SBS fisheye frame into SBS half-equirectangular
 */
export function buildV360Filter(fov: number): string {
  return [
    'v360=input=fisheye',
    `ih_fov=${fov}`,
    `iv_fov=${fov}`,
    'output=hequirect',
    'in_stereo=sbs',
    'out_stereo=sbs',
  ].join(':');
}

/**
 * Split the source into numbered pieces without re-encoding.
 * `outputPattern` carries the %d placeholder, e.g. %d.mp4 inside the job directory
 */
export function createSegmentCommand(
  inputFile: string,
  outputPattern: string,
  segmentSeconds: number = DEFAULT_SEGMENT_SECONDS
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(inputFile)
    .mapAll(0)
    .copyAllStreams()
    .setOutputOptions({
      format: 'segment',
      extraArgs: ['-segment_time', segmentSeconds.toString(), '-reset_timestamps', '1'],
    })
    .setOutput(outputPattern);
}

/**
 * Project one chunk, keeping only its video stream
 */
export function createEquirectCommand(
  inputFile: string,
  outputFile: string,
  fov: number
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(inputFile)
    .mapVideo(0)
    .setVideoCodec({ ...EQUIRECT_VIDEO_CODEC })
    .addVideoFilter(buildV360Filter(fov))
    .setOutput(outputFile);
}

/**
 * Join the files listed in a concat demuxer manifest
 */
export function createConcatCommand(
  manifestFile: string,
  outputFile: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(manifestFile, { format: 'concat', extraArgs: ['-safe', '0'] })
    .copyAllStreams()
    .setOutput(outputFile);
}
