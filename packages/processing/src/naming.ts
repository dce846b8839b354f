/**
 * File naming inside a job directory
 */

import { formatFileTimestamp, getBasename } from '@equirect/utils';

export const CONCAT_MANIFEST_NAME = 'chunks.txt';

const CONVERTED_CHUNK_SUFFIX = '_conv.mp4';
const OUTPUT_SUFFIX = '_converted';

export function chunkStem(chunk: string): string {
  return getBasename(chunk);
}

export function convertedChunkName(chunk: string): string {
  return `${chunkStem(chunk)}${CONVERTED_CHUNK_SUFFIX}`;
}

export function jobDirName(videoName: string, startedAt: Date): string {
  return `${getBasename(videoName)}${OUTPUT_SUFFIX}_${formatFileTimestamp(startedAt)}`;
}

export function outputFileName(videoName: string): string {
  return `${getBasename(videoName)}${OUTPUT_SUFFIX}.mp4`;
}

/**
 * Matches segment files written by the segment command, e.g. 12.mp4
 */
export function segmentFilePattern(extension: string): RegExp {
  const escaped = extension.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`^(\\d+)${escaped}$`);
}
