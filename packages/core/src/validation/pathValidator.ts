/**
 * Path Validator
 *
 * Stateless pre-flight checks for the pipeline entry points.
 */

import { getExtension, isDirectory, isFile, isInteger } from '@equirect/utils';
import { ValidationError } from '../errors/index.js';
import { JobStore } from '../store/jobStore.js';
import { MAX_FOV, MIN_FOV } from '../types/job.js';

export const SUPPORTED_VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4',
  '.avi',
  '.mkv',
  '.webm',
  '.mov',
]);

export async function validateInputVideo(path: string): Promise<boolean> {
  if (!SUPPORTED_VIDEO_EXTENSIONS.has(getExtension(path))) {
    return false;
  }
  return isFile(path);
}

export async function validateOutputDir(path: string): Promise<boolean> {
  return isDirectory(path);
}

export function validateFov(value: unknown): value is number {
  return isInteger(value) && value >= MIN_FOV && value <= MAX_FOV;
}

/**
 * Crash-recovery gate: a directory that fails this must never be resumed
 */
export async function validateJobDir(path: string): Promise<boolean> {
  if (!(await isDirectory(path))) {
    return false;
  }
  try {
    await JobStore.inspect(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Throw a ValidationError for the first invalid new-job parameter
 */
export async function assertNewJobInput(
  inputVideoPath: string,
  outputDir: string,
  fov: unknown
): Promise<void> {
  if (!(await validateInputVideo(inputVideoPath))) {
    const supported = [...SUPPORTED_VIDEO_EXTENSIONS].join(', ');
    throw new ValidationError(
      'inputVideoPath',
      `${inputVideoPath} is not an existing video file (${supported})`
    );
  }
  if (!(await validateOutputDir(outputDir))) {
    throw new ValidationError('outputDir', `${outputDir} is not an existing directory`);
  }
  if (!validateFov(fov)) {
    throw new ValidationError('fov', `must be an integer from ${MIN_FOV} to ${MAX_FOV}`);
  }
}
