/**
 * Custom Error Classes
 */

import { isErrnoException } from '@equirect/utils';
import type { ConversionPhase } from '../phase.js';

/**
 * Step of the pipeline that shells out to the transcoder
 */
export type ToolStep = 'SEGMENT' | 'TRANSCODE' | 'CONCAT';

/**
 * Base error class for all converter errors
 */
export class ConverterError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConverterError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends ConverterError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * A job directory whose persisted record can't be trusted
 */
export class CorruptJobError extends ConverterError {
  constructor(jobDir: string, reason: string, options?: { cause?: unknown }) {
    super(
      `Conversion directory ${jobDir} is not resumable: ${reason}`,
      'CORRUPT_JOB',
      { jobDir, reason },
      options
    );
    this.name = 'CorruptJobError';
  }
}

/**
 * The external transcoder failed to start or exited with an error
 */
export class ExternalToolError extends ConverterError {
  public readonly step: ToolStep;
  public readonly chunk?: string;
  public readonly exitCode: number;

  constructor(
    step: ToolStep,
    exitCode: number,
    stderr: string,
    options: { chunk?: string; cause?: unknown; reason?: string } = {}
  ) {
    const target = options.chunk ? ` on chunk ${options.chunk}` : '';
    const outcome = options.reason
      ?? (exitCode < 0 ? 'could not start the transcoder' : `failed with exit code ${exitCode}`);
    super(
      `${step} step ${outcome}${target}`,
      'EXTERNAL_TOOL_ERROR',
      { step, exitCode, chunk: options.chunk, stderr: stderr.slice(-1000) },
      { cause: options.cause }
    );
    this.name = 'ExternalToolError';
    this.step = step;
    this.chunk = options.chunk;
    this.exitCode = exitCode;
  }
}

/**
 * Unexpected I/O failure while a run is in progress
 */
export class FilesystemError extends ConverterError {
  constructor(cause: NodeJS.ErrnoException) {
    super(
      `Filesystem operation failed: ${cause.message}`,
      'FILESYSTEM_ERROR',
      { errno: cause.code, syscall: cause.syscall, path: cause.path },
      { cause }
    );
    this.name = 'FilesystemError';
  }
}

/**
 * Phase change out of pipeline order
 */
export class PhaseTransitionError extends ConverterError {
  constructor(from: ConversionPhase, to: ConversionPhase) {
    super(
      `Invalid phase transition from ${from} to ${to}`,
      'PHASE_TRANSITION_ERROR',
      { from, to }
    );
    this.name = 'PhaseTransitionError';
  }
}

/**
 * Normalize anything thrown inside a run
 */
export function toConverterError(error: unknown): ConverterError {
  if (error instanceof ConverterError) {
    return error;
  }
  if (isErrnoException(error)) {
    return new FilesystemError(error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConverterError(message, 'INTERNAL_ERROR', undefined, { cause: error });
}
