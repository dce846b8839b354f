/**
 * Status Reporter
 *
 * Turns pipeline progress into immutable StatusEvents and hands each one
 * to a caller-supplied sink.
 *
 * Completion model:
 *   INITIALIZING       0
 *   CONVERTING_CHUNKS  1 + round(97 * converted / total)   (1..98)
 *   MERGING            98
 *   CLEAN_UP           99
 *   FINISHED           100
 *   ERROR              last reported value
 */

import {
  ConverterError,
  ExternalToolError,
  PhaseMachine,
  type ConversionPhase,
  type StatusEvent,
  type StatusEventError,
} from '@equirect/core';
import { createLogger, type Logger } from '@equirect/utils';

export type StatusSink = (event: StatusEvent) => void;

export type ProgressPhase = Exclude<ConversionPhase, 'ERROR'>;

export interface ChunkProgress {
  /** |chunks_all| */
  total: number;
  /** |chunks_to_convert| */
  remaining: number;
}

export interface StatusContext {
  videoName: string;
  fov: number;
}

const FIXED_PERCENTAGES = {
  INITIALIZING: 0,
  MERGING: 98,
  CLEAN_UP: 99,
  FINISHED: 100,
} as const satisfies Record<Exclude<ProgressPhase, 'CONVERTING_CHUNKS'>, number>;

export function completionPercentage(phase: ProgressPhase, progress?: ChunkProgress): number {
  if (phase !== 'CONVERTING_CHUNKS') {
    return FIXED_PERCENTAGES[phase];
  }
  if (!progress) {
    throw new ConverterError('Chunk progress is required while converting', 'MISSING_PROGRESS');
  }
  const { total, remaining } = progress;
  if (total <= 0) {
    throw new ConverterError('Job has no chunks to convert', 'EMPTY_JOB', { total });
  }
  if (remaining < 0 || remaining > total) {
    throw new ConverterError('Remaining chunk count out of range', 'INVALID_PROGRESS', {
      total,
      remaining,
    });
  }
  return 1 + Math.round((97 * (total - remaining)) / total);
}

export function buildStatusEvent(params: {
  context: StatusContext;
  phase: ConversionPhase;
  completionPercentage: number;
  message: string;
  timestamp?: Date;
  error?: StatusEventError;
}): StatusEvent {
  const event: StatusEvent = {
    videoName: params.context.videoName,
    fov: params.context.fov,
    completionPercentage: params.completionPercentage,
    currentProcess: params.phase,
    message: params.message,
    timestamp: params.timestamp ?? new Date(),
    ...(params.error ? { error: Object.freeze({ ...params.error }) } : {}),
  };
  return Object.freeze(event);
}

export class StatusReporter {
  private readonly machine: PhaseMachine;
  private readonly log: Logger;
  private lastPercentage: number;
  private activeChunk?: string;

  constructor(
    private readonly sink: StatusSink,
    private readonly context: StatusContext,
    initialPhase: 'INITIALIZING' | 'CONVERTING_CHUNKS' = 'INITIALIZING'
  ) {
    this.machine = new PhaseMachine(initialPhase);
    this.log = createLogger({ component: 'status', videoName: context.videoName });
    this.lastPercentage = 0;
  }

  get phase(): ConversionPhase {
    return this.machine.getPhase();
  }

  /**
   * Enter (or stay in) a phase and emit one event for it
   */
  update(
    phase: ProgressPhase,
    message: string,
    details: { progress?: ChunkProgress; chunk?: string } = {}
  ): StatusEvent {
    const percentage = completionPercentage(phase, details.progress);
    this.machine.advance(phase);
    this.activeChunk = phase === 'CONVERTING_CHUNKS' ? details.chunk : undefined;
    this.lastPercentage = percentage;
    this.log.info({ phase, completion: percentage }, message);
    return this.emit(buildStatusEvent({
      context: this.context,
      phase,
      completionPercentage: percentage,
      message,
    }));
  }

  /**
   * Emit the terminal ERROR event for a failed run
   */
  fail(error: ConverterError): StatusEvent {
    const step = this.machine.getPhase();
    const chunk = error instanceof ExternalToolError ? error.chunk ?? this.activeChunk : this.activeChunk;
    const detail: StatusEventError = {
      code: error.code,
      step,
      ...(error instanceof ExternalToolError ? { tool: error.step } : {}),
      ...(chunk !== undefined ? { chunk } : {}),
    };
    if (!this.machine.isTerminal()) {
      this.machine.advance('ERROR');
    }
    return this.emit(buildStatusEvent({
      context: this.context,
      phase: 'ERROR',
      completionPercentage: this.lastPercentage,
      message: error.message,
      error: detail,
    }));
  }

  private emit(event: StatusEvent): StatusEvent {
    this.sink(event);
    return event;
  }
}
