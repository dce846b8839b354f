/**
 * Conversion Phase Machine
 *
 * Strict state machine for a conversion run.
 *
 * Phase Flow:
 * INITIALIZING → CONVERTING_CHUNKS → MERGING → CLEAN_UP → FINISHED
 *                    ↘ ERROR (from any non-terminal phase)
 *
 * Rules:
 * - Phases only move forward, one step at a time
 * - A resumed job starts at CONVERTING_CHUNKS
 * - Invalid transitions throw errors
 */

import { PhaseTransitionError } from './errors/index.js';

export const CONVERSION_PHASES = [
  'INITIALIZING',
  'CONVERTING_CHUNKS',
  'MERGING',
  'CLEAN_UP',
  'FINISHED',
  'ERROR',
] as const;

export type ConversionPhase = (typeof CONVERSION_PHASES)[number];

/**
 * Represents a phase transition with metadata
 */
export interface PhaseTransition {
  from: ConversionPhase;
  to: ConversionPhase;
  timestamp: Date;
}

const validTransitions: Record<ConversionPhase, ReadonlySet<ConversionPhase>> = {
  INITIALIZING: new Set<ConversionPhase>(['CONVERTING_CHUNKS', 'ERROR']),
  CONVERTING_CHUNKS: new Set<ConversionPhase>(['MERGING', 'ERROR']),
  MERGING: new Set<ConversionPhase>(['CLEAN_UP', 'ERROR']),
  CLEAN_UP: new Set<ConversionPhase>(['FINISHED', 'ERROR']),
  FINISHED: new Set<ConversionPhase>(), // Terminal
  ERROR: new Set<ConversionPhase>(), // Terminal
};

/**
 * Check if a phase transition is valid
 */
export function isValidTransition(from: ConversionPhase, to: ConversionPhase): boolean {
  return validTransitions[from].has(to);
}

export class PhaseMachine {
  private currentPhase: ConversionPhase;
  private readonly history: PhaseTransition[] = [];

  constructor(initialPhase: 'INITIALIZING' | 'CONVERTING_CHUNKS' = 'INITIALIZING') {
    this.currentPhase = initialPhase;
  }

  getPhase(): ConversionPhase {
    return this.currentPhase;
  }

  getHistory(): ReadonlyArray<PhaseTransition> {
    return [...this.history];
  }

  isTerminal(): boolean {
    return this.currentPhase === 'FINISHED' || this.currentPhase === 'ERROR';
  }

  /**
   * Move to the target phase. Staying in the current phase is a no-op.
   */
  advance(target: ConversionPhase): void {
    if (target === this.currentPhase && !this.isTerminal()) {
      return;
    }
    if (!isValidTransition(this.currentPhase, target)) {
      throw new PhaseTransitionError(this.currentPhase, target);
    }
    this.history.push({ from: this.currentPhase, to: target, timestamp: new Date() });
    this.currentPhase = target;
  }
}
