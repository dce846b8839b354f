/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { ConversionPhase, StatusEvent } from '@equirect/core';
import { formatClockTime } from '@equirect/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJsonLine(data: unknown): void {
  console.log(JSON.stringify(data));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export const phaseColors: Record<ConversionPhase, (text: string) => string> = {
  INITIALIZING: chalk.gray,
  CONVERTING_CHUNKS: chalk.blue,
  MERGING: chalk.yellow,
  CLEAN_UP: chalk.cyan,
  FINISHED: chalk.green,
  ERROR: chalk.red,
};

/**
 * One progress line. `completion` overrides the event's own percentage so
 * callers can show the highest value seen so far.
 */
export function formatStatusLine(event: StatusEvent, completion: number = event.completionPercentage): string {
  return `${formatClockTime(event.timestamp)} - completion: ${completion}% status: ${event.currentProcess} - ${event.message}`;
}

/**
 * Parse a field of view typed by the user. Null when it isn't a whole number.
 */
export function parseFovArgument(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}
