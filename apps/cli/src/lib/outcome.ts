/**
 * Final report for a finished or failed run
 */

import chalk from 'chalk';
import { ConverterError, validateJobDir } from '@equirect/core';
import { printError, printInfo, printJsonLine, printKeyValue, printSuccess } from './output.js';
import type { FollowResult } from './progress.js';

export async function reportOutcome(result: FollowResult, json?: boolean): Promise<void> {
  const { outcome } = result;

  if (outcome.status === 'finished') {
    if (json) {
      printJsonLine({ status: 'finished', jobDir: outcome.jobDir, outputFile: outcome.outputFile });
      return;
    }
    printSuccess('Conversion completed');
    printKeyValue('Output', outcome.outputFile);
    printKeyValue('Job directory', outcome.jobDir);
    return;
  }

  const resumable = outcome.jobDir !== undefined && (await validateJobDir(outcome.jobDir));
  process.exitCode = 1;

  if (json) {
    printJsonLine({
      status: 'failed',
      jobDir: outcome.jobDir ?? null,
      code: outcome.error.code,
      message: outcome.error.message,
      resumable,
    });
    return;
  }

  printError(outcome.error.message);
  printKeyValue('Code', outcome.error.code);
  if (outcome.jobDir !== undefined) {
    printKeyValue('Job directory', outcome.jobDir);
  }
  if (resumable && outcome.jobDir !== undefined) {
    printInfo(`Resume with ${chalk.cyan(`fisheye-equirect resume "${outcome.jobDir}"`)}`);
  }
}

/**
 * Report a run that was refused before it started
 */
export function reportRejection(error: unknown, json?: boolean): void {
  process.exitCode = 1;
  const code = error instanceof ConverterError ? error.code : 'INTERNAL_ERROR';
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (json) {
    printJsonLine({ status: 'rejected', code, message });
    return;
  }
  printError(message);
}
