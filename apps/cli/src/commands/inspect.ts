/**
 * Inspect Command
 *
 * Show what a job directory's record says, or why it can't be resumed.
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import { CorruptJobError, JobStore, JOB_STORE_FILES } from '@equirect/core';
import { isDirectory } from '@equirect/utils';
import { completionPercentage } from '@equirect/processing';
import {
  printError,
  printHeader,
  printJsonLine,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

interface InspectOptions {
  json?: boolean;
  verbose?: boolean;
}

export async function inspectCommand(jobDir: string, options: InspectOptions): Promise<void> {
  const path = resolve(jobDir);

  try {
    if (!(await isDirectory(path))) {
      throw new CorruptJobError(path, 'directory does not exist');
    }
    const job = await JobStore.inspect(path);
    const total = job.chunksAll.length;
    const remaining = job.chunksToConvert.length;
    const completion = completionPercentage('CONVERTING_CHUNKS', { total, remaining });

    if (options.json) {
      printJsonLine({
        jobDir: path,
        resumable: true,
        videoName: job.videoName,
        fov: job.fov,
        chunksTotal: total,
        chunksRemaining: remaining,
        completionPercentage: completion,
        ...(options.verbose ? { chunksToConvert: job.chunksToConvert } : {}),
      });
      return;
    }

    printHeader(`Job: ${job.videoName}`);
    printKeyValue('Directory', path);
    printKeyValue('Field of view', job.fov);
    printKeyValue('Chunks', `${total - remaining}/${total} converted`);
    printKeyValue('Completion', `${completion}%`);
    if (options.verbose && remaining > 0) {
      printKeyValue('Next chunk', job.chunksToConvert[remaining - 1] ?? '-');
      printKeyValue('Pending', job.chunksToConvert.join(', '));
    }
    console.log();
    printSuccess(`Resumable with ${chalk.cyan(`fisheye-equirect resume "${path}"`)}`);
  } catch (error) {
    process.exitCode = 1;
    if (!(error instanceof CorruptJobError)) {
      printError(error instanceof Error ? error.message : 'Unknown error');
      return;
    }
    if (options.json) {
      printJsonLine({ jobDir: path, resumable: false, code: error.code, message: error.message });
      return;
    }
    printError(error.message);
    printWarning(`A resumable job keeps ${Object.values(JOB_STORE_FILES).join(', ')}`);
  }
}
