/**
 * Convert Command
 *
 * Start a new conversion of a side-by-side fisheye video.
 */

import { dirname, resolve } from 'node:path';
import { ValidationError } from '@equirect/core';
import { config } from '../config/index.js';
import { createPipeline } from '../lib/pipeline.js';
import { followRun } from '../lib/progress.js';
import { reportOutcome, reportRejection } from '../lib/outcome.js';
import { parseFovArgument } from '../lib/output.js';

export interface ConvertOptions {
  output?: string;
  fov?: string;
  json?: boolean;
}

export async function convertCommand(input: string, options: ConvertOptions): Promise<void> {
  const fov = options.fov === undefined ? config.defaultFov : parseFovArgument(options.fov);
  if (fov === null) {
    reportRejection(new ValidationError('fov', `"${options.fov ?? ''}" is not a whole number`), options.json);
    return;
  }

  const inputVideoPath = resolve(input);
  const outputDir = resolve(options.output ?? dirname(inputVideoPath));

  try {
    const run = await createPipeline().startNewJob(inputVideoPath, outputDir, fov);
    const result = await followRun(run, { pollMs: config.statusPollMs, json: options.json });
    await reportOutcome(result, options.json);
  } catch (error) {
    reportRejection(error, options.json);
  }
}
