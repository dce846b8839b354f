/**
 * Resume Command
 *
 * Continue an interrupted conversion from its job directory.
 */

import { resolve } from 'node:path';
import { config } from '../config/index.js';
import { createPipeline } from '../lib/pipeline.js';
import { followRun } from '../lib/progress.js';
import { reportOutcome, reportRejection } from '../lib/outcome.js';

interface ResumeOptions {
  json?: boolean;
}

export async function resumeCommand(jobDir: string, options: ResumeOptions): Promise<void> {
  try {
    const run = await createPipeline().resumeJob(resolve(jobDir));
    const result = await followRun(run, { pollMs: config.statusPollMs, json: options.json });
    await reportOutcome(result, options.json);
  } catch (error) {
    reportRejection(error, options.json);
  }
}
