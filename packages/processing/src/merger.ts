/**
 * Merger
 *
 * Joins the converted chunks back together in chronological order.
 * chunks_all is stored highest number first, so the manifest lists it
 * reversed.
 */

import { writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { CorruptJobError, type JobStore } from '@equirect/core';
import { createLogger, isFile, removeIfExists, type Logger } from '@equirect/utils';
import { CONCAT_MANIFEST_NAME, convertedChunkName, outputFileName } from './naming.js';
import { createConcatCommand } from './presets.js';
import type { ToolRunner } from './ffmpeg.js';
import type { StatusReporter } from './statusReporter.js';

/**
 * Concat demuxer manifest. Paths are relative to the manifest's directory.
 */
export function buildConcatManifest(chunksAll: readonly string[]): string {
  return [...chunksAll]
    .reverse()
    .map((chunk) => `file '${convertedChunkName(chunk)}'\n`)
    .join('');
}

export class Merger {
  private readonly log: Logger;

  constructor(
    private readonly runner: ToolRunner,
    private readonly store: JobStore,
    private readonly reporter: StatusReporter
  ) {
    this.log = createLogger({ component: 'merger', jobDir: store.jobDir });
  }

  /**
   * Produce the final file and remove the intermediates. Returns its path.
   */
  async merge(): Promise<string> {
    this.reporter.update('MERGING', 'Merging converted chunks into single video file');

    const job = await this.store.read();
    const manifestPath = join(job.jobDir, CONCAT_MANIFEST_NAME);
    const outputPath = join(job.jobDir, outputFileName(job.videoName));

    const missing: string[] = [];
    for (const chunk of job.chunksAll) {
      if (!(await isFile(join(job.jobDir, convertedChunkName(chunk))))) {
        missing.push(chunk);
      }
    }

    if (missing.length === 0) {
      await writeFile(manifestPath, buildConcatManifest(job.chunksAll), 'utf8');
      await removeIfExists(outputPath);

      const command = createConcatCommand(manifestPath, outputPath);
      await this.runner.run({ step: 'CONCAT', args: command.build(), cwd: job.jobDir });
      this.log.info({ outputPath, chunks: job.chunksAll.length }, 'Chunks merged');
    } else if (await isFile(outputPath)) {
      // A previous run merged and was interrupted while cleaning up
      this.log.warn({ outputPath, missing: missing.length }, 'Merged output already present');
    } else {
      throw new CorruptJobError(job.jobDir, `converted chunk for ${missing[0]} is missing`);
    }

    this.reporter.update('CLEAN_UP', 'Removing chunk files');
    for (const chunk of job.chunksAll) {
      await rm(join(job.jobDir, convertedChunkName(chunk)), { force: true });
      // Originals only survive a crash between commit and delete
      if (await removeIfExists(join(job.jobDir, chunk))) {
        this.log.warn({ chunk }, 'Removed leftover original chunk');
      }
    }
    await rm(manifestPath, { force: true });

    return outputPath;
  }
}
