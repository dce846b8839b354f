/**
 * Chunk Transcoder
 *
 * Drains chunks_to_convert one segment at a time. For each segment:
 *
 *   1. remove any stale converted file left by a crashed attempt
 *   2. run the projection transform into <n>_conv.mp4
 *   3. commit chunks_to_convert without the segment
 *   4. delete the original segment
 *
 * A crash anywhere before step 3 leaves the segment pending, so the next
 * run redoes it from scratch. A crash after step 3 only leaves an orphaned
 * original, which the merger sweeps up.
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { CorruptJobError, type JobStore } from '@equirect/core';
import { createLogger, isFile, removeIfExists, type Logger } from '@equirect/utils';
import { convertedChunkName } from './naming.js';
import { createEquirectCommand } from './presets.js';
import type { ToolRunner } from './ffmpeg.js';
import type { StatusReporter } from './statusReporter.js';

export class ChunkTranscoder {
  private readonly log: Logger;

  constructor(
    private readonly runner: ToolRunner,
    private readonly store: JobStore,
    private readonly reporter: StatusReporter
  ) {
    this.log = createLogger({ component: 'chunk-transcoder', jobDir: store.jobDir });
  }

  /**
   * Convert every pending chunk. Returns the chunks converted by this call,
   * in processing order.
   */
  async run(): Promise<string[]> {
    const converted: string[] = [];

    for (;;) {
      const job = await this.store.read();
      if (job.chunksAll.length === 0) {
        throw new CorruptJobError(job.jobDir, 'chunks_all is empty');
      }

      const pending = [...job.chunksToConvert];
      const chunk = pending.pop();
      if (chunk === undefined) {
        break;
      }

      this.reporter.update('CONVERTING_CHUNKS', `Converting chunk ${chunk}`, {
        chunk,
        progress: { total: job.chunksAll.length, remaining: job.chunksToConvert.length },
      });

      await this.convert(job.jobDir, chunk, job.fov);
      await this.store.commitChunksToConvert(pending);
      await rm(join(job.jobDir, chunk));

      converted.push(chunk);
    }

    this.log.info({ converted: converted.length }, 'All chunks converted');
    return converted;
  }

  private async convert(jobDir: string, chunk: string, fov: number): Promise<void> {
    const sourcePath = join(jobDir, chunk);
    const targetPath = join(jobDir, convertedChunkName(chunk));

    if (!(await isFile(sourcePath))) {
      throw new CorruptJobError(jobDir, `pending chunk ${chunk} is missing`);
    }

    if (await removeIfExists(targetPath)) {
      this.log.warn({ chunk }, 'Removed converted chunk left by an interrupted attempt');
    }

    const command = createEquirectCommand(sourcePath, targetPath, fov);
    await this.runner.run({ step: 'TRANSCODE', args: command.build(), cwd: jobDir, chunk });
  }
}
