/**
 * Segmenter
 *
 * Creates the job directory and splits the source video into numbered,
 * fixed-length pieces inside it.
 */

import { mkdir, readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { ExternalToolError } from '@equirect/core';
import { createLogger, type Logger } from '@equirect/utils';
import { jobDirName, segmentFilePattern } from './naming.js';
import { createSegmentCommand, DEFAULT_SEGMENT_SECONDS } from './presets.js';
import type { ToolRunner } from './ffmpeg.js';

export interface SegmenterOptions {
  segmentSeconds?: number;
}

export class Segmenter {
  private readonly segmentSeconds: number;
  private readonly log: Logger;

  constructor(
    private readonly runner: ToolRunner,
    options: SegmenterOptions = {}
  ) {
    this.segmentSeconds = options.segmentSeconds ?? DEFAULT_SEGMENT_SECONDS;
    this.log = createLogger({ component: 'segmenter' });
  }

  /**
   * Create <outputDir>/<name>_converted_<timestamp>. Fails if it exists.
   */
  async createJobDir(outputDir: string, inputVideoPath: string, startedAt: Date = new Date()): Promise<string> {
    const jobDir = join(outputDir, jobDirName(basename(inputVideoPath), startedAt));
    await mkdir(jobDir);
    this.log.info({ jobDir }, 'Conversion directory created');
    return jobDir;
  }

  /**
   * Split the input into the job directory and return the segment names,
   * highest number first.
   */
  async segment(inputVideoPath: string, jobDir: string): Promise<string[]> {
    const extension = extname(inputVideoPath);
    // Relative to the job directory, so the directory name is never read as a pattern
    const command = createSegmentCommand(inputVideoPath, `%d${extension}`, this.segmentSeconds);

    await this.runner.run({ step: 'SEGMENT', args: command.build(), cwd: jobDir });

    const chunks = await listSegments(jobDir, extension);
    if (chunks.length === 0) {
      throw new ExternalToolError('SEGMENT', 0, '', { reason: 'produced no segments' });
    }

    this.log.info(
      { jobDir, chunks: chunks.length, segmentSeconds: this.segmentSeconds },
      'Video split into chunks'
    );
    return chunks;
  }
}

/**
 * Segment files in a job directory, sorted by number, descending
 */
export async function listSegments(jobDir: string, extension: string): Promise<string[]> {
  const pattern = segmentFilePattern(extension);
  const numbered: Array<{ name: string; index: number }> = [];

  for (const name of await readdir(jobDir)) {
    const match = pattern.exec(name);
    if (match?.[1] !== undefined) {
      numbered.push({ name, index: Number.parseInt(match[1], 10) });
    }
  }

  return numbered
    .sort((a, b) => b.index - a.index)
    .map(({ name }) => name);
}
