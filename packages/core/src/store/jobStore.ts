/**
 * Persistent Job Store
 *
 * Durable record of one conversion job, kept in its job directory as three
 * JSON artifacts. Every write is an atomic replace, so a crash leaves each
 * artifact either at its previous or at its new content.
 *
 * Write ordering:
 * - create() writes the header, the backup, then the progress file last;
 *   a directory without all three is not a job.
 * - commitChunksToConvert() rotates the backup before replacing progress.
 */

import { readdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createLogger,
  isAtomicTempFor,
  isErrnoException,
  writeFileAtomic,
  type Logger,
} from '@equirect/utils';
import type { ZodType, ZodTypeDef } from 'zod';
import { CorruptJobError } from '../errors/index.js';
import {
  JOB_RECORD_VERSION,
  jobHeaderSchema,
  jobProgressSchema,
  type ConversionJob,
  type JobCreateInput,
  type JobHeaderFile,
  type JobProgressFile,
} from '../types/job.js';

export const JOB_STORE_FILES = {
  header: 'conversion_data.json',
  progress: 'conversion_data.progress.json',
  backup: 'conversion_data.bak',
} as const;

export type JobStoreArtifact = keyof typeof JOB_STORE_FILES;

function serialize(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function isPrefixOf(prefix: readonly string[], list: readonly string[]): boolean {
  return prefix.length <= list.length && prefix.every((item, index) => list[index] === item);
}

async function readArtifact<T>(
  jobDir: string,
  artifact: JobStoreArtifact,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
  const filename = JOB_STORE_FILES[artifact];
  let raw: string;
  try {
    raw = await readFile(join(jobDir, filename), 'utf8');
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new CorruptJobError(jobDir, `${filename} is missing`, { cause: error });
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptJobError(jobDir, `${filename} is not valid JSON`, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid shape';
    throw new CorruptJobError(jobDir, `${filename} ${where}`, { cause: result.error });
  }
  return result.data;
}

export class JobStore {
  private readonly log: Logger;

  private constructor(public readonly jobDir: string) {
    this.log = createLogger({ component: 'job-store', jobDir });
  }

  /**
   * Persist a new job. The segment files must already be on disk.
   */
  static async create(jobDir: string, input: JobCreateInput): Promise<JobStore> {
    const now = new Date().toISOString();
    const header: JobHeaderFile = {
      version: JOB_RECORD_VERSION,
      video_name: input.videoName,
      fov: input.fov,
      chunks_all: [...input.chunks],
      created_at: now,
    };
    const progress: JobProgressFile = {
      chunks_to_convert: [...input.chunks],
      updated_at: now,
    };

    // Reject anything the reader would later call corrupt
    jobHeaderSchema.parse(header);

    await writeFileAtomic(join(jobDir, JOB_STORE_FILES.header), serialize(header));
    await writeFileAtomic(join(jobDir, JOB_STORE_FILES.backup), serialize(progress));
    await writeFileAtomic(join(jobDir, JOB_STORE_FILES.progress), serialize(progress));

    const store = new JobStore(jobDir);
    store.log.info({ chunks: input.chunks.length, fov: input.fov }, 'Job record created');
    return store;
  }

  /**
   * Open an existing job, throwing CorruptJobError when it can't be trusted
   */
  static async open(jobDir: string): Promise<JobStore> {
    await JobStore.inspect(jobDir);
    return new JobStore(jobDir);
  }

  /**
   * Read and check every artifact of a job directory
   */
  static async inspect(jobDir: string): Promise<ConversionJob> {
    const header = await readArtifact(jobDir, 'header', jobHeaderSchema);
    const progress = await readArtifact(jobDir, 'progress', jobProgressSchema);
    await readArtifact(jobDir, 'backup', jobProgressSchema);

    if (!isPrefixOf(progress.chunks_to_convert, header.chunks_all)) {
      throw new CorruptJobError(jobDir, 'chunks_to_convert is not a prefix of chunks_all');
    }

    return {
      jobDir,
      videoName: header.video_name,
      fov: header.fov,
      chunksAll: header.chunks_all,
      chunksToConvert: progress.chunks_to_convert,
    };
  }

  async read(): Promise<ConversionJob> {
    return JobStore.inspect(this.jobDir);
  }

  /**
   * Record that the tail element of chunks_to_convert has been converted.
   * `next` must be the current list without its last element.
   */
  async commitChunksToConvert(next: readonly string[]): Promise<void> {
    const current = await readArtifact(this.jobDir, 'progress', jobProgressSchema);
    const expectedLength = current.chunks_to_convert.length - 1;

    if (next.length !== expectedLength || !isPrefixOf(next, current.chunks_to_convert)) {
      throw new CorruptJobError(
        this.jobDir,
        'chunks_to_convert may only shrink by its last element'
      );
    }

    await writeFileAtomic(join(this.jobDir, JOB_STORE_FILES.backup), serialize(current));
    const updated: JobProgressFile = {
      chunks_to_convert: [...next],
      updated_at: new Date().toISOString(),
    };
    await writeFileAtomic(join(this.jobDir, JOB_STORE_FILES.progress), serialize(updated));

    this.log.info(
      { committed: current.chunks_to_convert[expectedLength], remaining: next.length },
      'Chunk conversion committed'
    );
  }

  /**
   * Remove the record and its leftovers. The job can't be resumed afterwards.
   */
  async destroy(): Promise<void> {
    // Progress goes first so a partial destroy is never resumable
    for (const artifact of ['progress', 'backup', 'header'] as const) {
      await rm(join(this.jobDir, JOB_STORE_FILES[artifact]), { force: true });
    }

    const names: string[] = Object.values(JOB_STORE_FILES);
    for (const entry of await readdir(this.jobDir)) {
      if (names.some((name) => isAtomicTempFor(entry, name))) {
        await rm(join(this.jobDir, entry), { force: true });
      }
    }

    this.log.info('Job record removed');
  }
}
