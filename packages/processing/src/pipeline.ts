/**
 * Conversion Pipeline
 *
 * Entry points for starting and resuming a conversion.
 *
 * Flow:
 *   startNewJob: validate → job dir → segment → store → convert → merge → clean up
 *   resumeJob:   validate job dir → convert (remaining) → merge → clean up
 *
 * Both entry points reject before anything runs when their input is
 * invalid. Once a run is launched it never throws: failures become a single
 * ERROR event on the run's channel and a 'failed' outcome, and the job
 * directory stays resumable from its last committed state.
 */

import { basename } from 'node:path';
import {
  ConverterError,
  CorruptJobError,
  JobStore,
  assertNewJobInput,
  toConverterError,
  type StatusEvent,
} from '@equirect/core';
import { createLogger, isDirectory, type Logger } from '@equirect/utils';
import { ChunkTranscoder } from './chunkTranscoder.js';
import { FFmpeg, type ToolRunner } from './ffmpeg.js';
import { Merger } from './merger.js';
import { Segmenter } from './segmenter.js';
import { StatusChannel } from './statusChannel.js';
import { StatusReporter, type StatusContext } from './statusReporter.js';

export interface ConversionPipelineOptions {
  /** Transcoder runner, a real FFmpeg by default */
  runner?: ToolRunner;
  segmentSeconds?: number;
  /** Clock used to name job directories */
  now?: () => Date;
}

export type ConversionOutcome =
  | { status: 'finished'; jobDir: string; outputFile: string }
  | { status: 'failed'; jobDir?: string; error: ConverterError };

export interface ConversionRun {
  /** Closed once the run has ended */
  events: StatusChannel<StatusEvent>;
  /** Never rejects */
  completion: Promise<ConversionOutcome>;
}

interface RunResult {
  jobDir: string;
  outputFile: string;
}

type RunBody = (
  reporter: StatusReporter,
  trackJobDir: (jobDir: string) => void
) => Promise<RunResult>;

export class ConversionPipeline {
  private readonly runner: ToolRunner;
  private readonly segmenter: Segmenter;
  private readonly now: () => Date;
  private readonly log: Logger;
  private busy = false;

  constructor(options: ConversionPipelineOptions = {}) {
    this.runner = options.runner ?? new FFmpeg();
    this.segmenter = new Segmenter(this.runner, { segmentSeconds: options.segmentSeconds });
    this.now = options.now ?? (() => new Date());
    this.log = createLogger({ component: 'pipeline' });
  }

  get isRunning(): boolean {
    return this.busy;
  }

  async startNewJob(
    inputVideoPath: string,
    outputDir: string,
    fov: number
  ): Promise<ConversionRun> {
    await this.preflight(() => assertNewJobInput(inputVideoPath, outputDir, fov));

    const videoName = basename(inputVideoPath);
    this.log.info({ inputVideoPath, outputDir, fov }, 'Starting new conversion');

    return this.launch({ videoName, fov }, 'INITIALIZING', async (reporter, trackJobDir) => {
      reporter.update('INITIALIZING', 'Creating conversion directory');
      const jobDir = await this.segmenter.createJobDir(outputDir, inputVideoPath, this.now());
      trackJobDir(jobDir);

      reporter.update('INITIALIZING', 'Cutting video into chunks');
      const chunks = await this.segmenter.segment(inputVideoPath, jobDir);

      reporter.update('INITIALIZING', 'Creating conversion data files');
      const store = await JobStore.create(jobDir, { videoName, fov, chunks });

      return this.convert(store, reporter);
    });
  }

  async resumeJob(jobDir: string): Promise<ConversionRun> {
    const { store, context } = await this.preflight(async () => {
      if (!(await isDirectory(jobDir))) {
        throw new CorruptJobError(jobDir, 'directory does not exist');
      }
      const opened = await JobStore.open(jobDir);
      const job = await opened.read();
      this.log.info(
        { jobDir, remaining: job.chunksToConvert.length, total: job.chunksAll.length },
        'Resuming conversion'
      );
      return { store: opened, context: { videoName: job.videoName, fov: job.fov } };
    });

    return this.launch(context, 'CONVERTING_CHUNKS', async (reporter, trackJobDir) => {
      trackJobDir(jobDir);
      return this.convert(store, reporter);
    });
  }

  /**
   * Reserve the pipeline while checking a run's input; released on failure
   */
  private async preflight<T>(check: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new ConverterError('A conversion is already running', 'PIPELINE_BUSY');
    }
    this.busy = true;
    try {
      return await check();
    } catch (error) {
      this.busy = false;
      throw error;
    }
  }

  private async convert(store: JobStore, reporter: StatusReporter): Promise<RunResult> {
    await new ChunkTranscoder(this.runner, store, reporter).run();
    const outputFile = await new Merger(this.runner, store, reporter).merge();

    reporter.update('CLEAN_UP', 'Removing conversion data files');
    await store.destroy();

    reporter.update('FINISHED', 'Conversion completed');
    this.log.info({ jobDir: store.jobDir, outputFile }, 'Conversion finished');
    return { jobDir: store.jobDir, outputFile };
  }

  private launch(
    context: StatusContext,
    initialPhase: 'INITIALIZING' | 'CONVERTING_CHUNKS',
    body: RunBody
  ): ConversionRun {
    const events = new StatusChannel<StatusEvent>();
    const reporter = new StatusReporter((event) => events.push(event), context, initialPhase);
    let jobDir: string | undefined;

    const completion = (async (): Promise<ConversionOutcome> => {
      try {
        const result = await body(reporter, (dir) => {
          jobDir = dir;
        });
        return { status: 'finished', ...result };
      } catch (caught) {
        const error = toConverterError(caught);
        this.log.error(
          { err: error, code: error.code, jobDir, phase: reporter.phase },
          'Conversion failed'
        );
        reporter.fail(error);
        return { status: 'failed', jobDir, error };
      } finally {
        events.close();
        this.busy = false;
      }
    })();

    return { events, completion };
  }
}
