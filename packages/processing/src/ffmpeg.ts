/**
 * FFmpeg Wrapper
 *
 * Runs one transcoder invocation at a time on behalf of a pipeline step.
 * The child's output is suppressed, the caller waits for it to exit, and
 * the child is killed if the host process goes down while it runs.
 */

import { ExternalToolError, getBinaryPath, type ToolStep } from '@equirect/core';
import { createLogger, executeCommand, formatDuration, type Logger } from '@equirect/utils';
import { formatCommand } from './commandBuilder.js';

export interface ToolInvocation {
  step: ToolStep;
  args: string[];
  cwd?: string;
  /** Segment being processed, for error reports */
  chunk?: string;
}

/**
 * Anything able to execute a transcoder invocation to completion
 */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<void>;
}

export interface FFmpegOptions {
  ffmpegPath?: string;
  /** Milliseconds before the child is killed; no limit when omitted */
  timeout?: number;
}

export class FFmpeg implements ToolRunner {
  private readonly ffmpegPath: string;
  private readonly timeout?: number;
  private readonly log: Logger;
  private running = false;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? getBinaryPath('ffmpeg');
    this.timeout = options.timeout;
    this.log = createLogger({ component: 'ffmpeg' });
  }

  async run(invocation: ToolInvocation): Promise<void> {
    if (this.running) {
      throw new Error('FFmpeg is already running an invocation');
    }

    const args = [
      '-hide_banner',
      '-nostdin',
      '-loglevel', 'error',
      '-y', // Stale outputs are removed by the caller; never prompt
      ...invocation.args,
    ];
    const context = { step: invocation.step, chunk: invocation.chunk };
    this.log.debug({ ...context, command: formatCommand(this.ffmpegPath, args) }, 'FFmpeg command');

    this.running = true;
    try {
      const result = await executeCommand(this.ffmpegPath, args, {
        cwd: invocation.cwd,
        timeout: this.timeout,
        killOnExit: true,
      }).catch((error: unknown) => {
        throw new ExternalToolError(invocation.step, -1, '', {
          chunk: invocation.chunk,
          cause: error,
        });
      });

      if (result.exitCode !== 0 || result.timedOut) {
        this.log.error(
          { ...context, exitCode: result.exitCode, signal: result.signal, timedOut: result.timedOut },
          'FFmpeg failed'
        );
        throw new ExternalToolError(invocation.step, result.exitCode, result.stderr, {
          chunk: invocation.chunk,
        });
      }

      this.log.debug({ ...context, duration: formatDuration(result.duration) }, 'FFmpeg finished');
    } finally {
      this.running = false;
    }
  }
}
