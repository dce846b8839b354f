/**
 * Command Execution Wrapper
 *
 * Wrapper for executing external commands with:
 * - Suppressed stdio (stderr tail kept for error reports)
 * - Optional timeout
 * - Child termination when the host process goes down
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeout?: number; // milliseconds, none when omitted
  maxStderrSize?: number; // bytes kept from the end of stderr
  killOnExit?: boolean;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Execute an external command and wait for it to exit.
 *
 * The child's stdout is discarded and its stderr is only buffered, never
 * forwarded. With `killOnExit`, the child is terminated if the host process
 * exits or receives SIGINT/SIGTERM while it runs; the handlers are removed
 * as soon as the child is gone.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    timeout,
    maxStderrSize = 64 * 1024,
    killOnExit = false,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      stdio: ['ignore', 'ignore', 'pipe'],
      windowsHide: true,
    };

    const child = spawn(command, args, spawnOptions);

    let stderr = '';

    const terminate = (): void => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    };

    const onHostExit = (): void => terminate();
    const onHostSignal = (received: NodeJS.Signals): void => {
      terminate();
      release();
      // Nothing else listens now, so re-raising applies the default action
      process.kill(process.pid, received);
    };

    let timeoutId: NodeJS.Timeout | undefined;
    let killTimeoutId: NodeJS.Timeout | undefined;

    const release = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killTimeoutId) clearTimeout(killTimeoutId);
      if (killOnExit) {
        process.removeListener('exit', onHostExit);
        for (const name of SHUTDOWN_SIGNALS) {
          process.removeListener(name, onHostSignal);
        }
      }
    };

    if (timeout !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        terminate();
        // Force kill after 10 seconds
        killTimeoutId = setTimeout(() => child.kill('SIGKILL'), 10000);
      }, timeout);
    }

    if (killOnExit) {
      process.once('exit', onHostExit);
      for (const name of SHUTDOWN_SIGNALS) {
        process.once(name, onHostSignal);
      }
    }

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
      if (stderr.length > maxStderrSize) {
        stderr = stderr.slice(-maxStderrSize);
      }
    });

    child.on('close', (code, exitSignal) => {
      release();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        signal: exitSignal,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      release();
      reject(error);
    });
  });
}
