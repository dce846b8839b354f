/**
 * Run Progress
 *
 * Polls a conversion's status channel on a timer and renders what it finds,
 * either as a spinner line or as one JSON object per event.
 */

import ora, { type Ora } from 'ora';
import type { StatusEvent } from '@equirect/core';
import type { ConversionOutcome, ConversionRun } from '@equirect/processing';
import { formatStatusLine, phaseColors, printJsonLine } from './output.js';

export interface FollowOptions {
  pollMs: number;
  json?: boolean;
}

export interface FollowResult {
  outcome: ConversionOutcome;
  /** Highest completion percentage observed */
  highest: number;
  lastEvent?: StatusEvent;
}

export async function followRun(run: ConversionRun, options: FollowOptions): Promise<FollowResult> {
  const spinner: Ora | null = options.json ? null : ora('Starting conversion...').start();
  let highest = 0;
  let lastEvent: StatusEvent | undefined;

  const render = (event: StatusEvent): void => {
    highest = Math.max(highest, event.completionPercentage);
    lastEvent = event;

    if (options.json) {
      printJsonLine(event);
      return;
    }
    if (spinner) {
      spinner.text = phaseColors[event.currentProcess](formatStatusLine(event, highest));
    }
  };

  const drain = (): void => {
    for (const event of run.events.poll()) {
      render(event);
    }
  };

  const timer = setInterval(drain, options.pollMs);
  try {
    const outcome = await run.completion;
    drain();

    if (spinner) {
      const line = lastEvent ? formatStatusLine(lastEvent, highest) : 'Conversion ended';
      if (outcome.status === 'finished') {
        spinner.succeed(line);
      } else {
        spinner.fail(line);
      }
    }

    return { outcome, highest, lastEvent };
  } finally {
    clearInterval(timer);
  }
}
