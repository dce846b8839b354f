import { describe, expect, it } from 'vitest';
import { ConverterError, ExternalToolError, type StatusEvent } from '@equirect/core';
import { StatusReporter, completionPercentage } from './statusReporter.js';

function collect(initialPhase: 'INITIALIZING' | 'CONVERTING_CHUNKS' = 'INITIALIZING') {
  const events: StatusEvent[] = [];
  const reporter = new StatusReporter(
    (event) => events.push(event),
    { videoName: 'clip.mp4', fov: 190 },
    initialPhase
  );
  return { events, reporter };
}

describe('completionPercentage', () => {
  it('uses fixed values outside chunk conversion', () => {
    expect(completionPercentage('INITIALIZING')).toBe(0);
    expect(completionPercentage('MERGING')).toBe(98);
    expect(completionPercentage('CLEAN_UP')).toBe(99);
    expect(completionPercentage('FINISHED')).toBe(100);
  });

  it('scales converted chunks into 1..98', () => {
    expect(completionPercentage('CONVERTING_CHUNKS', { total: 4, remaining: 4 })).toBe(1);
    expect(completionPercentage('CONVERTING_CHUNKS', { total: 4, remaining: 3 })).toBe(25);
    expect(completionPercentage('CONVERTING_CHUNKS', { total: 4, remaining: 0 })).toBe(98);
    expect(completionPercentage('CONVERTING_CHUNKS', { total: 3, remaining: 1 })).toBe(66);
  });

  it('rejects missing or impossible progress', () => {
    expect(() => completionPercentage('CONVERTING_CHUNKS')).toThrow(ConverterError);
    expect(() => completionPercentage('CONVERTING_CHUNKS', { total: 0, remaining: 0 })).toThrow(
      'Job has no chunks to convert'
    );
    expect(() => completionPercentage('CONVERTING_CHUNKS', { total: 2, remaining: 3 })).toThrow(
      'Remaining chunk count out of range'
    );
  });
});

describe('StatusReporter', () => {
  it('emits frozen events with the run context', () => {
    const { events, reporter } = collect();
    reporter.update('INITIALIZING', 'Creating conversion directory');

    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event).toMatchObject({
      videoName: 'clip.mp4',
      fov: 190,
      completionPercentage: 0,
      currentProcess: 'INITIALIZING',
      message: 'Creating conversion directory',
    });
    expect(event?.timestamp).toBeInstanceOf(Date);
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('refuses to go backwards', () => {
    const { reporter } = collect('CONVERTING_CHUNKS');
    reporter.update('MERGING', 'Merging');
    expect(() => reporter.update('CONVERTING_CHUNKS', 'Again', {
      progress: { total: 2, remaining: 1 },
    })).toThrow('Invalid phase transition from MERGING to CONVERTING_CHUNKS');
  });

  it('reports a transcoder failure with the chunk being converted', () => {
    const { events, reporter } = collect('CONVERTING_CHUNKS');
    reporter.update('CONVERTING_CHUNKS', 'Converting chunk 1.mp4', {
      chunk: '1.mp4',
      progress: { total: 2, remaining: 1 },
    });
    reporter.fail(new ExternalToolError('TRANSCODE', 1, 'Invalid data found'));

    expect(reporter.phase).toBe('ERROR');
    expect(events[1]).toMatchObject({
      currentProcess: 'ERROR',
      completionPercentage: 50,
      error: { code: 'EXTERNAL_TOOL_ERROR', step: 'CONVERTING_CHUNKS', tool: 'TRANSCODE', chunk: '1.mp4' },
    });
  });

  it('keeps the last percentage and omits tool details for other errors', () => {
    const { events, reporter } = collect('CONVERTING_CHUNKS');
    reporter.update('MERGING', 'Merging converted chunks into single video file');
    reporter.fail(new ConverterError('disk full', 'FILESYSTEM_ERROR'));

    expect(events[1]).toMatchObject({
      currentProcess: 'ERROR',
      completionPercentage: 98,
      message: 'disk full',
      error: { code: 'FILESYSTEM_ERROR', step: 'MERGING' },
    });
    expect(events[1]?.error).not.toHaveProperty('tool');
    expect(events[1]?.error).not.toHaveProperty('chunk');
  });
});
