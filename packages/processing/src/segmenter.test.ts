import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExternalToolError } from '@equirect/core';
import { Segmenter, listSegments } from './segmenter.js';
import type { ToolInvocation, ToolRunner } from './ffmpeg.js';

class RecordingRunner implements ToolRunner {
  readonly calls: ToolInvocation[] = [];

  constructor(private readonly produce: string[] = []) {}

  async run(invocation: ToolInvocation): Promise<void> {
    this.calls.push(invocation);
    for (const name of this.produce) {
      await writeFile(join(invocation.cwd ?? '.', name), name);
    }
  }
}

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'equirect-segmenter-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('listSegments', () => {
  it('sorts numerically, highest first, and skips other files', async () => {
    for (const name of ['0.mp4', '2.mp4', '10.mp4', '9.mp4', 'clip.mp4', '3.mkv', '1_conv.mp4']) {
      await writeFile(join(root, name), '');
    }
    expect(await listSegments(root, '.mp4')).toEqual(['10.mp4', '9.mp4', '2.mp4', '0.mp4']);
  });
});

describe('Segmenter', () => {
  it('creates a timestamped job directory once', async () => {
    const segmenter = new Segmenter(new RecordingRunner());
    const startedAt = new Date(2024, 4, 6, 7, 8, 9);

    const jobDir = await segmenter.createJobDir(root, '/videos/trip.MOV', startedAt);

    expect(jobDir).toBe(join(root, 'trip_converted_2024-05-06_07-08-09'));
    expect(await readdir(root)).toEqual(['trip_converted_2024-05-06_07-08-09']);
    await expect(segmenter.createJobDir(root, '/videos/trip.MOV', startedAt)).rejects.toThrow();
  });

  it('keeps the input extension for segment names', async () => {
    const runner = new RecordingRunner(['0.MOV', '1.MOV']);
    const segmenter = new Segmenter(runner, { segmentSeconds: 2 });

    expect(await segmenter.segment('/videos/trip.MOV', root)).toEqual(['1.MOV', '0.MOV']);
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0]?.step).toBe('SEGMENT');
    expect(runner.calls[0]?.cwd).toBe(root);
    expect(runner.calls[0]?.args.slice(-3)).toEqual(['-reset_timestamps', '1', '%d.MOV']);
  });

  it('keeps a percent sign in the output directory out of the segment pattern', async () => {
    const runner = new RecordingRunner(['0.mp4']);
    const segmenter = new Segmenter(runner);
    const jobDir = await segmenter.createJobDir(root, '/videos/100%d.mp4', new Date(2024, 0, 1));

    expect(await segmenter.segment('/videos/100%d.mp4', jobDir)).toEqual(['0.mp4']);
    expect(runner.calls[0]?.args.at(-1)).toBe('%d.mp4');
    expect(await readdir(jobDir)).toEqual(['0.mp4']);
  });

  it('fails when nothing was produced', async () => {
    const segmenter = new Segmenter(new RecordingRunner());
    const attempt = segmenter.segment('/videos/trip.mp4', root);

    await expect(attempt).rejects.toBeInstanceOf(ExternalToolError);
    await expect(attempt).rejects.toThrow('SEGMENT step produced no segments');
  });
});
