import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getBinariesConfig } from './binaries.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'equirect-binaries-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('getBinariesConfig', () => {
  it('prefers an existing FFMPEG_PATH', async () => {
    const ffmpegPath = join(root, 'ffmpeg');
    await writeFile(ffmpegPath, '');

    expect(getBinariesConfig({ FFMPEG_PATH: ffmpegPath }).ffmpeg).toEqual({
      name: 'ffmpeg',
      envVar: 'FFMPEG_PATH',
      resolvedPath: ffmpegPath,
      source: 'env',
    });
  });

  it('falls back to PATH when FFMPEG_PATH points nowhere', () => {
    const { ffmpeg } = getBinariesConfig({ FFMPEG_PATH: join(root, 'missing') });

    expect(ffmpeg.source).toBe('path');
    expect(ffmpeg.resolvedPath).toBe('ffmpeg');
  });

  it('falls back to PATH when FFMPEG_PATH is unset', () => {
    expect(getBinariesConfig({}).ffmpeg.resolvedPath).toBe('ffmpeg');
  });
});
