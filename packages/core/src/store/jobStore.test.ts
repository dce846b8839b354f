import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CorruptJobError } from '../errors/index.js';
import { JobStore, JOB_STORE_FILES } from './jobStore.js';

const CHUNKS = ['2.mp4', '1.mp4', '0.mp4'];

let jobDir: string;

async function readJson(filename: string): Promise<unknown> {
  return JSON.parse(await readFile(join(jobDir, filename), 'utf8'));
}

beforeEach(async () => {
  jobDir = await mkdtemp(join(tmpdir(), 'equirect-store-'));
});

afterEach(async () => {
  await rm(jobDir, { recursive: true, force: true });
});

describe('JobStore.create', () => {
  it('writes all three artifacts', async () => {
    await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });

    expect((await readdir(jobDir)).sort()).toEqual([
      'conversion_data.bak',
      'conversion_data.json',
      'conversion_data.progress.json',
    ]);
    expect(await readJson(JOB_STORE_FILES.header)).toMatchObject({
      version: 1,
      video_name: 'clip.mp4',
      fov: 190,
      chunks_all: CHUNKS,
    });
    expect(await readJson(JOB_STORE_FILES.progress)).toMatchObject({ chunks_to_convert: CHUNKS });
    expect(await readJson(JOB_STORE_FILES.backup)).toMatchObject({ chunks_to_convert: CHUNKS });
  });

  it('refuses an empty chunk list', async () => {
    await expect(
      JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: [] })
    ).rejects.toThrow();
    expect(await readdir(jobDir)).toEqual([]);
  });

  it('reads back what it wrote', async () => {
    const store = await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 200, chunks: CHUNKS });

    expect(await store.read()).toEqual({
      jobDir,
      videoName: 'clip.mp4',
      fov: 200,
      chunksAll: CHUNKS,
      chunksToConvert: CHUNKS,
    });
  });
});

describe('JobStore.commitChunksToConvert', () => {
  it('drops the tail and keeps the previous record as backup', async () => {
    const store = await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });

    await store.commitChunksToConvert(['2.mp4', '1.mp4']);
    expect((await store.read()).chunksToConvert).toEqual(['2.mp4', '1.mp4']);
    expect(await readJson(JOB_STORE_FILES.backup)).toMatchObject({ chunks_to_convert: CHUNKS });

    await store.commitChunksToConvert(['2.mp4']);
    expect((await store.read()).chunksToConvert).toEqual(['2.mp4']);
    expect(await readJson(JOB_STORE_FILES.backup)).toMatchObject({
      chunks_to_convert: ['2.mp4', '1.mp4'],
    });

    await store.commitChunksToConvert([]);
    const job = await store.read();
    expect(job.chunksToConvert).toEqual([]);
    expect(job.chunksAll).toEqual(CHUNKS);
  });

  it('rejects anything other than removing the last element', async () => {
    const store = await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });

    await expect(store.commitChunksToConvert(['1.mp4', '0.mp4'])).rejects.toBeInstanceOf(
      CorruptJobError
    );
    await expect(store.commitChunksToConvert(['2.mp4'])).rejects.toBeInstanceOf(CorruptJobError);
    await expect(store.commitChunksToConvert(CHUNKS)).rejects.toBeInstanceOf(CorruptJobError);
    expect((await store.read()).chunksToConvert).toEqual(CHUNKS);
  });

  it('leaves no temp files behind', async () => {
    const store = await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });
    await store.commitChunksToConvert(['2.mp4', '1.mp4']);

    expect((await readdir(jobDir)).filter((name) => name.endsWith('.tmp'))).toEqual([]);
  });
});

describe('JobStore.open', () => {
  it('rejects a directory with a broken progress file', async () => {
    await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });
    await writeFile(join(jobDir, JOB_STORE_FILES.progress), '{"chunks_to_convert": [');

    await expect(JobStore.open(jobDir)).rejects.toThrow(
      `Conversion directory ${jobDir} is not resumable: conversion_data.progress.json is not valid JSON`
    );
  });

  it('names the missing artifact', async () => {
    await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });
    await rm(join(jobDir, JOB_STORE_FILES.backup));

    await expect(JobStore.open(jobDir)).rejects.toThrow('conversion_data.bak is missing');
  });
});

describe('JobStore.destroy', () => {
  it('removes the record and stray temp files only', async () => {
    const store = await JobStore.create(jobDir, { videoName: 'clip.mp4', fov: 190, chunks: CHUNKS });
    await writeFile(join(jobDir, '.conversion_data.progress.json.123.456.tmp'), '{}');
    await writeFile(join(jobDir, 'clip_converted.mp4'), 'video');

    await store.destroy();

    expect(await readdir(jobDir)).toEqual(['clip_converted.mp4']);
  });
});
