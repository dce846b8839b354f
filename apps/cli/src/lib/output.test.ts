import { describe, expect, it } from 'vitest';
import type { StatusEvent } from '@equirect/core';
import { formatStatusLine, parseFovArgument } from './output.js';

const event: StatusEvent = {
  videoName: 'clip.mp4',
  fov: 190,
  completionPercentage: 33,
  currentProcess: 'CONVERTING_CHUNKS',
  message: 'Converting chunk 1.mp4',
  timestamp: new Date(2024, 0, 2, 3, 4, 5),
};

describe('formatStatusLine', () => {
  it('renders time, completion, phase and message', () => {
    expect(formatStatusLine(event)).toBe(
      '2024-01-02 03:04:05 - completion: 33% status: CONVERTING_CHUNKS - Converting chunk 1.mp4'
    );
  });

  it('shows an overriding completion value', () => {
    expect(formatStatusLine(event, 66)).toBe(
      '2024-01-02 03:04:05 - completion: 66% status: CONVERTING_CHUNKS - Converting chunk 1.mp4'
    );
  });
});

describe('parseFovArgument', () => {
  it('accepts whole numbers', () => {
    expect(parseFovArgument('190')).toBe(190);
    expect(parseFovArgument(' 220 ')).toBe(220);
    expect(parseFovArgument('0')).toBe(0);
  });

  it('rejects anything else', () => {
    expect(parseFovArgument('190.5')).toBeNull();
    expect(parseFovArgument('-5')).toBeNull();
    expect(parseFovArgument('wide')).toBeNull();
    expect(parseFovArgument('')).toBeNull();
  });
});
