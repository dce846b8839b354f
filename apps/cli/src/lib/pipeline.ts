import { ConversionPipeline, FFmpeg } from '@equirect/processing';
import { config } from '../config/index.js';

export function createPipeline(): ConversionPipeline {
  return new ConversionPipeline({
    // ffmpeg location comes from FFMPEG_PATH, binaries/ or PATH
    runner: new FFmpeg({ timeout: config.transcodeTimeoutMs }),
    segmentSeconds: config.segmentSeconds,
  });
}
