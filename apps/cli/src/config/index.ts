/**
 * CLI Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  // Media tools (FFMPEG_PATH is resolved by @equirect/core)
  FFMPEG_PATH: z.string().min(1).optional(),
  TRANSCODE_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).optional(),

  // Conversion defaults
  SEGMENT_SECONDS: z.string().regex(/^\d+$/).transform(Number).default('1'),
  DEFAULT_FOV: z.string().regex(/^\d+$/).transform(Number).default('190'),

  // How often the progress display drains the status channel
  STATUS_POLL_MS: z.string().regex(/^\d+$/).transform(Number).default('250'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

// The shared logger reads these when it is first imported
process.env['NODE_ENV'] = env.NODE_ENV;
process.env['LOG_LEVEL'] = env.LOG_LEVEL;

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  transcodeTimeoutMs: env.TRANSCODE_TIMEOUT_MS === 0 ? undefined : env.TRANSCODE_TIMEOUT_MS,
  segmentSeconds: Math.max(1, env.SEGMENT_SECONDS),
  defaultFov: env.DEFAULT_FOV,
  statusPollMs: Math.max(10, env.STATUS_POLL_MS),
} as const;
