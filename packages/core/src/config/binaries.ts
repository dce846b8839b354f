/**
 * Binary Configuration
 *
 * Location of the external transcoder, with automatic OS detection.
 *
 * Priority order:
 * 1. Environment variable (FFMPEG_PATH)
 * 2. Custom binary folder (binaries/<os>/ at the project root)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/src/config
const BINARY_ROOT = resolve(__dirname, '../../../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  // 1. Check environment variable
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // 2. Check custom binary folder
  const customPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(customPath)) {
    return { name, envVar, resolvedPath: customPath, source: 'bundled' };
  }

  // 3. Let the system PATH resolve it, failing at spawn time if absent
  return { name, envVar, resolvedPath: name, source: 'path' };
}

export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

export function getBinaryPath(name: keyof BinariesConfig): string {
  return binaries()[name].resolvedPath;
}
