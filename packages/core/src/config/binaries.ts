/**
 * Binary Configuration
 *
 * Resolves the external tools the converter drives.
 *
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Bundled binary folder (<repo>/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - repository root
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

/**
 * Get executable extension for current OS
 */
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
  ffprobe: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

const ENV_VARS: Record<BinaryName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
};

/**
 * Resolve one binary path
 */
export function resolveBinaryPath(
  name: BinaryName,
  env: NodeJS.ProcessEnv = process.env,
  binaryRoot: string = BINARY_ROOT
): BinaryConfig {
  const envVar = ENV_VARS[name];

  // 1. An explicit path wins even if it does not exist yet; the
  //    availability check reports it as missing
  const envPath = env[envVar];
  if (envPath && envPath.trim().length > 0) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // 2. Bundled binary folder
  const bundledPath = join(binaryRoot, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // 3. Let the system PATH resolve it at spawn time
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', env),
    ffprobe: resolveBinaryPath('ffprobe', env),
  };
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder()),
  };
}
