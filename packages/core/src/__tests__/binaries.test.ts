import { describe, it, expect } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveBinaryPath } from '../config/binaries.js';

describe('resolveBinaryPath', () => {
  it('should prefer the environment variable', () => {
    const config = resolveBinaryPath('ffmpeg', { FFMPEG_PATH: '/opt/ffmpeg/ffmpeg' }, '/nonexistent');

    expect(config).toEqual({
      name: 'ffmpeg',
      envVar: 'FFMPEG_PATH',
      resolvedPath: '/opt/ffmpeg/ffmpeg',
      source: 'env',
    });
  });

  it('should fall back to the system PATH', () => {
    const config = resolveBinaryPath('ffprobe', {}, '/nonexistent');

    expect(config.resolvedPath).toBe('ffprobe');
    expect(config.source).toBe('path');
  });

  it('should use a bundled binary when present', async () => {
    const root = await mkdtemp(join(tmpdir(), 'letterbox-bin-'));
    const osFolder = process.platform === 'win32' ? 'windows' : process.platform === 'darwin' ? 'macos' : 'linux';
    const exe = process.platform === 'win32' ? 'ffprobe.exe' : 'ffprobe';

    try {
      await mkdir(join(root, osFolder), { recursive: true });
      await writeFile(join(root, osFolder, exe), '');

      const config = resolveBinaryPath('ffprobe', {}, root);

      expect(config.source).toBe('bundled');
      expect(config.resolvedPath).toBe(join(root, osFolder, exe));
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
