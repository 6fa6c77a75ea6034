/**
 * Tests for the ffmpeg wrapper against binaries that fail
 */

import { describe, it, expect } from 'vitest';
import { CommandExecutionError } from '@letterbox/core';
import { FFmpeg } from '../ffmpeg.js';

const missing = '/nonexistent/letterbox-ffmpeg';

describe('FFmpeg', () => {
  it('should report a missing binary as unavailable', async () => {
    expect(await new FFmpeg(missing).isAvailable()).toBe(false);
  });

  it('should fall back to x264 when the binary cannot be started', async () => {
    expect(await new FFmpeg(missing).detectEncoder()).toBe('x264');
  });

  it('should reject the encoder listing when the binary exits non-zero', async () => {
    // node rejects the ffmpeg flags and exits with a non-zero code
    const ffmpeg = new FFmpeg(process.execPath);

    await expect(ffmpeg.listEncoders()).rejects.toBeInstanceOf(CommandExecutionError);
    expect(await ffmpeg.detectEncoder()).toBe('x264');
  });

  it('should resolve a failed encode launch to -1', async () => {
    const encode = new FFmpeg(missing).spawnEncode(['-i', 'in.mp4', 'out.mp4']);

    expect(await encode.exited).toBe(-1);
  });
});
