/**
 * Tests for merging command-line options, environment and defaults
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@letterbox/core';
import {
  buildConverterConfig,
  parseEnvironment,
  parsePlanInput,
  parseTargetOptions,
} from '../config/index.js';

const tools = { FFMPEG_PATH: '/opt/ffmpeg/ffmpeg', FFPROBE_PATH: '/opt/ffmpeg/ffprobe' };

describe('buildConverterConfig', () => {
  it('should fall back to defaults', () => {
    const config = buildConverterConfig(undefined, {}, { ...tools }, '/videos');

    expect(config).toEqual({
      inputDir: '/videos',
      outputDir: '/videos/converted',
      targetWidth: 1920,
      targetHeight: 1080,
      subtitleFontSize: 20,
      extensions: ['.mp4', '.mkv'],
      encoder: 'auto',
      dryRun: false,
      ffmpegPath: '/opt/ffmpeg/ffmpeg',
      ffprobePath: '/opt/ffmpeg/ffprobe',
    });
  });

  it('should read settings from the environment', () => {
    const config = buildConverterConfig(
      undefined,
      {},
      {
        ...tools,
        LETTERBOX_INPUT_DIR: 'in',
        LETTERBOX_OUTPUT_DIR: '/srv/out',
        LETTERBOX_FONT_SIZE: '28',
        LETTERBOX_ENCODER: 'nvenc',
      },
      '/home/me'
    );

    expect(config.inputDir).toBe('/home/me/in');
    expect(config.outputDir).toBe('/srv/out');
    expect(config.subtitleFontSize).toBe(28);
    expect(config.encoder).toBe('nvenc');
  });

  it('should let options override the environment', () => {
    const config = buildConverterConfig(
      'movies',
      { output: 'done', fontSize: '16', encoder: 'x264', width: '1280', height: '720', dryRun: true },
      { ...tools, LETTERBOX_INPUT_DIR: 'in', LETTERBOX_FONT_SIZE: '28', LETTERBOX_ENCODER: 'nvenc' },
      '/home/me'
    );

    expect(config).toMatchObject({
      inputDir: '/home/me/movies',
      outputDir: '/home/me/done',
      targetWidth: 1280,
      targetHeight: 720,
      subtitleFontSize: 16,
      encoder: 'x264',
      dryRun: true,
    });
  });

  it('should split and normalize the extension list', () => {
    const config = buildConverterConfig(undefined, { ext: 'MKV, .avi,,mp4' }, { ...tools }, '/videos');

    expect(config.extensions).toEqual(['.mkv', '.avi', '.mp4']);
  });

  it('should treat blank environment values as unset', () => {
    const config = buildConverterConfig(
      undefined,
      {},
      { ...tools, LETTERBOX_OUTPUT_DIR: '', LETTERBOX_FONT_SIZE: ' ' },
      '/videos'
    );

    expect(config.outputDir).toBe('/videos/converted');
    expect(config.subtitleFontSize).toBe(20);
  });

  it('should reject a non-numeric width', () => {
    expect(() => buildConverterConfig(undefined, { width: 'wide' }, { ...tools }, '/videos')).toThrow(
      ConfigurationError
    );
  });

  it('should reject an unknown encoder from the environment', () => {
    let caught: unknown;
    try {
      buildConverterConfig(undefined, {}, { ...tools, LETTERBOX_ENCODER: 'vp9' }, '/videos');
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof ConfigurationError)) throw new Error('expected a ConfigurationError');
    expect(caught.details).toMatchObject({ field: 'LETTERBOX_ENCODER' });
  });
});

describe('parseEnvironment', () => {
  it('should default the log level to warn', () => {
    expect(parseEnvironment({}).LOG_LEVEL).toBe('warn');
  });

  it('should accept any NODE_ENV value', () => {
    expect(parseEnvironment({ NODE_ENV: 'staging' }).NODE_ENV).toBe('staging');
    expect(parseEnvironment({}).NODE_ENV).toBe('development');
  });

  it('should not let an unusual NODE_ENV block a conversion', () => {
    const config = buildConverterConfig(undefined, {}, { ...tools, NODE_ENV: 'staging' }, '/videos');

    expect(config.inputDir).toBe('/videos');
  });
});

describe('parsePlanInput', () => {
  it('should convert numeric arguments', () => {
    expect(parsePlanInput({ sourceWidth: '720', sourceHeight: '480', subtitle: 'a.srt' })).toEqual({
      sourceWidth: 720,
      sourceHeight: 480,
      subtitle: 'a.srt',
    });
  });

  it('should reject a zero height', () => {
    expect(() => parsePlanInput({ sourceWidth: '720', sourceHeight: '0' })).toThrow(
      'Invalid configuration for sourceHeight'
    );
  });
});

describe('parseTargetOptions', () => {
  it('should leave unset options undefined', () => {
    expect(parseTargetOptions({ width: '1280' })).toEqual({ width: 1280 });
  });
});
