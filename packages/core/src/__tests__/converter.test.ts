import { describe, it, expect } from 'vitest';
import { resolveConverterConfig } from '../config/converter.js';
import { ConfigurationError } from '../errors/index.js';

describe('resolveConverterConfig', () => {
  it('should fill in defaults and derive the output directory', () => {
    const config = resolveConverterConfig({}, '/videos');

    expect(config).toEqual({
      inputDir: '/videos',
      outputDir: '/videos/converted',
      targetWidth: 1920,
      targetHeight: 1080,
      subtitleFontSize: 20,
      extensions: ['.mp4', '.mkv'],
      encoder: 'auto',
      dryRun: false,
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
    });
  });

  it('should resolve relative directories against the working directory', () => {
    const config = resolveConverterConfig(
      { inputDir: 'incoming', outputDir: '../out' },
      '/home/user/media'
    );

    expect(config.inputDir).toBe('/home/user/media/incoming');
    expect(config.outputDir).toBe('/home/user/out');
  });

  it('should normalise and de-duplicate extensions', () => {
    const config = resolveConverterConfig({ extensions: ['MP4', '.mkv', '.Mp4'] }, '/videos');

    expect(config.extensions).toEqual(['.mp4', '.mkv']);
  });

  it('should reject a non-positive target size', () => {
    expect(() => resolveConverterConfig({ targetWidth: 0 }, '/videos')).toThrow(ConfigurationError);
  });

  it('should name the offending field', () => {
    try {
      resolveConverterConfig({ subtitleFontSize: 12.5 }, '/videos');
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.details?.['field']).toBe('subtitleFontSize');
    }
  });
});
