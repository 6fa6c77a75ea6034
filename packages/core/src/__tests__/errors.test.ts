import { describe, it, expect } from 'vitest';
import {
  LetterboxError,
  MissingDependencyError,
  ProbeError,
  ConversionError,
  UserInterruptError,
  InvalidMediaDescriptorError,
  CommandExecutionError,
  isLetterboxError,
} from '../errors/index.js';

describe('LetterboxError hierarchy', () => {
  it('should carry code, exit code and details', () => {
    const error = new MissingDependencyError('ffmpeg', '/opt/ffmpeg/bin/ffmpeg');

    expect(error).toBeInstanceOf(LetterboxError);
    expect(error.name).toBe('MissingDependencyError');
    expect(error.code).toBe('MISSING_DEPENDENCY');
    expect(error.exitCode).toBe(1);
    expect(error.message).toBe('ffmpeg not found (tried "/opt/ffmpeg/bin/ffmpeg")');
    expect(error.details).toEqual({ binary: 'ffmpeg', resolvedPath: '/opt/ffmpeg/bin/ffmpeg' });
  });

  it('should describe invalid dimensions', () => {
    const error = new InvalidMediaDescriptorError('sourceWidth', -4);

    expect(error.message).toBe(
      'Invalid media descriptor: sourceWidth must be a positive integer, got -4'
    );
  });

  it('should name the file a probe failed for', () => {
    const error = new ProbeError('/videos/a.mkv', 'no video stream');

    expect(error.message).toBe('Could not read video information for /videos/a.mkv: no video stream');
    expect(error.code).toBe('PROBE_FAILURE');
  });

  it('should keep only the start of a long stderr', () => {
    const error = new CommandExecutionError('ffmpeg -encoders', 1, 'x'.repeat(5000));

    expect(error.details?.['stderr']).toBe('x'.repeat(1000));
  });

  it('should report the encoder exit code on conversion failure', () => {
    const error = new ConversionError('/videos/a.mkv', 69);

    expect(error.message).toBe('Conversion failed for /videos/a.mkv (ffmpeg exit code 69)');
  });
});

describe('error guards', () => {
  it('should recognise letterbox errors', () => {
    expect(isLetterboxError(new UserInterruptError())).toBe(true);
    expect(isLetterboxError(new Error('plain'))).toBe(false);
  });
});
