/**
 * Tests for reducing ffprobe output to a MediaDescriptor
 */

import { describe, it, expect } from 'vitest';
import { ProbeError } from '@letterbox/core';
import { toMediaDescriptor } from '../probes/ffprobe.js';

function probeOutput(overrides: { streams?: unknown[]; format?: Record<string, unknown> } = {}) {
  return {
    streams: overrides.streams ?? [
      { index: 0, codec_name: 'aac', codec_type: 'audio', sample_rate: '48000' },
      { index: 1, codec_name: 'h264', codec_type: 'video', width: 1280, height: 720 },
    ],
    format: overrides.format ?? {
      filename: 'holiday.mp4',
      format_name: 'mov,mp4,m4a,3gp,3g2,mj2',
      duration: '93.456000',
    },
  };
}

describe('toMediaDescriptor', () => {
  it('should use the first video stream and the container duration', () => {
    expect(toMediaDescriptor(probeOutput(), 'holiday.mp4')).toEqual({
      width: 1280,
      height: 720,
      duration: 93.456,
    });
  });

  it('should accept a numeric duration', () => {
    const descriptor = toMediaDescriptor(probeOutput({ format: { duration: 12 } }));

    expect(descriptor.duration).toBe(12);
  });

  it('should pick the first of several video streams', () => {
    const descriptor = toMediaDescriptor(
      probeOutput({
        streams: [
          { codec_type: 'video', width: 1920, height: 800 },
          { codec_type: 'video', width: 320, height: 240 },
        ],
      })
    );

    expect(descriptor.width).toBe(1920);
    expect(descriptor.height).toBe(800);
  });

  it('should fail when there is no video stream', () => {
    const raw = probeOutput({ streams: [{ codec_type: 'audio' }] });

    expect(() => toMediaDescriptor(raw, 'song.mkv')).toThrow(
      'Could not read video information for song.mkv: no video stream'
    );
  });

  it('should fail when the duration is missing', () => {
    const raw = probeOutput({ format: { filename: 'clip.mkv' } });

    expect(() => toMediaDescriptor(raw, 'clip.mkv')).toThrow(ProbeError);
  });

  it('should fail when the duration is not a number', () => {
    const raw = probeOutput({ format: { duration: 'N/A' } });

    expect(() => toMediaDescriptor(raw, 'clip.mkv')).toThrow(ProbeError);
  });

  it('should fail on zero or missing dimensions', () => {
    const zero = probeOutput({ streams: [{ codec_type: 'video', width: 0, height: 720 }] });
    const missing = probeOutput({ streams: [{ codec_type: 'video' }] });

    expect(() => toMediaDescriptor(zero, 'a.mp4')).toThrow(
      'Could not read video information for a.mp4: invalid video dimensions 0x720'
    );
    expect(() => toMediaDescriptor(missing, 'b.mp4')).toThrow(
      'Could not read video information for b.mp4: invalid video dimensions undefinedxundefined'
    );
  });

  it('should fail on a payload that is not ffprobe output', () => {
    expect(() => toMediaDescriptor({ error: { code: -2 } }, 'x.mp4')).toThrow(ProbeError);
    expect(() => toMediaDescriptor(null, 'x.mp4')).toThrow(ProbeError);
  });
});
