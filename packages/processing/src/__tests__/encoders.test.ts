/**
 * Tests for encoder profiles and detection from `ffmpeg -encoders`
 */

import { describe, it, expect } from 'vitest';
import { ENCODER_KINDS } from '@letterbox/core';
import { detectEncoder, getEncoderProfile, listEncoderProfiles } from '../encoders.js';

const listing = (...codecs: string[]) =>
  [
    'Encoders:',
    ' V..... = Video',
    ' ------',
    ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC / MPEG-4 part 10 (codec h264)',
    ...codecs.map((codec) => ` V....D ${codec}            ${codec} H.264 encoder (codec h264)`),
    ' A....D aac                  AAC (Advanced Audio Coding)',
  ].join('\n');

describe('detectEncoder', () => {
  it('should prefer NVENC over every other encoder', () => {
    expect(detectEncoder(listing('h264_qsv', 'h264_amf', 'h264_nvenc'))).toBe('nvenc');
  });

  it('should prefer AMF over QuickSync', () => {
    expect(detectEncoder(listing('h264_qsv', 'h264_amf'))).toBe('amf');
  });

  it('should pick QuickSync when it is the only hardware encoder', () => {
    expect(detectEncoder(listing('h264_qsv'))).toBe('qsv');
  });

  it('should fall back to libx264', () => {
    expect(detectEncoder(listing())).toBe('x264');
    expect(detectEncoder('')).toBe('x264');
  });

  it('should not match a longer encoder name', () => {
    expect(detectEncoder(listing('h264_nvenc_custom'))).toBe('x264');
  });
});

describe('getEncoderProfile', () => {
  it('should give the NVENC speed settings', () => {
    expect(getEncoderProfile('nvenc')).toEqual({
      kind: 'nvenc',
      codec: 'h264_nvenc',
      label: 'NVIDIA NVENC',
      args: ['-preset', 'p1', '-tune', 'hq', '-rc', 'vbr', '-cq', '23', '-b:v', '0', '-maxrate', '10M', '-bufsize', '20M'],
    });
  });

  it('should give the CPU settings', () => {
    expect(getEncoderProfile('x264').args).toEqual(['-preset', 'veryfast', '-crf', '23']);
    expect(getEncoderProfile('x264').codec).toBe('libx264');
  });

  it('should map every kind to its own codec', () => {
    expect(ENCODER_KINDS.map((kind) => getEncoderProfile(kind).codec)).toEqual([
      'h264_nvenc',
      'h264_amf',
      'h264_qsv',
      'libx264',
    ]);
  });
});

describe('listEncoderProfiles', () => {
  it('should list profiles in detection priority order', () => {
    expect(listEncoderProfiles().map((profile) => profile.kind)).toEqual(['nvenc', 'amf', 'qsv', 'x264']);
  });
});
