/**
 * Encoder Table
 *
 * Every supported H.264 encoder, keyed by EncoderKind, with the
 * speed-oriented settings passed after `-c:v`.
 */

import { ENCODER_KINDS, type EncoderKind } from '@letterbox/core';

export type VideoCodecName = 'h264_nvenc' | 'h264_amf' | 'h264_qsv' | 'libx264';

export interface EncoderProfile {
  kind: EncoderKind;
  codec: VideoCodecName;
  label: string;
  args: readonly string[];
}

/**
 * Detection priority: hardware encoders first, CPU last
 */
export const ENCODER_PRIORITY: readonly EncoderKind[] = ENCODER_KINDS;

export const FALLBACK_ENCODER: EncoderKind = 'x264';

export function getEncoderProfile(kind: EncoderKind): EncoderProfile {
  switch (kind) {
    case 'nvenc':
      return {
        kind,
        codec: 'h264_nvenc',
        label: 'NVIDIA NVENC',
        args: [
          '-preset', 'p1',      // fastest preset
          '-tune', 'hq',
          '-rc', 'vbr',
          '-cq', '23',
          '-b:v', '0',          // let CQ control bitrate
          '-maxrate', '10M',
          '-bufsize', '20M',
        ],
      };
    case 'amf':
      return {
        kind,
        codec: 'h264_amf',
        label: 'AMD AMF',
        args: [
          '-quality', 'speed',
          '-rc', 'vbr_peak',
          '-qp_i', '23',
          '-qp_p', '23',
        ],
      };
    case 'qsv':
      return {
        kind,
        codec: 'h264_qsv',
        label: 'Intel QuickSync',
        args: [
          '-preset', 'veryfast',
          '-global_quality', '23',
        ],
      };
    case 'x264':
      return {
        kind,
        codec: 'libx264',
        label: 'CPU (libx264)',
        args: [
          '-preset', 'veryfast',
          '-crf', '23',
        ],
      };
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown encoder kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Pick the best encoder named in `ffmpeg -encoders` output.
 *
 * A listed encoder is compiled in, not necessarily backed by hardware;
 * a missing GPU shows up later as a conversion failure.
 */
export function detectEncoder(encoderListing: string): EncoderKind {
  for (const kind of ENCODER_PRIORITY) {
    const { codec } = getEncoderProfile(kind);
    if (new RegExp(`\\b${codec}\\b`).test(encoderListing)) {
      return kind;
    }
  }
  return FALLBACK_ENCODER;
}

export function listEncoderProfiles(): EncoderProfile[] {
  return ENCODER_PRIORITY.map(getEncoderProfile);
}
