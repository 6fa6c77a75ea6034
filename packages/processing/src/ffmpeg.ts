/**
 * FFmpeg Wrapper
 *
 * Availability checks, encoder discovery, and launching encodes whose
 * stderr is read line by line by the ProgressMonitor.
 */

import { executeCommand, streamCommand, createLogger } from '@letterbox/utils';
import { detectEncoder, FALLBACK_ENCODER } from './encoders.js';
import { CommandExecutionError, type EncoderKind } from '@letterbox/core';
import type { MonitoredProcess } from './progressParser.js';

const log = createLogger({ component: 'ffmpeg' });

export interface EncoderProcess extends MonitoredProcess {
  kill(signal?: NodeJS.Signals): void;
}

/**
 * The ffmpeg operations the batch converter depends on
 */
export interface TranscodeRunner {
  readonly binary: string;
  isAvailable(): Promise<boolean>;
  detectEncoder(): Promise<EncoderKind>;
  spawnEncode(args: string[]): EncoderProcess;
}

export class FFmpeg implements TranscodeRunner {
  readonly binary: string;

  constructor(ffmpegPath: string = 'ffmpeg') {
    this.binary = ffmpegPath;
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.binary, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  /**
   * Raw `ffmpeg -encoders` listing
   */
  async listEncoders(): Promise<string> {
    const result = await executeCommand(this.binary, ['-hide_banner', '-encoders'], {
      timeout: 10000,
    });
    if (result.exitCode !== 0) {
      throw new CommandExecutionError(`${this.binary} -encoders`, result.exitCode, result.stderr);
    }
    return result.stdout;
  }

  /**
   * Best H.264 encoder this build offers; libx264 if the listing fails
   */
  async detectEncoder(): Promise<EncoderKind> {
    try {
      return detectEncoder(await this.listEncoders());
    } catch (error) {
      log.warn({ err: error }, 'Encoder detection failed, using CPU encoder');
      return FALLBACK_ENCODER;
    }
  }

  /**
   * Launch an encode. Nothing bounds its run time.
   */
  spawnEncode(args: string[]): EncoderProcess {
    log.debug({ command: this.binary, args }, 'FFmpeg command');
    return streamCommand(this.binary, args);
  }
}
