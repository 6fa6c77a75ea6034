/**
 * FFmpeg Command Builder
 *
 * Fluent API for building the transcode command. Produces an argument
 * array for spawn; `buildString` gives a quoted rendering for logs and
 * dry runs.
 */

import { logger } from '@letterbox/utils';
import type { VideoCodecName } from './encoders.js';

export interface VideoCodecOptions {
  codec: 'copy' | VideoCodecName;
  extraArgs?: readonly string[];
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;
}

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];
}

export class FFmpegCommandBuilder {
  private globalArgs: string[] = [];
  private inputs: string[] = [];
  private videoFilters: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Overwrite the output without asking
   */
  overwrite(): this {
    return this.addGlobalArg('-y');
  }

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Add a video filter; multiple filters are joined into one -vf chain
   */
  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = pass-through)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    args.push(...this.globalArgs);

    if (this.inputs.length === 0) {
      throw new Error('Input file not specified');
    }
    for (const input of this.inputs) {
      args.push('-i', input);
    }

    // Video filters (only if not copying)
    if (this.videoFilters.length > 0) {
      if (this.videoCodec?.codec === 'copy') {
        logger.warn('Video filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.codec !== 'copy' && this.videoCodec.extraArgs) {
        args.push(...this.videoCodec.extraArgs);
      }
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.codec !== 'copy' && this.audioCodec.bitrate) {
        args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(binary: string = 'ffmpeg'): string {
    return [binary, ...this.build()].map(quoteArg).join(' ');
  }
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
