/**
 * FFProbe Wrapper
 *
 * Runs ffprobe with JSON output and extracts the MediaDescriptor the
 * converter needs: first video stream's size and the container duration.
 */

import { z } from 'zod';
import { ProbeError } from '@letterbox/core';
import { executeCommand, createLogger, type CommandResult } from '@letterbox/utils';
import type { MediaDescriptor, MediaProber } from '../types.js';

const log = createLogger({ component: 'ffprobe' });

const numericString = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value) && value >= 0, 'must be a non-negative number');

const streamSchema = z
  .object({
    index: z.number().int().optional(),
    codec_name: z.string().optional(),
    codec_type: z.string(),
    width: z.number().optional(),
    height: z.number().optional(),
  })
  .passthrough();

export const ffprobeOutputSchema = z.object({
  streams: z.array(streamSchema),
  format: z
    .object({
      filename: z.string().optional(),
      format_name: z.string().optional(),
      duration: numericString,
    })
    .passthrough(),
});

export type FFProbeResult = z.infer<typeof ffprobeOutputSchema>;

const dimensionSchema = z.number().int().positive();

/**
 * Extract a MediaDescriptor from parsed ffprobe JSON.
 *
 * @throws ProbeError when the payload has no usable video stream or duration
 */
export function toMediaDescriptor(raw: unknown, filePath: string = '<unknown>'): MediaDescriptor {
  const parsed = ffprobeOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'output';
    throw new ProbeError(filePath, `${where}: ${issue?.message ?? 'unexpected structure'}`);
  }

  const videoStream = parsed.data.streams.find((stream) => stream.codec_type === 'video');
  if (!videoStream) {
    throw new ProbeError(filePath, 'no video stream');
  }

  const width = dimensionSchema.safeParse(videoStream.width);
  const height = dimensionSchema.safeParse(videoStream.height);
  if (!width.success || !height.success) {
    throw new ProbeError(
      filePath,
      `invalid video dimensions ${String(videoStream.width)}x${String(videoStream.height)}`
    );
  }

  return {
    width: width.data,
    height: height.data,
    duration: parsed.data.format.duration,
  };
}

export class FFProbe implements MediaProber {
  private ffprobePath: string;

  constructor(ffprobePath: string = 'ffprobe') {
    this.ffprobePath = ffprobePath;
  }

  /**
   * Probe a media file and return its raw JSON metadata
   */
  async probe(filePath: string): Promise<unknown> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    log.debug({ command: this.ffprobePath, args }, 'Running ffprobe');

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
    } catch (error) {
      throw new ProbeError(filePath, error instanceof Error ? error.message : String(error));
    }

    if (result.timedOut) {
      throw new ProbeError(filePath, 'ffprobe timed out');
    }

    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `ffprobe exited with code ${result.exitCode}`);
    }

    if (result.stdout.trim().length === 0) {
      throw new ProbeError(filePath, 'ffprobe returned no output');
    }

    try {
      return JSON.parse(result.stdout);
    } catch {
      throw new ProbeError(filePath, `unparseable ffprobe output: ${result.stdout.substring(0, 200)}`);
    }
  }

  /**
   * Probe a file and reduce the result to a MediaDescriptor
   */
  async describe(filePath: string): Promise<MediaDescriptor> {
    const raw = await this.probe(filePath);
    return toMediaDescriptor(raw, filePath);
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
