/**
 * Converter Configuration
 *
 * Explicit configuration struct passed into the batch entry point.
 */

import { resolve, join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

export const ENCODER_KINDS = ['nvenc', 'amf', 'qsv', 'x264'] as const;

export type EncoderKind = (typeof ENCODER_KINDS)[number];

export const ENCODER_CHOICES = ['auto', ...ENCODER_KINDS] as const;

export type EncoderChoice = (typeof ENCODER_CHOICES)[number];

export const DEFAULT_TARGET_WIDTH = 1920;
export const DEFAULT_TARGET_HEIGHT = 1080;
export const DEFAULT_SUBTITLE_FONT_SIZE = 20;
export const DEFAULT_EXTENSIONS: readonly string[] = ['.mp4', '.mkv'];
export const DEFAULT_OUTPUT_DIRNAME = 'converted';

const extensionSchema = z
  .string()
  .trim()
  .min(1)
  .transform((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());

export const converterConfigSchema = z.object({
  inputDir: z.string().min(1).default('.'),
  outputDir: z.string().min(1).optional(),
  targetWidth: z.number().int().positive().default(DEFAULT_TARGET_WIDTH),
  targetHeight: z.number().int().positive().default(DEFAULT_TARGET_HEIGHT),
  subtitleFontSize: z.number().int().positive().max(200).default(DEFAULT_SUBTITLE_FONT_SIZE),
  extensions: z.array(extensionSchema).min(1).default([...DEFAULT_EXTENSIONS]),
  encoder: z.enum(ENCODER_CHOICES).default('auto'),
  dryRun: z.boolean().default(false),
  ffmpegPath: z.string().min(1).default('ffmpeg'),
  ffprobePath: z.string().min(1).default('ffprobe'),
});

export type ConverterConfigInput = z.input<typeof converterConfigSchema>;

export interface ConverterConfig {
  /** Absolute directory scanned for video files */
  inputDir: string;
  /** Absolute directory converted files are written to */
  outputDir: string;
  targetWidth: number;
  targetHeight: number;
  subtitleFontSize: number;
  /** Lowercase extensions including the dot */
  extensions: string[];
  encoder: EncoderChoice;
  /** Report commands without running the encoder */
  dryRun: boolean;
  ffmpegPath: string;
  ffprobePath: string;
}

/**
 * Validate raw settings and fill in defaults.
 * Relative directories are resolved against `cwd`.
 */
export function resolveConverterConfig(
  input: ConverterConfigInput,
  cwd: string = process.cwd()
): ConverterConfig {
  const parsed = converterConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigurationError(field, issue?.message ?? 'invalid value');
  }

  const settings = parsed.data;
  const inputDir = resolve(cwd, settings.inputDir);
  const outputDir = settings.outputDir
    ? resolve(cwd, settings.outputDir)
    : join(inputDir, DEFAULT_OUTPUT_DIRNAME);

  return {
    ...settings,
    extensions: [...new Set(settings.extensions)],
    inputDir,
    outputDir,
  };
}
