/**
 * CLI Configuration
 *
 * Command-line options override environment variables, which override
 * the converter defaults.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  ENCODER_CHOICES,
  getBinariesConfig,
  resolveConverterConfig,
  type ConverterConfig,
} from '@letterbox/core';

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = z.coerce.number().int().positive();

// Environment schema
export const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  LETTERBOX_INPUT_DIR: z.preprocess(blankAsUndefined, z.string().optional()),
  LETTERBOX_OUTPUT_DIR: z.preprocess(blankAsUndefined, z.string().optional()),
  LETTERBOX_FONT_SIZE: z.preprocess(blankAsUndefined, positiveInt.optional()),
  LETTERBOX_ENCODER: z.preprocess(blankAsUndefined, z.enum(ENCODER_CHOICES).optional()),
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Raw `convert` options as commander hands them over
 */
export interface ConvertCommandOptions {
  output?: string;
  width?: string;
  height?: string;
  fontSize?: string;
  encoder?: string;
  ext?: string;
  dryRun?: boolean;
}

export const convertOptionsSchema = z.object({
  inputDir: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  width: positiveInt.optional(),
  height: positiveInt.optional(),
  fontSize: positiveInt.max(200).optional(),
  encoder: z.enum(ENCODER_CHOICES).optional(),
  ext: z
    .string()
    .optional()
    .transform((list) =>
      list
        ?.split(',')
        .map((ext) => ext.trim())
        .filter((ext) => ext.length > 0)
    ),
  dryRun: z.boolean().optional(),
});

/**
 * Raw target-box options shared by `plan` and `probe`
 */
export interface TargetCommandOptions {
  width?: string;
  height?: string;
  fontSize?: string;
}

export const targetOptionsSchema = z.object({
  width: positiveInt.optional(),
  height: positiveInt.optional(),
  fontSize: positiveInt.max(200).optional(),
});

export type TargetOptions = z.infer<typeof targetOptionsSchema>;

/**
 * Raw `plan` arguments and options
 */
export interface PlanCommandInput extends TargetCommandOptions {
  sourceWidth: string;
  sourceHeight: string;
  subtitle?: string;
}

export const planInputSchema = targetOptionsSchema.extend({
  sourceWidth: positiveInt,
  sourceHeight: positiveInt,
  subtitle: z.string().min(1).optional(),
});

export type PlanInput = z.infer<typeof planInputSchema>;

function toConfigurationError(error: z.ZodError, fallbackField: string): ConfigurationError {
  const issue = error.issues[0];
  const field = issue?.path.join('.') || fallbackField;
  return new ConfigurationError(field, issue?.message ?? 'invalid value');
}

/**
 * @throws ConfigurationError naming the offending variable
 */
export function parseEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw toConfigurationError(result.error, 'environment');
  }
  return result.data;
}

export function parseTargetOptions(options: TargetCommandOptions): TargetOptions {
  const result = targetOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toConfigurationError(result.error, 'options');
  }
  return result.data;
}

export function parsePlanInput(input: PlanCommandInput): PlanInput {
  const result = planInputSchema.safeParse(input);
  if (!result.success) {
    throw toConfigurationError(result.error, 'plan');
  }
  return result.data;
}

/**
 * ffmpeg and ffprobe locations: FFMPEG_PATH/FFPROBE_PATH, a bundled
 * binary, or the bare name for PATH lookup
 */
export function resolveTools(env: NodeJS.ProcessEnv = process.env): { ffmpegPath: string; ffprobePath: string } {
  const binaries = getBinariesConfig(env);
  return {
    ffmpegPath: binaries.ffmpeg.resolvedPath,
    ffprobePath: binaries.ffprobe.resolvedPath,
  };
}

/**
 * Merge `convert` options, environment and defaults into a validated config
 *
 * @throws ConfigurationError
 */
export function buildConverterConfig(
  inputDir: string | undefined,
  options: ConvertCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConverterConfig {
  const parsed = convertOptionsSchema.safeParse({ ...options, inputDir });
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, 'options');
  }
  const settings = parsed.data;
  const environment = parseEnvironment(env);

  return resolveConverterConfig(
    {
      inputDir: settings.inputDir ?? environment.LETTERBOX_INPUT_DIR,
      outputDir: settings.output ?? environment.LETTERBOX_OUTPUT_DIR,
      targetWidth: settings.width,
      targetHeight: settings.height,
      subtitleFontSize: settings.fontSize ?? environment.LETTERBOX_FONT_SIZE,
      encoder: settings.encoder ?? environment.LETTERBOX_ENCODER,
      extensions: settings.ext,
      dryRun: settings.dryRun,
      ...resolveTools(env),
    },
    cwd
  );
}
