/**
 * Batch Converter
 *
 * Converts every video in the input directory, one at a time:
 * probe -> plan filters -> encode -> monitor -> keep or delete output.
 *
 * Probe and conversion failures skip the file; a missing tool, an
 * interrupt or anything unexpected ends the batch.
 */

import { join, basename } from 'node:path';
import {
  ConfigurationError,
  ConversionError,
  MissingDependencyError,
  NoInputFilesError,
  ProbeError,
  UserInterruptError,
  type ConverterConfig,
  type EncoderKind,
} from '@letterbox/core';
import { FFProbe, type MediaDescriptor, type MediaProber } from '@letterbox/media';
import { createLogger, ensureDir, pathExists, removeFile } from '@letterbox/utils';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { findSubtitleFile, findVideoFiles, outputNameFor } from './discovery.js';
import { getEncoderProfile, type EncoderProfile } from './encoders.js';
import { FFmpeg, type TranscodeRunner } from './ffmpeg.js';
import { buildVideoFilter } from './filterPlanner.js';
import {
  ProgressMonitor,
  runMonitor,
  type MonitorOutcome,
  type ProgressSample,
} from './progressParser.js';

const log = createLogger({ component: 'batch' });

export type SkipReason = 'already-target' | 'output-exists';

export type FileOutcome = 'converted' | 'skipped' | 'failed';

export interface BatchSummary {
  total: number;
  converted: number;
  skipped: number;
  failed: number;
  outputDir: string;
  encoder: EncoderKind;
}

/**
 * Receives status as the batch runs. Every hook is optional.
 */
export interface BatchReporter {
  start?(info: { files: string[]; encoder: EncoderProfile; config: ConverterConfig }): void;
  fileStart?(info: { index: number; total: number; inputPath: string }): void;
  probed?(info: { inputPath: string; media: MediaDescriptor; subtitlePath: string | null }): void;
  skipped?(info: { inputPath: string; reason: SkipReason; outputPath?: string }): void;
  dryRun?(info: { inputPath: string; outputPath: string; command: string }): void;
  encodeStart?(info: { inputPath: string; outputPath: string; filter: string | null }): void;
  progress?(sample: ProgressSample): void;
  converted?(info: { inputPath: string; outputPath: string; elapsedMs: number }): void;
  failed?(info: { inputPath: string; error: ProbeError | ConversionError }): void;
  finish?(summary: BatchSummary): void;
}

export interface BatchConverterDeps {
  runner: TranscodeRunner;
  prober: MediaProber;
  reporter?: BatchReporter;
}

export interface RunOptions {
  /** Aborting kills the running encode and ends the batch with UserInterruptError */
  signal?: AbortSignal;
}

export class BatchConverter {
  private readonly runner: TranscodeRunner;
  private readonly prober: MediaProber;
  private readonly reporter: BatchReporter;

  constructor(deps: BatchConverterDeps) {
    this.runner = deps.runner;
    this.prober = deps.prober;
    this.reporter = deps.reporter ?? {};
  }

  /**
   * Run the whole batch
   *
   * @throws MissingDependencyError, NoInputFilesError, ConfigurationError,
   *   UserInterruptError
   */
  async run(config: ConverterConfig, options: RunOptions = {}): Promise<BatchSummary> {
    const { signal } = options;

    await this.verifyTools(config);

    const encoderKind = config.encoder === 'auto'
      ? await this.runner.detectEncoder()
      : config.encoder;
    const encoder = getEncoderProfile(encoderKind);

    const files = await this.discover(config);

    this.reporter.start?.({ files, encoder, config });
    log.info({ files: files.length, encoder: encoder.codec, outputDir: config.outputDir }, 'Starting batch');

    if (!config.dryRun) {
      await ensureDir(config.outputDir);
    }

    const summary: BatchSummary = {
      total: files.length,
      converted: 0,
      skipped: 0,
      failed: 0,
      outputDir: config.outputDir,
      encoder: encoderKind,
    };

    for (const [i, inputPath] of files.entries()) {
      if (signal?.aborted) {
        throw new UserInterruptError();
      }

      this.reporter.fileStart?.({ index: i + 1, total: files.length, inputPath });

      const outcome = await this.convertFile(inputPath, config, encoder, signal);
      summary[outcome]++;
    }

    this.reporter.finish?.(summary);
    log.info({ ...summary }, 'Batch finished');

    return summary;
  }

  /**
   * Convert one file; recoverable failures are reported, not thrown
   */
  async convertFile(
    inputPath: string,
    config: ConverterConfig,
    encoder: EncoderProfile,
    signal?: AbortSignal
  ): Promise<FileOutcome> {
    let media: MediaDescriptor;
    try {
      media = await this.prober.describe(inputPath);
    } catch (error) {
      if (error instanceof ProbeError) {
        log.warn({ inputPath, err: error }, 'Probe failed, skipping file');
        this.reporter.failed?.({ inputPath, error });
        return 'failed';
      }
      throw error;
    }

    const subtitlePath = await findSubtitleFile(inputPath);
    this.reporter.probed?.({ inputPath, media, subtitlePath });

    const filter = buildVideoFilter(media, {
      targetWidth: config.targetWidth,
      targetHeight: config.targetHeight,
      subtitlePath,
      fontSize: config.subtitleFontSize,
    });

    if (filter === null) {
      this.reporter.skipped?.({ inputPath, reason: 'already-target' });
      return 'skipped';
    }

    const outputPath = join(
      config.outputDir,
      outputNameFor(inputPath, config.targetHeight, subtitlePath !== null)
    );

    if (await pathExists(outputPath)) {
      this.reporter.skipped?.({ inputPath, reason: 'output-exists', outputPath });
      return 'skipped';
    }

    const args = new FFmpegCommandBuilder()
      .overwrite()
      .addInput(inputPath)
      .addVideoFilter(filter)
      .setVideoCodec({ codec: encoder.codec, extraArgs: encoder.args })
      .setAudioCodec('copy')
      .setOutputOptions({ movflags: '+faststart' })
      .setOutput(outputPath);

    if (config.dryRun) {
      this.reporter.dryRun?.({ inputPath, outputPath, command: args.buildString(this.runner.binary) });
      return 'skipped';
    }

    if (signal?.aborted) {
      throw new UserInterruptError();
    }

    this.reporter.encodeStart?.({ inputPath, outputPath, filter });

    const startedAt = Date.now();
    const encode = this.runner.spawnEncode(args.build());
    const onAbort = () => encode.kill('SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    const monitor = new ProgressMonitor(media.duration);
    let result: MonitorOutcome;
    try {
      result = await runMonitor(monitor, encode, (sample) => {
        this.reporter.progress?.(sample);
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (signal?.aborted) {
      await removeFile(outputPath);
      throw new UserInterruptError();
    }

    if (!result.success) {
      const error = new ConversionError(inputPath, result.exitCode);
      log.warn({ inputPath, outputPath, exitCode: result.exitCode }, 'Conversion failed, removing partial output');
      await removeFile(outputPath);
      this.reporter.failed?.({ inputPath, error });
      return 'failed';
    }

    this.reporter.converted?.({ inputPath, outputPath, elapsedMs: Date.now() - startedAt });
    return 'converted';
  }

  private async verifyTools(config: ConverterConfig): Promise<void> {
    if (!(await this.runner.isAvailable())) {
      throw new MissingDependencyError('ffmpeg', this.runner.binary);
    }
    if (!(await this.prober.isAvailable())) {
      throw new MissingDependencyError('ffprobe', config.ffprobePath);
    }
  }

  private async discover(config: ConverterConfig): Promise<string[]> {
    let files: string[];
    try {
      files = await findVideoFiles(config.inputDir, config.extensions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError('inputDir', `cannot read ${config.inputDir}: ${reason}`);
    }

    if (files.length === 0) {
      throw new NoInputFilesError(config.inputDir, config.extensions);
    }

    log.debug({ files: files.map((file) => basename(file)) }, 'Discovered input files');
    return files;
  }
}

/**
 * A converter wired to the real ffmpeg and ffprobe binaries
 */
export function createBatchConverter(
  config: Pick<ConverterConfig, 'ffmpegPath' | 'ffprobePath'>,
  reporter?: BatchReporter
): BatchConverter {
  return new BatchConverter({
    runner: new FFmpeg(config.ffmpegPath),
    prober: new FFProbe(config.ffprobePath),
    reporter,
  });
}
