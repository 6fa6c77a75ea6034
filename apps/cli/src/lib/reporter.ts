/**
 * Console Reporter
 *
 * Renders batch progress for a terminal: a header, one block per file,
 * an ora spinner while encoding, and the final summary.
 */

import { basename } from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ConverterConfig, ConversionError, ProbeError } from '@letterbox/core';
import type { MediaDescriptor } from '@letterbox/media';
import {
  formatProgressSample,
  type BatchReporter,
  type BatchSummary,
  type EncoderProfile,
  type ProgressSample,
  type SkipReason,
} from '@letterbox/processing';
import { formatDuration } from '@letterbox/utils';
import {
  printCommand,
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from './output.js';

const skipMessages: Record<SkipReason, string> = {
  'already-target': 'Already at target size with no subtitles, skipping',
  'output-exists': 'Output already exists, skipping',
};

export function describeMedia(media: MediaDescriptor): string {
  const length = media.duration > 0 ? formatDuration(media.duration * 1000) : 'unknown length';
  return `${media.width}x${media.height}, ${length}`;
}

export class ConsoleReporter implements BatchReporter {
  private spinner: Ora | null = null;

  start(info: { files: string[]; encoder: EncoderProfile; config: ConverterConfig }): void {
    const { files, encoder, config } = info;

    printHeader('Batch Conversion');
    printKeyValue('Input', config.inputDir);
    printKeyValue('Output', config.outputDir);
    printKeyValue('Target', `${config.targetWidth}x${config.targetHeight}`);
    printKeyValue('Encoder', `${encoder.label} (${encoder.codec})`);
    printKeyValue('Files', files.length);

    if (config.dryRun) {
      console.log();
      printWarning('Dry run: commands are shown, nothing is encoded');
    }
  }

  fileStart(info: { index: number; total: number; inputPath: string }): void {
    console.log();
    console.log(chalk.bold(`[${info.index}/${info.total}] ${basename(info.inputPath)}`));
  }

  probed(info: { media: MediaDescriptor; subtitlePath: string | null }): void {
    printKeyValue('Source', describeMedia(info.media));
    if (info.subtitlePath) {
      printKeyValue('Subtitles', basename(info.subtitlePath));
    }
  }

  skipped(info: { reason: SkipReason; outputPath?: string }): void {
    const target = info.outputPath ? `: ${basename(info.outputPath)}` : '';
    printInfo(`${skipMessages[info.reason]}${target}`);
  }

  dryRun(info: { outputPath: string; command: string }): void {
    printInfo(`Would write ${basename(info.outputPath)}`);
    printCommand(info.command);
  }

  encodeStart(info: { outputPath: string }): void {
    this.spinner = ora(`Encoding ${basename(info.outputPath)}`).start();
  }

  progress(sample: ProgressSample): void {
    if (this.spinner) {
      this.spinner.text = formatProgressSample(sample);
    }
  }

  converted(info: { outputPath: string; elapsedMs: number }): void {
    const message = `Saved ${basename(info.outputPath)} in ${formatDuration(info.elapsedMs)}`;
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else {
      printSuccess(message);
    }
  }

  failed(info: { error: ProbeError | ConversionError }): void {
    if (this.spinner) {
      this.spinner.fail(info.error.message);
      this.spinner = null;
    } else {
      printError(info.error.message);
    }
  }

  finish(summary: BatchSummary): void {
    printHeader('Summary');
    printKeyValue('Converted', chalk.green(summary.converted));
    printKeyValue('Skipped', summary.skipped);
    printKeyValue('Failed', summary.failed > 0 ? chalk.red(summary.failed) : summary.failed);
    console.log();

    if (summary.failed > 0) {
      printWarning(`${summary.failed} of ${summary.total} files failed`);
    } else {
      printSuccess(`Done. Files are in ${summary.outputDir}`);
    }
  }

  /**
   * Clear a running spinner, e.g. on interrupt
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
