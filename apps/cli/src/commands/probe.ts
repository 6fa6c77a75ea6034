/**
 * Probe Command
 *
 * Shows a file's dimensions and duration, and the filter a conversion
 * would apply to it.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { MissingDependencyError } from '@letterbox/core';
import { FFProbe, type MediaDescriptor } from '@letterbox/media';
import { buildVideoFilter, findSubtitleFile } from '@letterbox/processing';
import { parseTargetOptions, resolveTools, type TargetCommandOptions } from '../config/index.js';
import { printHeader, printKeyValue } from '../lib/output.js';
import { describeMedia } from '../lib/reporter.js';

export async function probeCommand(file: string, options: TargetCommandOptions): Promise<void> {
  const target = parseTargetOptions(options);
  const filePath = resolve(file);
  const { ffprobePath } = resolveTools();
  const prober = new FFProbe(ffprobePath);

  const spinner = ora('Reading video information...').start();

  if (!(await prober.isAvailable())) {
    spinner.stop();
    throw new MissingDependencyError('ffprobe', ffprobePath);
  }

  let media: MediaDescriptor;
  try {
    media = await prober.describe(filePath);
  } finally {
    spinner.stop();
  }

  const subtitlePath = await findSubtitleFile(filePath);

  const filter = buildVideoFilter(media, {
    targetWidth: target.width,
    targetHeight: target.height,
    subtitlePath,
    fontSize: target.fontSize,
  });

  printHeader('Media Information');
  printKeyValue('File', filePath);
  printKeyValue('Video', describeMedia(media));
  printKeyValue('Subtitles', subtitlePath ?? chalk.gray('none'));
  printKeyValue('Filter', filter ?? chalk.gray('none (already at target size)'));
}
