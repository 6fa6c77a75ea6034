/**
 * Encoders Command
 *
 * Shows which H.264 encoder ffmpeg offers and the settings each one uses.
 */

import chalk from 'chalk';
import ora from 'ora';
import { MissingDependencyError } from '@letterbox/core';
import { FFmpeg, listEncoderProfiles } from '@letterbox/processing';
import { resolveTools } from '../config/index.js';
import { printHeader, printKeyValue } from '../lib/output.js';

export async function encodersCommand(): Promise<void> {
  const { ffmpegPath } = resolveTools();
  const ffmpeg = new FFmpeg(ffmpegPath);

  const spinner = ora('Detecting encoders...').start();

  if (!(await ffmpeg.isAvailable())) {
    spinner.stop();
    throw new MissingDependencyError('ffmpeg', ffmpegPath);
  }

  const detected = await ffmpeg.detectEncoder();
  spinner.stop();

  printHeader('Encoders');
  printKeyValue('ffmpeg', ffmpegPath);
  console.log();

  for (const profile of listEncoderProfiles()) {
    const selected = profile.kind === detected;
    const marker = selected ? chalk.green('→') : ' ';
    const name = `${profile.kind.padEnd(6)} ${profile.label}`;
    console.log(`${marker} ${selected ? chalk.bold(name) : name} ${chalk.gray(`(${profile.codec})`)}`);
    console.log(chalk.gray(`    ${profile.args.join(' ')}`));
  }
}
