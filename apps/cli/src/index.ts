#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Batch converts a directory of videos to a fixed frame size with
 * letterboxing and burned-in subtitles.
 */

import './env.js';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import {
  ENCODER_CHOICES,
  MissingDependencyError,
  getBinaryFolders,
  isLetterboxError,
} from '@letterbox/core';
import { createLogger } from '@letterbox/utils';

// Commands
import { convertCommand } from './commands/convert.js';
import { encodersCommand } from './commands/encoders.js';
import { probeCommand } from './commands/probe.js';
import { planCommand } from './commands/plan.js';
import { printError, printInfo } from './lib/output.js';

const log = createLogger({ component: 'cli' });

const program = new Command();

program
  .name('letterbox')
  .description('Batch convert videos to a fixed frame size with letterboxing and burned-in subtitles')
  .version('0.1.0');

// ============================================
// CONVERSION
// ============================================

program
  .command('convert [inputDir]', { isDefault: true })
  .description('Convert every video in a directory (default: current directory)')
  .option('-o, --output <dir>', 'Output directory (default: <inputDir>/converted)')
  .option('-W, --width <pixels>', 'Target width (default: 1920)')
  .option('-H, --height <pixels>', 'Target height (default: 1080)')
  .option('--font-size <size>', 'Subtitle font size (default: 20)')
  .addOption(new Option('-e, --encoder <kind>', 'Video encoder (default: auto)').choices(ENCODER_CHOICES))
  .option('--ext <list>', 'Comma-separated extensions to convert (default: .mp4,.mkv)')
  .option('--dry-run', 'Show the ffmpeg commands without running them')
  .action(convertCommand);

// ============================================
// INSPECTION
// ============================================

program
  .command('encoders')
  .description('Show the detected encoder and the settings of each encoder')
  .action(encodersCommand);

program
  .command('probe <file>')
  .description('Show video information and the filter a conversion would apply')
  .option('-W, --width <pixels>', 'Target width (default: 1920)')
  .option('-H, --height <pixels>', 'Target height (default: 1080)')
  .option('--font-size <size>', 'Subtitle font size (default: 20)')
  .action(probeCommand);

program
  .command('plan <width> <height>')
  .description('Print the filter chain for a source size')
  .option('-s, --subtitle <path>', 'Subtitle file to burn in')
  .option('-W, --width <pixels>', 'Target width (default: 1920)')
  .option('-H, --height <pixels>', 'Target height (default: 1080)')
  .option('--font-size <size>', 'Subtitle font size (default: 20)')
  .action(planCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownOption' || err.code === 'commander.invalidArgument') {
    console.log('Run', chalk.cyan('letterbox --help'), 'for usage');
  }
  process.exit(err.exitCode);
});

function handleError(error: unknown): never {
  if (isLetterboxError(error)) {
    log.debug({ err: error, code: error.code }, 'Command failed');
    printError(error.message);
    if (error instanceof MissingDependencyError) {
      printInfo(`Install ffmpeg, set FFMPEG_PATH/FFPROBE_PATH, or place the binaries in ${getBinaryFolders().os}`);
    }
    process.exit(error.exitCode);
  }

  log.error({ err: error }, 'Unexpected error');
  printError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

// Parse and execute
program.parseAsync().catch(handleError);
