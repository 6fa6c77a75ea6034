/**
 * Plan Command
 *
 * Prints the filter chain for a source size without touching any file.
 */

import chalk from 'chalk';
import { buildVideoFilter } from '@letterbox/processing';
import { parsePlanInput, type TargetCommandOptions } from '../config/index.js';

interface PlanOptions extends TargetCommandOptions {
  subtitle?: string;
}

export function planCommand(sourceWidth: string, sourceHeight: string, options: PlanOptions): void {
  const input = parsePlanInput({ ...options, sourceWidth, sourceHeight });

  const filter = buildVideoFilter(
    { width: input.sourceWidth, height: input.sourceHeight },
    {
      targetWidth: input.width,
      targetHeight: input.height,
      subtitlePath: input.subtitle,
      fontSize: input.fontSize,
    }
  );

  console.log(filter ?? chalk.gray('No filter needed: source already matches the target size'));
}
