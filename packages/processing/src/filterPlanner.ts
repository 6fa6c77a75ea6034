/**
 * Filter Planner
 *
 * Computes the -vf chain that fits a source frame into the target box:
 * scale to the largest even size that keeps the aspect ratio, pad the rest
 * with black, then burn in subtitles on the final geometry.
 */

import {
  DEFAULT_SUBTITLE_FONT_SIZE,
  DEFAULT_TARGET_HEIGHT,
  DEFAULT_TARGET_WIDTH,
  InvalidMediaDescriptorError,
} from '@letterbox/core';

export interface FrameSize {
  width: number;
  height: number;
}

export interface ScalePadStage {
  kind: 'scale-pad';
  /** Scaled frame size, both even */
  width: number;
  height: number;
  targetWidth: number;
  targetHeight: number;
  /** Left and top padding; an odd remainder lands on the right/bottom edge */
  padX: number;
  padY: number;
}

export interface SubtitleStage {
  kind: 'subtitles';
  path: string;
  fontSize: number;
}

export type FilterStage = ScalePadStage | SubtitleStage;

/**
 * Ordered filter stages. Scale/pad always precedes subtitles so the
 * subtitle renderer sees the final frame.
 */
export interface FilterSpec {
  readonly stages: readonly FilterStage[];
}

export interface FilterPlanOptions {
  targetWidth?: number;
  targetHeight?: number;
  subtitlePath?: string | null;
  fontSize?: number;
}

function assertDimension(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidMediaDescriptorError(field, value);
  }
}

function toEven(value: number): number {
  return Math.max(2, value - (value % 2));
}

/**
 * Largest frame with the source aspect ratio that fits the target box.
 *
 * Equivalent to floor(source * min(tw/sw, th/sh)) but computed with integer
 * cross-multiplication, so the limiting side lands exactly on the target
 * instead of one pixel short from floating-point error.
 */
export function fitWithinBox(source: FrameSize, target: FrameSize): FrameSize {
  if (target.width * source.height <= target.height * source.width) {
    return {
      width: target.width,
      height: Math.floor((source.height * target.width) / source.width),
    };
  }
  return {
    width: Math.floor((source.width * target.height) / source.height),
    height: target.height,
  };
}

export function planScalePad(source: FrameSize, target: FrameSize): ScalePadStage {
  const fitted = fitWithinBox(source, target);
  const width = toEven(fitted.width);
  const height = toEven(fitted.height);

  return {
    kind: 'scale-pad',
    width,
    height,
    targetWidth: target.width,
    targetHeight: target.height,
    padX: Math.floor((target.width - width) / 2),
    padY: Math.floor((target.height - height) / 2),
  };
}

/**
 * Plan the filter stages for one file.
 *
 * @returns null when the source already matches the target and there are
 *   no subtitles, meaning the file needs no transcoding at all
 * @throws InvalidMediaDescriptorError for zero, negative or fractional sizes
 */
export function planFilters(
  source: FrameSize,
  options: FilterPlanOptions = {}
): FilterSpec | null {
  const target: FrameSize = {
    width: options.targetWidth ?? DEFAULT_TARGET_WIDTH,
    height: options.targetHeight ?? DEFAULT_TARGET_HEIGHT,
  };

  assertDimension('sourceWidth', source.width);
  assertDimension('sourceHeight', source.height);
  assertDimension('targetWidth', target.width);
  assertDimension('targetHeight', target.height);

  const needsScale = source.width !== target.width || source.height !== target.height;
  const subtitlePath = options.subtitlePath ?? null;

  if (!needsScale && subtitlePath === null) {
    return null;
  }

  const stages: FilterStage[] = [];

  if (needsScale) {
    stages.push(planScalePad(source, target));
  }

  if (subtitlePath !== null) {
    stages.push({
      kind: 'subtitles',
      path: subtitlePath,
      fontSize: options.fontSize ?? DEFAULT_SUBTITLE_FONT_SIZE,
    });
  }

  return { stages };
}

/**
 * Escape a file path for use inside a quoted filter argument.
 * Backslashes become forward slashes and colons are escaped, which also
 * covers Windows drive letters.
 */
export function escapeFilterPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/:/g, '\\:');
}

export function renderFilterStage(stage: FilterStage): string {
  switch (stage.kind) {
    case 'scale-pad': {
      const scale = `scale=${stage.width}:${stage.height}`;
      if (stage.width === stage.targetWidth && stage.height === stage.targetHeight) {
        return scale;
      }
      return `${scale},pad=${stage.targetWidth}:${stage.targetHeight}:${stage.padX}:${stage.padY}:black`;
    }
    case 'subtitles':
      return `subtitles='${escapeFilterPath(stage.path)}':force_style='FontSize=${stage.fontSize}'`;
  }
}

export function renderFilterSpec(spec: FilterSpec): string {
  return spec.stages.map(renderFilterStage).join(',');
}

/**
 * Plan and render in one step; null means no filtering is needed
 */
export function buildVideoFilter(
  source: FrameSize,
  options: FilterPlanOptions = {}
): string | null {
  const spec = planFilters(source, options);
  return spec ? renderFilterSpec(spec) : null;
}
