/**
 * Progress Parser
 *
 * Turns ffmpeg's stderr status lines into throttled progress samples.
 *
 * The stderr format is not a stable contract, so line parsing sits behind
 * ProgressLineParser and the monitor only deals in elapsed seconds and fps.
 */

import { MonitorStateError } from '@letterbox/core';
import { parseTimestamp } from '@letterbox/utils';

/**
 * What a single diagnostic line revealed; null fields were not present
 */
export interface ProgressReading {
  elapsedSeconds: number | null;
  framesPerSecond: number | null;
}

export interface ProgressLineParser {
  /** null when the line carries no progress information */
  parse(line: string): ProgressReading | null;
}

/**
 * Matches the classic status line:
 * frame= 1000 fps= 24.5 q=28.0 size=   1234kB time=00:00:42.00 bitrate= 240.5kbits/s speed=2.01x
 */
export class StderrProgressParser implements ProgressLineParser {
  private static readonly TIME_PATTERN = /time=(\d+:\d+:\d+\.\d+)/;
  private static readonly FPS_PATTERN = /fps=\s*(\d+\.?\d*)/;

  parse(line: string): ProgressReading | null {
    const timeMatch = line.match(StderrProgressParser.TIME_PATTERN);
    const fpsMatch = line.match(StderrProgressParser.FPS_PATTERN);

    const time = timeMatch?.[1];
    const fps = fpsMatch?.[1];

    const elapsedSeconds = time !== undefined ? parseTimestamp(time) : null;
    const framesPerSecond = fps !== undefined ? parseFloat(fps) : null;

    if (elapsedSeconds === null && framesPerSecond === null) {
      return null;
    }

    return { elapsedSeconds, framesPerSecond };
  }
}

export interface ProgressSample {
  elapsedSeconds: number;
  /** 0 when the line had no fps field */
  framesPerSecond: number;
  /** 0-100 */
  percent: number;
}

export type MonitorState = 'RUNNING' | 'DONE';

export interface MonitorOutcome {
  success: boolean;
  exitCode: number;
  /** Last surfaced percentage, 0 if none was surfaced */
  lastPercent: number;
  samplesEmitted: number;
}

/**
 * The parts of a running encoder the monitor reads from
 */
export interface MonitoredProcess {
  lines: AsyncIterable<string>;
  exited: Promise<number>;
}

export interface ProgressMonitorOptions {
  parser?: ProgressLineParser;
  /** A sample is surfaced only when it is more than this many points past the last one */
  minStep?: number;
}

/**
 * Percentage of `durationSeconds` covered by `elapsedSeconds`, capped at 100.
 * null when the duration is unknown.
 */
export function computePercent(elapsedSeconds: number, durationSeconds: number): number | null {
  if (durationSeconds <= 0) return null;
  return Math.min((elapsedSeconds / durationSeconds) * 100, 100);
}

/**
 * Watches one encoder run. RUNNING until the stream closes and the process
 * exits, then DONE with the outcome; a monitor is never reused.
 */
export class ProgressMonitor {
  private readonly durationSeconds: number;
  private readonly parser: ProgressLineParser;
  private readonly minStep: number;

  private currentState: MonitorState = 'RUNNING';
  private started = false;
  private result: MonitorOutcome | null = null;

  constructor(durationSeconds: number, options: ProgressMonitorOptions = {}) {
    this.durationSeconds = durationSeconds;
    this.parser = options.parser ?? new StderrProgressParser();
    this.minStep = options.minStep ?? 1;
  }

  get state(): MonitorState {
    return this.currentState;
  }

  get outcome(): MonitorOutcome | null {
    return this.result;
  }

  /**
   * Read the process's diagnostic lines, yielding throttled samples.
   * The generator's return value is the outcome.
   *
   * @throws MonitorStateError when called a second time
   */
  async *watch(encoder: MonitoredProcess): AsyncGenerator<ProgressSample, MonitorOutcome, undefined> {
    if (this.started) {
      throw new MonitorStateError(this.currentState);
    }
    this.started = true;

    let lastPercent = 0;
    let samplesEmitted = 0;

    for await (const line of encoder.lines) {
      const reading = this.parser.parse(line);
      if (!reading || reading.elapsedSeconds === null) continue;

      const percent = computePercent(reading.elapsedSeconds, this.durationSeconds);
      if (percent === null || percent <= lastPercent + this.minStep) continue;

      lastPercent = percent;
      samplesEmitted++;

      yield {
        elapsedSeconds: reading.elapsedSeconds,
        framesPerSecond: reading.framesPerSecond ?? 0,
        percent,
      };
    }

    const exitCode = await encoder.exited;

    this.result = {
      success: exitCode === 0,
      exitCode,
      lastPercent,
      samplesEmitted,
    };
    this.currentState = 'DONE';

    return this.result;
  }
}

/**
 * Drive a monitor to completion, handing each sample to `onSample`
 */
export async function runMonitor(
  monitor: ProgressMonitor,
  encoder: MonitoredProcess,
  onSample: (sample: ProgressSample) => void = () => {}
): Promise<MonitorOutcome> {
  const iterator = monitor.watch(encoder);

  for (;;) {
    const step = await iterator.next();
    if (step.done) return step.value;
    onSample(step.value);
  }
}

/**
 * Format a sample for a status line
 */
export function formatProgressSample(sample: ProgressSample): string {
  return `Progress: ${sample.percent.toFixed(1)}% - ${sample.framesPerSecond} fps`;
}
