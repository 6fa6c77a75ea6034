/**
 * Command Execution Wrapper
 *
 * Wrappers for running external tools:
 * - executeCommand: run to completion, capture output (probing, version checks)
 * - streamCommand: run in the background and read stderr line by line (encoding)
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';
import { logger } from './logger.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
}

/**
 * Execute an external command and capture its output
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult; rejects if the binary cannot be spawned
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * A running command whose diagnostic stream is consumed line by line.
 */
export interface StreamingCommand {
  /** stderr split into lines; ends when the stream closes */
  lines: AsyncIterable<string>;
  /** Exit status; -1 when the process could not be started */
  exited: Promise<number>;
  kill(signal?: NodeJS.Signals): void;
}

/**
 * Split a chunked text stream into lines.
 *
 * Accepts `\n`, `\r\n` and bare `\r` as terminators: ffmpeg rewrites its
 * status line with carriage returns. Buffers are decoded as UTF-8, keeping
 * characters split across chunks intact. Empty lines are dropped and a
 * trailing partial line is flushed when the source ends.
 */
export async function* splitLines(
  source: AsyncIterable<string | Buffer>
): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let buffer = '';

  for await (const chunk of source) {
    buffer += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    const parts = buffer.split(/\r\n|\r|\n/);
    buffer = parts.pop() ?? '';

    for (const part of parts) {
      if (part.length > 0) yield part;
    }
  }

  buffer += decoder.end();
  if (buffer.length > 0) yield buffer;
}

/**
 * Start a command and expose its stderr as a line stream.
 *
 * No timeout is applied: long encodes are expected to run for hours.
 */
export function streamCommand(
  command: string,
  args: string[],
  options: Pick<CommandOptions, 'cwd' | 'env'> = {}
): StreamingCommand {
  const child = spawn(command, args, {
    cwd: options.cwd ?? process.cwd(),
    env: options.env ?? process.env,
    stdio: ['ignore', 'ignore', 'pipe'],
  });

  const exited = new Promise<number>((resolve) => {
    child.on('error', (error) => {
      logger.error({ command, err: error }, 'Failed to start command');
      resolve(-1);
    });
    child.on('close', (code, exitSignal) => {
      resolve(code ?? (exitSignal ? 128 : 1));
    });
  });

  const stderr = child.stderr;
  const lines: AsyncIterable<string> = stderr ? splitLines(stderr) : emptyLines();

  return {
    lines,
    exited,
    kill: (signal: NodeJS.Signals = 'SIGTERM') => {
      child.kill(signal);
    },
  };
}

async function* emptyLines(): AsyncGenerator<string> {
  // nothing to read
}
