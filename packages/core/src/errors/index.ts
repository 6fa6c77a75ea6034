/**
 * Custom Error Classes
 *
 * Recoverable errors (ProbeError, ConversionError) skip one file and the
 * batch continues. Everything else ends the run with `exitCode`.
 */

/**
 * Base error class for all letterbox errors
 */
export class LetterboxError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LetterboxError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A required external tool (ffmpeg, ffprobe) is not installed or not runnable
 */
export class MissingDependencyError extends LetterboxError {
  constructor(binary: string, resolvedPath: string = binary) {
    super(
      `${binary} not found (tried "${resolvedPath}")`,
      'MISSING_DEPENDENCY',
      1,
      { binary, resolvedPath }
    );
    this.name = 'MissingDependencyError';
  }
}

/**
 * Media metadata was missing or malformed for a file
 */
export class ProbeError extends LetterboxError {
  constructor(filePath: string, reason: string) {
    super(
      `Could not read video information for ${filePath}: ${reason}`,
      'PROBE_FAILURE',
      1,
      { filePath, reason }
    );
    this.name = 'ProbeError';
  }
}

/**
 * The encoder exited with a non-zero status
 */
export class ConversionError extends LetterboxError {
  constructor(inputPath: string, exitCode: number) {
    super(
      `Conversion failed for ${inputPath} (ffmpeg exit code ${exitCode})`,
      'CONVERSION_FAILURE',
      1,
      { inputPath, encoderExitCode: exitCode }
    );
    this.name = 'ConversionError';
  }
}

/**
 * The batch was interrupted (SIGINT or an aborted signal)
 */
export class UserInterruptError extends LetterboxError {
  constructor() {
    super('Conversion interrupted by user', 'USER_INTERRUPT', 1);
    this.name = 'UserInterruptError';
  }
}

/**
 * Source or target dimensions cannot be planned
 */
export class InvalidMediaDescriptorError extends LetterboxError {
  constructor(field: string, value: number) {
    super(
      `Invalid media descriptor: ${field} must be a positive integer, got ${value}`,
      'INVALID_MEDIA_DESCRIPTOR',
      1,
      { field, value }
    );
    this.name = 'InvalidMediaDescriptorError';
  }
}

/**
 * Validation error for configuration values
 */
export class ConfigurationError extends LetterboxError {
  constructor(field: string, message: string) {
    super(
      `Invalid configuration for ${field}: ${message}`,
      'CONFIGURATION_ERROR',
      1,
      { field, message }
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * The input directory contained no supported video files
 */
export class NoInputFilesError extends LetterboxError {
  constructor(inputDir: string, extensions: readonly string[]) {
    super(
      `No supported video files found in: ${inputDir}`,
      'NO_INPUT_FILES',
      1,
      { inputDir, extensions: [...extensions] }
    );
    this.name = 'NoInputFilesError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends LetterboxError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      1,
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}

/**
 * A progress monitor was used after it finished
 */
export class MonitorStateError extends LetterboxError {
  constructor(state: string) {
    super(
      `Progress monitor cannot be restarted from state ${state}`,
      'MONITOR_STATE_ERROR',
      1,
      { state }
    );
    this.name = 'MonitorStateError';
  }
}

export function isLetterboxError(error: unknown): error is LetterboxError {
  return error instanceof LetterboxError;
}
