/**
 * @letterbox/core
 *
 * Core package containing:
 * - Error taxonomy
 * - External binary resolution
 * - Converter configuration
 */

// Errors
export {
  LetterboxError,
  MissingDependencyError,
  ProbeError,
  ConversionError,
  UserInterruptError,
  InvalidMediaDescriptorError,
  ConfigurationError,
  NoInputFilesError,
  CommandExecutionError,
  MonitorStateError,
  isLetterboxError,
} from './errors/index.js';

// Binaries
export {
  resolveBinaryPath,
  getBinariesConfig,
  getBinaryFolders,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
  type BinarySource,
} from './config/binaries.js';

// Converter configuration
export {
  converterConfigSchema,
  resolveConverterConfig,
  ENCODER_KINDS,
  ENCODER_CHOICES,
  DEFAULT_TARGET_WIDTH,
  DEFAULT_TARGET_HEIGHT,
  DEFAULT_SUBTITLE_FONT_SIZE,
  DEFAULT_EXTENSIONS,
  DEFAULT_OUTPUT_DIRNAME,
  type ConverterConfig,
  type ConverterConfigInput,
  type EncoderKind,
  type EncoderChoice,
} from './config/converter.js';
