/**
 * @letterbox/processing
 *
 * Conversion layer:
 * - Filter planning (scale, pad, subtitle burn-in)
 * - Progress monitoring of running encodes
 * - Encoder selection and command building
 * - Batch conversion of a directory
 */

// Filter Planner
export {
  planFilters,
  planScalePad,
  fitWithinBox,
  escapeFilterPath,
  renderFilterStage,
  renderFilterSpec,
  buildVideoFilter,
  type FrameSize,
  type ScalePadStage,
  type SubtitleStage,
  type FilterStage,
  type FilterSpec,
  type FilterPlanOptions,
} from './filterPlanner.js';

// Progress Parser
export {
  ProgressMonitor,
  StderrProgressParser,
  runMonitor,
  computePercent,
  formatProgressSample,
  type ProgressReading,
  type ProgressLineParser,
  type ProgressSample,
  type MonitorState,
  type MonitorOutcome,
  type MonitoredProcess,
  type ProgressMonitorOptions,
} from './progressParser.js';

// Encoders
export {
  getEncoderProfile,
  detectEncoder,
  listEncoderProfiles,
  ENCODER_PRIORITY,
  FALLBACK_ENCODER,
  type EncoderProfile,
  type VideoCodecName,
} from './encoders.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type OutputOptions,
} from './commandBuilder.js';

// FFmpeg wrapper
export { FFmpeg, type EncoderProcess, type TranscodeRunner } from './ffmpeg.js';

// Discovery
export { findVideoFiles, findSubtitleFile, outputNameFor } from './discovery.js';

// Batch Converter
export {
  BatchConverter,
  createBatchConverter,
  type BatchConverterDeps,
  type BatchReporter,
  type BatchSummary,
  type FileOutcome,
  type RunOptions,
  type SkipReason,
} from './batchConverter.js';
