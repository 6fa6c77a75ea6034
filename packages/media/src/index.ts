/**
 * @letterbox/media
 *
 * Media probing layer: runs ffprobe and reduces its output to the
 * width, height and duration the converter plans with.
 */

// Probing
export {
  FFProbe,
  toMediaDescriptor,
  ffprobeOutputSchema,
  type FFProbeResult,
} from './probes/ffprobe.js';

// Types
export type { MediaDescriptor, MediaProber } from './types.js';
