/**
 * Media Types
 */

/**
 * Dimensions and length of a probed video. Read-only once produced.
 */
export interface MediaDescriptor {
  readonly width: number;
  readonly height: number;
  /** Seconds; 0 when the container does not report a duration */
  readonly duration: number;
}

/**
 * Anything that can turn a file path into a MediaDescriptor
 */
export interface MediaProber {
  describe(filePath: string): Promise<MediaDescriptor>;
  isAvailable(): Promise<boolean>;
}
