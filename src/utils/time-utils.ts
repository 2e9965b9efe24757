/**
 * Converts between BVH frame indices and time in seconds.
 *
 * BVH stores a fixed duration per frame ("Frame Time"), so frame `i` starts
 * at `i * frameTime` seconds.
 */

/**
 * Frame/time conversions for a fixed frame duration.
 */
export class FrameTimeConverter {
  /**
   * Frames per second for a frame duration, 0 when the duration is 0
   */
  static toFrameRate(frameTime: number): number {
    return frameTime > 0 ? 1 / frameTime : 0;
  }

  /**
   * Start time of a frame in seconds
   */
  static timeOfFrame(frameIndex: number, frameTime: number): number {
    return frameIndex * frameTime;
  }

  /**
   * Total length of `frameCount` frames in seconds
   */
  static duration(frameCount: number, frameTime: number): number {
    return frameCount * frameTime;
  }

  /**
   * Nearest frame to a time, clamped to `[0, frameCount - 1]`.
   *
   * Returns -1 when there are no frames.
   */
  static frameIndexAtTime(seconds: number, frameTime: number, frameCount: number): number {
    if (frameCount === 0) {
      return -1;
    }
    if (frameTime <= 0 || seconds <= 0) {
      return 0;
    }

    const index = Math.round(seconds / frameTime);
    return Math.min(index, frameCount - 1);
  }
}
