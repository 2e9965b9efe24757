/**
 * BVH document parser
 *
 * Runs the hierarchy parser, then the motion parser against the layout it
 * fixed, and assembles the MotionDocument. The whole document is returned
 * or the first failure is, never a partial result.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { MotionDocument } from '../core/motion-document';
import { ok, unwrap, type ParseResult } from '../core/result';
import { countChannels } from '../core/traversal';
import type { Logger } from '../utils/logger';
import { LineReader } from './grammar';
import { parseHierarchy } from './hierarchy-parser';
import { parseMotion } from './motion-parser';

export interface BvhParseOptions {
  /** Reject malformed OFFSET lines (default true) */
  validateOffsets?: boolean;
  /** Receives debug diagnostics. Failures are returned, never logged. */
  logger?: Logger;
}

/**
 * Parse BVH text into a MotionDocument.
 *
 * @example
 * ```typescript
 * const result = parseBvh(text);
 * if (result.success) {
 *   console.log(result.value.toString());
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function parseBvh(source: string, options: BvhParseOptions = {}): ParseResult<MotionDocument> {
  const logger = options.logger;
  const reader = new LineReader(source);

  const root = parseHierarchy(reader, {
    validateOffsets: options.validateOffsets ?? DEFAULT_CONFIG.VALIDATE_OFFSETS,
  });
  if (!root.success) {
    return root;
  }
  logger?.logStage('hierarchy', {
    root: root.value.name,
    channelCount: countChannels(root.value),
  });

  const motion = parseMotion(reader, root.value);
  if (!motion.success) {
    return motion;
  }
  logger?.logStage('motion', {
    frameCount: motion.value.frameCount,
    frameTime: motion.value.frameTime,
  });

  return ok(new MotionDocument({
    root: root.value,
    frameCount: motion.value.frameCount,
    frameTime: motion.value.frameTime,
    channels: motion.value.channels,
  }));
}

/**
 * Parse BVH text, throwing the parse error on failure
 */
export function parseBvhOrThrow(source: string, options: BvhParseOptions = {}): MotionDocument {
  return unwrap(parseBvh(source, options));
}
