/**
 * Motion parser
 *
 * Reads the MOTION section once the hierarchy has fixed the channel layout:
 *
 * MOTION
 * Frames: 2
 * Frame Time: 0.0333333
 * 0 90 0 0 0 0 0 0 0
 * 0 91 0 0 0 0 0 0 0
 */

import { BvhErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { BVH_KEYWORDS } from '../constants/bvh';
import { fail, ok, type ParseResult } from '../core/result';
import { traverseJoints } from '../core/traversal';
import type { BvhJoint, ChannelCurve, ChannelKind } from '../types';
import {
  expectLiteral,
  locationOf,
  parseFloatToken,
  parseKeyValue,
  parseNonNegativeIntegerToken,
  splitTokens,
  type LineReader,
} from './grammar';

export interface MotionSection {
  frameCount: number;
  /** Seconds per frame */
  frameTime: number;
  /** Depth-first pre-order channel layout */
  channels: readonly ChannelCurve[];
}

export interface CurveBuffer {
  jointName: string;
  channel: ChannelKind;
  keys: number[];
}

/**
 * One zero-filled buffer per channel, in pre-order joint order and
 * declaration order within each joint.
 */
export function allocateChannelCurves(root: BvhJoint, frameCount: number): CurveBuffer[] {
  const buffers: CurveBuffer[] = [];
  for (const joint of traverseJoints(root)) {
    for (const channel of joint.channels) {
      buffers.push({
        jointName: joint.name,
        channel,
        keys: new Array<number>(frameCount).fill(0),
      });
    }
  }
  return buffers;
}

/**
 * Parse the MOTION section against the skeleton rooted at `root`.
 */
export function parseMotion(reader: LineReader, root: BvhJoint): ParseResult<MotionSection> {
  const marker = expectLiteral(reader, BVH_KEYWORDS.MOTION, ERROR_MESSAGES.MOTION_NOT_FOUND);
  if (!marker.success) {
    return marker;
  }

  const framesLine = reader.readLine(BVH_KEYWORDS.FRAMES);
  if (!framesLine.success) {
    return framesLine;
  }
  const framesValue = parseKeyValue(framesLine.value, BVH_KEYWORDS.FRAMES);
  if (!framesValue.success) {
    return framesValue;
  }
  const frameCount = parseNonNegativeIntegerToken(framesValue.value, framesLine.value, 'frame count');
  if (!frameCount.success) {
    return frameCount;
  }

  const frameTimeLine = reader.readLine(BVH_KEYWORDS.FRAME_TIME);
  if (!frameTimeLine.success) {
    return frameTimeLine;
  }
  const frameTimeValue = parseKeyValue(frameTimeLine.value, BVH_KEYWORDS.FRAME_TIME);
  if (!frameTimeValue.success) {
    return frameTimeValue;
  }
  const frameTime = parseFloatToken(frameTimeValue.value, frameTimeLine.value, 'frame time');
  if (!frameTime.success) {
    return frameTime;
  }
  if (frameTime.value < 0) {
    return fail(BvhErrorFactory.numericParseError(
      locationOf(frameTimeLine.value),
      frameTimeValue.value,
      'frame time',
      `frame time must not be negative: ${frameTimeValue.value}`
    ));
  }

  // Every frame needs a row; check before sizing the buffers
  if (reader.remaining < frameCount.value) {
    const expected = `frame ${reader.remaining}`;
    return fail(BvhErrorFactory.structuralError(
      `${ERROR_MESSAGES.UNEXPECTED_END_OF_INPUT}, expected ${expected}`,
      { lineNumber: reader.lineNumber + reader.remaining, line: null },
      expected
    ));
  }

  const buffers = allocateChannelCurves(root, frameCount.value);

  for (let frame = 0; frame < frameCount.value; frame++) {
    const row = parseFrame(reader, frame, buffers);
    if (!row.success) {
      return row;
    }
  }

  const channels = buffers.map(buffer => Object.freeze({
    jointName: buffer.jointName,
    channel: buffer.channel,
    keys: Object.freeze(buffer.keys),
  }));

  return ok({
    frameCount: frameCount.value,
    frameTime: frameTime.value,
    channels: Object.freeze(channels),
  });
}

/**
 * Read one frame row into the curve buffers
 */
function parseFrame(reader: LineReader, frame: number, buffers: CurveBuffer[]): ParseResult<void> {
  const result = reader.readLine(`frame ${frame}`);
  if (!result.success) {
    return result;
  }

  const line = result.value;
  const tokens = splitTokens(line.text);
  if (tokens.length !== buffers.length) {
    return fail(BvhErrorFactory.frameDataCountMismatch(
      `${ERROR_MESSAGES.FRAME_DATA_COUNT_MISMATCH}: frame ${frame} has ${tokens.length} values, expected ${buffers.length}`,
      locationOf(line),
      frame,
      buffers.length,
      tokens.length
    ));
  }

  for (let i = 0; i < tokens.length; i++) {
    const value = parseFloatToken(tokens[i], line, `frame ${frame} channel ${i}`);
    if (!value.success) {
      return value;
    }
    buffers[i].keys[frame] = value.value;
  }

  return ok(undefined);
}
