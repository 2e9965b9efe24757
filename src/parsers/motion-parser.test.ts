import { describe, expect, it } from 'vitest';
import { BvhFrameDataCountMismatchError, BvhNumericParseError, BvhStructuralError } from '../errors';
import type { BvhJoint } from '../types';
import { LineReader } from './grammar';
import { allocateChannelCurves, parseMotion } from './motion-parser';

const ZERO = { x: 0, y: 0, z: 0 };

const root: BvhJoint = {
  kind: 'joint',
  name: 'Hips',
  offset: ZERO,
  channels: ['Xposition', 'Yposition'],
  children: [
    { kind: 'joint', name: 'Knee', offset: ZERO, channels: ['Xrotation'], children: [], endSites: [] },
  ],
  endSites: [],
};

function parse(lines: string[]) {
  return parseMotion(new LineReader(lines.join('\n')), root);
}

describe('allocateChannelCurves', () => {
  it('allocates one zero-filled curve per channel in pre-order', () => {
    const curves = allocateChannelCurves(root, 2);
    expect(curves).toEqual([
      { jointName: 'Hips', channel: 'Xposition', keys: [0, 0] },
      { jointName: 'Hips', channel: 'Yposition', keys: [0, 0] },
      { jointName: 'Knee', channel: 'Xrotation', keys: [0, 0] },
    ]);
  });
});

describe('parseMotion', () => {
  it('fills each curve column by column', () => {
    const result = parse(['MOTION', 'Frames: 2', 'Frame Time: 0.5', '1 2 3', '  4\t5  6 ']);
    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.value.frameCount).toBe(2);
    expect(result.value.frameTime).toBe(0.5);
    expect(result.value.channels.map(curve => curve.keys)).toEqual([[1, 4], [2, 5], [3, 6]]);
    expect(Object.isFrozen(result.value.channels[0].keys)).toBe(true);
  });

  it('accepts zero frames', () => {
    const result = parse(['MOTION', 'Frames: 0', 'Frame Time: 0.1']);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.channels).toHaveLength(3);
      expect(result.value.channels.every(curve => curve.keys.length === 0)).toBe(true);
    }
  });

  it('ignores lines after the last frame', () => {
    const result = parse(['MOTION', 'Frames: 1', 'Frame Time: 0.1', '1 2 3', '', 'trailing']);
    expect(result.success).toBe(true);
  });

  it('requires the MOTION marker without reading frame data', () => {
    const result = parse(['Frames: 1', 'Frame Time: 0.1', '1 2 3']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhStructuralError);
      expect(result.error.message).toBe('MOTION is not found (line 1)');
    }
  });

  it('requires the Frames key', () => {
    const result = parse(['MOTION', 'Frame Count: 1']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe('BvhStructuralError');
      expect(result.error.message).toBe('Frames is not found (line 2)');
    }
  });

  it('rejects a non-numeric frame count', () => {
    const result = parse(['MOTION', 'Frames: many']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhNumericParseError);
      expect(result.error.message).toBe('frame count is not a number: many (line 2)');
    }
  });

  it('rejects a negative frame count', () => {
    const result = parse(['MOTION', 'Frames: -3']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe('BvhNumericParseError');
    }
  });

  it('requires the Frame Time key', () => {
    const result = parse(['MOTION', 'Frames: 1', 'FrameTime: 0.1']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Frame Time is not found (line 3)');
    }
  });

  it('rejects a non-numeric or negative frame time', () => {
    const garbled = parse(['MOTION', 'Frames: 1', 'Frame Time: fast']);
    const negative = parse(['MOTION', 'Frames: 1', 'Frame Time: -0.1']);

    expect(garbled.success).toBe(false);
    expect(negative.success).toBe(false);
    if (!negative.success) {
      expect(negative.error.message).toBe('frame time must not be negative: -0.1 (line 3)');
    }
  });

  it('fails on a row with too few values', () => {
    const result = parse(['MOTION', 'Frames: 2', 'Frame Time: 0.1', '1 2 3', '4 5']);
    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof BvhFrameDataCountMismatchError) {
      expect(result.error.frame).toBe(1);
      expect(result.error.expected).toBe(3);
      expect(result.error.actual).toBe(2);
      expect(result.error.lineNumber).toBe(5);
      expect(result.error.line).toBe('4 5');
    } else {
      expect.fail('expected a frame data count mismatch');
    }
  });

  it('fails on a row with too many values', () => {
    const result = parse(['MOTION', 'Frames: 1', 'Frame Time: 0.1', '1 2 3 4']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe('BvhFrameDataCountMismatchError');
      expect(result.error.message).toBe('frame value count does not match channel count: frame 0 has 4 values, expected 3 (line 4)');
    }
  });

  it('fails on a non-numeric sample', () => {
    const result = parse(['MOTION', 'Frames: 1', 'Frame Time: 0.1', '1 x 3']);
    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof BvhNumericParseError) {
      expect(result.error.token).toBe('x');
      expect(result.error.field).toBe('frame 0 channel 1');
    } else {
      expect.fail('expected a numeric parse error');
    }
  });

  it('fails when frame rows run out', () => {
    const result = parse(['MOTION', 'Frames: 3', 'Frame Time: 0.1', '1 2 3']);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhStructuralError);
      expect(result.error.message).toBe('Unexpected end of input, expected frame 1 (line 5)');
    }
  });

  it('rejects a frame count larger than the rows left before allocating', () => {
    const result = parse(['MOTION', 'Frames: 5000000000', 'Frame Time: 0.1', '1 2 3']);
    expect(result.success).toBe(false);
    if (!result.success && result.error instanceof BvhStructuralError) {
      expect(result.error.expected).toBe('frame 1');
      expect(result.error.lineNumber).toBe(5);
      expect(result.error.line).toBeNull();
    } else {
      expect.fail('expected a structural error');
    }
  });
});
