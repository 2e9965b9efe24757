import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it, vi } from 'vitest';
import { countChannels, traverseJoints } from '../core/traversal';
import { BvhFrameDataCountMismatchError, BvhStructuralError, BvhUnknownChannelNameError } from '../errors';
import { LogLevel, Logger } from '../utils/logger';
import { parseBvh, parseBvhOrThrow } from './bvh-parser';

const fixture = (name: string) =>
  fs.readFileSync(path.join(__dirname, '..', '__fixtures__', name), 'utf-8');

const HIPS_SPINE = fixture('hips-spine.bvh');
const BRANCHING = fixture('branching.bvh');

describe('parseBvh', () => {
  it('parses a root with one joint and an End Site', () => {
    const result = parseBvh(HIPS_SPINE);
    expect(result.success).toBe(true);
    if (!result.success) return;

    const document = result.value;
    expect(document.nodeCount).toBe(2);
    expect(document.getJointNames()).toEqual(['Hips', 'Spine']);
    expect(document.channels).toHaveLength(9);
    expect(document.channels.every(curve => curve.keys.length === 2)).toBe(true);
    expect(document.frameCount).toBe(2);
    expect(document.frameTime).toBeCloseTo(0.0333333, 7);
  });

  it('lays channels out depth-first in declaration order', () => {
    const document = parseBvhOrThrow(HIPS_SPINE);
    expect(document.channels.map(curve => `${curve.jointName}.${curve.channel}`)).toEqual([
      'Hips.Xposition',
      'Hips.Yposition',
      'Hips.Zposition',
      'Hips.Zrotation',
      'Hips.Xrotation',
      'Hips.Yrotation',
      'Spine.Zrotation',
      'Spine.Xrotation',
      'Spine.Yrotation',
    ]);
    expect(document.channels[1].keys).toEqual([90, 91]);
    expect(document.channels[8].keys).toEqual([30, 31]);
  });

  it('matches the curve count to the pre-order channel sum', () => {
    for (const source of [HIPS_SPINE, BRANCHING]) {
      const document = parseBvhOrThrow(source);
      const declared = traverseJoints(document.root).toArray()
        .reduce((sum, joint) => sum + joint.channels.length, 0);

      expect(document.channels).toHaveLength(declared);
      expect(countChannels(document.root)).toBe(declared);
      expect(document.channels.every(curve => curve.keys.length === document.frameCount)).toBe(true);
    }
  });

  it('lays out sibling branches in pre-order', () => {
    const document = parseBvhOrThrow(BRANCHING);
    expect(document.getJointNames()).toEqual(['Hips', 'LeftUpLeg', 'LeftLeg', 'RightUpLeg', 'Chest', 'Head']);
    expect(document.channels).toHaveLength(19);
    expect(document.channels[18]).toEqual({ jointName: 'Head', channel: 'Yrotation', keys: [13, 14, 15] });
    expect(document.channels[9].keys).toEqual([4, 4.5, 5]);
  });

  it('yields equal documents for the same text', () => {
    const first = parseBvhOrThrow(BRANCHING);
    const second = parseBvhOrThrow(BRANCHING);
    expect(second.root).toEqual(first.root);
    expect(second.channels).toEqual(first.channels);
    expect(second).not.toBe(first);
  });

  it('fails without MOTION after a valid hierarchy', () => {
    const source = HIPS_SPINE.replace('MOTION\n', '');
    const result = parseBvh(source);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhStructuralError);
      expect(result.error.message).toBe('MOTION is not found (line 16)');
      expect(result.error.line).toBe('Frames: 2');
    }
  });

  it('fails on a misspelled channel name', () => {
    const result = parseBvh(HIPS_SPINE.replace('CHANNELS 3 Zrotation', 'CHANNELS 3 Wposition'));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhUnknownChannelNameError);
      expect(result.error.lineNumber).toBe(9);
    }
  });

  it('returns no document when a frame row is short', () => {
    const result = parseBvh(HIPS_SPINE.replace('11.0 21.0 31.0', '11.0 21.0'));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhFrameDataCountMismatchError);
    }
    expect('value' in result).toBe(false);
  });

  it('returns a failure for an impossible frame count', () => {
    const result = parseBvh(HIPS_SPINE.replace('Frames: 2', 'Frames: 100000000'));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhStructuralError);
    }
  });

  it('accepts CRLF line endings', () => {
    const document = parseBvhOrThrow(HIPS_SPINE.replace(/\n/g, '\r\n'));
    expect(document.channels).toHaveLength(9);
    expect(document.channels[0].keys).toEqual([1, 1.5]);
  });

  it('throws the parse error from parseBvhOrThrow', () => {
    expect(() => parseBvhOrThrow('ROOT Hips')).toThrow(BvhStructuralError);
    expect(() => parseBvhOrThrow('ROOT Hips')).toThrow('HIERARCHY is not found (line 1)');
  });

  it('passes offset validation through', () => {
    const source = HIPS_SPINE.replace('OFFSET 0.00 10.00 0.00', 'OFFSET 0.00 10.00');
    expect(parseBvh(source).success).toBe(false);

    const lenient = parseBvh(source, { validateOffsets: false });
    expect(lenient.success).toBe(true);
    if (lenient.success) {
      expect(lenient.value.findJoint('Spine')?.offset).toEqual({ x: 0, y: 0, z: 0 });
    }
  });

  it('logs parse stages to a debug logger', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      parseBvh(HIPS_SPINE, { logger: new Logger({ level: LogLevel.DEBUG, timestamp: false, prefix: 'Test' }) });

      expect(log).toHaveBeenCalledTimes(2);
      expect(log.mock.calls[0][1]).toEqual({ stage: 'hierarchy', root: 'Hips', channelCount: 9 });
      expect(log.mock.calls[1][1]).toEqual({ stage: 'motion', frameCount: 2, frameTime: 0.0333333 });
    } finally {
      log.mockRestore();
    }
  });
});
