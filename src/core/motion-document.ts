/**
 * Motion Document
 *
 * Immutable product of a BVH parse: the joint tree plus one curve per
 * channel, laid out in depth-first pre-order.
 */

import { BvhErrorFactory } from '../errors';
import type {
  BvhJoint,
  ChannelCurve,
  ChannelKind,
  JointSample,
  MotionSummary,
} from '../types';
import { FrameTimeConverter } from '../utils/time-utils';
import { findJoint, traverseJoints } from './traversal';

export interface MotionDocumentInit {
  root: BvhJoint;
  frameCount: number;
  /** Seconds per frame */
  frameTime: number;
  channels: readonly ChannelCurve[];
}

export class MotionDocument {
  readonly root: BvhJoint;
  readonly frameCount: number;
  readonly frameTime: number;
  readonly channels: readonly ChannelCurve[];

  /** Index of each joint's first curve */
  private readonly channelOffsets: ReadonlyMap<string, number>;

  constructor(init: MotionDocumentInit) {
    this.root = init.root;
    this.frameCount = init.frameCount;
    this.frameTime = init.frameTime;
    this.channels = init.channels;

    const offsets = new Map<string, number>();
    let offset = 0;
    for (const joint of traverseJoints(init.root)) {
      // First declaration wins for duplicated names, matching findJoint
      if (!offsets.has(joint.name)) {
        offsets.set(joint.name, offset);
      }
      offset += joint.channels.length;
    }
    this.channelOffsets = offsets;

    Object.freeze(this);
  }

  /**
   * Number of channel-owning joints
   */
  get nodeCount(): number {
    return traverseJoints(this.root).toArray().length;
  }

  get channelCount(): number {
    return this.channels.length;
  }

  /**
   * Length of the motion in seconds
   */
  get duration(): number {
    return FrameTimeConverter.duration(this.frameCount, this.frameTime);
  }

  get frameRate(): number {
    return FrameTimeConverter.toFrameRate(this.frameTime);
  }

  findJoint(name: string): BvhJoint | undefined {
    return findJoint(this.root, name);
  }

  /**
   * Joint names in pre-order
   */
  getJointNames(): string[] {
    return traverseJoints(this.root).toArray().map(joint => joint.name);
  }

  /**
   * Position of a joint's first curve in `channels`
   */
  getChannelOffset(jointName: string): number | undefined {
    return this.channelOffsets.get(jointName);
  }

  getCurve(jointName: string, channel: ChannelKind): ChannelCurve | undefined {
    const joint = this.findJoint(jointName);
    const offset = this.getChannelOffset(jointName);
    if (!joint || offset === undefined) {
      return undefined;
    }

    const index = joint.channels.indexOf(channel);
    return index < 0 ? undefined : this.channels[offset + index];
  }

  /**
   * All channel values of one frame, in channel layout order
   */
  getFrame(frameIndex: number): number[] {
    this.assertFrameIndex(frameIndex);
    return this.channels.map(curve => curve.keys[frameIndex]);
  }

  /**
   * Values of one joint's channels at a frame
   */
  sampleJoint(jointName: string, frameIndex: number): JointSample {
    this.assertFrameIndex(frameIndex);

    const joint = this.findJoint(jointName);
    const offset = this.getChannelOffset(jointName);
    if (!joint || offset === undefined) {
      throw BvhErrorFactory.validationError(`Unknown joint: ${jointName}`, 'jointName', { jointName });
    }

    const sample: JointSample = {};
    joint.channels.forEach((channel, i) => {
      sample[channel] = this.channels[offset + i].keys[frameIndex];
    });
    return sample;
  }

  /**
   * Start time of a frame in seconds
   */
  timeOfFrame(frameIndex: number): number {
    this.assertFrameIndex(frameIndex);
    return FrameTimeConverter.timeOfFrame(frameIndex, this.frameTime);
  }

  /**
   * Nearest frame to a time in seconds, clamped to the document's frames
   */
  frameIndexAtTime(seconds: number): number {
    return FrameTimeConverter.frameIndexAtTime(seconds, this.frameTime, this.frameCount);
  }

  getSummary(): MotionSummary {
    return {
      nodeCount: this.nodeCount,
      channelCount: this.channelCount,
      frameCount: this.frameCount,
      frameTime: this.frameTime,
      duration: this.duration,
    };
  }

  toString(): string {
    return `${this.nodeCount}nodes, ${this.channelCount}channels, ${this.frameCount}frames, ${this.duration.toFixed(2)}seconds`;
  }

  private assertFrameIndex(frameIndex: number): void {
    if (!Number.isInteger(frameIndex) || frameIndex < 0 || frameIndex >= this.frameCount) {
      throw BvhErrorFactory.validationError(
        `Frame index ${frameIndex} is out of range [0, ${this.frameCount})`,
        'frameIndex',
        { frameIndex, frameCount: this.frameCount }
      );
    }
  }
}
