/**
 * Core Types for the BVH document model
 */

import type { CHANNEL_KINDS } from './constants/bvh';

/**
 * One of the six animated degrees of freedom a joint can declare
 */
export type ChannelKind = typeof CHANNEL_KINDS[number];

export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Named, channel-owning node of the skeleton.
 */
export interface BvhJoint {
  readonly kind: 'joint';
  readonly name: string;
  /** Rest translation relative to the parent joint */
  readonly offset: Vector3;
  /** Declaration order is the order of this joint's curves */
  readonly channels: readonly ChannelKind[];
  /** Child joints in declaration order. End Sites are never listed here. */
  readonly children: readonly BvhJoint[];
  /** Terminal markers declared inside this joint's block */
  readonly endSites: readonly BvhEndSite[];
}

/**
 * Tip of a chain. Has no name, channels or children.
 */
export interface BvhEndSite {
  readonly kind: 'endSite';
  readonly offset: Vector3;
}

export type BvhNode = BvhJoint | BvhEndSite;

/**
 * Samples of one channel of one joint, one per frame.
 */
export interface ChannelCurve {
  readonly jointName: string;
  readonly channel: ChannelKind;
  readonly keys: readonly number[];
}

/**
 * Per-joint channel values of a single frame
 */
export type JointSample = Partial<Record<ChannelKind, number>>;

export interface MotionSummary {
  nodeCount: number;
  channelCount: number;
  frameCount: number;
  frameTime: number;
  duration: number;
}

export type {
  BvhReaderConfig,
  Encoding,
} from './schemas';
