/**
 * BVH Format Constants
 *
 * Literal tokens of the Biovision Hierarchy text format.
 */

/**
 * Section and block keywords
 */
export const BVH_KEYWORDS = {
  HIERARCHY: 'HIERARCHY',
  ROOT: 'ROOT',
  JOINT: 'JOINT',
  END: 'End',
  SITE: 'Site',
  OFFSET: 'OFFSET',
  CHANNELS: 'CHANNELS',
  MOTION: 'MOTION',
  FRAMES: 'Frames',
  FRAME_TIME: 'Frame Time',
} as const;

/**
 * Block delimiters
 */
export const BVH_BRACES = {
  OPEN: '{',
  CLOSE: '}',
} as const;

/**
 * Separator between a motion header key and its value
 */
export const BVH_KEY_VALUE_SEPARATOR = ':';

/**
 * Channel kind spellings, in canonical order.
 * Matching is exact and case-sensitive.
 */
export const CHANNEL_KINDS = [
  'Xposition',
  'Yposition',
  'Zposition',
  'Xrotation',
  'Yrotation',
  'Zrotation',
] as const;

/**
 * Number of components on an OFFSET line
 */
export const OFFSET_COMPONENT_COUNT = 3;
