/**
 * Error Constants for the BVH reader
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  STRUCTURAL_ERROR: 'BVH_STRUCTURAL_ERROR',
  GRAMMAR_ERROR: 'BVH_GRAMMAR_ERROR',
  CHANNEL_COUNT_MISMATCH: 'BVH_CHANNEL_COUNT_MISMATCH',
  UNKNOWN_CHANNEL_NAME: 'BVH_UNKNOWN_CHANNEL_NAME',
  FRAME_DATA_COUNT_MISMATCH: 'BVH_FRAME_DATA_COUNT_MISMATCH',
  NUMERIC_PARSE_ERROR: 'BVH_NUMERIC_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR: 'BVH_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'BVH_FILE_SYSTEM_ERROR',
  VALIDATION_ERROR: 'BVH_VALIDATION_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  UNEXPECTED_END_OF_INPUT: 'Unexpected end of input',
  HIERARCHY_NOT_FOUND: 'HIERARCHY is not found',
  MOTION_NOT_FOUND: 'MOTION is not found',
  ROOT_NOT_FOUND: 'ROOT is not found',
  NESTED_ROOT: 'nested ROOT',
  JOINT_AT_TOP_LEVEL: 'should be ROOT, but JOINT',
  END_SITE_AT_TOP_LEVEL: 'End Site at level 0',
  OPEN_BRACE_NOT_FOUND: "'{' is not found",
  CHANNELS_NOT_FOUND: 'CHANNELS is not found',
  OFFSET_NOT_FOUND: 'OFFSET is not found',
  CHANNEL_COUNT_MISMATCH: 'channel count does not match the number of channel names',
  FRAME_DATA_COUNT_MISMATCH: 'frame value count does not match channel count',
  CONFIG_VALIDATION_ERROR: 'Configuration validation failed',
  FILE_NOT_FOUND: 'File not found',
  UNSUPPORTED_EXTENSION: 'Unsupported file extension',
} as const;
