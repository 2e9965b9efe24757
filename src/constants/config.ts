/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  VALIDATE_OFFSETS: true,
  ENCODING: 'utf-8' as const,
  LOG_PREFIX: 'BVH',
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  BVH: '.bvh',
} as const;
