/**
 * Zod Schemas for the BVH reader
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { EncodingSchema } from './base-schemas';

/**
 * Reader Configuration Schema
 */
export const BvhReaderConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  validateOffsets: z.boolean().optional().default(DEFAULT_CONFIG.VALIDATE_OFFSETS),
  encoding: EncodingSchema.optional().default(DEFAULT_CONFIG.ENCODING),
  logPrefix: z.string().min(1, 'Log prefix cannot be empty').optional().default(DEFAULT_CONFIG.LOG_PREFIX),
});

/**
 * File Path Schema
 */
export const FilePathSchema = z.string()
  .min(1, 'File path cannot be empty');

/**
 * Type exports for TypeScript inference
 */
export type BvhReaderConfig = z.infer<typeof BvhReaderConfigSchema>;
export type Encoding = z.infer<typeof EncodingSchema>;

// Re-export base schemas
export { EncodingSchema, ChannelKindSchema } from './base-schemas';
