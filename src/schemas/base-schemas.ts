/**
 * Base Schemas
 *
 * Common validation schemas shared by the reader and its config.
 */

import { z } from 'zod';
import { CHANNEL_KINDS } from '../constants/bvh';

/**
 * Text encodings accepted when reading BVH files
 */
export const EncodingSchema = z.enum(['utf-8', 'utf-16le', 'latin1']);

/**
 * Channel kind spellings (exact, case-sensitive)
 */
export const ChannelKindSchema = z.enum(CHANNEL_KINDS);
