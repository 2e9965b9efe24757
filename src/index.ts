/**
 * BVH Motion Reader
 *
 * Reads Biovision Hierarchy motion-capture files into a joint tree and
 * per-channel sample curves.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'bvh-motion-reader';
 *
 * const reader = defineConfig({ debug: true });
 *
 * const walk = reader.parseFile('./walk.bvh');
 * console.log(walk.toString());
 * console.log(walk.sampleJoint('Hips', 0));
 * ```
 */

import { ZodError } from 'zod';
import { BvhErrorFactory } from './errors';
import { BvhReaderConfigSchema, FilePathSchema, type BvhReaderConfig } from './schemas';
import { MotionDocument } from './core/motion-document';
import { unwrap, type ParseResult } from './core/result';
import { parseBvh } from './parsers/bvh-parser';
import { findBvhFiles, getBasenameWithoutExt, readBvhFile } from './utils/file-utils';
import { Logger, LoggerFactory } from './utils/logger';

/**
 * One parsed file of a directory
 */
export interface ParsedBvhFile {
  name: string;
  filePath: string;
  document: MotionDocument;
}

/**
 * Main reader class
 */
export class BvhReader {
  private config: BvhReaderConfig;
  private logger: Logger;

  constructor(config: Partial<BvhReaderConfig> = {}) {
    try {
      this.config = BvhReaderConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw BvhErrorFactory.configError(
          'Invalid configuration',
          'BvhReaderConfig',
          error
        );
      }
      throw error;
    }

    this.logger = LoggerFactory.forReader(this.config.debug, this.config.logPrefix);
  }

  /**
   * Parse BVH text, returning the failure instead of throwing it
   */
  tryParse(source: string): ParseResult<MotionDocument> {
    return this.logger.withTiming('parse', () => parseBvh(source, {
      validateOffsets: this.config.validateOffsets,
      logger: this.logger,
    }));
  }

  /**
   * Parse BVH text
   *
   * @throws The parse error on malformed input
   */
  parse(source: string): MotionDocument {
    return unwrap(this.tryParse(source));
  }

  /**
   * Read and parse a `.bvh` file
   *
   * @example
   * ```typescript
   * const document = reader.parseFile('./captures/run.bvh');
   * const hips = document.getCurve('Hips', 'Yposition');
   * ```
   */
  parseFile(filePath: string): MotionDocument {
    const validPath = FilePathSchema.safeParse(filePath);
    if (!validPath.success) {
      throw BvhErrorFactory.fileSystemError('Invalid file path', filePath, 'read', { zodError: validPath.error });
    }

    const source = readBvhFile(validPath.data, this.config.encoding);
    this.logger.logFileOperation('read', validPath.data, source.length);

    return this.parse(source);
  }

  /**
   * Parse every `.bvh` file directly inside a directory, in name order.
   * The first file that fails aborts the whole batch.
   */
  parseDirectory(dirPath: string): ParsedBvhFile[] {
    const files = findBvhFiles(dirPath);
    this.logger.debug(`Found ${files.length} BVH files`, { filePath: dirPath });

    return files.map(filePath => ({
      name: getBasenameWithoutExt(filePath),
      filePath,
      document: this.parseFile(filePath),
    }));
  }

  /**
   * Get current configuration
   */
  getConfig(): BvhReaderConfig {
    return { ...this.config };
  }
}

/**
 * Create reader instance with configuration
 *
 * @example
 * ```typescript
 * const reader = defineConfig({ validateOffsets: false });
 * const document = reader.parse(text);
 * ```
 */
export function defineConfig(config: Partial<BvhReaderConfig> = {}): BvhReader {
  return new BvhReader(config);
}

/**
 * TypeScript type exports
 */
export type {
  BvhEndSite,
  BvhJoint,
  BvhNode,
  BvhReaderConfig,
  ChannelCurve,
  ChannelKind,
  Encoding,
  JointSample,
  MotionSummary,
  Vector3,
} from './types';
export type { ParseResult } from './core/result';
export type { BvhParseOptions } from './parsers/bvh-parser';
export type { SourceLocation, BvhParseError, BvhError } from './errors';

/**
 * Parser and model exports
 */
export { MotionDocument } from './core/motion-document';
export { parseBvh, parseBvhOrThrow } from './parsers/bvh-parser';
export { PreOrderTraversal, traverseJoints, traverseNodes, findJoint, countChannels } from './core/traversal';
export { validateMotionDocument } from './validation';
export { CHANNEL_KINDS } from './constants/bvh';
export {
  BaseBvhError,
  BvhStructuralError,
  BvhGrammarError,
  BvhChannelCountMismatchError,
  BvhUnknownChannelNameError,
  BvhFrameDataCountMismatchError,
  BvhNumericParseError,
  BvhConfigError,
  BvhFileSystemError,
  BvhValidationError,
  BvhErrorFactory,
} from './errors';
export { Logger, LogLevel, createLogger } from './utils/logger';
