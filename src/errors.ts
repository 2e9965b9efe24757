/**
 * Custom Error Classes for BVH Operations
 *
 * Tagged union of parse failures plus the config, file system and
 * query errors raised around them.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Position of the offending line in the source text.
 * `line` is null when the input ended before the line was read.
 */
export interface SourceLocation {
  lineNumber: number;
  line: string | null;
}

/**
 * Base BVH Error Class
 */
export abstract class BaseBvhError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Base for every failure raised while reading BVH text.
 * Carries the line the parser stopped at.
 */
export abstract class BaseBvhParseError extends BaseBvhError {
  readonly lineNumber: number;
  readonly line: string | null;

  constructor(message: string, location: SourceLocation, context?: Record<string, unknown>) {
    super(`${message} (line ${location.lineNumber})`, { ...location, ...context });
    this.lineNumber = location.lineNumber;
    this.line = location.line;
  }
}

/**
 * Required section keyword or marker missing or out of order.
 */
export class BvhStructuralError extends BaseBvhParseError {
  readonly _tag = 'BvhStructuralError' as const;
  readonly code = ERROR_CODES.STRUCTURAL_ERROR;
  readonly expected: string;

  constructor(message: string, location: SourceLocation, expected: string) {
    super(message, location, { expected });
    this.expected = expected;
  }
}

/**
 * Block header, offset or channels line with the wrong shape.
 */
export class BvhGrammarError extends BaseBvhParseError {
  readonly _tag = 'BvhGrammarError' as const;
  readonly code = ERROR_CODES.GRAMMAR_ERROR;
  readonly tokenCount: number;
  readonly level: number;

  constructor(message: string, location: SourceLocation, tokenCount: number, level: number) {
    super(message, location, { tokenCount, level });
    this.tokenCount = tokenCount;
    this.level = level;
  }
}

/**
 * CHANNELS count disagrees with the channel names that follow it.
 */
export class BvhChannelCountMismatchError extends BaseBvhParseError {
  readonly _tag = 'BvhChannelCountMismatchError' as const;
  readonly code = ERROR_CODES.CHANNEL_COUNT_MISMATCH;
  readonly declared: number;
  readonly actual: number;

  constructor(message: string, location: SourceLocation, declared: number, actual: number) {
    super(message, location, { declared, actual });
    this.declared = declared;
    this.actual = actual;
  }
}

/**
 * Channel name outside the six canonical spellings.
 */
export class BvhUnknownChannelNameError extends BaseBvhParseError {
  readonly _tag = 'BvhUnknownChannelNameError' as const;
  readonly code = ERROR_CODES.UNKNOWN_CHANNEL_NAME;
  readonly channelName: string;

  constructor(message: string, location: SourceLocation, channelName: string) {
    super(message, location, { channelName });
    this.channelName = channelName;
  }
}

/**
 * Frame row whose value count differs from the document's channel count.
 */
export class BvhFrameDataCountMismatchError extends BaseBvhParseError {
  readonly _tag = 'BvhFrameDataCountMismatchError' as const;
  readonly code = ERROR_CODES.FRAME_DATA_COUNT_MISMATCH;
  readonly frame: number;
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, location: SourceLocation, frame: number, expected: number, actual: number) {
    super(message, location, { frame, expected, actual });
    this.frame = frame;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Token that should be a number but is not.
 */
export class BvhNumericParseError extends BaseBvhParseError {
  readonly _tag = 'BvhNumericParseError' as const;
  readonly code = ERROR_CODES.NUMERIC_PARSE_ERROR;
  readonly token: string;
  readonly field: string;

  constructor(message: string, location: SourceLocation, token: string, field: string) {
    super(message, location, { token, field });
    this.token = token;
    this.field = field;
  }
}

/**
 * BVH Configuration Error
 *
 * Error for configuration validation failures with Zod integration.
 */
export class BvhConfigError extends BaseBvhError {
  readonly _tag = 'BvhConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;
  readonly zodError?: ZodError;

  constructor(message: string, configKey: string, zodError?: ZodError) {
    super(message, { configKey, zodError });
    this.configKey = configKey;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * BVH File System Error
 */
export class BvhFileSystemError extends BaseBvhError {
  readonly _tag = 'BvhFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * BVH Validation Error
 *
 * Raised by document queries given an unknown joint or an out-of-range frame.
 */
export class BvhValidationError extends BaseBvhError {
  readonly _tag = 'BvhValidationError' as const;
  readonly code = ERROR_CODES.VALIDATION_ERROR;
  readonly field: string;

  constructor(message: string, field: string, context?: Record<string, unknown>) {
    super(message, { field, ...context });
    this.field = field;
  }
}

/**
 * Union type for every failure the parser can return
 */
export type BvhParseError =
  | BvhStructuralError
  | BvhGrammarError
  | BvhChannelCountMismatchError
  | BvhUnknownChannelNameError
  | BvhFrameDataCountMismatchError
  | BvhNumericParseError;

/**
 * Union type for all BVH errors
 */
export type BvhError =
  | BvhParseError
  | BvhConfigError
  | BvhFileSystemError
  | BvhValidationError;

/**
 * Error factory functions
 */
export const BvhErrorFactory = {
  structuralError(message: string, location: SourceLocation, expected: string): BvhStructuralError {
    return new BvhStructuralError(message, location, expected);
  },

  grammarError(message: string, location: SourceLocation, tokenCount: number, level: number): BvhGrammarError {
    return new BvhGrammarError(message, location, tokenCount, level);
  },

  channelCountMismatch(message: string, location: SourceLocation, declared: number, actual: number): BvhChannelCountMismatchError {
    return new BvhChannelCountMismatchError(message, location, declared, actual);
  },

  unknownChannelName(location: SourceLocation, channelName: string): BvhUnknownChannelNameError {
    return new BvhUnknownChannelNameError(`unknown channel name: ${channelName}`, location, channelName);
  },

  frameDataCountMismatch(message: string, location: SourceLocation, frame: number, expected: number, actual: number): BvhFrameDataCountMismatchError {
    return new BvhFrameDataCountMismatchError(message, location, frame, expected, actual);
  },

  numericParseError(location: SourceLocation, token: string, field: string, message?: string): BvhNumericParseError {
    return new BvhNumericParseError(message ?? `${field} is not a number: ${token}`, location, token, field);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, zodError?: ZodError): BvhConfigError {
    return new BvhConfigError(message, configKey, zodError);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): BvhFileSystemError {
    return new BvhFileSystemError(message, filePath, operation, context);
  },

  /**
   * Create validation error
   */
  validationError(message: string, field: string, context?: Record<string, unknown>): BvhValidationError {
    return new BvhValidationError(message, field, context);
  },
};
