/**
 * Grammar primitives
 *
 * Line reading, whitespace tokenization, literal matching and strict number
 * parsing shared by the hierarchy and motion parsers.
 */

import { BvhErrorFactory, type SourceLocation } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { BVH_KEY_VALUE_SEPARATOR } from '../constants/bvh';
import { fail, ok, type ParseResult } from '../core/result';

const LINE_BREAK = /\r?\n/;
const WHITESPACE = /\s+/;
const BYTE_ORDER_MARK = '\uFEFF';

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const NON_NEGATIVE_INTEGER_PATTERN = /^\+?\d+$/;

/**
 * One line of source text
 */
export interface SourceLine {
  /** Line with surrounding whitespace removed */
  text: string;
  raw: string;
  /** 1-based */
  lineNumber: number;
}

/**
 * Hands out the lines of a BVH document one at a time.
 */
export class LineReader {
  private readonly lines: string[];
  private position = 0;

  constructor(source: string) {
    const text = source.startsWith(BYTE_ORDER_MARK) ? source.slice(1) : source;
    this.lines = text.split(LINE_BREAK);
  }

  /**
   * Number of the line the next read returns
   */
  get lineNumber(): number {
    return this.position + 1;
  }

  /**
   * Lines not yet read
   */
  get remaining(): number {
    return this.lines.length - this.position;
  }

  get atEnd(): boolean {
    return this.position >= this.lines.length;
  }

  /**
   * Read the next line; running out of input is a structural failure.
   */
  readLine(expected: string): ParseResult<SourceLine> {
    if (this.atEnd) {
      return fail(BvhErrorFactory.structuralError(
        `${ERROR_MESSAGES.UNEXPECTED_END_OF_INPUT}, expected ${expected}`,
        { lineNumber: this.lineNumber, line: null },
        expected
      ));
    }

    const raw = this.lines[this.position];
    this.position++;
    return ok({ text: raw.trim(), raw, lineNumber: this.position });
  }
}

export function locationOf(line: SourceLine): SourceLocation {
  return { lineNumber: line.lineNumber, line: line.raw };
}

/**
 * Split on whitespace, dropping empty tokens
 */
export function splitTokens(text: string): string[] {
  return text.split(WHITESPACE).filter(token => token.length > 0);
}

/**
 * Consume a line that must equal `literal` once trimmed.
 */
export function expectLiteral(reader: LineReader, literal: string, message: string): ParseResult<SourceLine> {
  const result = reader.readLine(literal);
  if (!result.success) {
    return result;
  }

  if (result.value.text !== literal) {
    return fail(BvhErrorFactory.structuralError(message, locationOf(result.value), literal));
  }
  return result;
}

/**
 * Parse a decimal float token such as `1`, `-0.5`, `.25` or `1e-3`.
 */
export function parseFloatToken(token: string, line: SourceLine, field: string): ParseResult<number> {
  if (!FLOAT_PATTERN.test(token)) {
    return fail(BvhErrorFactory.numericParseError(locationOf(line), token, field));
  }
  return ok(Number(token));
}

export function parseNonNegativeIntegerToken(token: string, line: SourceLine, field: string): ParseResult<number> {
  if (!NON_NEGATIVE_INTEGER_PATTERN.test(token)) {
    return fail(BvhErrorFactory.numericParseError(locationOf(line), token, field));
  }

  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    return fail(BvhErrorFactory.numericParseError(locationOf(line), token, field));
  }
  return ok(value);
}

/**
 * Read the value of a `key: value` line.
 * Only the first separator splits, the value is returned trimmed.
 */
export function parseKeyValue(line: SourceLine, key: string): ParseResult<string> {
  const separatorIndex = line.text.indexOf(BVH_KEY_VALUE_SEPARATOR);
  const actualKey = separatorIndex < 0 ? line.text : line.text.slice(0, separatorIndex).trim();

  if (separatorIndex < 0 || actualKey !== key) {
    return fail(BvhErrorFactory.structuralError(`${key} is not found`, locationOf(line), key));
  }
  return ok(line.text.slice(separatorIndex + 1).trim());
}
