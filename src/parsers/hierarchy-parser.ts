/**
 * Hierarchy parser
 *
 * Recursive descent over the HIERARCHY section:
 *
 * HIERARCHY
 * ROOT Hips
 * {
 *   OFFSET 0 0 0
 *   CHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation
 *   JOINT Spine
 *   {
 *     OFFSET 0 10 0
 *     CHANNELS 3 Zrotation Xrotation Yrotation
 *     End Site
 *     {
 *       OFFSET 0 5 0
 *     }
 *   }
 * }
 */

import { BvhErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { BVH_BRACES, BVH_KEYWORDS, OFFSET_COMPONENT_COUNT } from '../constants/bvh';
import { fail, ok, type ParseResult } from '../core/result';
import type { BvhEndSite, BvhJoint, BvhNode, Vector3 } from '../types';
import { parseChannels } from './channel-parser';
import {
  expectLiteral,
  locationOf,
  parseFloatToken,
  splitTokens,
  type LineReader,
  type SourceLine,
} from './grammar';

export interface HierarchyParserOptions {
  /** Reject malformed OFFSET lines instead of falling back to a zero offset */
  validateOffsets: boolean;
}

/**
 * Block header line, classified by its keyword
 */
type BlockHeader =
  | { type: 'root'; name: string; line: SourceLine }
  | { type: 'joint'; name: string; line: SourceLine }
  | { type: 'endSite'; line: SourceLine }
  | { type: 'close'; line: SourceLine };

const ZERO_OFFSET: Vector3 = Object.freeze({ x: 0, y: 0, z: 0 });

/**
 * Parse the HIERARCHY section and return the root joint.
 * The reader is left on the line after the root's closing brace.
 */
export function parseHierarchy(reader: LineReader, options: HierarchyParserOptions): ParseResult<BvhJoint> {
  const marker = expectLiteral(reader, BVH_KEYWORDS.HIERARCHY, ERROR_MESSAGES.HIERARCHY_NOT_FOUND);
  if (!marker.success) {
    return marker;
  }

  const header = parseBlockHeader(reader, 0);
  if (!header.success) {
    return header;
  }

  const root = header.value;
  if (root.type !== 'root') {
    return fail(BvhErrorFactory.structuralError(
      ERROR_MESSAGES.ROOT_NOT_FOUND,
      locationOf(root.line),
      BVH_KEYWORDS.ROOT
    ));
  }

  return parseJointBlock(reader, root.name, 0, options);
}

function parseBlockHeader(reader: LineReader, level: number): ParseResult<BlockHeader> {
  const result = reader.readLine(level === 0 ? BVH_KEYWORDS.ROOT : BVH_BRACES.CLOSE);
  if (!result.success) {
    return result;
  }

  const line = result.value;
  const tokens = splitTokens(line.text);

  if (tokens.length === 1 && tokens[0] === BVH_BRACES.CLOSE) {
    return ok({ type: 'close' as const, line });
  }

  if (tokens.length !== 2) {
    return fail(BvhErrorFactory.grammarError(
      `block header split to ${tokens.length} tokens (${line.text})`,
      locationOf(line),
      tokens.length,
      level
    ));
  }

  const [keyword, name] = tokens;
  switch (keyword) {
    case BVH_KEYWORDS.ROOT:
      if (level !== 0) {
        return fail(BvhErrorFactory.structuralError(ERROR_MESSAGES.NESTED_ROOT, locationOf(line), BVH_KEYWORDS.JOINT));
      }
      return ok({ type: 'root' as const, name, line });

    case BVH_KEYWORDS.JOINT:
      if (level === 0) {
        return fail(BvhErrorFactory.structuralError(ERROR_MESSAGES.JOINT_AT_TOP_LEVEL, locationOf(line), BVH_KEYWORDS.ROOT));
      }
      return ok({ type: 'joint' as const, name, line });

    case BVH_KEYWORDS.END:
      if (level === 0) {
        return fail(BvhErrorFactory.structuralError(ERROR_MESSAGES.END_SITE_AT_TOP_LEVEL, locationOf(line), BVH_KEYWORDS.ROOT));
      }
      if (name !== BVH_KEYWORDS.SITE) {
        return fail(BvhErrorFactory.grammarError(`expected 'End Site', found '${line.text}'`, locationOf(line), tokens.length, level));
      }
      return ok({ type: 'endSite' as const, line });

    default:
      return fail(BvhErrorFactory.grammarError(`unknown block type: ${keyword}`, locationOf(line), tokens.length, level));
  }
}

function parseChildNode(reader: LineReader, header: BlockHeader, level: number, options: HierarchyParserOptions): ParseResult<BvhNode | null> {
  switch (header.type) {
    case 'close':
      return ok(null);
    case 'endSite':
      return parseEndSiteBlock(reader, level, options);
    case 'root':
    case 'joint':
      return parseJointBlock(reader, header.name, level, options);
  }
}

function parseJointBlock(reader: LineReader, name: string, level: number, options: HierarchyParserOptions): ParseResult<BvhJoint> {
  const open = expectOpenBrace(reader, level);
  if (!open.success) {
    return open;
  }

  const offset = parseOffset(reader, level, options);
  if (!offset.success) {
    return offset;
  }

  const channelLine = reader.readLine(BVH_KEYWORDS.CHANNELS);
  if (!channelLine.success) {
    return channelLine;
  }

  const channels = parseChannels(channelLine.value, level);
  if (!channels.success) {
    return channels;
  }

  const children: BvhJoint[] = [];
  const endSites: BvhEndSite[] = [];

  for (;;) {
    const header = parseBlockHeader(reader, level + 1);
    if (!header.success) {
      return header;
    }

    const child = parseChildNode(reader, header.value, level + 1, options);
    if (!child.success) {
      return child;
    }
    if (child.value === null) {
      break;
    }

    // End Sites own no channels and stay out of the joint tree
    if (child.value.kind === 'endSite') {
      endSites.push(child.value);
    } else {
      children.push(child.value);
    }
  }

  return ok(Object.freeze({
    kind: 'joint' as const,
    name,
    offset: offset.value,
    channels: Object.freeze(channels.value),
    children: Object.freeze(children),
    endSites: Object.freeze(endSites),
  }));
}

function parseEndSiteBlock(reader: LineReader, level: number, options: HierarchyParserOptions): ParseResult<BvhEndSite> {
  const open = expectOpenBrace(reader, level);
  if (!open.success) {
    return open;
  }

  const offset = parseOffset(reader, level, options);
  if (!offset.success) {
    return offset;
  }

  const close = reader.readLine(BVH_BRACES.CLOSE);
  if (!close.success) {
    return close;
  }
  if (close.value.text !== BVH_BRACES.CLOSE) {
    return fail(BvhErrorFactory.structuralError(
      `End Site block must close after its OFFSET (${close.value.text})`,
      locationOf(close.value),
      BVH_BRACES.CLOSE
    ));
  }

  return ok(Object.freeze({ kind: 'endSite' as const, offset: offset.value }));
}

function expectOpenBrace(reader: LineReader, level: number): ParseResult<SourceLine> {
  const result = reader.readLine(BVH_BRACES.OPEN);
  if (!result.success) {
    return result;
  }

  if (result.value.text !== BVH_BRACES.OPEN) {
    return fail(BvhErrorFactory.grammarError(
      ERROR_MESSAGES.OPEN_BRACE_NOT_FOUND,
      locationOf(result.value),
      splitTokens(result.value.text).length,
      level
    ));
  }
  return result;
}

function parseOffset(reader: LineReader, level: number, options: HierarchyParserOptions): ParseResult<Vector3> {
  const result = reader.readLine(BVH_KEYWORDS.OFFSET);
  if (!result.success) {
    return result;
  }

  const line = result.value;
  const tokens = splitTokens(line.text);
  const wellFormed = tokens[0] === BVH_KEYWORDS.OFFSET && tokens.length === OFFSET_COMPONENT_COUNT + 1;

  if (!wellFormed) {
    if (!options.validateOffsets) {
      return ok(ZERO_OFFSET);
    }
    const message = tokens[0] === BVH_KEYWORDS.OFFSET
      ? `OFFSET expects ${OFFSET_COMPONENT_COUNT} values, found ${tokens.length - 1}`
      : ERROR_MESSAGES.OFFSET_NOT_FOUND;
    return fail(BvhErrorFactory.grammarError(message, locationOf(line), tokens.length, level));
  }

  const components: number[] = [];
  for (const token of tokens.slice(1)) {
    const value = parseFloatToken(token, line, 'offset');
    if (!value.success) {
      return options.validateOffsets ? value : ok(ZERO_OFFSET);
    }
    components.push(value.value);
  }

  const [x, y, z] = components;
  return ok(Object.freeze({ x, y, z }));
}
