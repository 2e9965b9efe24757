/**
 * Channel-list parser
 *
 * Reads a `CHANNELS <n> <name>...` line into an ordered list of channel kinds.
 */

import { BvhErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { BVH_KEYWORDS } from '../constants/bvh';
import { ChannelKindSchema } from '../schemas';
import { fail, ok, type ParseResult } from '../core/result';
import type { ChannelKind } from '../types';
import { locationOf, parseNonNegativeIntegerToken, splitTokens, type SourceLine } from './grammar';

/**
 * Parse a CHANNELS line.
 *
 * @param level - Nesting level of the owning block, reported on grammar failures
 */
export function parseChannels(line: SourceLine, level: number): ParseResult<ChannelKind[]> {
  const tokens = splitTokens(line.text);

  if (tokens[0] !== BVH_KEYWORDS.CHANNELS) {
    return fail(BvhErrorFactory.grammarError(ERROR_MESSAGES.CHANNELS_NOT_FOUND, locationOf(line), tokens.length, level));
  }

  if (tokens.length < 2) {
    return fail(BvhErrorFactory.grammarError('CHANNELS line has no channel count', locationOf(line), tokens.length, level));
  }

  const count = parseNonNegativeIntegerToken(tokens[1], line, 'channel count');
  if (!count.success) {
    return count;
  }

  const names = tokens.slice(2);
  if (names.length !== count.value) {
    return fail(BvhErrorFactory.channelCountMismatch(
      `${ERROR_MESSAGES.CHANNEL_COUNT_MISMATCH}: declared ${count.value}, found ${names.length}`,
      locationOf(line),
      count.value,
      names.length
    ));
  }

  const channels: ChannelKind[] = [];
  for (const name of names) {
    const parsed = ChannelKindSchema.safeParse(name);
    if (!parsed.success) {
      return fail(BvhErrorFactory.unknownChannelName(locationOf(line), name));
    }
    channels.push(parsed.data);
  }

  return ok(channels);
}
