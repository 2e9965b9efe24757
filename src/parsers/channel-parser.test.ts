import { describe, expect, it } from 'vitest';
import {
  BvhChannelCountMismatchError,
  BvhGrammarError,
  BvhNumericParseError,
  BvhUnknownChannelNameError,
} from '../errors';
import { parseChannels } from './channel-parser';
import type { SourceLine } from './grammar';

function lineOf(raw: string): SourceLine {
  return { text: raw.trim(), raw, lineNumber: 5 };
}

describe('parseChannels', () => {
  it('keeps the declared channel order', () => {
    const result = parseChannels(lineOf('  CHANNELS 6 Xposition Yposition Zposition Zrotation Xrotation Yrotation'), 0);
    expect(result).toEqual({
      success: true,
      value: ['Xposition', 'Yposition', 'Zposition', 'Zrotation', 'Xrotation', 'Yrotation'],
    });
  });

  it('accepts an empty channel list', () => {
    expect(parseChannels(lineOf('CHANNELS 0'), 1)).toEqual({ success: true, value: [] });
  });

  it('fails with a grammar error when the keyword is missing', () => {
    const result = parseChannels(lineOf('OFFSET 0 0 0'), 2);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhGrammarError);
      expect(result.error.message).toBe('CHANNELS is not found (line 5)');
      expect(result.error.context).toMatchObject({ tokenCount: 4, level: 2, line: 'OFFSET 0 0 0' });
    }
  });

  it('fails with a count mismatch when fewer names than declared follow', () => {
    const result = parseChannels(lineOf('CHANNELS 3 Xposition Yposition'), 1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhChannelCountMismatchError);
      if (result.error instanceof BvhChannelCountMismatchError) {
        expect(result.error.declared).toBe(3);
        expect(result.error.actual).toBe(2);
      }
    }
  });

  it('fails with a count mismatch when more names than declared follow', () => {
    const result = parseChannels(lineOf('CHANNELS 1 Xrotation Yrotation'), 1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe('BvhChannelCountMismatchError');
    }
  });

  it('fails on a misspelled channel name instead of defaulting', () => {
    const result = parseChannels(lineOf('CHANNELS 3 Wposition Yposition Zposition'), 1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhUnknownChannelNameError);
      expect(result.error.message).toBe('unknown channel name: Wposition (line 5)');
    }
  });

  it('matches channel names case-sensitively', () => {
    const result = parseChannels(lineOf('CHANNELS 1 xrotation'), 1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe('BvhUnknownChannelNameError');
    }
  });

  it('fails with a numeric error on a non-integer count', () => {
    const result = parseChannels(lineOf('CHANNELS three Xrotation Yrotation Zrotation'), 1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BvhNumericParseError);
    }
  });

  it('fails with a grammar error when the count is missing', () => {
    const result = parseChannels(lineOf('CHANNELS'), 1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe('BvhGrammarError');
    }
  });
});
