import { describe, expect, it } from 'vitest';
import { DISCORD_MESSAGE_LIMIT, splitMessage } from '../../../src/core/utils/message-splitter';

describe('splitMessage', () => {
  it('throws when maxLength is not a positive integer', () => {
    expect(() => splitMessage('hello', 0)).toThrow(RangeError);
    expect(() => splitMessage('hello', -2)).toThrow('maxLength must be a positive integer');
    expect(() => splitMessage('hello', 2.5)).toThrow(RangeError);
    expect(() => splitMessage('hello', Number.NaN)).toThrow(RangeError);
  });

  it('returns short text as a single chunk', () => {
    expect(splitMessage('Meow.')).toEqual(['Meow.']);
  });

  it('prefers newline boundaries when splitting', () => {
    expect(splitMessage('first line\nsecond line', 12)).toEqual(['first line', 'second line']);
  });

  it('falls back to the last space before the limit', () => {
    expect(splitMessage('alpha beta gamma', 11)).toEqual(['alpha beta', 'gamma']);
  });

  it('hard-cuts text without any boundary', () => {
    const parts = splitMessage('x'.repeat(DISCORD_MESSAGE_LIMIT + 500));
    expect(parts.map((part) => part.length)).toEqual([DISCORD_MESSAGE_LIMIT, 500]);
  });

  it('drops whitespace-only chunks', () => {
    expect(splitMessage('   ')).toEqual([]);
  });
});
