export const DISCORD_MESSAGE_LIMIT = 2000;

function findSplitIndex(text: string, limit: number): number {
  let splitIndex = text.lastIndexOf('\n', limit);
  if (splitIndex <= 0) splitIndex = text.lastIndexOf(' ', limit);
  if (splitIndex <= 0) splitIndex = limit;
  return splitIndex;
}

/**
 * Split text into chunks no longer than `maxLength`, cutting at the last newline, then the
 * last space, before the limit and hard-cutting only when neither exists.
 * Whitespace-only chunks are dropped.
 */
export function splitMessage(text: string, maxLength = DISCORD_MESSAGE_LIMIT): string[] {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError('maxLength must be a positive integer');
  }

  const parts: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    const splitIndex = findSplitIndex(remaining, maxLength);
    parts.push(remaining.slice(0, splitIndex));
    remaining = remaining.slice(splitIndex).trimStart();
  }
  parts.push(remaining);

  return parts.filter((part) => part.trim().length > 0);
}
