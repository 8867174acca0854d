function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove the bot's own mention markup (`<@id>` and the nickname form `<@!id>`) and trim.
 * Mentions of other users are left in place.
 */
export function stripBotMention(content: string, botUserId: string): string {
  const mention = new RegExp(`<@!?${escapeRegex(botUserId)}>`, 'g');
  return content.replace(mention, '').trim();
}
