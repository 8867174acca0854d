import { Client, GatewayIntentBits } from 'discord.js';

/**
 * Provide the singleton Discord client used by the bot.
 *
 * Invariants:
 * - Intents cover guild and direct messages plus message content, which mention
 *   detection and transcript logging need.
 */
export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.DirectMessages,
    GatewayIntentBits.MessageContent,
  ],
});
