import { Events, Message } from 'discord.js';
import { client } from '../client';
import { logger } from '../../shared/logging/logger';
import { ChatRuntimeDeps, generateChatReply } from '../../core/chat-engine';
import { ingestEvent } from '../../core/ingest/ingestEvent';
import { splitMessage } from '../../core/utils/message-splitter';

const registrationKey = Symbol.for('persona-relay.handlers.messageCreate.registered');

type GlobalScope = typeof globalThis & {
  [registrationKey]?: boolean;
};

/**
 * Record every message, and reply when the bot is mentioned.
 *
 * Only the bot's own messages are ignored; other bots are recorded like anyone else.
 */
export async function handleMessageCreate(message: Message, deps: ChatRuntimeDeps): Promise<void> {
  const botUser = client.user;
  if (!botUser) return;
  if (message.author.id === botUser.id) return;

  const log = logger.child({ msgId: message.id, channelId: message.channelId });

  try {
    const isMentioned = message.mentions.has(botUser);
    const content = message.content ?? '';

    const interactionCount = await ingestEvent(
      {
        type: 'message',
        guildId: message.guildId,
        channelId: message.channelId,
        messageId: message.id,
        authorId: message.author.id,
        authorName: message.author.username,
        authorDiscriminator: message.author.discriminator ?? null,
        authorIsBot: message.author.bot,
        content,
        timestamp: message.createdAt,
        mentionsBot: isMentioned,
      },
      deps,
    );

    if (!isMentioned) return;

    const channel = message.channel;
    if (!channel.isSendable()) {
      log.warn('Mentioned in a channel the bot cannot send to');
      return;
    }

    log.info({ interactionCount, textLength: content.length }, 'Mention received');

    await channel.sendTyping().catch((error: unknown) => {
      log.debug({ error }, 'Typing indicator failed');
    });

    const sent = await generateChatReply(
      {
        channelId: message.channelId,
        guildId: message.guildId,
        authorName: message.author.username,
        rawContent: content,
        interactionCount,
        bot: { id: botUser.id, username: botUser.username, discriminator: botUser.discriminator },
        send: async (text) => {
          for (const chunk of splitMessage(text)) {
            await channel.send(chunk);
          }
        },
      },
      deps,
    );

    log.info({ sent }, sent ? 'Response sent' : 'Response failed');
  } catch (error) {
    log.error({ error }, 'MessageCreate handler failed');
  }
}

export function registerMessageCreateHandler(deps: ChatRuntimeDeps): void {
  const g = globalThis as GlobalScope;
  if (g[registrationKey]) {
    logger.warn('MessageCreate handler ALREADY registered (Skip)');
    return;
  }
  g[registrationKey] = true;

  client.on(Events.MessageCreate, (msg) => {
    void handleMessageCreate(msg, deps).catch((error) => {
      logger.error({ error, msgId: msg.id }, 'MessageCreate handler rejected');
    });
  });
  logger.info(
    { count: client.listenerCount(Events.MessageCreate) },
    'MessageCreate handler registered',
  );
}
