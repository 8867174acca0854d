import { Client, Events } from 'discord.js';
import { logger } from '../../shared/logging/logger';

const readyKey = Symbol.for('persona-relay.handlers.ready');

type GlobalScope = typeof globalThis & {
  [readyKey]?: boolean;
};

export function registerReadyHandler(botClient: Client): void {
  const g = globalThis as GlobalScope;
  if (g[readyKey]) return;
  g[readyKey] = true;

  botClient.once(Events.ClientReady, (readyClient) => {
    logger.info(
      { userId: readyClient.user.id, guilds: readyClient.guilds.cache.size },
      `${readyClient.user.username} has connected to Discord!`,
    );
  });

  botClient.on(Events.Error, (error) => {
    logger.error({ error }, 'Discord client error');
  });
}
