import { client } from '../bot/client';
import { registerMessageCreateHandler } from '../bot/handlers/messageCreate';
import { registerReadyHandler } from '../bot/handlers/ready';
import { loadPersonality } from '../core/agentRuntime/personality';
import { PromptComposer } from '../core/agentRuntime/promptComposer';
import { SqliteHistoryStore } from '../core/awareness/historyStore';
import { RollingMemory } from '../core/awareness/rollingMemory';
import { openDatabase } from '../core/db/sqlite-client';
import { getLLMClient } from '../core/llm';
import { registerShutdownHooks } from '../core/runtime/shutdown';
import { startHealthServer } from '../server/healthServer';
import { config } from '../shared/config/env';
import { AppError } from '../shared/errors/app-error';
import { logger } from '../shared/logging/logger';

export async function bootstrapApp(): Promise<void> {
  try {
    const healthServer = await startHealthServer(config.PORT);

    let store: SqliteHistoryStore;
    try {
      store = new SqliteHistoryStore(openDatabase(config.DB_PATH));
    } catch (error) {
      throw new AppError('STORAGE_FAILED', `Could not open history database at ${config.DB_PATH}`, error);
    }

    const memory = new RollingMemory({
      capacity: config.MEMORY_CAPACITY,
      counterMode: config.INTERACTION_COUNTER_MODE,
    });
    const personality = loadPersonality({
      personalityFile: config.PERSONALITY_FILE,
      fallbackText: config.BOT_PERSONALITY,
    });

    registerMessageCreateHandler({
      store,
      memory,
      composer: new PromptComposer(personality),
      llm: getLLMClient(),
      contextLimit: config.CONTEXT_HISTORY_LIMIT,
    });
    registerReadyHandler(client);
    registerShutdownHooks({ client, store, healthServer });

    logger.info(
      { model: config.OPENAI_MODEL, dbPath: config.DB_PATH, counterMode: memory.counterMode },
      'Starting Discord bot...',
    );

    try {
      await client.login(config.DISCORD_BOT_TOKEN);
    } catch (error) {
      throw new AppError('DISCORD_LOGIN_FAILED', 'Discord login failed', error);
    }
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new AppError('BOOTSTRAP_FAILED', 'Application bootstrap failed', error);
  }
}
