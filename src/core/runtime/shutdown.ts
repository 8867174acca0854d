import type { Client } from 'discord.js';
import type { Server } from 'node:http';
import { logger } from '../../shared/logging/logger';
import { HistoryStore } from '../awareness/historyStore';
import { stopHealthServer } from '../../server/healthServer';

type ShutdownSignal = NodeJS.Signals | 'UNHANDLED_REJECTION' | 'UNCAUGHT_EXCEPTION';

interface RegisterShutdownHooksParams {
  client: Client;
  store: HistoryStore;
  healthServer: Server;
}

let shutdownInFlight: Promise<void> | null = null;

async function runShutdown(signal: ShutdownSignal, params: RegisterShutdownHooksParams): Promise<void> {
  if (shutdownInFlight) {
    return shutdownInFlight;
  }

  shutdownInFlight = (async () => {
    logger.info({ signal }, 'Shutdown initiated');

    try {
      await params.client.destroy();
    } catch (error) {
      logger.warn({ error }, 'Discord client destroy failed during shutdown');
    }

    try {
      await stopHealthServer(params.healthServer);
    } catch (error) {
      logger.warn({ error }, 'Health server close failed during shutdown');
    }

    try {
      params.store.close();
    } catch (error) {
      logger.warn({ error }, 'History store close failed during shutdown');
    }

    logger.info({ signal }, 'Shutdown complete');
  })();

  return shutdownInFlight;
}

export function registerShutdownHooks(params: RegisterShutdownHooksParams): void {
  const handleSignal = (signal: NodeJS.Signals) => {
    void runShutdown(signal, params)
      .catch((error) => {
        logger.error({ error, signal }, 'Fatal shutdown failure');
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.once('SIGINT', () => handleSignal('SIGINT'));
  process.once('SIGTERM', () => handleSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ error: reason }, 'Unhandled promise rejection');
    void runShutdown('UNHANDLED_REJECTION', params)
      .catch((error) => {
        logger.error({ error }, 'Fatal shutdown failure after unhandled rejection');
      })
      .finally(() => {
        process.exit(1);
      });
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught exception');
    void runShutdown('UNCAUGHT_EXCEPTION', params)
      .catch((shutdownError) => {
        logger.error({ error: shutdownError }, 'Fatal shutdown failure after uncaught exception');
      })
      .finally(() => {
        process.exit(1);
      });
  });
}

/** Test hook: forget a previous shutdown so the sequence can run again. */
export function resetShutdownState(): void {
  shutdownInFlight = null;
}
