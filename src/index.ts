import { bootstrapApp } from './app/bootstrap';
import { logger } from './shared/logging/logger';

/**
 * Entry point. Importing the config module validates the environment first and exits
 * the process when credentials are missing.
 */
async function main() {
  logger.info('Starting application...');
  await bootstrapApp();
}

main().catch((error) => {
  logger.fatal({ error }, 'Fatal error starting bot');
  process.exit(1);
});
