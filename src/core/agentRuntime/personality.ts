import path from 'node:path';
import { ReadTextFile, readTextFileIfExists } from '../../shared/config/env';
import { logger } from '../../shared/logging/logger';

/**
 * Resolve the persona text once at startup.
 *
 * A non-empty personality file wins; otherwise the configured text (which already
 * carries the built-in default) is used. A file that exists but cannot be read is
 * logged and skipped.
 */
export function loadPersonality(params: {
  personalityFile: string;
  fallbackText: string;
  readTextFile?: ReadTextFile;
}): string {
  const readTextFile = params.readTextFile ?? readTextFileIfExists;

  if (params.personalityFile) {
    const filePath = path.resolve(params.personalityFile);
    try {
      const text = readTextFile(filePath)?.trim();
      if (text) {
        logger.info({ filePath }, 'Bot personality loaded from file');
        return text;
      }
    } catch (error) {
      logger.warn({ error, filePath }, 'Failed to read personality file; using configured personality');
    }
  }

  logger.info('Using configured bot personality');
  return params.fallbackText;
}
