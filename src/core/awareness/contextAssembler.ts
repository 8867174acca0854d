import { logger } from '../../shared/logging/logger';
import { DEFAULT_TRANSCRIPT_LIMIT, HistoryStore } from './historyStore';
import { RollingMemory } from './rollingMemory';

export interface ContextAssemblerDeps {
    store: HistoryStore;
    memory: RollingMemory;
    limit?: number;
}

/**
 * Build the transcript for a channel, oldest line first.
 *
 * The durable store wins whenever it returns lines for the channel. A store error or an
 * empty result (cold database) falls back to the tail of the rolling memory, which spans
 * every channel the process has seen.
 */
export async function buildContext(channelId: string, deps: ContextAssemblerDeps): Promise<string[]> {
    const limit = deps.limit ?? DEFAULT_TRANSCRIPT_LIMIT;

    let lines: string[] = [];
    try {
        lines = await deps.store.recentTranscript(channelId, limit);
    } catch (error) {
        logger.error({ error, channelId }, 'Failed to fetch context from history store');
    }

    if (lines.length > 0) return lines;

    logger.debug({ channelId }, 'History store empty; using rolling memory');
    return deps.memory.tail(limit);
}

export function renderContext(lines: string[]): string {
    return lines.join('\n');
}
