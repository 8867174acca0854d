import { logger } from '../../shared/logging/logger';
import { HistoryStore } from '../awareness/historyStore';
import { formatMemoryLine, RollingMemory } from '../awareness/rollingMemory';
import { toUnixSeconds } from '../utils/clock';

/**
 * Inbound chat message captured from Discord.
 */
export interface MessageEvent {
    type: 'message';
    guildId: string | null;
    channelId: string;
    messageId: string;
    authorId: string;
    authorName: string;
    authorDiscriminator: string | null;
    authorIsBot: boolean;
    content: string;
    timestamp: Date;
    mentionsBot: boolean;
}

export interface IngestDeps {
    store: HistoryStore;
    memory: RollingMemory;
}

/**
 * Record an inbound message before any reply gating.
 *
 * Flow:
 * 1. Upsert the author's participant row (message count +1, mention count +1 when the bot was mentioned)
 * 2. Append the message to the durable log
 * 3. Append `author: content` to the rolling memory
 *
 * Must never throw: store failures are logged and the rolling memory is still updated.
 *
 * @returns The interaction count after this message was added to memory.
 */
export async function ingestEvent(event: MessageEvent, deps: IngestDeps): Promise<number> {
    const ts = toUnixSeconds(event.timestamp);

    try {
        await deps.store.recordParticipant({
            userId: event.authorId,
            username: event.authorName,
            discriminator: event.authorDiscriminator,
            isBot: event.authorIsBot,
            nowTs: ts,
            incrementMessage: true,
            incrementMention: event.mentionsBot,
        });
        await deps.store.appendMessage({
            ts,
            userId: event.authorId,
            username: event.authorName,
            guildId: event.guildId,
            channelId: event.channelId,
            messageId: event.messageId,
            isBot: false,
            content: event.content,
        });
    } catch (error) {
        logger.error(
            { error, channelId: event.channelId, messageId: event.messageId },
            'Failed to log incoming message (non-fatal)',
        );
    }

    const interactionCount = deps.memory.append(formatMemoryLine(event.authorName, event.content));
    logger.debug({ channelId: event.channelId, messageId: event.messageId, interactionCount }, 'Event ingested');
    return interactionCount;
}
