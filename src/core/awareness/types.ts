/** Participant stats row, keyed by Discord user id. */
export interface Participant {
    userId: string;
    username: string;
    discriminator: string | null;
    isBot: boolean;
    firstSeenAt: number;
    lastSeenAt: number;
    messageCount: number;
    mentionCount: number;
}

export interface RecordParticipantParams {
    userId: string;
    username: string;
    discriminator?: string | null;
    isBot: boolean;
    nowTs: number;
    incrementMessage: boolean;
    incrementMention: boolean;
}

/** Immutable message log entry. Timestamps are unix seconds. */
export interface MessageRecord {
    ts: number;
    userId: string | null;
    username: string;
    guildId: string | null;
    channelId: string | null;
    messageId: string | null;
    isBot: boolean;
    content: string;
}

export type InteractionCounterMode = 'monotonic' | 'buffer-length';
