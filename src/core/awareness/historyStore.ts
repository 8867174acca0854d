import type Database from 'better-sqlite3';
import { logger } from '../../shared/logging/logger';
import { MessageRecord, Participant, RecordParticipantParams } from './types';

export const BOT_TRANSCRIPT_LABEL = 'Bot';
export const DEFAULT_TRANSCRIPT_LIMIT = 100;

/**
 * Durable participant stats and message log.
 *
 * Writes never reject: failures are logged and dropped so message handling keeps going.
 * Reads reject on failure; callers decide how to fall back.
 */
export interface HistoryStore {
    recordParticipant(params: RecordParticipantParams): Promise<void>;
    appendMessage(record: MessageRecord): Promise<void>;
    recentTranscript(channelId: string, limit?: number): Promise<string[]>;
    getParticipant(userId: string): Promise<Participant | null>;
    close(): void;
}

interface UpsertUserParams {
    userId: string;
    username: string;
    discriminator: string | null;
    isBot: number;
    nowTs: number;
    messageDelta: number;
    mentionDelta: number;
}

interface InsertMessageParams {
    ts: number;
    userId: string | null;
    username: string;
    guildId: string | null;
    channelId: string | null;
    messageId: string | null;
    isBot: number;
    content: string;
}

interface TranscriptRow {
    username: string | null;
    content: string;
    is_bot: number;
}

interface UserRow {
    user_id: string;
    username: string | null;
    discriminator: string | null;
    is_bot: number;
    first_seen_at: number;
    last_seen_at: number;
    message_count: number;
    mention_count: number;
}

const UPSERT_USER_SQL = `
    INSERT INTO users (user_id, username, discriminator, is_bot, first_seen_at, last_seen_at, message_count, mention_count)
    VALUES (@userId, @username, @discriminator, @isBot, @nowTs, @nowTs, @messageDelta, @mentionDelta)
    ON CONFLICT(user_id) DO UPDATE SET
        username = excluded.username,
        discriminator = excluded.discriminator,
        is_bot = excluded.is_bot,
        last_seen_at = excluded.last_seen_at,
        message_count = users.message_count + @messageDelta,
        mention_count = users.mention_count + @mentionDelta
`;

const INSERT_MESSAGE_SQL = `
    INSERT INTO messages (ts, user_id, username, guild_id, channel_id, message_id, is_bot, content)
    VALUES (@ts, @userId, @username, @guildId, @channelId, @messageId, @isBot, @content)
`;

const RECENT_TRANSCRIPT_SQL = `
    SELECT username, content, is_bot
    FROM messages
    WHERE channel_id = ?
    ORDER BY ts DESC, id DESC
    LIMIT ?
`;

export function renderTranscriptLine(row: { username: string | null; content: string; isBot: boolean }): string {
    const speaker = row.isBot ? BOT_TRANSCRIPT_LABEL : row.username ?? '';
    return `${speaker}: ${row.content}`;
}

export class SqliteHistoryStore implements HistoryStore {
    private readonly upsertUser: Database.Statement<[UpsertUserParams]>;
    private readonly insertMessage: Database.Statement<[InsertMessageParams]>;
    private readonly selectRecent: Database.Statement<[string, number], TranscriptRow>;
    private readonly selectUser: Database.Statement<[string], UserRow>;

    constructor(private readonly db: Database.Database) {
        this.upsertUser = db.prepare<UpsertUserParams>(UPSERT_USER_SQL);
        this.insertMessage = db.prepare<InsertMessageParams>(INSERT_MESSAGE_SQL);
        this.selectRecent = db.prepare<[string, number], TranscriptRow>(RECENT_TRANSCRIPT_SQL);
        this.selectUser = db.prepare<[string], UserRow>('SELECT * FROM users WHERE user_id = ?');
    }

    async recordParticipant(params: RecordParticipantParams): Promise<void> {
        try {
            this.upsertUser.run({
                userId: params.userId,
                username: params.username,
                discriminator: params.discriminator ?? null,
                isBot: params.isBot ? 1 : 0,
                nowTs: params.nowTs,
                messageDelta: params.incrementMessage ? 1 : 0,
                mentionDelta: params.incrementMention ? 1 : 0,
            });
        } catch (error) {
            logger.warn({ error, userId: params.userId }, 'Participant upsert failed (non-fatal)');
        }
    }

    async appendMessage(record: MessageRecord): Promise<void> {
        try {
            this.insertMessage.run({
                ts: record.ts,
                userId: record.userId,
                username: record.username,
                guildId: record.guildId,
                channelId: record.channelId,
                messageId: record.messageId,
                isBot: record.isBot ? 1 : 0,
                content: record.content,
            });
        } catch (error) {
            logger.warn(
                { error, channelId: record.channelId, messageId: record.messageId },
                'Message append failed (non-fatal)',
            );
        }
    }

    async recentTranscript(channelId: string, limit: number = DEFAULT_TRANSCRIPT_LIMIT): Promise<string[]> {
        const rows = this.selectRecent.all(channelId, limit);
        // Rows arrive newest first; transcripts read oldest first.
        return rows.reverse().map((row) =>
            renderTranscriptLine({ username: row.username, content: row.content, isBot: row.is_bot === 1 }),
        );
    }

    async getParticipant(userId: string): Promise<Participant | null> {
        const row = this.selectUser.get(userId);
        if (!row) return null;
        return {
            userId: row.user_id,
            username: row.username ?? '',
            discriminator: row.discriminator,
            isBot: row.is_bot === 1,
            firstSeenAt: row.first_seen_at,
            lastSeenAt: row.last_seen_at,
            messageCount: row.message_count,
            mentionCount: row.mention_count,
        };
    }

    close(): void {
        this.db.close();
    }
}
