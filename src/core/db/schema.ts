/**
 * SQLite schema for the history store.
 *
 * `users` holds one stats row per participant; `messages` is an append-only log
 * looked up by (channel_id, ts) for transcripts and (user_id, ts) for per-user history.
 */
export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id        TEXT PRIMARY KEY,
    username       TEXT,
    discriminator  TEXT,
    is_bot         INTEGER NOT NULL DEFAULT 0,
    first_seen_at  INTEGER NOT NULL,
    last_seen_at   INTEGER NOT NULL,
    message_count  INTEGER NOT NULL DEFAULT 0,
    mention_count  INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS messages (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    ts          INTEGER NOT NULL,
    user_id     TEXT REFERENCES users(user_id),
    username    TEXT,
    guild_id    TEXT,
    channel_id  TEXT,
    message_id  TEXT,
    is_bot      INTEGER NOT NULL DEFAULT 0,
    content     TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_messages_channel_ts ON messages(channel_id, ts);
  CREATE INDEX IF NOT EXISTS idx_messages_user_ts ON messages(user_id, ts);
`;
