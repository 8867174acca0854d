import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { loadConfig, ReadTextFile } from '../../../src/shared/config/env';

const CREDENTIALS_DIR = path.join('/srv', 'creds');

function filesReader(files: Record<string, string>): ReadTextFile {
  return (filePath) => files[filePath] ?? null;
}

const noFiles: ReadTextFile = () => null;

describe('loadConfig', () => {
  it('applies defaults when only credentials are set', () => {
    const result = loadConfig(
      { DISCORD_BOT_TOKEN: 'test-discord-token', OPENAI_API_KEY: 'test-secret' },
      { readTextFile: noFiles },
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.config).toMatchObject({
      NODE_ENV: 'development',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_BASE_URL: 'https://api.openai.com/v1',
      CHAT_MAX_OUTPUT_TOKENS: 500,
      PERSONALITY_FILE: 'discord_bot_personality.txt',
      LOG_FILE: 'discord_bot.log',
      DB_PATH: 'bot.db',
      MEMORY_CAPACITY: 100,
      CONTEXT_HISTORY_LIMIT: 100,
      INTERACTION_COUNTER_MODE: 'monotonic',
      PORT: 8080,
    });
  });

  it('coerces numeric settings and accepts the buffer-length counter mode', () => {
    const result = loadConfig(
      {
        DISCORD_BOT_TOKEN: 'test-discord-token',
        OPENAI_API_KEY: 'test-secret',
        MEMORY_CAPACITY: '25',
        PORT: '3000',
        INTERACTION_COUNTER_MODE: 'buffer-length',
        NODE_ENV: 'production',
      },
      { readTextFile: noFiles },
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.config.MEMORY_CAPACITY).toBe(25);
    expect(result.config.PORT).toBe(3000);
    expect(result.config.INTERACTION_COUNTER_MODE).toBe('buffer-length');
    expect(result.config.NODE_ENV).toBe('production');
  });

  it('reports missing credentials', () => {
    const result = loadConfig({}, { readTextFile: noFiles, cwd: CREDENTIALS_DIR });

    expect(result).toEqual({
      success: false,
      issues: [
        'DISCORD_BOT_TOKEN: DISCORD_BOT_TOKEN is required (env or DISCORD_BOT_TOKEN.json)',
        'OPENAI_API_KEY: OPENAI_API_KEY is required (env or OPENAI_API_KEY.json)',
      ],
    });
  });

  it('reads credentials from JSON files in the credentials directory', () => {
    const result = loadConfig(
      { CREDENTIALS_DIR },
      {
        readTextFile: filesReader({
          [path.join(CREDENTIALS_DIR, 'OPENAI_API_KEY.json')]: '{"key":"test-secret"}',
          [path.join(CREDENTIALS_DIR, 'DISCORD_BOT_TOKEN.json')]: '{"token":"test-discord-token"}',
        }),
      },
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.config.OPENAI_API_KEY).toBe('test-secret');
    expect(result.config.DISCORD_BOT_TOKEN).toBe('test-discord-token');
  });

  it('prefers environment credentials over files', () => {
    const readTextFile = vi.fn<ReadTextFile>(() => '{"key":"file-secret","token":"file-token"}');

    const result = loadConfig(
      { DISCORD_BOT_TOKEN: 'test-discord-token', OPENAI_API_KEY: 'test-secret' },
      { readTextFile, cwd: CREDENTIALS_DIR },
    );

    expect(readTextFile).not.toHaveBeenCalled();
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.config.OPENAI_API_KEY).toBe('test-secret');
  });

  it('reports a credential file with the wrong shape', () => {
    const result = loadConfig(
      { DISCORD_BOT_TOKEN: 'test-discord-token' },
      {
        cwd: CREDENTIALS_DIR,
        readTextFile: filesReader({
          [path.join(CREDENTIALS_DIR, 'OPENAI_API_KEY.json')]: '{"key":""}',
        }),
      },
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([
      'OPENAI_API_KEY.json: key: String must contain at least 1 character(s)',
      'OPENAI_API_KEY: OPENAI_API_KEY is required (env or OPENAI_API_KEY.json)',
    ]);
  });

  it('reports a credential file that is not JSON', () => {
    const result = loadConfig(
      { DISCORD_BOT_TOKEN: 'test-discord-token' },
      {
        cwd: CREDENTIALS_DIR,
        readTextFile: filesReader({
          [path.join(CREDENTIALS_DIR, 'OPENAI_API_KEY.json')]: 'not json',
        }),
      },
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues[0]).toMatch(/^OPENAI_API_KEY\.json: /);
  });

  it('rejects a non-HTTP completion endpoint', () => {
    const result = loadConfig(
      {
        DISCORD_BOT_TOKEN: 'test-discord-token',
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'ftp://llm.example.test',
      },
      { readTextFile: noFiles },
    );

    expect(result).toEqual({ success: false, issues: ['OPENAI_BASE_URL: Must be an HTTP(S) URL.'] });
  });
});
