import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

export const DEFAULT_PERSONALITY =
  "I am Captain Whiskers, a grey tabby who spent eleven years as the ship's cat on a North Sea " +
  'trawler before retiring to a harbour bakery. I am proud, a little vain about my torn left ear, ' +
  'and I judge everyone by whether they have brought fish.';

const httpOrHttpsUrlSchema = z.string().trim().url().refine((value) => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}, 'Must be an HTTP(S) URL.');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  // Empty string disables the file target.
  LOG_FILE: z.string().trim().default('discord_bot.log'),

  // Credentials (env first, JSON files in CREDENTIALS_DIR second)
  DISCORD_BOT_TOKEN: z
    .string({ required_error: 'DISCORD_BOT_TOKEN is required (env or DISCORD_BOT_TOKEN.json)' })
    .trim()
    .min(1, 'DISCORD_BOT_TOKEN is required (env or DISCORD_BOT_TOKEN.json)'),
  OPENAI_API_KEY: z
    .string({ required_error: 'OPENAI_API_KEY is required (env or OPENAI_API_KEY.json)' })
    .trim()
    .min(1, 'OPENAI_API_KEY is required (env or OPENAI_API_KEY.json)'),

  // Completion API
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: httpOrHttpsUrlSchema.default('https://api.openai.com/v1'),
  CHAT_MAX_OUTPUT_TOKENS: positiveInt(500),
  LLM_TIMEOUT_MS: positiveInt(60_000),

  // Persona
  BOT_PERSONALITY: z.string().min(1).default(DEFAULT_PERSONALITY),
  PERSONALITY_FILE: z.string().trim().default('discord_bot_personality.txt'),

  // Memory & storage
  DB_PATH: z.string().trim().min(1).default('bot.db'),
  MEMORY_CAPACITY: positiveInt(100),
  CONTEXT_HISTORY_LIMIT: positiveInt(100),
  INTERACTION_COUNTER_MODE: z.enum(['monotonic', 'buffer-length']).default('monotonic'),

  // Health check
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
});

export type AppConfig = z.infer<typeof envSchema>;

export type LoadConfigResult =
  | { success: true; config: AppConfig }
  | { success: false; issues: string[] };

/** Returns the file contents, or null when the file does not exist. */
export type ReadTextFile = (filePath: string) => string | null;

export const readTextFileIfExists: ReadTextFile = (filePath) => {
  if (!fs.existsSync(filePath)) return null;
  return fs.readFileSync(filePath, 'utf-8');
};

interface CredentialFallback {
  envKey: 'OPENAI_API_KEY' | 'DISCORD_BOT_TOKEN';
  fileName: string;
  schema: z.ZodType<string, z.ZodTypeDef, unknown>;
}

const credentialFallbacks: CredentialFallback[] = [
  {
    envKey: 'OPENAI_API_KEY',
    fileName: 'OPENAI_API_KEY.json',
    schema: z.object({ key: z.string().trim().min(1) }).transform((file) => file.key),
  },
  {
    envKey: 'DISCORD_BOT_TOKEN',
    fileName: 'DISCORD_BOT_TOKEN.json',
    schema: z.object({ token: z.string().trim().min(1) }).transform((file) => file.token),
  },
];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

/**
 * Resolve and validate runtime configuration.
 *
 * Credentials missing from the environment are read from `OPENAI_API_KEY.json`
 * (`{ "key": ... }`) and `DISCORD_BOT_TOKEN.json` (`{ "token": ... }`) inside
 * `CREDENTIALS_DIR` (defaults to the working directory).
 *
 * Never throws; problems are returned as readable issue strings.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  opts: { readTextFile?: ReadTextFile; cwd?: string } = {},
): LoadConfigResult {
  const readTextFile = opts.readTextFile ?? readTextFileIfExists;
  const credentialsDir = env.CREDENTIALS_DIR?.trim() || opts.cwd || process.cwd();
  const resolved: NodeJS.ProcessEnv = { ...env };
  const issues: string[] = [];

  for (const fallback of credentialFallbacks) {
    if (resolved[fallback.envKey]?.trim()) continue;

    const filePath = path.join(credentialsDir, fallback.fileName);
    try {
      const raw = readTextFile(filePath);
      if (raw === null) continue;
      const parsed = fallback.schema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        issues.push(`${fallback.fileName}: ${formatIssues(parsed.error).join('; ')}`);
        continue;
      }
      resolved[fallback.envKey] = parsed.data;
    } catch (error) {
      issues.push(`${fallback.fileName}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const parsed = envSchema.safeParse(resolved);
  if (!parsed.success) {
    return { success: false, issues: [...issues, ...formatIssues(parsed.error)] };
  }

  return { success: true, config: parsed.data };
}

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'info',
  DISCORD_BOT_TOKEN: 'test-discord-token',
  OPENAI_API_KEY: 'test-openai-key',
  DB_PATH: ':memory:',
  PORT: '0',
};

const _env = loadConfig(isTestRuntime ? { ...testDefaults, ...process.env } : process.env);

if (!_env.success) {
  console.error('❌ Invalid environment configuration:');
  for (const issue of _env.issues) {
    console.error(`  - ${issue}`);
  }
  process.exit(1);
}

export const config: AppConfig = _env.config;
