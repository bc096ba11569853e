import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const Score = z.coerce.number().min(0).max(100);

export function defaultMusicDirectory(): string {
  return join(homedir(), 'Music');
}

export const EnvSchema = z
  .object({
    AUDIO_PLAYER_DIR: z.preprocess(
      emptyToUndefined,
      z.string().default(defaultMusicDirectory()),
    ),

    MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
    HOST: z.string().default('127.0.0.1'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    MCP_TITLE: z.string().default('Local Audio Player'),
    MCP_INSTRUCTIONS: z.preprocess(emptyToUndefined, z.string().optional()),
    MCP_VERSION: z.string().default('0.1.0'),
    MCP_PROTOCOL_VERSION: z.string().default('2025-06-18'),

    MPV_PATH: z.string().default('mpv'),
    MPV_IPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(3000),

    DEFAULT_VOLUME: z.coerce.number().int().min(0).max(10).default(3),
    SEARCH_MIN_SCORE: Score.default(30),
    AUTOPLAY_MIN_SCORE: Score.default(60),
    // Score at or above which artist matches count as equally good for random picks
    ARTIST_TIE_BAND: Score.default(90),
    SCAN_MAX_DEPTH: z.coerce.number().int().min(1).max(256).default(32),

    LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .passthrough();

export type Config = z.infer<typeof EnvSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = EnvSchema.parse(env);
  return Object.freeze({ ...parsed });
}

export const config = loadConfig();
