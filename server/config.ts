/**
 * Server configuration from environment variables.
 *
 * Parsed once at startup; an invalid value aborts startup with the zod
 * error listing every offending variable.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

export const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Simulation
  TICK_RATE: z.coerce.number().int().min(1).max(120).default(20),
  BROADCAST_RATE: z.coerce.number().int().min(1).max(60).default(10),
  GAME_MODE: z.string().min(1).default('standard'),
  MAP_ID: z.string().min(1).default('crossroads'),
  STRICT_INVARIANTS: booleanFlag.optional(),

  // Capacity & abuse limits
  MAX_CONCURRENT_GAMES: z.coerce.number().int().min(1).default(50),
  COMMAND_RATE_LIMIT: z.coerce.number().int().min(1).default(30),
  COMMAND_RATE_WINDOW_MS: z.coerce.number().int().min(100).default(1000),
  INTENT_RATE_LIMIT: z.coerce.number().int().min(1).default(5),

  // AI translator
  TRANSLATOR_URL: z.string().url().optional(),
  TRANSLATOR_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),

  ALLOWED_ORIGIN: z.string().default('*'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface ServerConfig {
  port: number;
  env: EnvConfig['NODE_ENV'];
  logLevel: string;
  tickRate: number;
  /** Snapshots go out every this many ticks */
  broadcastEvery: number;
  gameMode: string;
  mapId: string;
  strictInvariants: boolean;
  maxConcurrentGames: number;
  commandRateLimit: number;
  commandRateWindowMs: number;
  intentRateLimit: number;
  translatorUrl: string | null;
  translatorTimeoutMs: number;
  allowedOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  const defaultLevel = parsed.NODE_ENV === 'production' ? 'info' : parsed.NODE_ENV === 'test' ? 'silent' : 'debug';

  return {
    port: parsed.PORT,
    env: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL ?? defaultLevel,
    tickRate: parsed.TICK_RATE,
    broadcastEvery: Math.max(1, Math.round(parsed.TICK_RATE / parsed.BROADCAST_RATE)),
    gameMode: parsed.GAME_MODE,
    mapId: parsed.MAP_ID,
    strictInvariants: parsed.STRICT_INVARIANTS ?? parsed.NODE_ENV !== 'production',
    maxConcurrentGames: parsed.MAX_CONCURRENT_GAMES,
    commandRateLimit: parsed.COMMAND_RATE_LIMIT,
    commandRateWindowMs: parsed.COMMAND_RATE_WINDOW_MS,
    intentRateLimit: parsed.INTENT_RATE_LIMIT,
    translatorUrl: parsed.TRANSLATOR_URL ?? null,
    translatorTimeoutMs: parsed.TRANSLATOR_TIMEOUT_MS,
    allowedOrigin: parsed.ALLOWED_ORIGIN,
  };
}
