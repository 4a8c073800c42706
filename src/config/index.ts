import { z } from 'zod';
import type { LevelWithSilent } from 'pino';
import { MAX_DECK_COUNT } from '../game/config.js';

export type AppConfig = {
  deckCount: number;
  hapticsEnabled: boolean;
  dbPath: string;
  logDir: string;
  logLevel: LevelWithSilent;
};

export type ConfigIssue = { key: string; value: string; message: string };

export const DEFAULT_CONFIG: AppConfig = {
  deckCount: 1,
  hapticsEnabled: true,
  dbPath: './data/pick21.db',
  logDir: './logs',
  logLevel: 'info',
};

const deckCountSchema = z.coerce.number().int().min(1).max(MAX_DECK_COUNT);
const flagSchema = z
  .enum(['true', 'false', '1', '0', 'on', 'off'])
  .transform((v) => v === 'true' || v === '1' || v === 'on');
const pathSchema = z.string().min(1);
const levelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

type Env = Record<string, string | undefined>;

function read<T>(env: Env, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T, issues: ConfigIssue[]): T {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  issues.push({ key, value: raw, message: parsed.error.issues[0]?.message ?? 'invalid value' });
  return fallback;
}

/**
 * Reads settings from the environment. A bad value falls back to its default
 * and is reported in `issues` rather than failing startup.
 */
export function loadConfig(env: Env = process.env): { config: AppConfig; issues: ConfigIssue[] } {
  const issues: ConfigIssue[] = [];
  const config: AppConfig = {
    deckCount: read(env, 'PICK21_DECKS', deckCountSchema, DEFAULT_CONFIG.deckCount, issues),
    hapticsEnabled: read(env, 'PICK21_HAPTICS', flagSchema, DEFAULT_CONFIG.hapticsEnabled, issues),
    dbPath: read(env, 'PICK21_DB_PATH', pathSchema, DEFAULT_CONFIG.dbPath, issues),
    logDir: read(env, 'PICK21_LOG_DIR', pathSchema, DEFAULT_CONFIG.logDir, issues),
    logLevel: read(env, 'LOG_LEVEL', levelSchema, DEFAULT_CONFIG.logLevel, issues),
  };
  return { config, issues };
}
