import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Logger } from 'pino';
import { getKV, setKV } from '../db/kv.js';
import { normalizeError } from '../util/errors.js';
import { HIGH_SCORE_CAPACITY } from '../game/config.js';
import { createScoreTable, type ScoreTable } from './table.js';

export const HIGH_SCORES_KEY = 'pick21.highscores';

/** Persistence for the high-score table. Implementations must not throw. */
export interface HighScoreStore {
  /** The saved table, or an empty one when nothing usable is stored. */
  load(): ScoreTable;
  save(table: ScoreTable): void;
}

const payloadSchema = z.object({
  entries: z.array(
    z.object({
      id: z.string().min(1),
      score: z.number().int(),
      date: z.number().finite(),
    }),
  ),
  maxEntries: z.number().int().positive(),
});

export function encodeScoreTable(table: ScoreTable): string {
  return JSON.stringify({ entries: table.entries, maxEntries: table.maxEntries });
}

/** Throws on malformed JSON or a payload of the wrong shape. */
export function decodeScoreTable(raw: string): ScoreTable {
  const payload = payloadSchema.parse(JSON.parse(raw));
  return createScoreTable(payload.entries, HIGH_SCORE_CAPACITY);
}

abstract class EncodedStore implements HighScoreStore {
  constructor(protected readonly log: Logger) {}

  protected abstract read(): string | null;
  protected abstract write(raw: string): void;

  load(): ScoreTable {
    try {
      const raw = this.read();
      return raw === null ? createScoreTable() : decodeScoreTable(raw);
    } catch (err) {
      this.log.warn({ msg: 'highscores_load_failed', error: normalizeError(err) });
      return createScoreTable();
    }
  }

  save(table: ScoreTable): void {
    try {
      this.write(encodeScoreTable(table));
    } catch (err) {
      this.log.warn({ msg: 'highscores_save_failed', error: normalizeError(err) });
    }
  }
}

export class SqliteHighScoreStore extends EncodedStore {
  constructor(
    private readonly db: Database.Database,
    log: Logger,
    private readonly key = HIGH_SCORES_KEY,
  ) {
    super(log);
  }

  protected read(): string | null {
    return getKV(this.db, this.key);
  }

  protected write(raw: string): void {
    setKV(this.db, this.key, raw);
  }
}

/** Keeps the encoded table in a string; used for ephemeral sessions and tests. */
export class MemoryHighScoreStore extends EncodedStore {
  constructor(
    log: Logger,
    private raw: string | null = null,
  ) {
    super(log);
  }

  get contents(): string | null {
    return this.raw;
  }

  protected read(): string | null {
    return this.raw;
  }

  protected write(raw: string): void {
    this.raw = raw;
  }
}
