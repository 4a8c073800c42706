import { nanoid } from 'nanoid';
import { HIGH_SCORE_CAPACITY } from '../game/config.js';

export interface HighScoreEntry {
  readonly id: string;
  readonly score: number;
  /** Epoch milliseconds. */
  readonly date: number;
}

export interface ScoreTable {
  readonly entries: readonly HighScoreEntry[];
  readonly maxEntries: number;
}

function rank(entries: readonly HighScoreEntry[], maxEntries: number): HighScoreEntry[] {
  // Array#sort is stable: entries keep their relative order on equal scores.
  return entries.slice().sort((a, b) => b.score - a.score).slice(0, maxEntries);
}

export function createScoreTable(entries: readonly HighScoreEntry[] = [], maxEntries = HIGH_SCORE_CAPACITY): ScoreTable {
  return { entries: rank(entries, maxEntries), maxEntries };
}

/**
 * Adds a score, re-ranks and truncates. On an exact tie the newer entry ranks
 * above the older one, so matching the current best counts as a new top score.
 */
export function insertScore(
  table: ScoreTable,
  score: number,
  date: number = Date.now(),
): { table: ScoreTable; entry: HighScoreEntry; isNewTop: boolean } {
  const entry: HighScoreEntry = { id: nanoid(), score, date };
  const entries = rank([entry, ...table.entries], table.maxEntries);
  return {
    table: { entries, maxEntries: table.maxEntries },
    entry,
    isNewTop: entries[0] === entry,
  };
}

export function clearScores(table: ScoreTable): ScoreTable {
  return { entries: [], maxEntries: table.maxEntries };
}

export function bestScore(table: ScoreTable): number {
  return table.entries[0]?.score ?? 0;
}
