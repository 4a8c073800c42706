import { BONUS_MULTIPLIERS } from './config.js';

export type ScoredColumn = { readonly effectiveTotal: number; readonly busted: boolean };

export function boardTotals(columns: readonly ScoredColumn[]): { sum: number; anyBusted: boolean } {
  let sum = 0;
  let anyBusted = false;
  for (const col of columns) {
    if (col.busted) anyBusted = true;
    sum += col.effectiveTotal;
  }
  return { sum, anyBusted };
}

export function multiplierFor(boardTotal: number): number | null {
  return BONUS_MULTIPLIERS.get(boardTotal) ?? null;
}

/**
 * Remaining countdown times the board multiplier. A busted board, or a total
 * outside the bonus table, scores 0.
 */
export function roundScore(columns: readonly ScoredColumn[], timerValue: number): { score: number; boardTotal: number } {
  const { sum, anyBusted } = boardTotals(columns);
  if (anyBusted) return { score: 0, boardTotal: sum };
  const mult = multiplierFor(sum);
  if (mult === null) return { score: 0, boardTotal: sum };
  return { score: Math.max(0, timerValue) * mult, boardTotal: sum };
}
