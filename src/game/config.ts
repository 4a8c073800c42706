export const COLUMN_COUNT = 5;
export const ROUNDS_PER_GAME = 3;

// Countdown units, not seconds: 2 units every 500ms nets 4 units per second.
export const TIMER_MAX = 280;
export const TICK_INTERVAL_MS = 500;
export const TICK_DECREMENT = 2;

export const TARGET_TOTAL = 21;
export const CHARLIE_CARD_COUNT = 5;
export const PERFECT_BOARD_TOTAL = TARGET_TOTAL * COLUMN_COUNT;

export const HIGH_SCORE_CAPACITY = 10;
export const MAX_DECK_COUNT = 8;

/** Board total -> score multiplier. Exact matches only. */
export const BONUS_MULTIPLIERS: ReadonlyMap<number, number> = new Map([
  [105, 1000],
  [104, 500],
  [103, 400],
  [102, 300],
  [101, 250],
  [100, 200],
  [99, 150],
  [98, 100],
  [97, 50],
]);
