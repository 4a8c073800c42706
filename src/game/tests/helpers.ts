import { makeCard, type Rank, type Suit } from '../../cards/Card.js';
import type { ShoeSource } from '../shoe.js';

/** A shoe source that deals `ranks` in order, first rank first. */
export function stacked(ranks: Rank[], suit: Suit = 'S'): ShoeSource {
  return () => ranks.map((r) => makeCard(r, suit)).reverse();
}

export function cards(...ranks: Rank[]) {
  return ranks.map((r) => makeCard(r, 'S'));
}

export const HARD_21: Rank[] = ['K', '5', '6'];

/** Four hard 21s and a 16: board total 100. */
export const BOARD_100: Rank[] = [...HARD_21, ...HARD_21, ...HARD_21, ...HARD_21, 'K', '6'];

/** Column index for each card of BOARD_100, in dealing order. */
export const BOARD_100_TARGETS = [0, 0, 0, 1, 1, 1, 2, 2, 2, 3, 3, 3, 4, 4];
