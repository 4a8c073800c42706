import { baseValue, type Card } from '../cards/Card.js';
import { CHARLIE_CARD_COUNT, TARGET_TOTAL } from './config.js';
import type { ColumnView } from './types.js';

function baseSum(cards: readonly Card[]): number {
  let sum = 0;
  for (const c of cards) sum += baseValue(c.rank);
  return sum;
}

/** Blackjack total: aces start at 1 and are raised to 11 while that stays at or under 21. */
export function handTotal(cards: readonly Card[]): number {
  let sum = baseSum(cards);
  let aces = cards.filter((c) => c.rank === 'A').length;
  while (aces > 0 && sum + 10 <= TARGET_TOTAL) {
    sum += 10;
    aces--;
  }
  return sum;
}

/** An ace is currently counted as 11. A lone ace is never soft. */
export function isSoftHand(cards: readonly Card[]): boolean {
  if (cards.length < 2) return false;
  const hasAce = cards.some((c) => c.rank === 'A');
  return hasAce && baseSum(cards) + 10 <= TARGET_TOTAL;
}

export class Column {
  private readonly _cards: Card[] = [];
  private _locked = false;
  private _charlie = false;

  get cards(): readonly Card[] {
    return this._cards;
  }

  get isLocked(): boolean {
    return this._locked;
  }

  get isFiveCardCharlie(): boolean {
    return this._charlie;
  }

  get total(): number {
    return handTotal(this._cards);
  }

  get isSoft(): boolean {
    return isSoftHand(this._cards);
  }

  get busted(): boolean {
    return this.total > TARGET_TOTAL;
  }

  /** 21 for a five-card charlie, otherwise the total capped at 21. */
  get effectiveTotal(): number {
    if (this._charlie) return TARGET_TOTAL;
    return Math.min(this.total, TARGET_TOTAL);
  }

  /** Ignored once the column is locked; returns whether the card was taken. */
  add(card: Card): boolean {
    if (this._locked) return false;
    this._cards.push(card);
    this.updateLock();
    return true;
  }

  reset(): void {
    this._cards.length = 0;
    this._locked = false;
    this._charlie = false;
  }

  view(): ColumnView {
    return {
      cards: this._cards.slice(),
      total: this.total,
      isSoft: this.isSoft,
      busted: this.busted,
      effectiveTotal: this.effectiveTotal,
      isLocked: this._locked,
      isFiveCardCharlie: this._charlie,
    };
  }

  private updateLock(): void {
    const total = this.total;
    if (this._cards.length >= CHARLIE_CARD_COUNT && total <= TARGET_TOTAL) {
      this._charlie = true;
      this._locked = true;
      return;
    }
    // Only a hard 21 locks; a soft 21 can still take cards.
    if (total === TARGET_TOTAL && !this.isSoft) {
      this._locked = true;
    } else if (this._locked && total !== TARGET_TOTAL && !this._charlie) {
      // Unreachable while locked columns refuse cards; repairs the flag if that ever changes.
      this._locked = false;
    }
  }
}
