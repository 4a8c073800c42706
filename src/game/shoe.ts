import { RANKS, SUITS, makeCard, type Card } from '../cards/Card.js';
import { cryptoRNG, type RNG } from '../util/rng.js';

/** Produces the full draw pile for a shoe of `deckCount` decks, top card last. */
export type ShoeSource = (deckCount: number) => Card[];

export function buildShoe(deckCount: number): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < deckCount; d++) {
    for (const s of SUITS) {
      for (const r of RANKS) {
        cards.push(makeCard(r, s));
      }
    }
  }
  return cards;
}

// Fisher-Yates
export function shuffle<T>(items: readonly T[], rng: RNG = cryptoRNG): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = rng(i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export function shuffledSource(rng: RNG = cryptoRNG): ShoeSource {
  return (deckCount) => shuffle(buildShoe(deckCount), rng);
}

export class Shoe {
  readonly deckCount: number;
  private cards: Card[];

  constructor(
    deckCount: number,
    private readonly source: ShoeSource = shuffledSource(),
    private readonly onRebuild?: (deckCount: number) => void,
  ) {
    this.deckCount = Math.max(1, Math.floor(deckCount));
    this.cards = source(this.deckCount);
  }

  get remaining(): number {
    return this.cards.length;
  }

  /** Takes the top card. An empty shoe is rebuilt from the same source first. */
  draw(): Card {
    if (this.cards.length === 0) {
      this.cards = this.source(this.deckCount);
      this.onRebuild?.(this.deckCount);
    }
    const card = this.cards.pop();
    if (!card) throw new Error(`Shoe source returned no cards for ${this.deckCount} deck(s)`);
    return card;
  }
}
