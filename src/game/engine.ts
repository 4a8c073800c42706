import type { Logger } from 'pino';
import type { Card } from '../cards/Card.js';
import { getLogger } from '../log.js';
import { bestScore, clearScores, createScoreTable, insertScore, type ScoreTable } from '../scores/table.js';
import type { HighScoreStore } from '../scores/store.js';
import { fireAndForget, normalizeError } from '../util/errors.js';
import type { RNG } from '../util/rng.js';
import { Column } from './column.js';
import {
  COLUMN_COUNT,
  PERFECT_BOARD_TOTAL,
  ROUNDS_PER_GAME,
  TARGET_TOTAL,
  TICK_DECREMENT,
  TICK_INTERVAL_MS,
  TIMER_MAX,
} from './config.js';
import { boardTotals, roundScore } from './scoring.js';
import { Shoe, shuffledSource, type ShoeSource } from './shoe.js';
import { Countdown } from './timer.js';
import type {
  FeedbackHooks,
  GameEvent,
  GameHooks,
  GameListener,
  GamePhase,
  GameSnapshot,
  RoundEndReason,
  RoundResult,
} from './types.js';

export interface GameEngineOptions {
  store: HighScoreStore;
  deckCount?: number;
  hapticsEnabled?: boolean;
  /** Used by the default shuffled shoe; ignored when `shoeSource` is given. */
  rng?: RNG;
  shoeSource?: ShoeSource;
  hooks?: GameHooks;
  feedback?: FeedbackHooks;
  logger?: Logger;
  /** Clock for high-score timestamps, epoch ms. */
  now?: () => number;
  tickIntervalMs?: number;
}

function isValidDeckCount(n: number): boolean {
  return Number.isInteger(n) && n >= 1;
}

/**
 * Round and game state machine. Every mutator re-checks the phase and does
 * nothing when called out of turn; a countdown tick landing after the round
 * already ended is the common case.
 *
 * All work runs synchronously on the event loop, so a tick can never interleave
 * with a player action halfway through.
 */
export class GameEngine {
  private readonly columns: Column[] = Array.from({ length: COLUMN_COUNT }, () => new Column());
  private currentCard: Card | null = null;
  private round = 1;
  private totalScore = 0;
  private roundScores: number[] = new Array<number>(ROUNDS_PER_GAME).fill(0);
  private roundResults: RoundResult[] = [];
  private roundEndReason: RoundEndReason = 'none';
  private phase: GamePhase = 'preGame';
  private timerValue = TIMER_MAX;
  private passAvailable = true;
  private isNewHighScore = false;
  private highScores: ScoreTable;
  private deckCount: number;
  private hapticsEnabled: boolean;
  private shoe: Shoe | null = null;

  private readonly store: HighScoreStore;
  private readonly shoeSource: ShoeSource;
  private readonly hooks: GameHooks;
  private readonly feedback: FeedbackHooks;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly countdown: Countdown;
  private readonly listeners = new Set<GameListener>();

  constructor(opts: GameEngineOptions) {
    this.store = opts.store;
    this.deckCount = opts.deckCount !== undefined && isValidDeckCount(opts.deckCount) ? opts.deckCount : 1;
    this.hapticsEnabled = opts.hapticsEnabled ?? true;
    this.shoeSource = opts.shoeSource ?? shuffledSource(opts.rng);
    this.hooks = opts.hooks ?? {};
    this.feedback = opts.feedback ?? {};
    this.log = (opts.logger ?? getLogger()).child({ scope: 'engine' });
    this.now = opts.now ?? Date.now;
    this.countdown = new Countdown(opts.tickIntervalMs ?? TICK_INTERVAL_MS, () => this.tick());
    this.highScores = this.loadHighScores();
  }

  // ---- observation ----

  getState(): GameSnapshot {
    return {
      phase: this.phase,
      round: this.round,
      roundsPerGame: ROUNDS_PER_GAME,
      columns: this.columns.map((c) => c.view()),
      currentCard: this.currentCard,
      roundScores: this.roundScores.slice(),
      roundResults: this.roundResults.map((r) => ({ ...r })),
      totalScore: this.totalScore,
      roundEndReason: this.roundEndReason,
      timerValue: this.timerValue,
      timerMax: TIMER_MAX,
      passAvailable: this.passAvailable,
      isNewHighScore: this.isNewHighScore,
      highScores: this.highScores.entries.slice(),
      bestScore: bestScore(this.highScores),
      deckCount: this.deckCount,
      hapticsEnabled: this.hapticsEnabled,
      shoeRemaining: this.shoe?.remaining ?? 0,
    };
  }

  subscribe(listener: GameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---- game lifecycle ----

  startNewGame(): void {
    this.totalScore = 0;
    this.roundScores = new Array<number>(ROUNDS_PER_GAME).fill(0);
    this.roundResults = [];
    this.round = 1;
    this.isNewHighScore = false;
    this.shoe = null;
    this.startRound();
  }

  startRound(): void {
    for (const col of this.columns) col.reset();
    this.roundEndReason = 'none';
    this.passAvailable = true;
    this.timerValue = TIMER_MAX;
    this.phase = 'inRound';
    this.shoe = new Shoe(this.deckCount, this.shoeSource, (decks) =>
      this.log.debug({ msg: 'shoe_rebuilt', round: this.round, decks }),
    );
    this.drawNextCard();
    this.countdown.start();
    this.log.info({ msg: 'round_start', round: this.round, decks: this.deckCount });
    this.emit('change');
  }

  nextRound(): void {
    if (this.phase !== 'betweenRounds') return;
    this.round += 1;
    this.startRound();
  }

  returnToPreGame(): void {
    this.countdown.stop();
    this.phase = 'preGame';
    this.emit('change');
  }

  endRound(reason: Exclude<RoundEndReason, 'none'>): void {
    if (this.phase !== 'inRound') return;
    this.countdown.stop();
    this.roundEndReason = reason;

    const { score, boardTotal } = roundScore(this.columns, this.timerValue);
    this.roundScores[this.round - 1] = score;
    this.totalScore += score;
    const result: RoundResult = { round: this.round, score, boardTotal, reason };
    this.roundResults.push(result);
    this.log.info({ msg: 'round_end', ...result, timer: this.timerValue });

    if (this.round < ROUNDS_PER_GAME) {
      this.phase = 'betweenRounds';
    } else {
      const { table, isNewTop } = insertScore(this.highScores, this.totalScore, this.now());
      this.highScores = table;
      this.isNewHighScore = isNewTop;
      this.persistHighScores();
      this.phase = 'gameOver';
      this.log.info({ msg: 'game_over', totalScore: this.totalScore, newHighScore: isNewTop });
    }

    if (reason === 'perfectBoard') this.fireFeedback('perfectBoard', (f) => f.perfectBoard?.());
    const snapshot = this.getState();
    fireAndForget(this.log, 'onRoundEnd', () => this.hooks.onRoundEnd?.(result, snapshot));
    if (this.phase === 'gameOver') {
      const total = this.totalScore;
      if (this.isNewHighScore) this.fireFeedback('newHighScore', (f) => f.newHighScore?.(total));
      else this.fireFeedback('gameOver', (f) => f.gameOver?.());
      const isTop = this.isNewHighScore;
      fireAndForget(this.log, 'onGameOver', () => this.hooks.onGameOver?.(total, isTop));
    }
    this.emit('change');
  }

  // ---- player actions ----

  placeCurrentCard(columnIndex: number): void {
    if (this.phase !== 'inRound') return;
    if (!Number.isInteger(columnIndex) || columnIndex < 0 || columnIndex >= this.columns.length) return;
    const card = this.currentCard;
    if (!card) return;
    const column = this.columns[columnIndex];
    if (column.isLocked) return;

    column.add(card);
    this.currentCard = null;

    if (column.busted) {
      this.endRound('bust');
      return;
    }
    // 105 ends the round even while some 21s are still soft and unlocked.
    if (boardTotals(this.columns).sum === PERFECT_BOARD_TOTAL) {
      this.endRound('perfectBoard');
      return;
    }
    if (this.columns.every((c) => c.isLocked && c.effectiveTotal === TARGET_TOTAL)) {
      this.endRound('perfectBoard');
      return;
    }
    this.drawNextCard();
    this.emit('change');
  }

  usePass(): void {
    if (this.phase !== 'inRound' || !this.passAvailable) return;
    this.passAvailable = false;
    this.drawNextCard();
    this.emit('change');
  }

  takeScore(): void {
    if (this.phase !== 'inRound') return;
    this.endRound('tookScore');
  }

  /** One countdown step; driven by the round's countdown. */
  tick(): void {
    if (this.phase !== 'inRound') return;
    this.timerValue = Math.max(0, this.timerValue - TICK_DECREMENT);
    if (this.timerValue === 0) {
      this.endRound('timerExpired');
      return;
    }
    this.emit('tick');
  }

  // ---- settings & scores ----

  /** Takes effect when the next round builds its shoe. */
  setDeckCount(deckCount: number): void {
    if (!isValidDeckCount(deckCount) || deckCount === this.deckCount) return;
    this.deckCount = deckCount;
    this.emit('change');
  }

  setHapticsEnabled(enabled: boolean): void {
    if (enabled === this.hapticsEnabled) return;
    this.hapticsEnabled = enabled;
    this.emit('change');
  }

  clearHighScores(): void {
    this.highScores = clearScores(this.highScores);
    this.isNewHighScore = false;
    this.persistHighScores();
    this.emit('change');
  }

  dispose(): void {
    this.countdown.stop();
    this.listeners.clear();
  }

  // ---- internals ----

  private drawNextCard(): void {
    if (!this.shoe) return;
    this.currentCard = this.shoe.draw();
  }

  private loadHighScores(): ScoreTable {
    try {
      return this.store.load();
    } catch (err) {
      this.log.warn({ msg: 'highscores_load_failed', error: normalizeError(err) });
      return createScoreTable();
    }
  }

  private persistHighScores(): void {
    const table = this.highScores;
    fireAndForget(this.log, 'highscores_save', () => this.store.save(table));
  }

  private fireFeedback(label: string, fn: (f: FeedbackHooks) => unknown): void {
    if (!this.hapticsEnabled) return;
    fireAndForget(this.log, `feedback:${label}`, () => fn(this.feedback));
  }

  private emit(event: GameEvent): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.getState();
    for (const listener of this.listeners) {
      fireAndForget(this.log, `listener:${event}`, () => listener(snapshot, event));
    }
  }
}
