import type { Card } from '../cards/Card.js';
import type { HighScoreEntry } from '../scores/table.js';

export type GamePhase = 'preGame' | 'inRound' | 'betweenRounds' | 'gameOver';

export type RoundEndReason = 'none' | 'bust' | 'tookScore' | 'perfectBoard' | 'timerExpired';

export interface ColumnView {
  cards: Card[];
  total: number;
  isSoft: boolean;
  busted: boolean;
  effectiveTotal: number;
  isLocked: boolean;
  isFiveCardCharlie: boolean;
}

export interface RoundResult {
  round: number;
  score: number;
  boardTotal: number;
  reason: Exclude<RoundEndReason, 'none'>;
}

export interface GameSnapshot {
  phase: GamePhase;
  round: number;
  roundsPerGame: number;
  columns: ColumnView[];
  currentCard: Card | null;
  roundScores: number[];
  roundResults: RoundResult[];
  totalScore: number;
  roundEndReason: RoundEndReason;
  timerValue: number;
  timerMax: number;
  passAvailable: boolean;
  isNewHighScore: boolean;
  highScores: HighScoreEntry[];
  bestScore: number;
  deckCount: number;
  hapticsEnabled: boolean;
  shoeRemaining: number;
}

/** `tick` is a countdown step with nothing else changed; everything else is `change`. */
export type GameEvent = 'change' | 'tick';

export type GameListener = (snapshot: GameSnapshot, event: GameEvent) => void;

type HookResult = void | Promise<void>;

/** Lifecycle callbacks. Failures are logged and never reach game state. */
export interface GameHooks {
  onRoundEnd?(result: RoundResult, snapshot: GameSnapshot): HookResult;
  onGameOver?(totalScore: number, isNewHighScore: boolean): HookResult;
}

/** Cosmetic feedback (haptics, sounds); only fired while haptics are enabled. */
export interface FeedbackHooks {
  perfectBoard?(): HookResult;
  newHighScore?(score: number): HookResult;
  gameOver?(): HookResult;
}
