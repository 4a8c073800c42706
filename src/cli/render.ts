import dayjs from 'dayjs';
import { cardLabel, isRed, type Card } from '../cards/Card.js';
import { boardTotals } from '../game/scoring.js';
import type { ColumnView, GameSnapshot, RoundEndReason, RoundResult } from '../game/types.js';
import type { HighScoreEntry } from '../scores/table.js';
import type { Palette } from './theme.js';

const CARDS_WIDTH = 16;
const TIMER_BAR_WIDTH = 28;

const REASON_TEXT: Record<Exclude<RoundEndReason, 'none'>, string> = {
  bust: 'Bust!',
  tookScore: 'Score taken.',
  perfectBoard: 'Perfect board!',
  timerExpired: "Time's up!",
};

export function formatScore(n: number): string {
  return n.toLocaleString('en-US');
}

function paintCard(card: Card, p: Palette): string {
  const label = cardLabel(card);
  return isRed(card.suit) ? p.redCard(label) : p.blackCard(label);
}

function columnStatus(col: ColumnView, p: Palette): string {
  if (col.busted) return p.error('BUST');
  if (col.isFiveCardCharlie) return p.success('CHARLIE');
  if (col.isLocked) return p.success('LOCKED');
  if (col.isSoft) return p.dim('soft');
  return '';
}

export function renderColumn(col: ColumnView, index: number, p: Palette): string {
  // Pad on the uncolored text so escape codes don't skew the alignment.
  const plain = col.cards.length > 0 ? col.cards.map(cardLabel).join(' ') : '-';
  const cards = col.cards.length > 0 ? col.cards.map((c) => paintCard(c, p)).join(' ') : p.dim('-');
  const pad = ' '.repeat(Math.max(0, CARDS_WIDTH - plain.length));
  const status = columnStatus(col, p);
  return `[${index + 1}] ${cards}${pad} ${String(col.total).padStart(2)}${status ? ` ${status}` : ''}`;
}

export function timerBar(value: number, max: number, width = TIMER_BAR_WIDTH): string {
  const ratio = max > 0 ? Math.max(0, Math.min(1, value / max)) : 0;
  const filled = Math.round(ratio * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function roundScoresLine(s: GameSnapshot): string {
  const cells = s.roundScores.map((score, i) => (i < s.roundResults.length ? formatScore(score) : '-'));
  return cells.join(' | ');
}

export function renderBoard(s: GameSnapshot, p: Palette): string {
  const header =
    `${p.title(`Round ${s.round}/${s.roundsPerGame}`)}  ` +
    `Timer ${s.timerValue}/${s.timerMax}  ` +
    `Pass ${s.passAvailable ? 'ready' : 'used'}  ` +
    `Best ${formatScore(s.bestScore)}`;
  const lines = [header, p.info(timerBar(s.timerValue, s.timerMax)), ''];
  s.columns.forEach((col, i) => lines.push(renderColumn(col, i, p)));
  lines.push('');
  lines.push(`Card: ${s.currentCard ? paintCard(s.currentCard, p) : p.dim('-')}`);
  lines.push(`Board ${boardTotals(s.columns).sum}  Rounds ${roundScoresLine(s)}  Total ${formatScore(s.totalScore)}`);
  return lines.join('\n');
}

export function renderRoundResult(result: RoundResult, p: Palette): string {
  const text = REASON_TEXT[result.reason];
  const head = result.reason === 'bust' ? p.error(text) : p.success(text);
  return `${head} Round ${result.round}: board ${result.boardTotal}, +${formatScore(result.score)}`;
}

export function renderScores(entries: readonly HighScoreEntry[], p: Palette): string {
  if (entries.length === 0) return `${p.title('High scores')}\n${p.dim('No scores yet.')}`;
  const rows = entries.map(
    (e, i) => `${String(i + 1).padStart(2)}. ${formatScore(e.score).padStart(9)}  ${dayjs(e.date).format('YYYY-MM-DD HH:mm')}`,
  );
  return [p.title('High scores'), ...rows].join('\n');
}

export const HELP_TEXT = [
  '1-5     place the card in that column',
  'p       pass (once per round)',
  's       take the score and end the round',
  'n       next round / new game',
  'm       back to the menu',
  'd <n>   decks per shoe (from next round)',
  'h       toggle haptics',
  'c       clear high scores',
  'l       list high scores',
  '?       this help',
  'q       quit',
].join('\n');

export function renderMenu(s: GameSnapshot, p: Palette): string {
  return [
    p.title('Pick 21'),
    `Best ${formatScore(s.bestScore)}  Decks ${s.deckCount}  Haptics ${s.hapticsEnabled ? 'on' : 'off'}`,
    p.dim('n to play, ? for help'),
  ].join('\n');
}

export function render(s: GameSnapshot, p: Palette): string {
  const last = s.roundResults[s.roundResults.length - 1];
  switch (s.phase) {
    case 'preGame':
      return renderMenu(s, p);
    case 'inRound':
      return renderBoard(s, p);
    case 'betweenRounds':
      return [renderBoard(s, p), '', last ? renderRoundResult(last, p) : '', p.dim('n for the next round')].join('\n');
    case 'gameOver': {
      const lines = [renderBoard(s, p), ''];
      if (last) lines.push(renderRoundResult(last, p));
      lines.push(p.title(`Game over! Total ${formatScore(s.totalScore)}`));
      if (s.isNewHighScore) lines.push(p.success('New high score!'));
      lines.push('', renderScores(s.highScores, p), '', p.dim('n for a new game, m for the menu'));
      return lines.join('\n');
    }
  }
}
