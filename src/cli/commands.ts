import type { GameEngine } from '../game/engine.js';

export type Command =
  | { kind: 'place'; column: number }
  | { kind: 'pass' }
  | { kind: 'take' }
  | { kind: 'next' }
  | { kind: 'menu' }
  | { kind: 'decks'; count: number }
  | { kind: 'haptics' }
  | { kind: 'clear' }
  | { kind: 'scores' }
  | { kind: 'help' }
  | { kind: 'quit' };

const SIMPLE: Record<string, Command> = {
  p: { kind: 'pass' },
  pass: { kind: 'pass' },
  s: { kind: 'take' },
  take: { kind: 'take' },
  n: { kind: 'next' },
  next: { kind: 'next' },
  m: { kind: 'menu' },
  menu: { kind: 'menu' },
  h: { kind: 'haptics' },
  c: { kind: 'clear' },
  l: { kind: 'scores' },
  scores: { kind: 'scores' },
  '?': { kind: 'help' },
  help: { kind: 'help' },
  q: { kind: 'quit' },
  quit: { kind: 'quit' },
};

export function parseCommand(line: string): Command | null {
  const [head, ...rest] = line.trim().toLowerCase().split(/\s+/);
  if (!head) return null;
  if (/^[1-5]$/.test(head)) return { kind: 'place', column: Number(head) - 1 };
  if (head === 'd' || head === 'decks') {
    const count = Number(rest[0]);
    return Number.isInteger(count) && count >= 1 ? { kind: 'decks', count } : null;
  }
  return Object.prototype.hasOwnProperty.call(SIMPLE, head) ? SIMPLE[head] : null;
}

/** What the terminal still has to do after the engine took the command. */
export type CommandOutcome = 'done' | 'help' | 'scores' | 'quit';

export function applyCommand(engine: GameEngine, cmd: Command): CommandOutcome {
  switch (cmd.kind) {
    case 'place':
      engine.placeCurrentCard(cmd.column);
      return 'done';
    case 'pass':
      engine.usePass();
      return 'done';
    case 'take':
      engine.takeScore();
      return 'done';
    case 'next': {
      const { phase } = engine.getState();
      if (phase === 'betweenRounds') engine.nextRound();
      else if (phase === 'preGame' || phase === 'gameOver') engine.startNewGame();
      return 'done';
    }
    case 'menu':
      engine.returnToPreGame();
      return 'done';
    case 'decks':
      engine.setDeckCount(cmd.count);
      return 'done';
    case 'haptics':
      engine.setHapticsEnabled(!engine.getState().hapticsEnabled);
      return 'done';
    case 'clear':
      engine.clearHighScores();
      return 'done';
    case 'scores':
    case 'help':
    case 'quit':
      return cmd.kind;
  }
}
