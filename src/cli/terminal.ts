import readline from 'node:readline';
import type { GameEngine } from '../game/engine.js';
import type { FeedbackHooks, GameSnapshot } from '../game/types.js';
import { applyCommand, parseCommand } from './commands.js';
import { HELP_TEXT, render, renderScores } from './render.js';
import type { Palette } from './theme.js';

export type TerminalIO = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  palette: Palette;
  clearScreen: boolean;
};

// Print a countdown line every 10 seconds of game time.
const TIMER_NOTICE_EVERY = 40;

/** Haptics stand-in for a terminal: the bell. */
export function bellFeedback(output: NodeJS.WritableStream): FeedbackHooks {
  return {
    perfectBoard: () => {
      output.write('\x07\x07');
    },
    newHighScore: () => {
      output.write('\x07');
    },
    gameOver: () => {
      output.write('\x07');
    },
  };
}

function promptFor(s: GameSnapshot): string {
  return s.phase === 'inRound' ? `[${s.timerValue}] > ` : '> ';
}

/** Plays on the given streams until the user quits or input ends. */
export function runTerminal(engine: GameEngine, io: TerminalIO): Promise<void> {
  const p = io.palette;
  return new Promise<void>((resolve) => {
    const rl = readline.createInterface({ input: io.input, output: io.output });

    const draw = (s: GameSnapshot) => {
      if (io.clearScreen) io.output.write('\x1b[2J\x1b[H');
      io.output.write(`${render(s, p)}\n`);
      rl.setPrompt(promptFor(s));
      rl.prompt();
    };

    const unsubscribe = engine.subscribe((s, event) => {
      if (event === 'change') {
        draw(s);
        return;
      }
      rl.setPrompt(promptFor(s));
      if (s.timerValue % TIMER_NOTICE_EVERY === 0) {
        io.output.write(`\n${p.dim(`${s.timerValue} left`)}\n`);
        rl.prompt(true);
      }
    });

    rl.on('line', (line) => {
      const cmd = parseCommand(line);
      if (!cmd) {
        io.output.write(`${p.warn('Unknown command.')} ${p.dim('? for help')}\n`);
        rl.prompt();
        return;
      }
      switch (applyCommand(engine, cmd)) {
        case 'quit':
          rl.close();
          return;
        case 'help':
          io.output.write(`${HELP_TEXT}\n`);
          break;
        case 'scores':
          io.output.write(`${renderScores(engine.getState().highScores, p)}\n`);
          break;
        case 'done':
          break;
      }
      rl.prompt();
    });

    rl.on('close', () => {
      unsubscribe();
      resolve();
    });

    draw(engine.getState());
  });
}
