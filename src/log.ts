import path from 'node:path';
import pino, { type Logger, type LevelWithSilent } from 'pino';
import { isTestEnv } from './util/env.js';

export type { Logger };

export type LoggerOptions = {
  level?: LevelWithSilent;
  dir?: string;
};

/**
 * NDJSON to `<dir>/pick21.ndjson`. The terminal belongs to the board, so
 * nothing is written to stdout. Silent under Jest.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const level: LevelWithSilent = isTestEnv() ? 'silent' : opts.level ?? 'info';
  if (level === 'silent') return pino({ level });
  const stream = pino.destination({
    dest: path.join(path.resolve(opts.dir ?? 'logs'), 'pick21.ndjson'),
    mkdir: true,
    sync: false,
  });
  return pino(
    {
      base: undefined,
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.epochTime,
    },
    stream,
  );
}

let root: Logger | null = null;

export function getLogger(): Logger {
  if (!root) root = createLogger();
  return root;
}

export function setLogger(logger: Logger): void {
  root = logger;
}
