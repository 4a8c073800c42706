#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config/index.js';
import { createLogger, setLogger } from './log.js';
import { openDb } from './db/connection.js';
import { SqliteHighScoreStore } from './scores/store.js';
import { GameEngine } from './game/engine.js';
import { bellFeedback, runTerminal } from './cli/terminal.js';
import { getPalette } from './cli/theme.js';
import { isInteractive } from './util/env.js';
import { normalizeError } from './util/errors.js';

dotenv.config({ override: false });

async function main() {
  const { config, issues } = loadConfig();
  const log = createLogger({ level: config.logLevel, dir: config.logDir });
  setLogger(log);
  const palette = getPalette(!!process.env.NO_COLOR || !isInteractive());
  for (const issue of issues) {
    log.warn({ msg: 'config_invalid_value', ...issue });
    console.warn(palette.warn(`Ignoring ${issue.key}=${issue.value}: ${issue.message}`));
  }

  const db = openDb(config.dbPath);
  const engine = new GameEngine({
    store: new SqliteHighScoreStore(db, log),
    deckCount: config.deckCount,
    hapticsEnabled: config.hapticsEnabled,
    feedback: bellFeedback(process.stdout),
    logger: log,
  });
  log.info({ msg: 'boot', node: process.versions.node, db: config.dbPath, decks: config.deckCount });

  try {
    await runTerminal(engine, {
      input: process.stdin,
      output: process.stdout,
      palette,
      clearScreen: isInteractive(),
    });
  } finally {
    engine.dispose();
    db.close();
    log.flush();
  }
}

main().catch((err) => {
  console.error(`pick21: ${normalizeError(err).message}`);
  process.exitCode = 1;
});
