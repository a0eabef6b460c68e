// apps/cli/src/index.ts
//
// Entry point: `npm start` from the repository root.
//
// Builds the process-wide collaborators once (config, logger, random source,
// terminal) and hands them to the session menu.
//
// Exit behaviour:
//   • "99" at the menu or end of input → exit code 0
//   • unreadable or unusable resources → "Error: …" and exit code 1

import 'dotenv/config';
import {
  ReadStreamClosedError,
  createSeededRandom,
  type Random,
} from '@hangman/game-core';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { runMenu } from './menu.js';
import { createPalette } from './palette.js';
import { fileAssets } from './resources.js';
import { createNodeTerminal } from './terminal.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config);
  const random: Random = config.seed ? createSeededRandom(config.seed) : Math.random;
  const terminal = createNodeTerminal();

  log.info({ seeded: config.seed !== undefined, attempts: config.attempts }, 'hangman up');

  try {
    const rounds = await runMenu({
      terminal,
      assets: fileAssets(config.assets),
      random,
      palette: createPalette(config.color),
      log,
      settings: config,
    });
    log.info({ rounds }, 'quit');
  } catch (err) {
    if (err instanceof ReadStreamClosedError) {
      log.info('input closed');
      return;
    }
    log.error({ err }, 'fatal error');
    terminal.print(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    terminal.close();
  }
}

main().catch((error) => {
  console.error('Failed to start hangman:', error);
  process.exit(1);
});
