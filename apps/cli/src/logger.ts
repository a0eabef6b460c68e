// apps/cli/src/logger.ts
//
// pino logger for the CLI. Output goes to stderr (or LOG_FILE) so log lines
// never land in the middle of the game screen.

import { pino, destination, type Logger } from 'pino';
import type { Config } from './config.js';

export type { Logger };

export function createLogger(config: Pick<Config, 'logLevel' | 'logFile'>): Logger {
  return pino(
    { level: config.logLevel },
    destination({ dest: config.logFile ?? 2, sync: true }),
  );
}
