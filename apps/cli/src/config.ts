// apps/cli/src/config.ts
//
// Runtime configuration, read from the environment (and .env via dotenv).
//
// Every value has a default, so `npm start` works with no setup. Asset paths
// default to the files shipped in apps/cli/assets.

import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const assetPath = (name: string) =>
  fileURLToPath(new URL(`../assets/${name}`, import.meta.url));

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  HANGMAN_WORDS_FILE: z.string().min(1).default(assetPath('words.txt')),
  HANGMAN_GALLOWS_FILE: z.string().min(1).default(assetPath('hangman.txt')),
  HANGMAN_START_FILE: z.string().min(1).default(assetPath('start.txt')),
  HANGMAN_WIN_FILE: z.string().min(1).default(assetPath('win.txt')),
  HANGMAN_LOSS_FILE: z.string().min(1).default(assetPath('loss.txt')),
  HANGMAN_ATTEMPTS: z.coerce.number().int().min(1).max(26).default(10),
  HANGMAN_SEED: z.string().min(1).optional(),
  HANGMAN_PENALIZE_REPEATS: flag('false'),
  HANGMAN_ROUND_END_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  HANGMAN_COLOR: flag('true'),
  NO_COLOR: z.string().optional(),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
  LOG_FILE: z.string().min(1).optional(),
});

export type AssetName = 'words' | 'gallows' | 'start' | 'win' | 'loss';

export interface Config {
  assets: Record<AssetName, string>;
  attempts: number;
  seed?: string;
  penalizeRepeats: boolean;
  roundEndDelayMs: number;
  color: boolean;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  logFile?: string;
}

/**
 * loadConfig validates the environment and maps it onto Config.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const e = envSchema.parse(env);
  return {
    assets: {
      words: e.HANGMAN_WORDS_FILE,
      gallows: e.HANGMAN_GALLOWS_FILE,
      start: e.HANGMAN_START_FILE,
      win: e.HANGMAN_WIN_FILE,
      loss: e.HANGMAN_LOSS_FILE,
    },
    attempts: e.HANGMAN_ATTEMPTS,
    seed: e.HANGMAN_SEED,
    penalizeRepeats: e.HANGMAN_PENALIZE_REPEATS,
    roundEndDelayMs: e.HANGMAN_ROUND_END_DELAY_MS,
    // a non-empty NO_COLOR disables colour (https://no-color.org)
    color: e.HANGMAN_COLOR && !e.NO_COLOR,
    logLevel: e.LOG_LEVEL,
    logFile: e.LOG_FILE,
  };
}
