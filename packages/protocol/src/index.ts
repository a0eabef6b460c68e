// packages/protocol/src/index.ts
//
// Shared input/output shapes for the hangman app.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Letter:       one guessed letter, normalized to uppercase A–Z.
//   - MenuCommand:  what a line typed at the session menu means.
//   - RoundSummary: the record of a finished round, logged at round end.

import { z } from 'zod';

/**
 * Letter schema: trims and uppercases the raw line, then requires exactly
 * one character A–Z.
 *  " q\n" → "Q", "ab" / "1" / "" → rejected
 */
export const letterSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]$/, 'Enter a single letter A–Z');
export type Letter = z.infer<typeof letterSchema>;

/* -------------------------------------------------------------------------- */
/*                                Session menu                                */
/* -------------------------------------------------------------------------- */

export const QUIT_SENTINEL = '99';

export const menuCommandEnum = z.enum(['play', 'quit', 'unknown']);
export type MenuCommand = z.infer<typeof menuCommandEnum>;

/**
 * Menu command schema:
 *  - empty line (after trimming) → "play"
 *  - "99"                        → "quit"
 *  - anything else               → "unknown" (the menu re-prompts)
 */
export const menuCommandSchema = z
  .string()
  .trim()
  .transform((line): MenuCommand => {
    if (line === '') return 'play';
    if (line === QUIT_SENTINEL) return 'quit';
    return 'unknown';
  });

/* -------------------------------------------------------------------------- */
/*                                Round summary                               */
/* -------------------------------------------------------------------------- */

export const roundStateSchema = z.enum(['playing', 'won', 'lost']);
export type RoundState = z.infer<typeof roundStateSchema>;

/**
 * Summary of a finished round:
 *  - id:           round identifier used in log lines
 *  - word:         the target word
 *  - state:        "won" | "lost"
 *  - attemptsLeft: attempts remaining at the end
 *  - wrongCount:   number of misses
 *  - correct / incorrect: guess history in play order
 */
export const roundSummarySchema = z.object({
  id: z.string().min(1),
  word: z.string().regex(/^[A-Z]+$/),
  state: roundStateSchema.exclude(['playing']),
  attemptsLeft: z.number().int().min(0),
  wrongCount: z.number().int().min(0),
  correct: z.array(letterSchema),
  incorrect: z.array(letterSchema),
});
export type RoundSummary = z.infer<typeof roundSummarySchema>;
