// apps/cli/src/prompt.ts

import { letterSchema, type Letter } from '@hangman/protocol';
import type { Terminal } from './terminal.js';

export const LETTER_PROMPT = 'Enter a single letter: ';
export const INVALID_LETTER = 'Invalid input. Please enter a single letter.';

/**
 * readLetter prompts until the operator types a single letter A–Z.
 *
 * There is no retry limit: the loop only ends with a valid letter, or with
 * ReadStreamClosedError from the terminal once input has ended.
 */
export async function readLetter(terminal: Terminal): Promise<Letter> {
  for (;;) {
    const parsed = letterSchema.safeParse(await terminal.prompt(LETTER_PROMPT));
    if (parsed.success) return parsed.data;
    terminal.print(INVALID_LETTER);
  }
}
