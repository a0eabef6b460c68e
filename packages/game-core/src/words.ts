// packages/game-core/src/words.ts
//
// Word list utilities.
//
// The word list is a line-delimited text resource read by the app at the
// start of every round. parseWordList turns its raw lines into candidate
// words; pickRandomWord chooses the target for the round.

import { EmptySourceError } from './errors.js';
import { randomIndex, type Random } from './random.js';

const WORD_RE = /^[A-Z]+$/;

/**
 * parseWordList normalizes raw lines into candidate words.
 *
 * Lines are trimmed and uppercased. Empty lines and lines with anything
 * other than A–Z are dropped, since such a word could never be completed.
 * Order and duplicates are kept.
 *
 * Example:
 *   parseWordList(['apple', '', ' Pear ', 'ice-cream'])
 *   → ['APPLE', 'PEAR']
 */
export function parseWordList(lines: readonly string[]): string[] {
  const words: string[] = [];
  for (const line of lines) {
    const w = line.trim().toUpperCase();
    if (WORD_RE.test(w)) words.push(w);
  }
  return words;
}

/**
 * pickRandomWord returns one of the candidates, chosen uniformly.
 *
 * @param words  - candidate words; must not be empty
 * @param random - randomness source, Math.random by default
 * @throws EmptySourceError when there are no candidates
 */
export function pickRandomWord(
  words: readonly string[],
  random: Random = Math.random,
): string {
  if (words.length === 0) throw new EmptySourceError();
  return words[randomIndex(random, words.length)];
}
