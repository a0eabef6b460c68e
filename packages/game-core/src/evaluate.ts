// packages/game-core/src/evaluate.ts
//
// Guess evaluation: where does a letter occur in the word?
//
// Rules:
//   • The guess must be exactly one letter A–Z (case-insensitive).
//   • Both sides are uppercased before comparison.
//   • Matching is exact per-character equality.

import { InvalidGuessInputError } from './errors.js';

export type GuessResult =
  | { kind: 'match'; positions: number[] }
  | { kind: 'none' };

/**
 * evaluate finds every position of letter in word.
 *
 * @param word   - the target word
 * @param letter - a single letter, validated upstream
 * @returns      - { kind: 'match', positions } in ascending order, or { kind: 'none' }
 * @throws InvalidGuessInputError if letter is not one character A–Z
 *
 * Example:
 *   evaluate('APPLE', 'p') → { kind: 'match', positions: [1, 2] }
 */
export function evaluate(word: string, letter: string): GuessResult {
  const L = letter.toUpperCase();
  if (!/^[A-Z]$/.test(L)) throw new InvalidGuessInputError(letter);

  const W = word.toUpperCase();
  const positions: number[] = [];
  for (let i = 0; i < W.length; i++) {
    if (W[i] === L) positions.push(i);
  }

  return positions.length > 0 ? { kind: 'match', positions } : { kind: 'none' };
}
