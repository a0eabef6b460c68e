// packages/game-core/src/reveal.ts
//
// Reveal mask handling.
//
// A mask is a string as long as the word, where each position is either the
// word's letter (revealed) or PLACEHOLDER (hidden). Revealing is positional
// and never hides a letter again.

import { randomIndex, type Random } from './random.js';

export const PLACEHOLDER = '_';

/** Number of random draws made for the opening reveal of a word. */
export function revealCount(length: number): number {
  return Math.max(0, Math.floor(length / 2) - 1);
}

/**
 * initialReveal builds the mask shown at the start of a round.
 *
 * Draws revealCount(word.length) indices independently. Draws may repeat,
 * so fewer positions than requested can end up visible.
 *
 * Example:
 *   initialReveal('PLANET', () => 0) → 'P_____'
 */
export function initialReveal(word: string, random: Random = Math.random): string {
  const picks: number[] = [];
  for (let i = 0; i < revealCount(word.length); i++) {
    picks.push(randomIndex(random, word.length));
  }
  return applyReveal(word, picks, PLACEHOLDER.repeat(word.length));
}

/**
 * applyReveal returns a copy of mask with the given positions uncovered.
 *
 * @param word      - the target word
 * @param positions - zero-based indices; anything outside [0, word.length) is ignored
 * @param mask      - current mask, same length as word
 * @returns         - the updated mask (the input string is left as is)
 *
 * Example:
 *   applyReveal('APPLE', [1, 2, 9], 'A____') → 'APP__'
 */
export function applyReveal(
  word: string,
  positions: Iterable<number>,
  mask: string,
): string {
  if (mask.length !== word.length) {
    throw new Error('Mask length must match word length');
  }
  const out = mask.split('');
  for (const p of positions) {
    if (Number.isInteger(p) && p >= 0 && p < word.length) out[p] = word[p];
  }
  return out.join('');
}

/** isFullyRevealed is true once no position of the mask is hidden. */
export function isFullyRevealed(word: string, mask: string): boolean {
  return mask === word;
}
