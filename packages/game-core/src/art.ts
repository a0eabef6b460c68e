// packages/game-core/src/art.ts
//
// ASCII-art selection.
//
// The gallows resource is a stack of FRAME_HEIGHT-line frames, one per wrong
// guess count (frame 0 first). Banners (start, win, loss screens) are the
// first BANNER_HEIGHT lines of their own resource.

import { ResourceTooShortError } from './errors.js';

export const FRAME_HEIGHT = 7;
export const BANNER_HEIGHT = 16;

const clamp = (n: number, max: number) => Math.min(Math.max(n, 0), max);

/**
 * renderFrame picks the frame for a wrong-guess count.
 *
 * Counts past the last frame give a partial or empty slice rather than an
 * error.
 *
 * Example:
 *   renderFrame(lines, 2) → lines.slice(14, 21)
 */
export function renderFrame(lines: readonly string[], wrongCount: number): string[] {
  const start = clamp(wrongCount * FRAME_HEIGHT, lines.length);
  const end = clamp(wrongCount * FRAME_HEIGHT + FRAME_HEIGHT, lines.length);
  return lines.slice(start, end);
}

/**
 * renderBanner returns the first BANNER_HEIGHT lines of a banner resource.
 *
 * @throws ResourceTooShortError when the resource is shorter than a banner
 */
export function renderBanner(lines: readonly string[], resource = 'banner'): string[] {
  if (lines.length < BANNER_HEIGHT) {
    throw new ResourceTooShortError(resource, BANNER_HEIGHT, lines.length);
  }
  return lines.slice(0, BANNER_HEIGHT);
}
