// packages/game-core/src/session.ts
//
// One round of hangman as a small state machine.
//
//   playing --guess--> hit | miss | repeat --> playing | won | lost
//
// A hit reveals every position of the letter. A miss costs one attempt and
// advances the gallows by one frame. After each guess the round is won once
// the mask equals the word, otherwise lost once attempts run out.
//
// Repeated letters: by default a letter already in either history is
// reported as 'repeat' and changes nothing. With penalizeRepeats the guess
// is evaluated again, so a repeated miss costs another attempt.

import { evaluate } from './evaluate.js';
import { PLACEHOLDER, applyReveal, isFullyRevealed } from './reveal.js';

export const DEFAULT_ATTEMPTS = 10;

export type RoundState = 'playing' | 'won' | 'lost';

export interface GameSession {
  readonly id: string;
  readonly word: string;
  mask: string;
  attemptsLeft: number;
  wrongCount: number;
  readonly correct: string[];
  readonly incorrect: string[];
  state: RoundState;
}

export type GuessOutcome =
  | { kind: 'hit'; letter: string; positions: number[] }
  | { kind: 'miss'; letter: string }
  | { kind: 'repeat'; letter: string };

export interface SessionOptions {
  id?: string;
  attempts?: number;
  /** Opening mask, typically from initialReveal. All hidden by default. */
  mask?: string;
}

export interface GuessOptions {
  penalizeRepeats?: boolean;
}

export function createSession(word: string, opts: SessionOptions = {}): GameSession {
  const attempts = opts.attempts ?? DEFAULT_ATTEMPTS;
  if (word.length === 0) throw new Error('Word must not be empty');
  if (!Number.isInteger(attempts) || attempts < 1) {
    throw new Error('Attempts must be a positive integer');
  }
  const W = word.toUpperCase();
  if (!/^[A-Z]+$/.test(W)) throw new Error('Word must contain only letters A–Z');
  const mask = (opts.mask ?? PLACEHOLDER.repeat(W.length)).toUpperCase();
  if (mask.length !== W.length) throw new Error('Mask length must match word length');
  for (let i = 0; i < mask.length; i++) {
    if (mask[i] !== PLACEHOLDER && mask[i] !== W[i]) {
      throw new Error(`Mask position ${i} does not match the word`);
    }
  }

  return {
    id: opts.id ?? '',
    word: W,
    mask,
    attemptsLeft: attempts,
    wrongCount: 0,
    correct: [],
    incorrect: [],
    state: 'playing',
  };
}

/**
 * applyGuess plays one letter against the session, updating it in place.
 *
 * @param session - a session still in the 'playing' state
 * @param letter  - a single letter A–Z (case-insensitive)
 * @returns       - what the guess did; session.state tells whether the round ended
 *
 * Example:
 *   const s = createSession('CAT', { attempts: 1 });
 *   applyGuess(s, 'z') → { kind: 'miss', letter: 'Z' }, s.state === 'lost'
 */
export function applyGuess(
  session: GameSession,
  letter: string,
  opts: GuessOptions = {},
): GuessOutcome {
  if (session.state !== 'playing') throw new Error('Round is over');

  const L = letter.toUpperCase();
  if (
    !opts.penalizeRepeats &&
    (session.correct.includes(L) || session.incorrect.includes(L))
  ) {
    return { kind: 'repeat', letter: L };
  }

  const result = evaluate(session.word, L);
  let outcome: GuessOutcome;
  if (result.kind === 'match') {
    session.mask = applyReveal(session.word, result.positions, session.mask);
    session.correct.push(L);
    outcome = { kind: 'hit', letter: L, positions: result.positions };
  } else {
    session.attemptsLeft--;
    session.wrongCount++;
    session.incorrect.push(L);
    outcome = { kind: 'miss', letter: L };
  }

  if (isFullyRevealed(session.word, session.mask)) session.state = 'won';
  else if (session.attemptsLeft === 0) session.state = 'lost';

  return outcome;
}
