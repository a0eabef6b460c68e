// packages/game-core/src/__tests__/session.test.ts
//
// Unit tests for the round state machine (createSession, applyGuess).
//
// Covered cases:
//   • Full winning round with one miss
//   • Immediate loss on the last attempt
//   • Repeat guesses, with and without penalties
//   • Guarding against guesses after the round ended

import { applyGuess, createSession, initialReveal } from '../index.js';

describe('applyGuess', () => {
  it('wins APPLE after A, P, Z, L, E with one attempt lost', () => {
    const s = createSession('APPLE', { mask: initialReveal('APPLE', () => 0) });
    expect(s.mask).toBe('A____');

    expect(applyGuess(s, 'A')).toEqual({ kind: 'hit', letter: 'A', positions: [0] });
    expect(applyGuess(s, 'P')).toEqual({
      kind: 'hit',
      letter: 'P',
      positions: [1, 2],
    });
    expect(s.mask).toBe('APP__');

    expect(applyGuess(s, 'Z')).toEqual({ kind: 'miss', letter: 'Z' });
    expect(s.attemptsLeft).toBe(9);
    expect(s.wrongCount).toBe(1);

    applyGuess(s, 'L');
    expect(s.state).toBe('playing');
    applyGuess(s, 'E');

    expect(s.mask).toBe('APPLE');
    expect(s.state).toBe('won');
    expect(s.attemptsLeft).toBe(9);
    expect(s.correct).toEqual(['A', 'P', 'L', 'E']);
    expect(s.incorrect).toEqual(['Z']);
  });

  it('loses CAT on a miss with one attempt left', () => {
    const s = createSession('CAT', { attempts: 1 });
    applyGuess(s, 'Z');
    expect(s.attemptsLeft).toBe(0);
    expect(s.wrongCount).toBe(1);
    expect(s.state).toBe('lost');
  });

  it('normalizes lowercase letters', () => {
    const s = createSession('cat');
    expect(s.word).toBe('CAT');
    expect(applyGuess(s, 'c')).toEqual({ kind: 'hit', letter: 'C', positions: [0] });
  });

  it('wins a lowercase word opened with initialReveal', () => {
    const s = createSession('planet', { mask: initialReveal('planet', () => 0) });
    expect(s.mask).toBe('P_____');
    for (const l of ['L', 'A', 'N', 'E', 'T']) applyGuess(s, l);
    expect(s.mask).toBe('PLANET');
    expect(s.state).toBe('won');
  });

  it('ignores repeated letters by default', () => {
    const s = createSession('CAT');
    applyGuess(s, 'Z');
    applyGuess(s, 'C');
    expect(applyGuess(s, 'Z')).toEqual({ kind: 'repeat', letter: 'Z' });
    expect(applyGuess(s, 'C')).toEqual({ kind: 'repeat', letter: 'C' });
    expect(s.attemptsLeft).toBe(9);
    expect(s.wrongCount).toBe(1);
    expect(s.incorrect).toEqual(['Z']);
    expect(s.correct).toEqual(['C']);
  });

  it('penalizes repeated misses when asked to', () => {
    const s = createSession('CAT');
    applyGuess(s, 'Z', { penalizeRepeats: true });
    applyGuess(s, 'Z', { penalizeRepeats: true });
    applyGuess(s, 'C', { penalizeRepeats: true });
    applyGuess(s, 'C', { penalizeRepeats: true });
    expect(s.attemptsLeft).toBe(8);
    expect(s.wrongCount).toBe(2);
    expect(s.incorrect).toEqual(['Z', 'Z']);
    expect(s.correct).toEqual(['C', 'C']);
    expect(s.mask).toBe('C__');
  });

  it('refuses guesses once the round is over', () => {
    const s = createSession('CAT', { attempts: 1 });
    applyGuess(s, 'Q');
    expect(() => applyGuess(s, 'C')).toThrow('Round is over');
  });
});

describe('createSession', () => {
  it('starts fully hidden with ten attempts', () => {
    expect(createSession('CAT', { id: 'r1' })).toEqual({
      id: 'r1',
      word: 'CAT',
      mask: '___',
      attemptsLeft: 10,
      wrongCount: 0,
      correct: [],
      incorrect: [],
      state: 'playing',
    });
  });

  it('validates its inputs', () => {
    expect(() => createSession('')).toThrow('Word must not be empty');
    expect(() => createSession('CAT', { attempts: 0 })).toThrow(
      'Attempts must be a positive integer',
    );
    expect(() => createSession('CAT', { mask: '_' })).toThrow(
      'Mask length must match word length',
    );
  });

  it('rejects words that could never be completed', () => {
    expect(() => createSession('ICE-CREAM')).toThrow(
      'Word must contain only letters A–Z',
    );
    expect(() => createSession('R2D2')).toThrow('Word must contain only letters A–Z');
  });

  it('rejects masks showing letters the word does not have', () => {
    expect(() => createSession('CAT', { mask: '_X_' })).toThrow(
      'Mask position 1 does not match the word',
    );
    expect(createSession('CAT', { mask: 'c__' }).mask).toBe('C__');
  });
});
