// packages/protocol/src/__tests__/schemas.test.ts
//
// Unit tests for the shared Zod schemas.

import { letterSchema, menuCommandSchema, roundSummarySchema } from '../index.js';

describe('letterSchema', () => {
  it('trims and uppercases a single letter', () => {
    expect(letterSchema.parse(' q\n')).toBe('Q');
    expect(letterSchema.parse('Z')).toBe('Z');
  });

  it.each(['', 'ab', '1', '?', ' ', 'é'])('rejects %j', (raw) => {
    expect(letterSchema.safeParse(raw).success).toBe(false);
  });
});

describe('menuCommandSchema', () => {
  it('maps an empty line to play', () => {
    expect(menuCommandSchema.parse('')).toBe('play');
    expect(menuCommandSchema.parse('   ')).toBe('play');
  });

  it('maps the sentinel to quit', () => {
    expect(menuCommandSchema.parse(' 99 ')).toBe('quit');
  });

  it('treats anything else as unknown', () => {
    expect(menuCommandSchema.parse('play')).toBe('unknown');
    expect(menuCommandSchema.parse('9')).toBe('unknown');
  });
});

describe('roundSummarySchema', () => {
  const summary = {
    id: 'round-1',
    word: 'CAT',
    state: 'lost',
    attemptsLeft: 0,
    wrongCount: 1,
    correct: [],
    incorrect: ['Z'],
  };

  it('accepts a finished round', () => {
    expect(roundSummarySchema.parse(summary)).toEqual(summary);
  });

  it('rejects a round still in play', () => {
    expect(roundSummarySchema.safeParse({ ...summary, state: 'playing' }).success).toBe(
      false,
    );
  });
});
