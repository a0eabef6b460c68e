// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • errors.ts   → error kinds (ResourceUnavailableError, EmptySourceError, …)
//   • random.ts   → Random type, seeded generator, randomIndex
//   • words.ts    → word list parsing and random selection
//   • reveal.ts   → reveal mask (initialReveal, applyReveal)
//   • evaluate.ts → letter evaluation (evaluate, GuessResult)
//   • art.ts      → gallows frames and banners
//   • session.ts  → round state machine (createSession, applyGuess)
//
// Example usage:
//   import { pickRandomWord, createSession, applyGuess } from '@hangman/game-core';

export * from './errors.js';
export * from './random.js';
export * from './words.js';
export * from './reveal.js';
export * from './evaluate.js';
export * from './art.js';
export * from './session.js';
