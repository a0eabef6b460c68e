// apps/cli/src/round.ts
//
// The game loop for a single round.
//
// Flow:
//   1. Re-read the word list and gallows art, pick a word, build the opening mask.
//   2. Until the session is won or lost: read a letter, apply it, redraw.
//   3. Show the win or loss banner with the word, pause, log the summary.

import { nanoid } from 'nanoid';
import {
  applyGuess,
  createSession,
  initialReveal,
  parseWordList,
  pickRandomWord,
  renderBanner,
  renderFrame,
  type GameSession,
  type GuessOutcome,
  type Random,
} from '@hangman/game-core';
import { roundSummarySchema, type RoundSummary } from '@hangman/protocol';
import type { Config } from './config.js';
import type { Logger } from './logger.js';
import type { Palette } from './palette.js';
import { readLetter } from './prompt.js';
import type { AssetSource } from './resources.js';
import type { Terminal } from './terminal.js';

export interface GameDeps {
  terminal: Terminal;
  assets: AssetSource;
  random: Random;
  palette: Palette;
  log: Logger;
  settings: Pick<Config, 'attempts' | 'penalizeRepeats' | 'roundEndDelayMs'>;
  /** Round id generator, nanoid by default. */
  newId?: () => string;
}

const STATUS: Record<GuessOutcome['kind'], string> = {
  hit: 'Letter found.',
  miss: 'Letter not found.',
  repeat: 'Letter already tried.',
};

const history = (letters: readonly string[]) => letters.map((l) => `${l} `).join('');

function drawBoard(
  { terminal, palette }: GameDeps,
  gallows: readonly string[],
  session: GameSession,
  outcome: GuessOutcome,
): void {
  terminal.clear();
  for (const line of renderFrame(gallows, session.wrongCount)) {
    terminal.print(palette.blue(line));
  }
  terminal.print(`${STATUS[outcome.kind]} Remaining attempts: ${session.attemptsLeft}`);
  terminal.print(`Word: ${session.mask}`);
  terminal.print(`Used letter False: ${palette.red(history(session.incorrect))}`);
  terminal.print(`Used letter True: ${palette.green(history(session.correct))}`);
}

export async function playRound(deps: GameDeps): Promise<RoundSummary> {
  const { terminal, assets, random, palette, settings } = deps;

  const word = pickRandomWord(parseWordList(await assets.load('words')), random);
  const gallows = await assets.load('gallows');
  const session = createSession(word, {
    id: (deps.newId ?? nanoid)(),
    attempts: settings.attempts,
    mask: initialReveal(word, random),
  });
  const log = deps.log.child({ round: session.id });
  log.info({ length: word.length, attempts: session.attemptsLeft }, 'round started');

  terminal.clear();
  for (const line of renderFrame(gallows, 0)) terminal.print(palette.blue(line));
  terminal.print(session.mask);

  while (session.state === 'playing') {
    const letter = await readLetter(terminal);
    const outcome = applyGuess(session, letter, {
      penalizeRepeats: settings.penalizeRepeats,
    });
    log.debug({ outcome, attemptsLeft: session.attemptsLeft }, 'guess');
    drawBoard(deps, gallows, session, outcome);
  }

  terminal.clear();
  if (session.state === 'won') {
    for (const line of renderBanner(await assets.load('win'), 'win')) {
      terminal.print(palette.red(line));
    }
    terminal.print(palette.yellow(`Congratulations! You guessed the word: ${session.word}`));
  } else {
    for (const line of renderBanner(await assets.load('loss'), 'loss')) {
      terminal.print(palette.red(line));
    }
    terminal.print(palette.red(`The word was: ${session.word}`));
  }
  await terminal.pause(settings.roundEndDelayMs);

  const summary = roundSummarySchema.parse({
    id: session.id,
    word: session.word,
    state: session.state,
    attemptsLeft: session.attemptsLeft,
    wrongCount: session.wrongCount,
    correct: session.correct,
    incorrect: session.incorrect,
  });
  log.info(summary, 'round finished');
  return summary;
}
