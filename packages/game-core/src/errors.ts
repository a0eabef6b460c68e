// packages/game-core/src/errors.ts
//
// Error kinds raised by the game and its I/O collaborators.
//
//   • ResourceUnavailableError → a word list or art file could not be read
//   • EmptySourceError         → the word list has no usable entries
//   • ResourceTooShortError    → a banner resource has fewer lines than needed
//   • InvalidGuessInputError   → a guess that is not a single letter A–Z
//   • ReadStreamClosedError    → the interactive input ended
//
// All of them extend HangmanError so callers can tell game failures
// apart from programming errors.

export class HangmanError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ResourceUnavailableError extends HangmanError {
  constructor(
    readonly resource: string,
    cause?: unknown,
  ) {
    super(`Cannot read resource "${resource}"`, { cause });
  }
}

export class EmptySourceError extends HangmanError {
  constructor(readonly source = 'word list') {
    super(`No candidate words in ${source}`);
  }
}

export class ResourceTooShortError extends HangmanError {
  constructor(
    readonly resource: string,
    readonly required: number,
    readonly actual: number,
  ) {
    super(
      `Resource "${resource}" has ${actual} lines, at least ${required} required`,
    );
  }
}

export class InvalidGuessInputError extends HangmanError {
  constructor(readonly input: string) {
    super(`Invalid guess "${input}": expected a single letter A–Z`);
  }
}

export class ReadStreamClosedError extends HangmanError {
  constructor() {
    super('Input stream closed');
  }
}
