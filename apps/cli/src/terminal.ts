// apps/cli/src/terminal.ts
//
// Console I/O behind a small interface so the game loop can be driven by a
// scripted terminal in tests.

import { createInterface } from 'node:readline';
import { setTimeout as sleep } from 'node:timers/promises';
import { ReadStreamClosedError } from '@hangman/game-core';

export const CLEAR_SCREEN = '\x1b[H\x1b[2J';

export interface Terminal {
  print(line?: string): void;
  /** Writes text and resolves with the next input line (without its newline). */
  prompt(text: string): Promise<string>;
  clear(): void;
  pause(ms: number): Promise<void>;
}

export interface NodeTerminal extends Terminal {
  close(): void;
}

/**
 * createNodeTerminal reads lines from input with node:readline.
 * Once input has ended every prompt rejects with ReadStreamClosedError.
 */
export function createNodeTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): NodeTerminal {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    print(line = '') {
      output.write(`${line}\n`);
    },
    async prompt(text) {
      output.write(text);
      const next = await lines.next();
      if (next.done) throw new ReadStreamClosedError();
      return next.value;
    },
    clear() {
      output.write(CLEAR_SCREEN);
    },
    async pause(ms) {
      await sleep(ms);
    },
    close() {
      rl.close();
    },
  };
}
