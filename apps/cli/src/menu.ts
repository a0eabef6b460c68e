// apps/cli/src/menu.ts
//
// Session menu: shows the start banner and waits for a command.
//   • empty line → play a round
//   • "99"       → quit
//   • otherwise  → ignored, prompt again

import { renderBanner } from '@hangman/game-core';
import { menuCommandSchema } from '@hangman/protocol';
import { playRound, type GameDeps } from './round.js';

export const MENU_PROMPT = 'INPUT : ';

/** Runs the menu until the quit command; resolves with the number of rounds played. */
export async function runMenu(deps: GameDeps): Promise<number> {
  const { terminal, assets, palette } = deps;
  let rounds = 0;

  for (;;) {
    terminal.clear();
    for (const line of renderBanner(await assets.load('start'), 'start')) {
      terminal.print(palette.red(line));
    }

    const command = menuCommandSchema.parse(
      await terminal.prompt(palette.red(MENU_PROMPT)),
    );
    if (command === 'quit') return rounds;
    if (command === 'play') {
      await playRound(deps);
      rounds++;
    }
  }
}
