// apps/cli/src/resources.ts
//
// Text resources (word list, gallows art, banners) read from disk.
// Each load reads the whole file; nothing is cached between rounds.

import { readFile } from 'node:fs/promises';
import { ResourceUnavailableError } from '@hangman/game-core';
import type { AssetName } from './config.js';

export interface AssetSource {
  load(name: AssetName): Promise<string[]>;
}

/** Splits text on LF or CRLF, dropping the empty line after a final newline. */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.at(-1) === '') lines.pop();
  return lines;
}

export async function readLines(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ResourceUnavailableError(path, err);
  }
  return splitLines(text);
}

export function fileAssets(paths: Record<AssetName, string>): AssetSource {
  return { load: (name) => readLines(paths[name]) };
}
