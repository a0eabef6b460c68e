// apps/cli/src/palette.ts
//
// Foreground colours for the terminal screens. Purely cosmetic:
//   • art    → blue
//   • banner → red (also misses and the loss message)
//   • hit    → green
//   • win    → yellow

export interface Palette {
  blue(text: string): string;
  red(text: string): string;
  green(text: string): string;
  yellow(text: string): string;
}

const sgr = (code: number) => (text: string) => `\x1b[${code}m${text}\x1b[0m`;
const plain = (text: string) => text;

export function createPalette(enabled: boolean): Palette {
  if (!enabled) return { blue: plain, red: plain, green: plain, yellow: plain };
  return { blue: sgr(34), red: sgr(31), green: sgr(32), yellow: sgr(33) };
}
