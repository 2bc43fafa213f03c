import chalk from 'chalk';
import type { Color } from '../games/roulette/layout.js';
import { noColor } from '../util/env.js';

type Paint = (s: string) => string;

export type Palette = {
  info: Paint;
  success: Paint;
  warn: Paint;
  error: Paint;
  dim: Paint;
  pocket: Record<Color, Paint>;
};

const base = (plain: boolean) => new chalk.Instance({ level: plain ? 0 : 3 });

export function getPalette(): Palette {
  const c = base(noColor());
  const theme = (process.env.CLI_THEME || 'felt').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      pocket: { red: c.bold, black: c.bold, green: c.bold },
    };
  }
  // felt (default): table colours for pockets
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    pocket: {
      red: c.bgRed.white.bold,
      black: c.bgBlack.white.bold,
      green: c.bgGreen.black.bold,
    },
  };
}
