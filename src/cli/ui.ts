import boxen from 'boxen';
import logSymbols from 'log-symbols';
import { getPalette } from './theme.js';
import { isQuiet, isTestEnv } from '../util/env.js';
import type { Color } from '../games/roulette/layout.js';

const palette = getPalette();

function banner(title: string, lines: string[] = []) {
  if (isTestEnv() || isQuiet()) return;
  const body = [palette.info(title), ...lines.map((l) => palette.dim(l))].join('\n');
  console.log(boxen(body, { padding: 1, borderColor: 'green', borderStyle: 'round' }));
}

function say(msg: string, style: 'info' | 'success' | 'warn' | 'error' | 'dim' | 'plain' = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (isQuiet() && style !== 'error') return;
  let out = msg;
  switch (style) {
    case 'success': out = `${logSymbols.success} ${palette.success(msg)}`; break;
    case 'warn': out = `${logSymbols.warning} ${palette.warn(msg)}`; break;
    case 'error': out = `${logSymbols.error} ${palette.error(msg)}`; break;
    case 'dim': out = palette.dim(msg); break;
    case 'plain': break;
    default: out = `${logSymbols.info} ${palette.info(msg)}`; break;
  }
  if (style === 'error') console.error(out);
  else console.log(out);
}

function pocket(n: number, color: Color): string {
  return palette.pocket[color](` ${String(n).padStart(2)} `);
}

function table(rows: Array<Record<string, string | number>>) {
  if (isTestEnv() || isQuiet()) return;
  if (rows.length === 0) return console.log('(none)');
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  console.log(headers.map((h, i) => palette.dim(h.padEnd(widths[i]))).join('  '));
  for (const r of rows) {
    console.log(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  '));
  }
}

export const ui = { banner, say, pocket, table };
export default ui;
