import { winValue } from './bet.js';
import { MAX_NUMBER } from './layout.js';
import type { Color } from './layout.js';
import type { Bet, BetCategory, BetResult } from './types.js';

export function isWinning(winningNumber: number, winningColor: Color, category: BetCategory): boolean {
  const n = winningNumber;
  switch (category.kind) {
    case 'straight':
      return n === category.number;
    case 'split':
    case 'street':
    case 'basket':
    case 'topline':
    case 'corner':
    case 'doubleLine':
      return category.numbers.includes(n);
    case 'dozens': {
      const g = category.group;
      return n >= (g - 1) * 12 + 1 && n <= g * 12;
    }
    case 'columns': {
      const c = category.column;
      return n > 0 && n <= MAX_NUMBER && n >= c && (n - c) % 3 === 0;
    }
    // Zero is neither even nor odd, high nor low, red nor black: the house keeps those.
    case 'evenOdd':
      return n !== 0 && n % 2 === category.value;
    case 'highLow':
      return (category.value === 0 && n >= 1 && n <= 18) || (category.value === 1 && n >= 19 && n <= MAX_NUMBER);
    case 'redBlack':
      return (category.value === 0 && winningColor === 'red') || (category.value === 1 && winningColor === 'black');
    default: {
      const unhandled: never = category;
      throw new Error(`Unhandled bet category: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Pays every bet against one winning number. One result per bet, in input
 * order. Depends on its arguments only.
 */
export function evaluate(winningNumber: number, winningColor: Color, bets: readonly Bet[]): BetResult[] {
  return bets.map((bet) => ({
    bet,
    payout: isWinning(winningNumber, winningColor, bet.category) ? winValue(bet) : 0,
  }));
}

export function totalPayout(results: readonly BetResult[]): number {
  return results.reduce((acc, r) => acc + r.payout, 0);
}
