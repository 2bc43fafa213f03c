import type { Bet, BetCategory, BetKind } from './types.js';

// Total returned on a win, stake included (straight pays 35:1 + stake).
export const PAYOUT_MULTIPLIERS: Readonly<Record<BetKind, number>> = {
  straight: 36,
  split: 18,
  street: 12,
  basket: 12,
  topline: 9,
  corner: 9,
  doubleLine: 6,
  dozens: 3,
  columns: 3,
  evenOdd: 2,
  highLow: 2,
  redBlack: 2,
};

/**
 * Builds an immutable bet. Nothing is checked here: a malformed bet is still
 * representable so the engine can report why it was refused.
 */
export function createBet(category: BetCategory, wager: number): Bet {
  return Object.freeze({ category, wager });
}

export function payoutMultiplier(category: BetCategory | BetKind): number {
  const kind = typeof category === 'string' ? category : category.kind;
  return PAYOUT_MULTIPLIERS[kind];
}

export function stakeOf(bets: readonly Bet[]): number {
  const total = bets.reduce((acc, b) => acc + b.wager, 0);
  if (!Number.isSafeInteger(total)) throw new RangeError(`Slate stake ${total} is not an exact whole amount`);
  return total;
}

export function winValue(bet: Bet): number {
  return bet.wager * payoutMultiplier(bet.category);
}

function pick(value: number, labels: [string, string]): string {
  if (value === 0) return labels[0];
  if (value === 1) return labels[1];
  return 'INVALID';
}

export function describeCategory(category: BetCategory): string {
  switch (category.kind) {
    case 'straight':
      return `Straight(${category.number})`;
    case 'split':
      return `Split(${category.numbers.join(', ')})`;
    case 'street':
      return `Street(${category.numbers.join(', ')})`;
    case 'basket':
      return `Basket(${category.numbers.join(', ')})`;
    case 'topline':
      return `Topline(${category.numbers.join(', ')})`;
    case 'corner':
      return `Corner(${category.numbers.join(', ')})`;
    case 'doubleLine':
      return `DoubleLine(${category.numbers.join(', ')})`;
    case 'dozens':
      return `Dozens(${category.group})`;
    case 'columns':
      return `Columns(${category.column})`;
    case 'evenOdd':
      return `EvenOdd(${pick(category.value, ['even', 'odd'])})`;
    case 'highLow':
      return `HighLow(${pick(category.value, ['1-18', '19-36'])})`;
    case 'redBlack':
      return `RedBlack(${pick(category.value, ['red', 'black'])})`;
    default: {
      const unhandled: never = category;
      throw new Error(`Unhandled bet category: ${JSON.stringify(unhandled)}`);
    }
  }
}

export function describeBet(bet: Bet): string {
  return `type: ${describeCategory(bet.category)}, wager: ${bet.wager}`;
}
