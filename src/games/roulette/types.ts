import type { Color } from './layout.js';

export type BetCategory =
  | { kind: 'straight'; number: number }
  | { kind: 'split'; numbers: readonly [number, number] }
  | { kind: 'street'; numbers: readonly [number, number, number] }
  | { kind: 'basket'; numbers: readonly [number, number, number] } // 0-1-2 or 0-2-3
  | { kind: 'topline'; numbers: readonly [number, number, number, number] } // 0-1-2-3
  | { kind: 'corner'; numbers: readonly [number, number, number, number] }
  | { kind: 'doubleLine'; numbers: readonly [number, number, number, number, number, number] }
  | { kind: 'dozens'; group: number } // 1 for 1-12, 2 for 13-24, 3 for 25-36
  | { kind: 'columns'; column: number } // lowest number of the column: 1, 2 or 3
  | { kind: 'evenOdd'; value: number } // 0 even, 1 odd
  | { kind: 'highLow'; value: number } // 0 for 1-18, 1 for 19-36
  | { kind: 'redBlack'; value: number }; // 0 red, 1 black

export type BetKind = BetCategory['kind'];

export type CategoryOf<K extends BetKind> = Extract<BetCategory, { kind: K }>;

export interface Bet {
  readonly category: BetCategory;
  readonly wager: number; // smallest currency unit
}

export interface BetResult {
  readonly bet: Bet;
  readonly payout: number; // 0 or wager * multiplier
}

export type ValidationError =
  | { kind: 'InvalidGeometry'; bet: Bet }
  | { kind: 'InvalidWager'; bet: Bet }
  | { kind: 'BelowMinimum'; bet: Bet; minimum: number }
  | { kind: 'AboveMaximum'; bet: Bet; maximum: number };

export type SpinOutcome =
  | {
      ok: true;
      number: number; // 0-36
      color: Color;
      payout: number; // total payout
      results: BetResult[];
    }
  | { ok: false; errors: ValidationError[] };
