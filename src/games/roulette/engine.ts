import { log } from '../../cli/logger.js';
import type { ScopedLogger } from '../../cli/logger.js';
import { cryptoRNG } from '../../util/rng.js';
import type { RNG } from '../../util/rng.js';
import { describeCategory, winValue } from './bet.js';
import { evaluate, totalPayout } from './evaluator.js';
import { isLegal } from './geometry.js';
import { colorOf, isTableNumber, POCKETS } from './layout.js';
import type { Bet, BetCategory, BetKind, SpinOutcome, ValidationError } from './types.js';

export type MinBetMultipliers = Readonly<Record<BetKind, number>>;

// Uniform today; kept per category so tables can price inside bets differently.
export const DEFAULT_MIN_BET_MULTIPLIERS: MinBetMultipliers = {
  straight: 1,
  split: 1,
  street: 1,
  basket: 1,
  topline: 1,
  corner: 1,
  doubleLine: 1,
  dozens: 1,
  columns: 1,
  evenOdd: 1,
  highLow: 1,
  redBlack: 1,
};

export interface EngineOptions {
  minBet?: number; // global floor, default 1
  maxBet?: number; // per-bet ceiling, none when omitted
  minBetMultipliers?: Partial<Record<BetKind, number>>;
  rng?: RNG;
  logger?: ScopedLogger;
}

function assertPositiveInt(name: string, v: number) {
  if (!Number.isSafeInteger(v) || v < 1) throw new Error(`${name} must be a positive integer, got ${v}`);
}

/**
 * One roulette table. Owns its bet-size policy and the history of winning
 * numbers; use one instance per table.
 */
export class RouletteEngine {
  private minBet: number;
  private readonly maxBet: number | undefined;
  private readonly multipliers: MinBetMultipliers;
  private readonly rng: RNG;
  private readonly log: ScopedLogger;
  private readonly spins: number[] = [];

  constructor(opts: EngineOptions = {}) {
    this.minBet = opts.minBet ?? 1;
    assertPositiveInt('minBet', this.minBet);
    if (opts.maxBet !== undefined) {
      assertPositiveInt('maxBet', opts.maxBet);
      if (opts.maxBet < this.minBet) throw new Error(`maxBet (${opts.maxBet}) is below minBet (${this.minBet})`);
    }
    this.maxBet = opts.maxBet;
    const multipliers = { ...DEFAULT_MIN_BET_MULTIPLIERS, ...opts.minBetMultipliers };
    for (const [kind, m] of Object.entries(multipliers)) assertPositiveInt(`minBetMultipliers.${kind}`, m);
    this.multipliers = multipliers;
    this.rng = opts.rng ?? cryptoRNG;
    this.log = opts.logger ?? log.withScope('roulette');
  }

  get history(): readonly number[] {
    return [...this.spins];
  }

  get minimumBet(): number {
    return this.minBet;
  }

  get maximumBet(): number | undefined {
    return this.maxBet;
  }

  setMinBet(floor: number): void {
    assertPositiveInt('minBet', floor);
    if (this.maxBet !== undefined && floor > this.maxBet) {
      throw new Error(`minBet (${floor}) is above maxBet (${this.maxBet})`);
    }
    this.minBet = floor;
  }

  minimumFor(category: BetCategory): number {
    return this.minBet * this.multipliers[category.kind];
  }

  /**
   * All problems in the bet slate, at most one per bet, in bet order. A wager
   * whose win, or whose addition to the slate's combined win, leaves the safe
   * integer range counts as an invalid wager.
   */
  validate(bets: readonly Bet[]): ValidationError[] {
    const errors: ValidationError[] = [];
    let exposure = 0;
    for (const bet of bets) {
      if (!isLegal(bet.category)) {
        errors.push({ kind: 'InvalidGeometry', bet });
        continue;
      }
      if (!Number.isSafeInteger(bet.wager) || bet.wager <= 0 || !Number.isSafeInteger(exposure + winValue(bet))) {
        errors.push({ kind: 'InvalidWager', bet });
        continue;
      }
      exposure += winValue(bet);
      const minimum = this.minimumFor(bet.category);
      if (bet.wager < minimum) {
        errors.push({ kind: 'BelowMinimum', bet, minimum });
        continue;
      }
      if (this.maxBet !== undefined && bet.wager > this.maxBet) {
        errors.push({ kind: 'AboveMaximum', bet, maximum: this.maxBet });
      }
    }
    return errors;
  }

  /**
   * Validates the whole slate, then draws and pays. A refused slate leaves
   * the table untouched: no draw, no history entry.
   */
  spin(bets: readonly Bet[]): SpinOutcome {
    const errors = this.validate(bets);
    if (errors.length > 0) {
      this.log.debug('bets refused', {
        errors: errors.map((e) => ({ kind: e.kind, bet: describeCategory(e.bet.category) })),
      });
      return { ok: false, errors };
    }

    const number = this.rng(POCKETS); // 0..36
    if (!isTableNumber(number)) throw new Error(`RNG produced ${number}, expected 0..${POCKETS - 1}`);
    this.spins.push(number);
    const color = colorOf(number);
    const results = evaluate(number, color, bets);
    const payout = totalPayout(results);
    this.log.debug('spin', { number, color, bets: bets.length, payout });
    return { ok: true, number, color, payout, results };
  }
}
