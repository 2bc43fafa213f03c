import type { RouletteEngine } from '../games/roulette/engine.js';
import type { Bet, SpinOutcome } from '../games/roulette/types.js';
import { stakeOf } from '../games/roulette/bet.js';

export interface RoundReport {
  round: number;
  staked: number;
  outcome: SpinOutcome;
  balance: number; // after payouts
}

export type StopReason = 'insufficient-balance' | 'round-limit' | 'refused';

export interface SessionSummary {
  rounds: number;
  finalBalance: number;
  highestBalance: number;
  stoppedBecause: StopReason;
}

export interface SessionOptions {
  engine: RouletteEngine;
  bets: readonly Bet[];
  balance: number;
  maxRounds?: number; // unbounded when omitted
  onRound?: (report: RoundReport) => void;
}

/**
 * Replays the same slate until the bankroll can't cover it, a round limit is
 * hit, or the table refuses the slate. Stakes leave the balance before the
 * spin and payouts come back after it.
 */
export function runSession(opts: SessionOptions): SessionSummary {
  const { engine, bets, maxRounds, onRound } = opts;
  const staked = stakeOf(bets);
  let balance = opts.balance;
  let highestBalance = balance;
  let rounds = 0;

  for (;;) {
    if (maxRounds !== undefined && rounds >= maxRounds) {
      return { rounds, finalBalance: balance, highestBalance, stoppedBecause: 'round-limit' };
    }
    if (staked > balance) {
      return { rounds, finalBalance: balance, highestBalance, stoppedBecause: 'insufficient-balance' };
    }

    const outcome = engine.spin(bets);
    rounds++;
    if (!outcome.ok) {
      onRound?.({ round: rounds, staked: 0, outcome, balance });
      return { rounds, finalBalance: balance, highestBalance, stoppedBecause: 'refused' };
    }

    balance = balance - staked + outcome.payout;
    if (balance > highestBalance) highestBalance = balance;
    onRound?.({ round: rounds, staked, outcome, balance });
  }
}
