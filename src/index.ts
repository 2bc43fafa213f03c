#!/usr/bin/env node
// Must stay first: logger and ui read LOG_LEVEL, LOG_FILE and CLI_THEME when they load.
import 'dotenv/config';
import prettyMs from 'pretty-ms';
import { loadTableConfig } from './config/index.js';
import { log } from './cli/logger.js';
import { ui } from './cli/ui.js';
import { runSession } from './cli/session.js';
import type { RoundReport } from './cli/session.js';
import { RouletteEngine } from './games/roulette/engine.js';
import { createBet, describeBet } from './games/roulette/bet.js';
import { formatValidationError } from './games/roulette/errors.js';
import { CALL_BETS, isCallBetName } from './games/roulette/callBets.js';
import type { Bet } from './games/roulette/types.js';
import { cryptoRNG, seededRNG } from './util/rng.js';

const DEFAULT_SLATE: Bet[] = [
  createBet({ kind: 'straight', number: 11 }, 100),
  createBet({ kind: 'split', numbers: [10, 11] }, 100),
  createBet({ kind: 'corner', numbers: [7, 8, 10, 11] }, 100),
  createBet({ kind: 'corner', numbers: [8, 9, 11, 12] }, 100),
  createBet({ kind: 'corner', numbers: [10, 11, 13, 14] }, 100),
  createBet({ kind: 'corner', numbers: [11, 12, 14, 15] }, 100),
  createBet({ kind: 'columns', column: 2 }, 300),
  createBet({ kind: 'basket', numbers: [0, 1, 2] }, 100),
  createBet({ kind: 'dozens', group: 1 }, 100),
  createBet({ kind: 'evenOdd', value: 0 }, 100),
  createBet({ kind: 'highLow', value: 1 }, 100),
  createBet({ kind: 'redBlack', value: 1 }, 100),
  createBet({ kind: 'doubleLine', numbers: [25, 26, 27, 28, 29, 30] }, 100),
];

function argValue(name: string): string | undefined {
  const prefix = `--${name}=`;
  const hit = process.argv.find((a) => a.startsWith(prefix));
  return hit ? hit.slice(prefix.length) : undefined;
}

function intArg(name: string): number | undefined {
  const raw = argValue(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < 0) throw new Error(`--${name} expects a non-negative integer, got "${raw}"`);
  return n;
}

function slateFromArgs(): Bet[] {
  const call = argValue('call');
  if (call === undefined) return DEFAULT_SLATE;
  if (!isCallBetName(call)) throw new Error(`--call must be one of ${Object.keys(CALL_BETS).join(', ')}`);
  const unit = intArg('unit') ?? 100;
  return CALL_BETS[call](unit);
}

function printRound(r: RoundReport) {
  const { outcome } = r;
  if (!outcome.ok) {
    ui.say(`Round ${r.round}: bets refused`, 'error');
    for (const e of outcome.errors) ui.say(`- ${formatValidationError(e)}`, 'error');
    return;
  }
  ui.say(`Round ${r.round}: ball dropped on ${ui.pocket(outcome.number, outcome.color)}`, 'plain');
  ui.table(
    outcome.results.map((res, i) => ({ '#': i, bet: describeBet(res.bet), wins: res.payout })),
  );
  ui.say(`staked ${r.staked}, paid ${outcome.payout}, balance ${r.balance}`, 'dim');
}

function main() {
  const started = Date.now();
  const table = loadTableConfig();
  const seed = intArg('seed');
  const engine = new RouletteEngine({
    minBet: table.min_bet,
    maxBet: table.max_bet ?? undefined,
    minBetMultipliers: table.min_bet_multipliers,
    rng: seed === undefined ? cryptoRNG : seededRNG(seed),
  });
  const bets = slateFromArgs();
  const balance = intArg('balance') ?? 10_000;
  const maxRounds = intArg('rounds');

  ui.banner('Roulette table', [
    `min bet ${engine.minimumBet}${engine.maximumBet !== undefined ? `, max bet ${engine.maximumBet}` : ''}`,
    `balance ${balance}, ${bets.length} bets per round`,
    seed === undefined ? 'random draws' : `seed ${seed}`,
  ]);

  const summary = runSession({ engine, bets, balance, maxRounds, onRound: printRound });

  const reason = {
    'insufficient-balance': 'not enough balance to place the bets',
    'round-limit': 'round limit reached',
    refused: 'the table refused the bets',
  }[summary.stoppedBecause];
  ui.say(`Stopped after ${summary.rounds} rounds: ${reason}`, summary.stoppedBecause === 'refused' ? 'warn' : 'info');
  ui.say(`Final balance ${summary.finalBalance}, highest ${summary.highestBalance}`, 'success');
  log.withScope('session').info(`session finished in ${prettyMs(Date.now() - started)}`, {
    rounds: summary.rounds,
    finalBalance: summary.finalBalance,
    history: engine.history.slice(-20),
  });
  if (summary.stoppedBecause === 'refused') process.exitCode = 1;
}

try {
  main();
} catch (e: unknown) {
  const err = e instanceof Error ? e : new Error(String(e));
  log.error(err.message, 'boot', { stack: err.stack });
  process.exitCode = 1;
}
