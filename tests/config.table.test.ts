import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadTableConfig, parseTableConfig, resetTableConfigCache } from '../src/config/index.js';

describe('table config', () => {
  let dir: string;

  beforeEach(() => {
    delete process.env.ROULETTE_MIN_BET;
    delete process.env.ROULETTE_MAX_BET;
    resetTableConfigCache();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roulette-cfg-'));
  });

  afterEach(() => {
    delete process.env.ROULETTE_MIN_BET;
    delete process.env.ROULETTE_MAX_BET;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('defaults', () => {
    expect(parseTableConfig({})).toEqual({ min_bet: 1, max_bet: null, min_bet_multipliers: {} });
  });

  test('file values', () => {
    expect(parseTableConfig({ min_bet: 5, max_bet: 500, min_bet_multipliers: { straight: 2 } })).toEqual({
      min_bet: 5,
      max_bet: 500,
      min_bet_multipliers: { straight: 2 },
    });
  });

  test('env overrides the file', () => {
    process.env.ROULETTE_MIN_BET = '10';
    process.env.ROULETTE_MAX_BET = '1000';
    expect(parseTableConfig({ min_bet: 5 })).toEqual({ min_bet: 10, max_bet: 1000, min_bet_multipliers: {} });
  });

  test('rejects bad values', () => {
    expect(() => parseTableConfig({ min_bet: 0 })).toThrow(/^Invalid table config: min_bet: /);
    expect(() => parseTableConfig({ min_bet: 10, max_bet: 5 })).toThrow(
      'Invalid table config: (root): max_bet must not be below min_bet',
    );
    expect(() => parseTableConfig({ tables: 3 })).toThrow(/^Invalid table config: /);
    expect(() => parseTableConfig({ min_bet_multipliers: { snake: 2 } })).toThrow(/^Invalid table config: /);
    process.env.ROULETTE_MIN_BET = 'abc';
    expect(() => parseTableConfig({})).toThrow('ROULETTE_MIN_BET must be an integer, got "abc"');
  });

  test('loads and caches the file', () => {
    const file = path.join(dir, 'table.json');
    fs.writeFileSync(file, JSON.stringify({ min_bet: 2 }));
    expect(loadTableConfig(file).min_bet).toBe(2);
    fs.writeFileSync(file, JSON.stringify({ min_bet: 3 }));
    expect(loadTableConfig(file).min_bet).toBe(2);
    resetTableConfigCache();
    expect(loadTableConfig(file).min_bet).toBe(3);
  });

  test('each file is cached on its own', () => {
    const low = path.join(dir, 'low.json');
    const high = path.join(dir, 'high.json');
    fs.writeFileSync(low, JSON.stringify({ min_bet: 2 }));
    fs.writeFileSync(high, JSON.stringify({ min_bet: 50, max_bet: 5000 }));
    expect(loadTableConfig(low).min_bet).toBe(2);
    expect(loadTableConfig(high)).toEqual({ min_bet: 50, max_bet: 5000, min_bet_multipliers: {} });
    expect(loadTableConfig(low).min_bet).toBe(2);
  });

  test('missing file means defaults', () => {
    expect(loadTableConfig(path.join(dir, 'nope.json'))).toEqual({ min_bet: 1, max_bet: null, min_bet_multipliers: {} });
  });
});
