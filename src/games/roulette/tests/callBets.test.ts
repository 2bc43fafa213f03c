import { describe, test, expect } from '@jest/globals';
import { stakeOf } from '../bet.js';
import { CALL_BETS, isCallBetName, jeuZero, voisinsDuZero } from '../callBets.js';
import { evaluate, totalPayout } from '../evaluator.js';
import { isLegal } from '../geometry.js';
import { colorOf } from '../layout.js';

const VOISINS = [0, 2, 3, 4, 7, 12, 15, 18, 19, 21, 22, 25, 26, 28, 29, 32, 35];

describe('call bets', () => {
  test('voisins du zero is nine units of legal bets', () => {
    const bets = voisinsDuZero(5);
    expect(bets.every((b) => isLegal(b.category))).toBe(true);
    expect(stakeOf(bets)).toBe(45);
  });

  test('voisins pays on its seventeen numbers only', () => {
    const bets = voisinsDuZero(1);
    for (let n = 0; n <= 36; n++) {
      const paid = totalPayout(evaluate(n, colorOf(n), bets));
      expect(paid > 0).toBe(VOISINS.includes(n));
    }
    expect(totalPayout(evaluate(0, 'green', bets))).toBe(24); // basket, two units
    expect(totalPayout(evaluate(26, colorOf(26), bets))).toBe(18); // corner, two units
  });

  test('jeu zero', () => {
    const bets = jeuZero(10);
    expect(bets.every((b) => isLegal(b.category))).toBe(true);
    expect(stakeOf(bets)).toBe(40);
    expect(totalPayout(evaluate(26, colorOf(26), bets))).toBe(360);
    expect(totalPayout(evaluate(15, colorOf(15), bets))).toBe(180);
    expect(totalPayout(evaluate(1, colorOf(1), bets))).toBe(0);
  });

  test('lookup by name', () => {
    expect(isCallBetName('voisins')).toBe(true);
    expect(isCallBetName('zero')).toBe(true);
    expect(isCallBetName('tiers')).toBe(false);
    expect(isCallBetName('toString')).toBe(false);
    expect(CALL_BETS.zero(1)).toHaveLength(4);
  });
});
