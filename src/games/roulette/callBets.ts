import { createBet } from './bet.js';
import type { Bet } from './types.js';

// Announced bets on sections of the wheel, expanded into table bets of `unit` each.

export function voisinsDuZero(unit: number): Bet[] {
  return [
    createBet({ kind: 'basket', numbers: [0, 2, 3] }, unit * 2),
    createBet({ kind: 'split', numbers: [4, 7] }, unit),
    createBet({ kind: 'split', numbers: [12, 15] }, unit),
    createBet({ kind: 'split', numbers: [18, 21] }, unit),
    createBet({ kind: 'split', numbers: [19, 22] }, unit),
    createBet({ kind: 'split', numbers: [32, 35] }, unit),
    createBet({ kind: 'corner', numbers: [25, 26, 28, 29] }, unit * 2),
  ];
}

export function jeuZero(unit: number): Bet[] {
  return [
    createBet({ kind: 'split', numbers: [0, 3] }, unit),
    createBet({ kind: 'split', numbers: [12, 15] }, unit),
    createBet({ kind: 'straight', number: 26 }, unit),
    createBet({ kind: 'split', numbers: [32, 35] }, unit),
  ];
}

export const CALL_BETS = {
  voisins: voisinsDuZero,
  zero: jeuZero,
} as const;

export type CallBetName = keyof typeof CALL_BETS;

export function isCallBetName(name: string): name is CallBetName {
  return Object.prototype.hasOwnProperty.call(CALL_BETS, name);
}
