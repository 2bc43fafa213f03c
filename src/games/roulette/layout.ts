export type Color = 'red' | 'black' | 'green';

export const MIN_NUMBER = 0;
export const MAX_NUMBER = 36;
export const POCKETS = MAX_NUMBER - MIN_NUMBER + 1; // 37, single zero

const REDS = new Set([1, 3, 5, 7, 9, 12, 14, 16, 18, 19, 21, 23, 25, 27, 30, 32, 34, 36]);

export function isTableNumber(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_NUMBER && n <= MAX_NUMBER;
}

export function colorOf(n: number): Color {
  if (n === 0) return 'green';
  return REDS.has(n) ? 'red' : 'black';
}

// Numbers 1..36 sit in a 3-wide grid: 1,4,7.. is the left column, 3,6,9.. the right.
export function isLeftColumn(n: number): boolean {
  return n >= 1 && (n - 1) % 3 === 0;
}

export function isRightColumn(n: number): boolean {
  return n >= 1 && n % 3 === 0;
}
