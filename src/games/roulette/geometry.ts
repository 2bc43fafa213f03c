import { isRightColumn, isTableNumber, MAX_NUMBER } from './layout.js';
import type { BetCategory } from './types.js';

/*
 * Table layout, 1-based:
 *
 *        0
 *    1   2   3
 *    4   5   6
 *   ...
 *   34  35  36
 *
 * Each line of three is a street; columns run down (1,4,7.. / 2,5,8.. / 3,6,9..).
 * All checks are arithmetic on the raw numbers. Numbers must be listed in
 * ascending order.
 */

function numbersOk(nums: readonly number[], arity: number): boolean {
  return Array.isArray(nums) && nums.length === arity && nums.every(isTableNumber);
}

function selectorIn(v: number, lo: number, hi: number): boolean {
  return Number.isInteger(v) && v >= lo && v <= hi;
}

function isLegalSplit(a: number, b: number): boolean {
  if (b <= a) return false;
  if (a === 0) return b >= 1 && b <= 3;
  // horizontal: neighbours on one street, 34-35 and 35-36 included
  if (b - a === 1) return !isRightColumn(a);
  // vertical: same column, next street. 33-36 is not offered.
  if (b - a === 3) return b <= MAX_NUMBER && !(a === 33 && b === 36);
  return false;
}

function isStreetStart(n: number): boolean {
  return n >= 1 && n <= 34 && (n - 1) % 3 === 0;
}

function isLegalStreet(v: readonly number[]): boolean {
  return isStreetStart(v[0]) && v[1] === v[0] + 1 && v[2] === v[1] + 1;
}

function isLegalCorner(v: readonly number[]): boolean {
  const n = v[0];
  return (
    n >= 1 &&
    !isRightColumn(n) &&
    v[1] === n + 1 &&
    v[2] === n + 3 &&
    v[3] === n + 4 &&
    v[3] <= MAX_NUMBER
  );
}

/**
 * Whether a bet category is a placeable position on the table. Pure and
 * total: malformed input yields `false`, never an exception. Wagers are not
 * looked at.
 */
export function isLegal(category: BetCategory): boolean {
  switch (category.kind) {
    case 'straight':
      return isTableNumber(category.number);
    case 'split': {
      const v = category.numbers;
      return numbersOk(v, 2) && isLegalSplit(v[0], v[1]);
    }
    case 'street':
      return numbersOk(category.numbers, 3) && isLegalStreet(category.numbers);
    case 'basket': {
      const v = category.numbers;
      return numbersOk(v, 3) && v[0] === 0 && ((v[1] === 1 && v[2] === 2) || (v[1] === 2 && v[2] === 3));
    }
    case 'topline': {
      const v = category.numbers;
      return numbersOk(v, 4) && v[0] === 0 && v[1] === 1 && v[2] === 2 && v[3] === 3;
    }
    case 'corner':
      return numbersOk(category.numbers, 4) && isLegalCorner(category.numbers);
    case 'doubleLine': {
      const v = category.numbers;
      if (!numbersOk(v, 6)) return false;
      const first = v.slice(0, 3);
      const second = v.slice(3, 6);
      return isLegalStreet(first) && isLegalStreet(second) && second[0] === first[2] + 1;
    }
    case 'dozens':
      return selectorIn(category.group, 1, 3);
    case 'columns':
      return selectorIn(category.column, 1, 3);
    case 'evenOdd':
    case 'highLow':
    case 'redBlack':
      return selectorIn(category.value, 0, 1);
    default: {
      const unhandled: never = category;
      void unhandled;
      return false;
    }
  }
}
