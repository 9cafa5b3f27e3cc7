/**
 * Overflow-checked integer arithmetic over safe integers.
 *
 * Doubles are exact inside the safe range, and any true result outside it
 * rounds to a value outside it, so one `Number.isSafeInteger` check per
 * operation detects every overflow.
 */

import { ArithmeticOverflowError } from './Errors.js';

function checked(operation: string, operands: number[], result: number): number {
  if (!Number.isSafeInteger(result)) {
    throw new ArithmeticOverflowError(operation, operands);
  }
  // -0 never leaves this module
  return result === 0 ? 0 : result;
}

export function checkedAdd(a: number, b: number): number {
  return checked('add', [a, b], a + b);
}

export function checkedSub(a: number, b: number): number {
  return checked('sub', [a, b], a - b);
}

export function checkedMul(a: number, b: number): number {
  return checked('mul', [a, b], a * b);
}

export function checkedNeg(a: number): number {
  return checked('neg', [a], 0 - a);
}

/**
 * base^exponent for a non-negative integer exponent
 */
export function checkedPow(base: number, exponent: number): number {
  if (exponent < 0) {
    throw new RangeError(`Negative exponent ${exponent} has no integer result`);
  }
  if (exponent === 0) return 1;
  if (base === 0 || base === 1) return base;
  if (base === -1) return exponent % 2 === 0 ? 1 : -1;

  // |base| >= 2 overflows within 53 steps
  let result = 1;
  for (let i = 0; i < exponent; i++) {
    result = checked('pow', [base, exponent], result * base);
  }
  return result;
}
