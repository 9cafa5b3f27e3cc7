/**
 * Algebraic constructors.
 *
 * Combining builders flatten locally: adding to a Sum appends to its terms,
 * multiplying a Product appends to its factors. They never reorder or fold;
 * canonical form is left to `simplify`.
 */

import type {
  Expression,
  Constant,
  Variable,
  Sum,
  Product,
  Power,
  FunctionCall,
  FunctionName
} from './AST.js';
import { InvalidConstantError } from './Errors.js';

/**
 * Anything a builder accepts: an expression or an integer
 */
export type Operand = Expression | number;

export function constant(value: number): Constant {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidConstantError(value);
  }
  return { kind: 'const', value: value === 0 ? 0 : value };
}

export function variable(): Variable {
  return { kind: 'var' };
}

export function toExpression(operand: Operand): Expression {
  return typeof operand === 'number' ? constant(operand) : operand;
}

/**
 * Raw n-ary sum, no flattening
 */
export function sum(terms: Operand[]): Sum {
  return { kind: 'sum', terms: terms.map(toExpression) };
}

/**
 * Raw n-ary product, no flattening
 */
export function product(factors: Operand[]): Product {
  return { kind: 'product', factors: factors.map(toExpression) };
}

/**
 * a + b, splicing the terms of either operand that is already a Sum
 */
export function add(a: Operand, b: Operand): Sum {
  const left = toExpression(a);
  const right = toExpression(b);
  return {
    kind: 'sum',
    terms: [
      ...(left.kind === 'sum' ? left.terms : [left]),
      ...(right.kind === 'sum' ? right.terms : [right])
    ]
  };
}

/**
 * a * b, splicing the factors of either operand that is already a Product
 */
export function mul(a: Operand, b: Operand): Product {
  const left = toExpression(a);
  const right = toExpression(b);
  return {
    kind: 'product',
    factors: [
      ...(left.kind === 'product' ? left.factors : [left]),
      ...(right.kind === 'product' ? right.factors : [right])
    ]
  };
}

/**
 * -a; negating a negation unwraps it
 */
export function neg(a: Operand): Expression {
  const operand = toExpression(a);
  if (operand.kind === 'neg') {
    return operand.operand;
  }
  return { kind: 'neg', operand };
}

export function sub(a: Operand, b: Operand): Sum {
  return add(a, neg(b));
}

export function pow(base: Operand, exponent: Operand): Power {
  return { kind: 'pow', base: toExpression(base), exponent: toExpression(exponent) };
}

/**
 * 1/a. The reciprocal of a^b is a^(-b).
 */
export function recip(a: Operand): Power {
  const operand = toExpression(a);
  if (operand.kind === 'pow') {
    return pow(operand.base, neg(operand.exponent));
  }
  return pow(operand, constant(-1));
}

export function div(a: Operand, b: Operand): Product {
  return mul(a, recip(b));
}

function call(name: FunctionName, arg: Operand): FunctionCall {
  return { kind: 'call', name, arg: toExpression(arg) };
}

export function ln(arg: Operand): FunctionCall {
  return call('ln', arg);
}

export function sin(arg: Operand): FunctionCall {
  return call('sin', arg);
}

export function cos(arg: Operand): FunctionCall {
  return call('cos', arg);
}

export function arcsin(arg: Operand): FunctionCall {
  return call('arcsin', arg);
}

export function arccos(arg: Operand): FunctionCall {
  return call('arccos', arg);
}

export function arctan(arg: Operand): FunctionCall {
  return call('arctan', arg);
}
