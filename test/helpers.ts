/**
 * Test helper utilities shared by the algebra specs
 */

import type { Expression } from '../src/algebra/AST.js';
import {
  variable,
  constant,
  sum,
  add,
  sub,
  mul,
  div,
  neg,
  pow,
  recip,
  ln,
  sin,
  arcsin,
  arccos,
  arctan
} from '../src/algebra/Builders.js';
import { differentiate } from '../src/algebra/Differentiation.js';
import { simplify } from '../src/algebra/Simplify.js';
import { toLatex } from '../src/algebra/Latex.js';
import { isSorted } from '../src/algebra/Ordering.js';
import { childrenOf } from '../src/algebra/ExpressionUtils.js';

export const x = variable();

/**
 * Fixed set of expressions covering every kind and every rewrite family
 */
export function corpus(): Expression[] {
  return [
    constant(7),
    x,
    add(add(x, 3), 2),
    div(add(x, mul(x, 5)), x),
    sub(mul(2, x), mul(3, pow(x, 2))),
    mul(mul(x, x), recip(x)),
    neg(add(x, neg(sin(x)))),
    pow(add(1, x), sub(x, 1)),
    mul(add(1, x), add(x, 1)),
    arctan(pow(x, 2)),
    div(6, mul(2, x)),
    ln(mul(x, pow(x, -1))),
    sum([sum([x, 1]), neg(sum([x, 1]))]),
    pow(mul(-3, x), -1),
    mul(-1, add(x, 2)),
    mul(pow(x, sin(x)), x),
    mul(pow(x, sin(x)), pow(x, neg(sin(x)))),
    differentiate(arcsin(x)),
    differentiate(arccos(mul(2, x))),
    differentiate(pow(x, x)),
    differentiate(mul(x, sin(x))),
    differentiate(ln(pow(x, 2)))
  ];
}

/**
 * Check that every Sum and Product in the tree has sorted children
 */
export function isCanonicallySorted(expr: Expression): boolean {
  const children = childrenOf(expr);
  if ((expr.kind === 'sum' || expr.kind === 'product') && !isSorted(children)) {
    return false;
  }
  return children.every(isCanonicallySorted);
}

/**
 * Simplify, then render
 *
 * @example
 * expect(simplifiedLatex(add(x, x))).toBe('2x');
 */
export function simplifiedLatex(expr: Expression, fractions = false): string {
  return toLatex(simplify(expr), { fractions });
}

/**
 * A chain of `depth` nested sin calls around x
 */
export function nestedSin(depth: number): Expression {
  let expr: Expression = x;
  for (let i = 1; i < depth; i++) {
    expr = sin(expr);
  }
  return expr;
}
