/**
 * Canonical total order over expressions.
 *
 * The order carries no algebraic meaning; it only makes Sum and Product
 * children sortable so that simplified trees compare structurally.
 */

import { FUNCTION_NAMES, type Expression, type ExpressionKind } from './AST.js';

const KIND_RANK: Record<Exclude<ExpressionKind, 'call'>, number> = {
  const: 0,
  var: 1,
  sum: 2,
  product: 3,
  neg: 4,
  pow: 5
};

/**
 * Rank of a node: kinds in declaration order, then each function name
 */
export function rankOf(expr: Expression): number {
  if (expr.kind === 'call') {
    return KIND_RANK.pow + 1 + FUNCTION_NAMES.indexOf(expr.name);
  }
  return KIND_RANK[expr.kind];
}

function compareSequences(a: readonly Expression[], b: readonly Expression[]): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const order = compareExpressions(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

/**
 * Negative when a sorts before b, zero when structurally equal
 */
export function compareExpressions(a: Expression, b: Expression): number {
  const rank = rankOf(a) - rankOf(b);
  if (rank !== 0) {
    return Math.sign(rank);
  }

  switch (a.kind) {
    case 'const':
      return b.kind === 'const' ? Math.sign(a.value - b.value) : 0;
    case 'var':
      return 0;
    case 'sum':
      return b.kind === 'sum' ? Math.sign(compareSequences(a.terms, b.terms)) : 0;
    case 'product':
      return b.kind === 'product' ? Math.sign(compareSequences(a.factors, b.factors)) : 0;
    case 'neg':
      return b.kind === 'neg' ? compareExpressions(a.operand, b.operand) : 0;
    case 'pow':
      if (b.kind !== 'pow') return 0;
      return compareExpressions(a.base, b.base) || compareExpressions(a.exponent, b.exponent);
    case 'call':
      return b.kind === 'call' ? compareExpressions(a.arg, b.arg) : 0;
  }
}

/**
 * Check if two expressions are structurally equal
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  return compareExpressions(a, b) === 0;
}

/**
 * Sorted copy in canonical order
 */
export function sortExpressions(list: readonly Expression[]): Expression[] {
  return [...list].sort(compareExpressions);
}

/**
 * Check if a sequence is non-decreasing in canonical order
 */
export function isSorted(list: readonly Expression[]): boolean {
  for (let i = 1; i < list.length; i++) {
    if (compareExpressions(list[i - 1], list[i]) > 0) return false;
  }
  return true;
}
