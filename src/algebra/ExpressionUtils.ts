/**
 * Shared utility functions for expression manipulation
 * Used by: Simplify, Differentiation, Latex
 */

import type { Expression } from './AST.js';
import { ExpressionDepthError } from './Errors.js';

/**
 * Default recursion limit for every tree walk
 */
export const DEFAULT_MAX_DEPTH = 2048;

/**
 * Direct children of a node, in order
 */
export function childrenOf(expr: Expression): readonly Expression[] {
  switch (expr.kind) {
    case 'const':
    case 'var':
      return [];
    case 'sum':
      return expr.terms;
    case 'product':
      return expr.factors;
    case 'neg':
      return [expr.operand];
    case 'pow':
      return [expr.base, expr.exponent];
    case 'call':
      return [expr.arg];
  }
}

/**
 * Deep copy of an expression
 */
export function cloneExpression(expr: Expression): Expression {
  switch (expr.kind) {
    case 'const':
      return { kind: 'const', value: expr.value };
    case 'var':
      return { kind: 'var' };
    case 'sum':
      return { kind: 'sum', terms: expr.terms.map(cloneExpression) };
    case 'product':
      return { kind: 'product', factors: expr.factors.map(cloneExpression) };
    case 'neg':
      return { kind: 'neg', operand: cloneExpression(expr.operand) };
    case 'pow':
      return { kind: 'pow', base: cloneExpression(expr.base), exponent: cloneExpression(expr.exponent) };
    case 'call':
      return { kind: 'call', name: expr.name, arg: cloneExpression(expr.arg) };
  }
}

/**
 * Number of nodes on the longest root-to-leaf path.
 * Iterative, so it is safe on trees too deep to recurse over.
 */
export function expressionDepth(expr: Expression): number {
  let deepest = 0;
  const stack: Array<[Expression, number]> = [[expr, 1]];

  for (let entry = stack.pop(); entry !== undefined; entry = stack.pop()) {
    const [node, depth] = entry;
    deepest = Math.max(deepest, depth);
    for (const child of childrenOf(node)) {
      stack.push([child, depth + 1]);
    }
  }

  return deepest;
}

/**
 * Throw before a recursive walk would go deeper than `limit`
 */
export function assertDepth(expr: Expression, limit: number): void {
  const depth = expressionDepth(expr);
  if (depth > limit) {
    throw new ExpressionDepthError(depth, limit);
  }
}

/**
 * Debug notation, e.g. `Sum(1, Neg(Pow(x, 2)))`
 */
export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'const':
      return String(expr.value);
    case 'var':
      return 'x';
    case 'sum':
      return `Sum(${expr.terms.map(formatExpression).join(', ')})`;
    case 'product':
      return `Prod(${expr.factors.map(formatExpression).join(', ')})`;
    case 'neg':
      return `Neg(${formatExpression(expr.operand)})`;
    case 'pow':
      return `Pow(${formatExpression(expr.base)}, ${formatExpression(expr.exponent)})`;
    case 'call':
      return `${expr.name}(${formatExpression(expr.arg)})`;
  }
}
