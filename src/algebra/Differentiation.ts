/**
 * Symbolic differentiation with respect to the free variable.
 * Returns a new, unsimplified tree; pass it through `simplify` before use.
 */

import type { Expression, FunctionCall, Power } from './AST.js';
import {
  constant,
  add,
  mul,
  neg,
  sub,
  pow,
  recip,
  ln,
  sin,
  cos
} from './Builders.js';
import { checkedSub } from './Integer.js';
import { assertDepth, cloneExpression, DEFAULT_MAX_DEPTH } from './ExpressionUtils.js';

/**
 * Options for differentiation
 */
export interface DifferentiateOptions {
  maxDepth?: number;    // Default: DEFAULT_MAX_DEPTH
}

function derivative(expr: Expression): Expression {
  switch (expr.kind) {
    case 'const':
      // d/dx(c) = 0
      return constant(0);

    case 'var':
      // d/dx(x) = 1
      return constant(1);

    case 'sum':
      // d/dx(u + v) = du/dx + dv/dx
      return { kind: 'sum', terms: expr.terms.map(derivative) };

    case 'neg':
      // d/dx(-u) = -du/dx
      return { kind: 'neg', operand: derivative(expr.operand) };

    case 'product':
      return differentiateProduct(expr.factors);

    case 'pow':
      return differentiatePower(expr);

    case 'call':
      return differentiateCall(expr);
  }
}

/**
 * Product rule on head and tail: (a * b)' = a * b' + b * a'.
 * The tail recurses until it is a single factor.
 */
function differentiateProduct(factors: readonly Expression[]): Expression {
  const [head, ...tail] = factors;
  if (head === undefined) {
    return constant(0);
  }

  const [second] = tail;
  if (second === undefined) {
    return derivative(head);
  }

  const rest: Expression = tail.length === 1 ? second : { kind: 'product', factors: tail };

  return add(
    mul(cloneExpression(head), derivative(rest)),
    mul(cloneExpression(rest), derivative(head))
  );
}

function differentiatePower(expr: Power): Expression {
  const { base, exponent } = expr;

  if (exponent.kind === 'const') {
    // d/dx(u^0) = 0
    if (exponent.value === 0) return constant(0);
    // d/dx(u^1) = du/dx
    if (exponent.value === 1) return derivative(base);

    // d/dx(u^c) = c * u^(c-1) * du/dx
    return mul(
      mul(constant(exponent.value), pow(cloneExpression(base), constant(checkedSub(exponent.value, 1)))),
      derivative(base)
    );
  }

  // u^v = e^(ln(u) * v), so d/dx(u^v) = u^v * d/dx(ln(u) * v)
  return mul(
    cloneExpression(expr),
    derivative(mul(ln(cloneExpression(base)), cloneExpression(exponent)))
  );
}

/**
 * (1 - u^2)^(-1/2)
 */
function inverseSquareRootTerm(arg: Expression): Expression {
  return pow(
    sub(1, pow(cloneExpression(arg), 2)),
    neg(recip(2))
  );
}

function differentiateCall(expr: FunctionCall): Expression {
  const arg = expr.arg;
  const darg = derivative(arg);

  // Chain rule: du/dx * f'(u)
  switch (expr.name) {
    case 'ln':
      // d/dx(ln(u)) = du/dx * u^-1
      return mul(darg, pow(cloneExpression(arg), -1));

    case 'sin':
      // d/dx(sin(u)) = du/dx * cos(u)
      return mul(darg, cos(cloneExpression(arg)));

    case 'cos':
      // d/dx(cos(u)) = du/dx * -sin(u)
      return mul(darg, neg(sin(cloneExpression(arg))));

    case 'arcsin':
      // d/dx(arcsin(u)) = du/dx * (1 - u^2)^(-1/2)
      return mul(darg, inverseSquareRootTerm(arg));

    case 'arccos':
      // d/dx(arccos(u)) = -(du/dx * (1 - u^2)^(-1/2))
      return neg(mul(darg, inverseSquareRootTerm(arg)));

    case 'arctan':
      // d/dx(arctan(u)) = du/dx * (1 + u^2)^-1
      return mul(darg, pow(add(1, pow(cloneExpression(arg), 2)), -1));
  }
}

/**
 * Differentiate an expression with respect to the free variable
 */
export function differentiate(expr: Expression, options: DifferentiateOptions = {}): Expression {
  const { maxDepth = DEFAULT_MAX_DEPTH } = options;
  assertDepth(expr, maxDepth);
  return derivative(expr);
}
