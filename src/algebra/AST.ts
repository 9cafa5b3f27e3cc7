/**
 * Expression tree for the single-variable algebra core.
 *
 * Nodes are plain immutable records discriminated by `kind`. Every algorithm
 * switches over `kind` without a default branch, so a new kind fails to
 * compile until each of them handles it.
 */

/**
 * Transcendental functions, in canonical order
 */
export const FUNCTION_NAMES = ['ln', 'sin', 'cos', 'arcsin', 'arccos', 'arctan'] as const;

export type FunctionName = typeof FUNCTION_NAMES[number];

/**
 * Expression types
 */
export type Expression =
  | Constant
  | Variable
  | Sum
  | Product
  | Negation
  | Power
  | FunctionCall;

export type ExpressionKind = Expression['kind'];

/**
 * Integer literal. `value` is always a safe integer.
 */
export interface Constant {
  readonly kind: 'const';
  readonly value: number;
}

/**
 * The free variable
 */
export interface Variable {
  readonly kind: 'var';
}

/**
 * N-ary addition
 */
export interface Sum {
  readonly kind: 'sum';
  readonly terms: readonly Expression[];
}

/**
 * N-ary multiplication
 */
export interface Product {
  readonly kind: 'product';
  readonly factors: readonly Expression[];
}

export interface Negation {
  readonly kind: 'neg';
  readonly operand: Expression;
}

/**
 * base^exponent
 */
export interface Power {
  readonly kind: 'pow';
  readonly base: Expression;
  readonly exponent: Expression;
}

/**
 * Transcendental function applied to one argument (e.g. sin(x), ln(x))
 */
export interface FunctionCall {
  readonly kind: 'call';
  readonly name: FunctionName;
  readonly arg: Expression;
}
