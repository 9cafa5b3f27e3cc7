/**
 * symbolic-calculus - single-variable symbolic algebra
 *
 * Build expression trees, reduce them to canonical form, differentiate them
 * and print them as LaTeX.
 */

// Core API
export { simplify, DEFAULT_MAX_ITERATIONS, type SimplifyOptions } from './algebra/Simplify.js';
export { differentiate, type DifferentiateOptions } from './algebra/Differentiation.js';
export { toLatex, type LatexOptions } from './algebra/Latex.js';

// Construction
export {
  constant,
  variable,
  toExpression,
  sum,
  product,
  add,
  sub,
  mul,
  div,
  neg,
  pow,
  recip,
  ln,
  sin,
  cos,
  arcsin,
  arccos,
  arctan,
  type Operand
} from './algebra/Builders.js';

// Canonical order
export {
  compareExpressions,
  expressionsEqual,
  sortExpressions,
  isSorted,
  rankOf
} from './algebra/Ordering.js';

// Utilities
export {
  childrenOf,
  cloneExpression,
  expressionDepth,
  assertDepth,
  formatExpression,
  DEFAULT_MAX_DEPTH
} from './algebra/ExpressionUtils.js';

// AST types
export { FUNCTION_NAMES } from './algebra/AST.js';
export type {
  Expression,
  ExpressionKind,
  Constant,
  Variable,
  Sum,
  Product,
  Negation,
  Power,
  FunctionCall,
  FunctionName
} from './algebra/AST.js';

// Errors
export {
  ArithmeticOverflowError,
  InvalidConstantError,
  ExpressionDepthError,
  InvariantError
} from './algebra/Errors.js';
