/**
 * Expression simplification to canonical form.
 *
 * Post-order rewriting: children are simplified first, then node-local rules
 * run until the node stops changing, then Sum/Product children are sorted.
 * The result is idempotent: simplify(simplify(e)) equals simplify(e).
 */

import type { Expression, FunctionName, Sum } from './AST.js';
import { constant, variable } from './Builders.js';
import { checkedAdd, checkedMul, checkedNeg, checkedPow } from './Integer.js';
import { expressionsEqual, sortExpressions } from './Ordering.js';
import { assertDepth, formatExpression, DEFAULT_MAX_DEPTH } from './ExpressionUtils.js';
import { InvariantError } from './Errors.js';

export const DEFAULT_MAX_ITERATIONS = 64;

/**
 * Options for simplification
 */
export interface SimplifyOptions {
  maxDepth?: number;         // Default: DEFAULT_MAX_DEPTH
  maxIterations?: number;    // Fixed-point passes per node. Default: 64
  verbose?: boolean;         // Log every rule that fires
}

/**
 * A sum term split into its integer coefficient and remaining factors
 */
interface Term {
  coefficient: number;
  factors: Expression[];
}

interface LikeTermGroup extends Term {
  members: Expression[];
}

interface PowerGroup {
  base: Expression;
  exponents: Expression[];
  first: Expression;
}

/**
 * Simplification engine
 */
class Simplifier {
  constructor(
    private maxIterations: number,
    private verbose: boolean
  ) {}

  simplify(expr: Expression): Expression {
    switch (expr.kind) {
      case 'const':
        return constant(expr.value);

      case 'var':
        return variable();

      case 'sum':
        return this.simplifySum(expr.terms.map(term => this.simplify(term)));

      case 'product':
        return this.simplifyProduct(expr.factors.map(factor => this.simplify(factor)));

      case 'neg':
        return this.simplifyNeg(this.simplify(expr.operand));

      case 'pow':
        return this.simplifyPow(this.simplify(expr.base), this.simplify(expr.exponent));

      case 'call':
        return this.simplifyCall(expr.name, this.simplify(expr.arg));
    }
  }

  /**
   * Sum rules over already simplified terms
   */
  private simplifySum(terms: Expression[]): Expression {
    let current = terms;

    for (let pass = 0; pass < this.maxIterations; pass++) {
      const flattened = current.some(term => term.kind === 'sum')
        ? this.flattenSum(current)
        : current;
      const { terms: unified, changed } = this.unifyLikeTerms(flattened);

      if (!changed) {
        return this.assembleSum(unified);
      }
      current = unified;
    }

    throw new InvariantError(
      `sum did not reach a fixed point within ${this.maxIterations} passes`,
      formatExpression({ kind: 'sum', terms })
    );
  }

  private flattenSum(terms: Expression[]): Expression[] {
    const flat: Expression[] = [];
    for (const term of terms) {
      if (term.kind === 'sum') {
        this.trace('flatten sum', term);
        flat.push(...term.terms);
      } else {
        flat.push(term);
      }
    }
    return flat;
  }

  /**
   * Merge terms that differ only by their integer coefficient.
   * Terms whose coefficients cancel are dropped.
   */
  private unifyLikeTerms(terms: Expression[]): { terms: Expression[]; changed: boolean } {
    const groups: LikeTermGroup[] = [];

    for (const term of terms) {
      const { coefficient, factors } = decomposeTerm(term);
      const group = groups.find(g => sameFactors(g.factors, factors));
      if (group) {
        group.coefficient = checkedAdd(group.coefficient, coefficient);
        group.members.push(term);
      } else {
        groups.push({ coefficient, factors, members: [term] });
      }
    }

    let changed = false;
    const unified: Expression[] = [];

    for (const group of groups) {
      if (group.members.length === 1 && group.coefficient !== 0) {
        unified.push(group.members[0]);
        continue;
      }

      changed = true;
      if (group.coefficient === 0) {
        this.trace('cancel terms', { kind: 'sum', terms: group.members });
        continue;
      }

      const merged = this.buildTerm(group.coefficient, group.factors);
      this.trace('unify like terms', merged);
      unified.push(merged);
    }

    return { terms: unified, changed };
  }

  private buildTerm(coefficient: number, factors: Expression[]): Expression {
    if (factors.length === 0) {
      return constant(coefficient);
    }
    return this.simplifyProduct([constant(coefficient), ...factors]);
  }

  private assembleSum(terms: Expression[]): Expression {
    // Empty sum = 0
    if (terms.length === 0) return constant(0);
    // Singleton sum = its term
    if (terms.length === 1) return terms[0];
    return { kind: 'sum', terms: sortExpressions(terms) };
  }

  /**
   * Product rules over already simplified factors
   */
  private simplifyProduct(factors: Expression[]): Expression {
    if (factors.length === 0) {
      this.trace('empty product', { kind: 'product', factors });
      return constant(0);
    }

    let coefficient = 1;
    let pending = factors;

    for (let pass = 0; pass < this.maxIterations; pass++) {
      const rest: Expression[] = [];
      const queue = [...pending];

      // Flatten nested products, fold constants, hoist negations
      for (let factor = queue.shift(); factor !== undefined; factor = queue.shift()) {
        switch (factor.kind) {
          case 'const':
            coefficient = checkedMul(coefficient, factor.value);
            break;
          case 'product':
            queue.push(...factor.factors);
            break;
          case 'neg':
            coefficient = checkedNeg(coefficient);
            queue.push(factor.operand);
            break;
          default:
            rest.push(factor);
        }
      }

      // 0 * x = 0
      if (coefficient === 0) {
        this.trace('zero factor', { kind: 'product', factors });
        return constant(0);
      }

      const cancelled = this.cancelConstantBases(coefficient, this.consolidatePowers(rest));
      coefficient = cancelled.coefficient;

      if (!cancelled.factors.some(needsAnotherPass)) {
        return this.assembleProduct(coefficient, cancelled.factors);
      }
      pending = cancelled.factors;
    }

    throw new InvariantError(
      `product did not reach a fixed point within ${this.maxIterations} passes`,
      formatExpression({ kind: 'product', factors })
    );
  }

  /**
   * x^a * x^b = x^(a+b); a bare factor counts as exponent 1.
   * x * x^-1 cancels here, through x^0 = 1.
   */
  private consolidatePowers(factors: Expression[]): Expression[] {
    const groups: PowerGroup[] = [];

    for (const factor of factors) {
      const base = factor.kind === 'pow' ? factor.base : factor;
      const exponent = factor.kind === 'pow' ? factor.exponent : constant(1);
      const group = groups.find(g => expressionsEqual(g.base, base));
      if (group) {
        group.exponents.push(exponent);
      } else {
        groups.push({ base, exponents: [exponent], first: factor });
      }
    }

    return groups.map(group => {
      if (group.exponents.length === 1) {
        return group.first;
      }
      const merged = this.simplifyPow(group.base, this.simplifySum(group.exponents));
      this.trace('consolidate powers', merged);
      return merged;
    });
  }

  /**
   * 6 * 2^-1 = 3: divide the coefficient by integer bases with negative
   * exponents while it stays an integer
   */
  private cancelConstantBases(
    coefficient: number,
    factors: Expression[]
  ): { coefficient: number; factors: Expression[] } {
    let remaining = coefficient;
    const kept: Expression[] = [];

    for (const factor of factors) {
      if (
        factor.kind !== 'pow' ||
        factor.base.kind !== 'const' ||
        factor.exponent.kind !== 'const' ||
        factor.exponent.value >= 0 ||
        Math.abs(factor.base.value) < 2
      ) {
        kept.push(factor);
        continue;
      }

      const base = factor.base.value;
      let exponent = factor.exponent.value;
      while (exponent < 0 && remaining % base === 0) {
        remaining = remaining / base;
        exponent++;
      }

      if (exponent === factor.exponent.value) {
        kept.push(factor);
        continue;
      }

      this.trace('cancel fraction', factor);
      if (exponent < 0) {
        kept.push({ kind: 'pow', base: factor.base, exponent: constant(exponent) });
      }
    }

    return { coefficient: remaining, factors: kept };
  }

  private assembleProduct(coefficient: number, factors: Expression[]): Expression {
    const sorted = sortExpressions(factors);
    if (sorted.length === 0) {
      return constant(coefficient);
    }

    const body: Expression = sorted.length === 1
      ? sorted[0]
      : { kind: 'product', factors: sorted };

    // 1 * x = x
    if (coefficient === 1) return body;

    // -1 * x = -x
    if (coefficient === -1) {
      return body.kind === 'sum' ? this.distributeNegation(body) : { kind: 'neg', operand: body };
    }

    return { kind: 'product', factors: [constant(coefficient), ...sorted] };
  }

  /**
   * Negation rules over an already simplified operand
   */
  private simplifyNeg(operand: Expression): Expression {
    switch (operand.kind) {
      case 'const':
        // -(c) = (-c)
        this.trace('negate constant', operand);
        return constant(checkedNeg(operand.value));

      case 'neg':
        // -(-x) = x; the operand is already free of nested negations
        this.trace('double negation', operand);
        return operand.operand;

      case 'sum':
        return this.distributeNegation(operand);

      case 'product':
        // -(c * x) = (-c) * x
        return this.simplifyProduct([constant(-1), ...operand.factors]);

      case 'var':
      case 'pow':
      case 'call':
        return { kind: 'neg', operand };
    }
  }

  /**
   * -(a + b) = -a + -b
   */
  private distributeNegation(operand: Sum): Expression {
    this.trace('distribute negation', operand);
    return this.simplifySum(operand.terms.map(term => this.simplifyNeg(term)));
  }

  /**
   * Power rules over an already simplified base and exponent
   */
  private simplifyPow(base: Expression, exponent: Expression): Expression {
    if (exponent.kind === 'const') {
      const n = exponent.value;

      // x^0 = 1
      if (n === 0) return constant(1);
      // x^1 = x
      if (n === 1) return base;

      switch (base.kind) {
        case 'const': {
          const folded = foldConstantPower(base.value, n);
          if (folded !== undefined) {
            this.trace('fold power', { kind: 'pow', base, exponent });
            return constant(folded);
          }
          break;
        }

        case 'pow':
          // (a^b)^n = a^(b*n) for integer n
          this.trace('power of power', base);
          return this.simplifyPow(base.base, this.simplifyProduct([base.exponent, exponent]));

        case 'product':
          // (a*b)^n = a^n * b^n for integer n
          this.trace('distribute power', base);
          return this.simplifyProduct(base.factors.map(factor => this.simplifyPow(factor, exponent)));

        case 'neg':
          // (-a)^n = (-1)^n * a^n
          return this.simplifyProduct([
            constant(checkedPow(-1, Math.abs(n))),
            this.simplifyPow(base.operand, exponent)
          ]);

        default:
          break;
      }
    }

    // 1^x = 1
    if (base.kind === 'const' && base.value === 1) {
      return constant(1);
    }

    return { kind: 'pow', base, exponent };
  }

  private simplifyCall(name: FunctionName, arg: Expression): Expression {
    if (arg.kind === 'const') {
      const value = exactValue(name, arg.value);
      if (value !== undefined) {
        this.trace('exact function value', { kind: 'call', name, arg });
        return constant(value);
      }
    }
    return { kind: 'call', name, arg };
  }

  private trace(rule: string, node: Expression): void {
    if (this.verbose) {
      console.log(`[simplify] ${rule}: ${formatExpression(node)}`);
    }
  }
}

/**
 * Split a simplified sum term into coefficient and factors
 */
function decomposeTerm(term: Expression): Term {
  switch (term.kind) {
    case 'const':
      return { coefficient: term.value, factors: [] };

    case 'neg': {
      const inner = decomposeTerm(term.operand);
      return { coefficient: checkedNeg(inner.coefficient), factors: inner.factors };
    }

    case 'product': {
      const [head, ...rest] = term.factors;
      if (head !== undefined && head.kind === 'const') {
        return { coefficient: head.value, factors: sortExpressions(rest) };
      }
      return { coefficient: 1, factors: sortExpressions(term.factors) };
    }

    default:
      return { coefficient: 1, factors: [term] };
  }
}

/**
 * Check if two sorted factor lists hold the same multiset
 */
function sameFactors(a: Expression[], b: Expression[]): boolean {
  return a.length === b.length && a.every((factor, i) => expressionsEqual(factor, b[i]));
}

function needsAnotherPass(factor: Expression): boolean {
  return factor.kind === 'const' || factor.kind === 'product' || factor.kind === 'neg';
}

/**
 * Integer value of base^n, or undefined when it is not an integer
 */
function foldConstantPower(base: number, n: number): number | undefined {
  if (n >= 0) return checkedPow(base, n);
  if (base === 1) return 1;
  if (base === -1) return n % 2 === 0 ? 1 : -1;
  return undefined;
}

/**
 * Integer values of the functions at integer points
 */
function exactValue(name: FunctionName, input: number): number | undefined {
  switch (name) {
    case 'ln':
      // ln(1) = 0
      return input === 1 ? 0 : undefined;
    case 'cos':
      // cos(0) = 1
      return input === 0 ? 1 : undefined;
    case 'sin':
    case 'arcsin':
    case 'arctan':
      return input === 0 ? 0 : undefined;
    case 'arccos':
      return undefined;
  }
}

/**
 * Simplify an expression to canonical form
 */
export function simplify(expr: Expression, options: SimplifyOptions = {}): Expression {
  const {
    maxDepth = DEFAULT_MAX_DEPTH,
    maxIterations = DEFAULT_MAX_ITERATIONS,
    verbose = false
  } = options;

  assertDepth(expr, maxDepth);
  return new Simplifier(maxIterations, verbose).simplify(expr);
}
