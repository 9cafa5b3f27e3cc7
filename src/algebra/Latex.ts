/**
 * LaTeX renderer.
 * Produces a math-mode fragment without the enclosing `$...$`.
 */

import type { Expression, Power } from './AST.js';
import { pow } from './Builders.js';
import { checkedNeg } from './Integer.js';
import { assertDepth, DEFAULT_MAX_DEPTH } from './ExpressionUtils.js';

/**
 * Options for LaTeX output
 */
export interface LatexOptions {
  variable?: string;     // Name printed for the free variable. Default: 'x'
  fractions?: boolean;   // Print negative integer powers as \frac. Default: false
  maxDepth?: number;     // Default: DEFAULT_MAX_DEPTH
}

class LatexRenderer {
  constructor(
    private variable: string,
    private fractions: boolean
  ) {}

  render(expr: Expression): string {
    switch (expr.kind) {
      case 'const':
        return String(expr.value);

      case 'var':
        return this.variable;

      case 'sum':
        return this.renderSum(expr.terms);

      case 'product':
        return this.renderProduct(expr.factors);

      case 'neg':
        return this.renderNeg(expr.operand);

      case 'pow':
        return this.renderPow(expr);

      case 'call':
        return `\\${expr.name}(${this.render(expr.arg)})`;
    }
  }

  private renderSum(terms: readonly Expression[]): string {
    const [head, ...rest] = terms;
    if (head === undefined) {
      return '0';
    }

    let latex = this.render(head);
    for (const term of rest) {
      const part = this.render(term);
      // a + (-b) prints as a - b
      latex += part.startsWith('-') ? part : `+${part}`;
    }
    return latex;
  }

  private renderNeg(operand: Expression): string {
    const inner = this.render(operand);
    if (operand.kind === 'sum' || operand.kind === 'neg' || inner.startsWith('-')) {
      return `-(${inner})`;
    }
    return `-${inner}`;
  }

  private renderProduct(factors: readonly Expression[]): string {
    if (factors.length === 0) {
      return '0';
    }

    if (this.fractions) {
      const numerator: Expression[] = [];
      const denominator: Expression[] = [];
      for (const factor of factors) {
        const inverted = invertNegativePower(factor);
        if (inverted) {
          denominator.push(inverted);
        } else {
          numerator.push(factor);
        }
      }

      if (denominator.length > 0) {
        return `\\frac{${this.renderFractionPart(numerator)}}{${this.renderFractionPart(denominator)}}`;
      }
    }

    return this.renderFactors(factors);
  }

  /**
   * Juxtaposed factors. A leading 1 is suppressed and a leading -1 prints
   * as a sign.
   */
  private renderFactors(factors: readonly Expression[]): string {
    let latex = '';

    factors.forEach((factor, i) => {
      if (i === 0 && factors.length > 1 && factor.kind === 'const' && Math.abs(factor.value) === 1) {
        latex = factor.value === 1 ? '' : '-';
        return;
      }

      let part = this.render(factor);
      if (factor.kind === 'sum' || factor.kind === 'neg' || (i > 0 && part.startsWith('-'))) {
        part = `(${part})`;
      }

      // Two numbers side by side would read as one
      if (latex !== '' && latex !== '-' && /^\d/.test(part)) {
        latex += ' \\cdot ';
      }
      latex += part;
    });

    return latex;
  }

  private renderFractionPart(factors: Expression[]): string {
    const [only] = factors;
    if (only === undefined) return '1';
    if (factors.length === 1) return this.render(only);
    return this.renderFactors(factors);
  }

  private renderPow(expr: Power): string {
    if (this.fractions) {
      const inverted = invertNegativePower(expr);
      if (inverted) {
        return `\\frac{1}{${this.render(inverted)}}`;
      }
    }

    const { base, exponent } = expr;

    let baseLatex = this.render(base);
    if (
      base.kind === 'sum' ||
      base.kind === 'neg' ||
      base.kind === 'product' ||
      base.kind === 'pow' ||
      baseLatex.startsWith('-')
    ) {
      baseLatex = `(${baseLatex})`;
    }

    let exponentLatex = this.render(exponent);
    if (exponent.kind === 'sum' || exponent.kind === 'neg') {
      exponentLatex = `(${exponentLatex})`;
    }

    return `${baseLatex}^{${exponentLatex}}`;
  }
}

/**
 * u^-n as u^n (u for n = 1), or undefined when the exponent is not a
 * negative integer
 */
function invertNegativePower(expr: Expression): Expression | undefined {
  if (expr.kind !== 'pow' || expr.exponent.kind !== 'const' || expr.exponent.value >= 0) {
    return undefined;
  }
  const n = checkedNeg(expr.exponent.value);
  return n === 1 ? expr.base : pow(expr.base, n);
}

/**
 * Render an expression as LaTeX
 */
export function toLatex(expr: Expression, options: LatexOptions = {}): string {
  const {
    variable = 'x',
    fractions = false,
    maxDepth = DEFAULT_MAX_DEPTH
  } = options;

  assertDepth(expr, maxDepth);
  return new LatexRenderer(variable, fractions).render(expr);
}
