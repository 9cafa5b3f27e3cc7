import { describe, it, expect } from 'vitest';
import {
  constant,
  sum,
  product,
  add,
  mul,
  div,
  neg,
  pow,
  sin
} from '../../src/algebra/Builders.js';
import { toLatex } from '../../src/algebra/Latex.js';
import { ExpressionDepthError } from '../../src/algebra/Errors.js';
import { x, nestedSin, simplifiedLatex } from '../helpers.js';

describe('LaTeX Output', () => {
  describe('Atoms', () => {
    it('should print constants', () => {
      expect(toLatex(constant(42))).toBe('42');
      expect(toLatex(constant(-3))).toBe('-3');
    });

    it('should print the variable', () => {
      expect(toLatex(x)).toBe('x');
    });

    it('should use the configured variable name', () => {
      expect(toLatex(sum([pow(x, 2), x]), { variable: 't' })).toBe('t^{2}+t');
    });

    it('should print function calls', () => {
      expect(toLatex(sin(x))).toBe('\\sin(x)');
    });

    it('should print empty sums and products as 0', () => {
      expect(toLatex(sum([]))).toBe('0');
      expect(toLatex(product([]))).toBe('0');
    });
  });

  describe('Sums', () => {
    it('should join terms with +', () => {
      expect(toLatex(sum([1, x]))).toBe('1+x');
    });

    it('should fold a leading minus into the operator', () => {
      expect(toLatex(sum([x, neg(x)]))).toBe('x-x');
      expect(toLatex(sum([1, neg(pow(x, 2))]))).toBe('1-x^{2}');
      expect(toLatex(sum([pow(x, 2), product([-2, x])]))).toBe('x^{2}-2x');
    });
  });

  describe('Products', () => {
    it('should suppress a leading coefficient of 1', () => {
      expect(toLatex(product([1, x]))).toBe('x');
    });

    it('should print a lone 1', () => {
      expect(toLatex(product([1]))).toBe('1');
    });

    it('should print a leading -1 as a sign', () => {
      expect(toLatex(product([-1, x]))).toBe('-x');
    });

    it('should parenthesize sum factors', () => {
      expect(toLatex(product([2, sum([1, x])]))).toBe('2(1+x)');
    });

    it('should parenthesize negated factors', () => {
      expect(toLatex(product([x, neg(x)]))).toBe('x(-x)');
    });

    it('should separate digits with \\cdot', () => {
      expect(toLatex(product([x, 3]))).toBe('x \\cdot 3');
      expect(toLatex(product([2, 3]))).toBe('2 \\cdot 3');
    });

    it('should juxtapose a coefficient and a power', () => {
      expect(toLatex(product([2, pow(x, 2)]))).toBe('2x^{2}');
    });

    it('should print an unsimplified quotient as written', () => {
      expect(toLatex(div(add(x, mul(x, 5)), x))).toBe('(x+x \\cdot 5)x^{-1}');
    });
  });

  describe('Negation', () => {
    it('should prefix a minus', () => {
      expect(toLatex(neg(sin(x)))).toBe('-\\sin(x)');
    });

    it('should parenthesize a negated sum', () => {
      expect(toLatex(neg(sum([x, 1])))).toBe('-(x+1)');
    });

    it('should parenthesize a double negation', () => {
      expect(toLatex({ kind: 'neg', operand: { kind: 'neg', operand: x } })).toBe('-(-x)');
    });
  });

  describe('Powers', () => {
    it('should brace the exponent', () => {
      expect(toLatex(pow(x, 2))).toBe('x^{2}');
    });

    it('should parenthesize compound bases', () => {
      expect(toLatex(pow(sum([1, x]), 2))).toBe('(1+x)^{2}');
      expect(toLatex(pow(product([2, x]), 3))).toBe('(2x)^{3}');
    });

    it('should parenthesize a negative base', () => {
      expect(toLatex(pow(constant(-2), 2))).toBe('(-2)^{2}');
    });

    it('should parenthesize a sum exponent', () => {
      expect(toLatex(pow(x, sum([1, x])))).toBe('x^{(1+x)}');
    });
  });

  describe('Fractions', () => {
    it('should move reciprocals below the line', () => {
      expect(toLatex(product([2, pow(x, -1)]), { fractions: true })).toBe('\\frac{2}{x}');
    });

    it('should render a lone reciprocal over 1', () => {
      expect(toLatex(pow(sum([1, pow(x, 2)]), -1), { fractions: true })).toBe('\\frac{1}{1+x^{2}}');
      expect(toLatex(pow(x, -2), { fractions: true })).toBe('\\frac{1}{x^{2}}');
    });

    it('should collect several denominators', () => {
      const expr = product([pow(x, -1), pow(sin(x), -1)]);
      expect(toLatex(expr, { fractions: true })).toBe('\\frac{1}{x\\sin(x)}');
    });

    it('should keep negative powers inline by default', () => {
      expect(toLatex(product([2, pow(x, -1)]))).toBe('2x^{-1}');
    });
  });

  describe('Simplified output', () => {
    it('should render x + x as 2x', () => {
      expect(simplifiedLatex(add(x, x))).toBe('2x');
    });

    it('should render (x + 5x) / x as 6', () => {
      expect(simplifiedLatex(div(add(x, mul(x, 5)), x))).toBe('6');
    });

    it('should render (x + 3 + 2) / (5 + x) as 1', () => {
      expect(simplifiedLatex(div(add(add(x, 3), 2), add(5, x)))).toBe('1');
    });

    it('should render 6 / (2x) as a fraction', () => {
      expect(simplifiedLatex(div(6, mul(2, x)), true)).toBe('\\frac{3}{x}');
    });
  });

  describe('Depth limit', () => {
    it('should refuse trees deeper than maxDepth', () => {
      expect(() => toLatex(nestedSin(5), { maxDepth: 3 })).toThrow(ExpressionDepthError);
    });
  });
});
