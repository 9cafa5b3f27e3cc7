export class ArithmeticOverflowError extends Error {
  constructor(
    public operation: string,
    public operands: number[]
  ) {
    super(`Arithmetic overflow in '${operation}': ${operands.join(', ')} leaves the safe integer range`);
    this.name = 'ArithmeticOverflowError';
  }
}

export class InvalidConstantError extends Error {
  constructor(public value: number) {
    super(`Invalid constant '${value}': constants must be safe integers`);
    this.name = 'InvalidConstantError';
  }
}

export class ExpressionDepthError extends Error {
  constructor(
    public depth: number,
    public limit: number
  ) {
    super(`Expression depth ${depth} exceeds the limit of ${limit}`);
    this.name = 'ExpressionDepthError';
  }
}

/**
 * Raised when a rewrite reaches a state its invariants rule out
 */
export class InvariantError extends Error {
  constructor(
    message: string,
    public node: string
  ) {
    super(`Invariant violated at '${node}': ${message}`);
    this.name = 'InvariantError';
  }
}
