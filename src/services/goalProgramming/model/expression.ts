/**
 * Linear Expression
 *
 * Affine combination of variables: Σ coefficient · variable + constant.
 * Immutable: every operation returns a new expression. A variable that is
 * referenced more than once has its coefficients summed; a coefficient that
 * sums to exactly zero is dropped.
 *
 * ```ts
 * const energy = LinearExpression.term(rice, 5).add(LinearExpression.term(dal, 10));
 * const slack = energy.subtract(200).scale(0.5);
 * ```
 */

import { InvalidCoefficientError, UnknownVariableError } from '../errors';
import type { ExpressionLike, LPTerm, Variable } from '../types';

/** Solved values by variable name */
export type Assignment = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

function assertFinite(value: number, what: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidCoefficientError(`${what} must be a finite number, got ${value}`);
  }
}

function isMapAssignment(assignment: Assignment): assignment is ReadonlyMap<string, number> {
  return assignment instanceof Map;
}

function readAssignment(assignment: Assignment, name: string): number | undefined {
  if (isMapAssignment(assignment)) {
    return assignment.get(name);
  }
  return Object.prototype.hasOwnProperty.call(assignment, name) ? assignment[name] : undefined;
}

export class LinearExpression {
  private readonly coefficients: ReadonlyMap<string, number>;
  readonly constant: number;

  private constructor(coefficients: Map<string, number>, constant: number) {
    this.coefficients = coefficients;
    this.constant = constant;
  }

  /** c */
  static constant(value: number): LinearExpression {
    assertFinite(value, 'constant');
    return new LinearExpression(new Map(), value);
  }

  /** coefficient · variable */
  static term(variable: Variable | string, coefficient = 1): LinearExpression {
    assertFinite(coefficient, 'coefficient');
    const name = typeof variable === 'string' ? variable : variable.name;
    const coefficients = new Map<string, number>();
    if (coefficient !== 0) {
      coefficients.set(name, coefficient);
    }
    return new LinearExpression(coefficients, 0);
  }

  /** Converts a number, a variable, or an expression to an expression */
  static from(value: ExpressionLike): LinearExpression {
    if (value instanceof LinearExpression) return value;
    if (typeof value === 'number') return LinearExpression.constant(value);
    return LinearExpression.term(value, 1);
  }

  /** a + b + c + ... */
  static sum(...parts: ExpressionLike[]): LinearExpression {
    return parts.reduce<LinearExpression>((acc, part) => acc.add(part), LinearExpression.constant(0));
  }

  /** Σ coefficient · variable + constant, from (variable, coefficient) pairs */
  static linear(
    entries: Iterable<readonly [Variable | string, number]>,
    constant = 0
  ): LinearExpression {
    let result = LinearExpression.constant(constant);
    for (const [variable, coefficient] of entries) {
      result = result.add(LinearExpression.term(variable, coefficient));
    }
    return result;
  }

  /** this + factor · other */
  addScaled(other: ExpressionLike, factor: number): LinearExpression {
    assertFinite(factor, 'factor');
    const rhs = LinearExpression.from(other);

    // Copy, never share, the coefficient map
    const coefficients = new Map(this.coefficients);
    for (const [name, coefficient] of rhs.coefficients) {
      const merged = (coefficients.get(name) ?? 0) + factor * coefficient;
      if (merged === 0) {
        coefficients.delete(name);
      } else {
        coefficients.set(name, merged);
      }
    }
    return new LinearExpression(coefficients, this.constant + factor * rhs.constant);
  }

  add(other: ExpressionLike): LinearExpression {
    return this.addScaled(other, 1);
  }

  subtract(other: ExpressionLike): LinearExpression {
    return this.addScaled(other, -1);
  }

  scale(factor: number): LinearExpression {
    return LinearExpression.constant(0).addScaled(this, factor);
  }

  /** Coefficient of a variable, 0 when absent */
  coefficientOf(variable: Variable | string): number {
    const name = typeof variable === 'string' ? variable : variable.name;
    return this.coefficients.get(name) ?? 0;
  }

  /** Referenced variable names, in first-reference order */
  get variableNames(): string[] {
    return Array.from(this.coefficients.keys());
  }

  get isConstant(): boolean {
    return this.coefficients.size === 0;
  }

  /** Linear part as solver terms (constant excluded) */
  terms(): LPTerm[] {
    return Array.from(this.coefficients, ([name, coefficient]) => ({ name, coefficient }));
  }

  /**
   * Σ coefficient · value + constant
   * @throws UnknownVariableError when a referenced variable has no value
   */
  evaluate(assignment: Assignment): number {
    let total = this.constant;
    for (const [name, coefficient] of this.coefficients) {
      const value = readAssignment(assignment, name);
      if (value === undefined) {
        throw new UnknownVariableError(name);
      }
      total += coefficient * value;
    }
    return total;
  }

  toString(): string {
    const parts: string[] = [];
    for (const [name, coefficient] of this.coefficients) {
      const magnitude = Math.abs(coefficient);
      const body = magnitude === 1 ? name : `${magnitude} ${name}`;
      if (parts.length === 0) {
        parts.push(coefficient < 0 ? `-${body}` : body);
      } else {
        parts.push(coefficient < 0 ? `- ${body}` : `+ ${body}`);
      }
    }
    if (parts.length === 0) return String(this.constant);
    if (this.constant > 0) parts.push(`+ ${this.constant}`);
    if (this.constant < 0) parts.push(`- ${Math.abs(this.constant)}`);
    return parts.join(' ');
  }
}

/** Shorthand for {@link LinearExpression.term} */
export function term(variable: Variable | string, coefficient = 1): LinearExpression {
  return LinearExpression.term(variable, coefficient);
}

/** Shorthand for {@link LinearExpression.constant} */
export function constant(value: number): LinearExpression {
  return LinearExpression.constant(value);
}

/** Shorthand for {@link LinearExpression.sum} */
export function sum(...parts: ExpressionLike[]): LinearExpression {
  return LinearExpression.sum(...parts);
}
