/**
 * Variable Registry
 *
 * Owns every variable of one model, decision and deviation alike, in
 * creation order. Names are unique; a variable is never replaced or removed.
 */

import { DuplicateNameError, InvalidBoundsError, UnknownVariableError } from '../errors';
import type { Variable, VariableCategory, VariableOptions, VariableOrigin } from '../types';
import { assertName } from './naming';

const CATEGORIES: readonly VariableCategory[] = ['continuous', 'integer', 'binary'];

/**
 * Resolve bounds and category for a new variable
 * Binary variables always get [0, 1].
 */
export function resolveVariableSpec(
  name: string,
  options: VariableOptions = {}
): Pick<Variable, 'lowerBound' | 'upperBound' | 'category'> {
  const category = options.category ?? 'continuous';
  if (!CATEGORIES.includes(category)) {
    throw new InvalidBoundsError(`variable '${name}': unknown category '${String(category)}'`);
  }
  if (category === 'binary') {
    return { lowerBound: 0, upperBound: 1, category };
  }

  const lowerBound = options.lowerBound ?? 0;
  const upperBound = options.upperBound ?? Infinity;
  if (Number.isNaN(lowerBound) || Number.isNaN(upperBound)) {
    throw new InvalidBoundsError(`variable '${name}': bounds must be numbers`);
  }
  if (lowerBound === Infinity || upperBound === -Infinity) {
    throw new InvalidBoundsError(`variable '${name}': bounds [${lowerBound}, ${upperBound}] admit no value`);
  }
  if (lowerBound > upperBound) {
    throw new InvalidBoundsError(`variable '${name}': lower bound ${lowerBound} exceeds upper bound ${upperBound}`);
  }
  return { lowerBound, upperBound, category };
}

export class VariableRegistry {
  private readonly variables = new Map<string, Variable>();

  /**
   * Create and register a variable
   * @throws DuplicateNameError when the name is taken
   */
  create(name: string, options: VariableOptions = {}, origin: VariableOrigin = 'decision'): Variable {
    assertName(name, 'variable');
    this.assertAvailable(name);
    const variable: Variable = Object.freeze({
      name,
      ...resolveVariableSpec(name, options),
      origin,
    });
    this.variables.set(name, variable);
    return variable;
  }

  /** @throws DuplicateNameError when the name is taken */
  assertAvailable(name: string): void {
    if (this.variables.has(name)) {
      throw new DuplicateNameError('variable', name);
    }
  }

  /** @throws UnknownVariableError when absent */
  lookup(name: string): Variable {
    const variable = this.variables.get(name);
    if (!variable) {
      throw new UnknownVariableError(name);
    }
    return variable;
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  get size(): number {
    return this.variables.size;
  }

  /** All variables in creation order */
  values(): Variable[] {
    return Array.from(this.variables.values());
  }

  /** Caller-declared variables only, in creation order */
  decisionVariables(): Variable[] {
    return this.values().filter(v => v.origin === 'decision');
  }
}
