/**
 * Constraint declarations
 *
 * A constraint is an immutable record. Name uniqueness is a model-wide
 * invariant and is checked by the model, not here.
 */

import { TOLERANCE } from '@/_domain';
import { InvalidCoefficientError, InvalidSenseError } from '../errors';
import type {
  Constraint,
  ConstraintKind,
  ConstraintReport,
  ConstraintType,
  ExpressionLike,
  LPConstraint
} from '../types';
import { LinearExpression, type Assignment } from './expression';
import { assertName } from './naming';

const SENSE_ALIASES: Readonly<Record<string, ConstraintType>> = {
  '<=': 'le',
  le: 'le',
  '>=': 'ge',
  ge: 'ge',
  '=': 'eq',
  '==': 'eq',
  eq: 'eq',
};

/**
 * Parse a textual sense into a constraint type
 * @throws InvalidSenseError for anything but <=, >=, =, ==, le, ge, eq
 */
export function parseConstraintSense(sense: string): ConstraintType {
  const key = typeof sense === 'string' ? sense.trim().toLowerCase() : '';
  const type = Object.prototype.hasOwnProperty.call(SENSE_ALIASES, key) ? SENSE_ALIASES[key] : undefined;
  if (!type) {
    throw new InvalidSenseError('constraint', sense, Object.keys(SENSE_ALIASES));
  }
  return type;
}

export function senseSymbol(type: ConstraintType): '<=' | '>=' | '=' {
  switch (type) {
    case 'le':
      return '<=';
    case 'ge':
      return '>=';
    case 'eq':
      return '=';
  }
}

export interface ConstraintSpec {
  name: string;
  expression: ExpressionLike;
  type: ConstraintType;
  rhs: number;
  kind: ConstraintKind;
  goal?: string;
}

export function createConstraint(spec: ConstraintSpec): Constraint {
  assertName(spec.name, 'constraint');
  if (!Number.isFinite(spec.rhs)) {
    throw new InvalidCoefficientError(`constraint '${spec.name}': rhs must be a finite number, got ${spec.rhs}`);
  }
  const constraint: Constraint = {
    name: spec.name,
    expression: LinearExpression.from(spec.expression),
    type: spec.type,
    rhs: spec.rhs,
    kind: spec.kind,
    ...(spec.goal !== undefined ? { goal: spec.goal } : {}),
  };
  return Object.freeze(constraint);
}

/**
 * Solver form: linear terms on the left, every constant on the right
 * (expression + c <= rhs  →  expression <= rhs - c)
 */
export function toLPConstraint(constraint: Constraint): LPConstraint {
  return {
    name: constraint.name,
    type: constraint.type,
    terms: constraint.expression.terms(),
    rhs: constraint.rhs - constraint.expression.constant,
  };
}

/**
 * Activity and slack of a constraint at an assignment
 * Slack is positive on the feasible side: le → rhs - activity,
 * ge → activity - rhs, eq → rhs - activity (feasible only near zero).
 */
export function evaluateConstraint(constraint: Constraint, assignment: Assignment): ConstraintReport {
  const activity = constraint.expression.evaluate(assignment);
  let slack: number;
  switch (constraint.type) {
    case 'le':
      slack = constraint.rhs - activity;
      break;
    case 'ge':
      slack = activity - constraint.rhs;
      break;
    case 'eq':
      slack = constraint.rhs - activity;
      break;
  }
  return {
    kind: constraint.kind,
    activity,
    rhs: constraint.rhs,
    slack,
    active: Math.abs(slack) < TOLERANCE.ACTIVE_CONSTRAINT,
  };
}

export function describeConstraint(constraint: Constraint): string {
  return `${constraint.name}: ${constraint.expression.toString()} ${senseSymbol(constraint.type)} ${constraint.rhs}`;
}
