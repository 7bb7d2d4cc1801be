/**
 * Model Errors
 *
 * Raised synchronously at the point of misuse. Solver outcomes (infeasible,
 * unbounded, timeout, solver failure) are never raised; they come back as
 * the result status.
 */

export type ModelErrorCode =
  | 'duplicate_name'       // Variable/constraint/goal name collision
  | 'unknown_variable'     // Reference to a variable not in this model
  | 'unknown_goal'         // Weight override for a goal not in this model
  | 'invalid_sense'        // Malformed constraint or goal sense
  | 'invalid_weight'       // Negative or non-finite weight
  | 'invalid_bounds'       // lower > upper, NaN bound, bad priority
  | 'invalid_name'         // Blank name, or nothing left after sanitizing
  | 'invalid_coefficient'  // Non-finite coefficient, constant, target or rhs
  | 'empty_objective';     // No goals and no cost term

export class ModelError extends Error {
  readonly code: ModelErrorCode;

  constructor(code: ModelErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type NameKind = 'variable' | 'constraint' | 'goal';

export class DuplicateNameError extends ModelError {
  readonly kind: NameKind;
  readonly duplicateName: string;
  /** What already holds the name; differs from kind for goal/constraint clashes */
  readonly existingKind: NameKind;

  constructor(kind: NameKind, name: string, existingKind: NameKind = kind) {
    super(
      'duplicate_name',
      existingKind === kind
        ? `${kind} '${name}' already exists`
        : `${kind} '${name}' collides with existing ${existingKind} '${name}'`
    );
    this.kind = kind;
    this.duplicateName = name;
    this.existingKind = existingKind;
  }
}

export class UnknownVariableError extends ModelError {
  readonly variableName: string;

  constructor(name: string) {
    super('unknown_variable', `variable '${name}' does not exist`);
    this.variableName = name;
  }
}

export class UnknownGoalError extends ModelError {
  readonly goalName: string;

  constructor(name: string) {
    super('unknown_goal', `goal '${name}' does not exist`);
    this.goalName = name;
  }
}

export class InvalidSenseError extends ModelError {
  readonly sense: unknown;

  constructor(what: 'constraint' | 'goal', sense: unknown, allowed: readonly string[]) {
    super('invalid_sense', `invalid ${what} sense '${String(sense)}', expected one of: ${allowed.join(', ')}`);
    this.sense = sense;
  }
}

export class InvalidWeightError extends ModelError {
  readonly weight: number;

  constructor(context: string, weight: number) {
    super('invalid_weight', `${context}: weight must be a finite number >= 0, got ${weight}`);
    this.weight = weight;
  }
}

export class InvalidBoundsError extends ModelError {
  constructor(message: string) {
    super('invalid_bounds', message);
  }
}

export class InvalidNameError extends ModelError {
  constructor(message: string) {
    super('invalid_name', message);
  }
}

export class InvalidCoefficientError extends ModelError {
  constructor(message: string) {
    super('invalid_coefficient', message);
  }
}

export class EmptyObjectiveError extends ModelError {
  constructor() {
    super('empty_objective', 'no objective terms: add at least one goal or pass a cost term');
  }
}
