/**
 * Weighted Goal Programming - Type Definitions
 *
 * Types for the model (variables, constraints, goals), the linear program
 * handed to a solver adapter, and the structured result handed back.
 */

import type { LinearExpression } from './model/expression';

// =============================================================================
// Enumerations
// =============================================================================

export type VariableCategory = 'continuous' | 'integer' | 'binary';

/** Where a variable came from: declared by the caller or synthesized for a goal */
export type VariableOrigin = 'decision' | 'deviation';

/** <=, >=, = */
export type ConstraintType = 'le' | 'ge' | 'eq';

/** Textual forms accepted at the API boundary */
export type ConstraintSenseInput = ConstraintType | '<=' | '>=' | '=' | '==';

/** Hard constraints come from the caller, goal links are synthesized per goal */
export type ConstraintKind = 'hard' | 'goal-link';

/**
 * Which deviation directions the objective penalizes
 * - attain: both (hit the target exactly)
 * - minimize_under: only under-achievement (reach at least the target)
 * - minimize_over: only over-achievement (stay at most at the target)
 */
export type GoalSense = 'attain' | 'minimize_under' | 'minimize_over';

export type SolveStatus = 'Optimal' | 'Infeasible' | 'Unbounded' | 'Timeout' | 'Error';

export type SolverKind = 'highs' | 'glpk';

export type LogLevel = 'silent' | 'info' | 'debug';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Solver configuration
 * @see config/solverConfig.ts for defaults and environment overrides
 */
export interface SolverParams {
  solver: SolverKind;
  timeLimitSeconds: number | null;  // null = run to completion
  mipRelGap: number;                // Relative gap for integer programs
  logLevel: LogLevel;
}

// =============================================================================
// Model Types
// =============================================================================

export interface VariableOptions {
  /** Defaults to 0. Use -Infinity for a free variable. */
  lowerBound?: number;
  /** Defaults to +Infinity */
  upperBound?: number;
  category?: VariableCategory;
}

export interface Variable {
  readonly name: string;
  readonly lowerBound: number;
  readonly upperBound: number;
  readonly category: VariableCategory;
  readonly origin: VariableOrigin;
}

/** Anything that converts to a LinearExpression */
export type ExpressionLike = LinearExpression | Variable | number;

export interface ConstraintInput {
  name: string;
  expression: ExpressionLike;
  sense: ConstraintSenseInput;
  rhs: number;
}

export interface Constraint {
  readonly name: string;
  readonly expression: LinearExpression;
  readonly type: ConstraintType;
  readonly rhs: number;
  readonly kind: ConstraintKind;
  /** Owning goal, for goal-link constraints */
  readonly goal?: string;
}

export interface GoalWeights {
  readonly under: number;
  readonly over: number;
}

/** One weight for both directions, or an explicit pair */
export type GoalWeightInput = number | GoalWeights | readonly [under: number, over: number];

export interface GoalInput {
  name: string;
  expression: ExpressionLike;
  target: number;
  sense?: GoalSense;
  weight?: GoalWeightInput;
  /** Lexicographic level, 1 = most important */
  priority?: number;
}

export interface Goal {
  readonly name: string;
  readonly expression: LinearExpression;
  readonly target: number;
  readonly sense: GoalSense;
  readonly weights: GoalWeights;
  readonly priority: number;
  readonly underVariable: Variable;
  readonly overVariable: Variable;
  readonly link: Constraint;
}

/** Cost term blended into the weighted objective */
export interface CostTerm {
  expression: ExpressionLike;
  weight: number;
}

export interface SolveOptions {
  cost?: CostTerm;
  /** Per-solve (under, over) weight overrides by goal name; the sense mask still applies */
  goalWeights?: Readonly<Record<string, GoalWeightInput>>;
  /** Overrides the model's configured solver time limit for this solve */
  timeLimitSeconds?: number | null;
}

export interface LexicographicSolveOptions extends SolveOptions {
  /** Slack added to each finished level's optimum before it bounds later levels */
  tolerance?: number;
}

// =============================================================================
// Linear Program (solver adapter input)
// =============================================================================

export interface LPTerm {
  name: string;
  coefficient: number;
}

export interface LPVariable {
  name: string;
  lowerBound: number;   // -Infinity allowed
  upperBound: number;   // +Infinity allowed
  category: VariableCategory;
}

export interface LPConstraint {
  name: string;
  type: ConstraintType;
  terms: LPTerm[];
  rhs: number;  // Expression constants are already moved here
}

export interface LPObjective {
  direction: 'minimize';
  terms: LPTerm[];
  /** Constant part; never sent to the solver, added back to its objective value */
  offset: number;
}

export interface LinearProgram {
  name: string;
  variables: LPVariable[];
  constraints: LPConstraint[];
  objective: LPObjective;
}

// =============================================================================
// Solver Adapter
// =============================================================================

/**
 * Raw solver output
 * values and objectiveValue are present iff the solver reported a solution.
 */
export interface SolverOutcome {
  status: SolveStatus;
  solverStatus: string;     // The solver's own status text, verbatim
  values?: Map<string, number>;
  objectiveValue?: number;  // Without LPObjective.offset
  solveTimeMs: number;
  error?: string;
}

export interface SolverAdapter {
  readonly name: string;
  solve(program: LinearProgram, params: SolverParams): Promise<SolverOutcome>;
}

// =============================================================================
// Result Types
// =============================================================================

export type DeviationPair = readonly [under: number, over: number];

export interface GoalReport {
  target: number;
  achieved: number;
  under: number;
  over: number;
  sense: GoalSense;
  priority: number;
  /** Every penalized direction is zero within tolerance */
  attained: boolean;
}

export interface ConstraintReport {
  kind: ConstraintKind;
  activity: number;  // Left-hand side value, constant included
  rhs: number;
  slack: number;     // le: rhs - activity, ge: activity - rhs, eq: rhs - activity
  active: boolean;
}

export interface ProblemStats {
  numVariables: number;
  numDecisionVariables: number;
  numConstraints: number;
  numGoals: number;
}

export interface LexicographicStage {
  /** Priority level, or null for the final cost stage */
  priority: number | null;
  goals: string[];
  status: SolveStatus;
  objective: number | null;
}

export interface GoalProgramResult {
  status: SolveStatus;
  solverStatus: string;
  solver: string;
  variables: Record<string, number>;
  deviations: Record<string, DeviationPair>;
  goals: Record<string, GoalReport>;
  constraints: Record<string, ConstraintReport>;
  objective: number | null;
  solveTimeMs: number;
  stats: ProblemStats;
  modelVersion: string;
  error?: string;
  /** Present for lexicographic solves */
  stages?: LexicographicStage[];
}
