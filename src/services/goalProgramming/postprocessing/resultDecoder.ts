/**
 * Result Decoder
 *
 * Turns a raw solver outcome into the structured result:
 * - Decision variable values
 * - Goal deviations [under, over] and per-goal attainment reports
 * - Constraint activity and slack
 * - Objective (solver value + the constant the solver never saw)
 *
 * Only values the solver returned are reported. A non-optimal outcome
 * without a solution decodes to empty maps and a null objective.
 */

import { GOAL_MODEL_VERSION, TOLERANCE } from '@/_domain';
import type {
  Constraint,
  ConstraintReport,
  DeviationPair,
  Goal,
  GoalProgramResult,
  GoalReport,
  LexicographicStage,
  ProblemStats,
  SolverOutcome,
  Variable
} from '../types';
import { evaluateConstraint } from '../model/constraint';
import type { LinearExpression } from '../model/expression';
import { penalizedDirections } from '../model/goal';

export interface DecodeInput {
  variables: readonly Variable[];
  constraints: readonly Constraint[];
  goals: readonly Goal[];
  outcome: SolverOutcome;
  solver: string;
  /** Objective constant, added back to the solver's objective value */
  objectiveOffset: number;
  stages?: LexicographicStage[];
}

function covers(values: ReadonlyMap<string, number>, expression: LinearExpression): boolean {
  return expression.variableNames.every(name => values.has(name));
}

export function computeStats(
  variables: readonly Variable[],
  constraints: readonly Constraint[],
  goals: readonly Goal[]
): ProblemStats {
  return {
    numVariables: variables.length,
    numDecisionVariables: variables.filter(v => v.origin === 'decision').length,
    numConstraints: constraints.length,
    numGoals: goals.length,
  };
}

/**
 * Attainment report for one goal
 * Returns null when the solution does not cover the goal's variables.
 */
export function buildGoalReport(goal: Goal, values: ReadonlyMap<string, number>): GoalReport | null {
  const under = values.get(goal.underVariable.name);
  const over = values.get(goal.overVariable.name);
  if (under === undefined || over === undefined || !covers(values, goal.expression)) {
    return null;
  }
  const penalized = penalizedDirections(goal);
  const attained =
    (!penalized.under || under <= TOLERANCE.ATTAINMENT) &&
    (!penalized.over || over <= TOLERANCE.ATTAINMENT);

  return {
    target: goal.target,
    achieved: goal.expression.evaluate(values),
    under,
    over,
    sense: goal.sense,
    priority: goal.priority,
    attained,
  };
}

export function decodeResult(input: DecodeInput): GoalProgramResult {
  const { outcome } = input;
  const variables: Record<string, number> = {};
  const deviations: Record<string, DeviationPair> = {};
  const goals: Record<string, GoalReport> = {};
  const constraints: Record<string, ConstraintReport> = {};

  const values = outcome.values;
  if (values) {
    for (const variable of input.variables) {
      if (variable.origin !== 'decision') continue;
      const value = values.get(variable.name);
      if (value !== undefined) variables[variable.name] = value;
    }

    for (const goal of input.goals) {
      const under = values.get(goal.underVariable.name);
      const over = values.get(goal.overVariable.name);
      if (under !== undefined && over !== undefined) {
        deviations[goal.name] = [under, over];
      }
      const report = buildGoalReport(goal, values);
      if (report) goals[goal.name] = report;
    }

    for (const constraint of input.constraints) {
      if (covers(values, constraint.expression)) {
        constraints[constraint.name] = evaluateConstraint(constraint, values);
      }
    }
  }

  const result: GoalProgramResult = {
    status: outcome.status,
    solverStatus: outcome.solverStatus,
    solver: input.solver,
    variables,
    deviations,
    goals,
    constraints,
    objective: outcome.objectiveValue !== undefined ? outcome.objectiveValue + input.objectiveOffset : null,
    solveTimeMs: outcome.solveTimeMs,
    stats: computeStats(input.variables, input.constraints, input.goals),
    modelVersion: GOAL_MODEL_VERSION,
  };
  if (outcome.error !== undefined) result.error = outcome.error;
  if (input.stages) result.stages = input.stages;
  return result;
}
