/**
 * Linear Program Builder
 *
 * Assembles the solver-facing program from a model's parts:
 * - Variables (decision + deviation, creation order)
 * - Constraints (hard + goal links, registration order, constants moved right)
 * - Objective: minimize Σ w_under · n_goal + w_over · p_goal (+ cost_weight · cost)
 *
 * Weighted deviations and cost are both quantities to minimize. There is no
 * maximization mode; a benefit term goes in as a goal or a negated cost.
 */

import { EmptyObjectiveError, InvalidWeightError, UnknownGoalError } from '../errors';
import type {
  Constraint,
  CostTerm,
  Goal,
  GoalWeightInput,
  GoalWeights,
  LinearProgram,
  LPConstraint,
  LPObjective,
  Variable
} from '../types';
import { toLPConstraint } from '../model/constraint';
import { LinearExpression } from '../model/expression';
import { effectiveWeights, resolveGoalWeights } from '../model/goal';

export interface ModelParts {
  name: string;
  variables: readonly Variable[];
  constraints: readonly Constraint[];
  goals: readonly Goal[];
}

/**
 * Resolve per-solve weight overrides against the model's goals
 * @throws UnknownGoalError for names the model does not have
 */
export function resolveWeightOverrides(
  goals: readonly Goal[],
  overrides: Readonly<Record<string, GoalWeightInput>> = {}
): Map<string, GoalWeights> {
  const known = new Set(goals.map(g => g.name));
  const resolved = new Map<string, GoalWeights>();
  for (const [goalName, input] of Object.entries(overrides)) {
    if (!known.has(goalName)) {
      throw new UnknownGoalError(goalName);
    }
    resolved.set(goalName, resolveGoalWeights(goalName, input));
  }
  return resolved;
}

/** Sense-masked (under, over) weights of a goal, honoring an override */
export function goalObjectiveWeights(goal: Goal, overrides: ReadonlyMap<string, GoalWeights>): GoalWeights {
  return effectiveWeights(goal.sense, overrides.get(goal.name) ?? goal.weights);
}

/** Σ w_under · n_goal + w_over · p_goal over the given goals */
export function weightedDeviationExpression(
  goals: readonly Goal[],
  overrides: ReadonlyMap<string, GoalWeights>
): LinearExpression {
  let expression = LinearExpression.constant(0);
  for (const goal of goals) {
    const weights = goalObjectiveWeights(goal, overrides);
    expression = expression
      .add(LinearExpression.term(goal.underVariable, weights.under))
      .add(LinearExpression.term(goal.overVariable, weights.over));
  }
  return expression;
}

/** cost_weight · cost, or null when there is no cost term to blend in */
export function weightedCostExpression(cost: CostTerm | undefined): LinearExpression | null {
  if (!cost) return null;
  if (!Number.isFinite(cost.weight) || cost.weight < 0) {
    throw new InvalidWeightError('cost term', cost.weight);
  }
  if (cost.weight === 0) return null;
  return LinearExpression.from(cost.expression).scale(cost.weight);
}

/**
 * Build the weighted objective
 * @throws EmptyObjectiveError with neither goals nor a cost term
 */
export function buildWeightedObjective(
  goals: readonly Goal[],
  overrides: ReadonlyMap<string, GoalWeights>,
  cost: CostTerm | undefined
): LinearExpression {
  const costExpression = weightedCostExpression(cost);
  if (goals.length === 0 && costExpression === null) {
    throw new EmptyObjectiveError();
  }
  const deviations = weightedDeviationExpression(goals, overrides);
  return costExpression ? deviations.add(costExpression) : deviations;
}

export function toLPObjective(expression: LinearExpression): LPObjective {
  return {
    direction: 'minimize',
    terms: expression.terms(),
    offset: expression.constant,
  };
}

/**
 * Assemble the full program
 * extraConstraints are appended after the model's own (lexicographic stage bounds).
 */
export function buildLinearProgram(
  parts: ModelParts,
  objective: LinearExpression,
  extraConstraints: readonly LPConstraint[] = []
): LinearProgram {
  return {
    name: parts.name,
    variables: parts.variables.map(v => ({
      name: v.name,
      lowerBound: v.lowerBound,
      upperBound: v.upperBound,
      category: v.category,
    })),
    constraints: [...parts.constraints.map(toLPConstraint), ...extraConstraints],
    objective: toLPObjective(objective),
  };
}
