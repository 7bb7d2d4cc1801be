/**
 * Goal declarations: sense parsing, weight resolution and the sense mask
 *
 * Sense decides which deviation directions reach the objective:
 *
 * | sense          | under weight | over weight |
 * |----------------|--------------|-------------|
 * | attain         | w_under      | w_over      |
 * | minimize_under | w_under      | 0           |
 * | minimize_over  | 0            | w_over      |
 *
 * The unpenalized deviation variable of a one-sided goal still exists so the
 * linking equation stays well-posed.
 */

import { DEFAULT_GOAL_PRIORITY, DEFAULT_GOAL_WEIGHT } from '@/_domain';
import { InvalidBoundsError, InvalidSenseError, InvalidWeightError } from '../errors';
import type { Goal, GoalSense, GoalWeightInput, GoalWeights } from '../types';

const GOAL_SENSES: readonly GoalSense[] = ['attain', 'minimize_under', 'minimize_over'];

function isGoalSense(value: string): value is GoalSense {
  return GOAL_SENSES.some(sense => sense === value);
}

/**
 * Parse a goal sense. Case and '-'/'_' are normalized:
 * 'Minimize-Under' → 'minimize_under'.
 * @throws InvalidSenseError
 */
export function parseGoalSense(sense: string): GoalSense {
  const key = typeof sense === 'string' ? sense.trim().toLowerCase().replace(/-/g, '_') : '';
  if (!isGoalSense(key)) {
    throw new InvalidSenseError('goal', sense, GOAL_SENSES);
  }
  return key;
}

function assertWeight(context: string, weight: number): number {
  if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
    throw new InvalidWeightError(context, weight);
  }
  return weight;
}

function isWeightPair(input: GoalWeightInput): input is readonly [number, number] {
  return Array.isArray(input);
}

/**
 * Resolve a weight input into an (under, over) pair
 * A single number applies to both directions.
 * @throws InvalidWeightError for negative or non-finite weights
 */
export function resolveGoalWeights(goalName: string, input: GoalWeightInput = DEFAULT_GOAL_WEIGHT): GoalWeights {
  const context = `goal '${goalName}'`;
  if (typeof input === 'number') {
    const weight = assertWeight(context, input);
    return { under: weight, over: weight };
  }
  if (isWeightPair(input)) {
    return {
      under: assertWeight(`${context} (under)`, input[0]),
      over: assertWeight(`${context} (over)`, input[1]),
    };
  }
  return {
    under: assertWeight(`${context} (under)`, input.under),
    over: assertWeight(`${context} (over)`, input.over),
  };
}

/** @throws InvalidBoundsError unless priority is a positive integer */
export function resolveGoalPriority(goalName: string, priority: number = DEFAULT_GOAL_PRIORITY): number {
  if (!Number.isInteger(priority) || priority < 1) {
    throw new InvalidBoundsError(`goal '${goalName}': priority must be a positive integer, got ${priority}`);
  }
  return priority;
}

/** Apply the sense mask to a weight pair */
export function effectiveWeights(sense: GoalSense, weights: GoalWeights): GoalWeights {
  switch (sense) {
    case 'attain':
      return { under: weights.under, over: weights.over };
    case 'minimize_under':
      return { under: weights.under, over: 0 };
    case 'minimize_over':
      return { under: 0, over: weights.over };
  }
}

/** Penalized directions, for attainment checks */
export function penalizedDirections(goal: Pick<Goal, 'sense'>): { under: boolean; over: boolean } {
  switch (goal.sense) {
    case 'attain':
      return { under: true, over: true };
    case 'minimize_under':
      return { under: true, over: false };
    case 'minimize_over':
      return { under: false, over: true };
  }
}
