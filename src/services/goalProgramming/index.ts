/**
 * Weighted Goal Programming - Public API
 *
 * Usage:
 * ```typescript
 * import { WeightedGoalModel, term } from '@/services/goalProgramming';
 *
 * const model = new WeightedGoalModel('diet');
 * const rice = model.addVariable('Rice');
 * const dal = model.addVariable('Dal');
 * model.addConstraint({ name: 'capacity', expression: term(rice).add(dal), sense: '<=', rhs: 20 });
 * model.addGoal({ name: 'energy', expression: term(rice, 5).add(term(dal, 10)), target: 200 });
 *
 * const result = await model.solveWeighted();
 * console.log(result.status, result.deviations.energy);
 * ```
 */

// Types
export * from './types';
export * from './errors';

// Main Model
export { WeightedGoalModel, type WeightedGoalModelOptions } from './goalModel';

// Expressions
export { LinearExpression, term, constant, sum, type Assignment } from './model/expression';

// Declarations
export { parseConstraintSense, senseSymbol, describeConstraint } from './model/constraint';
export { parseGoalSense, resolveGoalWeights, effectiveWeights } from './model/goal';
export { sanitizeName, goalArtifactNames } from './model/naming';

// Objective
export { buildWeightedObjective, buildLinearProgram } from './objective/programBuilder';

// Solver
export { createSolverAdapter, HighsAdapter, GlpkAdapter, programToLPFormat, toGlpkProblem } from './solver';
export type { GlpkLoader } from './solver';

// Post-processing
export { decodeResult } from './postprocessing/resultDecoder';
export { formatResultSummary } from './postprocessing/resultSummary';

// Logging
export { createLogger, type Logger } from './utils/logger';
