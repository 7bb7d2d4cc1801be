/**
 * Weighted Goal Model
 *
 * Main entry point for building and solving a weighted goal program.
 *
 * Build flow (synchronous, in call order):
 * 1. addVariable: decision variables with bounds and category
 * 2. addConstraint: hard linear constraints
 * 3. addGoal: soft targets; each synthesizes n_<goal>, p_<goal> and
 *    goal_link_<goal> atomically
 *
 * Solve flow:
 * 1. Assemble the objective (weighted deviations + optional cost)
 * 2. Build the linear program
 * 3. Solve with the configured adapter (HiGHS by default)
 * 4. Decode into a structured result
 *
 * Goals and constraints share one namespace; variables have their own.
 * Misuse throws synchronously; solver outcomes come back as result status.
 */

import { TOLERANCE } from '@/_domain';
import { resolveSolverParams, type SolverEnv } from '@/config/solverConfig';
import {
  DuplicateNameError,
  EmptyObjectiveError,
  InvalidBoundsError,
  InvalidCoefficientError,
  UnknownGoalError
} from './errors';
import type {
  Constraint,
  ConstraintInput,
  ExpressionLike,
  Goal,
  GoalInput,
  GoalProgramResult,
  LexicographicSolveOptions,
  LexicographicStage,
  LinearProgram,
  LPConstraint,
  SolveOptions,
  SolverAdapter,
  SolverOutcome,
  SolverParams,
  Variable,
  VariableOptions
} from './types';
import { LinearExpression } from './model/expression';
import { createConstraint, describeConstraint, parseConstraintSense } from './model/constraint';
import { parseGoalSense, resolveGoalPriority, resolveGoalWeights } from './model/goal';
import { assertName, goalArtifactNames, priorityLevelConstraintName } from './model/naming';
import { VariableRegistry } from './model/variableRegistry';
import {
  buildLinearProgram,
  buildWeightedObjective,
  resolveWeightOverrides,
  weightedCostExpression,
  weightedDeviationExpression,
  type ModelParts
} from './objective/programBuilder';
import { decodeResult } from './postprocessing/resultDecoder';
import { createSolverAdapter } from './solver';
import { createLogger, type Logger } from './utils/logger';

export interface WeightedGoalModelOptions {
  /** Defaults to the adapter for params.solver */
  solver?: SolverAdapter;
  params?: Partial<SolverParams>;
  /** Environment read for solver parameters; defaults to process.env */
  env?: SolverEnv;
}

export class WeightedGoalModel {
  readonly name: string;
  readonly params: SolverParams;

  private readonly registry = new VariableRegistry();
  private readonly constraintsByName = new Map<string, Constraint>();
  private readonly goalsByName = new Map<string, Goal>();
  private readonly adapter: SolverAdapter;
  private readonly log: Logger;

  constructor(name = 'wglp', options: WeightedGoalModelOptions = {}) {
    this.name = assertName(name, 'model');
    this.params = resolveSolverParams(options.params, options.env);
    this.adapter = options.solver ?? createSolverAdapter(this.params.solver);
    this.log = createLogger('Model', this.params.logLevel);
  }

  // ===========================================================================
  // Variables
  // ===========================================================================

  /**
   * Declare a decision variable
   * @throws DuplicateNameError when the name is taken (including by a
   *   deviation variable)
   */
  addVariable(name: string, options: VariableOptions = {}): Variable {
    const variable = this.registry.create(name, options, 'decision');
    this.log.debug(`Added variable '${name}' [${variable.lowerBound}, ${variable.upperBound}] ${variable.category}`);
    return variable;
  }

  /** @throws UnknownVariableError */
  variable(name: string): Variable {
    return this.registry.lookup(name);
  }

  hasVariable(name: string): boolean {
    return this.registry.has(name);
  }

  /** Decision and deviation variables, in creation order */
  get variables(): Variable[] {
    return this.registry.values();
  }

  get decisionVariables(): Variable[] {
    return this.registry.decisionVariables();
  }

  get numVariables(): number {
    return this.registry.size;
  }

  // ===========================================================================
  // Constraints
  // ===========================================================================

  /**
   * Add a hard constraint
   * @throws DuplicateNameError when a constraint or goal already has the name
   * @throws UnknownVariableError for variables not in this model
   */
  addConstraint(input: ConstraintInput): Constraint {
    assertName(input.name, 'constraint');
    const type = parseConstraintSense(input.sense);
    this.assertNameFree(input.name, 'constraint');
    const expression = this.resolveExpression(input.expression);

    const constraint = createConstraint({
      name: input.name,
      expression,
      type,
      rhs: input.rhs,
      kind: 'hard',
    });
    this.constraintsByName.set(constraint.name, constraint);
    this.log.debug(`Added constraint ${describeConstraint(constraint)}`);
    return constraint;
  }

  /** Hard constraints and goal links, in registration order */
  get constraints(): Constraint[] {
    return Array.from(this.constraintsByName.values());
  }

  get numConstraints(): number {
    return this.constraintsByName.size;
  }

  // ===========================================================================
  // Goals
  // ===========================================================================

  /**
   * Add a goal
   *
   * Creates n_<goal> and p_<goal> (continuous, >= 0) and the linking
   * constraint goal_link_<goal>: expression + n - p = target.
   * All-or-nothing: every check runs before anything is registered.
   *
   * @throws DuplicateNameError on a goal/constraint name clash, or when a
   *   synthesized name is already taken
   */
  addGoal(input: GoalInput): Goal {
    const name = assertName(input.name, 'goal');
    const sense = parseGoalSense(input.sense ?? 'attain');
    const weights = resolveGoalWeights(name, input.weight);
    const priority = resolveGoalPriority(name, input.priority);
    if (!Number.isFinite(input.target)) {
      throw new InvalidCoefficientError(`goal '${name}': target must be a finite number, got ${input.target}`);
    }
    const expression = this.resolveExpression(input.expression);

    this.assertNameFree(name, 'goal');
    const artifacts = goalArtifactNames(name);
    this.registry.assertAvailable(artifacts.under);
    this.registry.assertAvailable(artifacts.over);
    this.assertNameFree(artifacts.link, 'constraint');

    // Nothing below can fail
    const underVariable = this.registry.create(artifacts.under, {}, 'deviation');
    const overVariable = this.registry.create(artifacts.over, {}, 'deviation');
    const link = createConstraint({
      name: artifacts.link,
      expression: expression.add(underVariable).subtract(overVariable),
      type: 'eq',
      rhs: input.target,
      kind: 'goal-link',
      goal: name,
    });

    const goal: Goal = Object.freeze({
      name,
      expression,
      target: input.target,
      sense,
      weights: Object.freeze(weights),
      priority,
      underVariable,
      overVariable,
      link,
    });
    this.constraintsByName.set(link.name, link);
    this.goalsByName.set(name, goal);
    this.log.debug(
      `Added goal '${name}' (${sense}, target ${input.target}, weights ${weights.under}/${weights.over}, priority ${priority})`
    );
    return goal;
  }

  /** @throws UnknownGoalError */
  goal(name: string): Goal {
    const goal = this.goalsByName.get(name);
    if (!goal) {
      throw new UnknownGoalError(name);
    }
    return goal;
  }

  get goals(): Goal[] {
    return Array.from(this.goalsByName.values());
  }

  get numGoals(): number {
    return this.goalsByName.size;
  }

  // ===========================================================================
  // Solving
  // ===========================================================================

  /**
   * The program a weighted solve would hand to the solver
   * @throws EmptyObjectiveError with no goals and no cost term
   */
  buildProgram(options: SolveOptions = {}): LinearProgram {
    const overrides = resolveWeightOverrides(this.goals, options.goalWeights);
    const cost = options.cost ? { ...options.cost, expression: this.resolveExpression(options.cost.expression) } : undefined;
    const objective = buildWeightedObjective(this.goals, overrides, cost);
    return buildLinearProgram(this.parts(), objective);
  }

  /**
   * Minimize Σ w_under · n + w_over · p (+ cost_weight · cost) in one solve
   *
   * Validation errors throw before any solver work; the returned promise
   * only carries the solve itself.
   */
  solveWeighted(options: SolveOptions = {}): Promise<GoalProgramResult> {
    const program = this.buildProgram(options);
    const params = this.resolveParams(options);
    return this.runWeighted(program, params);
  }

  /**
   * Preemptive goal programming over priority levels
   *
   * Each level minimizes its own weighted deviations while every earlier
   * level stays within its optimum + tolerance. A cost term, if given, is
   * minimized last under all level bounds. The model itself is not changed.
   */
  solveLexicographic(options: LexicographicSolveOptions = {}): Promise<GoalProgramResult> {
    const goals = this.goals;
    const overrides = resolveWeightOverrides(goals, options.goalWeights);
    const cost = options.cost ? { ...options.cost, expression: this.resolveExpression(options.cost.expression) } : undefined;
    const costExpression = weightedCostExpression(cost);
    if (goals.length === 0 && costExpression === null) {
      throw new EmptyObjectiveError();
    }
    const tolerance = options.tolerance ?? TOLERANCE.LEXICOGRAPHIC_STAGE;
    if (!Number.isFinite(tolerance) || tolerance < 0) {
      throw new InvalidBoundsError(`tolerance must be a finite number >= 0, got ${tolerance}`);
    }
    const params = this.resolveParams(options);

    const levels = Array.from(new Set(goals.map(g => g.priority))).sort((a, b) => a - b);
    const stageObjectives = levels.map(level => {
      const levelGoals = goals.filter(g => g.priority === level);
      return {
        priority: level,
        goals: levelGoals.map(g => g.name),
        objective: weightedDeviationExpression(levelGoals, overrides),
      };
    });

    return this.runLexicographic(stageObjectives, costExpression, tolerance, params);
  }

  // ===========================================================================
  // Description
  // ===========================================================================

  /** Constraint listing, one per line */
  describe(): string {
    const lines = [`${this.toString()}`];
    for (const constraint of this.constraintsByName.values()) {
      lines.push(`  ${describeConstraint(constraint)}`);
    }
    return lines.join('\n');
  }

  toString(): string {
    return `WeightedGoalModel(name=${this.name}, vars=${this.numVariables}, constraints=${this.numConstraints}, goals=${this.numGoals})`;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private parts(): ModelParts {
    return {
      name: this.name,
      variables: this.variables,
      constraints: this.constraints,
      goals: this.goals,
    };
  }

  /** @throws UnknownVariableError for variables not in this model */
  private resolveExpression(value: ExpressionLike): LinearExpression {
    const expression = LinearExpression.from(value);
    for (const name of expression.variableNames) {
      this.registry.lookup(name);
    }
    return expression;
  }

  /** Goals and constraints share one namespace */
  private assertNameFree(name: string, kind: 'constraint' | 'goal'): void {
    if (this.constraintsByName.has(name)) {
      throw new DuplicateNameError(kind, name, 'constraint');
    }
    if (this.goalsByName.has(name)) {
      throw new DuplicateNameError(kind, name, 'goal');
    }
  }

  private resolveParams(options: SolveOptions): SolverParams {
    const timeLimitSeconds = options.timeLimitSeconds;
    if (timeLimitSeconds === undefined) return this.params;
    if (timeLimitSeconds !== null && !(Number.isFinite(timeLimitSeconds) && timeLimitSeconds > 0)) {
      throw new InvalidBoundsError(`time limit must be a positive number of seconds, got ${timeLimitSeconds}`);
    }
    return { ...this.params, timeLimitSeconds };
  }

  private async runWeighted(program: LinearProgram, params: SolverParams): Promise<GoalProgramResult> {
    this.log.info(
      `Solving '${this.name}' with ${this.adapter.name} (${program.variables.length} vars, ${program.constraints.length} constraints, ${this.numGoals} goals)`
    );
    const outcome = await this.adapter.solve(program, params);
    this.log.info(`Status: ${outcome.status} (${outcome.solverStatus}) in ${outcome.solveTimeMs}ms`);
    return decodeResult({
      variables: this.variables,
      constraints: this.constraints,
      goals: this.goals,
      outcome,
      solver: this.adapter.name,
      objectiveOffset: program.objective.offset,
    });
  }

  private async runLexicographic(
    levels: Array<{ priority: number; goals: string[]; objective: LinearExpression }>,
    costExpression: LinearExpression | null,
    tolerance: number,
    params: SolverParams
  ): Promise<GoalProgramResult> {
    const parts = this.parts();
    const stageBounds: LPConstraint[] = [];
    const stages: LexicographicStage[] = [];
    const plan: Array<{ priority: number | null; goals: string[]; objective: LinearExpression }> = [...levels];
    if (costExpression) {
      plan.push({ priority: null, goals: [], objective: costExpression });
    }

    let outcome: SolverOutcome | null = null;
    let offset = 0;
    let totalTimeMs = 0;

    for (const stage of plan) {
      const program = buildLinearProgram(parts, stage.objective, stageBounds);
      const label = stage.priority === null ? 'cost' : `priority ${stage.priority}`;
      this.log.info(`Lexicographic stage ${label}: ${stage.goals.length} goals, ${stageBounds.length} level bounds`);

      outcome = await this.adapter.solve(program, params);
      offset = program.objective.offset;
      totalTimeMs += outcome.solveTimeMs;
      const stageObjective = outcome.objectiveValue !== undefined ? outcome.objectiveValue + offset : null;
      stages.push({
        priority: stage.priority,
        goals: stage.goals,
        status: outcome.status,
        objective: stageObjective,
      });

      if (outcome.status !== 'Optimal' || outcome.objectiveValue === undefined) {
        this.log.warn(`Lexicographic stage ${label} ended ${outcome.status} (${outcome.solverStatus}), stopping`);
        break;
      }

      const terms = stage.objective.terms();
      if (stage.priority !== null && terms.length > 0) {
        stageBounds.push({
          name: priorityLevelConstraintName(stage.priority),
          type: 'le',
          terms,
          rhs: outcome.objectiveValue + tolerance,
        });
      }
    }

    // plan is never empty: there is at least one goal or a cost term
    const finalOutcome: SolverOutcome = outcome
      ? { ...outcome, solveTimeMs: totalTimeMs }
      : { status: 'Error', solverStatus: 'Error', solveTimeMs: 0, error: 'no stages to solve' };

    return decodeResult({
      variables: this.variables,
      constraints: this.constraints,
      goals: this.goals,
      outcome: finalOutcome,
      solver: this.adapter.name,
      objectiveOffset: offset,
      stages,
    });
  }
}
