/**
 * ============================================================================
 * MODEL CONSTANTS
 * ============================================================================
 *
 * Reserved names, tolerances and solver defaults live here.
 *
 * NAMING CONVENTION:
 * - SCREAMING_SNAKE_CASE for constants
 * - Related constants grouped in objects
 *
 * ============================================================================
 */

// =============================================================================
// RESERVED NAMES
// =============================================================================

/**
 * RESERVED NAME PREFIXES
 * ----------------------
 * Every goal synthesizes two deviation variables and one linking constraint,
 * named from the sanitized goal name:
 *
 *   n_<goal>          under-achievement (target - achieved, when positive)
 *   p_<goal>          over-achievement  (achieved - target, when positive)
 *   goal_link_<goal>  expression + n_<goal> - p_<goal> = target
 *
 * Lexicographic solves add one stage bound per finished priority level,
 * named priority_level_<k>. Those rows only exist in the per-stage programs.
 */
export const RESERVED_PREFIXES = {
  UNDER_DEVIATION: 'n_',
  OVER_DEVIATION: 'p_',
  GOAL_LINK: 'goal_link_',
  PRIORITY_LEVEL: 'priority_level_',
} as const;

// =============================================================================
// TOLERANCES
// =============================================================================

/**
 * NUMERICAL TOLERANCES
 * --------------------
 * ATTAINMENT: a penalized deviation at or below this counts as attained.
 * ACTIVE_CONSTRAINT: a constraint with |slack| below this is reported active.
 * LEXICOGRAPHIC_STAGE: slack added to each finished level's optimum before it
 *   becomes a bound for later levels. Without it, solver round-off can make
 *   the next stage infeasible.
 */
export const TOLERANCE = {
  ATTAINMENT: 1e-6,
  ACTIVE_CONSTRAINT: 1e-6,
  LEXICOGRAPHIC_STAGE: 1e-6,
} as const;

// =============================================================================
// GOAL DEFAULTS
// =============================================================================

/** Weight applied to both deviation directions when a goal names none */
export const DEFAULT_GOAL_WEIGHT = 1.0;

/** Priority level of a goal that names none (1 = most important) */
export const DEFAULT_GOAL_PRIORITY = 1;

// =============================================================================
// SOLVER DEFAULTS
// =============================================================================

/**
 * DEFAULT SOLVER PARAMETERS
 * -------------------------
 * HiGHS is the default solver. GLPK is available as an alternative.
 *
 * MIP_REL_GAP: relative optimality gap for integer programs. Plain LPs
 *   ignore it.
 * TIME_LIMIT_SECONDS: null = no limit, the solver runs to completion.
 */
export const DEFAULT_SOLVER_PARAMS = {
  SOLVER: 'highs',
  TIME_LIMIT_SECONDS: null,
  MIP_REL_GAP: 1e-4,
  LOG_LEVEL: 'silent',
} as const;

/**
 * ENVIRONMENT VARIABLES
 * ---------------------
 * Read by config/solverConfig.ts. Explicit options always win.
 */
export const SOLVER_ENV_VARS = {
  SOLVER: 'WGLP_SOLVER',
  LOG_LEVEL: 'WGLP_LOG_LEVEL',
  TIME_LIMIT_SECONDS: 'WGLP_TIME_LIMIT_SECONDS',
  MIP_REL_GAP: 'WGLP_MIP_REL_GAP',
} as const;

// =============================================================================
// MODEL VERSIONING
// =============================================================================

/**
 * MODEL VERSION
 * -------------
 * Reported with every result. Bump when objective assembly, deviation
 * synthesis or decoding changes what a given model solves to.
 */
export const GOAL_MODEL_VERSION = '1.0.0';
