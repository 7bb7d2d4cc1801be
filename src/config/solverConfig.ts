import { DEFAULT_SOLVER_PARAMS, SOLVER_ENV_VARS } from '@/_domain';
import type { LogLevel, SolverKind, SolverParams } from '@/services/goalProgramming/types';
import { createLogger } from '@/services/goalProgramming/utils/logger';

export type SolverEnv = Readonly<Record<string, string | undefined>>;

export const DEFAULT_SOLVER_CONFIG: SolverParams = {
  solver: DEFAULT_SOLVER_PARAMS.SOLVER,
  timeLimitSeconds: DEFAULT_SOLVER_PARAMS.TIME_LIMIT_SECONDS,
  mipRelGap: DEFAULT_SOLVER_PARAMS.MIP_REL_GAP,
  logLevel: DEFAULT_SOLVER_PARAMS.LOG_LEVEL,
};

const SOLVER_KINDS: readonly SolverKind[] = ['highs', 'glpk'];
const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

const log = createLogger('Config', 'silent');

function isSolverKind(value: string): value is SolverKind {
  return SOLVER_KINDS.some(kind => kind === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function readEnv(env: SolverEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function parsePositiveNumber(raw: string): number | null {
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : null;
}

function parseNonNegativeNumber(raw: string): number | null {
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

/**
 * Solver parameters from the environment
 * Unset variables are skipped; invalid ones are skipped with a warning.
 */
export function solverParamsFromEnv(env: SolverEnv): Partial<SolverParams> {
  const params: Partial<SolverParams> = {};

  const solver = readEnv(env, SOLVER_ENV_VARS.SOLVER);
  if (solver !== undefined) {
    const kind = solver.toLowerCase();
    if (isSolverKind(kind)) params.solver = kind;
    else log.warn(`Ignoring ${SOLVER_ENV_VARS.SOLVER}='${solver}', expected one of: ${SOLVER_KINDS.join(', ')}`);
  }

  const logLevel = readEnv(env, SOLVER_ENV_VARS.LOG_LEVEL);
  if (logLevel !== undefined) {
    const level = logLevel.toLowerCase();
    if (isLogLevel(level)) params.logLevel = level;
    else log.warn(`Ignoring ${SOLVER_ENV_VARS.LOG_LEVEL}='${logLevel}', expected one of: ${LOG_LEVELS.join(', ')}`);
  }

  const timeLimit = readEnv(env, SOLVER_ENV_VARS.TIME_LIMIT_SECONDS);
  if (timeLimit !== undefined) {
    const seconds = parsePositiveNumber(timeLimit);
    if (seconds !== null) params.timeLimitSeconds = seconds;
    else log.warn(`Ignoring ${SOLVER_ENV_VARS.TIME_LIMIT_SECONDS}='${timeLimit}', expected a positive number`);
  }

  const gap = readEnv(env, SOLVER_ENV_VARS.MIP_REL_GAP);
  if (gap !== undefined) {
    const mipRelGap = parseNonNegativeNumber(gap);
    if (mipRelGap !== null) params.mipRelGap = mipRelGap;
    else log.warn(`Ignoring ${SOLVER_ENV_VARS.MIP_REL_GAP}='${gap}', expected a number >= 0`);
  }

  return params;
}

/** Drops keys explicitly set to undefined so they do not shadow lower layers */
function definedOnly(overrides: Partial<SolverParams>): Partial<SolverParams> {
  const result: Partial<SolverParams> = {};
  if (overrides.solver !== undefined) result.solver = overrides.solver;
  if (overrides.timeLimitSeconds !== undefined) result.timeLimitSeconds = overrides.timeLimitSeconds;
  if (overrides.mipRelGap !== undefined) result.mipRelGap = overrides.mipRelGap;
  if (overrides.logLevel !== undefined) result.logLevel = overrides.logLevel;
  return result;
}

/**
 * Resolve solver parameters: defaults ← environment ← explicit overrides
 */
export function resolveSolverParams(
  overrides: Partial<SolverParams> = {},
  env: SolverEnv = process.env
): SolverParams {
  return {
    ...DEFAULT_SOLVER_CONFIG,
    ...solverParamsFromEnv(env),
    ...definedOnly(overrides),
  };
}
