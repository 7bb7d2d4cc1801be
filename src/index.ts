export * from './services/goalProgramming';
export { resolveSolverParams, solverParamsFromEnv, DEFAULT_SOLVER_CONFIG, type SolverEnv } from './config/solverConfig';
export { GOAL_MODEL_VERSION, RESERVED_PREFIXES, TOLERANCE } from './_domain';
