/**
 * LP Solver Adapter using GLPK.js
 *
 * Alternative to HiGHS. The program is translated into a glpk.js problem
 * object with the same compact column/row naming the LP text uses.
 */

import type { GLPK, LP, Options, Result } from 'glpk.js';
import type { LinearProgram, LPVariable, SolveStatus, SolverAdapter, SolverOutcome, SolverParams } from '../types';
import { createLogger } from '../utils/logger';

const DUMMY_COLUMN = '_dummy_';

export interface GlpkTranslation {
  problem: LP;
  /** Original variable name per compact column name */
  columns: Map<string, string>;
}

type GlpkRow = LP['subjectTo'][number];
type GlpkTerm = GlpkRow['vars'][number];
type GlpkBound = GlpkRow['bnds'];

function toGlpkBound(glpk: GLPK, variable: LPVariable): GlpkBound {
  const { lowerBound: lb, upperBound: ub } = variable;
  if (lb === -Infinity && ub === Infinity) return { type: glpk.GLP_FR, lb: 0, ub: 0 };
  if (ub === Infinity) return { type: glpk.GLP_LO, lb, ub: 0 };
  if (lb === -Infinity) return { type: glpk.GLP_UP, lb: 0, ub };
  if (lb === ub) return { type: glpk.GLP_FX, lb, ub };
  return { type: glpk.GLP_DB, lb, ub };
}

/**
 * Convert a LinearProgram to a glpk.js problem object
 */
export function toGlpkProblem(glpk: GLPK, program: LinearProgram): GlpkTranslation {
  const columns = new Map<string, string>();
  const compactByName = new Map<string, string>();
  program.variables.forEach((variable, idx) => {
    columns.set(`x${idx}`, variable.name);
    compactByName.set(variable.name, `x${idx}`);
  });
  const columnOf = (name: string): string => {
    const compactName = compactByName.get(name);
    if (compactName === undefined) {
      throw new Error(`program references undeclared variable '${name}'`);
    }
    return compactName;
  };

  const needsDummyVar = program.variables.length === 0;
  const firstColumn = needsDummyVar ? DUMMY_COLUMN : 'x0';

  const objectiveCoefficients = new Map(program.objective.terms.map(t => [t.name, t.coefficient]));
  for (const term of program.objective.terms) columnOf(term.name);
  const objectiveVars: GlpkTerm[] = needsDummyVar
    ? [{ name: DUMMY_COLUMN, coef: 0 }]
    : program.variables.map(v => ({ name: columnOf(v.name), coef: objectiveCoefficients.get(v.name) ?? 0 }));

  const subjectTo: GlpkRow[] = program.constraints.map((constraint, idx) => {
    const vars = constraint.terms.map(t => ({ name: columnOf(t.name), coef: t.coefficient }));
    if (vars.length === 0) vars.push({ name: firstColumn, coef: 0 });

    let bnds: GlpkBound;
    if (constraint.type === 'eq') {
      bnds = { type: glpk.GLP_FX, lb: constraint.rhs, ub: constraint.rhs };
    } else if (constraint.type === 'le') {
      bnds = { type: glpk.GLP_UP, lb: 0, ub: constraint.rhs };
    } else {
      bnds = { type: glpk.GLP_LO, lb: constraint.rhs, ub: 0 };
    }
    return { name: `c${idx}`, vars, bnds };
  });

  const bounds = program.variables
    .filter(v => v.category !== 'binary')
    .map(v => ({ name: columnOf(v.name), ...toGlpkBound(glpk, v) }));

  return {
    problem: {
      name: program.name,
      objective: { direction: glpk.GLP_MIN, name: 'obj', vars: objectiveVars },
      subjectTo,
      bounds,
      binaries: program.variables.filter(v => v.category === 'binary').map(v => columnOf(v.name)),
      generals: program.variables.filter(v => v.category === 'integer').map(v => columnOf(v.name)),
    },
    columns,
  };
}

/**
 * Map a GLPK status code
 * GLPK status codes: 1=GLP_UNDEF, 2=GLP_FEAS, 3=GLP_INFEAS, 4=GLP_NOFEAS, 5=GLP_OPT, 6=GLP_UNBND
 *
 * FEAS after a solve means the search stopped with an incumbent it could
 * not prove optimal, which only happens on the time limit. UNDEF is also
 * what presolve leaves behind for an infeasible or unbounded LP, so it only
 * counts as a timeout when a time limit was set.
 */
export function mapGlpkStatus(
  glpk: GLPK,
  code: number,
  timeLimited: boolean
): { status: SolveStatus; solverStatus: string } {
  switch (code) {
    case glpk.GLP_OPT:
      return { status: 'Optimal', solverStatus: 'GLP_OPT' };
    case glpk.GLP_FEAS:
      return { status: 'Timeout', solverStatus: 'GLP_FEAS' };
    case glpk.GLP_UNDEF:
      return { status: timeLimited ? 'Timeout' : 'Error', solverStatus: 'GLP_UNDEF' };
    case glpk.GLP_INFEAS:
      return { status: 'Infeasible', solverStatus: 'GLP_INFEAS' };
    case glpk.GLP_NOFEAS:
      return { status: 'Infeasible', solverStatus: 'GLP_NOFEAS' };
    case glpk.GLP_UNBND:
      return { status: 'Unbounded', solverStatus: 'GLP_UNBND' };
    default:
      return { status: 'Error', solverStatus: `GLPK status ${code}` };
  }
}

export function buildGlpkOptions(glpk: GLPK, params: SolverParams, presolve = true): Options {
  return {
    msglev: params.logLevel === 'debug' ? glpk.GLP_MSG_ALL : glpk.GLP_MSG_OFF,
    presol: presolve,
    mipgap: params.mipRelGap,
    ...(params.timeLimitSeconds !== null ? { tmlim: params.timeLimitSeconds } : {}),
  };
}

function outOfTime(startTime: number, params: SolverParams): boolean {
  const limit = params.timeLimitSeconds;
  return limit !== null && (Date.now() - startTime) / 1000 >= limit;
}

export type GlpkLoader = () => Promise<GLPK>;

export async function loadGlpkModule(): Promise<GLPK> {
  const glpkModule = await import('glpk.js');
  return glpkModule.default();
}

export class GlpkAdapter implements SolverAdapter {
  readonly name = 'glpk';

  private glpkInstance: GLPK | null = null;
  private glpkLoadPromise: Promise<GLPK> | null = null;

  constructor(private readonly loader: GlpkLoader = loadGlpkModule) {}

  private async getGLPK(params: SolverParams): Promise<GLPK> {
    if (this.glpkInstance) return this.glpkInstance;

    if (!this.glpkLoadPromise) {
      const log = createLogger('GLPK', params.logLevel);
      this.glpkLoadPromise = (async () => {
        try {
          log.info('Loading GLPK.js...');
          const instance = await this.loader();
          log.info('GLPK loaded successfully');
          this.glpkInstance = instance;
          return instance;
        } catch (error) {
          this.glpkLoadPromise = null;
          throw error;
        }
      })();
    }
    return this.glpkLoadPromise;
  }

  async solve(program: LinearProgram, params: SolverParams): Promise<SolverOutcome> {
    const log = createLogger('GLPK', params.logLevel);
    const startTime = Date.now();
    const timeLimited = params.timeLimitSeconds !== null;

    try {
      const glpk = await this.getGLPK(params);
      const { problem, columns } = toGlpkProblem(glpk, program);

      log.info(
        `Solving problem (${program.variables.length} vars, ${problem.binaries?.length ?? 0} binary, ${problem.generals?.length ?? 0} integer, ${program.constraints.length} constraints)...`
      );

      let result: Result = await glpk.solve(problem, buildGlpkOptions(glpk, params));
      if (result.result.status === glpk.GLP_UNDEF && !outOfTime(startTime, params)) {
        // Presolve stops on infeasible and unbounded LPs without a verdict; the simplex gives one
        log.info('Presolve left the status undefined, solving again without presolve...');
        result = await glpk.solve(problem, buildGlpkOptions(glpk, params, false));
      }

      const solveTimeMs = Date.now() - startTime;
      const { status, solverStatus } = mapGlpkStatus(glpk, result.result.status, timeLimited);
      log.info(`Solve completed in ${solveTimeMs}ms, status: ${solverStatus}, objective: ${result.result.z}`);

      const outcome: SolverOutcome = { status, solverStatus, solveTimeMs };

      // GLP_UNDEF carries no usable point
      if (status === 'Optimal' || solverStatus === 'GLP_FEAS') {
        const values = new Map<string, number>();
        for (const [compactName, originalName] of columns) {
          const value = result.result.vars[compactName];
          if (typeof value === 'number') values.set(originalName, value);
        }
        outcome.values = values;
        outcome.objectiveValue = result.result.z;
      }

      return outcome;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Solve error:', message);
      return {
        status: 'Error',
        solverStatus: 'Error',
        solveTimeMs: Date.now() - startTime,
        error: message || 'Unknown solver error',
      };
    }
  }
}
