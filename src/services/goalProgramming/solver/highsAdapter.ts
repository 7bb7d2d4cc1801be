/**
 * LP Solver Adapter using HiGHS
 *
 * Uses the HiGHS WebAssembly build for LP/MIP optimization.
 *
 * Handles:
 * - Lazy loading of the solver module (once per adapter)
 * - Program conversion to CPLEX LP format
 * - Status mapping and solution extraction
 */

import type { Highs } from 'highs';
import type { LinearProgram, LPVariable, SolveStatus, SolverAdapter, SolverOutcome, SolverParams } from '../types';
import { createLogger } from '../utils/logger';

type HighsSolveOptions = NonNullable<Parameters<Highs['solve']>[1]>;

const MAX_LINE_LENGTH = 200;
const DUMMY_COLUMN = '_dummy_';

export interface LPText {
  lpString: string;
  /** Original variable name per compact column name (x0, x1, ...) */
  columns: Map<string, string>;
  /** Original constraint name per compact row name (c0, c1, ...) */
  rows: Map<string, string>;
}

/**
 * Full precision. toFixed() would flatten small weights to zero.
 */
function formatNumber(value: number): string {
  return String(value);
}

function formatTerm(coefficient: number, column: string): string {
  return `${coefficient >= 0 ? '+' : '-'} ${formatNumber(Math.abs(coefficient))} ${column}`;
}

/**
 * Lay terms out after a row label, breaking lines at MAX_LINE_LENGTH
 * (LP format allows continuation)
 */
function wrapTerms(label: string, terms: string[], tail = ''): string[] {
  const lines: string[] = [];
  let currentLine = label;
  for (const term of terms) {
    if (currentLine.length + term.length + 1 > MAX_LINE_LENGTH) {
      lines.push(currentLine);
      currentLine = ' ' + term;
    } else {
      currentLine += ' ' + term;
    }
  }
  if (tail) currentLine += ' ' + tail;
  lines.push(currentLine);
  return lines;
}

function formatBound(variable: LPVariable, column: string): string {
  const { lowerBound: lb, upperBound: ub } = variable;
  if (lb === -Infinity && ub === Infinity) return ` ${column} free`;
  if (ub === Infinity) return ` ${column} >= ${formatNumber(lb)}`;
  if (lb === -Infinity) return ` -inf <= ${column} <= ${formatNumber(ub)}`;
  return ` ${formatNumber(lb)} <= ${column} <= ${formatNumber(ub)}`;
}

/**
 * Convert a LinearProgram to LP format text for HiGHS
 * Uses compact column and row names so user names never have to satisfy
 * LP-format naming rules, and never collide.
 */
export function programToLPFormat(program: LinearProgram): LPText {
  const columns = new Map<string, string>();
  const rows = new Map<string, string>();
  const compactByName = new Map<string, string>();

  program.variables.forEach((variable, idx) => {
    const compactName = `x${idx}`;
    columns.set(compactName, variable.name);
    compactByName.set(variable.name, compactName);
  });

  const needsDummyVar = program.variables.length === 0;
  const firstColumn = needsDummyVar ? DUMMY_COLUMN : 'x0';
  const columnOf = (name: string): string => {
    const compactName = compactByName.get(name);
    if (compactName === undefined) {
      throw new Error(`program references undeclared variable '${name}'`);
    }
    return compactName;
  };

  const lines: string[] = [];

  // Objective function: every column appears, zero coefficient if absent
  lines.push('Minimize');
  const objectiveCoefficients = new Map(program.objective.terms.map(t => [t.name, t.coefficient]));
  for (const term of program.objective.terms) columnOf(term.name);
  const objectiveTerms = needsDummyVar
    ? [formatTerm(0, DUMMY_COLUMN)]
    : program.variables.map(v => formatTerm(objectiveCoefficients.get(v.name) ?? 0, columnOf(v.name)));
  lines.push(...wrapTerms(' obj:', objectiveTerms));

  // Constraints
  lines.push('Subject To');
  program.constraints.forEach((constraint, idx) => {
    const rowName = `c${idx}`;
    rows.set(rowName, constraint.name);
    const terms = constraint.terms.map(t => formatTerm(t.coefficient, columnOf(t.name)));
    // An emptied row still has to be checked against its rhs
    if (terms.length === 0) terms.push(formatTerm(0, firstColumn));
    const op = constraint.type === 'eq' ? '=' : constraint.type === 'le' ? '<=' : '>=';
    lines.push(...wrapTerms(` ${rowName}:`, terms, `${op} ${formatNumber(constraint.rhs)}`));
  });

  // Bounds
  lines.push('Bounds');
  if (needsDummyVar) {
    lines.push(` ${DUMMY_COLUMN} >= 0`);
  }
  for (const variable of program.variables) {
    if (variable.category === 'binary') continue;
    lines.push(formatBound(variable, columnOf(variable.name)));
  }

  const integers = program.variables.filter(v => v.category === 'integer');
  if (integers.length > 0) {
    lines.push('General');
    for (const variable of integers) lines.push(` ${columnOf(variable.name)}`);
  }

  const binaries = program.variables.filter(v => v.category === 'binary');
  if (binaries.length > 0) {
    lines.push('Binary');
    for (const variable of binaries) lines.push(` ${columnOf(variable.name)}`);
  }

  lines.push('End');

  return { lpString: lines.join('\n'), columns, rows };
}

/**
 * Map HiGHS model status text to a SolveStatus
 */
export function mapHighsStatus(status: string): SolveStatus {
  switch (status) {
    case 'Optimal':
      return 'Optimal';
    case 'Infeasible':
      return 'Infeasible';
    case 'Unbounded':
      return 'Unbounded';
    case 'Time limit reached':
      return 'Timeout';
    default:
      return 'Error';
  }
}

function primalOf(column: object | undefined): number | undefined {
  if (column && 'Primal' in column && typeof column.Primal === 'number') {
    return column.Primal;
  }
  return undefined;
}

/** Presolve answers this when it cannot tell the two apart */
function isUndecidedStatus(status: string): boolean {
  return status === 'Primal infeasible or unbounded';
}

export function buildHighsOptions(params: SolverParams, presolve = true): HighsSolveOptions {
  return {
    presolve: presolve ? 'choose' : 'off',
    mip_rel_gap: params.mipRelGap,
    output_flag: params.logLevel === 'debug',
    ...(params.timeLimitSeconds !== null ? { time_limit: params.timeLimitSeconds } : {}),
  };
}

export class HighsAdapter implements SolverAdapter {
  readonly name = 'highs';

  private highsInstance: Highs | null = null;
  private highsLoadPromise: Promise<Highs> | null = null;

  /**
   * Get or load the HiGHS instance
   */
  private async getHiGHS(params: SolverParams): Promise<Highs> {
    if (this.highsInstance) return this.highsInstance;

    if (!this.highsLoadPromise) {
      const log = createLogger('HiGHS', params.logLevel);
      this.highsLoadPromise = (async () => {
        try {
          log.info('Loading HiGHS WebAssembly...');
          const highsModule = await import('highs');
          const instance = await highsModule.default({});
          log.info('HiGHS loaded successfully');
          this.highsInstance = instance;
          return instance;
        } catch (error) {
          // A failed load must not poison later attempts
          this.highsLoadPromise = null;
          throw error;
        }
      })();
    }
    return this.highsLoadPromise;
  }

  /**
   * Drop the instance after a thrown solve. The WebAssembly heap may be
   * left in a bad state.
   */
  private resetHiGHSInstance(): void {
    this.highsInstance = null;
    this.highsLoadPromise = null;
  }

  async solve(program: LinearProgram, params: SolverParams): Promise<SolverOutcome> {
    const log = createLogger('HiGHS', params.logLevel);
    const startTime = Date.now();

    try {
      const highs = await this.getHiGHS(params);
      const { lpString, columns } = programToLPFormat(program);

      const lpLines = lpString.split('\n');
      log.info(
        `Solving problem (${program.variables.length} vars, ${program.constraints.length} constraints, ${lpLines.length} LP lines)...`
      );
      log.debug(`LP format preview:\n${lpLines.slice(0, 5).join('\n')}\n...\n${lpLines.slice(-5).join('\n')}`);

      let solution = highs.solve(lpString, buildHighsOptions(params));
      if (isUndecidedStatus(solution.Status)) {
        log.info(`Presolve returned '${solution.Status}', solving again without presolve...`);
        solution = highs.solve(lpString, buildHighsOptions(params, false));
      }
      const solveTimeMs = Date.now() - startTime;
      const status = mapHighsStatus(solution.Status);
      log.info(`Solve completed in ${solveTimeMs}ms, status: ${solution.Status}`);

      const outcome: SolverOutcome = { status, solverStatus: solution.Status, solveTimeMs };

      // Extract solution
      if (status === 'Optimal' || status === 'Timeout') {
        const values = new Map<string, number>();
        for (const [compactName, originalName] of columns) {
          const value = primalOf(solution.Columns[compactName]);
          if (value !== undefined) values.set(originalName, value);
        }
        if (values.size > 0 || program.variables.length === 0) {
          outcome.values = values;
          if (Number.isFinite(solution.ObjectiveValue)) {
            outcome.objectiveValue = solution.ObjectiveValue;
          }
        }
      }

      return outcome;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('Solve error:', message);
      this.resetHiGHSInstance();
      return {
        status: 'Error',
        solverStatus: 'Error',
        solveTimeMs: Date.now() - startTime,
        error: message || 'Unknown solver error',
      };
    }
  }
}
