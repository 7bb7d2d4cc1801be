import { describe, expect, it } from 'vitest';
import { DEFAULT_SOLVER_CONFIG } from '@/config/solverConfig';
import type { LinearProgram } from '../types';
import { buildHighsOptions, HighsAdapter, mapHighsStatus, programToLPFormat } from './highsAdapter';

const mixedProgram: LinearProgram = {
  name: 'mixed',
  variables: [
    { name: 'Rice', lowerBound: 0, upperBound: Infinity, category: 'continuous' },
    { name: 'Dal', lowerBound: 0, upperBound: 20, category: 'continuous' },
    { name: 'free var', lowerBound: -Infinity, upperBound: Infinity, category: 'continuous' },
    { name: 'cap', lowerBound: -Infinity, upperBound: 5, category: 'integer' },
    { name: 'pick', lowerBound: 0, upperBound: 1, category: 'binary' },
  ],
  constraints: [
    {
      name: 'capacity',
      type: 'le',
      terms: [
        { name: 'Rice', coefficient: 1 },
        { name: 'Dal', coefficient: 1 },
      ],
      rhs: 20,
    },
    { name: 'emptied', type: 'ge', terms: [], rhs: -1 },
  ],
  objective: {
    direction: 'minimize',
    terms: [
      { name: 'Dal', coefficient: 10 },
      { name: 'free var', coefficient: -0.5 },
    ],
    offset: 0,
  },
};

describe('programToLPFormat', () => {
  it('renders objective, rows, bounds and integrality with compact names', () => {
    const { lpString, columns, rows } = programToLPFormat(mixedProgram);
    expect(lpString).toBe(
      [
        'Minimize',
        ' obj: + 0 x0 + 10 x1 - 0.5 x2 + 0 x3 + 0 x4',
        'Subject To',
        ' c0: + 1 x0 + 1 x1 <= 20',
        ' c1: + 0 x0 >= -1',
        'Bounds',
        ' x0 >= 0',
        ' 0 <= x1 <= 20',
        ' x2 free',
        ' -inf <= x3 <= 5',
        'General',
        ' x3',
        'Binary',
        ' x4',
        'End',
      ].join('\n')
    );
    expect(columns.get('x2')).toBe('free var');
    expect(rows.get('c1')).toBe('emptied');
  });

  it('declares a placeholder column for a program without variables', () => {
    const { lpString } = programToLPFormat({
      name: 'empty',
      variables: [],
      constraints: [],
      objective: { direction: 'minimize', terms: [], offset: 0 },
    });
    expect(lpString).toBe(['Minimize', ' obj: + 0 _dummy_', 'Subject To', 'Bounds', ' _dummy_ >= 0', 'End'].join('\n'));
  });

  it('wraps long rows', () => {
    const variables = Array.from({ length: 80 }, (_, i) => ({
      name: `v${i}`,
      lowerBound: 0,
      upperBound: Infinity,
      category: 'continuous' as const,
    }));
    const { lpString } = programToLPFormat({
      name: 'wide',
      variables,
      constraints: [{ name: 'total', type: 'le', terms: variables.map(v => ({ name: v.name, coefficient: 1 })), rhs: 1 }],
      objective: { direction: 'minimize', terms: [], offset: 0 },
    });
    const lines = lpString.split('\n');
    expect(lines.length).toBeGreaterThan(10);
    expect(lines.every(line => line.length <= 200)).toBe(true);
  });

  it('refuses terms on undeclared variables', () => {
    expect(() =>
      programToLPFormat({
        name: 'broken',
        variables: [],
        constraints: [{ name: 'c', type: 'eq', terms: [{ name: 'ghost', coefficient: 1 }], rhs: 0 }],
        objective: { direction: 'minimize', terms: [], offset: 0 },
      })
    ).toThrow("program references undeclared variable 'ghost'");
  });
});

describe('mapHighsStatus', () => {
  it('maps HiGHS model status text', () => {
    expect(mapHighsStatus('Optimal')).toBe('Optimal');
    expect(mapHighsStatus('Infeasible')).toBe('Infeasible');
    expect(mapHighsStatus('Unbounded')).toBe('Unbounded');
    expect(mapHighsStatus('Time limit reached')).toBe('Timeout');
    expect(mapHighsStatus('Iteration limit reached')).toBe('Error');
  });

  it('leaves an undecided presolve verdict as an error', () => {
    expect(mapHighsStatus('Primal infeasible or unbounded')).toBe('Error');
  });
});

describe('buildHighsOptions', () => {
  it('passes the time limit only when set', () => {
    expect(buildHighsOptions(DEFAULT_SOLVER_CONFIG)).toEqual({
      presolve: 'choose',
      mip_rel_gap: 1e-4,
      output_flag: false,
    });
    expect(buildHighsOptions({ ...DEFAULT_SOLVER_CONFIG, timeLimitSeconds: 5, logLevel: 'debug' })).toEqual({
      presolve: 'choose',
      mip_rel_gap: 1e-4,
      output_flag: true,
      time_limit: 5,
    });
  });

  it('turns presolve off on request', () => {
    expect(buildHighsOptions(DEFAULT_SOLVER_CONFIG, false).presolve).toBe('off');
  });
});

describe('HighsAdapter', () => {
  const adapter = new HighsAdapter();

  it('solves a small LP', async () => {
    const outcome = await adapter.solve(
      {
        name: 'floor',
        variables: [{ name: 'x', lowerBound: 0, upperBound: Infinity, category: 'continuous' }],
        constraints: [{ name: 'floor', type: 'ge', terms: [{ name: 'x', coefficient: 1 }], rhs: 3 }],
        objective: { direction: 'minimize', terms: [{ name: 'x', coefficient: 2 }], offset: 0 },
      },
      DEFAULT_SOLVER_CONFIG
    );
    expect(outcome.status).toBe('Optimal');
    expect(outcome.solverStatus).toBe('Optimal');
    expect(outcome.values?.get('x')).toBeCloseTo(3, 6);
    expect(outcome.objectiveValue).toBeCloseTo(6, 6);
  });

  it('reports infeasibility without values', async () => {
    const outcome = await adapter.solve(
      {
        name: 'clash',
        variables: [{ name: 'x', lowerBound: 0, upperBound: Infinity, category: 'continuous' }],
        constraints: [
          { name: 'low', type: 'le', terms: [{ name: 'x', coefficient: 1 }], rhs: 1 },
          { name: 'high', type: 'ge', terms: [{ name: 'x', coefficient: 1 }], rhs: 2 },
        ],
        objective: { direction: 'minimize', terms: [{ name: 'x', coefficient: 1 }], offset: 0 },
      },
      DEFAULT_SOLVER_CONFIG
    );
    expect(outcome.status).toBe('Infeasible');
    expect(outcome.values).toBeUndefined();
    expect(outcome.objectiveValue).toBeUndefined();
  });

  it('reports an unbounded LP', async () => {
    const outcome = await adapter.solve(
      {
        name: 'open',
        variables: [{ name: 'x', lowerBound: 0, upperBound: Infinity, category: 'continuous' }],
        constraints: [{ name: 'floor', type: 'ge', terms: [{ name: 'x', coefficient: 1 }], rhs: 1 }],
        objective: { direction: 'minimize', terms: [{ name: 'x', coefficient: -1 }], offset: 0 },
      },
      DEFAULT_SOLVER_CONFIG
    );
    expect(outcome.status).toBe('Unbounded');
    expect(outcome.values).toBeUndefined();
  });

  it('solves integer programs', async () => {
    const outcome = await adapter.solve(
      {
        name: 'knapsack',
        variables: [
          { name: 'a', lowerBound: 0, upperBound: 1, category: 'binary' },
          { name: 'b', lowerBound: 0, upperBound: 1, category: 'binary' },
        ],
        constraints: [
          {
            name: 'budget',
            type: 'le',
            terms: [
              { name: 'a', coefficient: 3 },
              { name: 'b', coefficient: 2 },
            ],
            rhs: 4,
          },
        ],
        objective: {
          direction: 'minimize',
          terms: [
            { name: 'a', coefficient: -5 },
            { name: 'b', coefficient: -4 },
          ],
          offset: 0,
        },
      },
      DEFAULT_SOLVER_CONFIG
    );
    expect(outcome.status).toBe('Optimal');
    expect(outcome.values?.get('a')).toBeCloseTo(1, 6);
    expect(outcome.values?.get('b')).toBeCloseTo(0, 6);
    expect(outcome.objectiveValue).toBeCloseTo(-5, 6);
  });
});
