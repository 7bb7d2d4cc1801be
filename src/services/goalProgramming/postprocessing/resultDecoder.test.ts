import { describe, expect, it } from 'vitest';
import { WeightedGoalModel } from '../goalModel';
import { term } from '../model/expression';
import { FakeAdapter, optimalOutcome } from '../testing/fakeAdapter';
import type { SolverOutcome } from '../types';
import { decodeResult } from './resultDecoder';
import { formatResultSummary } from './resultSummary';

function dietModel(): WeightedGoalModel {
  const model = new WeightedGoalModel('diet', {
    solver: new FakeAdapter(program => optimalOutcome(program, {}, 0)),
    env: {},
  });
  const rice = model.addVariable('Rice');
  const dal = model.addVariable('Dal');
  model.addConstraint({ name: 'capacity', expression: term(rice).add(dal), sense: '<=', rhs: 10 });
  model.addGoal({ name: 'energy', expression: term(rice, 5).add(term(dal, 10)), target: 200 });
  model.addGoal({ name: 'protein', expression: term(dal, 2), target: 15, sense: 'minimize_over' });
  return model;
}

function decode(model: WeightedGoalModel, outcome: SolverOutcome, objectiveOffset = 0) {
  return decodeResult({
    variables: model.variables,
    constraints: model.constraints,
    goals: model.goals,
    outcome,
    solver: 'fake',
    objectiveOffset,
  });
}

describe('decodeResult', () => {
  const model = dietModel();
  const solved = optimalOutcome(
    model.buildProgram(),
    { Rice: 0, Dal: 10, n_energy: 100, p_energy: 0, n_protein: 0, p_protein: 5 },
    100
  );

  it('reports decision variables only', () => {
    expect(decode(model, solved).variables).toEqual({ Rice: 0, Dal: 10 });
  });

  it('reports deviations per goal', () => {
    expect(decode(model, solved).deviations).toEqual({ energy: [100, 0], protein: [0, 5] });
  });

  it('reports attainment through the sense mask', () => {
    const { goals } = decode(model, solved);
    expect(goals.energy).toEqual({
      target: 200,
      achieved: 100,
      under: 100,
      over: 0,
      sense: 'attain',
      priority: 1,
      attained: false,
    });
    // Over-achievement is penalized for minimize_over
    expect(goals.protein.achieved).toBe(20);
    expect(goals.protein.attained).toBe(false);
  });

  it('reports constraint activity for hard and link rows', () => {
    const { constraints } = decode(model, solved);
    expect(constraints.capacity).toEqual({ kind: 'hard', activity: 10, rhs: 10, slack: 0, active: true });
    expect(constraints.goal_link_energy).toEqual({ kind: 'goal-link', activity: 200, rhs: 200, slack: 0, active: true });
  });

  it('adds the objective constant back', () => {
    expect(decode(model, solved, 2.5).objective).toBe(102.5);
  });

  it('carries status, solver and statistics', () => {
    const result = decode(model, solved);
    expect(result.status).toBe('Optimal');
    expect(result.solverStatus).toBe('Optimal');
    expect(result.solver).toBe('fake');
    expect(result.modelVersion).toBe('1.0.0');
    expect(result.stats).toEqual({ numVariables: 6, numDecisionVariables: 2, numConstraints: 3, numGoals: 2 });
  });

  it('fabricates nothing without a solution', () => {
    const result = decode(model, {
      status: 'Infeasible',
      solverStatus: 'Infeasible',
      solveTimeMs: 3,
    });
    expect(result.variables).toEqual({});
    expect(result.deviations).toEqual({});
    expect(result.goals).toEqual({});
    expect(result.constraints).toEqual({});
    expect(result.objective).toBeNull();
    expect(result.error).toBeUndefined();
  });

  it('passes solver errors through', () => {
    const result = decode(model, { status: 'Error', solverStatus: 'Error', solveTimeMs: 0, error: 'wasm trap' });
    expect(result.status).toBe('Error');
    expect(result.error).toBe('wasm trap');
  });

  it('skips goals whose variables the solution does not cover', () => {
    const partial = decode(model, {
      status: 'Timeout',
      solverStatus: 'Time limit reached',
      values: new Map([
        ['Rice', 1],
        ['n_energy', 0],
        ['p_energy', 0],
      ]),
      solveTimeMs: 50,
    });
    expect(partial.variables).toEqual({ Rice: 1 });
    expect(partial.deviations).toEqual({ energy: [0, 0] });
    expect(partial.goals).toEqual({});
    expect(partial.constraints).toEqual({});
    expect(partial.objective).toBeNull();
  });
});

describe('formatResultSummary', () => {
  it('lists status, objective and goals line by line', () => {
    const model = dietModel();
    const result = decode(
      model,
      optimalOutcome(
        model.buildProgram(),
        { Rice: 0, Dal: 10, n_energy: 100, p_energy: 0, n_protein: 0, p_protein: 5 },
        100
      )
    );
    expect(formatResultSummary(result)).toBe(
      [
        'Status: Optimal (fake: Optimal)',
        'Objective: 100',
        'Goal energy: 100 vs target 200 (under 100, over 0, missed)',
        'Goal protein: 20 vs target 15 (under 0, over 5, missed)',
        'Solve time: 1ms',
      ].join('\n')
    );
  });
});
