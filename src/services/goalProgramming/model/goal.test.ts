import { describe, expect, it } from 'vitest';
import { InvalidBoundsError, InvalidSenseError, InvalidWeightError } from '../errors';
import { effectiveWeights, parseGoalSense, penalizedDirections, resolveGoalPriority, resolveGoalWeights } from './goal';

describe('parseGoalSense', () => {
  it('normalizes case and dashes', () => {
    expect(parseGoalSense('Minimize-Under')).toBe('minimize_under');
    expect(parseGoalSense('attain')).toBe('attain');
  });

  it('rejects unknown senses', () => {
    expect(() => parseGoalSense('maximize')).toThrow(InvalidSenseError);
  });
});

describe('resolveGoalWeights', () => {
  it('defaults to 1 in both directions', () => {
    expect(resolveGoalWeights('g')).toEqual({ under: 1, over: 1 });
  });

  it('accepts a single weight, a pair, or an object', () => {
    expect(resolveGoalWeights('g', 3)).toEqual({ under: 3, over: 3 });
    expect(resolveGoalWeights('g', [2, 0.5])).toEqual({ under: 2, over: 0.5 });
    expect(resolveGoalWeights('g', { under: 0, over: 4 })).toEqual({ under: 0, over: 4 });
  });

  it('rejects negative or non-finite weights', () => {
    expect(() => resolveGoalWeights('g', -1)).toThrow(InvalidWeightError);
    expect(() => resolveGoalWeights('g', [1, Infinity])).toThrow("goal 'g' (over): weight must be a finite number >= 0, got Infinity");
  });
});

describe('resolveGoalPriority', () => {
  it('requires a positive integer', () => {
    expect(resolveGoalPriority('g')).toBe(1);
    expect(resolveGoalPriority('g', 3)).toBe(3);
    expect(() => resolveGoalPriority('g', 0)).toThrow(InvalidBoundsError);
    expect(() => resolveGoalPriority('g', 1.5)).toThrow(InvalidBoundsError);
  });
});

describe('sense mask', () => {
  const weights = { under: 2, over: 5 };

  it('penalizes both directions for attain', () => {
    expect(effectiveWeights('attain', weights)).toEqual({ under: 2, over: 5 });
    expect(penalizedDirections({ sense: 'attain' })).toEqual({ under: true, over: true });
  });

  it('penalizes only under-achievement for minimize_under', () => {
    expect(effectiveWeights('minimize_under', weights)).toEqual({ under: 2, over: 0 });
    expect(penalizedDirections({ sense: 'minimize_under' })).toEqual({ under: true, over: false });
  });

  it('penalizes only over-achievement for minimize_over', () => {
    expect(effectiveWeights('minimize_over', weights)).toEqual({ under: 0, over: 5 });
    expect(penalizedDirections({ sense: 'minimize_over' })).toEqual({ under: false, over: true });
  });
});
