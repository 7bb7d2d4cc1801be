import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SOLVER_CONFIG, resolveSolverParams, solverParamsFromEnv } from './solverConfig';

describe('resolveSolverParams', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults with an empty environment', () => {
    expect(resolveSolverParams({}, {})).toEqual({
      solver: 'highs',
      timeLimitSeconds: null,
      mipRelGap: 1e-4,
      logLevel: 'silent',
    });
    expect(resolveSolverParams({}, {})).toEqual(DEFAULT_SOLVER_CONFIG);
  });

  it('reads the environment', () => {
    const env = {
      WGLP_SOLVER: 'GLPK',
      WGLP_LOG_LEVEL: 'debug',
      WGLP_TIME_LIMIT_SECONDS: '12.5',
      WGLP_MIP_REL_GAP: '0',
    };
    expect(resolveSolverParams({}, env)).toEqual({
      solver: 'glpk',
      timeLimitSeconds: 12.5,
      mipRelGap: 0,
      logLevel: 'debug',
    });
  });

  it('lets explicit options win over the environment', () => {
    const env = { WGLP_SOLVER: 'glpk', WGLP_TIME_LIMIT_SECONDS: '30' };
    expect(resolveSolverParams({ solver: 'highs', timeLimitSeconds: null }, env)).toMatchObject({
      solver: 'highs',
      timeLimitSeconds: null,
    });
  });

  it('does not let an undefined option shadow the environment', () => {
    expect(resolveSolverParams({ solver: undefined }, { WGLP_SOLVER: 'glpk' }).solver).toBe('glpk');
  });

  it('ignores invalid environment values with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const params = solverParamsFromEnv({
      WGLP_SOLVER: 'cplex',
      WGLP_LOG_LEVEL: 'loud',
      WGLP_TIME_LIMIT_SECONDS: '-3',
      WGLP_MIP_REL_GAP: 'abc',
    });
    expect(params).toEqual({});
    expect(warn).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledWith("[Config] Ignoring WGLP_SOLVER='cplex', expected one of: highs, glpk");
  });

  it('skips blank values silently', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(solverParamsFromEnv({ WGLP_SOLVER: '  ', WGLP_LOG_LEVEL: undefined })).toEqual({});
    expect(warn).not.toHaveBeenCalled();
  });
});
