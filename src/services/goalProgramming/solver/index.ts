import type { SolverAdapter, SolverKind } from '../types';
import { GlpkAdapter } from './glpkAdapter';
import { HighsAdapter } from './highsAdapter';

export { GlpkAdapter, HighsAdapter };
export { programToLPFormat, mapHighsStatus } from './highsAdapter';
export { toGlpkProblem, mapGlpkStatus } from './glpkAdapter';
export type { LPText } from './highsAdapter';
export type { GlpkLoader, GlpkTranslation } from './glpkAdapter';

/** Adapter for a configured solver kind */
export function createSolverAdapter(kind: SolverKind): SolverAdapter {
  switch (kind) {
    case 'highs':
      return new HighsAdapter();
    case 'glpk':
      return new GlpkAdapter();
  }
}
