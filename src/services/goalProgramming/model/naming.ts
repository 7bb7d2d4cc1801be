/**
 * Name validation and the reserved naming scheme for synthesized artifacts
 */

import { RESERVED_PREFIXES } from '@/_domain';
import { InvalidNameError } from '../errors';

/** Rejects blank names; returns the name unchanged */
export function assertName(name: string, what: string): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new InvalidNameError(`${what} name must be a non-blank string`);
  }
  return name;
}

/**
 * Reduce a name to [A-Za-z0-9_]: runs of anything else become one underscore.
 * "Vitamin A (µg)" → "Vitamin_A_g_"
 */
export function sanitizeName(name: string): string {
  const sanitized = name.trim().replace(/[^A-Za-z0-9_]+/g, '_').replace(/_+/g, '_');
  if (sanitized.length === 0 || sanitized === '_') {
    throw new InvalidNameError(`name '${name}' has no usable characters`);
  }
  return sanitized;
}

export interface GoalArtifactNames {
  under: string;
  over: string;
  link: string;
}

/** n_<goal>, p_<goal>, goal_link_<goal> */
export function goalArtifactNames(goalName: string): GoalArtifactNames {
  const safe = sanitizeName(goalName);
  return {
    under: `${RESERVED_PREFIXES.UNDER_DEVIATION}${safe}`,
    over: `${RESERVED_PREFIXES.OVER_DEVIATION}${safe}`,
    link: `${RESERVED_PREFIXES.GOAL_LINK}${safe}`,
  };
}

/** priority_level_<k> */
export function priorityLevelConstraintName(priority: number): string {
  return `${RESERVED_PREFIXES.PRIORITY_LEVEL}${priority}`;
}
