/**
 * ============================================================================
 * DOMAIN MODULE
 * ============================================================================
 *
 * Import constants from here rather than from individual files:
 *
 *   import { RESERVED_PREFIXES, TOLERANCE } from '@/_domain';
 *
 * ============================================================================
 */

/** Reserved names, tolerances, solver defaults */
export * from './constants';
