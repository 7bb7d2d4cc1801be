/**
 * Human-readable summary of a solve, one line per item
 */

import type { GoalProgramResult } from '../types';

function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

export function formatResultSummary(result: GoalProgramResult): string {
  const lines = [
    `Status: ${result.status} (${result.solver}: ${result.solverStatus})`,
    `Objective: ${result.objective === null ? 'n/a' : formatValue(result.objective)}`,
  ];

  for (const [name, report] of Object.entries(result.goals)) {
    const mark = report.attained ? 'attained' : 'missed';
    lines.push(
      `Goal ${name}: ${formatValue(report.achieved)} vs target ${formatValue(report.target)} ` +
        `(under ${formatValue(report.under)}, over ${formatValue(report.over)}, ${mark})`
    );
  }

  for (const stage of result.stages ?? []) {
    const label = stage.priority === null ? 'cost' : `priority ${stage.priority}`;
    const objective = stage.objective === null ? 'n/a' : formatValue(stage.objective);
    lines.push(`Stage ${label}: ${stage.status}, objective ${objective}`);
  }

  if (result.error) {
    lines.push(`Error: ${result.error}`);
  }
  lines.push(`Solve time: ${result.solveTimeMs}ms`);
  return lines.join('\n');
}
