/**
 * Filter strictness levels and severity thresholds.
 */
import type { FilterLevel } from '../config/schema.js';
import type { CategoryAnalysis } from '../safety/types.js';

/**
 * Minimum severity that trips each level. Stricter levels trip earlier.
 */
export const LEVEL_MIN_SEVERITY: Record<FilterLevel, number> = {
  low: 6,
  medium: 4,
  high: 2,
};

export interface Violation {
  category: string;
  severity: number;
}

/**
 * First category, in service order, whose severity reaches the level's minimum.
 */
export function findViolation(
  analysis: { categoriesAnalysis: CategoryAnalysis[] },
  level: FilterLevel
): Violation | undefined {
  const min = LEVEL_MIN_SEVERITY[level];
  for (const item of analysis.categoriesAnalysis) {
    const severity = item.severity ?? 0;
    if (severity >= min) {
      return { category: item.category, severity };
    }
  }
  return undefined;
}

/**
 * Highest severity in an analysis, 0 when nothing was reported.
 */
export function maxSeverity(analysis: { categoriesAnalysis: CategoryAnalysis[] }): number {
  return analysis.categoriesAnalysis.reduce((max, item) => Math.max(max, item.severity ?? 0), 0);
}
