/**
 * Severity Aggregation
 *
 * Severities are totally ordered: breaking > warning > change.
 */

import { Severity, Violation } from './types';

const SEVERITY_ORDER: Record<Severity, number> = {
  change: 0,
  warning: 1,
  breaking: 2,
};

export const SEVERITIES: readonly Severity[] = ['breaking', 'warning', 'change'];

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Positive when `a` is more severe than `b`.
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b];
}

export function meetsSeverity(severity: Severity, min: Severity): boolean {
  return compareSeverity(severity, min) >= 0;
}

/**
 * Overall severity of a violation list. An empty list is 'change'.
 */
export function aggregateSeverity(violations: readonly Violation[]): Severity {
  let result: Severity = 'change';

  for (const v of violations) {
    if (v.severity === 'breaking') return 'breaking';
    if (v.severity === 'warning') result = 'warning';
  }

  return result;
}

export function filterBySeverity(violations: readonly Violation[], min: Severity): Violation[] {
  return violations.filter((v) => meetsSeverity(v.severity, min));
}

/**
 * Calculate a backward compatibility score (0–100).
 *
 * - 100 = identical
 * - Deductions: breaking = -15, warning = -5, change = -1
 * - Floor at 0
 */
export function calculateCompatibilityScore(violations: readonly Violation[]): number {
  let score = 100;

  for (const v of violations) {
    switch (v.severity) {
      case 'breaking':
        score -= 15;
        break;
      case 'warning':
        score -= 5;
        break;
      case 'change':
        score -= 1;
        break;
    }
  }

  return Math.max(0, score);
}
