/**
 * Rule Model
 *
 * Every detected difference is a Rule: a small immutable object that knows
 * its own name, severity, category and how to describe itself. Matchers only
 * decide when to construct a rule; rendering lives with the rule.
 */

import { RuleCategory, Severity, Violation } from '../core/types';

export interface Rule {
  /** Stable identifier of the difference kind (e.g., 'TypeChanged') */
  readonly name: string;

  readonly category: RuleCategory;

  /** Schema the difference was found in */
  readonly schema: string;

  /** Dotted property path inside the schema; empty at the schema root */
  readonly path: string;

  description(): string;

  severity(): Severity;

  context(): string;
}

/**
 * Context string shared by schema rules: `schema: Name` at the root,
 * `schema: Name, property: a.b` below it.
 */
export function schemaContext(schema: string, path: string): string {
  return path ? `schema: ${schema}, property: ${path}` : `schema: ${schema}`;
}

/**
 * Render a rule into the frozen record handed to callers.
 */
export function toViolation(rule: Rule): Violation {
  return Object.freeze({
    name: rule.name,
    description: rule.description(),
    severity: rule.severity(),
    category: rule.category,
    context: rule.context(),
    schema: rule.schema,
    path: rule.path,
  });
}
