/**
 * Result Assembly
 *
 * Orders match results and packages them into a DiffReport that renderers
 * can display without resolving anything themselves.
 */

import {
  DiffReport,
  MatchResult,
  PropertyDetails,
  ReportOptions,
  ReportedResult,
  SchemaDetails,
  SchemaNode,
  SchemaObject,
  SchemaStatus,
  SchemaTable,
  Violation,
  isReference,
} from './types';
import { lookup, typeLabel, typeSet } from './schema';
import { parsePointer, resolveSchema } from './resolver';
import {
  aggregateSeverity,
  calculateCompatibilityScore,
  compareSeverity,
  filterBySeverity,
} from './severity';

// ─── Ordering ───────────────────────────────────────────────────────────────

function byName(a: MatchResult, b: MatchResult): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Results in lexicographic name order.
 */
export function orderResults(results: readonly MatchResult[]): MatchResult[] {
  return [...results].sort(byName);
}

/**
 * Breaking schemas first, then warnings, then the rest; by name within a level.
 */
export function sortBySeverity(results: readonly MatchResult[]): MatchResult[] {
  return [...results].sort((a, b) => compareSeverity(b.severity, a.severity) || byName(a, b));
}

export function schemaStatus(result: MatchResult): SchemaStatus {
  if (result.violations.length === 0) return 'unchanged';
  if (result.violations.some((v) => v.name === 'SchemaRemoved')) return 'removed';
  if (result.violations.some((v) => v.name === 'SchemaAdded')) return 'added';
  return 'modified';
}

// ─── Schema Details ─────────────────────────────────────────────────────────

function describeType(node: SchemaNode): string {
  if (isReference(node)) return parsePointer(node.$ref) ?? node.$ref;

  const types = typeSet(node);
  if (types.length === 1 && types[0] === 'array' && node.items) {
    return `array<${describeType(node.items)}>`;
  }
  return typeLabel(types);
}

/** Top-level property a violation path belongs to ('' for the schema root) */
function anchorOf(path: string): string {
  return path.split(/\.|\[\]/)[0];
}

/**
 * Property-level view of one schema's current version, with its violations
 * attached to the top-level property they concern.
 */
export function describeSchema(
  name: string,
  table: SchemaTable,
  violations: readonly Violation[]
): SchemaDetails | undefined {
  const root = lookup(table, name);
  if (root === undefined) return undefined;

  const resolved = resolveSchema(root, table, new Set([name]));
  const schema: SchemaObject = resolved.status === 'resolved' ? resolved.node : {};
  const visited = resolved.status === 'resolved' ? resolved.visited : new Set([name]);
  const props = schema.properties ?? {};
  const required = new Set(schema.required ?? []);

  const anchored = new Map<string, Violation[]>();
  const schemaViolations: Violation[] = [];

  for (const v of violations) {
    const anchor = anchorOf(v.path);
    if (anchor && lookup(props, anchor) !== undefined) {
      anchored.set(anchor, [...(anchored.get(anchor) ?? []), v]);
    } else {
      schemaViolations.push(v);
    }
  }

  const properties: PropertyDetails[] = Object.keys(props).map((prop) => {
    const node = props[prop];
    const target = resolveSchema(node, table, visited);
    const obj: SchemaObject = target.status === 'resolved' ? target.node : {};

    return {
      name: prop,
      type: describeType(node),
      format: obj.format,
      description: obj.description,
      required: required.has(prop),
      nullable: obj.nullable ?? false,
      enum: obj.enum ?? [],
      violations: anchored.get(prop) ?? [],
    };
  });

  properties.sort((a, b) => {
    if (a.required !== b.required) return a.required ? -1 : 1;
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });

  return {
    name,
    description: schema.description,
    severity: aggregateSeverity(violations),
    properties,
    schemaViolations,
  };
}

// ─── Report ─────────────────────────────────────────────────────────────────

/**
 * Package match results into a report.
 *
 * Violations below `minSeverity` are dropped and each result's severity is
 * re-aggregated over what remains.
 */
export function buildReport(
  results: readonly MatchResult[],
  current: SchemaTable,
  options: ReportOptions = {}
): DiffReport {
  const minSeverity = options.minSeverity ?? 'change';

  // Status comes from the unfiltered violations
  const reported = orderResults(results)
    .map((r): ReportedResult => {
      const violations = filterBySeverity(r.violations, minSeverity);
      return {
        name: r.name,
        violations,
        severity: aggregateSeverity(violations),
        status: schemaStatus(r),
      };
    })
    .filter((r) => !options.changedOnly || r.violations.length > 0);

  const all = reported.flatMap((r) => r.violations);

  const schemas: SchemaDetails[] = [];
  for (const r of reported) {
    const details = describeSchema(r.name, current, r.violations);
    if (details) schemas.push(details);
  }

  const statuses: Record<SchemaStatus, number> = { added: 0, removed: 0, modified: 0, unchanged: 0 };
  for (const r of reported) {
    statuses[r.status]++;
  }

  return {
    base: options.labels?.base ?? 'base',
    current: options.labels?.current ?? 'current',
    timestamp: new Date().toISOString(),
    results: reported,
    schemas,
    summary: {
      breaking: all.filter((v) => v.severity === 'breaking').length,
      warning: all.filter((v) => v.severity === 'warning').length,
      change: all.filter((v) => v.severity === 'change').length,
      total: all.length,
      schemas: statuses,
    },
    compatibilityScore: calculateCompatibilityScore(all),
    hasBreakingChanges: all.some((v) => v.severity === 'breaking'),
  };
}
