/**
 * Schema Matcher
 *
 * Compares two schema tables and produces one MatchResult per schema name,
 * listing every difference between the base and current versions.
 */

import {
  JsonValue,
  MatchOptions,
  MatchResult,
  SchemaNode,
  SchemaObject,
  SchemaTable,
  Violation,
} from './types';
import { canonicalJson, hasType, lookup, sameTypes, typeSet } from './schema';
import { resolveSchema } from './resolver';
import { aggregateSeverity } from './severity';
import {
  Rule,
  toViolation,
  SchemaAddedRule,
  SchemaRemovedRule,
  SchemaUnresolvedRule,
  TypeChangedRule,
  PropertyAddedRule,
  PropertyRemovedRule,
  RequiredPropertyAddedRule,
  RequiredPropertyRemovedRule,
  ArrayItemsChangedRule,
  EnumValuesAddedRule,
  EnumValuesRemovedRule,
  FormatChangedRule,
  NullableChangedRule,
  DescriptionChangedRule,
} from '../rules';

export const DEFAULT_MAX_DEPTH = 10;

// ─── Comparison Context ─────────────────────────────────────────────────────

interface Side {
  table: SchemaTable;
  /** Schema names already followed on the current path */
  visited: ReadonlySet<string>;
}

interface CompareContext {
  schema: string;
  maxDepth: number;
  rules: Rule[];
}

function childPath(path: string, property: string): string {
  return path ? `${path}.${property}` : property;
}

function itemsPath(path: string): string {
  return `${path}[]`;
}

// ─── Node Comparison ────────────────────────────────────────────────────────

/**
 * Resolve both sides and compare them, or record why that is impossible.
 *
 * A cycle on either side stops the branch silently, even when the other side
 * is a concrete node: a self reference replaced by an inline schema reports
 * nothing below that point.
 */
function compareBranch(
  ctx: CompareContext,
  path: string,
  baseNode: SchemaNode,
  currentNode: SchemaNode,
  base: Side,
  current: Side,
  depth: number
): void {
  if (depth >= ctx.maxDepth) return;

  const before = resolveSchema(baseNode, base.table, base.visited);
  const after = resolveSchema(currentNode, current.table, current.visited);

  // The same dangling pointer on both sides is not a difference
  if (
    before.status === 'unresolved' &&
    after.status === 'unresolved' &&
    before.pointer === after.pointer
  ) {
    return;
  }

  // One diagnostic per branch, even when neither side resolves
  if (before.status === 'unresolved') {
    ctx.rules.push(new SchemaUnresolvedRule(ctx.schema, path, before.pointer));
    return;
  }
  if (after.status === 'unresolved') {
    ctx.rules.push(new SchemaUnresolvedRule(ctx.schema, path, after.pointer));
    return;
  }
  if (before.status === 'cycle' || after.status === 'cycle') return;

  compareNodes(
    ctx,
    path,
    before.node,
    after.node,
    { table: base.table, visited: before.visited },
    { table: current.table, visited: after.visited },
    depth
  );
}

function compareNodes(
  ctx: CompareContext,
  path: string,
  before: SchemaObject,
  after: SchemaObject,
  base: Side,
  current: Side,
  depth: number
): void {
  // Type
  if (!sameTypes(before, after)) {
    ctx.rules.push(new TypeChangedRule(ctx.schema, path, typeSet(before), typeSet(after)));
  }

  compareProperties(ctx, path, before, after, base, current, depth);

  // Array items
  if (hasType(before, 'array') && hasType(after, 'array')) {
    if (before.items && after.items) {
      compareBranch(ctx, itemsPath(path), before.items, after.items, base, current, depth + 1);
    } else if (before.items && !after.items) {
      ctx.rules.push(new ArrayItemsChangedRule(ctx.schema, path, 'removed'));
    } else if (!before.items && after.items) {
      ctx.rules.push(new ArrayItemsChangedRule(ctx.schema, path, 'added'));
    }
  }

  compareEnums(ctx, path, before.enum ?? [], after.enum ?? []);

  // Format
  if (before.format !== after.format) {
    ctx.rules.push(new FormatChangedRule(ctx.schema, path, before.format, after.format));
  }

  // Nullable
  const wasNullable = before.nullable ?? false;
  const isNullable = after.nullable ?? false;
  if (wasNullable !== isNullable) {
    ctx.rules.push(new NullableChangedRule(ctx.schema, path, wasNullable, isNullable));
  }

  // Description
  if (before.description !== after.description) {
    ctx.rules.push(
      new DescriptionChangedRule(ctx.schema, path, before.description, after.description)
    );
  }
}

function compareProperties(
  ctx: CompareContext,
  path: string,
  before: SchemaObject,
  after: SchemaObject,
  base: Side,
  current: Side,
  depth: number
): void {
  const beforeProps = before.properties ?? {};
  const afterProps = after.properties ?? {};
  const beforeRequired = new Set(before.required ?? []);
  const afterRequired = new Set(after.required ?? []);

  const names = [...new Set([...Object.keys(beforeProps), ...Object.keys(afterProps)])].sort();

  for (const name of names) {
    const fieldPath = childPath(path, name);
    const beforeProp = lookup(beforeProps, name);
    const afterProp = lookup(afterProps, name);

    if (beforeProp && !afterProp) {
      ctx.rules.push(new PropertyRemovedRule(ctx.schema, fieldPath));
      continue;
    }

    if (!beforeProp && afterProp) {
      ctx.rules.push(
        afterRequired.has(name)
          ? new RequiredPropertyAddedRule(ctx.schema, fieldPath)
          : new PropertyAddedRule(ctx.schema, fieldPath)
      );
      continue;
    }

    if (beforeProp && afterProp) {
      if (beforeRequired.has(name) && !afterRequired.has(name)) {
        ctx.rules.push(new RequiredPropertyRemovedRule(ctx.schema, fieldPath));
      } else if (!beforeRequired.has(name) && afterRequired.has(name)) {
        ctx.rules.push(new RequiredPropertyAddedRule(ctx.schema, fieldPath));
      }

      compareBranch(ctx, fieldPath, beforeProp, afterProp, base, current, depth + 1);
    }
  }
}

function compareEnums(
  ctx: CompareContext,
  path: string,
  before: readonly JsonValue[],
  after: readonly JsonValue[]
): void {
  const beforeKeys = new Set(before.map(canonicalJson));
  const afterKeys = new Set(after.map(canonicalJson));

  const removed = unique(before.filter((v) => !afterKeys.has(canonicalJson(v))));
  const added = unique(after.filter((v) => !beforeKeys.has(canonicalJson(v))));

  if (removed.length > 0) {
    ctx.rules.push(new EnumValuesRemovedRule(ctx.schema, path, removed));
  }
  if (added.length > 0) {
    ctx.rules.push(new EnumValuesAddedRule(ctx.schema, path, added));
  }
}

function unique(values: JsonValue[]): JsonValue[] {
  const seen = new Set<string>();
  return values.filter((v) => {
    const key = canonicalJson(v);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// ─── Main Match ─────────────────────────────────────────────────────────────

/**
 * Compare one named schema across both tables.
 */
export function compareSchema(
  name: string,
  base: SchemaTable,
  current: SchemaTable,
  options: MatchOptions = {}
): Violation[] {
  const baseRoot = lookup(base, name);
  const currentRoot = lookup(current, name);

  if (baseRoot === undefined && currentRoot === undefined) return [];
  if (currentRoot === undefined) return [toViolation(new SchemaRemovedRule(name))];
  if (baseRoot === undefined) return [toViolation(new SchemaAddedRule(name))];

  const ctx: CompareContext = {
    schema: name,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    rules: [],
  };
  const visited = new Set([name]);

  compareBranch(
    ctx,
    '',
    baseRoot,
    currentRoot,
    { table: base, visited },
    { table: current, visited },
    0
  );

  return ctx.rules.map(toViolation);
}

/**
 * Compare two schema tables.
 *
 * Every name found in either table gets exactly one result, in
 * lexicographic name order.
 */
export function matchSchemas(
  base: SchemaTable,
  current: SchemaTable,
  options: MatchOptions = {}
): MatchResult[] {
  const names = [...new Set([...Object.keys(base), ...Object.keys(current)])].sort();

  return names.map((name) => {
    const violations = compareSchema(name, base, current, options);
    return { name, violations, severity: aggregateSeverity(violations) };
  });
}

/**
 * Holds a pair of tables for repeated comparisons.
 */
export class SchemaMatcher {
  constructor(
    private readonly base: SchemaTable,
    private readonly current: SchemaTable,
    private readonly options: MatchOptions = {}
  ) {}

  matchSchemas(): MatchResult[] {
    return matchSchemas(this.base, this.current, this.options);
  }

  compareSchema(name: string): Violation[] {
    return compareSchema(name, this.base, this.current, this.options);
  }
}
