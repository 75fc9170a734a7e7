/**
 * Canonical type definitions for oas-drift.
 * These types describe the schema graph being compared and everything the
 * comparison produces.
 */

// ─── Schema Graph ───────────────────────────────────────────────────────────

export type SchemaType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'object'
  | 'array'
  | 'null';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface SchemaObject {
  /** A single type, or a union compared as a set */
  type?: SchemaType | SchemaType[];

  /** For objects: child properties */
  properties?: Record<string, SchemaNode>;

  /** For objects: names of mandatory properties */
  required?: string[];

  /** Permitted literal values */
  enum?: JsonValue[];

  /** Format constraint (e.g., 'uuid', 'date-time', 'int64') */
  format?: string;

  description?: string;

  /** Whether null is accepted in addition to the declared type */
  nullable?: boolean;

  /** For arrays: schema of array items */
  items?: SchemaNode;
}

/** Pointer to another named schema of the same document */
export interface SchemaReference {
  $ref: string;
}

export type SchemaNode = SchemaObject | SchemaReference;

/** Named schemas of one document version, keyed by schema name */
export type SchemaTable = Readonly<Record<string, SchemaNode>>;

export function isReference(node: SchemaNode): node is SchemaReference {
  return '$ref' in node && typeof node.$ref === 'string';
}

// ─── Violations ─────────────────────────────────────────────────────────────

export type Severity = 'breaking' | 'warning' | 'change';

export type RuleCategory = 'schema' | 'endpoint' | 'parameter' | 'response' | 'requestBody';

export interface Violation {
  /** Kind identifier (e.g., 'PropertyRemoved') */
  readonly name: string;

  /** Human-readable description of the difference */
  readonly description: string;

  readonly severity: Severity;

  readonly category: RuleCategory;

  /** Where it happened (e.g., 'schema: User, property: address.city') */
  readonly context: string;

  /** Schema the violation belongs to */
  readonly schema: string;

  /** Dotted property path inside the schema; empty at the schema root */
  readonly path: string;
}

export interface MatchResult {
  /** Schema name */
  readonly name: string;

  /** Violations in discovery order */
  readonly violations: readonly Violation[];

  /** Highest severity among the violations ('change' when there are none) */
  readonly severity: Severity;
}

// ─── Options ────────────────────────────────────────────────────────────────

export interface MatchOptions {
  /** Nesting depth at which comparison stops descending (default: 10) */
  maxDepth?: number;
}

export interface ReportOptions {
  /** Minimum severity of violations kept in the report (default: 'change') */
  minSeverity?: Severity;

  /** Drop schemas without violations from the report (default: false) */
  changedOnly?: boolean;

  /** Labels of the compared documents, usually file paths */
  labels?: { base?: string; current?: string };
}

export interface ApiDifferOptions extends MatchOptions {
  minSeverity?: Severity;
  changedOnly?: boolean;
}

// ─── Report ─────────────────────────────────────────────────────────────────

export type SchemaStatus = 'added' | 'removed' | 'modified' | 'unchanged';

export interface PropertyDetails {
  name: string;

  /** Type label (e.g., 'string', 'integer | string', 'array<Tag>') */
  type: string;

  format?: string;
  description?: string;
  required: boolean;
  nullable: boolean;
  enum: JsonValue[];

  /** Violations anchored at this property or below it */
  violations: Violation[];
}

export interface SchemaDetails {
  name: string;
  description?: string;
  severity: Severity;

  /** Properties of the current version, required first */
  properties: PropertyDetails[];

  /** Violations anchored at the schema root */
  schemaViolations: Violation[];
}

/** A match result after severity filtering, with the status of the full result */
export interface ReportedResult extends MatchResult {
  readonly status: SchemaStatus;
}

export interface DiffReport {
  /** Label of the base document */
  base: string;

  /** Label of the current document */
  current: string;

  /** ISO timestamp of the comparison */
  timestamp: string;

  /** One entry per reported schema, ordered by name */
  results: ReportedResult[];

  /** Property-level view of reported schemas that exist in the current version */
  schemas: SchemaDetails[];

  summary: {
    breaking: number;
    warning: number;
    change: number;
    total: number;
    schemas: Record<SchemaStatus, number>;
  };

  /** Backward compatibility score (0-100) */
  compatibilityScore: number;

  hasBreakingChanges: boolean;
}

export type ReportFormat = 'console' | 'json' | 'markdown' | 'html';
