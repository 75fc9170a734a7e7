/**
 * oas-drift
 *
 * Catch breaking changes between two versions of an OpenAPI document.
 *
 * @example
 * ```typescript
 * import { ApiDiffer } from 'oas-drift';
 *
 * const differ = new ApiDiffer({ minSeverity: 'warning' });
 * const report = await differ.compareFiles('openapi.v1.yaml', 'openapi.v2.yaml');
 *
 * if (report.hasBreakingChanges) {
 *   console.log(differ.format(report, 'console'));
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { ApiDiffer } from './differ';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  SchemaType,
  SchemaObject,
  SchemaReference,
  SchemaNode,
  SchemaTable,
  JsonValue,
  Severity,
  RuleCategory,
  Violation,
  MatchResult,
  ReportedResult,
  MatchOptions,
  ReportOptions,
  ApiDifferOptions,
  SchemaStatus,
  PropertyDetails,
  SchemaDetails,
  DiffReport,
  ReportFormat,
  isReference,
} from './core/types';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { matchSchemas, compareSchema, SchemaMatcher, DEFAULT_MAX_DEPTH } from './core/matcher';
export { resolveReference, resolveSchema, parsePointer, Resolution } from './core/resolver';
export {
  aggregateSeverity,
  compareSeverity,
  meetsSeverity,
  filterBySeverity,
  calculateCompatibilityScore,
  isSeverity,
  SEVERITIES,
} from './core/severity';
export { buildReport, describeSchema, orderResults, sortBySeverity, schemaStatus } from './core/report';
export { formatReport } from './core/reporter';

// ─── Rules ──────────────────────────────────────────────────────────────────
export * from './rules';

// ─── Document Formats ───────────────────────────────────────────────────────
export {
  parseJson,
  isJson,
  parseYaml,
  autoParse,
  readDocument,
  extractSchemaTable,
  normalizeSchema,
} from './formats';
