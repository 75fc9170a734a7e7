/**
 * ApiDiffer — Main API
 *
 * The primary entry point for oas-drift. Provides a simple API for:
 * - Comparing two schema tables
 * - Comparing two parsed (or raw) OpenAPI documents
 * - Comparing two document files
 * - Formatting the resulting reports
 */

import {
  ApiDifferOptions,
  DiffReport,
  ReportFormat,
  SchemaTable,
  Severity,
} from './core/types';
import { DEFAULT_MAX_DEPTH, matchSchemas } from './core/matcher';
import { buildReport } from './core/report';
import { formatReport } from './core/reporter';
import { autoParse, extractSchemaTable, readDocument } from './formats';

// ─── ApiDiffer Class ────────────────────────────────────────────────────────

export class ApiDiffer {
  private minSeverity: Severity;
  private maxDepth: number;
  private changedOnly: boolean;

  constructor(options: ApiDifferOptions = {}) {
    this.minSeverity = options.minSeverity ?? 'change';
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.changedOnly = options.changedOnly ?? false;
  }

  /**
   * Compare two schema tables.
   *
   * @param base    Named schemas of the previous version
   * @param current Named schemas of the new version
   * @param labels  Names shown in the report, usually file paths
   */
  compare(
    base: SchemaTable,
    current: SchemaTable,
    labels: { base?: string; current?: string } = {}
  ): DiffReport {
    const results = matchSchemas(base, current, { maxDepth: this.maxDepth });

    return buildReport(results, current, {
      minSeverity: this.minSeverity,
      changedOnly: this.changedOnly,
      labels,
    });
  }

  /**
   * Compare two OpenAPI documents, given as parsed objects or raw JSON/YAML text.
   */
  compareDocuments(
    base: unknown,
    current: unknown,
    labels: { base?: string; current?: string } = {}
  ): DiffReport {
    const baseDoc = typeof base === 'string' ? autoParse(base) : base;
    const currentDoc = typeof current === 'string' ? autoParse(current) : current;

    return this.compare(extractSchemaTable(baseDoc), extractSchemaTable(currentDoc), labels);
  }

  /**
   * Compare two OpenAPI document files (JSON or YAML).
   */
  async compareFiles(basePath: string, currentPath: string): Promise<DiffReport> {
    const [baseDoc, currentDoc] = await Promise.all([
      readDocument(basePath),
      readDocument(currentPath),
    ]);

    return this.compareDocuments(baseDoc, currentDoc, { base: basePath, current: currentPath });
  }

  /**
   * Format a diff report.
   */
  format(report: DiffReport, format: ReportFormat = 'console'): string {
    return formatReport(report, format);
  }
}
