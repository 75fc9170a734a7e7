#!/usr/bin/env node

/**
 * oas-drift CLI
 *
 * Commands:
 *   diff     - Compare the schemas of two OpenAPI documents
 *   schemas  - List the named schemas of one document
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { ApiDiffer } from './differ';
import { extractSchemaTable, readDocument } from './formats';
import { meetsSeverity, SEVERITIES } from './core/severity';
import { isReference, ReportFormat, Severity } from './core/types';

const REPORT_FORMATS: readonly ReportFormat[] = ['console', 'json', 'markdown', 'html'];

interface DiffCommandOptions {
  format: ReportFormat;
  output?: string;
  failOn: Severity | 'none';
  minSeverity: Severity;
  maxDepth?: number;
  changedOnly?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('oas-drift')
  .description('Catch breaking changes between two versions of an OpenAPI document.')
  .version('1.0.0');

// ─── Helpers ────────────────────────────────────────────────────────────────

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError('Depth must be a positive integer.');
  }
  return depth;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── diff Command ───────────────────────────────────────────────────────────

program
  .command('diff')
  .description('Compare the schemas of two OpenAPI documents (JSON or YAML)')
  .argument('<base>', 'Base (previous) document')
  .argument('<current>', 'Current (new) document')
  .addOption(
    new Option('-f, --format <format>', 'Report format').choices(REPORT_FORMATS).default('console')
  )
  .option('-o, --output <file>', 'Write report to file instead of stdout')
  .addOption(
    new Option('--fail-on <severity>', 'Exit with code 1 on this severity or above')
      .choices([...SEVERITIES, 'none'])
      .default('breaking')
  )
  .addOption(
    new Option('--min-severity <severity>', 'Hide violations below this severity')
      .choices(SEVERITIES)
      .default('change')
  )
  .option('--max-depth <n>', 'Nesting depth at which comparison stops', parseDepth)
  .option('--changed-only', 'Leave unchanged schemas out of the report')
  .option('-v, --verbose', 'Print progress information')
  .action(async (base: string, current: string, opts: DiffCommandOptions) => {
    try {
      const differ = new ApiDiffer({
        minSeverity: opts.minSeverity,
        maxDepth: opts.maxDepth,
        changedOnly: opts.changedOnly,
      });

      if (opts.verbose) {
        console.log(chalk.gray(`📖 Base:    ${base}`));
        console.log(chalk.gray(`📖 Current: ${current}`));
      }

      const report = await differ.compareFiles(base, current);

      if (opts.verbose) {
        console.log(chalk.gray(`🔄 Compared ${report.results.length} schema(s)`));
      }

      const formatted = differ.format(report, opts.format);

      if (opts.output) {
        fs.writeFileSync(opts.output, formatted, 'utf-8');
        console.log(`📄 Report written to ${opts.output}`);
      } else {
        console.log(formatted);
      }

      const failOn = opts.failOn;
      if (failOn === 'none') return;

      const failing = report.results.some((r) =>
        r.violations.some((v) => meetsSeverity(v.severity, failOn))
      );
      if (failing) {
        process.exit(1);
      }
    } catch (error) {
      console.error(`❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// ─── schemas Command ────────────────────────────────────────────────────────

program
  .command('schemas')
  .description('List the named schemas of an OpenAPI document')
  .argument('<document>', 'Document to inspect (JSON or YAML)')
  .action(async (document: string) => {
    try {
      const table = extractSchemaTable(await readDocument(document));
      const names = Object.keys(table).sort();

      if (names.length === 0) {
        console.log('📭 No schemas defined.');
        return;
      }

      console.log(`📋 Schemas in ${document} (${names.length}):\n`);
      for (const name of names) {
        const node = table[name];
        if (isReference(node)) {
          console.log(`  • ${name} → ${node.$ref}`);
        } else {
          const count = Object.keys(node.properties ?? {}).length;
          console.log(`  • ${name} (${count} ${count === 1 ? 'property' : 'properties'})`);
        }
      }
    } catch (error) {
      console.error(`❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parseAsync().catch((error: unknown) => {
  console.error(`❌ Error: ${errorMessage(error)}`);
  process.exit(1);
});
