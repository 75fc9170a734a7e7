/**
 * Report Generator
 *
 * Produces human-readable diff reports in multiple formats:
 * Console (colored), JSON, Markdown, HTML.
 */

import chalk from 'chalk';
import {
  DiffReport,
  MatchResult,
  ReportFormat,
  SchemaDetails,
  Severity,
  Violation,
} from './types';
import { sortBySeverity } from './report';
import { aggregateSeverity, compareSeverity } from './severity';

// ─── Severity Icons & Colors ────────────────────────────────────────────────

const SEVERITY_ICON: Record<Severity, string> = {
  breaking: '🔴',
  warning: '🟡',
  change: '🟢',
};

const SEVERITY_LABEL: Record<Severity, string> = {
  breaking: 'BREAKING',
  warning: 'WARNING',
  change: 'CHANGE',
};

const SEVERITY_COLOR: Record<Severity, (text: string) => string> = {
  breaking: chalk.red,
  warning: chalk.yellow,
  change: chalk.green,
};

// ─── Format Report ──────────────────────────────────────────────────────────

/**
 * Format a diff report in the specified format.
 */
export function formatReport(report: DiffReport, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(report);
    case 'json':
      return formatJson(report);
    case 'markdown':
      return formatMarkdown(report);
    case 'html':
      return formatHtml(report);
    default:
      return formatConsole(report);
  }
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(report: DiffReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold(`🔍 Schema Drift Report: ${report.base} → ${report.current}`));
  lines.push(chalk.gray(bar));

  const changed = changedResults(report);

  if (changed.length === 0) {
    lines.push(chalk.green('  ✅ No schema changes detected'));
  } else {
    for (const result of changed) {
      lines.push(`📋 ${chalk.bold(result.name)} ${SEVERITY_COLOR[result.severity](`[${SEVERITY_LABEL[result.severity]}]`)}`);

      for (const v of sortViolations(result.violations)) {
        const label = SEVERITY_LABEL[v.severity].padEnd(8);
        const where = v.path ? chalk.gray(` (${v.path})`) : '';
        lines.push(`   ${SEVERITY_ICON[v.severity]} ${SEVERITY_COLOR[v.severity](label)} ${v.description}${where}`);
      }
    }
  }

  lines.push(chalk.gray(bar));

  const { breaking, warning, change, schemas } = report.summary;
  lines.push(
    `Summary: ${chalk.red(`${breaking} breaking`)} | ${chalk.yellow(`${warning} warnings`)} | ${chalk.green(`${change} changes`)}`
  );
  lines.push(
    `Schemas: ${schemas.added} added | ${schemas.removed} removed | ${schemas.modified} modified | ${schemas.unchanged} unchanged`
  );
  lines.push(`Compatibility Score: ${scoreColor(report.compatibilityScore)}`);
  lines.push('');

  return lines.join('\n');
}

function scoreColor(score: number): string {
  if (score >= 90) return chalk.green(`${score}%`);
  if (score >= 70) return chalk.yellow(`${score}%`);
  return chalk.red(`${score}%`);
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(report: DiffReport): string {
  return JSON.stringify(report, null, 2);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(report: DiffReport): string {
  const lines: string[] = [];

  lines.push(`# 🔍 Schema Drift Report`);
  lines.push('');
  lines.push(`**Base:** ${report.base}`);
  lines.push(`**Current:** ${report.current}`);
  lines.push(`**Timestamp:** ${report.timestamp}`);
  lines.push(`**Compatibility Score:** ${report.compatibilityScore}%`);
  lines.push('');

  const all = report.results.flatMap((r) => r.violations);

  if (all.length === 0) {
    lines.push('✅ **No schema changes detected**');
    return lines.join('\n');
  }

  const grouped = groupBySeverity(all);
  const sections: Array<[Severity, string]> = [
    ['breaking', '## 🔴 Breaking Changes'],
    ['warning', '## 🟡 Warnings'],
    ['change', '## 🟢 Changes'],
  ];

  for (const [severity, heading] of sections) {
    if (grouped[severity].length === 0) continue;

    lines.push(heading);
    lines.push('');
    for (const v of grouped[severity]) {
      const where = v.path ? ` \`${v.path}\`` : '';
      lines.push(`- **${v.schema}**${where}: ${v.description}`);
    }
    lines.push('');
  }

  const detailsByName = new Map(report.schemas.map((s) => [s.name, s]));
  const tables = changedResults(report)
    .map((r) => detailsByName.get(r.name))
    .filter((d): d is SchemaDetails => d !== undefined && d.properties.length > 0);

  if (tables.length > 0) {
    lines.push('## 📋 Schema Details');
    lines.push('');
    for (const details of tables) {
      lines.push(`### ${details.name}`);
      lines.push('');
      lines.push('| Property | Type | Required | Nullable | Changes |');
      lines.push('|---|---|---|---|---|');
      for (const p of details.properties) {
        const type = p.format ? `${p.type} (${p.format})` : p.type;
        lines.push(
          `| \`${p.name}\` | ${escapeCell(type)} | ${p.required ? 'yes' : '—'} | ${p.nullable ? 'yes' : '—'} | ${p.violations.length} |`
        );
      }
      lines.push('');
    }
  }

  lines.push('---');
  lines.push('');
  lines.push(
    `**Summary:** ${report.summary.breaking} breaking | ${report.summary.warning} warnings | ${report.summary.change} changes`
  );

  return lines.join('\n');
}

// ─── HTML Format ────────────────────────────────────────────────────────────

function violationRows(violations: readonly Violation[]): string {
  return sortViolations(violations)
    .map(
      (v) => `
          <tr class="severity-${v.severity}">
            <td><span class="badge badge-${v.severity}">${SEVERITY_LABEL[v.severity]}</span></td>
            <td>${v.path ? `<code>${escapeHtml(v.path)}</code>` : '—'}</td>
            <td>${escapeHtml(v.description)}</td>
            <td><code>${escapeHtml(v.name)}</code></td>
          </tr>`
    )
    .join('');
}

function propertyRows(details: SchemaDetails): string {
  return details.properties
    .map(
      (p) => `
          <tr${p.violations.length > 0 ? ` class="severity-${aggregateSeverity(p.violations)}"` : ''}>
            <td><code>${escapeHtml(p.name)}</code></td>
            <td>${escapeHtml(p.type)}${p.format ? ` <small>(${escapeHtml(p.format)})</small>` : ''}</td>
            <td>${p.required ? 'yes' : '—'}</td>
            <td>${p.nullable ? 'yes' : '—'}</td>
            <td>${p.violations.length}</td>
          </tr>`
    )
    .join('');
}

function schemaSection(result: MatchResult, details: SchemaDetails | undefined): string {
  const properties =
    details && details.properties.length > 0
      ? `
      <table class="properties">
        <thead>
          <tr><th>Property</th><th>Type</th><th>Required</th><th>Nullable</th><th>Changes</th></tr>
        </thead>
        <tbody>${propertyRows(details)}
        </tbody>
      </table>`
      : '';

  return `
    <section class="schema" id="schema-${escapeHtml(result.name)}">
      <h2>${escapeHtml(result.name)} <span class="badge badge-${result.severity}">${SEVERITY_LABEL[result.severity]}</span></h2>
      ${details?.description ? `<p class="description">${escapeHtml(details.description)}</p>` : ''}
      <table>
        <thead>
          <tr><th>Severity</th><th>Property</th><th>Change</th><th>Rule</th></tr>
        </thead>
        <tbody>${violationRows(result.violations)}
        </tbody>
      </table>${properties}
    </section>`;
}

function formatHtml(report: DiffReport): string {
  const changed = changedResults(report);
  const unchanged = report.results.filter((r) => r.status === 'unchanged');
  const detailsByName = new Map(report.schemas.map((s) => [s.name, s]));

  const sections = changed.map((r) => schemaSection(r, detailsByName.get(r.name))).join('\n');
  const scoreClass =
    report.compatibilityScore >= 90 ? 'high' : report.compatibilityScore >= 70 ? 'mid' : 'low';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Schema Drift Report — ${escapeHtml(report.base)} → ${escapeHtml(report.current)}</title>
  <style>
    :root {
      --red: #ef4444; --yellow: #f59e0b; --green: #22c55e;
      --bg: #0f172a; --surface: #1e293b; --text: #e2e8f0; --muted: #94a3b8;
    }
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body { font-family: 'Segoe UI', system-ui, sans-serif; background: var(--bg); color: var(--text); padding: 2rem; }
    .container { max-width: 960px; margin: 0 auto; }
    h1 { font-size: 1.5rem; margin-bottom: 0.5rem; }
    h2 { font-size: 1.15rem; margin: 2rem 0 0.75rem; }
    .meta { color: var(--muted); margin-bottom: 1.5rem; font-size: 0.875rem; }
    .description { color: var(--muted); margin-bottom: 0.75rem; font-size: 0.875rem; }
    .summary { display: flex; gap: 1rem; margin-bottom: 2rem; }
    .summary-card { background: var(--surface); border-radius: 8px; padding: 1rem 1.5rem; flex: 1; text-align: center; }
    .summary-card .count { font-size: 2rem; font-weight: 700; }
    .summary-card.breaking .count { color: var(--red); }
    .summary-card.warning .count { color: var(--yellow); }
    .summary-card.change .count { color: var(--green); }
    .summary-card .label { color: var(--muted); font-size: 0.75rem; text-transform: uppercase; }
    .score { font-size: 2.5rem; font-weight: 800; }
    .score.high { color: var(--green); }
    .score.mid { color: var(--yellow); }
    .score.low { color: var(--red); }
    table { width: 100%; border-collapse: collapse; background: var(--surface); border-radius: 8px; overflow: hidden; }
    table.properties { margin-top: 0.75rem; }
    th { background: #334155; padding: 0.75rem 1rem; text-align: left; font-size: 0.75rem; text-transform: uppercase; color: var(--muted); }
    td { padding: 0.75rem 1rem; border-top: 1px solid #334155; font-size: 0.875rem; }
    code { background: #334155; padding: 0.15rem 0.4rem; border-radius: 3px; font-size: 0.8rem; }
    .badge { padding: 0.2rem 0.6rem; border-radius: 4px; font-size: 0.7rem; font-weight: 600; }
    .badge-breaking { background: rgba(239,68,68,0.2); color: var(--red); }
    .badge-warning { background: rgba(245,158,11,0.2); color: var(--yellow); }
    .badge-change { background: rgba(34,197,94,0.2); color: var(--green); }
    .unchanged { color: var(--muted); margin-top: 2rem; font-size: 0.875rem; }
    .no-drift { text-align: center; padding: 3rem; color: var(--green); font-size: 1.2rem; }
  </style>
</head>
<body>
  <div class="container">
    <h1>🔍 Schema Drift Report</h1>
    <div class="meta">
      <strong>${escapeHtml(report.base)}</strong> → <strong>${escapeHtml(report.current)}</strong> · ${escapeHtml(report.timestamp)}
    </div>

    <div class="summary">
      <div class="summary-card breaking">
        <div class="count">${report.summary.breaking}</div>
        <div class="label">Breaking</div>
      </div>
      <div class="summary-card warning">
        <div class="count">${report.summary.warning}</div>
        <div class="label">Warnings</div>
      </div>
      <div class="summary-card change">
        <div class="count">${report.summary.change}</div>
        <div class="label">Changes</div>
      </div>
      <div class="summary-card">
        <div class="score ${scoreClass}">${report.compatibilityScore}%</div>
        <div class="label">Compatibility</div>
      </div>
    </div>

    ${changed.length === 0 ? '<div class="no-drift">✅ No schema changes detected</div>' : sections}
    ${
      unchanged.length > 0
        ? `<p class="unchanged">Unchanged: ${unchanged.map((r) => escapeHtml(r.name)).join(', ')}</p>`
        : ''
    }
  </div>
</body>
</html>`;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function changedResults(report: DiffReport): MatchResult[] {
  return sortBySeverity(report.results.filter((r) => r.violations.length > 0));
}

/** Breaking first; discovery order within a level */
function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort((a, b) => compareSeverity(b.severity, a.severity));
}

function groupBySeverity(violations: readonly Violation[]): Record<Severity, Violation[]> {
  return {
    breaking: violations.filter((v) => v.severity === 'breaking'),
    warning: violations.filter((v) => v.severity === 'warning'),
    change: violations.filter((v) => v.severity === 'change'),
  };
}

function escapeCell(str: string): string {
  return str.replace(/\|/g, '\\|');
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
