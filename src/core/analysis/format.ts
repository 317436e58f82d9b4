import type { ParseErrorInfo } from '../errors';
import type { CodeMetricsResult } from './metrics';
import type { ChangeReportResult, SummaryResult } from './report';
import type { SecurityScanResult } from './security';
import type { SmellScanResult } from './smells';
import type { SecurityFinding, SmellFinding } from './types';

const RULE = '='.repeat(50);

function parseFailure(error: ParseErrorInfo): string {
  return `Syntax error: ${error.message}`;
}

function smellLine(f: SmellFinding): string {
  const tag = `[${f.severity}]`;
  switch (f.kind) {
    case 'long_function':
      return `  ${tag} ${f.name}() line ${f.line}: ${f.lines} lines`;
    case 'too_many_params':
      return `  ${tag} ${f.name}() line ${f.line}: ${f.count} parameters (${f.params.join(', ')})`;
    case 'deep_nesting':
      return `  ${tag} ${f.name}() line ${f.line}: nested ${f.depth} levels`;
    case 'god_class':
      return `  ${tag} ${f.name} line ${f.line}: ${f.method_count} methods`;
  }
}

function section<T>(out: string[], title: string, items: T[], line: (item: T) => string): void {
  if (items.length === 0) return;
  out.push('', `${title}:`);
  for (const item of items) out.push(line(item));
}

export function formatSmellReport(result: SmellScanResult): string {
  if (!result.ok) return parseFailure(result.error);
  if (result.total_smells === 0) return 'No code smells found.';
  const out = [`Code smell report (${result.total_smells} found)`, RULE];
  section(out, 'Long functions', result.long_functions, smellLine);
  section(out, 'Too many parameters', result.too_many_params, smellLine);
  section(out, 'Deep nesting', result.deep_nesting, smellLine);
  section(out, 'God classes', result.god_class, smellLine);
  out.push('', RULE, `Summary: ${result.severity_counts.warning} warnings, ${result.severity_counts.error} errors`);
  return out.join('\n');
}

function securityLine(f: SecurityFinding): string {
  return `  [${f.severity}] line ${f.line}: ${f.message}`;
}

export function formatSecurityReport(result: SecurityScanResult): string {
  if (!result.ok) return parseFailure(result.error);
  if (result.total_issues === 0) return 'No security issues found.';
  const out = [`Security report (${result.total_issues} issues)`, RULE];
  section(out, 'Dangerous functions', result.dangerous_functions, securityLine);
  section(out, 'Shell injection', result.shell_injection, securityLine);
  section(out, 'Hardcoded secrets', result.hardcoded_secrets, securityLine);
  section(out, 'Risky imports', result.risky_imports, securityLine);
  section(out, 'Risky calls', result.risky_calls, securityLine);
  const c = result.severity_counts;
  out.push('', RULE, `Summary: ${c.critical} critical, ${c.high} high, ${c.medium} medium`);
  return out.join('\n');
}

function nameList(out: string[], label: string, names: string[]): void {
  if (names.length > 0) out.push(`${label}: ${names.join(', ')}`);
}

export function formatChangeReport(result: ChangeReportResult): string {
  if (!result.ok) return `${parseFailure(result.error)} (${result.side} version)`;
  const out: string[] = [];
  nameList(out, 'Added functions', result.added_functions);
  nameList(out, 'Removed functions', result.removed_functions);
  nameList(out, 'Added classes', result.added_classes);
  nameList(out, 'Removed classes', result.removed_classes);
  nameList(out, 'Added imports', result.added_imports);
  nameList(out, 'Removed imports', result.removed_imports);
  for (const [cls, change] of Object.entries(result.method_changes)) {
    const parts = [...change.added.map((m) => `+${m}`), ...change.removed.map((m) => `-${m}`)];
    out.push(`Methods of ${cls}: ${parts.join(', ')}`);
  }
  for (const [name, change] of Object.entries(result.decorator_changes)) {
    const parts = [...change.added.map((d) => `+${d}`), ...change.removed.map((d) => `-${d}`)];
    out.push(`Decorators of ${name}: ${parts.join(', ')}`);
  }
  for (const name of Object.keys(result.docstring_changes)) out.push(`Docstring changed: ${name}`);
  for (const [name, change] of Object.entries(result.complexity_changes)) {
    const detail = change.delta === null ? change.trend : `${change.old} -> ${change.new} (${change.delta > 0 ? '+' : ''}${change.delta})`;
    out.push(`Complexity ${name}: ${detail} [${change.level}]`);
  }
  return out.length === 0 ? 'No structural changes.' : out.join('\n');
}

export function formatMetrics(result: CodeMetricsResult): string {
  if (!result.ok) return parseFailure(result.error);
  return [
    `Lines: ${result.total_lines} (code ${result.lines_of_code}, comments ${result.comment_lines}, blank ${result.blank_lines})`,
    `Functions: ${result.function_count}, classes: ${result.class_count}, imports: ${result.import_count}`,
    `Docstring coverage: ${result.docstring_coverage}%`,
    `Average function length: ${result.avg_function_length}, average complexity: ${result.avg_complexity}`,
  ].join('\n');
}

export function formatSummary(result: SummaryResult): string {
  if (!result.ok) return parseFailure(result.error);
  const out: string[] = [];
  nameList(out, 'Functions', result.functions);
  nameList(out, 'Classes', result.classes);
  nameList(out, 'Imports', result.imports);
  for (const [name, score] of Object.entries(result.complexity)) {
    out.push(`Complexity ${name}: ${score}, annotations ${result.annotation_coverage[name] ?? 0}%`);
  }
  return out.length === 0 ? 'Empty module.' : out.join('\n');
}
