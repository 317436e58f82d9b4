import type { AnalysisConfig } from './config';
import { ParseError } from './errors';
import type { SourceFile } from './batch';
import type { Logger } from './log';
import { scanTree } from './analysis/security';
import { detectSmells } from './analysis/smells';
import { parsePython, assertValidTree } from './parser/python';

export interface GateOptions {
  /** fail on smells of any severity, not only errors */
  failOnWarning?: boolean;
}

export type GateCheckName = 'syntax' | 'smells' | 'security';

export interface GateCheck {
  name: GateCheckName;
  passed: boolean;
  message: string;
  details: string[];
}

export interface GateResult {
  passed: boolean;
  files: number;
  checks: GateCheck[];
}

function check(name: GateCheckName, details: string[], noun: string, okMessage: string): GateCheck {
  if (details.length === 0) return { name, passed: true, message: okMessage, details };
  return { name, passed: false, message: `${details.length} ${noun}`, details };
}

/**
 * Pre-commit style gate: every file is parsed once and checked for syntax,
 * smells and security findings. A file that does not parse fails the syntax
 * check and is left out of the other two.
 */
export function runQualityGate(
  files: SourceFile[],
  config: AnalysisConfig,
  options: GateOptions = {},
  log?: Logger,
): GateResult {
  const syntax: string[] = [];
  const smells: string[] = [];
  const security: string[] = [];

  for (const file of files) {
    const tree = parsePython(file.source);
    try {
      assertValidTree(tree);
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      syntax.push(`${file.path}:${e.line}: ${e.message}`);
      log?.warn('skip_file', { path: file.path, reason: 'parse_error', line: e.line });
      continue;
    }
    for (const f of detectSmells(tree, config.smells)) {
      if (f.severity === 'error' || options.failOnWarning) smells.push(`${file.path}:${f.line}: [${f.severity}] ${f.message}`);
    }
    for (const f of scanTree(tree, config.security)) {
      if (f.severity === 'critical' || f.severity === 'high') security.push(`${file.path}:${f.line}: [${f.severity}] ${f.message}`);
    }
  }

  const checks = [
    check('syntax', syntax, 'syntax error(s)', 'All files have valid syntax'),
    check('smells', smells, 'blocking smell(s)', 'No blocking code smells'),
    check('security', security, 'security issue(s)', 'No critical or high security issues'),
  ];
  return { passed: checks.every((c) => c.passed), files: files.length, checks };
}

export function formatGateReport(result: GateResult): string {
  const out: string[] = [];
  for (const c of result.checks) {
    out.push(`${c.passed ? 'PASS' : 'FAIL'} ${c.name}: ${c.message}`);
    for (const d of c.details) out.push(`  - ${d}`);
  }
  const passed = result.checks.filter((c) => c.passed).length;
  out.push(`Quality gate ${result.passed ? 'passed' : 'failed'}: ${passed}/${result.checks.length} checks passed over ${result.files} file(s)`);
  return out.join('\n');
}
