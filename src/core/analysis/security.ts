import type Parser from 'tree-sitter';
import type { SecurityPatternSet } from '../config';
import { ParseError, type ParseErrorInfo } from '../errors';
import { boundName, importEntries } from '../parser/imports';
import { stringLiteralValue } from '../parser/literals';
import { assertNever, classifyNode, codeChildren, startLine } from '../parser/nodes';
import { assertValidTree, parsePython, type SyntaxTree } from '../parser/python';
import type { SecurityFinding, SecurityKind, SecuritySeverity } from './types';

interface ScanState {
  patterns: SecurityPatternSet;
  secretPatterns: RegExp[];
  dangerous: ReadonlySet<string>;
  /** bound name -> what it was imported as; grows as imports are met */
  aliases: Map<string, string>;
  findings: SecurityFinding[];
}

/**
 * Dotted name of a call target: `a.b.c` for attribute chains over an
 * identifier. A root that is not an identifier (a call, a subscript) is
 * dropped, so `make().run` gives `run`.
 */
export function callName(node: Parser.SyntaxNode | null): string {
  if (!node) return '';
  if (node.type === 'identifier') return node.text;
  if (node.type === 'attribute') {
    const attr = node.childForFieldName('attribute');
    if (!attr) return '';
    const head = callName(node.childForFieldName('object'));
    return head ? `${head}.${attr.text}` : attr.text;
  }
  return '';
}

function resolveHead(name: string, aliases: ReadonlyMap<string, string>): string {
  const [head = '', ...rest] = name.split('.');
  const resolved = aliases.get(head) ?? head;
  return [resolved, ...rest].join('.');
}

function hasLiteralTrueKeyword(args: Parser.SyntaxNode | null, keyword: string): boolean {
  if (!args) return false;
  return codeChildren(args).some((arg) => {
    if (arg.type !== 'keyword_argument') return false;
    return arg.childForFieldName('name')?.text === keyword && arg.childForFieldName('value')?.type === 'true';
  });
}

function isShellInjection(name: string, args: Parser.SyntaxNode | null, state: ScanState): boolean {
  const rule = state.patterns.shell_rule;
  const resolved = resolveHead(name, state.aliases);
  const matches = rule.functions.some(
    (fn) => name === fn || name === `${rule.module}.${fn}` || resolved === `${rule.module}.${fn}`,
  );
  return matches && hasLiteralTrueKeyword(args, rule.keyword);
}

function checkCall(node: Parser.SyntaxNode, callee: Parser.SyntaxNode | null, args: Parser.SyntaxNode | null, state: ScanState): void {
  const name = callName(callee);
  if (!name) return;
  const line = startLine(node);

  if (state.dangerous.has(name)) {
    state.findings.push({
      kind: 'dangerous_function',
      subject: name,
      line,
      severity: 'critical',
      message: `Call to ${name}() allows arbitrary code execution`,
      function: name,
    });
  }

  if (isShellInjection(name, args, state)) {
    state.findings.push({
      kind: 'shell_injection',
      subject: name,
      line,
      severity: 'critical',
      message: `${name}() called with ${state.patterns.shell_rule.keyword}=True runs its command through the system shell`,
      function: name,
    });
    return;
  }

  if (!name.includes('.')) return;
  const module = resolveHead(name, state.aliases).split('.')[0] ?? '';
  const fn = name.slice(name.lastIndexOf('.') + 1);
  if (state.patterns.risky_modules[module]?.includes(fn)) {
    state.findings.push({
      kind: 'risky_call',
      subject: name,
      line,
      severity: 'high',
      message: `Risky call ${name}() (${module}.${fn})`,
      module,
      function: fn,
    });
  }
}

function checkImport(node: Parser.SyntaxNode, state: ScanState): void {
  for (const entry of importEntries(node)) {
    const target = entry.form === 'import' ? entry.name : entry.module ? `${entry.module}.${entry.name}` : entry.name;
    state.aliases.set(boundName(entry), target);
    if (entry.form !== 'from' || !entry.module) continue;
    const risky = state.patterns.risky_modules[entry.module];
    if (risky && (entry.name === '*' || risky.includes(entry.name))) {
      state.findings.push({
        kind: 'risky_import',
        subject: `${entry.module}.${entry.name}`,
        line: entry.line,
        severity: 'high',
        message: `Risky import ${entry.module}.${entry.name} (deserialization or command execution)`,
        module: entry.module,
        function: entry.name,
      });
    }
  }
}

/** Identifier targets of an assignment chain `a = b = value`, and the final value. */
function assignmentChain(node: Parser.SyntaxNode): { targets: Parser.SyntaxNode[]; value: Parser.SyntaxNode | null } {
  const targets: Parser.SyntaxNode[] = [];
  let current: Parser.SyntaxNode | null = node;
  while (current && current.type === 'assignment') {
    const left = current.childForFieldName('left');
    if (left?.type === 'identifier') targets.push(left);
    current = current.childForFieldName('right');
  }
  return { targets, value: current };
}

function checkAssignment(node: Parser.SyntaxNode, state: ScanState): void {
  const { targets, value } = assignmentChain(node);
  if (!value) return;
  const literal = stringLiteralValue(value);
  if (literal === null || [...literal].length < state.patterns.min_secret_length) return;
  for (const target of targets) {
    const variable = target.text;
    if (!state.secretPatterns.some((re) => re.test(variable))) continue;
    state.findings.push({
      kind: 'hardcoded_secret',
      subject: variable,
      line: startLine(target),
      severity: 'critical',
      message: `Hardcoded secret in ${variable} = '***'`,
      variable,
    });
  }
}

function scanChildren(node: Parser.SyntaxNode, state: ScanState): void {
  for (const c of node.children) scanNode(c, state, false);
}

function scanNode(node: Parser.SyntaxNode, state: ScanState, chained: boolean): void {
  const n = classifyNode(node);
  switch (n.kind) {
    case 'import':
    case 'import_from':
      checkImport(node, state);
      return;
    case 'call':
      checkCall(node, n.callee, n.args, state);
      scanChildren(node, state);
      return;
    case 'assignment':
      // the inner links of `a = b = v` were checked with the outermost one
      if (!chained) checkAssignment(node, state);
      for (const c of node.children) scanNode(c, state, c.type === 'assignment');
      return;
    case 'function':
    case 'class':
    case 'decorated':
    case 'if':
    case 'elif':
    case 'else':
    case 'loop':
    case 'try':
    case 'except':
    case 'with':
    case 'assert':
    case 'comprehension':
    case 'comprehension_clause':
    case 'conditional_expression':
    case 'boolean_operator':
    case 'other':
      scanChildren(node, state);
      return;
    default:
      assertNever(n);
  }
}

/**
 * Match calls, imports and literal assignments against the pattern set in
 * one forward pass. Aliases resolve only after their import statement.
 * Secret patterns match from the start of the variable name.
 *
 * @throws ParseError when the tree was produced from invalid source.
 */
export function scanTree(tree: SyntaxTree, patterns: SecurityPatternSet): SecurityFinding[] {
  assertValidTree(tree);
  const state: ScanState = {
    patterns,
    secretPatterns: patterns.secret_patterns.map((src) => new RegExp(`^(?:${src})`, 'i')),
    dangerous: new Set(patterns.dangerous_calls),
    aliases: new Map(),
    findings: [],
  };
  scanChildren(tree.root, state);
  return state.findings;
}

type FindingsOf<K extends SecurityKind> = Array<Extract<SecurityFinding, { kind: K }>>;

export interface SecurityScan {
  ok: true;
  dangerous_functions: FindingsOf<'dangerous_function'>;
  risky_imports: FindingsOf<'risky_import'>;
  risky_calls: FindingsOf<'risky_call'>;
  hardcoded_secrets: FindingsOf<'hardcoded_secret'>;
  shell_injection: FindingsOf<'shell_injection'>;
  total_issues: number;
  severity_counts: Record<SecuritySeverity, number>;
}

export type SecurityScanResult = SecurityScan | { ok: false; error: ParseErrorInfo; total_issues: 0 };

export function groupSecurityFindings(findings: SecurityFinding[]): SecurityScan {
  const scan: SecurityScan = {
    ok: true,
    dangerous_functions: [],
    risky_imports: [],
    risky_calls: [],
    hardcoded_secrets: [],
    shell_injection: [],
    total_issues: findings.length,
    severity_counts: { critical: 0, high: 0, medium: 0 },
  };
  for (const f of findings) {
    scan.severity_counts[f.severity] += 1;
    switch (f.kind) {
      case 'dangerous_function':
        scan.dangerous_functions.push(f);
        break;
      case 'risky_import':
        scan.risky_imports.push(f);
        break;
      case 'risky_call':
        scan.risky_calls.push(f);
        break;
      case 'hardcoded_secret':
        scan.hardcoded_secrets.push(f);
        break;
      case 'shell_injection':
        scan.shell_injection.push(f);
        break;
      default:
        assertNever(f);
    }
  }
  return scan;
}

export function scanSecurity(source: string, patterns: SecurityPatternSet): SecurityScanResult {
  try {
    return groupSecurityFindings(scanTree(parsePython(source), patterns));
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e.toInfo(), total_issues: 0 };
    throw e;
  }
}
