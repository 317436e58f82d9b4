import type Parser from 'tree-sitter';
import { ParseError, type ParseErrorInfo } from '../errors';
import { importEntries } from '../parser/imports';
import { docstringOf } from '../parser/literals';
import { classifyNode } from '../parser/nodes';
import { assertValidTree, parsePython, type SyntaxTree } from '../parser/python';
import { complexity } from './complexity';
import { collectDefinitions } from './definitions';
import { functionLength } from './smells';

export interface LineCounts {
  lines_of_code: number;
  blank_lines: number;
  comment_lines: number;
  total_lines: number;
}

/** Classify physical lines. A trailing newline does not open an extra line. */
export function countLines(source: string): LineCounts {
  const lines = source.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  const counts: LineCounts = { lines_of_code: 0, blank_lines: 0, comment_lines: 0, total_lines: lines.length };
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) counts.blank_lines += 1;
    else if (trimmed.startsWith('#')) counts.comment_lines += 1;
    else counts.lines_of_code += 1;
  }
  return counts;
}

export interface CodeMetrics extends LineCounts {
  ok: true;
  function_count: number;
  class_count: number;
  import_count: number;
  docstring_count: number;
  docstring_coverage: number;
  avg_function_length: number;
  avg_complexity: number;
}

export type CodeMetricsResult = CodeMetrics | { ok: false; error: ParseErrorInfo };

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function countImports(root: Parser.SyntaxNode): number {
  let count = 0;
  const stack: Parser.SyntaxNode[] = [root];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;
    const kind = classifyNode(n).kind;
    if (kind === 'import' || kind === 'import_from') {
      count += importEntries(n).length;
      continue;
    }
    stack.push(...n.children);
  }
  return count;
}

/** @throws ParseError when the tree was produced from invalid source. */
export function metricsOf(tree: SyntaxTree): CodeMetrics {
  assertValidTree(tree);
  const { functions, classes } = collectDefinitions(tree.root);
  const documented =
    functions.filter((f) => docstringOf(f.body) !== null).length +
    classes.filter((c) => docstringOf(c.body) !== null).length;
  const symbols = functions.length + classes.length;
  const lengths = functions.map((f) => functionLength(f.node));
  const scores = functions.map((f) => complexity(f.node));
  const mean = (xs: number[]): number => (xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length);
  return {
    ok: true,
    ...countLines(tree.source),
    function_count: functions.length,
    class_count: classes.length,
    import_count: countImports(tree.root),
    docstring_count: documented,
    docstring_coverage: symbols === 0 ? 100 : round((documented / symbols) * 100, 1),
    avg_function_length: round(mean(lengths), 2),
    avg_complexity: round(mean(scores), 2),
  };
}

export function computeMetrics(source: string): CodeMetricsResult {
  try {
    return metricsOf(parsePython(source));
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e.toInfo() };
    throw e;
  }
}

export interface LoopCounts {
  loops: number;
  nested_loops: number;
  comprehensions: number;
}

export interface LoopProfile {
  functions: Array<{ name: string; line: number } & LoopCounts>;
  totals: LoopCounts;
  hotspots: string[];
}

function descendants(node: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const out: Parser.SyntaxNode[] = [];
  const stack = [...node.children];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;
    out.push(n);
    stack.push(...n.children);
  }
  return out;
}

function isLoop(node: Parser.SyntaxNode): boolean {
  return classifyNode(node).kind === 'loop';
}

/**
 * Every loop adds one to `loops` and, to `nested_loops`, the number of loops
 * anywhere inside it. Three loops nested in a chain give 2 + 1 = 3.
 */
export function countLoops(node: Parser.SyntaxNode): LoopCounts {
  const counts: LoopCounts = { loops: 0, nested_loops: 0, comprehensions: 0 };
  for (const n of descendants(node)) {
    const kind = classifyNode(n).kind;
    if (kind === 'loop') {
      counts.loops += 1;
      counts.nested_loops += descendants(n).filter(isLoop).length;
    } else if (kind === 'comprehension') {
      counts.comprehensions += 1;
    }
  }
  return counts;
}

export function loopHotspots(counts: LoopCounts): string[] {
  const hints: string[] = [];
  if (counts.nested_loops > 0) hints.push(`${counts.nested_loops} nested loops detected (quadratic or worse)`);
  if (counts.loops > 10) hints.push(`${counts.loops} loops in total, review for optimisation`);
  return hints;
}

/** @throws ParseError when the tree was produced from invalid source. */
export function profileLoops(tree: SyntaxTree): LoopProfile {
  assertValidTree(tree);
  const functions = collectDefinitions(tree.root).functions.map((f) => ({
    name: f.name,
    line: f.line,
    ...countLoops(f.node),
  }));
  const totals = countLoops(tree.root);
  return { functions, totals, hotspots: loopHotspots(totals) };
}
