import type Parser from 'tree-sitter';
import type { SmellThresholds } from '../config';
import { ParseError, type ParseErrorInfo } from '../errors';
import { assertNever, classifyNode, directMethods, lastCodeLine, startLine } from '../parser/nodes';
import { assertValidTree, parsePython, type SyntaxTree } from '../parser/python';
import { collectDefinitions, type ClassDefinition, type FunctionDefinition } from './definitions';
import { positionalParameters } from './signature';
import type { SmellFinding, SmellKind, SmellSeverity } from './types';

export function functionLength(fn: Parser.SyntaxNode): number {
  return lastCodeLine(fn) - startLine(fn) + 1;
}

function childrenDepth(node: Parser.SyntaxNode, depth: number, skip?: (c: Parser.SyntaxNode) => boolean): number {
  let max = depth;
  for (const c of node.children) {
    if (skip?.(c)) continue;
    max = Math.max(max, depthOf(c, depth));
  }
  return max;
}

/**
 * Deepest nesting reached inside `node` when it sits at `depth`. Each `elif`
 * opens one level below the branch before it and an `else` body sits at the
 * level of the last branch.
 */
function depthOf(node: Parser.SyntaxNode, depth: number): number {
  const n = classifyNode(node);
  switch (n.kind) {
    case 'if': {
      let level = depth + 1;
      let max = childrenDepth(node, level, (c) => c.type === 'elif_clause' || c.type === 'else_clause');
      for (const elif of n.elifs) {
        level += 1;
        max = Math.max(max, childrenDepth(elif, level));
      }
      if (n.orElse) max = Math.max(max, childrenDepth(n.orElse, level));
      return max;
    }
    case 'loop':
    case 'try':
    case 'except':
    case 'with':
      return childrenDepth(node, depth + 1);
    case 'function':
    case 'class':
    case 'decorated':
    case 'elif':
    case 'else':
    case 'assert':
    case 'comprehension':
    case 'comprehension_clause':
    case 'conditional_expression':
    case 'boolean_operator':
    case 'import':
    case 'import_from':
    case 'call':
    case 'assignment':
    case 'other':
      return childrenDepth(node, depth);
    default:
      return assertNever(n);
  }
}

/** Maximum depth of nested if/loop/try/except/with blocks in a function, nested functions included. */
export function nestingDepth(fn: Parser.SyntaxNode): number {
  return childrenDepth(fn, 0);
}

function longFunction(def: FunctionDefinition, threshold: number): SmellFinding | null {
  const lines = functionLength(def.node);
  if (lines <= threshold) return null;
  return {
    kind: 'long_function',
    name: def.name,
    line: def.line,
    value: lines,
    threshold,
    severity: lines > threshold * 2 ? 'error' : 'warning',
    message: `Function '${def.name}' is ${lines} lines long (threshold ${threshold})`,
    lines,
  };
}

function tooManyParams(def: FunctionDefinition, threshold: number): SmellFinding | null {
  const params = positionalParameters(def.node, def.isMethod, def.decorators).map((p) => p.name);
  if (params.length <= threshold) return null;
  return {
    kind: 'too_many_params',
    name: def.name,
    line: def.line,
    value: params.length,
    threshold,
    severity: 'warning',
    message: `Function '${def.name}' takes ${params.length} parameters (threshold ${threshold})`,
    count: params.length,
    params,
  };
}

function deepNesting(def: FunctionDefinition, threshold: number): SmellFinding | null {
  const depth = nestingDepth(def.node);
  if (depth <= threshold) return null;
  return {
    kind: 'deep_nesting',
    name: def.name,
    line: def.line,
    value: depth,
    threshold,
    severity: depth > threshold + 2 ? 'error' : 'warning',
    message: `Function '${def.name}' nests ${depth} levels deep (threshold ${threshold})`,
    depth,
  };
}

function godClass(def: ClassDefinition, threshold: number): SmellFinding | null {
  const methods = directMethods(def.body).map((m) => m.fn.childForFieldName('name')?.text ?? '<unknown>');
  if (methods.length <= threshold) return null;
  return {
    kind: 'god_class',
    name: def.name,
    line: def.line,
    value: methods.length,
    threshold,
    severity: 'error',
    message: `Class '${def.name}' defines ${methods.length} methods (threshold ${threshold})`,
    method_count: methods.length,
    methods,
  };
}

/**
 * Every smell in the tree, in source order per category.
 *
 * @throws ParseError when the tree was produced from invalid source.
 */
export function detectSmells(tree: SyntaxTree, thresholds: SmellThresholds): SmellFinding[] {
  assertValidTree(tree);
  const { functions, classes } = collectDefinitions(tree.root);
  const found: Array<SmellFinding | null> = [
    ...functions.map((f) => longFunction(f, thresholds.long_function_lines)),
    ...functions.map((f) => tooManyParams(f, thresholds.too_many_params)),
    ...functions.map((f) => deepNesting(f, thresholds.deep_nesting_level)),
    ...classes.map((c) => godClass(c, thresholds.god_class_methods)),
  ];
  return found.filter((f): f is SmellFinding => f !== null);
}

type FindingsOf<K extends SmellKind> = Array<Extract<SmellFinding, { kind: K }>>;

export interface SmellScan {
  ok: true;
  long_functions: FindingsOf<'long_function'>;
  too_many_params: FindingsOf<'too_many_params'>;
  deep_nesting: FindingsOf<'deep_nesting'>;
  god_class: FindingsOf<'god_class'>;
  total_smells: number;
  severity_counts: Record<SmellSeverity, number>;
}

export type SmellScanResult = SmellScan | { ok: false; error: ParseErrorInfo; total_smells: 0 };

export function groupSmells(findings: SmellFinding[]): SmellScan {
  const scan: SmellScan = {
    ok: true,
    long_functions: [],
    too_many_params: [],
    deep_nesting: [],
    god_class: [],
    total_smells: findings.length,
    severity_counts: { warning: 0, error: 0 },
  };
  for (const f of findings) {
    scan.severity_counts[f.severity] += 1;
    switch (f.kind) {
      case 'long_function':
        scan.long_functions.push(f);
        break;
      case 'too_many_params':
        scan.too_many_params.push(f);
        break;
      case 'deep_nesting':
        scan.deep_nesting.push(f);
        break;
      case 'god_class':
        scan.god_class.push(f);
        break;
      default:
        assertNever(f);
    }
  }
  return scan;
}

/** Parse and scan; invalid source yields an error result with no findings. */
export function scanSmells(source: string, thresholds: SmellThresholds): SmellScanResult {
  try {
    return groupSmells(detectSmells(parsePython(source), thresholds));
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e.toInfo(), total_smells: 0 };
    throw e;
  }
}
