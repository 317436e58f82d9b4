import type Parser from 'tree-sitter';
import { assertNever, classifyNode, codeChildren } from '../parser/nodes';
import type { ComplexityChange, ComplexityLevel, StructuralSnapshot } from './types';

/** `else:` whose body opens with another `if` reads as an `elif`, so it adds no branch of its own. */
function elseStartsWithIf(orElse: Parser.SyntaxNode): boolean {
  const body = orElse.childForFieldName('body');
  const first = body ? codeChildren(body)[0] : undefined;
  return first?.type === 'if_statement';
}

function isFunctionDefinition(node: Parser.SyntaxNode | null): boolean {
  return node?.type === 'function_definition';
}

function branchesIn(node: Parser.SyntaxNode): number {
  let count = 0;
  for (const child of node.children) count += branchesOf(child);
  return count;
}

function branchesOf(node: Parser.SyntaxNode): number {
  const n = classifyNode(node);
  switch (n.kind) {
    // a nested function is scored on its own
    case 'function':
      return 0;
    case 'decorated':
      return isFunctionDefinition(n.definition) ? 0 : branchesIn(node);
    case 'if': {
      let own = 1 + n.elifs.length;
      if (n.orElse && !elseStartsWithIf(n.orElse)) own += 1;
      return own + branchesIn(node);
    }
    case 'loop':
    case 'except':
    case 'with':
    case 'assert':
    case 'comprehension_clause':
    case 'conditional_expression':
    case 'boolean_operator':
      return 1 + branchesIn(node);
    case 'class':
    case 'elif':
    case 'else':
    case 'try':
    case 'comprehension':
    case 'import':
    case 'import_from':
    case 'call':
    case 'assignment':
    case 'other':
      return branchesIn(node);
    default:
      return assertNever(n);
  }
}

/**
 * McCabe cyclomatic complexity of one function definition: 1 plus one per
 * decision point. Binary boolean operators each add one, so a chain of N
 * operands adds N - 1. Branches of nested functions are not counted here.
 */
export function complexity(functionNode: Parser.SyntaxNode): number {
  return 1 + branchesIn(functionNode);
}

export function complexityLevel(score: number): ComplexityLevel {
  if (score <= 10) return 'low';
  if (score <= 20) return 'medium';
  if (score <= 50) return 'high';
  return 'critical';
}

export interface ComplexityReportEntry {
  complexity: number;
  level: ComplexityLevel;
  warning: boolean;
}

export function complexityReport(snapshot: StructuralSnapshot): Map<string, ComplexityReportEntry> {
  const out = new Map<string, ComplexityReportEntry>();
  for (const [name, score] of snapshot.complexity) {
    out.set(name, { complexity: score, level: complexityLevel(score), warning: score > 10 });
  }
  return out;
}

export function complexityChange(oldScore: number | null, newScore: number | null): ComplexityChange {
  const level = complexityLevel(newScore ?? oldScore ?? 1);
  if (oldScore !== null && newScore !== null) {
    const delta = newScore - oldScore;
    const trend = delta > 0 ? 'increased' : delta < 0 ? 'decreased' : 'unchanged';
    return { old: oldScore, new: newScore, delta, trend, level };
  }
  if (newScore !== null) return { old: null, new: newScore, delta: null, trend: 'new_symbol', level };
  return { old: oldScore, new: null, delta: null, trend: 'removed_symbol', level };
}

/** Per-symbol complexity comparison over every function present in either snapshot. */
export function compareComplexity(
  oldSnap: StructuralSnapshot,
  newSnap: StructuralSnapshot,
): Map<string, ComplexityChange> {
  const names = new Set([...oldSnap.complexity.keys(), ...newSnap.complexity.keys()]);
  const out = new Map<string, ComplexityChange>();
  for (const name of names) {
    out.set(name, complexityChange(oldSnap.complexity.get(name) ?? null, newSnap.complexity.get(name) ?? null));
  }
  return out;
}
