import type Parser from 'tree-sitter';
import { ParseError } from '../errors';
import { importEntries, normalizedImport } from '../parser/imports';
import { docstringOf } from '../parser/literals';
import { assertNever, classifyNode, directMethods } from '../parser/nodes';
import { assertValidTree, parsePython, type SyntaxTree } from '../parser/python';
import { complexity } from './complexity';
import { annotationCoverage, renderDecorators } from './signature';
import { MODULE_DOCSTRING_KEY, type StructuralSnapshot } from './types';

interface SnapshotAccumulator {
  functions: Set<string>;
  classes: Set<string>;
  classMethods: Map<string, Set<string>>;
  imports: Set<string>;
  decorators: Map<string, string[]>;
  docstrings: Map<string, string>;
  complexity: Map<string, number>;
  annotationCoverage: Map<string, number>;
}

interface VisitContext {
  /** the node is a direct statement of a class body */
  inClassBody: boolean;
  decorators: string[];
}

const PLAIN: VisitContext = { inClassBody: false, decorators: [] };

function uniqueInOrder(values: string[]): string[] {
  return [...new Set(values)];
}

function recordDecorators(acc: SnapshotAccumulator, name: string, decorators: string[]): void {
  if (decorators.length > 0) acc.decorators.set(name, uniqueInOrder(decorators));
}

function recordDocstring(acc: SnapshotAccumulator, name: string, body: Parser.SyntaxNode | null): void {
  const doc = docstringOf(body);
  if (doc !== null) acc.docstrings.set(name, doc);
}

function visitChildren(node: Parser.SyntaxNode, acc: SnapshotAccumulator): void {
  for (const child of node.children) visit(child, acc, PLAIN);
}

function visit(node: Parser.SyntaxNode, acc: SnapshotAccumulator, ctx: VisitContext): void {
  const n = classifyNode(node);
  switch (n.kind) {
    case 'function':
      acc.functions.add(n.name);
      recordDecorators(acc, n.name, ctx.decorators);
      recordDocstring(acc, n.name, n.body);
      acc.complexity.set(n.name, complexity(node));
      acc.annotationCoverage.set(n.name, annotationCoverage(node, ctx.inClassBody, ctx.decorators));
      visitChildren(node, acc);
      return;
    case 'class': {
      acc.classes.add(n.name);
      acc.classMethods.set(n.name, new Set(directMethods(n.body).map((m) => m.fn.childForFieldName('name')?.text ?? '').filter(Boolean)));
      recordDecorators(acc, n.name, ctx.decorators);
      recordDocstring(acc, n.name, n.body);
      if (n.body) {
        for (const stmt of n.body.children) visit(stmt, acc, { inClassBody: true, decorators: [] });
      }
      return;
    }
    case 'decorated':
      if (n.definition) {
        visit(n.definition, acc, { inClassBody: ctx.inClassBody, decorators: renderDecorators(n.decorators) });
      }
      return;
    case 'import':
    case 'import_from':
      for (const entry of importEntries(node)) acc.imports.add(normalizedImport(entry));
      return;
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
    case 'call':
    case 'assignment':
    case 'other':
      visitChildren(node, acc);
      return;
    default:
      assertNever(n);
  }
}

/**
 * Build the structural snapshot of a parsed source unit.
 *
 * @throws ParseError when the tree was produced from invalid source.
 */
export function extract(tree: SyntaxTree): StructuralSnapshot {
  assertValidTree(tree);
  const acc: SnapshotAccumulator = {
    functions: new Set(),
    classes: new Set(),
    classMethods: new Map(),
    imports: new Set(),
    decorators: new Map(),
    docstrings: new Map(),
    complexity: new Map(),
    annotationCoverage: new Map(),
  };
  const moduleDoc = docstringOf(tree.root);
  if (moduleDoc !== null) acc.docstrings.set(MODULE_DOCSTRING_KEY, moduleDoc);
  visitChildren(tree.root, acc);
  return Object.freeze({ ...acc });
}

export type SnapshotResult = { ok: true; snapshot: StructuralSnapshot } | { ok: false; error: ParseError };

/** Parse and extract; a syntax error comes back as a value instead of being thrown. */
export function snapshotOf(source: string): SnapshotResult {
  try {
    return { ok: true, snapshot: extract(parsePython(source)) };
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e };
    throw e;
  }
}
