import type Parser from 'tree-sitter';

type SyntaxNode = Parser.SyntaxNode;

/**
 * Closed set of node kinds the analyses care about. Every traversal switches
 * over `kind` and ends in {@link assertNever}, so adding a kind forces each
 * analysis to decide what to do with it.
 */
export type PyNode =
  | { kind: 'function'; node: SyntaxNode; name: string; isAsync: boolean; parameters: SyntaxNode | null; returnType: SyntaxNode | null; body: SyntaxNode | null }
  | { kind: 'class'; node: SyntaxNode; name: string; body: SyntaxNode | null }
  | { kind: 'decorated'; node: SyntaxNode; decorators: SyntaxNode[]; definition: SyntaxNode | null }
  | { kind: 'if'; node: SyntaxNode; condition: SyntaxNode | null; consequence: SyntaxNode | null; elifs: SyntaxNode[]; orElse: SyntaxNode | null }
  | { kind: 'elif'; node: SyntaxNode; condition: SyntaxNode | null; consequence: SyntaxNode | null }
  | { kind: 'else'; node: SyntaxNode; body: SyntaxNode | null }
  | { kind: 'loop'; node: SyntaxNode; loop: 'for' | 'while' }
  | { kind: 'try'; node: SyntaxNode }
  | { kind: 'except'; node: SyntaxNode }
  | { kind: 'with'; node: SyntaxNode }
  | { kind: 'assert'; node: SyntaxNode }
  | { kind: 'comprehension'; node: SyntaxNode }
  | { kind: 'comprehension_clause'; node: SyntaxNode }
  | { kind: 'conditional_expression'; node: SyntaxNode }
  | { kind: 'boolean_operator'; node: SyntaxNode }
  | { kind: 'import'; node: SyntaxNode }
  | { kind: 'import_from'; node: SyntaxNode }
  | { kind: 'call'; node: SyntaxNode; callee: SyntaxNode | null; args: SyntaxNode | null }
  | { kind: 'assignment'; node: SyntaxNode }
  | { kind: 'other'; node: SyntaxNode };

export type PyNodeKind = PyNode['kind'];

export function assertNever(value: never): never {
  throw new Error(`Unhandled node kind: ${JSON.stringify(value)}`);
}

const COMPREHENSION_TYPES = new Set([
  'list_comprehension',
  'set_comprehension',
  'dictionary_comprehension',
  'generator_expression',
]);

export function classifyNode(node: SyntaxNode): PyNode {
  switch (node.type) {
    case 'function_definition': {
      const nameNode = node.childForFieldName('name');
      if (!nameNode) return { kind: 'other', node };
      return {
        kind: 'function',
        node,
        name: nameNode.text,
        isAsync: node.children.some((c) => c.type === 'async'),
        parameters: node.childForFieldName('parameters'),
        returnType: node.childForFieldName('return_type'),
        body: node.childForFieldName('body'),
      };
    }
    case 'class_definition': {
      const nameNode = node.childForFieldName('name');
      if (!nameNode) return { kind: 'other', node };
      return { kind: 'class', node, name: nameNode.text, body: node.childForFieldName('body') };
    }
    case 'decorated_definition':
      return {
        kind: 'decorated',
        node,
        decorators: node.namedChildren.filter((c) => c.type === 'decorator'),
        definition: node.childForFieldName('definition'),
      };
    case 'if_statement':
      return {
        kind: 'if',
        node,
        condition: node.childForFieldName('condition'),
        consequence: node.childForFieldName('consequence'),
        elifs: node.namedChildren.filter((c) => c.type === 'elif_clause'),
        orElse: node.namedChildren.find((c) => c.type === 'else_clause') ?? null,
      };
    case 'elif_clause':
      return {
        kind: 'elif',
        node,
        condition: node.childForFieldName('condition'),
        consequence: node.childForFieldName('consequence'),
      };
    case 'else_clause':
      return { kind: 'else', node, body: node.childForFieldName('body') };
    case 'for_statement':
      return { kind: 'loop', node, loop: 'for' };
    case 'while_statement':
      return { kind: 'loop', node, loop: 'while' };
    case 'try_statement':
      return { kind: 'try', node };
    case 'except_clause':
    case 'except_group_clause':
      return { kind: 'except', node };
    case 'with_statement':
      return { kind: 'with', node };
    case 'assert_statement':
      return { kind: 'assert', node };
    case 'for_in_clause':
      return { kind: 'comprehension_clause', node };
    case 'conditional_expression':
      return { kind: 'conditional_expression', node };
    case 'boolean_operator':
      return { kind: 'boolean_operator', node };
    case 'import_statement':
      return { kind: 'import', node };
    case 'import_from_statement':
    case 'future_import_statement':
      return { kind: 'import_from', node };
    case 'call':
      return {
        kind: 'call',
        node,
        callee: node.childForFieldName('function'),
        args: node.childForFieldName('arguments'),
      };
    case 'assignment':
      return { kind: 'assignment', node };
    default:
      if (COMPREHENSION_TYPES.has(node.type)) return { kind: 'comprehension', node };
      return { kind: 'other', node };
  }
}

/** Named children without comments, which tree-sitter keeps as extras. */
export function codeChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((c) => c.type !== 'comment');
}

export function startLine(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * Last line holding code inside `node`. Comments are ignored, and a leaf that
 * ends at column 0 is counted on the line before.
 */
export function lastCodeLine(node: SyntaxNode): number {
  let last = startLine(node);
  const stack: SyntaxNode[] = [node];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;
    if (n.type === 'comment') continue;
    if (n.children.length === 0) {
      const end = n.endPosition;
      const line = end.column === 0 && end.row > n.startPosition.row ? end.row : end.row + 1;
      if (line > last) last = line;
      continue;
    }
    for (const c of n.children) stack.push(c);
  }
  return last;
}

/** `a.b.c` from a dotted_name node, ignoring any whitespace or comments inside. */
export function dottedName(node: SyntaxNode): string {
  if (node.type === 'identifier') return node.text;
  return node.namedChildren
    .filter((c) => c.type === 'identifier')
    .map((c) => c.text)
    .join('.');
}

/** Function definitions that are direct statements of a class body, unwrapping decorators. */
export function directMethods(classBody: SyntaxNode | null): Array<{ fn: SyntaxNode; decorators: SyntaxNode[] }> {
  if (!classBody) return [];
  const out: Array<{ fn: SyntaxNode; decorators: SyntaxNode[] }> = [];
  for (const stmt of classBody.namedChildren) {
    if (stmt.type === 'function_definition') {
      out.push({ fn: stmt, decorators: [] });
    } else if (stmt.type === 'decorated_definition') {
      const def = stmt.childForFieldName('definition');
      if (def?.type === 'function_definition') {
        out.push({ fn: def, decorators: stmt.namedChildren.filter((c) => c.type === 'decorator') });
      }
    }
  }
  return out;
}
