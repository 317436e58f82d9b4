import type Parser from 'tree-sitter';
import { assertNever, classifyNode, startLine } from '../parser/nodes';
import { renderDecorators } from './signature';

export interface FunctionDefinition {
  node: Parser.SyntaxNode;
  name: string;
  line: number;
  /** direct statement of a class body */
  isMethod: boolean;
  decorators: string[];
  body: Parser.SyntaxNode | null;
}

export interface ClassDefinition {
  node: Parser.SyntaxNode;
  name: string;
  line: number;
  body: Parser.SyntaxNode | null;
}

export interface Definitions {
  functions: FunctionDefinition[];
  classes: ClassDefinition[];
}

function collect(node: Parser.SyntaxNode, out: Definitions, isMethod: boolean, decorators: string[]): void {
  const n = classifyNode(node);
  switch (n.kind) {
    case 'function':
      out.functions.push({ node, name: n.name, line: startLine(node), isMethod, decorators, body: n.body });
      for (const c of node.children) collect(c, out, false, []);
      return;
    case 'class':
      out.classes.push({ node, name: n.name, line: startLine(node), body: n.body });
      for (const c of node.children) {
        if (c.type !== 'block') collect(c, out, false, []);
      }
      if (n.body) {
        for (const stmt of n.body.children) collect(stmt, out, true, []);
      }
      return;
    case 'decorated':
      if (n.definition) collect(n.definition, out, isMethod, renderDecorators(n.decorators));
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
    case 'import':
    case 'import_from':
    case 'call':
    case 'assignment':
    case 'other':
      for (const c of node.children) collect(c, out, false, []);
      return;
    default:
      assertNever(n);
  }
}

/** Every function and class definition in source pre-order, at any depth. */
export function collectDefinitions(root: Parser.SyntaxNode): Definitions {
  const out: Definitions = { functions: [], classes: [] };
  for (const c of root.children) collect(c, out, false, []);
  return out;
}
