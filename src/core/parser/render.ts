import type Parser from 'tree-sitter';
import { codeChildren } from './nodes';

export const UNKNOWN_DECORATOR = '@<unknown>';

const ATOM_TYPES = new Set(['identifier', 'integer', 'float', 'true', 'false', 'none', 'ellipsis']);

function renderAll(nodes: Parser.SyntaxNode[]): string[] | null {
  const out: string[] = [];
  for (const n of nodes) {
    const r = renderExpression(n);
    if (r === null) return null;
    out.push(r);
  }
  return out;
}

function renderArgument(node: Parser.SyntaxNode): string | null {
  switch (node.type) {
    case 'keyword_argument': {
      const name = node.childForFieldName('name');
      const value = node.childForFieldName('value');
      if (!name || !value) return null;
      const v = renderExpression(value);
      return v === null ? null : `${name.text}=${v}`;
    }
    case 'list_splat': {
      const inner = codeChildren(node)[0];
      const v = inner ? renderExpression(inner) : null;
      return v === null ? null : `*${v}`;
    }
    case 'dictionary_splat': {
      const inner = codeChildren(node)[0];
      const v = inner ? renderExpression(inner) : null;
      return v === null ? null : `**${v}`;
    }
    default:
      return renderExpression(node);
  }
}

function renderArguments(node: Parser.SyntaxNode): string | null {
  if (node.type === 'generator_expression') return null;
  const parts: string[] = [];
  for (const arg of codeChildren(node)) {
    const r = renderArgument(arg);
    if (r === null) return null;
    parts.push(r);
  }
  return parts.join(', ');
}

/**
 * Canonical, whitespace-normalised source text for the expression forms that
 * appear in decorators. Returns null for anything else.
 */
export function renderExpression(node: Parser.SyntaxNode): string | null {
  if (ATOM_TYPES.has(node.type)) return node.text;
  switch (node.type) {
    case 'string':
    case 'concatenated_string':
      return node.text.includes('\n') ? null : node.text;
    case 'attribute': {
      const obj = node.childForFieldName('object');
      const attr = node.childForFieldName('attribute');
      if (!obj || !attr) return null;
      const o = renderExpression(obj);
      return o === null ? null : `${o}.${attr.text}`;
    }
    case 'call': {
      const fn = node.childForFieldName('function');
      const args = node.childForFieldName('arguments');
      if (!fn || !args) return null;
      const f = renderExpression(fn);
      const a = renderArguments(args);
      return f === null || a === null ? null : `${f}(${a})`;
    }
    case 'subscript': {
      const value = node.childForFieldName('value');
      if (!value) return null;
      const v = renderExpression(value);
      const subs = renderAll(codeChildren(node).filter((c) => c.startIndex !== value.startIndex));
      return v === null || subs === null ? null : `${v}[${subs.join(', ')}]`;
    }
    case 'list': {
      const items = renderAll(codeChildren(node));
      return items === null ? null : `[${items.join(', ')}]`;
    }
    case 'set': {
      const items = renderAll(codeChildren(node));
      return items === null ? null : `{${items.join(', ')}}`;
    }
    case 'tuple': {
      const items = renderAll(codeChildren(node));
      if (items === null) return null;
      return items.length === 1 ? `(${items[0]},)` : `(${items.join(', ')})`;
    }
    case 'dictionary': {
      const parts: string[] = [];
      for (const pair of codeChildren(node)) {
        if (pair.type !== 'pair') return null;
        const k = pair.childForFieldName('key');
        const v = pair.childForFieldName('value');
        const kr = k ? renderExpression(k) : null;
        const vr = v ? renderExpression(v) : null;
        if (kr === null || vr === null) return null;
        parts.push(`${kr}: ${vr}`);
      }
      return `{${parts.join(', ')}}`;
    }
    case 'parenthesized_expression': {
      const inner = codeChildren(node)[0];
      const r = inner ? renderExpression(inner) : null;
      return r === null ? null : `(${r})`;
    }
    case 'unary_operator': {
      const op = node.childForFieldName('operator');
      const arg = node.childForFieldName('argument');
      const a = arg ? renderExpression(arg) : null;
      return op && a !== null ? `${op.text}${a}` : null;
    }
    case 'binary_operator': {
      const left = node.childForFieldName('left');
      const op = node.childForFieldName('operator');
      const right = node.childForFieldName('right');
      const l = left ? renderExpression(left) : null;
      const r = right ? renderExpression(right) : null;
      return op && l !== null && r !== null ? `${l} ${op.text} ${r}` : null;
    }
    default:
      return null;
  }
}

/** `@expr` for a decorator node, or the stable placeholder when it cannot be rendered. */
export function renderDecorator(decorator: Parser.SyntaxNode): string {
  const expr = codeChildren(decorator)[0];
  const rendered = expr ? renderExpression(expr) : null;
  return rendered === null ? UNKNOWN_DECORATOR : `@${rendered}`;
}
