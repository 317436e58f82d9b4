import type Parser from 'tree-sitter';
import { codeChildren } from './nodes';

const STRING_RE = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

function decodeEscapes(body: string): string {
  return body.replace(
    /\\(\r?\n|[\\'"abfnrtv]|[0-7]{1,3}|x[0-9A-Fa-f]{2}|u[0-9A-Fa-f]{4}|U[0-9A-Fa-f]{8})/g,
    (whole: string, esc: string) => {
      if (esc === '\n' || esc === '\r\n') return '';
      const simple = SIMPLE_ESCAPES[esc];
      if (simple !== undefined) return simple;
      if (/^[0-7]/.test(esc)) return String.fromCodePoint(parseInt(esc, 8));
      const hex = esc.slice(1);
      const code = parseInt(hex, 16);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    },
  );
}

/**
 * Value of a plain string literal, or null for anything that is not a
 * constant `str` at run time: f-strings, bytes, and non-string nodes.
 * Implicitly concatenated literals are joined.
 */
export function stringLiteralValue(node: Parser.SyntaxNode): string | null {
  if (node.type === 'concatenated_string') {
    let out = '';
    for (const part of codeChildren(node)) {
      const v = stringLiteralValue(part);
      if (v === null) return null;
      out += v;
    }
    return out;
  }
  if (node.type !== 'string') return null;
  const m = STRING_RE.exec(node.text);
  if (!m) return null;
  const prefix = (m[1] ?? '').toLowerCase();
  if (prefix.includes('f') || prefix.includes('b')) return null;
  const body = m[3] ?? '';
  return prefix.includes('r') ? body : decodeEscapes(body);
}

function expandTabs(line: string, size = 8): string {
  let out = '';
  for (const ch of line) {
    if (ch === '\t') {
      out += ' '.repeat(size - (out.length % size));
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Normalise docstring indentation the way Python's `inspect.cleandoc` does:
 * the first line is stripped, the common margin of the remaining lines is
 * removed, and blank lines at both ends are dropped.
 */
export function cleanDocstring(text: string): string {
  const lines = expandTabs(text).split('\n');
  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) margin = Math.min(margin, line.length - content.length);
  }
  const cleaned = lines.map((line, i) => {
    if (i === 0) return line.trimStart();
    return Number.isFinite(margin) ? line.slice(margin) : line;
  });
  while (cleaned.length > 0 && (cleaned[cleaned.length - 1] ?? '').trim() === '') cleaned.pop();
  while (cleaned.length > 0 && (cleaned[0] ?? '').trim() === '') cleaned.shift();
  return cleaned.join('\n');
}

/**
 * Docstring of a module, class or function body: the first statement must be
 * a bare string literal expression. Returns null when absent or empty.
 */
export function docstringOf(body: Parser.SyntaxNode | null): string | null {
  if (!body) return null;
  const first = codeChildren(body)[0];
  if (!first || first.type !== 'expression_statement') return null;
  const exprs = codeChildren(first);
  const expr = exprs[0];
  if (exprs.length !== 1 || !expr) return null;
  const value = stringLiteralValue(expr);
  if (value === null) return null;
  const cleaned = cleanDocstring(value);
  return cleaned.length > 0 ? cleaned : null;
}
