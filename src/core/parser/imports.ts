import type Parser from 'tree-sitter';
import { codeChildren, dottedName, startLine } from './nodes';

export interface ImportEntry {
  /** `import x` or `from m import x` */
  form: 'import' | 'from';
  /** Source module of a `from` import without leading dots; empty for `import x` and `from . import x`. */
  module: string;
  /** Imported name (`*` for a wildcard). */
  name: string;
  alias: string | null;
  line: number;
}

function nameAndAlias(node: Parser.SyntaxNode): { name: string; alias: string | null } | null {
  if (node.type === 'dotted_name') return { name: dottedName(node), alias: null };
  if (node.type === 'aliased_import') {
    const name = node.childForFieldName('name');
    const alias = node.childForFieldName('alias');
    if (!name) return null;
    return { name: dottedName(name), alias: alias ? alias.text : null };
  }
  if (node.type === 'wildcard_import') return { name: '*', alias: null };
  return null;
}

function moduleOf(node: Parser.SyntaxNode): { module: string; moduleNode: Parser.SyntaxNode | null } {
  if (node.type === 'future_import_statement') return { module: '__future__', moduleNode: null };
  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return { module: '', moduleNode: null };
  if (moduleNode.type === 'relative_import') {
    const inner = codeChildren(moduleNode).find((c) => c.type === 'dotted_name');
    return { module: inner ? dottedName(inner) : '', moduleNode };
  }
  return { module: dottedName(moduleNode), moduleNode };
}

/** One entry per imported name of an `import` / `from ... import` statement. */
export function importEntries(node: Parser.SyntaxNode): ImportEntry[] {
  const line = startLine(node);
  if (node.type === 'import_statement') {
    const out: ImportEntry[] = [];
    for (const child of codeChildren(node)) {
      const na = nameAndAlias(child);
      if (na) out.push({ form: 'import', module: '', name: na.name, alias: na.alias, line });
    }
    return out;
  }
  if (node.type !== 'import_from_statement' && node.type !== 'future_import_statement') return [];
  const { module, moduleNode } = moduleOf(node);
  const out: ImportEntry[] = [];
  for (const child of codeChildren(node)) {
    if (moduleNode && child.startIndex === moduleNode.startIndex) continue;
    const na = nameAndAlias(child);
    if (na) out.push({ form: 'from', module, name: na.name, alias: na.alias, line });
  }
  return out;
}

/** `X` for `import X`, `M.X` for `from M import X`, bare `X` when M is empty. */
export function normalizedImport(entry: ImportEntry): string {
  if (entry.form === 'import') return entry.name;
  return entry.module ? `${entry.module}.${entry.name}` : entry.name;
}

/** Name the statement binds in the importing scope. */
export function boundName(entry: ImportEntry): string {
  return entry.alias ?? entry.name;
}
