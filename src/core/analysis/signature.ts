import type Parser from 'tree-sitter';
import { codeChildren } from '../parser/nodes';
import { renderDecorator } from '../parser/render';

export interface ParameterInfo {
  name: string;
  annotated: boolean;
  splat: 'none' | 'list' | 'dict';
  /** `positional_only` before a `/`, `keyword_only` after `*` or `*args` */
  binding: 'positional_only' | 'positional' | 'keyword_only';
}

type ParsedParameter = Omit<ParameterInfo, 'binding'>;

function splatOf(node: Parser.SyntaxNode): ParameterInfo['splat'] {
  if (node.type === 'list_splat_pattern') return 'list';
  if (node.type === 'dictionary_splat_pattern') return 'dict';
  return 'none';
}

function bareName(node: Parser.SyntaxNode): string {
  if (node.type === 'identifier') return node.text;
  const inner = codeChildren(node).find((c) => c.type === 'identifier');
  return inner ? inner.text : node.text;
}

function parameterInfo(node: Parser.SyntaxNode): ParsedParameter | null {
  switch (node.type) {
    case 'identifier':
      return { name: node.text, annotated: false, splat: 'none' };
    case 'list_splat_pattern':
    case 'dictionary_splat_pattern':
      return { name: bareName(node), annotated: false, splat: splatOf(node) };
    case 'typed_parameter': {
      const target = codeChildren(node)[0];
      if (!target) return null;
      return { name: bareName(target), annotated: true, splat: splatOf(target) };
    }
    case 'default_parameter': {
      const name = node.childForFieldName('name');
      return name ? { name: name.text, annotated: false, splat: 'none' } : null;
    }
    case 'typed_default_parameter': {
      const name = node.childForFieldName('name');
      return name ? { name: name.text, annotated: true, splat: 'none' } : null;
    }
    case 'tuple_pattern':
      return { name: node.text, annotated: false, splat: 'none' };
    default:
      // `*` and `/` separators are not parameters
      return null;
  }
}

export function parametersOf(fn: Parser.SyntaxNode): ParameterInfo[] {
  const params = fn.childForFieldName('parameters');
  if (!params) return [];
  const out: ParameterInfo[] = [];
  let keywordOnly = false;
  for (const child of codeChildren(params)) {
    if (child.type === 'positional_separator') {
      for (const earlier of out) earlier.binding = 'positional_only';
      continue;
    }
    if (child.type === 'keyword_separator') {
      keywordOnly = true;
      continue;
    }
    const info = parameterInfo(child);
    if (!info) continue;
    if (info.splat === 'list') {
      keywordOnly = true;
      out.push({ ...info, binding: 'positional' });
    } else {
      out.push({ ...info, binding: keywordOnly || info.splat === 'dict' ? 'keyword_only' : 'positional' });
    }
  }
  return out;
}

/**
 * Whether the first parameter is the implicit `self` of an instance method:
 * the function is a direct method that is neither static nor a class method.
 */
export function hasImplicitReceiver(isMethod: boolean, decorators: string[]): boolean {
  if (!isMethod) return false;
  return !decorators.includes('@staticmethod') && !decorators.includes('@classmethod');
}

/** Parameters after the implicit `self` of an instance method. */
export function explicitParameters(fn: Parser.SyntaxNode, isMethod: boolean, decorators: string[]): ParameterInfo[] {
  const params = parametersOf(fn);
  const first = params[0];
  if (first && first.splat === 'none' && hasImplicitReceiver(isMethod, decorators)) return params.slice(1);
  return params;
}

/**
 * Share of annotated slots (explicit parameters plus the return value), as a
 * percentage with one decimal.
 */
export function annotationCoverage(fn: Parser.SyntaxNode, isMethod: boolean, decorators: string[]): number {
  const params = explicitParameters(fn, isMethod, decorators);
  const slots = params.length + 1;
  const annotated = params.filter((p) => p.annotated).length + (fn.childForFieldName('return_type') ? 1 : 0);
  return Math.round((annotated / slots) * 1000) / 10;
}

export function renderDecorators(decorators: Parser.SyntaxNode[]): string[] {
  return decorators.map(renderDecorator);
}

/**
 * Positional-or-keyword parameters after the receiver: no positional-only
 * parameters, no keyword-only parameters, no `*args` or `**kwargs`.
 */
export function positionalParameters(fn: Parser.SyntaxNode, isMethod: boolean, decorators: string[]): ParameterInfo[] {
  return explicitParameters(fn, isMethod, decorators).filter((p) => p.splat === 'none' && p.binding === 'positional');
}
