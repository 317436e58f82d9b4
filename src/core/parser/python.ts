import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { ParseError } from '../errors';

export interface SyntaxProblem {
  message: string;
  line: number;
  column: number;
}

/**
 * One parsed Python source unit. Owned by the caller that produced it and
 * never shared between analyses.
 */
export interface SyntaxTree {
  source: string;
  root: Parser.SyntaxNode;
  problem: SyntaxProblem | null;
}

function createParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

function parseWithRetry(parser: Parser, source: string): Parser.Tree {
  try {
    return parser.parse(source);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    if (!msg.includes('Invalid argument')) throw e;
    // the node binding rejects inputs larger than its default buffer
    const bufferSize = Math.max(1024 * 1024, Buffer.byteLength(source, 'utf-8') * 2);
    return parser.parse(source, undefined, { bufferSize });
  }
}

// A missing token is inserted by error recovery as a zero-width leaf.
function isMissingLeaf(n: Parser.SyntaxNode): boolean {
  return n.children.length === 0 && n.startIndex === n.endIndex;
}

function problemAt(n: Parser.SyntaxNode, message: string): SyntaxProblem {
  return { message, line: n.startPosition.row + 1, column: n.startPosition.column + 1 };
}

// The grammar still accepts these Python 2 statements without an ERROR node.
const LEGACY_STATEMENTS = new Map([
  ['print_statement', "Missing parentheses in call to 'print'"],
  ['exec_statement', "Missing parentheses in call to 'exec'"],
]);

const DEFAULT_PARAMETERS = new Set(['default_parameter', 'typed_default_parameter']);
const SPLAT_PATTERNS = new Set(['list_splat_pattern', 'dictionary_splat_pattern']);

function isSplat(param: Parser.SyntaxNode): boolean {
  if (SPLAT_PATTERNS.has(param.type)) return true;
  const target = param.type === 'typed_parameter' ? param.namedChildren[0] : undefined;
  return target !== undefined && SPLAT_PATTERNS.has(target.type);
}

/** A positional parameter without a default after one with a default. */
function defaultOrderProblem(params: Parser.SyntaxNode): SyntaxProblem | null {
  let seenDefault = false;
  for (const p of params.namedChildren) {
    if (p.type === 'comment' || p.type === 'positional_separator') continue;
    // keyword-only parameters may omit defaults
    if (p.type === 'keyword_separator' || isSplat(p)) return null;
    if (DEFAULT_PARAMETERS.has(p.type)) seenDefault = true;
    else if (seenDefault) return problemAt(p, 'parameter without a default follows parameter with a default');
  }
  return null;
}

/**
 * First problem in document order: an ERROR node, a token inserted by error
 * recovery, or a construct the grammar parses cleanly but Python 3 rejects.
 */
export function findSyntaxProblem(root: Parser.SyntaxNode): SyntaxProblem | null {
  const stack: Parser.SyntaxNode[] = [root];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;
    if (n.type === 'ERROR') return problemAt(n, 'invalid syntax');
    if (n !== root && isMissingLeaf(n)) return problemAt(n, `missing '${n.type}'`);
    const legacy = LEGACY_STATEMENTS.get(n.type);
    if (legacy) return problemAt(n, legacy);
    if (n.type === 'parameters' || n.type === 'lambda_parameters') {
      const problem = defaultOrderProblem(n);
      if (problem) return problem;
    }
    const children = n.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const c = children[i];
      if (c) stack.push(c);
    }
  }
  return null;
}

/**
 * Parse Python source. Never throws on bad syntax: the first problem found
 * by error recovery is recorded on the tree and reported by
 * {@link assertValidTree}.
 */
export function parsePython(source: string): SyntaxTree {
  const tree = parseWithRetry(createParser(), source);
  return { source, root: tree.rootNode, problem: findSyntaxProblem(tree.rootNode) };
}

export function assertValidTree(tree: SyntaxTree): void {
  if (tree.problem) {
    throw new ParseError(tree.problem.message, tree.problem.line, tree.problem.column);
  }
}

/** Parse and reject invalid source in one step. */
export function parseValidPython(source: string): SyntaxTree {
  const tree = parsePython(source);
  assertValidTree(tree);
  return tree;
}
