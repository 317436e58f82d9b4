import test from 'node:test';
import assert from 'node:assert/strict';
import { ParseError } from '../src/core/errors';
import { cleanDocstring, stringLiteralValue } from '../src/core/parser/literals';
import { classifyNode } from '../src/core/parser/nodes';
import { assertValidTree, parsePython, parseValidPython } from '../src/core/parser/python';

function firstExpression(source: string) {
  const stmt = parsePython(source).root.namedChildren[0];
  assert.ok(stmt);
  const expr = stmt.namedChildren[0];
  assert.ok(expr);
  return expr;
}

test('valid source parses without a problem', () => {
  const tree = parsePython('def f():\n    return 1\n');
  assert.equal(tree.problem, null);
  assert.doesNotThrow(() => assertValidTree(tree));
});

test('invalid source is recorded on the tree and rejected by assertValidTree', () => {
  const tree = parsePython('def broken(:\n    pass\n');
  assert.notEqual(tree.problem, null);
  assert.throws(() => assertValidTree(tree), ParseError);
  assert.throws(() => parseValidPython('class :\n'), (e: unknown) => e instanceof ParseError && e.line >= 1);
});

test('ParseError exposes a serializable info value', () => {
  const err = new ParseError('invalid syntax', 3, 7);
  assert.deepEqual(err.toInfo(), {
    kind: 'parse_error',
    message: 'invalid syntax (line 3, column 7)',
    line: 3,
    column: 7,
  });
});

test('classifyNode maps definitions and branch constructs', () => {
  const root = parsePython('async def f(x):\n    if x:\n        pass\n    elif x > 1:\n        pass\n    else:\n        pass\n').root;
  const fn = root.namedChildren[0];
  assert.ok(fn);
  const n = classifyNode(fn);
  assert.equal(n.kind, 'function');
  if (n.kind === 'function') {
    assert.equal(n.name, 'f');
    assert.equal(n.isAsync, true);
  }
  const ifNode = n.kind === 'function' ? n.body?.namedChildren[0] : undefined;
  assert.ok(ifNode);
  const branch = classifyNode(ifNode);
  assert.equal(branch.kind, 'if');
  if (branch.kind === 'if') {
    assert.equal(branch.elifs.length, 1);
    assert.notEqual(branch.orElse, null);
  }
});

test('stringLiteralValue decodes plain literals and rejects f-strings and bytes', () => {
  assert.equal(stringLiteralValue(firstExpression('"a\\tb"\n')), 'a\tb');
  assert.equal(stringLiteralValue(firstExpression("r'a\\tb'\n")), 'a\\tb');
  assert.equal(stringLiteralValue(firstExpression('"ab" "cd"\n')), 'abcd');
  assert.equal(stringLiteralValue(firstExpression('f"{x}"\n')), null);
  assert.equal(stringLiteralValue(firstExpression('b"raw"\n')), null);
  assert.equal(stringLiteralValue(firstExpression('42\n')), null);
});

test('cleanDocstring strips the common margin and blank edges', () => {
  assert.equal(cleanDocstring('Summary.\n\n    Details here.\n    '), 'Summary.\n\nDetails here.');
  assert.equal(cleanDocstring('\n    Indented\n      more\n'), 'Indented\n  more');
});

test('Python 2 statements the grammar still accepts are syntax problems', () => {
  assert.deepEqual(parsePython('print "hello"\n').problem, {
    message: "Missing parentheses in call to 'print'",
    line: 1,
    column: 1,
  });
  assert.deepEqual(parsePython('x = 1\nexec "import os"\n').problem, {
    message: "Missing parentheses in call to 'exec'",
    line: 2,
    column: 1,
  });
  assert.equal(parsePython('print("hello")\n').problem, null);
});

test('a parameter without a default may not follow one with a default', () => {
  assert.deepEqual(parsePython('def f(a=1, b):\n    pass\n').problem, {
    message: 'parameter without a default follows parameter with a default',
    line: 1,
    column: 12,
  });
  assert.notEqual(parsePython('g = lambda a=1, b: a\n').problem, null);
  assert.equal(parsePython('def f(a, b=1, *args, c, d=2, **kw):\n    pass\n').problem, null);
  assert.equal(parsePython('def f(a=1, *, b):\n    pass\n').problem, null);
  assert.equal(parsePython('def f(a, /, b=1):\n    pass\n').problem, null);
});
