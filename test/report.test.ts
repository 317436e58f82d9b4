import test from 'node:test';
import assert from 'node:assert/strict';
import { formatChangeReport, formatSmellReport } from '../src/core/analysis/format';
import { analyzeChanges, analyzeSource, summarize } from '../src/core/analysis/report';
import { scanSmells } from '../src/core/analysis/smells';
import { DEFAULT_CONFIG } from '../src/core/config';

const SRC = `"""Tools."""
import sys
import os


class Zeta:
    def run(self):
        pass

    def alpha(self):
        pass


@cache
def beta(a: int) -> int:
    if a:
        return a
    return 0
`;

test('summarize lists every structural fact in sorted order', () => {
  assert.deepEqual(summarize(SRC), {
    ok: true,
    functions: ['alpha', 'beta', 'run'],
    classes: ['Zeta'],
    class_methods: { Zeta: ['alpha', 'run'] },
    imports: ['os', 'sys'],
    decorators: { beta: ['@cache'] },
    docstrings: { __module__: 'Tools.' },
    complexity: { alpha: 1, beta: 2, run: 1 },
    annotation_coverage: { alpha: 0, beta: 100, run: 0 },
  });
});

test('summarize reports a syntax error as a value', () => {
  const result = summarize('def f(:\n');
  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.kind, 'parse_error');
});

test('summarize rejects source the interpreter would not compile', () => {
  assert.equal(summarize('print "hello"\n').ok, false);
  assert.equal(summarize('def f(a=1, b):\n    pass\n').ok, false);
});

const OLD = 'def b(): pass\ndef a(): pass\n';
const NEW = 'def c(): pass\ndef a():\n    if x:\n        pass\n';

test('analyzeChanges produces sorted plain data', () => {
  const result = analyzeChanges(OLD, NEW);
  assert.ok(result.ok);
  assert.deepEqual(result.added_functions, ['c']);
  assert.deepEqual(result.removed_functions, ['b']);
  assert.deepEqual(result.modified_functions, ['a']);
  assert.deepEqual(result.method_changes, {});
  assert.deepEqual(result.docstring_changes, {});
  assert.deepEqual(Object.keys(result.complexity_changes), ['a', 'b', 'c']);
  assert.deepEqual(result.complexity_changes.a, { old: 1, new: 2, delta: 1, trend: 'increased', level: 'low' });
  assert.deepEqual(result.complexity_changes.b, { old: 1, new: null, delta: null, trend: 'removed_symbol', level: 'low' });
  assert.deepEqual(result.annotation_changes, {
    b: { old: 0, new: null, delta: null },
    c: { old: null, new: 0, delta: null },
  });
});

test('analyzeChanges names the side that failed to parse', () => {
  const broken = analyzeChanges(OLD, 'def (\n');
  assert.equal(broken.ok, false);
  if (!broken.ok) assert.equal(broken.side, 'new');
  const brokenOld = analyzeChanges('class\n', NEW);
  assert.equal(brokenOld.ok, false);
  if (!brokenOld.ok) assert.equal(brokenOld.side, 'old');
});

test('formatChangeReport renders one line per change', () => {
  assert.equal(
    formatChangeReport(analyzeChanges(OLD, NEW)),
    [
      'Added functions: c',
      'Removed functions: b',
      'Complexity a: 1 -> 2 (+1) [low]',
      'Complexity b: removed_symbol [low]',
      'Complexity c: new_symbol [low]',
    ].join('\n'),
  );
  assert.equal(formatChangeReport(analyzeChanges(OLD, OLD)), 'No structural changes.');
});

test('formatSmellReport groups findings by category', () => {
  const src = 'def wide(a, b, c, d, e, f):\n    pass\n';
  assert.equal(
    formatSmellReport(scanSmells(src, DEFAULT_CONFIG.smells)),
    [
      'Code smell report (1 found)',
      '='.repeat(50),
      '',
      'Too many parameters:',
      '  [warning] wide() line 1: 6 parameters (a, b, c, d, e, f)',
      '',
      '='.repeat(50),
      'Summary: 1 warnings, 0 errors',
    ].join('\n'),
  );
});

test('analyzeSource runs every single-version analysis', () => {
  const result = analyzeSource(SRC, DEFAULT_CONFIG);
  assert.ok(result.ok);
  assert.deepEqual(result.summary, summarize(SRC));
  assert.deepEqual(result.complexity_levels, { alpha: 'low', beta: 'low', run: 'low' });
  assert.equal(result.smells.total_smells, 0);
  assert.equal(result.security.total_issues, 0);
  assert.equal(result.metrics.function_count, 3);
  assert.equal(result.metrics.class_count, 1);
  assert.deepEqual(result.loops.totals, { loops: 0, nested_loops: 0, comprehensions: 0 });

  assert.equal(analyzeSource('if\n', DEFAULT_CONFIG).ok, false);
});
