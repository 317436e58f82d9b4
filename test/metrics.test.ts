import test from 'node:test';
import assert from 'node:assert/strict';
import { computeMetrics, countLines, loopHotspots, profileLoops } from '../src/core/analysis/metrics';
import { parsePython } from '../src/core/parser/python';

const SAMPLE = [
  'import os',
  'from sys import argv',
  '',
  '# helpers',
  'class Grid:',
  '    """A grid."""',
  '',
  '',
  'def walk(rows):',
  '    for r in rows:',
  '        for c in r:',
  '            for v in c:',
  '                print(v)',
  '    return [x for x in rows if x]',
  '',
].join('\n');

test('countLines classifies physical lines', () => {
  assert.deepEqual(countLines(SAMPLE), { lines_of_code: 10, blank_lines: 3, comment_lines: 1, total_lines: 14 });
  assert.deepEqual(countLines(''), { lines_of_code: 0, blank_lines: 0, comment_lines: 0, total_lines: 0 });
  assert.deepEqual(countLines('a = 1\r\n\r\n'), { lines_of_code: 1, blank_lines: 1, comment_lines: 0, total_lines: 2 });
});

test('computeMetrics combines line counts with symbol statistics', () => {
  assert.deepEqual(computeMetrics(SAMPLE), {
    ok: true,
    lines_of_code: 10,
    blank_lines: 3,
    comment_lines: 1,
    total_lines: 14,
    function_count: 1,
    class_count: 1,
    import_count: 2,
    docstring_count: 1,
    docstring_coverage: 50,
    avg_function_length: 6,
    avg_complexity: 5,
  });
});

test('a module without symbols has full docstring coverage and zero averages', () => {
  const result = computeMetrics('x = 1\n');
  assert.ok(result.ok);
  assert.equal(result.docstring_coverage, 100);
  assert.equal(result.avg_function_length, 0);
  assert.equal(result.avg_complexity, 0);
});

test('coverage and averages are rounded', () => {
  const src = 'def a():\n    """Doc."""\n\ndef b():\n    pass\n\ndef c():\n    if x:\n        pass\n';
  const result = computeMetrics(src);
  assert.ok(result.ok);
  assert.equal(result.docstring_coverage, 33.3);
  assert.equal(result.avg_function_length, 2.33);
  assert.equal(result.avg_complexity, 1.33);
});

test('computeMetrics reports invalid source', () => {
  const result = computeMetrics('class :\n');
  assert.equal(result.ok, false);
});

test('profileLoops counts loops per function and for the module', () => {
  const profile = profileLoops(parsePython(SAMPLE));
  assert.deepEqual(profile.functions, [{ name: 'walk', line: 9, loops: 3, nested_loops: 3, comprehensions: 1 }]);
  assert.deepEqual(profile.totals, { loops: 3, nested_loops: 3, comprehensions: 1 });
  assert.deepEqual(profile.hotspots, ['3 nested loops detected (quadratic or worse)']);
});

test('loopHotspots flags many loops even without nesting', () => {
  assert.deepEqual(loopHotspots({ loops: 11, nested_loops: 0, comprehensions: 0 }), [
    '11 loops in total, review for optimisation',
  ]);
  assert.deepEqual(loopHotspots({ loops: 10, nested_loops: 0, comprehensions: 2 }), []);
});
