import test from 'node:test';
import assert from 'node:assert/strict';
import { runBatch, type SourceFile } from '../src/core/batch';
import { computeMetrics, type CodeMetrics } from '../src/core/analysis/metrics';
import { DEFAULT_CONFIG } from '../src/core/config';
import { formatGateReport, runQualityGate } from '../src/core/gate';
import { createLogger } from '../src/core/log';

const good: SourceFile = { path: 'good.py', source: 'def ok():\n    return 1\n' };
const bad: SourceFile = { path: 'bad.py', source: 'def broken(:\n' };
const danger: SourceFile = { path: 'danger.py', source: 'eval(data)\n' };
const wide: SourceFile = { path: 'wide.py', source: 'def wide(a, b, c, d, e, f):\n    pass\n' };

test('each gate check fails on its own files only', () => {
  const result = runQualityGate([good, bad, danger], DEFAULT_CONFIG);
  assert.equal(result.passed, false);
  assert.equal(result.files, 3);
  const [syntax, smells, security] = result.checks;
  assert.ok(syntax && smells && security);

  assert.equal(syntax.passed, false);
  assert.equal(syntax.message, '1 syntax error(s)');
  assert.equal(syntax.details.length, 1);
  assert.match(syntax.details[0] ?? '', /^bad\.py:\d+: /);

  assert.equal(smells.passed, true);
  assert.equal(smells.message, 'No blocking code smells');

  assert.equal(security.passed, false);
  assert.deepEqual(security.details, ['danger.py:1: [critical] Call to eval() allows arbitrary code execution']);
});

test('warnings block the gate only with failOnWarning', () => {
  assert.equal(runQualityGate([wide], DEFAULT_CONFIG).passed, true);
  const strict = runQualityGate([wide], DEFAULT_CONFIG, { failOnWarning: true });
  assert.equal(strict.passed, false);
  assert.deepEqual(strict.checks[1]?.details, [
    "wide.py:1: [warning] Function 'wide' takes 6 parameters (threshold 5)",
  ]);
});

test('formatGateReport lists each check and a closing verdict', () => {
  assert.equal(
    formatGateReport(runQualityGate([good], DEFAULT_CONFIG)),
    [
      'PASS syntax: All files have valid syntax',
      'PASS smells: No blocking code smells',
      'PASS security: No critical or high security issues',
      'Quality gate passed: 3/3 checks passed over 1 file(s)',
    ].join('\n'),
  );
});

test('runBatch records parse failures and keeps going', () => {
  process.env.PYDELTA_LOG_LEVEL = 'warn';
  const lines: string[] = [];
  const log = createLogger({ component: 'test' }, (line) => lines.push(line));

  const batch = runBatch<CodeMetrics>([bad, good], computeMetrics, log);
  assert.equal(batch.analyzed, 1);
  assert.equal(batch.skipped, 1);
  assert.deepEqual(batch.files.map((f) => [f.path, f.ok]), [
    ['bad.py', false],
    ['good.py', true],
  ]);

  assert.equal(lines.length, 1);
  const record: unknown = JSON.parse(lines[0] ?? '');
  assert.ok(typeof record === 'object' && record !== null);
  assert.equal(Reflect.get(record, 'msg'), 'skip_file');
  assert.equal(Reflect.get(record, 'path'), 'bad.py');
  assert.equal(Reflect.get(record, 'reason'), 'parse_error');
});
