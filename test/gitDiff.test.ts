import test from 'node:test';
import assert from 'node:assert/strict';
import { parseNameStatus } from '../src/core/gitDiff';

test('parseNameStatus reads -z output including renames', () => {
  const raw = 'M\0a.py\0R100\0old.py\0new.py\0D\0gone.py\0A\0b.py\0';
  assert.deepEqual(parseNameStatus(raw), [
    { status: 'A', path: 'b.py' },
    { status: 'D', path: 'gone.py' },
    { status: 'M', path: 'a.py' },
    { status: 'R', oldPath: 'old.py', path: 'new.py' },
  ]);
});

test('parseNameStatus ignores empty output', () => {
  assert.deepEqual(parseNameStatus(''), []);
});
