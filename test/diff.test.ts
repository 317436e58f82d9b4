import test from 'node:test';
import assert from 'node:assert/strict';
import { diff, diffSources } from '../src/core/analysis/diff';
import { extract } from '../src/core/analysis/snapshot';
import { parsePython } from '../src/core/parser/python';

const snap = (source: string) => extract(parsePython(source));

const A = `import os
from typing import List


class Store:
    def get(self):
        pass

    def put(self, value):
        pass


@property
def size():
    """Size."""
    return 1
`;

const B = `import os
import json


class Store:
    def get(self):
        pass

    def delete(self, key):
        pass


class Cache:
    pass


@cached
def size(x: int) -> int:
    """Number of items."""
    if x:
        return x
    return 0
`;

test('an added function appears only in added', () => {
  const d = diff(snap('def hello(): pass\n'), snap('def hello(): pass\ndef world(): pass\n'));
  assert.deepEqual([...d.functions.added], ['world']);
  assert.deepEqual([...d.functions.removed], []);
  assert.deepEqual([...d.functions.modified], ['hello']);
});

test('diff of a snapshot with itself is empty apart from the name intersection', () => {
  const a = snap(A);
  const d = diff(a, a);
  for (const category of [d.functions, d.classes, d.imports]) {
    assert.equal(category.added.size, 0);
    assert.equal(category.removed.size, 0);
  }
  assert.deepEqual([...d.functions.modified].sort(), ['get', 'put', 'size']);
  assert.equal(d.methodChanges.size, 0);
  assert.equal(d.decoratorChanges.size, 0);
  assert.equal(d.docstringChanges.size, 0);
  assert.equal(d.complexityChanges.size, 0);
  assert.equal(d.annotationChanges.size, 0);
});

test('added and removed are symmetric', () => {
  const a = snap(A);
  const b = snap(B);
  const forward = diff(a, b);
  const backward = diff(b, a);
  assert.deepEqual(forward.functions.added, backward.functions.removed);
  assert.deepEqual(forward.functions.removed, backward.functions.added);
  assert.deepEqual(forward.classes.added, backward.classes.removed);
  assert.deepEqual(forward.imports.added, backward.imports.removed);
});

test('set categories across versions', () => {
  const d = diff(snap(A), snap(B));
  assert.deepEqual([...d.functions.added].sort(), ['delete']);
  assert.deepEqual([...d.functions.removed].sort(), ['put']);
  assert.deepEqual([...d.classes.added], ['Cache']);
  assert.deepEqual([...d.imports.added], ['json']);
  assert.deepEqual([...d.imports.removed], ['typing.List']);
  assert.deepEqual([...d.imports.modified], ['os']);
});

test('method changes are keyed by class and only emitted when non-empty', () => {
  const d = diff(snap(A), snap(B));
  const store = d.methodChanges.get('Store');
  assert.ok(store);
  assert.deepEqual([...store.added], ['delete']);
  assert.deepEqual([...store.removed], ['put']);
  assert.equal(d.methodChanges.has('Cache'), false);
});

test('decorator, docstring, complexity and annotation changes', () => {
  const d = diff(snap(A), snap(B));
  const deco = d.decoratorChanges.get('size');
  assert.ok(deco);
  assert.deepEqual(deco.old, ['@property']);
  assert.deepEqual(deco.new, ['@cached']);
  assert.deepEqual([...deco.added], ['@cached']);
  assert.deepEqual([...deco.removed], ['@property']);

  assert.deepEqual(d.docstringChanges.get('size'), { old: 'Size.', new: 'Number of items.' });
  assert.deepEqual(d.complexityChanges.get('size'), { old: 1, new: 2, delta: 1, trend: 'increased', level: 'low' });
  assert.deepEqual(d.complexityChanges.get('put'), { old: 1, new: null, delta: null, trend: 'removed_symbol', level: 'low' });
  assert.equal(d.complexityChanges.has('get'), false);
  assert.deepEqual(d.annotationChanges.get('size'), { old: 0, new: 100, delta: 100 });
});

test('a symbol present on one side only reports null for the other', () => {
  const d = diff(snap('def f():\n    pass\n'), snap('@staticmethod\ndef f():\n    """Doc."""\n'));
  const deco = d.decoratorChanges.get('f');
  assert.ok(deco);
  assert.equal(deco.old, null);
  assert.deepEqual(deco.new, ['@staticmethod']);
  assert.deepEqual(d.docstringChanges.get('f'), { old: null, new: 'Doc.' });
});

test('diffSources reports which side failed to parse', () => {
  const bad = diffSources('def f():\n    pass\n', 'def f(:\n');
  assert.equal(bad.ok, false);
  if (!bad.ok) assert.equal(bad.side, 'new');
  const good = diffSources('x = 1\n', 'def g():\n    pass\n');
  assert.equal(good.ok, true);
  if (good.ok) assert.deepEqual([...good.diff.functions.added], ['g']);
});
