import test from 'node:test';
import assert from 'node:assert/strict';
import { extract, snapshotOf } from '../src/core/analysis/snapshot';
import { ParseError } from '../src/core/errors';
import { parsePython } from '../src/core/parser/python';

const SOURCE = `"""Module doc."""
import os
import os.path as osp
from typing import List, Optional
from . import sibling
from .pkg import thing
from json import *


@dataclass
class Point:
    """A point.

    Immutable.
    """
    x: int = 0

    def norm(self) -> float:
        return 0.0

    @staticmethod
    def origin(a: int, b):
        def helper():
            pass
        return None


async def fetch(url: str, *, timeout: int = 5) -> bytes:
    return b""


@app.route('/x', methods=['GET'])
@app.route('/x', methods=['GET'])
def handler(request):
    ""


@(lambda f: f)
def odd():
    pass
`;

test('extract records functions at any depth and direct methods only', () => {
  const snap = extract(parsePython(SOURCE));
  assert.deepEqual([...snap.functions].sort(), ['fetch', 'handler', 'helper', 'norm', 'odd', 'origin']);
  assert.deepEqual([...snap.classes], ['Point']);
  assert.deepEqual([...(snap.classMethods.get('Point') ?? [])].sort(), ['norm', 'origin']);
});

test('extract normalizes imports', () => {
  const snap = extract(parsePython(SOURCE));
  assert.deepEqual([...snap.imports].sort(), [
    'json.*',
    'os',
    'os.path',
    'pkg.thing',
    'sibling',
    'typing.List',
    'typing.Optional',
  ]);
});

test('extract renders decorators and drops duplicates', () => {
  const snap = extract(parsePython(SOURCE));
  assert.deepEqual(snap.decorators.get('Point'), ['@dataclass']);
  assert.deepEqual(snap.decorators.get('origin'), ['@staticmethod']);
  assert.deepEqual(snap.decorators.get('handler'), ["@app.route('/x', methods=['GET'])"]);
  assert.deepEqual(snap.decorators.get('odd'), ['@<unknown>']);
  assert.equal(snap.decorators.has('norm'), false);
});

test('extract records cleaned docstrings and skips empty ones', () => {
  const snap = extract(parsePython(SOURCE));
  assert.equal(snap.docstrings.get('__module__'), 'Module doc.');
  assert.equal(snap.docstrings.get('Point'), 'A point.\n\nImmutable.');
  assert.equal(snap.docstrings.has('handler'), false);
  assert.equal(snap.docstrings.has('fetch'), false);
});

test('annotation coverage excludes the receiver and counts the return slot', () => {
  const snap = extract(parsePython(SOURCE));
  assert.equal(snap.annotationCoverage.get('norm'), 100);
  assert.equal(snap.annotationCoverage.get('origin'), 33.3);
  assert.equal(snap.annotationCoverage.get('helper'), 0);
  assert.equal(snap.annotationCoverage.get('fetch'), 100);
  assert.equal(snap.annotationCoverage.get('handler'), 0);
});

test('the cls parameter of a class method is a coverage slot', () => {
  const snap = extract(parsePython('class C:\n    @classmethod\n    def make(cls, n: int):\n        pass\n'));
  assert.equal(snap.annotationCoverage.get('make'), 33.3);
});

test('duplicate names keep the last definition', () => {
  const snap = extract(parsePython('def f():\n    pass\n\n\ndef f(x):\n    if x:\n        pass\n'));
  assert.equal(snap.complexity.get('f'), 2);
});

test('extraction is deterministic', () => {
  const tree = parsePython(SOURCE);
  const a = extract(tree);
  const b = extract(tree);
  assert.deepEqual(a, b);
  assert.ok(Object.isFrozen(a));
});

test('extract rejects invalid source and snapshotOf returns it as a value', () => {
  assert.throws(() => extract(parsePython('def f(:\n')), ParseError);
  const result = snapshotOf('def f(:\n');
  assert.equal(result.ok, false);
});
