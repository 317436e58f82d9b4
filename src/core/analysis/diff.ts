import type { ParseErrorInfo } from '../errors';
import { compareComplexity } from './complexity';
import { snapshotOf } from './snapshot';
import type {
  AnnotationChange,
  DecoratorChange,
  DiffResult,
  DocstringChange,
  MethodChange,
  SetChanges,
  StructuralSnapshot,
} from './types';

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  return new Set([...a].filter((x) => !b.has(x)));
}

function intersection(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  return new Set([...a].filter((x) => b.has(x)));
}

function union<K>(a: Iterable<K>, b: Iterable<K>): Set<K> {
  return new Set([...a, ...b]);
}

export function setChanges(oldSet: ReadonlySet<string>, newSet: ReadonlySet<string>): SetChanges {
  return {
    added: difference(newSet, oldSet),
    removed: difference(oldSet, newSet),
    modified: intersection(oldSet, newSet),
  };
}

function methodChanges(oldSnap: StructuralSnapshot, newSnap: StructuralSnapshot): Map<string, MethodChange> {
  const out = new Map<string, MethodChange>();
  const empty = new Set<string>();
  for (const cls of union(oldSnap.classMethods.keys(), newSnap.classMethods.keys())) {
    const before = oldSnap.classMethods.get(cls) ?? empty;
    const after = newSnap.classMethods.get(cls) ?? empty;
    const added = difference(after, before);
    const removed = difference(before, after);
    if (added.size > 0 || removed.size > 0) out.set(cls, { added, removed });
  }
  return out;
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && [...a].every((x) => b.has(x));
}

function decoratorChanges(oldSnap: StructuralSnapshot, newSnap: StructuralSnapshot): Map<string, DecoratorChange> {
  const out = new Map<string, DecoratorChange>();
  for (const name of union(oldSnap.decorators.keys(), newSnap.decorators.keys())) {
    const before = oldSnap.decorators.get(name) ?? null;
    const after = newSnap.decorators.get(name) ?? null;
    const beforeSet = new Set(before ?? []);
    const afterSet = new Set(after ?? []);
    if (sameSet(beforeSet, afterSet)) continue;
    out.set(name, {
      old: before,
      new: after,
      added: difference(afterSet, beforeSet),
      removed: difference(beforeSet, afterSet),
    });
  }
  return out;
}

function docstringChanges(oldSnap: StructuralSnapshot, newSnap: StructuralSnapshot): Map<string, DocstringChange> {
  const out = new Map<string, DocstringChange>();
  for (const name of union(oldSnap.docstrings.keys(), newSnap.docstrings.keys())) {
    const before = oldSnap.docstrings.get(name) ?? null;
    const after = newSnap.docstrings.get(name) ?? null;
    if (before !== after) out.set(name, { old: before, new: after });
  }
  return out;
}

function annotationChanges(oldSnap: StructuralSnapshot, newSnap: StructuralSnapshot): Map<string, AnnotationChange> {
  const out = new Map<string, AnnotationChange>();
  for (const name of union(oldSnap.annotationCoverage.keys(), newSnap.annotationCoverage.keys())) {
    const before = oldSnap.annotationCoverage.get(name) ?? null;
    const after = newSnap.annotationCoverage.get(name) ?? null;
    if (before === after) continue;
    const delta = before !== null && after !== null ? Math.round((after - before) * 10) / 10 : null;
    out.set(name, { old: before, new: after, delta });
  }
  return out;
}

/**
 * Structural diff of two snapshots of the same file.
 *
 * Identity is the bare name: a renamed or moved symbol shows up as one
 * removal plus one addition, and `modified` lists every name present in both
 * versions without checking whether its body changed.
 */
export function diff(oldSnap: StructuralSnapshot, newSnap: StructuralSnapshot): DiffResult {
  const complexityChanges = new Map(
    [...compareComplexity(oldSnap, newSnap)].filter(([, change]) => change.old !== change.new),
  );
  return {
    functions: setChanges(oldSnap.functions, newSnap.functions),
    classes: setChanges(oldSnap.classes, newSnap.classes),
    imports: setChanges(oldSnap.imports, newSnap.imports),
    methodChanges: methodChanges(oldSnap, newSnap),
    decoratorChanges: decoratorChanges(oldSnap, newSnap),
    docstringChanges: docstringChanges(oldSnap, newSnap),
    complexityChanges,
    annotationChanges: annotationChanges(oldSnap, newSnap),
  };
}

export type DiffSide = 'old' | 'new';

export type DiffSourcesResult =
  | { ok: true; diff: DiffResult; old: StructuralSnapshot; new: StructuralSnapshot }
  | { ok: false; error: ParseErrorInfo; side: DiffSide };

export function diffSources(oldSource: string, newSource: string): DiffSourcesResult {
  const before = snapshotOf(oldSource);
  if (!before.ok) return { ok: false, error: before.error.toInfo(), side: 'old' };
  const after = snapshotOf(newSource);
  if (!after.ok) return { ok: false, error: after.error.toInfo(), side: 'new' };
  return { ok: true, diff: diff(before.snapshot, after.snapshot), old: before.snapshot, new: after.snapshot };
}
