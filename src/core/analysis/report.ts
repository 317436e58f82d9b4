import type { AnalysisConfig } from '../config';
import { ParseError, type ParseErrorInfo } from '../errors';
import { parsePython } from '../parser/python';
import { complexityLevel } from './complexity';
import { diffSources, type DiffSide } from './diff';
import { metricsOf, profileLoops, type CodeMetrics, type LoopProfile } from './metrics';
import { groupSecurityFindings, scanTree, type SecurityScan } from './security';
import { detectSmells, groupSmells, type SmellScan } from './smells';
import { extract, snapshotOf } from './snapshot';
import type { ComplexityChange, ComplexityLevel, DiffResult, StructuralSnapshot } from './types';

const sorted = (values: Iterable<string>): string[] => [...values].sort();

function sortedRecord<V, R>(map: ReadonlyMap<string, V>, fn: (value: V) => R): Record<string, R> {
  const out: Record<string, R> = {};
  for (const key of sorted(map.keys())) {
    const value = map.get(key);
    if (value !== undefined) out[key] = fn(value);
  }
  return out;
}

export interface Summary {
  ok: true;
  functions: string[];
  classes: string[];
  class_methods: Record<string, string[]>;
  imports: string[];
  decorators: Record<string, string[]>;
  docstrings: Record<string, string>;
  complexity: Record<string, number>;
  annotation_coverage: Record<string, number>;
}

export type SummaryResult = Summary | { ok: false; error: ParseErrorInfo };

export function summaryOf(snapshot: StructuralSnapshot): Summary {
  return {
    ok: true,
    functions: sorted(snapshot.functions),
    classes: sorted(snapshot.classes),
    class_methods: sortedRecord(snapshot.classMethods, sorted),
    imports: sorted(snapshot.imports),
    decorators: sortedRecord(snapshot.decorators, (d) => [...d]),
    docstrings: sortedRecord(snapshot.docstrings, (d) => d),
    complexity: sortedRecord(snapshot.complexity, (c) => c),
    annotation_coverage: sortedRecord(snapshot.annotationCoverage, (c) => c),
  };
}

/** Structural facts of one source version with stable ordering. */
export function summarize(source: string): SummaryResult {
  const result = snapshotOf(source);
  if (!result.ok) return { ok: false, error: result.error.toInfo() };
  return summaryOf(result.snapshot);
}

export interface ChangeReport {
  ok: true;
  added_functions: string[];
  removed_functions: string[];
  modified_functions: string[];
  added_classes: string[];
  removed_classes: string[];
  modified_classes: string[];
  added_imports: string[];
  removed_imports: string[];
  modified_imports: string[];
  method_changes: Record<string, { added: string[]; removed: string[] }>;
  decorator_changes: Record<string, { old: string[] | null; new: string[] | null; added: string[]; removed: string[] }>;
  docstring_changes: Record<string, { old: string | null; new: string | null }>;
  complexity_changes: Record<string, ComplexityChange>;
  annotation_changes: Record<string, { old: number | null; new: number | null; delta: number | null }>;
}

export type ChangeReportResult = ChangeReport | { ok: false; error: ParseErrorInfo; side: DiffSide };

export function changeReportOf(d: DiffResult): ChangeReport {
  return {
    ok: true,
    added_functions: sorted(d.functions.added),
    removed_functions: sorted(d.functions.removed),
    modified_functions: sorted(d.functions.modified),
    added_classes: sorted(d.classes.added),
    removed_classes: sorted(d.classes.removed),
    modified_classes: sorted(d.classes.modified),
    added_imports: sorted(d.imports.added),
    removed_imports: sorted(d.imports.removed),
    modified_imports: sorted(d.imports.modified),
    method_changes: sortedRecord(d.methodChanges, (c) => ({ added: sorted(c.added), removed: sorted(c.removed) })),
    decorator_changes: sortedRecord(d.decoratorChanges, (c) => ({
      old: c.old ? [...c.old] : null,
      new: c.new ? [...c.new] : null,
      added: sorted(c.added),
      removed: sorted(c.removed),
    })),
    docstring_changes: sortedRecord(d.docstringChanges, (c) => ({ old: c.old, new: c.new })),
    complexity_changes: sortedRecord(d.complexityChanges, (c) => ({ ...c })),
    annotation_changes: sortedRecord(d.annotationChanges, (c) => ({ old: c.old, new: c.new, delta: c.delta })),
  };
}

/** Structural changes between two versions of one file. */
export function analyzeChanges(oldSource: string, newSource: string): ChangeReportResult {
  const result = diffSources(oldSource, newSource);
  if (!result.ok) return result;
  return changeReportOf(result.diff);
}

export interface SourceAnalysis {
  ok: true;
  summary: Summary;
  complexity_levels: Record<string, ComplexityLevel>;
  smells: SmellScan;
  security: SecurityScan;
  metrics: CodeMetrics;
  loops: LoopProfile;
}

export type SourceAnalysisResult = SourceAnalysis | { ok: false; error: ParseErrorInfo };

/** Every single-version analysis over one parse of `source`. */
export function analyzeSource(source: string, config: AnalysisConfig): SourceAnalysisResult {
  const tree = parsePython(source);
  try {
    const snapshot = extract(tree);
    return {
      ok: true,
      summary: summaryOf(snapshot),
      complexity_levels: sortedRecord(snapshot.complexity, complexityLevel),
      smells: groupSmells(detectSmells(tree, config.smells)),
      security: groupSecurityFindings(scanTree(tree, config.security)),
      metrics: metricsOf(tree),
      loops: profileLoops(tree),
    };
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, error: e.toInfo() };
    throw e;
  }
}
