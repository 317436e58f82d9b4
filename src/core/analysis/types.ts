import type { ParseErrorInfo } from '../errors';

export const MODULE_DOCSTRING_KEY = '__module__';

/**
 * Structural facts of one source version. Names are unqualified; a name
 * defined twice keeps the facts of its last definition in source order.
 */
export interface StructuralSnapshot {
  readonly functions: ReadonlySet<string>;
  readonly classes: ReadonlySet<string>;
  readonly classMethods: ReadonlyMap<string, ReadonlySet<string>>;
  readonly imports: ReadonlySet<string>;
  readonly decorators: ReadonlyMap<string, readonly string[]>;
  readonly docstrings: ReadonlyMap<string, string>;
  readonly complexity: ReadonlyMap<string, number>;
  readonly annotationCoverage: ReadonlyMap<string, number>;
}

export interface SetChanges {
  readonly added: ReadonlySet<string>;
  readonly removed: ReadonlySet<string>;
  /**
   * Names present in both versions. This is a name intersection only: a
   * symbol is listed whether or not its body changed.
   */
  readonly modified: ReadonlySet<string>;
}

export interface MethodChange {
  readonly added: ReadonlySet<string>;
  readonly removed: ReadonlySet<string>;
}

export interface DecoratorChange {
  readonly old: readonly string[] | null;
  readonly new: readonly string[] | null;
  readonly added: ReadonlySet<string>;
  readonly removed: ReadonlySet<string>;
}

export interface DocstringChange {
  readonly old: string | null;
  readonly new: string | null;
}

export type ComplexityLevel = 'low' | 'medium' | 'high' | 'critical';
export type ComplexityTrend = 'increased' | 'decreased' | 'unchanged' | 'new_symbol' | 'removed_symbol';

export interface ComplexityChange {
  readonly old: number | null;
  readonly new: number | null;
  readonly delta: number | null;
  readonly trend: ComplexityTrend;
  readonly level: ComplexityLevel;
}

export interface AnnotationChange {
  readonly old: number | null;
  readonly new: number | null;
  readonly delta: number | null;
}

export interface DiffResult {
  readonly functions: SetChanges;
  readonly classes: SetChanges;
  readonly imports: SetChanges;
  readonly methodChanges: ReadonlyMap<string, MethodChange>;
  readonly decoratorChanges: ReadonlyMap<string, DecoratorChange>;
  readonly docstringChanges: ReadonlyMap<string, DocstringChange>;
  readonly complexityChanges: ReadonlyMap<string, ComplexityChange>;
  readonly annotationChanges: ReadonlyMap<string, AnnotationChange>;
}

export type SmellSeverity = 'warning' | 'error';

interface SmellBase {
  name: string;
  line: number;
  value: number;
  threshold: number;
  severity: SmellSeverity;
  message: string;
}

export type SmellFinding =
  | (SmellBase & { kind: 'long_function'; lines: number })
  | (SmellBase & { kind: 'too_many_params'; count: number; params: string[] })
  | (SmellBase & { kind: 'deep_nesting'; depth: number })
  | (SmellBase & { kind: 'god_class'; method_count: number; methods: string[] });

export type SmellKind = SmellFinding['kind'];

export type SecuritySeverity = 'critical' | 'high' | 'medium';

interface SecurityBase {
  subject: string;
  line: number;
  severity: SecuritySeverity;
  message: string;
}

export type SecurityFinding =
  | (SecurityBase & { kind: 'dangerous_function'; function: string })
  | (SecurityBase & { kind: 'risky_import'; module: string; function: string })
  | (SecurityBase & { kind: 'risky_call'; module: string; function: string })
  | (SecurityBase & { kind: 'shell_injection'; function: string })
  | (SecurityBase & { kind: 'hardcoded_secret'; variable: string });

export type SecurityKind = SecurityFinding['kind'];

export interface Failure {
  ok: false;
  error: ParseErrorInfo;
}
