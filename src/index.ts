export { parsePython, parseValidPython, assertValidTree, type SyntaxTree, type SyntaxProblem } from './core/parser/python';
export { extract, snapshotOf } from './core/analysis/snapshot';
export { diff, diffSources } from './core/analysis/diff';
export { complexity, complexityLevel, complexityReport, compareComplexity } from './core/analysis/complexity';
export { detectSmells, scanSmells, type SmellScan, type SmellScanResult } from './core/analysis/smells';
export { scanTree, scanSecurity, type SecurityScan, type SecurityScanResult } from './core/analysis/security';
export { computeMetrics, profileLoops, type CodeMetrics, type LoopProfile } from './core/analysis/metrics';
export { summarize, analyzeChanges, analyzeSource } from './core/analysis/report';
export {
  formatSmellReport,
  formatSecurityReport,
  formatChangeReport,
  formatMetrics,
  formatSummary,
} from './core/analysis/format';
export { runQualityGate, formatGateReport, type GateResult, type GateOptions } from './core/gate';
export { runBatch, type SourceFile } from './core/batch';
export {
  createAnalysisConfig,
  loadAnalysisConfig,
  DEFAULT_CONFIG,
  type AnalysisConfig,
  type SmellThresholds,
  type SecurityPatternSet,
} from './core/config';
export { ParseError, ConfigError, type ParseErrorInfo } from './core/errors';
export type * from './core/analysis/types';
