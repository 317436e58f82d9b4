import { runBatch, type FileOutcome } from '../../core/batch';
import { formatMetrics, formatSecurityReport, formatSmellReport } from '../../core/analysis/format';
import { computeMetrics, type CodeMetrics } from '../../core/analysis/metrics';
import { scanSecurity, type SecurityScan } from '../../core/analysis/security';
import { scanSmells, type SmellScan } from '../../core/analysis/smells';
import { createLogger } from '../../core/log';
import { isCLIError, loadSourceFiles, resolveAnalysisConfig } from '../helpers';
import type { MetricsInput, SecurityInput, SmellsInput } from '../schemas/scanSchemas';
import type { CLIResult, CLIError } from '../types';
import { success } from '../types';

function renderFiles<R extends { ok: true }>(
  outcomes: Array<FileOutcome<R>>,
  render: (outcome: FileOutcome<R>) => string,
): string {
  return outcomes.map((o) => `== ${o.path} ==\n${render(o)}`).join('\n\n');
}

export async function handleSmells(input: SmellsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'smells' });
  const config = await resolveAnalysisConfig(input.config, {
    smells: {
      long_function_lines: input.longFunctionLines,
      too_many_params: input.maxParams,
      deep_nesting_level: input.maxNesting,
      god_class_methods: input.maxMethods,
    },
  });
  if (isCLIError(config)) return config;
  const files = await loadSourceFiles(input.paths);
  if (isCLIError(files)) return files;

  const batch = runBatch<SmellScan>(files, (source) => scanSmells(source, config.smells), log);
  const total_smells = batch.files.reduce((n, f) => n + (f.ok ? f.total_smells : 0), 0);
  return success({
    ...batch,
    total_smells,
    thresholds: config.smells,
    textOutput: input.text
      ? renderFiles(batch.files, (o) => (o.ok ? formatSmellReport(o) : formatSmellReport({ ...o, total_smells: 0 })))
      : undefined,
  });
}

export async function handleSecurity(input: SecurityInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'security' });
  const config = await resolveAnalysisConfig(input.config);
  if (isCLIError(config)) return config;
  const files = await loadSourceFiles(input.paths);
  if (isCLIError(files)) return files;

  const batch = runBatch<SecurityScan>(files, (source) => scanSecurity(source, config.security), log);
  const total_issues = batch.files.reduce((n, f) => n + (f.ok ? f.total_issues : 0), 0);
  return success({
    ...batch,
    total_issues,
    textOutput: input.text
      ? renderFiles(batch.files, (o) => (o.ok ? formatSecurityReport(o) : formatSecurityReport({ ...o, total_issues: 0 })))
      : undefined,
  });
}

export async function handleMetrics(input: MetricsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'metrics' });
  const files = await loadSourceFiles(input.paths);
  if (isCLIError(files)) return files;

  const batch = runBatch<CodeMetrics>(files, computeMetrics, log);
  return success({
    ...batch,
    textOutput: input.text ? renderFiles(batch.files, formatMetrics) : undefined,
  });
}
