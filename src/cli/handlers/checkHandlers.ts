import path from 'path';
import type { SourceFile } from '../../core/batch';
import { formatGateReport, runQualityGate } from '../../core/gate';
import { readFileAtRevision, resolveGitRoot } from '../../core/git';
import { getStagedPythonFiles } from '../../core/gitDiff';
import { createLogger } from '../../core/log';
import { isCLIError, loadSourceFiles, resolveAnalysisConfig } from '../helpers';
import type { CheckInput } from '../schemas/checkSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorReasons } from '../types';

/** Staged Python files, read from the index rather than the working tree. */
async function loadStagedFiles(cwd: string): Promise<SourceFile[] | CLIError> {
  try {
    const repoRoot = await resolveGitRoot(cwd);
    const staged = await getStagedPythonFiles(repoRoot);
    const files: SourceFile[] = [];
    for (const rel of staged) {
      files.push({ path: rel, source: await readFileAtRevision(repoRoot, '', path.join(repoRoot, rel)) });
    }
    return files;
  } catch (e) {
    return error(ErrorReasons.GIT_FAILED, { message: e instanceof Error ? e.message : String(e) });
  }
}

export async function handleCheck(input: CheckInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'check' });
  const config = await resolveAnalysisConfig(input.config);
  if (isCLIError(config)) return config;

  const files = input.staged
    ? await loadStagedFiles(process.cwd())
    : await loadSourceFiles(input.paths.length > 0 ? input.paths : ['.']);
  if (isCLIError(files)) return files;

  const result = runQualityGate(files, config, { failOnWarning: input.failOnWarning }, log);
  const textOutput = input.text ? formatGateReport(result) : undefined;
  if (!result.passed) {
    return error(ErrorReasons.QUALITY_GATE_FAILED, { message: 'Quality gate failed', ...result, textOutput });
  }
  return success({ ...result, textOutput });
}
