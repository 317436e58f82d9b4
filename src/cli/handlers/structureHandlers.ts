import path from 'path';
import fs from 'fs-extra';
import { formatChangeReport, formatSummary } from '../../core/analysis/format';
import { analyzeChanges, summarize } from '../../core/analysis/report';
import { readFileAtRevision, resolveGitRoot } from '../../core/git';
import { createLogger } from '../../core/log';
import type { DiffInput, SummaryInput } from '../schemas/structureSchemas';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorReasons } from '../types';

async function readText(file: string): Promise<string | CLIError> {
  try {
    return await fs.readFile(path.resolve(file), 'utf-8');
  } catch (e) {
    return error(ErrorReasons.READ_FAILED, { file, message: e instanceof Error ? e.message : String(e) });
  }
}

export async function handleSummary(input: SummaryInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'summary' });
  const source = await readText(input.file);
  if (typeof source !== 'string') return source;

  const result = summarize(source);
  const textOutput = input.text ? formatSummary(result) : undefined;
  if (!result.ok) {
    log.warn('parse_error', { file: input.file, line: result.error.line });
    return error(ErrorReasons.PARSE_ERROR, { file: input.file, error: result.error, textOutput });
  }
  const { ok: _ok, ...summary } = result;
  return success({ file: input.file, ...summary, textOutput });
}

async function readOldVersion(input: DiffInput): Promise<string | CLIError> {
  if (input.rev === undefined) return readText(input.old);
  try {
    const repoRoot = await resolveGitRoot(path.dirname(path.resolve(input.old)));
    return await readFileAtRevision(repoRoot, input.rev, input.old);
  } catch (e) {
    return error(ErrorReasons.GIT_FAILED, {
      file: input.old,
      rev: input.rev,
      message: e instanceof Error ? e.message : String(e),
    });
  }
}

export async function handleDiff(input: DiffInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'diff' });
  const oldSource = await readOldVersion(input);
  if (typeof oldSource !== 'string') return oldSource;
  // with --rev and no <new>, the working tree copy of <old> is the new side
  const newFile = input.new ?? input.old;
  const newSource = await readText(newFile);
  if (typeof newSource !== 'string') return newSource;

  const result = analyzeChanges(oldSource, newSource);
  const textOutput = input.text ? formatChangeReport(result) : undefined;
  const files = { old: input.rev ? `${input.rev}:${input.old}` : input.old, new: newFile };
  if (!result.ok) {
    log.warn('parse_error', { side: result.side, line: result.error.line });
    return error(ErrorReasons.PARSE_ERROR, { files, side: result.side, error: result.error, textOutput });
  }
  const { ok: _ok, ...changes } = result;
  return success({ files, ...changes, textOutput });
}
