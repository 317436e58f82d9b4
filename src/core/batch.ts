import type { ParseErrorInfo } from './errors';
import type { Logger } from './log';

export interface SourceFile {
  path: string;
  source: string;
}

type Failed = { ok: false; error: ParseErrorInfo };

function isFailure(result: { ok: boolean }): result is Failed {
  return result.ok === false;
}

export type FileOutcome<R> = { path: string } & (R | Failed);

export interface BatchResult<R> {
  files: Array<FileOutcome<R>>;
  analyzed: number;
  skipped: number;
}

/**
 * Run one analysis per file. A file that fails to parse is recorded with its
 * error and the rest of the batch still runs.
 */
export function runBatch<R extends { ok: true }>(
  files: SourceFile[],
  analyze: (source: string) => R | Failed,
  log?: Logger,
): BatchResult<R> {
  const out: Array<FileOutcome<R>> = [];
  let skipped = 0;
  for (const file of files) {
    const result = analyze(file.source);
    if (isFailure(result)) {
      skipped += 1;
      log?.warn('skip_file', { path: file.path, reason: result.error.kind, line: result.error.line, message: result.error.message });
      out.push({ path: file.path, ...result });
      continue;
    }
    out.push({ path: file.path, ...result });
  }
  return { files: out, analyzed: files.length - skipped, skipped };
}
