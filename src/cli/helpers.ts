import path from 'path';
import fs from 'fs-extra';
import { glob } from 'glob';
import type { SourceFile } from '../core/batch';
import {
  createAnalysisConfig,
  findConfigFile,
  loadAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigInput,
} from '../core/config';
import { ConfigError } from '../core/errors';
import { resolveGitRoot } from '../core/git';
import type { CLIError } from './types';
import { error } from './types';

export const PYTHON_IGNORE = [
  '.git/**',
  '**/.git/**',
  '**/__pycache__/**',
  'venv/**',
  '**/venv/**',
  '.venv/**',
  '**/.venv/**',
  '**/site-packages/**',
  'node_modules/**',
  '**/node_modules/**',
];

/**
 * Expand files and directories into Python source paths. Directories are
 * searched recursively, skipping virtualenvs, `.git` and `__pycache__`.
 */
export async function expandPythonPaths(inputs: string[], cwd: string = process.cwd()): Promise<string[]> {
  const out = new Set<string>();
  for (const input of inputs) {
    const abs = path.resolve(cwd, input);
    const stat = await fs.stat(abs);
    if (stat.isDirectory()) {
      const files = await glob('**/*.py', { cwd: abs, nodir: true, ignore: PYTHON_IGNORE });
      for (const f of files) out.add(path.join(abs, f));
    } else {
      out.add(abs);
    }
  }
  return [...out].sort();
}

export async function readSourceFiles(paths: string[], cwd: string = process.cwd()): Promise<SourceFile[]> {
  const files: SourceFile[] = [];
  for (const p of paths) {
    files.push({ path: path.relative(cwd, p) || p, source: await fs.readFile(p, 'utf-8') });
  }
  return files;
}

export async function loadSourceFiles(inputs: string[], cwd: string = process.cwd()): Promise<SourceFile[] | CLIError> {
  try {
    return await readSourceFiles(await expandPythonPaths(inputs, cwd), cwd);
  } catch (e) {
    return error('read_failed', { message: e instanceof Error ? e.message : String(e) });
  }
}

/**
 * Defaults, then the config file (`--config` or `.pydelta.json` at the
 * repository root), then flag overrides.
 */
export async function resolveAnalysisConfig(
  configPath: string | undefined,
  overrides: AnalysisConfigInput = {},
  cwd: string = process.cwd(),
): Promise<AnalysisConfig | CLIError> {
  try {
    const found = await findConfigFile(await resolveGitRoot(cwd), configPath);
    return found ? await loadAnalysisConfig(found, overrides) : createAnalysisConfig(overrides);
  } catch (e) {
    if (e instanceof ConfigError) {
      return error('config_error', { message: e.message, issues: e.issues });
    }
    throw e;
  }
}

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}
