import simpleGit from 'simple-git';

export type GitNameStatus = 'A' | 'M' | 'D' | 'R';

export interface GitDiffPathChange {
  status: GitNameStatus;
  path: string;
  oldPath?: string;
}

/**
 * Parse `git diff --name-status -z` output: a status field followed by one
 * path, or by two paths for a rename.
 */
export function parseNameStatus(raw: string): GitDiffPathChange[] {
  const parts = raw.split('\0').filter(Boolean);
  const out: GitDiffPathChange[] = [];

  for (let i = 0; i < parts.length; i++) {
    const statusLetter = (parts[i] ?? '').trim()[0] ?? '';

    if (statusLetter === 'R') {
      const oldPath = parts[i + 1] ?? '';
      const newPath = parts[i + 2] ?? '';
      i += 2;
      if (oldPath && newPath) out.push({ status: 'R', oldPath, path: newPath });
      continue;
    }

    const p = parts[i + 1] ?? '';
    i += 1;
    if ((statusLetter === 'A' || statusLetter === 'M' || statusLetter === 'D') && p) {
      out.push({ status: statusLetter, path: p });
    }
  }

  out.sort((a, b) => `${a.status}\t${a.oldPath ?? ''}\t${a.path}`.localeCompare(`${b.status}\t${b.oldPath ?? ''}\t${b.path}`));
  return out;
}

export async function getStagedNameStatus(repoRoot: string): Promise<GitDiffPathChange[]> {
  const git = simpleGit(repoRoot);
  const raw = await git.raw(['diff', '--cached', '--name-status', '-z', '--find-renames']);
  return parseNameStatus(raw);
}

/** Staged Python files that still exist in the index (deletions are skipped). */
export async function getStagedPythonFiles(repoRoot: string): Promise<string[]> {
  const changes = await getStagedNameStatus(repoRoot);
  return changes.filter((c) => c.status !== 'D' && c.path.endsWith('.py')).map((c) => c.path);
}
