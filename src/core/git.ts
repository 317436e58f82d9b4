import simpleGit from 'simple-git';
import path from 'path';

export async function resolveGitRoot(startDir: string): Promise<string> {
  const resolved = path.resolve(startDir);
  try {
    const git = simpleGit(resolved);
    const root = await git.raw(['rev-parse', '--show-toplevel']);
    return root.trim();
  } catch {
    return resolved;
  }
}

/** Repository-relative path with forward slashes, as git expects in `<rev>:<path>`. */
export function toRepoPath(repoRoot: string, filePath: string): string {
  return path.relative(repoRoot, path.resolve(filePath)).split(path.sep).join('/');
}

/**
 * Content of `filePath` at `rev`. An empty `rev` reads the staged copy from
 * the index.
 */
export async function readFileAtRevision(repoRoot: string, rev: string, filePath: string): Promise<string> {
  const git = simpleGit(repoRoot);
  return git.show([`${rev}:${toRepoPath(repoRoot, filePath)}`]);
}
