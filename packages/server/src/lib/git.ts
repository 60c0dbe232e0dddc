/**
 * Git utilities using child_process.execFile for async, shell-free execution.
 *
 * Arguments are passed as an array and never through a shell, so
 * user-supplied values (branch names) cannot inject commands.
 */
import { execFile } from 'child_process';

export class GitError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(message);
    this.name = 'GitError';
  }
}

/**
 * Execute a git command asynchronously.
 *
 * @param args - Git command arguments (without 'git' prefix)
 * @param cwd - Working directory for the command (defaults to the process cwd)
 * @returns The stdout output trimmed
 * @throws GitError if git ran and exited non-zero
 *
 * @example
 * await git(['check-ref-format', '--branch', 'topic/foo']);
 */
export function git(args: string[], cwd?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile('git', args, { cwd, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (!error) {
        resolve(stdout.trim());
        return;
      }
      // A numeric code is git's exit status; anything else (ENOENT, EACCES)
      // means git could not be started at all.
      if (typeof error.code === 'number') {
        reject(
          new GitError(
            `git ${args[0]} failed: ${stderr.trim() || `exit code ${error.code}`}`,
            error.code,
            stderr
          )
        );
        return;
      }
      reject(error);
    });
  });
}

/**
 * Check a branch name with `git check-ref-format --branch`.
 * Resolves to false when git rejects the name.
 */
export async function isValidBranchName(branch: string): Promise<boolean> {
  try {
    await git(['check-ref-format', '--branch', branch]);
    return true;
  } catch (error) {
    if (error instanceof GitError) {
      return false;
    }
    throw error;
  }
}
