import { simpleGit, SimpleGit } from 'simple-git';
import * as fs from 'fs';
import * as path from 'path';

export interface GitRepoInfo {
  repo: string | null;
  branch: string | null;
  commit: string | null;
}

export class GitOperations {
  private git: SimpleGit;
  private workingDirectory: string;

  constructor(workingDirectory: string = process.cwd()) {
    this.workingDirectory = workingDirectory;
    this.git = simpleGit(workingDirectory);
  }

  /**
   * Repository root, current branch and HEAD commit. Outside a repository,
   * or when git fails, every field is null.
   */
  async getRepoInfo(): Promise<GitRepoInfo> {
    const empty: GitRepoInfo = { repo: null, branch: null, commit: null };

    try {
      const isRepo = await this.isGitRepository();
      if (!isRepo) {
        return empty;
      }

      const [root, branch, commit] = await Promise.all([
        this.git.revparse(['--show-toplevel']),
        this.getCurrentBranch(),
        this.git.revparse(['HEAD']).catch(() => ''),
      ]);

      return {
        repo: root.trim() || null,
        branch,
        commit: commit.trim() || null,
      };
    } catch (_error) {
      console.warn(
        `Git lookup failed in ${this.workingDirectory}: ${_error instanceof Error ? _error.message : String(_error)}`
      );
      return empty;
    }
  }

  async getCurrentBranch(): Promise<string | null> {
    try {
      // First try using git command
      const branch = await this.git.branch();
      if (branch.current && branch.current.trim() !== '') {
        return branch.current;
      }

      // Fallback to reading .git/HEAD
      const gitHeadPath = path.join(this.workingDirectory, '.git', 'HEAD');
      if (fs.existsSync(gitHeadPath)) {
        const headContent = fs.readFileSync(gitHeadPath, 'utf8').trim();
        if (headContent.startsWith('ref: refs/heads/')) {
          return headContent.replace('ref: refs/heads/', '');
        }
      }

      return null;
    } catch (_error) {
      return null;
    }
  }

  private async isGitRepository(): Promise<boolean> {
    try {
      return await this.git.checkIsRepo();
    } catch {
      return false;
    }
  }
}

/**
 * Git details for a directory; all nulls when it does not exist or is not
 * inside a repository.
 */
export async function detectGitInfo(directory: string): Promise<GitRepoInfo> {
  if (!fs.existsSync(directory)) {
    return { repo: null, branch: null, commit: null };
  }
  return new GitOperations(directory).getRepoInfo();
}
