import { GitOperations, detectGitInfo } from '../../utils/git';
import { simpleGit } from 'simple-git';
import * as os from 'os';

// Mock simple-git
jest.mock('simple-git', () => ({
  simpleGit: jest.fn(),
}));

describe('GitOperations', () => {
  let gitOps: GitOperations;
  let mockGit: {
    checkIsRepo: jest.Mock;
    revparse: jest.Mock;
    branch: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockGit = {
      checkIsRepo: jest.fn(),
      revparse: jest.fn(),
      branch: jest.fn(),
    };
    (simpleGit as jest.Mock).mockReturnValue(mockGit);
    gitOps = new GitOperations('/test/repo/packages/api');
  });

  describe('getRepoInfo', () => {
    it('should return root, branch and commit inside a repository', async () => {
      mockGit.checkIsRepo.mockResolvedValue(true);
      mockGit.revparse.mockImplementation(async (args: string[]) =>
        args[0] === '--show-toplevel' ? '/test/repo\n' : 'abc123\n'
      );
      mockGit.branch.mockResolvedValue({ current: 'feature/login' });

      const info = await gitOps.getRepoInfo();

      expect(info).toEqual({ repo: '/test/repo', branch: 'feature/login', commit: 'abc123' });
      expect(mockGit.revparse).toHaveBeenCalledWith(['--show-toplevel']);
      expect(mockGit.revparse).toHaveBeenCalledWith(['HEAD']);
    });

    it('should return nulls outside a repository', async () => {
      mockGit.checkIsRepo.mockResolvedValue(false);

      const info = await gitOps.getRepoInfo();

      expect(info).toEqual({ repo: null, branch: null, commit: null });
      expect(mockGit.revparse).not.toHaveBeenCalled();
    });

    it('should treat a failing repository check as no repository', async () => {
      mockGit.checkIsRepo.mockRejectedValue(new Error('git not installed'));

      const info = await gitOps.getRepoInfo();

      expect(info).toEqual({ repo: null, branch: null, commit: null });
    });

    it('should leave the commit empty in a repository without commits', async () => {
      mockGit.checkIsRepo.mockResolvedValue(true);
      mockGit.revparse.mockImplementation(async (args: string[]) => {
        if (args[0] === '--show-toplevel') return '/test/repo';
        throw new Error("ambiguous argument 'HEAD'");
      });
      mockGit.branch.mockResolvedValue({ current: 'main' });

      const info = await gitOps.getRepoInfo();

      expect(info).toEqual({ repo: '/test/repo', branch: 'main', commit: null });
    });
  });

  describe('getCurrentBranch', () => {
    it('should return the current branch', async () => {
      mockGit.branch.mockResolvedValue({ current: 'develop' });
      expect(await gitOps.getCurrentBranch()).toBe('develop');
    });

    it('should return null when git fails', async () => {
      mockGit.branch.mockRejectedValue(new Error('fatal'));
      expect(await gitOps.getCurrentBranch()).toBeNull();
    });
  });

  describe('detectGitInfo', () => {
    it('should not touch git for a missing directory', async () => {
      (simpleGit as jest.Mock).mockClear();
      const info = await detectGitInfo('/definitely/not/here/for-tests');

      expect(info).toEqual({ repo: null, branch: null, commit: null });
      expect(simpleGit).not.toHaveBeenCalled();
    });

    it('should use git for an existing directory', async () => {
      mockGit.checkIsRepo.mockResolvedValue(false);

      await detectGitInfo(os.tmpdir());

      expect(simpleGit).toHaveBeenCalledWith(os.tmpdir());
    });
  });
});
