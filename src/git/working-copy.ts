import { CommandFailedError } from '../errors';
import { create } from '../logger';
import { exec, type CommandRunner } from '../utils/exec';

const logger = create({ name: 'git' });

export type GitAuthor = {
  name: string;
  email: string;
};

export type CloneOptions = {
  /** HTTPS clone URL of the repository. */
  url: string;
  /** Branch to clone. */
  branch: string;
  /** Directory to clone into; must be empty or missing. */
  directory: string;
  /** Token sent as basic credentials for every request to the host. */
  token: string;
  runner?: CommandRunner;
};

/** The subset of a git working copy the update client drives. */
export interface WorkingCopy {
  readonly directory: string;
  remoteBranchExists(branch: string): Promise<boolean>;
  checkoutBranch(branch: string, existsRemotely: boolean): Promise<void>;
  hasChanges(): Promise<boolean>;
  commitAll(message: string, author: GitAuthor): Promise<void>;
  push(branch: string): Promise<void>;
}

export type WorkingCopyFactory = (options: CloneOptions) => Promise<WorkingCopy>;

/**
 * Build the environment that passes credentials to git without putting them
 * in the command line or in the remote URL stored in `.git/config`.
 */
export function gitCredentialsEnvironment(url: string, token: string): Record<string, string> {
  const origin = new URL(url).origin;
  const basic = Buffer.from(`x-access-token:${token}`).toString('base64');
  return {
    GIT_TERMINAL_PROMPT: '0',
    GIT_CONFIG_COUNT: '1',
    GIT_CONFIG_KEY_0: `http.${origin}/.extraheader`,
    GIT_CONFIG_VALUE_0: `AUTHORIZATION: basic ${basic}`,
  };
}

/**
 * A clone of a repository driven through the git command line.
 */
export class GitWorkingCopy implements WorkingCopy {
  private constructor(
    public readonly directory: string,
    private readonly env: Record<string, string>,
    private readonly runner: CommandRunner,
  ) {}

  public static async clone({ url, branch, directory, token, runner = exec }: CloneOptions): Promise<GitWorkingCopy> {
    const env = gitCredentialsEnvironment(url, token);
    logger.debug(`Cloning '${url}' (${branch}) into '${directory}'...`);
    await git(runner, ['clone', '--no-tags', '--single-branch', '--branch', branch, url, directory], undefined, env);
    return new GitWorkingCopy(directory, env, runner);
  }

  public async remoteBranchExists(branch: string): Promise<boolean> {
    // --exit-code makes ls-remote exit with 2 when no matching ref is found
    const { exitCode } = await this.runner('git', ['ls-remote', '--exit-code', '--heads', 'origin', branch], {
      cwd: this.directory,
      env: this.env,
    });
    if (exitCode === 2) return false;
    if (exitCode !== 0) {
      throw new CommandFailedError(`git ls-remote failed with exit code ${exitCode}`, 'git', exitCode);
    }
    return true;
  }

  /**
   * Switch to the branch, tracking the remote one when a previous run left it behind,
   * or creating it from the current head otherwise.
   */
  public async checkoutBranch(branch: string, existsRemotely: boolean): Promise<void> {
    if (existsRemotely) {
      await this.git(['fetch', '--no-tags', 'origin', `+refs/heads/${branch}:refs/remotes/origin/${branch}`]);
      await this.git(['checkout', '-B', branch, `origin/${branch}`]);
    } else {
      await this.git(['checkout', '-b', branch]);
    }
  }

  public async hasChanges(): Promise<boolean> {
    const stdout = await this.git(['status', '--porcelain']);
    return stdout.trim().length > 0;
  }

  public async commitAll(message: string, author: GitAuthor): Promise<void> {
    await this.git(['add', '--all']);
    await this.git(['commit', '--message', message], {
      GIT_AUTHOR_NAME: author.name,
      GIT_AUTHOR_EMAIL: author.email,
      GIT_COMMITTER_NAME: author.name,
      GIT_COMMITTER_EMAIL: author.email,
    });
  }

  public async push(branch: string): Promise<void> {
    await this.git(['push', 'origin', `HEAD:refs/heads/${branch}`]);
  }

  private async git(args: string[], env?: Record<string, string>): Promise<string> {
    return await git(this.runner, args, this.directory, { ...this.env, ...env });
  }
}

async function git(
  runner: CommandRunner,
  args: string[],
  cwd: string | undefined,
  env: Record<string, string>,
): Promise<string> {
  const { exitCode, stdout, stderr } = await runner('git', args, { cwd, env, logger });
  if (exitCode !== 0) {
    throw new CommandFailedError(
      `git ${args[0]} failed with exit code ${exitCode}: ${stderr.trim()}`,
      'git',
      exitCode,
      stderr,
    );
  }
  return stdout;
}
