/**
 * Git Source
 *
 * A local, non-bare working copy driven through the git executable.
 * Every method is one git invocation; a non-zero exit is surfaced as a
 * RepositoryError carrying git's own message.
 */

import simpleGit from 'simple-git';
import { existsSync } from 'fs';
import { join } from 'path';
import { RepositoryError, errorMessage } from '../errors';
import { makeNoopLogger, type Logger } from '../logging';

/** The slice of simple-git this module drives. */
export interface GitRunner {
  raw(args: string[]): Promise<string>;
}

export type GitFactory = (baseDir?: string) => GitRunner;

export interface GitRepositoryDeps {
  git?: GitFactory;
  logger?: Logger;
}

// The inherited environment is left alone: simple-git refuses to run
// when handed variables such as EDITOR or GIT_EDITOR.
export const defaultGitFactory: GitFactory = (baseDir) =>
  baseDir ? simpleGit({ baseDir }) : simpleGit();

export class GitRepository {
  readonly uri: string;
  readonly dirpath: string;
  private git: GitRunner;
  private logger: Logger;

  constructor(uri: string, dirpath: string, deps: GitRepositoryDeps = {}) {
    if (!existsSync(join(dirpath, '.git'))) {
      throw new RepositoryError(`git repository '${dirpath}' does not exist`);
    }

    this.uri = uri;
    this.dirpath = dirpath;
    this.git = (deps.git ?? defaultGitFactory)(dirpath);
    this.logger = deps.logger ?? makeNoopLogger();
  }

  /**
   * Clone `uri` into `dirpath`. git refuses a destination that already
   * exists and is not empty; that refusal is what the caller sees.
   */
  static async clone(uri: string, dirpath: string, deps: GitRepositoryDeps = {}): Promise<GitRepository> {
    const git = (deps.git ?? defaultGitFactory)();
    await run(git, ['clone', uri, dirpath]);
    deps.logger?.info({ uri, dirpath }, 'git repository cloned');
    return new GitRepository(uri, dirpath, deps);
  }

  /**
   * Bring the working copy back to the state of its remote. HEAD is
   * detached at the remote default branch, so no local branch is moved and
   * local changes are dropped.
   */
  async pull(): Promise<void> {
    await run(this.git, ['fetch', 'origin']);
    await run(this.git, ['checkout', '--detach', '--force', 'origin/HEAD']);
    this.logger.debug({ dirpath: this.dirpath }, 'git repository updated');
  }

  /**
   * Check out `rev`. A branch that exists on the remote is reset to the
   * remote's tip; tags and commit hashes are checked out as given.
   */
  async checkout(rev: string): Promise<void> {
    if (rev !== 'HEAD' && await this.hasRemoteBranch(rev)) {
      await run(this.git, ['checkout', '--force', '-B', rev, `origin/${rev}`]);
    } else {
      await run(this.git, ['checkout', rev]);
    }
    this.logger.debug({ dirpath: this.dirpath, rev }, 'git repository checked out');
  }

  private async hasRemoteBranch(branch: string): Promise<boolean> {
    const output = await run(this.git, ['branch', '--remotes', '--list', `origin/${branch}`]);
    return output.split('\n').some(line => line.trim() === `origin/${branch}`);
  }

  /** Paths tracked at the checked-out revision. */
  async listFiles(): Promise<string[]> {
    const output = await run(this.git, ['ls-files', '-z']);
    return output.split('\0').filter(path => path.length > 0);
  }

  /**
   * Porcelain blame of `path` at the checked-out revision, following renames.
   * A path that does not exist there yields an empty string.
   */
  async blame(path: string): Promise<string> {
    if (!existsSync(join(this.dirpath, path))) {
      return '';
    }
    return run(this.git, ['blame', '--porcelain', '-M', '-C', '--', path]);
  }
}

async function run(git: GitRunner, args: string[]): Promise<string> {
  try {
    return await git.raw(args);
  } catch (error) {
    throw new RepositoryError(`git command - ${errorMessage(error).trim()}`, { cause: error });
  }
}
