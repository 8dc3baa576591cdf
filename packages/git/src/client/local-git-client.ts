/**
 * Local Git Client
 * Reads the triggering revision from a local checkout using simple-git
 */

import simpleGit, { type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { ValidationError, createLogger, type Logger, type Revision } from '@deckhand/shared';
import {
  DEFAULT_GIT_CLIENT_CONFIG,
  type GitClientConfig,
  type GitStatusInfo,
  type HeadCommitInfo,
  type ResolveRevisionOptions,
  type RevisionSource,
} from '../types.js';

export interface LocalGitClientOptions {
  config?: Partial<GitClientConfig>;
  logger?: Logger;
}

export interface ResolvedRevision extends Revision {
  source: RevisionSource;
}

export class LocalGitClient {
  private readonly config: GitClientConfig;
  private readonly logger: Logger;

  constructor(options: LocalGitClientOptions = {}) {
    this.config = { ...DEFAULT_GIT_CLIENT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('LocalGitClient');
  }

  /**
   * Get a simple-git instance for a repository path
   */
  private getGit(repoPath: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: repoPath,
      binary: this.config.binary,
      maxConcurrentProcesses: 1,
      trimmed: true,
    };
    return simpleGit(options);
  }

  /**
   * Check if a directory is a git repository
   */
  async isGitRepo(path: string): Promise<boolean> {
    try {
      return await this.getGit(path).checkIsRepo();
    } catch (error) {
      this.logger.debug({ path, error: error instanceof Error ? error.message : String(error) }, 'Not a git repository');
      return false;
    }
  }

  /**
   * Get repository status
   */
  async status(repoPath: string): Promise<GitStatusInfo> {
    const status = await this.getGit(repoPath).status();

    return {
      isClean: status.isClean(),
      current: status.current ?? this.config.defaultBranch,
      detached: status.detached,
      tracking: status.tracking ?? undefined,
      ahead: status.ahead,
      behind: status.behind,
      modified: status.modified,
      staged: status.staged,
      untracked: status.not_added,
    };
  }

  /**
   * Latest commit on HEAD
   */
  async head(repoPath: string): Promise<HeadCommitInfo> {
    const log = await this.getGit(repoPath).log({ maxCount: 1 });
    const latest = log.latest;
    if (!latest) {
      throw new ValidationError(`Repository at ${repoPath} has no commits`, { repoPath });
    }

    return {
      hash: latest.hash,
      shortHash: latest.hash.slice(0, 7),
      message: latest.message,
      author: latest.author_name,
      date: new Date(latest.date),
    };
  }

  /**
   * Work out which revision a pipeline run is for.
   * Order: explicit ref, then the CI environment, then the local checkout.
   */
  async resolveRevision(repoPath: string, options: ResolveRevisionOptions = {}): Promise<ResolvedRevision> {
    const env = options.env ?? {};

    if (options.refName) {
      return { refName: options.refName, sha: env.GITHUB_SHA, source: 'explicit' };
    }

    if (env.GITHUB_REF_NAME) {
      return { refName: env.GITHUB_REF_NAME, sha: env.GITHUB_SHA, source: 'ci' };
    }

    if (!(await this.isGitRepo(repoPath))) {
      throw new ValidationError(`Cannot determine revision: ${repoPath} is not a git checkout`, {
        repoPath,
      });
    }

    const [status, head] = await Promise.all([this.status(repoPath), this.head(repoPath)]);
    // A detached checkout has no branch to pull on the remote side; use the commit itself
    const refName = status.detached ? head.hash : status.current;

    this.logger.debug({ repoPath, refName, sha: head.hash }, 'Resolved revision from checkout');

    return { refName, sha: head.hash, source: 'checkout' };
  }
}
