/**
 * Git Types
 */

export interface GitClientConfig {
  /** git binary to run */
  binary: string;
  /** Branch reported when the checkout has no current branch name */
  defaultBranch: string;
}

export const DEFAULT_GIT_CLIENT_CONFIG: GitClientConfig = {
  binary: 'git',
  defaultBranch: 'main',
};

export interface GitStatusInfo {
  isClean: boolean;
  current: string;
  detached: boolean;
  tracking?: string;
  ahead: number;
  behind: number;
  modified: string[];
  staged: string[];
  untracked: string[];
}

export interface HeadCommitInfo {
  hash: string;
  shortHash: string;
  message: string;
  author: string;
  date: Date;
}

/**
 * Where the triggering revision came from
 */
export type RevisionSource = 'explicit' | 'ci' | 'checkout';

export interface ResolveRevisionOptions {
  /** Ref given on the command line; wins over everything else */
  refName?: string;
  /** CI environment, read for GITHUB_REF_NAME and GITHUB_SHA */
  env?: Record<string, string | undefined>;
}
