import type { GitError, OperationResult } from "../../core/errors";
import type { CommandRunner } from "../../core/process";

type GitResult<T> = OperationResult<T, GitError>;

/** Local repository config entries, applied in insertion order. */
type GitConfig = Record<string, string>;

interface GitOperationsOptions {
  runner?: CommandRunner;
  /** Extra environment for every git process (e.g. GIT_TERMINAL_PROMPT=0). */
  env?: Record<string, string>;
  /** Passed to every git process; aborting kills the running one. */
  signal?: AbortSignal;
}

interface GitOperations {
  clone: (url: string, targetDir: string, branch?: string) => Promise<GitResult<void>>;
  /** Resolves with the keys applied; on failure earlier keys stay applied. */
  configure: (targetDir: string, keyValues: GitConfig) => Promise<GitResult<string[]>>;
  createBranch: (
    name: string,
    targetDir: string,
    baseBranch?: string
  ) => Promise<GitResult<string>>;
  checkout: (name: string, targetDir: string) => Promise<GitResult<void>>;
  getCurrentBranch: (targetDir: string) => Promise<GitResult<string>>;
  stageAll: (targetDir: string) => Promise<GitResult<void>>;
  stageFiles: (files: string[], targetDir: string) => Promise<GitResult<void>>;
  /** Resolves with the new commit hash. */
  commit: (message: string, targetDir: string) => Promise<GitResult<string>>;
  push: (branch: string, targetDir: string, remote?: string) => Promise<GitResult<void>>;
  /** `git status --porcelain` output; empty when the tree is clean. */
  status: (targetDir: string) => Promise<GitResult<string>>;
  /** Same operations, with every git process bound to `signal`. */
  withSignal: (signal: AbortSignal) => GitOperations;
}

export type { GitConfig, GitOperations, GitOperationsOptions, GitResult };
