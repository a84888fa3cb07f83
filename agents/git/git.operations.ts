import { GitError, fail, ok } from "../../core/errors";
import { logger } from "../../core/logger";
import { commandOutput, runCommand } from "../../core/process";
import type { CommandResult } from "../../core/process";
import type {
  GitConfig,
  GitOperations,
  GitOperationsOptions,
  GitResult,
} from "./git.types";

const log = logger.child("git");

const DEFAULT_REMOTE = "origin";

const toGitError = (args: string[], result: CommandResult) => {
  const message = commandOutput(result, `exit code ${result.exitCode}`);
  return new GitError(
    `git ${args[0] ?? ""} failed: ${message}`,
    result.stderr,
    result.exitCode,
    args
  );
};

const slugifyBranchName = (value: string) => {
  const normalized = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/-+/g, "-");
  if (normalized.length === 0) {
    return "workflow";
  }
  return normalized.length > 60 ? normalized.slice(0, 60) : normalized;
};

const createGitOperations = (
  options: GitOperationsOptions = {}
): GitOperations => {
  const runner = options.runner ?? runCommand;

  const runGit = async (
    args: string[],
    cwd: string
  ): Promise<GitResult<string>> => {
    log.debug(`git ${args.join(" ")}`, { data: { cwd } });
    const result = await runner("git", args, { cwd, env: options.env, signal: options.signal });
    if (!result.ok) {
      const error = toGitError(args, result);
      log.error(error.message);
      return fail(error);
    }
    return ok(result.stdout.trim());
  };

  const clone = async (url: string, targetDir: string, branch?: string) => {
    const args = ["clone"];
    if (branch && branch.trim().length > 0) {
      args.push("--branch", branch);
    }
    args.push(url, ".");

    const result = await runGit(args, targetDir);
    if (!result.ok) {
      return result;
    }
    log.info(`Cloned ${url} into ${targetDir}`);
    return ok(undefined);
  };

  const configure = async (targetDir: string, keyValues: GitConfig) => {
    const applied: string[] = [];
    for (const [key, value] of Object.entries(keyValues)) {
      const result = await runGit(["config", key, value], targetDir);
      if (!result.ok) {
        return result;
      }
      applied.push(key);
      log.debug(`Set git config ${key}`);
    }
    return ok(applied);
  };

  const checkout = async (name: string, targetDir: string) => {
    const result = await runGit(["checkout", name], targetDir);
    return result.ok ? ok(undefined) : result;
  };

  const createBranch = async (
    name: string,
    targetDir: string,
    baseBranch?: string
  ) => {
    if (baseBranch && baseBranch.trim().length > 0) {
      const base = await checkout(baseBranch, targetDir);
      if (!base.ok) {
        return base;
      }
    }
    const result = await runGit(["checkout", "-b", name], targetDir);
    if (!result.ok) {
      return result;
    }
    log.info(`Created branch ${name}`);
    return ok(name);
  };

  const getCurrentBranch = (targetDir: string) =>
    runGit(["rev-parse", "--abbrev-ref", "HEAD"], targetDir);

  const stageAll = async (targetDir: string) => {
    const result = await runGit(["add", "-A"], targetDir);
    return result.ok ? ok(undefined) : result;
  };

  const stageFiles = async (files: string[], targetDir: string) => {
    if (files.length === 0) {
      return ok(undefined);
    }
    const result = await runGit(["add", "--", ...files], targetDir);
    return result.ok ? ok(undefined) : result;
  };

  const commit = async (message: string, targetDir: string) => {
    const result = await runGit(["commit", "-m", message], targetDir);
    if (!result.ok) {
      return result;
    }
    const hash = await runGit(["rev-parse", "HEAD"], targetDir);
    if (!hash.ok) {
      return hash;
    }
    log.info(`Committed ${hash.value}`);
    return ok(hash.value);
  };

  const push = async (
    branch: string,
    targetDir: string,
    remote: string = DEFAULT_REMOTE
  ) => {
    const result = await runGit(["push", "-u", remote, branch], targetDir);
    if (!result.ok) {
      return result;
    }
    log.info(`Pushed ${branch} to ${remote}`);
    return ok(undefined);
  };

  const status = (targetDir: string) =>
    runGit(["status", "--porcelain"], targetDir);

  const withSignal = (signal: AbortSignal) =>
    createGitOperations({ ...options, signal });

  return {
    clone,
    configure,
    createBranch,
    checkout,
    getCurrentBranch,
    stageAll,
    stageFiles,
    commit,
    push,
    status,
    withSignal,
  };
};

export { createGitOperations, slugifyBranchName };
