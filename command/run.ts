import type { Command } from "commander";
import type { AppConfig } from "../core/config";
import { maskSecret, resolveGitIdentity } from "../core/config";
import { logger } from "../core/logger";
import { resolveInstructionInput } from "../core/task-input";
import type { WorkflowRequest } from "../orchestrator/orchestrator.types";
import { runWorkflow } from "../orchestrator/state-machine";
import {
  buildValidationConfig,
  createWorkflowDependencies,
  parsePositiveInt,
  printJson,
  resolveRepoUrl,
} from "./shared";
import type { SandboxCliOptions, ValidationCliOptions } from "./shared";

interface RunOptions extends SandboxCliOptions, ValidationCliOptions {
  repo?: string;
  branch?: string;
  base?: string;
  message?: string;
  instruction?: string;
  file?: string;
  content?: string;
  prTitle?: string;
  prBody?: string;
  token?: string;
  push: boolean;
  timeout?: string;
  gitName?: string;
  gitEmail?: string;
}

const buildWorkflowRequest = async (
  config: AppConfig,
  options: RunOptions
): Promise<WorkflowRequest> => {
  if (options.file !== undefined && options.content === undefined) {
    throw new Error("--file requires --content.");
  }

  const instruction = options.instruction
    ? (await resolveInstructionInput(options.instruction)).instruction
    : undefined;
  const token = options.token ?? config.githubToken;
  const gitConfig = resolveGitIdentity(config, {
    name: options.gitName,
    email: options.gitEmail,
  });

  return {
    repoUrl: resolveRepoUrl(config, options.repo),
    branchName: options.branch,
    baseBranch: options.base,
    commitMessage: options.message,
    instruction,
    file:
      options.file !== undefined && options.content !== undefined
        ? { path: options.file, content: options.content }
        : undefined,
    push: options.push,
    pullRequest: options.prTitle
      ? { title: options.prTitle, body: options.prBody }
      : undefined,
    token,
    gitConfig: Object.keys(gitConfig).length > 0 ? gitConfig : undefined,
    validation: buildValidationConfig(options),
    stepTimeoutMs: parsePositiveInt(options.timeout, "--timeout"),
  };
};

export const registerRunCommand = (program: Command, config: AppConfig) => {
  program
    .command("run")
    .description("Clone, branch, change, commit, push and open a pull request in a fresh sandbox.")
    .option("--repo <url>", "Repository to clone (defaults to DEFAULT_REPO_URL).")
    .option("--branch <name>", "Branch to create.")
    .option("--base <branch>", "Branch to start from and target with the pull request.")
    .option("--message <msg>", "Commit message.")
    .option("--instruction <text>", "Change instruction, or a .md/.json file holding one.")
    .option("--file <path>", "Repo-relative file to write instead of running the code tool.")
    .option("--content <text>", "Content for --file.")
    .option("--pr-title <title>", "Open a pull request with this title.")
    .option("--pr-body <body>", "Pull request description.")
    .option("--token <token>", "Access token for the pull request (defaults to GITHUB_TOKEN).")
    .option("--no-push", "Skip pushing the branch.")
    .option("--test <cmd>", "Test command to run after committing.")
    .option("--lint <cmd>", "Lint command to run after committing.")
    .option("--script <path...>", "Extra validation scripts.")
    .option("--work-dir <dir>", "Use an existing directory instead of a generated sandbox.")
    .option("--sandbox-root <dir>", "Directory holding generated sandboxes.")
    .option("--timeout <ms>", "Fail any step that runs longer than this.")
    .option("--git-name <name>", "Commit author name.")
    .option("--git-email <email>", "Commit author email.")
    .action(async (options: RunOptions) => {
      const request = await buildWorkflowRequest(config, options);
      if (request.token) {
        logger.info(`Using access token ${maskSecret(request.token)}`);
      }

      const result = await runWorkflow(request, createWorkflowDependencies(config, options));
      printJson(result);
      if (!result.success) {
        process.exitCode = 1;
      }
    });
};

export { buildWorkflowRequest };
export type { RunOptions };
