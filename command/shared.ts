import { resolve } from "node:path";
import { createCoderAgent } from "../agents/coder/coder.agent";
import { createOpenAICompletionClient } from "../agents/coder/completion.client";
import { createGitHubClient } from "../agents/forge/github.client";
import { createGitOperations } from "../agents/git/git.operations";
import { createSandboxManager } from "../agents/sandbox/sandbox.manager";
import type { ValidationConfig } from "../agents/validation/validation.types";
import { runValidation } from "../agents/validation/validation.runner";
import type { AppConfig } from "../core/config";
import type { WorkflowDependencies } from "../orchestrator/orchestrator.types";

interface SandboxCliOptions {
  sandboxRoot?: string;
  workDir?: string;
}

interface ValidationCliOptions {
  test?: string;
  lint?: string;
  script?: string[];
}

/** Git must fail instead of prompting for credentials on a terminal nobody is watching. */
const GIT_ENV = { GIT_TERMINAL_PROMPT: "0" };

const createSandbox = (config: AppConfig, options: SandboxCliOptions) =>
  createSandboxManager({
    rootDir: resolve(options.sandboxRoot ?? config.sandboxRoot),
    workingDir: options.workDir ? resolve(options.workDir) : undefined,
  });

const createCoder = (config: AppConfig) =>
  createCoderAgent({
    completion: createOpenAICompletionClient({ apiKey: config.openaiApiKey }),
    model: config.openaiModel,
  });

const createWorkflowDependencies = (
  config: AppConfig,
  options: SandboxCliOptions
): WorkflowDependencies => ({
  sandbox: createSandbox(config, options),
  git: createGitOperations({ env: GIT_ENV }),
  forge: createGitHubClient({ apiBaseUrl: config.githubApiUrl }),
  coder: createCoder(config),
  validate: (cwd, validation, signal) => runValidation(cwd, validation, { signal }),
  journalDir: config.runsRoot,
});

const buildValidationConfig = (options: ValidationCliOptions): ValidationConfig | undefined => {
  const scripts = options.script ?? [];
  if (!options.test && !options.lint && scripts.length === 0) {
    return undefined;
  }
  return {
    testCommand: options.test,
    lintCommand: options.lint,
    customScripts: scripts.map((path) => ({ path })),
  };
};

const parsePositiveInt = (raw: string | undefined, label: string) => {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${label} "${raw}": expected a positive integer.`);
  }
  return parsed;
};

const resolveRepoUrl = (config: AppConfig, repo?: string) => {
  const url = repo ?? config.defaultRepoUrl;
  if (!url) {
    throw new Error("A repository URL is required: pass --repo or set DEFAULT_REPO_URL.");
  }
  return url;
};

const printJson = (value: unknown) => {
  console.log(JSON.stringify(value, null, 2));
};

export {
  GIT_ENV,
  buildValidationConfig,
  createCoder,
  createSandbox,
  createWorkflowDependencies,
  parsePositiveInt,
  printJson,
  resolveRepoUrl,
};
export type { SandboxCliOptions, ValidationCliOptions };
