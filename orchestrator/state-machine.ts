import { randomBytes } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { resolveRepoPath } from "../agents/coder/code.updater";
import { parseRepoUrl } from "../agents/forge/github.client";
import { slugifyBranchName } from "../agents/git/git.operations";
import type { GitResult } from "../agents/git/git.types";
import {
  TimeoutError,
  ValidationFailure,
  errorKind,
  errorMessage,
} from "../core/errors";
import { logger } from "../core/logger";
import { writeRunJournal } from "./artifacts";
import type {
  StepDefinition,
  StepName,
  StepOutcome,
  StepPayload,
  StepResult,
  WorkflowContext,
  WorkflowDependencies,
  WorkflowRequest,
  WorkflowResult,
  WorkflowRun,
} from "./orchestrator.types";

const log = logger.child("workflow");

/** Steps that must all succeed for the run to count as succeeded. */
const CORE_STEPS: StepName[] = ["clone", "create_branch", "commit"];

const pad = (value: number) => String(value).padStart(2, "0");

/** `YYYYMMDD_HHMMSS_<8 hex>` in UTC. */
const generateRunId = (now: Date = new Date()) => {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}_${randomBytes(4).toString("hex")}`;
};

const runIdSuffix = (runId: string) => runId.slice(-8);

const defaultBranchName = (runId: string, hint?: string) => {
  const slug = slugifyBranchName(hint ?? "").slice(0, 40).replace(/-+$/, "");
  return `feature/${slug.length > 0 ? slug : "workflow"}-${runIdSuffix(runId)}`;
};

const defaultCommitMessage = (runId: string) => `Automated commit from workflow ${runId}`;

const succeeded = (payload?: StepPayload): StepOutcome => ({ status: "success", payload });

const fromGitFailure = (result: GitResult<unknown>, payload?: StepPayload): StepOutcome =>
  result.ok
    ? succeeded(payload)
    : { status: "failure", error: result.error.message, errorKind: "GitError", payload };

const requireSandbox = (context: WorkflowContext) => {
  if (!context.sandbox) {
    throw new Error("No sandbox has been acquired.");
  }
  return context.sandbox;
};

/** How long cleanup waits for timed-out steps to notice their abort. */
const ABANDONED_STEP_GRACE_MS = 5000;

/**
 * Runs a step with its own abort signal. On timeout the signal is aborted with
 * the TimeoutError and the still-running promise goes to `abandoned`.
 */
const runWithTimeout = async (
  definition: StepDefinition,
  context: WorkflowContext,
  abandoned: Promise<unknown>[]
): Promise<StepOutcome> => {
  const controller = new AbortController();
  const running = definition.run(context, controller.signal);
  const timeoutMs = context.request.stepTimeoutMs;
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return running;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(
        `Step ${definition.name} timed out after ${timeoutMs}ms.`,
        timeoutMs
      );
      controller.abort(error);
      abandoned.push(running);
      reject(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/** Keeps cleanup from deleting a sandbox that a timed-out step is still writing to. */
const settleAbandoned = async (abandoned: Promise<unknown>[]) => {
  if (abandoned.length === 0) {
    return;
  }
  log.info(`Waiting for ${abandoned.length} timed-out step(s) to stop`);
  let timer: NodeJS.Timeout | undefined;
  const grace = new Promise<"expired">((resolve) => {
    timer = setTimeout(() => resolve("expired"), ABANDONED_STEP_GRACE_MS);
  });
  try {
    const settled = await Promise.race([
      Promise.allSettled(abandoned).then(() => "settled" as const),
      grace,
    ]);
    if (settled === "expired") {
      log.warn(`Timed-out steps still running after ${ABANDONED_STEP_GRACE_MS}ms`);
    }
  } finally {
    clearTimeout(timer);
  }
};

const STEP_DEFINITIONS: StepDefinition[] = [
  {
    name: "create_sandbox",
    state: "sandbox_ready",
    mandatory: true,
    requires: [],
    enabled: () => true,
    disabledReason: "",
    run: async (context) => {
      const sandbox = await context.deps.sandbox.acquire(context.request.sandboxName);
      context.sandbox = sandbox;
      return succeeded({ sandboxPath: sandbox.path });
    },
  },
  {
    name: "clone",
    state: "cloned",
    mandatory: false,
    requires: ["create_sandbox"],
    enabled: () => true,
    disabledReason: "",
    run: async (context, signal) => {
      const git = context.deps.git.withSignal(signal);
      const sandbox = requireSandbox(context);
      const cloned = await git.clone(context.request.repoUrl, sandbox.path);
      if (!cloned.ok) {
        return fromGitFailure(cloned);
      }
      const current = await git.getCurrentBranch(sandbox.path);
      if (current.ok) {
        context.clonedBranch = current.value;
      } else {
        log.warn(`Could not determine the cloned branch: ${current.error.message}`);
      }
      return succeeded({ sandboxPath: sandbox.path, baseBranch: context.clonedBranch });
    },
  },
  {
    name: "configure_git",
    state: "configured",
    mandatory: false,
    requires: ["clone"],
    enabled: (context) => Object.keys(context.request.gitConfig ?? {}).length > 0,
    disabledReason: "No git configuration given.",
    run: async (context, signal) => {
      const result = await context.deps.git.withSignal(signal).configure(
        requireSandbox(context).path,
        context.request.gitConfig ?? {}
      );
      return result.ok
        ? succeeded({ appliedConfig: result.value })
        : fromGitFailure(result);
    },
  },
  {
    name: "create_branch",
    state: "branched",
    mandatory: false,
    requires: ["clone"],
    enabled: () => true,
    disabledReason: "",
    run: async (context, signal) => {
      const result = await context.deps.git.withSignal(signal).createBranch(
        context.branch,
        requireSandbox(context).path,
        context.request.baseBranch
      );
      return fromGitFailure(result, { branch: context.branch });
    },
  },
  {
    name: "modify_code",
    state: "code_modified",
    mandatory: false,
    requires: ["create_branch"],
    enabled: (context) =>
      Boolean(context.request.instruction?.trim()) || context.request.file !== undefined,
    disabledReason: "No instruction or file content given.",
    run: async (context, signal) => {
      const sandbox = requireSandbox(context);
      const { instruction, file } = context.request;

      if (instruction?.trim()) {
        const { coder } = context.deps;
        if (!coder) {
          return {
            status: "failure",
            error: "No code-modification tool is configured.",
            errorKind: "UnexpectedError",
          };
        }
        const report = await coder.modify(sandbox.path, instruction, { signal });
        if (!report.success) {
          return {
            status: "failure",
            error: report.error ?? "Code modification failed.",
            errorKind: report.errorKind ?? "UnexpectedError",
            payload: { codeReport: report },
          };
        }
        return succeeded({ codeReport: report });
      }

      if (!file) {
        return { status: "skipped", reason: "No instruction or file content given." };
      }
      const target = resolveRepoPath(sandbox.path, file.path);
      signal.throwIfAborted();
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, file.content);
      log.info(`Wrote ${file.path}`);
      return succeeded({ writtenFile: file.path });
    },
  },
  {
    name: "commit",
    state: "committed",
    mandatory: false,
    requires: ["create_branch"],
    enabled: () => true,
    disabledReason: "",
    run: async (context, signal) => {
      const git = context.deps.git.withSignal(signal);
      const repoPath = requireSandbox(context).path;
      const staged = await git.stageAll(repoPath);
      if (!staged.ok) {
        return fromGitFailure(staged);
      }
      const status = await git.status(repoPath);
      if (status.ok && status.value.trim().length === 0) {
        return {
          status: "failure",
          error: "Nothing to commit, working tree clean.",
          errorKind: "GitError",
        };
      }
      const committed = await git.commit(context.commitMessage, repoPath);
      if (!committed.ok) {
        return fromGitFailure(committed);
      }
      context.commitHash = committed.value;
      return succeeded({ commitHash: committed.value, branch: context.branch });
    },
  },
  {
    name: "push",
    state: "pushed",
    mandatory: false,
    requires: ["commit"],
    enabled: (context) => context.request.push !== false,
    disabledReason: "Push disabled.",
    run: async (context, signal) => {
      const result = await context.deps.git
        .withSignal(signal)
        .push(context.branch, requireSandbox(context).path);
      return fromGitFailure(result, { branch: context.branch });
    },
  },
  {
    name: "create_pr",
    state: "pr_created",
    mandatory: false,
    requires: ["push"],
    enabled: (context) =>
      Boolean(context.request.pullRequest?.title.trim()) &&
      Boolean(context.request.token?.trim()),
    disabledReason: "No pull request title or access token given.",
    run: async (context, signal) => {
      const { pullRequest, token } = context.request;
      if (!pullRequest || !token) {
        return { status: "skipped", reason: "No pull request title or access token given." };
      }
      const base = context.request.baseBranch ?? context.clonedBranch;
      if (!base) {
        return {
          status: "failure",
          error: "Could not determine the base branch for the pull request.",
          errorKind: "GitError",
        };
      }
      const repo = parseRepoUrl(context.request.repoUrl);
      const result = await context.deps.forge.createPullRequest({
        token,
        repoFullName: repo.fullName,
        base,
        head: context.branch,
        title: pullRequest.title,
        body: pullRequest.body ?? "",
        signal,
      });
      if (!result.ok) {
        return { status: "failure", error: result.error.message, errorKind: "ApiError" };
      }
      context.prUrl = result.value.url;
      return succeeded({ prUrl: result.value.url, prNumber: result.value.number, baseBranch: base });
    },
  },
  {
    name: "validate",
    state: "validated",
    mandatory: false,
    requires: ["clone"],
    enabled: (context) =>
      context.request.validation !== undefined && context.deps.validate !== undefined,
    disabledReason: "No validation configured.",
    run: async (context, signal) => {
      const { validate } = context.deps;
      const config = context.request.validation;
      if (!validate || !config) {
        return { status: "skipped", reason: "No validation configured." };
      }
      const report = await validate(requireSandbox(context).path, config, signal);
      if (report.overallSuccess) {
        return succeeded({ validation: report });
      }
      const failed = report.validators
        .filter((validator) => !validator.success)
        .map((validator) => validator.name);
      const failure = new ValidationFailure(`Validation failed: ${failed.join(", ")}`, failed);
      return {
        status: "failure",
        error: failure.message,
        errorKind: failure.kind,
        payload: { validation: report },
      };
    },
  },
];

const statusOf = (run: WorkflowRun, name: StepName) =>
  run.steps.find((step) => step.name === name)?.status;

const recordStep = (run: WorkflowRun, name: StepName, outcome: StepOutcome, startedAt: number) => {
  const durationMs = Date.now() - startedAt;
  const result: StepResult =
    outcome.status === "skipped"
      ? { name, status: "skipped", reason: outcome.reason, durationMs }
      : outcome.status === "failure"
        ? {
            name,
            status: "failure",
            error: outcome.error,
            errorKind: outcome.errorKind,
            payload: outcome.payload,
            durationMs,
          }
        : { name, status: "success", payload: outcome.payload, durationMs };
  run.steps.push(Object.freeze(result));

  if (result.status === "success") {
    log.success(`${name} succeeded`);
  } else if (result.status === "failure") {
    log.error(`${name} failed: ${result.error ?? "unknown error"}`);
  } else {
    log.info(`${name} skipped: ${result.reason ?? ""}`);
  }
  return result;
};

const executeStep = async (
  definition: StepDefinition,
  run: WorkflowRun,
  context: WorkflowContext,
  abandoned: Promise<unknown>[]
) => {
  const startedAt = Date.now();
  if (!definition.enabled(context)) {
    return recordStep(
      run,
      definition.name,
      { status: "skipped", reason: definition.disabledReason },
      startedAt
    );
  }

  const missing = definition.requires.find((name) => statusOf(run, name) !== "success");
  if (missing) {
    return recordStep(
      run,
      definition.name,
      { status: "skipped", reason: `Prerequisite ${missing} did not succeed.` },
      startedAt
    );
  }

  log.info(`Running ${definition.name}`);
  let outcome: StepOutcome;
  try {
    outcome = await runWithTimeout(definition, context, abandoned);
  } catch (error) {
    outcome = { status: "failure", error: errorMessage(error), errorKind: errorKind(error) };
  }

  const result = recordStep(run, definition.name, outcome, startedAt);
  if (result.status === "success") {
    run.state = definition.state;
  }
  return result;
};

const cleanupSandbox = async (run: WorkflowRun, context: WorkflowContext) => {
  const startedAt = Date.now();
  const { sandbox } = context;
  if (!sandbox) {
    recordStep(
      run,
      "cleanup_sandbox",
      { status: "skipped", reason: "No sandbox was acquired." },
      startedAt
    );
    return;
  }

  try {
    await context.deps.sandbox.release(sandbox);
    recordStep(
      run,
      "cleanup_sandbox",
      { status: "success", payload: { sandboxPath: sandbox.path } },
      startedAt
    );
    run.state = "cleaned_up";
  } catch (error) {
    recordStep(
      run,
      "cleanup_sandbox",
      { status: "failure", error: errorMessage(error), errorKind: errorKind(error) },
      startedAt
    );
  }
};

const buildResult = (run: WorkflowRun, context: WorkflowContext): WorkflowResult => {
  const firstFailure = run.steps.find((step) => step.status === "failure");
  return {
    runId: run.id,
    success: run.status === "succeeded",
    status: run.status,
    state: run.state,
    steps: run.steps,
    error: firstFailure?.error,
    branch: context.branch,
    commitHash: context.commitHash,
    prUrl: context.prUrl,
    sandboxPath: run.sandboxPath,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt ?? run.startedAt,
  };
};

const runWorkflow = async (
  request: WorkflowRequest,
  deps: WorkflowDependencies
): Promise<WorkflowResult> => {
  const now = deps.now ?? (() => new Date());
  const runId = generateRunId(now());
  const run: WorkflowRun = {
    id: runId,
    status: "running",
    state: "init",
    steps: [],
    startedAt: now().toISOString(),
  };
  const context: WorkflowContext = {
    runId,
    request,
    deps,
    branch:
      request.branchName ?? defaultBranchName(runId, request.instruction ?? request.file?.path),
    commitMessage: request.commitMessage ?? defaultCommitMessage(runId),
  };

  log.info(`Starting workflow ${runId} for ${request.repoUrl} on ${context.branch}`);
  let aborted = false;
  const abandoned: Promise<unknown>[] = [];

  try {
    for (const definition of STEP_DEFINITIONS) {
      if (aborted) {
        recordStep(
          run,
          definition.name,
          { status: "skipped", reason: "Workflow aborted." },
          Date.now()
        );
        continue;
      }
      const result = await executeStep(definition, run, context, abandoned);
      if (definition.name === "create_sandbox" && context.sandbox) {
        run.sandboxPath = context.sandbox.path;
      }
      if (definition.mandatory && result.status !== "success") {
        aborted = true;
      }
    }
  } catch (error) {
    log.error(`Workflow ${runId} stopped unexpectedly: ${errorMessage(error)}`, { data: error });
    aborted = aborted || !context.sandbox;
  } finally {
    await settleAbandoned(abandoned);
    await cleanupSandbox(run, context);
  }

  run.status = aborted
    ? "aborted"
    : CORE_STEPS.every((name) => statusOf(run, name) === "success")
      ? "succeeded"
      : "failed";
  run.state = "terminal";
  run.finishedAt = now().toISOString();

  const result = buildResult(run, context);
  if (result.success) {
    log.success(`Workflow ${runId} succeeded`);
  } else {
    log.warn(`Workflow ${runId} finished with status ${result.status}`);
  }

  if (deps.journalDir) {
    try {
      const path = await writeRunJournal(deps.journalDir, result);
      log.debug(`Journal written to ${path}`);
    } catch (error) {
      log.warn(`Could not write run journal: ${errorMessage(error)}`);
    }
  }

  return result;
};

export { defaultBranchName, generateRunId, runWorkflow };
