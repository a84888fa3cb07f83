import type { CoderAgent, CodeModificationReport } from "../agents/coder/coder.types";
import type { ForgeClient } from "../agents/forge/forge.types";
import type { GitConfig, GitOperations } from "../agents/git/git.types";
import type { Sandbox, SandboxManager } from "../agents/sandbox/sandbox.types";
import type { ValidationConfig, ValidationReport } from "../agents/validation/validation.types";
import type { WorkflowErrorKind } from "../core/errors";

type WorkflowStatus = "pending" | "running" | "succeeded" | "failed" | "aborted";

type WorkflowState =
  | "init"
  | "sandbox_ready"
  | "cloned"
  | "configured"
  | "branched"
  | "code_modified"
  | "committed"
  | "pushed"
  | "pr_created"
  | "validated"
  | "cleaned_up"
  | "terminal";

type StepName =
  | "create_sandbox"
  | "clone"
  | "configure_git"
  | "create_branch"
  | "modify_code"
  | "commit"
  | "push"
  | "create_pr"
  | "validate"
  | "cleanup_sandbox";

type StepStatus = "success" | "failure" | "skipped";

interface StepPayload {
  sandboxPath?: string;
  branch?: string;
  baseBranch?: string;
  appliedConfig?: string[];
  writtenFile?: string;
  codeReport?: CodeModificationReport;
  commitHash?: string;
  prUrl?: string;
  prNumber?: number;
  validation?: ValidationReport;
}

interface StepResult {
  name: StepName;
  status: StepStatus;
  /** Why a skipped step did not run. */
  reason?: string;
  error?: string;
  errorKind?: WorkflowErrorKind;
  payload?: StepPayload;
  durationMs: number;
}

/** What a step action hands back; the machine adds name and timing. */
type StepOutcome =
  | { status: "success"; payload?: StepPayload }
  | { status: "failure"; error: string; errorKind: WorkflowErrorKind; payload?: StepPayload }
  | { status: "skipped"; reason: string };

interface FileWrite {
  path: string;
  content: string;
}

interface PullRequestRequest {
  title: string;
  body?: string;
}

interface WorkflowRequest {
  repoUrl: string;
  /** Defaults to `feature/<slug>-<8 hex of the run id>`. */
  branchName?: string;
  /** Branch to start from and to target with the pull request. */
  baseBranch?: string;
  commitMessage?: string;
  instruction?: string;
  /** Used when no instruction is given. */
  file?: FileWrite;
  /** Defaults to true. */
  push?: boolean;
  pullRequest?: PullRequestRequest;
  token?: string;
  gitConfig?: GitConfig;
  validation?: ValidationConfig;
  sandboxName?: string;
  stepTimeoutMs?: number;
}

interface WorkflowDependencies {
  sandbox: SandboxManager;
  git: GitOperations;
  forge: ForgeClient;
  coder?: CoderAgent;
  validate?: (
    cwd: string,
    config: ValidationConfig,
    signal?: AbortSignal
  ) => Promise<ValidationReport>;
  /** Directory receiving `<runId>/run.json`; no journal when omitted. */
  journalDir?: string;
  now?: () => Date;
}

interface WorkflowRun {
  id: string;
  status: WorkflowStatus;
  state: WorkflowState;
  steps: StepResult[];
  sandboxPath?: string;
  startedAt: string;
  finishedAt?: string;
}

/** Mutable state threaded through the step actions of one run. */
interface WorkflowContext {
  runId: string;
  request: WorkflowRequest;
  deps: WorkflowDependencies;
  branch: string;
  commitMessage: string;
  sandbox?: Sandbox;
  clonedBranch?: string;
  commitHash?: string;
  prUrl?: string;
}

interface StepDefinition {
  name: StepName;
  /** State entered when the step succeeds. */
  state: WorkflowState;
  /** Failure aborts the run. */
  mandatory: boolean;
  requires: StepName[];
  enabled: (context: WorkflowContext) => boolean;
  disabledReason: string;
  /** `signal` is aborted when the step times out; the action should stop touching the sandbox. */
  run: (context: WorkflowContext, signal: AbortSignal) => Promise<StepOutcome>;
}

interface WorkflowResult {
  runId: string;
  success: boolean;
  status: WorkflowStatus;
  state: WorkflowState;
  steps: StepResult[];
  error?: string;
  branch: string;
  commitHash?: string;
  prUrl?: string;
  sandboxPath?: string;
  startedAt: string;
  finishedAt: string;
}

export type {
  FileWrite,
  PullRequestRequest,
  StepDefinition,
  StepName,
  StepOutcome,
  StepPayload,
  StepResult,
  StepStatus,
  WorkflowContext,
  WorkflowDependencies,
  WorkflowRequest,
  WorkflowResult,
  WorkflowRun,
  WorkflowState,
  WorkflowStatus,
};
