import type { CommandRunner } from "../../core/process";

type ValidatorKind = "test" | "lint" | "script";

interface CustomScript {
  path: string;
  args?: string[];
  /** Program that runs the script, e.g. `node` or `bash`; omitted runs the path itself. */
  interpreter?: string;
}

interface ValidationConfig {
  testCommand?: string;
  lintCommand?: string;
  customScripts?: CustomScript[];
}

interface ValidatorResult {
  name: string;
  kind: ValidatorKind;
  command: string;
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

interface ValidationReport {
  validators: ValidatorResult[];
  overallSuccess: boolean;
}

interface ValidationSummary {
  testsPassed?: boolean;
  lintPassed?: boolean;
  customScriptsPassed?: boolean;
  overallSuccess: boolean;
}

interface ValidationRunnerOptions {
  runner?: CommandRunner;
  env?: Record<string, string>;
  /** Kills the running validator and skips the rest once aborted. */
  signal?: AbortSignal;
}

export type {
  CustomScript,
  ValidationConfig,
  ValidationReport,
  ValidationRunnerOptions,
  ValidationSummary,
  ValidatorKind,
  ValidatorResult,
};
