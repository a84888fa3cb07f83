import { logger } from "../../core/logger";
import { formatCommandLine, runCommand } from "../../core/process";
import type {
  ValidationConfig,
  ValidationReport,
  ValidationRunnerOptions,
  ValidationSummary,
  ValidatorKind,
  ValidatorResult,
} from "./validation.types";

const log = logger.child("validation");

interface PlannedValidator {
  name: string;
  kind: ValidatorKind;
  argv: string[];
}

const splitCommand = (command: string) =>
  command.split(/\s+/).filter((part) => part.length > 0);

const planValidators = (config: ValidationConfig): PlannedValidator[] => {
  const planned: PlannedValidator[] = [];
  if (config.testCommand !== undefined) {
    planned.push({ name: "tests", kind: "test", argv: splitCommand(config.testCommand) });
  }
  if (config.lintCommand !== undefined) {
    planned.push({ name: "lint", kind: "lint", argv: splitCommand(config.lintCommand) });
  }
  for (const script of config.customScripts ?? []) {
    const argv = script.interpreter
      ? [script.interpreter, script.path, ...(script.args ?? [])]
      : [script.path, ...(script.args ?? [])];
    planned.push({ name: `script:${script.path}`, kind: "script", argv });
  }
  return planned;
};

/** Runs every configured validator; a failure never stops the ones after it. */
const runValidation = async (
  cwd: string,
  config: ValidationConfig,
  options: ValidationRunnerOptions = {}
): Promise<ValidationReport> => {
  const runner = options.runner ?? runCommand;
  const validators: ValidatorResult[] = [];

  for (const validator of planValidators(config)) {
    options.signal?.throwIfAborted();
    const [command, ...args] = validator.argv;
    if (!command) {
      validators.push({
        name: validator.name,
        kind: validator.kind,
        command: "",
        success: false,
        exitCode: -1,
        stdout: "",
        stderr: `Missing ${validator.kind} command.`,
      });
      log.warn(`Validator ${validator.name} has no command`);
      continue;
    }

    const commandLine = formatCommandLine(command, args);
    log.info(`Running ${validator.name}: ${commandLine}`);
    const result = await runner(command, args, { cwd, env: options.env, signal: options.signal });
    validators.push({
      name: validator.name,
      kind: validator.kind,
      command: commandLine,
      success: result.ok,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    });

    if (result.ok) {
      log.success(`${validator.name} passed`);
    } else {
      log.error(`${validator.name} failed with exit code ${result.exitCode}`);
    }
  }

  const overallSuccess = validators.every((validator) => validator.success);
  return { validators, overallSuccess };
};

const summarizeValidation = (report: ValidationReport): ValidationSummary => {
  const passedFor = (kind: ValidatorKind) => {
    const matching = report.validators.filter((validator) => validator.kind === kind);
    return matching.length > 0 ? matching.every((validator) => validator.success) : undefined;
  };

  const summary: ValidationSummary = { overallSuccess: report.overallSuccess };
  const testsPassed = passedFor("test");
  const lintPassed = passedFor("lint");
  const customScriptsPassed = passedFor("script");
  if (testsPassed !== undefined) {
    summary.testsPassed = testsPassed;
  }
  if (lintPassed !== undefined) {
    summary.lintPassed = lintPassed;
  }
  if (customScriptsPassed !== undefined) {
    summary.customScriptsPassed = customScriptsPassed;
  }
  return summary;
};

export { planValidators, runValidation, summarizeValidation };
