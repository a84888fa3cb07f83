import type { Command } from "commander";
import { createGitOperations } from "../agents/git/git.operations";
import { runValidation, summarizeValidation } from "../agents/validation/validation.runner";
import type { AppConfig } from "../core/config";
import { ValidationFailure } from "../core/errors";
import { logger } from "../core/logger";
import {
  GIT_ENV,
  buildValidationConfig,
  createSandbox,
  printJson,
  resolveRepoUrl,
} from "./shared";
import type { SandboxCliOptions, ValidationCliOptions } from "./shared";

interface ValidateOptions extends SandboxCliOptions, ValidationCliOptions {
  repo?: string;
  branch?: string;
}

export const registerValidateCommand = (program: Command, config: AppConfig) => {
  program
    .command("validate")
    .description("Clone a repository into a sandbox and run its validators.")
    .option("--repo <url>", "Repository to clone (defaults to DEFAULT_REPO_URL).")
    .option("--branch <name>", "Branch to check out.")
    .option("--test <cmd>", "Test command.")
    .option("--lint <cmd>", "Lint command.")
    .option("--script <path...>", "Extra validation scripts.")
    .option("--work-dir <dir>", "Use an existing directory instead of a generated sandbox.")
    .option("--sandbox-root <dir>", "Directory holding generated sandboxes.")
    .action(async (options: ValidateOptions) => {
      const repoUrl = resolveRepoUrl(config, options.repo);
      const validation = buildValidationConfig(options);
      if (!validation) {
        throw new ValidationFailure("Nothing to validate: pass --test, --lint or --script.", []);
      }

      const git = createGitOperations({ env: GIT_ENV });
      const report = await createSandbox(config, options).withSandbox(repoUrl, async (sandbox) => {
        const cloned = await git.clone(repoUrl, sandbox.path, options.branch);
        if (!cloned.ok) {
          throw cloned.error;
        }
        return runValidation(sandbox.path, validation);
      });

      printJson({ ...report, summary: summarizeValidation(report) });
      if (!report.overallSuccess) {
        const failed = report.validators.filter((item) => !item.success).map((item) => item.name);
        logger.error(`Validation failed: ${failed.join(", ")}`, { scope: "validation" });
        process.exitCode = 1;
      }
    });
};
