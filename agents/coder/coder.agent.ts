import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ParseError, ResourceError, errorKind, errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import { bundleFiles, collectSourceFiles, hasSourceCandidates } from "./code.collector";
import { applyFileChanges, parseFileChanges, summarizeChanges } from "./code.updater";
import type {
  CodeModificationReport,
  CoderAgent,
  CoderAgentOptions,
  ModifyOptions,
  PlaceholderFile,
} from "./coder.types";

const log = logger.child("coder");

const DEFAULT_SYSTEM_PROMPT_PATH = fileURLToPath(new URL("./coder.system.md", import.meta.url));
const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_TOKENS = 4096;

const DEFAULT_PLACEHOLDER: PlaceholderFile = {
  path: "index.js",
  content: [
    "// Entry point created so the repository has source to work with.",
    "const main = () => {",
    '  console.log("Hello from the workflow");',
    "};",
    "",
    "main();",
    "",
  ].join("\n"),
};

const readPrompt = async (path: string) => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new Error(`Prompt file not found: ${path}`, { cause: error });
  }
};

const buildUserInput = (bundle: string, instruction: string) =>
  [
    "Here is the code from the repository:",
    "",
    bundle,
    "",
    `Instruction: ${instruction}`,
    "",
    "Return only the files you changed, each preceded by its === FILE: <path> === marker.",
  ].join("\n");

const writePlaceholder = async (repoPath: string, placeholder: PlaceholderFile) => {
  try {
    await writeFile(join(repoPath, placeholder.path), placeholder.content, { flag: "wx" });
  } catch (error) {
    throw new ResourceError(
      `Could not create placeholder ${placeholder.path}: ${errorMessage(error)}`
    );
  }
};

const failedReport = (
  error: unknown,
  placeholderCreated: boolean
): CodeModificationReport => ({
  success: false,
  filesChanged: 0,
  results: [],
  summary: "No files were changed.",
  placeholderCreated,
  error: errorMessage(error),
  errorKind: errorKind(error),
});

const createCoderAgent = (options: CoderAgentOptions): CoderAgent => {
  const model = options.model ?? DEFAULT_MODEL;
  const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  const systemPromptPath = options.systemPromptPath ?? DEFAULT_SYSTEM_PROMPT_PATH;
  const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;

  const modify = async (
    repoPath: string,
    instruction: string,
    { signal }: ModifyOptions = {}
  ): Promise<CodeModificationReport> => {
    let placeholderCreated = false;
    try {
      let files = await collectSourceFiles(repoPath, options.collect);
      if (files.length === 0) {
        if (await hasSourceCandidates(repoPath, options.collect)) {
          return failedReport(
            new Error("No source files fit the collection limits."),
            placeholderCreated
          );
        }
        if (placeholder) {
          signal?.throwIfAborted();
          log.warn(`No source files found, writing placeholder ${placeholder.path}`);
          await writePlaceholder(repoPath, placeholder);
          placeholderCreated = true;
          files = await collectSourceFiles(repoPath, options.collect);
        }
      }
      if (files.length === 0) {
        return failedReport(new Error("No source files found to modify."), placeholderCreated);
      }

      const bundle = bundleFiles(files);
      const system = await readPrompt(systemPromptPath);
      signal?.throwIfAborted();
      const response = await options.completion.complete({
        model,
        system,
        user: buildUserInput(bundle.text, instruction),
        temperature,
        maxTokens,
        signal,
      });

      const changes = parseFileChanges(response);
      if (changes.length === 0) {
        log.warn("Completion response contained no file blocks");
        return failedReport(
          new ParseError("Completion response contained no file blocks."),
          placeholderCreated
        );
      }

      const results = await applyFileChanges(repoPath, changes, signal);
      const applied = results.filter((result) => result.success).length;
      const success = applied === results.length;
      const report: CodeModificationReport = {
        success,
        filesChanged: applied,
        results,
        summary: summarizeChanges(results),
        placeholderCreated,
      };
      if (!success) {
        report.error = `${results.length - applied} of ${results.length} file changes could not be applied.`;
        report.errorKind = "ResourceError";
      }
      return report;
    } catch (error) {
      log.error(`Code modification failed: ${errorMessage(error)}`);
      return failedReport(error, placeholderCreated);
    }
  };

  return { modify };
};

const generateReport = (report: CodeModificationReport) => {
  const lines = ["=== CODE MODIFICATION REPORT ===", ""];
  if (!report.success && report.results.length === 0) {
    lines.push(`Error: ${report.error ?? "Unknown error."}`);
    return lines.join("\n");
  }

  lines.push(`Files changed: ${report.filesChanged}`, "", report.summary);
  if (report.error) {
    lines.push(`Error: ${report.error}`);
  }
  lines.push("", "=== DETAILED RESULTS ===");
  for (const result of report.results) {
    const status = result.success ? "OK" : "FAILED";
    lines.push(`${result.path}: ${status} (${result.change}) - ${result.message}`);
  }
  return lines.join("\n");
};

export { createCoderAgent, generateReport };
