import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve, sep } from "node:path";
import { errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import type { FileChangeResult, ParsedFileChange } from "./coder.types";

const log = logger.child("coder");

const FILE_BLOCK_PATTERN = /=== FILE: ([^\n]+) ===\n([\s\S]*?)(?=\n=== FILE:|$)/g;
const WRAPPING_FENCE_PATTERN = /^```[^\n]*\n([\s\S]*?)\n?```$/;

const stripWrappingFence = (content: string) => {
  const match = WRAPPING_FENCE_PATTERN.exec(content);
  return match ? (match[1] ?? "").trim() : content;
};

/** Splits a completion into file blocks. Text without markers yields no changes. */
const parseFileChanges = (response: string): ParsedFileChange[] => {
  const changes: ParsedFileChange[] = [];
  for (const match of response.matchAll(FILE_BLOCK_PATTERN)) {
    const path = (match[1] ?? "").trim();
    const content = stripWrappingFence((match[2] ?? "").trim());
    if (path.length === 0 || content.length === 0) {
      continue;
    }
    changes.push({ path, content });
  }
  return changes;
};

const resolveRepoPath = (repoRoot: string, filePath: string) => {
  if (filePath.trim().length === 0) {
    throw new Error("Path must not be empty.");
  }
  if (isAbsolute(filePath)) {
    throw new Error(`Path must be repo-relative: ${filePath}`);
  }

  const resolvedRoot = resolve(repoRoot);
  const resolvedPath = resolve(resolvedRoot, filePath);
  const rootPrefix = resolvedRoot.endsWith(sep) ? resolvedRoot : resolvedRoot + sep;

  if (resolvedPath === resolvedRoot || !resolvedPath.startsWith(rootPrefix)) {
    throw new Error(`Path escapes repo root: ${filePath}`);
  }

  return resolvedPath;
};

const fileExists = async (path: string) => {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
};

const applyFileChange = async (
  repoRoot: string,
  change: ParsedFileChange
): Promise<FileChangeResult> => {
  let target: string;
  try {
    target = resolveRepoPath(repoRoot, change.path);
  } catch (error) {
    const message = errorMessage(error);
    log.warn(`Rejected ${change.path}: ${message}`);
    return { path: change.path, success: false, message, change: "created" };
  }

  const existed = await fileExists(target);
  const kind = existed ? "modified" : "created";
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, change.content.endsWith("\n") ? change.content : `${change.content}\n`);
  } catch (error) {
    const message = `Failed to write ${change.path}: ${errorMessage(error)}`;
    log.error(message);
    return { path: change.path, success: false, message, change: kind };
  }

  log.info(`${existed ? "Updated" : "Created"} ${change.path}`);
  return {
    path: change.path,
    success: true,
    message: existed ? "File updated" : "File created",
    change: kind,
  };
};

/**
 * Writes changes sequentially; one file's failure never stops the rest.
 * An aborted `signal` rejects before the next file is touched.
 */
const applyFileChanges = async (
  repoRoot: string,
  changes: ParsedFileChange[],
  signal?: AbortSignal
) => {
  const results: FileChangeResult[] = [];
  for (const change of changes) {
    signal?.throwIfAborted();
    results.push(await applyFileChange(repoRoot, change));
  }
  return results;
};

const summarizeChanges = (results: FileChangeResult[]) => {
  if (results.length === 0) {
    return "No files were changed.";
  }
  const applied = results.filter((result) => result.success);
  const created = applied.filter((result) => result.change === "created").length;
  const modified = applied.length - created;
  const failed = results.length - applied.length;
  const parts = [`${modified} modified`, `${created} created`];
  if (failed > 0) {
    parts.push(`${failed} failed`);
  }
  return `Applied ${applied.length} of ${results.length} file changes (${parts.join(", ")}).`;
};

export { applyFileChanges, parseFileChanges, resolveRepoPath, summarizeChanges };
