import { readFile, readdir } from "node:fs/promises";
import { extname, join } from "node:path";
import { logger } from "../../core/logger";
import type { CodeBundle, CollectOptions, CollectedFile } from "./coder.types";

const log = logger.child("coder");

const DEFAULT_COLLECT_OPTIONS: CollectOptions = {
  maxFiles: 5,
  maxTotalLines: 2000,
  extensions: [".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs", ".py"],
  ignoredDirectories: [".git", "node_modules", "__pycache__", "venv", ".venv", "dist"],
};

const FILE_MARKER_PREFIX = "=== FILE: ";
const FILE_MARKER_SUFFIX = " ===";

const formatFileMarker = (path: string) =>
  `${FILE_MARKER_PREFIX}${path}${FILE_MARKER_SUFFIX}`;

const countLines = (content: string) => content.split("\n").length;

const compareNames = (left: string, right: string) =>
  left < right ? -1 : left > right ? 1 : 0;

/** Repo-relative paths of candidate files, depth-first in lexicographic order. */
const listSourceFiles = async (
  rootDir: string,
  options: CollectOptions,
  relativeDir = ""
): Promise<string[]> => {
  const entries = await readdir(join(rootDir, relativeDir), { withFileTypes: true });
  const sorted = [...entries].sort((left, right) => compareNames(left.name, right.name));
  const extensions = new Set(options.extensions.map((ext) => ext.toLowerCase()));
  const files: string[] = [];

  for (const entry of sorted) {
    const relativePath = relativeDir.length > 0 ? `${relativeDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (options.ignoredDirectories.includes(entry.name)) {
        continue;
      }
      files.push(...(await listSourceFiles(rootDir, options, relativePath)));
      continue;
    }
    if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      files.push(relativePath);
    }
  }

  return files;
};

/** True when any file matches the extension and directory filters, whatever its size. */
const hasSourceCandidates = async (
  rootDir: string,
  overrides: Partial<CollectOptions> = {}
) => (await listSourceFiles(rootDir, { ...DEFAULT_COLLECT_OPTIONS, ...overrides })).length > 0;

const collectSourceFiles = async (
  rootDir: string,
  overrides: Partial<CollectOptions> = {}
): Promise<CollectedFile[]> => {
  const options = { ...DEFAULT_COLLECT_OPTIONS, ...overrides };
  const candidates = await listSourceFiles(rootDir, options);
  const collected: CollectedFile[] = [];
  let totalLines = 0;

  for (const path of candidates) {
    if (collected.length >= options.maxFiles) {
      log.info(`Reached maximum number of files (${options.maxFiles})`);
      break;
    }

    let content: string;
    try {
      content = await readFile(join(rootDir, path), "utf-8");
    } catch (error) {
      log.warn(`Skipping unreadable file ${path}`, { data: error });
      continue;
    }
    if (content.length === 0) {
      continue;
    }

    const lineCount = countLines(content);
    if (totalLines + lineCount > options.maxTotalLines) {
      log.info(`Reached maximum total lines (${options.maxTotalLines})`);
      break;
    }

    collected.push({ path, content, lineCount });
    totalLines += lineCount;
  }

  return collected;
};

const bundleFiles = (files: CollectedFile[]): CodeBundle => {
  const text = files
    .map((file) => `\n${formatFileMarker(file.path)}\n${file.content}\n`)
    .join("")
    .trim();
  const totalLines = files.reduce((sum, file) => sum + file.lineCount, 0);
  log.info(`Bundled ${files.length} files with a total of ${totalLines} lines`);
  return { files, totalLines, text };
};

export { bundleFiles, collectSourceFiles, countLines, hasSourceCandidates };
