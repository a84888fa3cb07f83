import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { isMissingFile } from "../core/errors";
import type { WorkflowResult } from "./orchestrator.types";

const RUN_FILE = "run.json";

const stepResultSchema = z.object({
  name: z.string(),
  status: z.enum(["success", "failure", "skipped"]),
  reason: z.string().optional(),
  error: z.string().optional(),
  errorKind: z.string().optional(),
  durationMs: z.number(),
});

/** Shape checked when reading a journal back; payloads are kept as written. */
const journalSchema = z
  .object({
    runId: z.string(),
    success: z.boolean(),
    status: z.enum(["pending", "running", "succeeded", "failed", "aborted"]),
    steps: z.array(stepResultSchema.passthrough()),
    error: z.string().optional(),
    branch: z.string(),
    commitHash: z.string().optional(),
    prUrl: z.string().optional(),
    sandboxPath: z.string().optional(),
    startedAt: z.string(),
    finishedAt: z.string(),
  })
  .passthrough();

type JournalEntry = z.infer<typeof journalSchema>;

const ensureDir = async (path: string) => {
  await mkdir(path, { recursive: true });
};

const writeJson = async (path: string, data: unknown) => {
  const payload = JSON.stringify(data, null, 2);
  await writeFile(path, `${payload}\n`);
};

const readJson = async (path: string): Promise<unknown> => {
  const text = await readFile(path, "utf-8");
  return JSON.parse(text);
};

const getRunDir = (runsRoot: string, runId: string) => join(runsRoot, runId);

const writeRunJournal = async (runsRoot: string, result: WorkflowResult) => {
  const runDir = getRunDir(runsRoot, result.runId);
  await ensureDir(runDir);
  const path = join(runDir, RUN_FILE);
  await writeJson(path, result);
  return path;
};

const readRunJournal = async (runDir: string): Promise<JournalEntry> => {
  const parsed = journalSchema.safeParse(await readJson(join(runDir, RUN_FILE)));
  if (!parsed.success) {
    throw new Error(`Malformed run journal in ${runDir}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
};

const getRunDirectories = async (runsRoot: string) => {
  try {
    const entries = await readdir(runsRoot, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => join(runsRoot, entry.name));
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
};

const getLatestRunDir = async (runsRoot: string) => {
  const runDirs = await getRunDirectories(runsRoot);
  const [first, ...rest] = runDirs;
  if (!first) {
    return null;
  }

  let latestDir = first;
  let latestTime = (await stat(first)).mtimeMs;

  for (const runDir of rest) {
    const currentTime = (await stat(runDir)).mtimeMs;
    if (currentTime > latestTime) {
      latestTime = currentTime;
      latestDir = runDir;
    }
  }

  return latestDir;
};

export { getLatestRunDir, getRunDir, readRunJournal, writeRunJournal };
export type { JournalEntry };
