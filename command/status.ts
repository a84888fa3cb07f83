import { resolve } from "node:path";
import type { Command } from "commander";
import type { AppConfig } from "../core/config";
import { isMissingFile } from "../core/errors";
import { logger } from "../core/logger";
import { getLatestRunDir, getRunDir, readRunJournal } from "../orchestrator/artifacts";
import type { JournalEntry } from "../orchestrator/artifacts";

interface StatusSnapshot {
  journal?: JournalEntry;
  runDir?: string;
  warning?: string;
}

const RUN_ID_PATTERN = /^[\w-]+$/;

const readStatusSnapshot = async (
  runsRoot: string,
  runId?: string
): Promise<StatusSnapshot> => {
  const id = runId?.trim();
  if (id && !RUN_ID_PATTERN.test(id)) {
    throw new Error(`Invalid run id "${id}": use letters, digits, "_" or "-".`);
  }
  const runDir = id ? getRunDir(runsRoot, id) : await getLatestRunDir(runsRoot);
  if (!runDir) {
    return { warning: `No runs found under ${runsRoot}.` };
  }

  try {
    return { journal: await readRunJournal(runDir), runDir: resolve(runDir) };
  } catch (error) {
    if (isMissingFile(error)) {
      return {
        warning: id ? `No journal found for run ${id}.` : `No journal found in ${runDir}.`,
      };
    }
    throw error;
  }
};

const printSnapshot = (snapshot: StatusSnapshot) => {
  if (snapshot.warning) {
    logger.warn(snapshot.warning);
    return;
  }
  if (snapshot.journal) {
    console.log(JSON.stringify({ runDir: snapshot.runDir, ...snapshot.journal }, null, 2));
    return;
  }
  logger.warn("No status information available.");
};

export const registerStatusCommand = (program: Command, config: AppConfig) => {
  program
    .command("status [runId]")
    .description("Show the journaled result of the latest run or of a specific run id.")
    .action(async (runId: string | undefined) => {
      printSnapshot(await readStatusSnapshot(config.runsRoot, runId));
    });
};

export { readStatusSnapshot };
