import { resolve } from "node:path";
import type { Command } from "commander";
import { generateReport } from "../agents/coder/coder.agent";
import type { AppConfig } from "../core/config";
import { resolveInstructionInput } from "../core/task-input";
import { createCoder } from "./shared";

interface ModifyOptions {
  instruction: string;
}

export const registerModifyCommand = (program: Command, config: AppConfig) => {
  program
    .command("modify <dir>")
    .description("Run the code-modification tool on a local directory.")
    .requiredOption("--instruction <text>", "Change instruction, or a .md/.json file holding one.")
    .action(async (dir: string, options: ModifyOptions) => {
      const { instruction } = await resolveInstructionInput(options.instruction);
      const report = await createCoder(config).modify(resolve(dir), instruction);
      console.log(generateReport(report));
      if (!report.success) {
        process.exitCode = 1;
      }
    });
};
