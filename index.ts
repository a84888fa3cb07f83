import { Command } from "commander";
import { registerModifyCommand } from "./command/modify";
import { registerRunCommand } from "./command/run";
import { registerStatusCommand } from "./command/status";
import { registerValidateCommand } from "./command/validate";
import { describeConfig, loadConfig } from "./core/config";
import { errorMessage } from "./core/errors";
import { logger, setLogLevel } from "./core/logger";

const config = loadConfig();
setLogLevel(config.logLevel);
logger.debug("Loaded configuration", { scope: "config", data: describeConfig(config) });

const program = new Command();

program
  .name("sandbox-git-workflow")
  .description("Run git change workflows against remote repositories in disposable sandboxes.")
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => cmd.name(),
  });

registerRunCommand(program, config);
registerValidateCommand(program, config);
registerModifyCommand(program, config);
registerStatusCommand(program, config);

program.parseAsync().catch((error: unknown) => {
  logger.error(errorMessage(error), { data: config.logLevel === "debug" ? error : undefined });
  process.exitCode = 1;
});
