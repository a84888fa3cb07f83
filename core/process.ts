import { spawn } from "node:child_process";

interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  /** Aborting kills the child and resolves with `SPAWN_FAILURE_EXIT_CODE`. */
  signal?: AbortSignal;
}

/**
 * Runs an external program to completion. Never rejects: a program that
 * cannot be spawned resolves with exit code 127 and the spawn error in stderr.
 */
type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;

const SPAWN_FAILURE_EXIT_CODE = 127;

const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolveResult) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const settle = (result: CommandResult) => {
      if (settled) {
        return;
      }
      settled = true;
      resolveResult(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
      signal: options.signal,
    });

    child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    child.on("error", (error) => {
      settle({
        ok: false,
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: error.message,
        exitCode: SPAWN_FAILURE_EXIT_CODE,
      });
    });

    child.on("close", (code, signal) => {
      const stderr = Buffer.concat(stderrChunks).toString("utf-8");
      const exitCode = code ?? 1;
      settle({
        ok: exitCode === 0,
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: signal ? `${stderr}Terminated by ${signal}.` : stderr,
        exitCode,
      });
    });
  });

const formatCommandLine = (command: string, args: string[]) =>
  [command, ...args].join(" ");

/** First non-empty stream of a finished command, for error messages. */
const commandOutput = (result: CommandResult, fallback: string) => {
  const stderr = result.stderr.trim();
  if (stderr.length > 0) {
    return stderr;
  }
  const stdout = result.stdout.trim();
  return stdout.length > 0 ? stdout : fallback;
};

export { SPAWN_FAILURE_EXIT_CODE, commandOutput, formatCommandLine, runCommand };
export type { CommandOptions, CommandResult, CommandRunner };
