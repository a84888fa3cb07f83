import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { z } from "zod";
import { logger } from "./logger";

const DEFAULT_SANDBOX_ROOT = ".orchestrator/sandboxes";
const DEFAULT_RUNS_ROOT = ".orchestrator/runs";
const DEFAULT_GITHUB_API_URL = "https://api.github.com";
const DEFAULT_OPENAI_MODEL = "gpt-4o";

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : undefined;
  });

const envSchema = z.object({
  GITHUB_TOKEN: optionalSecret,
  GITHUB_API_URL: z.string().url().default(DEFAULT_GITHUB_API_URL),
  GIT_AUTHOR_NAME: optionalSecret,
  GIT_AUTHOR_EMAIL: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_OPENAI_MODEL),
  SANDBOX_ROOT: z.string().min(1).default(DEFAULT_SANDBOX_ROOT),
  DEFAULT_REPO_URL: optionalSecret,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

interface AppConfig {
  githubToken?: string;
  githubApiUrl: string;
  gitAuthorName?: string;
  gitAuthorEmail?: string;
  openaiApiKey?: string;
  openaiModel: string;
  sandboxRoot: string;
  runsRoot: string;
  defaultRepoUrl?: string;
  logLevel: "debug" | "info" | "warn" | "error";
}

/** Reads `.env` from `cwd` into `process.env` without overriding values already set. */
const loadEnvFile = (cwd: string = process.cwd()) => {
  const result = loadDotenv({ path: resolve(cwd, ".env") });
  if (result.error) {
    logger.debug("No .env file loaded.", { scope: "config" });
  }
};

const parseConfig = (
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    githubToken: values.GITHUB_TOKEN,
    githubApiUrl: values.GITHUB_API_URL,
    gitAuthorName: values.GIT_AUTHOR_NAME,
    gitAuthorEmail: values.GIT_AUTHOR_EMAIL,
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL,
    sandboxRoot: resolve(cwd, values.SANDBOX_ROOT),
    runsRoot: resolve(cwd, DEFAULT_RUNS_ROOT),
    defaultRepoUrl: values.DEFAULT_REPO_URL,
    logLevel: values.LOG_LEVEL,
  };
};

const maskSecret = (value: string) =>
  value.length > 4 ? `${value.slice(0, 4)}****` : "****";

/** Builds the `user.name` / `user.email` git config from overrides, falling back to the env defaults. */
const resolveGitIdentity = (
  config: AppConfig,
  overrides: { name?: string; email?: string } = {}
): Record<string, string> => {
  const identity: Record<string, string> = {};
  const name = overrides.name ?? config.gitAuthorName;
  const email = overrides.email ?? config.gitAuthorEmail;
  if (name) {
    identity["user.name"] = name;
  }
  if (email) {
    identity["user.email"] = email;
  }
  return identity;
};

const describeConfig = (config: AppConfig) => ({
  githubToken: config.githubToken ? maskSecret(config.githubToken) : "(not set)",
  githubApiUrl: config.githubApiUrl,
  gitAuthorName: config.gitAuthorName ?? "(not set)",
  gitAuthorEmail: config.gitAuthorEmail ?? "(not set)",
  openaiApiKey: config.openaiApiKey ? maskSecret(config.openaiApiKey) : "(not set)",
  openaiModel: config.openaiModel,
  sandboxRoot: config.sandboxRoot,
});

const loadConfig = (cwd: string = process.cwd()): AppConfig => {
  loadEnvFile(cwd);
  return parseConfig(process.env, cwd);
};

export {
  describeConfig,
  loadConfig,
  maskSecret,
  parseConfig,
  resolveGitIdentity,
};
export type { AppConfig };
