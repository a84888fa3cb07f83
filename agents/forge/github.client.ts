import { z } from "zod";
import { ApiError, errorMessage, fail, ok } from "../../core/errors";
import { logger } from "../../core/logger";
import type {
  ForgeClient,
  ForgeClientOptions,
  PullRequestInput,
  RepoInfo,
} from "./forge.types";

const log = logger.child("forge");

const DEFAULT_API_BASE_URL = "https://api.github.com";
const DEFAULT_USER_AGENT = "sandbox-git-workflow";

const pullRequestResponseSchema = z.object({
  html_url: z.string(),
  number: z.number().int(),
});

const errorResponseSchema = z.object({
  message: z.string(),
  errors: z
    .array(z.object({ message: z.string().optional() }).passthrough())
    .optional(),
});

const buildRepoInfo = (host: string, owner: string, repo: string): RepoInfo => {
  const name = repo.replace(/\.git$/i, "");
  if (owner.length === 0 || name.length === 0) {
    throw new Error("Repository URL missing owner or repo.");
  }
  return { host, owner, repo: name, fullName: `${owner}/${name}` };
};

/** Accepts `https://host/owner/repo(.git)` and `git@host:owner/repo(.git)`. */
const parseRepoUrl = (repoUrl: string): RepoInfo => {
  const trimmed = repoUrl.trim();
  if (trimmed.startsWith("git@")) {
    const match = /^git@([^:]+):([^/]+)\/(.+?)(?:\.git)?$/.exec(trimmed);
    if (!match) {
      throw new Error("Unsupported SSH repository URL format.");
    }
    return buildRepoInfo(match[1] ?? "", match[2] ?? "", match[3] ?? "");
  }

  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    const url = new URL(trimmed);
    const parts = url.pathname.replace(/^\/+|\/+$/g, "").split("/");
    if (parts.length < 2) {
      throw new Error("Repository URL missing owner or repo.");
    }
    return buildRepoInfo(url.hostname, parts[0] ?? "", parts[1] ?? "");
  }

  throw new Error("Unsupported repository URL format.");
};

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const describeFailure = (status: number, text: string) => {
  const parsed = errorResponseSchema.safeParse(parseJson(text));
  if (parsed.success) {
    const details = (parsed.data.errors ?? [])
      .map((entry) => entry.message)
      .filter((message): message is string => typeof message === "string");
    return details.length > 0
      ? `${parsed.data.message} (${details.join("; ")})`
      : parsed.data.message;
  }
  const raw = text.trim();
  return raw.length > 0 ? raw : `HTTP ${status}`;
};

const createGitHubClient = (options: ForgeClientOptions = {}): ForgeClient => {
  const apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
  const fetchImpl = options.fetch ?? fetch;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  const createPullRequest = async (input: PullRequestInput) => {
    if (input.token.trim().length === 0) {
      return fail(new ApiError("An access token is required to create pull requests.", 401));
    }
    if (!/^[^/\s]+\/[^/\s]+$/.test(input.repoFullName)) {
      return fail(
        new ApiError(`Invalid repository name "${input.repoFullName}", expected owner/repo.`, 0)
      );
    }

    const endpoint = `${apiBaseUrl}/repos/${input.repoFullName}/pulls`;
    log.info(`Creating pull request ${input.head} -> ${input.base} on ${input.repoFullName}`);

    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${input.token}`,
          Accept: "application/vnd.github+json",
          "Content-Type": "application/json",
          "User-Agent": userAgent,
          "X-GitHub-Api-Version": "2022-11-28",
        },
        body: JSON.stringify({
          title: input.title,
          head: input.head,
          base: input.base,
          body: input.body,
        }),
        signal: input.signal,
      });
      text = await response.text();
    } catch (error) {
      const message = `Pull request request failed: ${errorMessage(error)}`;
      log.error(message);
      return fail(new ApiError(message, 0));
    }

    if (!response.ok) {
      const message = `GitHub PR creation failed (${response.status}): ${describeFailure(
        response.status,
        text
      )}`;
      log.error(message);
      return fail(new ApiError(message, response.status));
    }

    const parsed = pullRequestResponseSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      return fail(
        new ApiError("GitHub pull request response is missing html_url or number.", response.status)
      );
    }

    log.success(`Opened pull request #${parsed.data.number}: ${parsed.data.html_url}`);
    return ok({ url: parsed.data.html_url, number: parsed.data.number });
  };

  return { createPullRequest };
};

export { createGitHubClient, parseRepoUrl };
