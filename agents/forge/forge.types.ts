import type { ApiError, OperationResult } from "../../core/errors";

interface RepoInfo {
  host: string;
  owner: string;
  repo: string;
  /** `owner/repo` */
  fullName: string;
}

interface PullRequestInput {
  token: string;
  repoFullName: string;
  base: string;
  head: string;
  title: string;
  body: string;
  signal?: AbortSignal;
}

interface PullRequest {
  url: string;
  number: number;
}

interface ForgeClientOptions {
  apiBaseUrl?: string;
  fetch?: typeof fetch;
  userAgent?: string;
}

interface ForgeClient {
  createPullRequest: (
    input: PullRequestInput
  ) => Promise<OperationResult<PullRequest, ApiError>>;
}

export type {
  ForgeClient,
  ForgeClientOptions,
  PullRequest,
  PullRequestInput,
  RepoInfo,
};
