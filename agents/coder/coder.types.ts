import type { WorkflowErrorKind } from "../../core/errors";

interface CollectOptions {
  maxFiles: number;
  maxTotalLines: number;
  extensions: string[];
  ignoredDirectories: string[];
}

interface CollectedFile {
  /** Repo-relative, forward slashes. */
  path: string;
  content: string;
  lineCount: number;
}

interface CodeBundle {
  files: CollectedFile[];
  totalLines: number;
  text: string;
}

interface ParsedFileChange {
  path: string;
  content: string;
}

interface FileChangeResult {
  path: string;
  success: boolean;
  message: string;
  change: "created" | "modified";
}

interface CodeModificationReport {
  success: boolean;
  filesChanged: number;
  results: FileChangeResult[];
  summary: string;
  placeholderCreated: boolean;
  error?: string;
  errorKind?: WorkflowErrorKind;
}

interface CompletionRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/** Returns the completion text; rejects with ApiError on API failure. */
interface CompletionClient {
  complete: (request: CompletionRequest) => Promise<string>;
}

interface PlaceholderFile {
  path: string;
  content: string;
}

interface CoderAgentOptions {
  completion: CompletionClient;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  systemPromptPath?: string;
  collect?: Partial<CollectOptions>;
  /**
   * Written when the repo has no candidate source files at all; never
   * overwrites an existing file. `false` disables it.
   */
  placeholder?: PlaceholderFile | false;
}

interface ModifyOptions {
  /** Checked before the placeholder write, the completion call and each file write. */
  signal?: AbortSignal;
}

interface CoderAgent {
  modify: (
    repoPath: string,
    instruction: string,
    options?: ModifyOptions
  ) => Promise<CodeModificationReport>;
}

export type {
  CodeBundle,
  CodeModificationReport,
  CoderAgent,
  CoderAgentOptions,
  CollectOptions,
  CollectedFile,
  CompletionClient,
  CompletionRequest,
  FileChangeResult,
  ModifyOptions,
  ParsedFileChange,
  PlaceholderFile,
};
