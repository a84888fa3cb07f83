type WorkflowErrorKind =
  | "ResourceError"
  | "GitError"
  | "ApiError"
  | "ValidationFailure"
  | "ParseError"
  | "TimeoutError"
  | "UnexpectedError";

class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly kind: WorkflowErrorKind
  ) {
    super(message);
    this.name = kind;
  }
}

/** Sandbox directory could not be created, validated or deleted. */
class ResourceError extends WorkflowError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message, "ResourceError");
  }
}

/** A git invocation exited non-zero or could not be spawned. */
class GitError extends WorkflowError {
  constructor(
    message: string,
    public readonly stderr: string,
    public readonly exitCode: number,
    public readonly args: string[]
  ) {
    super(message, "GitError");
  }
}

/** Forge or completion API answered non-2xx, or the request never completed (statusCode 0). */
class ApiError extends WorkflowError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message, "ApiError");
  }
}

class ValidationFailure extends WorkflowError {
  constructor(
    message: string,
    public readonly failed: string[]
  ) {
    super(message, "ValidationFailure");
  }
}

class ParseError extends WorkflowError {
  constructor(message: string) {
    super(message, "ParseError");
  }
}

class TimeoutError extends WorkflowError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, "TimeoutError");
  }
}

type OperationResult<T, E extends WorkflowError = WorkflowError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

const fail = <E extends WorkflowError>(error: E): { ok: false; error: E } => ({
  ok: false,
  error,
});

const errorMessage = (error: unknown, fallback = "Unknown error.") => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string" && error.length > 0) {
    return error;
  }
  return fallback;
};

const errorKind = (error: unknown): WorkflowErrorKind =>
  error instanceof WorkflowError ? error.kind : "UnexpectedError";

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export {
  ApiError,
  GitError,
  ParseError,
  ResourceError,
  TimeoutError,
  ValidationFailure,
  WorkflowError,
  errorKind,
  errorMessage,
  fail,
  isMissingFile,
  ok,
};

export type { OperationResult, WorkflowErrorKind };
