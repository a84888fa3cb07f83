interface Sandbox {
  path: string;
  /** False for a caller-supplied working directory, which release never deletes. */
  owned: boolean;
}

interface SandboxManagerOptions {
  rootDir: string;
  /** Externally owned directory used instead of a generated sandbox. */
  workingDir?: string;
}

interface SandboxManager {
  readonly rootDir: string;
  acquire: (name?: string) => Promise<Sandbox>;
  release: (sandbox: Sandbox) => Promise<void>;
  withSandbox: <T>(
    name: string | undefined,
    scope: (sandbox: Sandbox) => Promise<T>
  ) => Promise<T>;
}

export type { Sandbox, SandboxManager, SandboxManagerOptions };
