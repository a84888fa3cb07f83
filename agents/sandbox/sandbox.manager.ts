import { randomBytes } from "node:crypto";
import { mkdir, rm, stat } from "node:fs/promises";
import { isAbsolute, join, relative, resolve } from "node:path";
import { ResourceError, errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import type {
  Sandbox,
  SandboxManager,
  SandboxManagerOptions,
} from "./sandbox.types";

const log = logger.child("sandbox");

// 8 random bytes: 64 bits per name.
const SUFFIX_BYTES = 8;

const slugifySandboxName = (value: string) => {
  const normalized = value
    .trim()
    .toLowerCase()
    .replace(/\.git$/, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return normalized.length > 40 ? normalized.slice(0, 40) : normalized;
};

const buildSandboxName = (name?: string) => {
  const suffix = randomBytes(SUFFIX_BYTES).toString("hex");
  const slug = name ? slugifySandboxName(name) : "";
  return slug.length > 0 ? `sandbox-${slug}-${suffix}` : `sandbox-${suffix}`;
};

const isInside = (rootDir: string, target: string) => {
  const rel = relative(rootDir, target);
  return rel.length > 0 && !rel.startsWith("..") && !isAbsolute(rel);
};

const isDirectory = async (path: string) => {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
};

const createSandboxManager = (
  options: SandboxManagerOptions
): SandboxManager => {
  const rootDir = resolve(options.rootDir);
  const workingDir = options.workingDir ? resolve(options.workingDir) : undefined;

  const acquire = async (name?: string): Promise<Sandbox> => {
    if (workingDir) {
      if (!(await isDirectory(workingDir))) {
        throw new ResourceError(
          `Working directory does not exist: ${workingDir}`,
          workingDir
        );
      }
      log.info(`Using caller-owned working directory ${workingDir}`);
      return { path: workingDir, owned: false };
    }

    try {
      await mkdir(rootDir, { recursive: true });
    } catch (error) {
      throw new ResourceError(
        `Failed to create sandbox root ${rootDir}: ${errorMessage(error)}`,
        rootDir
      );
    }

    const path = join(rootDir, buildSandboxName(name));
    try {
      // Non-recursive: an existing directory is a collision, never reused.
      await mkdir(path);
    } catch (error) {
      throw new ResourceError(
        `Failed to create sandbox ${path}: ${errorMessage(error)}`,
        path
      );
    }

    log.info(`Created sandbox at ${path}`);
    return { path, owned: true };
  };

  const release = async (sandbox: Sandbox) => {
    if (!sandbox.owned) {
      log.info(`Leaving caller-owned directory in place: ${sandbox.path}`);
      return;
    }

    const target = resolve(sandbox.path);
    if (!isInside(rootDir, target)) {
      log.warn(`Refusing to delete directory outside sandbox root: ${target}`);
      return;
    }

    try {
      await rm(target, { recursive: true, force: true });
    } catch (error) {
      throw new ResourceError(
        `Failed to delete sandbox ${target}: ${errorMessage(error)}`,
        target
      );
    }
    log.info(`Released sandbox ${target}`);
  };

  const withSandbox = async <T>(
    name: string | undefined,
    scope: (sandbox: Sandbox) => Promise<T>
  ): Promise<T> => {
    const sandbox = await acquire(name);
    try {
      return await scope(sandbox);
    } finally {
      await release(sandbox);
    }
  };

  return { rootDir, acquire, release, withSandbox };
};

export { createSandboxManager, slugifySandboxName };
