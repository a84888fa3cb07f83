import { mkdtemp, mkdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ResourceError } from "../../core/errors";
import { createSandboxManager, slugifySandboxName } from "./sandbox.manager";

const exists = async (path: string) => {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
};

describe("sandbox manager", () => {
  let tempDir: string;
  let rootDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "sandbox-manager-test-"));
    rootDir = join(tempDir, "sandboxes");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("creates the root and a fresh owned directory inside it", async () => {
    const manager = createSandboxManager({ rootDir });
    const sandbox = await manager.acquire();

    expect(sandbox.owned).toBe(true);
    expect(dirname(sandbox.path)).toBe(rootDir);
    expect(basename(sandbox.path)).toMatch(/^sandbox-[0-9a-f]{16}$/);
    expect((await stat(sandbox.path)).isDirectory()).toBe(true);
  });

  it("derives the directory name from the requested name", async () => {
    const manager = createSandboxManager({ rootDir });
    const sandbox = await manager.acquire("My Repo");

    expect(basename(sandbox.path)).toMatch(/^sandbox-my-repo-[0-9a-f]{16}$/);
  });

  it("returns distinct paths for overlapping acquisitions", async () => {
    const manager = createSandboxManager({ rootDir });
    const sandboxes = await Promise.all(
      Array.from({ length: 25 }, () => manager.acquire("same-name"))
    );

    const paths = new Set(sandboxes.map((sandbox) => sandbox.path));
    expect(paths.size).toBe(25);
  });

  it("deletes the sandbox tree on release", async () => {
    const manager = createSandboxManager({ rootDir });
    const sandbox = await manager.acquire();
    await mkdir(join(sandbox.path, "nested"));
    await writeFile(join(sandbox.path, "nested", "file.txt"), "content");

    await manager.release(sandbox);

    expect(await exists(sandbox.path)).toBe(false);
    expect(await exists(rootDir)).toBe(true);
  });

  it("treats releasing an absent sandbox as success", async () => {
    const manager = createSandboxManager({ rootDir });
    const sandbox = await manager.acquire();

    await manager.release(sandbox);
    await expect(manager.release(sandbox)).resolves.toBeUndefined();
    await expect(
      manager.release({ path: join(rootDir, "sandbox-never-created"), owned: true })
    ).resolves.toBeUndefined();
  });

  it("refuses to delete a directory outside the root", async () => {
    const manager = createSandboxManager({ rootDir });
    const outside = join(tempDir, "outside");
    await mkdir(outside);

    await manager.release({ path: outside, owned: true });

    expect(await exists(outside)).toBe(true);
  });

  it("fails with ResourceError when the root cannot be created", async () => {
    const blocked = join(tempDir, "blocked");
    await writeFile(blocked, "not a directory");
    const manager = createSandboxManager({ rootDir: blocked });

    await expect(manager.acquire()).rejects.toBeInstanceOf(ResourceError);
  });

  it("uses a caller-owned working directory without deleting it", async () => {
    const workingDir = join(tempDir, "mine");
    await mkdir(workingDir);
    const manager = createSandboxManager({ rootDir, workingDir });

    const sandbox = await manager.acquire();
    expect(sandbox).toEqual({ path: workingDir, owned: false });

    await manager.release(sandbox);
    expect(await exists(workingDir)).toBe(true);
  });

  it("rejects a missing caller-owned working directory", async () => {
    const manager = createSandboxManager({
      rootDir,
      workingDir: join(tempDir, "missing"),
    });

    await expect(manager.acquire()).rejects.toBeInstanceOf(ResourceError);
  });

  it("releases the sandbox when the scope throws", async () => {
    const manager = createSandboxManager({ rootDir });
    let seenPath = "";

    await expect(
      manager.withSandbox("scoped", async (sandbox) => {
        seenPath = sandbox.path;
        throw new Error("scope failed");
      })
    ).rejects.toThrow("scope failed");

    expect(seenPath.length).toBeGreaterThan(0);
    expect(await exists(seenPath)).toBe(false);
  });
});

describe("slugifySandboxName", () => {
  it("normalizes repository urls", () => {
    expect(slugifySandboxName("https://github.com/acme/widgets.git")).toBe(
      "https-github-com-acme-widgets"
    );
  });
});
