import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  applyFileChanges,
  parseFileChanges,
  resolveRepoPath,
  summarizeChanges,
} from "./code.updater";

describe("parseFileChanges", () => {
  it("splits blocks at each marker", () => {
    const response = "=== FILE: a.ts ===\nconst a = 1;\n\n=== FILE: lib/b.ts ===\nconst b = 2;\n";

    expect(parseFileChanges(response)).toEqual([
      { path: "a.ts", content: "const a = 1;" },
      { path: "lib/b.ts", content: "const b = 2;" },
    ]);
  });

  it("removes a wrapping markdown fence", () => {
    const response = "=== FILE: a.ts ===\n```ts\nconst a = 2;\n```";

    expect(parseFileChanges(response)).toEqual([{ path: "a.ts", content: "const a = 2;" }]);
  });

  it("drops empty blocks", () => {
    const response = "=== FILE: a.ts ===\n\n=== FILE: b.ts ===\nb";

    expect(parseFileChanges(response)).toEqual([{ path: "b.ts", content: "b" }]);
  });

  it("returns nothing for a response without markers", () => {
    expect(parseFileChanges("Sure, here is the updated code:\nconst a = 1;")).toEqual([]);
  });
});

describe("resolveRepoPath", () => {
  it("rejects absolute and escaping paths", () => {
    expect(() => resolveRepoPath("/repo", "/etc/passwd")).toThrow(
      "Path must be repo-relative: /etc/passwd"
    );
    expect(() => resolveRepoPath("/repo", "../other/file.ts")).toThrow(
      "Path escapes repo root: ../other/file.ts"
    );
  });

  it("resolves nested paths inside the root", () => {
    expect(resolveRepoPath("/repo", "src/./a.ts")).toBe("/repo/src/a.ts");
  });
});

describe("applyFileChanges", () => {
  let repoDir: string;

  beforeEach(async () => {
    repoDir = await mkdtemp(join(tmpdir(), "code-updater-test-"));
    await writeFile(join(repoDir, "keep.ts"), "old\n");
  });

  afterEach(async () => {
    await rm(repoDir, { recursive: true, force: true });
  });

  it("writes each file and fails only the escaping one", async () => {
    const results = await applyFileChanges(repoDir, [
      { path: "keep.ts", content: "new" },
      { path: "lib/new.ts", content: "n\n" },
      { path: "../escape.ts", content: "x" },
    ]);

    expect(results).toEqual([
      { path: "keep.ts", success: true, message: "File updated", change: "modified" },
      { path: "lib/new.ts", success: true, message: "File created", change: "created" },
      {
        path: "../escape.ts",
        success: false,
        message: "Path escapes repo root: ../escape.ts",
        change: "created",
      },
    ]);
    expect(await readFile(join(repoDir, "keep.ts"), "utf-8")).toBe("new\n");
    expect(await readFile(join(repoDir, "lib", "new.ts"), "utf-8")).toBe("n\n");
    await expect(stat(join(repoDir, "..", "escape.ts"))).rejects.toThrow();
    expect(summarizeChanges(results)).toBe(
      "Applied 2 of 3 file changes (1 modified, 1 created, 1 failed)."
    );
  });

  it("writes nothing once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(
      applyFileChanges(repoDir, [{ path: "lib/late.ts", content: "x" }], controller.signal)
    ).rejects.toThrow("cancelled");
    await expect(stat(join(repoDir, "lib"))).rejects.toThrow();
  });

  it("summarizes an empty result list", () => {
    expect(summarizeChanges([])).toBe("No files were changed.");
  });
});
