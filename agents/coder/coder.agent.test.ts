import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApiError } from "../../core/errors";
import { createCoderAgent, generateReport } from "./coder.agent";
import type { CompletionRequest } from "./coder.types";

const completionReturning = (text: string) =>
  vi.fn(async (_request: CompletionRequest) => text);

describe("coder agent", () => {
  let repoDir: string;

  beforeEach(async () => {
    repoDir = await mkdtemp(join(tmpdir(), "coder-agent-test-"));
  });

  afterEach(async () => {
    await rm(repoDir, { recursive: true, force: true });
  });

  it("applies the files returned by the completion", async () => {
    await writeFile(join(repoDir, "app.ts"), "export const a = 1;\n");
    const complete = completionReturning("=== FILE: app.ts ===\n```ts\nexport const a = 2;\n```");
    const agent = createCoderAgent({ completion: { complete } });

    const report = await agent.modify(repoDir, "bump the constant");

    expect(report.success).toBe(true);
    expect(report.filesChanged).toBe(1);
    expect(report.results).toEqual([
      { path: "app.ts", success: true, message: "File updated", change: "modified" },
    ]);
    expect(await readFile(join(repoDir, "app.ts"), "utf-8")).toBe("export const a = 2;\n");

    const request = complete.mock.calls[0]?.[0];
    expect(request?.model).toBe("gpt-4o");
    expect(request?.temperature).toBe(0.2);
    expect(request?.maxTokens).toBe(4096);
    expect(request?.system).toContain("=== FILE: <relative path> ===");
    expect(request?.user).toContain("=== FILE: app.ts ===\nexport const a = 1;");
    expect(request?.user).toContain("Instruction: bump the constant");
  });

  it("reports a parse failure without throwing when the response has no markers", async () => {
    await writeFile(join(repoDir, "app.ts"), "export const a = 1;\n");
    const agent = createCoderAgent({
      completion: { complete: completionReturning("I could not find anything to change.") },
    });

    const report = await agent.modify(repoDir, "bump the constant");

    expect(report.success).toBe(false);
    expect(report.filesChanged).toBe(0);
    expect(report.results).toEqual([]);
    expect(report.errorKind).toBe("ParseError");
    expect(report.error).toBe("Completion response contained no file blocks.");
    expect(await readFile(join(repoDir, "app.ts"), "utf-8")).toBe("export const a = 1;\n");
  });

  it("writes a placeholder when the repository has no source files", async () => {
    const complete = completionReturning("=== FILE: index.js ===\nmain();");
    const agent = createCoderAgent({ completion: { complete } });

    const report = await agent.modify(repoDir, "simplify");

    expect(report.placeholderCreated).toBe(true);
    expect(report.success).toBe(true);
    expect(complete.mock.calls[0]?.[0].user).toContain("=== FILE: index.js ===");
    expect(await readFile(join(repoDir, "index.js"), "utf-8")).toBe("main();\n");
  });

  it("leaves an oversized entry file alone instead of replacing it with a placeholder", async () => {
    const original = "const x = 1;\n".repeat(2500);
    await writeFile(join(repoDir, "index.js"), original);
    const complete = completionReturning("Nothing to change.");
    const agent = createCoderAgent({ completion: { complete } });

    const report = await agent.modify(repoDir, "simplify");

    expect(report.success).toBe(false);
    expect(report.placeholderCreated).toBe(false);
    expect(report.error).toBe("No source files fit the collection limits.");
    expect(complete).not.toHaveBeenCalled();
    expect(await readFile(join(repoDir, "index.js"), "utf-8")).toBe(original);
  });

  it("never overwrites an existing file at the placeholder path", async () => {
    await writeFile(join(repoDir, "README.md"), "# Widgets\n");
    const complete = completionReturning("");
    const agent = createCoderAgent({
      completion: { complete },
      placeholder: { path: "README.md", content: "replaced\n" },
    });

    const report = await agent.modify(repoDir, "simplify");

    expect(report.success).toBe(false);
    expect(report.placeholderCreated).toBe(false);
    expect(report.errorKind).toBe("ResourceError");
    expect(report.error).toMatch(/^Could not create placeholder README\.md: /);
    expect(complete).not.toHaveBeenCalled();
    expect(await readFile(join(repoDir, "README.md"), "utf-8")).toBe("# Widgets\n");
  });

  it("stops before the completion call once the signal is aborted", async () => {
    await writeFile(join(repoDir, "app.ts"), "export const a = 1;\n");
    const complete = completionReturning("=== FILE: app.ts ===\nexport const a = 2;");
    const agent = createCoderAgent({ completion: { complete } });
    const controller = new AbortController();
    controller.abort(new Error("step timed out"));

    const report = await agent.modify(repoDir, "bump", { signal: controller.signal });

    expect(report.success).toBe(false);
    expect(report.error).toBe("step timed out");
    expect(complete).not.toHaveBeenCalled();
    expect(await readFile(join(repoDir, "app.ts"), "utf-8")).toBe("export const a = 1;\n");
  });

  it("fails without calling the API when placeholders are disabled", async () => {
    const complete = completionReturning("");
    const agent = createCoderAgent({ completion: { complete }, placeholder: false });

    const report = await agent.modify(repoDir, "simplify");

    expect(report.success).toBe(false);
    expect(report.error).toBe("No source files found to modify.");
    expect(complete).not.toHaveBeenCalled();
  });

  it("turns a completion API error into a failed report", async () => {
    await writeFile(join(repoDir, "app.ts"), "export const a = 1;\n");
    const agent = createCoderAgent({
      completion: {
        complete: async () => {
          throw new ApiError("Completion request failed: Internal error", 500);
        },
      },
    });

    const report = await agent.modify(repoDir, "bump");

    expect(report.success).toBe(false);
    expect(report.errorKind).toBe("ApiError");
    expect(report.error).toBe("Completion request failed: Internal error");
  });
});

describe("generateReport", () => {
  it("lists every file result", () => {
    const text = generateReport({
      success: false,
      filesChanged: 1,
      results: [
        { path: "a.ts", success: true, message: "File updated", change: "modified" },
        { path: "../b.ts", success: false, message: "Path escapes repo root: ../b.ts", change: "created" },
      ],
      summary: "Applied 1 of 2 file changes (1 modified, 0 created, 1 failed).",
      placeholderCreated: false,
      error: "1 of 2 file changes could not be applied.",
    });

    expect(text.split("\n")).toEqual([
      "=== CODE MODIFICATION REPORT ===",
      "",
      "Files changed: 1",
      "",
      "Applied 1 of 2 file changes (1 modified, 0 created, 1 failed).",
      "Error: 1 of 2 file changes could not be applied.",
      "",
      "=== DETAILED RESULTS ===",
      "a.ts: OK (modified) - File updated",
      "../b.ts: FAILED (created) - Path escapes repo root: ../b.ts",
    ]);
  });

  it("prints only the error when nothing was attempted", () => {
    const text = generateReport({
      success: false,
      filesChanged: 0,
      results: [],
      summary: "No files were changed.",
      placeholderCreated: false,
      error: "Completion response contained no file blocks.",
    });

    expect(text).toBe(
      "=== CODE MODIFICATION REPORT ===\n\nError: Completion response contained no file blocks."
    );
  });
});
