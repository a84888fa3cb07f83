import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveInstructionInput } from "./task-input";

describe("resolveInstructionInput", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "instruction-input-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns literal text trimmed", async () => {
    await expect(resolveInstructionInput("  add logging  ", dir)).resolves.toEqual({
      instruction: "add logging",
    });
  });

  it("reads a markdown file", async () => {
    await writeFile(join(dir, "task.md"), "\n# Rename the helper\n");

    expect(await resolveInstructionInput("task.md", dir)).toEqual({
      instruction: "# Rename the helper",
      filePath: join(dir, "task.md"),
    });
  });

  it("reads a json string or its instruction field", async () => {
    await writeFile(join(dir, "plain.json"), JSON.stringify(" Fix typo "));
    await writeFile(join(dir, "object.json"), JSON.stringify({ instruction: "Add tests" }));

    expect((await resolveInstructionInput("plain.json", dir)).instruction).toBe("Fix typo");
    expect((await resolveInstructionInput("object.json", dir)).instruction).toBe("Add tests");
  });

  it("rejects a json file without an instruction", async () => {
    await writeFile(join(dir, "other.json"), JSON.stringify({ prompt: "Add tests" }));

    await expect(resolveInstructionInput("other.json", dir)).rejects.toThrow(
      `${join(dir, "other.json")} must hold a non-empty string or an object with an "instruction" string.`
    );
  });

  it("rejects an empty markdown file", async () => {
    await writeFile(join(dir, "blank.md"), "  \n");

    await expect(resolveInstructionInput("blank.md", dir)).rejects.toThrow(
      `${join(dir, "blank.md")} is empty.`
    );
  });

  it("treats a missing markdown path as literal text", async () => {
    expect(await resolveInstructionInput("notes.md", dir)).toEqual({ instruction: "notes.md" });
  });

  it("rejects blank input", async () => {
    await expect(resolveInstructionInput("   ", dir)).rejects.toThrow("Instruction must not be empty.");
  });
});
