import { readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { z } from "zod";
import { ParseError, errorMessage, isMissingFile } from "./errors";

interface InstructionInput {
  instruction: string;
  /** Set when the instruction came from a file. */
  filePath?: string;
}

const instructionText = z.string().trim().min(1, "Instruction must not be empty.");

/** A JSON instruction file holds a string or `{ "instruction": "..." }`. */
const instructionFileSchema = z.union([
  instructionText,
  z.object({ instruction: instructionText }).transform((value) => value.instruction),
]);

const readInstructionFile = async (filePath: string) => {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }
};

const parseInstructionFile = (filePath: string, text: string) => {
  if (extname(filePath).toLowerCase() === ".md") {
    const parsed = instructionText.safeParse(text);
    if (!parsed.success) {
      throw new ParseError(`${filePath} is empty.`);
    }
    return parsed.data;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`);
  }
  const parsed = instructionFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(
      `${filePath} must hold a non-empty string or an object with an "instruction" string.`
    );
  }
  return parsed.data;
};

/** `--instruction` value: literal text, or a `.md`/`.json` file when one exists at that path. */
const resolveInstructionInput = async (
  input: string,
  cwd: string = process.cwd()
): Promise<InstructionInput> => {
  const ext = extname(input).toLowerCase();
  if (ext === ".md" || ext === ".json") {
    const filePath = resolve(cwd, input);
    const text = await readInstructionFile(filePath);
    if (text !== undefined) {
      return { instruction: parseInstructionFile(filePath, text), filePath };
    }
  }
  const literal = instructionText.safeParse(input);
  if (!literal.success) {
    throw new Error("Instruction must not be empty.");
  }
  return { instruction: literal.data };
};

export { resolveInstructionInput };
export type { InstructionInput };
