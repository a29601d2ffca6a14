import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { NotFoundError } from "./errors.js";

/**
 * Rewrites a transcript without its `lineNo`-th line (1-based) through a
 * temporary file renamed over it.
 */
export async function removeLine(filePath: string, lineNo: number): Promise<void> {
  const text = await readFile(filePath, "utf8");
  const endsWithNewline = text.endsWith("\n");
  const lines = text.split("\n");
  if (endsWithNewline) lines.pop();
  if (lineNo < 1 || lineNo > lines.length) {
    throw new NotFoundError(`line ${lineNo} not found in ${filePath}`);
  }

  lines.splice(lineNo - 1, 1);
  const next = lines.length > 0 ? `${lines.join("\n")}${endsWithNewline ? "\n" : ""}` : "";
  const tmpPath = `${filePath}.tmp`;
  try {
    await writeFile(tmpPath, next, "utf8");
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}
