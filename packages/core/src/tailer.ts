import { open, stat } from "node:fs/promises";
import type { FileCursor } from "./cursorStore.js";

export interface TailLine {
  lineNo: number;
  text: string;
}

export interface TailResult {
  lines: TailLine[];
  cursor: FileCursor;
  /** The file shrank below the stored offset and was read again from zero. */
  restarted: boolean;
  bytesRead: number;
  mtimeMs: number;
}

const NEWLINE = 0x0a;

async function readFileChunk(filePath: string, offset: number, length: number): Promise<Buffer> {
  if (length <= 0) return Buffer.alloc(0);
  const fileHandle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await fileHandle.read(buffer, 0, buffer.length, offset);
    return buffer.subarray(0, Math.max(0, bytesRead));
  } finally {
    await fileHandle.close();
  }
}

function decodeLine(chunk: Buffer, start: number, end: number): string {
  const text = chunk.toString("utf8", start, end);
  return text.endsWith("\r") ? text.slice(0, -1) : text;
}

/**
 * Splits a chunk into lines and consumes it to the end. Bytes after the last
 * newline are forwarded as a line of their own, even while a writer is still
 * appending to them.
 */
export function splitChunk(chunk: Buffer, cursor: FileCursor): { lines: TailLine[]; cursor: FileCursor } {
  const lines: TailLine[] = [];
  let lineNo = cursor.lineNo;
  let consumed = 0;

  while (consumed < chunk.length) {
    const newlineAt = chunk.indexOf(NEWLINE, consumed);
    const end = newlineAt >= 0 ? newlineAt : chunk.length;
    const text = decodeLine(chunk, consumed, end);
    lineNo += 1;
    if (text.trim()) {
      lines.push({ lineNo, text });
    }
    consumed = newlineAt >= 0 ? newlineAt + 1 : chunk.length;
  }

  return {
    lines,
    cursor: { offset: cursor.offset + consumed, lineNo },
  };
}

/** Reads the lines appended to a file since the cursor. */
export async function tailFile(filePath: string, cursor: FileCursor): Promise<TailResult> {
  const fileStat = await stat(filePath);
  const sizeBytes = fileStat.size;
  const mtimeMs = fileStat.mtimeMs;
  const restarted = sizeBytes < cursor.offset;
  const start: FileCursor = restarted ? { offset: 0, lineNo: 0 } : cursor;

  if (sizeBytes === start.offset) {
    return { lines: [], cursor: start, restarted, bytesRead: 0, mtimeMs };
  }

  const chunk = await readFileChunk(filePath, start.offset, sizeBytes - start.offset);
  const split = splitChunk(chunk, start);
  return { lines: split.lines, cursor: split.cursor, restarted, bytesRead: chunk.length, mtimeMs };
}
