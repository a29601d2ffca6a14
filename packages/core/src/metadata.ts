import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { asRecord, readString } from "./utils.js";

/** `<dir>/<stem>.jsonl` keeps its overrides in `<dir>/<stem>.meta.json`. */
export function sidecarPathFor(transcriptPath: string): string {
  const ext = path.extname(transcriptPath);
  const base = ext ? transcriptPath.slice(0, -ext.length) : transcriptPath;
  return `${base}.meta.json`;
}

async function readSidecar(transcriptPath: string): Promise<Record<string, unknown>> {
  try {
    const raw = await readFile(sidecarPathFor(transcriptPath), "utf8");
    const parsed: unknown = JSON.parse(raw);
    return asRecord(parsed);
  } catch {
    // missing or unreadable sidecar means no overrides
    return {};
  }
}

export async function readCustomTitle(transcriptPath: string): Promise<string> {
  const sidecar = await readSidecar(transcriptPath);
  return readString(sidecar.custom_title).trim();
}

export async function writeCustomTitle(transcriptPath: string, title: string): Promise<void> {
  const sidecar = await readSidecar(transcriptPath);
  const next = { ...sidecar, custom_title: title };
  await writeFile(sidecarPathFor(transcriptPath), `${JSON.stringify(next, null, 2)}\n`, "utf8");
}
