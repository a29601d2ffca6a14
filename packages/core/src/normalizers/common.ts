import type { Message } from "@threadwatch/contracts";
import { asArray, asRecord, firstTimestampMs, isRecord, readString } from "../utils.js";
import type { NormalizeContext } from "./types.js";

const TEXT_PART_TYPES = new Set(["text", "input_text", "output_text"]);
const THINKING_PART_TYPES = new Set(["thinking", "reasoning_text"]);
const NON_TEXT_PART_TYPES = new Set([
  "thinking",
  "redacted_thinking",
  "reasoning_text",
  "tool_use",
  "tool_result",
  "image",
  "input_image",
]);

export const TIMESTAMP_KEYS = ["timestamp", "ts", "created_at"];
const DIRECT_CWD_KEYS = ["cwd", "working_dir", "current_working_directory"];
const PART_SEPARATOR = "\n\n";

export interface MessageSeed {
  context: NormalizeContext;
  raw: Record<string, unknown>;
  id?: string;
  sessionId?: string;
  role?: string;
  content?: string;
  thinking?: string;
  model?: string;
  recordType?: string;
  toolName?: string;
}

export function makeMessage(seed: MessageSeed): Message {
  return {
    id: seed.id ?? "",
    sessionId: seed.sessionId || seed.context.fileSessionKey,
    timestampMs: firstTimestampMs(seed.raw, TIMESTAMP_KEYS),
    role: seed.role ?? "",
    content: seed.content ?? "",
    thinking: seed.thinking ?? "",
    model: seed.model ?? "",
    recordType: seed.recordType ?? "",
    toolName: seed.toolName ?? "",
    raw: seed.raw,
    source: seed.context.source,
    provider: seed.context.provider,
    lineNo: seed.context.lineNo,
  };
}

/**
 * Joins the text-bearing parts of a `content` value. Flat record content only
 * takes the typed text parts; content nested under `message` or `payload` also
 * takes unknown part types that carry a `text` string.
 */
export function extractPartsText(value: unknown, nested: boolean): string {
  if (typeof value === "string") {
    return value;
  }
  const out: string[] = [];
  for (const item of asArray(value)) {
    if (typeof item === "string") {
      if (item) out.push(item);
      continue;
    }
    const part = asRecord(item);
    const partType = readString(part.type);
    if (TEXT_PART_TYPES.has(partType)) {
      const text = readString(part.text) || readString(part.content);
      if (text) out.push(text);
      continue;
    }
    if (nested && !NON_TEXT_PART_TYPES.has(partType)) {
      const text = readString(part.text);
      if (text) out.push(text);
    }
  }
  return out.join(PART_SEPARATOR);
}

function extractMessageLikeText(value: unknown): string {
  if (!isRecord(value)) return "";
  return extractPartsText(value.content, true) || readString(value.text) || readString(value.message);
}

/** message object, then payload object, then flat content, text and message fields. */
export function extractText(raw: Record<string, unknown>): string {
  return (
    extractMessageLikeText(raw.message) ||
    extractMessageLikeText(raw.payload) ||
    extractPartsText(raw.content, false) ||
    readString(raw.text) ||
    readString(raw.message)
  );
}

function collectThinkingParts(value: unknown, out: string[]): void {
  for (const item of asArray(value)) {
    const part = asRecord(item);
    const partType = readString(part.type);
    if (THINKING_PART_TYPES.has(partType)) {
      const text = readString(part.thinking) || readString(part.text);
      if (text) out.push(text);
    } else if (partType === "summary_text") {
      const text = readString(part.text);
      if (text) out.push(text);
    }
  }
}

export function extractThinking(raw: Record<string, unknown>): string {
  const out: string[] = [];
  const message = asRecord(raw.message);
  const payload = asRecord(raw.payload);
  collectThinkingParts(message.content, out);
  collectThinkingParts(payload.content, out);
  collectThinkingParts(payload.summary, out);
  collectThinkingParts(raw.content, out);
  collectThinkingParts(raw.summary, out);
  return out.join(PART_SEPARATOR);
}

export function cwdFromMarker(text: string): string {
  const start = text.indexOf("<cwd>");
  if (start < 0) return "";
  const rest = text.slice(start + "<cwd>".length);
  const end = rest.indexOf("</cwd>");
  if (end >= 0) {
    return rest.slice(0, end).trim();
  }
  const nextTag = rest.indexOf("<");
  return (nextTag >= 0 ? rest.slice(0, nextTag) : rest).trim();
}

function directCwd(record: Record<string, unknown>): string {
  for (const key of DIRECT_CWD_KEYS) {
    const value = readString(record[key]).trim();
    if (value) return value;
  }
  return "";
}

/**
 * Direct fields (on the record, then on any nested records passed in), the git
 * object, the environment_context blob, then a `<cwd>` marker in the content.
 */
export function extractCwd(
  raw: Record<string, unknown>,
  content: string,
  nestedRecords: Record<string, unknown>[] = [],
): string {
  for (const record of [raw, ...nestedRecords]) {
    const value = directCwd(record);
    if (value) return value;
  }

  const git = asRecord(raw.git);
  const gitCwd = readString(git.cwd).trim() || readString(git.root).trim();
  if (gitCwd) return gitCwd;

  const environment = readString(raw.environment_context);
  if (environment) {
    const fromEnvironment = cwdFromMarker(environment);
    if (fromEnvironment) return fromEnvironment;
  }

  if (content.includes("</cwd>")) {
    return cwdFromMarker(content);
  }
  return "";
}
