import type {
  DialogItem,
  DirectoryExportFormat,
  DirectoryExportMode,
  ExportFilters,
  ExportFormat,
  ExportResult,
  ExportedMessage,
  Message,
  Session,
  TimeRange,
} from "@threadwatch/contracts";
import { BadRequestError, NotFoundError } from "./errors.js";
import { extractToolText } from "./search/toolText.js";

/** Read side of the index the exporter needs. */
export interface ExportSource {
  session(id: string): Session | null;
  sessions(): Session[];
  messages(sessionId: string, limit: number): Message[];
}

export const EXPORT_FORMATS: readonly ExportFormat[] = ["jsonl", "json", "md", "txt"];
export const DIRECTORY_EXPORT_MODES: readonly DirectoryExportMode[] = ["user", "dialog", "dialog_with_thinking", "all"];
export const DIRECTORY_EXPORT_FORMATS: readonly DirectoryExportFormat[] = ["json", "md"];

const TOOL_TYPES = new Set(["function_call", "function_call_output"]);
const FILENAME_UNSAFE = /[/\\:*?"<>|]/g;

export function parseExportFormat(value: string | undefined): ExportFormat {
  const normalized = (value ?? "jsonl").trim().toLowerCase();
  const format = EXPORT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) throw new BadRequestError(`unsupported format: ${value ?? ""}`);
  return format;
}

export function parseDirectoryExportMode(value: string | undefined): DirectoryExportMode {
  const normalized = (value ?? "dialog").trim().toLowerCase();
  const mode = DIRECTORY_EXPORT_MODES.find((candidate) => candidate === normalized);
  if (!mode) throw new BadRequestError(`unsupported mode: ${value ?? ""}`);
  return mode;
}

export function parseDirectoryExportFormat(value: string | undefined): DirectoryExportFormat {
  const normalized = (value ?? "json").trim().toLowerCase();
  const format = DIRECTORY_EXPORT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) throw new BadRequestError(`unsupported format: ${value ?? ""}`);
  return format;
}

function normalizeType(recordType: string): string {
  const trimmed = recordType.trim().toLowerCase();
  return trimmed || "message";
}

function inRange(timestampMs: number | null, range: TimeRange): boolean {
  if (timestampMs === null) return true;
  if (range.afterMs !== undefined && timestampMs < range.afterMs) return false;
  if (range.beforeMs !== undefined && timestampMs > range.beforeMs) return false;
  return true;
}

function compareChronological(
  a: { timestampMs: number | null; source: string; lineNo: number },
  b: { timestampMs: number | null; source: string; lineNo: number },
): number {
  const at = a.timestampMs ?? 0;
  const bt = b.timestampMs ?? 0;
  if (at !== bt) return at - bt;
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return a.lineNo - b.lineNo;
}

function isShellCall(message: Message): boolean {
  const tool = message.toolName.trim().toLowerCase();
  return tool === "shell";
}

function roleHeading(message: { role: string; type: string }): string {
  if (message.type === "reasoning") return "ASSISTANT THINKING";
  return message.role.trim().toUpperCase() || "MESSAGE";
}

function reasoningText(message: Message): string {
  return message.content.trim() || message.thinking.trim();
}

function passesFilters(message: Message, filters: ExportFilters): boolean {
  if (!inRange(message.timestampMs, filters)) return false;

  const roles = filters.roles?.map((role) => role.trim().toLowerCase()).filter(Boolean) ?? [];
  if (roles.length > 0 && !roles.includes(message.role.trim().toLowerCase())) return false;

  const type = normalizeType(message.recordType);
  const types = filters.types?.map((value) => value.trim().toLowerCase()).filter(Boolean) ?? [];
  if (types.length > 0 && !types.includes(type)) return false;

  if (filters.excludeToolOutputs && type === "function_call_output") return false;
  if (filters.excludeShellCalls && type === "function_call" && isShellCall(message)) return false;
  if (filters.textOnly) {
    if (TOOL_TYPES.has(type)) return false;
    if (!message.content.trim() && type !== "reasoning") return false;
  }
  return true;
}

function toExported(message: Message): ExportedMessage {
  const type = normalizeType(message.recordType);
  return {
    id: message.id,
    sessionId: message.sessionId,
    timestampMs: message.timestampMs,
    role: message.role,
    type,
    model: message.model,
    content: type === "reasoning" ? reasoningText(message) : message.content,
    toolName: message.toolName,
    source: message.source,
    lineNo: message.lineNo,
  };
}

function renderDocument(session: Session, messages: ExportedMessage[], markdown: boolean): string {
  const title = session.title.trim() || session.id;
  const cwd = session.cwd.trim();
  let body = markdown ? `# ${title}\n\n` : `${title}\n`;
  if (cwd) {
    body += `CWD: ${session.cwd}\n\n`;
  }
  for (const message of messages) {
    const heading = roleHeading(message);
    body += markdown ? `### ${heading}\n\n` : `== ${heading} ==\n`;
    if (message.content.trim()) {
      body += `${message.content}\n\n`;
    }
  }
  return body;
}

/**
 * Renders one session. Messages pass the filters in ingestion order (so
 * `maxMessages` keeps the earliest ones) and are then ordered by timestamp,
 * source and line.
 */
export function writeSessionExport(
  source: ExportSource,
  sessionId: string,
  format: ExportFormat,
  filters: ExportFilters = {},
): ExportResult {
  const session = source.session(sessionId);
  if (!session) throw new NotFoundError(`session not found: ${sessionId}`);

  const selected: ExportedMessage[] = [];
  for (const message of source.messages(sessionId, 0)) {
    if (!passesFilters(message, filters)) continue;
    selected.push(toExported(message));
    if (filters.maxMessages !== undefined && filters.maxMessages > 0 && selected.length >= filters.maxMessages) break;
  }
  selected.sort(compareChronological);

  switch (format) {
    case "jsonl":
      return { body: selected.map((message) => `${JSON.stringify(message)}\n`).join(""), count: selected.length };
    case "json":
      return { body: JSON.stringify(selected), count: selected.length };
    case "md":
      return { body: renderDocument(session, selected, true), count: selected.length };
    case "txt":
      return { body: renderDocument(session, selected, false), count: selected.length };
  }
}

function sanitizeFilenamePart(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return "_";
  return trimmed.replaceAll(" ", "_").replace(FILENAME_UNSAFE, "_");
}

function shorten(value: string, maxCodePoints: number): string {
  const trimmed = value.trim();
  if (!trimmed) return "untitled";
  const codePoints = Array.from(trimmed);
  if (codePoints.length <= maxCodePoints) return trimmed;
  return `${codePoints.slice(0, maxCodePoints - 1).join("")}_`;
}

function compactUtcStamp(timestampMs: number): string {
  const iso = new Date(timestampMs).toISOString();
  // 2024-01-02T03:04:05.000Z -> 20240102_0304
  return `${iso.slice(0, 10).replaceAll("-", "")}_${iso.slice(11, 16).replace(":", "")}`;
}

/** `<cwdBase>__<title>__<yyyyMMdd_HHmm>.<format>`, URL-escaped for Content-Disposition. */
export function buildAttachmentName(session: Session, format: string, now: number = Date.now()): string {
  const base = session.cwdBase.trim() || "session";
  const stamp = compactUtcStamp(session.firstAtMs ?? now);
  const name = `${sanitizeFilenamePart(base)}__${sanitizeFilenamePart(shorten(session.title, 40))}__${stamp}.${format.toLowerCase()}`;
  return encodeURIComponent(name);
}

export function buildDirectoryAttachmentName(
  cwd: string,
  mode: string,
  format: string,
  now: number = Date.now(),
): string {
  const trimmed = cwd.trim().replace(/\/+$/, "");
  const base = trimmed.slice(trimmed.lastIndexOf("/") + 1) || "export";
  const name = `${sanitizeFilenamePart(base)}__${sanitizeFilenamePart(mode)}__${compactUtcStamp(now)}.${format.toLowerCase()}`;
  return encodeURIComponent(name);
}

function compareByFirstAt(a: Session, b: Session): number {
  if (a.firstAtMs === b.firstAtMs) {
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
  }
  if (a.firstAtMs === null) return -1;
  if (b.firstAtMs === null) return 1;
  return a.firstAtMs - b.firstAtMs;
}

function sessionsUnder(source: ExportSource, cwdPrefix: string): Session[] {
  return source
    .sessions()
    .filter((session) => !cwdPrefix || session.cwd.startsWith(cwdPrefix))
    .sort(compareByFirstAt);
}

function chronologicalMessages(source: ExportSource, sessionId: string): Message[] {
  return source.messages(sessionId, 0).sort(compareChronological);
}

function collectDialog(source: ExportSource, sessions: Session[], mode: DirectoryExportMode, range: TimeRange): DialogItem[] {
  const includeThinking = mode === "dialog_with_thinking";
  const items: DialogItem[] = [];
  for (const session of sessions) {
    for (const message of chronologicalMessages(source, session.id)) {
      if (!inRange(message.timestampMs, range)) continue;
      const type = message.recordType.trim().toLowerCase();
      const role = message.role.trim().toLowerCase();
      if (TOOL_TYPES.has(type)) continue;

      if (type === "reasoning") {
        const text = reasoningText(message);
        if (includeThinking && text) items.push({ role: "assistant", text, type: "reasoning" });
        continue;
      }

      const text = message.content.trim();
      if (!text) continue;
      if (mode === "user") {
        if (role === "user") items.push({ role, text });
        continue;
      }
      if (role === "user" || role === "assistant") {
        items.push(includeThinking ? { role, text, type: "message" } : { role, text });
      }
    }
  }
  return items;
}

function dialogHeading(item: DialogItem): string {
  if (item.type === "reasoning") return "THINKING";
  return item.role === "assistant" ? "ASSISTANT" : "USER";
}

function renderTranscript(source: ExportSource, sessions: Session[], cwdPrefix: string, range: TimeRange): ExportResult {
  let body = cwdPrefix ? `# Export for ${cwdPrefix}\n\n` : "";
  let count = 0;

  for (const session of sessions) {
    body += `## ${session.title.trim() || session.id}\n\n`;
    if (session.cwd.trim()) {
      body += `CWD: ${session.cwd}\n\n`;
    }

    for (const message of chronologicalMessages(source, session.id)) {
      if (!inRange(message.timestampMs, range)) continue;
      const type = message.recordType.trim().toLowerCase();
      const role = message.role.trim().toLowerCase();

      if (type === "function_call") {
        const { command } = extractToolText(message);
        body += "### TOOLS\n\n";
        if (command) body += `~~~bash\n$ ${command}\n~~~\n\n`;
        count += 1;
        continue;
      }
      if (type === "function_call_output") {
        const { stdout, stderr } = extractToolText(message);
        body += "### TOOLS OUTPUT\n\n";
        if (stdout) {
          body += `~~~\n${stdout}\n~~~\n\n`;
          count += 1;
        }
        if (stderr) body += `#### STDERR\n\n~~~\n${stderr}\n~~~\n\n`;
        continue;
      }
      if (type === "reasoning") {
        const text = reasoningText(message);
        if (text) {
          body += `### ASSISTANT THINKING\n\n${text}\n\n`;
          count += 1;
        }
        continue;
      }

      const text = message.content.trim();
      if (text && (role === "user" || role === "assistant")) {
        body += `### ${role.toUpperCase()}\n\n${text}\n\n`;
        count += 1;
      }
    }
  }
  return { body, count };
}

/**
 * Flattens every session whose cwd starts with `cwdPrefix` (all sessions when
 * empty), oldest session first. `user` yields user texts, the dialog modes
 * user and assistant turns, and `all` a markdown transcript including tools.
 */
export function writeDirectoryExport(
  source: ExportSource,
  cwdPrefix: string,
  mode: DirectoryExportMode,
  format: DirectoryExportFormat,
  range: TimeRange = {},
): ExportResult {
  const sessions = sessionsUnder(source, cwdPrefix);
  if (mode === "all") {
    if (format !== "md") throw new BadRequestError("mode all supports md only");
    return renderTranscript(source, sessions, cwdPrefix, range);
  }

  const items = collectDialog(source, sessions, mode, range);
  if (format === "json") {
    const body = mode === "user" ? JSON.stringify(items.map((item) => item.text)) : JSON.stringify(items);
    return { body, count: items.length };
  }

  const body = items
    .map((item) => (mode === "user" ? `${item.text}\n\n` : `### ${dialogHeading(item)}\n\n${item.text}\n\n`))
    .join("");
  return { body, count: items.length };
}
