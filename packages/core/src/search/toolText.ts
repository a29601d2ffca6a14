import type { Message } from "@threadwatch/contracts";
import { asArray, asRecord, asString, isRecord, readString } from "../utils.js";

export interface ToolText {
  command: string;
  stdout: string;
  stderr: string;
}

const EMPTY: ToolText = { command: "", stdout: "", stderr: "" };

function parseJsonRecord(value: string): Record<string, unknown> | null {
  const trimmed = value.trim();
  if (!trimmed.startsWith("{")) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function commandFrom(record: Record<string, unknown>): string {
  const command = record.command;
  if (Array.isArray(command)) {
    return command.filter((part): part is string => typeof part === "string").join(" ");
  }
  return readString(command) || readString(record.cmd);
}

function codexCommand(raw: Record<string, unknown>): string {
  const args = raw.arguments ?? asRecord(raw.payload).arguments;
  if (typeof args === "string") {
    const parsed = parseJsonRecord(args);
    const command = parsed ? commandFrom(parsed) : "";
    return command || args;
  }
  return isRecord(args) ? commandFrom(args) : "";
}

function codexOutput(raw: Record<string, unknown>): Pick<ToolText, "stdout" | "stderr"> {
  const output = raw.output ?? asRecord(raw.payload).output;
  if (typeof output === "string") {
    const parsed = parseJsonRecord(output);
    if (!parsed) return { stdout: output, stderr: "" };
    return {
      stdout: readString(parsed.output) || readString(parsed.stdout) || output,
      stderr: readString(parsed.stderr),
    };
  }
  const record = asRecord(output);
  return {
    stdout: readString(record.output) || readString(record.stdout),
    stderr: readString(record.stderr),
  };
}

function toolResultText(content: unknown): string {
  if (typeof content === "string") return content;
  return asArray(content)
    .map((item) => readString(asRecord(item).text))
    .filter((text) => text.length > 0)
    .join("\n");
}

function claudeToolText(raw: Record<string, unknown>): ToolText {
  const commands: string[] = [];
  const stdout: string[] = [];
  const stderr: string[] = [];

  for (const item of asArray(asRecord(raw.message).content)) {
    const part = asRecord(item);
    const partType = readString(part.type);
    if (partType === "tool_use") {
      const input = asRecord(part.input);
      const command = readString(input.command) || (Object.keys(input).length > 0 ? asString(input) : "");
      if (command) commands.push(command);
    } else if (partType === "tool_result") {
      const text = toolResultText(part.content);
      if (!text) continue;
      if (part.is_error === true) stderr.push(text);
      else stdout.push(text);
    }
  }

  const result = asRecord(raw.toolUseResult);
  const resultStdout = readString(result.stdout);
  const resultStderr = readString(result.stderr);
  return {
    command: commands.join("\n"),
    stdout: resultStdout || stdout.join("\n"),
    stderr: resultStderr || stderr.join("\n"),
  };
}

/** Command line and captured output of a tool call or tool result record. */
export function extractToolText(message: Message): ToolText {
  if (message.provider === "claude") {
    return claudeToolText(message.raw);
  }
  const recordType = message.recordType.toLowerCase();
  if (recordType === "function_call") {
    return { ...EMPTY, command: codexCommand(message.raw) };
  }
  if (recordType === "function_call_output") {
    return { ...EMPTY, ...codexOutput(message.raw) };
  }
  return EMPTY;
}
