import { asArray, asRecord, readString } from "../utils.js";
import { extractCwd, extractText, extractThinking, makeMessage } from "./common.js";
import type { NormalizeContext, NormalizedRecord, RecordNormalizer } from "./types.js";

function firstToolUseName(content: unknown): string {
  for (const item of asArray(content)) {
    const part = asRecord(item);
    if (readString(part.type) === "tool_use") {
      const name = readString(part.name);
      if (name) return name;
    }
  }
  return "";
}

export class ClaudeNormalizer implements RecordNormalizer {
  provider = "claude" as const;

  normalize(context: NormalizeContext, raw: Record<string, unknown>): NormalizedRecord | null {
    const message = asRecord(raw.message);
    const recordType = readString(raw.type);
    const content = extractText(raw);

    const normalized = makeMessage({
      context,
      raw,
      id: readString(raw.id) || readString(raw.uuid),
      // one file is one conversation, resumed or not
      sessionId: context.fileSessionKey,
      role: readString(message.role) || readString(raw.role),
      content,
      thinking: extractThinking(raw),
      model: readString(message.model) || readString(raw.model),
      recordType,
      toolName: readString(raw.tool_name) || firstToolUseName(message.content),
    });

    const explicitTitle = recordType === "summary" ? readString(raw.summary) : readString(raw.title);
    return {
      message: normalized,
      cwd: extractCwd(raw, content),
      explicitTitle,
    };
  }
}
