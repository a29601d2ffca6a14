import { asRecord, readString } from "../utils.js";
import { extractCwd, extractText, extractThinking, makeMessage } from "./common.js";
import type { NormalizeContext, NormalizedRecord, RecordNormalizer } from "./types.js";

const WRAPPER_TYPES = new Set(["response_item", "event_msg"]);
const RESTATED_EVENT_TYPES = new Set(["user_message", "agent_message"]);

/**
 * `event_msg` records that restate a user or agent turn already captured by
 * the structured `response_item` for the same turn.
 */
export function isRestatedEvent(raw: Record<string, unknown>): boolean {
  if (readString(raw.type).toLowerCase() !== "event_msg") return false;
  const payloadType = readString(asRecord(raw.payload).type).toLowerCase();
  return RESTATED_EVENT_TYPES.has(payloadType);
}

export class CodexNormalizer implements RecordNormalizer {
  provider = "codex" as const;

  normalize(context: NormalizeContext, raw: Record<string, unknown>): NormalizedRecord | null {
    if (isRestatedEvent(raw)) {
      return null;
    }

    const payload = asRecord(raw.payload);
    const outerType = readString(raw.type);
    const wrapped = WRAPPER_TYPES.has(outerType);
    const recordType = (wrapped && readString(payload.type)) || outerType;
    const content = extractText(raw);

    const message = makeMessage({
      context,
      raw,
      id: readString(raw.id) || (outerType === "response_item" ? readString(payload.id) : ""),
      sessionId: readString(raw.session_id),
      role: readString(raw.role) || readString(payload.role),
      content,
      thinking: extractThinking(raw),
      model: readString(raw.model) || readString(payload.model),
      recordType,
      toolName: readString(raw.tool_name) || readString(raw.name) || readString(payload.name),
    });

    return {
      message,
      cwd: extractCwd(raw, content, [payload]),
      explicitTitle: readString(raw.title),
    };
  }
}
