import type { Message, ProviderKind } from "@threadwatch/contracts";

export interface NormalizeContext {
  provider: ProviderKind;
  /** Session key derived from the file location, used when a record carries none. */
  fileSessionKey: string;
  /** Path relative to the provider root. */
  source: string;
  lineNo: number;
}

export interface NormalizedRecord {
  message: Message;
  cwd: string;
  /** Title the record states outright: a `title` field or a summary record. */
  explicitTitle: string;
}

export interface RecordNormalizer {
  provider: ProviderKind;
  normalize(context: NormalizeContext, raw: Record<string, unknown>): NormalizedRecord | null;
}
