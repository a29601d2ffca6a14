export type ProviderKind = "codex" | "claude";

export type SearchScope = "content" | "tools" | "all";

export type SearchField = "content" | "tool_cmd" | "stdout" | "stderr";

export type ExportFormat = "jsonl" | "json" | "md" | "txt";

export type DirectoryExportMode = "user" | "dialog" | "dialog_with_thinking" | "all";

export type DirectoryExportFormat = "json" | "md";

export interface ProviderRootsConfig {
  codexDir: string;
  claudeDir: string;
}

export interface ScanConfig {
  intervalMs: number;
}

export interface RetentionConfig {
  maxMessagesPerSession: number;
}

export interface SearchConfig {
  budgetMs: number;
  maxReturn: number;
  defaultLimit: number;
  previewChars: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  logger: boolean;
}

export interface AppConfig {
  roots: ProviderRootsConfig;
  scan: ScanConfig;
  retention: RetentionConfig;
  search: SearchConfig;
  server: ServerConfig;
}

export interface Message {
  id: string;
  sessionId: string;
  timestampMs: number | null;
  role: string;
  content: string;
  thinking: string;
  model: string;
  recordType: string;
  toolName: string;
  raw: Record<string, unknown>;
  source: string;
  provider: ProviderKind;
  lineNo: number;
}

export interface Session {
  id: string;
  title: string;
  firstAtMs: number | null;
  lastAtMs: number | null;
  fileModAtMs: number | null;
  messageCount: number;
  textCount: number;
  cwd: string;
  cwdBase: string;
  models: Record<string, number>;
  roles: Record<string, number>;
  sources: string[];
  provider: ProviderKind;
  project: string;
}

export interface IndexStats {
  totalMessages: number;
  totalSessions: number;
  byRole: Record<string, number>;
  byModel: Record<string, number>;
  fields: Record<string, number>;
  badLines: number;
  trackedFiles: number;
  scanCount: number;
  lastScanMs: number;
  lastScanAtMs: number;
}

export interface ScanSummary {
  filesSeen: number;
  filesRead: number;
  linesIngested: number;
  durationMs: number;
}

export interface SearchHit {
  sessionId: string;
  messageId: string;
  role: string;
  recordType: string;
  model: string;
  source: string;
  lineNo: number;
  timestampMs: number | null;
  field: SearchField;
  content: string;
}

export interface SearchResponse {
  tookMs: number;
  truncated: boolean;
  total: number;
  hits: SearchHit[];
}

export interface ExportFilters {
  roles?: string[];
  types?: string[];
  textOnly?: boolean;
  afterMs?: number;
  beforeMs?: number;
  maxMessages?: number;
  excludeShellCalls?: boolean;
  excludeToolOutputs?: boolean;
}

export interface ExportResult {
  body: string;
  count: number;
}

export interface ExportedMessage {
  id: string;
  sessionId: string;
  timestampMs: number | null;
  role: string;
  type: string;
  model: string;
  content: string;
  toolName: string;
  source: string;
  lineNo: number;
}

export interface DialogItem {
  role: string;
  text: string;
  type?: "message" | "reasoning";
}

export interface TimeRange {
  afterMs?: number;
  beforeMs?: number;
}
