import type { AppConfig } from "@threadwatch/contracts";

export const DEFAULT_CONFIG: AppConfig = {
  roots: {
    codexDir: "~/.codex",
    claudeDir: "~/.claude/projects",
  },
  scan: {
    intervalMs: 1500,
  },
  retention: {
    maxMessagesPerSession: 5000,
  },
  search: {
    budgetMs: 350,
    maxReturn: 200,
    defaultLimit: 50,
    previewChars: 240,
  },
  server: {
    host: "127.0.0.1",
    port: 7077,
    logger: false,
  },
};
