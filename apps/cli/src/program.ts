import { writeFile } from "node:fs/promises";
import { Command } from "commander";
import type { AppConfig, ExportFilters, Session } from "@threadwatch/contracts";
import {
  NotFoundError,
  SessionIndex,
  applyEnvOverrides,
  asRecord,
  isRecord,
  loadConfig,
  mergeConfig,
  parseDirectoryExportFormat,
  parseDirectoryExportMode,
  parseExportFormat,
  parseTimestampMs,
  resolveConfigPath,
  saveConfig,
  search,
  toConfigInput,
  writeDirectoryExport,
  writeSessionExport,
} from "@threadwatch/core";
import { runServer } from "@threadwatch/server";

const DEFAULT_SESSIONS_LIMIT = 50;
const DEFAULT_MESSAGES_LIMIT = 50;
const PREVIEW_WIDTH = 80;

interface GlobalOptions {
  config?: string;
  codexDir?: string;
  claudeDir?: string;
}

function printTable(rows: string[][]): void {
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ");
    console.log(line.trimEnd());
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function fmtTime(ms: number | null): string {
  if (ms === null) return "-";
  return new Date(ms).toISOString().replace(".000Z", "Z");
}

function inline(value: string, width = PREVIEW_WIDTH): string {
  const flattened = value.replace(/\s+/g, " ").trim();
  const codePoints = Array.from(flattened);
  return codePoints.length <= width ? flattened : `${codePoints.slice(0, width - 1).join("")}…`;
}

function parseCount(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

function getPath(target: Record<string, unknown>, dottedKey: string): unknown {
  let cursor: unknown = target;
  for (const key of dottedKey.split(".").filter(Boolean)) {
    if (!isRecord(cursor)) return undefined;
    cursor = cursor[key];
  }
  return cursor;
}

function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  const lastKey = parts.pop();
  if (!lastKey) return;

  let cursor = target;
  for (const key of parts) {
    if (!isRecord(cursor[key])) {
      cursor[key] = {};
    }
    cursor = asRecord(cursor[key]);
  }
  cursor[lastKey] = value;
}

function configDocument(config: AppConfig): Record<string, unknown> {
  const copy: unknown = structuredClone(config);
  return asRecord(copy);
}

async function emit(body: string, out: string | undefined, count: number): Promise<void> {
  if (out) {
    await writeFile(out, body, "utf8");
    console.log(`wrote ${count} item(s) to ${out}`);
    return;
  }
  process.stdout.write(body.endsWith("\n") ? body : `${body}\n`);
}

export function createProgram(): Command {
  const program = new Command();
  program.name("threadwatch").description("Index and search local codex and claude transcripts");
  program.option("--config <path>", "Config path (default: $THREADWATCH_CONFIG or ~/.threadwatch/config.toml)");
  program.option("--codex-dir <path>", "Codex root directory");
  program.option("--claude-dir <path>", "Claude projects directory");
  program.addHelpText(
    "after",
    `
Examples:
  $ threadwatch serve --port 7077
  $ threadwatch search 'role:user "flaky test" -draft'
  $ threadwatch export <session-id> --format md --out session.md`,
  );

  const loadRuntimeConfig = async (): Promise<AppConfig> => {
    const opts = program.opts<GlobalOptions>();
    const config = applyEnvOverrides(await loadConfig(resolveConfigPath(opts.config)));
    return mergeConfig({
      ...config,
      roots: {
        codexDir: opts.codexDir ?? config.roots.codexDir,
        claudeDir: opts.claudeDir ?? config.roots.claudeDir,
      },
    });
  };

  const openIndex = async (): Promise<SessionIndex> => {
    const index = new SessionIndex(await loadRuntimeConfig());
    await index.scanOnce();
    return index;
  };

  const requireSession = (index: SessionIndex, id: string): Session => {
    const session = index.session(id);
    if (!session) throw new NotFoundError(`session not found: ${id}`);
    return session;
  };

  program
    .command("serve")
    .description("Run the HTTP API and keep the index fresh")
    .option("--host <host>", "Listen host")
    .option("--port <port>", "Listen port")
    .action(async (opts: { host?: string; port?: string }) => {
      const globals = program.opts<GlobalOptions>();
      if (globals.codexDir) process.env.CODEX_DIR = globals.codexDir;
      if (globals.claudeDir) process.env.CLAUDE_DIR = globals.claudeDir;
      const port = opts.port === undefined ? undefined : parseCount(opts.port, 0);
      await runServer({
        ...(globals.config ? { configPath: globals.config } : {}),
        ...(opts.host ? { host: opts.host } : {}),
        ...(port ? { port } : {}),
      });
    });

  program
    .command("sessions")
    .description("List sessions, most recent first")
    .option("--limit <n>", "Rows to show", String(DEFAULT_SESSIONS_LIMIT))
    .option("--json", "JSON output")
    .action(async (opts: { limit: string; json?: boolean }) => {
      const index = await openIndex();
      const limit = Math.max(1, parseCount(opts.limit, DEFAULT_SESSIONS_LIMIT));
      const rows = index.sessions().slice(0, limit);
      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      printTable([
        ["session", "provider", "last_at", "messages", "title"],
        ...rows.map((session) => [
          session.id,
          session.provider,
          fmtTime(session.lastAtMs),
          String(session.messageCount),
          inline(session.title, 60),
        ]),
      ]);
    });

  program
    .command("messages <sessionId>")
    .description("Show the latest messages of a session")
    .option("--limit <n>", "Number of messages (0 for all)", String(DEFAULT_MESSAGES_LIMIT))
    .option("--jsonl", "Emit one message JSON per line")
    .action(async (sessionId: string, opts: { limit: string; jsonl?: boolean }) => {
      const index = await openIndex();
      requireSession(index, sessionId);
      const messages = index.messages(sessionId, parseCount(opts.limit, DEFAULT_MESSAGES_LIMIT));
      if (opts.jsonl) {
        for (const message of messages) console.log(JSON.stringify(message));
        return;
      }
      printTable([
        ["line", "time", "role", "type", "content"],
        ...messages.map((message) => [
          String(message.lineNo),
          fmtTime(message.timestampMs),
          message.role || "-",
          message.recordType || "-",
          inline(message.content),
        ]),
      ]);
    });

  program
    .command("search <query...>")
    .description("Search messages (terms, \"phrases\", prefix*, /regex/i, field:value, OR)")
    .option("--in <scope>", "content, tools or all", "content")
    .option("--limit <n>", "Maximum hits")
    .option("--offset <n>", "Hits to skip", "0")
    .option("--json", "JSON output")
    .action(async (terms: string[], opts: { in: string; limit?: string; offset: string; json?: boolean }) => {
      const index = await openIndex();
      const config = index.getConfig();
      const response = search(index, terms.join(" "), opts.in, {
        limit: parseCount(opts.limit, config.search.defaultLimit),
        offset: parseCount(opts.offset, 0),
        budgetMs: config.search.budgetMs,
        maxReturn: config.search.maxReturn,
        defaultLimit: config.search.defaultLimit,
        previewChars: config.search.previewChars,
      });
      if (opts.json) {
        console.log(JSON.stringify(response, null, 2));
        return;
      }
      console.log(`${response.total} match(es) in ${response.tookMs}ms${response.truncated ? " (truncated)" : ""}`);
      printTable([
        ["time", "session", "role", "field", "content"],
        ...response.hits.map((hit) => [
          fmtTime(hit.timestampMs),
          hit.sessionId,
          hit.role || "-",
          hit.field,
          inline(hit.content),
        ]),
      ]);
    });

  program
    .command("stats")
    .description("Index statistics")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const stats = (await openIndex()).stats();
      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }
      console.log(`sessions: ${stats.totalSessions}`);
      console.log(`messages: ${stats.totalMessages}`);
      console.log(`bad_lines: ${stats.badLines}`);
      console.log(`tracked_files: ${stats.trackedFiles}`);
      const roles = Object.entries(stats.byRole).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
      if (roles.length > 0) {
        console.log("");
        printTable([["role", "count"], ...roles.map(([role, count]) => [role, String(count)])]);
      }
    });

  program
    .command("fields")
    .description("Top-level raw field frequencies")
    .action(async () => {
      const fields = (await openIndex()).fields();
      const rows = Object.entries(fields).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
      printTable([["field", "count"], ...rows.map(([field, count]) => [field, String(count)])]);
    });

  program
    .command("export <sessionId>")
    .description("Export one session")
    .option("--format <format>", "jsonl, json, md or txt", "md")
    .option("--roles <list>", "Comma-separated roles to keep")
    .option("--types <list>", "Comma-separated record types to keep")
    .option("--text-only", "Drop tool calls and empty messages")
    .option("--after <time>", "Keep messages at or after this time")
    .option("--before <time>", "Keep messages at or before this time")
    .option("--max <n>", "Maximum messages")
    .option("--exclude-shell", "Drop shell tool calls")
    .option("--exclude-tool-outputs", "Drop tool outputs")
    .option("--out <path>", "Write to a file instead of stdout")
    .action(
      async (
        sessionId: string,
        opts: {
          format: string;
          roles?: string;
          types?: string;
          textOnly?: boolean;
          after?: string;
          before?: string;
          max?: string;
          excludeShell?: boolean;
          excludeToolOutputs?: boolean;
          out?: string;
        },
      ) => {
        const index = await openIndex();
        requireSession(index, sessionId);
        const filters: ExportFilters = {
          textOnly: opts.textOnly === true,
          excludeShellCalls: opts.excludeShell === true,
          excludeToolOutputs: opts.excludeToolOutputs === true,
        };
        const roles = parseList(opts.roles);
        const types = parseList(opts.types);
        const afterMs = opts.after ? parseTimestampMs(opts.after) : null;
        const beforeMs = opts.before ? parseTimestampMs(opts.before) : null;
        const max = parseCount(opts.max, 0);
        if (roles.length > 0) filters.roles = roles;
        if (types.length > 0) filters.types = types;
        if (afterMs !== null) filters.afterMs = afterMs;
        if (beforeMs !== null) filters.beforeMs = beforeMs;
        if (max > 0) filters.maxMessages = max;

        const result = writeSessionExport(index, sessionId, parseExportFormat(opts.format), filters);
        await emit(result.body, opts.out, result.count);
      },
    );

  program
    .command("export-dir")
    .description("Flatten every session under a cwd prefix")
    .option("--cwd <prefix>", "cwd prefix (default: all sessions)", "")
    .option("--mode <mode>", "user, dialog, dialog_with_thinking or all", "dialog")
    .option("--format <format>", "json or md", "md")
    .option("--out <path>", "Write to a file instead of stdout")
    .action(async (opts: { cwd: string; mode: string; format: string; out?: string }) => {
      const index = await openIndex();
      const result = writeDirectoryExport(
        index,
        opts.cwd.trim(),
        parseDirectoryExportMode(opts.mode),
        parseDirectoryExportFormat(opts.format),
      );
      await emit(result.body, opts.out, result.count);
    });

  program
    .command("retitle <sessionId> <title...>")
    .description("Set a custom session title (stored in a .meta.json sidecar)")
    .action(async (sessionId: string, words: string[]) => {
      const index = await openIndex();
      const session = await index.updateSessionTitle(sessionId, words.join(" "));
      console.log(`${session.id}: ${session.title}`);
    });

  program
    .command("delete-session <sessionId>")
    .description("Delete a session's transcript files and sidecars")
    .action(async (sessionId: string) => {
      const index = await openIndex();
      await index.deleteSession(sessionId);
      console.log(`deleted session ${sessionId}`);
    });

  program
    .command("delete-message <sessionId> <messageId>")
    .description("Remove one message line from its transcript file")
    .action(async (sessionId: string, messageId: string) => {
      const index = await openIndex();
      await index.deleteMessage(sessionId, messageId);
      console.log(`deleted message ${messageId}`);
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get [key]")
    .description("Print the effective config, or one dotted key")
    .action(async (key: string | undefined) => {
      const document = configDocument(await loadRuntimeConfig());
      const value = key ? getPath(document, key) : document;
      if (value === undefined) throw new Error(`unknown config key: ${key ?? ""}`);
      console.log(typeof value === "string" ? value : JSON.stringify(value, null, 2));
    });

  configCmd
    .command("set <key> <value>")
    .description("Set one dotted key in the config file")
    .action(async (key: string, value: string) => {
      const configPath = resolveConfigPath(program.opts<GlobalOptions>().config);
      const document = configDocument(await loadConfig(configPath));
      if (getPath(document, key) === undefined) throw new Error(`unknown config key: ${key}`);
      setPath(document, key, parseValue(value));
      await saveConfig(mergeConfig(toConfigInput(document)), configPath);
      console.log(`updated ${key}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      console.log(resolveConfigPath(program.opts<GlobalOptions>().config));
    });

  return program;
}
