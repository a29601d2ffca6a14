import Fastify, { type FastifyInstance } from "fastify";
import type { ExportFilters, ScanSummary, TimeRange } from "@threadwatch/contracts";
import {
  BadRequestError,
  NotFoundError,
  SessionIndex,
  buildAttachmentName,
  buildDirectoryAttachmentName,
  errorMessage,
  parseDirectoryExportFormat,
  parseDirectoryExportMode,
  parseExportFormat,
  parseTimestampMs,
  search,
  writeDirectoryExport,
  writeSessionExport,
} from "@threadwatch/core";

const DEFAULT_MESSAGES_LIMIT = 200;

const CONTENT_TYPES: Record<string, string> = {
  jsonl: "application/x-ndjson; charset=utf-8",
  json: "application/json; charset=utf-8",
  md: "text/markdown; charset=utf-8",
  txt: "text/plain; charset=utf-8",
};

export interface CreateServerOptions {
  index: SessionIndex;
  /** Defaults to the index config's `server.logger`. */
  logger?: boolean;
}

interface SessionParams {
  id: string;
}

interface MessageParams extends SessionParams {
  messageId: string;
}

interface MessagesQuery {
  session_id?: string;
  limit?: string;
}

interface SearchQuery {
  q?: string;
  limit?: string;
  offset?: string;
  in?: string;
}

interface SessionExportQuery {
  format?: string;
  roles?: string;
  types?: string;
  text_only?: string;
  after?: string;
  before?: string;
  max?: string;
  exclude_shell?: string;
  exclude_tool_outputs?: string;
}

interface DirectoryExportQuery {
  cwd?: string;
  mode?: string;
  format?: string;
  after?: string;
  before?: string;
}

interface TitleBody {
  title?: unknown;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || !value.trim()) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function parseFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseRange(query: { after?: string; before?: string }): TimeRange {
  const range: TimeRange = {};
  const afterMs = query.after ? parseTimestampMs(query.after) : null;
  const beforeMs = query.before ? parseTimestampMs(query.before) : null;
  if (afterMs !== null) range.afterMs = afterMs;
  if (beforeMs !== null) range.beforeMs = beforeMs;
  return range;
}

function parseExportFilters(query: SessionExportQuery): ExportFilters {
  const filters: ExportFilters = {
    ...parseRange(query),
    textOnly: parseFlag(query.text_only),
    excludeShellCalls: parseFlag(query.exclude_shell),
    excludeToolOutputs: parseFlag(query.exclude_tool_outputs),
  };
  const roles = parseList(query.roles);
  const types = parseList(query.types);
  const max = parseInteger(query.max, 0);
  if (roles.length > 0) filters.roles = roles;
  if (types.length > 0) filters.types = types;
  if (max > 0) filters.maxMessages = max;
  return filters;
}

/** Domain errors map to 404 and 400; Fastify's own client errors keep their status. */
export function statusForError(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof BadRequestError) return 400;
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
    return error.statusCode;
  }
  return 500;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const index = options.index;
  const config = index.getConfig();
  const server = Fastify({ logger: options.logger ?? config.server.logger });

  server.setErrorHandler(async (error, request, reply) => {
    const status = statusForError(error);
    if (status === 500) {
      request.log.error(error);
    }
    reply.code(status);
    return { error: errorMessage(error) };
  });

  index.on("scan", (summary: ScanSummary) => {
    server.log.debug({ summary }, "scan pass finished");
  });

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/config", async () => ({ config }));

  server.get("/api/sessions", async () => ({ sessions: index.sessions() }));

  server.get<{ Params: SessionParams }>("/api/sessions/:id", async (request) => {
    const session = index.session(request.params.id);
    if (!session) throw new NotFoundError(`session not found: ${request.params.id}`);
    return { session };
  });

  server.get<{ Querystring: MessagesQuery }>("/api/messages", async (request) => {
    const sessionId = request.query.session_id?.trim();
    if (!sessionId) throw new BadRequestError("session_id is required");
    const limit = parseInteger(request.query.limit, DEFAULT_MESSAGES_LIMIT);
    return { messages: index.messages(sessionId, limit) };
  });

  server.get<{ Querystring: SearchQuery }>("/api/search", async (request) => {
    const query = request.query;
    return search(index, query.q ?? "", query.in, {
      limit: parseInteger(query.limit, config.search.defaultLimit),
      offset: parseInteger(query.offset, 0),
      budgetMs: config.search.budgetMs,
      maxReturn: config.search.maxReturn,
      defaultLimit: config.search.defaultLimit,
      previewChars: config.search.previewChars,
    });
  });

  server.get("/api/stats", async () => ({ stats: index.stats() }));

  server.get("/api/fields", async () => ({ fields: index.fields() }));

  server.post("/api/reindex", async () => {
    const summary = await index.reindex();
    return { ok: true, summary };
  });

  server.delete<{ Params: SessionParams }>("/api/sessions/:id", async (request) => {
    await index.deleteSession(request.params.id);
    return { ok: true };
  });

  server.delete<{ Params: MessageParams }>("/api/sessions/:id/messages/:messageId", async (request) => {
    await index.deleteMessage(request.params.id, request.params.messageId);
    return { ok: true };
  });

  server.post<{ Params: SessionParams; Body: TitleBody | null }>("/api/sessions/:id/title", async (request) => {
    const title = request.body?.title;
    if (typeof title !== "string") throw new BadRequestError("title must be a string");
    const session = await index.updateSessionTitle(request.params.id, title);
    return { ok: true, session };
  });

  server.get<{ Params: SessionParams; Querystring: SessionExportQuery }>(
    "/api/sessions/:id/export",
    async (request, reply) => {
      const session = index.session(request.params.id);
      if (!session) throw new NotFoundError(`session not found: ${request.params.id}`);
      const format = parseExportFormat(request.query.format);
      const result = writeSessionExport(index, session.id, format, parseExportFilters(request.query));
      reply.header("Content-Type", CONTENT_TYPES[format] ?? "text/plain; charset=utf-8");
      reply.header("Content-Disposition", `attachment; filename*=UTF-8''${buildAttachmentName(session, format)}`);
      reply.header("X-Export-Count", String(result.count));
      return result.body;
    },
  );

  server.get<{ Querystring: DirectoryExportQuery }>("/api/export/dir", async (request, reply) => {
    const query = request.query;
    const mode = parseDirectoryExportMode(query.mode);
    const format = parseDirectoryExportFormat(query.format);
    const cwd = query.cwd?.trim() ?? "";
    const result = writeDirectoryExport(index, cwd, mode, format, parseRange(query));
    reply.header("Content-Type", CONTENT_TYPES[format] ?? "text/plain; charset=utf-8");
    reply.header("Content-Disposition", `attachment; filename*=UTF-8''${buildDirectoryAttachmentName(cwd, mode, format)}`);
    reply.header("X-Export-Count", String(result.count));
    return result.body;
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const index = await SessionIndex.fromConfigPath(options.configPath);
  const config = index.getConfig();
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;

  index.on("scan_error", (error: unknown) => {
    console.error(`scan failed: ${errorMessage(error)}`);
  });
  await index.start();

  const server = await createServer({ index });
  await server.listen({ host, port });

  process.on("SIGINT", async () => {
    index.stop();
    await server.close();
    process.exit(0);
  });

  console.log(`threadwatch server: http://${host}:${port}`);
}
