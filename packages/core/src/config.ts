import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  ProviderRootsConfig,
  RetentionConfig,
  ScanConfig,
  SearchConfig,
  ServerConfig,
} from "@threadwatch/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { asRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".threadwatch", "config.toml");

type SectionInput<T> = { [K in keyof T]?: unknown };

export interface ConfigInput {
  roots?: SectionInput<ProviderRootsConfig>;
  scan?: SectionInput<ScanConfig>;
  retention?: SectionInput<RetentionConfig>;
  search?: SectionInput<SearchConfig>;
  server?: SectionInput<ServerConfig>;
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() && Number.isFinite(Number(value))) return Number(value);
  return null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function booleanOrDefault(value: unknown, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return fallback;
}

function mergeRoots(input?: SectionInput<ProviderRootsConfig>): ProviderRootsConfig {
  const defaults = DEFAULT_CONFIG.roots;
  return {
    codexDir: nonEmptyStringOrDefault(input?.codexDir, defaults.codexDir),
    claudeDir: nonEmptyStringOrDefault(input?.claudeDir, defaults.claudeDir),
  };
}

function mergeScan(input?: SectionInput<ScanConfig>): ScanConfig {
  return {
    intervalMs: Math.max(50, positiveIntOrDefault(input?.intervalMs, DEFAULT_CONFIG.scan.intervalMs)),
  };
}

function mergeRetention(input?: SectionInput<RetentionConfig>): RetentionConfig {
  return {
    maxMessagesPerSession: positiveIntOrDefault(
      input?.maxMessagesPerSession,
      DEFAULT_CONFIG.retention.maxMessagesPerSession,
    ),
  };
}

function mergeSearch(input?: SectionInput<SearchConfig>): SearchConfig {
  const defaults = DEFAULT_CONFIG.search;
  const maxReturn = positiveIntOrDefault(input?.maxReturn, defaults.maxReturn);
  return {
    budgetMs: positiveIntOrDefault(input?.budgetMs, defaults.budgetMs),
    maxReturn,
    defaultLimit: Math.min(maxReturn, positiveIntOrDefault(input?.defaultLimit, defaults.defaultLimit)),
    previewChars: positiveIntOrDefault(input?.previewChars, defaults.previewChars),
  };
}

function mergeServer(input?: SectionInput<ServerConfig>): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const port = positiveIntOrDefault(input?.port, defaults.port);
  return {
    host: nonEmptyStringOrDefault(input?.host, defaults.host),
    port: port <= 65_535 ? port : defaults.port,
    logger: booleanOrDefault(input?.logger, defaults.logger),
  };
}

export function mergeConfig(input?: ConfigInput): AppConfig {
  return {
    roots: mergeRoots(input?.roots),
    scan: mergeScan(input?.scan),
    retention: mergeRetention(input?.retention),
    search: mergeSearch(input?.search),
    server: mergeServer(input?.server),
  };
}

export function toConfigInput(value: unknown): ConfigInput {
  const record = asRecord(value);
  return {
    roots: asRecord(record.roots),
    scan: asRecord(record.scan),
    retention: asRecord(record.retention),
    search: asRecord(record.search),
    server: asRecord(record.server),
  };
}

/** Applies CODEX_DIR, CLAUDE_DIR, HOST and PORT on top of a merged config. */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return mergeConfig({
    roots: {
      codexDir: env.CODEX_DIR ?? config.roots.codexDir,
      claudeDir: env.CLAUDE_DIR ?? config.roots.claudeDir,
    },
    scan: config.scan,
    retention: config.retention,
    search: config.search,
    server: {
      host: env.HOST ?? config.server.host,
      port: env.PORT ?? config.server.port,
      logger: config.server.logger,
    },
  });
}

/** An explicit path wins over THREADWATCH_CONFIG, which wins over the default. */
export function resolveConfigPath(configPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return configPath ?? (env.THREADWATCH_CONFIG?.trim() || DEFAULT_CONFIG_PATH);
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    return mergeConfig(toConfigInput(TOML.parse(raw)));
  } catch {
    return mergeConfig();
  }
}

function toTomlDocument(config: AppConfig): JsonMap {
  return {
    roots: { codexDir: config.roots.codexDir, claudeDir: config.roots.claudeDir },
    scan: { intervalMs: config.scan.intervalMs },
    retention: { maxMessagesPerSession: config.retention.maxMessagesPerSession },
    search: {
      budgetMs: config.search.budgetMs,
      maxReturn: config.search.maxReturn,
      defaultLimit: config.search.defaultLimit,
      previewChars: config.search.previewChars,
    },
    server: { host: config.server.host, port: config.server.port, logger: config.server.logger },
  };
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(toTomlDocument(config));
  await writeFile(configPath, content, "utf8");
}
