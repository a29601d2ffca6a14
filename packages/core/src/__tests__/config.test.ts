import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { applyEnvOverrides, loadConfig, mergeConfig, resolveConfigPath, saveConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../defaults.js";

describe("config", () => {
  it("provides defaults for roots, scanning, retention, search and server", () => {
    const config = mergeConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.scan.intervalMs).toBe(1500);
    expect(config.retention.maxMessagesPerSession).toBe(5000);
    expect(config.search).toEqual({ budgetMs: 350, maxReturn: 200, defaultLimit: 50, previewChars: 240 });
    expect(config.server).toEqual({ host: "127.0.0.1", port: 7077, logger: false });
  });

  it("coerces numeric strings and rejects out-of-range values", () => {
    const config = mergeConfig({
      scan: { intervalMs: "2000" },
      retention: { maxMessagesPerSession: -3 },
      search: { maxReturn: 100, defaultLimit: 500 },
      server: { port: 70_000, logger: "true", host: "  " },
    });
    expect(config.scan.intervalMs).toBe(2000);
    expect(config.retention.maxMessagesPerSession).toBe(5000);
    expect(config.search.maxReturn).toBe(100);
    expect(config.search.defaultLimit).toBe(100);
    expect(config.server).toEqual({ host: "127.0.0.1", port: 7077, logger: true });
  });

  it("keeps the scan interval at 50ms or more", () => {
    expect(mergeConfig({ scan: { intervalMs: 5 } }).scan.intervalMs).toBe(50);
  });

  it("falls back to defaults when the file is missing or invalid", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "threadwatch-config-"));
    expect(await loadConfig(path.join(root, "missing.toml"))).toEqual(DEFAULT_CONFIG);

    const brokenPath = path.join(root, "broken.toml");
    await writeFile(brokenPath, "[scan\nintervalMs = ", "utf8");
    expect(await loadConfig(brokenPath)).toEqual(DEFAULT_CONFIG);
  });

  it("saves TOML that loads back to the same config", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "threadwatch-config-"));
    const configPath = path.join(root, "nested", "config.toml");
    const config = mergeConfig({
      roots: { codexDir: "/data/codex", claudeDir: "/data/claude" },
      search: { budgetMs: 500 },
      server: { port: 9000 },
    });

    await saveConfig(config, configPath);
    const text = await readFile(configPath, "utf8");
    expect(text).toContain('codexDir = "/data/codex"');
    expect(await loadConfig(configPath)).toEqual(config);
  });

  it("applies environment overrides over the file values", () => {
    const config = applyEnvOverrides(mergeConfig(), {
      CODEX_DIR: "/env/codex",
      HOST: "0.0.0.0",
      PORT: "8080",
    });
    expect(config.roots).toEqual({ codexDir: "/env/codex", claudeDir: "~/.claude/projects" });
    expect(config.server.host).toBe("0.0.0.0");
    expect(config.server.port).toBe(8080);
  });

  it("resolves the config path from the argument, then THREADWATCH_CONFIG", () => {
    expect(resolveConfigPath("/explicit.toml", { THREADWATCH_CONFIG: "/env.toml" })).toBe("/explicit.toml");
    expect(resolveConfigPath(undefined, { THREADWATCH_CONFIG: "/env.toml" })).toBe("/env.toml");
    expect(resolveConfigPath(undefined, {})).toBe(path.join(os.homedir(), ".threadwatch", "config.toml"));
  });
});
