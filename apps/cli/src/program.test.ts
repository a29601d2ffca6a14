import { mkdtemp, mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "./program.js";

interface Fixture {
  root: string;
  configPath: string;
  transcriptPath: string;
  baseArgs: string[];
}

function jsonl(...records: Record<string, unknown>[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join("");
}

async function buildFixture(): Promise<Fixture> {
  const root = await mkdtemp(path.join(os.tmpdir(), "threadwatch-cli-"));
  const codexDir = path.join(root, "codex");
  const claudeDir = path.join(root, "claude");
  const sessionsDir = path.join(codexDir, "sessions", "2024", "01", "01");
  await mkdir(sessionsDir, { recursive: true });
  await mkdir(claudeDir, { recursive: true });

  const transcriptPath = path.join(sessionsDir, "a.jsonl");
  await writeFile(
    transcriptPath,
    jsonl(
      { id: "m1", session_id: "s1", role: "user", content: "Build a CLI tool", cwd: "/home/user/project1", timestamp: "2024-01-01T00:00:00Z" },
      { id: "m2", session_id: "s1", role: "assistant", content: "Sure, here's a plan", timestamp: "2024-01-01T00:01:00Z" },
      { id: "m3", session_id: "s2", role: "user", content: "Fix the bug", timestamp: "2024-01-02T00:00:00Z" },
    ),
    "utf8",
  );

  const configPath = path.join(root, "config", "config.toml");
  return {
    root,
    configPath,
    transcriptPath,
    baseArgs: ["--config", configPath, "--codex-dir", codexDir, "--claude-dir", claudeDir],
  };
}

async function run(args: string[]): Promise<string[]> {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const program = createProgram().exitOverride();
  await program.parseAsync(args, { from: "user" });
  return log.mock.calls.map((call) => String(call[0]));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("cli", () => {
  it("lists sessions as JSON", async () => {
    const fixture = await buildFixture();
    const [output] = await run([...fixture.baseArgs, "sessions", "--json"]);
    const sessions: unknown = JSON.parse(output ?? "");
    expect(sessions).toMatchObject([{ id: "s2", messageCount: 1 }, { id: "s1", messageCount: 2 }]);
  });

  it("prints stats with a role table", async () => {
    const fixture = await buildFixture();
    const lines = await run([...fixture.baseArgs, "stats"]);
    expect(lines).toEqual([
      "sessions: 2",
      "messages: 3",
      "bad_lines: 0",
      "tracked_files: 1",
      "",
      "role      | count",
      "----------+------",
      "user        2",
      "assistant   1",
    ]);
  });

  it("searches across sessions", async () => {
    const fixture = await buildFixture();
    const [output] = await run([...fixture.baseArgs, "search", "role:user", "--json"]);
    const response: unknown = JSON.parse(output ?? "");
    expect(response).toMatchObject({ total: 2, truncated: false, hits: [{ messageId: "m3" }, { messageId: "m1" }] });
  });

  it("exports a session to a file", async () => {
    const fixture = await buildFixture();
    const out = path.join(fixture.root, "s1.md");
    const lines = await run([...fixture.baseArgs, "export", "s1", "--format", "md", "--out", out]);
    expect(lines).toEqual([`wrote 2 item(s) to ${out}`]);
    expect(await readFile(out, "utf8")).toBe(
      "# Build a CLI tool\n\nCWD: /home/user/project1\n\n### USER\n\nBuild a CLI tool\n\n### ASSISTANT\n\nSure, here's a plan\n\n",
    );
  });

  it("exports user prompts under a directory", async () => {
    const fixture = await buildFixture();
    const out = path.join(fixture.root, "prompts.json");
    await run([...fixture.baseArgs, "export-dir", "--cwd", "/home/user", "--mode", "user", "--format", "json", "--out", out]);
    expect(JSON.parse(await readFile(out, "utf8"))).toEqual(["Build a CLI tool"]);
  });

  it("retitles a session", async () => {
    const fixture = await buildFixture();
    expect(await run([...fixture.baseArgs, "retitle", "s1", "Planning", "session"])).toEqual(["s1: Planning session"]);
    const [output] = await run([...fixture.baseArgs, "sessions", "--json"]);
    expect(JSON.parse(output ?? "")).toMatchObject([{ id: "s2" }, { id: "s1", title: "Planning session" }]);
  });

  it("deletes a message from its transcript", async () => {
    const fixture = await buildFixture();
    expect(await run([...fixture.baseArgs, "delete-message", "s1", "m2"])).toEqual(["deleted message m2"]);
    const remaining = (await readFile(fixture.transcriptPath, "utf8")).trimEnd().split("\n");
    expect(remaining.map((line) => String(JSON.parse(line).id))).toEqual(["m1", "m3"]);
  });

  it("fails for an unknown session", async () => {
    const fixture = await buildFixture();
    await expect(run([...fixture.baseArgs, "messages", "missing"])).rejects.toThrow("session not found: missing");
  });

  it("reads and writes config keys", async () => {
    const fixture = await buildFixture();
    expect(await run([...fixture.baseArgs, "config", "path"])).toEqual([fixture.configPath]);
    expect(await run([...fixture.baseArgs, "config", "set", "search.budgetMs", "500"])).toEqual(["updated search.budgetMs"]);
    expect(await run([...fixture.baseArgs, "config", "get", "search.budgetMs"])).toEqual(["500"]);
    await expect(run([...fixture.baseArgs, "config", "set", "search.nope", "1"])).rejects.toThrow(
      "unknown config key: search.nope",
    );
  });
});
