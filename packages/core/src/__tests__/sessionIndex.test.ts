import { access, appendFile, mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { mergeConfig } from "../config.js";
import { BadRequestError, NotFoundError } from "../errors.js";
import { SessionIndex } from "../sessionIndex.js";

interface Fixture {
  root: string;
  codexDir: string;
  claudeDir: string;
  sessionsDir: string;
}

async function createFixture(): Promise<Fixture> {
  const root = await mkdtemp(path.join(os.tmpdir(), "threadwatch-index-"));
  const codexDir = path.join(root, "codex");
  const claudeDir = path.join(root, "claude");
  const sessionsDir = path.join(codexDir, "sessions", "2024", "01", "01");
  await mkdir(sessionsDir, { recursive: true });
  await mkdir(claudeDir, { recursive: true });
  return { root, codexDir, claudeDir, sessionsDir };
}

function createIndex(fixture: Fixture, maxMessagesPerSession?: number): SessionIndex {
  return new SessionIndex(
    mergeConfig({
      roots: { codexDir: fixture.codexDir, claudeDir: fixture.claudeDir },
      retention: { maxMessagesPerSession },
    }),
  );
}

function jsonl(...records: Record<string, unknown>[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join("");
}

/** Samples `read` on every turn of the event loop until `work` settles, then once more. */
async function sampleWhile(work: Promise<unknown>, read: () => number): Promise<number[]> {
  const samples: number[] = [];
  let settled = false;
  const finished = work.finally(() => {
    settled = true;
  });
  while (!settled) {
    samples.push(read());
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  await finished;
  samples.push(read());
  return samples;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

const buildCli = {
  id: "m1",
  session_id: "s1",
  role: "user",
  content: "Build a CLI tool",
  model: "gpt-4",
  cwd: "/home/user/project1",
  timestamp: "2024-01-01T00:00:00Z",
};
const plan = {
  id: "m2",
  session_id: "s1",
  role: "assistant",
  content: "Sure, here's a plan",
  model: "gpt-4",
  timestamp: "2024-01-01T00:01:00Z",
};
const fixBug = {
  id: "m3",
  session_id: "s2",
  role: "user",
  content: "Fix the bug",
  cwd: "/home/user/project2",
  timestamp: "2024-01-02T00:00:00Z",
};

describe("SessionIndex", () => {
  it("indexes sessions from a codex transcript", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(buildCli, plan, fixBug), "utf8");
    const index = createIndex(fixture);

    const summary = await index.scanOnce();
    expect(summary).toMatchObject({ filesSeen: 1, filesRead: 1, linesIngested: 3 });

    const sessions = index.sessions();
    expect(sessions.map((session) => session.id)).toEqual(["s2", "s1"]);
    expect(index.session("s1")).toMatchObject({
      title: "Build a CLI tool",
      cwd: "/home/user/project1",
      cwdBase: "project1",
      messageCount: 2,
      textCount: 2,
      firstAtMs: Date.UTC(2024, 0, 1, 0, 0),
      lastAtMs: Date.UTC(2024, 0, 1, 0, 1),
      models: { "gpt-4": 2 },
      roles: { user: 1, assistant: 1 },
      sources: ["sessions/2024/01/01/a.jsonl"],
      provider: "codex",
    });
    expect(index.session("s2")?.cwd).toBe("/home/user/project2");

    const last = index.messages("s1", 1);
    expect(last.map((message) => message.id)).toEqual(["m2"]);
    expect(last[0]?.lineNo).toBe(2);

    const stats = index.stats();
    expect(stats.totalSessions).toBe(2);
    expect(stats.totalMessages).toBe(3);
    expect(stats.byRole).toEqual({ user: 2, assistant: 1 });
    expect(stats.byModel).toEqual({ "gpt-4": 2 });
    expect(index.fields()).toEqual({ id: 3, session_id: 3, role: 3, content: 3, model: 2, cwd: 2, timestamp: 3 });
  });

  it("takes an explicit title and an environment-context cwd", async () => {
    const fixture = await createFixture();
    await writeFile(
      path.join(fixture.sessionsDir, "a.jsonl"),
      jsonl(buildCli, plan, {
        session_id: "s2",
        role: "user",
        title: "Project Setup",
        content: "Let's start",
        environment_context: "<environment_context><cwd>/workspace/app</cwd></environment_context>",
        timestamp: "2024-01-01T00:02:00Z",
      }),
      "utf8",
    );
    const index = createIndex(fixture);
    await index.scanOnce();

    expect(index.sessions().map((session) => session.id)).toEqual(["s2", "s1"]);
    expect(index.session("s2")).toMatchObject({ title: "Project Setup", cwd: "/workspace/app", cwdBase: "app" });
  });

  it("ingests nothing new when the files have not changed", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(buildCli, plan), "utf8");
    const index = createIndex(fixture);

    await index.scanOnce();
    const second = await index.scanOnce();
    expect(second).toMatchObject({ filesSeen: 1, filesRead: 0, linesIngested: 0 });
    expect(index.stats()).toMatchObject({ totalMessages: 2, scanCount: 2, trackedFiles: 1 });
  });

  it("consumes a partial trailing line as it stands", async () => {
    const fixture = await createFixture();
    const filePath = path.join(fixture.sessionsDir, "a.jsonl");
    await writeFile(filePath, jsonl(buildCli), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    await appendFile(filePath, '{"id":"m2","session_id":"s1","role":"assistant","content":"ha', "utf8");
    await index.scanOnce();
    expect(index.session("s1")?.messageCount).toBe(1);
    expect(index.stats().badLines).toBe(1);

    // the completed line is read from the old end of file, so neither half parses
    await appendFile(filePath, `lf done"}\n${jsonl(plan)}`, "utf8");
    await index.scanOnce();
    const messages = index.messages("s1", 0);
    expect(messages.map((message) => message.id)).toEqual(["m1", "m2"]);
    expect(messages[1]?.content).toBe("Sure, here's a plan");
    expect(messages[1]?.lineNo).toBe(4);
    expect(index.stats().badLines).toBe(2);
  });

  it("re-reads a file that was truncated", async () => {
    const fixture = await createFixture();
    const filePath = path.join(fixture.sessionsDir, "a.jsonl");
    await writeFile(filePath, jsonl(buildCli, plan), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    await writeFile(filePath, jsonl({ id: "m9", session_id: "s1", role: "user", content: "short" }), "utf8");
    await index.scanOnce();
    expect(index.messages("s1", 0).map((message) => message.id)).toEqual(["m9"]);
    expect(index.session("s1")?.messageCount).toBe(1);
  });

  it("counts malformed lines without indexing them", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), `not json\n[1,2]\n\n${jsonl(buildCli)}`, "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    expect(index.stats().badLines).toBe(2);
    expect(index.messages("s1", 0)[0]?.lineNo).toBe(4);
  });

  it("counts roles and raw keys named after Object.prototype members", async () => {
    const fixture = await createFixture();
    await writeFile(
      path.join(fixture.sessionsDir, "a.jsonl"),
      '{"session_id":"s1","role":"constructor","content":"hi","__proto__":1}\n',
      "utf8",
    );
    const index = createIndex(fixture);
    await index.scanOnce();

    expect(index.session("s1")?.roles).toEqual({ constructor: 1 });
    expect(index.stats().byRole["constructor"]).toBe(1);
    expect(Object.entries(index.fields())).toContainEqual(["__proto__", 1]);
  });

  it("keeps only the most recent messages past the retention cap", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(buildCli, plan, { ...fixBug, session_id: "s1" }), "utf8");
    const index = createIndex(fixture, 2);
    await index.scanOnce();

    expect(index.messages("s1", 0).map((message) => message.id)).toEqual(["m2", "m3"]);
    expect(index.session("s1")?.messageCount).toBe(3);
  });

  it("titles a session from its cwd when the first prompt is environment context", async () => {
    const fixture = await createFixture();
    await writeFile(
      path.join(fixture.sessionsDir, "a.jsonl"),
      jsonl(
        { session_id: "c1", role: "user", content: "<environment_context><cwd>/work/app</cwd></environment_context>" },
        { session_id: "c1", role: "user", content: "Real question" },
      ),
      "utf8",
    );
    const index = createIndex(fixture);
    await index.scanOnce();

    expect(index.session("c1")).toMatchObject({ title: "app", cwd: "/work/app", cwdBase: "app" });
  });

  it("prefers content over a generated identifier as the title", async () => {
    const fixture = await createFixture();
    await writeFile(
      path.join(fixture.sessionsDir, "rollout-2024-05-01T10-00-00-abc.jsonl"),
      jsonl({ title: "rollout-2024-05-01T10-00-00-abc", role: "user", content: "Refactor the tailer" }),
      "utf8",
    );
    const index = createIndex(fixture);
    await index.scanOnce();

    expect(index.session("rollout-2024-05-01T10-00-00-abc")?.title).toBe("Refactor the tailer");
  });

  it("keys claude sessions by project and file", async () => {
    const fixture = await createFixture();
    const projectDir = path.join(fixture.claudeDir, "-home-dev-app");
    await mkdir(projectDir, { recursive: true });
    await writeFile(
      path.join(projectDir, "abc.jsonl"),
      jsonl({ type: "user", uuid: "u1", cwd: "/home/dev/app", message: { role: "user", content: "hello" } }),
      "utf8",
    );
    const index = createIndex(fixture);
    await index.scanOnce();

    expect(index.session("claude:-home-dev-app:abc")).toMatchObject({
      provider: "claude",
      project: "-home-dev-app",
      title: "hello",
      sources: ["-home-dev-app/abc.jsonl"],
    });
  });

  it("deletes a message line and resyncs the session", async () => {
    const fixture = await createFixture();
    const filePath = path.join(fixture.sessionsDir, "a.jsonl");
    await writeFile(filePath, jsonl(buildCli, plan, fixBug), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    await index.deleteMessage("s1", "m2");

    expect(index.session("s1")?.messageCount).toBe(1);
    expect(index.messages("s1", 0).map((message) => message.id)).toEqual(["m1"]);
    expect(index.messages("s2", 0)[0]?.lineNo).toBe(2);
    expect(index.stats().totalMessages).toBe(2);
    const text = await readFile(filePath, "utf8");
    expect(text).toBe(jsonl(buildCli, fixBug));
  });

  it("decrements the count by one when retention has dropped older messages", async () => {
    const fixture = await createFixture();
    const filePath = path.join(fixture.sessionsDir, "a.jsonl");
    const records = [1, 2, 3, 4, 5, 6].map((n) => ({ id: `m${n}`, session_id: "s1", role: "user", content: `step ${n}` }));
    await writeFile(filePath, jsonl(...records), "utf8");
    const index = createIndex(fixture, 2);
    await index.scanOnce();
    expect(index.session("s1")?.messageCount).toBe(6);

    await index.deleteMessage("s1", "m6");

    expect(index.session("s1")).toMatchObject({ messageCount: 5, textCount: 5, roles: { user: 5 } });
    expect(index.stats().totalMessages).toBe(5);
    expect(index.fields()).toEqual({ id: 5, session_id: 5, role: 5, content: 5 });
    expect(index.messages("s1", 0).map((message) => message.id)).toEqual(["m4", "m5"]);
    const text = await readFile(filePath, "utf8");
    expect(text.split("\n").filter(Boolean)).toHaveLength(5);
  });

  it("never shows readers a half-applied message delete", async () => {
    const fixture = await createFixture();
    const records = [1, 2, 3, 4, 5].map((n) => ({ id: `m${n}`, session_id: "s1", role: "user", content: `step ${n}` }));
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(...records), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    const counts = await sampleWhile(index.deleteMessage("s1", "m3"), () => index.session("s1")?.messageCount ?? 0);
    expect([...new Set(counts)]).toEqual([5, 4]);
  });

  it("swaps a reindex in at once", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(buildCli, plan), "utf8");
    await writeFile(path.join(fixture.sessionsDir, "b.jsonl"), jsonl(fixBug), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    const totals = await sampleWhile(index.reindex(), () => index.stats().totalMessages);
    expect([...new Set(totals)]).toEqual([3]);
    expect(index.stats()).toMatchObject({ totalSessions: 2, trackedFiles: 2, scanCount: 2 });
  });

  it("rejects deletes of unknown sessions and messages", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(buildCli), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    await expect(index.deleteMessage("nope", "m1")).rejects.toThrow(new NotFoundError("session not found: nope"));
    await expect(index.deleteMessage("s1", "m7")).rejects.toThrow("message not found: m7");
    await expect(index.deleteSession("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("deletes a session with its files and sidecar", async () => {
    const fixture = await createFixture();
    const first = path.join(fixture.sessionsDir, "a.jsonl");
    const second = path.join(fixture.sessionsDir, "b.jsonl");
    await writeFile(first, jsonl(buildCli, plan), "utf8");
    await writeFile(second, jsonl(fixBug), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();
    await index.updateSessionTitle("s1", "Keep me");

    await index.deleteSession("s1");

    expect(await exists(first)).toBe(false);
    expect(await exists(path.join(fixture.sessionsDir, "a.meta.json"))).toBe(false);
    expect(index.sessions().map((session) => session.id)).toEqual(["s2"]);
    expect(index.stats()).toMatchObject({ totalMessages: 1, trackedFiles: 1 });

    await index.scanOnce();
    expect(index.session("s1")).toBeNull();
  });

  it("stores custom titles in a sidecar that survives a reindex", async () => {
    const fixture = await createFixture();
    const filePath = path.join(fixture.sessionsDir, "a.jsonl");
    await writeFile(filePath, jsonl(buildCli, plan), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    const updated = await index.updateSessionTitle("s1", "  My title ");
    expect(updated.title).toBe("My title");
    const sidecar: unknown = JSON.parse(await readFile(path.join(fixture.sessionsDir, "a.meta.json"), "utf8"));
    expect(sidecar).toEqual({ custom_title: "My title" });

    await index.reindex();
    expect(index.session("s1")?.title).toBe("My title");
    expect(index.stats().totalMessages).toBe(2);
  });

  it("rejects an empty title", async () => {
    const fixture = await createFixture();
    await writeFile(path.join(fixture.sessionsDir, "a.jsonl"), jsonl(buildCli), "utf8");
    const index = createIndex(fixture);
    await index.scanOnce();

    await expect(index.updateSessionTitle("s1", "   ")).rejects.toBeInstanceOf(BadRequestError);
    await expect(index.updateSessionTitle("missing", "x")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("emits a scan event after each pass", async () => {
    const fixture = await createFixture();
    const index = createIndex(fixture);
    const seen: unknown[] = [];
    index.on("scan", (summary) => seen.push(summary));

    await index.scanOnce();
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ filesSeen: 0, filesRead: 0, linesIngested: 0 });
  });
});
