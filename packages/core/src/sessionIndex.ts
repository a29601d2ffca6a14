import { EventEmitter } from "node:events";
import { rm } from "node:fs/promises";
import path from "node:path";
import type { AppConfig, IndexStats, Message, ProviderKind, ScanSummary, Session } from "@threadwatch/contracts";
import { applyEnvOverrides, loadConfig, resolveConfigPath } from "./config.js";
import { CursorStore, type FileCursor } from "./cursorStore.js";
import { discoverTranscriptFiles, resolveProviderRoots, type DiscoveredTranscriptFile } from "./discovery.js";
import { BadRequestError, NotFoundError } from "./errors.js";
import { readCustomTitle, sidecarPathFor, writeCustomTitle } from "./metadata.js";
import { NormalizerRegistry, type NormalizedRecord } from "./normalizers/index.js";
import { PollScheduler } from "./scheduler.js";
import {
  applyMessage,
  cloneSession,
  createSessionAggregate,
  createTally,
  setCustomTitle,
  subtractTally,
  tallyMessage,
  type SessionAggregate,
  type SessionTally,
} from "./sessionAggregator.js";
import type { SearchSource } from "./search/index.js";
import { tailFile, type TailLine, type TailResult } from "./tailer.js";
import { removeLine } from "./transcriptFiles.js";
import { createCounts, incrementCount, isRecord, nowMs, trimTitle } from "./utils.js";
import { WriteLock } from "./writeLock.js";

interface TrackedFile {
  path: string;
  provider: ProviderKind;
  relativePath: string;
  project: string;
  fileSessionKey: string;
  customTitle: string;
  metaLoaded: boolean;
  badLines: number;
  sessionIds: Set<string>;
  /** Per session, what this file's lines added to its counters. */
  tallies: Map<string, SessionTally>;
}

interface FileRead {
  tracked: TrackedFile;
  result: TailResult;
}

interface ScanCounters {
  scanCount: number;
  lastScanMs: number;
  lastScanAtMs: number;
}

const START_CURSOR: FileCursor = { offset: 0, lineNo: 0 };

export interface SessionIndexOptions {
  normalizers?: NormalizerRegistry;
}

function compareSessions(a: Session, b: Session): number {
  if (a.lastAtMs !== b.lastAtMs) {
    if (a.lastAtMs === null) return 1;
    if (b.lastAtMs === null) return -1;
    return b.lastAtMs - a.lastAtMs;
  }
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

function addCounts(into: Record<string, number>, from: Record<string, number>): void {
  for (const [key, count] of Object.entries(from)) {
    incrementCount(into, key, count);
  }
}

/**
 * In-memory index of every transcript under the configured roots. Reads are
 * synchronous copy-outs; every mutation goes through the write lock.
 *
 * Events: `scan` (ScanSummary) after each pass, `scan_error` (unknown) when a
 * polled pass fails.
 */
export class SessionIndex extends EventEmitter implements SearchSource {
  private readonly config: AppConfig;
  private readonly normalizers: NormalizerRegistry;
  private readonly roots: Record<ProviderKind, string>;
  private readonly lock = new WriteLock();
  private readonly cursors = new CursorStore();
  private readonly aggregates = new Map<string, SessionAggregate>();
  private readonly files = new Map<string, TrackedFile>();
  private counters: ScanCounters = { scanCount: 0, lastScanMs: 0, lastScanAtMs: 0 };
  private scheduler: PollScheduler | null = null;

  constructor(config: AppConfig, options: SessionIndexOptions = {}) {
    super();
    this.config = config;
    this.normalizers = options.normalizers ?? new NormalizerRegistry();
    this.roots = resolveProviderRoots(config.roots);
  }

  /** Loads the TOML config (THREADWATCH_CONFIG when no path is given) with env overrides applied. */
  static async fromConfigPath(configPath?: string): Promise<SessionIndex> {
    const config = await loadConfig(resolveConfigPath(configPath));
    return new SessionIndex(applyEnvOverrides(config));
  }

  getConfig(): AppConfig {
    return this.config;
  }

  sessions(): Session[] {
    return Array.from(this.aggregates.values(), (aggregate) => cloneSession(aggregate.session)).sort(compareSessions);
  }

  session(id: string): Session | null {
    const aggregate = this.aggregates.get(id);
    return aggregate ? cloneSession(aggregate.session) : null;
  }

  /** The last `limit` retained messages in ingestion order, or all of them when `limit <= 0`. */
  messages(sessionId: string, limit: number): Message[] {
    const aggregate = this.aggregates.get(sessionId);
    if (!aggregate) return [];
    const retained = aggregate.messages;
    const slice = limit > 0 && limit < retained.length ? retained.slice(-limit) : retained.slice();
    return slice.map((message) => ({ ...message }));
  }

  stats(): IndexStats {
    const byRole = createCounts();
    const byModel = createCounts();
    const fields = createCounts();
    let totalMessages = 0;
    for (const aggregate of this.aggregates.values()) {
      totalMessages += aggregate.session.messageCount;
      addCounts(byRole, aggregate.session.roles);
      addCounts(byModel, aggregate.session.models);
      addCounts(fields, aggregate.fields);
    }

    let badLines = 0;
    for (const tracked of this.files.values()) {
      badLines += tracked.badLines;
    }

    return {
      totalMessages,
      totalSessions: this.aggregates.size,
      byRole,
      byModel,
      fields,
      badLines,
      trackedFiles: this.files.size,
      scanCount: this.counters.scanCount,
      lastScanMs: this.counters.lastScanMs,
      lastScanAtMs: this.counters.lastScanAtMs,
    };
  }

  fields(): Record<string, number> {
    return this.stats().fields;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.scheduler?.isRunning) return;
    this.scheduler = new PollScheduler({
      intervalMs: this.config.scan.intervalMs,
      task: async () => {
        await this.scanOnce();
      },
      onError: (error) => {
        this.emit("scan_error", error);
      },
    });
    await this.scheduler.start(signal);
  }

  stop(): void {
    this.scheduler?.stop();
  }

  /** One discovery and tail pass over every transcript file. */
  async scanOnce(): Promise<ScanSummary> {
    const startedAt = nowMs();
    const discovered = await discoverTranscriptFiles(this.config.roots);

    let filesRead = 0;
    let linesIngested = 0;
    for (const file of discovered) {
      const ingested = await this.lock.run(() => this.tailTracked(this.track(file)));
      if (ingested > 0) {
        filesRead += 1;
        linesIngested += ingested;
      }
    }
    return this.finishScan(startedAt, discovered.length, filesRead, linesIngested);
  }

  /**
   * Reads every file again from the start. The new state is read off to the
   * side and swapped in at once, so readers see either the old index or the
   * new one.
   */
  async reindex(): Promise<ScanSummary> {
    const startedAt = nowMs();
    const counts = await this.lock.run(async () => {
      const discovered = await discoverTranscriptFiles(this.config.roots);
      const reads: FileRead[] = [];
      for (const file of discovered) {
        const tracked = this.createTracked(file);
        const result = await this.readTracked(tracked, START_CURSOR);
        if (result) reads.push({ tracked, result });
      }

      this.aggregates.clear();
      this.files.clear();
      this.cursors.clear();
      let filesRead = 0;
      let linesIngested = 0;
      for (const read of reads) {
        this.files.set(read.tracked.path, read.tracked);
        const ingested = this.applyTail(read.tracked, read.result);
        if (ingested > 0) {
          filesRead += 1;
          linesIngested += ingested;
        }
      }
      return { filesSeen: discovered.length, filesRead, linesIngested };
    });
    return this.finishScan(startedAt, counts.filesSeen, counts.filesRead, counts.linesIngested);
  }

  async deleteSession(id: string): Promise<void> {
    await this.lock.run(async () => {
      const aggregate = this.aggregates.get(id);
      if (!aggregate) throw new NotFoundError(`session not found: ${id}`);

      const filePaths = Array.from(aggregate.filePaths);
      for (const filePath of filePaths) {
        await rm(filePath, { force: true });
        await rm(sidecarPathFor(filePath), { force: true });
      }

      this.aggregates.delete(id);
      for (const filePath of filePaths) {
        const tracked = this.files.get(filePath);
        if (tracked) {
          // sessions sharing the file lose its messages too
          this.purgeFile(tracked);
          this.files.delete(filePath);
        }
        this.cursors.delete(filePath);
      }
    });
  }

  /**
   * Removes the message's line from its transcript, then re-reads that file
   * so the session's counts match what is left on disk. The re-read finishes
   * before any in-memory state changes.
   */
  async deleteMessage(sessionId: string, messageId: string): Promise<void> {
    await this.lock.run(async () => {
      const aggregate = this.aggregates.get(sessionId);
      if (!aggregate) throw new NotFoundError(`session not found: ${sessionId}`);
      if (aggregate.messages.length === 0) throw new NotFoundError(`no messages for session: ${sessionId}`);

      const message = messageId ? aggregate.messages.find((candidate) => candidate.id === messageId) : undefined;
      if (!message) throw new NotFoundError(`message not found: ${messageId}`);

      const filePath = path.join(this.roots[message.provider], ...message.source.split("/"));
      await removeLine(filePath, message.lineNo);

      const tracked = this.files.get(filePath);
      if (!tracked) {
        this.cursors.reset(filePath);
        return;
      }
      const result = await this.readTracked(tracked, START_CURSOR);
      this.purgeFile(tracked);
      if (result) {
        this.applyTail(tracked, result);
      } else {
        // the next poll reads whatever is there from the start
        this.cursors.reset(filePath);
      }
    });
  }

  async updateSessionTitle(id: string, text: string): Promise<Session> {
    return this.lock.run(async () => {
      const aggregate = this.aggregates.get(id);
      if (!aggregate) throw new NotFoundError(`session not found: ${id}`);

      const title = trimTitle(text);
      if (!title) throw new BadRequestError("title must not be empty");

      const [primaryPath] = aggregate.filePaths;
      if (!primaryPath) throw new NotFoundError(`no source file for session: ${id}`);

      await writeCustomTitle(primaryPath, title);
      setCustomTitle(aggregate, title);
      const tracked = this.files.get(primaryPath);
      if (tracked) tracked.customTitle = title;
      return cloneSession(aggregate.session);
    });
  }

  private finishScan(startedAt: number, filesSeen: number, filesRead: number, linesIngested: number): ScanSummary {
    const finishedAt = nowMs();
    this.counters = {
      scanCount: this.counters.scanCount + 1,
      lastScanMs: finishedAt - startedAt,
      lastScanAtMs: finishedAt,
    };
    const summary: ScanSummary = {
      filesSeen,
      filesRead,
      linesIngested,
      durationMs: finishedAt - startedAt,
    };
    this.emit("scan", summary);
    return summary;
  }

  private createTracked(file: DiscoveredTranscriptFile): TrackedFile {
    return {
      path: file.path,
      provider: file.provider,
      relativePath: file.relativePath,
      project: file.project,
      fileSessionKey: file.fileSessionKey,
      customTitle: "",
      metaLoaded: false,
      badLines: 0,
      sessionIds: new Set(),
      tallies: new Map(),
    };
  }

  private track(file: DiscoveredTranscriptFile): TrackedFile {
    const existing = this.files.get(file.path);
    if (existing) return existing;
    const tracked = this.createTracked(file);
    this.files.set(file.path, tracked);
    return tracked;
  }

  /** The file I/O half of a tail: sidecar title, then the bytes after the cursor. Null when the file cannot be read. */
  private async readTracked(tracked: TrackedFile, cursor: FileCursor): Promise<TailResult | null> {
    if (!tracked.metaLoaded) {
      tracked.customTitle = await readCustomTitle(tracked.path);
      tracked.metaLoaded = true;
    }
    try {
      return await tailFile(tracked.path, cursor);
    } catch {
      // removed or unreadable since discovery
      return null;
    }
  }

  /** Returns the number of messages ingested. Must run under the write lock. */
  private async tailTracked(tracked: TrackedFile): Promise<number> {
    const result = await this.readTracked(tracked, this.cursors.get(tracked.path));
    if (!result) {
      // a file never read is forgotten until discovery finds it again
      if (!this.cursors.has(tracked.path) && tracked.sessionIds.size === 0) {
        this.files.delete(tracked.path);
      }
      return 0;
    }
    return this.applyTail(tracked, result);
  }

  /** Folds a tail result into the index without awaiting, so readers never see it half applied. */
  private applyTail(tracked: TrackedFile, result: TailResult): number {
    if (result.restarted) {
      this.purgeFile(tracked);
    }

    let ingested = 0;
    for (const line of result.lines) {
      if (this.ingestLine(tracked, line)) ingested += 1;
    }
    this.cursors.set(tracked.path, result.cursor);

    for (const sessionId of tracked.sessionIds) {
      const session = this.aggregates.get(sessionId)?.session;
      if (session && (session.fileModAtMs === null || session.fileModAtMs < result.mtimeMs)) {
        session.fileModAtMs = result.mtimeMs;
      }
    }
    return ingested;
  }

  private ingestLine(tracked: TrackedFile, line: TailLine): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line.text);
    } catch {
      tracked.badLines += 1;
      return false;
    }
    if (!isRecord(parsed)) {
      tracked.badLines += 1;
      return false;
    }

    const record = this.normalizers.normalize(
      {
        provider: tracked.provider,
        fileSessionKey: tracked.fileSessionKey,
        source: tracked.relativePath,
        lineNo: line.lineNo,
      },
      parsed,
    );
    if (!record) return false;
    this.addRecord(tracked, record);
    return true;
  }

  private addRecord(tracked: TrackedFile, record: NormalizedRecord): void {
    const message = record.message;
    let aggregate = this.aggregates.get(message.sessionId);
    if (!aggregate) {
      aggregate = createSessionAggregate(message.sessionId, tracked.provider, tracked.project);
      this.aggregates.set(message.sessionId, aggregate);
    }
    if (tracked.customTitle && aggregate.titleSource !== "custom") {
      setCustomTitle(aggregate, tracked.customTitle);
    }
    aggregate.filePaths.add(tracked.path);
    tracked.sessionIds.add(message.sessionId);

    applyMessage(aggregate, record);
    let tally = tracked.tallies.get(message.sessionId);
    if (!tally) {
      tally = createTally();
      tracked.tallies.set(message.sessionId, tally);
    }
    tallyMessage(tally, message);
    aggregate.messages.push(message);
    const overflow = aggregate.messages.length - this.config.retention.maxMessagesPerSession;
    if (overflow > 0) {
      aggregate.messages.splice(0, overflow);
    }
  }

  /** Takes back everything the file added, retained or not, and forgets its malformed lines. */
  private purgeFile(tracked: TrackedFile): void {
    for (const sessionId of tracked.sessionIds) {
      const aggregate = this.aggregates.get(sessionId);
      if (!aggregate) continue;
      const tally = tracked.tallies.get(sessionId);
      if (tally) subtractTally(aggregate, tally);
      aggregate.messages = aggregate.messages.filter(
        (message) => message.provider !== tracked.provider || message.source !== tracked.relativePath,
      );
    }
    tracked.tallies.clear();
    tracked.badLines = 0;
  }
}
