import path from "node:path";
import type { Message, ProviderKind, Session } from "@threadwatch/contracts";
import type { NormalizedRecord } from "./normalizers/types.js";
import { createCounts, decrementCount, incrementCount, trimTitle } from "./utils.js";

/** Where the current title came from. Only "none" is open to the records that follow. */
export type TitleSource = "none" | "fallback" | "derived" | "explicit" | "custom";

const ENVIRONMENT_MARKERS = ["<cwd>", "</cwd>", "<approval_pol", "<sandbox_mode", "<network_access", "<shell>"];
const GENERATED_ID_PATTERN = /^[a-z]+-\d{4}-\d{2}-\d{2}t\d{2}-\d{2}-\d{2}(?:-[0-9a-z]+)+$/;

/** What one file has added to one session's counters, so a purge can take back exactly that. */
export interface SessionTally {
  messageCount: number;
  textCount: number;
  models: Record<string, number>;
  roles: Record<string, number>;
  fields: Record<string, number>;
}

export interface SessionAggregate {
  session: Session;
  titleSource: TitleSource;
  messages: Message[];
  /** Top-level raw keys of every message folded in. */
  fields: Record<string, number>;
  /** Absolute paths of the files that contributed messages, first seen first. */
  filePaths: Set<string>;
}

export function looksLikeEnvironmentContext(text: string): boolean {
  const lowered = text.toLowerCase();
  if (lowered.includes("<environment_context")) return true;
  let hits = 0;
  for (const marker of ENVIRONMENT_MARKERS) {
    if (lowered.includes(marker)) hits += 1;
  }
  return hits >= 2;
}

export function looksLikeGeneratedIdentifier(text: string): boolean {
  const lowered = text.trim().toLowerCase();
  return lowered.startsWith("rollout-") || GENERATED_ID_PATTERN.test(lowered);
}

export function normalizeTitleCandidate(text: string, sessionId: string): string {
  const trimmed = text.trim();
  if (!trimmed || trimmed === sessionId) return "";
  if (looksLikeEnvironmentContext(trimmed) || looksLikeGeneratedIdentifier(trimmed)) return "";
  return trimTitle(trimmed);
}

export function cwdBaseOf(cwd: string): string {
  const trimmed = cwd.replace(/\/+$/, "");
  if (!trimmed) return "";
  return path.posix.basename(trimmed);
}

function fallbackTitle(session: Session): string {
  if (session.cwdBase) return trimTitle(session.cwdBase);
  if (session.cwd) return trimTitle(session.cwd);
  if (session.id && !looksLikeGeneratedIdentifier(session.id)) return trimTitle(session.id);
  return "";
}

export function createSessionAggregate(id: string, provider: ProviderKind, project: string): SessionAggregate {
  return {
    session: {
      id,
      title: "",
      firstAtMs: null,
      lastAtMs: null,
      fileModAtMs: null,
      messageCount: 0,
      textCount: 0,
      cwd: "",
      cwdBase: "",
      models: createCounts(),
      roles: createCounts(),
      sources: [],
      provider,
      project,
    },
    titleSource: "none",
    messages: [],
    fields: createCounts(),
    filePaths: new Set(),
  };
}

export function setCustomTitle(aggregate: SessionAggregate, title: string): void {
  aggregate.session.title = title;
  aggregate.titleSource = "custom";
}

/**
 * The first record that yields a usable candidate sets the title: its explicit
 * title field, then its content, then the cwd basename, cwd or session id.
 */
function applyTitle(aggregate: SessionAggregate, record: NormalizedRecord): void {
  if (aggregate.titleSource !== "none") return;
  const sessionId = aggregate.session.id;
  const candidates: [string, TitleSource][] = [
    [normalizeTitleCandidate(record.explicitTitle, sessionId), "explicit"],
    [normalizeTitleCandidate(record.message.content, sessionId), "derived"],
    [fallbackTitle(aggregate.session), "fallback"],
  ];
  for (const [title, source] of candidates) {
    if (title) {
      aggregate.session.title = title;
      aggregate.titleSource = source;
      return;
    }
  }
}

function addSource(session: Session, source: string): void {
  if (!source || session.sources.includes(source)) return;
  session.sources.push(source);
  session.sources.sort();
}

/** Folds one normalized record into the session summary. */
export function applyMessage(aggregate: SessionAggregate, record: NormalizedRecord): void {
  const session = aggregate.session;
  const message = record.message;

  session.messageCount += 1;
  if (message.content.trim()) {
    session.textCount += 1;
  }
  if (message.timestampMs !== null) {
    if (session.firstAtMs === null || message.timestampMs < session.firstAtMs) {
      session.firstAtMs = message.timestampMs;
    }
    if (session.lastAtMs === null || message.timestampMs > session.lastAtMs) {
      session.lastAtMs = message.timestampMs;
    }
  }
  if (message.model) incrementCount(session.models, message.model);
  if (message.role) incrementCount(session.roles, message.role);
  addSource(session, message.source);
  for (const key of Object.keys(message.raw)) {
    incrementCount(aggregate.fields, key);
  }

  if (!session.cwd && record.cwd) {
    session.cwd = record.cwd;
    session.cwdBase = cwdBaseOf(record.cwd);
  }

  applyTitle(aggregate, record);
}

export function createTally(): SessionTally {
  return { messageCount: 0, textCount: 0, models: createCounts(), roles: createCounts(), fields: createCounts() };
}

/** Records a message's contribution alongside `applyMessage`. */
export function tallyMessage(tally: SessionTally, message: Message): void {
  tally.messageCount += 1;
  if (message.content.trim()) tally.textCount += 1;
  if (message.model) incrementCount(tally.models, message.model);
  if (message.role) incrementCount(tally.roles, message.role);
  for (const key of Object.keys(message.raw)) {
    incrementCount(tally.fields, key);
  }
}

function subtractCounts(from: Record<string, number>, counts: Record<string, number>): void {
  for (const [key, count] of Object.entries(counts)) {
    decrementCount(from, key, count);
  }
}

/**
 * Takes a file's tally back out of the session, including messages that
 * retention already dropped. Bounds stay as they are.
 */
export function subtractTally(aggregate: SessionAggregate, tally: SessionTally): void {
  const session = aggregate.session;
  session.messageCount = Math.max(0, session.messageCount - tally.messageCount);
  session.textCount = Math.max(0, session.textCount - tally.textCount);
  subtractCounts(session.models, tally.models);
  subtractCounts(session.roles, tally.roles);
  subtractCounts(aggregate.fields, tally.fields);
}

export function cloneSession(session: Session): Session {
  return {
    ...session,
    models: { ...session.models },
    roles: { ...session.roles },
    sources: [...session.sources],
  };
}
