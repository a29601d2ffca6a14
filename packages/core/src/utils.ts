import os from "node:os";
import path from "node:path";

export const TITLE_MAX_CODE_POINTS = 80;

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (isRecord(value)) {
    return value;
  }
  return {};
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** Returns the value when it is a string, "" for anything else. */
export function readString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function nowMs(): number {
  return Date.now();
}

function epochFromNumber(value: number): number | null {
  if (!Number.isFinite(value)) return null;
  if (value > 1_000_000_000_000) {
    return Math.round(value);
  }
  if (value > 1_000_000_000) {
    return Math.round(value * 1000);
  }
  return null;
}

/**
 * Accepts RFC3339 strings (any fractional precision), digit-only unix strings
 * and unix numbers in seconds or milliseconds.
 */
export function parseTimestampMs(value: unknown): number | null {
  if (typeof value === "number") {
    return epochFromNumber(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (/^\d+$/.test(trimmed)) {
    return epochFromNumber(Number(trimmed));
  }
  const millisPrecision = trimmed.replace(/(\.\d{3})\d+/, "$1");
  const parsed = Date.parse(millisPrecision);
  return Number.isNaN(parsed) ? null : parsed;
}

export function firstTimestampMs(record: Record<string, unknown>, keys: string[]): number | null {
  for (const key of keys) {
    const parsed = parseTimestampMs(record[key]);
    if (parsed !== null) return parsed;
  }
  return null;
}

export function truncateCodePoints(text: string, maxCodePoints: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxCodePoints) {
    return text;
  }
  return codePoints.slice(0, maxCodePoints).join("");
}

export function trimTitle(text: string, maxCodePoints = TITLE_MAX_CODE_POINTS): string {
  const flattened = text.trim().replace(/\r?\n/g, " ");
  const codePoints = Array.from(flattened);
  if (codePoints.length <= maxCodePoints) {
    return flattened;
  }
  return `${codePoints.slice(0, maxCodePoints).join("")}…`;
}

/** A histogram with no prototype, so keys such as `constructor` or `__proto__` count like any other. */
export function createCounts(): Record<string, number> {
  const counts: Record<string, number> = Object.create(null);
  return counts;
}

function countOf(counts: Record<string, number>, key: string): number {
  return Object.hasOwn(counts, key) ? (counts[key] ?? 0) : 0;
}

export function incrementCount(counts: Record<string, number>, key: string, by = 1): void {
  counts[key] = countOf(counts, key) + by;
}

export function decrementCount(counts: Record<string, number>, key: string, by = 1): void {
  const next = countOf(counts, key) - by;
  if (next > 0) {
    counts[key] = next;
  } else {
    delete counts[key];
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
