import type { SearchScope } from "@threadwatch/contracts";
import { RE2JS } from "re2js";
import { isFilterField, parseScope } from "./query.js";
import type { Clause, CompiledQuery } from "./query.js";

interface Token {
  raw: string;
  negative: boolean;
  kind: "text" | "or" | "field";
  field?: string;
}

const SHORTHAND_CLASSES: Record<string, string> = {
  s: "[ \\t\\n\\r\\f\\v]",
  S: "[^ \\t\\n\\r\\f\\v]",
  d: "[0-9]",
  D: "[^0-9]",
  w: "[A-Za-z0-9_]",
  W: "[^A-Za-z0-9_]",
};

function isSpace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isFlagLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

export function tokenize(input: string): Token[] {
  const out: Token[] = [];
  const s = input.trim();
  let i = 0;

  while (i < s.length) {
    if (isSpace(s.charAt(i))) {
      i += 1;
      continue;
    }

    let negative = false;
    if (s.charAt(i) === "-") {
      negative = true;
      i += 1;
      while (i < s.length && isSpace(s.charAt(i))) i += 1;
    }
    if (i >= s.length) break;

    if (s.charAt(i) === '"') {
      const close = s.indexOf('"', i + 1);
      const end = close < 0 ? s.length : close;
      out.push({ raw: `"${s.slice(i + 1, end)}"`, negative, kind: "text" });
      i = Math.min(end + 1, s.length);
      continue;
    }

    if (s.charAt(i) === "/") {
      const close = s.indexOf("/", i + 1);
      if (close > i) {
        let k = close + 1;
        while (k < s.length && isFlagLetter(s.charAt(k))) k += 1;
        out.push({ raw: s.slice(i, k), negative, kind: "text" });
        i = k;
        continue;
      }
    }

    let j = i;
    while (j < s.length && !isSpace(s.charAt(j))) j += 1;
    const raw = s.slice(i, j);
    i = j;

    if (raw === "OR") {
      out.push({ raw, negative: false, kind: "or" });
      continue;
    }

    const colon = raw.indexOf(":");
    if (colon > 0) {
      const field = raw.slice(0, colon).toLowerCase();
      if (field === "in" || isFilterField(field)) {
        out.push({ raw: raw.slice(colon + 1), negative, kind: "field", field });
        continue;
      }
    }

    out.push({ raw, negative, kind: "text" });
  }

  return out;
}

/** Rewrites `\s \d \w \S \D \W` outside character classes into explicit ASCII classes. */
export function rewriteShorthands(pattern: string): string {
  let out = "";
  let inClass = false;
  for (let i = 0; i < pattern.length; i += 1) {
    const ch = pattern.charAt(i);
    if (ch === "\\" && i + 1 < pattern.length) {
      const next = pattern.charAt(i + 1);
      const replacement = inClass ? undefined : SHORTHAND_CLASSES[next];
      out += replacement ?? `${ch}${next}`;
      i += 1;
      continue;
    }
    if (ch === "[" && !inClass) {
      inClass = true;
    } else if (ch === "]" && inClass) {
      inClass = false;
    }
    out += ch;
  }
  return out;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Compiles with RE2 semantics, which run in linear time. A pattern RE2 rejects never matches. */
function compileRegexClause(source: string, caseInsensitive: boolean, negative: boolean): Clause {
  try {
    return { kind: "regex", pattern: RE2JS.compile(source, caseInsensitive ? RE2JS.CASE_INSENSITIVE : 0), negative };
  } catch {
    return { kind: "never", source, negative };
  }
}

function compileTextToken(token: Token): Clause {
  const raw = token.raw;
  const negative = token.negative;

  if (raw.startsWith("/") && raw.length >= 2) {
    const close = raw.lastIndexOf("/");
    if (close > 0) {
      const flags = raw.slice(close + 1);
      const pattern = rewriteShorthands(raw.slice(1, close).replaceAll("\\\\", "\\"));
      return compileRegexClause(pattern, flags.includes("i"), negative);
    }
  }

  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    return { kind: "phrase", value: stripQuotes(raw).toLowerCase(), negative };
  }

  if (raw.includes("*")) {
    const stars = raw.split("*").length - 1;
    if (stars === 1 && raw.endsWith("*")) {
      return { kind: "prefix", value: raw.slice(0, -1).toLowerCase(), negative };
    }
    const wildcard = escapeRegex(raw).replaceAll("\\*", ".*");
    return compileRegexClause(wildcard, true, negative);
  }

  return { kind: "term", value: raw.toLowerCase(), negative };
}

function toDnf(tokens: Token[]): Clause[][] {
  const groups: Clause[][] = [];
  let current: Clause[] = [];
  const flush = (): void => {
    if (current.length > 0) {
      groups.push(current);
      current = [];
    }
  };

  for (const token of tokens) {
    if (token.kind === "or") {
      flush();
      continue;
    }
    if (token.kind === "field" && token.field && isFilterField(token.field)) {
      current.push({
        kind: "field",
        field: token.field,
        value: stripQuotes(token.raw).trim().toLowerCase(),
        negative: token.negative,
      });
      continue;
    }
    current.push(compileTextToken(token));
  }
  flush();

  return groups.length > 0 ? groups : [[]];
}

/**
 * Compiles a query string. An `in:` token anywhere in the query overrides
 * `scopeHint` and is dropped from the clauses.
 */
export function parseQuery(rawQuery: string, scopeHint?: string): CompiledQuery {
  let scope: SearchScope = parseScope(scopeHint);
  const kept: Token[] = [];
  for (const token of tokenize(rawQuery)) {
    if (token.kind === "field" && token.field === "in") {
      scope = parseScope(stripQuotes(token.raw));
      continue;
    }
    kept.push(token);
  }
  return { scope, groups: toDnf(kept) };
}
