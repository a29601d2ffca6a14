import type { Message, SearchField, SearchHit, SearchResponse, SearchScope, Session } from "@threadwatch/contracts";
import { DEFAULT_CONFIG } from "../defaults.js";
import { truncateCodePoints } from "../utils.js";
import type { Clause, CompiledQuery, FieldClause, FilterField, TextClause } from "./query.js";
import { extractToolText } from "./toolText.js";

/** Read side of the index the executor scans. */
export interface SearchSource {
  sessions(): Session[];
  messages(sessionId: string, limit: number): Message[];
}

export interface ExecuteOptions {
  limit?: number;
  offset?: number;
  budgetMs?: number;
  maxReturn?: number;
  defaultLimit?: number;
  previewChars?: number;
  clock?: () => number;
}

interface SearchTarget {
  field: SearchField;
  /** Text as written, for regex clauses. */
  text: string;
  /** Lowercased text, for term, phrase and prefix clauses. */
  lowered: string;
}

interface FieldFilters {
  allow: Map<FilterField, string[]>;
  deny: Map<FilterField, string[]>;
}

function collectFieldFilters(groups: Clause[][]): FieldFilters {
  const allow = new Map<FilterField, string[]>();
  const deny = new Map<FilterField, string[]>();
  for (const group of groups) {
    for (const clause of group) {
      if (clause.kind !== "field") continue;
      const bucket = clause.negative ? deny : allow;
      const values = bucket.get(clause.field) ?? [];
      values.push(clause.value);
      bucket.set(clause.field, values);
    }
  }
  return { allow, deny };
}

function fieldValueMatches(field: FilterField, got: string, want: string): boolean {
  if (!want) return true;
  const normalized = got.trim().toLowerCase();
  return field === "cwd" ? normalized.includes(want) : normalized === want;
}

function fieldPasses(filters: FieldFilters, field: FilterField, got: string): boolean {
  const allowed = filters.allow.get(field);
  if (allowed && allowed.length > 0 && !allowed.some((want) => fieldValueMatches(field, got, want))) {
    return false;
  }
  const denied = filters.deny.get(field);
  return !denied || !denied.some((want) => fieldValueMatches(field, got, want));
}

/** Field filters apply to every candidate regardless of which OR-group matches. */
function matchesFieldFilters(filters: FieldFilters, message: Message, session: Session): boolean {
  return (
    fieldPasses(filters, "role", message.role) &&
    fieldPasses(filters, "type", message.recordType) &&
    fieldPasses(filters, "model", message.model) &&
    fieldPasses(filters, "cwd", session.cwd) &&
    fieldPasses(filters, "cwd_base", session.cwdBase)
  );
}

function clauseMatches(clause: TextClause, target: SearchTarget): boolean {
  switch (clause.kind) {
    case "term":
    case "phrase":
    case "prefix":
      return !clause.value || target.lowered.includes(clause.value);
    case "regex":
      return clause.pattern.matcher(target.text).find();
    case "never":
      return false;
  }
}

function makeTarget(field: SearchField, text: string): SearchTarget {
  return { field, text, lowered: text.toLowerCase() };
}

function buildTargets(message: Message, scope: SearchScope): SearchTarget[] {
  const targets: SearchTarget[] = [];
  if (scope === "content" || scope === "all") {
    targets.push(makeTarget("content", message.content));
  }
  if (scope === "tools" || scope === "all") {
    const tool = extractToolText(message);
    targets.push(makeTarget("tool_cmd", tool.command), makeTarget("stdout", tool.stdout), makeTarget("stderr", tool.stderr));
  }
  return targets;
}

/** Returns the matched field of the first satisfied group, or null. */
function matchTextGroups(query: CompiledQuery, targets: SearchTarget[]): SearchField | null {
  for (const group of query.groups) {
    let satisfied = true;
    let fieldHit: SearchField | null = null;

    for (const clause of group) {
      if (clause.kind === "field") continue;
      const hit = targets.find((target) => clauseMatches(clause, target));
      if (clause.negative ? hit : !hit) {
        satisfied = false;
        break;
      }
      if (hit && !fieldHit) {
        fieldHit = hit.field;
      }
    }

    if (satisfied) {
      return fieldHit ?? (query.scope === "tools" ? "tool_cmd" : "content");
    }
  }
  return null;
}

function compareHits(a: SearchHit, b: SearchHit): number {
  if (a.timestampMs !== b.timestampMs) {
    if (a.timestampMs === null) return 1;
    if (b.timestampMs === null) return -1;
    return b.timestampMs - a.timestampMs;
  }
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return a.lineNo - b.lineNo;
}

/**
 * Scans sessions (most recent first) and their messages in ingestion order.
 * Every match counts toward `total`; matches before `offset` are not emitted.
 * The scan stops once the time budget is spent and marks the response truncated.
 */
export function executeSearch(source: SearchSource, query: CompiledQuery, options: ExecuteOptions = {}): SearchResponse {
  const clock = options.clock ?? Date.now;
  const startedAt = clock();
  const maxReturn = options.maxReturn ?? DEFAULT_CONFIG.search.maxReturn;
  const budgetMs = options.budgetMs ?? DEFAULT_CONFIG.search.budgetMs;
  const previewChars = options.previewChars ?? DEFAULT_CONFIG.search.previewChars;
  const requested = options.limit ?? 0;
  const limit = Math.min(requested > 0 ? requested : (options.defaultLimit ?? DEFAULT_CONFIG.search.defaultLimit), maxReturn);
  const offset = Math.max(0, options.offset ?? 0);

  const filters = collectFieldFilters(query.groups);
  const hits: SearchHit[] = [];
  let total = 0;
  let truncated = false;

  for (const session of source.sessions()) {
    for (const message of source.messages(session.id, 0)) {
      if (matchesFieldFilters(filters, message, session)) {
        const targets = buildTargets(message, query.scope);
        const field = matchTextGroups(query, targets);
        if (field) {
          total += 1;
          if (total > offset && hits.length < limit) {
            const target = targets.find((candidate) => candidate.field === field);
            hits.push({
              sessionId: message.sessionId,
              messageId: message.id,
              role: message.role,
              recordType: message.recordType,
              model: message.model,
              source: message.source,
              lineNo: message.lineNo,
              timestampMs: message.timestampMs,
              field,
              content: truncateCodePoints((target?.text ?? "").trim(), previewChars),
            });
          }
        }
      }
      if (clock() - startedAt > budgetMs) {
        truncated = true;
        break;
      }
    }
    if (truncated) break;
  }

  hits.sort(compareHits);
  return {
    tookMs: Math.max(0, clock() - startedAt),
    truncated,
    total,
    hits,
  };
}
