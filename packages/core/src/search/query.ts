import type { SearchScope } from "@threadwatch/contracts";
import type { RE2JS } from "re2js";

export type FilterField = "role" | "type" | "model" | "cwd" | "cwd_base";

interface ClauseBase {
  negative: boolean;
}

/** Case-insensitive substring. `value` is lowercased. */
export interface TermClause extends ClauseBase {
  kind: "term";
  value: string;
}

/** Case-insensitive substring taken from a quoted phrase. */
export interface PhraseClause extends ClauseBase {
  kind: "phrase";
  value: string;
}

/** `value*`: a case-insensitive substring test on `value`. */
export interface PrefixClause extends ClauseBase {
  kind: "prefix";
  value: string;
}

export interface RegexClause extends ClauseBase {
  kind: "regex";
  pattern: RE2JS;
}

/** A regex that failed to compile; never matches. */
export interface NeverClause extends ClauseBase {
  kind: "never";
  source: string;
}

export interface FieldClause extends ClauseBase {
  kind: "field";
  field: FilterField;
  value: string;
}

export type TextClause = TermClause | PhraseClause | PrefixClause | RegexClause | NeverClause;

export type Clause = TextClause | FieldClause;

export interface CompiledQuery {
  scope: SearchScope;
  /** OR of AND-groups. */
  groups: Clause[][];
}

export const FILTER_FIELDS: readonly FilterField[] = ["role", "type", "model", "cwd", "cwd_base"];

export function isFilterField(value: string): value is FilterField {
  const known: readonly string[] = FILTER_FIELDS;
  return known.includes(value);
}

export function parseScope(value: string | undefined): SearchScope {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "tools" || normalized === "all") return normalized;
  return "content";
}
