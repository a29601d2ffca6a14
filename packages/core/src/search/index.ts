import type { SearchResponse } from "@threadwatch/contracts";
import { executeSearch } from "./executor.js";
import type { ExecuteOptions, SearchSource } from "./executor.js";
import { parseQuery } from "./parser.js";

export function search(
  source: SearchSource,
  rawQuery: string,
  scopeHint?: string,
  options: ExecuteOptions = {},
): SearchResponse {
  return executeSearch(source, parseQuery(rawQuery, scopeHint), options);
}

export { executeSearch } from "./executor.js";
export type { ExecuteOptions, SearchSource } from "./executor.js";
export { parseQuery, rewriteShorthands, tokenize } from "./parser.js";
export { FILTER_FIELDS, isFilterField, parseScope } from "./query.js";
export type * from "./query.js";
export { extractToolText } from "./toolText.js";
export type { ToolText } from "./toolText.js";
