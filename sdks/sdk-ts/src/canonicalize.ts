import { serializeQuery, withoutParam, type QueryParams } from "./query.js";

export const TOKEN_PARAM = "token";

/**
 * `sorted` orders parameters by name so proxies and URL builders may reorder
 * the query string freely. `insertion` keeps the caller's order.
 */
export type CanonicalOrdering = "sorted" | "insertion";

/** Digest input: `path?query` with the token removed. */
export type CanonicalString = string;

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function canonicalize(
  path: string,
  params: QueryParams,
  ordering: CanonicalOrdering = "sorted",
): CanonicalString {
  const remaining = withoutParam(params, TOKEN_PARAM);
  // Array.prototype.sort is stable, so repeated names keep their relative order.
  const ordered = ordering === "sorted"
    ? [...remaining].sort(([a], [b]) => compareNames(a, b))
    : remaining;
  return `${path}?${serializeQuery(ordered)}`;
}
