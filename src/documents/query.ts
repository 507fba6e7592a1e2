import type { Cursor, SortKey } from "./document.js";

export const SORT_FIELD = "ID";

export type MatchAllQuery = {
  query: { match_all: Record<string, never> };
  sort: Array<Record<string, { order: "asc" | "desc" }>>;
  search_after?: SortKey[];
};

export type SearchPlan =
  | { mode: "offset"; body: MatchAllQuery; from: number; size: number }
  | { mode: "cursor"; body: MatchAllQuery; size: number };

export function buildMatchAllQuery(cursor?: Cursor): MatchAllQuery {
  const body: MatchAllQuery = {
    query: { match_all: {} },
    // search_after needs a total order; ID is the tiebreaker and the key.
    sort: [{ [SORT_FIELD]: { order: "asc" } }]
  };
  if (cursor !== undefined) {
    body.search_after = [cursor];
  }
  return body;
}

/**
 * Without a cursor the page is read by skip-and-take from `offset`. With one,
 * the page continues after that sort key and `offset` is ignored.
 */
export function planSearch(params: { offset: number; size: number; cursor?: Cursor }): SearchPlan {
  const body = buildMatchAllQuery(params.cursor);
  if (params.cursor !== undefined) {
    return { mode: "cursor", body, size: params.size };
  }
  return { mode: "offset", body, from: params.offset, size: params.size };
}
