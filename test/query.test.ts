import { describe, expect, it } from "vitest";
import { buildMatchAllQuery, planSearch } from "../src/documents/query.js";

describe("query builder", () => {
  it("always sorts ascending by ID", () => {
    expect(buildMatchAllQuery()).toEqual({
      query: { match_all: {} },
      sort: [{ ID: { order: "asc" } }]
    });
  });

  it("adds search_after for a cursor", () => {
    expect(buildMatchAllQuery(19)).toEqual({
      query: { match_all: {} },
      sort: [{ ID: { order: "asc" } }],
      search_after: [19]
    });
  });

  it("treats 0 as a real cursor", () => {
    expect(buildMatchAllQuery(0).search_after).toEqual([0]);
  });

  it("plans skip-and-take without a cursor", () => {
    const plan = planSearch({ offset: 30, size: 10 });
    expect(plan).toEqual({
      mode: "offset",
      from: 30,
      size: 10,
      body: { query: { match_all: {} }, sort: [{ ID: { order: "asc" } }] }
    });
  });

  it("ignores the offset once a cursor is set", () => {
    const plan = planSearch({ offset: 30, size: 10, cursor: 29 });
    expect(plan.mode).toBe("cursor");
    expect("from" in plan).toBe(false);
    expect(plan.size).toBe(10);
    expect(plan.body.search_after).toEqual([29]);
    expect(plan.body.sort).toEqual([{ ID: { order: "asc" } }]);
  });
});
