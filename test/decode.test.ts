import { describe, expect, it } from "vitest";
import pino from "pino";
import { Writable } from "node:stream";
import { decodeSearchResponse } from "../src/documents/decode.js";
import { EnvelopeDecodeError } from "../src/engine/errors.js";
import { hit, searchBody, silentLogger, user } from "./helpers.js";

const decode = (body: unknown) =>
  decodeSearchResponse(typeof body === "string" ? body : JSON.stringify(body), {
    index: "users",
    logger: silentLogger
  });

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("decodeSearchResponse", () => {
  it("decodes hits in engine order and takes the last sort key as cursor", () => {
    const page = decode(searchBody(25, [hit(user(3), [3]), hit(user(1), [1]), hit(user(2), [2])]));
    expect(page.documents.map((d) => d.ID)).toEqual([3, 1, 2]);
    expect(page.total).toBe(25);
    expect(page.cursor).toBe(2);
    expect(page.truncated).toBe(false);
    expect(page.returned).toBe(3);
    expect(page.attempted).toBe(3);
    expect(page.decoded).toBe(3);
  });

  it("returns an empty page for zero hits whatever else the envelope holds", () => {
    const page = decode({ hits: { total: { value: 0, relation: "eq" }, hits: "garbage" }, noise: [1, 2] });
    expect(page).toEqual({
      documents: [],
      total: 0,
      cursor: undefined,
      truncated: false,
      returned: 0,
      attempted: 0,
      decoded: 0
    });
  });

  it("fails when hits.total.value is missing", () => {
    expect(() => decode({ hits: { hits: [hit(user(1), [1])] } })).toThrow(EnvelopeDecodeError);
    const error = thrown(() => decode({ hits: { total: { relation: "eq" }, hits: [] } }));
    expect(error).toBeInstanceOf(EnvelopeDecodeError);
    expect(error).toMatchObject({ index: "users", path: "hits.total.value" });
  });

  it("fails when hits.total.value has the wrong type", () => {
    expect(() => decode({ hits: { total: { value: "10" }, hits: [] } })).toThrow(/hits\.total\.value/);
  });

  it("fails when hits.total is a bare number", () => {
    const error = thrown(() => decode({ hits: { total: 1, hits: [hit(user(5), [5])] } }));
    expect(error).toBeInstanceOf(EnvelopeDecodeError);
    expect(error).toMatchObject({ index: "users", path: "hits.total.value" });
  });

  it("fails when the body is not JSON", () => {
    expect(() => decode("<html>")).toThrow(/at \$: body is not JSON/);
  });

  it("fails when hits.hits is not an array and total is positive", () => {
    expect(() => decode({ hits: { total: { value: 3 }, hits: {} } })).toThrow(/at hits\.hits/);
  });

  it("keeps the documents before a malformed one and stops there", () => {
    const page = decode(
      searchBody(40, [
        hit(user(1), [1]),
        hit(user(2), [2]),
        hit({ ID: "three", CreatedAt: "2024-03-01T10:00:00Z", Username: "x" }, [3]),
        hit(user(4), [4]),
        hit(user(5), [5])
      ])
    );
    expect(page.documents.map((d) => d.ID)).toEqual([1, 2]);
    expect(page.total).toBe(40);
    expect(page.truncated).toBe(true);
    expect(page.returned).toBe(5);
    expect(page.attempted).toBe(3);
    expect(page.decoded).toBe(2);
    expect(page.cursor).toBe(5);
  });

  it("truncates on a hit without _source", () => {
    const page = decode(searchBody(2, [hit(user(1), [1]), { _id: "x", sort: [2] }]));
    expect(page.documents).toEqual([user(1)]);
    expect(page.truncated).toBe(true);
    expect(page.cursor).toBe(2);
  });

  it("truncates to nothing when the first hit is malformed", () => {
    const page = decode(searchBody(2, [hit({ ID: 1 }, [1]), hit(user(2), [2])]));
    expect(page.documents).toEqual([]);
    expect(page.truncated).toBe(true);
    expect(page.cursor).toBe(2);
  });

  it("fails when the last hit has no sort value", () => {
    const error = thrown(() => decode(searchBody(2, [hit(user(1), [1]), hit(user(2), undefined)])));
    expect(error).toBeInstanceOf(EnvelopeDecodeError);
    expect(error).toMatchObject({ index: "users", path: "hits.hits.1.sort" });
  });

  it("fails when the last hit has an empty sort array", () => {
    expect(() => decode(searchBody(1, [hit(user(1), [])]))).toThrow(/at hits\.hits\.0\.sort/);
  });

  it("only needs a sort value on the last hit", () => {
    const page = decode(searchBody(2, [hit(user(1), undefined), hit(user(2), [2])]));
    expect(page.documents.map((d) => d.ID)).toEqual([1, 2]);
    expect(page.cursor).toBe(2);
  });

  it("keeps a sort value of 0 as a cursor", () => {
    const page = decode(searchBody(1, [hit(user(0), [0])]));
    expect(page.cursor).toBe(0);
  });

  it("returns no documents and no cursor for an offset past the end", () => {
    const page = decode(searchBody(25, []));
    expect(page.documents).toEqual([]);
    expect(page.total).toBe(25);
    expect(page.cursor).toBeUndefined();
    expect(page.truncated).toBe(false);
  });

  it("logs the failing hit", () => {
    const lines: string[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString("utf-8"));
        callback();
      }
    });
    const logger = pino({ level: "error", base: null }, sink);

    decodeSearchResponse(JSON.stringify(searchBody(2, [hit(user(1), [1]), hit({}, [2])])), {
      index: "users",
      logger
    });

    expect(lines).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(lines[0] ?? "{}");
    expect(entry.msg).toBe("document decode failed, truncating page");
    expect(entry.index).toBe("users");
    expect(entry.hitIndex).toBe(1);
    expect(entry.level).toBe(50);
  });
});
