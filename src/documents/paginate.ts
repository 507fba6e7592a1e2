import type { Logger } from "pino";
import type { PaginationStrategy, StopWhen } from "../config/env.js";
import type { PageLoader } from "./client.js";
import type { Cursor, Page, UserDocument } from "./document.js";

export type PaginationResult = {
  documents: UserDocument[];
  requests: number;
  /** Last total the engine reported; 0 when nothing was fetched. */
  total: number;
  /** Iteration numbers (0-based) of pages that came back truncated. */
  truncatedPages: number[];
};

type PaginateBase = {
  loader: PageLoader;
  index?: string;
  pageSize: number;
  /**
   * "bound" always issues the configured number of requests; "exhausted"
   * also stops once the engine has nothing more to return.
   */
  stopWhen?: StopWhen;
  signal?: AbortSignal;
  logger?: Logger;
};

export class PaginationError extends Error {
  override readonly name = "PaginationError";

  constructor(
    readonly strategy: PaginationStrategy,
    readonly iteration: number,
    readonly position: { offset: number } | { cursor: Cursor },
    readonly partial: UserDocument[],
    options: { cause: unknown }
  ) {
    super(
      `${strategy} pagination failed at iteration ${iteration} (${describePosition(position)}): ${describeCause(options.cause)}`,
      options
    );
  }
}

function describePosition(position: { offset: number } | { cursor: Cursor }): string {
  if ("offset" in position) return `offset ${position.offset}`;
  return position.cursor === undefined ? "no cursor" : `cursor ${String(position.cursor)}`;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }
}

class Accumulator {
  readonly documents: UserDocument[] = [];
  readonly truncatedPages: number[] = [];
  requests = 0;
  total = 0;
  hits = 0;

  add(iteration: number, page: Page): void {
    this.requests++;
    this.total = page.total;
    this.hits += page.returned;
    this.documents.push(...page.documents);
    if (page.truncated) this.truncatedPages.push(iteration);
  }

  result(): PaginationResult {
    return {
      documents: this.documents,
      requests: this.requests,
      total: this.total,
      truncatedPages: this.truncatedPages
    };
  }
}

async function fetchPage(
  params: PaginateBase,
  strategy: PaginationStrategy,
  iteration: number,
  position: { offset: number } | { cursor: Cursor },
  acc: Accumulator
): Promise<Page> {
  try {
    params.signal?.throwIfAborted();
    return await params.loader.loadPage({
      index: params.index,
      offset: "offset" in position ? position.offset : 0,
      size: params.pageSize,
      cursor: "cursor" in position ? position.cursor : undefined,
      signal: params.signal
    });
  } catch (error) {
    params.logger?.error({ strategy, iteration, ...position, error }, "page request failed");
    throw new PaginationError(strategy, iteration, position, [...acc.documents], { cause: error });
  }
}

/**
 * Skip-and-take over offsets 0, size, 2*size, ... below `limit`, so
 * ceil(limit / pageSize) requests unless `stopWhen` is "exhausted".
 */
export async function paginateByOffset(params: PaginateBase & { limit: number }): Promise<PaginationResult> {
  assertPageSize(params.pageSize);
  const stopWhen = params.stopWhen ?? "bound";
  const acc = new Accumulator();

  for (let offset = 0, iteration = 0; offset < params.limit; offset += params.pageSize, iteration++) {
    const page = await fetchPage(params, "offset", iteration, { offset }, acc);
    acc.add(iteration, page);

    if (stopWhen === "exhausted" && (page.returned === 0 || offset + params.pageSize >= page.total)) {
      break;
    }
  }

  params.logger?.info(
    { strategy: "offset", requests: acc.requests, documents: acc.documents.length, total: acc.total },
    "pagination finished"
  );
  return acc.result();
}

/**
 * Chains search_after cursors: the first request starts at the beginning,
 * every later one continues after the previous page's last sort key. A page
 * without a cursor keeps the previous one rather than starting over.
 */
export async function paginateByCursor(params: PaginateBase & { iterations: number }): Promise<PaginationResult> {
  assertPageSize(params.pageSize);
  const stopWhen = params.stopWhen ?? "bound";
  const acc = new Accumulator();
  let cursor: Cursor = undefined;

  for (let iteration = 0; iteration < params.iterations; iteration++) {
    const page = await fetchPage(params, "cursor", iteration, { cursor }, acc);
    acc.add(iteration, page);
    if (page.cursor !== undefined) cursor = page.cursor;

    params.logger?.debug({ iteration, cursor }, "current cursor");

    if (stopWhen === "exhausted" && (page.returned === 0 || acc.hits >= page.total)) {
      break;
    }
  }

  params.logger?.info(
    { strategy: "cursor", requests: acc.requests, documents: acc.documents.length, total: acc.total },
    "pagination finished"
  );
  return acc.result();
}
