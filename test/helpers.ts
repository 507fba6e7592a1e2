import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import pino from "pino";
import type { LoadPageRequest, PageLoader } from "../src/documents/client.js";
import type { Page, UserDocument } from "../src/documents/document.js";

export const silentLogger = pino({ level: "silent", base: null });

export async function getAvailablePort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address() as AddressInfo;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

export type RecordedRequest = {
  method: string;
  path: string;
  searchParams: Record<string, string>;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
};

export type StubReply = {
  status?: number;
  /** Objects are sent as JSON, strings as they are. */
  body: unknown;
  delayMs?: number;
};

export function user(id: number, createdAt = "2024-03-01T10:00:00Z"): UserDocument {
  return { ID: id, CreatedAt: createdAt, Username: `user ${id}` };
}

export function hit(source: unknown, sort: unknown[] | undefined): Record<string, unknown> {
  return { _index: "users", _id: `doc-${String(sort?.[0])}`, _score: null, _source: source, sort };
}

export function searchBody(total: number, hits: unknown[]): Record<string, unknown> {
  return {
    took: 1,
    timed_out: false,
    _shards: { total: 1, successful: 1, skipped: 0, failed: 0 },
    hits: { total: { value: total, relation: "eq" }, max_score: null, hits }
  };
}

/**
 * In-process engine stub. Every request is recorded; `reply` decides the
 * response, defaulting to an empty search result.
 */
export async function startStubEngine(
  reply: (req: RecordedRequest) => StubReply = () => ({ body: searchBody(0, []) })
): Promise<{
  baseUrl: string;
  getRequests: () => RecordedRequest[];
  close: () => Promise<void>;
}> {
  const requests: RecordedRequest[] = [];

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const url = new URL(req.url ?? "/", "http://127.0.0.1");
      const raw = Buffer.concat(chunks).toString("utf-8");
      const recorded: RecordedRequest = {
        method: req.method ?? "GET",
        path: url.pathname,
        searchParams: Object.fromEntries(url.searchParams.entries()),
        headers: req.headers,
        body: raw ? JSON.parse(raw) : undefined
      };
      requests.push(recorded);

      const out = reply(recorded);
      const send = () => {
        res.statusCode = out.status ?? 200;
        res.setHeader("content-type", "application/json");
        res.end(typeof out.body === "string" ? out.body : JSON.stringify(out.body));
      };
      if (out.delayMs) setTimeout(send, out.delayMs);
      else send();
    });
  });

  const port = await getAvailablePort();
  await new Promise<void>((resolve) => server.listen(port, "127.0.0.1", resolve));

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    getRequests: () => [...requests],
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
  };
}

/**
 * A PageLoader over an in-memory list sorted by ID, answering offset and
 * search_after requests the way the engine does.
 */
export class MemoryPageLoader implements PageLoader {
  readonly requests: LoadPageRequest[] = [];
  failAt: number | undefined;

  constructor(private readonly users: UserDocument[]) {}

  async loadPage(request: LoadPageRequest): Promise<Page> {
    this.requests.push(request);
    if (this.failAt !== undefined && this.requests.length - 1 === this.failAt) {
      throw new Error("connection reset");
    }

    const sorted = [...this.users].sort((a, b) => a.ID - b.ID);
    const cursor = request.cursor;
    const start =
      cursor === undefined ? request.offset : sorted.filter((u) => u.ID <= Number(cursor)).length;
    const documents = sorted.slice(start, start + request.size);
    const last = documents.at(-1);

    return {
      documents,
      total: sorted.length,
      cursor: last?.ID,
      truncated: false,
      returned: documents.length,
      attempted: documents.length,
      decoded: documents.length
    };
  }
}
