import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import * as z from "zod/v4";
import {
  EngineErrorBodyDecodeError,
  EngineResponseError,
  EnvelopeDecodeError,
  type EngineOperation
} from "../engine/errors.js";
import type { EngineResponse, EngineTransport } from "../engine/transport.js";
import { decodeSearchResponse } from "./decode.js";
import { UserDocumentSchema, type Cursor, type Page, type UserDocument } from "./document.js";
import { planSearch } from "./query.js";

export type LoadPageRequest = {
  /** Empty or absent means the configured default index. */
  index?: string;
  offset: number;
  size: number;
  cursor?: Cursor;
  signal?: AbortSignal;
};

export interface PageLoader {
  loadPage(request: LoadPageRequest): Promise<Page>;
}

export type StoreResult = {
  id: string;
  result: string;
};

const StoreReplySchema = z.object({
  _id: z.string(),
  result: z.string().default("created")
});

const CreateIndexReplySchema = z.object({
  acknowledged: z.boolean(),
  index: z.string().optional()
});

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class DocumentClient implements PageLoader {
  constructor(
    private readonly transport: EngineTransport,
    private readonly options: { defaultIndex: string; mappingPath: string },
    private readonly logger: Logger
  ) {}

  resolveIndex(index?: string): string {
    return index ? index : this.options.defaultIndex;
  }

  async loadPage(request: LoadPageRequest): Promise<Page> {
    const index = this.resolveIndex(request.index);
    const plan = planSearch({ offset: request.offset, size: request.size, cursor: request.cursor });

    const res = await this.transport.request({
      method: "POST",
      path: `/${encodeURIComponent(index)}/_search`,
      query: {
        from: plan.mode === "offset" ? plan.from : undefined,
        size: plan.size,
        track_total_hits: true,
        timeout: `${this.transport.timeoutMs}ms`
      },
      body: plan.body,
      signal: request.signal
    });

    if (!isSuccess(res.status)) {
      this.logger.error({ index, query: plan.body, status: res.status }, "search failed");
      throw this.failure("search", index, res);
    }

    const page = decodeSearchResponse(res.text, { index, logger: this.logger });
    this.logger.debug(
      { index, mode: plan.mode, total: page.total, decoded: page.decoded, cursor: page.cursor },
      "page loaded"
    );
    return page;
  }

  async storeDocument(
    doc: UserDocument,
    options: { index?: string; documentId?: string; refresh?: boolean; signal?: AbortSignal } = {}
  ): Promise<StoreResult> {
    const index = this.resolveIndex(options.index);
    const path =
      options.documentId === undefined
        ? `/${encodeURIComponent(index)}/_doc`
        : `/${encodeURIComponent(index)}/_doc/${encodeURIComponent(options.documentId)}`;

    const res = await this.transport.request({
      method: options.documentId === undefined ? "POST" : "PUT",
      path,
      query: { refresh: options.refresh ?? true },
      body: UserDocumentSchema.parse(doc),
      signal: options.signal
    });

    if (!isSuccess(res.status)) throw this.failure("store", index, res);

    const reply = StoreReplySchema.safeParse(parseJson(res.text));
    if (!reply.success) {
      throw new EnvelopeDecodeError(index, "_id", "store reply has no document id", { cause: reply.error });
    }

    this.logger.debug({ index, doc, status: res.status, id: reply.data._id }, "document stored");
    return { id: reply.data._id, result: reply.data.result };
  }

  async createIndex(
    options: { index?: string; mappingPath?: string; signal?: AbortSignal } = {}
  ): Promise<{ acknowledged: boolean; index: string }> {
    const index = this.resolveIndex(options.index);
    const mappingPath = options.mappingPath ?? this.options.mappingPath;

    let raw: string;
    try {
      raw = await readFile(mappingPath, "utf-8");
    } catch (error) {
      throw new Error(`Could not read index mapping at ${mappingPath}`, { cause: error });
    }

    let mapping: unknown;
    try {
      mapping = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Index mapping at ${mappingPath} is not valid JSON`, { cause: error });
    }

    const res = await this.transport.request({
      method: "PUT",
      path: `/${encodeURIComponent(index)}`,
      body: mapping,
      signal: options.signal
    });

    if (!isSuccess(res.status)) throw this.failure("create_index", index, res);

    const reply = CreateIndexReplySchema.safeParse(parseJson(res.text));
    const acknowledged = reply.success ? reply.data.acknowledged : false;
    this.logger.info({ index, mappingPath, acknowledged }, "index created");
    return { acknowledged, index };
  }

  private failure(
    operation: EngineOperation,
    index: string,
    res: EngineResponse
  ): EngineResponseError | EngineErrorBodyDecodeError {
    try {
      return new EngineResponseError(operation, index, res.status, JSON.parse(res.text));
    } catch (error) {
      return new EngineErrorBodyDecodeError(operation, index, res.status, res.text, { cause: error });
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
