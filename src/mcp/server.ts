import type { Logger } from "pino";
import * as z from "zod/v4";
import type { Express, NextFunction, Request, Response } from "express";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { randomUUID } from "node:crypto";

import { loadConfig, PaginationStrategy, StopWhen, type AppConfig } from "../config/env.js";
import { createAppContext, type AppContext } from "../context.js";
import { CachingPageLoader } from "../cache/pageCache.js";
import type { PageLoader } from "../documents/client.js";
import { UserDocumentSchema, type UserDocument } from "../documents/document.js";
import { paginateByCursor, paginateByOffset } from "../documents/paginate.js";
import { safeEqual } from "../security/timingSafeEqual.js";
import { decodePageToken, encodePageToken } from "./pagination.js";

type CreateServerResult = {
  url: string;
  close: () => Promise<void>;
};

type Session = {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  createdAt: number;
};

function parseBearerToken(req: Request): string | undefined {
  const header = req.header("authorization");
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header);
  if (!match) return undefined;
  const token = match[1]?.trim();
  return token || undefined;
}

function createAuthMiddleware(params: {
  allowedTokens: string[];
  logger: Logger;
}): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    if (req.path === "/healthz") return next();

    const token = parseBearerToken(req);
    if (!token) {
      res
        .status(401)
        .setHeader("www-authenticate", 'Bearer realm="docs-paginator"')
        .json({ error: "missing bearer token" });
      return;
    }

    if (!params.allowedTokens.some((t) => safeEqual(t, token))) {
      params.logger.warn({ path: req.path }, "rejected bearer token");
      res.status(403).json({ error: "invalid token" });
      return;
    }

    next();
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function listing(documents: UserDocument[]): string {
  if (documents.length === 0) return "(no documents)";
  return documents.map((d) => `${d.ID}\t${d.Username}\t${d.CreatedAt}`).join("\n");
}

const indexArg = z.string().optional().describe("Index name; the configured default when omitted");

function buildMcpServer(params: {
  logger: Logger;
  context: AppContext;
  loader: PageLoader;
}): McpServer {
  const { logger, context, loader } = params;
  const server = new McpServer(
    {
      name: "docs-paginator",
      version: "0.1.0"
    },
    { capabilities: { logging: {} } }
  );

  const fail = (tool: string, error: unknown): CallToolResult => {
    logger.error({ tool, error }, "tool failed");
    return { isError: true, content: [{ type: "text", text: describeError(error) }] };
  };

  server.registerTool(
    "docs_load_page",
    {
      title: "Load Page",
      description:
        "Loads one page of users sorted by ID. Pass nextCursor from a previous call to continue after it; without a cursor the page starts at offset.",
      inputSchema: {
        index: indexArg,
        size: z.number().int().min(1).max(1_000).default(10),
        offset: z.number().int().min(0).default(0).describe("Ignored when cursor is set"),
        cursor: z.string().optional().describe("Opaque cursor from a previous page")
      },
      outputSchema: {
        total: z.number(),
        documents: z.array(UserDocumentSchema),
        truncated: z.boolean(),
        nextCursor: z.string().optional()
      }
    },
    async ({ index, size, offset, cursor }, extra): Promise<CallToolResult> => {
      const signal = AbortSignal.any([context.signal, extra.signal]);
      try {
        const after = cursor ? decodePageToken(cursor).after : undefined;
        const page = await loader.loadPage({ index, offset, size, cursor: after, signal });
        const nextCursor =
          page.cursor !== undefined && page.returned > 0 ? encodePageToken({ after: page.cursor }) : undefined;

        return {
          structuredContent: {
            total: page.total,
            documents: page.documents,
            truncated: page.truncated,
            nextCursor
          },
          content: [{ type: "text", text: listing(page.documents) }]
        };
      } catch (error) {
        return fail("docs_load_page", error);
      }
    }
  );

  server.registerTool(
    "docs_load_all",
    {
      title: "Load All",
      description:
        "Pages through an index by offset or by cursor and returns every document fetched, in fetch order.",
      inputSchema: {
        index: indexArg,
        strategy: PaginationStrategy.default("cursor"),
        pageSize: z.number().int().min(1).max(1_000).default(10),
        bound: z
          .number()
          .int()
          .min(1)
          .max(10_000)
          .default(100)
          .describe("offset: record bound; cursor: number of requests"),
        stopWhen: StopWhen.default("exhausted")
      },
      outputSchema: {
        total: z.number(),
        requests: z.number(),
        truncatedPages: z.array(z.number()),
        documents: z.array(UserDocumentSchema)
      }
    },
    async ({ index, strategy, pageSize, bound, stopWhen }, extra): Promise<CallToolResult> => {
      const signal = AbortSignal.any([context.signal, extra.signal]);
      try {
        const common = { loader, index, pageSize, stopWhen, signal, logger };
        const result =
          strategy === "offset"
            ? await paginateByOffset({ ...common, limit: bound })
            : await paginateByCursor({ ...common, iterations: bound });

        return {
          structuredContent: {
            total: result.total,
            requests: result.requests,
            truncatedPages: result.truncatedPages,
            documents: result.documents
          },
          content: [
            {
              type: "text",
              text: `${result.documents.length} documents in ${result.requests} requests (total ${result.total})`
            }
          ]
        };
      } catch (error) {
        return fail("docs_load_all", error);
      }
    }
  );

  server.registerTool(
    "docs_store",
    {
      title: "Store User",
      description: "Stores one user document and refreshes the index.",
      inputSchema: {
        index: indexArg,
        id: z.number().int(),
        username: z.string(),
        createdAt: z.iso.datetime({ offset: true }).optional().describe("RFC3339; now when omitted"),
        documentId: z.string().optional().describe("Engine document id; engine-assigned when omitted")
      },
      outputSchema: {
        id: z.string(),
        result: z.string()
      }
    },
    async ({ index, id, username, createdAt, documentId }, extra): Promise<CallToolResult> => {
      const signal = AbortSignal.any([context.signal, extra.signal]);
      try {
        const doc: UserDocument = {
          ID: id,
          CreatedAt: createdAt ?? new Date().toISOString(),
          Username: username
        };
        const stored = await context.documents.storeDocument(doc, { index, documentId, signal });
        return {
          structuredContent: { id: stored.id, result: stored.result },
          content: [{ type: "text", text: `${stored.result} ${stored.id}` }]
        };
      } catch (error) {
        return fail("docs_store", error);
      }
    }
  );

  server.registerTool(
    "docs_create_index",
    {
      title: "Create Index",
      description: "Creates the index from the configured mapping file.",
      inputSchema: {
        index: indexArg
      },
      outputSchema: {
        acknowledged: z.boolean(),
        index: z.string()
      }
    },
    async ({ index }, extra): Promise<CallToolResult> => {
      const signal = AbortSignal.any([context.signal, extra.signal]);
      try {
        const created = await context.documents.createIndex({ index, signal });
        return {
          structuredContent: { acknowledged: created.acknowledged, index: created.index },
          content: [{ type: "text", text: `index ${created.index} acknowledged=${created.acknowledged}` }]
        };
      } catch (error) {
        return fail("docs_create_index", error);
      }
    }
  );

  return server;
}

function registerHealthz(app: Express): void {
  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });
}

function registerSessionRoutes(params: {
  app: Express;
  config: AppConfig;
  logger: Logger;
  sessions: Map<string, Session>;
  createServer: () => McpServer;
}): void {
  const { app, config, logger, sessions } = params;

  app.post(config.MCP_PATH, async (req, res) => {
    const sessionId = req.header("mcp-session-id");
    try {
      if (sessionId) {
        const session = sessions.get(sessionId);
        if (!session) {
          res.status(404).json({ error: "unknown session" });
          return;
        }
        await session.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: missing session id (initialize required)" },
          id: null
        });
        return;
      }

      const server = params.createServer();
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          sessions.set(sid, { transport, server, createdAt: Date.now() });
        }
      });
      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid) sessions.delete(sid);
      };

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error({ error }, "mcp request failed");
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null
        });
      }
    }
  });

  // GET opens the server-to-client stream, DELETE ends the session.
  const forward = (label: string) => async (req: Request, res: Response) => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      res.status(400).send("Missing mcp-session-id");
      return;
    }
    const session = sessions.get(sessionId);
    if (!session) {
      res.status(404).send("Unknown session");
      return;
    }
    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      logger.error({ error }, `mcp ${label} failed`);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get(config.MCP_PATH, forward("get"));
  app.delete(config.MCP_PATH, forward("delete"));
}

export async function createDocsMcpServer(params: {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}): Promise<CreateServerResult> {
  const config = loadConfig(params.env);
  const context = createAppContext({ config, logger: params.logger });
  const loader = new CachingPageLoader(context.documents, {
    maxEntries: 1_000,
    ttlMs: config.PAGE_CACHE_TTL_MS
  });

  const app = createMcpExpressApp({
    host: config.HOST,
    allowedHosts: config.ALLOWED_HOSTS
  });

  registerHealthz(app);
  app.use(createAuthMiddleware({ allowedTokens: config.API_KEYS, logger: params.logger }));

  const sessions = new Map<string, Session>();
  registerSessionRoutes({
    app,
    config,
    logger: params.logger,
    sessions,
    createServer: () => buildMcpServer({ logger: params.logger, context, loader })
  });

  const httpServer = app.listen(config.PORT, config.HOST);
  await new Promise<void>((resolve, reject) => {
    httpServer.once("listening", () => resolve());
    httpServer.once("error", reject);
  });
  const url = `http://${config.HOST}:${config.PORT}${config.MCP_PATH}`;

  return {
    url,
    close: async () => {
      await context.close();
      for (const session of sessions.values()) {
        await session.transport.close().catch((error: unknown) => {
          params.logger.warn({ error }, "session transport close failed");
        });
        await session.server.close().catch((error: unknown) => {
          params.logger.warn({ error }, "session server close failed");
        });
      }
      sessions.clear();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
      });
    }
  };
}
