import type { Logger } from "pino";
import type { EngineConfig } from "./config/env.js";
import { EngineTransport } from "./engine/transport.js";
import { DocumentClient } from "./documents/client.js";

export type AppContext = {
  config: EngineConfig;
  logger: Logger;
  transport: EngineTransport;
  documents: DocumentClient;
  /** Aborted by `close()`; pass it to retrievals so shutdown cancels them. */
  signal: AbortSignal;
  close: () => Promise<void>;
};

export function createAppContext(params: { config: EngineConfig; logger: Logger }): AppContext {
  const { config, logger } = params;

  const transport = new EngineTransport({
    hosts: config.ES_HOSTS,
    timeoutMs: config.ES_SEARCH_TIMEOUT_MS,
    username: config.ES_USERNAME,
    password: config.ES_PASSWORD,
    apiKey: config.ES_API_KEY,
    disableCompression: config.ES_DISABLE_COMPRESSION
  });

  const documents = new DocumentClient(
    transport,
    { defaultIndex: config.ES_DEFAULT_INDEX, mappingPath: config.ES_MAPPING_PATH },
    logger
  );

  const shutdown = new AbortController();

  logger.info({ hosts: config.ES_HOSTS, defaultIndex: config.ES_DEFAULT_INDEX }, "engine client ready");

  return {
    config,
    logger,
    transport,
    documents,
    signal: shutdown.signal,
    close: async () => {
      if (shutdown.signal.aborted) return;
      shutdown.abort(new Error("shutting down"));
      logger.info("in-flight engine requests cancelled");
    }
  };
}
