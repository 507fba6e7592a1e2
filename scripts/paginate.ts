import * as z from "zod/v4";
import { loadEngineConfig, PaginationStrategy, StopWhen } from "../src/config/env.js";
import { createAppContext } from "../src/context.js";
import { paginateByCursor, paginateByOffset, PaginationError } from "../src/documents/paginate.js";
import { createLogger } from "../src/observability/logger.js";

const ArgsSchema = z.object({
  STRATEGY: PaginationStrategy.default("offset"),
  PAGE_SIZE: z.coerce.number().int().min(1).default(10),
  BOUND: z.coerce.number().int().min(1).default(100),
  STOP_WHEN: StopWhen.default("bound"),
  INDEX: z.string().optional()
});

const logger = createLogger();

async function main(): Promise<void> {
  const args = ArgsSchema.parse(process.env);
  const context = createAppContext({ config: loadEngineConfig(), logger });

  const cancel = () => {
    logger.info("interrupt received, cancelling");
    void context.close();
  };
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  const common = {
    loader: context.documents,
    index: args.INDEX,
    pageSize: args.PAGE_SIZE,
    stopWhen: args.STOP_WHEN,
    signal: context.signal,
    logger
  };

  try {
    const result =
      args.STRATEGY === "offset"
        ? await paginateByOffset({ ...common, limit: args.BOUND })
        : await paginateByCursor({ ...common, iterations: args.BOUND });
    console.log(JSON.stringify(result.documents, null, 4));
  } catch (error) {
    if (error instanceof PaginationError) {
      console.log(JSON.stringify(error.partial, null, 4));
    }
    throw error;
  } finally {
    await context.close();
  }
}

main().catch((error) => {
  logger.error({ error }, "pagination failed");
  process.exit(1);
});
