import * as z from "zod/v4";
import { loadEngineConfig } from "../src/config/env.js";
import { createAppContext } from "../src/context.js";
import { seedUsers } from "../src/documents/seed.js";
import { createLogger } from "../src/observability/logger.js";

const ArgsSchema = z.object({
  COUNT: z.coerce.number().int().min(1).default(100_000),
  START_ID: z.coerce.number().int().min(0).default(0),
  CREATE_INDEX: z
    .string()
    .optional()
    .transform((v) => v === "1" || v?.toLowerCase() === "true"),
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

  try {
    if (args.CREATE_INDEX) {
      await context.documents.createIndex({ index: args.INDEX, signal: context.signal });
    }
    const stored = await seedUsers(context.documents, {
      count: args.COUNT,
      index: args.INDEX,
      startId: args.START_ID,
      signal: context.signal,
      logger
    });
    logger.info({ stored, index: context.documents.resolveIndex(args.INDEX) }, "seeding finished");
  } finally {
    await context.close();
  }
}

main().catch((error) => {
  logger.error({ error }, "seeding failed");
  process.exit(1);
});
