import * as z from "zod/v4";

const StopWhenSchema = z.enum(["bound", "exhausted"]);
const StrategySchema = z.enum(["offset", "cursor"]);

export type StopWhen = z.infer<typeof StopWhenSchema>;
export type PaginationStrategy = z.infer<typeof StrategySchema>;

const csv = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

const flag = z
  .string()
  .optional()
  .transform((v) => v === "1" || v?.toLowerCase() === "true")
  .default(false);

const EngineEnvSchema = z.object({
  ES_HOSTS: z
    .string()
    .default("http://localhost:9200")
    .transform(csv)
    .pipe(z.array(z.url({ protocol: /^https?$/ })).min(1)),
  ES_USERNAME: z.string().optional(),
  ES_PASSWORD: z.string().optional(),
  ES_API_KEY: z.string().optional(),
  ES_DEFAULT_INDEX: z.string().min(1).default("users"),
  ES_SEARCH_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),
  ES_DISABLE_COMPRESSION: flag,
  ES_MAPPING_PATH: z.string().default("mapping.json")
});

const ServerEnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),

  MCP_PATH: z.string().default("/mcp"),

  API_KEYS: z.string().min(1).transform(csv),

  ALLOWED_HOSTS: z
    .string()
    .optional()
    .transform((value) => (value ? csv(value) : undefined)),

  PAGE_CACHE_TTL_MS: z.coerce.number().int().min(0).default(0)
});

const EnvSchema = EngineEnvSchema.extend(ServerEnvSchema.shape);

export type EngineConfig = z.infer<typeof EngineEnvSchema>;
export type AppConfig = z.infer<typeof EnvSchema>;

function parseEnv<S extends z.ZodType>(schema: S, env: NodeJS.ProcessEnv): z.output<S> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${message}`);
  }
  return parsed.data;
}

/** Engine settings only; what the command-line scripts need. */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return parseEnv(EngineEnvSchema, env);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return parseEnv(EnvSchema, env);
}

export const StopWhen = StopWhenSchema;
export const PaginationStrategy = StrategySchema;
