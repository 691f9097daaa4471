import { z } from "zod";

const optionalSecret = z
  .string()
  .optional()
  .transform((s) => {
    const trimmed = s?.trim();
    return trimmed ? trimmed : undefined;
  });

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((s) => {
      if (s === undefined || s.trim() === "") return fallback;
      return !["false", "0", "no", "off"].includes(s.trim().toLowerCase());
    });

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  logLevel: z.string().default("info"),
  githubToken: optionalSecret,
  openaiApiKey: optionalSecret,
  useEmbeddings: envBoolean(true),
  similarityThreshold: z.coerce.number().min(0).max(1).default(0.75),
  topK: z.coerce.number().int().positive().default(3),
  maxCandidates: z.coerce.number().int().positive().default(100),
  embeddingModel: z.string().min(1).default("text-embedding-3-small"),
  embeddingTimeoutMs: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Map environment variables onto the config schema. Pure; does not exit. */
export function parseConfig(env: Record<string, string | undefined>) {
  return configSchema.safeParse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    githubToken: env.GITHUB_TOKEN,
    openaiApiKey: env.OPENAI_API_KEY,
    useEmbeddings: env.DUPLICATE_USE_EMBEDDINGS,
    similarityThreshold: env.DUPLICATE_SIMILARITY_THRESHOLD,
    topK: env.DUPLICATE_TOP_K,
    maxCandidates: env.DUPLICATE_MAX_CANDIDATES,
    embeddingModel: env.EMBEDDING_MODEL,
    embeddingTimeoutMs: env.EMBEDDING_TIMEOUT_MS,
  });
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = parseConfig(env);

  if (!result.success) {
    console.error("FATAL: Invalid configuration:");
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}
