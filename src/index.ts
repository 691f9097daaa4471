import { serve } from "@hono/node-server";
import { Octokit } from "@octokit/rest";
import { Hono } from "hono";
import { loadConfig } from "./config.ts";
import { createDuplicateFinder } from "./duplicates/duplicate-finder.ts";
import { createGitHubIssueSource, type IssueSource } from "./github/issue-source.ts";
import { createDuplicateCheckHandler } from "./handlers/duplicate-check.ts";
import { classifyError, ERROR_SUMMARIES } from "./lib/errors.ts";
import { createLogger } from "./lib/logger.ts";
import { createDuplicateRoutes } from "./routes/duplicates.ts";
import { createHealthRoutes } from "./routes/health.ts";

// Fail fast on missing or invalid config
const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

// Missing OPENAI_API_KEY is not an error: the finder falls back to lexical scoring
const finder = createDuplicateFinder(
  {
    useEmbeddings: config.useEmbeddings,
    similarityThreshold: config.similarityThreshold,
    topK: config.topK,
    apiCredential: config.openaiApiKey,
    embeddingModel: config.embeddingModel,
    embeddingTimeoutMs: config.embeddingTimeoutMs,
  },
  { logger },
);

let issueSource: IssueSource | undefined;
if (config.githubToken) {
  issueSource = createGitHubIssueSource({
    octokit: new Octokit({ auth: config.githubToken }),
    logger,
    maxCandidates: config.maxCandidates,
  });
} else {
  logger.info("GITHUB_TOKEN not set, repository lookups disabled (inline requests only)");
}

const handler = createDuplicateCheckHandler({ finder, issueSource, logger });

const app = new Hono();

// Mount routes
app.route("/api/duplicates", createDuplicateRoutes({ handler, logger }));
app.route("/", createHealthRoutes({ backend: finder.backend, repoModeEnabled: handler.supportsRepoMode }));

// Global error handler
app.onError((err, c) => {
  const category = classifyError(err);
  logger.error({ err, category, path: c.req.path, method: c.req.method }, "Unhandled error");
  return c.json({ error: category, message: ERROR_SUMMARIES[category] }, 500);
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, backend: finder.backend, threshold: finder.threshold, topK: finder.topK },
    "Duplicate finder server started",
  );
});
