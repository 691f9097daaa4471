import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import type { Logger } from "pino";
import { z } from "zod";
import type { DuplicateCheckHandler, DuplicateCheckRequest } from "../handlers/duplicate-check.ts";
import { createChildLogger } from "../lib/logger.ts";
import { classifyError, IssueSourceError } from "../lib/errors.ts";

interface DuplicateRouteDeps {
  handler: DuplicateCheckHandler;
  logger: Logger;
}

const topKSchema = z.number().int().positive().max(50).optional();

const repoRequestSchema = z.object({
  repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, "Expected \"owner/name\""),
  issueNumber: z.number().int().positive(),
  topK: topKSchema,
});

const textSchema = z.string().nullish();

const inlineRequestSchema = z.object({
  issue: z.object({
    id: z.number().int(),
    title: textSchema,
    body: textSchema,
  }),
  candidates: z.array(
    z.object({
      id: z.number().int(),
      title: textSchema,
      body: textSchema,
      url: z.string(),
    }),
  ),
  topK: topKSchema,
});

export const duplicateRequestSchema = z.union([repoRequestSchema, inlineRequestSchema]);

export function toCheckRequest(body: z.infer<typeof duplicateRequestSchema>): DuplicateCheckRequest {
  if ("repo" in body) {
    const [owner = "", repo = ""] = body.repo.split("/");
    return { mode: "repo", owner, repo, issueNumber: body.issueNumber, topK: body.topK };
  }
  return { mode: "inline", issue: body.issue, candidates: body.candidates, topK: body.topK };
}

export function createDuplicateRoutes(deps: DuplicateRouteDeps): Hono {
  const { handler, logger } = deps;
  const app = new Hono();

  app.post("/", async (c) => {
    const requestId = c.req.header("x-request-id") ?? randomUUID();
    const requestLogger = createChildLogger(logger, { requestId, route: "duplicates" });

    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch (err) {
      requestLogger.debug({ err }, "Request body is not valid JSON");
      return c.json(
        { error: "invalid_request", issues: [{ path: "", message: "Body must be JSON" }] },
        400,
      );
    }

    const parsed = duplicateRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(
        {
          error: "invalid_request",
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        },
        400,
      );
    }

    const request = toCheckRequest(parsed.data);
    if (request.mode === "repo" && !handler.supportsRepoMode) {
      return c.json(
        {
          error: "issue_source_unavailable",
          message: "Repository lookups require GITHUB_TOKEN; send issue and candidates inline instead",
        },
        400,
      );
    }

    try {
      // A client disconnect aborts in-flight embedding batches
      const result = await handler.check(request, {
        logger: requestLogger,
        abortSignal: c.req.raw.signal,
      });
      return c.json(result);
    } catch (err) {
      if (err instanceof IssueSourceError && err.statusCode === 404 && request.mode === "repo") {
        requestLogger.info({ err }, "Issue or repository not found");
        return c.json(
          {
            error: "issue_not_found",
            message: `Issue #${request.issueNumber} not found in ${request.owner}/${request.repo}`,
          },
          404,
        );
      }
      if (err instanceof IssueSourceError) {
        requestLogger.warn({ err, statusCode: err.statusCode }, "Issue source request failed");
        return c.json(
          { error: "issue_source_error", category: classifyError(err), message: err.message },
          502,
        );
      }
      throw err;
    }
  });

  return app;
}
