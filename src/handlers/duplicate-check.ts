/**
 * Handler for duplicate checks.
 *
 * Loads the target and its candidates (from GitHub, or inline from the
 * request), runs the exact-title pre-check, then the ranked similarity search.
 *
 * Fail-open on the embedding backend only: an EmbeddingBackendError yields an
 * empty match list flagged `degraded`, so callers can tell it apart from a
 * genuine "no matches". Issue source and other errors propagate.
 */

import type { Logger } from "pino";
import type { DuplicateFinder } from "../duplicates/duplicate-finder.ts";
import type { BackendName, CandidateIssue, RankedMatch, TargetIssue } from "../duplicates/types.ts";
import type { IssueSource } from "../github/issue-source.ts";
import { classifyError, EmbeddingBackendError } from "../lib/errors.ts";

export type DuplicateCheckRequest =
  | {
      mode: "repo";
      owner: string;
      repo: string;
      issueNumber: number;
      topK?: number;
    }
  | {
      mode: "inline";
      issue: TargetIssue;
      candidates: CandidateIssue[];
      topK?: number;
    };

export type DuplicateCheckResult = {
  backend: BackendName;
  exactDuplicate: { id: number; title: string; url: string } | null;
  similarIssues: RankedMatch[];
  candidateCount: number;
  degraded: boolean;
  degradedReason: string | null;
};

export type DuplicateCheckHandler = {
  /** False when no issue source is configured; repo-mode requests are then rejected. */
  readonly supportsRepoMode: boolean;
  check(
    request: DuplicateCheckRequest,
    opts?: { logger?: Logger; abortSignal?: AbortSignal },
  ): Promise<DuplicateCheckResult>;
};

export class RepoModeUnavailableError extends Error {
  constructor() {
    super("Repository lookups are disabled: no GitHub token configured");
    this.name = "RepoModeUnavailableError";
  }
}

export function createDuplicateCheckHandler(deps: {
  finder: DuplicateFinder;
  issueSource?: IssueSource;
  logger: Logger;
}): DuplicateCheckHandler {
  const { finder, issueSource } = deps;

  async function loadIssues(
    request: DuplicateCheckRequest,
  ): Promise<{ target: TargetIssue; candidates: CandidateIssue[] }> {
    if (request.mode === "inline") {
      return { target: request.issue, candidates: request.candidates };
    }

    if (!issueSource) throw new RepoModeUnavailableError();

    const [target, candidates] = await Promise.all([
      issueSource.getIssue(request.owner, request.repo, request.issueNumber),
      issueSource.listOpenIssues(request.owner, request.repo),
    ]);
    return { target, candidates };
  }

  async function check(
    request: DuplicateCheckRequest,
    opts: { logger?: Logger; abortSignal?: AbortSignal } = {},
  ): Promise<DuplicateCheckResult> {
    const logger = (opts.logger ?? deps.logger).child({
      handler: "duplicate-check",
      mode: request.mode,
      ...(request.mode === "repo"
        ? { repo: `${request.owner}/${request.repo}`, issueNumber: request.issueNumber }
        : {}),
    });

    const { target, candidates } = await loadIssues(request);
    const candidateCount = candidates.filter((c) => c.id !== target.id).length;

    const exact = finder.checkExactDuplicate(target, candidates);
    const exactDuplicate = exact
      ? { id: exact.id, title: exact.title ?? "", url: exact.url }
      : null;
    if (exactDuplicate) {
      logger.info({ duplicateOf: exactDuplicate.id }, "Exact title duplicate found");
    }

    let similarIssues: RankedMatch[] = [];
    let degradedReason: string | null = null;
    try {
      similarIssues = await finder.findSimilarIssues(target, candidates, request.topK, {
        abortSignal: opts.abortSignal,
      });
    } catch (err) {
      if (!(err instanceof EmbeddingBackendError)) throw err;

      degradedReason = err.reason;
      logger.warn(
        { err, reason: err.reason, category: classifyError(err) },
        "Embedding similarity failed, returning no similar issues (fail-open)",
      );
    }

    logger.info(
      {
        backend: finder.backend,
        candidateCount,
        matchCount: similarIssues.length,
        degraded: degradedReason !== null,
      },
      "Duplicate check complete",
    );

    return {
      backend: finder.backend,
      exactDuplicate,
      similarIssues,
      candidateCount,
      degraded: degradedReason !== null,
      degradedReason,
    };
  }

  return {
    supportsRepoMode: issueSource !== undefined,
    check,
  };
}
