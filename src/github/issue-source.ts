import type { Octokit } from "@octokit/rest";
import type { Logger } from "pino";
import type { CandidateIssue } from "../duplicates/types.ts";
import { IssueSourceError, readStatusCode } from "../lib/errors.ts";

export const DEFAULT_MAX_CANDIDATES = 100;
const PAGE_SIZE = 100;

export type IssueSource = {
  getIssue(owner: string, repo: string, issueNumber: number): Promise<CandidateIssue>;
  listOpenIssues(owner: string, repo: string): Promise<CandidateIssue[]>;
};

type IssueItem = {
  number: number;
  title: string;
  body?: string | null;
  html_url: string;
  pull_request?: unknown;
};

function toCandidate(item: IssueItem): CandidateIssue {
  return {
    id: item.number,
    title: item.title,
    body: item.body ?? "",
    url: item.html_url,
  };
}

function wrapError(err: unknown, action: string): IssueSourceError {
  const message = err instanceof Error ? err.message : String(err);
  return new IssueSourceError(`Failed to ${action}: ${message}`, {
    statusCode: readStatusCode(err),
    cause: err,
  });
}

/**
 * GitHub-backed issue source. Pull requests returned by the issues API are
 * skipped; listing stops at `maxCandidates` or the last page.
 */
export function createGitHubIssueSource(deps: {
  octokit: Octokit;
  logger: Logger;
  maxCandidates?: number;
}): IssueSource {
  const { octokit, logger } = deps;
  const maxCandidates = deps.maxCandidates ?? DEFAULT_MAX_CANDIDATES;

  return {
    async getIssue(owner, repo, issueNumber) {
      try {
        const { data } = await octokit.rest.issues.get({
          owner,
          repo,
          issue_number: issueNumber,
        });
        return toCandidate(data);
      } catch (err) {
        throw wrapError(err, `fetch issue ${owner}/${repo}#${issueNumber}`);
      }
    },

    async listOpenIssues(owner, repo) {
      const issues: CandidateIssue[] = [];
      let page = 1;

      while (issues.length < maxCandidates) {
        let items: IssueItem[];
        try {
          const response = await octokit.rest.issues.listForRepo({
            owner,
            repo,
            state: "open",
            sort: "updated",
            direction: "desc",
            per_page: PAGE_SIZE,
            page,
          });
          items = response.data;
        } catch (err) {
          throw wrapError(err, `list open issues for ${owner}/${repo}`);
        }

        for (const item of items) {
          if (item.pull_request) continue;
          issues.push(toCandidate(item));
          if (issues.length >= maxCandidates) break;
        }

        if (items.length < PAGE_SIZE) break;
        page++;
      }

      logger.debug({ owner, repo, count: issues.length, pages: page }, "Loaded open issues");
      return issues;
    },
  };
}
