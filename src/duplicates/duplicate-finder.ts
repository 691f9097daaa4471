/**
 * Duplicate finder facade.
 *
 * Picks a similarity backend once at construction and runs
 * normalize -> score -> rank for each call. The exact-title check is exposed
 * separately as a cheap pre-check; it is not part of the ranked pipeline.
 */

import type { Logger } from "pino";
import { createEmbeddingBackend, DEFAULT_EMBEDDING_TIMEOUT_MS } from "./embedding-backend.ts";
import { createOpenAIEmbeddingClient, DEFAULT_EMBEDDING_MODEL } from "./embedding-client.ts";
import { findExactDuplicate } from "./exact-match.ts";
import { createLexicalBackend } from "./lexical-backend.ts";
import { combineIssueText } from "./normalize.ts";
import { rankMatches } from "./ranker.ts";
import type {
  BackendName,
  CandidateIssue,
  EmbeddingClient,
  RankedMatch,
  ScoreOptions,
  SimilarityBackend,
  TargetIssue,
} from "./types.ts";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.75;
export const DEFAULT_TOP_K = 3;

export type DuplicateFinderConfig = {
  useEmbeddings: boolean;
  similarityThreshold?: number;
  topK?: number;
  apiCredential?: string;
  embeddingModel?: string;
  embeddingTimeoutMs?: number;
};

export type DuplicateFinderDeps = {
  logger: Logger;
  /** Replaces the OpenAI client built from `apiCredential`. */
  embeddingClient?: EmbeddingClient;
};

export type DuplicateFinder = {
  readonly backend: BackendName;
  readonly threshold: number;
  readonly topK: number;
  findSimilarIssues(
    target: TargetIssue,
    existingIssues: readonly CandidateIssue[],
    topK?: number,
    options?: ScoreOptions,
  ): Promise<RankedMatch[]>;
  checkExactDuplicate(
    target: TargetIssue,
    candidates: readonly CandidateIssue[],
  ): CandidateIssue | null;
};

function assertThreshold(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`similarityThreshold must be within [0, 1], got ${value}`);
  }
  return value;
}

function assertTopK(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`topK must be a positive integer, got ${value}`);
  }
  return value;
}

function selectBackend(config: DuplicateFinderConfig, deps: DuplicateFinderDeps): SimilarityBackend {
  const { logger } = deps;

  if (!config.useEmbeddings) {
    logger.info("Embeddings disabled, using lexical similarity backend");
    return createLexicalBackend();
  }

  const apiKey = config.apiCredential?.trim();
  const client =
    deps.embeddingClient ??
    (apiKey
      ? createOpenAIEmbeddingClient({
          apiKey,
          model: config.embeddingModel ?? DEFAULT_EMBEDDING_MODEL,
        })
      : undefined);

  if (!client) {
    logger.info("No embedding credential configured, falling back to lexical similarity backend");
    return createLexicalBackend();
  }

  logger.info({ model: client.model }, "Using embedding similarity backend");
  return createEmbeddingBackend({
    client,
    timeoutMs: config.embeddingTimeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS,
    logger,
  });
}

export function createDuplicateFinder(
  config: DuplicateFinderConfig,
  deps: DuplicateFinderDeps,
): DuplicateFinder {
  const threshold = assertThreshold(config.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD);
  const defaultTopK = assertTopK(config.topK ?? DEFAULT_TOP_K);
  const backend = selectBackend(config, deps);
  const logger = deps.logger.child({ module: "duplicate-finder", backend: backend.name });

  async function findSimilarIssues(
    target: TargetIssue,
    existingIssues: readonly CandidateIssue[],
    topK?: number,
    options?: ScoreOptions,
  ): Promise<RankedMatch[]> {
    const limit = assertTopK(topK ?? defaultTopK);

    const candidates = existingIssues.filter((issue) => issue.id !== target.id);
    if (candidates.length === 0) {
      logger.debug({ targetId: target.id }, "No candidates to compare, skipping scoring");
      return [];
    }

    const targetText = combineIssueText(target.title, target.body);
    const candidateTexts = candidates.map((c) => combineIssueText(c.title, c.body));

    const scores = await backend.score(targetText, candidateTexts, options);
    const matches = rankMatches(candidates, scores, threshold, limit);

    logger.debug(
      { targetId: target.id, candidateCount: candidates.length, matchCount: matches.length },
      "Similarity ranking complete",
    );
    return matches;
  }

  return {
    backend: backend.name,
    threshold,
    topK: defaultTopK,
    findSimilarIssues,
    checkExactDuplicate: (target, candidates) => findExactDuplicate(target, candidates),
  };
}
