/** Raw issue text as supplied by callers. Missing parts are treated as "". */
export type IssueText = {
  title?: string | null;
  body?: string | null;
};

export type TargetIssue = IssueText & {
  id: number;
};

export type CandidateIssue = IssueText & {
  id: number;
  url: string;
};

export type RankedMatch = {
  id: number;
  title: string;
  url: string;
  /** Rounded to 2 decimal places. */
  similarity: number;
};

export type BackendName = "lexical" | "embedding";

export type ScoreOptions = {
  /** Cancels in-flight remote work. Ignored by the lexical backend. */
  abortSignal?: AbortSignal;
};

/**
 * Scores a target text against candidate texts. The returned array is aligned
 * positionally with `candidateTexts`, each value in [0, 1].
 */
export interface SimilarityBackend {
  readonly name: BackendName;
  score(
    targetText: string,
    candidateTexts: readonly string[],
    options?: ScoreOptions,
  ): Promise<number[]>;
}

/** Remote embedding service seam. One call per batch. */
export interface EmbeddingClient {
  readonly model: string;
  embedBatch(
    texts: readonly string[],
    options: { abortSignal: AbortSignal },
  ): Promise<number[][]>;
}
