import type { RankedMatch } from "./types.ts";

export type RankableCandidate = {
  id: number;
  title?: string | null;
  url: string;
};

function roundSimilarity(score: number): number {
  return Math.round(score * 100) / 100;
}

/**
 * Pair candidates with their scores, keep those at or above `threshold`,
 * sort descending and truncate to `topK`.
 *
 * Array.prototype.sort is stable, so equal scores keep input order.
 * Comparisons use full precision; only the output is rounded.
 */
export function rankMatches(
  candidates: readonly RankableCandidate[],
  scores: readonly number[],
  threshold: number,
  topK: number,
): RankedMatch[] {
  if (scores.length !== candidates.length) {
    throw new RangeError(
      `Expected ${candidates.length} scores, received ${scores.length}`,
    );
  }

  return candidates
    .map((candidate, index) => ({ candidate, score: scores[index] ?? 0 }))
    .filter(({ score }) => score >= threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topK))
    .map(({ candidate, score }) => ({
      id: candidate.id,
      title: candidate.title ?? "",
      url: candidate.url,
      similarity: roundSimilarity(score),
    }));
}
