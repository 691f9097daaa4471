import type { SimilarityBackend } from "./types.ts";
import { MAX_FEATURES, scoreLexical } from "./tfidf.ts";

/**
 * TF-IDF backend. Pure computation with no external dependency, so it is
 * always available as the fallback.
 */
export function createLexicalBackend(opts: { maxFeatures?: number } = {}): SimilarityBackend {
  const maxFeatures = opts.maxFeatures ?? MAX_FEATURES;

  return {
    name: "lexical",
    async score(targetText, candidateTexts) {
      return scoreLexical(targetText, candidateTexts, { maxFeatures });
    },
  };
}
