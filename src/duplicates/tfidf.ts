import { readFileSync } from "node:fs";
import { z } from "zod";
import { sparseCosineSimilarity, type SparseVector } from "./similarity.ts";

export const MAX_FEATURES = 5000;

const stopWordsSchema = z.array(z.string().min(1));

let stopWords: ReadonlySet<string> | undefined;

/** English stop words, loaded once from the JSON list beside this module. */
export function getStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    const raw = readFileSync(new URL("./english-stop-words.json", import.meta.url), "utf8");
    stopWords = new Set(stopWordsSchema.parse(JSON.parse(raw)));
  }
  return stopWords;
}

export type TfidfOptions = {
  maxFeatures?: number;
  stopWords?: ReadonlySet<string>;
};

/**
 * A fitted TF-IDF space over one corpus. Created per call and never shared:
 * the vocabulary belongs to the documents it was fitted on.
 */
export type TfidfSpace = {
  vocabulary: ReadonlySet<string>;
  idf: ReadonlyMap<string, number>;
  /** One L2-normalized row per input document, same order as the input. */
  vectors: SparseVector[];
};

/**
 * Unigrams and bigrams of the tokens left after stop-word removal. Tokens are
 * runs of two or more word characters; single characters are dropped.
 */
export function extractFeatures(text: string, stop: ReadonlySet<string>): string[] {
  const tokens = (text.match(/\w\w+/g) ?? []).filter((t) => !stop.has(t));

  const features = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    features.push(`${tokens[i]} ${tokens[i + 1]}`);
  }
  return features;
}

function countFeatures(features: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const f of features) counts.set(f, (counts.get(f) ?? 0) + 1);
  return counts;
}

/**
 * Keep the `maxFeatures` terms with the highest corpus-wide counts. Ties are
 * broken by term so the vocabulary does not depend on document order.
 */
function limitVocabulary(
  totals: ReadonlyMap<string, number>,
  maxFeatures: number,
): Set<string> {
  if (totals.size <= maxFeatures) return new Set(totals.keys());

  const ranked = [...totals.entries()].sort((a, b) => {
    if (b[1] !== a[1]) return b[1] - a[1];
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
  });
  return new Set(ranked.slice(0, maxFeatures).map(([term]) => term));
}

export function fitTransform(
  documents: readonly string[],
  options: TfidfOptions = {},
): TfidfSpace {
  const maxFeatures = options.maxFeatures ?? MAX_FEATURES;
  const stop = options.stopWords ?? getStopWords();

  const docCounts = documents.map((doc) => countFeatures(extractFeatures(doc, stop)));

  const totals = new Map<string, number>();
  for (const counts of docCounts) {
    for (const [term, count] of counts) {
      totals.set(term, (totals.get(term) ?? 0) + count);
    }
  }
  const vocabulary = limitVocabulary(totals, maxFeatures);

  const df = new Map<string, number>();
  for (const counts of docCounts) {
    for (const term of counts.keys()) {
      if (vocabulary.has(term)) df.set(term, (df.get(term) ?? 0) + 1);
    }
  }

  // Smoothed idf: ln((1 + n) / (1 + df)) + 1
  const n = documents.length;
  const idf = new Map<string, number>();
  for (const [term, freq] of df) {
    idf.set(term, Math.log((1 + n) / (1 + freq)) + 1);
  }

  const vectors = docCounts.map((counts) => {
    const row = new Map<string, number>();
    let sumSquares = 0;
    for (const [term, count] of counts) {
      const weight = idf.get(term);
      if (weight === undefined) continue;
      const value = count * weight;
      row.set(term, value);
      sumSquares += value * value;
    }
    const norm = Math.sqrt(sumSquares);
    if (norm > 0) {
      for (const [term, value] of row) row.set(term, value / norm);
    }
    return row;
  });

  return { vocabulary, idf, vectors };
}

/**
 * TF-IDF cosine similarity of `targetText` against each candidate. The target
 * is document 0 of the fitted corpus. An empty vocabulary scores all zeros.
 */
export function scoreLexical(
  targetText: string,
  candidateTexts: readonly string[],
  options: TfidfOptions = {},
): number[] {
  if (candidateTexts.length === 0) return [];

  const space = fitTransform([targetText, ...candidateTexts], options);
  const [target, ...candidates] = space.vectors;

  if (!target || space.vocabulary.size === 0) {
    return candidateTexts.map(() => 0);
  }
  return candidates.map((vector) => sparseCosineSimilarity(target, vector));
}
