import type { Logger } from "pino";
import { EmbeddingBackendError, readStatusCode, type EmbeddingFailureReason } from "../lib/errors.ts";
import { cosineSimilarity } from "./similarity.ts";
import type { EmbeddingClient, ScoreOptions, SimilarityBackend } from "./types.ts";

/** Longer inputs are rejected by the embedding service. */
export const MAX_INPUT_CHARS = 8000;
export const EMBEDDING_BATCH_SIZE = 100;
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 30_000;

export type EmbeddingScoreOptions = ScoreOptions & {
  client: EmbeddingClient;
  timeoutMs?: number;
  batchSize?: number;
  logger?: Logger;
};

function reasonForStatus(status: number | undefined): EmbeddingFailureReason {
  if (status === 401 || status === 403) return "auth";
  if (status === 429) return "quota";
  if (status !== undefined && status >= 500) return "network";
  return "unknown";
}

function toBackendError(err: unknown, signals: {
  timeout: AbortSignal;
  caller: AbortSignal | undefined;
}): EmbeddingBackendError {
  if (err instanceof EmbeddingBackendError) return err;

  if (signals.caller?.aborted) {
    return new EmbeddingBackendError("Embedding request aborted by caller", {
      reason: "aborted",
      cause: err,
    });
  }
  if (signals.timeout.aborted) {
    return new EmbeddingBackendError("Embedding request timed out", {
      reason: "timeout",
      cause: err,
    });
  }

  const statusCode = readStatusCode(err);
  let reason = reasonForStatus(statusCode);
  if (reason === "unknown" && err instanceof TypeError) {
    // fetch reports connection failures as TypeError
    reason = "network";
  }
  const message = err instanceof Error ? err.message : String(err);
  return new EmbeddingBackendError(`Embedding request failed: ${message}`, {
    reason,
    statusCode,
    cause: err,
  });
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. Clients that
 * ignore the signal still cannot outlive the timeout.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Embed `texts` in sequential batches, concatenated in submission order.
 * Batches are never issued in parallel: position in the result is what ties a
 * vector back to its text.
 */
export async function embedInBatches(
  texts: readonly string[],
  opts: {
    client: EmbeddingClient;
    signal: AbortSignal;
    batchSize?: number;
    logger?: Logger;
  },
): Promise<number[][]> {
  const batchSize = opts.batchSize ?? EMBEDDING_BATCH_SIZE;
  const vectors: number[][] = [];

  for (let start = 0; start < texts.length; start += batchSize) {
    const batch = texts.slice(start, start + batchSize).map((t) => t.slice(0, MAX_INPUT_CHARS));
    const embeddings = await raceAbort(
      opts.client.embedBatch(batch, { abortSignal: opts.signal }),
      opts.signal,
    );

    if (!Array.isArray(embeddings) || embeddings.length !== batch.length) {
      throw new EmbeddingBackendError(
        `Embedding response had ${Array.isArray(embeddings) ? embeddings.length : "no"} vectors for ${batch.length} inputs`,
        { reason: "malformed_response" },
      );
    }
    if (embeddings.some((vector) => !Array.isArray(vector))) {
      throw new EmbeddingBackendError("Embedding response contained a non-vector entry", {
        reason: "malformed_response",
      });
    }

    opts.logger?.debug(
      { batchStart: start, batchSize: batch.length, model: opts.client.model },
      "Embedding batch complete",
    );
    vectors.push(...embeddings);
  }

  return vectors;
}

/**
 * Cosine similarity of the target's embedding against each candidate's.
 *
 * Failures propagate as EmbeddingBackendError; no partial or substituted
 * scores are ever returned.
 */
export async function scoreEmbedding(
  targetText: string,
  candidateTexts: readonly string[],
  opts: EmbeddingScoreOptions,
): Promise<number[]> {
  if (candidateTexts.length === 0) return [];

  const timeout = AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS);
  const signal = opts.abortSignal ? AbortSignal.any([timeout, opts.abortSignal]) : timeout;

  let vectors: number[][];
  try {
    vectors = await embedInBatches([targetText, ...candidateTexts], {
      client: opts.client,
      signal,
      batchSize: opts.batchSize,
      logger: opts.logger,
    });
  } catch (err) {
    throw toBackendError(err, { timeout, caller: opts.abortSignal });
  }

  const [target = [], ...candidates] = vectors;
  return candidates.map((vector) => cosineSimilarity(target, vector));
}

export function createEmbeddingBackend(opts: {
  client: EmbeddingClient;
  timeoutMs?: number;
  batchSize?: number;
  logger?: Logger;
}): SimilarityBackend {
  return {
    name: "embedding",
    score(targetText, candidateTexts, options) {
      return scoreEmbedding(targetText, candidateTexts, {
        ...opts,
        abortSignal: options?.abortSignal,
      });
    },
  };
}
