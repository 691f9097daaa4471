import { createOpenAI } from "@ai-sdk/openai";
import { embedMany } from "ai";
import type { EmbeddingClient } from "./types.ts";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * OpenAI embeddings through the AI SDK. Retries are disabled: a failed batch
 * surfaces immediately and retry policy belongs to the caller.
 */
export function createOpenAIEmbeddingClient(opts: {
  apiKey: string;
  model?: string;
}): EmbeddingClient {
  const model = opts.model ?? DEFAULT_EMBEDDING_MODEL;
  const provider = createOpenAI({ apiKey: opts.apiKey });
  const embeddingModel = provider.textEmbeddingModel(model);

  return {
    model,
    async embedBatch(texts, { abortSignal }) {
      const { embeddings } = await embedMany({
        model: embeddingModel,
        values: [...texts],
        maxRetries: 0,
        abortSignal,
      });
      return embeddings;
    },
  };
}
