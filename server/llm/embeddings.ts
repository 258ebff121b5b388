/**
 * Embeddings
 *
 * Purpose:
 * Turns text into vectors for the vector index. The index build script and
 * the semantic retriever share one Embedder so questions and text blocks are
 * embedded by the same model.
 *
 * Layer: LLM (external service)
 */

import { getOpenAI, LLMError } from "./client";
import { MODEL_ASSIGNMENTS } from "../config/models";

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface Embedder {
  readonly model: string;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

function toSafeEmbedding(value: unknown): number[] {
  if (!Array.isArray(value)) {
    throw new LLMError("unavailable", "[Embeddings] Invalid embedding vector payload", "openai");
  }
  return value.map(entry => {
    if (typeof entry !== "number" || !Number.isFinite(entry)) {
      throw new LLMError("unavailable", "[Embeddings] Invalid embedding vector value", "openai");
    }
    return entry;
  });
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;

  constructor(model: string = MODEL_ASSIGNMENTS.EMBEDDING) {
    this.model = model;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options);
    if (!vector) {
      throw new LLMError("empty", "[Embeddings] No embedding returned", "openai");
    }
    return vector;
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.request(texts, options);

    if (response.data.length !== texts.length) {
      throw new LLMError("unavailable", "[Embeddings] Unexpected embeddings response length", "openai");
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => toSafeEmbedding(item.embedding));
  }

  private async request(texts: string[], options: EmbedOptions) {
    try {
      return await getOpenAI().embeddings.create(
        { model: this.model, input: texts },
        { signal: options.signal },
      );
    } catch (error) {
      if (error instanceof LLMError) throw error;
      if (options.signal?.aborted) {
        throw new LLMError("timeout", "[Embeddings] Request aborted", "openai");
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LLMError("unavailable", `[Embeddings] Request failed: ${message}`, "openai");
    }
  }
}
