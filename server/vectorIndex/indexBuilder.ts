/**
 * Index Builder
 *
 * Embeds every text block in batches and assembles an InMemoryVectorIndex.
 * Failed batches are retried with exponential backoff; a batch that fails on
 * its last attempt aborts the build.
 *
 * Layer: Retrieval (offline)
 */

import { INDEX_BUILD_CONSTANTS } from "../config/constants";
import type { Embedder } from "../llm/embeddings";
import type { TextBlock } from "../records/types";
import { InMemoryVectorIndex } from "./index";

export interface IndexBuildOptions {
  batchSize?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onBatch?: (done: number, total: number) => void;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

async function embedWithRetry(
  embedder: Embedder,
  texts: string[],
  maxAttempts: number,
  baseDelayMs: number,
  sleep: (ms: number) => Promise<void>,
): Promise<number[][]> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const vectors = await embedder.embedBatch(texts);
      if (vectors.length !== texts.length) {
        throw new Error(`expected ${texts.length} embeddings, got ${vectors.length}`);
      }
      return vectors;
    } catch (error) {
      lastError = error;
      if (attempt < maxAttempts) {
        const delay = baseDelayMs * 2 ** (attempt - 1);
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[IndexBuilder] Attempt ${attempt}/${maxAttempts} failed (${message}), retrying in ${delay}ms`);
        await sleep(delay);
      }
    }
  }
  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`[IndexBuilder] Embedding failed after ${maxAttempts} attempts: ${message}`);
}

export async function buildVectorIndex(
  blocks: readonly TextBlock[],
  embedder: Embedder,
  options: IndexBuildOptions = {},
): Promise<InMemoryVectorIndex> {
  const batchSize = options.batchSize ?? INDEX_BUILD_CONSTANTS.BATCH_SIZE;
  const maxAttempts = options.maxAttempts ?? INDEX_BUILD_CONSTANTS.MAX_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? INDEX_BUILD_CONSTANTS.BASE_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;

  if (blocks.length === 0) {
    throw new Error("[IndexBuilder] No text blocks to index");
  }

  const entries: Array<{ id: string; vector: number[] }> = [];
  for (let start = 0; start < blocks.length; start += batchSize) {
    const batch = blocks.slice(start, start + batchSize);
    const vectors = await embedWithRetry(embedder, batch.map(b => b.text), maxAttempts, baseDelayMs, sleep);
    batch.forEach((block, i) => entries.push({ id: block.id, vector: vectors[i] }));
    options.onBatch?.(entries.length, blocks.length);
  }

  const dimensions = entries[0].vector.length;
  const mismatched = entries.find(e => e.vector.length !== dimensions);
  if (mismatched) {
    throw new Error(`[IndexBuilder] ${mismatched.id} has ${mismatched.vector.length} dimensions, expected ${dimensions}`);
  }

  return new InMemoryVectorIndex(embedder.model, dimensions, entries);
}
