/**
 * Vector Index
 *
 * Purpose:
 * Flat cosine-similarity search over text block embeddings, persisted as a
 * JSON file written by server/scripts/build-index.ts.
 *
 * Ranking: score descending, ties broken by text block id ascending.
 *
 * Layer: Retrieval (storage)
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import type { RecordStore } from "../records/recordStore";
import { SnapshotLoadError } from "../utils/errorHandler";

export interface VectorHit {
  id: string;
  score: number;
}

export interface VectorIndex {
  readonly model: string;
  readonly dimensions: number;
  readonly size: number;
  ids(): string[];
  search(vector: number[], topK: number, signal?: AbortSignal): Promise<VectorHit[]>;
}

export const INDEX_FILE_VERSION = 1;

const indexFileSchema = z
  .object({
    version: z.literal(INDEX_FILE_VERSION),
    model: z.string().min(1),
    dimensions: z.number().int().positive(),
    builtAt: z.string(),
    entries: z.array(
      z.object({
        id: z.string().min(1),
        vector: z.array(z.number()),
      }),
    ),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.entries.forEach((entry, i) => {
      if (entry.vector.length !== file.dimensions) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", i, "vector"],
          message: `expected ${file.dimensions} dimensions, got ${entry.vector.length}`,
        });
      }
      if (seen.has(entry.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["entries", i, "id"], message: `duplicate id ${entry.id}` });
      }
      seen.add(entry.id);
    });
  });

export type VectorIndexFile = z.infer<typeof indexFileSchema>;

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`[VectorIndex] Dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function compareHits(a: VectorHit, b: VectorHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class InMemoryVectorIndex implements VectorIndex {
  readonly model: string;
  readonly dimensions: number;
  private readonly entries: ReadonlyArray<{ id: string; vector: readonly number[] }>;

  constructor(model: string, dimensions: number, entries: Array<{ id: string; vector: number[] }>) {
    this.model = model;
    this.dimensions = dimensions;
    this.entries = Object.freeze(entries.map(e => Object.freeze({ id: e.id, vector: Object.freeze([...e.vector]) })));
  }

  static fromJSON(raw: unknown): InMemoryVectorIndex {
    const parsed = indexFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SnapshotLoadError(`Invalid vector index: ${fromZodError(parsed.error).message}`);
    }
    return new InMemoryVectorIndex(parsed.data.model, parsed.data.dimensions, parsed.data.entries);
  }

  static fromFile(location: URL | string): InMemoryVectorIndex {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(location, "utf-8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SnapshotLoadError(`Cannot read vector index (${String(location)}): ${message}. Run "npm run build:index" first.`);
    }
    return InMemoryVectorIndex.fromJSON(raw);
  }

  get size(): number {
    return this.entries.length;
  }

  ids(): string[] {
    return this.entries.map(e => e.id);
  }

  async search(vector: number[], topK: number, signal?: AbortSignal): Promise<VectorHit[]> {
    signal?.throwIfAborted();
    if (vector.length !== this.dimensions) {
      throw new Error(`[VectorIndex] Query has ${vector.length} dimensions, index has ${this.dimensions}`);
    }
    const hits = this.entries.map(entry => ({ id: entry.id, score: cosineSimilarity(vector, entry.vector) }));
    hits.sort(compareHits);
    return hits.slice(0, Math.max(0, topK));
  }

  toJSON(): VectorIndexFile {
    return {
      version: INDEX_FILE_VERSION,
      model: this.model,
      dimensions: this.dimensions,
      builtAt: new Date().toISOString(),
      entries: this.entries.map(e => ({ id: e.id, vector: [...e.vector] })),
    };
  }
}

/**
 * Every indexed id must name a text block in the store. Blocks that were
 * never indexed are only reported: they cannot be retrieved, but nothing
 * retrieved can point at them either.
 */
export function assertIndexMatchesStore(index: VectorIndex, store: RecordStore): void {
  const unknown = index.ids().filter(id => !store.textBlock(id));
  if (unknown.length > 0) {
    const preview = unknown.slice(0, 5).join(", ");
    throw new SnapshotLoadError(
      `Vector index has ${unknown.length} entries with no matching text block (${preview}). Rebuild the index.`,
    );
  }

  const indexed = new Set(index.ids());
  const missing = store.textBlocks().filter(b => !indexed.has(b.id)).length;
  if (missing > 0) {
    console.warn(`[VectorIndex] ${missing} text blocks are not in the index and will not be retrievable`);
  }
}
