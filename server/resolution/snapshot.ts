/**
 * Engine Snapshot
 *
 * Purpose:
 * Everything a question is answered from: section catalog, record store,
 * vector index and predefined table, loaded together and never mutated.
 * A reload builds a whole new snapshot and publishes it with one reference
 * swap; requests read the reference once and keep it until they finish.
 *
 * Layer: Resolution (state)
 */

import { SectionCatalog } from "../records/sectionSchema";
import { loadProposalRecords } from "../records/loader";
import { RecordStore } from "../records/recordStore";
import { SnapshotLoadError } from "../utils/errorHandler";
import type { VectorIndex } from "../vectorIndex";
import { InMemoryVectorIndex, assertIndexMatchesStore } from "../vectorIndex";
import { PredefinedTable } from "./predefinedMatcher";

export interface SnapshotParts {
  catalog: SectionCatalog;
  store: RecordStore;
  index: VectorIndex;
  predefined: PredefinedTable;
}

export interface EngineSnapshot extends SnapshotParts {
  readonly version: number;
  readonly loadedAt: Date;
}

/** Builds snapshot contents; throws SnapshotLoadError when any part is unusable. */
export type SnapshotLoader = () => Promise<SnapshotParts>;

export class SnapshotHolder {
  private snapshot: EngineSnapshot | null = null;
  private nextVersion = 1;

  current(): EngineSnapshot | null {
    return this.snapshot;
  }

  publish(parts: SnapshotParts): EngineSnapshot {
    const snapshot: EngineSnapshot = Object.freeze({
      ...parts,
      version: this.nextVersion++,
      loadedAt: new Date(),
    });
    this.snapshot = snapshot;
    return snapshot;
  }
}

export interface SnapshotSources {
  proposalsPath: URL | string;
  predefinedPath: URL | string;
  vectorIndexPath: URL | string;
  schemaPath?: URL | string;
}

/**
 * Load every snapshot part from disk. When `expectedEmbeddingModel` is given
 * the index must have been built with that model, otherwise question vectors
 * would not be comparable with the stored ones.
 */
export function loadSnapshotFromDisk(sources: SnapshotSources, expectedEmbeddingModel?: string): SnapshotParts {
  const catalog = SectionCatalog.fromFile(sources.schemaPath);
  const store = new RecordStore(loadProposalRecords(sources.proposalsPath, catalog), catalog);
  const index = InMemoryVectorIndex.fromFile(sources.vectorIndexPath);

  if (expectedEmbeddingModel && index.model !== expectedEmbeddingModel) {
    throw new SnapshotLoadError(
      `Vector index was built with ${index.model} but questions are embedded with ${expectedEmbeddingModel}. Rebuild the index.`,
    );
  }
  assertIndexMatchesStore(index, store);

  const predefined = PredefinedTable.fromFile(sources.predefinedPath, store);
  console.log(
    `[Snapshot] ${store.size} records, ${store.textBlockCount} text blocks, ${index.size} indexed, ${predefined.size} predefined answers`,
  );
  return { catalog, store, index, predefined };
}

export function createDiskSnapshotLoader(sources: SnapshotSources, expectedEmbeddingModel?: string): SnapshotLoader {
  return async () => loadSnapshotFromDisk(sources, expectedEmbeddingModel);
}
