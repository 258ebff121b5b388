/**
 * Build the Vector Index
 *
 * Renders every proposal section to a text block, embeds the blocks and
 * writes the JSON index the server loads at startup. Run it again whenever
 * the proposal data or the embedding model changes.
 *
 * Usage:
 *   npm run build:index [-- --out path/to/vector_index.json]
 */

import * as fs from "fs";
import * as path from "path";
import { getEnv } from "../config/env";
import { OpenAIEmbedder } from "../llm/embeddings";
import { loadProposalRecords } from "../records/loader";
import { RecordStore } from "../records/recordStore";
import { SectionCatalog } from "../records/sectionSchema";
import { logError } from "../utils/errorHandler";
import { buildVectorIndex } from "../vectorIndex/indexBuilder";

function outputPath(args: string[], fallback: string): string {
  const i = args.indexOf("--out");
  return i >= 0 && args[i + 1] ? path.resolve(args[i + 1]) : fallback;
}

async function main(): Promise<void> {
  const env = getEnv();
  const out = outputPath(process.argv.slice(2), env.VECTOR_INDEX_PATH);

  const catalog = SectionCatalog.fromFile();
  const store = new RecordStore(loadProposalRecords(env.PROPOSALS_PATH, catalog), catalog);
  const blocks = store.textBlocks();
  const embedder = new OpenAIEmbedder(env.EMBEDDING_MODEL);

  console.log(`[BuildIndex] Embedding ${blocks.length} text blocks from ${store.size} records with ${embedder.model}`);
  const started = Date.now();

  const index = await buildVectorIndex(blocks, embedder, {
    onBatch: (done, total) => console.log(`[BuildIndex] ${done}/${total}`),
  });

  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, JSON.stringify(index.toJSON()));
  console.log(`[BuildIndex] Wrote ${index.size} vectors (${index.dimensions} dimensions) to ${out} in ${Date.now() - started}ms`);
}

main().catch(error => {
  logError("BuildIndex", error);
  process.exit(1);
});
