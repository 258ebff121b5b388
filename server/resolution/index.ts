/**
 * Engine wiring: strategies in priority order over the production LLM and
 * embedding clients, with data locations from the environment.
 */

import type { AppEnv } from "../config/env";
import { generateText } from "../llm/client";
import type { GenerateTextFn } from "../llm/client";
import type { Embedder } from "../llm/embeddings";
import { OpenAIEmbedder } from "../llm/embeddings";
import { AnalyticalStrategy } from "./analyticalResolver";
import { QueryResolutionEngine } from "./engine";
import type { EngineOptions } from "./engine";
import { IntentParser, IntentStrategy } from "./intentParser";
import { PredefinedStrategy } from "./predefinedMatcher";
import { SemanticRetriever } from "./semanticRetriever";
import type { SnapshotLoader } from "./snapshot";
import { createDiskSnapshotLoader } from "./snapshot";

export interface EngineBundle {
  engine: QueryResolutionEngine;
  loadSnapshot: SnapshotLoader;
}

export interface EngineOverrides {
  generate?: GenerateTextFn;
  embedder?: Embedder;
  audit?: EngineOptions["audit"];
}

export function createEngine(env: AppEnv, overrides: EngineOverrides = {}): EngineBundle {
  const generate = overrides.generate ?? generateText;
  const embedder = overrides.embedder ?? new OpenAIEmbedder(env.EMBEDDING_MODEL);

  const engine = new QueryResolutionEngine({
    strategies: [
      new PredefinedStrategy(),
      new AnalyticalStrategy(),
      new IntentStrategy(new IntentParser({ generate, model: env.INTENT_MODEL })),
      new SemanticRetriever({ embedder, generate, model: env.ANSWER_MODEL }),
    ],
    ...(overrides.audit && { audit: overrides.audit }),
  });

  const loadSnapshot = createDiskSnapshotLoader(
    {
      proposalsPath: env.PROPOSALS_PATH,
      predefinedPath: env.PREDEFINED_QA_PATH,
      vectorIndexPath: env.VECTOR_INDEX_PATH,
    },
    embedder.model,
  );

  return { engine, loadSnapshot };
}

export { QueryResolutionEngine, DEFAULT_SESSION_ID } from "./engine";
export type { EngineSnapshot, SnapshotLoader, SnapshotParts } from "./snapshot";
