/**
 * Semantic Retriever
 *
 * Purpose:
 * Last resolution stage. Embeds the question, searches the vector index and
 * answers only when the best hit clears the similarity threshold. Accepted
 * blocks are handed to the LLM with a grounding prompt; if that call fails
 * the block text itself is returned.
 *
 * Key Responsibilities:
 * - Threshold gate: best score strictly above the threshold, else refusal
 * - Hit → text block resolution (an unresolvable hit is InconsistentEvidence)
 * - Context assembly within a character budget, whole blocks only
 * - "Data not available" sentinel → NotFound refusal
 *
 * Layer: Resolution (strategy 4)
 */

import { RefusalReason } from "@shared/schema";
import { RETRIEVAL_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { MODEL_ASSIGNMENTS, TOKEN_LIMITS } from "../config/models";
import {
  DATA_NOT_AVAILABLE_SENTINEL,
  GROUNDED_ANSWER_SYSTEM_PROMPT,
  buildGroundedAnswerUserPrompt,
} from "../config/prompts";
import type { GenerateTextFn } from "../llm/client";
import { LLMError } from "../llm/client";
import type { Embedder } from "../llm/embeddings";
import type { TextBlock } from "../records/types";
import { InconsistentEvidenceError, TimeoutError } from "../utils/errorHandler";
import { cleanOutput } from "../utils/outputCleaner";
import { withTimeout } from "../utils/timeout";
import { compareHits } from "../vectorIndex";
import type { EngineSnapshot } from "./snapshot";
import type { ResolutionContext, ResolutionStrategy, StrategyOutcome } from "./types";
import { failed } from "./types";

export interface RetrievedBlock {
  block: TextBlock;
  score: number;
}

export interface SemanticRetrieverOptions {
  embedder: Embedder;
  generate: GenerateTextFn;
  model?: string;
  threshold?: number;
  topK?: number;
  maxContextChars?: number;
  llmTimeoutMs?: number;
  embeddingTimeoutMs?: number;
  searchTimeoutMs?: number;
}

const CONTEXT_SEPARATOR = "\n\n---\n\n";

/**
 * Blocks in rank order until the budget is spent. The top block is always
 * kept; later blocks are kept only if they fit whole.
 */
export function buildContext(blocks: readonly TextBlock[], maxChars: number): { text: string; used: TextBlock[] } {
  const used: TextBlock[] = [];
  let length = 0;
  for (const block of blocks) {
    const added = block.text.length + (used.length > 0 ? CONTEXT_SEPARATOR.length : 0);
    if (used.length > 0 && length + added > maxChars) break;
    used.push(block);
    length += added;
  }
  return { text: used.map(b => b.text).join(CONTEXT_SEPARATOR), used };
}

export function isDataNotAvailable(text: string): boolean {
  return text.trim().toLowerCase().startsWith(DATA_NOT_AVAILABLE_SENTINEL.toLowerCase().replace(/\.$/, ""));
}

export class SemanticRetriever implements ResolutionStrategy {
  readonly stage = "semantic" as const;
  readonly threshold: number;
  readonly topK: number;
  private readonly embedder: Embedder;
  private readonly generate: GenerateTextFn;
  private readonly model: string;
  private readonly maxContextChars: number;
  private readonly llmTimeoutMs: number;
  private readonly embeddingTimeoutMs: number;
  private readonly searchTimeoutMs: number;

  constructor(options: SemanticRetrieverOptions) {
    this.embedder = options.embedder;
    this.generate = options.generate;
    this.model = options.model ?? MODEL_ASSIGNMENTS.GROUNDED_ANSWER;
    this.threshold = options.threshold ?? RETRIEVAL_CONSTANTS.SIMILARITY_THRESHOLD;
    this.topK = options.topK ?? RETRIEVAL_CONSTANTS.TOP_K;
    this.maxContextChars = options.maxContextChars ?? RETRIEVAL_CONSTANTS.MAX_CONTEXT_CHARS;
    this.llmTimeoutMs = options.llmTimeoutMs ?? TIMEOUT_CONSTANTS.LLM_TIMEOUT_MS;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs ?? TIMEOUT_CONSTANTS.EMBEDDING_TIMEOUT_MS;
    this.searchTimeoutMs = options.searchTimeoutMs ?? TIMEOUT_CONSTANTS.INDEX_SEARCH_TIMEOUT_MS;
  }

  get embeddingModel(): string {
    return this.embedder.model;
  }

  /**
   * Ranked hits resolved to text blocks: score descending, id ascending.
   */
  async retrieve(question: string, snapshot: EngineSnapshot, topK: number = this.topK): Promise<RetrievedBlock[]> {
    const vector = await withTimeout("Question embedding", this.embeddingTimeoutMs, signal =>
      this.embedder.embed(question, { signal }),
    );
    const hits = await withTimeout("Vector index search", this.searchTimeoutMs, signal =>
      snapshot.index.search(vector, topK, signal),
    );

    return [...hits].sort(compareHits).map(hit => {
      const block = snapshot.store.textBlock(hit.id);
      if (!block) throw new InconsistentEvidenceError(hit.id);
      return { block, score: hit.score };
    });
  }

  accept(scores: readonly number[]): boolean {
    if (scores.length === 0) return false;
    return Math.max(...scores) > this.threshold;
  }

  async run(ctx: ResolutionContext): Promise<StrategyOutcome> {
    let retrieved: RetrievedBlock[];
    try {
      retrieved = await this.retrieve(ctx.question, ctx.snapshot);
    } catch (error) {
      if (error instanceof InconsistentEvidenceError) {
        console.error(`[SemanticRetriever] ${error.message}`);
        return failed(RefusalReason.InconsistentEvidence, true, error.message);
      }
      if (error instanceof TimeoutError) {
        return failed(RefusalReason.UpstreamTimeout, true, error.message);
      }
      if (error instanceof LLMError) {
        const reason = error.kind === "timeout" ? RefusalReason.UpstreamTimeout : RefusalReason.UpstreamUnavailable;
        return failed(reason, true, error.message);
      }
      throw error;
    }

    const scores = retrieved.map(r => r.score);
    const topScore = scores.length > 0 ? Math.max(...scores) : undefined;
    if (!this.accept(scores)) {
      return failed(
        RefusalReason.BelowConfidenceThreshold,
        true,
        `best similarity ${topScore?.toFixed(3) ?? "n/a"} does not exceed ${this.threshold}`,
        topScore,
      );
    }

    const accepted = retrieved.filter(r => r.score > this.threshold).map(r => r.block);
    const context = buildContext(accepted, this.maxContextChars);
    const evidence = Array.from(new Set(context.used.map(b => b.quoteId))).sort();

    let text: string;
    try {
      const response = await this.generate({
        model: this.model,
        messages: [
          { role: "system", content: GROUNDED_ANSWER_SYSTEM_PROMPT },
          { role: "user", content: buildGroundedAnswerUserPrompt(ctx.question, context.text) },
        ],
        temperature: 0,
        maxTokens: TOKEN_LIMITS.GROUNDED_ANSWER,
        timeoutMs: this.llmTimeoutMs,
      });
      text = cleanOutput(response.text);
    } catch (error) {
      if (!(error instanceof LLMError)) throw error;
      console.warn(`[SemanticRetriever] Answer generation ${error.kind}, returning retrieved text: ${error.message}`);
      text = context.text;
    }

    if (isDataNotAvailable(text)) {
      return failed(RefusalReason.NotFound, true, "retrieved records do not contain the answer", topScore);
    }

    return {
      status: "matched",
      stage: this.stage,
      payload: { kind: "text", text },
      evidence,
      ...(topScore !== undefined && { topScore }),
    };
  }
}
