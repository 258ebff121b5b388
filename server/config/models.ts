/**
 * Centralized LLM Model Registry
 * 
 * Single source of truth for model selections. Changing a model here updates
 * every usage.
 * 
 * MODEL TIERS:
 * 
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Speed: ~100-300ms | Cost: Lowest | Quality: Good for structured tasks
 *   Use for: Intent parsing into the JSON contract
 * 
 * STANDARD_REASONING - gpt-4o
 *   Speed: ~500-1500ms | Cost: Medium | Quality: High
 *   Use for: Grounded answers over retrieved proposal text
 */

export const LLM_MODELS = {
  /**
   * Fast, cheap model for structured extraction.
   */
  FAST_CLASSIFICATION: "gpt-4o-mini",

  /**
   * Balanced model for grounded answer phrasing.
   */
  STANDARD_REASONING: "gpt-4o",
} as const;

/**
 * Gemini models, selectable through INTENT_MODEL / ANSWER_MODEL.
 */
export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

/**
 * Claude models, selectable through INTENT_MODEL / ANSWER_MODEL.
 */
export const CLAUDE_MODELS = {
  SONNET: "claude-sonnet-4-5",
} as const;

/**
 * Embedding models. The index file records which model built it; the query
 * embedder must use the same one.
 */
export const EMBEDDING_MODELS = {
  SMALL: "text-embedding-3-small",
  LARGE: "text-embedding-3-large",
} as const;

export type LLMModelType = typeof LLM_MODELS[keyof typeof LLM_MODELS];

export type LLMProvider = "openai" | "gemini" | "claude";

const OPENAI_MODEL_SET = new Set<string>(Object.values(LLM_MODELS));
const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

/**
 * Registry first, then model name prefix. Undefined for models no client
 * can serve.
 */
export function providerForModel(model: string): LLMProvider | undefined {
  if (OPENAI_MODEL_SET.has(model)) return "openai";
  if (GEMINI_MODEL_SET.has(model)) return "gemini";
  if (CLAUDE_MODEL_SET.has(model)) return "claude";
  if (model.startsWith("gpt-") || model.startsWith("o1") || model.startsWith("o3")) return "openai";
  if (model.startsWith("gemini-")) return "gemini";
  if (model.startsWith("claude-")) return "claude";
  return undefined;
}

/**
 * Specific model assignments by task type.
 */
export const MODEL_ASSIGNMENTS = {
  // Intent parsing - short JSON output, temperature 0
  INTENT_PARSING: LLM_MODELS.FAST_CLASSIFICATION,

  // Grounded answer over retrieved text blocks
  GROUNDED_ANSWER: LLM_MODELS.STANDARD_REASONING,

  // Text block and question embeddings
  EMBEDDING: EMBEDDING_MODELS.SMALL,
} as const;

/**
 * Token limits by task
 */
export const TOKEN_LIMITS = {
  INTENT_PARSING: 400,
  GROUNDED_ANSWER: 800,
} as const;
