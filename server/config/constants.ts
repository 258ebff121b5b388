/**
 * Application Constants
 * 
 * Centralized configuration values used across the application.
 * Every tunable of the resolution pipeline lives here.
 */

/**
 * Semantic retrieval
 */
export const RETRIEVAL_CONSTANTS = {
  /**
   * Minimum cosine similarity for a retrieval result to count as evidence.
   * The best hit must score strictly above this value, and only hits above
   * it are passed to the grounded answer prompt.
   */
  SIMILARITY_THRESHOLD: 0.5,

  /**
   * Number of text blocks requested from the vector index per question.
   */
  TOP_K: 5,

  /**
   * Character budget for retrieved context sent to the LLM.
   * Whole blocks only; the block that would overflow is dropped.
   */
  MAX_CONTEXT_CHARS: 12000,
} as const;

/**
 * Conversation state
 */
export const CONVERSATION_CONSTANTS = {
  /**
   * How many previous turns are searched when binding "their", "it", etc.
   * Also the number of turns shown to the intent parsing prompt.
   */
  HISTORY_LOOKBACK_TURNS: 5,

  /**
   * Turns kept per session. Older turns are dropped from the front.
   */
  MAX_STORED_TURNS: 50,

  /**
   * Sessions kept in memory. The least recently active one is dropped first.
   */
  MAX_SESSIONS: 1000,
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * LLM call timeout (intent parsing and grounded answers).
   */
  LLM_TIMEOUT_MS: 15000,

  /**
   * Embedding API timeout for a single question.
   */
  EMBEDDING_TIMEOUT_MS: 10000,

  /**
   * Vector index search timeout.
   */
  INDEX_SEARCH_TIMEOUT_MS: 5000,
} as const;

/**
 * Answer formatting
 */
export const FORMAT_CONSTANTS = {
  /**
   * Maximum rows rendered in a list answer before "... and N more."
   */
  MAX_LIST_ITEMS: 20,
} as const;

/**
 * Input limits
 */
export const INPUT_LIMITS = {
  MAX_QUESTION_LENGTH: 1000,
  MAX_SESSION_ID_LENGTH: 128,
} as const;

/**
 * Index build (server/scripts/build-index.ts)
 */
export const INDEX_BUILD_CONSTANTS = {
  /**
   * Texts per embeddings request.
   */
  BATCH_SIZE: 64,

  MAX_ATTEMPTS: 3,

  /**
   * Base delay for exponential backoff between attempts (milliseconds).
   */
  BASE_DELAY_MS: 2000,
} as const;

/**
 * Rate limiting for POST /api/query
 */
export const RATE_LIMIT_CONSTANTS = {
  QUERY_WINDOW_MS: 60 * 1000,

  /**
   * Questions per client per window.
   */
  QUERY_MAX_REQUESTS: 60,
} as const;
