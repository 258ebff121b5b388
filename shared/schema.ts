import { z } from "zod";

/**
 * Which resolution strategy produced an answer.
 */
export const STRATEGY_TAGS = ["predefined", "deterministic", "llm-assisted", "semantic", "refusal"] as const;
export type StrategyTag = typeof STRATEGY_TAGS[number];

/**
 * Machine-readable refusal categories. Front ends localize on these rather
 * than on the message text.
 */
export enum RefusalReason {
  InputInvalid = "InputInvalid",
  AmbiguousReference = "AmbiguousReference",
  NotFound = "NotFound",
  BelowConfidenceThreshold = "BelowConfidenceThreshold",
  UpstreamTimeout = "UpstreamTimeout",
  UpstreamUnavailable = "UpstreamUnavailable",
  InconsistentEvidence = "InconsistentEvidence",
  InternalError = "InternalError",
}

export interface Answer {
  text: string;
  strategy: StrategyTag;
  /** Quote ids backing the answer. Empty only for refusals. */
  evidence: string[];
  refusalReason?: RefusalReason;
  traceId: string;
}

export interface EngineStatus {
  ready: boolean;
  snapshotVersion: number | null;
  records: number;
  textBlocks: number;
  indexedBlocks: number;
  loadedAt: string | null;
}

export const queryRequestSchema = z.object({
  question: z
    .string({ required_error: "question is required" })
    .trim()
    .min(1, "question must not be empty")
    .max(1000, "question must be at most 1000 characters"),
  sessionId: z
    .string()
    .trim()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_.:-]+$/, "sessionId may only contain letters, digits and _ . : -")
    .optional(),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export interface QueryResponse {
  question: string;
  sessionId: string;
  answer: Answer;
}
