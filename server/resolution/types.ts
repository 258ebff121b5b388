/**
 * Resolution Types
 *
 * Purpose:
 * Shared vocabulary of the resolution pipeline: intents, scopes, answer
 * payloads and the tagged outcome every strategy returns.
 *
 * Layer: Resolution (types)
 */

import type { RefusalReason, StrategyTag } from "@shared/schema";
import type { ConversationTurn } from "./conversationState";
import type { EngineSnapshot } from "./snapshot";

export type Operation = "lookup" | "count" | "list" | "exists" | "compare";

export type CompareDirection = "highest" | "lowest";

export interface Condition {
  /** "section.key" */
  field: string;
  /** Human label of the field, used when rendering the condition. */
  label: string;
  operator: "equals" | "contains";
  /** Decoded value label for equals, text fragment for contains. */
  value: string;
}

/**
 * Records an intent applies to: the listed ids (or the whole store when
 * absent), narrowed by every condition.
 */
export interface Scope {
  ids?: string[];
  conditions: Condition[];
}

export interface ResolvedIntent {
  operation: Operation;
  scope: Scope;
  /** Field read by lookup and compare. */
  field?: string;
  direction?: CompareDirection;
  reference: "explicit" | "anaphora";
}

/**
 * What a turn leaves behind for later references. The scope is kept so a
 * follow-up re-evaluates it instead of trusting a stale id list.
 */
export interface TurnEntity {
  scope: Scope;
  ids: string[];
}

export interface RecordRow {
  quoteId: string;
  businessName: string;
}

export interface LookupRow extends RecordRow {
  value: string;
}

export type AnswerPayload =
  | { kind: "count"; conditions: Condition[]; count: number }
  | { kind: "exists"; conditions: Condition[]; count: number }
  | { kind: "list"; conditions: Condition[]; rows: RecordRow[] }
  | { kind: "lookup"; fieldLabel: string; rows: LookupRow[] }
  | { kind: "compare"; direction: CompareDirection; fieldLabel: string; row: LookupRow }
  | { kind: "text"; text: string };

export type ResolutionStage = Exclude<StrategyTag, "refusal">;

export interface MatchedOutcome {
  status: "matched";
  stage: ResolutionStage;
  payload: AnswerPayload;
  evidence: string[];
  intent?: ResolvedIntent;
  entity?: TurnEntity;
  topScore?: number;
}

export interface NoMatchOutcome {
  status: "no_match";
  detail: string;
}

export interface FailedOutcome {
  status: "failed";
  reason: RefusalReason;
  /** Terminal failures end resolution; others let the next strategy run. */
  terminal: boolean;
  detail: string;
  topScore?: number;
}

export type StrategyOutcome = MatchedOutcome | NoMatchOutcome | FailedOutcome;

export interface ResolutionContext {
  question: string;
  history: readonly ConversationTurn[];
  snapshot: EngineSnapshot;
  traceId: string;
}

export interface ResolutionStrategy {
  readonly stage: ResolutionStage;
  run(ctx: ResolutionContext): Promise<StrategyOutcome>;
}

export function noMatch(detail: string): NoMatchOutcome {
  return { status: "no_match", detail };
}

export function failed(reason: RefusalReason, terminal: boolean, detail: string, topScore?: number): FailedOutcome {
  return { status: "failed", reason, terminal, detail, ...(topScore !== undefined && { topScore }) };
}
