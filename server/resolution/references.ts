/**
 * Reference binding for follow-up questions ("their", "it", "those").
 */

import type { ConversationTurn } from "./conversationState";
import type { TurnEntity } from "./types";

const REFERENCE_PATTERN = /\b(their|them|they|those|these|it|its|the above)\b/i;

/** Longer questions only count as follow-ups when they match a follow-up phrase. */
const SHORT_FOLLOW_UP_WORDS = 5;

const FOLLOW_UP_PATTERNS = [
  /\b(give|show|tell) me (their|those|these)\b/i,
  /\b(show|list) their\b/i,
  /\bwhat are (they|those|these)\b/i,
  /\bwhich are (they|those|these)\b/i,
  /\b(and|what about) (their|them|those|these|it|its)\b/i,
  /\b(of|for|about|among|from) (them|those|these|the above)\b/i,
];

const NAME_FOLLOW_UP_PATTERNS = [
  /\btheir (business |company )?names?\b/i,
  /\b(list|name|show) (them|those|these)\b/i,
  /\bwho are (they|those|these)\b/i,
  /\bwhich (businesses|companies|proposals) are (they|those|these)\b/i,
];

export function hasReference(question: string): boolean {
  return REFERENCE_PATTERN.test(question);
}

/**
 * A question reads as a follow-up when it matches a follow-up phrase, or is
 * short and carries a reference word. "How many proposals have a CCTV
 * contract for their shop?" is self-contained.
 */
export function isFollowUp(question: string): boolean {
  if (!hasReference(question)) return false;
  if (isNameFollowUp(question) || FOLLOW_UP_PATTERNS.some(p => p.test(question))) return true;
  return question.trim().split(/\s+/).length <= SHORT_FOLLOW_UP_WORDS;
}

/** "Give me their names", "list them", "who are they". */
export function isNameFollowUp(question: string): boolean {
  return NAME_FOLLOW_UP_PATTERNS.some(p => p.test(question));
}

export type Referent =
  | { kind: "bound"; entity: TurnEntity }
  | { kind: "ambiguous"; candidates: string[] }
  | { kind: "none" };

/**
 * The most recent turn in the window that mentioned anything decides: a
 * bound entity or a single mentioned id binds, several ids are ambiguous.
 * Refusals mention nothing and are skipped.
 */
export function findReferent(history: readonly ConversationTurn[], lookback: number): Referent {
  const window = history.slice(-lookback);
  for (let i = window.length - 1; i >= 0; i--) {
    const turn = window[i];
    if (turn.entity) return { kind: "bound", entity: turn.entity };
    if (turn.mentioned.length === 1) {
      return { kind: "bound", entity: { scope: { ids: [...turn.mentioned], conditions: [] }, ids: [...turn.mentioned] } };
    }
    if (turn.mentioned.length > 1) return { kind: "ambiguous", candidates: [...turn.mentioned] };
  }
  return { kind: "none" };
}
