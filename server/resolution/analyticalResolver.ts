/**
 * Deterministic Analytical Resolver
 *
 * Purpose:
 * Rule-based fast path for count / list / exists / compare questions and
 * for field lookups on an explicitly named proposal. No LLM is involved:
 * fields are found only by direct phrase matching against the section
 * catalog's labels and aliases, so the same question over the same snapshot
 * always produces the same answer.
 *
 * Anything it cannot pin down is a no_match, never a guess.
 *
 * Layer: Resolution (strategy 2)
 */

import { RefusalReason } from "@shared/schema";
import type { RecordStore } from "../records/recordStore";
import type { SectionCatalog } from "../records/sectionSchema";
import type { FieldDescriptor } from "../records/types";
import { executeIntent } from "./recordQueries";
import { isFollowUp } from "./references";
import { containsPhrase, normalizeForMatching, removePhrase, tokens } from "./textMatching";
import type {
  CompareDirection,
  Condition,
  Operation,
  ResolutionContext,
  ResolutionStrategy,
  ResolvedIntent,
  StrategyOutcome,
} from "./types";
import { failed, noMatch } from "./types";

// ============================================================================
// SIGNALS
// ============================================================================

const COUNT_SIGNALS = ["how many", "count", "number of", "total number"];
const COMPARE_SIGNALS: Record<string, CompareDirection> = {
  highest: "highest",
  largest: "highest",
  biggest: "highest",
  lowest: "lowest",
  smallest: "lowest",
};
const LIST_SIGNALS = [
  "list",
  "which proposal",
  "which business",
  "which record",
  "which company",
  "show all",
  "show me all",
  "what are all",
  "name all",
];
const EXISTS_SIGNALS = ["is there", "are there", "does any", "do any", "has any", "have any"];
const LIST_ALL_PHRASES = ["all proposal", "all business", "all record", "every proposal", "all company"];

const NEGATION_TOKENS = new Set([
  "no", "not", "without", "dont", "doesnt", "lack", "lacking", "havent", "hasnt", "never", "none",
]);

/**
 * Quote ids look like MYJADEQT001: letters ending in "QT", then digits.
 */
export const QUOTE_ID_PATTERN = /\b[A-Z]{2,}QT\d+\b/gi;

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function detectOperation(normalized: string): Operation | undefined {
  if (COUNT_SIGNALS.some(s => containsPhrase(normalized, s))) return "count";
  if (Object.keys(COMPARE_SIGNALS).some(s => containsPhrase(normalized, s))) return "compare";
  if (LIST_SIGNALS.some(s => containsPhrase(normalized, s))) return "list";
  if (EXISTS_SIGNALS.some(s => normalized.startsWith(s))) return "exists";
  return undefined;
}

function detectDirection(normalized: string): CompareDirection {
  for (const [signal, direction] of Object.entries(COMPARE_SIGNALS)) {
    if (containsPhrase(normalized, signal)) return direction;
  }
  return "highest";
}

export interface DetectedEntities {
  ids: string[];
  unknownIds: string[];
  /** Normalized phrases that named the entities, removed before field matching. */
  phrases: string[];
}

export function detectEntities(question: string, store: RecordStore): DetectedEntities {
  const ids = new Set<string>();
  const unknownIds = new Set<string>();
  const phrases: string[] = [];

  for (const match of question.matchAll(QUOTE_ID_PATTERN)) {
    const quoteId = match[0].toUpperCase();
    if (store.has(quoteId)) ids.add(quoteId);
    else unknownIds.add(quoteId);
    phrases.push(normalizeForMatching(quoteId));
  }

  const normalized = normalizeForMatching(question);
  for (const { name, quoteId } of store.knownNames()) {
    const phrase = normalizeForMatching(name);
    if (containsPhrase(normalized, phrase)) {
      ids.add(quoteId);
      phrases.push(phrase);
    }
  }

  return {
    ids: Array.from(ids).sort(),
    unknownIds: Array.from(unknownIds).sort(),
    phrases,
  };
}

/**
 * Longest label or alias contained in the question wins; on equal length the
 * field declared first wins.
 */
export function matchField(normalized: string, catalog: SectionCatalog): FieldDescriptor | undefined {
  let best: { descriptor: FieldDescriptor; length: number } | undefined;
  for (const descriptor of catalog.fields()) {
    for (const phrase of [descriptor.field.label, ...descriptor.field.aliases]) {
      const p = normalizeForMatching(phrase);
      if (containsPhrase(normalized, p) && (!best || p.length > best.length)) {
        best = { descriptor, length: p.length };
      }
    }
  }
  return best?.descriptor;
}

export function isNegated(normalized: string): boolean {
  return tokens(normalized).some(t => NEGATION_TOKENS.has(t));
}

/**
 * Build the filter a count/list/exists question asks for on `descriptor`.
 * Returns undefined when the question does not say which value it wants.
 */
export function buildCondition(
  descriptor: FieldDescriptor,
  normalized: string,
  question: string,
  catalog: SectionCatalog,
): Condition | undefined {
  const { field, ref } = descriptor;
  const base = { field: ref, label: field.label };

  switch (field.kind) {
    case "boolean": {
      const wanted = isNegated(normalized) ? "no" : "yes";
      const label = catalog.valueLabels(field).find(l => l.toLowerCase() === wanted);
      return label ? { ...base, operator: "equals", value: label } : undefined;
    }

    case "enum": {
      let best: { label: string; length: number } | undefined;
      const candidates: Array<[string, string | undefined]> = [
        ...catalog.valueLabels(field).map((label): [string, string] => [label, label]),
        ...Object.entries(field.valueAliases).map(([phrase, code]): [string, string | undefined] => [
          phrase,
          catalog.codeLabel(field, code),
        ]),
      ];
      for (const [phrase, label] of candidates) {
        if (!label) continue;
        const p = normalizeForMatching(phrase);
        if (containsPhrase(normalized, p) && (!best || p.length > best.length)) {
          best = { label, length: p.length };
        }
      }
      return best ? { ...base, operator: "equals", value: best.label } : undefined;
    }

    case "text": {
      const quoted = question.match(/["“]([^"”]+)["”]/);
      const value = quoted?.[1]?.trim();
      return value ? { ...base, operator: "contains", value } : undefined;
    }

    case "number":
      return undefined;

    default: {
      const _exhaustive: never = field.kind;
      throw new Error(`[AnalyticalResolver] Unhandled field kind: ${String(_exhaustive)}`);
    }
  }
}

export type Classification =
  | { kind: "intent"; intent: ResolvedIntent }
  | { kind: "unknown_id"; ids: string[] }
  | { kind: "no_match"; detail: string };

/**
 * Turn a question into a ResolvedIntent using rules only.
 */
export function classifyQuestion(question: string, store: RecordStore): Classification {
  const { catalog } = store;

  // Follow-ups are bound against conversation state in the LLM-assisted stage.
  if (isFollowUp(question)) {
    return { kind: "no_match", detail: "refers to an earlier answer" };
  }

  const entities = detectEntities(question, store);

  if (entities.unknownIds.length > 0 && entities.ids.length === 0) {
    return { kind: "unknown_id", ids: entities.unknownIds };
  }

  let normalized = normalizeForMatching(question);
  for (const phrase of entities.phrases) {
    normalized = removePhrase(normalized, phrase);
  }

  const operation = detectOperation(normalized);
  const descriptor = matchField(normalized, catalog);

  if (entities.ids.length > 0) {
    if (!descriptor) return { kind: "no_match", detail: "named proposal but no recognizable field" };
    return {
      kind: "intent",
      intent: {
        operation: "lookup",
        scope: { ids: entities.ids, conditions: [] },
        field: descriptor.ref,
        reference: "explicit",
      },
    };
  }

  switch (operation) {
    case undefined:
    case "lookup":
      return { kind: "no_match", detail: "no analytical phrasing" };

    case "compare":
      if (!descriptor || descriptor.field.kind !== "number") {
        return { kind: "no_match", detail: "comparison needs a numeric field" };
      }
      return {
        kind: "intent",
        intent: {
          operation: "compare",
          scope: { conditions: [] },
          field: descriptor.ref,
          direction: detectDirection(normalized),
          reference: "explicit",
        },
      };

    case "count":
    case "list":
    case "exists": {
      if (!descriptor) {
        if (operation === "list" && LIST_ALL_PHRASES.some(p => containsPhrase(normalized, p))) {
          return { kind: "intent", intent: { operation: "list", scope: { conditions: [] }, reference: "explicit" } };
        }
        return { kind: "no_match", detail: "no recognizable field" };
      }
      const condition = buildCondition(descriptor, normalized, question, catalog);
      if (!condition) {
        return { kind: "no_match", detail: `no recognizable value for ${descriptor.field.label}` };
      }
      return {
        kind: "intent",
        intent: { operation, scope: { conditions: [condition] }, reference: "explicit" },
      };
    }

    default: {
      const _exhaustive: never = operation;
      throw new Error(`[AnalyticalResolver] Unhandled operation: ${String(_exhaustive)}`);
    }
  }
}

export function resolveAnalytical(question: string, store: RecordStore): StrategyOutcome {
  const classification = classifyQuestion(question, store);

  if (classification.kind === "no_match") return noMatch(classification.detail);
  if (classification.kind === "unknown_id") {
    return failed(
      RefusalReason.NotFound,
      true,
      `Quote id ${classification.ids.join(", ")} is not in the proposal records`,
    );
  }

  const { intent } = classification;
  const result = executeIntent(intent, store);
  if (result.status === "not_found") {
    return failed(RefusalReason.NotFound, true, result.detail);
  }

  return {
    status: "matched",
    stage: "deterministic",
    payload: result.payload,
    evidence: result.evidence,
    intent,
    entity: result.entity,
  };
}

export class AnalyticalStrategy implements ResolutionStrategy {
  readonly stage = "deterministic" as const;

  async run(ctx: ResolutionContext): Promise<StrategyOutcome> {
    return resolveAnalytical(ctx.question, ctx.snapshot.store);
  }
}
