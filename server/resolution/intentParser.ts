/**
 * Intent Parser (LLM-assisted)
 *
 * Purpose:
 * Third resolution stage. Binds references ("their", "it", "those") to the
 * conversation, then asks the LLM for a JSON query plan and checks every
 * value in it against the section catalog and record store before anything
 * runs. A plan that fails any check is a no_match, never partially used.
 *
 * Key Responsibilities:
 * - Referent lookup over the last N turns (exactly one candidate or ambiguous)
 * - Name follow-ups ("give me their names") without an LLM call
 * - LLM plan extraction with a timeout; LLM failure is recoverable
 * - Plan validation against known vocabularies
 *
 * Layer: Resolution (strategy 3)
 */

import { z } from "zod";
import { RefusalReason } from "@shared/schema";
import { CONVERSATION_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { MODEL_ASSIGNMENTS, TOKEN_LIMITS } from "../config/models";
import { INTENT_PARSING_SYSTEM_PROMPT, buildIntentParsingUserPrompt } from "../config/prompts";
import type { GenerateTextFn } from "../llm/client";
import { LLMError } from "../llm/client";
import type { RecordStore } from "../records/recordStore";
import type { SectionCatalog } from "../records/sectionSchema";
import type { ConversationTurn } from "./conversationState";
import type { Referent } from "./references";
import { findReferent, isFollowUp, isNameFollowUp } from "./references";
import { executeIntent } from "./recordQueries";
import { describeConditions } from "./answerFormatter";
import type {
  Condition,
  ResolutionContext,
  ResolutionStrategy,
  ResolvedIntent,
  Scope,
  StrategyOutcome,
  TurnEntity,
} from "./types";
import { failed, noMatch } from "./types";

const OUT_OF_SCOPE_PATTERNS = [
  /\bpremiums?\b/i,
  /\b(forecast|predict|projection)s?\b/i,
  /\brecommend(ation)?s?\b/i,
  /\bshould (i|we)\b/i,
  /\bweather\b/i,
  /\b(other|another|different) countr(y|ies)\b/i,
  /\b(outside|beyond) malaysia\b/i,
  /\b(singapore|indonesia|thailand|philippines|vietnam|brunei)\b/i,
];

export function isOutOfScope(question: string): boolean {
  return OUT_OF_SCOPE_PATTERNS.some(p => p.test(question));
}

// ============================================================================
// LLM CONTRACT
// ============================================================================

export const queryPlanSchema = z.object({
  operation: z.enum(["lookup", "count", "list", "exists", "compare", "unsupported"]),
  target: z.enum(["explicit", "previous", "all"]),
  quoteIds: z.array(z.string()).default([]),
  names: z.array(z.string()).default([]),
  field: z.string().nullable().default(null),
  condition: z
    .object({
      field: z.string(),
      operator: z.enum(["equals", "contains"]),
      value: z.string().min(1),
    })
    .nullable()
    .default(null),
  direction: z.enum(["highest", "lowest"]).nullable().default(null),
});

export type QueryPlan = z.infer<typeof queryPlanSchema>;

export function parseQueryPlan(text: string): QueryPlan | null {
  const stripped = text.trim().replace(/^```(?:json)?\s*/i, "").replace(/```$/, "").trim();
  let raw: unknown;
  try {
    raw = JSON.parse(stripped);
  } catch {
    return null;
  }
  const parsed = queryPlanSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

const fieldCatalogCache = new WeakMap<SectionCatalog, string>();

export function describeFieldCatalog(catalog: SectionCatalog): string {
  const cached = fieldCatalogCache.get(catalog);
  if (cached) return cached;

  const lines = catalog.fields().map(({ ref, field }) => {
    const values = catalog.valueLabels(field);
    const kind = field.kind === "boolean" || field.kind === "enum"
      ? `${field.kind}: ${values.join(" | ")}`
      : field.kind;
    return `- ${ref}: ${field.label} (${kind})`;
  });
  const text = lines.join("\n");
  fieldCatalogCache.set(catalog, text);
  return text;
}

// ============================================================================
// PARSER
// ============================================================================

export type ParseResult =
  | { kind: "intent"; intent: ResolvedIntent }
  | { kind: "no_match"; detail: string }
  | { kind: "ambiguous"; detail: string }
  | { kind: "failed"; error: LLMError };

export interface IntentParserOptions {
  generate: GenerateTextFn;
  model?: string;
  timeoutMs?: number;
  lookback?: number;
}

export class IntentParser {
  private readonly generate: GenerateTextFn;
  private readonly model: string;
  private readonly timeoutMs: number;
  readonly lookback: number;

  constructor(options: IntentParserOptions) {
    this.generate = options.generate;
    this.model = options.model ?? MODEL_ASSIGNMENTS.INTENT_PARSING;
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.LLM_TIMEOUT_MS;
    this.lookback = options.lookback ?? CONVERSATION_CONSTANTS.HISTORY_LOOKBACK_TURNS;
  }

  async parse(question: string, history: readonly ConversationTurn[], store: RecordStore): Promise<ParseResult> {
    const referent = findReferent(history, this.lookback);

    if (isFollowUp(question)) {
      if (referent.kind === "none") {
        return { kind: "ambiguous", detail: "reference with no earlier answer to bind to" };
      }
      if (referent.kind === "ambiguous") {
        return { kind: "ambiguous", detail: `reference could mean any of ${referent.candidates.join(", ")}` };
      }
      if (isNameFollowUp(question)) {
        return {
          kind: "intent",
          intent: { operation: "list", scope: referent.entity.scope, reference: "anaphora" },
        };
      }
    }

    if (isOutOfScope(question)) {
      return { kind: "no_match", detail: "outside the proposal data" };
    }

    let text: string;
    try {
      const response = await this.generate({
        model: this.model,
        messages: [
          { role: "system", content: INTENT_PARSING_SYSTEM_PROMPT },
          {
            role: "user",
            content: buildIntentParsingUserPrompt({
              question,
              fieldCatalog: describeFieldCatalog(store.catalog),
              history: history.slice(-this.lookback).map(turn => ({
                question: turn.question,
                answer: turn.answer.text.slice(0, 300),
              })),
              previousSelection: referent.kind === "bound" ? describeSelection(referent.entity) : null,
            }),
          },
        ],
        temperature: 0,
        maxTokens: TOKEN_LIMITS.INTENT_PARSING,
        responseFormat: "json",
        timeoutMs: this.timeoutMs,
      });
      text = response.text;
    } catch (error) {
      if (error instanceof LLMError) return { kind: "failed", error };
      const message = error instanceof Error ? error.message : String(error);
      return { kind: "failed", error: new LLMError("unavailable", message) };
    }

    const plan = parseQueryPlan(text);
    if (!plan) {
      console.warn(`[IntentParser] Plan violates the output contract: ${text.slice(0, 200)}`);
      return { kind: "no_match", detail: "plan violates the output contract" };
    }

    return validatePlan(plan, question, referent, store);
  }
}

function describeSelection(entity: TurnEntity): string {
  const preview = entity.ids.slice(0, 10).join(", ");
  const more = entity.ids.length > 10 ? ` and ${entity.ids.length - 10} more` : "";
  const filter = entity.scope.conditions.length > 0 ? ` filtered by ${describeConditions(entity.scope.conditions)}` : "";
  return `${entity.ids.length} proposal(s): ${preview}${more}${filter}`;
}

function validateCondition(
  planCondition: NonNullable<QueryPlan["condition"]>,
  question: string,
  catalog: SectionCatalog,
): Condition | null {
  const descriptor = catalog.field(planCondition.field);
  if (!descriptor) return null;
  const { field } = descriptor;
  const value = planCondition.value.trim();

  if (field.kind === "boolean" || field.kind === "enum") {
    if (planCondition.operator !== "equals") return null;
    const label = catalog.valueLabels(field).find(l => l.toLowerCase() === value.toLowerCase());
    return label ? { field: descriptor.ref, label: field.label, operator: "equals", value: label } : null;
  }

  // Free-text values must come from the question, not from the model.
  if (!question.toLowerCase().includes(value.toLowerCase())) return null;
  return { field: descriptor.ref, label: field.label, operator: planCondition.operator, value };
}

export function validatePlan(
  plan: QueryPlan,
  question: string,
  referent: Referent,
  store: RecordStore,
): ParseResult {
  const { catalog } = store;

  if (plan.operation === "unsupported") {
    return { kind: "no_match", detail: "question not answerable from fields" };
  }

  let base: Scope;
  switch (plan.target) {
    case "previous":
      if (referent.kind === "ambiguous") {
        return { kind: "ambiguous", detail: `reference could mean any of ${referent.candidates.join(", ")}` };
      }
      if (referent.kind === "none") {
        return { kind: "ambiguous", detail: "reference with no earlier answer to bind to" };
      }
      base = referent.entity.scope;
      break;

    case "explicit": {
      const ids = new Set<string>();
      for (const raw of plan.quoteIds) {
        const quoteId = raw.trim().toUpperCase();
        if (!store.has(quoteId)) return { kind: "no_match", detail: `unknown quote id ${raw}` };
        ids.add(quoteId);
      }
      for (const name of plan.names) {
        const records = store.findByName(name);
        if (records.length === 0) return { kind: "no_match", detail: `unknown name ${name}` };
        records.forEach(r => ids.add(r.quoteId));
      }
      if (ids.size === 0) return { kind: "no_match", detail: "explicit target without entities" };
      base = { ids: Array.from(ids).sort(), conditions: [] };
      break;
    }

    case "all":
      base = { conditions: [] };
      break;

    default: {
      const _exhaustive: never = plan.target;
      throw new Error(`[IntentParser] Unhandled target: ${String(_exhaustive)}`);
    }
  }

  let field: string | undefined;
  if (plan.field) {
    const descriptor = catalog.field(plan.field);
    if (!descriptor) return { kind: "no_match", detail: `unknown field ${plan.field}` };
    field = descriptor.ref;
  }

  const conditions = [...base.conditions];
  if (plan.condition) {
    const condition = validateCondition(plan.condition, question, catalog);
    if (!condition) return { kind: "no_match", detail: "condition outside the known vocabulary" };
    conditions.push(condition);
  }

  const scope: Scope = { ...(base.ids && { ids: base.ids }), conditions };
  const reference = plan.target === "previous" ? "anaphora" : "explicit";

  switch (plan.operation) {
    case "lookup":
      if (!field) return { kind: "no_match", detail: "lookup without a field" };
      return { kind: "intent", intent: { operation: "lookup", scope, field, reference } };

    case "compare": {
      const descriptor = field ? catalog.field(field) : undefined;
      if (!descriptor || descriptor.field.kind !== "number" || !plan.direction) {
        return { kind: "no_match", detail: "comparison needs a numeric field and a direction" };
      }
      return {
        kind: "intent",
        intent: { operation: "compare", scope, field: descriptor.ref, direction: plan.direction, reference },
      };
    }

    case "count":
    case "list":
    case "exists":
      return { kind: "intent", intent: { operation: plan.operation, scope, reference } };

    default: {
      const _exhaustive: never = plan.operation;
      throw new Error(`[IntentParser] Unhandled operation: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================================
// STRATEGY
// ============================================================================

export class IntentStrategy implements ResolutionStrategy {
  readonly stage = "llm-assisted" as const;
  private readonly parser: IntentParser;

  constructor(parser: IntentParser) {
    this.parser = parser;
  }

  async run(ctx: ResolutionContext): Promise<StrategyOutcome> {
    const { store } = ctx.snapshot;
    const result = await this.parser.parse(ctx.question, ctx.history, store);

    switch (result.kind) {
      case "no_match":
        return noMatch(result.detail);

      case "ambiguous":
        return failed(RefusalReason.AmbiguousReference, true, result.detail);

      case "failed": {
        console.warn(`[IntentParser] LLM ${result.error.kind}, falling through: ${result.error.message}`);
        const reason = result.error.kind === "timeout" ? RefusalReason.UpstreamTimeout : RefusalReason.UpstreamUnavailable;
        return failed(reason, false, result.error.message);
      }

      case "intent": {
        const execution = executeIntent(result.intent, store);
        if (execution.status === "not_found") {
          return failed(RefusalReason.NotFound, true, execution.detail);
        }
        return {
          status: "matched",
          stage: this.stage,
          payload: execution.payload,
          evidence: execution.evidence,
          intent: result.intent,
          entity: execution.entity,
        };
      }

      default: {
        const _exhaustive: never = result;
        throw new Error(`[IntentParser] Unhandled parse result: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
}
