/**
 * Answer Formatter
 *
 * Purpose:
 * Renders strategy payloads and refusals into the Answer returned to
 * callers. Templates are fixed so identical payloads always read the same.
 *
 * Layer: Resolution (output)
 */

import type { Answer, RefusalReason } from "@shared/schema";
import { FORMAT_CONSTANTS } from "../config/constants";
import { cleanOutput } from "../utils/outputCleaner";
import { getRefusalMessage } from "../utils/refusalMessages";
import type { AnswerPayload, Condition, LookupRow, ResolutionStage } from "./types";

export function describeConditions(conditions: readonly Condition[]): string {
  return conditions
    .map(c => (c.operator === "equals" ? `${c.label} = ${c.value}` : `${c.label} contains "${c.value}"`))
    .join(" and ");
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

function criteria(conditions: readonly Condition[]): string {
  return conditions.length > 0 ? `the criteria (${describeConditions(conditions)})` : "the criteria";
}

function lookupLine(fieldLabel: string, row: LookupRow): string {
  return `${fieldLabel} for ${row.quoteId} (${row.businessName}): ${row.value}`;
}

export function renderPayload(payload: AnswerPayload): string {
  switch (payload.kind) {
    case "count":
      return `${payload.count} proposal(s) match ${criteria(payload.conditions)}.`;

    case "list": {
      const { rows, conditions } = payload;
      if (rows.length === 0) return `0 proposal(s) match ${criteria(conditions)}.`;
      const suffix = conditions.length > 0 ? ` (${describeConditions(conditions)})` : "";
      const shown = rows.slice(0, FORMAT_CONSTANTS.MAX_LIST_ITEMS);
      const lines = [
        `Found ${rows.length} matching proposal(s)${suffix}:`,
        ...shown.map(r => `- ${r.quoteId}: ${r.businessName}`),
      ];
      if (rows.length > shown.length) lines.push(`... and ${rows.length - shown.length} more.`);
      return lines.join("\n");
    }

    case "exists":
      return payload.count > 0
        ? `Yes, ${payload.count} proposal(s) match ${criteria(payload.conditions)}.`
        : `No proposals match ${criteria(payload.conditions)}.`;

    case "lookup":
      if (payload.rows.length === 1) return lookupLine(payload.fieldLabel, payload.rows[0]);
      return payload.rows.map(r => `- ${lookupLine(payload.fieldLabel, r)}`).join("\n");

    case "compare": {
      const { row } = payload;
      return `The ${payload.direction} ${lowerFirst(payload.fieldLabel)} is ${row.value} for ${row.quoteId} (${row.businessName}).`;
    }

    case "text":
      return cleanOutput(payload.text);

    default: {
      const _exhaustive: never = payload;
      throw new Error(`[AnswerFormatter] Unhandled payload: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function formatAnswer(
  stage: ResolutionStage,
  payload: AnswerPayload,
  evidence: readonly string[],
  traceId: string,
): Answer {
  return {
    text: renderPayload(payload),
    strategy: stage,
    evidence: Array.from(new Set(evidence)).sort(),
    traceId,
  };
}

export function formatRefusal(reason: RefusalReason, traceId: string): Answer {
  return {
    text: getRefusalMessage(reason),
    strategy: "refusal",
    evidence: [],
    refusalReason: reason,
    traceId,
  };
}
