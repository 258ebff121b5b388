/**
 * Record Queries
 *
 * Purpose:
 * Executes a ResolvedIntent against the record store. Used by both the
 * deterministic resolver and the LLM-assisted path, so an intent yields the
 * same answer whichever stage produced it.
 *
 * Every scan walks records in quote id order; results never depend on
 * anything but the snapshot and the intent.
 *
 * Layer: Resolution (execution)
 */

import type { RecordStore } from "../records/recordStore";
import type { FieldDescriptor, ProposalRecord } from "../records/types";
import type {
  AnswerPayload,
  Condition,
  LookupRow,
  ResolvedIntent,
  Scope,
  TurnEntity,
} from "./types";

export type ExecutionResult =
  | { status: "ok"; payload: AnswerPayload; evidence: string[]; entity: TurnEntity }
  | { status: "not_found"; detail: string };

export interface Selection {
  /** Records in scope that carry a value for every condition field. */
  examined: ProposalRecord[];
  /** Examined records satisfying every condition. */
  matched: ProposalRecord[];
}

function requireField(store: RecordStore, ref: string): FieldDescriptor {
  const descriptor = store.catalog.field(ref);
  if (!descriptor) {
    throw new Error(`[RecordQueries] Unknown field "${ref}"`);
  }
  return descriptor;
}

export function conditionHolds(values: string[], condition: Condition): boolean {
  const wanted = condition.value.trim().toLowerCase();
  if (condition.operator === "equals") {
    return values.some(v => v.toLowerCase() === wanted);
  }
  return values.some(v => v.toLowerCase().includes(wanted));
}

export function selectRecords(store: RecordStore, scope: Scope): Selection {
  const ids = scope.ids ? Array.from(new Set(scope.ids)).sort() : store.ids();
  const base = ids
    .map(id => store.get(id))
    .filter((record): record is ProposalRecord => record !== undefined);

  const fields = scope.conditions.map(c => ({ condition: c, descriptor: requireField(store, c.field) }));

  const examined = base.filter(record => fields.every(({ descriptor }) => store.values(record, descriptor).length > 0));
  const matched = examined.filter(record =>
    fields.every(({ condition, descriptor }) => conditionHolds(store.values(record, descriptor), condition)),
  );

  return { examined, matched };
}

/**
 * Parse a stored amount such as "RM 1,250,000" or "500000.50".
 */
export function parseNumeric(raw: string): number | null {
  const cleaned = raw.replace(/\b(rm|myr|usd|sgd)\b/gi, "").replace(/[$,\s]/g, "");
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

function ids(records: ProposalRecord[]): string[] {
  return records.map(r => r.quoteId);
}

function scopeDescription(scope: Scope, store: RecordStore): string {
  if (scope.conditions.length > 0) {
    return scope.conditions.map(c => requireField(store, c.field).field.label).join(", ");
  }
  return scope.ids ? scope.ids.join(", ") : "any proposal";
}

export function executeIntent(intent: ResolvedIntent, store: RecordStore): ExecutionResult {
  const { matched, examined } = selectRecords(store, intent.scope);
  const entity: TurnEntity = { scope: intent.scope, ids: ids(matched) };

  switch (intent.operation) {
    case "count":
    case "exists":
    case "list": {
      if (examined.length === 0) {
        return { status: "not_found", detail: `No proposal records carry ${scopeDescription(intent.scope, store)}` };
      }
      // A zero result is still an answer; its evidence is what was examined.
      const evidence = matched.length > 0 ? ids(matched) : ids(examined);
      const conditions = intent.scope.conditions;
      let payload: AnswerPayload;
      if (intent.operation === "list") {
        payload = { kind: "list", conditions, rows: matched.map(r => ({ quoteId: r.quoteId, businessName: r.businessName })) };
      } else if (intent.operation === "exists") {
        payload = { kind: "exists", conditions, count: matched.length };
      } else {
        payload = { kind: "count", conditions, count: matched.length };
      }
      return { status: "ok", payload, evidence, entity };
    }

    case "lookup": {
      if (!intent.field) {
        return { status: "not_found", detail: "Lookup without a field" };
      }
      const descriptor = requireField(store, intent.field);
      const rows: LookupRow[] = [];
      for (const record of matched) {
        const values = store.values(record, descriptor);
        if (values.length === 0) continue;
        rows.push({ quoteId: record.quoteId, businessName: record.businessName, value: values.join("; ") });
      }
      if (rows.length === 0) {
        return { status: "not_found", detail: `${descriptor.field.label} is not recorded for ${scopeDescription(intent.scope, store)}` };
      }
      return {
        status: "ok",
        payload: { kind: "lookup", fieldLabel: descriptor.field.label, rows },
        evidence: rows.map(r => r.quoteId),
        entity,
      };
    }

    case "compare": {
      if (!intent.field) {
        return { status: "not_found", detail: "Comparison without a field" };
      }
      const descriptor = requireField(store, intent.field);
      const direction = intent.direction ?? "highest";
      let best: { row: LookupRow; amount: number } | null = null;

      for (const record of matched) {
        for (const value of store.values(record, descriptor)) {
          const amount = parseNumeric(value);
          if (amount === null) continue;
          const better = best === null
            || (direction === "highest" ? amount > best.amount : amount < best.amount);
          if (better) {
            best = { row: { quoteId: record.quoteId, businessName: record.businessName, value }, amount };
          }
        }
      }

      if (!best) {
        return { status: "not_found", detail: `No numeric ${descriptor.field.label} recorded` };
      }
      const winner = best.row.quoteId;
      return {
        status: "ok",
        payload: { kind: "compare", direction, fieldLabel: descriptor.field.label, row: best.row },
        evidence: [winner],
        entity: { scope: { ids: [winner], conditions: [] }, ids: [winner] },
      };
    }

    default: {
      const _exhaustive: never = intent.operation;
      throw new Error(`[RecordQueries] Unhandled operation: ${String(_exhaustive)}`);
    }
  }
}
