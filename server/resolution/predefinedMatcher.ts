/**
 * Predefined Q&A Matcher
 *
 * Purpose:
 * Exact lookup of curated answers. Matching ignores case, repeated
 * whitespace and trailing "?", "." or "!"; nothing fuzzier, so a curated
 * entry never captures a question meant for the grounded strategies.
 *
 * Layer: Resolution (strategy 1)
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import type { RecordStore } from "../records/recordStore";
import { readJsonFile } from "../records/loader";
import { SnapshotLoadError } from "../utils/errorHandler";
import type { ResolutionContext, ResolutionStrategy, StrategyOutcome } from "./types";
import { noMatch } from "./types";

const predefinedEntrySchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
  evidence: z.array(z.string().min(1)).min(1, "every predefined answer needs at least one evidence quote id"),
});

const predefinedFileSchema = z.array(predefinedEntrySchema);

export type PredefinedEntry = z.infer<typeof predefinedEntrySchema>;

export function normalizeQuestion(question: string): string {
  return question
    .trim()
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/[\s?.!]+$/, "");
}

export class PredefinedTable {
  private readonly entries = new Map<string, PredefinedEntry>();

  constructor(entries: PredefinedEntry[], store: RecordStore) {
    for (const entry of entries) {
      const key = normalizeQuestion(entry.question);
      if (this.entries.has(key)) {
        throw new SnapshotLoadError(`Duplicate predefined question "${entry.question}"`);
      }
      const missing = entry.evidence.filter(id => !store.has(id));
      if (missing.length > 0) {
        throw new SnapshotLoadError(
          `Predefined answer for "${entry.question}" cites unknown quote ids: ${missing.join(", ")}`,
        );
      }
      this.entries.set(key, Object.freeze({ ...entry, evidence: [...entry.evidence] }));
    }
  }

  static fromJSON(raw: unknown, store: RecordStore): PredefinedTable {
    const parsed = predefinedFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SnapshotLoadError(`Invalid predefined Q&A table: ${fromZodError(parsed.error).message}`);
    }
    return new PredefinedTable(parsed.data, store);
  }

  static fromFile(location: URL | string, store: RecordStore): PredefinedTable {
    return PredefinedTable.fromJSON(readJsonFile(location, "predefined Q&A table"), store);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(question: string): PredefinedEntry | undefined {
    return this.entries.get(normalizeQuestion(question));
  }
}

export class PredefinedStrategy implements ResolutionStrategy {
  readonly stage = "predefined" as const;

  async run(ctx: ResolutionContext): Promise<StrategyOutcome> {
    const entry = ctx.snapshot.predefined.lookup(ctx.question);
    if (!entry) return noMatch("no curated entry");

    return {
      status: "matched",
      stage: this.stage,
      payload: { kind: "text", text: entry.answer },
      evidence: [...entry.evidence],
      entity: { scope: { ids: [...entry.evidence], conditions: [] }, ids: [...entry.evidence] },
    };
  }
}
