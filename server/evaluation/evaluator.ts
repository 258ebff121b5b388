/**
 * Evaluation Harness
 *
 * Runs a labelled question set through the engine and scores exact-match
 * accuracy (case and whitespace ignored) plus strategy agreement. Cases that
 * share a session run in file order so follow-ups see earlier turns.
 *
 * Layer: Tooling
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { STRATEGY_TAGS } from "@shared/schema";
import type { Answer, StrategyTag } from "@shared/schema";
import { readJsonFile } from "../records/loader";

export const evaluationCaseSchema = z.object({
  question: z.string().min(1),
  expectedAnswer: z.string().min(1),
  expectedStrategy: z.enum(STRATEGY_TAGS).optional(),
  /** Cases with the same session share conversation history. */
  session: z.string().min(1).optional(),
});

export type EvaluationCase = z.infer<typeof evaluationCaseSchema>;

export interface CaseResult {
  case: EvaluationCase;
  answer: Answer;
  exactMatch: boolean;
  strategyMatch: boolean | null;
}

export interface EvaluationReport {
  total: number;
  exactMatches: number;
  accuracy: number;
  strategyDistribution: Record<StrategyTag, number>;
  results: CaseResult[];
}

export interface Resolver {
  resolve(question: string, sessionId: string): Promise<Answer>;
  endSession(sessionId: string): boolean;
}

export function parseEvaluationSet(raw: unknown): EvaluationCase[] {
  const parsed = z.array(evaluationCaseSchema).safeParse(raw);
  if (!parsed.success) {
    throw new Error(`[Evaluator] Invalid evaluation set: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}

export function loadEvaluationSet(location: URL | string): EvaluationCase[] {
  return parseEvaluationSet(readJsonFile(location, "evaluation set"));
}

export function normalizeAnswer(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

export async function runEvaluation(resolver: Resolver, cases: readonly EvaluationCase[]): Promise<EvaluationReport> {
  const strategyDistribution: Record<StrategyTag, number> = {
    predefined: 0,
    deterministic: 0,
    "llm-assisted": 0,
    semantic: 0,
    refusal: 0,
  };
  const results: CaseResult[] = [];
  const sessions = new Set<string>();

  for (const [i, evalCase] of cases.entries()) {
    const sessionId = `eval-${evalCase.session ?? `case-${i}`}`;
    sessions.add(sessionId);

    const answer = await resolver.resolve(evalCase.question, sessionId);
    strategyDistribution[answer.strategy]++;
    results.push({
      case: evalCase,
      answer,
      exactMatch: normalizeAnswer(answer.text) === normalizeAnswer(evalCase.expectedAnswer),
      strategyMatch: evalCase.expectedStrategy ? evalCase.expectedStrategy === answer.strategy : null,
    });
  }

  sessions.forEach(id => resolver.endSession(id));

  const exactMatches = results.filter(r => r.exactMatch).length;
  return {
    total: results.length,
    exactMatches,
    accuracy: results.length > 0 ? exactMatches / results.length : 0,
    strategyDistribution,
    results,
  };
}
