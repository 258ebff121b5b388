/**
 * Query Resolution Engine
 *
 * Purpose:
 * Sole entry point for answering a question. Runs the strategies in priority
 * order over one captured snapshot, inside the session's exclusive region,
 * and turns the first confident result (or the refusal that ended the run)
 * into an Answer.
 *
 * Key Responsibilities:
 * - Strategy fold: matched wins, terminal failure stops, everything else falls through
 * - Evidence check before any non-refusal answer leaves the engine
 * - Conversation history append after every question
 * - Snapshot publication (initialize / reload) with atomic swap
 * - One audit entry per question
 *
 * resolve() never throws; unexpected errors become InternalError refusals.
 *
 * Layer: Resolution (orchestration)
 */

import type { Answer, EngineStatus } from "@shared/schema";
import { RefusalReason } from "@shared/schema";
import { INPUT_LIMITS } from "../config/constants";
import { logError } from "../utils/errorHandler";
import { QueryTrace, generateCorrelationId, logQuery } from "../utils/queryLogger";
import type { QueryAuditSink } from "../utils/queryLogger";
import { formatAnswer, formatRefusal } from "./answerFormatter";
import type { ConversationTurn } from "./conversationState";
import { ConversationStore } from "./conversationState";
import type { SnapshotLoader } from "./snapshot";
import { SnapshotHolder } from "./snapshot";
import type {
  FailedOutcome,
  MatchedOutcome,
  ResolutionContext,
  ResolutionStrategy,
  ResolvedIntent,
  StrategyOutcome,
  TurnEntity,
} from "./types";

export const DEFAULT_SESSION_ID = "default";

export interface EngineOptions {
  strategies: ResolutionStrategy[];
  conversations?: ConversationStore;
  audit?: QueryAuditSink;
  newTraceId?: () => string;
}

interface Resolution {
  answer: Answer;
  intent?: ResolvedIntent;
  entity?: TurnEntity;
  topScore?: number;
}

export class QueryResolutionEngine {
  private readonly strategies: readonly ResolutionStrategy[];
  private readonly conversations: ConversationStore;
  private readonly audit: QueryAuditSink;
  private readonly newTraceId: () => string;
  private readonly holder = new SnapshotHolder();

  constructor(options: EngineOptions) {
    this.strategies = [...options.strategies];
    this.conversations = options.conversations ?? new ConversationStore();
    this.audit = options.audit ?? logQuery;
    this.newTraceId = options.newTraceId ?? generateCorrelationId;
  }

  // ==========================================================================
  // SNAPSHOT LIFECYCLE
  // ==========================================================================

  /**
   * First load. Failure propagates: the caller decides whether that is fatal.
   */
  async initialize(loader: SnapshotLoader): Promise<EngineStatus> {
    const parts = await loader();
    const snapshot = this.holder.publish(parts);
    console.log(`[Engine] Snapshot v${snapshot.version} ready`);
    return this.status();
  }

  /**
   * Build a new snapshot and swap it in. On failure the current snapshot
   * stays published and the error propagates.
   */
  async reload(loader: SnapshotLoader): Promise<EngineStatus> {
    const previous = this.holder.current();
    try {
      const parts = await loader();
      const snapshot = this.holder.publish(parts);
      console.log(`[Engine] Snapshot v${snapshot.version} replaced v${previous?.version ?? "none"}`);
      return this.status();
    } catch (error) {
      logError("Engine reload", error);
      throw error;
    }
  }

  isReady(): boolean {
    return this.holder.current() !== null;
  }

  status(): EngineStatus {
    const snapshot = this.holder.current();
    if (!snapshot) {
      return { ready: false, snapshotVersion: null, records: 0, textBlocks: 0, indexedBlocks: 0, loadedAt: null };
    }
    return {
      ready: true,
      snapshotVersion: snapshot.version,
      records: snapshot.store.size,
      textBlocks: snapshot.store.textBlockCount,
      indexedBlocks: snapshot.index.size,
      loadedAt: snapshot.loadedAt.toISOString(),
    };
  }

  endSession(sessionId: string): boolean {
    return this.conversations.clear(sessionId);
  }

  history(sessionId: string): readonly ConversationTurn[] {
    return this.conversations.history(sessionId);
  }

  // ==========================================================================
  // RESOLUTION
  // ==========================================================================

  async resolve(rawQuestion: string, sessionId: string = DEFAULT_SESSION_ID): Promise<Answer> {
    const trace = new QueryTrace(this.newTraceId());
    const question = rawQuestion.trim();

    if (!question || question.length > INPUT_LIMITS.MAX_QUESTION_LENGTH) {
      const answer = formatRefusal(RefusalReason.InputInvalid, trace.traceId);
      this.writeAudit(trace, sessionId, question, answer, null);
      return answer;
    }

    const initial = this.holder.current();
    if (!initial) {
      const answer = formatRefusal(RefusalReason.UpstreamUnavailable, trace.traceId);
      this.writeAudit(trace, sessionId, question, answer, null);
      return answer;
    }

    let snapshotVersion = initial.version;
    try {
      return await this.conversations.runExclusive(sessionId, async () => {
        // Captured once the session's turn starts: a reload during this
        // request does not affect it.
        const snapshot = this.holder.current() ?? initial;
        snapshotVersion = snapshot.version;
        const history = this.conversations.history(sessionId);
        const resolution = await this.runStrategies(
          { question, history, snapshot, traceId: trace.traceId },
          trace,
        );

        this.conversations.append(sessionId, {
          question,
          intent: resolution.intent,
          answer: resolution.answer,
          entity: resolution.entity,
          mentioned: resolution.answer.evidence,
          at: new Date(),
        });
        this.writeAudit(trace, sessionId, question, resolution.answer, snapshot.version, resolution.topScore);
        return resolution.answer;
      });
    } catch (error) {
      logError(`Engine ${trace.traceId}`, error);
      const answer = formatRefusal(RefusalReason.InternalError, trace.traceId);
      this.writeAudit(trace, sessionId, question, answer, snapshotVersion);
      return answer;
    }
  }

  private async runStrategies(ctx: ResolutionContext, trace: QueryTrace): Promise<Resolution> {
    let recoverable: FailedOutcome | undefined;
    let topScore: number | undefined;

    for (const strategy of this.strategies) {
      trace.startStage(strategy.stage);
      let outcome: StrategyOutcome;
      try {
        outcome = await strategy.run(ctx);
      } catch (error) {
        logError(`Engine ${strategy.stage}`, error);
        return { answer: formatRefusal(RefusalReason.InternalError, ctx.traceId) };
      } finally {
        trace.endStage(strategy.stage);
      }

      switch (outcome.status) {
        case "matched":
          return this.acceptMatch(outcome, ctx);

        case "failed":
          topScore = outcome.topScore ?? topScore;
          if (outcome.terminal) {
            return { answer: formatRefusal(outcome.reason, ctx.traceId), topScore };
          }
          console.warn(`[Engine] ${strategy.stage} failed (${outcome.reason}), trying next strategy: ${outcome.detail}`);
          recoverable = outcome;
          break;

        case "no_match":
          break;

        default: {
          const _exhaustive: never = outcome;
          throw new Error(`[Engine] Unhandled outcome: ${JSON.stringify(_exhaustive)}`);
        }
      }
    }

    const reason = recoverable?.reason ?? RefusalReason.BelowConfidenceThreshold;
    return { answer: formatRefusal(reason, ctx.traceId), topScore };
  }

  private acceptMatch(outcome: MatchedOutcome, ctx: ResolutionContext): Resolution {
    const { store } = ctx.snapshot;
    const unknown = outcome.evidence.filter(id => !store.has(id));
    if (outcome.evidence.length === 0 || unknown.length > 0) {
      console.error(
        `[Engine] ${outcome.stage} answer rejected: evidence ${outcome.evidence.length === 0 ? "is empty" : `cites unknown ids ${unknown.join(", ")}`}`,
      );
      return {
        answer: formatRefusal(RefusalReason.InconsistentEvidence, ctx.traceId),
        topScore: outcome.topScore,
      };
    }

    return {
      answer: formatAnswer(outcome.stage, outcome.payload, outcome.evidence, ctx.traceId),
      intent: outcome.intent,
      entity: outcome.entity,
      topScore: outcome.topScore,
    };
  }

  private writeAudit(
    trace: QueryTrace,
    sessionId: string,
    question: string,
    answer: Answer,
    snapshotVersion: number | null,
    topScore?: number,
  ): void {
    try {
      this.audit({
        traceId: trace.traceId,
        sessionId,
        question,
        strategy: answer.strategy,
        ...(answer.refusalReason && { refusalReason: answer.refusalReason }),
        evidence: answer.evidence,
        snapshotVersion,
        ...(topScore !== undefined && { topScore }),
        stages: trace.stages(),
        duration: trace.getDuration(),
      });
    } catch (error) {
      logError("Engine audit", error);
    }
  }
}
