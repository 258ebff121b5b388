/**
 * Conversation State
 *
 * Purpose:
 * Per-session, append-only turn history used to bind references such as
 * "their" or "it" in later questions.
 *
 * Requests for one session run one at a time through runExclusive; different
 * sessions never wait on each other. Only the most recently active sessions
 * are kept.
 *
 * Layer: Resolution (state)
 */

import type { Answer } from "@shared/schema";
import { CONVERSATION_CONSTANTS } from "../config/constants";
import type { ResolvedIntent, TurnEntity } from "./types";

export interface ConversationTurn {
  question: string;
  intent?: ResolvedIntent;
  answer: Answer;
  entity?: TurnEntity;
  /** Quote ids the answer mentioned (its evidence for non-refusals). */
  mentioned: string[];
  at: Date;
}

export class ConversationStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly maxTurns: number;
  private readonly maxSessions: number;

  constructor(
    maxTurns: number = CONVERSATION_CONSTANTS.MAX_STORED_TURNS,
    maxSessions: number = CONVERSATION_CONSTANTS.MAX_SESSIONS,
  ) {
    this.maxTurns = maxTurns;
    this.maxSessions = maxSessions;
  }

  /**
   * Run `task` after every earlier task for the same session has settled.
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(sessionId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    }
  }

  history(sessionId: string): readonly ConversationTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  append(sessionId: string, turn: ConversationTurn): void {
    const turns = this.sessions.get(sessionId) ?? [];
    turns.push(Object.freeze({ ...turn, mentioned: [...turn.mentioned] }));
    if (turns.length > this.maxTurns) {
      turns.splice(0, turns.length - this.maxTurns);
    }
    // Re-inserting keeps the Map in least-recently-active order.
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, turns);

    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
    }
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}
