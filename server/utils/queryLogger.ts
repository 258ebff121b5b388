import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { RefusalReason, type StrategyTag } from '@shared/schema';
import { PROMPT_VERSIONS } from '../config/prompts/versions';

const LOG_DIR = path.join(process.cwd(), 'logs');

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function currentLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

function fileLoggingEnabled(): boolean {
  const flag = process.env.QUERY_LOG_ENABLED;
  return flag !== 'false' && flag !== '0';
}

interface LogMeta {
  traceId?: string;
  sessionId?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

export function logToFile(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel()]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta
  };

  if (fileLoggingEnabled()) {
    const dateStr = new Date().toISOString().split('T')[0];
    const logFile = path.join(LOG_DIR, `queries-${dateStr}.log`);
    try {
      fs.mkdirSync(LOG_DIR, { recursive: true });
      fs.appendFileSync(logFile, JSON.stringify(logEntry) + '\n');
    } catch (err) {
      console.error('[QueryLogger] Failed to write to log file:', err);
    }
  }

  const tracePrefix = meta?.traceId ? `[${meta.traceId}] ` : '';
  console.log(`[${level.toUpperCase()}] ${tracePrefix}${message}`);
}

/**
 * One line per resolved question.
 */
export interface QueryAuditEntry {
  traceId: string;
  sessionId: string;
  question: string;
  strategy: StrategyTag;
  refusalReason?: RefusalReason;
  evidence: string[];
  snapshotVersion: number | null;
  topScore?: number;
  stages: Record<string, number>;
  duration: number;
}

export type QueryAuditSink = (entry: QueryAuditEntry) => void;

export const logQuery: QueryAuditSink = (entry) => {
  const level: LogLevel = entry.refusalReason === RefusalReason.InternalError || entry.refusalReason === RefusalReason.InconsistentEvidence
    ? 'error'
    : 'info';
  const { traceId, ...rest } = entry;
  logToFile(level, `query resolved via ${entry.strategy}`, { traceId, ...rest, promptVersions: PROMPT_VERSIONS });
};

/**
 * Per-query stage timer. Stage durations end up in the audit entry.
 */
export class QueryTrace {
  readonly traceId: string;
  private readonly startTime: number;
  private readonly open = new Map<string, number>();
  private readonly finished: Record<string, number> = {};

  constructor(traceId: string = generateCorrelationId()) {
    this.traceId = traceId;
    this.startTime = Date.now();
  }

  startStage(name: string): void {
    this.open.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.open.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.open.delete(name);
    this.finished[name] = duration;
    return duration;
  }

  stages(): Record<string, number> {
    return { ...this.finished };
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
