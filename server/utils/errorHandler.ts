import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  constructor(message = "Authentication required") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class ServiceUnavailableError extends Error implements AppError {
  statusCode = 503;
  isOperational = true;
  constructor(message = "Service is initializing") {
    super(message);
    this.name = "ServiceUnavailableError";
  }
}

/**
 * Raised while building a snapshot (records, schema, predefined table, vector index).
 * Fatal at startup; a failed reload keeps the previous snapshot.
 */
export class SnapshotLoadError extends Error implements AppError {
  statusCode = 500;
  isOperational = false;
  constructor(message: string) {
    super(message);
    this.name = "SnapshotLoadError";
  }
}

/**
 * A vector hit that does not resolve to exactly one record section.
 * Indicates the index and record store were built from different data.
 */
export class InconsistentEvidenceError extends Error implements AppError {
  isOperational = false;
  textBlockId: string;
  constructor(textBlockId: string) {
    super(`Text block "${textBlockId}" does not resolve to a record section`);
    this.name = "InconsistentEvidenceError";
    this.textBlockId = textBlockId;
  }
}

export class TimeoutError extends Error implements AppError {
  isOperational = true;
  operation: string;
  timeoutMs: number;
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = statusCode >= 500 && !(error instanceof ServiceUnavailableError)
    ? "Internal server error"
    : getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}
