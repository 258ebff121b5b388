import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { v4 as uuidv4 } from "uuid";
import type { QueryRequest, QueryResponse } from "@shared/schema";
import { addSecurityHeaders, createRateLimit, requireAdminToken } from "./middleware/security";
import { bodySchemas, paramSchemas, validate } from "./middleware/validation";
import type { QueryResolutionEngine } from "./resolution/engine";
import type { SnapshotLoader } from "./resolution/snapshot";
import { ServiceUnavailableError, SnapshotLoadError, getErrorStatusCode, handleRouteError } from "./utils/errorHandler";

export interface RouteDependencies {
  engine: QueryResolutionEngine;
  loadSnapshot: SnapshotLoader;
  adminToken?: string;
}

// ============================================================================
// HANDLERS
// ============================================================================

export function healthHandler(engine: QueryResolutionEngine) {
  return (_req: Request, res: Response) => {
    const status = engine.status();
    res.status(status.ready ? 200 : 503).json({ status: status.ready ? "ok" : "initializing", ...status });
  };
}

export function queryHandler(engine: QueryResolutionEngine) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!engine.isReady()) {
        throw new ServiceUnavailableError("Proposal data is still loading");
      }
      // Parsed by validate({ body: bodySchemas.query }).
      const body: QueryRequest = req.body;
      const { question } = body;
      // Without a session id the question starts a fresh conversation.
      const sessionId = body.sessionId ?? uuidv4();
      const answer = await engine.resolve(question, sessionId);
      const response: QueryResponse = { question, sessionId, answer };
      res.json(response);
    } catch (error) {
      next(error);
    }
  };
}

export function endSessionHandler(engine: QueryResolutionEngine) {
  return (req: Request, res: Response) => {
    engine.endSession(req.params.id);
    res.status(204).end();
  };
}

export function reloadHandler(engine: QueryResolutionEngine, loadSnapshot: SnapshotLoader) {
  return async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const status = await engine.reload(loadSnapshot);
      res.json(status);
    } catch (error) {
      // The previous snapshot is still serving; tell the operator why the new one was rejected.
      if (error instanceof SnapshotLoadError) {
        res.status(500).json({ error: error.message, status: engine.status() });
        return;
      }
      next(error);
    }
  };
}

/**
 * Last middleware: maps thrown errors to JSON responses.
 */
export function errorMiddleware(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (getErrorStatusCode(error) >= 500) {
    console.error(`[Routes] ${req.method} ${req.path} failed:`, error);
  }
  handleRouteError(res, error);
}

// ============================================================================
// REGISTRATION
// ============================================================================

export function registerRoutes(app: Express, deps: RouteDependencies): Server {
  const { engine, loadSnapshot, adminToken } = deps;

  app.use("/api", addSecurityHeaders);

  app.get("/api/health", healthHandler(engine));

  app.post("/api/query", createRateLimit(), validate({ body: bodySchemas.query }), queryHandler(engine));

  app.delete("/api/sessions/:id", validate({ params: paramSchemas.sessionId }), endSessionHandler(engine));

  app.post("/api/admin/reload", requireAdminToken(adminToken), reloadHandler(engine, loadSnapshot));

  app.use(errorMiddleware);

  return createServer(app);
}
