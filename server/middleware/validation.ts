/**
 * Validation Middleware
 *
 * Provides Zod-based request validation for body and params.
 * Integrates with existing error handling via ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError } from "zod";
import type { ZodSchema } from "zod";
import { queryRequestSchema } from "@shared/schema";
import { INPUT_LIMITS } from "../config/constants";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 * Parsed values replace the raw ones, so handlers see trimmed, defaulted data.
 *
 * @example
 * app.post("/api/query", validate({ body: queryRequestSchema }), handler);
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors
          .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
          .join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const paramSchemas = {
  sessionId: z.object({
    id: z
      .string()
      .min(1, "Session id is required")
      .max(INPUT_LIMITS.MAX_SESSION_ID_LENGTH)
      .regex(/^[A-Za-z0-9_.:-]+$/, "Session id may only contain letters, digits and _ . : -"),
  }),
};

export const bodySchemas = {
  query: queryRequestSchema,
};
