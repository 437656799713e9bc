/**
 * Validation Middleware
 *
 * Zod-based request validation for body and params, reported through
 * ValidationError.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodSchema, ZodError } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema<Record<string, string>>;
}

/**
 * @example
 * app.post("/api/sessions/:id/turns",
 *   validate({ params: commonSchemas.sessionId, body: turnRequestSchema }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
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
        const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const commonSchemas = {
  sessionId: z.object({
    id: z.string().uuid("Invalid session id"),
  }),
  category: z.object({
    category: z.string().min(1, "Category is required"),
  }),
};
