import { describe, it, expect, vi } from "vitest";
import type { Request, Response, NextFunction } from "express";
import { turnRequestSchema } from "@shared/schema";
import { commonSchemas, validate } from "../middleware/validation";
import { ValidationError } from "../utils/errorHandler";

function run(schemas: Parameters<typeof validate>[0], req: Partial<Request>) {
  const next = vi.fn();
  validate(schemas)(req as Request, {} as Response, next as NextFunction);
  return next;
}

describe("validate", () => {
  it("replaces the body with the parsed value", () => {
    const req: Partial<Request> = { body: { prompt: "  Draft it  ", category: "value_claim" }, params: {} };

    const next = run({ body: turnRequestSchema }, req);

    expect(next).toHaveBeenCalledWith();
    expect(req.body).toEqual({ prompt: "Draft it", category: "value_claim" });
  });

  it("passes a ValidationError naming the field", () => {
    const next = run({ body: turnRequestSchema }, { body: { prompt: "   " }, params: {} });

    const error = next.mock.calls[0][0];
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe("prompt: Prompt is required");
  });

  it("validates route params", () => {
    const next = run({ params: commonSchemas.sessionId }, { params: { id: "not-a-uuid" } });

    expect(next.mock.calls[0][0].message).toBe("id: Invalid session id");
  });
});
