import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { getField, getNumber, getString } from "./fieldAccess";

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

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
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

export class ConflictError extends Error implements AppError {
  statusCode = 409;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/**
 * Missing or corrupt configuration: no registry entry for a category, an
 * unparseable config file, an unset secret.
 */
export class ConfigurationError extends Error implements AppError {
  statusCode = 503;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * The backend (or the installed SDK) does not accept a request parameter.
 * Callers that probe a richer call fall back to the reduced one on this
 * error kind only.
 */
export class UnsupportedParameterError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  parameter: string;
  constructor(parameter: string, message?: string) {
    super(message ?? `Unsupported parameter: ${parameter}`);
    this.name = "UnsupportedParameterError";
    this.parameter = parameter;
  }
}

const UNKNOWN_ARGUMENT_PATTERN = /unexpected keyword argument|unknown (?:parameter|argument)|unrecognized (?:parameter|argument)/i;

export function isUnsupportedParameterError(error: unknown, parameter: string): boolean {
  if (error instanceof UnsupportedParameterError) {
    return error.parameter === parameter;
  }
  // Older SDKs reject unknown arguments before any request is sent, naming the argument in quotes
  if (error instanceof TypeError) {
    const named = [`'${parameter}'`, `"${parameter}"`].some((quoted) => error.message.includes(quoted));
    return named && UNKNOWN_ARGUMENT_PATTERN.test(error.message);
  }
  // API-side rejection: 400 with the offending parameter named
  const status = getNumber(error, "status") ?? getNumber(error, "statusCode");
  if (status !== 400) return false;
  const param = getString(error, "param") ?? getString(getField(error, "error"), "param");
  if (param !== undefined) return param === parameter || param.startsWith(`${parameter}[`);
  const code = getString(error, "code");
  return code === "unknown_parameter" && error instanceof Error && error.message.includes(parameter);
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
  return getNumber(error, "statusCode") ?? 500;
}

export function handleRouteError(res: Response, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export interface ClassifiedError {
  type: "openai_quota" | "openai_auth" | "network" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
}

const NETWORK_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "EAI_AGAIN"]);

/**
 * Turn a backend failure into a user-facing message for the chat surface.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = getString(err, "code") ?? getNumber(err, "status") ?? getNumber(err, "statusCode");
  const errorName = err instanceof Error ? err.name : "";

  if (errorCode === "insufficient_quota" || errorCode === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    errorMessage.includes("rate limit")) {
    return {
      type: "openai_quota",
      userMessage: "The drafting service quota has been exceeded. Please try again later or contact an admin.",
      errorMessage, errorCode,
    };
  }

  if (errorCode === 401 || errorCode === "invalid_api_key" ||
    errorMessage.includes("Incorrect API key")) {
    return {
      type: "openai_auth",
      userMessage: "The drafting service rejected our credentials. Please contact an admin.",
      errorMessage, errorCode,
    };
  }

  if ((typeof errorCode === "string" && NETWORK_ERROR_CODES.has(errorCode)) ||
    errorName === "APIConnectionError" || errorName === "APIConnectionTimeoutError" ||
    errorMessage.includes("Connection error")) {
    return {
      type: "network",
      userMessage: "Could not reach the drafting service. Please check the connection and try again.",
      errorMessage, errorCode,
    };
  }

  return {
    type: "internal",
    userMessage: `Error creating response: ${errorMessage}`,
    errorMessage, errorCode,
  };
}
