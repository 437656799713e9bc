/**
 * Application Constants
 *
 * Centralized configuration values used across the drafting pipeline.
 */

/**
 * Extraction sentinels.
 *
 * The extraction prompt asks for CANONICAL; older prompts produced LEGACY,
 * which is still recognized when normalizing extractor output.
 */
export const EXTRACTION_SENTINELS = {
  CANONICAL: "NO_RELEVANT_INFO",
  LEGACY: "NO_RELEVANT_INFO_FOUND_IN_UPLOAD",
} as const;

export const CONTEXT_CONSTANTS = {
  /**
   * Placeholder for an undeclared category/jurisdiction/sub-classification.
   * Drafting instructions look for this literal to ask for missing fields.
   */
  UNSPECIFIED: "(unspecified)",

  EXTRACTION_BLOCK_LABEL: "EXTRACTED_FROM_UPLOAD",
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Container / conversion-output download timeout (milliseconds).
   */
  ARTIFACT_DOWNLOAD_MS: 30000, // 30 seconds

  /**
   * HTML→PDF conversion call timeout (milliseconds). Rendering is slow.
   */
  CONVERSION_CALL_MS: 120000, // 2 minutes
} as const;

/**
 * Rate limiting configuration
 */
export const RATE_LIMIT_CONSTANTS = {
  /**
   * Authentication rate limit window (milliseconds).
   */
  AUTH_WINDOW_MS: 15 * 60 * 1000, // 15 minutes

  /**
   * Maximum failed password attempts per window.
   */
  AUTH_MAX_ATTEMPTS: 10,
} as const;

export const OPENAI_API = {
  BASE_URL: "https://api.openai.com/v1",

  /**
   * Response fields requested on the post-stream retrieve call.
   */
  RETRIEVE_INCLUDE: ["file_search_call.results", "code_interpreter_call.outputs"],
} as const;

export const ADMIN_CONSTANTS = {
  /**
   * Page size when listing files indexed in a knowledge store.
   */
  STORE_FILE_LIST_LIMIT: 100,

  UNKNOWN_FILENAME: "(unknown)",
} as const;

export const UPLOAD_CONSTANTS = {
  ACCEPTED_EXTENSIONS: ["pdf", "docx", "txt"],
  MAX_FILE_BYTES: 25 * 1024 * 1024, // 25 MB
  MAX_FILES_PER_TURN: 10,
} as const;

export const SESSION_CONSTANTS = {
  /**
   * Sessions untouched for this long are dropped with their files (milliseconds).
   */
  IDLE_TTL_MS: 2 * 60 * 60 * 1000, // 2 hours
} as const;

/**
 * Extension ↔ MIME pairs used to type uploads and to name generated files
 * that come back without an extension.
 */
export const MIME_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  doc: "application/msword",
  txt: "text/plain",
  md: "text/markdown",
  html: "text/html",
  csv: "text/csv",
  json: "application/json",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  png: "image/png",
  jpg: "image/jpeg",
  zip: "application/zip",
};

export const DEFAULT_MIME_TYPE = "application/octet-stream";
