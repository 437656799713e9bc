/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the models used by the drafting pipeline.
 *
 * DRAFTING - gpt-4o
 *   Streams the motion text through the Responses API with file search,
 *   code interpreter and the optional HTML→PDF function tool.
 *
 * EXTRACTION - gemini flash
 *   Reads uploaded petitions/schedules and reports explicitly present facts.
 */

export const LLM_MODELS = {
  /**
   * Balanced model for grounded drafting with tool use.
   */
  DRAFTING: "gpt-4o",
} as const;

export const GEMINI_MODELS = {
  /**
   * Fast multimodal model for reading scanned and native PDFs.
   */
  FLASH: "gemini-2.0-flash",
} as const;

export type LLMModelType = typeof LLM_MODELS[keyof typeof LLM_MODELS];

export type GeminiModelType = typeof GEMINI_MODELS[keyof typeof GEMINI_MODELS];

export const MODEL_ASSIGNMENTS = {
  MOTION_DRAFTING: LLM_MODELS.DRAFTING,
  DOCUMENT_EXTRACTION: GEMINI_MODELS.FLASH,
} as const;
