/**
 * Centralized Prompt Configuration
 *
 * Structure:
 * - extraction.ts: document-understanding prompts (facts from uploaded PDFs)
 * - drafting.ts: system instructions for the streaming drafting call
 */

export * from "./extraction";
export * from "./drafting";
