import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import { ConfigurationError } from "../utils/errorHandler";

let _openai: OpenAI | null = null;
export function getOpenAI(): OpenAI {
  if (!_openai) {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) throw new ConfigurationError("[LLM Client] OPENAI_API_KEY is not set");
    _openai = new OpenAI({ apiKey });
  }
  return _openai;
}

let _gemini: GoogleGenAI | null = null;
export function getGemini(): GoogleGenAI {
  if (!_gemini) {
    const apiKey = process.env.GEMINI_API_KEY;
    if (!apiKey) throw new ConfigurationError("[LLM Client] GEMINI_API_KEY is not set");
    _gemini = new GoogleGenAI({ apiKey });
  }
  return _gemini;
}

/**
 * Bearer token for raw downloads from OpenAI endpoints the SDK does not
 * wrap consistently across versions (container file content).
 */
export function getOpenAIApiKey(): string {
  return getOpenAI().apiKey;
}
