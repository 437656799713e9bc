/**
 * Service wiring: builds the drafting core from validated environment
 * settings. Routes and tests receive the result instead of reaching for
 * module-level singletons.
 */

import { getProfile, type DraftingProfile } from "./config/profiles";
import type { AppEnv } from "./config/env";
import { HtmlToPdfHandler } from "./conversion/htmlToPdf";
import { ArtifactResolver } from "./drafting/artifactResolver";
import type { FunctionToolHandler } from "./drafting/functionTools";
import { OpenAIDraftingBackend } from "./drafting/openaiDraftingBackend";
import { DraftingOrchestrator } from "./drafting/orchestrator";
import { DocumentExtractor } from "./extraction/documentExtractor";
import { GeminiExtractionBackend } from "./extraction/geminiBackend";
import { KnowledgeStoreRegistry } from "./knowledge/knowledgeStoreRegistry";
import { OpenAIStoreBackend } from "./knowledge/openaiStoreBackend";
import { getOpenAIApiKey } from "./llm/client";
import { SessionStore } from "./session/sessionStore";
import { logInfo } from "./utils/logger";

export type DraftingServices = {
  profile: DraftingProfile;
  registry: KnowledgeStoreRegistry;
  extractor: DocumentExtractor;
  orchestrator: DraftingOrchestrator;
  sessions: SessionStore;
};

export function createDraftingServices(env: AppEnv): DraftingServices {
  const profile = getProfile(env.DRAFTING_PROFILE);
  const registry = new KnowledgeStoreRegistry(env.DRAFTING_CONFIG_PATH, new OpenAIStoreBackend());
  const extractor = new DocumentExtractor(new GeminiExtractionBackend(), profile.extractionPrompt);

  const functionHandlers: FunctionToolHandler[] = [];
  if (env.HTML_TO_PDF_URL) {
    functionHandlers.push(new HtmlToPdfHandler({
      serviceUrl: env.HTML_TO_PDF_URL,
      apiKey: env.HTML_TO_PDF_API_KEY,
    }));
  }

  const orchestrator = new DraftingOrchestrator({
    backend: new OpenAIDraftingBackend(),
    artifactResolver: new ArtifactResolver({ apiKey: getOpenAIApiKey }),
    systemInstructions: profile.systemInstructions,
    functionHandlers,
  });

  logInfo(`[Services] Drafting services ready`, {
    profile: profile.id,
    htmlToPdf: functionHandlers.length > 0,
  });

  return { profile, registry, extractor, orchestrator, sessions: new SessionStore() };
}
