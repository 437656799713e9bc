/**
 * Turn Pipeline
 *
 * Runs one user submission end to end:
 *   uploads → extraction (sequential) → context block → drafting call
 * and records both the user and the assistant turn in the session. The
 * assistant turn is recorded even when drafting fails, with empty content,
 * so turn positions stay aligned. One turn at a time per session.
 */

import type { AttachedFile, ConversationTurn } from "@shared/schema";
import { categoryLabel, isCategory, type DraftingProfile } from "../config/profiles";
import { assembleContext } from "../drafting/contextAssembler";
import type { DraftingOrchestrator, DraftingReporter, DraftingTurnResult } from "../drafting/orchestrator";
import type {
  DocumentExtractor,
  ExtractionProgress,
  ExtractionResult,
} from "../extraction/documentExtractor";
import { classifyPipelineError, getErrorMessage } from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";
import { fileExtension } from "../utils/mime";
import type { SessionState } from "./sessionState";

export interface TurnReporter extends DraftingReporter, ExtractionProgress {}

export type TurnSubmission = {
  prompt: string;
  categorySlug?: string;
  jurisdiction?: string;
  subClassification?: string;
  uploads: readonly AttachedFile[];
};

export type TurnDependencies = {
  profile: DraftingProfile;
  registry: { get(category: string): string | undefined };
  extractor: DocumentExtractor;
  orchestrator: DraftingOrchestrator;
};

export type TurnOutcome =
  | { status: "rejected"; reason: string }
  | {
      status: "completed" | "failed";
      userTurn: ConversationTurn;
      assistantTurn: ConversationTurn;
      contextBlock: string;
      uploaderToken: string;
    };

export const TURN_IN_PROGRESS_MESSAGE = "A turn is already running for this session. Please wait for it to finish.";

export async function processTurn(
  session: SessionState,
  submission: TurnSubmission,
  deps: TurnDependencies,
  reporter: TurnReporter,
): Promise<TurnOutcome> {
  if (!session.beginTurn()) {
    reporter.onError(TURN_IN_PROGRESS_MESSAGE);
    return { status: "rejected", reason: TURN_IN_PROGRESS_MESSAGE };
  }
  try {
    return await runSubmission(session, submission, deps, reporter);
  } finally {
    session.endTurn();
  }
}

async function runSubmission(
  session: SessionState,
  submission: TurnSubmission,
  deps: TurnDependencies,
  reporter: TurnReporter,
): Promise<TurnOutcome> {
  const { profile } = deps;
  const logger = new RequestLogger(session.id);
  const categoryNoun = profile.labels.category.toLowerCase();

  const slug = submission.categorySlug;
  if (!slug || !isCategory(profile, slug)) {
    const reason = `Please select a ${categoryNoun} to enable chat.`;
    reporter.onError(reason);
    return { status: "rejected", reason };
  }

  let storeId: string | undefined;
  try {
    storeId = deps.registry.get(slug);
  } catch (err) {
    // Corrupt config file: this turn stops, the next one loads it again
    const reason = getErrorMessage(err);
    logger.error(`[TurnPipeline] Knowledge store lookup failed`, err);
    reporter.onError(reason);
    return { status: "rejected", reason };
  }
  if (!storeId) {
    const reason = `Knowledge store not found for this ${categoryNoun}. Please create it in Admin.`;
    reporter.onError(reason);
    return { status: "rejected", reason };
  }

  logger.info(`[TurnPipeline] Turn started`, { category: slug, uploads: submission.uploads.length });

  let extractions: ExtractionResult[] = [];
  if (submission.uploads.length > 0) {
    logger.startStage("extraction");
    extractions = await deps.extractor.extractUploads(submission.uploads, reporter);
    logger.endStage("extraction");

    if (submission.uploads.some((file) => fileExtension(file.filename) === "pdf")) {
      session.markScheduleUploaded();
    }
  }

  const contextBlock = assembleContext(
    categoryLabel(profile, slug),
    submission.jurisdiction,
    submission.subClassification,
    extractions,
    profile.labels,
  );

  // From here on both turns are recorded, whatever happens
  const userTurn = session.appendUserTurn(submission.prompt, submission.uploads);

  let result: DraftingTurnResult;
  try {
    result = await deps.orchestrator.runTurn(
      session.toDraftingInput(),
      [storeId],
      contextBlock,
      reporter,
      logger,
    );
  } catch (err) {
    const classified = classifyPipelineError(err);
    logger.error(`[TurnPipeline] Drafting failed (${classified.type})`, err);
    reporter.onError(classified.userMessage);
    result = { answerText: "", artifacts: [], citations: [], error: classified.errorMessage };
  }

  const assistantTurn = session.appendAssistantTurn(
    result.answerText,
    result.artifacts.map(({ filename, bytes }) => ({ filename, bytes })),
    result.citations,
  );
  const uploaderToken = session.rotateUploaderToken();

  logger.info(`[TurnPipeline] Turn finished`, { failed: result.error !== undefined, turns: session.turnCount });

  return {
    status: result.error === undefined ? "completed" : "failed",
    userTurn,
    assistantTurn,
    contextBlock,
    uploaderToken,
  };
}
