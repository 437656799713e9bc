/**
 * Drafting Orchestrator
 *
 * One user turn = one grounded, streaming generation request:
 *   compose → dispatch → stream → finalize → reconcile function calls → return
 *
 * Only a failed dispatch is fatal to the turn. Citation retrieval, function
 * calls and artifact downloads degrade to warnings and the streamed text is
 * always returned.
 */

import type { Citation, GeneratedArtifact, TurnRole } from "@shared/schema";
import { OPENAI_API } from "../config/constants";
import { MODEL_ASSIGNMENTS } from "../config/models";
import {
  classifyPipelineError,
  getErrorMessage,
  isUnsupportedParameterError,
} from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";
import type { ArtifactResolver } from "./artifactResolver";
import { extractCitations } from "./citations";
import type {
  FunctionCallOutcome,
  FunctionToolDefinition,
  FunctionToolHandler,
  RemoteFileRef,
} from "./functionTools";
import { parseStreamEvent } from "./streamEvents";

export type DraftingInputMessage = {
  role: "system" | TurnRole;
  content: string;
};

export type DraftingTool =
  | { type: "file_search"; vector_store_ids: string[] }
  | { type: "code_interpreter"; container: { type: "auto" } }
  | FunctionToolDefinition;

export type IncludableOutput = typeof OPENAI_API.RETRIEVE_INCLUDE[number];

export type DraftingRequest = {
  model: string;
  input: DraftingInputMessage[];
  tools: DraftingTool[];
};

export interface DraftingBackend {
  createStreamingResponse(request: DraftingRequest): Promise<AsyncIterable<unknown>>;
  retrieveResponse(responseId: string, include?: readonly IncludableOutput[]): Promise<unknown>;
}

export interface DraftingReporter {
  /** Called once per non-empty delta, in arrival order */
  onTextDelta(delta: string, accumulated: string): void;
  onWarning(message: string): void;
  onError(message: string): void;
}

export type DraftingTurnResult = {
  answerText: string;
  artifacts: GeneratedArtifact[];
  citations: Citation[];
  responseId?: string;
  /** Set when the dispatch itself failed; the answer is then empty */
  error?: string;
};

export type DraftingOrchestratorDeps = {
  backend: DraftingBackend;
  artifactResolver: ArtifactResolver;
  systemInstructions: string;
  model?: string;
  functionHandlers?: readonly FunctionToolHandler[];
};

type PendingFunctionCall = {
  itemId: string;
  callId?: string;
  name?: string;
  arguments: string;
};

type StreamOutcome = {
  text: string;
  responseId?: string;
  completedResponse?: unknown;
  functionCalls: PendingFunctionCall[];
  streamError?: string;
};

export function composeDraftingInput(
  systemInstructions: string,
  contextBlock: string,
  history: readonly DraftingInputMessage[],
): DraftingInputMessage[] {
  return [
    { role: "system", content: systemInstructions },
    { role: "system", content: contextBlock },
    ...history.map((turn) => ({ role: turn.role, content: turn.content })),
  ];
}

export class DraftingOrchestrator {
  private readonly model: string;
  private readonly handlers: Map<string, FunctionToolHandler>;

  constructor(private readonly deps: DraftingOrchestratorDeps) {
    this.model = deps.model ?? MODEL_ASSIGNMENTS.MOTION_DRAFTING;
    this.handlers = new Map((deps.functionHandlers ?? []).map((h) => [h.definition.name, h]));
  }

  buildRequest(
    history: readonly DraftingInputMessage[],
    scopedStoreIds: readonly string[],
    contextBlock: string,
  ): DraftingRequest {
    const tools: DraftingTool[] = [];
    if (scopedStoreIds.length > 0) {
      tools.push({ type: "file_search", vector_store_ids: [...scopedStoreIds] });
    }
    tools.push({ type: "code_interpreter", container: { type: "auto" } });
    for (const handler of this.handlers.values()) {
      tools.push(handler.definition);
    }

    return {
      model: this.model,
      input: composeDraftingInput(this.deps.systemInstructions, contextBlock, history),
      tools,
    };
  }

  async runTurn(
    history: readonly DraftingInputMessage[],
    scopedStoreIds: readonly string[],
    contextBlock: string,
    reporter: DraftingReporter,
    logger: RequestLogger = new RequestLogger(),
  ): Promise<DraftingTurnResult> {
    const request = this.buildRequest(history, scopedStoreIds, contextBlock);

    logger.startStage("dispatch");
    let stream: AsyncIterable<unknown>;
    try {
      stream = await this.deps.backend.createStreamingResponse(request);
    } catch (err) {
      return this.failTurn(err, reporter, logger);
    }
    logger.endStage("dispatch");

    logger.startStage("stream");
    const streamed = await this.consumeStream(stream, reporter);
    logger.endStage("stream");

    if (streamed.streamError && !streamed.text) {
      return this.failTurn(new Error(streamed.streamError), reporter, logger);
    }
    if (streamed.streamError) {
      reporter.onWarning(`The response stream ended early: ${streamed.streamError}`);
    }

    logger.startStage("finalize");
    const finalResponse = await this.finalize(streamed, reporter, logger);
    const citations = extractCitations(finalResponse);
    logger.endStage("finalize");

    let answerText = streamed.text.trim();
    const remoteFiles: RemoteFileRef[] = [];
    for (const call of streamed.functionCalls) {
      const outcome = await this.executeFunctionCall(call, reporter, logger);
      if (!outcome) continue;
      if (outcome.download) remoteFiles.push(outcome.download);
      const separator = answerText ? "\n\n" : "";
      answerText = `${answerText}${separator}${outcome.statusLine}`;
      reporter.onTextDelta(`${separator}${outcome.statusLine}`, answerText);
    }

    let artifacts: GeneratedArtifact[] = [];
    logger.startStage("artifacts");
    try {
      artifacts = await this.deps.artifactResolver.resolve(finalResponse, remoteFiles, reporter.onWarning.bind(reporter));
    } catch (err) {
      reporter.onWarning(`Could not resolve generated files: ${getErrorMessage(err)}`);
    }
    logger.endStage("artifacts");

    logger.info(`[DraftingOrchestrator] Turn complete`, {
      responseId: streamed.responseId,
      chars: answerText.length,
      citations: citations.length,
      artifacts: artifacts.length,
    });

    return { answerText, artifacts, citations, responseId: streamed.responseId };
  }

  private failTurn(err: unknown, reporter: DraftingReporter, logger: RequestLogger): DraftingTurnResult {
    const classified = classifyPipelineError(err);
    logger.error(`[DraftingOrchestrator] Dispatch failed (${classified.type})`, err);
    reporter.onError(classified.userMessage);
    return { answerText: "", artifacts: [], citations: [], error: classified.errorMessage };
  }

  private async consumeStream(stream: AsyncIterable<unknown>, reporter: DraftingReporter): Promise<StreamOutcome> {
    const outcome: StreamOutcome = { text: "", functionCalls: [] };
    const calls = new Map<string, PendingFunctionCall>();

    try {
      for await (const raw of stream) {
        const event = parseStreamEvent(raw);
        switch (event.kind) {
          case "text_delta":
            if (event.delta) {
              outcome.text += event.delta;
              reporter.onTextDelta(event.delta, outcome.text);
            }
            break;
          case "created":
            if (!outcome.responseId) outcome.responseId = event.responseId;
            break;
          case "completed":
            outcome.responseId = event.responseId;
            outcome.completedResponse = event.response;
            break;
          case "function_call_arguments": {
            const existing = calls.get(event.itemId);
            calls.set(event.itemId, {
              itemId: event.itemId,
              callId: event.callId ?? existing?.callId,
              name: event.name ?? existing?.name,
              arguments: event.arguments || existing?.arguments || "",
            });
            break;
          }
          case "failed":
            outcome.streamError = event.message;
            break;
          case "unknown":
            break;
        }
      }
    } catch (err) {
      outcome.streamError = getErrorMessage(err);
    }

    outcome.functionCalls = [...calls.values()];
    return outcome;
  }

  /**
   * One follow-up retrieve with included results. A backend that does not
   * take `include` gets the plain retrieve; any other failure keeps the
   * response object seen on the stream.
   */
  private async finalize(streamed: StreamOutcome, reporter: DraftingReporter, logger: RequestLogger): Promise<unknown> {
    if (!streamed.responseId) {
      return streamed.completedResponse;
    }
    try {
      return await this.retrieveWithResults(streamed.responseId, logger);
    } catch (err) {
      logger.warn(`[DraftingOrchestrator] Follow-up retrieve failed`, { error: getErrorMessage(err) });
      reporter.onWarning(`Could not retrieve citations and generated files: ${getErrorMessage(err)}`);
      return streamed.completedResponse;
    }
  }

  private async retrieveWithResults(responseId: string, logger: RequestLogger): Promise<unknown> {
    try {
      return await this.deps.backend.retrieveResponse(responseId, OPENAI_API.RETRIEVE_INCLUDE);
    } catch (err) {
      if (!isUnsupportedParameterError(err, "include")) throw err;
      logger.info(`[DraftingOrchestrator] Backend does not support include; retrieving without results`);
      return this.deps.backend.retrieveResponse(responseId);
    }
  }

  private async executeFunctionCall(
    call: PendingFunctionCall,
    reporter: DraftingReporter,
    logger: RequestLogger,
  ): Promise<FunctionCallOutcome | undefined> {
    const handler = call.name ? this.handlers.get(call.name) : undefined;
    if (!handler) {
      reporter.onWarning(`Ignoring call to undeclared function ${call.name ?? "(unnamed)"}`);
      return undefined;
    }
    try {
      return await handler.execute(call.arguments);
    } catch (err) {
      logger.error(`[DraftingOrchestrator] Function ${handler.definition.name} threw`, err);
      return { success: false, statusLine: `${handler.definition.name} failed: ${getErrorMessage(err)}` };
    }
  }
}
