import type { OpenAI } from "openai";
import { getOpenAI } from "../llm/client";
import type { DraftingBackend, DraftingRequest, IncludableOutput } from "./orchestrator";

/**
 * Responses API transport for the drafting orchestrator. Returns raw SDK
 * objects; the orchestrator reads them through the field accessors.
 */
export class OpenAIDraftingBackend implements DraftingBackend {
  constructor(private readonly clientFactory: () => OpenAI = getOpenAI) {}

  async createStreamingResponse(request: DraftingRequest): Promise<AsyncIterable<unknown>> {
    return this.clientFactory().responses.create({
      model: request.model,
      input: request.input,
      tools: request.tools,
      stream: true,
    });
  }

  async retrieveResponse(responseId: string, include?: readonly IncludableOutput[]): Promise<unknown> {
    const client = this.clientFactory();
    if (include && include.length > 0) {
      return client.responses.retrieve(responseId, { include: [...include] });
    }
    return client.responses.retrieve(responseId);
  }
}
