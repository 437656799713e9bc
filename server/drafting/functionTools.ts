/**
 * Declared Function Tools
 *
 * A function tool is declared to the drafting backend with a fixed JSON
 * schema. When the model calls it, the orchestrator runs the local handler
 * after the stream ends and folds the outcome into the turn.
 */

export type FunctionToolDefinition = {
  type: "function";
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  strict: boolean;
};

/**
 * File the handler produced somewhere else; the artifact resolver fetches it.
 */
export type RemoteFileRef = {
  url: string;
  filename: string;
  headers?: Record<string, string>;
  mimeType?: string;
};

export type FunctionCallOutcome = {
  success: boolean;
  /** One human-readable line appended to the answer */
  statusLine: string;
  download?: RemoteFileRef;
};

export interface FunctionToolHandler {
  readonly definition: FunctionToolDefinition;
  /**
   * Must resolve (never reject) with a failure outcome when the call cannot
   * be completed.
   */
  execute(rawArguments: string): Promise<FunctionCallOutcome>;
}
