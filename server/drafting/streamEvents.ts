/**
 * Drafting Stream Events
 *
 * Narrows raw Responses API stream events into the handful of variants the
 * orchestrator acts on. Anything else becomes `unknown` and is skipped, so
 * new event types never break a turn.
 */

import { getField, getString } from "../utils/fieldAccess";

export type DraftingStreamEvent =
  | { kind: "text_delta"; delta: string }
  | { kind: "created"; responseId: string }
  | { kind: "completed"; responseId: string; response: unknown }
  | {
      kind: "function_call_arguments";
      itemId: string;
      callId?: string;
      name?: string;
      arguments: string;
    }
  | { kind: "failed"; message: string }
  | { kind: "unknown"; type: string };

function responseIdOf(raw: unknown): string | undefined {
  return getString(getField(raw, "response"), "id");
}

export function parseStreamEvent(raw: unknown): DraftingStreamEvent {
  const type = getString(raw, "type") ?? "";

  switch (type) {
    case "response.output_text.delta":
      return { kind: "text_delta", delta: getString(raw, "delta") ?? "" };

    case "response.created": {
      const responseId = responseIdOf(raw);
      return responseId ? { kind: "created", responseId } : { kind: "unknown", type };
    }

    case "response.completed": {
      const responseId = responseIdOf(raw);
      return responseId
        ? { kind: "completed", responseId, response: getField(raw, "response") }
        : { kind: "unknown", type };
    }

    case "response.function_call_arguments.done": {
      const itemId = getString(raw, "item_id");
      if (!itemId) return { kind: "unknown", type };
      return {
        kind: "function_call_arguments",
        itemId,
        name: getString(raw, "name"),
        arguments: getString(raw, "arguments") ?? "",
      };
    }

    // The finished output item carries the function name and call id
    case "response.output_item.done": {
      const item = getField(raw, "item");
      const itemId = getString(item, "id");
      if (getString(item, "type") !== "function_call" || !itemId) {
        return { kind: "unknown", type };
      }
      return {
        kind: "function_call_arguments",
        itemId,
        callId: getString(item, "call_id"),
        name: getString(item, "name"),
        arguments: getString(item, "arguments") ?? "",
      };
    }

    case "response.failed":
    case "response.incomplete": {
      const error = getField(getField(raw, "response"), "error");
      return { kind: "failed", message: getString(error, "message") ?? `Response ended with ${type}` };
    }

    case "error":
      return { kind: "failed", message: getString(raw, "message") ?? "Stream error" };

    default:
      return { kind: "unknown", type };
  }
}
