import type { Provider, WireMessage } from "../formats/types.js";
import type { BackendToolDefinition } from "../formats/tool-definitions.js";

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * One decoded stream event. Adapters translate provider stream events
 * (SSE chunks, content_block_delta, candidates[].parts) into these.
 */
export type DecodedDelta =
  | { type: "text"; text: string }
  | { type: "thinking"; text: string; signature?: string }
  | { type: "tool_call_start"; id: string; name: string }
  /** Argument JSON arrives in fragments; concatenate per id, parse at stream end. */
  | { type: "tool_call_args"; id: string; fragment: string }
  /** Cumulative for the round; the last value wins. */
  | ({ type: "usage" } & TokenUsage);

/**
 * Everything provider-specific about talking to a model: building the
 * request body and decoding its stream. The network lives behind openStream.
 */
export interface BackendAdapter<Request = unknown> {
  readonly provider: Provider;
  encode(
    messages: WireMessage[],
    systemPrompt: string,
    tools: BackendToolDefinition[],
  ): Request;
  openStream(request: Request, signal?: AbortSignal): AsyncIterable<DecodedDelta>;
}
