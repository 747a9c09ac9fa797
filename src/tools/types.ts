import type { Provider } from "../formats/types.js";
import type { BackendToolDefinition } from "../formats/tool-definitions.js";

export interface ToolContext {
  /** Aborted when the user cancels the turn. Long-running handlers should honour it. */
  signal?: AbortSignal;
  /** Agent on whose behalf the tool runs. */
  agent: string;
}

/** Strings are passed through; anything else is JSON-serialized into the tool result. */
export type ToolOutput = string | number | boolean | null | object;

export type ToolHandler = (
  args: Record<string, unknown>,
  ctx: ToolContext,
) => ToolOutput | Promise<ToolOutput>;

export type DefinitionFactory = (provider: Provider) => BackendToolDefinition;

export type HandlerFactory<S> = (service: S) => ToolHandler;
