/**
 * Backend connection: the mutable per-session state in front of an adapter.
 * Holds the system prompt and the tool set the active agent registered, and
 * turns canonical messages into a delta stream.
 */
import { convert } from "../formats/index.js";
import type { Provider } from "../formats/types.js";
import type { BackendToolDefinition } from "../formats/tool-definitions.js";
import type { CanonicalMessage } from "../messages/types.js";
import type { ToolHandler } from "../tools/types.js";
import type { BackendAdapter, DecodedDelta } from "./types.js";

interface BoundTool {
  definition: BackendToolDefinition;
  handler: ToolHandler;
}

export class BackendConnection {
  private systemPrompt = "";
  private tools = new Map<string, BoundTool>();

  constructor(private readonly adapter: BackendAdapter) {}

  get provider(): Provider {
    return this.adapter.provider;
  }

  setSystemPrompt(prompt: string): void {
    this.systemPrompt = prompt;
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  registerTool(name: string, definition: BackendToolDefinition, handler: ToolHandler): void {
    this.tools.set(name, { definition, handler });
  }

  unregisterTool(name: string): boolean {
    return this.tools.delete(name);
  }

  clearTools(): void {
    this.tools.clear();
  }

  registeredToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  toolDefinitions(): BackendToolDefinition[] {
    return Array.from(this.tools.values(), (t) => t.definition);
  }

  /** Copy of the current name → handler table. Callers take one per round. */
  handlers(): Map<string, ToolHandler> {
    return new Map(Array.from(this.tools, ([name, t]): [string, ToolHandler] => [name, t.handler]));
  }

  openStream(messages: readonly CanonicalMessage[], signal?: AbortSignal): AsyncIterable<DecodedDelta> {
    const request = this.adapter.encode(
      convert(messages, this.adapter.provider),
      this.systemPrompt,
      this.toolDefinitions(),
    );
    return this.adapter.openStream(request, signal);
  }
}
