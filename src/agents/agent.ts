import type { BackendConnection } from "../backend/connection.js";
import type { BackendToolDefinition } from "../formats/tool-definitions.js";
import type { CanonicalMessage } from "../messages/types.js";
import type { ToolHandler } from "../tools/types.js";

export interface AgentDefinition {
  name: string;
  description: string;
  systemPrompt: string;
  /** Names resolved against the tool registry on activation. */
  tools: string[];
}

/** A message in an agent's history, with its position in the canonical log. */
export interface HistoryEntry {
  index: number;
  message: CanonicalMessage;
}

export interface ResolvedTool {
  name: string;
  definition: BackendToolDefinition;
  handler: ToolHandler;
}

export type AgentState = "registered" | "active" | "inactive";

export class Agent {
  readonly name: string;
  readonly description: string;
  readonly systemPrompt: string;
  readonly toolNames: readonly string[];

  /** target agent → canonical indices already disclosed to it by this agent */
  readonly sharedContextPool = new Map<string, Set<number>>();

  private entries: HistoryEntry[] = [];
  private registered: string[] = [];
  private _state: AgentState = "registered";

  constructor(def: AgentDefinition) {
    this.name = def.name;
    this.description = def.description;
    this.systemPrompt = def.systemPrompt;
    this.toolNames = [...new Set(def.tools)];
  }

  get state(): AgentState {
    return this._state;
  }

  get isActive(): boolean {
    return this._state === "active";
  }

  get history(): readonly HistoryEntry[] {
    return this.entries;
  }

  /** Tool names this agent currently has bound on the connection. */
  get registeredTools(): readonly string[] {
    return this.registered;
  }

  messages(): CanonicalMessage[] {
    return this.entries.map((e) => e.message);
  }

  append(index: number, message: CanonicalMessage): void {
    this.entries.push({ index, message });
  }

  /** Canonical index of the message at a history position. */
  indexAt(position: number): number | undefined {
    return this.entries[position]?.index;
  }

  poolFor(target: string): Set<number> {
    let pool = this.sharedContextPool.get(target);
    if (!pool) {
      pool = new Set();
      this.sharedContextPool.set(target, pool);
    }
    return pool;
  }

  /** Drops history and pools. Used by clear and before a rebuild. */
  reset(): void {
    this.entries = [];
    this.sharedContextPool.clear();
  }

  activate(connection: BackendConnection, systemPrompt: string, tools: readonly ResolvedTool[]): void {
    // Unconditional: a stale binding left by another agent must never survive.
    connection.clearTools();
    for (const tool of tools) {
      connection.registerTool(tool.name, tool.definition, tool.handler);
    }
    connection.setSystemPrompt(systemPrompt);
    this.registered = tools.map((t) => t.name);
    this._state = "active";
  }

  deactivate(connection: BackendConnection): void {
    for (const name of this.registered) connection.unregisterTool(name);
    this.registered = [];
    if (this._state === "active") this._state = "inactive";
  }
}
