/**
 * Agent registry, scoped to one conversation.
 *
 * Owns the agent set, the single current agent and the transfer log.
 * Exactly one agent is active at a time; activation always clears the
 * connection's tools before binding the new agent's.
 */
import type { BackendConnection } from "../backend/connection.js";
import { crewError } from "../errors.js";
import { Logger, C } from "../logger.js";
import { messageText } from "../messages/index.js";
import type { CanonicalMessage } from "../messages/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import { TRANSFER_TOOL_NAME, transferDefinition, transferHandler } from "../tools/transfer.js";
import { Agent } from "./agent.js";
import type { AgentDefinition, ResolvedTool } from "./agent.js";
import { composeSystemPrompt, renderHandoffPrompt } from "./prompts.js";

export interface TransferRecord {
  from: string;
  to: string;
  task: string;
  /** Canonical indices disclosed by this transfer (not previously in the pool). */
  sharedIndices: number[];
  /** Rendered excerpt lines, one per disclosed message with text. */
  relevantData: string[];
  postAction?: string;
  /** Canonical log length when the transfer happened. */
  logIndex: number;
}

export type SelectResult =
  | { ok: true; agent: string }
  | { ok: false; error: string; available: string[] };

export type TransferResult =
  | { ok: true; record: TransferRecord }
  | { ok: false; error: string; available: string[] };

export interface AgentRegistryOptions {
  connection: BackendConnection;
  /** Parent registry. The registry forks it to bind its own transfer tool. */
  tools: ToolRegistry;
  /** Current canonical log length; stamped onto transfer records. */
  logLength?: () => number;
}

export class AgentRegistry {
  private agents = new Map<string, Agent>();
  private currentName: string | undefined;
  private transfers: TransferRecord[] = [];
  private connection: BackendConnection;
  readonly tools: ToolRegistry;
  private readonly logLength: () => number;

  constructor(opts: AgentRegistryOptions) {
    this.connection = opts.connection;
    this.logLength = opts.logLength ?? (() => 0);
    this.tools = opts.tools.fork();
    this.tools.register(TRANSFER_TOOL_NAME, transferDefinition, transferHandler, this);
  }

  get current(): Agent | undefined {
    return this.currentName === undefined ? undefined : this.agents.get(this.currentName);
  }

  get backend(): BackendConnection {
    return this.connection;
  }

  get transferLog(): readonly TransferRecord[] {
    return this.transfers;
  }

  names(): string[] {
    return Array.from(this.agents.keys());
  }

  get(name: string): Agent | undefined {
    return this.agents.get(name);
  }

  all(): Agent[] {
    return Array.from(this.agents.values());
  }

  /** Registers an agent. The first one registered becomes current. */
  register(def: AgentDefinition | Agent): Agent {
    const agent = def instanceof Agent ? def : new Agent(def);
    if (this.agents.has(agent.name)) {
      throw crewError("config_error", `Agent '${agent.name}' is already registered`, { agent: agent.name });
    }
    this.agents.set(agent.name, agent);
    Logger.debug(`agent registered: ${agent.name}`);

    try {
      if (this.currentName === undefined) {
        this.activate(agent);
      } else {
        // The current agent's handoff section and transfer tool depend on who else exists.
        this.refresh();
      }
    } catch (err) {
      this.agents.delete(agent.name);
      throw err;
    }
    return agent;
  }

  deregister(name: string): boolean {
    if (!this.agents.has(name)) return false;
    if (name === this.currentName) {
      throw crewError("config_error", `Cannot deregister the current agent '${name}'`, { agent: name });
    }
    this.agents.delete(name);
    this.refresh();
    return true;
  }

  select(name: string): SelectResult {
    const next = this.agents.get(name);
    if (!next) {
      return { ok: false, error: `Agent '${name}' not found`, available: this.names() };
    }
    // Resolve before touching the connection so a bad tool name changes nothing.
    const tools = this.resolveTools(next);
    this.current?.deactivate(this.connection);
    this.bind(next, tools);
    return { ok: true, agent: name };
  }

  transfer(target: string, task: string, relevantPositions?: number[], postAction?: string): TransferResult {
    const source = this.current;
    if (!source) {
      return { ok: false, error: "No agent is currently selected", available: this.names() };
    }
    if (!this.agents.has(target)) {
      return { ok: false, error: `Agent '${target}' not found`, available: this.names() };
    }
    if (target === source.name) {
      return { ok: false, error: "Cannot transfer to the same agent", available: this.names() };
    }

    const pool = source.poolFor(target);
    const positions = relevantPositions ?? source.history.map((_, i) => i);
    const fresh: number[] = [];
    for (const pos of positions) {
      const index = source.indexAt(pos);
      if (index === undefined || pool.has(index) || fresh.includes(index)) continue;
      fresh.push(index);
    }

    const byIndex = new Map(source.history.map((e): [number, CanonicalMessage] => [e.index, e.message]));
    const relevantData: string[] = [];
    for (const index of fresh) {
      const msg = byIndex.get(index);
      const line = msg ? excerptLine(msg, source.name) : null;
      if (line) relevantData.push(line);
    }

    const selected = this.select(target);
    if (!selected.ok) return selected;

    for (const index of fresh) pool.add(index);
    const record: TransferRecord = {
      from: source.name,
      to: target,
      task,
      sharedIndices: fresh,
      relevantData,
      logIndex: this.logLength(),
    };
    if (postAction) record.postAction = postAction;
    this.transfers.push(record);
    Logger.info(`${C.cyan(source.name)} → ${C.cyan(target)}: ${task}`);
    return { ok: true, record };
  }

  /** Swap the backend connection (model switch), keeping the current agent active. */
  setConnection(connection: BackendConnection): void {
    const agent = this.current;
    agent?.deactivate(this.connection);
    this.connection = connection;
    if (agent) this.activate(agent);
  }

  handoffPrompt(): string {
    return renderHandoffPrompt(this.currentName, this.agents.values());
  }

  /** Record a freshly appended canonical message in its owner's history. */
  recordMessage(index: number, message: CanonicalMessage): void {
    if (message.agent === undefined) {
      for (const agent of this.agents.values()) agent.append(index, message);
      return;
    }
    this.agents.get(message.agent)?.append(index, message);
  }

  clearHistories(): void {
    for (const agent of this.agents.values()) agent.reset();
    this.transfers = [];
  }

  /**
   * Rebuild every agent's history and pool from a (possibly truncated) log.
   * Transfer records made at or after the end of the log are dropped.
   */
  rebuildHistories(log: readonly CanonicalMessage[]): void {
    for (const agent of this.agents.values()) agent.reset();
    log.forEach((msg, index) => this.recordMessage(index, msg));

    this.transfers = this.transfers.filter((t) => t.logIndex < log.length);
    for (const t of this.transfers) {
      const pool = this.agents.get(t.from)?.poolFor(t.to);
      if (!pool) continue;
      for (const index of t.sharedIndices) {
        if (index < log.length) pool.add(index);
      }
    }
  }

  /** Replace the transfer log wholesale (session load). */
  restoreTransfers(records: readonly TransferRecord[]): void {
    this.transfers = records.map((r) => ({ ...r, sharedIndices: [...r.sharedIndices], relevantData: [...r.relevantData] }));
  }

  /** Select the author of the last assistant message in the log, if it is still registered. */
  selectLastAuthor(log: readonly CanonicalMessage[]): void {
    for (let i = log.length - 1; i >= 0; i--) {
      const msg = log[i];
      if (msg.role !== "assistant" || msg.agent === undefined) continue;
      if (!this.agents.has(msg.agent)) continue;
      this.select(msg.agent);
      return;
    }
    const current = this.current;
    if (current) this.select(current.name);
  }

  private resolveTools(agent: Agent): ResolvedTool[] {
    const names = [...agent.toolNames];
    if (this.agents.size > 1 && !names.includes(TRANSFER_TOOL_NAME)) names.push(TRANSFER_TOOL_NAME);
    const provider = this.connection.provider;
    return names.map((name) => ({
      name,
      definition: this.tools.resolveDefinition(name, provider),
      handler: this.tools.resolveHandler(name),
    }));
  }

  private activate(agent: Agent): void {
    this.bind(agent, this.resolveTools(agent));
  }

  private bind(agent: Agent, tools: ResolvedTool[]): void {
    this.currentName = agent.name;
    agent.activate(this.connection, composeSystemPrompt(agent.systemPrompt, this.handoffPrompt()), tools);
    Logger.debug(`agent active: ${agent.name} (${tools.map((t) => t.name).join(", ") || "no tools"})`);
  }

  private refresh(): void {
    const agent = this.current;
    if (!agent) return;
    const tools = this.resolveTools(agent);
    agent.deactivate(this.connection);
    this.bind(agent, tools);
  }
}

function excerptLine(msg: CanonicalMessage, sourceName: string): string | null {
  if (msg.role === "tool" || msg.handoffFrom !== undefined) return null;
  const text = messageText(msg, "\n").trim();
  if (!text) return null;
  const who = msg.role === "user" ? "User" : msg.agent ?? sourceName;
  return `**${who}**: ${text}`;
}
