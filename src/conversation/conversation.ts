/**
 * Conversation: one canonical log, one agent registry, one turn index and an
 * optional store. Several conversations can share a root tool registry and
 * run side by side; nothing else is shared between them.
 */
import type { AgentDefinition } from "../agents/agent.js";
import { AgentRegistry } from "../agents/registry.js";
import type { SelectResult } from "../agents/registry.js";
import type { BackendConnection } from "../backend/connection.js";
import { crewError } from "../errors.js";
import { Logger } from "../logger.js";
import { isUserInput, userMessage } from "../messages/index.js";
import type { CanonicalMessage } from "../messages/types.js";
import { newConversationId } from "../session.js";
import type { ConversationMeta, ConversationStore } from "../session.js";
import { ToolRegistry } from "../tools/registry.js";
import { MessageLog } from "./message-log.js";
import { TurnIndex } from "./turn-index.js";
import type { Turn } from "./turn-index.js";
import { runTurn, DEFAULT_MAX_TOOL_ROUNDS } from "./turn-runner.js";
import type { TurnHost, TurnObserver, TurnResult } from "./turn-runner.js";

export interface ConversationOptions {
  connection: BackendConnection;
  /** Root registry holding process-wide tools. A private one is created when omitted. */
  tools?: ToolRegistry;
  agents?: AgentDefinition[];
  store?: ConversationStore;
  id?: string;
  maxToolRounds?: number;
  observer?: TurnObserver;
}

/** At least one backend call per turn. */
function roundCap(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_MAX_TOOL_ROUNDS;
  if (value < 1) {
    Logger.warn(`maxToolRounds ${value} is below 1; using 1`);
    return 1;
  }
  return Math.floor(value);
}

export class Conversation implements TurnHost {
  readonly agents: AgentRegistry;
  private log = new MessageLog();
  private turnIndex = new TurnIndex();
  private readonly store: ConversationStore | undefined;
  private readonly maxToolRounds: number;
  private readonly observer: TurnObserver | undefined;
  private _id: string;
  private createdAt = new Date().toISOString();
  /** Log length already handed to the store. */
  private persisted = 0;
  private running = false;

  constructor(opts: ConversationOptions) {
    this.agents = new AgentRegistry({
      connection: opts.connection,
      tools: opts.tools ?? new ToolRegistry(),
      logLength: () => this.log.length,
    });
    for (const def of opts.agents ?? []) this.agents.register(def);
    this.store = opts.store;
    this.maxToolRounds = roundCap(opts.maxToolRounds);
    this.observer = opts.observer;
    this._id = opts.id ?? newConversationId();
  }

  get id(): string {
    return this._id;
  }

  /** Snapshot of the log; later appends and rewinds do not touch it. */
  get messages(): readonly CanonicalMessage[] {
    return this.log.slice(0);
  }

  get turns(): readonly Turn[] {
    return [...this.turnIndex.list()];
  }

  get isRunning(): boolean {
    return this.running;
  }

  append(message: CanonicalMessage): number {
    const index = this.log.append(message);
    this.agents.recordMessage(index, message);
    return index;
  }

  /** Append user input, owned by the current agent. Returns its canonical index. */
  submit(text: string): number {
    const agent = this.agents.current;
    if (!agent) throw crewError("config_error", "No agent is registered");
    this.assertIdle("submit");
    return this.append(userMessage(text, agent.name));
  }

  /**
   * Run one turn against the last user input. Returns null when the turn was
   * cancelled or the backend failed; the log keeps every fully appended message.
   */
  async runTurn(signal?: AbortSignal): Promise<TurnResult | null> {
    this.assertIdle("runTurn");
    const anchor = this.lastUserInput();
    if (anchor === undefined) {
      throw crewError("config_error", "There is no user message to respond to");
    }
    const turnsBefore = this.turnIndex.list();
    const lastTurn = turnsBefore[turnsBefore.length - 1];
    if (lastTurn && lastTurn.boundaryIndex >= anchor) {
      throw crewError("config_error", "The last user message was already answered; submit a new one first");
    }

    this.running = true;
    try {
      const result = await runTurn(this, {
        maxToolRounds: this.maxToolRounds,
        observer: this.observer,
        signal,
      });
      if (!result) return null;
      const anchorMessage = this.log.at(anchor);
      if (anchorMessage) this.turnIndex.record(anchor, anchorMessage);
      await this.persist();
      return result;
    } finally {
      this.running = false;
    }
  }

  async send(text: string, signal?: AbortSignal): Promise<TurnResult | null> {
    this.submit(text);
    return this.runTurn(signal);
  }

  selectAgent(name: string): SelectResult {
    this.assertIdle("selectAgent");
    const before = this.agents.current?.name;
    const result = this.agents.select(name);
    if (result.ok && before !== undefined && before !== name) {
      this.observer?.onAgentChanged?.(before, name);
    }
    return result;
  }

  /**
   * Rewind to just before turn `turnNumber` (1-based). The anchor user message
   * of that turn and everything after it are removed.
   */
  async jump(turnNumber: number): Promise<Turn> {
    this.assertIdle("jump");
    const turn = this.turnIndex.get(turnNumber);
    const boundary = turn.boundaryIndex;

    this.log.truncate(boundary);
    this.turnIndex.truncate(turnNumber - 1);
    this.agents.rebuildHistories(this.log.all());
    this.agents.selectLastAuthor(this.log.all());
    Logger.debug(`[conversation] jumped to turn ${turnNumber}; log length ${boundary}`);

    if (this.store && this.persisted > boundary) {
      this.persisted = boundary;
      await this.store.truncate(this._id, boundary, this.meta());
    }
    return turn;
  }

  /** Fresh conversation id, empty log, turns and agent histories. Agents stay registered. */
  startNewConversation(): string {
    this.assertIdle("startNewConversation");
    this.reset();
    this._id = newConversationId();
    this.createdAt = new Date().toISOString();
    return this._id;
  }

  /** Empty this conversation in place, including its stored copy. */
  async clear(): Promise<void> {
    this.assertIdle("clear");
    this.reset();
    if (this.store) await this.store.truncate(this._id, 0, this.meta());
  }

  async load(id: string): Promise<boolean> {
    this.assertIdle("load");
    if (!this.store) throw crewError("session_error", "No conversation store is configured");
    const stored = await this.store.load(id);
    if (!stored) return false;

    this.reset();
    this._id = id;
    this.createdAt = stored.meta.createdAt;
    this.log.replace(stored.messages);
    this.agents.restoreTransfers(stored.meta.transfers);
    this.agents.rebuildHistories(this.log.all());
    this.turnIndex.rebuild(this.log.all());

    const preferred = stored.meta.currentAgent;
    if (preferred !== undefined && this.agents.get(preferred)) this.agents.select(preferred);
    else this.agents.selectLastAuthor(this.log.all());

    this.persisted = this.log.length;
    return true;
  }

  private reset(): void {
    this.log.truncate(0);
    this.turnIndex.clear();
    this.agents.clearHistories();
    this.persisted = 0;
  }

  private async persist(): Promise<void> {
    if (!this.store) return;
    const fresh = this.log.slice(this.persisted);
    await this.store.append(this._id, fresh, this.meta());
    this.persisted = this.log.length;
  }

  private meta(): ConversationMeta {
    const meta: ConversationMeta = {
      id: this._id,
      createdAt: this.createdAt,
      updatedAt: new Date().toISOString(),
      provider: this.agents.backend.provider,
      transfers: [...this.agents.transferLog],
    };
    const current = this.agents.current;
    if (current) meta.currentAgent = current.name;
    return meta;
  }

  private lastUserInput(): number | undefined {
    const all = this.log.all();
    for (let i = all.length - 1; i >= 0; i--) {
      if (isUserInput(all[i])) return i;
    }
    return undefined;
  }

  private assertIdle(operation: string): void {
    if (this.running) {
      throw crewError("session_error", `Cannot ${operation} while a turn is running`);
    }
  }
}
