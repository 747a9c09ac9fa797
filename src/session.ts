import { mkdirSync, writeFileSync, readFileSync, existsSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import type { TransferRecord } from "./agents/registry.js";
import { Logger } from "./logger.js";
import { crewError, asError, errorLogFields } from "./errors.js";
import { isRecord, stringField } from "./formats/guards.js";
import { isProvider } from "./formats/types.js";
import type { Provider } from "./formats/types.js";
import type { CanonicalMessage } from "./messages/types.js";
import { parseCanonicalMessages } from "./messages/validate.js";

/**
 * Conversation persistence.
 *
 * Layout:
 *   <dataDir>/
 *     conversations/
 *       <conversation-id>/
 *         messages.json   full canonical log
 *         meta.json       timestamps, current agent, transfer log
 */

export interface ConversationMeta {
  id: string;
  createdAt: string;
  updatedAt: string;
  provider?: Provider;
  currentAgent?: string;
  transfers: TransferRecord[];
}

export interface StoredConversation {
  messages: CanonicalMessage[];
  meta: ConversationMeta;
}

/** Persistence collaborator. The core appends once per completed turn and truncates on rewind. */
export interface ConversationStore {
  append(id: string, messages: readonly CanonicalMessage[], meta: ConversationMeta): Promise<void>;
  truncate(id: string, length: number, meta: ConversationMeta): Promise<void>;
  load(id: string): Promise<StoredConversation | null>;
  list(): Promise<ConversationMeta[]>;
  remove(id: string): Promise<boolean>;
}

/**
 * Generate a new conversation ID (short UUID prefix for readability).
 */
export function newConversationId(): string {
  return randomUUID().split("-")[0];
}

const INTERRUPTED_PLACEHOLDER =
  "[Conversation interrupted: this tool call was not completed before the session ended.]";

/**
 * Make every tool call answered exactly once. A process killed mid-batch
 * leaves calls without results, which backends reject; results whose call is
 * gone or that repeat an answered call are dropped.
 */
export function repairToolPairs(messages: readonly CanonicalMessage[]): CanonicalMessage[] {
  return repairWithPositions(messages).messages;
}

interface RepairOutcome {
  messages: CanonicalMessage[];
  /** positions[i]: where input message i sits in the output, or would sit if it was dropped. */
  positions: number[];
  dropped: Set<number>;
  changed: boolean;
}

function repairWithPositions(messages: readonly CanonicalMessage[]): RepairOutcome {
  const callIds = new Set<string>();
  const answered = new Set<string>();
  for (const m of messages) {
    for (const p of m.content) {
      if (p.type === "tool_call") callIds.add(p.id);
      else if (p.type === "tool_result") answered.add(p.toolCallId);
    }
  }

  const seen = new Set<string>();
  const out: CanonicalMessage[] = [];
  const positions: number[] = [];
  const dropped = new Set<number>();
  let changed = false;
  messages.forEach((m, index) => {
    positions.push(out.length);
    if (m.role === "tool") {
      const content = m.content.filter((p) => {
        if (p.type !== "tool_result") return true;
        if (!callIds.has(p.toolCallId)) {
          Logger.debug(`Conversation repair: dropping orphaned tool_result for missing call ${p.toolCallId}`);
          return false;
        }
        if (seen.has(p.toolCallId)) {
          Logger.debug(`Conversation repair: dropping duplicate tool_result for call ${p.toolCallId}`);
          return false;
        }
        seen.add(p.toolCallId);
        return true;
      });
      if (content.length !== m.content.length) changed = true;
      if (content.length === 0) {
        dropped.add(index);
        return;
      }
      out.push(content.length === m.content.length ? m : { ...m, content });
      return;
    }
    out.push(m);
    if (m.role !== "assistant") return;
    for (const p of m.content) {
      if (p.type !== "tool_call" || answered.has(p.id)) continue;
      const placeholder: CanonicalMessage = {
        role: "tool",
        content: [{ type: "tool_result", toolCallId: p.id, content: INTERRUPTED_PLACEHOLDER, isError: true }],
      };
      if (m.agent !== undefined) placeholder.agent = m.agent;
      out.push(placeholder);
      answered.add(p.id);
      seen.add(p.id);
      changed = true;
      Logger.warn(`Conversation repair: injected placeholder tool_result for orphaned call ${p.id} (${p.name})`);
    }
  });
  return { messages: out, positions, dropped, changed };
}

/**
 * Repair a stored conversation's tool pairs and move the transfer log's
 * canonical indices along with the messages. `changed` tells the store to
 * write the result back, so later truncates see the same indices as the
 * live log.
 */
export function repairConversation(stored: StoredConversation): { conversation: StoredConversation; changed: boolean } {
  const outcome = repairWithPositions(stored.messages);
  if (!outcome.changed) return { conversation: stored, changed: false };
  const shift = outcome.messages.length - stored.messages.length;
  const moved = (index: number): number => outcome.positions[index] ?? index + shift;
  const transfers = stored.meta.transfers.map((t) => ({
    ...t,
    sharedIndices: t.sharedIndices.filter((i) => !outcome.dropped.has(i)).map(moved),
    relevantData: [...t.relevantData],
    logIndex: moved(t.logIndex),
  }));
  return {
    conversation: { messages: outcome.messages, meta: { ...stored.meta, transfers } },
    changed: true,
  };
}

function parseTransferRecord(raw: unknown): TransferRecord | null {
  if (!isRecord(raw)) return null;
  const from = stringField(raw, "from");
  const to = stringField(raw, "to");
  const task = stringField(raw, "task");
  if (from === undefined || to === undefined || task === undefined) return null;
  if (typeof raw.logIndex !== "number") return null;
  const record: TransferRecord = {
    from,
    to,
    task,
    sharedIndices: Array.isArray(raw.sharedIndices)
      ? raw.sharedIndices.filter((n): n is number => typeof n === "number")
      : [],
    relevantData: Array.isArray(raw.relevantData)
      ? raw.relevantData.filter((s): s is string => typeof s === "string")
      : [],
    logIndex: raw.logIndex,
  };
  const postAction = stringField(raw, "postAction");
  if (postAction !== undefined) record.postAction = postAction;
  return record;
}

export function parseConversationMeta(raw: unknown, id: string): ConversationMeta {
  const meta: ConversationMeta = {
    id,
    createdAt: new Date(0).toISOString(),
    updatedAt: new Date(0).toISOString(),
    transfers: [],
  };
  if (!isRecord(raw)) return meta;
  meta.createdAt = stringField(raw, "createdAt") ?? meta.createdAt;
  meta.updatedAt = stringField(raw, "updatedAt") ?? meta.updatedAt;
  const provider = stringField(raw, "provider");
  if (provider !== undefined && isProvider(provider)) meta.provider = provider;
  const currentAgent = stringField(raw, "currentAgent");
  if (currentAgent !== undefined) meta.currentAgent = currentAgent;
  if (Array.isArray(raw.transfers)) {
    for (const t of raw.transfers) {
      const record = parseTransferRecord(t);
      if (record) meta.transfers.push(record);
    }
  }
  return meta;
}

/** JSON files under `<dataDir>/conversations/<id>/`. */
export class FileConversationStore implements ConversationStore {
  constructor(private readonly dataDir: string) {}

  private root(): string {
    return join(this.dataDir, "conversations");
  }

  private dir(id: string): string {
    return join(this.root(), id);
  }

  async append(id: string, messages: readonly CanonicalMessage[], meta: ConversationMeta): Promise<void> {
    const existing = this.readMessages(id);
    this.write(id, [...existing, ...messages], meta);
  }

  async truncate(id: string, length: number, meta: ConversationMeta): Promise<void> {
    this.write(id, this.readMessages(id).slice(0, Math.max(0, length)), meta);
  }

  /**
   * Load a conversation. Returns null if not found or unreadable.
   * Orphaned tool calls from interrupted sessions are repaired and the repair
   * is written back.
   */
  async load(id: string): Promise<StoredConversation | null> {
    const dir = this.dir(id);
    const msgPath = join(dir, "messages.json");
    const metaPath = join(dir, "meta.json");
    if (!existsSync(msgPath) || !existsSync(metaPath)) return null;

    let stored: StoredConversation;
    try {
      stored = {
        messages: parseCanonicalMessages(JSON.parse(readFileSync(msgPath, "utf-8"))),
        meta: parseConversationMeta(JSON.parse(readFileSync(metaPath, "utf-8")), id),
      };
    } catch (e: unknown) {
      const ce = crewError("session_error", `Failed to load conversation ${id}: ${asError(e).message}`, { cause: e });
      Logger.warn(ce.message, errorLogFields(ce));
      return null;
    }
    const { conversation, changed } = repairConversation(stored);
    if (changed) this.write(id, conversation.messages, conversation.meta);
    return conversation;
  }

  /**
   * List all conversations, most recently updated first.
   */
  async list(): Promise<ConversationMeta[]> {
    const root = this.root();
    if (!existsSync(root)) return [];
    const metas: ConversationMeta[] = [];
    for (const entry of readdirSync(root)) {
      const metaPath = join(root, entry, "meta.json");
      if (!existsSync(metaPath)) continue;
      try {
        metas.push(parseConversationMeta(JSON.parse(readFileSync(metaPath, "utf-8")), entry));
      } catch (e: unknown) {
        Logger.debug(`Skipping unreadable conversation ${entry}: ${asError(e).message}`);
      }
    }
    return metas.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async remove(id: string): Promise<boolean> {
    const dir = this.dir(id);
    if (!existsSync(dir)) return false;
    rmSync(dir, { recursive: true, force: true });
    return true;
  }

  private readMessages(id: string): CanonicalMessage[] {
    const msgPath = join(this.dir(id), "messages.json");
    if (!existsSync(msgPath)) return [];
    try {
      return parseCanonicalMessages(JSON.parse(readFileSync(msgPath, "utf-8")));
    } catch (e: unknown) {
      throw crewError("session_error", `Failed to read conversation ${id}: ${asError(e).message}`, { cause: e });
    }
  }

  private write(id: string, messages: readonly CanonicalMessage[], meta: ConversationMeta): void {
    const dir = this.dir(id);
    try {
      mkdirSync(dir, { recursive: true });
      writeFileSync(join(dir, "messages.json"), JSON.stringify(messages, null, 2));
      writeFileSync(join(dir, "meta.json"), JSON.stringify(meta, null, 2));
    } catch (e: unknown) {
      const ce = crewError("session_error", `Failed to save conversation ${id}: ${asError(e).message}`, { cause: e });
      Logger.error("Conversation save failed:", errorLogFields(ce));
      throw ce;
    }
  }
}

/** In-process store for tests and embedders that persist elsewhere. */
export class MemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, StoredConversation>();

  async append(id: string, messages: readonly CanonicalMessage[], meta: ConversationMeta): Promise<void> {
    const existing = this.conversations.get(id)?.messages ?? [];
    this.conversations.set(id, { messages: [...existing, ...messages], meta: cloneMeta(meta) });
  }

  async truncate(id: string, length: number, meta: ConversationMeta): Promise<void> {
    const existing = this.conversations.get(id)?.messages ?? [];
    this.conversations.set(id, { messages: existing.slice(0, Math.max(0, length)), meta: cloneMeta(meta) });
  }

  async load(id: string): Promise<StoredConversation | null> {
    const stored = this.conversations.get(id);
    if (!stored) return null;
    const { conversation, changed } = repairConversation(stored);
    if (changed) this.conversations.set(id, conversation);
    return { messages: [...conversation.messages], meta: cloneMeta(conversation.meta) };
  }

  async list(): Promise<ConversationMeta[]> {
    return Array.from(this.conversations.values(), (c) => cloneMeta(c.meta))
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async remove(id: string): Promise<boolean> {
    return this.conversations.delete(id);
  }
}

function cloneMeta(meta: ConversationMeta): ConversationMeta {
  return { ...meta, transfers: meta.transfers.map((t) => ({ ...t, sharedIndices: [...t.sharedIndices], relevantData: [...t.relevantData] })) };
}
