/**
 * Folds a round's DecodedDelta stream into content parts.
 *
 * Parts keep arrival order. Consecutive text deltas extend one text part,
 * consecutive thinking deltas one thinking part. Tool-call argument fragments
 * are concatenated per call id and parsed only in finish(), since a fragment
 * boundary can fall anywhere inside the JSON.
 */
import type { DecodedDelta, TokenUsage } from "../backend/types.js";
import { isRecord } from "../formats/guards.js";
import type { ContentPart, TextPart, ThinkingPart, ToolCallPart } from "../messages/types.js";

interface PendingCall {
  type: "pending_call";
  id: string;
  name: string;
  args: string;
}

type Slot = TextPart | ThinkingPart | PendingCall;

export interface AccumulatedRound {
  /** Parts in arrival order; tool calls carry parsed arguments. */
  content: ContentPart[];
  toolCalls: ToolCallPart[];
  /** call id → reason the argument JSON was rejected */
  argumentErrors: Map<string, string>;
  text: string;
  usage: TokenUsage;
}

export class StreamAccumulator {
  private slots: Slot[] = [];
  private calls = new Map<string, PendingCall>();
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  push(delta: DecodedDelta): void {
    const last = this.slots[this.slots.length - 1];
    switch (delta.type) {
      case "text":
        if (!delta.text) return;
        if (last?.type === "text") last.text += delta.text;
        else this.slots.push({ type: "text", text: delta.text });
        return;
      case "thinking":
        if (last?.type === "thinking") {
          last.text += delta.text;
          if (delta.signature !== undefined) last.signature = delta.signature;
        } else {
          const part: ThinkingPart = { type: "thinking", text: delta.text };
          if (delta.signature !== undefined) part.signature = delta.signature;
          this.slots.push(part);
        }
        return;
      case "tool_call_start": {
        const existing = this.calls.get(delta.id);
        if (existing) {
          // Some providers repeat the header; keep the first slot, fill a missing name.
          if (!existing.name) existing.name = delta.name;
          return;
        }
        this.openCall(delta.id, delta.name);
        return;
      }
      case "tool_call_args": {
        const call = this.calls.get(delta.id) ?? this.openCall(delta.id, "");
        call.args += delta.fragment;
        return;
      }
      case "usage":
        this.usage = { inputTokens: delta.inputTokens, outputTokens: delta.outputTokens };
        return;
    }
  }

  get hasToolCalls(): boolean {
    return this.calls.size > 0;
  }

  finish(): AccumulatedRound {
    const content: ContentPart[] = [];
    const toolCalls: ToolCallPart[] = [];
    const argumentErrors = new Map<string, string>();
    let text = "";

    for (const slot of this.slots) {
      if (slot.type === "pending_call") {
        const parsed = parseCallArguments(slot.args);
        if (typeof parsed === "string") argumentErrors.set(slot.id, parsed);
        const call: ToolCallPart = {
          type: "tool_call",
          id: slot.id,
          name: slot.name,
          arguments: typeof parsed === "string" ? {} : parsed,
        };
        content.push(call);
        toolCalls.push(call);
      } else {
        if (slot.type === "text") text += slot.text;
        content.push({ ...slot });
      }
    }

    return { content, toolCalls, argumentErrors, text, usage: { ...this.usage } };
  }

  private openCall(id: string, name: string): PendingCall {
    const call: PendingCall = { type: "pending_call", id, name, args: "" };
    this.calls.set(id, call);
    this.slots.push(call);
    return call;
  }
}

/** Parsed arguments, or an error message. An empty fragment stream means no arguments. */
function parseCallArguments(raw: string): Record<string, unknown> | string {
  if (!raw.trim()) return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return `Invalid JSON arguments: ${err instanceof Error ? err.message : String(err)}`;
  }
  if (!isRecord(value)) return "Invalid JSON arguments: expected an object";
  return value;
}
