/**
 * Runtime checks for canonical messages read back from storage.
 * Invalid parts and messages are dropped, never coerced.
 */
import { isRecord, stringField } from "../formats/guards.js";
import type { CanonicalMessage, ContentPart, Role } from "./types.js";

const ROLES: readonly Role[] = ["user", "assistant", "tool"];

function isRole(v: unknown): v is Role {
  return typeof v === "string" && ROLES.some((r) => r === v);
}

export function parseContentPart(raw: unknown): ContentPart | null {
  if (!isRecord(raw)) return null;
  switch (raw.type) {
    case "text": {
      const text = stringField(raw, "text");
      return text === undefined ? null : { type: "text", text };
    }
    case "thinking": {
      const text = stringField(raw, "text");
      if (text === undefined) return null;
      const signature = stringField(raw, "signature");
      return signature === undefined ? { type: "thinking", text } : { type: "thinking", text, signature };
    }
    case "tool_call": {
      const id = stringField(raw, "id");
      const name = stringField(raw, "name");
      if (id === undefined || name === undefined) return null;
      return { type: "tool_call", id, name, arguments: isRecord(raw.arguments) ? raw.arguments : {} };
    }
    case "tool_result": {
      const toolCallId = stringField(raw, "toolCallId");
      if (toolCallId === undefined) return null;
      return {
        type: "tool_result",
        toolCallId,
        content: stringField(raw, "content") ?? "",
        isError: raw.isError === true,
      };
    }
    default:
      return null;
  }
}

export function parseCanonicalMessage(raw: unknown): CanonicalMessage | null {
  if (!isRecord(raw) || !isRole(raw.role) || !Array.isArray(raw.content)) return null;
  const content: ContentPart[] = [];
  for (const p of raw.content) {
    const part = parseContentPart(p);
    if (part) content.push(part);
  }
  const msg: CanonicalMessage = { role: raw.role, content };
  const agent = stringField(raw, "agent");
  if (agent !== undefined) msg.agent = agent;
  const handoffFrom = stringField(raw, "handoffFrom");
  if (handoffFrom !== undefined) msg.handoffFrom = handoffFrom;
  return msg;
}

export function parseCanonicalMessages(raw: unknown): CanonicalMessage[] {
  if (!Array.isArray(raw)) return [];
  const out: CanonicalMessage[] = [];
  for (const m of raw) {
    const msg = parseCanonicalMessage(m);
    if (msg) out.push(msg);
  }
  return out;
}
