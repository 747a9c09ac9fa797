/**
 * Google Gemini `contents` mapping.
 *
 * Gemini differences from the canonical model:
 *   - role "assistant" → "model"; tool results travel in a "user" turn
 *   - tool calls are `functionCall` parts with object args
 *   - tool results are `functionResponse` parts keyed by the *function name*,
 *     so the name of the originating call is looked up from earlier messages
 *   - reasoning traces are text parts flagged `thought: true`
 *
 * Consecutive same-role turns are NOT merged here; the transport does that
 * if the endpoint insists on strict alternation.
 */
import type { CanonicalMessage, ContentPart, ThinkingPart, ToolCallPart } from "../messages/types.js";
import { isRecord, stringField, parseArguments } from "./guards.js";
import type { GeminiContent, GeminiPart } from "./types.js";

const UNKNOWN_TOOL = "unknown_tool";

function toPart(part: ContentPart, callNames: Map<string, string>): GeminiPart {
  switch (part.type) {
    case "text":
      return { text: part.text };
    case "thinking": {
      const p: GeminiPart = { text: part.text, thought: true };
      if (part.signature !== undefined) p.thoughtSignature = part.signature;
      return p;
    }
    case "tool_call":
      return { functionCall: { id: part.id, name: part.name, args: part.arguments } };
    case "tool_result":
      return {
        functionResponse: {
          id: part.toolCallId,
          name: callNames.get(part.toolCallId) ?? UNKNOWN_TOOL,
          response: part.isError ? { error: part.content } : { result: part.content },
        },
      };
  }
}

export function convertToGoogle(messages: readonly CanonicalMessage[]): GeminiContent[] {
  const callNames = new Map<string, string>();
  for (const m of messages) {
    for (const p of m.content) {
      if (p.type === "tool_call") callNames.set(p.id, p.name);
    }
  }
  return messages.map((m): GeminiContent => ({
    role: m.role === "assistant" ? "model" : "user",
    parts: m.content.map((p) => toPart(p, callNames)),
  }));
}

/**
 * Older Gemini models omit call ids. Ids are then derived from the position
 * of the call, and responses are matched to the oldest open call of the same name.
 */
class CallIdTracker {
  private open: Array<{ id: string; name: string }> = [];

  callId(given: string | undefined, name: string, msgIdx: number, partIdx: number): string {
    const id = given ?? `call_${msgIdx}_${partIdx}`;
    this.open.push({ id, name });
    return id;
  }

  responseId(given: string | undefined, name: string): string {
    const idx = given !== undefined
      ? this.open.findIndex((c) => c.id === given)
      : this.open.findIndex((c) => c.name === name);
    if (idx >= 0) {
      const [call] = this.open.splice(idx, 1);
      return call.id;
    }
    return given ?? "";
  }
}

function responseContent(response: unknown): { content: string; isError: boolean } {
  if (!isRecord(response)) return { content: "", isError: false };
  const error = response.error;
  if (error !== undefined) {
    return { content: typeof error === "string" ? error : JSON.stringify(error), isError: true };
  }
  const keys = Object.keys(response);
  if (keys.length === 1 && typeof response.result === "string") {
    return { content: response.result, isError: false };
  }
  return { content: JSON.stringify(response), isError: false };
}

export function standardizeGoogle(messages: readonly unknown[]): CanonicalMessage[] {
  const ids = new CallIdTracker();
  const out: CanonicalMessage[] = [];

  messages.forEach((m, msgIdx) => {
    if (!isRecord(m)) return;
    if (m.role !== "user" && m.role !== "model") return;

    const content: ContentPart[] = [];
    const parts: unknown[] = Array.isArray(m.parts) ? m.parts : [];
    parts.forEach((p, partIdx) => {
      if (!isRecord(p)) return;
      if (isRecord(p.functionCall)) {
        const fc = p.functionCall;
        const name = stringField(fc, "name") ?? "";
        const call: ToolCallPart = {
          type: "tool_call",
          id: ids.callId(stringField(fc, "id"), name, msgIdx, partIdx),
          name,
          arguments: parseArguments(fc.args),
        };
        content.push(call);
      } else if (isRecord(p.functionResponse)) {
        const fr = p.functionResponse;
        const { content: text, isError } = responseContent(fr.response);
        content.push({
          type: "tool_result",
          toolCallId: ids.responseId(stringField(fr, "id"), stringField(fr, "name") ?? ""),
          content: text,
          isError,
        });
      } else if (typeof p.text === "string") {
        if (p.thought === true) {
          const part: ThinkingPart = { type: "thinking", text: p.text };
          const signature = stringField(p, "thoughtSignature");
          if (signature !== undefined) part.signature = signature;
          content.push(part);
        } else {
          content.push({ type: "text", text: p.text });
        }
      }
      // inlineData / fileData parts have no canonical counterpart
    });

    const isToolMessage = m.role === "user"
      && content.length > 0
      && content.every((p) => p.type === "tool_result");
    out.push({ role: m.role === "model" ? "assistant" : isToolMessage ? "tool" : "user", content });
  });

  return out;
}
