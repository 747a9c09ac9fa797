/**
 * OpenAI chat-completions mapping (also used for Groq, xAI and local servers).
 *
 * - Assistant tool calls travel in a sibling `tool_calls` array with
 *   stringified-JSON arguments, so text after a tool call loses its position
 * - Each tool result is its own `role: "tool"` message
 * - There is no error field: errors are marked with an "ERROR: " prefix
 * - There is no reasoning trace: thinking parts are dropped
 */
import type { CanonicalMessage, ContentPart, ToolCallPart } from "../messages/types.js";
import { isRecord, flattenText, stringField, parseArguments } from "./guards.js";
import type { OpenAiMessage, OpenAiTextPart, OpenAiToolCall } from "./types.js";

export const ERROR_PREFIX = "ERROR: ";

function textContent(parts: readonly ContentPart[]): string | OpenAiTextPart[] | null {
  const texts = parts.flatMap((p) => (p.type === "text" ? [p.text] : []));
  if (texts.length === 0) return null;
  if (texts.length === 1) return texts[0];
  return texts.map((text): OpenAiTextPart => ({ type: "text", text }));
}

function toToolCall(part: ToolCallPart): OpenAiToolCall {
  return {
    id: part.id,
    type: "function",
    function: { name: part.name, arguments: JSON.stringify(part.arguments) },
  };
}

export function convertToOpenAi(messages: readonly CanonicalMessage[]): OpenAiMessage[] {
  const out: OpenAiMessage[] = [];
  for (const m of messages) {
    if (m.role === "tool") {
      for (const p of m.content) {
        if (p.type !== "tool_result") continue;
        out.push({
          role: "tool",
          tool_call_id: p.toolCallId,
          content: p.isError ? ERROR_PREFIX + p.content : p.content,
        });
      }
      continue;
    }

    if (m.role === "assistant") {
      const calls = m.content.flatMap((p) => (p.type === "tool_call" ? [toToolCall(p)] : []));
      const content = textContent(m.content);
      if (calls.length > 0) {
        out.push({ role: "assistant", content, tool_calls: calls });
      } else {
        out.push({ role: "assistant", content: content ?? "" });
      }
      continue;
    }

    out.push({ role: "user", content: textContent(m.content) ?? "" });
  }
  return out;
}

function textParts(content: unknown): ContentPart[] {
  if (typeof content === "string") return [{ type: "text", text: content }];
  if (!Array.isArray(content)) return [];
  const parts: ContentPart[] = [];
  for (const item of content) {
    // image_url and audio parts have no canonical counterpart
    if (isRecord(item) && item.type === "text" && typeof item.text === "string") {
      parts.push({ type: "text", text: item.text });
    }
  }
  return parts;
}

function fromToolCall(raw: unknown): ToolCallPart | null {
  if (!isRecord(raw)) return null;
  const fn = isRecord(raw.function) ? raw.function : {};
  return {
    type: "tool_call",
    id: stringField(raw, "id") ?? "",
    name: stringField(fn, "name") ?? "",
    arguments: parseArguments(fn.arguments),
  };
}

export function standardizeOpenAi(messages: readonly unknown[]): CanonicalMessage[] {
  const out: CanonicalMessage[] = [];
  for (const m of messages) {
    if (!isRecord(m)) continue;

    if (m.role === "tool") {
      const raw = flattenText(m.content);
      const isError = raw.startsWith(ERROR_PREFIX);
      out.push({
        role: "tool",
        content: [{
          type: "tool_result",
          toolCallId: stringField(m, "tool_call_id") ?? "",
          content: isError ? raw.slice(ERROR_PREFIX.length) : raw,
          isError,
        }],
      });
      continue;
    }

    if (m.role === "assistant") {
      const calls: ToolCallPart[] = [];
      if (Array.isArray(m.tool_calls)) {
        for (const tc of m.tool_calls) {
          const part = fromToolCall(tc);
          if (part) calls.push(part);
        }
      }
      // "" alongside tool calls is a placeholder, not a text block
      const texts = calls.length > 0 && m.content === "" ? [] : textParts(m.content);
      out.push({ role: "assistant", content: [...texts, ...calls] });
      continue;
    }

    if (m.role === "user") {
      out.push({ role: "user", content: textParts(m.content) });
    }
    // system / developer messages are carried by the backend's system prompt
  }
  return out;
}
