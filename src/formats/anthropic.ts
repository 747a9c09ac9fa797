/**
 * Anthropic Messages API mapping.
 *
 * Key differences from the canonical model:
 * - Tool calls are `tool_use` blocks inside the assistant content list
 * - Tool results are `tool_result` blocks inside a *user* message
 * - Thinking blocks carry a signature that must be sent back verbatim
 */
import type { CanonicalMessage, ContentPart, ThinkingPart } from "../messages/types.js";
import { isRecord, flattenText, stringField, parseArguments } from "./guards.js";
import type { AnthropicBlock, AnthropicMessage } from "./types.js";

function toBlock(part: ContentPart): AnthropicBlock {
  switch (part.type) {
    case "text":
      return { type: "text", text: part.text };
    case "thinking":
      return part.signature !== undefined
        ? { type: "thinking", thinking: part.text, signature: part.signature }
        : { type: "thinking", thinking: part.text };
    case "tool_call":
      return { type: "tool_use", id: part.id, name: part.name, input: part.arguments };
    case "tool_result":
      return part.isError
        ? { type: "tool_result", tool_use_id: part.toolCallId, content: part.content, is_error: true }
        : { type: "tool_result", tool_use_id: part.toolCallId, content: part.content };
  }
}

export function convertToAnthropic(messages: readonly CanonicalMessage[]): AnthropicMessage[] {
  return messages.map((m): AnthropicMessage => ({
    role: m.role === "assistant" ? "assistant" : "user",
    content: m.content.map(toBlock),
  }));
}

function fromBlock(block: unknown): ContentPart | null {
  if (!isRecord(block)) return null;
  switch (block.type) {
    case "text":
      return { type: "text", text: stringField(block, "text") ?? "" };
    case "thinking": {
      const part: ThinkingPart = { type: "thinking", text: stringField(block, "thinking") ?? "" };
      const signature = stringField(block, "signature");
      if (signature !== undefined) part.signature = signature;
      return part;
    }
    case "tool_use":
      return {
        type: "tool_call",
        id: stringField(block, "id") ?? "",
        name: stringField(block, "name") ?? "",
        arguments: parseArguments(block.input),
      };
    case "tool_result":
      return {
        type: "tool_result",
        toolCallId: stringField(block, "tool_use_id") ?? "",
        content: flattenText(block.content),
        isError: block.is_error === true,
      };
    default:
      // images, documents, redacted thinking: no canonical counterpart
      return null;
  }
}

export function standardizeAnthropic(messages: readonly unknown[]): CanonicalMessage[] {
  const out: CanonicalMessage[] = [];
  for (const m of messages) {
    if (!isRecord(m)) continue;
    if (m.role !== "user" && m.role !== "assistant") continue;

    const content: ContentPart[] = [];
    if (typeof m.content === "string") {
      content.push({ type: "text", text: m.content });
    } else if (Array.isArray(m.content)) {
      for (const block of m.content) {
        const part = fromBlock(block);
        if (part) content.push(part);
      }
    }

    // A user message made only of tool_result blocks is a tool message
    const isToolMessage = m.role === "user"
      && content.length > 0
      && content.every((p) => p.type === "tool_result");
    out.push({ role: m.role === "assistant" ? "assistant" : isToolMessage ? "tool" : "user", content });
  }
  return out;
}
