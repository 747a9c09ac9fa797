import type {
  CanonicalMessage,
  ContentPart,
  TextPart,
  ThinkingPart,
  ToolCallPart,
  ToolResultPart,
} from "./types.js";

export type {
  CanonicalMessage,
  ContentPart,
  Role,
  TextPart,
  ThinkingPart,
  ToolCallPart,
  ToolResultPart,
} from "./types.js";

export function textPart(text: string): TextPart {
  return { type: "text", text };
}

export function userMessage(text: string, agent?: string): CanonicalMessage {
  const msg: CanonicalMessage = { role: "user", content: [textPart(text)] };
  if (agent !== undefined) msg.agent = agent;
  return msg;
}

export function assistantMessage(content: ContentPart[], agent?: string): CanonicalMessage {
  const msg: CanonicalMessage = { role: "assistant", content };
  if (agent !== undefined) msg.agent = agent;
  return msg;
}

export function toolResultMessage(
  toolCallId: string,
  content: string,
  isError: boolean,
  agent?: string,
): CanonicalMessage {
  const msg: CanonicalMessage = {
    role: "tool",
    content: [{ type: "tool_result", toolCallId, content, isError }],
  };
  if (agent !== undefined) msg.agent = agent;
  return msg;
}

export function isTextPart(p: ContentPart): p is TextPart {
  return p.type === "text";
}

export function isToolCallPart(p: ContentPart): p is ToolCallPart {
  return p.type === "tool_call";
}

export function isToolResultPart(p: ContentPart): p is ToolResultPart {
  return p.type === "tool_result";
}

export function isThinkingPart(p: ContentPart): p is ThinkingPart {
  return p.type === "thinking";
}

/** Concatenated text parts of a message. */
export function messageText(msg: CanonicalMessage, separator = ""): string {
  return msg.content.filter(isTextPart).map((p) => p.text).join(separator);
}

export function toolCallsOf(msg: CanonicalMessage): ToolCallPart[] {
  return msg.content.filter(isToolCallPart);
}

/** A user message typed by a person, as opposed to a tool result or a handoff brief. */
export function isUserInput(msg: CanonicalMessage): boolean {
  return msg.role === "user"
    && msg.handoffFrom === undefined
    && msg.content.some(isTextPart);
}

/** Short single-line preview, used by turn listings and log lines. */
export function preview(msg: CanonicalMessage, max = 80): string {
  const text = messageText(msg, " ").trim().replace(/\s+/g, " ");
  return text.length > max ? text.slice(0, max - 3) + "..." : text;
}
