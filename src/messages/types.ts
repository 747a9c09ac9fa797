export type Role = "user" | "assistant" | "tool";

export interface TextPart {
  type: "text";
  text: string;
}

export interface ToolCallPart {
  type: "tool_call";
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultPart {
  type: "tool_result";
  /** Id of the tool_call this result answers. */
  toolCallId: string;
  content: string;
  isError: boolean;
}

export interface ThinkingPart {
  type: "thinking";
  text: string;
  /** Provider-issued signature that must travel back with the block (Anthropic, Gemini). */
  signature?: string;
}

export type ContentPart = TextPart | ToolCallPart | ToolResultPart | ThinkingPart;

/**
 * Backend-agnostic representation of one conversation entry.
 * Order inside `content` is significant and survives every wire format that can carry it.
 */
export interface CanonicalMessage {
  role: Role;
  content: ContentPart[];
  /** Name of the agent that owns this message. */
  agent?: string;
  /** Set on the user-role brief a target agent receives when a task is transferred to it. */
  handoffFrom?: string;
}
