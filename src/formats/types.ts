/**
 * Wire shapes for the backends crewline can talk to, plus the provider → wire
 * format mapping. Only the fields the core reads or writes are modelled.
 */

export type Provider = "anthropic" | "openai" | "groq" | "google" | "xai" | "local";

export type WireFormat = "anthropic" | "openai" | "google";

export const PROVIDERS: readonly Provider[] = ["anthropic", "openai", "groq", "google", "xai", "local"];

/** Groq, xAI and local servers speak the OpenAI chat-completions dialect. */
export function wireFormatOf(provider: Provider): WireFormat {
  switch (provider) {
    case "anthropic": return "anthropic";
    case "google": return "google";
    case "openai":
    case "groq":
    case "xai":
    case "local":
      return "openai";
  }
}

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value);
}

// --- Anthropic Messages API ---

export type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "thinking"; thinking: string; signature?: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicBlock[];
}

// --- OpenAI chat completions ---

export interface OpenAiToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface OpenAiTextPart {
  type: "text";
  text: string;
}

export type OpenAiMessage =
  | { role: "user"; content: string | OpenAiTextPart[] }
  | { role: "assistant"; content: string | OpenAiTextPart[] | null; tool_calls?: OpenAiToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

// --- Google Gemini ---

export interface GeminiPart {
  text?: string;
  /** Marks a reasoning-trace part (Gemini 2.5+). */
  thought?: boolean;
  thoughtSignature?: string;
  functionCall?: { id?: string; name: string; args: Record<string, unknown> };
  functionResponse?: { id?: string; name: string; response: Record<string, unknown> };
}

export interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

export type WireMessage = AnthropicMessage | OpenAiMessage | GeminiContent;
