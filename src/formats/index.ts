/**
 * Format adapter. Converts canonical messages to and from each backend's
 * wire schema. Pure functions keyed by provider; nothing here throws on
 * malformed input, it degrades to empty content instead.
 */
import type { CanonicalMessage } from "../messages/types.js";
import { convertToAnthropic, standardizeAnthropic } from "./anthropic.js";
import { convertToGoogle, standardizeGoogle } from "./google.js";
import { convertToOpenAi, standardizeOpenAi } from "./openai.js";
import { wireFormatOf } from "./types.js";
import type { Provider, WireFormat, WireMessage } from "./types.js";

export * from "./types.js";
export * from "./tool-definitions.js";
export { convertToAnthropic, standardizeAnthropic } from "./anthropic.js";
export { convertToGoogle, standardizeGoogle } from "./google.js";
export { convertToOpenAi, standardizeOpenAi, ERROR_PREFIX } from "./openai.js";

/**
 * Wire messages → canonical messages. Every produced message is stamped with
 * `agentName` when given.
 */
export function standardize(
  messages: readonly unknown[],
  provider: Provider,
  agentName?: string,
): CanonicalMessage[] {
  const out = standardizeFormat(messages, wireFormatOf(provider));
  if (agentName === undefined) return out;
  return out.map((m) => ({ ...m, agent: agentName }));
}

function standardizeFormat(messages: readonly unknown[], format: WireFormat): CanonicalMessage[] {
  switch (format) {
    case "anthropic": return standardizeAnthropic(messages);
    case "openai": return standardizeOpenAi(messages);
    case "google": return standardizeGoogle(messages);
  }
}

/** Canonical messages → the provider's wire messages. */
export function convert(messages: readonly CanonicalMessage[], provider: Provider): WireMessage[] {
  switch (wireFormatOf(provider)) {
    case "anthropic": return convertToAnthropic(messages);
    case "openai": return convertToOpenAi(messages);
    case "google": return convertToGoogle(messages);
  }
}
