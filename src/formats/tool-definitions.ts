/**
 * Provider-neutral tool schemas and their per-provider renderings.
 *
 * OpenAI:    { type: "function", function: { name, description, parameters } }
 * Anthropic: { name, description, input_schema }
 * Gemini:    { name, description, parameters }  (wrapped in functionDeclarations by the transport)
 */
import { isRecord, stringField } from "./guards.js";
import { wireFormatOf } from "./types.js";
import type { Provider } from "./types.js";

export type JsonSchema = Record<string, unknown>;

export interface ToolSpec {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export interface OpenAiToolDefinition {
  type: "function";
  function: { name: string; description: string; parameters: JsonSchema };
}

export interface AnthropicToolDefinition {
  name: string;
  description: string;
  input_schema: JsonSchema;
}

export interface GeminiFunctionDeclaration {
  name: string;
  description: string;
  parameters: JsonSchema;
}

export type BackendToolDefinition =
  | OpenAiToolDefinition
  | AnthropicToolDefinition
  | GeminiFunctionDeclaration;

const EMPTY_SCHEMA: JsonSchema = { type: "object", properties: {} };

export function renderToolDefinition(spec: ToolSpec, provider: Provider): BackendToolDefinition {
  const parameters = typeof spec.parameters.type === "string" ? spec.parameters : EMPTY_SCHEMA;
  switch (wireFormatOf(provider)) {
    case "anthropic":
      return { name: spec.name, description: spec.description, input_schema: parameters };
    case "google":
      return { name: spec.name, description: spec.description, parameters };
    case "openai":
      return { type: "function", function: { name: spec.name, description: spec.description, parameters } };
  }
}

/** Definition factory for a tool whose schema does not depend on the provider. */
export function definitionFromSpec(spec: ToolSpec): (provider: Provider) => BackendToolDefinition {
  return (provider) => renderToolDefinition(spec, provider);
}

/** Extract the tool name from a definition regardless of its format. */
export function toolNameOf(def: BackendToolDefinition): string {
  if ("function" in def) return def.function.name;
  return def.name;
}

/** Normalize an arbitrary tool definition object (e.g. from an MCP server or a config file) to a ToolSpec. */
export function toolSpecFrom(raw: unknown): ToolSpec | null {
  if (!isRecord(raw)) return null;
  const fn = isRecord(raw.function) ? raw.function : raw;
  const name = stringField(fn, "name");
  if (!name) return null;
  const schema = fn.parameters ?? fn.input_schema ?? fn.inputSchema;
  return {
    name,
    description: stringField(fn, "description") ?? "",
    parameters: isRecord(schema) ? schema : EMPTY_SCHEMA,
  };
}
