/**
 * Runtime configuration: environment variables plus the agent definition
 * and MCP server files they point at.
 *
 *   CREWLINE_HOME             data directory (default ~/.crewline)
 *   CREWLINE_MAX_TOOL_ROUNDS  tool-round cap per turn (default 25)
 *   CREWLINE_VERBOSE          "true"/"1" enables verbose logging
 *   CREWLINE_AGENTS           agent definitions (.toml or .json)
 *   CREWLINE_MCP_CONFIG       JSON file with an `mcpServers` map
 */
import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { extname, join } from "node:path";
import { parse as parseToml } from "smol-toml";
import type { AgentDefinition } from "./agents/agent.js";
import { DEFAULT_MAX_TOOL_ROUNDS } from "./conversation/turn-runner.js";
import { crewError, asError, errorLogFields } from "./errors.js";
import { isRecord, stringField } from "./formats/guards.js";
import { Logger } from "./logger.js";
import type { McpServerConfig } from "./mcp/client.js";

export interface CrewlineConfig {
  dataDir: string;
  maxToolRounds: number;
  verbose: boolean;
  agentsFile: string | null;
  mcpConfigFile: string | null;
}

function flag(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function positiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    Logger.warn(`${name}=${value} is not a positive integer; using ${fallback}`);
    return fallback;
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrewlineConfig {
  return {
    dataDir: env.CREWLINE_HOME || join(homedir(), ".crewline"),
    maxToolRounds: positiveInt("CREWLINE_MAX_TOOL_ROUNDS", env.CREWLINE_MAX_TOOL_ROUNDS, DEFAULT_MAX_TOOL_ROUNDS),
    verbose: flag(env.CREWLINE_VERBOSE),
    agentsFile: env.CREWLINE_AGENTS || null,
    mcpConfigFile: env.CREWLINE_MCP_CONFIG || null,
  };
}

function readConfigFile(path: string): string {
  if (!existsSync(path)) {
    throw crewError("config_error", `Config file not found: ${path}`);
  }
  try {
    return readFileSync(path, "utf-8");
  } catch (e: unknown) {
    throw crewError("config_error", `Failed to read ${path}: ${asError(e).message}`, { cause: e });
  }
}

function stringList(value: unknown, where: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw crewError("config_error", `${where}: "tools" must be a list of strings`);
  }
  return value.filter((v): v is string => typeof v === "string");
}

/**
 * Validate raw agent entries: `{ agents: [...] }` or a bare list. Entries with
 * `enabled = false` are skipped; `enabled` defaults to true.
 */
export function parseAgentDefinitions(raw: unknown, source: string): AgentDefinition[] {
  const list: unknown = isRecord(raw) ? raw.agents : raw;
  if (!Array.isArray(list)) {
    throw crewError("config_error", `${source}: expected an "agents" list`);
  }

  const defs: AgentDefinition[] = [];
  const seen = new Set<string>();
  list.forEach((entry: unknown, i: number) => {
    const where = `${source}: agents[${i}]`;
    if (!isRecord(entry)) throw crewError("config_error", `${where} must be a table`);
    const name = stringField(entry, "name")?.trim();
    if (!name) throw crewError("config_error", `${where}: "name" is required`);
    if (seen.has(name)) throw crewError("config_error", `${where}: duplicate agent "${name}"`);
    if (entry.enabled === false) {
      Logger.debug(`agent "${name}" is disabled; skipped`);
      return;
    }
    seen.add(name);
    defs.push({
      name,
      description: stringField(entry, "description") ?? "",
      systemPrompt: stringField(entry, "system_prompt") ?? stringField(entry, "systemPrompt") ?? "",
      tools: stringList(entry.tools, where),
    });
  });
  return defs;
}

/** Load agent definitions from a `.toml` or `.json` file. */
export function loadAgentDefinitions(path: string): AgentDefinition[] {
  const text = readConfigFile(path);
  let raw: unknown;
  try {
    raw = extname(path).toLowerCase() === ".toml" ? parseToml(text) : JSON.parse(text);
  } catch (e: unknown) {
    const ce = crewError("config_error", `Failed to parse ${path}: ${asError(e).message}`, { cause: e });
    Logger.error(ce.message, errorLogFields(ce));
    throw ce;
  }
  return parseAgentDefinitions(raw, path);
}

/**
 * Parse an `mcpServers` map (or a bare server map). Entries without a
 * command are skipped with a warning.
 */
export function parseMcpServers(raw: unknown, source: string): Record<string, McpServerConfig> {
  const map: unknown = isRecord(raw) && isRecord(raw.mcpServers) ? raw.mcpServers : raw;
  if (!isRecord(map)) throw crewError("config_error", `${source}: expected an "mcpServers" object`);

  const servers: Record<string, McpServerConfig> = {};
  for (const [name, entry] of Object.entries(map)) {
    if (!isRecord(entry)) continue;
    const command = stringField(entry, "command");
    if (!command) {
      Logger.warn(`${source}: MCP server "${name}" has no command; skipped`);
      continue;
    }
    const cfg: McpServerConfig = { command };
    if (Array.isArray(entry.args)) cfg.args = entry.args.filter((a): a is string => typeof a === "string");
    if (isRecord(entry.env)) {
      const env: Record<string, string> = {};
      for (const [k, v] of Object.entries(entry.env)) {
        if (typeof v === "string") env[k] = v;
      }
      cfg.env = env;
    }
    const cwd = stringField(entry, "cwd");
    if (cwd) cfg.cwd = cwd;
    if (typeof entry.timeout === "number" && entry.timeout > 0) cfg.timeout = entry.timeout;
    servers[name] = cfg;
  }
  return servers;
}

export function loadMcpServers(path: string): Record<string, McpServerConfig> {
  const text = readConfigFile(path);
  try {
    return parseMcpServers(JSON.parse(text), path);
  } catch (e: unknown) {
    if (e instanceof SyntaxError) {
      throw crewError("config_error", `Failed to parse ${path}: ${e.message}`, { cause: e });
    }
    throw e;
  }
}
