/**
 * MCP client: connects to MCP servers, discovers tools, routes tool calls.
 * Accepts the `mcpServers` config shape used by common MCP hosts.
 *
 * Discovered tools are exposed through the tool registry with the same
 * handler contract as local tools, so the conversation loop cannot tell
 * them apart.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { Logger } from "../logger.js";
import { crewError, asError, errorLogFields, isCrewError } from "../errors.js";
import { isRecord } from "../formats/guards.js";
import { definitionFromSpec } from "../formats/tool-definitions.js";
import type { JsonSchema } from "../formats/tool-definitions.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolHandler } from "../tools/types.js";

export interface McpServerConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** Tool call timeout in ms. Default: 10 minutes. */
  timeout?: number;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  /** Which MCP server provides this tool. */
  serverName: string;
}

interface ConnectedServer {
  name: string;
  client: Client;
  tools: McpTool[];
  timeout: number;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const EMPTY_SCHEMA: JsonSchema = { type: "object", properties: {} };

function childEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...extra };
}

function stdioTransport(cfg: McpServerConfig): () => Transport {
  return () => new StdioClientTransport({
    command: cfg.command,
    args: cfg.args ?? [],
    env: childEnv(cfg.env),
    cwd: cfg.cwd,
    stderr: "pipe",
  });
}

function isDisconnect(err: Error): boolean {
  return err.message.includes("Not connected") || err.message.includes("Connection closed");
}

/** Flatten an MCP tool result's content list into text. */
function resultText(content: unknown): string {
  if (!Array.isArray(content)) return JSON.stringify(content ?? null);
  return content
    .map((c: unknown) => (isRecord(c) && c.type === "text" && typeof c.text === "string" ? c.text : JSON.stringify(c)))
    .join("\n");
}

interface McpToolBinding {
  manager: McpManager;
  tool: string;
}

function mcpToolHandler(binding: McpToolBinding): ToolHandler {
  return (args, ctx) => binding.manager.callTool(binding.tool, args, ctx.signal);
}

export class McpManager {
  private servers = new Map<string, ConnectedServer>();
  private factories = new Map<string, () => Transport>();
  private timeouts = new Map<string, number>();

  /**
   * Connect to all configured stdio MCP servers and discover their tools.
   * A server that fails to connect is logged and skipped.
   */
  async connectAll(configs: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(configs);
    if (entries.length === 0) return;

    Logger.debug(`Connecting to ${entries.length} MCP server(s)...`);

    await Promise.all(
      entries.map(([name, cfg]) =>
        this.connect(name, stdioTransport(cfg), cfg.timeout).catch((e: unknown) => {
          const ce = crewError("mcp_error", `MCP server "${name}" failed to connect: ${asError(e).message}`, {
            retryable: true,
            cause: e,
          });
          Logger.warn(ce.message, errorLogFields(ce));
        }),
      ),
    );
  }

  /**
   * Connect one server over a caller-supplied transport. Pass a factory to
   * allow reconnects; a bare transport cannot be reopened once closed.
   */
  async connect(name: string, transport: Transport | (() => Transport), timeout = DEFAULT_TIMEOUT_MS): Promise<McpTool[]> {
    if (typeof transport === "function") this.factories.set(name, transport);
    this.timeouts.set(name, timeout);
    const client = new Client({ name: "crewline", version: "0.1.0" }, { capabilities: {} });
    await client.connect(typeof transport === "function" ? transport() : transport);

    const listed = await client.listTools();
    const tools: McpTool[] = listed.tools.map((t) => ({
      name: t.name,
      description: t.description ?? "",
      inputSchema: isRecord(t.inputSchema) ? t.inputSchema : EMPTY_SCHEMA,
      serverName: name,
    }));

    this.servers.set(name, { name, client, tools, timeout });
    Logger.debug(`MCP "${name}": ${tools.length} tool(s) available`);
    return tools;
  }

  /**
   * Reconnect a single MCP server: closes the old connection and opens a fresh one.
   */
  private async reconnectServer(name: string): Promise<void> {
    const factory = this.factories.get(name);
    if (!factory) throw crewError("mcp_error", `MCP server "${name}" cannot be reconnected`);
    const old = this.servers.get(name);
    if (old) {
      this.servers.delete(name);
      await old.client.close().catch((e: unknown) => {
        Logger.debug(`MCP server "${name}" close error: ${asError(e).message}`);
      });
    }
    Logger.info(`MCP "${name}": reconnecting...`);
    await this.connect(name, factory, this.timeouts.get(name));
    Logger.info(`MCP "${name}": reconnected`);
  }

  tools(): McpTool[] {
    return Array.from(this.servers.values(), (s) => s.tools).flat();
  }

  /**
   * Register every discovered tool. Names already present in the registry
   * keep their existing registration.
   */
  registerTools(registry: ToolRegistry): string[] {
    const registered: string[] = [];
    for (const tool of this.tools()) {
      if (registry.has(tool.name)) {
        Logger.warn(`MCP tool "${tool.name}" (server: ${tool.serverName}) shadows an existing tool; skipped`);
        continue;
      }
      registry.register(
        tool.name,
        definitionFromSpec({ name: tool.name, description: tool.description, parameters: tool.inputSchema }),
        mcpToolHandler,
        { manager: this, tool: tool.name },
      );
      registered.push(tool.name);
    }
    return registered;
  }

  /**
   * Execute a tool call by routing it to the server that provides it.
   * On disconnect errors, reconnects once and retries.
   */
  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const server = Array.from(this.servers.values()).find((s) => s.tools.some((t) => t.name === name));
    if (!server) {
      const ce = crewError("mcp_error", `No MCP server provides tool "${name}"`, { retryable: false });
      Logger.error(ce.message, errorLogFields(ce));
      throw ce;
    }
    const serverName = server.name;

    const attempt = async (): Promise<string> => {
      const current = this.servers.get(serverName);
      if (!current) throw crewError("mcp_error", `MCP server "${serverName}" is not connected`);
      const result = await current.client.callTool(
        { name, arguments: args },
        undefined,
        { timeout: current.timeout, signal },
      );
      const raw: unknown = result;
      const text = resultText(isRecord(raw) ? raw.content : undefined);
      if (isRecord(raw) && raw.isError === true) {
        throw crewError("tool_error", text || `MCP tool "${name}" reported an error`);
      }
      return text;
    };

    try {
      return await attempt();
    } catch (e: unknown) {
      const err = asError(e);
      if (isDisconnect(err) && this.factories.has(serverName)) {
        Logger.warn(`MCP "${serverName}": disconnected, reconnecting and retrying ${name}...`);
        try {
          await this.reconnectServer(serverName);
          return await attempt();
        } catch (retryErr: unknown) {
          const ce = crewError("mcp_error", `MCP tool "${name}" (server: ${serverName}) failed after reconnect: ${asError(retryErr).message}`, {
            retryable: true,
            cause: retryErr,
          });
          Logger.error(`MCP tool call failed [${serverName}/${name}]:`, errorLogFields(ce));
          throw ce;
        }
      }
      const ce = crewError("mcp_error", `MCP tool "${name}" (server: ${serverName}) failed: ${err.message}`, {
        retryable: !(isCrewError(e) && e.kind === "tool_error"),
        cause: e,
      });
      Logger.error(`MCP tool call failed [${serverName}/${name}]:`, errorLogFields(ce));
      throw ce;
    }
  }

  /**
   * Check if a tool name is provided by any connected MCP server.
   */
  hasTool(name: string): boolean {
    return this.tools().some((t) => t.name === name);
  }

  /**
   * Disconnect all MCP servers.
   */
  async disconnectAll(): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.client.close();
      } catch (e: unknown) {
        Logger.debug(`MCP server "${server.name}" close error: ${asError(e).message}`);
      }
    }
    this.servers.clear();
  }
}
