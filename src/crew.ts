/**
 * Process-level wiring: one root tool registry (built-ins + MCP tools), one
 * store, one agent roster; any number of conversations opened on top.
 */
import type { AgentDefinition } from "./agents/agent.js";
import { BackendConnection } from "./backend/connection.js";
import type { BackendAdapter } from "./backend/types.js";
import { loadAgentDefinitions, loadConfig, loadMcpServers } from "./config.js";
import type { CrewlineConfig } from "./config.js";
import { Conversation } from "./conversation/conversation.js";
import type { TurnObserver } from "./conversation/turn-runner.js";
import { crewError } from "./errors.js";
import { Logger } from "./logger.js";
import { McpManager } from "./mcp/client.js";
import { FileConversationStore } from "./session.js";
import type { ConversationStore } from "./session.js";
import { registerClockTool } from "./tools/clock.js";
import { ToolRegistry } from "./tools/registry.js";

export interface CrewOptions {
  adapter: BackendAdapter;
  config?: CrewlineConfig;
  /** Overrides the agents file named by the config. */
  agents?: AgentDefinition[];
  store?: ConversationStore;
  mcp?: McpManager;
  observer?: TurnObserver;
  /** Clock source for the built-in clock tool. */
  now?: () => Date;
}

export class Crew {
  constructor(
    readonly config: CrewlineConfig,
    readonly tools: ToolRegistry,
    readonly mcp: McpManager,
    readonly store: ConversationStore,
    readonly agents: readonly AgentDefinition[],
    private readonly adapter: BackendAdapter,
    private readonly observer: TurnObserver | undefined,
  ) {}

  /** Open a conversation. Each gets its own connection, agent registry and log. */
  conversation(id?: string): Conversation {
    return new Conversation({
      connection: new BackendConnection(this.adapter),
      tools: this.tools,
      agents: [...this.agents],
      store: this.store,
      id,
      maxToolRounds: this.config.maxToolRounds,
      observer: this.observer,
    });
  }

  async close(): Promise<void> {
    await this.mcp.disconnectAll();
  }
}

export async function createCrew(opts: CrewOptions): Promise<Crew> {
  const config = opts.config ?? loadConfig();
  Logger.setVerbose(config.verbose);

  const agents = opts.agents ?? (config.agentsFile ? loadAgentDefinitions(config.agentsFile) : []);
  if (agents.length === 0) {
    throw crewError("config_error", "No agents configured; set CREWLINE_AGENTS or pass agents explicitly");
  }

  const tools = new ToolRegistry();
  registerClockTool(tools, opts.now);

  const mcp = opts.mcp ?? new McpManager();
  if (config.mcpConfigFile) {
    await mcp.connectAll(loadMcpServers(config.mcpConfigFile));
  }
  const mcpTools = mcp.registerTools(tools);
  if (mcpTools.length > 0) Logger.debug(`MCP tools: ${mcpTools.join(", ")}`);

  const store = opts.store ?? new FileConversationStore(config.dataDir);
  return new Crew(config, tools, mcp, store, agents, opts.adapter, opts.observer);
}
