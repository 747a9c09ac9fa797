export * from "./messages/index.js";
export { parseCanonicalMessage, parseCanonicalMessages } from "./messages/validate.js";
export * from "./formats/index.js";
export * from "./tools/types.js";
export { ToolRegistry } from "./tools/registry.js";
export { CLOCK_TOOL_NAME, clockHandler, clockToolSpec, registerClockTool } from "./tools/clock.js";
export type { ClockReading } from "./tools/clock.js";
export {
  TRANSFER_TOOL_NAME,
  renderTransferBrief,
  transferBriefMessage,
  transferDefinition,
  transferHandler,
  transferToolSpec,
} from "./tools/transfer.js";
export * from "./backend/types.js";
export { BackendConnection } from "./backend/connection.js";
export { Agent } from "./agents/agent.js";
export type { AgentDefinition, AgentState, HistoryEntry, ResolvedTool } from "./agents/agent.js";
export { AgentRegistry } from "./agents/registry.js";
export type { AgentRegistryOptions, SelectResult, TransferRecord, TransferResult } from "./agents/registry.js";
export { renderHandoffPrompt, composeSystemPrompt, PROMPT_SEPARATOR } from "./agents/prompts.js";
export { MessageLog } from "./conversation/message-log.js";
export { StreamAccumulator } from "./conversation/stream-accumulator.js";
export type { AccumulatedRound } from "./conversation/stream-accumulator.js";
export { TurnIndex } from "./conversation/turn-index.js";
export type { Turn } from "./conversation/turn-index.js";
export { runTurn, DEFAULT_MAX_TOOL_ROUNDS } from "./conversation/turn-runner.js";
export type { TurnHost, TurnObserver, TurnOptions, TurnResult } from "./conversation/turn-runner.js";
export { Conversation } from "./conversation/conversation.js";
export type { ConversationOptions } from "./conversation/conversation.js";
export {
  FileConversationStore,
  MemoryConversationStore,
  newConversationId,
  repairConversation,
  repairToolPairs,
} from "./session.js";
export type { ConversationMeta, ConversationStore, StoredConversation } from "./session.js";
export { McpManager } from "./mcp/client.js";
export type { McpServerConfig, McpTool } from "./mcp/client.js";
export { loadConfig, loadAgentDefinitions, parseAgentDefinitions, loadMcpServers, parseMcpServers } from "./config.js";
export type { CrewlineConfig } from "./config.js";
export { Crew, createCrew } from "./crew.js";
export type { CrewOptions } from "./crew.js";
export { Logger, C } from "./logger.js";
export { crewError, asError, isCrewError, isAbortError, errorLogFields } from "./errors.js";
export type { CrewError, CrewErrorKind } from "./errors.js";
