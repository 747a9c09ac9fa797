/**
 * Turn execution: stream a response, run the tool calls it asks for, feed the
 * results back, repeat until a round ends without tool calls.
 *
 * Written as a bounded loop. The acting agent and its connection are
 * re-resolved at the top of every round, since a transfer may have switched
 * them in the previous one.
 */
import type { AgentRegistry } from "../agents/registry.js";
import type { DecodedDelta } from "../backend/types.js";
import { crewError, asError, errorLogFields, isAbortError } from "../errors.js";
import type { CrewError } from "../errors.js";
import { Logger } from "../logger.js";
import { messageText, toolResultMessage } from "../messages/index.js";
import type { CanonicalMessage, ToolCallPart, ToolResultPart } from "../messages/types.js";
import { TRANSFER_TOOL_NAME, transferBriefMessage } from "../tools/transfer.js";
import type { ToolHandler, ToolOutput } from "../tools/types.js";
import { StreamAccumulator } from "./stream-accumulator.js";
import type { AccumulatedRound } from "./stream-accumulator.js";

export const DEFAULT_MAX_TOOL_ROUNDS = 25;

export interface TurnResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
  /** Backend calls made during the turn. */
  rounds: number;
  /** Agent that produced the final response. */
  agent: string;
  /** True when the round cap was hit while the model still wanted tools. */
  exhausted: boolean;
}

export interface TurnObserver {
  onText?(text: string, agent: string): void;
  onThinking?(text: string, agent: string): void;
  onToolCall?(call: ToolCallPart, agent: string): void;
  onToolResult?(result: ToolResultPart, agent: string): void;
  onAgentChanged?(from: string, to: string): void;
  onError?(error: CrewError): void;
}

/** What the loop needs from its conversation. */
export interface TurnHost {
  readonly agents: AgentRegistry;
  /** Append to the canonical log (and the owner's history); returns the index. */
  append(message: CanonicalMessage): number;
}

export interface TurnOptions {
  maxToolRounds?: number;
  observer?: TurnObserver;
  signal?: AbortSignal;
}

const INTERRUPTED = "[Turn cancelled before this tool call completed.]";

export async function runTurn(host: TurnHost, opts: TurnOptions = {}): Promise<TurnResult | null> {
  const maxRounds = Math.max(1, opts.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS);
  const { observer, signal } = opts;
  let inputTokens = 0;
  let outputTokens = 0;
  let lastText = "";

  for (let round = 0; round < maxRounds; round++) {
    if (signal?.aborted) return cancelled(observer, host.agents.current?.name);

    const agent = host.agents.current;
    if (!agent) {
      const err = crewError("config_error", "No agent is registered");
      observer?.onError?.(err);
      throw err;
    }
    const connection = host.agents.backend;
    // Handlers as bound when the round starts; a mid-batch transfer does not change them.
    const handlers = connection.handlers();

    Logger.debug(`[turn] round ${round + 1}/${maxRounds} agent=${agent.name} provider=${connection.provider}`);

    const collected = await consumeStream(
      () => connection.openStream(agent.messages(), signal),
      agent.name,
      observer,
      signal,
    );
    if (collected === "cancelled") return cancelled(observer, agent.name);
    if (collected === null) return null;

    inputTokens += collected.usage.inputTokens;
    outputTokens += collected.usage.outputTokens;
    lastText = collected.text;

    if (collected.toolCalls.length === 0) {
      if (!collected.content.some((p) => p.type === "text")) {
        // Some backends reject an empty assistant content block.
        collected.content.push({ type: "text", text: " " });
      }
      const final: CanonicalMessage = { role: "assistant", content: collected.content, agent: agent.name };
      host.append(final);
      return {
        text: messageText(final),
        inputTokens,
        outputTokens,
        rounds: round + 1,
        agent: agent.name,
        exhausted: false,
      };
    }

    host.append({ role: "assistant", content: collected.content, agent: agent.name });

    let transferred = false;
    let interrupted = false;
    for (const call of collected.toolCalls) {
      if (interrupted || signal?.aborted) {
        interrupted = true;
        appendResult(host, observer, agent.name, call.id, INTERRUPTED, true);
        continue;
      }
      observer?.onToolCall?.(call, agent.name);

      const argError = collected.argumentErrors.get(call.id);
      if (argError !== undefined) {
        appendResult(host, observer, agent.name, call.id, `Error: ${argError}`, true);
        continue;
      }
      if (call.name === TRANSFER_TOOL_NAME && transferred) {
        appendResult(host, observer, agent.name, call.id,
          "Error: the task was already transferred in this round; only one transfer per round is carried out.", true);
        continue;
      }
      const handler = handlers.get(call.name);
      if (!handler) {
        appendResult(host, observer, agent.name, call.id,
          `Error: tool '${call.name}' is not available to agent '${agent.name}'`, true);
        continue;
      }

      const outcome = await invoke(handler, call, agent.name, signal);
      if (outcome.cancelled) {
        interrupted = true;
        appendResult(host, observer, agent.name, call.id, INTERRUPTED, true);
        continue;
      }
      appendResult(host, observer, agent.name, call.id, outcome.content, outcome.isError);
      if (call.name === TRANSFER_TOOL_NAME && !outcome.isError) transferred = true;
    }

    if (transferred) {
      const record = host.agents.transferLog[host.agents.transferLog.length - 1];
      if (record) {
        host.append(transferBriefMessage(record));
        observer?.onAgentChanged?.(record.from, record.to);
      }
    }
    if (interrupted) return cancelled(observer, agent.name);
  }

  Logger.warn(`[turn] stopped after ${maxRounds} tool rounds`);
  return {
    text: lastText,
    inputTokens,
    outputTokens,
    rounds: maxRounds,
    agent: host.agents.current?.name ?? "",
    exhausted: true,
  };
}

async function consumeStream(
  open: () => AsyncIterable<DecodedDelta>,
  agent: string,
  observer: TurnObserver | undefined,
  signal: AbortSignal | undefined,
): Promise<AccumulatedRound | "cancelled" | null> {
  const acc = new StreamAccumulator();
  try {
    for await (const delta of open()) {
      if (signal?.aborted) return "cancelled";
      acc.push(delta);
      if (delta.type === "text" && delta.text) observer?.onText?.(delta.text, agent);
      else if (delta.type === "thinking" && delta.text) observer?.onThinking?.(delta.text, agent);
    }
  } catch (e: unknown) {
    if (signal?.aborted || isAbortError(e)) {
      Logger.debug("[turn] stream aborted");
      return "cancelled";
    }
    const ce = crewError("backend_error", `Backend stream failed: ${asError(e).message}`, {
      agent,
      cause: e,
    });
    Logger.error("Backend error:", errorLogFields(ce));
    observer?.onError?.(ce);
    return null;
  }
  if (signal?.aborted) return "cancelled";
  return acc.finish();
}

/** Cancelled turns return null; observers get a `cancelled` error to tell them from backend failures. */
function cancelled(observer: TurnObserver | undefined, agent: string | undefined): null {
  const ce = crewError("cancelled", "Turn cancelled", { agent });
  Logger.debug(`[turn] ${ce.message}`);
  observer?.onError?.(ce);
  return null;
}

interface ToolOutcome {
  content: string;
  isError: boolean;
  cancelled: boolean;
}

function serialize(output: ToolOutput): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}

async function invoke(
  handler: ToolHandler,
  call: ToolCallPart,
  agent: string,
  signal: AbortSignal | undefined,
): Promise<ToolOutcome> {
  try {
    const output = await handler(call.arguments, { signal, agent });
    if (signal?.aborted) return { content: INTERRUPTED, isError: true, cancelled: true };
    return { content: serialize(output), isError: false, cancelled: false };
  } catch (e: unknown) {
    if (signal?.aborted && isAbortError(e)) {
      return { content: INTERRUPTED, isError: true, cancelled: true };
    }
    const raw = asError(e);
    const ce = crewError("tool_error", `Tool "${call.name}" failed: ${raw.message}`, { agent, cause: e });
    Logger.error("Tool execution error:", errorLogFields(ce));
    return { content: `Error: ${raw.message}`, isError: true, cancelled: false };
  }
}

function appendResult(
  host: TurnHost,
  observer: TurnObserver | undefined,
  agent: string,
  toolCallId: string,
  content: string,
  isError: boolean,
): void {
  const msg = toolResultMessage(toolCallId, content, isError, agent);
  host.append(msg);
  const part = msg.content[0];
  if (part?.type === "tool_result") observer?.onToolResult?.(part, agent);
}
