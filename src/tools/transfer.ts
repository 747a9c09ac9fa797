/**
 * Built-in `transfer` tool: hands the conversation to another agent.
 *
 * The handler is bound to one conversation's AgentRegistry, so it is
 * registered on that conversation's fork of the tool registry, never on the root.
 */
import { crewError } from "../errors.js";
import { definitionFromSpec } from "../formats/tool-definitions.js";
import type { ToolSpec } from "../formats/tool-definitions.js";
import type { CanonicalMessage } from "../messages/types.js";
import type { AgentRegistry, TransferRecord } from "../agents/registry.js";
import type { ToolHandler } from "./types.js";

export const TRANSFER_TOOL_NAME = "transfer";

export const transferToolSpec: ToolSpec = {
  name: TRANSFER_TOOL_NAME,
  description:
    "Transfer the current task to another agent when it needs expertise or tools you do not have. " +
    "The target agent does NOT see your history; share what it needs through relevant_messages. " +
    "Explain the reason for the transfer to the user before calling this tool.",
  parameters: {
    type: "object",
    properties: {
      target_agent: {
        type: "string",
        description: "Name of the agent to transfer to, exactly as listed in Available_Agents.",
      },
      task_description: {
        type: "string",
        description: "Precise, actionable description of what the target agent must achieve.",
      },
      relevant_messages: {
        type: "array",
        items: { type: "integer" },
        description:
          "Zero-based positions of messages in your conversation history to share. Omit to share everything not shared before.",
      },
      post_action: {
        type: "string",
        description: "What the target agent should do once the task is complete.",
      },
    },
    required: ["target_agent", "task_description"],
  },
};

export const transferDefinition = definitionFromSpec(transferToolSpec);

function positionsArg(raw: unknown): number[] | undefined {
  if (!Array.isArray(raw)) return undefined;
  return raw.filter((v): v is number => typeof v === "number" && Number.isInteger(v) && v >= 0);
}

export function transferHandler(registry: AgentRegistry): ToolHandler {
  return (args) => {
    const target = typeof args.target_agent === "string" ? args.target_agent.trim() : "";
    const task = typeof args.task_description === "string" ? args.task_description.trim() : "";
    const postAction = typeof args.post_action === "string" && args.post_action.trim()
      ? args.post_action.trim()
      : undefined;

    if (!target) throw crewError("tool_error", "No target agent specified");
    if (!task) throw crewError("tool_error", "No task specified for the transfer");

    const result = registry.transfer(target, task, positionsArg(args.relevant_messages), postAction);
    if (!result.ok) {
      throw crewError("config_error", `${result.error}. Available agents: ${result.available.join(", ")}`);
    }
    const shared = result.record.relevantData.length;
    return `Transferred to ${result.record.to} with ${shared} shared message${shared === 1 ? "" : "s"}.`;
  };
}

/** Text of the user-role brief the target agent receives. */
export function renderTransferBrief(record: TransferRecord): string {
  let brief = `## Task from ${record.from} via \`transfer\` tool: ${record.task}\n`;
  brief += `> Delegated by ${record.from}. Use the \`transfer\` tool if you need more context or have a question.\n`;
  if (record.relevantData.length > 0) {
    brief += `\n## Shared Context:\n${record.relevantData.join("\n\n")}\n`;
  }
  if (record.postAction) {
    brief += `\n## When task is completed: ${record.postAction}\n`;
  }
  return brief;
}

export function transferBriefMessage(record: TransferRecord): CanonicalMessage {
  return {
    role: "user",
    content: [{ type: "text", text: renderTransferBrief(record) }],
    agent: record.to,
    handoffFrom: record.from,
  };
}
