import type { Agent } from "./agent.js";

export const PROMPT_SEPARATOR = "\n---\n\n";

function describeAgent(agent: Agent): string {
  const lines = ["    <agent>", `      <name>${agent.name}</name>`];
  if (agent.description) lines.push(`      <description>${agent.description}</description>`);
  lines.push("    </agent>");
  return lines.join("\n");
}

/**
 * "Available agents" section appended to the active agent's system prompt.
 * Empty when there is nobody to hand off to.
 */
export function renderHandoffPrompt(current: string | undefined, agents: Iterable<Agent>): string {
  const others = Array.from(agents).filter((a) => a.name !== current);
  if (others.length === 0) return "";
  return `<Transferring_Agents>
  <Instruction>
    - You are a specialized agent operating within a multi-agent system.
    - Before executing a task, check whether another agent below is better suited to it.
    - When one is, explain the handoff to the user, then call the \`transfer\` tool.
    - Write the task description so the target agent can act on it without asking back.
  </Instruction>

  <Tool_Usage>
    Parameters of the \`transfer\` tool:
    - \`target_agent\`: exact name from Available_Agents
    - \`task_description\`: what the target agent must achieve, starting with an action verb
    - \`relevant_messages\`: (optional) positions of your messages the target needs; omit to share all
    - \`post_action\`: (optional) what the target should do once finished
  </Tool_Usage>

  <Available_Agents>
${others.map(describeAgent).join("\n")}
  </Available_Agents>
</Transferring_Agents>`;
}

export function composeSystemPrompt(base: string, handoff: string): string {
  return handoff ? `${base}${PROMPT_SEPARATOR}${handoff}` : base;
}
