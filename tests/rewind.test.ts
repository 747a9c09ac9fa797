/**
 * Turn index and jump(): truncating the log and every piece of derived state.
 */

import { test, describe, before } from "node:test";
import assert from "node:assert";
import type { AgentDefinition } from "../src/agents/agent.js";
import { BackendConnection } from "../src/backend/connection.js";
import { Conversation } from "../src/conversation/conversation.js";
import { TurnIndex } from "../src/conversation/turn-index.js";
import { isCrewError } from "../src/errors.js";
import { Logger } from "../src/logger.js";
import { assistantMessage, messageText, textPart, toolResultMessage, userMessage } from "../src/messages/index.js";
import type { CanonicalMessage } from "../src/messages/types.js";
import { MemoryConversationStore } from "../src/session.js";
import { ScriptedAdapter, callTool, say } from "./helpers/scripted-backend.js";
import type { ScriptedRound } from "./helpers/scripted-backend.js";

const helper: AgentDefinition = { name: "helper", description: "", systemPrompt: "You help.", tools: [] };
const planner: AgentDefinition = { name: "planner", description: "Plans", systemPrompt: "You plan.", tools: [] };
const booker: AgentDefinition = { name: "booker", description: "Books", systemPrompt: "You book.", tools: [] };

function open(agents: AgentDefinition[], rounds: ScriptedRound[]) {
  const adapter = new ScriptedAdapter(rounds);
  const store = new MemoryConversationStore();
  const conversation = new Conversation({ connection: new BackendConnection(adapter), agents, store });
  return { adapter, store, conversation };
}

async function twoTurns() {
  const ctx = open([helper], [[say("Hello")], [say("Fine")]]);
  await ctx.conversation.send("Hi");
  await ctx.conversation.send("How are you");
  return ctx;
}

function lastText(conversation: Conversation): string {
  const last = conversation.messages[conversation.messages.length - 1];
  return last ? messageText(last) : "";
}

function isRewindError(message: string) {
  return (err: unknown) => isCrewError(err) && err.kind === "rewind_error" && err.message === message;
}

before(() => Logger.setSilent(true));

describe("jump", () => {
  test("turns record the anchor index of each user message", async () => {
    const { conversation } = await twoTurns();
    assert.deepStrictEqual(conversation.turns.map((t) => t.boundaryIndex), [0, 2]);
    assert.deepStrictEqual(conversation.turns.map((t) => messageText(t.anchor)), ["Hi", "How are you"]);
  });

  test("jump(2) leaves the log ending at the first answer with one turn", async () => {
    const { conversation } = await twoTurns();
    const turn = await conversation.jump(2);
    assert.strictEqual(messageText(turn.anchor), "How are you");
    assert.strictEqual(conversation.messages.length, 2);
    assert.strictEqual(lastText(conversation), "Hello");
    assert.strictEqual(conversation.turns.length, 1);
  });

  test("turns and messages read before a jump keep their contents", async () => {
    const { conversation } = await twoTurns();
    const turnsBefore = conversation.turns;
    const messagesBefore = conversation.messages;
    await conversation.jump(2);
    assert.strictEqual(turnsBefore.length, 2);
    assert.strictEqual(messagesBefore.length, 4);
    assert.strictEqual(conversation.messages.length, turnsBefore[1]?.boundaryIndex);
    assert.strictEqual(messageText(messagesBefore[3]), "Fine");
  });

  test("jump(1) on two turns empties the log and the turn list", async () => {
    const { conversation } = await twoTurns();
    const boundary = conversation.turns[0]?.boundaryIndex;
    await conversation.jump(1);
    assert.strictEqual(conversation.turns.length, 0);
    assert.strictEqual(conversation.messages.length, boundary);
    for (const agent of conversation.agents.all()) {
      assert.deepStrictEqual(agent.history, []);
    }
  });

  test("invalid turn numbers are rejected without changes", async () => {
    const { conversation } = await twoTurns();
    await assert.rejects(conversation.jump(0), isRewindError("Invalid turn 0: expected 1..2"));
    await assert.rejects(conversation.jump(3), isRewindError("Invalid turn 3: expected 1..2"));
    await assert.rejects(conversation.jump(1.5), isRewindError("Invalid turn 1.5: expected 1..2"));
    assert.strictEqual(conversation.messages.length, 4);
    assert.strictEqual(conversation.turns.length, 2);
  });

  test("jumping with no turns recorded", async () => {
    const { conversation } = open([helper], []);
    await assert.rejects(conversation.jump(1), isRewindError("Invalid turn 1: no turns recorded"));
  });

  test("the stored copy is truncated too", async () => {
    const { conversation, store } = await twoTurns();
    await conversation.jump(2);
    const stored = await store.load(conversation.id);
    assert.deepStrictEqual(stored?.messages.map((m) => messageText(m)), ["Hi", "Hello"]);
  });

  test("the conversation continues after a jump", async () => {
    const { adapter, conversation } = await twoTurns();
    await conversation.jump(2);
    adapter.script([say("Still fine")]);
    const result = await conversation.send("How are you now");
    assert.strictEqual(result?.text, "Still fine");
    assert.deepStrictEqual(conversation.turns.map((t) => t.boundaryIndex), [0, 2]);
    assert.deepStrictEqual(adapter.requests[2]?.messages.length, 3);
  });
});

describe("jump across a transfer", () => {
  async function handedOff() {
    const ctx = open([planner, booker], [
      [say("Hello")],
      callTool("t1", "transfer", { target_agent: "booker", task_description: "Book a flight" }),
      [say("Booked.")],
      [say("Welcome")],
    ]);
    await ctx.conversation.send("Hi");
    await ctx.conversation.send("Book a flight");
    await ctx.conversation.send("Thanks");
    return ctx;
  }

  test("the later turn belongs to the target agent", async () => {
    const { conversation } = await handedOff();
    assert.strictEqual(conversation.agents.current?.name, "booker");
    assert.deepStrictEqual(conversation.turns.map((t) => t.boundaryIndex), [0, 2, 7]);
    assert.strictEqual(conversation.messages[7]?.agent, "booker");
  });

  test("rewinding before the transfer drops it and restores the source agent", async () => {
    const { conversation, adapter } = await handedOff();
    await conversation.jump(2);

    assert.strictEqual(conversation.messages.length, 2);
    assert.strictEqual(conversation.agents.transferLog.length, 0);
    assert.strictEqual(conversation.agents.current?.name, "planner");
    assert.ok(conversation.agents.backend.getSystemPrompt().startsWith("You plan."));
    assert.strictEqual(conversation.agents.get("planner")?.sharedContextPool.get("booker")?.size ?? 0, 0);
    for (const agent of conversation.agents.all()) {
      assert.ok(agent.history.every((e) => e.index < 2), `${agent.name} kept a stale index`);
    }
    assert.deepStrictEqual(conversation.agents.get("booker")?.history, []);
    assert.strictEqual(adapter.remaining, 0);
  });

  test("rewinding after the transfer keeps it and the target agent", async () => {
    const { conversation } = await handedOff();
    await conversation.jump(3);

    assert.strictEqual(conversation.messages.length, 7);
    assert.strictEqual(conversation.agents.transferLog.length, 1);
    assert.strictEqual(conversation.agents.current?.name, "booker");
    assert.deepStrictEqual(
      [...(conversation.agents.get("planner")?.sharedContextPool.get("booker") ?? [])],
      [0, 1, 2, 3],
    );
    assert.deepStrictEqual(conversation.agents.get("booker")?.history.map((e) => e.index), [5, 6]);
  });
});

describe("TurnIndex", () => {
  test("boundaries must increase", () => {
    const index = new TurnIndex();
    index.record(0, userMessage("a"));
    assert.throws(() => index.record(0, userMessage("b")), isRewindError("Turn boundary 0 is not after 0"));
  });

  test("rebuild finds answered user inputs only", () => {
    const log: CanonicalMessage[] = [
      userMessage("Hi", "planner"),
      assistantMessage([textPart("Hello")], "planner"),
      userMessage("Book a flight", "planner"),
      assistantMessage([{ type: "tool_call", id: "t1", name: "transfer", arguments: {} }], "planner"),
      toolResultMessage("t1", "Transferred to booker with 1 shared message.", false, "planner"),
      { ...userMessage("## Task from planner", "booker"), handoffFrom: "planner" },
      assistantMessage([textPart("Booked.")], "booker"),
      userMessage("unanswered", "booker"),
    ];
    const index = new TurnIndex();
    index.rebuild(log);
    assert.deepStrictEqual(index.list().map((t) => t.boundaryIndex), [0, 2]);
    assert.deepStrictEqual(index.describe(), ["1. Hi", "2. Book a flight"]);
  });
});
