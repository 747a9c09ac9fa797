import { test, describe } from "node:test";
import assert from "node:assert";
import { StreamAccumulator } from "../src/conversation/stream-accumulator.js";
import type { DecodedDelta } from "../src/backend/types.js";
import { callTool, say, think, usage } from "./helpers/scripted-backend.js";

function fold(deltas: DecodedDelta[]) {
  const acc = new StreamAccumulator();
  for (const d of deltas) acc.push(d);
  return acc.finish();
}

describe("StreamAccumulator", () => {
  test("merges consecutive text and thinking deltas", () => {
    const round = fold([think("let me "), think("see", "sig-9"), say("It is "), say(""), say("noon.")]);
    assert.deepStrictEqual(round.content, [
      { type: "thinking", text: "let me see", signature: "sig-9" },
      { type: "text", text: "It is noon." },
    ]);
    assert.strictEqual(round.text, "It is noon.");
    assert.deepStrictEqual(round.toolCalls, []);
  });

  test("keeps arrival order across text and calls", () => {
    const round = fold([say("Checking."), ...callTool("c1", "clock", { timezone: "UTC" }, 3), say("Done.")]);
    assert.deepStrictEqual(round.content, [
      { type: "text", text: "Checking." },
      { type: "tool_call", id: "c1", name: "clock", arguments: { timezone: "UTC" } },
      { type: "text", text: "Done." },
    ]);
    assert.strictEqual(round.text, "Checking.Done.");
  });

  test("interleaved argument fragments are joined per call id", () => {
    const round = fold([
      { type: "tool_call_start", id: "a", name: "one" },
      { type: "tool_call_start", id: "b", name: "two" },
      { type: "tool_call_args", id: "a", fragment: "{\"x\":" },
      { type: "tool_call_args", id: "b", fragment: "{\"y\":" },
      { type: "tool_call_args", id: "b", fragment: "2}" },
      { type: "tool_call_args", id: "a", fragment: "1}" },
    ]);
    assert.deepStrictEqual(round.toolCalls, [
      { type: "tool_call", id: "a", name: "one", arguments: { x: 1 } },
      { type: "tool_call", id: "b", name: "two", arguments: { y: 2 } },
    ]);
    assert.strictEqual(round.argumentErrors.size, 0);
  });

  test("a call without argument fragments gets {}", () => {
    const round = fold([{ type: "tool_call_start", id: "c", name: "clock" }]);
    assert.deepStrictEqual(round.toolCalls[0]?.arguments, {});
  });

  test("invalid JSON is reported per call", () => {
    const round = fold([
      { type: "tool_call_start", id: "bad", name: "clock" },
      { type: "tool_call_args", id: "bad", fragment: "{\"timezone\": " },
      { type: "tool_call_start", id: "arr", name: "clock" },
      { type: "tool_call_args", id: "arr", fragment: "[1,2]" },
    ]);
    assert.deepStrictEqual(round.toolCalls.map((c) => c.arguments), [{}, {}]);
    assert.ok(round.argumentErrors.get("bad")?.startsWith("Invalid JSON arguments: "));
    assert.strictEqual(round.argumentErrors.get("arr"), "Invalid JSON arguments: expected an object");
  });

  test("a repeated start keeps the first slot and fills a missing name", () => {
    const round = fold([
      { type: "tool_call_args", id: "c", fragment: "{}" },
      say("between"),
      { type: "tool_call_start", id: "c", name: "clock" },
    ]);
    assert.deepStrictEqual(round.content, [
      { type: "tool_call", id: "c", name: "clock", arguments: {} },
      { type: "text", text: "between" },
    ]);
  });

  test("usage keeps the last value", () => {
    const acc = new StreamAccumulator();
    acc.push(usage(10, 1));
    acc.push(usage(10, 7));
    assert.strictEqual(acc.hasToolCalls, false);
    assert.deepStrictEqual(acc.finish().usage, { inputTokens: 10, outputTokens: 7 });
  });
});
