import { test, describe } from "node:test";
import assert from "node:assert";
import { ToolRegistry } from "../src/tools/registry.js";
import { definitionFromSpec } from "../src/formats/tool-definitions.js";
import type { ToolHandler } from "../src/tools/types.js";
import { isCrewError } from "../src/errors.js";

const echoSpec = {
  name: "echo",
  description: "Echo the input",
  parameters: { type: "object", properties: { text: { type: "string" } } },
};

function echoHandler(prefix: string): ToolHandler {
  return (args) => `${prefix}${typeof args.text === "string" ? args.text : ""}`;
}

describe("ToolRegistry", () => {
  test("resolves a definition per provider", () => {
    const reg = new ToolRegistry();
    reg.register("echo", definitionFromSpec(echoSpec), echoHandler, "> ");
    assert.deepStrictEqual(reg.resolveDefinition("echo", "openai"), {
      type: "function",
      function: { name: "echo", description: "Echo the input", parameters: echoSpec.parameters },
    });
    assert.deepStrictEqual(reg.resolveDefinition("echo", "anthropic"), {
      name: "echo",
      description: "Echo the input",
      input_schema: echoSpec.parameters,
    });
  });

  test("handlers are bound to the registered service", async () => {
    const reg = new ToolRegistry();
    reg.register("echo", definitionFromSpec(echoSpec), echoHandler, "> ");
    const handler = reg.resolveHandler("echo");
    assert.strictEqual(await handler({ text: "hi" }, { agent: "a" }), "> hi");
    assert.strictEqual(reg.serviceOf("echo"), "> ");
  });

  test("service can be omitted for factories that take none", async () => {
    const reg = new ToolRegistry();
    reg.register("ping", definitionFromSpec({ ...echoSpec, name: "ping" }), () => () => "pong");
    assert.strictEqual(await reg.resolveHandler("ping")({}, { agent: "a" }), "pong");
  });

  test("unknown names raise a config_error listing known tools", () => {
    const reg = new ToolRegistry();
    reg.register("echo", definitionFromSpec(echoSpec), echoHandler, "");
    assert.throws(
      () => reg.resolveDefinition("nope", "google"),
      (err: unknown) => isCrewError(err)
        && err.kind === "config_error"
        && err.message === "Tool 'nope' is not registered. Known tools: echo",
    );
    assert.throws(
      () => new ToolRegistry().resolveHandler("nope"),
      { message: "Tool 'nope' is not registered. Known tools: (none)" },
    );
  });

  test("re-registering replaces, unregister removes", async () => {
    const reg = new ToolRegistry();
    reg.register("echo", definitionFromSpec(echoSpec), echoHandler, "a:");
    reg.register("echo", definitionFromSpec(echoSpec), echoHandler, "b:");
    assert.strictEqual(await reg.resolveHandler("echo")({ text: "x" }, { agent: "a" }), "b:x");
    assert.strictEqual(reg.unregister("echo"), true);
    assert.strictEqual(reg.has("echo"), false);
    assert.strictEqual(reg.unregister("echo"), false);
  });
});

describe("fork", () => {
  test("child sees parent tools; parent never sees child tools", () => {
    const root = new ToolRegistry();
    root.register("echo", definitionFromSpec(echoSpec), echoHandler, "");
    const child = root.fork();
    child.register("ping", definitionFromSpec({ ...echoSpec, name: "ping" }), () => () => "pong");

    assert.strictEqual(child.has("echo"), true);
    assert.strictEqual(root.has("ping"), false);
    assert.deepStrictEqual(child.names(), ["ping", "echo"]);
    assert.deepStrictEqual(root.names(), ["echo"]);
  });

  test("child registrations shadow the parent's", async () => {
    const root = new ToolRegistry();
    root.register("echo", definitionFromSpec(echoSpec), echoHandler, "root:");
    const child = root.fork();
    child.register("echo", definitionFromSpec(echoSpec), echoHandler, "child:");

    assert.strictEqual(await child.resolveHandler("echo")({ text: "x" }, { agent: "a" }), "child:x");
    assert.strictEqual(await root.resolveHandler("echo")({ text: "x" }, { agent: "a" }), "root:x");
    assert.deepStrictEqual(child.names(), ["echo"]);
  });

  test("siblings are isolated", () => {
    const root = new ToolRegistry();
    const a = root.fork();
    const b = root.fork();
    a.register("only-a", definitionFromSpec({ ...echoSpec, name: "only-a" }), () => () => "a");
    assert.strictEqual(a.has("only-a"), true);
    assert.strictEqual(b.has("only-a"), false);
  });
});
