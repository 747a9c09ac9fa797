import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { CrewlineConfig } from "../src/config.js";
import { createCrew } from "../src/crew.js";
import { isCrewError } from "../src/errors.js";
import { Logger } from "../src/logger.js";
import { McpManager } from "../src/mcp/client.js";
import { FileConversationStore, MemoryConversationStore } from "../src/session.js";
import { ScriptedAdapter, callTool, say } from "./helpers/scripted-backend.js";

const fixed = () => new Date("2026-03-01T12:00:00.000Z");
const solo = { name: "solo", description: "", systemPrompt: "You help.", tools: ["clock"] };

let dataDir = "";

function config(overrides: Partial<CrewlineConfig> = {}): CrewlineConfig {
  return { dataDir, maxToolRounds: 25, verbose: false, agentsFile: null, mcpConfigFile: null, ...overrides };
}

before(() => {
  Logger.setSilent(true);
  dataDir = mkdtempSync(join(tmpdir(), "crewline-crew-"));
});

after(() => {
  rmSync(dataDir, { recursive: true, force: true });
});

describe("createCrew", () => {
  test("refuses to start without agents", async () => {
    await assert.rejects(
      createCrew({ adapter: new ScriptedAdapter(), config: config() }),
      (err: unknown) => isCrewError(err)
        && err.kind === "config_error"
        && err.message === "No agents configured; set CREWLINE_AGENTS or pass agents explicitly",
    );
  });

  test("reads agents from the configured file", async () => {
    const path = join(dataDir, "agents.toml");
    writeFileSync(path, "[[agents]]\nname = \"solo\"\nsystem_prompt = \"You help.\"\ntools = [\"clock\"]\n");
    const crew = await createCrew({ adapter: new ScriptedAdapter(), config: config({ agentsFile: path }) });
    assert.deepStrictEqual(crew.agents, [{ name: "solo", description: "", systemPrompt: "You help.", tools: ["clock"] }]);
    await crew.close();
  });

  test("runs the clock round-trip end to end", async () => {
    const adapter = new ScriptedAdapter([callTool("c1", "clock", {}), [say("It is 12:00")]]);
    const crew = await createCrew({ adapter, config: config(), agents: [solo], store: new MemoryConversationStore(), now: fixed });
    assert.deepStrictEqual(crew.tools.names(), ["clock"]);

    const result = await crew.conversation().send("What time is it?");
    assert.strictEqual(result?.text, "It is 12:00");
    assert.strictEqual(adapter.calls, 2);
    await crew.close();
  });

  test("defaults to a file store under the data directory", async () => {
    const crew = await createCrew({ adapter: new ScriptedAdapter([[say("Hello")]]), config: config(), agents: [solo] });
    assert.ok(crew.store instanceof FileConversationStore);
    const conversation = crew.conversation();
    await conversation.send("Hi");
    assert.ok(existsSync(join(dataDir, "conversations", conversation.id, "messages.json")));
    await crew.close();
  });

  test("the configured round cap applies to every conversation", async () => {
    const adapter = new ScriptedAdapter([callTool("c1", "clock", {}), [say("unused")]]);
    const crew = await createCrew({
      adapter,
      config: config({ maxToolRounds: 1 }),
      agents: [solo],
      store: new MemoryConversationStore(),
      now: fixed,
    });
    const result = await crew.conversation().send("time?");
    assert.strictEqual(result?.exhausted, true);
    assert.strictEqual(adapter.calls, 1);
    await crew.close();
  });

  test("tools from a connected MCP manager are registered", async () => {
    const server = new Server({ name: "test-server", version: "1.0.0" }, { capabilities: { tools: {} } });
    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [{ name: "lookup", description: "Look up", inputSchema: { type: "object", properties: {} } }],
    }));
    server.setRequestHandler(CallToolRequestSchema, async () => ({ content: [{ type: "text", text: "found" }] }));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const mcp = new McpManager();
    await mcp.connect("lookup-server", clientTransport);

    const crew = await createCrew({
      adapter: new ScriptedAdapter(),
      config: config(),
      agents: [solo],
      store: new MemoryConversationStore(),
      mcp,
    });
    assert.deepStrictEqual(crew.tools.names(), ["clock", "lookup"]);
    await crew.close();
    assert.deepStrictEqual(mcp.tools(), []);
  });
});
