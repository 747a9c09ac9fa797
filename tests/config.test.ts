import { test, describe, before, after } from "node:test";
import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadAgentDefinitions,
  loadConfig,
  loadMcpServers,
  parseAgentDefinitions,
  parseMcpServers,
} from "../src/config.js";
import { isCrewError } from "../src/errors.js";
import { Logger } from "../src/logger.js";

function configError(message: string) {
  return (err: unknown) => isCrewError(err) && err.kind === "config_error" && err.message === message;
}

let dir = "";
let restoreError: typeof console.error = console.error;

before(() => {
  Logger.setSilent(true);
  dir = mkdtempSync(join(tmpdir(), "crewline-config-"));
  restoreError = console.error;
  console.error = () => {};
});

after(() => {
  console.error = restoreError;
  rmSync(dir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  test("defaults", () => {
    assert.deepStrictEqual(loadConfig({}), {
      dataDir: join(homedir(), ".crewline"),
      maxToolRounds: 25,
      verbose: false,
      agentsFile: null,
      mcpConfigFile: null,
    });
  });

  test("reads every variable", () => {
    assert.deepStrictEqual(loadConfig({
      CREWLINE_HOME: "/srv/crewline",
      CREWLINE_MAX_TOOL_ROUNDS: "8",
      CREWLINE_VERBOSE: "TRUE",
      CREWLINE_AGENTS: "/etc/crewline/agents.toml",
      CREWLINE_MCP_CONFIG: "/etc/crewline/mcp.json",
    }), {
      dataDir: "/srv/crewline",
      maxToolRounds: 8,
      verbose: true,
      agentsFile: "/etc/crewline/agents.toml",
      mcpConfigFile: "/etc/crewline/mcp.json",
    });
  });

  test("an invalid round cap falls back to the default", () => {
    assert.strictEqual(loadConfig({ CREWLINE_MAX_TOOL_ROUNDS: "0" }).maxToolRounds, 25);
    assert.strictEqual(loadConfig({ CREWLINE_MAX_TOOL_ROUNDS: "2.5" }).maxToolRounds, 25);
    assert.strictEqual(loadConfig({ CREWLINE_MAX_TOOL_ROUNDS: "lots" }).maxToolRounds, 25);
  });
});

describe("agent definitions", () => {
  test("TOML with disabled entries", () => {
    const path = join(dir, "agents.toml");
    writeFileSync(path, [
      "[[agents]]",
      "name = \"planner\"",
      "description = \"Plans trips\"",
      "system_prompt = \"You plan.\"",
      "tools = [\"clock\"]",
      "",
      "[[agents]]",
      "name = \"booker\"",
      "enabled = false",
      "",
    ].join("\n"));
    assert.deepStrictEqual(loadAgentDefinitions(path), [
      { name: "planner", description: "Plans trips", systemPrompt: "You plan.", tools: ["clock"] },
    ]);
  });

  test("JSON list with camelCase prompt", () => {
    const path = join(dir, "agents.json");
    writeFileSync(path, JSON.stringify([{ name: "solo", systemPrompt: "You help." }]));
    assert.deepStrictEqual(loadAgentDefinitions(path), [
      { name: "solo", description: "", systemPrompt: "You help.", tools: [] },
    ]);
  });

  test("validation errors name the entry", () => {
    assert.throws(
      () => parseAgentDefinitions({ agents: [{ name: "a" }, { name: "a" }] }, "agents.toml"),
      configError("agents.toml: agents[1]: duplicate agent \"a\""),
    );
    assert.throws(
      () => parseAgentDefinitions({ agents: [{ description: "no name" }] }, "agents.toml"),
      configError("agents.toml: agents[0]: \"name\" is required"),
    );
    assert.throws(
      () => parseAgentDefinitions({ agents: [{ name: "a", tools: "clock" }] }, "agents.toml"),
      configError("agents.toml: agents[0]: \"tools\" must be a list of strings"),
    );
    assert.throws(
      () => parseAgentDefinitions({ agent: [] }, "agents.toml"),
      configError("agents.toml: expected an \"agents\" list"),
    );
  });

  test("missing and unparseable files", () => {
    const missing = join(dir, "missing.toml");
    assert.throws(() => loadAgentDefinitions(missing), configError(`Config file not found: ${missing}`));

    const broken = join(dir, "broken.toml");
    writeFileSync(broken, "[[agents]\nname = ");
    assert.throws(
      () => loadAgentDefinitions(broken),
      (err: unknown) => isCrewError(err) && err.kind === "config_error" && err.message.startsWith(`Failed to parse ${broken}: `),
    );
  });
});

describe("MCP servers", () => {
  test("keeps valid fields and skips servers without a command", () => {
    const servers = parseMcpServers({
      mcpServers: {
        files: { command: "node", args: ["server.js", 3], env: { ROOT: "/data", DEBUG: 1 }, timeout: 5000 },
        broken: { args: [] },
      },
    }, "mcp.json");
    assert.deepStrictEqual(servers, {
      files: { command: "node", args: ["server.js"], env: { ROOT: "/data" }, timeout: 5000 },
    });
  });

  test("a bare server map is accepted", () => {
    assert.deepStrictEqual(parseMcpServers({ x: { command: "x-server", cwd: "/tmp" } }, "mcp.json"), {
      x: { command: "x-server", cwd: "/tmp" },
    });
  });

  test("invalid JSON is a config_error", () => {
    const path = join(dir, "mcp.json");
    writeFileSync(path, "{");
    assert.throws(
      () => loadMcpServers(path),
      (err: unknown) => isCrewError(err) && err.message.startsWith(`Failed to parse ${path}: `),
    );
  });
});
