/**
 * Tool registry. Maps a tool name to a definition factory, a handler factory
 * and the service the handler is bound to.
 *
 * The root registry holds process-wide tools whose factories carry no
 * conversation state. Each conversation works on a fork(), where tools bound
 * to per-conversation services (the transfer tool) are registered without
 * leaking into other conversations.
 */
import { crewError } from "../errors.js";
import type { Provider } from "../formats/types.js";
import type { BackendToolDefinition } from "../formats/tool-definitions.js";
import type { DefinitionFactory, HandlerFactory, ToolHandler } from "./types.js";

interface RegisteredTool {
  name: string;
  definitionFactory: DefinitionFactory;
  createHandler: () => ToolHandler;
  service: unknown;
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  constructor(private readonly parent?: ToolRegistry) {}

  /**
   * Register a tool. Re-registering a name replaces the previous entry.
   * `service` may be omitted for handler factories that need none.
   */
  register(name: string, definitionFactory: DefinitionFactory, handlerFactory: HandlerFactory<void>): void;
  register<S>(name: string, definitionFactory: DefinitionFactory, handlerFactory: HandlerFactory<S>, service: S): void;
  register<S>(
    name: string,
    definitionFactory: DefinitionFactory,
    handlerFactory: HandlerFactory<S | undefined>,
    service?: S,
  ): void {
    this.tools.set(name, {
      name,
      definitionFactory,
      createHandler: () => handlerFactory(service),
      service,
    });
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name) || (this.parent?.has(name) ?? false);
  }

  /** All resolvable tool names, own registrations first. */
  names(): string[] {
    const own = Array.from(this.tools.keys());
    const inherited = this.parent?.names().filter((n) => !this.tools.has(n)) ?? [];
    return [...own, ...inherited];
  }

  /** The service a tool was registered with, if any. */
  serviceOf(name: string): unknown {
    return this.lookup(name).service;
  }

  resolveDefinition(name: string, provider: Provider): BackendToolDefinition {
    return this.lookup(name).definitionFactory(provider);
  }

  resolveHandler(name: string): ToolHandler {
    return this.lookup(name).createHandler();
  }

  /** Child registry: own registrations shadow the parent's, lookups fall through. */
  fork(): ToolRegistry {
    return new ToolRegistry(this);
  }

  private lookup(name: string): RegisteredTool {
    const tool = this.tools.get(name) ?? this.parent?.find(name);
    if (!tool) {
      throw crewError("config_error", `Tool '${name}' is not registered. Known tools: ${this.names().join(", ") || "(none)"}`);
    }
    return tool;
  }

  private find(name: string): RegisteredTool | undefined {
    return this.tools.get(name) ?? this.parent?.find(name);
  }
}
