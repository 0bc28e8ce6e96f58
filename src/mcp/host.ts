// ============================================
// MCP Host — owns every server connection
// ============================================
//
// Starts the configured servers, merges their tools into one registry and
// routes tool calls to the server that owns each tool. The registry is built
// once at startup and never changes afterwards; a server whose transport
// fails is dropped from the connection map, so its tools report
// ServerNotFoundError from then on.
// ============================================

import type { McpServerSpec } from "../config/mcp-config.js";
import {
  McpTransportError,
  ServerNotFoundError,
  UnknownToolError,
  errorMessage,
} from "../errors.js";
import type { JsonObject, JsonValue } from "../types.js";
import { McpClient } from "./client.js";
import { spawnServer } from "./process.js";
import type { ClientInfo, McpToolDescription, RegisteredTool, ServerProcess } from "./types.js";

export type ServerSpawner = (spec: McpServerSpec) => Promise<ServerProcess>;

export interface McpHostOptions {
  /** Replaces process spawning, e.g. with in-process fakes. */
  spawn?: ServerSpawner;
  clientInfo?: ClientInfo;
}

const DEFAULT_CLIENT_INFO: ClientInfo = { name: "mcp-chat", version: "0.1.0" };

export class McpHost {
  private constructor(
    private readonly clients: Map<string, McpClient>,
    private readonly registry: ReadonlyMap<string, RegisteredTool>,
  ) {}

  /**
   * Start every server, best effort. A server that fails to spawn, to
   * complete the handshake, or to list its tools is logged and left out;
   * the host itself never fails to start.
   */
  static async start(specs: McpServerSpec[], options: McpHostOptions = {}): Promise<McpHost> {
    const spawn = options.spawn ?? spawnServer;
    const clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;

    const clients = new Map<string, McpClient>();
    for (const spec of specs) {
      try {
        const child = await spawn(spec);
        clients.set(spec.name, new McpClient(spec.name, child, clientInfo));
      } catch (err) {
        console.error(`[MCP] Failed to start ${spec.name}: ${errorMessage(err)}`);
      }
    }

    // Later servers overwrite earlier servers' tools of the same name.
    const registry = new Map<string, RegisteredTool>();
    for (const [name, client] of clients) {
      try {
        await client.initialize();
      } catch (err) {
        console.error(`[MCP] initialize failed for ${name}: ${errorMessage(err)}`);
        client.close();
        clients.delete(name);
        continue;
      }

      let tools: McpToolDescription[];
      try {
        tools = await client.listTools();
      } catch (err) {
        console.error(`[MCP] tools/list failed for ${name}: ${errorMessage(err)}`);
        client.close();
        clients.delete(name);
        continue;
      }

      for (const tool of tools) {
        const existing = registry.get(tool.name);
        if (existing) {
          console.warn(
            `[MCP] Tool "${tool.name}" from ${name} replaces the one from ${existing.server}`,
          );
        }
        registry.set(tool.name, { server: name, tool });
      }
      console.log(`[MCP] ${name}: ${tools.length} tool(s)`);
    }

    if (specs.length > 0 && clients.size === 0) {
      console.warn("[MCP] No MCP server could be started; continuing without tools.");
    }

    return new McpHost(clients, registry);
  }

  /** The registry snapshot: tool name → owning server and description. */
  get tools(): ReadonlyMap<string, RegisteredTool> {
    return this.registry;
  }

  get serverNames(): string[] {
    return Array.from(this.clients.keys());
  }

  getToolDefinitions(): McpToolDescription[] {
    return Array.from(this.registry.values()).map((entry) => entry.tool);
  }

  getToolNames(): string[] {
    return Array.from(this.registry.keys());
  }

  async call(toolName: string, args: JsonObject): Promise<JsonValue> {
    const entry = this.registry.get(toolName);
    if (!entry) throw new UnknownToolError(toolName);

    const client = this.clients.get(entry.server);
    if (!client) throw new ServerNotFoundError(entry.server);

    try {
      return await client.callTool(toolName, args);
    } catch (err) {
      if (err instanceof McpTransportError) {
        console.error(`[MCP] Lost connection to ${entry.server}: ${err.message}`);
        client.close();
        this.clients.delete(entry.server);
      }
      throw err;
    }
  }

  /** Stop every server. Never throws. */
  shutdown(): void {
    for (const [name, client] of this.clients) {
      try {
        client.close();
      } catch (err) {
        console.warn(`[MCP] Failed to stop ${name}: ${errorMessage(err)}`);
      }
    }
    this.clients.clear();
  }
}
