import { describe, it, expect, vi, beforeEach } from "vitest";
import { McpHost, type ServerSpawner } from "../mcp/host.js";
import type { McpServerSpec } from "../config/mcp-config.js";
import { McpProtocolError, ServerNotFoundError, UnknownToolError } from "../errors.js";
import { FakeServer, mcpHandler, tool, type FakeHandler } from "./helpers/fake-server.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function spec(name: string, command = `${name}-server`): McpServerSpec {
  return { name, command, args: [], env: {}, stderr: "ignore" };
}

/** Spawner backed by in-process fakes; unknown commands fail like ENOENT. */
function fakeSpawner(handlers: Record<string, FakeHandler>) {
  const servers = new Map<string, FakeServer>();
  const spawn: ServerSpawner = async (s) => {
    const handler = handlers[s.command];
    if (!handler) throw new Error(`spawn ${s.command} ENOENT`);
    const server = new FakeServer(handler);
    servers.set(s.name, server);
    return server;
  };
  return { spawn, servers };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

// ---------------------------------------------------------------------------
// start
// ---------------------------------------------------------------------------

describe("McpHost.start", () => {
  it("registers the union of disjoint tool sets", async () => {
    const { spawn } = fakeSpawner({
      "files-server": mcpHandler({ tools: [tool("read_file"), tool("write_file")] }),
      "web-server": mcpHandler({ tools: [tool("fetch_url")] }),
    });

    const host = await McpHost.start([spec("files"), spec("web")], { spawn });

    expect(host.getToolNames()).toEqual(["read_file", "write_file", "fetch_url"]);
    expect(host.tools.get("fetch_url")?.server).toBe("web");
    expect(host.serverNames).toEqual(["files", "web"]);
  });

  it("lets the later server win a tool name collision", async () => {
    const { spawn } = fakeSpawner({
      "first-server": mcpHandler({ tools: [tool("search", "first")] }),
      "second-server": mcpHandler({ tools: [tool("search", "second")] }),
    });

    const host = await McpHost.start([spec("first"), spec("second")], { spawn });

    expect(host.tools.size).toBe(1);
    expect(host.tools.get("search")).toEqual({
      server: "second",
      tool: { name: "search", description: "second", inputSchema: { type: "object", properties: {} } },
    });
  });

  it("skips a server whose command cannot be started", async () => {
    const { spawn } = fakeSpawner({
      "good-server": mcpHandler({ tools: [tool("ping")] }),
    });

    const host = await McpHost.start([spec("broken", "/no/such/binary"), spec("good")], { spawn });

    expect(host.serverNames).toEqual(["good"]);
    expect(host.getToolNames()).toEqual(["ping"]);
  });

  it("drops and stops a server whose handshake fails", async () => {
    const { spawn, servers } = fakeSpawner({
      "bad-server": mcpHandler({ initialize: { error: { code: -32600, message: "nope" } } }),
      "good-server": mcpHandler({ tools: [tool("ping")] }),
    });

    const host = await McpHost.start([spec("bad"), spec("good")], { spawn });

    expect(host.serverNames).toEqual(["good"]);
    expect(servers.get("bad")?.killed).toBe(true);
  });

  it("drops a server whose tool listing fails", async () => {
    const { spawn, servers } = fakeSpawner({
      "odd-server": (request) =>
        request.method === "tools/list" ? { result: { nothing: true } } : mcpHandler()(request),
    });

    const host = await McpHost.start([spec("odd")], { spawn });

    expect(host.serverNames).toEqual([]);
    expect(servers.get("odd")?.killed).toBe(true);
  });

  it("starts with zero tools when every server fails", async () => {
    const host = await McpHost.start([spec("a"), spec("b")], { spawn: fakeSpawner({}).spawn });

    expect(host.tools.size).toBe(0);
    expect(host.getToolDefinitions()).toEqual([]);
  });

  it("really spawns processes by default and survives a bad path", async () => {
    const host = await McpHost.start([spec("missing", "/nonexistent/mcp-chat-test-server")]);

    expect(host.serverNames).toEqual([]);
    expect(host.tools.size).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// call
// ---------------------------------------------------------------------------

describe("McpHost.call", () => {
  it("routes a call to the server that owns the tool", async () => {
    const { spawn, servers } = fakeSpawner({
      "alpha-server": mcpHandler({ tools: [tool("a_tool")], call: () => ({ result: "from alpha" }) }),
      "beta-server": mcpHandler({ tools: [tool("b_tool")], call: () => ({ result: "from beta" }) }),
    });
    const host = await McpHost.start([spec("alpha"), spec("beta")], { spawn });

    await expect(host.call("b_tool", { x: 1 })).resolves.toBe("from beta");
    expect(servers.get("beta")?.methods).toContain("tools/call");
    expect(servers.get("alpha")?.methods).not.toContain("tools/call");
  });

  it("fails with UnknownToolError without contacting any server", async () => {
    const { spawn, servers } = fakeSpawner({
      "alpha-server": mcpHandler({ tools: [tool("a_tool")] }),
    });
    const host = await McpHost.start([spec("alpha")], { spawn });
    const before = servers.get("alpha")?.received.length;

    await expect(host.call("get_weather", {})).rejects.toThrow(UnknownToolError);
    await expect(host.call("get_weather", {})).rejects.toThrow("Unknown tool: get_weather");
    expect(servers.get("alpha")?.received.length).toBe(before);
  });

  it("propagates protocol errors and keeps the connection", async () => {
    const { spawn } = fakeSpawner({
      "alpha-server": mcpHandler({
        tools: [tool("a_tool")],
        call: () => ({ error: { message: "bad arguments" } }),
      }),
    });
    const host = await McpHost.start([spec("alpha")], { spawn });

    await expect(host.call("a_tool", {})).rejects.toThrow(McpProtocolError);
    expect(host.serverNames).toEqual(["alpha"]);
  });

  it("drops a server after a transport failure", async () => {
    const { spawn } = fakeSpawner({
      "alpha-server": mcpHandler({ tools: [tool("a_tool")], call: () => "close" }),
    });
    const host = await McpHost.start([spec("alpha")], { spawn });

    await expect(host.call("a_tool", {})).rejects.toThrow("MCP server alpha closed stdout");
    await expect(host.call("a_tool", {})).rejects.toThrow(ServerNotFoundError);
    await expect(host.call("a_tool", {})).rejects.toThrow("Server not found: alpha");
    expect(host.tools.has("a_tool")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// shutdown
// ---------------------------------------------------------------------------

describe("McpHost.shutdown", () => {
  it("stops every server and never throws", async () => {
    const { spawn, servers } = fakeSpawner({
      "alpha-server": mcpHandler({ tools: [tool("a_tool")] }),
      "beta-server": mcpHandler({ tools: [tool("b_tool")] }),
    });
    const host = await McpHost.start([spec("alpha"), spec("beta")], { spawn });
    const beta = servers.get("beta");
    if (beta) {
      beta.kill = () => {
        throw new Error("already gone");
      };
    }

    expect(() => host.shutdown()).not.toThrow();
    expect(servers.get("alpha")?.killed).toBe(true);
    expect(host.serverNames).toEqual([]);
  });
});
