// ============================================
// Error types
// ============================================

import type { JsonValue } from "./types.js";

export class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ChatError";
  }
}

/** Missing or invalid configuration (flags, env, MCP config file). */
export class ConfigError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** The chat-completion API failed or returned something unusable. */
export class UpstreamError extends ChatError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, "UPSTREAM_ERROR", cause);
    this.name = "UpstreamError";
  }
}

/** The MCP server process or its pipes failed. Fatal to that connection. */
export class McpTransportError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super(message, "MCP_TRANSPORT_ERROR", cause);
    this.name = "McpTransportError";
  }
}

/**
 * The MCP server answered, but not with what was asked for: a malformed line,
 * a missing field, or a JSON-RPC error envelope. The connection stays usable.
 */
export class McpProtocolError extends ChatError {
  constructor(
    message: string,
    public readonly rpcError?: JsonValue,
    cause?: unknown,
  ) {
    super(message, "MCP_PROTOCOL_ERROR", cause);
    this.name = "McpProtocolError";
  }
}

export class UnknownToolError extends ChatError {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`, "UNKNOWN_TOOL");
    this.name = "UnknownToolError";
  }
}

export class ServerNotFoundError extends ChatError {
  constructor(public readonly serverName: string) {
    super(`Server not found: ${serverName}`, "SERVER_NOT_FOUND");
    this.name = "ServerNotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
