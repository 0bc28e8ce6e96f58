// ============================================
// MCP — Type Definitions
// ============================================

import type { Readable, Writable } from "node:stream";
import { z } from "zod";
import { JsonValueSchema, type JsonObject, type JsonValue } from "../types.js";

export const MCP_PROTOCOL_VERSION = "2024-11-05";

/** A tool as advertised by an MCP server's `tools/list`. */
export interface McpToolDescription {
  name: string;
  description?: string;
  inputSchema: JsonValue;
}

/** Registry entry: which server owns the tool, and its description. */
export interface RegisteredTool {
  server: string;
  tool: McpToolDescription;
}

export interface ClientInfo {
  name: string;
  version: string;
}

/**
 * The child process behind one MCP connection. Only the client that owns it
 * touches the pipes.
 */
export interface ServerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  kill(): void;
}

// ---- JSON-RPC wire shapes ----

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params: JsonObject;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: JsonObject;
}

/** Our answer to a request the server sent us. */
export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: number | string;
  result?: JsonObject;
  error?: { code: number; message: string };
}

/** Anything a server may write on stdout: a response, a request or a notification. */
export const JsonRpcMessageSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  method: z.string().optional(),
  result: JsonValueSchema.optional(),
  error: JsonValueSchema.optional(),
});

export type JsonRpcMessage = z.infer<typeof JsonRpcMessageSchema>;
