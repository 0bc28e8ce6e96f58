// ============================================
// MCP Client — JSON-RPC over a child's stdio
// ============================================
//
// One client owns one server process. Messages are newline-delimited JSON in
// both directions. Requests go out one at a time: the pipe pair has no
// multiplexing, so a response is matched to the request just sent.
// ============================================

import { createInterface } from "node:readline";
import { McpProtocolError, McpTransportError, errorMessage } from "../errors.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../types.js";
import {
  JsonRpcMessageSchema,
  MCP_PROTOCOL_VERSION,
  type ClientInfo,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpToolDescription,
  type ServerProcess,
} from "./types.js";

const JSONRPC_METHOD_NOT_FOUND = -32601;

export class McpClient {
  private idCounter = 0;
  private closed = false;
  private closeReason: McpTransportError | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly lines: AsyncIterator<string>;

  constructor(
    readonly name: string,
    private readonly child: ServerProcess,
    private readonly clientInfo: ClientInfo,
  ) {
    const rl = createInterface({ input: child.stdout, crlfDelay: Infinity });
    this.lines = rl[Symbol.asyncIterator]();

    // Without a listener an EPIPE on a dead child would crash the host.
    child.stdin.on("error", (err) => {
      this.markClosed(
        new McpTransportError(`MCP server ${this.name} stdin failed: ${err.message}`, err),
      );
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // --------------------------------------------------
  // Protocol operations
  // --------------------------------------------------

  /** Handshake. The response is read but its content is not inspected. */
  async initialize(): Promise<void> {
    await this.request("initialize", {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: this.clientInfo.name, version: this.clientInfo.version },
    });
    await this.notify("notifications/initialized");
  }

  async listTools(): Promise<McpToolDescription[]> {
    const result = await this.request("tools/list", {});
    const tools = isJsonObject(result) ? result.tools : undefined;

    if (!Array.isArray(tools)) {
      throw new McpProtocolError(`Invalid tools/list response from ${this.name}`);
    }

    const descriptions: McpToolDescription[] = [];
    for (const entry of tools) {
      if (!isJsonObject(entry) || typeof entry.name !== "string" || !entry.name) {
        console.warn(`[MCP] ${this.name}: skipping tool without a name`);
        continue;
      }
      descriptions.push({
        name: entry.name,
        description: typeof entry.description === "string" ? entry.description : undefined,
        inputSchema: entry.inputSchema ?? { type: "object" },
      });
    }
    return descriptions;
  }

  /** Invoke a tool. The result is returned exactly as the server sent it. */
  async callTool(name: string, args: JsonObject): Promise<JsonValue> {
    return this.request("tools/call", { name, arguments: args });
  }

  /** Kill the server process. Safe to call more than once. */
  close(): void {
    this.markClosed(new McpTransportError(`MCP server ${this.name} is closed`));
    try {
      this.child.kill();
    } catch (err) {
      console.warn(`[MCP] Failed to stop ${this.name}: ${errorMessage(err)}`);
    }
  }

  // --------------------------------------------------
  // Transport
  // --------------------------------------------------

  /** Queue a request behind any in flight on this connection. */
  private request(method: string, params: JsonObject): Promise<JsonValue> {
    const run = this.queue.then(() => this.exchange(method, params));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async exchange(method: string, params: JsonObject): Promise<JsonValue> {
    const id = this.nextId();
    await this.send({ jsonrpc: "2.0", id, method, params });
    const response = await this.readResponse();

    if (response.error !== undefined) {
      throw new McpProtocolError(
        `MCP error: ${JSON.stringify(response.error)}`,
        response.error,
      );
    }
    return response.result ?? null;
  }

  private async notify(method: string): Promise<void> {
    const message: JsonRpcNotification = { jsonrpc: "2.0", method };
    await this.send(message);
  }

  private nextId(): number {
    this.idCounter += 1;
    return this.idCounter;
  }

  private send(message: JsonRpcRequest | JsonRpcNotification | JsonRpcResponse): Promise<void> {
    if (this.closeReason) return Promise.reject(this.closeReason);

    const line = `${JSON.stringify(message)}\n`;
    return new Promise((resolve, reject) => {
      this.child.stdin.write(line, (err) => {
        if (!err) {
          resolve();
          return;
        }
        const failure = new McpTransportError(
          `Failed to write to MCP server ${this.name}: ${err.message}`,
          err,
        );
        this.markClosed(failure);
        reject(failure);
      });
    });
  }

  /**
   * Read lines until one is a response. Server notifications are skipped;
   * server requests (`ping` and the like) are answered, then skipped.
   */
  private async readResponse(): Promise<JsonRpcMessage> {
    for (;;) {
      const message = await this.readMessage();
      if (message.method === undefined) return message;

      if (message.id === undefined || message.id === null) {
        console.log(`[MCP] ${this.name}: notification ${message.method}`);
      } else {
        await this.answerServerRequest(message.id, message.method);
      }
    }
  }

  private answerServerRequest(id: number | string, method: string): Promise<void> {
    if (method === "ping") {
      return this.send({ jsonrpc: "2.0", id, result: {} });
    }
    console.log(`[MCP] ${this.name}: unsupported server request ${method}`);
    return this.send({
      jsonrpc: "2.0",
      id,
      error: { code: JSONRPC_METHOD_NOT_FOUND, message: `Method not found: ${method}` },
    });
  }

  private async readMessage(): Promise<JsonRpcMessage> {
    if (this.closeReason) throw this.closeReason;

    let next: IteratorResult<string>;
    try {
      next = await this.lines.next();
    } catch (err) {
      const failure = new McpTransportError(
        `Failed to read from MCP server ${this.name}: ${errorMessage(err)}`,
        err,
      );
      this.markClosed(failure);
      throw failure;
    }

    if (next.done) {
      const failure = new McpTransportError(`MCP server ${this.name} closed stdout`);
      this.markClosed(failure);
      throw failure;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(next.value);
    } catch (err) {
      throw new McpProtocolError(
        `Invalid JSON-RPC line from ${this.name}: ${next.value.slice(0, 200)}`,
        undefined,
        err,
      );
    }

    const message = JsonRpcMessageSchema.safeParse(parsed);
    if (!message.success) {
      throw new McpProtocolError(
        `Invalid JSON-RPC message from ${this.name}: ${next.value.slice(0, 200)}`,
        undefined,
        message.error,
      );
    }
    return message.data;
  }

  private markClosed(reason: McpTransportError): void {
    if (this.closed) return;
    this.closed = true;
    this.closeReason = reason;
  }
}
