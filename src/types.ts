// ============================================
// mcp-chat — Shared Types
// ============================================

import { z } from "zod";

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

const JsonLiteralSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonLiteralSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---- Conversation ----

export type ChatRole = "system" | "user" | "assistant" | "tool" | "function";

/** A tool invocation requested by the model (OpenAI `tool_calls` entry). */
export interface ToolCallRequest {
  id: string;
  type: "function";
  function: {
    name: string;
    /** JSON text produced by the model; may be malformed. */
    arguments: string;
  };
}

export interface ChatMessage {
  role: ChatRole;
  content: string | null;
  name?: string;
  tool_calls?: ToolCallRequest[];
  tool_call_id?: string;
}
