// ============================================
// Tool Loop — model replies interleaved with MCP tool calls
// ============================================
//
//   AwaitingModel ──(tool calls)──▶ DispatchingTools ──▶ AwaitingModel …
//   AwaitingModel ──(plain reply)──▶ Done
//
// Tool failures never abort the loop: they go back to the model as the tool
// result. Upstream (completion API) failures propagate to the caller.
// ============================================

import { errorMessage } from "../errors.js";
import type { McpHost } from "../mcp/host.js";
import { isJsonObject, type ChatMessage, type JsonObject, type JsonValue } from "../types.js";
import type { LLMAdapter } from "./llm-adapter.js";

export const DEFAULT_MAX_TOOL_ROUNDS = 10;

/**
 * Parse the model's argument text. Text that is not a JSON object is passed
 * through as `{ raw: text }` so the tool can still see what the model meant.
 */
export function parseToolArguments(text: string): JsonObject {
  if (!text.trim()) return {};

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { raw: text };
  }
  return isJsonObject(parsed) ? parsed : { raw: text };
}

export class ToolLoop {
  constructor(
    private readonly llm: LLMAdapter,
    private readonly host: McpHost,
    private readonly maxRounds = DEFAULT_MAX_TOOL_ROUNDS,
  ) {}

  /**
   * Drive the conversation until the model answers without tool calls.
   * Appends every assistant and tool turn to `messages`; returns the final
   * answer text.
   */
  async run(messages: ChatMessage[]): Promise<string> {
    const tools = this.host.getToolDefinitions();
    let totalTokens = 0;
    let lastText = "";

    for (let round = 0; round < this.maxRounds; round++) {
      const response = await this.llm.completeWithTools(messages, tools);
      totalTokens += response.tokensUsed ?? 0;
      messages.push(response.message);

      if (response.toolCalls.length === 0) {
        console.log(
          `[ToolLoop] Completed in ${round + 1} turn(s)` +
            `${totalTokens ? `, ${totalTokens} tokens` : ""}`,
        );
        return response.message.content ?? "";
      }

      if (response.message.content?.trim()) lastText = response.message.content;

      for (const call of response.toolCalls) {
        const args = parseToolArguments(call.function.arguments);
        console.log(`[Tool] ${call.function.name}(${JSON.stringify(args).slice(0, 100)})`);

        let content: string;
        try {
          const result = await this.host.call(call.function.name, args);
          content = JSON.stringify(result);
          console.log(
            `[Tool] ${call.function.name} -> ${content.slice(0, 150)}${content.length > 150 ? "..." : ""}`,
          );
        } catch (err) {
          const message = errorMessage(err);
          content = JSON.stringify({ error: message });
          console.warn(`[Tool] ${call.function.name} -> ERROR: ${message}`);
        }

        messages.push({ role: "tool", tool_call_id: call.id, content });
      }
    }

    console.warn(`[ToolLoop] Max tool rounds (${this.maxRounds}) reached.`);

    const notice = `[Stopped after ${this.maxRounds} tool rounds without a final answer]`;
    const content = lastText ? `${lastText}\n\n${notice}` : notice;
    messages.push({ role: "assistant", content });
    return content;
  }
}
