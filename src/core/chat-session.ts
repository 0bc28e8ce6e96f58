// ============================================
// Chat Session — conversation state for one run
// ============================================

import type { McpHost } from "../mcp/host.js";
import type { ChatMessage } from "../types.js";
import type { LLMAdapter } from "./llm-adapter.js";
import { DEFAULT_MAX_TOOL_ROUNDS, ToolLoop } from "./tool-loop.js";

export interface ChatSessionOptions {
  systemPrompt: string;
  maxToolRounds?: number;
  /** Stream plain replies (used only when no tools are registered). */
  stream?: boolean;
}

export class ChatSession {
  private readonly history: ChatMessage[] = [];
  private readonly toolLoop: ToolLoop | null;

  constructor(
    private readonly llm: LLMAdapter,
    private readonly host: McpHost | null,
    private readonly options: ChatSessionOptions,
  ) {
    this.toolLoop = host
      ? new ToolLoop(llm, host, options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS)
      : null;
    this.reset();
  }

  get messages(): readonly ChatMessage[] {
    return this.history;
  }

  get toolsEnabled(): boolean {
    return this.toolLoop !== null && (this.host?.tools.size ?? 0) > 0;
  }

  /**
   * Send one user turn and return the assistant's answer. If anything fails
   * the conversation is rolled back to where it was before this turn.
   */
  async send(input: string, onDelta?: (fragment: string) => void): Promise<string> {
    const mark = this.history.length;
    this.history.push({ role: "user", content: input });

    try {
      if (this.toolLoop && this.toolsEnabled) {
        return await this.toolLoop.run(this.history);
      }

      const response =
        this.options.stream && onDelta
          ? await this.llm.stream(this.history, onDelta)
          : await this.llm.complete(this.history);

      this.history.push({ role: "assistant", content: response.content });
      return response.content;
    } catch (err) {
      this.history.length = mark;
      throw err;
    }
  }

  /** Drop everything but the system prompt. */
  clear(): void {
    this.reset();
  }

  private reset(): void {
    this.history.length = 0;
    this.history.push({ role: "system", content: this.options.systemPrompt });
  }
}
