// ============================================
// Chat Completion Adapter
// ============================================
//
// Provides a uniform interface over OpenAI-style chat-completion endpoints:
// Azure OpenAI deployments and the public OpenAI API. Three call shapes:
// plain completion, completion with a tool manifest, and streamed completion.
// ============================================

import { z } from "zod";
import type { ChatConfig } from "../config/config.js";
import { ChatError, ConfigError, UpstreamError, errorMessage } from "../errors.js";
import type { McpToolDescription } from "../mcp/types.js";
import type { ChatMessage, ToolCallRequest } from "../types.js";
import { collectStream, readTextChunks } from "./sse-decoder.js";

// ---- Response types ----

export interface LLMResponse {
  content: string;
  model: string;
  tokensUsed?: number;
}

export interface LLMToolResponse {
  /** The assistant turn, ready to append to the conversation. */
  message: ChatMessage;
  /** Empty when the model answered in plain text. */
  toolCalls: ToolCallRequest[];
  tokensUsed?: number;
}

export type LLMSettings = Pick<
  ChatConfig,
  "endpoint" | "apiKey" | "model" | "apiVersion" | "maxTokens" | "temperature"
>;

// ---- Wire schemas ----

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(""),
  }),
});

const CompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
        tool_calls: z.array(ToolCallSchema).nullable().optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

type CompletionResponse = z.infer<typeof CompletionResponseSchema>;

// ---- Abstract base ----

export abstract class LLMAdapter {
  constructor(protected readonly settings: LLMSettings) {}

  /** Send the conversation and receive a text completion. */
  abstract complete(messages: ChatMessage[]): Promise<LLMResponse>;

  /** Send the conversation with a tool manifest; the reply may request tool calls. */
  abstract completeWithTools(
    messages: ChatMessage[],
    tools: McpToolDescription[],
  ): Promise<LLMToolResponse>;

  /** Stream a text completion, reporting each fragment as it arrives. */
  abstract stream(
    messages: ChatMessage[],
    onDelta: (fragment: string) => void,
  ): Promise<LLMResponse>;
}

// ---- OpenAI-style endpoints ----

export abstract class OpenAICompatibleAdapter extends LLMAdapter {
  /** Used in error messages. */
  protected abstract readonly label: string;

  protected abstract url(): string;

  protected abstract headers(): Record<string, string>;

  /** Extra body fields the endpoint needs (e.g. `model`). */
  protected extraBody(): Record<string, unknown> {
    return {};
  }

  async complete(messages: ChatMessage[]): Promise<LLMResponse> {
    const data = await this.send(this.body(messages, false));
    const choice = this.firstChoice(data);

    return {
      content: choice.message.content ?? "",
      model: this.settings.model,
      tokensUsed: data.usage?.total_tokens,
    };
  }

  async completeWithTools(
    messages: ChatMessage[],
    tools: McpToolDescription[],
  ): Promise<LLMToolResponse> {
    const body = this.body(messages, false);

    if (tools.length > 0) {
      body.tools = tools.map((t) => ({
        type: "function",
        function: {
          name: t.name,
          description: t.description,
          parameters: t.inputSchema,
        },
      }));
    }

    const data = await this.send(body);
    const choice = this.firstChoice(data);
    const toolCalls: ToolCallRequest[] = choice.message.tool_calls ?? [];

    const message: ChatMessage = {
      role: "assistant",
      content: choice.message.content ?? null,
    };
    if (toolCalls.length > 0) message.tool_calls = toolCalls;

    return { message, toolCalls, tokensUsed: data.usage?.total_tokens };
  }

  async stream(
    messages: ChatMessage[],
    onDelta: (fragment: string) => void,
  ): Promise<LLMResponse> {
    const res = await this.post(this.body(messages, true));
    if (!res.body) {
      throw new UpstreamError(`Empty streaming response from ${this.label}`, res.status);
    }

    let content: string;
    try {
      content = await collectStream(readTextChunks(res.body), onDelta);
    } catch (err) {
      if (err instanceof ChatError) throw err;
      throw new UpstreamError(
        `Stream from ${this.label} interrupted: ${errorMessage(err)}`,
        res.status,
        err,
      );
    }
    return { content, model: this.settings.model };
  }

  // --------------------------------------------------
  // Internal HTTP helpers
  // --------------------------------------------------

  private body(messages: ChatMessage[], stream: boolean): Record<string, unknown> {
    return {
      ...this.extraBody(),
      messages,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      stream,
    };
  }

  private async post(body: Record<string, unknown>): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(this.url(), {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers() },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new UpstreamError(`Failed to send request to ${this.label}`, undefined, err);
    }

    if (!res.ok) {
      const text = await res.text();
      throw new UpstreamError(`${this.label} API error ${res.status}: ${text}`, res.status);
    }
    return res;
  }

  private async send(body: Record<string, unknown>): Promise<CompletionResponse> {
    const res = await this.post(body);

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new UpstreamError(`Failed to parse response from ${this.label}`, res.status, err);
    }

    const parsed = CompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamError(`Failed to parse response from ${this.label}`, res.status, parsed.error);
    }
    return parsed.data;
  }

  private firstChoice(data: CompletionResponse): CompletionResponse["choices"][number] {
    const choice = data.choices[0];
    if (!choice) throw new UpstreamError("No response choices available");
    return choice;
  }
}

// ---- Azure OpenAI ----

export class AzureOpenAIAdapter extends OpenAICompatibleAdapter {
  protected readonly label = "Azure OpenAI";

  protected url(): string {
    const base = this.settings.endpoint.replace(/\/+$/, "");
    const deployment = encodeURIComponent(this.settings.model);
    const version = encodeURIComponent(this.settings.apiVersion);
    return `${base}/openai/deployments/${deployment}/chat/completions?api-version=${version}`;
  }

  protected headers(): Record<string, string> {
    return { "api-key": this.settings.apiKey };
  }
}

// ---- OpenAI ----

const DEFAULT_OPENAI_ENDPOINT = "https://api.openai.com";

export class OpenAIAdapter extends OpenAICompatibleAdapter {
  protected readonly label = "OpenAI";

  protected url(): string {
    const base = (this.settings.endpoint || DEFAULT_OPENAI_ENDPOINT).replace(/\/+$/, "");
    return `${base}/v1/chat/completions`;
  }

  protected headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.settings.apiKey}` };
  }

  protected extraBody(): Record<string, unknown> {
    return { model: this.settings.model };
  }
}

// ---- Factory ----

const PROVIDERS: Record<string, new (settings: LLMSettings) => LLMAdapter> = {
  azure: AzureOpenAIAdapter,
  openai: OpenAIAdapter,
};

/** Create the adapter for the configured provider. */
export function createLLMAdapter(config: ChatConfig): LLMAdapter {
  const Ctor = PROVIDERS[config.provider];
  if (!Ctor) {
    throw new ConfigError(`Unknown LLM provider "${config.provider}"`);
  }
  return new Ctor(config);
}
