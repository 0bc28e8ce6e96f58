// ============================================
// mcp-chat Configuration
// ============================================

import { ConfigError } from "../errors.js";

export type LLMProvider = "azure" | "openai";

export interface ChatConfig {
  /** Azure OpenAI resource endpoint, or an OpenAI-compatible base URL */
  endpoint: string;

  /** Credential passed through to the completion API */
  apiKey: string;

  /** Deployment name (azure) or model id (openai) */
  model: string;

  /** Azure OpenAI api-version query parameter */
  apiVersion: string;

  provider: LLMProvider;

  maxTokens: number;

  temperature: number;

  /** Stream plain replies token by token */
  stream: boolean;

  systemPrompt: string;

  /** Path to the MCP server list; unset means ./mcp.yaml, ./mcp.yml or ./mcp.json if present */
  mcpConfigPath?: string;

  /** Tool rounds allowed per user turn before the loop gives up */
  maxToolRounds: number;
}

/** Values given on the command line; they win over the environment. */
export type ConfigOverrides = Partial<
  Pick<ChatConfig, "endpoint" | "apiKey" | "model" | "apiVersion" | "provider" | "mcpConfigPath" | "stream">
>;

const DEFAULT_MODEL = "gpt-35-turbo";
const DEFAULT_API_VERSION = "2025-01-01-preview";
const DEFAULT_PROVIDER: LLMProvider = "azure";
const DEFAULT_MAX_TOKENS = 1000;
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";
const DEFAULT_MAX_TOOL_ROUNDS = 10;

/**
 * Load configuration from flags and environment variables.
 * Call dotenv.config() before invoking this function.
 */
export function loadConfig(overrides: ConfigOverrides = {}): ChatConfig {
  return {
    endpoint: overrides.endpoint ?? env("OPENAI_API_ENDPOINT", ""),
    apiKey: overrides.apiKey ?? env("OPENAI_API_KEY", ""),
    model: overrides.model ?? env("OPENAI_API_MODEL", DEFAULT_MODEL),
    apiVersion: overrides.apiVersion ?? env("OPENAI_API_VERSION", DEFAULT_API_VERSION),
    provider: overrides.provider ?? parseProvider(env("OPENAI_API_PROVIDER", DEFAULT_PROVIDER)),
    maxTokens: envInt("OPENAI_MAX_TOKENS", DEFAULT_MAX_TOKENS),
    temperature: envFloat("OPENAI_TEMPERATURE", DEFAULT_TEMPERATURE),
    stream: overrides.stream ?? envBool("CHAT_STREAM", true),
    systemPrompt: env("CHAT_SYSTEM_PROMPT", DEFAULT_SYSTEM_PROMPT),
    mcpConfigPath: overrides.mcpConfigPath ?? (env("MCP_CONFIG", "") || undefined),
    maxToolRounds: envInt("MCP_MAX_TOOL_ROUNDS", DEFAULT_MAX_TOOL_ROUNDS),
  };
}

export function parseProvider(value: string): LLMProvider {
  const normalized = value.trim().toLowerCase();
  if (normalized === "azure" || normalized === "openai") return normalized;
  throw new ConfigError(`Unknown LLM provider "${value}" (expected "azure" or "openai")`);
}

/** Fail early when the completion API cannot possibly be reached. */
export function requireCredentials(config: ChatConfig): void {
  if (config.provider === "azure" && !config.endpoint) {
    throw new ConfigError(
      "Azure OpenAI endpoint is required. Provide it via --endpoint argument or OPENAI_API_ENDPOINT environment variable",
    );
  }
  if (!config.apiKey) {
    throw new ConfigError(
      "API key is required. Provide it via --api-key argument or OPENAI_API_KEY environment variable",
    );
  }
}

/** Read a string env var with a fallback default. */
function env(key: string, fallback: string): string {
  return process.env[key]?.trim() || fallback;
}

/** Read a positive integer env var with a fallback default. */
function envInt(key: string, fallback: number): number {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function envFloat(key: string, fallback: number): number {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = process.env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  return fallback;
}
