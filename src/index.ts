#!/usr/bin/env node
// ============================================
// mcp-chat — Entry Point
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { config as dotenvConfig } from "dotenv";
import {
  loadConfig,
  parseProvider,
  requireCredentials,
  type ChatConfig,
  type ConfigOverrides,
} from "./config/config.js";
import { loadMcpConfig, resolveMcpConfigPath } from "./config/mcp-config.js";
import { ChatSession } from "./core/chat-session.js";
import { createLLMAdapter } from "./core/llm-adapter.js";
import { errorMessage } from "./errors.js";
import { McpHost } from "./mcp/host.js";

// ---- Package info ----

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PKG_PATH = path.resolve(__dirname, "../package.json");

function getVersion(): string {
  try {
    const pkg: { version?: string } = JSON.parse(fs.readFileSync(PKG_PATH, "utf-8"));
    return pkg.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

// ---- Helpers ----

function printBanner(): void {
  console.log(`🤖 mcp-chat v${getVersion()}`);
  console.log("Type 'quit' or 'exit' to end the conversation.");
  console.log("Type 'clear' to clear the conversation history.");
  console.log("Type 'tools' to list the available MCP tools.");
  console.log("=".repeat(50));
}

/** Ask one question; resolves `null` when input is closed (Ctrl-D). */
function ask(rl: readline.Interface, question: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = () => resolve(null);
    rl.once("close", onClose);
    rl.question(question, (answer) => {
      rl.off("close", onClose);
      resolve(answer);
    });
  });
}

function printTools(host: McpHost): void {
  if (host.tools.size === 0) {
    console.log("No MCP tools available.");
    return;
  }

  console.log(`${host.tools.size} tool(s) from ${host.serverNames.length} server(s):\n`);
  for (const [name, { server, tool }] of host.tools) {
    console.log(`  ${name} (${server})`);
    if (tool.description) console.log(`    ${tool.description}`);
  }
  console.log();
}

async function startHost(config: ChatConfig): Promise<McpHost> {
  const configPath = resolveMcpConfigPath(config.mcpConfigPath);
  if (!configPath) return McpHost.start([]);

  const mcpConfig = loadMcpConfig(configPath);
  console.log(`[MCP] Starting ${mcpConfig.servers.length} server(s) from ${configPath}`);
  return McpHost.start(mcpConfig.servers, {
    clientInfo: { name: "mcp-chat", version: getVersion() },
  });
}

// ---- Flags ----

function parseFlags(argv: string[]): { command: string | undefined; overrides: ConfigOverrides } {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      endpoint: { type: "string", short: "e" },
      "api-key": { type: "string", short: "k" },
      model: { type: "string", short: "m" },
      "api-version": { type: "string" },
      provider: { type: "string" },
      "mcp-config": { type: "string", short: "c" },
      "no-stream": { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
  });

  const overrides: ConfigOverrides = {
    endpoint: values.endpoint,
    apiKey: values["api-key"],
    model: values.model,
    apiVersion: values["api-version"],
    provider: values.provider ? parseProvider(values.provider) : undefined,
    mcpConfigPath: values["mcp-config"],
    stream: values["no-stream"] ? false : undefined,
  };

  let command = positionals[0]?.toLowerCase();
  if (values.help) command = "help";
  if (values.version) command = "version";
  return { command, overrides };
}

// ---- Tools command ----

async function runTools(overrides: ConfigOverrides): Promise<void> {
  dotenvConfig();
  const config = loadConfig(overrides);
  const host = await startHost(config);
  try {
    printTools(host);
  } finally {
    host.shutdown();
  }
}

// ---- Default: interactive chat ----

async function runChat(overrides: ConfigOverrides): Promise<void> {
  // Load .env from the current working directory
  dotenvConfig();

  const config = loadConfig(overrides);
  requireCredentials(config);

  const llm = createLLMAdapter(config);
  const host = await startHost(config);
  const session = new ChatSession(llm, host, {
    systemPrompt: config.systemPrompt,
    maxToolRounds: config.maxToolRounds,
    stream: config.stream,
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const shutdown = () => {
    rl.close();
    host.shutdown();
    process.exit(0);
  };
  rl.on("SIGINT", shutdown);
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  let inputClosed = false;
  rl.once("close", () => {
    inputClosed = true;
  });

  printBanner();
  if (session.toolsEnabled) {
    console.log(`[MCP] Tools: ${host.getToolNames().join(", ")}`);
  }

  try {
    while (!inputClosed) {
      const input = await ask(rl, "You: ");
      if (input === null) break;

      const command = input.trim().toLowerCase();
      if (command === "quit" || command === "exit") {
        console.log("👋 Goodbye!");
        break;
      }
      if (command === "clear") {
        session.clear();
        console.log("🗑️ Conversation cleared!");
        continue;
      }
      if (command === "tools") {
        printTools(host);
        continue;
      }
      if (!command) continue;

      process.stdout.write("🤖 Assistant: ");
      let streamed = false;
      try {
        const reply = await session.send(input, (fragment) => {
          streamed = true;
          process.stdout.write(fragment);
        });
        process.stdout.write(streamed ? "\n" : `${reply}\n`);
      } catch (err) {
        // The session already rolled the user turn back.
        process.stdout.write(streamed ? "\n" : "");
        console.log(`❌ Error: ${errorMessage(err)}`);
      }
      console.log();
    }
  } finally {
    rl.close();
    host.shutdown();
  }
}

// ---- CLI dispatch ----

function printHelp(): void {
  console.log(`mcp-chat v${getVersion()}\n`);
  console.log("Usage:");
  console.log("  mcp-chat [chat]          Start an interactive chat (default)");
  console.log("  mcp-chat tools           List the tools of the configured MCP servers");
  console.log("  mcp-chat version         Show version");
  console.log("  mcp-chat help            Show this help message");
  console.log();
  console.log("Options:");
  console.log("  -e, --endpoint <url>     Azure OpenAI endpoint (OPENAI_API_ENDPOINT)");
  console.log("  -k, --api-key <key>      API key (OPENAI_API_KEY)");
  console.log("  -m, --model <name>       Deployment or model name (OPENAI_API_MODEL)");
  console.log("      --api-version <v>    Azure api-version (OPENAI_API_VERSION)");
  console.log("      --provider <name>    azure | openai (OPENAI_API_PROVIDER)");
  console.log("  -c, --mcp-config <path>  MCP server list (MCP_CONFIG, default ./mcp.yaml or ./mcp.json)");
  console.log("      --no-stream          Wait for the whole reply instead of streaming");
  console.log();
}

async function main(): Promise<void> {
  const { command, overrides } = parseFlags(process.argv.slice(2));

  switch (command) {
    case undefined:
    case "chat":
      await runChat(overrides);
      break;

    case "tools":
      await runTools(overrides);
      break;

    case "version":
      console.log(`mcp-chat v${getVersion()}`);
      break;

    case "help":
      printHelp();
      break;

    default:
      console.error(`Unknown command "${command}".\n`);
      printHelp();
      process.exitCode = 1;
      break;
  }
}

main().catch((err) => {
  console.error("[mcp-chat] Fatal error:", errorMessage(err));
  process.exit(1);
});
