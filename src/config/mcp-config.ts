// ============================================
// MCP server list — YAML (or JSON) config file
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../errors.js";

const DEFAULT_CONFIG_FILES = ["mcp.yaml", "mcp.yml", "mcp.json"];

const EnvVarSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
});

/** `env` may be a record or a list of `{ key, value }` pairs. */
const EnvOverlaySchema = z
  .union([z.record(z.string()), z.array(EnvVarSchema)])
  .transform((env): Record<string, string> =>
    Array.isArray(env) ? Object.fromEntries(env.map(({ key, value }) => [key, value])) : env,
  );

export const McpServerSpecSchema = z.object({
  /** A human-friendly, unique name. */
  name: z.string().min(1),
  /** Command that starts the server (stdio transport). */
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Overlaid on this process's environment. */
  env: EnvOverlaySchema.default({}),
  cwd: z.string().optional(),
  /** What to do with the server's stderr. */
  stderr: z.enum(["inherit", "ignore"]).default("inherit"),
});

export const McpConfigSchema = z
  .object({
    servers: z.array(McpServerSpecSchema).default([]),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", index, "name"],
          message: `Duplicate server name "${server.name}"`,
        });
      }
      seen.add(server.name);
    });
  });

export type McpServerSpec = z.infer<typeof McpServerSpecSchema>;
export type McpConfig = z.infer<typeof McpConfigSchema>;

/** Read and validate an MCP config file. */
export function loadMcpConfig(filePath: string): McpConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read MCP config from ${filePath}`, err);
  }
  return parseMcpConfig(text, filePath);
}

/** Parse config text. YAML is a superset of JSON, so either form is accepted. */
export function parseMcpConfig(text: string, source: string): McpConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Invalid MCP config in ${source}: not valid YAML`, err);
  }

  const parsed = McpConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid MCP config in ${source}: ${issues}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Pick the config file: an explicit path wins, then the first of
 * `./mcp.yaml`, `./mcp.yml`, `./mcp.json` that exists. `null` means no MCP
 * servers.
 */
export function resolveMcpConfigPath(explicit: string | undefined, cwd = process.cwd()): string | null {
  if (explicit) return path.resolve(cwd, explicit);
  for (const file of DEFAULT_CONFIG_FILES) {
    const candidate = path.resolve(cwd, file);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}
