// ============================================
// MCP server process spawning
// ============================================

import { spawn } from "node:child_process";
import type { McpServerSpec } from "../config/mcp-config.js";
import { McpTransportError } from "../errors.js";
import type { ServerProcess } from "./types.js";

/**
 * Start an MCP server with piped stdin/stdout. Resolves once the OS has
 * started the process; rejects if it could not be started at all (bad
 * command path, missing permissions, bad cwd).
 */
export function spawnServer(spec: McpServerSpec): Promise<ServerProcess> {
  return new Promise((resolve, reject) => {
    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ["pipe", "pipe", spec.stderr],
      windowsHide: true,
    });

    const onError = (err: Error) => {
      reject(new McpTransportError(`Failed to start MCP server ${spec.name}: ${err.message}`, err));
    };
    child.once("error", onError);

    child.once("spawn", () => {
      child.off("error", onError);
      child.on("error", (err) => {
        console.warn(`[MCP] ${spec.name}: process error: ${err.message}`);
      });
      child.once("exit", (code, signal) => {
        if (code !== 0 && code !== null) {
          console.warn(`[MCP] ${spec.name} exited with code ${code}`);
        } else if (signal && signal !== "SIGTERM") {
          console.warn(`[MCP] ${spec.name} killed by ${signal}`);
        }
      });

      resolve({
        stdin: child.stdin,
        stdout: child.stdout,
        kill: () => {
          child.stdin.end();
          child.kill();
        },
      });
    });
  });
}
