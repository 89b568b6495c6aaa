/**
 * Command execution utilities
 */

import { spawn } from "child_process";
import type { CommandResult, RunCommandOptions } from "../types";
import { debug } from "./logging";

function joinOutput(stdout: string, stderr: string): string {
  return [stderr.trim(), stdout.trim()].filter((part) => part !== "").join("\n");
}

/**
 * Run a program to completion with Node's child_process.spawn. Never rejects:
 * a program that cannot be started resolves as a failure with the spawn error
 * as its output. No timeout is applied.
 */
export function runCommand(
  command: string,
  args: string[] = [],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  debug(`Executing: ${command} ${args.join(" ")}`);

  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd || process.cwd(),
      env: { ...process.env, ...options.env },
      stdio: options.interactive ? "inherit" : ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      stderr += err.message;
      resolve({
        success: false,
        exitCode: null,
        stdout,
        stderr,
        output: joinOutput(stdout, stderr)
      });
    });

    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      debug(`${command} exited with code ${code}`);
      resolve({
        success: code === 0,
        exitCode: code,
        stdout,
        stderr,
        output: joinOutput(stdout, stderr)
      });
    });
  });
}

/**
 * Check if a command exists
 */
export async function commandExists(command: string): Promise<boolean> {
  const result = await runCommand("which", [command]);
  return result.success;
}
