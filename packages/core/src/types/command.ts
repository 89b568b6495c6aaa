/**
 * Outcome of running an external program to completion.
 */
export interface CommandResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** stderr and stdout joined, as shown to the operator on failure */
  output: string;
}

export interface RunCommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Hand the terminal to the child instead of capturing its output */
  interactive?: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;
