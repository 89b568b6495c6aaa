// ABOUTME: Test doubles for CLI tests: a prompter that plays back scripted answers
// ABOUTME: and a server whose nginx/certbot results are set per test.

import type { CommandResult, ServerCapabilities } from "@nginx-sites/core";
import type { Choice, InputOptions, Prompter } from "../src/interactive/prompter";

export type Answer = string | boolean;

export const ok = (): CommandResult => ({
  success: true,
  exitCode: 0,
  stdout: "",
  stderr: "",
  output: ""
});

export const fail = (output: string): CommandResult => ({
  success: false,
  exitCode: 1,
  stdout: "",
  stderr: output,
  output
});

/**
 * Answers questions from a queue. An empty string takes the prompt's default,
 * and an answer its validator rejects is recorded and the question re-asked
 * with the next one, the way inquirer does.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  readonly rejected: string[] = [];

  constructor(private readonly answers: Answer[]) {}

  get remaining(): number {
    return this.answers.length;
  }

  private next(message: string): Answer {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for "${message}"`);
    }
    return answer;
  }

  async select<T extends string>(message: string, choices: Choice<T>[]): Promise<T> {
    const answer = this.next(message);
    const choice = choices.find((c) => c.value === answer);
    if (!choice) {
      throw new Error(`"${String(answer)}" is not a choice for "${message}"`);
    }
    return choice.value;
  }

  async input(message: string, options: InputOptions = {}): Promise<string> {
    while (true) {
      const answer = this.next(message);
      if (typeof answer !== "string") {
        throw new Error(`Expected text for "${message}"`);
      }
      const value = answer === "" ? options.default ?? "" : answer;
      const verdict = options.validate ? options.validate(value) : true;
      if (verdict === true) {
        return value.trim();
      }
      this.rejected.push(verdict);
    }
  }

  async confirm(message: string): Promise<boolean> {
    const answer = this.next(message);
    if (typeof answer !== "boolean") {
      throw new Error(`Expected yes/no for "${message}"`);
    }
    return answer;
  }
}

export class FakeServer implements ServerCapabilities {
  calls: string[] = [];
  testResult = ok();
  reloadResult = ok();
  certResult = ok();

  async testConfig(): Promise<CommandResult> {
    this.calls.push("test");
    return this.testResult;
  }

  async reload(): Promise<CommandResult> {
    this.calls.push("reload");
    return this.reloadResult;
  }

  async issueCertificate(domain: string): Promise<CommandResult> {
    this.calls.push(`cert ${domain}`);
    return this.certResult;
  }
}
