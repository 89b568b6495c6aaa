// ABOUTME: External process capabilities: nginx syntax test, nginx reload, certbot issuance.
// ABOUTME: Injected into the lifecycle driver so tests can swap in a fake.

import type { Settings } from "../config/paths";
import type { CommandResult, CommandRunner } from "../types";
import { runCommand } from "../utils/command";
import { debug } from "../utils/logging";

/**
 * The three actions the lifecycle driver needs from the host. Each resolves
 * with the tool's exit status and output; none of them rejects on a non-zero
 * exit.
 */
export interface ServerCapabilities {
  testConfig(): Promise<CommandResult>;
  reload(): Promise<CommandResult>;
  /**
   * certbot's nginx plugin reads the configuration nginx itself loads and
   * picks the server block whose `server_name` matches `domain`; it is not
   * told where the file lives. `configPath` is the file it is expected to
   * rewrite in place with its TLS directives and redirect block, so the
   * site must be enabled first.
   */
  issueCertificate(domain: string, configPath: string): Promise<CommandResult>;
}

export type NginxCapabilitiesOptions = Pick<
  Settings,
  "nginxBin" | "certbotBin" | "certbotEmail"
>;

export class NginxCapabilities implements ServerCapabilities {
  constructor(
    private readonly options: NginxCapabilitiesOptions,
    private readonly run: CommandRunner = runCommand
  ) {}

  testConfig(): Promise<CommandResult> {
    return this.run(this.options.nginxBin, ["-t"]);
  }

  reload(): Promise<CommandResult> {
    return this.run(this.options.nginxBin, ["-s", "reload"]);
  }

  certbotArgs(domain: string): string[] {
    const args = ["--nginx", "-d", domain];
    if (this.options.certbotEmail) {
      args.push(
        "--non-interactive",
        "--agree-tos",
        "-m",
        this.options.certbotEmail,
        "--redirect"
      );
    }
    return args;
  }

  issueCertificate(domain: string, configPath: string): Promise<CommandResult> {
    debug(`Requesting certificate for ${domain}; certbot will rewrite ${configPath}`);
    // Without an e-mail certbot asks its own questions, so it gets the terminal
    return this.run(this.options.certbotBin, this.certbotArgs(domain), {
      interactive: !this.options.certbotEmail
    });
  }
}
