// ABOUTME: Tests the nginx and certbot command lines built by NginxCapabilities.

import { describe, test, expect } from "vitest";
import { NginxCapabilities } from "./nginxCapabilities";
import type { CommandResult, CommandRunner, RunCommandOptions } from "../types";

interface Call {
  command: string;
  args: string[];
  options?: RunCommandOptions;
}

function recordingRunner(calls: Call[]): CommandRunner {
  return async (command, args, options) => {
    calls.push({ command, args, options });
    const result: CommandResult = {
      success: true,
      exitCode: 0,
      stdout: "",
      stderr: "",
      output: ""
    };
    return result;
  };
}

describe("NginxCapabilities", () => {
  test("runs the configured nginx binary for test and reload", async () => {
    const calls: Call[] = [];
    const caps = new NginxCapabilities(
      { nginxBin: "/usr/sbin/nginx", certbotBin: "certbot" },
      recordingRunner(calls)
    );

    await caps.testConfig();
    await caps.reload();

    expect(calls).toEqual([
      { command: "/usr/sbin/nginx", args: ["-t"], options: undefined },
      { command: "/usr/sbin/nginx", args: ["-s", "reload"], options: undefined }
    ]);
  });

  test("hands certbot the terminal when no e-mail is configured", async () => {
    const calls: Call[] = [];
    const caps = new NginxCapabilities(
      { nginxBin: "nginx", certbotBin: "certbot" },
      recordingRunner(calls)
    );

    await caps.issueCertificate("example.com", "/etc/nginx/sites-available/example.com.conf");

    expect(calls).toEqual([
      {
        command: "certbot",
        args: ["--nginx", "-d", "example.com"],
        options: { interactive: true }
      }
    ]);
  });

  test("runs certbot unattended with an e-mail", async () => {
    const calls: Call[] = [];
    const caps = new NginxCapabilities(
      { nginxBin: "nginx", certbotBin: "/opt/certbot", certbotEmail: "ops@example.com" },
      recordingRunner(calls)
    );

    await caps.issueCertificate("example.com", "/tmp/example.com.conf");

    expect(calls[0]).toEqual({
      command: "/opt/certbot",
      args: [
        "--nginx",
        "-d",
        "example.com",
        "--non-interactive",
        "--agree-tos",
        "-m",
        "ops@example.com",
        "--redirect"
      ],
      options: { interactive: false }
    });
  });

  test("lets certbot find the server block by domain under custom directories", async () => {
    const calls: Call[] = [];
    const caps = new NginxCapabilities(
      { nginxBin: "nginx", certbotBin: "certbot" },
      recordingRunner(calls)
    );

    await caps.issueCertificate("app.example.com", "/srv/nginx/available/app.example.com.conf");

    expect(calls.map((call) => call.args)).toEqual([["--nginx", "-d", "app.example.com"]]);
  });
});
