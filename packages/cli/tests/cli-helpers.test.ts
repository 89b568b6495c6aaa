import { describe, test, expect, beforeAll } from "vitest";
import chalk from "chalk";
import {
  ConflictError,
  ExternalToolError,
  NotFoundError,
  ValidationError,
  type DiscoveredSite
} from "@nginx-sites/core";
import {
  ExitCodes,
  describeError,
  exitCodeFor,
  formatSiteTable
} from "../src/utils/cli-helpers";

const site = (overrides: Partial<DiscoveredSite>): DiscoveredSite => ({
  domain: "example.com",
  fileName: "example.com.conf",
  path: "/etc/nginx/sites-available/example.com.conf",
  enabled: true,
  sslEnabled: false,
  serverName: "example.com",
  port: 80,
  mode: "proxy",
  ...overrides
});

describe("cli helpers", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  test("formatSiteTable aligns columns and marks unknown values", () => {
    const lines = formatSiteTable([
      site({}),
      site({ domain: "default", enabled: false, port: null, mode: "unknown", sslEnabled: true })
    ]);

    expect(lines).toEqual([
      "DOMAIN       STATUS    PORT  MODE     SSL",
      "example.com  enabled   80    proxy    no",
      "default      disabled  ?     unknown  yes"
    ]);
  });

  test("exitCodeFor maps each error class", () => {
    expect(exitCodeFor(new ValidationError("bad", "port"))).toBe(ExitCodes.INVALID_ARGUMENT);
    expect(exitCodeFor(new NotFoundError("missing", "a.com"))).toBe(ExitCodes.NOT_FOUND);
    expect(exitCodeFor(new ConflictError("taken", "a.com"))).toBe(ExitCodes.CONFLICT);
    expect(exitCodeFor(new ExternalToolError("failed", "nginx -t", ""))).toBe(
      ExitCodes.EXTERNAL_TOOL
    );
    expect(exitCodeFor(new Error("boom"))).toBe(ExitCodes.GENERAL_ERROR);
  });

  test("describeError adds tool output below the message", () => {
    expect(describeError(new ExternalToolError("reload failed", "nginx -s reload", " oops \n"))).toEqual([
      "❌ reload failed",
      "oops"
    ]);
    expect(describeError("plain")).toEqual(["❌ plain"]);
  });
});
