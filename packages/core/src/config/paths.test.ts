import { describe, test, expect } from "vitest";
import { resolve } from "path";
import { NGINX_DEFAULTS, resolveSettings } from "./paths";
import { LogLevel } from "../utils/logging";

describe("resolveSettings", () => {
  test("falls back to the Debian layout", () => {
    const settings = resolveSettings({}, {});

    expect(settings).toEqual({
      paths: {
        sitesAvailable: NGINX_DEFAULTS.sitesAvailable,
        sitesEnabled: NGINX_DEFAULTS.sitesEnabled,
        logDir: "/var/log/nginx"
      },
      nginxBin: "nginx",
      certbotBin: "certbot",
      certbotEmail: undefined,
      logLevel: LogLevel.WARN
    });
  });

  test("prefers environment variables over defaults", () => {
    const settings = resolveSettings(
      {},
      {
        NGINX_SITES_AVAILABLE: "/srv/nginx/available",
        NGINX_BIN: "/usr/local/sbin/nginx",
        CERTBOT_EMAIL: "ops@example.com",
        LOG_LEVEL: "4"
      }
    );

    expect(settings.paths.sitesAvailable).toBe("/srv/nginx/available");
    expect(settings.nginxBin).toBe("/usr/local/sbin/nginx");
    expect(settings.certbotEmail).toBe("ops@example.com");
    expect(settings.logLevel).toBe(LogLevel.DEBUG);
  });

  test("prefers options over environment variables", () => {
    const settings = resolveSettings(
      { sitesEnabled: "/a/enabled", email: "me@example.com", logLevel: "0" },
      { NGINX_SITES_ENABLED: "/b/enabled", CERTBOT_EMAIL: "ops@example.com", LOG_LEVEL: "4" }
    );

    expect(settings.paths.sitesEnabled).toBe("/a/enabled");
    expect(settings.certbotEmail).toBe("me@example.com");
    expect(settings.logLevel).toBe(LogLevel.NONE);
  });

  test("resolves relative directories against the working directory", () => {
    const settings = resolveSettings({ logDir: "logs" }, {});

    expect(settings.paths.logDir).toBe(resolve("logs"));
  });

  test("ignores blank values and unknown log levels", () => {
    const settings = resolveSettings(
      { email: "  ", certbotBin: "" },
      { CERTBOT_BIN: "/usr/bin/certbot", LOG_LEVEL: "verbose" }
    );

    expect(settings.certbotEmail).toBeUndefined();
    expect(settings.certbotBin).toBe("/usr/bin/certbot");
    expect(settings.logLevel).toBe(LogLevel.WARN);
  });
});
