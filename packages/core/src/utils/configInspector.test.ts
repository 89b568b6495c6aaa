// ABOUTME: Tests for the best-effort config text scanner used by list().
// ABOUTME: Covers generated, certbot-modified and hand-written configs.

import { describe, test, expect } from "vitest";
import { inspectConfigText, UNKNOWN_DETAILS } from "./configInspector";

describe("inspectConfigText", () => {
  test("reads a generated static config", () => {
    const text = [
      "# a.com (generated by nginx-sites)",
      "server {",
      "    listen 8080;",
      "    server_name a.com;",
      "    root /var/www/a;",
      "    index index.html;",
      "}"
    ].join("\n");

    expect(inspectConfigText(text)).toEqual({
      serverName: "a.com",
      port: 8080,
      mode: "static",
      sslEnabled: false
    });
  });

  test("reads a certbot-modified proxy config", () => {
    const text = [
      "server {",
      "    server_name app.example.com;",
      "    location / {",
      "        proxy_pass http://localhost:3000;",
      "    }",
      "    listen 443 ssl; # managed by Certbot",
      "    ssl_certificate /etc/letsencrypt/live/app.example.com/fullchain.pem; # managed by Certbot",
      "}",
      "server {",
      "    if ($host = app.example.com) {",
      "        return 301 https://$host$request_uri;",
      "    } # managed by Certbot",
      "    listen 80;",
      "    server_name app.example.com;",
      "    return 404; # managed by Certbot",
      "}"
    ].join("\n");

    expect(inspectConfigText(text)).toEqual({
      serverName: "app.example.com",
      port: 80,
      mode: "proxy",
      sslEnabled: true
    });
  });

  test("understands address:port and IPv6 listen forms", () => {
    const text = "server {\n  listen [::]:8443 ssl;\n  listen 127.0.0.1:8081;\n}";

    expect(inspectConfigText(text)).toMatchObject({ port: 8081, sslEnabled: true });
  });

  test("falls back to the first TLS listen when there is no plain one", () => {
    expect(inspectConfigText("listen 443 ssl http2;")).toMatchObject({
      port: 443,
      sslEnabled: true
    });
  });

  test("ignores commented-out directives", () => {
    const text = "# listen 443 ssl;\n# proxy_pass http://x;\nlisten 80;";

    expect(inspectConfigText(text)).toEqual({
      serverName: null,
      port: 80,
      mode: "unknown",
      sslEnabled: false
    });
  });

  test("reports unknown fields for unparsable text", () => {
    expect(inspectConfigText("not an nginx file")).toEqual(UNKNOWN_DETAILS);
  });

  test("treats unix socket listens as having no port", () => {
    expect(inspectConfigText("listen unix:/run/site.sock;")).toMatchObject({ port: null });
  });
});
