import type { DiscoveredSite } from "../types";

export type ConfigDetails = Pick<
  DiscoveredSite,
  "serverName" | "port" | "mode" | "sslEnabled"
>;

export const UNKNOWN_DETAILS: ConfigDetails = {
  serverName: null,
  port: null,
  mode: "unknown",
  sslEnabled: false
};

interface ListenDirective {
  port: number | null;
  ssl: boolean;
}

function stripComments(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/#.*$/, ""))
    .join("\n");
}

function parseListen(value: string): ListenDirective {
  const [address = "", ...flags] = value.trim().split(/\s+/);
  const match = address.match(/(?:^|:)(\d+)$/);
  const port = match ? parseInt(match[1], 10) : null;
  return { port, ssl: port === 443 || flags.includes("ssl") };
}

/**
 * Best-effort read of a config written by this tool, certbot, or a person.
 * Looks at directives line by line rather than parsing nginx syntax, so
 * anything it cannot find comes back as null / "unknown".
 *
 * The reported port is that of the first plain-HTTP listen directive (the
 * first listen of any kind when all of them are TLS).
 */
export function inspectConfigText(text: string): ConfigDetails {
  const source = stripComments(text);

  const serverName = source.match(/^\s*server_name\s+([^;]+);/m);
  const listens = [...source.matchAll(/^\s*listen\s+([^;]+);/gm)].map((m) =>
    parseListen(m[1])
  );
  const plain = listens.find((listen) => !listen.ssl && listen.port !== null);
  const first = listens.find((listen) => listen.port !== null);

  let mode: ConfigDetails["mode"] = "unknown";
  // root takes precedence: static sites may proxy an extra location
  if (/^\s*root\s+\S/m.test(source)) {
    mode = "static";
  } else if (/^\s*proxy_pass\s+\S/m.test(source)) {
    mode = "proxy";
  }

  return {
    serverName: serverName ? serverName[1].trim() : null,
    port: (plain ?? first)?.port ?? null,
    mode,
    sslEnabled: listens.some((listen) => listen.ssl)
  };
}
