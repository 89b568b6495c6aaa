import type {
  ExtraLocation,
  ProxySiteConfig,
  RenderOptions,
  SiteConfig
} from "../types";
import { assertValidSiteConfig, sanitizeDomain } from "./validation";

const INDENT = "    ";

export const DEFAULT_LOG_DIR = "/var/log/nginx";

const PROXY_HEADERS = [
  "proxy_set_header Host $host;",
  "proxy_set_header X-Real-IP $remote_addr;",
  "proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
  "proxy_set_header X-Forwarded-Proto $scheme;"
];

const PROXY_TUNING = [
  "proxy_redirect off;",
  "proxy_buffers 16 16k;",
  "proxy_buffer_size 16k;",
  "proxy_connect_timeout 60s;",
  "proxy_send_timeout 60s;",
  "proxy_read_timeout 60s;"
];

const WEBSOCKET_HEADERS = [
  "proxy_http_version 1.1;",
  "proxy_set_header Upgrade $http_upgrade;",
  'proxy_set_header Connection "upgrade";'
];

const SECURITY_HEADERS = [
  "add_header X-Content-Type-Options nosniff;",
  "add_header X-Frame-Options SAMEORIGIN;",
  'add_header X-XSS-Protection "1; mode=block";',
  "add_header Referrer-Policy no-referrer-when-downgrade;"
];

const STATIC_ASSET_CACHE = locationBlock("~* \\.(jpg|jpeg|png|gif|ico|svg|webp|css|js)$", [
  "expires 30d;",
  'add_header Cache-Control "public, no-transform";'
]);

const DENY_HIDDEN_FILES = locationBlock("~ /\\.", ["deny all;"]);

function indent(lines: string[], depth = 1): string[] {
  return lines.map((line) => (line === "" ? line : INDENT.repeat(depth) + line));
}

function locationBlock(path: string, body: string[]): string[] {
  return [`location ${path} {`, ...indent(body), "}"];
}

function proxyLocation(
  path: string,
  target: string,
  websocket: boolean
): string[] {
  return locationBlock(path, [
    `proxy_pass ${target};`,
    ...PROXY_HEADERS,
    ...PROXY_TUNING,
    ...(websocket ? WEBSOCKET_HEADERS : [])
  ]);
}

function customLocation(location: ExtraLocation): string[] {
  return locationBlock(
    location.path,
    location.directives.map(([name, value]) => `${name.trim()} ${value.trim()};`)
  );
}

function proxyLocations(config: ProxySiteConfig, websocket: boolean): string[][] {
  const blocks = [proxyLocation(config.proxyPath, config.proxyTarget, websocket)];
  for (const location of config.extraLocations) {
    // A bare extra path in proxy mode is forwarded to the same upstream
    blocks.push(
      location.directives.length === 0
        ? proxyLocation(location.path, config.proxyTarget, websocket)
        : customLocation(location)
    );
  }
  return blocks;
}

/**
 * Render a plain-HTTP server block for a site.
 *
 * The output never carries TLS directives: certbot adds those to the written
 * file afterwards. Throws a ValidationError if the config is unusable.
 */
export function renderSiteConfig(config: SiteConfig): string {
  assertValidSiteConfig(config);

  const options: Required<RenderOptions> = {
    securityHeaders: config.options?.securityHeaders ?? true,
    websocket: config.options?.websocket ?? false,
    accessLog: config.options?.accessLog ?? true,
    denyHiddenFiles: config.options?.denyHiddenFiles ?? true,
    cacheStaticAssets: config.options?.cacheStaticAssets ?? true,
    logDir: config.options?.logDir ?? DEFAULT_LOG_DIR
  };
  const domain = config.domain.trim();
  const sections: string[][] = [[`listen ${config.port};`, `server_name ${domain};`]];

  if (config.mode === "static") {
    const index = config.indexFiles
      .map((file) => file.trim())
      .filter((file) => file !== "")
      .join(" ");
    sections.push([`root ${config.rootDir.trim()};`, `index ${index};`]);
  }

  if (options.accessLog) {
    const logDir = `${options.logDir.replace(/\/+$/, "")}/${sanitizeDomain(domain)}`;
    sections.push([
      `access_log ${logDir}/access.log;`,
      `error_log ${logDir}/error.log warn;`
    ]);
  }

  if (options.securityHeaders) {
    sections.push(SECURITY_HEADERS);
  }

  if (config.mode === "proxy") {
    sections.push(...proxyLocations(config, options.websocket));
  } else {
    sections.push(...config.extraLocations.map(customLocation));
    if (options.cacheStaticAssets) {
      sections.push(STATIC_ASSET_CACHE);
    }
    if (options.denyHiddenFiles) {
      sections.push(DENY_HIDDEN_FILES);
    }
  }

  const body = sections.map((section) => indent(section).join("\n")).join("\n\n");

  return `# ${domain} (generated by nginx-sites)\nserver {\n${body}\n}\n`;
}

/**
 * Path of the per-domain log folder referenced by a rendered config, or null
 * when access logging is off.
 */
export function logDirectoryFor(config: SiteConfig): string | null {
  if (config.options?.accessLog === false) {
    return null;
  }
  const logDir = (config.options?.logDir ?? DEFAULT_LOG_DIR).replace(/\/+$/, "");
  return `${logDir}/${sanitizeDomain(config.domain)}`;
}
