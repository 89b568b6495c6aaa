/**
 * How a site answers requests: forwarded to an upstream, or served from disk.
 */
export type SiteMode = "proxy" | "static";

/**
 * A location block added after the primary one.
 *
 * @property path        URL path prefix, always starting with "/".
 * @property directives  Ordered [name, value] pairs rendered as `name value;`.
 */
export interface ExtraLocation {
  path: string;
  directives: Array<[string, string]>;
}

/**
 * Rendering switches that sit on top of the mandatory directives.
 */
export interface RenderOptions {
  /** Emit the add_header security block (default true) */
  securityHeaders?: boolean;
  /** Add HTTP/1.1 upgrade headers to proxy locations (default false) */
  websocket?: boolean;
  /** Emit per-domain access_log/error_log lines (default true) */
  accessLog?: boolean;
  /** Static mode: refuse requests for dotfiles such as .git or .env (default true) */
  denyHiddenFiles?: boolean;
  /** Static mode: long-lived cache headers for images, CSS and JS (default true) */
  cacheStaticAssets?: boolean;
  /** Directory holding the per-domain log folders */
  logDir?: string;
}

interface BaseSiteConfig {
  domain: string;
  port: number;
  extraLocations: ExtraLocation[];
  sslEnabled: boolean;
  options?: RenderOptions;
}

export interface ProxySiteConfig extends BaseSiteConfig {
  mode: "proxy";
  proxyTarget: string;
  proxyPath: string;
}

export interface StaticSiteConfig extends BaseSiteConfig {
  mode: "static";
  rootDir: string;
  indexFiles: string[];
}

/**
 * Everything needed to render one virtual host.
 */
export type SiteConfig = ProxySiteConfig | StaticSiteConfig;

/**
 * What `list()` can tell about a file found on disk. Fields that could not be
 * read from the text are null or "unknown".
 */
export interface DiscoveredSite {
  domain: string;
  fileName: string;
  path: string;
  enabled: boolean;
  sslEnabled: boolean;
  serverName: string | null;
  port: number | null;
  mode: SiteMode | "unknown";
}

/**
 * An entry of the enabled directory whose target is gone.
 */
export interface BrokenLink {
  name: string;
  path: string;
  target: string;
}
