import { resolve } from "path";
import { LogLevel, parseLogLevel } from "../utils/logging";
import { DEFAULT_LOG_DIR } from "../utils/nginxConfig";

/**
 * Centralized path and tool configuration.
 * Every value can come from a command-line option, an environment variable,
 * or the Debian/Ubuntu defaults below, in that order.
 */

export const NGINX_DEFAULTS = {
  sitesAvailable: "/etc/nginx/sites-available",
  sitesEnabled: "/etc/nginx/sites-enabled",
  logDir: DEFAULT_LOG_DIR,
  nginxBin: "nginx",
  certbotBin: "certbot"
} as const;

export interface NginxPaths {
  sitesAvailable: string;
  sitesEnabled: string;
  logDir: string;
}

export interface Settings {
  paths: NginxPaths;
  nginxBin: string;
  certbotBin: string;
  /** When set, certbot runs unattended and registers with this address */
  certbotEmail?: string;
  logLevel: LogLevel;
}

export interface SettingsOverrides {
  sitesAvailable?: string;
  sitesEnabled?: string;
  logDir?: string;
  nginxBin?: string;
  certbotBin?: string;
  email?: string;
  logLevel?: string;
}

function pick(
  option: string | undefined,
  envValue: string | undefined,
  fallback: string
): string {
  if (option && option.trim() !== "") return option.trim();
  if (envValue && envValue.trim() !== "") return envValue.trim();
  return fallback;
}

export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const email = pick(overrides.email, env.CERTBOT_EMAIL, "");

  return {
    paths: {
      sitesAvailable: resolve(
        pick(overrides.sitesAvailable, env.NGINX_SITES_AVAILABLE, NGINX_DEFAULTS.sitesAvailable)
      ),
      sitesEnabled: resolve(
        pick(overrides.sitesEnabled, env.NGINX_SITES_ENABLED, NGINX_DEFAULTS.sitesEnabled)
      ),
      logDir: resolve(pick(overrides.logDir, env.NGINX_LOG_DIR, NGINX_DEFAULTS.logDir))
    },
    nginxBin: pick(overrides.nginxBin, env.NGINX_BIN, NGINX_DEFAULTS.nginxBin),
    certbotBin: pick(overrides.certbotBin, env.CERTBOT_BIN, NGINX_DEFAULTS.certbotBin),
    certbotEmail: email === "" ? undefined : email,
    logLevel: parseLogLevel(pick(overrides.logLevel, env.LOG_LEVEL, String(LogLevel.WARN)))
  };
}
