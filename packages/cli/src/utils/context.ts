// ABOUTME: Turns commander's global options into resolved settings and the objects built from them.

import {
  FileSiteStore,
  NginxCapabilities,
  resolveSettings,
  setLogLevel,
  type Settings,
  type SettingsOverrides
} from "@nginx-sites/core";

/**
 * Global options as commander hands them over (camel-cased flag names).
 */
export type GlobalOptions = {
  sitesAvailable?: string;
  sitesEnabled?: string;
  logDir?: string;
  nginxBin?: string;
  certbotBin?: string;
  email?: string;
  logLevel?: string;
  skipChecks?: boolean;
};

export interface CliContext {
  settings: Settings;
  store: FileSiteStore;
  server: NginxCapabilities;
}

export function toOverrides(options: GlobalOptions): SettingsOverrides {
  return {
    sitesAvailable: options.sitesAvailable,
    sitesEnabled: options.sitesEnabled,
    logDir: options.logDir,
    nginxBin: options.nginxBin,
    certbotBin: options.certbotBin,
    email: options.email,
    logLevel: options.logLevel
  };
}

export function createContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): CliContext {
  const settings = resolveSettings(toOverrides(options), env);
  setLogLevel(settings.logLevel);
  return {
    settings,
    store: new FileSiteStore(settings.paths),
    server: new NginxCapabilities(settings)
  };
}
