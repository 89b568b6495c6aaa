#!/usr/bin/env tsx
// packages/cli/src/index.ts

import { Command } from "commander";
import { registerCommands } from "./commands";
import { NGINX_DEFAULTS } from "@nginx-sites/core";

// --- Commander CLI Setup ---
const program = new Command();

program
  .name("nginx-sites")
  .description("Create, list, inspect and delete nginx site configurations")
  .version("0.1.0");

// Global options; each falls back to its environment variable, then the default
program
  .option(
    "--sites-available <dir>",
    `Directory holding site configs (env NGINX_SITES_AVAILABLE, default ${NGINX_DEFAULTS.sitesAvailable})`
  )
  .option(
    "--sites-enabled <dir>",
    `Directory of enabled-site symlinks (env NGINX_SITES_ENABLED, default ${NGINX_DEFAULTS.sitesEnabled})`
  )
  .option(
    "--log-dir <dir>",
    `Base directory for per-site logs (env NGINX_LOG_DIR, default ${NGINX_DEFAULTS.logDir})`
  )
  .option("--nginx-bin <path>", "nginx executable (env NGINX_BIN)")
  .option("--certbot-bin <path>", "certbot executable (env CERTBOT_BIN)")
  .option(
    "--email <address>",
    "Run certbot unattended, registering this address (env CERTBOT_EMAIL)"
  )
  .option(
    "-l, --log-level <level>",
    "Set logging level (0=none, 1=error, 2=warn, 3=info, 4=debug)"
  )
  .option("--skip-checks", "Continue when not root or when nginx is missing");

registerCommands(program);

await program.parseAsync(process.argv);
