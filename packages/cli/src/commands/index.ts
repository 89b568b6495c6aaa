// ABOUTME: CLI command registration for nginx-sites.
// ABOUTME: The bare command (no subcommand) starts the interactive menu.

import { Command } from "commander";
import { registerListCommand } from "./list";
import { registerShowCommand } from "./show";
import { registerDeleteCommand } from "./delete";
import { registerMenuCommand } from "./menu";

/**
 * Register CLI commands.
 *
 * - list: table of configured sites
 * - show <domain>: print a site's config file
 * - delete <domain>: disable, reload and remove a site
 * - (default): interactive menu
 */
export function registerCommands(program: Command): void {
  registerListCommand(program);
  registerShowCommand(program);
  registerDeleteCommand(program);
  registerMenuCommand(program);
}
