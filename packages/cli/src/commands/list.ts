import { Command } from "commander";
import { createContext, type GlobalOptions } from "../utils/context";
import { handleCommandError, printSiteTable } from "../utils/cli-helpers";

/**
 * Register the list command
 */
export function registerListCommand(program: Command): void {
  program
    .command("list")
    .description("List configured sites with their status, port, mode and SSL")
    .action(async (_options: unknown, command: Command) => {
      try {
        const { store } = createContext(command.optsWithGlobals<GlobalOptions>());
        printSiteTable(await store.list());
      } catch (err) {
        handleCommandError(err, "list");
      }
    });
}
