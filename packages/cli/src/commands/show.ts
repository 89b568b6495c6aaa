import { Command } from "commander";
import { createContext, type GlobalOptions } from "../utils/context";
import { handleCommandError } from "../utils/cli-helpers";

export function registerShowCommand(program: Command): void {
  program
    .command("show <domain>")
    .description("Print the configuration file of a site")
    .action(async (domain: string, _options: unknown, command: Command) => {
      try {
        const { store } = createContext(command.optsWithGlobals<GlobalOptions>());
        process.stdout.write(await store.read(domain));
      } catch (err) {
        handleCommandError(err, `show ${domain}`);
      }
    });
}
