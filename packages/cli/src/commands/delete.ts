// ABOUTME: Non-interactive delete: disable the site, reload nginx, remove the file.

import { Command } from "commander";
import { SiteLifecycle } from "@nginx-sites/core";
import { InquirerPrompter } from "../interactive/prompter";
import { createContext, type GlobalOptions } from "../utils/context";
import { handleCommandError, showInfo, showSuccess } from "../utils/cli-helpers";

type DeleteOptions = GlobalOptions & {
  yes?: boolean;
};

export function registerDeleteCommand(program: Command): void {
  program
    .command("delete <domain>")
    .description("Disable a site, reload nginx and remove its configuration file")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (domain: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<DeleteOptions>();
      try {
        const { store, server } = createContext(options);

        if (!options.yes) {
          const confirmed = await new InquirerPrompter().confirm(
            `Delete ${domain}? Its configuration file will be removed`,
            false
          );
          if (!confirmed) {
            showInfo("Canceled");
            return;
          }
        }

        await new SiteLifecycle(store, server).deleteSite(domain);
        showSuccess(`Deleted ${domain}`);
      } catch (err) {
        handleCommandError(err, `delete ${domain}`);
      }
    });
}
