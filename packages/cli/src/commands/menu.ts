// ABOUTME: Default action: run the start-up checks, then the interactive menu until Quit.

import { Command } from "commander";
import { InquirerPrompter } from "../interactive/prompter";
import { MenuSession } from "../interactive/menuSession";
import { checkEnvironment } from "../utils/environment";
import { createContext, type GlobalOptions } from "../utils/context";
import { ExitCodes, handleCommandError, showError } from "../utils/cli-helpers";

export async function runInteractiveSession(options: GlobalOptions): Promise<void> {
  const { settings, store, server } = createContext(options);
  const prompter = new InquirerPrompter();

  const environment = await checkEnvironment(settings, store, prompter, {
    skipChecks: options.skipChecks
  });
  if (!environment.success) {
    showError(environment.message ?? "Environment check failed");
    process.exit(ExitCodes.PERMISSION_DENIED);
  }

  const session = new MenuSession({
    store,
    server,
    prompter,
    logDir: settings.paths.logDir,
    certbotAvailable: environment.certbotAvailable
  });
  await session.run();
}

export function registerMenuCommand(program: Command): void {
  program.action(async (_options: unknown, command: Command) => {
    try {
      await runInteractiveSession(command.optsWithGlobals<GlobalOptions>());
    } catch (err) {
      handleCommandError(err, "menu");
    }
  });
}
