// ABOUTME: Start-up checks before the interactive session: root, nginx, directories, broken links, certbot.
// ABOUTME: Offers to repair what it can; reports fatal problems through the result instead of exiting.

import { commandExists, type FileSiteStore, type Settings } from "@nginx-sites/core";
import type { Prompter } from "../interactive/prompter";
import { log, showSuccess, showWarning } from "./cli-helpers";

export type MaintenanceStore = Pick<
  FileSiteStore,
  "missingDirectories" | "ensureDirectories" | "findBrokenLinks" | "removeLink"
>;

/**
 * What the checks need from the host, injectable for tests.
 */
export interface HostProbe {
  isRoot(): boolean;
  commandExists(command: string): Promise<boolean>;
}

export const systemProbe: HostProbe = {
  isRoot: () => process.getuid?.() === 0,
  commandExists
};

export interface EnvironmentResult {
  success: boolean;
  message?: string;
  certbotAvailable: boolean;
}

export interface EnvironmentCheckOptions {
  /** Turn the root and nginx requirements into warnings */
  skipChecks?: boolean;
  probe?: HostProbe;
}

export async function checkEnvironment(
  settings: Settings,
  store: MaintenanceStore,
  prompter: Prompter,
  options: EnvironmentCheckOptions = {}
): Promise<EnvironmentResult> {
  const probe = options.probe ?? systemProbe;
  log.step("Checking environment...");

  if (!probe.isRoot()) {
    if (!options.skipChecks) {
      return {
        success: false,
        message: "This tool must be run as root (try sudo), or pass --skip-checks",
        certbotAvailable: false
      };
    }
    showWarning("Not running as root; writing to the nginx directories may fail");
  }

  if (!(await probe.commandExists(settings.nginxBin))) {
    if (!options.skipChecks) {
      return {
        success: false,
        message: `nginx was not found (looked for "${settings.nginxBin}"). Install it or set --nginx-bin`,
        certbotAvailable: false
      };
    }
    showWarning(`nginx was not found (looked for "${settings.nginxBin}")`);
  }

  const missing = await store.missingDirectories();
  if (missing.length > 0) {
    showWarning(`Missing directories:\n  ${missing.join("\n  ")}`);
    if (await prompter.confirm("Create missing directories?", true)) {
      await store.ensureDirectories();
      showSuccess("Directories created");
    }
  }

  for (const link of await store.findBrokenLinks()) {
    showWarning(`Broken symlink: ${link.path} -> ${link.target}`);
    if (await prompter.confirm("Remove broken symlink?", false)) {
      await store.removeLink(link.name);
      showSuccess(`Removed ${link.name}`);
    }
  }

  const certbotAvailable = await probe.commandExists(settings.certbotBin);
  if (!certbotAvailable) {
    showWarning("certbot was not found; SSL certificates cannot be requested");
  }

  return { success: true, certbotAvailable };
}
