// ABOUTME: The interactive menu: list, create, show, enable/disable and delete site configs.
// ABOUTME: Errors from any action are printed and the menu comes back; only Quit ends the loop.

import chalk from "chalk";
import type { Ora } from "ora";
import {
  SiteLifecycle,
  debug,
  parsePort,
  renderSiteConfig,
  validateDirectiveName,
  validateDirectiveValue,
  validateDomain,
  validateIndexFiles,
  validateLocationPath,
  validateNewLocationPath,
  validatePort,
  validateRootDir,
  validateUpstream,
  type ExtraLocation,
  type LifecycleState,
  type ServerCapabilities,
  type SiteConfig,
  type SiteMode,
  type SiteRepository
} from "@nginx-sites/core";
import {
  createSpinner,
  log,
  printSiteTable,
  reportError,
  showInfo,
  showSuccess,
  showWarning
} from "../utils/cli-helpers";
import type { Choice, Prompter } from "./prompter";

export type MenuAction = "list" | "create" | "show" | "toggle" | "delete" | "quit";

export const MENU_CHOICES: Choice<MenuAction>[] = [
  { name: "List sites", value: "list" },
  { name: "Create a site", value: "create" },
  { name: "Show a site's configuration", value: "show" },
  { name: "Enable or disable a site", value: "toggle" },
  { name: "Delete a site", value: "delete" },
  { name: "Quit", value: "quit" }
];

const MODE_CHOICES: Choice<SiteMode>[] = [
  { name: "Reverse proxy to an upstream", value: "proxy" },
  { name: "Static files", value: "static" }
];

export interface MenuSessionOptions {
  store: SiteRepository;
  server: ServerCapabilities;
  prompter: Prompter;
  /** Base directory for per-site access and error logs */
  logDir: string;
  /** When false the SSL question defaults to no */
  certbotAvailable: boolean;
}

export class MenuSession {
  private readonly store: SiteRepository;
  private readonly prompter: Prompter;
  private readonly lifecycle: SiteLifecycle;
  private spinner: Ora | null = null;

  constructor(private readonly options: MenuSessionOptions) {
    this.store = options.store;
    this.prompter = options.prompter;
    this.lifecycle = new SiteLifecycle(options.store, options.server, {
      onStateChange: (state, domain) => this.progress(state, domain)
    });
  }

  async run(): Promise<void> {
    log.step("nginx site manager");
    while (true) {
      const action = await this.prompter.select("What would you like to do?", MENU_CHOICES, "list");
      if (action === "quit") {
        console.log("Goodbye!");
        return;
      }

      try {
        await this.perform(action);
      } catch (err) {
        reportError(err);
      }
    }
  }

  async perform(action: Exclude<MenuAction, "quit">): Promise<void> {
    switch (action) {
      case "list":
        printSiteTable(await this.store.list());
        return;
      case "create":
        return this.createSite();
      case "show":
        return this.showSite();
      case "toggle":
        return this.toggleSite();
      case "delete":
        return this.deleteSite();
    }
  }

  private progress(state: LifecycleState, domain: string): void {
    debug(`${domain}: ${state}`);
    switch (state) {
      case "test-pending":
        this.spinner = createSpinner(`Testing configuration and reloading nginx for ${domain}`).start();
        break;
      case "active":
        this.spinner?.succeed(`${domain} is enabled and nginx has been reloaded`);
        this.spinner = null;
        break;
      case "rolled-back":
        this.spinner?.fail(`nginx rejected the configuration for ${domain}; changes were rolled back`);
        this.spinner = null;
        break;
      case "ssl-pending":
        // certbot may ask questions, so it gets a clean terminal
        log.step(`Requesting a certificate for ${domain} with certbot`);
        break;
    }
  }

  private async pickSite(message: string): Promise<string | null> {
    const sites = await this.store.list();
    if (sites.length === 0) {
      showInfo("No site configurations found");
      return null;
    }
    return this.prompter.select(
      message,
      sites.map((site) => ({
        name: `${site.domain} (${site.enabled ? "enabled" : "disabled"})`,
        value: site.domain
      }))
    );
  }

  private async showSite(): Promise<void> {
    const domain = await this.pickSite("Which site?");
    if (!domain) return;
    console.log(await this.store.read(domain));
  }

  private async toggleSite(): Promise<void> {
    const domain = await this.pickSite("Which site?");
    if (!domain) return;

    if (await this.store.isEnabled(domain)) {
      await this.lifecycle.disableSite(domain);
      showSuccess(`${domain} disabled`);
    } else {
      await this.lifecycle.enableSite(domain);
      showSuccess(`${domain} enabled`);
    }
  }

  private async deleteSite(): Promise<void> {
    const domain = await this.pickSite("Which site should be deleted?");
    if (!domain) return;

    const confirmed = await this.prompter.confirm(
      `Delete ${domain}? Its configuration file will be removed`,
      false
    );
    if (!confirmed) {
      showInfo("Canceled");
      return;
    }

    await this.lifecycle.deleteSite(domain);
    showSuccess(`Deleted ${domain}`);
  }

  private async askDirectives(): Promise<Array<[string, string]>> {
    const directives: Array<[string, string]> = [];
    while (true) {
      const name = await this.prompter.input("Directive name (blank to finish)", {
        validate: (input) => input.trim() === "" || validateDirectiveName(input)
      });
      if (name === "") {
        return directives;
      }
      const value = await this.prompter.input(`Value for ${name}`, {
        validate: validateDirectiveValue
      });
      directives.push([name, value]);
    }
  }

  /**
   * `taken` holds paths that already have a location block in this server.
   */
  private async askExtraLocations(mode: SiteMode, taken: string[]): Promise<ExtraLocation[]> {
    const locations: ExtraLocation[] = [];
    while (await this.prompter.confirm("Add an extra location block?", false)) {
      const path = await this.prompter.input("Location path", {
        default: "/api",
        validate: (input) => validateNewLocationPath(input, taken)
      });
      taken.push(path);
      const directives = await this.askDirectives();
      if (mode === "proxy" && directives.length === 0) {
        showInfo(`${path} will be proxied to the upstream`);
      }
      locations.push({ path, directives });
    }
    return locations;
  }

  /**
   * Ask for everything a SiteConfig needs. Each answer is validated at the
   * prompt, so the result always renders.
   */
  async askSiteConfig(domain: string): Promise<SiteConfig> {
    const port = parsePort(
      await this.prompter.input("Listening port", { default: "80", validate: validatePort })
    );
    const mode = await this.prompter.select("Mode", MODE_CHOICES, "proxy");

    if (mode === "proxy") {
      const proxyPath = await this.prompter.input("Proxy path", {
        default: "/",
        validate: validateLocationPath
      });
      const proxyTarget = await this.prompter.input(
        "Proxy upstream (e.g. http://localhost:3000)",
        { validate: validateUpstream }
      );
      const websocket = await this.prompter.confirm("Forward WebSocket upgrades?", false);
      const extraLocations = await this.askExtraLocations(mode, [proxyPath]);
      return {
        domain,
        port,
        mode,
        proxyTarget,
        proxyPath,
        extraLocations,
        sslEnabled: await this.askSsl(),
        options: { websocket, logDir: this.options.logDir }
      };
    }

    const rootDir = await this.prompter.input("Site root directory", {
      default: "/var/www/html",
      validate: validateRootDir
    });
    const index = await this.prompter.input("Index file(s)", {
      default: "index.html",
      validate: validateIndexFiles
    });
    const extraLocations = await this.askExtraLocations(mode, []);
    return {
      domain,
      port,
      mode,
      rootDir,
      indexFiles: index.split(/\s+/),
      extraLocations,
      sslEnabled: await this.askSsl(),
      options: { logDir: this.options.logDir }
    };
  }

  private askSsl(): Promise<boolean> {
    if (!this.options.certbotAvailable) {
      showWarning("certbot was not found; answer no unless it is installed elsewhere");
    }
    return this.prompter.confirm(
      "Request a TLS certificate with certbot once the site is live?",
      this.options.certbotAvailable
    );
  }

  private async createSite(): Promise<void> {
    const domain = await this.prompter.input("Primary domain (e.g. example.com)", {
      validate: validateDomain
    });

    let overwrite = false;
    if (await this.store.exists(domain)) {
      overwrite = await this.prompter.confirm(
        `A configuration for ${domain} already exists. Overwrite it?`,
        false
      );
      if (!overwrite) {
        showInfo("Canceled. No files written.");
        return;
      }
    }

    const config = await this.askSiteConfig(domain);

    log.step("Preview of the generated configuration");
    console.log(renderSiteConfig(config));
    if (!(await this.prompter.confirm("Write this configuration and enable it?", false))) {
      showInfo("Canceled. No files written.");
      return;
    }

    try {
      const result = await this.lifecycle.createSite(config, { overwrite });
      showSuccess(`Configuration saved to ${result.path}`);
      if (result.ssl === "active") {
        showSuccess(`HTTPS is enabled for ${domain}`);
      } else if (result.ssl === "failed") {
        showWarning(`Certificate request failed; ${domain} stays on plain HTTP`);
        if (result.sslError) {
          console.log(chalk.dim(result.sslError));
        }
      }
    } finally {
      this.spinner?.stop();
      this.spinner = null;
    }
  }
}
