// ABOUTME: Drives a site config from rendered text to a live, reloaded nginx.
// ABOUTME: Rolls back file and symlink when nginx rejects the config; SSL failures are reported, not rolled back.

import { ConflictError, ExternalToolError, NotFoundError } from "../errors";
import type { ServerCapabilities } from "../server/nginxCapabilities";
import type { CreateOptions, SiteRepository } from "../store/siteStore";
import type {
  CommandResult,
  LifecycleState,
  SiteConfig,
  SiteLifecycleResult,
  StateChangeListener
} from "../types";
import { debug, info, warn } from "../utils/logging";
import { renderSiteConfig } from "../utils/nginxConfig";

export interface SiteLifecycleOptions {
  onStateChange?: StateChangeListener;
}

interface Snapshot {
  text: string;
  enabled: boolean;
}

function failureText(tool: string, result: CommandResult): string {
  return result.output || `${tool} exited with code ${result.exitCode ?? "unknown"}`;
}

export class SiteLifecycle {
  constructor(
    private readonly store: SiteRepository,
    private readonly server: ServerCapabilities,
    private readonly options: SiteLifecycleOptions = {}
  ) {}

  private async snapshot(domain: string): Promise<Snapshot | null> {
    if (!(await this.store.exists(domain))) {
      return null;
    }
    return {
      text: await this.store.read(domain),
      enabled: await this.store.isEnabled(domain)
    };
  }

  /**
   * Put the disk back the way it was before createSite touched it.
   */
  private async rollback(domain: string, previous: Snapshot | null): Promise<void> {
    if (previous) {
      await this.store.write(domain, previous.text);
      if (previous.enabled) {
        await this.store.enable(domain);
      } else {
        await this.store.disable(domain);
      }
      info(`Restored previous configuration for ${domain}`);
      return;
    }

    if (await this.store.exists(domain)) {
      await this.store.delete(domain);
    } else {
      await this.store.disable(domain);
    }
    info(`Removed configuration for ${domain}`);
  }

  /**
   * Test the on-disk config, then reload. Throws ExternalToolError with the
   * raw output of whichever step failed.
   */
  private async activate(domain: string): Promise<void> {
    const test = await this.server.testConfig();
    if (!test.success) {
      throw new ExternalToolError(
        `nginx configuration test failed for ${domain}`,
        "nginx -t",
        failureText("nginx -t", test)
      );
    }

    const reload = await this.server.reload();
    if (!reload.success) {
      throw new ExternalToolError(
        `nginx reload failed for ${domain}`,
        "nginx -s reload",
        failureText("nginx -s reload", reload)
      );
    }
  }

  /**
   * Render, write, enable, test and reload a site, then request a
   * certificate when SSL is on.
   *
   * Throws ValidationError before touching the disk, ConflictError when the
   * domain exists and `overwrite` is not set, and ExternalToolError after
   * rolling back when nginx rejects the config. A certbot failure leaves the
   * plain-HTTP site active and is reported through `ssl: "failed"`.
   */
  async createSite(
    config: SiteConfig,
    options: CreateOptions = {}
  ): Promise<SiteLifecycleResult> {
    const domain = config.domain.trim();
    const states: LifecycleState[] = [];
    const enter = (state: LifecycleState): void => {
      states.push(state);
      debug(`${domain}: ${state}`);
      this.options.onStateChange?.(state, domain);
    };

    const text = renderSiteConfig(config);
    enter("drafted");

    const previous = await this.snapshot(domain);
    if (previous && !options.overwrite) {
      throw new ConflictError(
        `A configuration for ${domain} already exists`,
        domain
      );
    }

    let path: string;
    try {
      path = await this.store.create(config, text, options);
    } catch (err) {
      if (!(err instanceof ConflictError)) {
        await this.rollback(domain, previous);
      }
      throw err;
    }
    enter("written");

    enter("test-pending");
    try {
      await this.activate(domain);
    } catch (err) {
      await this.rollback(domain, previous);
      enter("rolled-back");
      throw err;
    }
    enter("active");

    if (!config.sslEnabled) {
      return { domain, path, states, ssl: "skipped" };
    }

    enter("ssl-pending");
    const issued = await this.server.issueCertificate(domain, path);
    if (!issued.success) {
      const sslError = failureText("certbot", issued);
      warn(`Certificate request for ${domain} failed; site stays on HTTP`);
      enter("ssl-failed");
      return { domain, path, states, ssl: "failed", sslError };
    }

    const reload = await this.server.reload();
    if (!reload.success) {
      enter("ssl-failed");
      return {
        domain,
        path,
        states,
        ssl: "failed",
        sslError: failureText("nginx -s reload", reload)
      };
    }

    enter("ssl-active");
    return { domain, path, states, ssl: "active" };
  }

  /**
   * Deactivate (remove the symlink and reload), then erase the file. If the
   * reload fails the file is kept and the site simply stays disabled.
   */
  async deleteSite(domain: string): Promise<void> {
    if (!(await this.store.exists(domain))) {
      throw new NotFoundError(`No configuration found for ${domain}`, domain);
    }

    if (await this.store.disable(domain)) {
      const reload = await this.server.reload();
      if (!reload.success) {
        throw new ExternalToolError(
          `${domain} was disabled but nginx reload failed; the file was kept`,
          "nginx -s reload",
          failureText("nginx -s reload", reload)
        );
      }
    }

    await this.store.delete(domain);
    info(`Deleted configuration for ${domain}`);
  }

  /**
   * Link an existing config into the enabled directory. Resolves false when
   * it already was enabled; the link is removed again if nginx rejects it.
   */
  async enableSite(domain: string): Promise<boolean> {
    if (!(await this.store.exists(domain))) {
      throw new NotFoundError(`No configuration found for ${domain}`, domain);
    }
    if (await this.store.isEnabled(domain)) {
      return false;
    }

    await this.store.enable(domain);
    try {
      await this.activate(domain);
    } catch (err) {
      await this.store.disable(domain);
      throw err;
    }
    return true;
  }

  /**
   * Remove a site's symlink and reload. Resolves false when it was not
   * enabled; the link is restored if the reload fails.
   */
  async disableSite(domain: string): Promise<boolean> {
    if (!(await this.store.exists(domain))) {
      throw new NotFoundError(`No configuration found for ${domain}`, domain);
    }
    if (!(await this.store.disable(domain))) {
      return false;
    }

    const reload = await this.server.reload();
    if (!reload.success) {
      await this.store.enable(domain);
      throw new ExternalToolError(
        `nginx reload failed while disabling ${domain}`,
        "nginx -s reload",
        failureText("nginx -s reload", reload)
      );
    }
    return true;
  }
}
