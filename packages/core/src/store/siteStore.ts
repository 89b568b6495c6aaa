// ABOUTME: Config store backed by the sites-available / sites-enabled directories.
// ABOUTME: The filesystem is the only source of truth; nothing is cached between calls.

import type { Dirent } from "fs";
import {
  access,
  lstat,
  mkdir,
  readdir,
  readFile,
  readlink,
  rename,
  symlink,
  unlink,
  writeFile
} from "fs/promises";
import { basename, dirname, join, relative, resolve } from "path";
import type { NginxPaths } from "../config/paths";
import { ConflictError, NotFoundError, getErrorMessage } from "../errors";
import type { BrokenLink, DiscoveredSite, SiteConfig } from "../types";
import { debug, info, warn } from "../utils/logging";
import { logDirectoryFor } from "../utils/nginxConfig";
import { UNKNOWN_DETAILS, inspectConfigText } from "../utils/configInspector";
import { sanitizeDomain } from "../utils/validation";

export const CONFIG_EXTENSION = ".conf";

export interface CreateOptions {
  /** Replace an existing file for the same domain instead of failing */
  overwrite?: boolean;
}

/**
 * Storage seam for site configs. FileSiteStore is the only implementation;
 * callers should not depend on anything beyond this interface.
 */
export interface SiteRepository {
  list(): Promise<DiscoveredSite[]>;
  exists(domain: string): Promise<boolean>;
  pathFor(domain: string): Promise<string>;
  isEnabled(domain: string): Promise<boolean>;
  create(config: SiteConfig, text: string, options?: CreateOptions): Promise<string>;
  read(domain: string): Promise<string>;
  write(domain: string, text: string): Promise<string>;
  enable(domain: string): Promise<void>;
  disable(domain: string): Promise<boolean>;
  delete(domain: string): Promise<void>;
}

function isIgnoredEntry(name: string): boolean {
  return name.startsWith(".") || name.endsWith(".bak") || name.endsWith("~");
}

export function domainFromFileName(fileName: string): string {
  return fileName.endsWith(CONFIG_EXTENSION)
    ? fileName.slice(0, -CONFIG_EXTENSION.length)
    : fileName;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readDirOrEmpty(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) {
      warn(`Directory not found: ${dir}`);
      return [];
    }
    throw err;
  }
}

async function entryExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (err) {
    if (isMissing(err)) {
      return false;
    }
    throw err;
  }
}

export class FileSiteStore implements SiteRepository {
  constructor(private readonly paths: NginxPaths) {}

  /**
   * Find the file backing a domain: `<domain>.conf` first, then a bare
   * `<domain>` file such as the stock "default" site.
   */
  private async locate(domain: string): Promise<string | null> {
    const safe = sanitizeDomain(domain);
    // "." and ".." would resolve to a directory outside the config folder
    if (safe === "" || safe === "." || safe === ".." || basename(safe) !== safe) {
      return null;
    }
    for (const name of [`${safe}${CONFIG_EXTENSION}`, safe]) {
      const path = join(this.paths.sitesAvailable, name);
      if (await entryExists(path)) {
        return path;
      }
    }
    return null;
  }

  private async require(domain: string): Promise<string> {
    const path = await this.locate(domain);
    if (!path) {
      throw new NotFoundError(`No configuration found for ${domain}`, domain);
    }
    return path;
  }

  private linkPathFor(availablePath: string): string {
    return join(this.paths.sitesEnabled, basename(availablePath));
  }

  private async link(availablePath: string): Promise<void> {
    await mkdir(this.paths.sitesEnabled, { recursive: true });
    const linkPath = this.linkPathFor(availablePath);

    if (await entryExists(linkPath)) {
      const stats = await lstat(linkPath);
      if (stats.isSymbolicLink()) {
        await unlink(linkPath);
        debug(`Removed existing symlink: ${linkPath}`);
      } else {
        await rename(linkPath, `${linkPath}.bak`);
        warn(`Backed up regular file: ${linkPath} -> ${linkPath}.bak`);
      }
    }

    const target = relative(dirname(linkPath), availablePath);
    await symlink(target, linkPath);
    debug(`Enabled: ${linkPath} -> ${target}`);
  }

  /**
   * Canonical path of a domain's file, whether or not it exists yet.
   */
  async pathFor(domain: string): Promise<string> {
    return (
      (await this.locate(domain)) ??
      join(this.paths.sitesAvailable, `${sanitizeDomain(domain)}${CONFIG_EXTENSION}`)
    );
  }

  async exists(domain: string): Promise<boolean> {
    return (await this.locate(domain)) !== null;
  }

  async isEnabled(domain: string): Promise<boolean> {
    return entryExists(this.linkPathFor(await this.pathFor(domain)));
  }

  async list(): Promise<DiscoveredSite[]> {
    const entries = await readDirOrEmpty(this.paths.sitesAvailable);
    const sites: DiscoveredSite[] = [];
    for (const entry of entries) {
      if (!(entry.isFile() || entry.isSymbolicLink()) || isIgnoredEntry(entry.name)) {
        continue;
      }

      const path = join(this.paths.sitesAvailable, entry.name);
      const enabled = await entryExists(this.linkPathFor(path));
      let details = UNKNOWN_DETAILS;
      try {
        details = inspectConfigText(await readFile(path, "utf-8"));
      } catch (err) {
        warn(`Could not read ${path}: ${getErrorMessage(err)}`);
      }

      sites.push({
        domain: domainFromFileName(entry.name),
        fileName: entry.name,
        path,
        enabled,
        ...details
      });
    }

    return sites.sort((a, b) => a.domain.localeCompare(b.domain));
  }

  /**
   * Write a new config and enable it. The file is always in place before the
   * symlink that points at it.
   */
  async create(
    config: SiteConfig,
    text: string,
    options: CreateOptions = {}
  ): Promise<string> {
    const existing = await this.locate(config.domain);
    if (existing && !options.overwrite) {
      throw new ConflictError(
        `A configuration for ${config.domain} already exists at ${existing}`,
        config.domain
      );
    }

    const path = existing ?? (await this.pathFor(config.domain));
    await mkdir(this.paths.sitesAvailable, { recursive: true });
    await writeFile(path, text, "utf-8");
    debug(`Written: ${path}`);

    const logDir = logDirectoryFor(config);
    if (logDir) {
      await mkdir(logDir, { recursive: true });
    }

    await this.link(path);
    return path;
  }

  async read(domain: string): Promise<string> {
    return readFile(await this.require(domain), "utf-8");
  }

  /**
   * Replace a config's text without touching its enabled state.
   */
  async write(domain: string, text: string): Promise<string> {
    const path = await this.pathFor(domain);
    await mkdir(this.paths.sitesAvailable, { recursive: true });
    await writeFile(path, text, "utf-8");
    return path;
  }

  async enable(domain: string): Promise<void> {
    await this.link(await this.require(domain));
  }

  /**
   * Remove the symlink only. Resolves false when the site was not enabled.
   */
  async disable(domain: string): Promise<boolean> {
    const linkPath = this.linkPathFor(await this.pathFor(domain));
    if (!(await entryExists(linkPath))) {
      return false;
    }
    await unlink(linkPath);
    debug(`Disabled: ${linkPath}`);
    return true;
  }

  async delete(domain: string): Promise<void> {
    const path = await this.require(domain);
    await this.disable(domain);
    await unlink(path);
    debug(`Removed: ${path}`);
  }

  async findBrokenLinks(): Promise<BrokenLink[]> {
    const entries = await readDirOrEmpty(this.paths.sitesEnabled);
    const broken: BrokenLink[] = [];
    for (const entry of entries) {
      if (!entry.isSymbolicLink()) continue;
      const path = join(this.paths.sitesEnabled, entry.name);
      const target = resolve(this.paths.sitesEnabled, await readlink(path));
      try {
        await access(target);
      } catch {
        broken.push({ name: entry.name, path, target });
      }
    }
    return broken;
  }

  async removeLink(name: string): Promise<void> {
    await unlink(join(this.paths.sitesEnabled, basename(name)));
  }

  async missingDirectories(): Promise<string[]> {
    const missing: string[] = [];
    for (const dir of [this.paths.sitesAvailable, this.paths.sitesEnabled, this.paths.logDir]) {
      if (!(await entryExists(dir))) {
        missing.push(dir);
      }
    }
    return missing;
  }

  async ensureDirectories(): Promise<void> {
    for (const dir of await this.missingDirectories()) {
      info(`Creating directory: ${dir}`);
      await mkdir(dir, { recursive: true });
    }
  }
}
