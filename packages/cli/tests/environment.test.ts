// ABOUTME: Tests for the start-up environment checks with a fake host probe.

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, symlink } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileSiteStore, resolveSettings, type Settings } from "@nginx-sites/core";
import { checkEnvironment, type HostProbe } from "../src/utils/environment";
import { ScriptedPrompter } from "./helpers";

const probe = (root: boolean, commands: string[]): HostProbe => ({
  isRoot: () => root,
  commandExists: async (command) => commands.includes(command)
});

describe("checkEnvironment", () => {
  let root: string;
  let settings: Settings;
  let store: FileSiteStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "nginx-sites-env-"));
    settings = resolveSettings(
      {
        sitesAvailable: join(root, "sites-available"),
        sitesEnabled: join(root, "sites-enabled"),
        logDir: join(root, "log")
      },
      {}
    );
    store = new FileSiteStore(settings.paths);
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  test("refuses to run without root", async () => {
    const result = await checkEnvironment(settings, store, new ScriptedPrompter([]), {
      probe: probe(false, ["nginx", "certbot"])
    });

    expect(result).toEqual({
      success: false,
      message: "This tool must be run as root (try sudo), or pass --skip-checks",
      certbotAvailable: false
    });
  });

  test("refuses to run without nginx", async () => {
    const result = await checkEnvironment(settings, store, new ScriptedPrompter([]), {
      probe: probe(true, ["certbot"])
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe(
      'nginx was not found (looked for "nginx"). Install it or set --nginx-bin'
    );
  });

  test("creates missing directories when the operator agrees", async () => {
    const prompter = new ScriptedPrompter([true]);

    const result = await checkEnvironment(settings, store, prompter, {
      probe: probe(true, ["nginx", "certbot"])
    });

    expect(result).toEqual({ success: true, certbotAvailable: true });
    expect(prompter.asked).toEqual(["Create missing directories?"]);
    expect(existsSync(settings.paths.sitesAvailable)).toBe(true);
    expect(existsSync(settings.paths.sitesEnabled)).toBe(true);
    expect(existsSync(settings.paths.logDir)).toBe(true);
  });

  test("continues without root or nginx when checks are skipped", async () => {
    await store.ensureDirectories();

    const result = await checkEnvironment(settings, store, new ScriptedPrompter([]), {
      skipChecks: true,
      probe: probe(false, [])
    });

    expect(result).toEqual({ success: true, certbotAvailable: false });
  });

  test("offers to remove each broken symlink", async () => {
    await store.ensureDirectories();
    await symlink("../sites-available/gone.conf", join(settings.paths.sitesEnabled, "gone.conf"));
    await symlink("../sites-available/old.conf", join(settings.paths.sitesEnabled, "old.conf"));
    const prompter = new ScriptedPrompter([true, false]);

    await checkEnvironment(settings, store, prompter, {
      probe: probe(true, ["nginx", "certbot"])
    });

    expect(prompter.asked).toEqual(["Remove broken symlink?", "Remove broken symlink?"]);
    const remaining = await store.findBrokenLinks();
    expect(remaining).toHaveLength(1);
  });
});
