import { describe, test, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  findInstall,
  installedPluginsFile,
  knownAsMarketplaces,
  knownMarketplaceKeys,
  listPluginViews,
  loadInstalledPlugins,
  pluginStatus,
} from "../src/plugins.js";
import { definitionsEqual, orderKeys, scopeFiles, toDefinition } from "../src/settings.js";
import { createTmpDir, writeJson } from "./fixtures.js";

describe("installed plugins", () => {
  const tmpDirs: string[] = [];

  function tmpDir(): string {
    const d = createTmpDir();
    tmpDirs.push(d);
    return d;
  }

  afterEach(() => {
    for (const d of tmpDirs) {
      fs.rmSync(d, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  test("missing file is an empty version 2 document", () => {
    expect(loadInstalledPlugins(tmpDir())).toEqual({ version: 2, plugins: {} });
  });

  test("version 1 files are upgraded to user scope", () => {
    const claude = tmpDir();
    writeJson(installedPluginsFile(claude), {
      version: 1,
      plugins: { "a@m": { version: "1.2.0", installPath: "/cache/a", isLocal: false } },
    });
    expect(loadInstalledPlugins(claude)).toEqual({
      version: 2,
      plugins: { "a@m": [{ scope: "user", version: "1.2.0", installPath: "/cache/a", isLocal: false }] },
    });
  });

  test("project installs must match the project", () => {
    const installed = {
      version: 2 as const,
      plugins: {
        "a@m": [
          { scope: "user", version: "1", installPath: "/x", isLocal: false },
          { scope: "project", version: "1", installPath: "/x", isLocal: false, projectPath: "/work/one" },
        ],
      },
    };
    expect(findInstall(installed, "a@m", "user", "/anywhere")?.scope).toBe("user");
    expect(findInstall(installed, "a@m", "project", "/work/one")?.projectPath).toBe("/work/one");
    expect(findInstall(installed, "a@m", "project", "/work/two")).toBeUndefined();
    expect(findInstall(installed, "a@m", "local", "/work/one")).toBeUndefined();
    expect(findInstall(installed, "b@m", "user", "/")).toBeUndefined();
  });

  test("status is derived from the install path and settings", () => {
    const claude = tmpDir();
    const present = path.join(claude, "cache", "a");
    fs.mkdirSync(present, { recursive: true });
    const record = { scope: "user", version: "1", installPath: present, isLocal: false };

    expect(pluginStatus({ ...record, installPath: path.join(claude, "gone") }, { "a@m": true }, "a@m")).toBe("stale");
    expect(pluginStatus(record, { "a@m": true }, "a@m")).toBe("enabled");
    expect(pluginStatus(record, { "a@m": false }, "a@m")).toBe("disabled");
    expect(pluginStatus(record, {}, "a@m")).toBe("cached");
    expect(pluginStatus({ ...record, isLocal: true }, {}, "a@m")).toBe("local");
  });

  test("views are sorted by id with one row per record", () => {
    const claude = tmpDir();
    const views = listPluginViews(
      {
        version: 2,
        plugins: {
          "z@m": [{ scope: "user", version: "2", installPath: claude, isLocal: false }],
          "a@m": [
            { scope: "user", version: "1", installPath: claude, isLocal: false },
            { scope: "local", version: "1", installPath: claude, isLocal: false },
          ],
        },
      },
      (scope): Record<string, boolean> => (scope === "user" ? { "a@m": true } : {}),
    );
    expect(views).toEqual([
      { id: "a@m", scope: "user", version: "1", status: "enabled" },
      { id: "a@m", scope: "local", version: "1", status: "cached" },
      { id: "z@m", scope: "user", version: "2", status: "cached" },
    ]);
  });

  test("known marketplaces", () => {
    const known = {
      official: { source: { source: "github", repo: "acme/official" } },
      internal: { source: { source: "git", url: "https://git.example.com/m.git" } },
    };
    expect([...knownMarketplaceKeys(known)].sort()).toEqual(["acme/official", "https://git.example.com/m.git"]);
    expect(knownAsMarketplaces(known)).toEqual([
      { source: "git", url: "https://git.example.com/m.git" },
      { source: "github", repo: "acme/official" },
    ]);
  });
});

describe("settings documents", () => {
  test("scope file locations", () => {
    expect(scopeFiles("user", "/c", "/p")).toEqual({ settings: "/c/settings.json", mcp: "/c/settings.json" });
    expect(scopeFiles("project", "/c", "/p")).toEqual({ settings: "/p/.claude/settings.json", mcp: "/p/.mcp.json" });
    expect(scopeFiles("local", "/c", "/p")).toEqual({
      settings: "/p/.claude/settings.local.json",
      mcp: "/p/.claude/settings.local.json",
    });
  });

  test("known keys first, the rest alphabetical", () => {
    const ordered = orderKeys({ b: 1, enabledPlugins: {}, a: 2, hooks: {}, $schema: "s" });
    expect(Object.keys(ordered)).toEqual(["$schema", "hooks", "enabledPlugins", "a", "b"]);
  });

  test("server definitions reference secrets by name", () => {
    expect(
      toDefinition({
        name: "db",
        command: "db-mcp",
        args: [],
        secrets: { TOKEN: { sources: [{ type: "env", key: "DB_TOKEN" }] } },
      }),
    ).toEqual({ command: "db-mcp", env: { TOKEN: "${TOKEN}" } });
  });

  test("missing and empty args compare equal", () => {
    expect(definitionsEqual({ command: "x" }, { command: "x", args: [] })).toBe(true);
    expect(definitionsEqual({ command: "x", env: { A: "1", B: "2" } }, { command: "x", env: { B: "2", A: "1" } })).toBe(
      true,
    );
    expect(definitionsEqual({ command: "x" }, { command: "y" })).toBe(false);
  });
});
