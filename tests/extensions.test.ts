import { describe, test, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ExtensionLibrary, matchWildcard, parseCategory } from "../src/extensions.js";
import { EnabledRegistry, MCP_SERVERS, PLUGINS } from "../src/registry.js";
import { createTmpDir, readJsonFile } from "./fixtures.js";

describe("matchWildcard", () => {
  const items = ["lint.md", "review.md", "team/api.md", "team/review-ui.md"];

  test("star matches everything", () => {
    expect(matchWildcard("*", items)).toEqual(items);
  });

  test("group star matches one directory", () => {
    expect(matchWildcard("team/*", items)).toEqual(["team/api.md", "team/review-ui.md"]);
  });

  test("prefix star matches base names", () => {
    expect(matchWildcard("review*", items)).toEqual(["review.md", "team/review-ui.md"]);
  });

  test("anything else is exact", () => {
    expect(matchWildcard("lint.md", items)).toEqual(["lint.md"]);
    expect(matchWildcard("lint", items)).toEqual([]);
  });
});

describe("parseCategory", () => {
  test("rejects unknown categories", () => {
    expect(parseCategory("agents")).toBe("agents");
    expect(() => parseCategory("widgets")).toThrow(/widgets/);
  });
});

describe("EnabledRegistry", () => {
  const tmpDirs: string[] = [];

  function registry(): EnabledRegistry {
    const d = createTmpDir();
    tmpDirs.push(d);
    return new EnabledRegistry(path.join(d, "enabled.json"));
  }

  afterEach(() => {
    for (const d of tmpDirs) {
      fs.rmSync(d, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  test("plugins and servers default on, extensions default off", () => {
    const r = registry();
    expect(r.isEnabled(PLUGINS, "x")).toBe(true);
    expect(r.isEnabled(MCP_SERVERS, "x")).toBe(true);
    expect(r.isEnabled("agents", "x")).toBe(false);
  });

  test("updates merge into the stored categories", () => {
    const r = registry();
    r.setEnabled("agents", "a.md", true);
    r.updateAll({ agents: { "b.md": true }, [MCP_SERVERS]: { db: false } });
    expect(readJsonFile(r.file)).toEqual({ agents: { "a.md": true, "b.md": true }, mcpServers: { db: false } });
    expect(r.enabledItems("agents")).toEqual(["a.md", "b.md"]);
    expect(r.isEnabled(MCP_SERVERS, "db")).toBe(false);
  });

  test("empty updates do not create the file", () => {
    const r = registry();
    r.updateAll({ agents: {} });
    expect(fs.existsSync(r.file)).toBe(false);
  });

  test("counts include known items at their default", () => {
    const r = registry();
    r.setEnabled(MCP_SERVERS, "off", false);
    expect(r.counts(MCP_SERVERS, ["on", "off"])).toEqual({ total: 2, enabled: 1 });
    expect(r.counts("skills", ["a", "b"])).toEqual({ total: 2, enabled: 0 });
  });

  test("item names shared with object prototype members take the default", () => {
    const r = registry();
    r.setEnabled("agents", "a.md", true);
    r.setEnabled(MCP_SERVERS, "db", false);
    expect(r.isEnabled("agents", "constructor")).toBe(false);
    expect(r.isEnabled("agents", "toString")).toBe(false);
    expect(r.isEnabled(MCP_SERVERS, "toString")).toBe(true);
    expect(r.counts("agents", ["constructor", "toString"])).toEqual({ total: 3, enabled: 1 });
  });
});

describe("ExtensionLibrary", () => {
  const tmpDirs: string[] = [];

  function setup(): { library: ExtensionLibrary; registry: EnabledRegistry; lib: string; target: string } {
    const d = createTmpDir();
    tmpDirs.push(d);
    const lib = path.join(d, "ext");
    const target = path.join(d, "claude");
    fs.mkdirSync(path.join(lib, "agents", "team"), { recursive: true });
    fs.writeFileSync(path.join(lib, "agents", "solo.md"), "solo\n");
    fs.writeFileSync(path.join(lib, "agents", "notes.txt"), "ignored\n");
    fs.writeFileSync(path.join(lib, "agents", "CLAUDE.md"), "ignored\n");
    fs.writeFileSync(path.join(lib, "agents", "team", "api.md"), "api\n");
    fs.mkdirSync(path.join(lib, "skills", "pdf"), { recursive: true });
    fs.mkdirSync(path.join(lib, "skills", ".cache"), { recursive: true });
    const registry = new EnabledRegistry(path.join(d, "enabled.json"));
    return { library: new ExtensionLibrary(lib, target, registry), registry, lib, target };
  }

  afterEach(() => {
    for (const d of tmpDirs) {
      fs.rmSync(d, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  test("lists library items per category", () => {
    const { library } = setup();
    expect(library.listItems("agents")).toEqual(["solo.md", "team/api.md"]);
    expect(library.listItems("skills")).toEqual(["pdf"]);
    expect(library.listItems("commands")).toEqual([]);
  });

  test("enable links, disable unlinks", () => {
    const { library, lib, target } = setup();

    const enabled = library.enable("agents", ["*", "ghost.md"]);
    expect(enabled).toEqual({ changed: ["solo.md", "team/api.md"], notFound: ["ghost.md"] });
    expect(fs.readlinkSync(path.join(target, "agents", "team", "api.md"))).toBe(path.join(lib, "agents", "team", "api.md"));
    expect(library.items("agents")).toEqual([
      { name: "solo.md", enabled: true },
      { name: "team/api.md", enabled: true },
    ]);

    library.disable("agents", ["team/*"]);
    expect(fs.existsSync(path.join(target, "agents", "team", "api.md"))).toBe(false);
    expect(fs.lstatSync(path.join(target, "agents", "solo.md")).isSymbolicLink()).toBe(true);
  });

  test("directories are linked as a whole", () => {
    const { library, target } = setup();
    library.enable("skills", ["pdf"]);
    expect(fs.lstatSync(path.join(target, "skills", "pdf")).isSymbolicLink()).toBe(true);
  });
});
