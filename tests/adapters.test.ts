import { describe, test, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ClaudeCliHost, NoopHost, createHost } from "../src/adapters/index.js";
import { createTmpDir } from "./fixtures.js";

describe("createHost", () => {
  test("builds the configured host", () => {
    expect(createHost({ type: "claude" }).displayName).toBe("claude");
    expect(createHost({ type: "claude", bin: "/opt/bin/claude" }).displayName).toBe("/opt/bin/claude");
    expect(createHost({ type: "none" })).toBeInstanceOf(NoopHost);
  });

  test("unknown types fail", () => {
    expect(() => createHost({ type: "docker" })).toThrow("Unknown host type: docker");
  });
});

describe("NoopHost", () => {
  test("reports success without doing anything", () => {
    const host = new NoopHost();
    expect(host.addMarketplace({ source: "github", repo: "acme/plugins" })).toEqual({ ok: true, message: "skipped" });
    expect(host.installPlugin("a@acme", "user", "/")).toEqual({ ok: true, message: "skipped" });
  });
});

describe("ClaudeCliHost", () => {
  const tmpDirs: string[] = [];

  function script(body: string): { bin: string; dir: string } {
    const dir = createTmpDir();
    tmpDirs.push(dir);
    const bin = path.join(dir, "fake-claude");
    fs.writeFileSync(bin, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return { bin, dir };
  }

  afterEach(() => {
    for (const d of tmpDirs) {
      fs.rmSync(d, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  test("availability follows the exit code", () => {
    expect(new ClaudeCliHost("true").isAvailable()).toBe(true);
    expect(new ClaudeCliHost(path.join("/nonexistent", "claude")).isAvailable()).toBe(false);
  });

  test("install runs in the project root with the scope", () => {
    const { bin, dir } = script('echo "$@" > "$(dirname "$0")/args.txt"\npwd > "$(dirname "$0")/cwd.txt"');
    const project = path.join(dir, "project");
    fs.mkdirSync(project);

    expect(new ClaudeCliHost(bin).installPlugin("a@acme", "project", project)).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(dir, "args.txt"), "utf-8")).toBe("plugin install --scope project a@acme\n");
    expect(fs.realpathSync(fs.readFileSync(path.join(dir, "cwd.txt"), "utf-8").trim())).toBe(fs.realpathSync(project));
  });

  test("marketplaces are added by key", () => {
    const { bin, dir } = script('echo "$@" > "$(dirname "$0")/args.txt"');
    new ClaudeCliHost(bin).addMarketplace({ source: "git", url: "https://git.example.com/m.git" });
    expect(fs.readFileSync(path.join(dir, "args.txt"), "utf-8")).toBe(
      "plugin marketplace add https://git.example.com/m.git\n",
    );
  });

  test("already installed counts as success", () => {
    const { bin } = script('echo "Plugin a@acme is already installed"\nexit 1');
    expect(new ClaudeCliHost(bin).installPlugin("a@acme", "user", "/")).toEqual({
      ok: true,
      message: "already installed",
    });
  });

  test("failures carry the output or the exit code", () => {
    const { bin } = script('echo "marketplace not found" >&2\nexit 2');
    expect(new ClaudeCliHost(bin).addMarketplace({ source: "github", repo: "acme/none" })).toEqual({
      ok: false,
      message: "marketplace not found",
    });
    expect(new ClaudeCliHost("false").addMarketplace({ source: "github", repo: "acme/none" })).toEqual({
      ok: false,
      message: "false exited with code 1",
    });
  });
});
