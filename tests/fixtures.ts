import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { PluginHost, type HostResult } from "../src/adapters/base.js";
import type { Paths } from "../src/config.js";
import { createContext, type Context } from "../src/context.js";
import {
  installedPluginsFile,
  knownMarketplacesFile,
  loadInstalledPlugins,
  loadKnownMarketplaces,
  type InstallRecord,
} from "../src/plugins.js";
import { marketplaceKey, type Marketplace, type Scope } from "../src/profiles.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "loadout-test-"));
}

export function writeJson(file: string, data: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(data, null, 2) + "\n");
}

export function readJsonFile(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf-8"));
}

/**
 * Stands in for the assistant CLI: records calls and updates the
 * installed/known files the way a real install would.
 */
export class FakeHost extends PluginHost {
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  private readonly claudeDir: string;

  constructor(claudeDir: string) {
    super();
    this.claudeDir = claudeDir;
  }

  isAvailable(): boolean {
    return true;
  }

  addMarketplace(marketplace: Marketplace): HostResult {
    const key = marketplaceKey(marketplace);
    this.calls.push(`marketplace ${key}`);
    if (this.failing.has(key)) return { ok: false, message: "network unreachable" };
    const known = loadKnownMarketplaces(this.claudeDir);
    const name = key.split("/").pop() ?? key;
    writeJson(knownMarketplacesFile(this.claudeDir), { ...known, [name]: { source: { ...marketplace } } });
    return { ok: true };
  }

  installPlugin(id: string, scope: Scope, projectRoot: string): HostResult {
    this.calls.push(`install ${id} ${scope}`);
    if (this.failing.has(id)) return { ok: false, message: "plugin not found in marketplace" };
    const installPath = path.join(this.claudeDir, "plugins", "cache", id);
    fs.mkdirSync(installPath, { recursive: true });
    const installed = loadInstalledPlugins(this.claudeDir);
    const record: InstallRecord = { scope, version: "1.0.0", installPath, isLocal: false };
    if (scope !== "user") record.projectPath = projectRoot;
    installed.plugins[id] = [...(installed.plugins[id] ?? []), record];
    writeJson(installedPluginsFile(this.claudeDir), installed);
    return { ok: true };
  }

  get displayName(): string {
    return "fake";
  }
}

export interface TestEnv {
  root: string;
  paths: Paths;
  builtinDir: string;
  project: string;
  host: FakeHost;
  ctx: Context;
}

/** A home, a claude dir, a built-in profiles dir and a project, all under one temp dir. */
export function createTestEnv(root: string): TestEnv {
  const paths: Paths = { home: path.join(root, "home"), claudeDir: path.join(root, "claude") };
  const builtinDir = path.join(root, "builtin");
  const project = path.join(root, "project");
  fs.mkdirSync(builtinDir, { recursive: true });
  fs.mkdirSync(project, { recursive: true });
  const host = new FakeHost(paths.claudeDir);
  const ctx = createContext(paths, host, { builtinDir, now: () => new Date("2026-01-02T03:04:05.000Z") });
  return { root, paths, builtinDir, project, host, ctx };
}

export function writeBuiltin(env: TestEnv, name: string, doc: Record<string, unknown>): void {
  writeJson(path.join(env.builtinDir, `${name}.json`), { name, ...doc });
}

export function writeUserProfile(env: TestEnv, name: string, doc: Record<string, unknown>): string {
  const file = path.join(env.paths.home, "profiles", `${name}.json`);
  writeJson(file, { name, ...doc });
  return file;
}

export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, "");
}
